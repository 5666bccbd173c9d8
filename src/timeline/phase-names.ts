export const DEFAULT_PHASE_MAPPING: Readonly<Record<string, string>> = Object.freeze({
  CONTEXT_ENRICHMENT: 'contextualize',
  PLANNING: 'plan',
  DESIGN: 'design',
  EXECUTION: 'execute',
  REFLECTION: 'review',
  'RE-PLANNING': 'replan',
  RESEARCH: 'research',
});

/**
 * Canonical phase name for a raw label, or null when no name can be derived.
 * Unmapped labels pass through lower-cased.
 */
export function resolvePhaseName(
  rawPhase: unknown,
  mapping: Readonly<Record<string, string>> = DEFAULT_PHASE_MAPPING
): string | null {
  if (typeof rawPhase !== 'string') {
    return null;
  }
  const label = rawPhase.trim();
  if (label.length === 0) {
    return null;
  }
  if (Object.prototype.hasOwnProperty.call(mapping, label)) {
    return mapping[label];
  }
  return label.toLowerCase();
}
