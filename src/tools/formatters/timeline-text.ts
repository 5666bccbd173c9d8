import type { ReductionOutcome, RunSummary, TimelineEntry } from '../../timeline/types';

export function formatProjection(projection: TimelineEntry[], activeRunId: string | null): string {
  if (projection.length === 0) {
    return 'Timeline is empty.';
  }

  const header = `Timeline (${projection.length} phase${projection.length === 1 ? '' : 's'}, active run: ${
    activeRunId ?? 'none'
  }):`;
  const lines = projection.map((entry, index) => `${index + 1}. ${entry.phase}: ${entry.status}`);
  return [header, ...lines].join('\n');
}

export function formatRunSummaries(runs: RunSummary[]): string {
  if (runs.length === 0) {
    return 'No runs recorded.';
  }

  const lines: string[] = [`Runs (${runs.length}):`];
  for (const run of runs) {
    const details: string[] = [];
    if (run.iteration !== undefined) {
      details.push(`iteration ${run.iteration}`);
    }
    if (run.mode) {
      details.push(`mode ${run.mode}`);
    }
    const suffix = details.length > 0 ? ` (${details.join(', ')})` : '';
    lines.push(`- ${run.runId}${run.active ? ' [active]' : ''}${suffix}`);
    for (const phase of run.phases) {
      lines.push(`    ${phase.phase}: ${phase.status}${phase.agent ? ` (${phase.agent})` : ''}`);
    }
  }
  return lines.join('\n');
}

/**
 * Counts per outcome in first-seen order, e.g. "accepted=3, stale=1".
 */
export function formatOutcomeCounts(outcomes: ReductionOutcome[]): string {
  const counts = new Map<ReductionOutcome, number>();
  for (const outcome of outcomes) {
    counts.set(outcome, (counts.get(outcome) ?? 0) + 1);
  }
  return Array.from(counts, ([outcome, count]) => `${outcome}=${count}`).join(', ');
}
