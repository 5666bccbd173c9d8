import { describe, expect, test } from '@jest/globals';
import { DEFAULT_PHASE_MAPPING, resolvePhaseName } from '../../src/timeline/phase-names';

describe('resolvePhaseName', () => {
  test.each([
    ['CONTEXT_ENRICHMENT', 'contextualize'],
    ['PLANNING', 'plan'],
    ['DESIGN', 'design'],
    ['EXECUTION', 'execute'],
    ['REFLECTION', 'review'],
    ['RE-PLANNING', 'replan'],
    ['RESEARCH', 'research'],
  ])('maps %s to %s', (label, expected) => {
    expect(resolvePhaseName(label)).toBe(expected);
  });

  test('passes unknown labels through lower-cased and trimmed', () => {
    expect(resolvePhaseName('Verification')).toBe('verification');
    expect(resolvePhaseName('  PLANNING  ')).toBe('plan');
  });

  test('matches mapped labels case-sensitively', () => {
    expect(resolvePhaseName('planning')).toBe('planning');
  });

  test('returns null when no name can be derived', () => {
    expect(resolvePhaseName(undefined)).toBeNull();
    expect(resolvePhaseName('')).toBeNull();
    expect(resolvePhaseName(' \t')).toBeNull();
    expect(resolvePhaseName(3)).toBeNull();
  });

  test('ignores inherited object keys', () => {
    expect(resolvePhaseName('constructor')).toBe('constructor');
  });

  test('accepts a custom mapping', () => {
    expect(resolvePhaseName('QA', { QA: 'verify' })).toBe('verify');
    expect(Object.isFrozen(DEFAULT_PHASE_MAPPING)).toBe(true);
  });
});
