/**
 * Derives the consumer-facing projection from every known run.
 *
 * @module timeline/timeline-aggregator
 */

import { DEFAULT_ITERATION_SEPARATOR } from './options';
import { PhaseStatus, RunSummary, TimelineEntry, TimelineState } from './types';

const ITERATION_PATTERN = /^\d+$/;

/**
 * Numeric iteration after the last separator, e.g. 2 for `mission-7:2`.
 */
export function parseIterationSuffix(
  runId: string,
  separator: string = DEFAULT_ITERATION_SEPARATOR
): number | null {
  const index = runId.lastIndexOf(separator);
  if (index < 0) {
    return null;
  }
  const suffix = runId.slice(index + separator.length);
  return ITERATION_PATTERN.test(suffix) ? Number(suffix) : null;
}

const compareLexical = (a: string, b: string): number => a.localeCompare(b, 'en');

/**
 * Merge order for runs. Two numbered ids compare by iteration; any other pair
 * compares lexically. To keep that a total order, numbered ids are sorted
 * among themselves and each unnumbered id is slotted in lexically against
 * the next numbered one, so `default_run`, `m:9`, `m:10` stay in that order.
 */
export function orderRunIds(
  runIds: Iterable<string>,
  separator: string = DEFAULT_ITERATION_SEPARATOR
): string[] {
  const numbered: Array<{ runId: string; iteration: number }> = [];
  const unnumbered: string[] = [];

  for (const runId of runIds) {
    const iteration = parseIterationSuffix(runId, separator);
    if (iteration === null) {
      unnumbered.push(runId);
    } else {
      numbered.push({ runId, iteration });
    }
  }

  numbered.sort((a, b) => a.iteration - b.iteration || compareLexical(a.runId, b.runId));
  unnumbered.sort(compareLexical);

  const ordered: string[] = [];
  let next = 0;
  for (const { runId } of numbered) {
    while (next < unnumbered.length && compareLexical(unnumbered[next], runId) < 0) {
      ordered.push(unnumbered[next]);
      next += 1;
    }
    ordered.push(runId);
  }
  return ordered.concat(unnumbered.slice(next));
}

/**
 * Later runs overwrite shared phase keys; entries keep first-seen order.
 */
export function buildProjection(
  state: TimelineState,
  separator: string = DEFAULT_ITERATION_SEPARATOR
): TimelineEntry[] {
  const merged = new Map<string, PhaseStatus>();

  for (const runId of orderRunIds(state.runs.keys(), separator)) {
    const run = state.runs.get(runId);
    if (!run) {
      continue;
    }
    for (const [phase, status] of run.phases) {
      merged.set(phase, status);
    }
  }

  return Array.from(merged, ([phase, status]) => ({ phase, status }));
}

export function describeRuns(
  state: TimelineState,
  separator: string = DEFAULT_ITERATION_SEPARATOR
): RunSummary[] {
  const summaries: RunSummary[] = [];
  for (const runId of orderRunIds(state.runs.keys(), separator)) {
    const run = state.runs.get(runId);
    if (!run) {
      continue;
    }
    summaries.push({
      runId,
      active: state.activeRunId === runId,
      ...run.metadata,
      phases: Array.from(run.phases, ([phase, status]) => {
        const agent = run.agents.get(phase);
        return agent === undefined ? { phase, status } : { phase, status, agent };
      }),
    });
  }
  return summaries;
}
