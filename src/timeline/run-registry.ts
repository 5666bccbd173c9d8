import { RunMetadata, RunState, TimelineState } from './types';

export function createRunState(runId: string, metadata: RunMetadata = {}): RunState {
  return {
    runId,
    phases: new Map(),
    agents: new Map(),
    metadata,
  };
}

export function putRun(state: TimelineState, run: RunState): ReadonlyMap<string, RunState> {
  const runs = new Map(state.runs);
  runs.set(run.runId, run);
  return runs;
}

/**
 * Registers `runId` if needed and makes it the active run, even when it was
 * already known. Repeated starts refresh the metadata.
 */
export function startRun(
  state: TimelineState,
  runId: string,
  metadata: RunMetadata,
  lastSequence: number
): TimelineState {
  const existing = state.runs.get(runId);
  const run: RunState = existing
    ? { ...existing, metadata: { ...existing.metadata, ...metadata } }
    : createRunState(runId, metadata);

  return {
    activeRunId: runId,
    lastSequence,
    runs: putRun(state, run),
  };
}

/**
 * Run a phase event belongs to: the event's own id, then the active run,
 * then the fallback run.
 */
export function resolveRunId(
  state: TimelineState,
  explicitRunId: string | undefined,
  fallbackRunId: string
): string {
  return explicitRunId ?? state.activeRunId ?? fallbackRunId;
}
