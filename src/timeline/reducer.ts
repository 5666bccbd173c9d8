/**
 * Pure `(state, event) -> state` transition for the run timeline.
 *
 * Every input is accepted. Stale, malformed, unresolved and illegal events
 * leave the runs untouched and are reported through the outcome instead of
 * an exception.
 *
 * @module timeline/reducer
 */

import { normalizeEvent } from './event-normalizer';
import { advanceSequence, isStaleSequence } from './ordering-guard';
import { applyPhaseStatus } from './phase-state-machine';
import { resetTimeline } from './reset-controller';
import { createRunState, putRun, resolveRunId, startRun } from './run-registry';
import { DEFAULT_TIMELINE_OPTIONS } from './options';
import {
  NormalizedEvent,
  ReductionResult,
  TimelineOptions,
  TimelineState,
} from './types';

type PhaseUpdate = Extract<NormalizedEvent, { kind: 'phase_update' }>;

function withSequence(state: TimelineState, lastSequence: number): TimelineState {
  return lastSequence === state.lastSequence ? state : { ...state, lastSequence };
}

function applyPhaseUpdate(
  state: TimelineState,
  event: PhaseUpdate,
  lastSequence: number,
  options: TimelineOptions
): ReductionResult {
  if (event.phase === undefined) {
    return { state: withSequence(state, lastSequence), outcome: 'unresolved_phase' };
  }

  const runId = resolveRunId(state, event.runId, options.fallbackRunId);
  const run = state.runs.get(runId) ?? createRunState(runId);
  const updated = applyPhaseStatus(run, event.phase, event.status, event.agent);

  if (!updated) {
    return { state: withSequence(state, lastSequence), outcome: 'illegal_transition' };
  }

  return {
    state: {
      // The producer's run id wins over whatever run this consumer had in focus.
      activeRunId: event.runId ?? state.activeRunId ?? runId,
      lastSequence,
      runs: putRun(state, updated),
    },
    outcome: 'accepted',
  };
}

export function reduceTimelineEvent(
  state: TimelineState,
  raw: unknown,
  options: TimelineOptions = DEFAULT_TIMELINE_OPTIONS
): ReductionResult {
  const event = normalizeEvent(raw, options);

  if (event.kind === 'reset') {
    return { state: resetTimeline(), outcome: 'reset' };
  }
  if (event.kind === 'malformed') {
    return { state, outcome: 'malformed' };
  }
  if (isStaleSequence(state.lastSequence, event.sequence)) {
    return { state, outcome: 'stale' };
  }

  const lastSequence = advanceSequence(state.lastSequence, event.sequence);

  switch (event.kind) {
    case 'ignored':
      return { state: withSequence(state, lastSequence), outcome: 'ignored_kind' };
    case 'run_started':
      return {
        state: startRun(state, event.runId, event.metadata, lastSequence),
        outcome: 'accepted',
      };
    case 'phase_update':
      return applyPhaseUpdate(state, event, lastSequence, options);
  }
}

export function reduceTimeline(
  state: TimelineState,
  raw: unknown,
  options: TimelineOptions = DEFAULT_TIMELINE_OPTIONS
): TimelineState {
  return reduceTimelineEvent(state, raw, options).state;
}

/**
 * Fold a batch of events, starting from `initial` when given.
 */
export function replayTimelineEvents(
  events: Iterable<unknown>,
  options: TimelineOptions = DEFAULT_TIMELINE_OPTIONS,
  initial: TimelineState = resetTimeline()
): TimelineState {
  let state = initial;
  for (const event of events) {
    state = reduceTimeline(state, event, options);
  }
  return state;
}
