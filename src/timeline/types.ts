/**
 * Shared types for the run timeline reducer.
 *
 * @module timeline/types
 */

export type PhaseStatus = 'running' | 'completed';

export const CANONICAL_EVENT_TYPES = ['RUN_STARTED', 'PHASE_STARTED', 'PHASE_COMPLETED'] as const;
export const LEGACY_EVENT_TYPES = ['phase_start', 'phase_completed', 'conversation_init'] as const;

export type CanonicalEventType = (typeof CANONICAL_EVENT_TYPES)[number];
export type LegacyEventType = (typeof LEGACY_EVENT_TYPES)[number];
export type KnownEventType = CanonicalEventType | LegacyEventType;

/**
 * Wire shape of an incoming progress event. Producers are not trusted to
 * honour it, so the normalizer reads every field defensively.
 */
export interface RawTimelineEvent {
  type: string;
  payload?: RawTimelineEventPayload;
}

export interface RawTimelineEventPayload {
  run_id?: string;
  phase?: string;
  seq?: number;
  status?: PhaseStatus;
  iteration?: number;
  mode?: string;
  timestamp?: string;
  agent?: string;
  [key: string]: unknown;
}

export interface RunMetadata {
  iteration?: number;
  mode?: string;
  startedAt?: string;
}

export type NormalizedEvent =
  | { kind: 'reset' }
  | { kind: 'run_started'; runId: string; sequence?: number; metadata: RunMetadata }
  | {
      kind: 'phase_update';
      runId?: string;
      phase?: string;
      status: PhaseStatus;
      sequence?: number;
      agent?: string;
    }
  | { kind: 'ignored'; sequence?: number }
  | { kind: 'malformed' };

export interface RunState {
  readonly runId: string;
  /** Insertion-ordered; the projection relies on first-seen order. */
  readonly phases: ReadonlyMap<string, PhaseStatus>;
  /** Last agent that reported on each phase, when the producer named one. */
  readonly agents: ReadonlyMap<string, string>;
  readonly metadata: RunMetadata;
}

export interface TimelineState {
  readonly activeRunId: string | null;
  readonly lastSequence: number;
  readonly runs: ReadonlyMap<string, RunState>;
}

export interface TimelineEntry {
  phase: string;
  status: PhaseStatus;
}

export interface RunPhaseSummary extends TimelineEntry {
  agent?: string;
}

export interface RunSummary extends RunMetadata {
  runId: string;
  active: boolean;
  phases: RunPhaseSummary[];
}

export type ReductionOutcome =
  | 'accepted'
  | 'reset'
  | 'stale'
  | 'unresolved_phase'
  | 'illegal_transition'
  | 'malformed'
  | 'ignored_kind';

export interface ReductionResult {
  state: TimelineState;
  outcome: ReductionOutcome;
}

export interface TimelineOptions {
  /** Raw phase label to canonical name. */
  phaseMapping: Readonly<Record<string, string>>;
  /** Run that phase events land in when neither the event nor the state names one. */
  fallbackRunId: string;
  /** Separator before the numeric iteration suffix of a run id, as in `mission-7:2`. */
  iterationSeparator: string;
}
