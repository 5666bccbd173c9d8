/**
 * Mutable holder around the pure reducer, for hosts that want one current
 * timeline and change notifications.
 *
 * @module timeline/store
 */

import { emitTelemetryInfo, emitTelemetryWarning } from '../telemetry/telemetry';
import { summarizeRawEvent } from './event-normalizer';
import { DEFAULT_TIMELINE_OPTIONS } from './options';
import { reduceTimelineEvent } from './reducer';
import { resetTimeline } from './reset-controller';
import { buildProjection, describeRuns } from './timeline-aggregator';
import {
  ReductionOutcome,
  RunSummary,
  TimelineEntry,
  TimelineOptions,
  TimelineState,
} from './types';

export type TimelineListener = (projection: TimelineEntry[], state: TimelineState) => void;

export interface TimelineStoreOptions {
  readonly options?: TimelineOptions;
  readonly initialState?: TimelineState;
  /**
   * Telemetry source identifier for dropped events and listener failures.
   */
  readonly telemetrySource?: string;
}

const DEFAULT_TELEMETRY_SOURCE = 'TimelineStore';

export class TimelineStore {
  private state: TimelineState;
  private readonly options: TimelineOptions;
  private readonly telemetrySource: string;
  private readonly listeners = new Set<TimelineListener>();

  constructor(storeOptions: TimelineStoreOptions = {}) {
    this.options = storeOptions.options ?? DEFAULT_TIMELINE_OPTIONS;
    this.state = storeOptions.initialState ?? resetTimeline();
    this.telemetrySource = storeOptions.telemetrySource ?? DEFAULT_TELEMETRY_SOURCE;
  }

  dispatch(raw: unknown): ReductionOutcome {
    const previous = this.state;
    const { state, outcome } = reduceTimelineEvent(previous, raw, this.options);
    this.state = state;

    if (outcome !== 'accepted' && outcome !== 'reset') {
      emitTelemetryInfo(this.telemetrySource, `event_${outcome}`, {
        ...summarizeRawEvent(raw),
        lastSequence: state.lastSequence,
      });
    }

    if (state !== previous) {
      this.notify();
    }
    return outcome;
  }

  dispatchAll(events: Iterable<unknown>): ReductionOutcome[] {
    const outcomes: ReductionOutcome[] = [];
    for (const event of events) {
      outcomes.push(this.dispatch(event));
    }
    return outcomes;
  }

  reset(): void {
    this.state = resetTimeline();
    this.notify();
  }

  getState(): TimelineState {
    return this.state;
  }

  getActiveRunId(): string | null {
    return this.state.activeRunId;
  }

  getProjection(): TimelineEntry[] {
    return buildProjection(this.state, this.options.iterationSeparator);
  }

  getRunSummaries(): RunSummary[] {
    return describeRuns(this.state, this.options.iterationSeparator);
  }

  /**
   * Listen for state changes. Returns the matching unsubscribe function.
   */
  subscribe(listener: TimelineListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    if (this.listeners.size === 0) {
      return;
    }
    const projection = this.getProjection();
    for (const listener of Array.from(this.listeners)) {
      try {
        listener(projection, this.state);
      } catch (error) {
        emitTelemetryWarning(this.telemetrySource, 'listener_failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
