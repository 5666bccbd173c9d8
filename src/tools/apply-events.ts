/**
 * Apply Timeline Events Tool
 *
 * Feeds a batch of progress events into the live timeline store and reports
 * what happened to each one.
 *
 * @module tools/apply-events
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { TimelineStore } from '../timeline/store';
import { ReductionOutcome, TimelineEntry } from '../timeline/types';
import { validate } from '../validation/middleware';
import { TimelineEventInputSchema } from '../validation/schemas/event-schema';
import { formatOutcomeCounts, formatProjection } from './formatters/timeline-text';

export const MAX_EVENTS_PER_CALL = 500;

export const ApplyTimelineEventsParamsSchema = z
  .object({
    events: z.array(TimelineEventInputSchema).min(1).max(MAX_EVENTS_PER_CALL),
  })
  .strict();

export type ApplyTimelineEventsParams = z.infer<typeof ApplyTimelineEventsParamsSchema>;

export interface AppliedEvent {
  type: string;
  outcome: ReductionOutcome;
}

export interface ApplyTimelineEventsResult {
  applied: AppliedEvent[];
  projection: TimelineEntry[];
  activeRunId: string | null;
  lastSequence: number;
}

export class ApplyTimelineEventsToolImpl {
  constructor(private readonly store: TimelineStore) {}

  readonly execute = validate(ApplyTimelineEventsParamsSchema)(
    (params: ApplyTimelineEventsParams): ApplyTimelineEventsResult => {
      const applied = params.events.map((event) => ({
        type: event.type,
        outcome: this.store.dispatch(event),
      }));
      const state = this.store.getState();

      return {
        applied,
        projection: this.store.getProjection(),
        activeRunId: state.activeRunId,
        lastSequence: state.lastSequence,
      };
    }
  );

  formatForLLM(result: ApplyTimelineEventsResult): string {
    const outcomes = formatOutcomeCounts(result.applied.map((entry) => entry.outcome));
    return [
      `Applied ${result.applied.length} event${result.applied.length === 1 ? '' : 's'} (${outcomes}).`,
      '',
      formatProjection(result.projection, result.activeRunId),
    ].join('\n');
  }
}

export const applyTimelineEventsToolDefinition: Tool = {
  name: 'apply_timeline_events',
  description:
    'Apply run/phase progress events (RUN_STARTED, PHASE_STARTED, PHASE_COMPLETED, or legacy phase_start, phase_completed, conversation_init) to the live timeline. Stale or invalid events are dropped without error.',
  inputSchema: {
    type: 'object',
    properties: {
      events: {
        type: 'array',
        minItems: 1,
        maxItems: MAX_EVENTS_PER_CALL,
        items: {
          type: 'object',
          required: ['type'],
          properties: {
            type: { type: 'string', description: 'Event type' },
            payload: {
              type: 'object',
              description: 'Event payload: run_id, phase, seq, iteration, mode, timestamp',
            },
          },
        },
      },
    },
    required: ['events'],
    additionalProperties: false,
  },
};
