/**
 * Get Timeline Tool
 *
 * @module tools/get-timeline
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { TimelineStore } from '../timeline/store';
import { RunSummary, TimelineEntry } from '../timeline/types';
import { formatProjection, formatRunSummaries } from './formatters/timeline-text';

export interface TimelineSnapshot {
  projection: TimelineEntry[];
  activeRunId: string | null;
  lastSequence: number;
  runs: RunSummary[];
}

export class GetTimelineToolImpl {
  constructor(private readonly store: TimelineStore) {}

  execute(): TimelineSnapshot {
    const state = this.store.getState();
    return {
      projection: this.store.getProjection(),
      activeRunId: state.activeRunId,
      lastSequence: state.lastSequence,
      runs: this.store.getRunSummaries(),
    };
  }

  formatForLLM(snapshot: TimelineSnapshot): string {
    return [
      formatProjection(snapshot.projection, snapshot.activeRunId),
      '',
      formatRunSummaries(snapshot.runs),
    ].join('\n');
  }
}

export const getTimelineToolDefinition: Tool = {
  name: 'get_timeline',
  description:
    'Get the current merged phase timeline across all runs, the active run, and a per-run breakdown.',
  inputSchema: {
    type: 'object',
    properties: {},
    additionalProperties: false,
  },
};
