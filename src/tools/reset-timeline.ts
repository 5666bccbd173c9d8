/**
 * Reset Timeline Tool
 *
 * @module tools/reset-timeline
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { TimelineStore } from '../timeline/store';

export interface ResetTimelineResult {
  clearedRuns: number;
}

export class ResetTimelineToolImpl {
  constructor(private readonly store: TimelineStore) {}

  execute(): ResetTimelineResult {
    const clearedRuns = this.store.getState().runs.size;
    this.store.reset();
    return { clearedRuns };
  }

  formatForLLM(result: ResetTimelineResult): string {
    return `Timeline reset. Cleared ${result.clearedRuns} run${result.clearedRuns === 1 ? '' : 's'}.`;
  }
}

export const resetTimelineToolDefinition: Tool = {
  name: 'reset_timeline',
  description: 'Discard every run and phase, rewinding the sequence cursor.',
  inputSchema: {
    type: 'object',
    properties: {},
    additionalProperties: false,
  },
};
