/**
 * Replay Timeline Log Tool
 *
 * Rebuilds a timeline from a newline-delimited JSON event log inside the
 * workspace. The live store is left alone.
 *
 * @module tools/replay-log
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { loadTimelineEventLog } from '../timeline/event-log';
import { replayTimelineEvents } from '../timeline/reducer';
import { buildProjection, describeRuns } from '../timeline/timeline-aggregator';
import { RunSummary, TimelineEntry, TimelineOptions } from '../timeline/types';
import { safeFilePath } from '../validation/common';
import { validate } from '../validation/middleware';
import { formatProjection, formatRunSummaries } from './formatters/timeline-text';

export const EVENT_LOG_EXTENSIONS = ['.jsonl', '.ndjson', '.log'] as const;

export const ReplayTimelineLogParamsSchema = z
  .object({
    path: z.string().min(1, 'path cannot be empty'),
  })
  .strict();

export type ReplayTimelineLogParams = z.infer<typeof ReplayTimelineLogParamsSchema>;

export interface ReplayTimelineLogResult {
  logPath: string;
  eventCount: number;
  projection: TimelineEntry[];
  activeRunId: string | null;
  runs: RunSummary[];
}

export class ReplayTimelineLogToolImpl {
  constructor(
    private readonly workspaceRoot: string,
    private readonly options: TimelineOptions
  ) {}

  readonly execute = validate(ReplayTimelineLogParamsSchema)(
    async (params: ReplayTimelineLogParams): Promise<ReplayTimelineLogResult> => {
      const logPath = await safeFilePath(params.path, {
        baseDir: this.workspaceRoot,
        allowedExtensions: EVENT_LOG_EXTENSIONS,
      });
      const events = await loadTimelineEventLog(logPath);
      const state = replayTimelineEvents(events, this.options);

      return {
        logPath,
        eventCount: events.length,
        projection: buildProjection(state, this.options.iterationSeparator),
        activeRunId: state.activeRunId,
        runs: describeRuns(state, this.options.iterationSeparator),
      };
    }
  );

  formatForLLM(result: ReplayTimelineLogResult): string {
    return [
      `Replayed ${result.eventCount} event${result.eventCount === 1 ? '' : 's'} from ${result.logPath}.`,
      '',
      formatProjection(result.projection, result.activeRunId),
      '',
      formatRunSummaries(result.runs),
    ].join('\n');
  }
}

export const replayTimelineLogToolDefinition: Tool = {
  name: 'replay_timeline_log',
  description:
    'Rebuild a timeline from a newline-delimited JSON event log in the workspace without touching the live timeline.',
  inputSchema: {
    type: 'object',
    properties: {
      path: {
        type: 'string',
        description: 'Log file path relative to the workspace root (.jsonl, .ndjson or .log)',
      },
    },
    required: ['path'],
    additionalProperties: false,
  },
};
