import { afterEach, beforeEach, describe, expect, test } from '@jest/globals';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import {
  DEFAULT_TIMELINE_OPTIONS,
  TimelineStore,
  buildProjection,
  buildRunTimelineContext,
  executeRunTimelineTool,
  getToolDefinitions,
  replayTimelineEvents,
  resolveTimelineConfig,
  sanitizeArgs,
  summarizeValue,
} from '../src/index';
import type { RunTimelineContext } from '../src/index';
import { ValidationError } from '../src/errors/validation-error';

const event = (type: string, payload: Record<string, unknown>) => ({ type, payload });

function textOf(result: Awaited<ReturnType<typeof executeRunTimelineTool>>): string {
  const [first] = result.content;
  return first && first.type === 'text' ? first.text : '';
}

describe('run timeline entry point', () => {
  let workspaceRoot: string;

  beforeEach(async () => {
    workspaceRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'timeline-server-'));
  });

  afterEach(async () => {
    await fs.rm(workspaceRoot, { recursive: true, force: true });
  });

  test('exposes tool definitions with expected identifiers', () => {
    expect(getToolDefinitions().map((definition) => definition.name)).toEqual([
      'apply_timeline_events',
      'get_timeline',
      'reset_timeline',
      'replay_timeline_log',
    ]);
  });

  test('re-exports the timeline library', () => {
    const state = replayTimelineEvents(
      [event('RUN_STARTED', { run_id: 'r1', seq: 0 }), event('PHASE_STARTED', { phase: 'EXECUTION', seq: 1 })],
      DEFAULT_TIMELINE_OPTIONS
    );

    expect(buildProjection(state)).toEqual([{ phase: 'execute', status: 'running' }]);
    expect(new TimelineStore({ initialState: state }).getActiveRunId()).toBe('r1');
    expect(resolveTimelineConfig().fallbackRunId).toBe('default_run');
  });

  test('summarizeValue and sanitizeArgs keep log payloads small', () => {
    expect(summarizeValue('x'.repeat(250))).toBe(`${'x'.repeat(197)}…`);
    expect(summarizeValue([1, { a: 1 }, undefined])).toEqual([1, '[object]', null]);
    expect(summarizeValue(true)).toBe(true);
    expect(sanitizeArgs(null)).toBeUndefined();
    expect(sanitizeArgs({ path: 'logs/run.jsonl', events: [{ type: 'RUN_STARTED' }] })).toEqual({
      path: 'logs/run.jsonl',
      events: ['[object]'],
    });
  });

  test('buildRunTimelineContext uses built-in defaults', async () => {
    const context = await buildRunTimelineContext({ workspaceRoot });

    expect(context.workspaceRoot).toBe(path.resolve(workspaceRoot));
    expect(context.config.fallbackRunId).toBe('default_run');
    expect(context.config.iterationSeparator).toBe(':');
    expect(context.config.phaseMapping.PLANNING).toBe('plan');
    expect(context.store.getProjection()).toEqual([]);
  });

  test('buildRunTimelineContext loads a config file relative to the workspace', async () => {
    await fs.writeFile(
      path.join(workspaceRoot, 'timeline.yaml'),
      ['fallbackRunId: orphans', 'phaseMapping:', '  VERIFICATION: Verify', ''].join('\n'),
      'utf-8'
    );

    const context = await buildRunTimelineContext({ workspaceRoot, configPath: 'timeline.yaml' });
    await executeRunTimelineTool(
      'apply_timeline_events',
      { events: [event('phase_start', { phase: 'VERIFICATION' })] },
      context
    );

    expect(context.config.phaseMapping.PLANNING).toBe('plan');
    expect(context.store.getRunSummaries()).toEqual([
      { runId: 'orphans', active: true, phases: [{ phase: 'verify', status: 'running' }] },
    ]);
  });

  describe('executeRunTimelineTool', () => {
    let context: RunTimelineContext;

    beforeEach(async () => {
      context = await buildRunTimelineContext({ workspaceRoot });
    });

    test('apply_timeline_events reports outcomes and the projection', async () => {
      const result = await executeRunTimelineTool(
        'apply_timeline_events',
        {
          events: [
            event('RUN_STARTED', { run_id: 'r1', seq: 0 }),
            event('PHASE_STARTED', { phase: 'PLANNING', seq: 1 }),
            event('PHASE_COMPLETED', { phase: 'PLANNING', seq: 2 }),
            event('PHASE_COMPLETED', { phase: 'PLANNING', seq: 2 }),
          ],
        },
        context
      );

      expect(textOf(result)).toBe(
        'Applied 4 events (accepted=3, stale=1).\n\nTimeline (1 phase, active run: r1):\n1. plan: completed'
      );
      expect(result.structuredContent).toEqual({
        success: true,
        applied: [
          { type: 'RUN_STARTED', outcome: 'accepted' },
          { type: 'PHASE_STARTED', outcome: 'accepted' },
          { type: 'PHASE_COMPLETED', outcome: 'accepted' },
          { type: 'PHASE_COMPLETED', outcome: 'stale' },
        ],
        projection: [{ phase: 'plan', status: 'completed' }],
        activeRunId: 'r1',
        lastSequence: 2,
      });
    });

    test('get_timeline and reset_timeline share the live store', async () => {
      await executeRunTimelineTool(
        'apply_timeline_events',
        { events: [event('RUN_STARTED', { run_id: 'r1' }), event('PHASE_COMPLETED', { phase: 'PLANNING' })] },
        context
      );

      const snapshot = await executeRunTimelineTool('get_timeline', {}, context);
      expect(textOf(snapshot)).toBe(
        'Timeline (1 phase, active run: r1):\n1. plan: completed\n\nRuns (1):\n- r1 [active]\n    plan: completed'
      );

      const reset = await executeRunTimelineTool('reset_timeline', {}, context);
      expect(textOf(reset)).toBe('Timeline reset. Cleared 1 run.');
      expect(reset.structuredContent).toEqual({ success: true, clearedRuns: 1 });

      const empty = await executeRunTimelineTool('get_timeline', undefined, context);
      expect(textOf(empty)).toBe('Timeline is empty.\n\nNo runs recorded.');
    });

    test('replay_timeline_log rebuilds a timeline without touching the live store', async () => {
      await fs.mkdir(path.join(workspaceRoot, 'logs'));
      const lines = [
        event('RUN_STARTED', { run_id: 'm:1', seq: 0, iteration: 1, mode: 'standard' }),
        event('PHASE_STARTED', { phase: 'PLANNING', seq: 1 }),
        event('PHASE_COMPLETED', { phase: 'PLANNING', seq: 2 }),
        event('RUN_STARTED', { run_id: 'm:2', seq: 3, iteration: 2 }),
        event('PHASE_STARTED', { phase: 'PLANNING', seq: 4 }),
      ].map((record) => JSON.stringify(record));
      await fs.writeFile(path.join(workspaceRoot, 'logs', 'session.jsonl'), lines.join('\n'), 'utf-8');
      const logPath = path.join(path.resolve(workspaceRoot), 'logs', 'session.jsonl');

      const result = await executeRunTimelineTool('replay_timeline_log', { path: 'logs/session.jsonl' }, context);

      expect(textOf(result)).toBe(
        [
          `Replayed 5 events from ${logPath}.`,
          '',
          'Timeline (1 phase, active run: m:2):',
          '1. plan: running',
          '',
          'Runs (2):',
          '- m:1 (iteration 1, mode standard)',
          '    plan: completed',
          '- m:2 [active] (iteration 2)',
          '    plan: running',
        ].join('\n')
      );
      expect(result.structuredContent).toMatchObject({ success: true, logPath, eventCount: 5 });
      expect(context.store.getProjection()).toEqual([]);
    });

    test('rejects invalid tool arguments with ValidationError', async () => {
      await expect(executeRunTimelineTool('apply_timeline_events', { events: [] }, context)).rejects.toBeInstanceOf(
        ValidationError
      );
      await expect(
        executeRunTimelineTool('replay_timeline_log', { path: '../outside.jsonl' }, context)
      ).rejects.toThrow('Path cannot contain parent directory traversals');
    });

    test('rejects unknown tools with MethodNotFound', async () => {
      const pending = executeRunTimelineTool('drop_timeline', {}, context);

      await expect(pending).rejects.toBeInstanceOf(McpError);
      await expect(pending).rejects.toMatchObject({ code: ErrorCode.MethodNotFound });
      await expect(pending).rejects.toThrow('Unknown tool: drop_timeline');
    });
  });
});
