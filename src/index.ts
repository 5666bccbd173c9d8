#!/usr/bin/env node

/**
 * Run Timeline MCP Server
 *
 * Hosts one live timeline store and exposes it to MCP clients over stdio.
 *
 * @module index
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  ListToolsRequestSchema,
  CallToolRequestSchema,
  ErrorCode,
  McpError,
  CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import * as path from 'path';

import {
  CONFIG_PATH_ENV_VAR,
  TimelineConfig,
  applyTelemetryConfig,
  loadTimelineConfig,
  resolveTimelineConfig,
  toTimelineOptions,
} from './config/timeline-config';
import { ErrorHandler } from './errors/handler';
import { ErrorLogger, createStderrSink } from './errors/logger';
import type { TimelineError } from './errors/timeline-error';
import type { JsonValue } from './errors/types';
import { registerTelemetryHandler } from './telemetry/telemetry';
import { TimelineStore } from './timeline/store';
import { ApplyTimelineEventsToolImpl, applyTimelineEventsToolDefinition } from './tools/apply-events';
import { GetTimelineToolImpl, getTimelineToolDefinition } from './tools/get-timeline';
import { ReplayTimelineLogToolImpl, replayTimelineLogToolDefinition } from './tools/replay-log';
import { ResetTimelineToolImpl, resetTimelineToolDefinition } from './tools/reset-timeline';

export * from './timeline';
export { loadTimelineConfig, resolveTimelineConfig } from './config/timeline-config';
export type { TimelineConfig } from './config/timeline-config';

const SERVER_CONFIG = {
  name: 'run-timeline',
  version: '1.0.0',
} as const;

const WORKSPACE_ROOT_ENV_VAR = 'RUN_TIMELINE_WORKSPACE_ROOT';

const server = new Server(
  {
    name: SERVER_CONFIG.name,
    version: SERVER_CONFIG.version,
  },
  {
    capabilities: {
      tools: {},
    },
  }
);

// stdout carries the protocol; everything diagnostic goes to stderr.
const errorLogger = new ErrorLogger(createStderrSink());
ErrorHandler.useLogger(errorLogger);

export interface RunTimelineContext {
  workspaceRoot: string;
  config: TimelineConfig;
  store: TimelineStore;
  applyEventsTool: ApplyTimelineEventsToolImpl;
  getTimelineTool: GetTimelineToolImpl;
  resetTimelineTool: ResetTimelineToolImpl;
  replayLogTool: ReplayTimelineLogToolImpl;
}

const TOOL_DEFINITIONS = [
  applyTimelineEventsToolDefinition,
  getTimelineToolDefinition,
  resetTimelineToolDefinition,
  replayTimelineLogToolDefinition,
];

export type ToolDefinitions = typeof TOOL_DEFINITIONS;

export function getToolDefinitions(): ToolDefinitions {
  return TOOL_DEFINITIONS;
}

export function summarizeValue(value: unknown): JsonValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (Array.isArray(value)) {
    return value.slice(0, 5).map((item) => summarizeValue(item));
  }
  if (typeof value === 'object') {
    return '[object]';
  }
  if (typeof value === 'string') {
    return value.length > 200 ? `${value.slice(0, 197)}…` : value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return String(value);
}

export function sanitizeArgs(args: unknown): Record<string, JsonValue> | undefined {
  if (!args || typeof args !== 'object') {
    return undefined;
  }
  const entries = Object.entries(args).slice(0, 10);
  const sanitized: Record<string, JsonValue> = {};
  for (const [key, value] of entries) {
    sanitized[key] = summarizeValue(value);
  }
  return sanitized;
}

/**
 * Client-facing one-liner: `<prefix> (correlationId=...): <public message>`.
 */
export function describeFailure(prefix: string, error: TimelineError): string {
  const publicError = ErrorHandler.toPublicError(error);
  const correlation = publicError.correlationId ? ` (correlationId=${publicError.correlationId})` : '';
  return `${prefix}${correlation}: ${publicError.message}`;
}

export async function buildRunTimelineContext(options?: {
  workspaceRoot?: string;
  configPath?: string;
  config?: TimelineConfig;
}): Promise<RunTimelineContext> {
  const workspaceRoot = path.resolve(
    options?.workspaceRoot ?? process.env[WORKSPACE_ROOT_ENV_VAR] ?? process.cwd()
  );

  const configPath = options?.configPath ?? process.env[CONFIG_PATH_ENV_VAR];
  const config =
    options?.config ??
    (configPath ? await loadTimelineConfig(path.resolve(workspaceRoot, configPath)) : resolveTimelineConfig());

  const timelineOptions = toTimelineOptions(config);
  const store = new TimelineStore({ options: timelineOptions, telemetrySource: SERVER_CONFIG.name });

  return {
    workspaceRoot,
    config,
    store,
    applyEventsTool: new ApplyTimelineEventsToolImpl(store),
    getTimelineTool: new GetTimelineToolImpl(store),
    resetTimelineTool: new ResetTimelineToolImpl(store),
    replayLogTool: new ReplayTimelineLogToolImpl(workspaceRoot, timelineOptions),
  };
}

let contextBuilder: typeof buildRunTimelineContext = buildRunTimelineContext;

function registerToolHandlers(context: RunTimelineContext): void {
  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return {
      tools: getToolDefinitions(),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      return await executeRunTimelineTool(name, args, context);
    } catch (error) {
      if (error instanceof McpError) {
        throw error;
      }

      const sanitizedArgs = sanitizeArgs(args);
      const data: Record<string, JsonValue> = {
        tool: name,
      };
      if (sanitizedArgs) {
        data.args = sanitizedArgs;
      }

      const timelineError = ErrorHandler.handle(error, 'server.execute_tool', {
        module: 'server',
        userMessage: 'Tool execution failed. Please check inputs and try again.',
        data,
      });

      throw new McpError(
        timelineError.category === 'validation' ? ErrorCode.InvalidParams : ErrorCode.InternalError,
        describeFailure('Tool execution failed', timelineError)
      );
    }
  });
}

export async function executeRunTimelineTool(
  name: string,
  args: unknown,
  context: RunTimelineContext
): Promise<CallToolResult> {
  switch (name) {
    case 'apply_timeline_events': {
      const result = await context.applyEventsTool.execute(args);
      return {
        content: [
          {
            type: 'text',
            text: context.applyEventsTool.formatForLLM(result),
          },
        ],
        structuredContent: {
          success: true,
          ...result,
        },
      };
    }

    case 'get_timeline': {
      const snapshot = context.getTimelineTool.execute();
      return {
        content: [
          {
            type: 'text',
            text: context.getTimelineTool.formatForLLM(snapshot),
          },
        ],
        structuredContent: {
          success: true,
          ...snapshot,
        },
      };
    }

    case 'reset_timeline': {
      const result = context.resetTimelineTool.execute();
      return {
        content: [
          {
            type: 'text',
            text: context.resetTimelineTool.formatForLLM(result),
          },
        ],
        structuredContent: {
          success: true,
          ...result,
        },
      };
    }

    case 'replay_timeline_log': {
      const result = await context.replayLogTool.execute(args);
      return {
        content: [
          {
            type: 'text',
            text: context.replayLogTool.formatForLLM(result),
          },
        ],
        structuredContent: {
          success: true,
          ...result,
        },
      };
    }

    default:
      throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
  }
}

async function initializeServer(): Promise<RunTimelineContext> {
  try {
    errorLogger.logInfo('Initializing MCP server', { module: 'server' });
    const context = await contextBuilder();
    applyTelemetryConfig(context.config);
    registerTelemetryHandler((event) => {
      const message = `[${event.source}] ${event.message}`;
      const telemetryContext = { module: 'telemetry', telemetry: event.context };
      if (event.level === 'info') {
        errorLogger.logInfo(message, telemetryContext);
      } else {
        errorLogger.logWarning(message, telemetryContext);
      }
    });

    errorLogger.logInfo('Server components initialized', {
      module: 'server',
      data: {
        workspaceRoot: context.workspaceRoot,
        fallbackRunId: context.config.fallbackRunId,
        phaseLabels: Object.keys(context.config.phaseMapping).length,
      },
    });

    return context;
  } catch (error) {
    throw ErrorHandler.handle(error, 'server.initialize', {
      module: 'server',
      userMessage: 'Failed to initialize run timeline server components.',
    });
  }
}

async function main(): Promise<void> {
  try {
    const context = await initializeServer();
    registerToolHandlers(context);

    const transport = new StdioServerTransport();
    await server.connect(transport);

    errorLogger.logInfo(`${SERVER_CONFIG.name} v${SERVER_CONFIG.version} running on stdio`, {
      module: 'server',
    });
  } catch (error) {
    const timelineError = ErrorHandler.handle(error, 'server.startup', {
      module: 'server',
      userMessage: 'Run timeline server startup failed.',
      data: { stage: 'startup' },
    });
    process.stderr.write(`[FATAL] ${describeFailure('Server startup failed', timelineError)}\n`);
    process.exit(1);
  }
}

async function shutdown(signal: NodeJS.Signals): Promise<void> {
  errorLogger.logInfo(`Received ${signal}, shutting down`, { module: 'server' });
  try {
    await server.close();
  } catch (error) {
    ErrorHandler.handle(error, 'server.shutdown', {
      module: 'server',
      userMessage: 'Graceful shutdown encountered an issue.',
      data: { signal },
    });
  }
  process.exit(0);
}

export const __test__ = {
  registerToolHandlers,
  initializeServer,
  server,
  setContextBuilder: (builder: typeof buildRunTimelineContext) => {
    contextBuilder = builder;
  },
  resetContextBuilder: () => {
    contextBuilder = buildRunTimelineContext;
  },
};

if (require.main === module) {
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  main().catch((error) => {
    const timelineError = ErrorHandler.handle(error, 'server.unhandled', {
      module: 'server',
      userMessage: 'Run timeline server encountered an unrecoverable error.',
    });
    process.stderr.write(`[FATAL] ${describeFailure('Unhandled error', timelineError)}\n`);
    process.exit(1);
  });
}
