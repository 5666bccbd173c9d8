/**
 * Process-wide telemetry for the timeline store and its hosts.
 *
 * Events below the minimum level are dropped. The rest go to the registered
 * handler, or to the console when there is none or it throws.
 */

export type TelemetryEventLevel = 'info' | 'warning' | 'error';

export interface TelemetryEvent {
  source: string;
  level: TelemetryEventLevel;
  message: string;
  context?: Record<string, unknown>;
}

export type TelemetryHandler = (event: TelemetryEvent) => void;

export const TELEMETRY_LEVEL_ENV_VAR = 'RUN_TIMELINE_TELEMETRY_LEVEL';

const LEVELS: readonly TelemetryEventLevel[] = ['info', 'warning', 'error'];

export function parseTelemetryLevel(level?: string): TelemetryEventLevel | null {
  const normalized = level?.trim().toLowerCase();
  return LEVELS.find((candidate) => candidate === normalized) ?? null;
}

const consoleHandler: TelemetryHandler = ({ source, level, message, context }) => {
  const write = level === 'error' ? console.error : level === 'info' ? console.info : console.warn;
  const line = `[Telemetry][${source}] ${message}`;
  if (context) {
    write(line, context);
  } else {
    write(line);
  }
};

const state: { handler: TelemetryHandler | null; minimumLevel: TelemetryEventLevel } = {
  handler: null,
  minimumLevel: parseTelemetryLevel(process.env[TELEMETRY_LEVEL_ENV_VAR]) ?? 'warning',
};

/**
 * Pass null to go back to console output.
 */
export function registerTelemetryHandler(handler: TelemetryHandler | null): void {
  state.handler = handler;
}

export function setTelemetryLevel(level: TelemetryEventLevel): void {
  state.minimumLevel = level;
}

export function getTelemetryLevel(): TelemetryEventLevel {
  return state.minimumLevel;
}

export function emitTelemetryEvent(
  level: TelemetryEventLevel,
  source: string,
  message: string,
  context?: Record<string, unknown>
): void {
  if (LEVELS.indexOf(level) < LEVELS.indexOf(state.minimumLevel)) {
    return;
  }

  const event: TelemetryEvent = context ? { source, level, message, context } : { source, level, message };
  if (state.handler) {
    try {
      state.handler(event);
      return;
    } catch (error) {
      console.warn(`[Telemetry handler error] ${error instanceof Error ? error.message : String(error)}`);
    }
  }
  consoleHandler(event);
}

export const emitTelemetryInfo = (source: string, message: string, context?: Record<string, unknown>): void =>
  emitTelemetryEvent('info', source, message, context);

export const emitTelemetryWarning = (source: string, message: string, context?: Record<string, unknown>): void =>
  emitTelemetryEvent('warning', source, message, context);
