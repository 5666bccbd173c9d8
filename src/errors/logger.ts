import { randomUUID } from 'crypto';
import { TimelineError } from './timeline-error';
import { ErrorContext } from './types';

export interface LogSink {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

type LogLevel = keyof LogSink;

interface LogRecord {
  level: LogLevel;
  timestamp: string;
  correlationId: string;
  message: string;
  code?: string;
  context: ErrorContext;
  stack?: string;
}

/**
 * Sink that keeps stdout free for a stdio transport.
 */
export function createStderrSink(stream: NodeJS.WritableStream = process.stderr): LogSink {
  const write = (line: string): void => {
    stream.write(`${line}\n`);
  };
  return { info: write, warn: write, error: write };
}

/**
 * One JSON line per record; a plain-text line when the context cannot be serialized.
 */
function formatRecord(record: LogRecord): string {
  try {
    return JSON.stringify(record);
  } catch {
    const code = record.code ? ` [${record.code}]` : '';
    return `[${record.timestamp}] [${record.level.toUpperCase()}]${code} ${record.message} (correlationId=${record.correlationId})`;
  }
}

export class ErrorLogger {
  constructor(private readonly sink: LogSink = console) {}

  /**
   * Logs `error` and stamps its context with the correlation id it was logged under.
   */
  logError(error: TimelineError): string {
    const correlationId = error.context?.correlationId ?? randomUUID();
    error.withContext({ correlationId });
    this.write({
      level: 'error',
      timestamp: new Date().toISOString(),
      correlationId,
      message: error.message,
      code: error.code,
      context: error.context ?? {},
      stack: error.stack,
    });
    return correlationId;
  }

  logWarning(message: string, context: ErrorContext = {}): string {
    return this.logMessage('warn', message, context);
  }

  logInfo(message: string, context: ErrorContext = {}): string {
    return this.logMessage('info', message, context);
  }

  private logMessage(level: LogLevel, message: string, context: ErrorContext): string {
    const correlationId = context.correlationId ?? randomUUID();
    this.write({ level, timestamp: new Date().toISOString(), correlationId, message, context });
    return correlationId;
  }

  private write(record: LogRecord): void {
    this.sink[record.level](formatRecord(record));
  }
}
