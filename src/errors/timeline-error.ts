import { ErrorCategory, ErrorCode, ErrorContext } from './types';

export interface TimelineErrorOptions<TCode extends ErrorCode = ErrorCode> {
  code: TCode;
  context?: ErrorContext;
  cause?: unknown;
}

/**
 * Base error for everything around the timeline core that is allowed to fail:
 * configuration, log files and tool input. The reducer itself never throws.
 */
export class TimelineError extends Error {
  public readonly code: ErrorCode;
  public readonly category: ErrorCategory;
  public context?: ErrorContext;
  public readonly cause?: unknown;

  constructor(message: string, category: ErrorCategory, options: TimelineErrorOptions) {
    super(message);
    this.name = new.target.name;
    this.code = options.code;
    this.category = category;
    this.context = options.context;
    this.cause = options.cause;
  }

  /**
   * Merge `context` into the error's own and return the error.
   */
  withContext(context: ErrorContext): this {
    this.context = { ...this.context, ...context };
    return this;
  }
}

/**
 * Unexpected failures: anything thrown that is not already a TimelineError.
 */
export function toTimelineError(error: unknown): TimelineError {
  if (error instanceof TimelineError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TimelineError(message, 'internal', { code: 'INTERNAL_UNEXPECTED', cause: error });
}
