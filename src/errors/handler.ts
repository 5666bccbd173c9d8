import { ErrorLogger } from './logger';
import { TimelineError, toTimelineError } from './timeline-error';
import { ErrorCategory, ErrorCode, ErrorContext } from './types';

export interface PublicError {
  code: ErrorCode;
  category: ErrorCategory;
  message: string;
  correlationId?: string;
}

const GENERIC_MESSAGE = 'An unexpected error occurred';

export class ErrorHandler {
  private static logger = new ErrorLogger();

  static useLogger(logger: ErrorLogger): void {
    this.logger = logger;
  }

  /**
   * Normalize and log a failure raised by `operation`. The returned error is
   * the original instance when it already was a TimelineError, now carrying
   * `operation`, the caller's context and a correlation id.
   */
  static handle(error: unknown, operation: string, context: ErrorContext = {}): TimelineError {
    const timelineError = toTimelineError(error).withContext({ ...context, operation });
    this.logger.logError(timelineError);
    return timelineError;
  }

  /**
   * Validation messages describe the caller's own input and are passed on;
   * everything else is replaced by the context's `userMessage`.
   */
  static toPublicError(error: TimelineError): PublicError {
    const message =
      error.category === 'validation' ? error.message : error.context?.userMessage ?? GENERIC_MESSAGE;
    return {
      code: error.code,
      category: error.category,
      message,
      correlationId: error.context?.correlationId,
    };
  }
}
