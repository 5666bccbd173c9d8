import { TimelineError, TimelineErrorOptions } from './timeline-error';

type ValidationCode = 'VALIDATION_INVALID_INPUT' | 'VALIDATION_SCHEMA_MISMATCH';

export class ValidationError extends TimelineError {
  constructor(message: string, options: Partial<TimelineErrorOptions<ValidationCode>> = {}) {
    super(message, 'validation', { ...options, code: options.code ?? 'VALIDATION_INVALID_INPUT' });
  }
}
