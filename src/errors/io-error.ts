import { TimelineError, TimelineErrorOptions } from './timeline-error';

type IOCode = 'IO_NOT_FOUND' | 'IO_PERMISSION_DENIED' | 'IO_READ_FAILED';

export class IOError extends TimelineError {
  constructor(message: string, options: TimelineErrorOptions<IOCode>) {
    super(message, 'io', options);
  }

  /**
   * Wrap a failed file read, keeping the errno distinction callers report on.
   */
  static fromReadFailure(
    message: string,
    cause: unknown,
    context?: TimelineErrorOptions['context']
  ): IOError {
    return new IOError(message, { code: ioCodeFor(cause), cause, context });
  }
}

export function ioCodeFor(error: unknown): IOCode {
  const errno = error instanceof Error && 'code' in error ? error.code : undefined;
  switch (errno) {
    case 'ENOENT':
      return 'IO_NOT_FOUND';
    case 'EACCES':
    case 'EPERM':
      return 'IO_PERMISSION_DENIED';
    default:
      return 'IO_READ_FAILED';
  }
}
