import { describe, expect, test, beforeEach, afterEach } from '@jest/globals';
import { ErrorHandler } from '../../src/errors/handler';
import { IOError } from '../../src/errors/io-error';
import { ErrorLogger } from '../../src/errors/logger';
import { TimelineError } from '../../src/errors/timeline-error';
import { ValidationError } from '../../src/errors/validation-error';

class StubLogger extends ErrorLogger {
  public errors: TimelineError[] = [];

  constructor() {
    super({
      info: () => undefined,
      warn: () => undefined,
      error: () => undefined,
    });
  }

  logError(error: TimelineError): string {
    this.errors.push(error);
    error.withContext({ correlationId: 'cid-test' });
    return 'cid-test';
  }
}

const originalLogger = new ErrorLogger();

describe('ErrorHandler', () => {
  let stubLogger: StubLogger;

  beforeEach(() => {
    stubLogger = new StubLogger();
    ErrorHandler.useLogger(stubLogger);
  });

  afterEach(() => {
    ErrorHandler.useLogger(originalLogger);
  });

  test('handle wraps, annotates and logs unexpected failures', () => {
    const result = ErrorHandler.handle(new Error('boom'), 'server.execute_tool', {
      module: 'server',
      userMessage: 'Tool execution failed.',
    });

    expect(result.code).toBe('INTERNAL_UNEXPECTED');
    expect(result.context).toMatchObject({
      operation: 'server.execute_tool',
      module: 'server',
      userMessage: 'Tool execution failed.',
      correlationId: 'cid-test',
    });
    expect(stubLogger.errors).toEqual([result]);
  });

  test('handle keeps timeline errors and their category', () => {
    const original = new IOError('Unable to read event log: /missing.jsonl', { code: 'IO_NOT_FOUND' });

    const handled = ErrorHandler.handle(original, 'replay', { module: 'tools/replay-log' });

    expect(handled).toBe(original);
    expect(handled.category).toBe('io');
    expect(handled.context?.module).toBe('tools/replay-log');
  });

  test('toPublicError shows the user message for non-validation failures', () => {
    const error = new IOError('Unable to read event log: /secret/path.jsonl', {
      code: 'IO_NOT_FOUND',
      context: { userMessage: 'Visible', correlationId: 'cid' },
    });

    expect(ErrorHandler.toPublicError(error)).toEqual({
      code: 'IO_NOT_FOUND',
      category: 'io',
      message: 'Visible',
      correlationId: 'cid',
    });
  });

  test('toPublicError falls back to a generic message', () => {
    const error = new IOError('hidden', { code: 'IO_READ_FAILED' });

    expect(ErrorHandler.toPublicError(error).message).toBe('An unexpected error occurred');
  });

  test('toPublicError passes validation messages through', () => {
    const error = new ValidationError('events must contain at least 1 items', {
      context: { userMessage: 'Tool execution failed.' },
    });

    expect(ErrorHandler.toPublicError(error).message).toBe('events must contain at least 1 items');
  });
});
