import { describe, expect, jest, test, beforeEach } from '@jest/globals';
import { Writable } from 'stream';
import { ErrorLogger, createStderrSink } from '../../src/errors/logger';
import { IOError } from '../../src/errors/io-error';
import type { ErrorContext } from '../../src/errors/types';

const createError = (context: ErrorContext = { module: 'tests' }) =>
  new IOError('Unable to read event log: run.jsonl', { code: 'IO_READ_FAILED', context });

const createSink = () => ({
  info: jest.fn<(line: string) => void>(),
  warn: jest.fn<(line: string) => void>(),
  error: jest.fn<(line: string) => void>(),
});

const circularValue = (): { self?: unknown } => {
  const circular: { self?: unknown } = {};
  circular.self = circular;
  return circular;
};

describe('ErrorLogger', () => {
  let sink: ReturnType<typeof createSink>;

  beforeEach(() => {
    sink = createSink();
  });

  test('logError emits a JSON line and stamps the correlation id', () => {
    const logger = new ErrorLogger(sink);
    const error = createError();

    const correlationId = logger.logError(error);

    expect(sink.error).toHaveBeenCalledTimes(1);
    const payload = JSON.parse(sink.error.mock.calls[0][0]);
    expect(payload).toMatchObject({
      level: 'error',
      code: 'IO_READ_FAILED',
      message: 'Unable to read event log: run.jsonl',
      correlationId,
      context: { module: 'tests', correlationId },
    });
    expect(error.context?.correlationId).toBe(correlationId);
  });

  test('logError reuses a correlation id already on the error', () => {
    const logger = new ErrorLogger(sink);

    expect(logger.logError(createError({ correlationId: 'cid-fixed' }))).toBe('cid-fixed');
  });

  test('logError falls back to plain text when the context cannot be serialized', () => {
    const logger = new ErrorLogger(sink);

    logger.logError(createError({ correlationId: 'cid-fixed', circular: circularValue() }));

    expect(sink.error.mock.calls[0][0]).toMatch(
      /^\[[^\]]+\] \[ERROR\] \[IO_READ_FAILED\] Unable to read event log: run\.jsonl \(correlationId=cid-fixed\)$/
    );
  });

  test('logWarning and logInfo go to their own sink methods', () => {
    const logger = new ErrorLogger(sink);

    const warningId = logger.logWarning('Heads up', { module: 'tests' });
    logger.logInfo('Server components initialized');

    const warning = JSON.parse(sink.warn.mock.calls[0][0]);
    const info = JSON.parse(sink.info.mock.calls[0][0]);
    expect(warning.message).toBe('Heads up');
    expect(warning.correlationId).toBe(warningId);
    expect(info.level).toBe('info');
    expect(info.context).toEqual({});
  });

  test('logWarning falls back when serialization fails', () => {
    const logger = new ErrorLogger(sink);

    logger.logWarning('Pay attention', { correlationId: 'cid-warn', circular: circularValue() });

    expect(sink.warn.mock.calls[0][0]).toMatch(/^\[[^\]]+\] \[WARN\] Pay attention \(correlationId=cid-warn\)$/);
  });
});

describe('createStderrSink', () => {
  test('writes one line per message to the stream', () => {
    const lines: string[] = [];
    const stream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        lines.push(chunk.toString());
        callback();
      },
    });

    const sink = createStderrSink(stream);
    sink.info('first');
    sink.error('second');

    expect(lines).toEqual(['first\n', 'second\n']);
  });
});
