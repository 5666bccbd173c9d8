import { describe, expect, test } from '@jest/globals';
import { IOError, ioCodeFor } from '../../src/errors/io-error';

const errno = (code: string): Error => Object.assign(new Error(code), { code });

describe('IOError', () => {
  test('maps errno codes onto IO codes', () => {
    expect(ioCodeFor(errno('ENOENT'))).toBe('IO_NOT_FOUND');
    expect(ioCodeFor(errno('EACCES'))).toBe('IO_PERMISSION_DENIED');
    expect(ioCodeFor(errno('EPERM'))).toBe('IO_PERMISSION_DENIED');
    expect(ioCodeFor(errno('EISDIR'))).toBe('IO_READ_FAILED');
    expect(ioCodeFor('not an error')).toBe('IO_READ_FAILED');
  });

  test('fromReadFailure keeps the cause and context', () => {
    const cause = errno('EACCES');
    const error = IOError.fromReadFailure('Unable to read event log: /logs/run.jsonl', cause, {
      data: { filePath: '/logs/run.jsonl' },
    });

    expect(error).toMatchObject({ category: 'io', code: 'IO_PERMISSION_DENIED' });
    expect(error.cause).toBe(cause);
    expect(error.context?.data).toEqual({ filePath: '/logs/run.jsonl' });
  });
});
