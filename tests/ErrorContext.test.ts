import { formatErrorChain, hasErrorCode, withContext, withContextSync } from '../src/ErrorContext';
import { logFatal } from '../src/logger';

describe('withContext', () => {
  it('passes through a successful result', async () => {
    await expect(withContext(Promise.resolve(7), 'unused')).resolves.toBe(7);
  });

  it('wraps a failure and keeps it as the cause', async () => {
    const inner = new Error('disk full');
    let caught: unknown;
    try {
      await withContext(Promise.reject(inner), 'failed to write out.rs');
    } catch (err: unknown) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(Error);
    expect(caught instanceof Error && caught.message).toBe('failed to write out.rs');
    expect(caught instanceof Error && caught.cause).toBe(inner);
  });
});

describe('withContextSync', () => {
  it('returns the result of a successful call', () => {
    expect(withContextSync(() => 'ok', 'unused')).toBe('ok');
  });

  it('wraps a thrown error with context', () => {
    let caught: unknown;
    try {
      withContextSync(() => {
        throw new Error("unpaired 'end_private' on line 2");
      }, 'failed to process file a.rs');
    } catch (err: unknown) {
      caught = err;
    }
    expect(formatErrorChain(caught)).toBe("failed to process file a.rs: unpaired 'end_private' on line 2");
  });
});

describe('formatErrorChain', () => {
  it('joins messages outermost first', () => {
    const err = new Error('failed to process entries', {
      cause: new Error('failed to process file a.rs', { cause: new Error("unknown property 'x'") })
    });
    expect(formatErrorChain(err)).toBe(
      "failed to process entries: failed to process file a.rs: unknown property 'x'"
    );
  });

  it('stringifies non-error causes', () => {
    expect(formatErrorChain(new Error('outer', { cause: 'inner' }))).toBe('outer: inner');
    expect(formatErrorChain('bare')).toBe('bare');
  });
});

describe('hasErrorCode', () => {
  it('matches system error codes', () => {
    const err = Object.assign(new Error('missing'), { code: 'ENOENT' });
    expect(hasErrorCode(err, 'ENOENT')).toBe(true);
    expect(hasErrorCode(err, 'EACCES')).toBe(false);
    expect(hasErrorCode('ENOENT', 'ENOENT')).toBe(false);
  });
});

describe('logFatal', () => {
  it('prints the chain on one line', () => {
    const spy = jest.spyOn(console, 'error').mockImplementation(() => {});
    try {
      logFatal(new Error('failed to read config', { cause: new Error('no such file') }));
      expect(spy).toHaveBeenCalledTimes(1);
      expect(spy).toHaveBeenCalledWith('Error: failed to read config: no such file');
    } finally {
      spy.mockRestore();
    }
  });

  it('adds the stack in verbose mode', () => {
    const spy = jest.spyOn(console, 'error').mockImplementation(() => {});
    try {
      const err = new Error('boom');
      logFatal(err, true);
      expect(spy).toHaveBeenNthCalledWith(2, err.stack);
    } finally {
      spy.mockRestore();
    }
  });
});
