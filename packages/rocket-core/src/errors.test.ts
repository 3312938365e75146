import { describe, it, expect } from 'vitest';
import {
  ArityError,
  FileIOError,
  NotFoundError,
  RecursionLimitError,
  UnknownDirectiveError,
  formatError,
  isRocketError,
} from './errors.js';

describe('RocketError', () => {
  it('should carry its kind and name', () => {
    const error = new ArityError('define', '2 arguments', 1);
    expect(error.kind).toBe('ArityError');
    expect(error.name).toBe('ArityError');
    expect(error.message).toBe('define expects 2 arguments, got 1');
    expect(isRocketError(error)).toBe(true);
    expect(isRocketError(new Error('plain'))).toBe(false);
  });

  it('should keep the underlying cause', () => {
    const cause = new Error('EACCES');
    const error = new FileIOError('/docs/a.rkt', { cause });
    expect(error.message).toBe('Failed to load /docs/a.rkt: EACCES');
    expect(error.cause).toBe(cause);
  });
});

describe('formatError', () => {
  it('should print only the message without a location', () => {
    expect(formatError(new NotFoundError('x'))).toBe("NotFound: No binding named 'x' in scope");
  });

  it('should print the origin and each include frame', () => {
    const error = new UnknownDirectiveError('nope', { file: 'c.rkt', line: 4, column: 2 })
      .addFrame({ file: 'b.rkt', line: 2, column: 1 })
      .addFrame({ file: 'a.rkt', line: 9, column: 5 });

    expect(formatError(error)).toBe(
      'UnknownDirective: Unknown directive: nope\n' +
        '  --> c.rkt:4:2\n' +
        '  included from b.rkt:2:1\n' +
        '  included from a.rkt:9:5'
    );
  });

  it('should name the recursion limit', () => {
    expect(formatError(new RecursionLimitError(8, { file: 'x', line: 1, column: 1 }))).toBe(
      'RecursionLimitExceeded: Recursion limit of 8 exceeded\n  --> x:1:1'
    );
  });
});
