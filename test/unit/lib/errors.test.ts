/**
 * Unit Tests: release errors
 */

import { describe, it, expect } from '@jest/globals';
import { ErrorCodes, ReleaseError, UsageError, toReleaseError } from '../../../src/lib/errors';

describe('ReleaseError', () => {
  it('should default to an internal error with exit code 1', () => {
    const error = new ReleaseError('boom');

    expect(error.code).toBe(ErrorCodes.INTERNAL_ERROR);
    expect(error.exitCode).toBe(1);
    expect(error.details).toEqual({});
  });

  it('should keep a subprocess exit code', () => {
    expect(new ReleaseError('push failed', ErrorCodes.PUSH_FAILED, { exitCode: 125 }).exitCode).toBe(125);
  });

  it('should never carry a success or out-of-range exit code', () => {
    expect(new ReleaseError('x', ErrorCodes.BUILD_FAILED, { exitCode: 0 }).exitCode).toBe(1);
    expect(new ReleaseError('x', ErrorCodes.BUILD_FAILED, { exitCode: -1 }).exitCode).toBe(1);
    expect(new ReleaseError('x', ErrorCodes.BUILD_FAILED, { exitCode: 256 }).exitCode).toBe(1);
  });

  it('should serialize without the stack', () => {
    const error = new ReleaseError('tag failed', ErrorCodes.TAG_FAILED, {
      details: { target: 'alice/piper-tts:latest' },
      cause: new Error('no such image'),
    });

    expect(error.toJSON()).toEqual({
      name: 'ReleaseError',
      message: 'tag failed',
      code: 'TAG_FAILED',
      exitCode: 1,
      details: { target: 'alice/piper-tts:latest' },
      cause: { message: 'no such image' },
    });
  });
});

describe('UsageError', () => {
  it('should be a release error with exit code 1', () => {
    const error = new UsageError('registry username required', ErrorCodes.MISSING_ARGUMENT);

    expect(error).toBeInstanceOf(ReleaseError);
    expect(error.name).toBe('UsageError');
    expect(error.exitCode).toBe(1);
  });
});

describe('toReleaseError', () => {
  it('should return release errors unchanged', () => {
    const error = new ReleaseError('x');
    expect(toReleaseError(error)).toBe(error);
  });

  it('should wrap plain errors and keep the cause', () => {
    const cause = new Error('socket hang up');
    const error = toReleaseError(cause, ErrorCodes.PUSH_FAILED);

    expect(error.message).toBe('socket hang up');
    expect(error.code).toBe(ErrorCodes.PUSH_FAILED);
    expect(error.cause).toBe(cause);
  });

  it('should stringify other values', () => {
    expect(toReleaseError('nope').message).toBe('nope');
  });
});
