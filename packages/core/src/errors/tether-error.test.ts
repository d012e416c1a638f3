import { describe, expect, expectTypeOf, it } from 'vitest';
import { type CodeOf, ERROR_CODES } from './error-codes.js';
import {
  DispatchError,
  LifecycleError,
  RetainedStoreError,
  TetherError,
  ThreadingError,
  ensureTetherError,
  isTetherError,
} from './tether-error.js';

describe('error codes', () => {
  it('should file each code under the category its letter names', () => {
    const byLetter: Record<string, string> = {
      L: 'lifecycle',
      D: 'dispatch',
      T: 'threading',
      S: 'store',
      X: 'internal',
    };
    for (const [code, info] of Object.entries(ERROR_CODES)) {
      expect(info.category).toBe(byLetter[code.charAt('TETHER_'.length)]);
    }
  });

  it('should restrict each error class to the codes of its category', () => {
    expectTypeOf<CodeOf<'lifecycle'>>().toEqualTypeOf<
      'TETHER_L100' | 'TETHER_L101' | 'TETHER_L102' | 'TETHER_L103'
    >();
    expectTypeOf<CodeOf<'dispatch'>>().toEqualTypeOf<'TETHER_D200' | 'TETHER_D201'>();
    expectTypeOf<CodeOf<'store'>>().toEqualTypeOf<'TETHER_S400'>();
  });
});

describe('TetherError', () => {
  it('should take message, category and hint from the code', () => {
    const error = new LifecycleError('TETHER_L100', {
      context: { from: 'initialized', to: 'destroyed' },
    });

    expect(error).toBeInstanceOf(TetherError);
    expect(error.name).toBe('LifecycleError');
    expect(error.code).toBe('TETHER_L100');
    expect(error.category).toBe('lifecycle');
    expect(error.message).toBe('State must be at least CREATED to move to DESTROYED');
    expect(error.hint).toBe(ERROR_CODES.TETHER_L100.hint);
    expect(error.context).toEqual({ from: 'initialized', to: 'destroyed' });
  });

  it('should append the detail to the message', () => {
    const error = new DispatchError('TETHER_D201', { detail: 'source "inbox"' });

    expect(error.message).toBe(
      'This source was already added with a different callback: source "inbox"'
    );
    expect(error.context).toEqual({});
  });

  it('should name the operation that ran off the main context', () => {
    const error = new ThreadingError('setValue');

    expect(error.code).toBe('TETHER_T300');
    expect(error.operation).toBe('setValue');
    expect(error.context).toEqual({ operation: 'setValue' });
    expect(error.message).toBe(
      'Operation must run on the main context: setValue was called off the main context'
    );
  });

  it('should keep the cause', () => {
    const closeFailure = new Error('close failed');
    const error = new RetainedStoreError('TETHER_S400', { cause: closeFailure });

    expect(error.cause).toBe(closeFailure);
    expect(error.name).toBe('RetainedStoreError');
  });
});

describe('isTetherError', () => {
  it('should match by class and optionally by code', () => {
    const error = new LifecycleError('TETHER_L102');

    expect(isTetherError(error)).toBe(true);
    expect(isTetherError(error, 'TETHER_L102')).toBe(true);
    expect(isTetherError(error, 'TETHER_L100')).toBe(false);
    expect(isTetherError(new Error('plain'))).toBe(false);
    expect(isTetherError(undefined, 'TETHER_L102')).toBe(false);
  });
});

describe('ensureTetherError', () => {
  it('should pass a TetherError through untouched', () => {
    const error = new DispatchError('TETHER_D200');
    expect(ensureTetherError(error)).toBe(error);
  });

  it('should wrap anything else as an internal error', () => {
    const failure = new Error('boom');
    const wrapped = ensureTetherError(failure);

    expect(wrapped.code).toBe('TETHER_X900');
    expect(wrapped.category).toBe('internal');
    expect(wrapped.name).toBe('TetherError');
    expect(wrapped.message).toBe('An unexpected error occurred: boom');
    expect(wrapped.cause).toBe(failure);

    expect(ensureTetherError(42).message).toBe('An unexpected error occurred: 42');
  });
});
