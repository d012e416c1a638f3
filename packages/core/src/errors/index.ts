/**
 * Errors raised by the lifecycle, dispatch and store engines.
 *
 * @example
 * ```typescript
 * import { isTetherError } from '@tether/core';
 *
 * try {
 *   registry.handleLifecycleEvent(LifecycleEvent.DESTROY);
 * } catch (error) {
 *   if (isTetherError(error) && error.category === 'lifecycle') {
 *     console.warn(error.message, error.hint);
 *   }
 * }
 * ```
 *
 * @module errors
 */

export {
  ERROR_CODES,
  type CodeOf,
  type ErrorCategory,
  type ErrorCode,
  type ErrorCodeInfo,
} from './error-codes.js';

export {
  DispatchError,
  LifecycleError,
  RetainedStoreError,
  TetherError,
  ThreadingError,
  ensureTetherError,
  isTetherError,
  type TetherErrorOptions,
} from './tether-error.js';
