import { type CodeOf, type ErrorCategory, type ErrorCode, ERROR_CODES } from './error-codes.js';

export interface TetherErrorOptions {
  /** Appended to the code's message, e.g. the offending state or operation */
  readonly detail?: string;
  readonly context?: Record<string, unknown>;
  readonly cause?: unknown;
}

/**
 * Misuse of a lifecycle, holder or store, raised at the call site.
 *
 * The message comes from the code table; `hint` says what to do instead.
 * Stale owner references and reentrant calls never raise one.
 *
 * @example
 * ```typescript
 * try {
 *   holder.setValue(next);
 * } catch (error) {
 *   if (isTetherError(error, 'TETHER_T300')) {
 *     holder.postValue(next);
 *   }
 * }
 * ```
 */
export class TetherError extends Error {
  readonly code: ErrorCode;
  readonly category: ErrorCategory;
  readonly hint: string;
  readonly context: Record<string, unknown>;

  constructor(code: ErrorCode, options: TetherErrorOptions = {}) {
    const info = ERROR_CODES[code];
    super(options.detail ? `${info.message}: ${options.detail}` : info.message, {
      cause: options.cause,
    });
    this.name = new.target.name;
    this.code = code;
    this.category = info.category;
    this.hint = info.hint;
    this.context = options.context ?? {};
  }
}

/** Illegal lifecycle transition */
export class LifecycleError extends TetherError {
  constructor(code: CodeOf<'lifecycle'>, options?: TetherErrorOptions) {
    super(code, options);
  }
}

/** Observer binding misuse on a data holder or combinator */
export class DispatchError extends TetherError {
  constructor(code: CodeOf<'dispatch'>, options?: TetherErrorOptions) {
    super(code, options);
  }
}

/** A main-context-only operation was invoked from another context */
export class ThreadingError extends TetherError {
  readonly operation: string;

  constructor(operation: string) {
    super('TETHER_T300', {
      detail: `${operation} was called off the main context`,
      context: { operation },
    });
    this.operation = operation;
  }
}

/** Use of a retained store after it was closed */
export class RetainedStoreError extends TetherError {
  constructor(code: CodeOf<'store'>, options?: TetherErrorOptions) {
    super(code, options);
  }
}

/** Whether `error` is a TetherError, optionally with the given code */
export function isTetherError(error: unknown, code?: ErrorCode): error is TetherError {
  return error instanceof TetherError && (code === undefined || error.code === code);
}

/**
 * `error` itself if it is a TetherError, otherwise a `TETHER_X900` wrapping it.
 */
export function ensureTetherError(error: unknown): TetherError {
  if (isTetherError(error)) {
    return error;
  }
  return new TetherError('TETHER_X900', {
    detail: error instanceof Error ? error.message : String(error),
    cause: error,
  });
}
