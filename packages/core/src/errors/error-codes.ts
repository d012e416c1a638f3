/**
 * Tether error codes.
 *
 * Codes read `TETHER_<letter><number>`; the letter names the engine that
 * rejected the call:
 * - L: lifecycle synchronizer (L100-L199)
 * - D: value dispatch and combinators (D200-D299)
 * - T: designated-context checks (T300-T399)
 * - S: retained store (S400-S499)
 * - X: anything else (X900-X999)
 */

export type ErrorCategory = 'lifecycle' | 'dispatch' | 'threading' | 'store' | 'internal';

export interface ErrorCodeInfo {
  readonly category: ErrorCategory;
  readonly message: string;
  /** What the caller should do instead */
  readonly hint: string;
}

export const ERROR_CODES = {
  TETHER_L100: {
    category: 'lifecycle',
    message: 'State must be at least CREATED to move to DESTROYED',
    hint: 'Dispatch CREATE before DESTROY, or drop the owner without destroying it.',
  },
  TETHER_L101: {
    category: 'lifecycle',
    message: 'No lifecycle event leads out of this state',
    hint: 'Only the six driven events can be dispatched; ANY is reserved for observer hooks.',
  },
  TETHER_L102: {
    category: 'lifecycle',
    message: 'Lifecycle is destroyed and cannot be moved to another state',
    hint: 'Create a new owner instead of reviving a destroyed one.',
  },
  TETHER_L103: {
    category: 'lifecycle',
    message: 'Lifecycle cannot move back to INITIALIZED',
    hint: 'Drive the owner down with STOP or DESTROY; INITIALIZED is only the starting state.',
  },
  TETHER_D200: {
    category: 'dispatch',
    message: 'Cannot add the same observer with different lifecycles',
    hint: 'Use a distinct observer function per owner, or remove it before rebinding.',
  },
  TETHER_D201: {
    category: 'dispatch',
    message: 'This source was already added with a different callback',
    hint: 'Call removeSource() before adding the source again with another callback.',
  },
  TETHER_T300: {
    category: 'threading',
    message: 'Operation must run on the main context',
    hint: 'Use postValue() from foreign contexts, or route the call through the task executor.',
  },
  TETHER_S400: {
    category: 'store',
    message: 'Retained store has been closed for good',
    hint: 'Do not put handles into a store whose owner has been destroyed.',
  },
  TETHER_X900: {
    category: 'internal',
    message: 'An unexpected error occurred',
    hint: 'Check the cause for details.',
  },
} as const satisfies Record<string, ErrorCodeInfo>;

export type ErrorCode = keyof typeof ERROR_CODES;

/** Codes belonging to one category, e.g. `CodeOf<'lifecycle'>` is `TETHER_L100 | …` */
export type CodeOf<C extends ErrorCategory> = {
  [K in ErrorCode]: (typeof ERROR_CODES)[K]['category'] extends C ? K : never;
}[ErrorCode];
