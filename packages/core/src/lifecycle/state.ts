/**
 * Lifecycle states, events and the fixed transition table between them.
 *
 * @module lifecycle/state
 */

import { LifecycleError } from '../errors/tether-error.js';

/**
 * Ordered lifecycle stages of an owner, lowest first.
 */
export const LifecycleState = {
  DESTROYED: 'destroyed',
  INITIALIZED: 'initialized',
  CREATED: 'created',
  STARTED: 'started',
  RESUMED: 'resumed',
} as const;

export type LifecycleState = (typeof LifecycleState)[keyof typeof LifecycleState];

/**
 * Transition triggers. `ANY` is only a hook marker for observers and is never
 * dispatched.
 */
export const LifecycleEvent = {
  CREATE: 'create',
  START: 'start',
  RESUME: 'resume',
  PAUSE: 'pause',
  STOP: 'stop',
  DESTROY: 'destroy',
  ANY: 'any',
} as const;

export type LifecycleEvent = (typeof LifecycleEvent)[keyof typeof LifecycleEvent];

/** Events that can actually be dispatched to a lifecycle */
export type DrivenLifecycleEvent = Exclude<LifecycleEvent, 'any'>;

const STATE_RANK: Record<LifecycleState, number> = {
  destroyed: 0,
  initialized: 1,
  created: 2,
  started: 3,
  resumed: 4,
};

const RESULTING_STATE: Record<DrivenLifecycleEvent, LifecycleState> = {
  create: LifecycleState.CREATED,
  start: LifecycleState.STARTED,
  resume: LifecycleState.RESUMED,
  pause: LifecycleState.STARTED,
  stop: LifecycleState.CREATED,
  destroy: LifecycleState.DESTROYED,
};

const UP_FROM: Partial<Record<LifecycleState, DrivenLifecycleEvent>> = {
  initialized: LifecycleEvent.CREATE,
  created: LifecycleEvent.START,
  started: LifecycleEvent.RESUME,
};

const DOWN_FROM: Partial<Record<LifecycleState, DrivenLifecycleEvent>> = {
  created: LifecycleEvent.DESTROY,
  started: LifecycleEvent.STOP,
  resumed: LifecycleEvent.PAUSE,
};

const DRIVEN_EVENTS = new Set<string>(Object.keys(RESULTING_STATE));

export function isDrivenEvent(event: LifecycleEvent): event is DrivenLifecycleEvent {
  return DRIVEN_EVENTS.has(event);
}

/**
 * The state an owner is in after `event`.
 *
 * @throws LifecycleError (`TETHER_L101`) for the `ANY` marker
 */
export function resultingState(event: LifecycleEvent): LifecycleState {
  if (!isDrivenEvent(event)) {
    throw new LifecycleError('TETHER_L101', {
      detail: `${event} is a hook marker, not a dispatchable event`,
      context: { event },
    });
  }
  return RESULTING_STATE[event];
}

/** Negative, zero or positive as `a` ranks below, equal to or above `b` */
export function compareStates(a: LifecycleState, b: LifecycleState): number {
  return STATE_RANK[a] - STATE_RANK[b];
}

export function isAtLeast(a: LifecycleState, b: LifecycleState): boolean {
  return STATE_RANK[a] >= STATE_RANK[b];
}

export function minState(a: LifecycleState, b: LifecycleState | undefined): LifecycleState {
  if (b === undefined) return a;
  return compareStates(b, a) < 0 ? b : a;
}

/** Event for one step up from `state`, e.g. CREATED → START */
export function upFrom(state: LifecycleState): DrivenLifecycleEvent | undefined {
  return UP_FROM[state];
}

/** Event for one step down from `state`, e.g. STARTED → STOP */
export function downFrom(state: LifecycleState): DrivenLifecycleEvent | undefined {
  return DOWN_FROM[state];
}
