import type {
  DataHolder,
  DrivenLifecycleEvent,
  Lifecycle,
  LifecycleEventCallback,
  LifecycleOwner,
  LifecycleState,
  ValueObserver,
} from '@tether/core';

export interface LifecycleEventLog {
  /** Events received so far, in order */
  readonly events: DrivenLifecycleEvent[];
  /** The registered observer; its identity can be used with removeObserver */
  readonly observer: LifecycleEventCallback;
  clear(): void;
  stop(): void;
}

/**
 * Register an observer on `lifecycle` that records every event it receives.
 */
export function recordLifecycleEvents(lifecycle: Lifecycle): LifecycleEventLog {
  const events: DrivenLifecycleEvent[] = [];
  const observer: LifecycleEventCallback = (_owner, event) => {
    events.push(event);
  };
  lifecycle.addObserver(observer);
  return {
    events,
    observer,
    clear: () => {
      events.length = 0;
    },
    stop: () => lifecycle.removeObserver(observer),
  };
}

export interface StateLog {
  readonly states: LifecycleState[];
  /** Whether the state stream has completed */
  readonly completed: boolean;
  stop(): void;
}

/**
 * Subscribe to `lifecycle.currentState$` and record what it emits.
 */
export function recordStates(lifecycle: Lifecycle): StateLog {
  const states: LifecycleState[] = [];
  let completed = false;
  const subscription = lifecycle.currentState$.subscribe({
    next: (state) => states.push(state),
    complete: () => {
      completed = true;
    },
  });
  return {
    states,
    get completed() {
      return completed;
    },
    stop: () => subscription.unsubscribe(),
  };
}

export interface ValueLog<T> {
  readonly values: T[];
  readonly observer: ValueObserver<T>;
  stop(): void;
}

/**
 * Observe `holder` and record delivered values. With an `owner` the binding
 * follows its lifecycle; without one it is always active.
 */
export function recordValues<T>(holder: DataHolder<T>, owner?: LifecycleOwner): ValueLog<T> {
  const values: T[] = [];
  const observer: ValueObserver<T> = (value) => {
    values.push(value);
  };
  if (owner) {
    holder.observe(owner, observer);
  } else {
    holder.observeForever(observer);
  }
  return {
    values,
    observer,
    stop: () => holder.removeObserver(observer),
  };
}
