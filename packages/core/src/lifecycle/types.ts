import type { Observable } from 'rxjs';
import type { DrivenLifecycleEvent, LifecycleState } from './state.js';

/**
 * Callback form of a lifecycle observer, invoked once per transition step.
 */
export type LifecycleEventCallback = (owner: LifecycleOwner, event: DrivenLifecycleEvent) => void;

/**
 * Hook form of a lifecycle observer. Every hook is optional; `onAny` runs after
 * the event-specific hook for every event.
 */
export interface LifecycleHooks {
  onCreate?(owner: LifecycleOwner): void;
  onStart?(owner: LifecycleOwner): void;
  onResume?(owner: LifecycleOwner): void;
  onPause?(owner: LifecycleOwner): void;
  onStop?(owner: LifecycleOwner): void;
  onDestroy?(owner: LifecycleOwner): void;
  onAny?(owner: LifecycleOwner, event: DrivenLifecycleEvent): void;
}

/**
 * Anything that can be registered on a {@link Lifecycle}. The function or
 * object itself is the observer's identity.
 */
export type LifecycleObserver = LifecycleEventCallback | LifecycleHooks;

/**
 * Read side of an owner's lifecycle.
 */
export interface Lifecycle {
  /** The owner's current state */
  readonly currentState: LifecycleState;
  /** Current state as a stream; replays the latest state and completes on destruction */
  readonly currentState$: Observable<LifecycleState>;
  /** Register an observer; it is brought up to the current state one step at a time */
  addObserver(observer: LifecycleObserver): void;
  /** Unregister an observer without sending it any further events */
  removeObserver(observer: LifecycleObserver): void;
}

/**
 * A component whose lifecycle drives its observers.
 */
export interface LifecycleOwner {
  readonly lifecycle: Lifecycle;
}
