/**
 * Lifecycle synchronizer for a single owner.
 *
 * Tracks the owner's state and drives every registered observer toward it,
 * one transition at a time, so an observer always sees CREATE before START
 * before RESUME (and the mirror image on the way down). Observer callbacks may
 * register or remove observers and dispatch further events; such nested calls
 * only record that something changed and the pass in progress restarts with
 * fresh data.
 *
 * @module lifecycle/lifecycle-registry
 */

import { BehaviorSubject, type Observable } from 'rxjs';
import { LifecycleError } from '../errors/tether-error.js';
import { type TetherLogger, defaultLogger } from '../observability/logger.js';
import {
  type TaskExecutor,
  assertMainThread,
  defaultTaskExecutor,
} from '../scheduling/task-executor.js';
import { adaptObserver } from './observer-adapter.js';
import { ObserverRegistry } from './observer-registry.js';
import {
  type DrivenLifecycleEvent,
  type LifecycleEvent,
  LifecycleState,
  compareStates,
  downFrom,
  isAtLeast,
  minState,
  resultingState,
  upFrom,
} from './state.js';
import type {
  Lifecycle,
  LifecycleEventCallback,
  LifecycleObserver,
  LifecycleOwner,
} from './types.js';

export interface LifecycleRegistryOptions {
  /** Reject calls made off the executor's main context (default: true) */
  readonly enforceMainThread?: boolean;
  /** Designated context (default: {@link defaultTaskExecutor}) */
  readonly executor?: TaskExecutor;
  readonly logger?: TetherLogger;
}

interface ObserverWithState {
  state: LifecycleState;
  readonly callback: LifecycleEventCallback;
}

/**
 * {@link Lifecycle} implementation that owners drive with
 * {@link LifecycleRegistry.handleLifecycleEvent}.
 *
 * @example
 * ```typescript
 * class Screen implements LifecycleOwner {
 *   readonly lifecycle = new LifecycleRegistry(this);
 *
 *   show(): void {
 *     this.lifecycle.handleLifecycleEvent(LifecycleEvent.CREATE);
 *     this.lifecycle.handleLifecycleEvent(LifecycleEvent.START);
 *   }
 * }
 * ```
 */
export class LifecycleRegistry implements Lifecycle {
  private readonly observers = new ObserverRegistry<LifecycleObserver, ObserverWithState>();
  private readonly ownerRef: WeakRef<LifecycleOwner>;
  private readonly enforceMainThread: boolean;
  private readonly executor: TaskExecutor;
  private readonly logger: TetherLogger;
  private readonly state$$ = new BehaviorSubject<LifecycleState>(LifecycleState.INITIALIZED);

  private state: LifecycleState = LifecycleState.INITIALIZED;
  private addingObserverCounter = 0;
  private handlingEvent = false;
  private newEventOccurred = false;
  // States of observers whose callbacks are currently on the stack. A
  // reentrant registration must not overtake them.
  private readonly parentStates: LifecycleState[] = [];

  constructor(owner: LifecycleOwner, options: LifecycleRegistryOptions = {}) {
    this.ownerRef = new WeakRef(owner);
    this.enforceMainThread = options.enforceMainThread ?? true;
    this.executor = options.executor ?? defaultTaskExecutor();
    this.logger = (options.logger ?? defaultLogger('lifecycle')).with({
      owner: owner.constructor.name,
    });
  }

  /**
   * Registry that skips the main-context check, for owners driven from a
   * context the executor does not consider main.
   */
  static createUnsafe(
    owner: LifecycleOwner,
    options: Omit<LifecycleRegistryOptions, 'enforceMainThread'> = {}
  ): LifecycleRegistry {
    return new LifecycleRegistry(owner, { ...options, enforceMainThread: false });
  }

  get currentState(): LifecycleState {
    return this.state;
  }

  get currentState$(): Observable<LifecycleState> {
    return this.state$$.asObservable();
  }

  get observerCount(): number {
    this.assertMainThreadIfNeeded('observerCount');
    return this.observers.size;
  }

  isAtLeast(state: LifecycleState): boolean {
    return isAtLeast(this.state, state);
  }

  /**
   * Move to the state `event` leads to and notify observers. A no-op once the
   * lifecycle is destroyed.
   *
   * @throws LifecycleError (`TETHER_L100`) on DESTROY straight from INITIALIZED
   */
  handleLifecycleEvent(event: LifecycleEvent): void {
    this.assertMainThreadIfNeeded('handleLifecycleEvent');
    const next = resultingState(event);
    if (this.state === LifecycleState.DESTROYED) {
      if (next !== LifecycleState.DESTROYED) {
        this.logger.warn('Ignoring lifecycle event after destruction', { event });
      }
      return;
    }
    this.moveToState(next);
  }

  /**
   * Move straight to `state`, passing every intermediate transition on to
   * observers.
   *
   * @throws LifecycleError (`TETHER_L102`) when leaving DESTROYED, or
   * (`TETHER_L103`) when asked to go back to INITIALIZED
   */
  setCurrentState(state: LifecycleState): void {
    this.assertMainThreadIfNeeded('setCurrentState');
    if (this.state === LifecycleState.DESTROYED && state !== LifecycleState.DESTROYED) {
      throw new LifecycleError('TETHER_L102', { context: { requested: state } });
    }
    if (state === LifecycleState.INITIALIZED && this.state !== LifecycleState.INITIALIZED) {
      throw new LifecycleError('TETHER_L103', { context: { from: this.state } });
    }
    this.moveToState(state);
  }

  addObserver(observer: LifecycleObserver): void {
    this.assertMainThreadIfNeeded('addObserver');
    const initialState =
      this.state === LifecycleState.DESTROYED ? LifecycleState.DESTROYED : LifecycleState.INITIALIZED;
    const entry: ObserverWithState = { state: initialState, callback: adaptObserver(observer) };

    if (this.observers.putIfAbsent(observer, entry) !== undefined) {
      return;
    }

    const owner = this.ownerRef.deref();
    if (!owner) {
      return;
    }

    const isReentrance = this.addingObserverCounter !== 0 || this.handlingEvent;
    let targetState = this.calculateTargetState(observer);
    this.addingObserverCounter++;
    try {
      while (compareStates(entry.state, targetState) < 0 && this.observers.get(observer) === entry) {
        const event = upFrom(entry.state);
        if (!event) {
          throw new LifecycleError('TETHER_L101', {
            detail: `no event up from ${entry.state}`,
            context: { state: entry.state },
          });
        }
        this.pushParentState(entry.state);
        try {
          this.dispatchToObserver(entry, owner, event);
        } finally {
          this.popParentState();
        }
        // The callback may have moved the owner or registered a sibling
        targetState = this.calculateTargetState(observer);
      }

      if (!isReentrance) {
        this.sync();
      }
    } finally {
      this.addingObserverCounter--;
    }

    if (!isReentrance) {
      this.teardownIfDestroyed();
    }
  }

  /**
   * Unregister `observer`. It receives no compensating down events; only
   * owner destruction sends DESTROY.
   */
  removeObserver(observer: LifecycleObserver): void {
    this.assertMainThreadIfNeeded('removeObserver');
    this.observers.remove(observer);
  }

  // ── Private ──────────────────────────────────────────────────────────

  private moveToState(next: LifecycleState): void {
    if (this.state === next) {
      return;
    }
    if (this.state === LifecycleState.INITIALIZED && next === LifecycleState.DESTROYED) {
      throw new LifecycleError('TETHER_L100', { context: { from: this.state, to: next } });
    }

    this.logger.debug('Lifecycle state changed', { from: this.state, to: next });
    this.state = next;

    if (this.handlingEvent || this.addingObserverCounter !== 0) {
      // Picked up by the pass already running further up the stack
      this.newEventOccurred = true;
      this.state$$.next(next);
      return;
    }

    this.handlingEvent = true;
    try {
      this.state$$.next(next);
      this.sync();
    } finally {
      this.handlingEvent = false;
    }
    this.teardownIfDestroyed();
  }

  private isSynced(): boolean {
    const eldest = this.observers.eldest();
    const newest = this.observers.newest();
    if (!eldest || !newest) {
      return true;
    }
    const eldestState = eldest[1].state;
    const newestState = newest[1].state;
    return eldestState === newestState && this.state === newestState;
  }

  private sync(): void {
    const owner = this.ownerRef.deref();
    if (!owner) {
      this.logger.debug('Owner is gone, skipping synchronization');
      return;
    }

    while (!this.isSynced()) {
      this.newEventOccurred = false;

      const eldest = this.observers.eldest();
      if (eldest && compareStates(this.state, eldest[1].state) < 0) {
        this.backwardPass(owner);
      }

      const newest = this.observers.newest();
      if (!this.newEventOccurred && newest && compareStates(this.state, newest[1].state) > 0) {
        this.forwardPass(owner);
      }
    }
    this.newEventOccurred = false;
  }

  private forwardPass(owner: LifecycleOwner): void {
    for (const [observer, entry] of this.observers.iteratorWithAdditions()) {
      if (this.newEventOccurred) break;

      while (
        compareStates(entry.state, this.state) < 0 &&
        !this.newEventOccurred &&
        this.observers.get(observer) === entry
      ) {
        const event = upFrom(entry.state);
        if (!event) {
          throw new LifecycleError('TETHER_L101', {
            detail: `no event up from ${entry.state}`,
            context: { state: entry.state },
          });
        }
        this.pushParentState(entry.state);
        try {
          this.dispatchToObserver(entry, owner, event);
        } finally {
          this.popParentState();
        }
      }
    }
  }

  private backwardPass(owner: LifecycleOwner): void {
    for (const [observer, entry] of this.observers.descendingIterator()) {
      if (this.newEventOccurred) break;

      while (
        compareStates(entry.state, this.state) > 0 &&
        !this.newEventOccurred &&
        this.observers.get(observer) === entry
      ) {
        const event = downFrom(entry.state);
        if (!event) {
          // Registered but never created: nothing to tear down
          entry.state = this.state;
          break;
        }
        this.pushParentState(resultingState(event));
        try {
          this.dispatchToObserver(entry, owner, event);
        } finally {
          this.popParentState();
        }
      }
    }
  }

  private dispatchToObserver(
    entry: ObserverWithState,
    owner: LifecycleOwner,
    event: DrivenLifecycleEvent
  ): void {
    const newState = resultingState(event);
    entry.state = minState(entry.state, newState);
    entry.callback(owner, event);
    entry.state = newState;
  }

  private calculateTargetState(observer: LifecycleObserver): LifecycleState {
    const previous = this.observers.previous(observer);
    const siblingState = previous?.[1].state;
    const parentState = this.parentStates[this.parentStates.length - 1];
    return minState(minState(this.state, siblingState), parentState);
  }

  private pushParentState(state: LifecycleState): void {
    this.parentStates.push(state);
  }

  private popParentState(): void {
    this.parentStates.pop();
  }

  private teardownIfDestroyed(): void {
    if (this.state !== LifecycleState.DESTROYED) {
      return;
    }
    this.observers.clear();
    this.state$$.complete();
  }

  private assertMainThreadIfNeeded(operation: string): void {
    if (this.enforceMainThread) {
      assertMainThread(this.executor, operation);
    }
  }
}
