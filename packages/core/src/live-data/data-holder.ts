/**
 * Versioned value holder whose observers only hear about values while they
 * are active.
 *
 * Every `setValue` bumps a version counter. Each observer binding remembers
 * the last version it was handed, so an active observer sees the latest value
 * exactly once per version, and an observer that was inactive while several
 * values went by receives only the newest one when it becomes active again.
 *
 * @module live-data/data-holder
 */

import { Observable } from 'rxjs';
import { DispatchError } from '../errors/tether-error.js';
import type { LifecycleHooks, LifecycleOwner } from '../lifecycle/types.js';
import { ObserverRegistry } from '../lifecycle/observer-registry.js';
import { LifecycleState, isAtLeast } from '../lifecycle/state.js';
import { type TetherLogger, defaultLogger } from '../observability/logger.js';
import {
  type Task,
  type TaskExecutor,
  assertMainThread,
  defaultTaskExecutor,
} from '../scheduling/task-executor.js';

/** Version of a holder that has never been given a value */
export const START_VERSION = -1;

const NOT_SET: unique symbol = Symbol('tether.notSet');

export type ValueObserver<T> = (value: T) => void;

export interface DataHolderOptions<T> {
  /** Value present before the first `setValue`; counts as version 0 */
  readonly initialValue?: T;
  /** Designated context (default: {@link defaultTaskExecutor}) */
  readonly executor?: TaskExecutor;
  readonly logger?: TetherLogger;
  /** Label used in log entries */
  readonly name?: string;
}

function hasInitialValue<T>(
  options: DataHolderOptions<T>
): options is DataHolderOptions<T> & { readonly initialValue: T } {
  return 'initialValue' in options;
}

interface ObserverBinding<T> {
  readonly observer: ValueObserver<T>;
  /** Owner whose state gates this binding; `undefined` means always active */
  readonly owner: LifecycleOwner | undefined;
  readonly lifecycleObserver: LifecycleHooks | undefined;
  active: boolean;
  lastVersion: number;
}

/**
 * Read side of a versioned value. Subclasses decide who may write it; see
 * {@link MutableDataHolder} for the public-setter variant.
 *
 * @example
 * ```typescript
 * const user = new MutableDataHolder<User>();
 *
 * user.observe(screen, (u) => render(u)); // delivered while screen is STARTED or RESUMED
 * user.setValue(await loadUser());
 * ```
 */
export class DataHolder<T> {
  protected readonly executor: TaskExecutor;
  protected readonly logger: TetherLogger;
  protected readonly name: string;

  private readonly bindings = new ObserverRegistry<ValueObserver<T>, ObserverBinding<T>>();
  private data: T | typeof NOT_SET;
  private pendingData: T | typeof NOT_SET = NOT_SET;
  private currentVersion: number;
  private activeCount = 0;
  private changingActiveState = false;
  private dispatching = false;
  private dispatchInvalidated = false;

  private readonly postValueTask: Task = () => {
    const newValue = this.pendingData;
    this.pendingData = NOT_SET;
    if (newValue !== NOT_SET) {
      this.setValue(newValue);
    }
  };

  constructor(options: DataHolderOptions<T> = {}) {
    this.executor = options.executor ?? defaultTaskExecutor();
    this.name = options.name ?? 'holder';
    this.logger = (options.logger ?? defaultLogger('holder')).with({ holder: this.name });
    if (hasInitialValue(options)) {
      this.data = options.initialValue;
      this.currentVersion = START_VERSION + 1;
    } else {
      this.data = NOT_SET;
      this.currentVersion = START_VERSION;
    }
  }

  /** Current value, or `undefined` if none was ever set */
  get value(): T | undefined {
    return this.data === NOT_SET ? undefined : this.data;
  }

  /** Whether a value has been set, even if that value is `undefined` */
  get isInitialized(): boolean {
    return this.data !== NOT_SET;
  }

  /** Number of values set so far, offset by {@link START_VERSION} */
  get version(): number {
    return this.currentVersion;
  }

  get observerCount(): number {
    return this.bindings.size;
  }

  hasObservers(): boolean {
    return this.bindings.size > 0;
  }

  hasActiveObservers(): boolean {
    return this.activeCount > 0;
  }

  /**
   * Deliver values to `observer` while `owner` is at least STARTED. The binding
   * is dropped when the owner is destroyed; binding to an owner that is
   * already destroyed does nothing.
   *
   * @throws DispatchError (`TETHER_D200`) if `observer` is bound elsewhere
   */
  observe(owner: LifecycleOwner, observer: ValueObserver<T>): void {
    assertMainThread(this.executor, 'observe');
    if (owner.lifecycle.currentState === LifecycleState.DESTROYED) {
      this.logger.debug('Ignoring observer of a destroyed owner');
      return;
    }

    const lifecycleObserver: LifecycleHooks = {
      onAny: () => this.onOwnerStateChanged(binding),
    };
    const binding: ObserverBinding<T> = {
      observer,
      owner,
      lifecycleObserver,
      active: false,
      lastVersion: START_VERSION,
    };

    if (!this.register(binding)) {
      return;
    }
    owner.lifecycle.addObserver(lifecycleObserver);
  }

  /**
   * Deliver values to `observer` regardless of any lifecycle until it is
   * removed with {@link removeObserver}.
   *
   * @throws DispatchError (`TETHER_D200`) if `observer` is bound to an owner
   */
  observeForever(observer: ValueObserver<T>): void {
    assertMainThread(this.executor, 'observeForever');
    const binding: ObserverBinding<T> = {
      observer,
      owner: undefined,
      lifecycleObserver: undefined,
      active: false,
      lastVersion: START_VERSION,
    };

    if (!this.register(binding)) {
      return;
    }
    this.activeStateChanged(binding, true);
  }

  removeObserver(observer: ValueObserver<T>): void {
    assertMainThread(this.executor, 'removeObserver');
    const removed = this.bindings.remove(observer);
    if (!removed) {
      return;
    }
    if (removed.owner && removed.lifecycleObserver) {
      removed.owner.lifecycle.removeObserver(removed.lifecycleObserver);
    }
    this.activeStateChanged(removed, false);
    if (this.bindings.size === 0) {
      this.onLastObserverRemoved();
    }
  }

  /** Remove every observer bound to `owner` */
  removeObservers(owner: LifecycleOwner): void {
    assertMainThread(this.executor, 'removeObservers');
    for (const [observer, binding] of this.bindings) {
      if (binding.owner === owner) {
        this.removeObserver(observer);
      }
    }
  }

  /**
   * Stream of this holder's values through an always-active binding.
   * Unsubscribing removes the binding.
   */
  asObservable(): Observable<T> {
    return new Observable<T>((subscriber) => {
      const observer: ValueObserver<T> = (value) => subscriber.next(value);
      this.observeForever(observer);
      return () => this.removeObserver(observer);
    });
  }

  /**
   * Store `value` as a new version and deliver it to active observers.
   *
   * @throws ThreadingError off the designated context
   */
  protected setValue(value: T): void {
    assertMainThread(this.executor, 'setValue');
    this.currentVersion++;
    this.data = value;
    this.dispatchingValue(undefined);
  }

  /**
   * Hand `value` to the designated context from anywhere. Values posted before
   * the scheduled delivery runs collapse into the last one.
   */
  protected postValue(value: T): void {
    const postTask = this.pendingData === NOT_SET;
    this.pendingData = value;
    if (!postTask) {
      return;
    }
    this.executor.postToMainThread(this.postValueTask);
  }

  /** Called when the number of active observers goes from 0 to 1 */
  protected onActive(): void {}

  /** Called when the number of active observers goes from 1 to 0 */
  protected onInactive(): void {}

  /** Called when the first observer is registered, active or not */
  protected onFirstObserver(): void {}

  /** Called when the last registered observer is removed */
  protected onLastObserverRemoved(): void {}

  // ── Private ──────────────────────────────────────────────────────────

  /** @returns whether `binding` was newly registered */
  private register(binding: ObserverBinding<T>): boolean {
    const existing = this.bindings.putIfAbsent(binding.observer, binding);
    if (existing) {
      if (existing.owner !== binding.owner) {
        throw new DispatchError('TETHER_D200', { context: { holder: this.name } });
      }
      return false;
    }
    if (this.bindings.size === 1) {
      this.onFirstObserver();
    }
    return true;
  }

  private shouldBeActive(binding: ObserverBinding<T>): boolean {
    if (!binding.owner) {
      return true;
    }
    return isAtLeast(binding.owner.lifecycle.currentState, LifecycleState.STARTED);
  }

  private onOwnerStateChanged(binding: ObserverBinding<T>): void {
    const owner = binding.owner;
    if (!owner) {
      return;
    }
    let currentState = owner.lifecycle.currentState;
    if (currentState === LifecycleState.DESTROYED) {
      this.removeObserver(binding.observer);
      return;
    }
    let prevState: LifecycleState | undefined;
    // Activation may deliver a value whose observer moves the owner again
    while (prevState !== currentState) {
      prevState = currentState;
      this.activeStateChanged(binding, this.shouldBeActive(binding));
      currentState = owner.lifecycle.currentState;
    }
  }

  private activeStateChanged(binding: ObserverBinding<T>, newActive: boolean): void {
    if (newActive === binding.active) {
      return;
    }
    binding.active = newActive;
    this.changeActiveCounter(newActive ? 1 : -1);
    if (newActive) {
      this.dispatchingValue(binding);
    }
  }

  private changeActiveCounter(change: number): void {
    let previousActiveCount = this.activeCount;
    this.activeCount += change;
    if (this.changingActiveState) {
      return;
    }
    this.changingActiveState = true;
    try {
      // onActive/onInactive may add or remove observers; keep going until the
      // hook calls match the final count
      while (previousActiveCount !== this.activeCount) {
        const needToCallActive = previousActiveCount === 0 && this.activeCount > 0;
        const needToCallInactive = previousActiveCount > 0 && this.activeCount === 0;
        previousActiveCount = this.activeCount;
        if (needToCallActive) {
          this.logger.debug('Holder became active');
          this.onActive();
        } else if (needToCallInactive) {
          this.logger.debug('Holder became inactive');
          this.onInactive();
        }
      }
    } finally {
      this.changingActiveState = false;
    }
  }

  private dispatchingValue(initiator: ObserverBinding<T> | undefined): void {
    if (this.dispatching) {
      this.dispatchInvalidated = true;
      return;
    }
    this.dispatching = true;
    let target = initiator;
    try {
      do {
        this.dispatchInvalidated = false;
        if (target) {
          this.considerNotify(target);
          target = undefined;
        } else {
          for (const [, binding] of this.bindings.iteratorWithAdditions()) {
            this.considerNotify(binding);
            if (this.dispatchInvalidated) {
              break;
            }
          }
        }
      } while (this.dispatchInvalidated);
    } finally {
      this.dispatching = false;
    }
  }

  private considerNotify(binding: ObserverBinding<T>): void {
    if (!binding.active) {
      return;
    }
    // The owner may have moved since the binding's flag was last updated
    if (!this.shouldBeActive(binding)) {
      this.activeStateChanged(binding, false);
      return;
    }
    const data = this.data;
    if (binding.lastVersion >= this.currentVersion || data === NOT_SET) {
      return;
    }
    binding.lastVersion = this.currentVersion;
    binding.observer(data);
  }
}

/**
 * {@link DataHolder} whose setters are public.
 */
export class MutableDataHolder<T> extends DataHolder<T> {
  override setValue(value: T): void {
    super.setValue(value);
  }

  override postValue(value: T): void {
    super.postValue(value);
  }
}
