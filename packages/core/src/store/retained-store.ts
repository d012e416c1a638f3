/**
 * Keyed store of handles that outlive transient re-creation of their owner
 * and are torn down exactly once when the owner goes away for good.
 *
 * @module store/retained-store
 */

import type { Unsubscribable } from 'rxjs';
import { RetainedStoreError } from '../errors/tether-error.js';
import { LifecycleState } from '../lifecycle/state.js';
import type { LifecycleHooks, LifecycleOwner } from '../lifecycle/types.js';
import { type TetherLogger, defaultLogger } from '../observability/logger.js';

/** Something a handle releases when it is cleared */
export type Closeable = { close(): void } | Unsubscribable | (() => void);

function release(closeable: Closeable): void {
  if (typeof closeable === 'function') {
    closeable();
  } else if ('close' in closeable) {
    closeable.close();
  } else {
    closeable.unsubscribe();
  }
}

/**
 * Base class for retained state. Resources registered through
 * {@link RetainedHandle.addCloseable} are released, and {@link onCleared} is
 * called, the first time the handle is cleared.
 *
 * @example
 * ```typescript
 * class SearchState extends RetainedHandle {
 *   readonly results = new MutableDataHolder<string[]>({ initialValue: [] });
 *
 *   constructor(query$: Observable<string>) {
 *     super();
 *     this.addCloseable(query$.subscribe((q) => this.search(q)));
 *   }
 * }
 * ```
 */
export class RetainedHandle {
  private readonly keyed = new Map<string, Closeable>();
  private readonly anonymous = new Set<Closeable>();
  private cleared = false;

  get isCleared(): boolean {
    return this.cleared;
  }

  /**
   * Register a resource to release on clear. On an already cleared handle
   * the resource is released immediately.
   */
  addCloseable(closeable: Closeable): void;
  addCloseable(key: string, closeable: Closeable): void;
  addCloseable(keyOrCloseable: string | Closeable, maybeCloseable?: Closeable): void {
    const closeable = typeof keyOrCloseable === 'string' ? maybeCloseable : keyOrCloseable;
    if (closeable === undefined) {
      return;
    }
    if (this.cleared) {
      release(closeable);
      return;
    }
    if (typeof keyOrCloseable === 'string') {
      const previous = this.keyed.get(keyOrCloseable);
      this.keyed.set(keyOrCloseable, closeable);
      if (previous && previous !== closeable) {
        release(previous);
      }
    } else {
      this.anonymous.add(closeable);
    }
  }

  getCloseable(key: string): Closeable | undefined {
    return this.keyed.get(key);
  }

  /**
   * Release every registered resource, then call {@link onCleared}. Later
   * calls do nothing.
   *
   * @throws AggregateError carrying every failure raised while releasing
   */
  clear(): void {
    if (this.cleared) {
      return;
    }
    this.cleared = true;

    const errors: unknown[] = [];
    const closeables = [...this.keyed.values(), ...this.anonymous];
    this.keyed.clear();
    this.anonymous.clear();
    for (const closeable of closeables) {
      try {
        release(closeable);
      } catch (err) {
        errors.push(err);
      }
    }
    try {
      this.onCleared();
    } catch (err) {
      errors.push(err);
    }

    if (errors.length > 0) {
      throw new AggregateError(errors, 'Failed to release retained resources');
    }
  }

  /** Teardown hook for subclasses */
  protected onCleared(): void {}
}

export interface RetainedStoreOptions {
  readonly logger?: TetherLogger;
  /** Label used in log entries */
  readonly name?: string;
}

/**
 * Keyed collection of {@link RetainedHandle}s belonging to one owner.
 */
export class RetainedStore {
  private readonly handles = new Map<string, RetainedHandle>();
  private readonly logger: TetherLogger;
  private readonly name: string;
  private closed = false;

  constructor(options: RetainedStoreOptions = {}) {
    this.name = options.name ?? 'store';
    this.logger = (options.logger ?? defaultLogger('store')).with({ store: this.name });
  }

  get size(): number {
    return this.handles.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Store `handle` under `key`. A different handle previously stored under the
   * same key is cleared.
   *
   * @throws RetainedStoreError (`TETHER_S400`) once the store is closed
   */
  put(key: string, handle: RetainedHandle): void {
    this.assertOpen(key);
    const previous = this.handles.get(key);
    this.handles.set(key, handle);
    if (previous && previous !== handle) {
      previous.clear();
    }
  }

  get(key: string): RetainedHandle | undefined {
    return this.handles.get(key);
  }

  /**
   * Return the handle stored under `key` if it is a `type`, otherwise create
   * one and store it in place of whatever was there.
   */
  getOrCreate<H extends RetainedHandle>(
    key: string,
    type: abstract new (...args: never[]) => H,
    create: () => H
  ): H {
    const existing = this.handles.get(key);
    if (existing instanceof type) {
      return existing;
    }
    const handle = create();
    this.put(key, handle);
    return handle;
  }

  keys(): string[] {
    return Array.from(this.handles.keys());
  }

  /** Clear every handle once and empty the store; the store stays usable */
  clear(): void {
    const handles = Array.from(this.handles.values());
    this.handles.clear();
    const errors: unknown[] = [];
    for (const handle of handles) {
      try {
        handle.clear();
      } catch (err) {
        errors.push(err);
      }
    }
    this.logger.debug('Retained store cleared', { handles: handles.length });
    if (errors.length > 0) {
      throw new AggregateError(errors, `Failed to clear retained store "${this.name}"`);
    }
  }

  /** Clear the store and refuse further handles */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.clear();
  }

  private assertOpen(key: string): void {
    if (this.closed) {
      throw new RetainedStoreError('TETHER_S400', { context: { store: this.name, key } });
    }
  }
}

export interface BindRetainedStoreOptions {
  /**
   * Reports whether the owner is being destroyed only to be re-created
   * (default: never). The store survives such a destruction.
   */
  readonly isRecreating?: () => boolean;
}

/**
 * Close `store` when `owner` is destroyed for good. An owner that is already
 * destroyed closes the store on the spot.
 *
 * @returns a function that detaches the store from the owner
 */
export function bindRetainedStore(
  store: RetainedStore,
  owner: LifecycleOwner,
  options: BindRetainedStoreOptions = {}
): () => void {
  const closeUnlessRecreating = (): void => {
    if (!(options.isRecreating?.() ?? false)) {
      store.close();
    }
  };

  if (owner.lifecycle.currentState === LifecycleState.DESTROYED) {
    closeUnlessRecreating();
    return () => undefined;
  }

  const observer: LifecycleHooks = { onDestroy: closeUnlessRecreating };
  owner.lifecycle.addObserver(observer);
  return () => owner.lifecycle.removeObserver(observer);
}
