/**
 * @tether/computed: data holder fed by other data holders.
 *
 * @module @tether/computed
 */

import {
  type DataHolder,
  DispatchError,
  MutableDataHolder,
  START_VERSION,
  type ValueObserver,
} from '@tether/core';

// ── Source Links ──────────────────────────────────────────

interface SourceLink {
  /** The callback the source was added with; compared on re-adds */
  readonly onChanged: unknown;
  plug(): void;
  unplug(): void;
}

function createLink<S>(source: DataHolder<S>, onChanged: ValueObserver<S>): SourceLink {
  let lastSeenVersion = START_VERSION;
  let plugged = false;

  // Re-plugging hands over the current value again; only a new version counts
  const observer: ValueObserver<S> = (value) => {
    if (lastSeenVersion !== source.version) {
      lastSeenVersion = source.version;
      onChanged(value);
    }
  };

  return {
    onChanged,
    plug: () => {
      if (plugged) return;
      plugged = true;
      source.observeForever(observer);
    },
    unplug: () => {
      if (!plugged) return;
      plugged = false;
      source.removeObserver(observer);
    },
  };
}

// ── Mediator ──────────────────────────────────────────────

/**
 * Combinator over any number of upstream data holders.
 *
 * Upstreams are observed through always-active bindings, but only while this
 * holder has at least one registered observer; with none, every upstream is
 * detached. Each upstream delivery with a version not seen before runs the
 * callback it was added with, which typically calls {@link setValue}.
 *
 * @example
 * ```ts
 * const unread = new MediatorDataHolder<number>();
 * unread.addSource(inbox, (messages) => unread.setValue(messages.filter(isUnread).length));
 * unread.forward(pushCount); // straight copy of another number holder
 * unread.observe(screen, renderBadge);
 * ```
 */
export class MediatorDataHolder<T> extends MutableDataHolder<T> {
  private readonly sources = new Map<object, SourceLink>();

  private readonly forwardValue: ValueObserver<T> = (value) => {
    this.setValue(value);
  };

  /** Number of attached upstreams */
  get sourceCount(): number {
    return this.sources.size;
  }

  /**
   * Start listening to `source`. Adding the same source again with the same
   * callback is a no-op.
   *
   * @throws DispatchError (`TETHER_D201`) if `source` was added with another callback
   */
  addSource<S>(source: DataHolder<S>, onChanged: ValueObserver<S>): void {
    const existing = this.sources.get(source);
    if (existing) {
      if (existing.onChanged !== onChanged) {
        throw new DispatchError('TETHER_D201', { context: { mediator: this.name } });
      }
      return;
    }

    const link = createLink(source, onChanged);
    this.sources.set(source, link);
    if (this.hasObservers()) {
      link.plug();
    }
  }

  /** Add `source` with a callback that copies each of its values into this holder */
  forward(source: DataHolder<T>): void {
    this.addSource(source, this.forwardValue);
  }

  removeSource(source: object): void {
    const link = this.sources.get(source);
    if (!link) return;
    this.sources.delete(source);
    link.unplug();
  }

  hasSource(source: object): boolean {
    return this.sources.has(source);
  }

  protected override onFirstObserver(): void {
    for (const link of this.sources.values()) {
      link.plug();
    }
  }

  protected override onLastObserverRemoved(): void {
    for (const link of this.sources.values()) {
      link.unplug();
    }
  }
}
