/**
 * Insertion-ordered map that tolerates mutation while it is being traversed.
 *
 * Observers are registered and removed from inside the very callbacks a
 * traversal invokes. Instead of snapshotting, every entry is a node in a
 * doubly linked list; a removed node keeps its links so an iterator parked on
 * it can still find its way back into the live list.
 *
 * Traversal contracts:
 * - {@link ObserverRegistry.iteratorWithAdditions} walks forward and visits
 *   entries appended while it is running.
 * - {@link ObserverRegistry.descendingIterator} walks backward from the entry
 *   that was newest when it was created; later additions are not visited.
 * - {@link ObserverRegistry.ascendingIterator} walks forward over the entries
 *   present when it was created.
 * - Every iterator skips entries removed before it reaches them.
 *
 * @module lifecycle/observer-registry
 */

interface RegistryNode<K, V> {
  readonly key: K;
  readonly value: V;
  readonly seq: number;
  prev: RegistryNode<K, V> | undefined;
  next: RegistryNode<K, V> | undefined;
  removed: boolean;
}

export type RegistryEntry<K, V> = readonly [key: K, value: V];

export class ObserverRegistry<K, V> implements Iterable<RegistryEntry<K, V>> {
  private readonly nodes = new Map<K, RegistryNode<K, V>>();
  private head: RegistryNode<K, V> | undefined;
  private tail: RegistryNode<K, V> | undefined;
  private seq = 0;

  get size(): number {
    return this.nodes.size;
  }

  has(key: K): boolean {
    return this.nodes.has(key);
  }

  get(key: K): V | undefined {
    return this.nodes.get(key)?.value;
  }

  /**
   * Append `value` under `key` unless the key is already present.
   *
   * @returns the value already stored under `key`, or `undefined` if inserted
   */
  putIfAbsent(key: K, value: V): V | undefined {
    const existing = this.nodes.get(key);
    if (existing) return existing.value;

    const node: RegistryNode<K, V> = {
      key,
      value,
      seq: this.seq++,
      prev: this.tail,
      next: undefined,
      removed: false,
    };
    if (this.tail) {
      this.tail.next = node;
    } else {
      this.head = node;
    }
    this.tail = node;
    this.nodes.set(key, node);
    return undefined;
  }

  /**
   * Remove the entry for `key`. Iterators that have not reached it yet will
   * skip it.
   *
   * @returns the removed value, or `undefined` if the key was absent
   */
  remove(key: K): V | undefined {
    const node = this.nodes.get(key);
    if (!node) return undefined;
    this.nodes.delete(key);
    this.unlink(node);
    return node.value;
  }

  clear(): void {
    for (const node of this.nodes.values()) {
      node.removed = true;
    }
    this.nodes.clear();
    this.head = undefined;
    this.tail = undefined;
  }

  /** First entry by insertion order */
  eldest(): RegistryEntry<K, V> | undefined {
    return this.head ? [this.head.key, this.head.value] : undefined;
  }

  /** Last entry by insertion order */
  newest(): RegistryEntry<K, V> | undefined {
    return this.tail ? [this.tail.key, this.tail.value] : undefined;
  }

  /** The live entry registered immediately before `key` */
  previous(key: K): RegistryEntry<K, V> | undefined {
    const prev = this.nodes.get(key)?.prev;
    return prev ? [prev.key, prev.value] : undefined;
  }

  keys(): K[] {
    return Array.from(this, ([key]) => key);
  }

  [Symbol.iterator](): Iterator<RegistryEntry<K, V>> {
    return this.ascendingIterator();
  }

  /** Forward traversal over the entries present right now */
  ascendingIterator(): Generator<RegistryEntry<K, V>, void, undefined> {
    return this.walkForward(this.head, this.seq - 1);
  }

  /** Forward traversal that also visits entries appended while it runs */
  iteratorWithAdditions(): Generator<RegistryEntry<K, V>, void, undefined> {
    return this.walkForward(undefined, Number.POSITIVE_INFINITY);
  }

  /** Backward traversal starting from the entry that is newest right now */
  descendingIterator(): Generator<RegistryEntry<K, V>, void, undefined> {
    return this.walkBackward(this.tail);
  }

  // ── Private ──────────────────────────────────────────────────────────

  private *walkForward(
    start: RegistryNode<K, V> | undefined,
    lastSeq: number
  ): Generator<RegistryEntry<K, V>, void, undefined> {
    // An open-ended walk resolves its first node lazily so that entries added
    // before the first next() are included.
    let current = start ?? this.head;
    while (current && current.seq <= lastSeq) {
      if (!current.removed) {
        yield [current.key, current.value];
      }
      current = this.successor(current);
    }
  }

  private *walkBackward(
    start: RegistryNode<K, V> | undefined
  ): Generator<RegistryEntry<K, V>, void, undefined> {
    let current = start;
    while (current) {
      if (!current.removed) {
        yield [current.key, current.value];
      }
      current = current.prev;
    }
  }

  /**
   * Next live node after `node`'s position. A removed node is first walked
   * back to its nearest live predecessor: its own `next` link goes stale once
   * something is appended after its removal.
   */
  private successor(node: RegistryNode<K, V>): RegistryNode<K, V> | undefined {
    let anchor: RegistryNode<K, V> | undefined = node;
    while (anchor && anchor.removed) {
      anchor = anchor.prev;
    }
    return anchor ? anchor.next : this.head;
  }

  private unlink(node: RegistryNode<K, V>): void {
    node.removed = true;
    if (node.prev) {
      node.prev.next = node.next;
    } else {
      this.head = node.next;
    }
    if (node.next) {
      node.next.prev = node.prev;
    } else {
      this.tail = node.prev;
    }
  }
}
