/**
 * @tether/computed: derived data holders.
 *
 * Each transformation returns a {@link MediatorDataHolder}, so the upstream is
 * only observed while the derived holder itself has observers.
 *
 * @module @tether/computed
 */

import type { DataHolder, DataHolderOptions } from '@tether/core';
import { MediatorDataHolder } from './mediator-data-holder.js';

/**
 * Holder whose value is `fn` applied to each new value of `source`.
 *
 * ```ts
 * const fullName = map(user, (u) => `${u.first} ${u.last}`);
 * ```
 */
export function map<X, Y>(
  source: DataHolder<X>,
  fn: (value: X) => Y,
  options?: DataHolderOptions<Y>
): DataHolder<Y> {
  const result = new MediatorDataHolder<Y>(options);
  result.addSource(source, (value) => result.setValue(fn(value)));
  return result;
}

/**
 * Holder that mirrors the holder `fn` picks for the latest value of `source`.
 * When `fn` picks a different holder the previous one is detached; returning
 * `undefined` detaches without a replacement and keeps the last value.
 *
 * ```ts
 * const profile = switchMap(userId, (id) => repository.profile(id));
 * ```
 */
export function switchMap<X, Y>(
  source: DataHolder<X>,
  fn: (value: X) => DataHolder<Y> | undefined,
  options?: DataHolderOptions<Y>
): DataHolder<Y> {
  const result = new MediatorDataHolder<Y>(options);
  let current: DataHolder<Y> | undefined;

  result.addSource(source, (value) => {
    const next = fn(value);
    if (next === current) return;
    if (current) {
      result.removeSource(current);
    }
    current = next;
    if (current) {
      result.forward(current);
    }
  });
  return result;
}

/**
 * Holder that skips values equal to the one it last emitted. The first value
 * always passes.
 */
export function distinctUntilChanged<X>(
  source: DataHolder<X>,
  equals: (a: X, b: X) => boolean = Object.is,
  options?: DataHolderOptions<X>
): DataHolder<X> {
  const result = new MediatorDataHolder<X>(options);
  let last: { readonly value: X } | undefined;

  result.addSource(source, (value) => {
    if (last && equals(last.value, value)) return;
    last = { value };
    result.setValue(value);
  });
  return result;
}

/**
 * Holder that emits `fn` of the latest value of every source once each source
 * has produced one, and again whenever any of them changes. Sources must be
 * distinct holders.
 *
 * ```ts
 * const total = combine([subtotal, shipping, tax], (parts) => parts.reduce((a, b) => a + b, 0));
 * ```
 */
export function combine<T, R>(
  sources: readonly DataHolder<T>[],
  fn: (values: T[]) => R,
  options?: DataHolderOptions<R>
): DataHolder<R> {
  const result = new MediatorDataHolder<R>(options);
  const latest: T[] = [];
  const seen = new Set<number>();

  // A holder listed more than once is added once and fills every slot it owns
  const slots = new Map<DataHolder<T>, number[]>();
  sources.forEach((source, index) => {
    const indices = slots.get(source);
    if (indices) {
      indices.push(index);
    } else {
      slots.set(source, [index]);
    }
  });

  for (const [source, indices] of slots) {
    result.addSource(source, (value) => {
      for (const index of indices) {
        latest[index] = value;
        seen.add(index);
      }
      if (seen.size === sources.length) {
        result.setValue(fn(latest.slice()));
      }
    });
  }
  return result;
}
