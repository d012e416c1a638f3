import {
  EMPTY,
  type MonoTypeOperatorFunction,
  type Observable,
  defer,
  distinctUntilChanged,
  filter,
  map,
  switchMap,
  takeUntil,
} from 'rxjs';
import { LifecycleState, isAtLeast } from '../lifecycle/state.js';
import type { Lifecycle } from '../lifecycle/types.js';

function destroyed$(lifecycle: Lifecycle): Observable<LifecycleState> {
  return lifecycle.currentState$.pipe(filter((state) => state === LifecycleState.DESTROYED));
}

/**
 * Complete the source when the owner of `lifecycle` is destroyed. A source
 * subscribed after destruction completes immediately.
 *
 * @example
 * ```typescript
 * ticks$.pipe(takeUntilDestroyed(screen.lifecycle)).subscribe(redraw);
 * ```
 */
export function takeUntilDestroyed<T>(lifecycle: Lifecycle): MonoTypeOperatorFunction<T> {
  return (source) =>
    defer(() =>
      lifecycle.currentState === LifecycleState.DESTROYED
        ? EMPTY
        : source.pipe(takeUntil(destroyed$(lifecycle)))
    );
}

/**
 * Keep the source subscribed only while the owner is at least `minState`.
 * Each time the owner climbs back to `minState` the source is subscribed
 * afresh; the result completes when the owner is destroyed.
 *
 * @example
 * ```typescript
 * location$.pipe(whileAtLeast(screen.lifecycle, LifecycleState.STARTED)).subscribe(showOnMap);
 * ```
 */
export function whileAtLeast<T>(
  lifecycle: Lifecycle,
  minState: LifecycleState
): MonoTypeOperatorFunction<T> {
  return (source) =>
    lifecycle.currentState$.pipe(
      map((state) => isAtLeast(state, minState)),
      distinctUntilChanged(),
      switchMap((active) => (active ? source : EMPTY))
    );
}
