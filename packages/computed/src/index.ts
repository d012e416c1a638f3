/**
 * @tether/computed: combinators and derived holders for Tether.
 *
 * @example
 * ```ts
 * import { MediatorDataHolder, combine, map } from '@tether/computed';
 *
 * const label = map(count, (n) => `${n} unread`);
 * const total = combine([inboxCount, archiveCount], (counts) => counts.reduce((a, b) => a + b, 0));
 * ```
 *
 * @module @tether/computed
 */

// Mediator
export { MediatorDataHolder } from './mediator-data-holder.js';

// Transformations
export { combine, distinctUntilChanged, map, switchMap } from './transformations.js';
