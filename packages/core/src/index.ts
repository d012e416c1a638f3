/**
 * @tether/core: lifecycle synchronizer and version-gated data holders.
 *
 * @example
 * ```ts
 * import { LifecycleEvent, LifecycleRegistry, MutableDataHolder } from '@tether/core';
 *
 * class Screen {
 *   readonly lifecycle = new LifecycleRegistry(this);
 * }
 *
 * const screen = new Screen();
 * const title = new MutableDataHolder<string>();
 * title.observe(screen, (t) => console.log('title', t));
 *
 * title.setValue('Inbox');                                 // nothing yet: screen not started
 * screen.lifecycle.handleLifecycleEvent(LifecycleEvent.CREATE);
 * screen.lifecycle.handleLifecycleEvent(LifecycleEvent.START); // logs "title Inbox"
 * ```
 *
 * @module @tether/core
 */

// Errors
export * from './errors/index.js';

// Observability
export * from './observability/index.js';

// Scheduling
export * from './scheduling/index.js';

// Lifecycle
export * from './lifecycle/index.js';

// Data holders
export * from './live-data/index.js';

// Retained store
export * from './store/index.js';

// Reactive interop
export * from './rx/index.js';
