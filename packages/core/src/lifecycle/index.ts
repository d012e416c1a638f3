export {
  LifecycleRegistry,
  type LifecycleRegistryOptions,
} from './lifecycle-registry.js';
export { adaptObserver } from './observer-adapter.js';
export { ObserverRegistry, type RegistryEntry } from './observer-registry.js';
export {
  LifecycleEvent,
  LifecycleState,
  compareStates,
  downFrom,
  isAtLeast,
  isDrivenEvent,
  minState,
  resultingState,
  upFrom,
  type DrivenLifecycleEvent,
} from './state.js';
export type {
  Lifecycle,
  LifecycleEventCallback,
  LifecycleHooks,
  LifecycleObserver,
  LifecycleOwner,
} from './types.js';
