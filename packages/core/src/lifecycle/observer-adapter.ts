import { LifecycleEvent } from './state.js';
import type { LifecycleEventCallback, LifecycleHooks, LifecycleObserver } from './types.js';

/**
 * Normalise either observer form into a single event callback.
 */
export function adaptObserver(observer: LifecycleObserver): LifecycleEventCallback {
  if (typeof observer === 'function') {
    return observer;
  }
  return (owner, event) => {
    invokeHook(observer, owner, event);
    observer.onAny?.(owner, event);
  };
}

function invokeHook(
  hooks: LifecycleHooks,
  owner: Parameters<LifecycleEventCallback>[0],
  event: Parameters<LifecycleEventCallback>[1]
): void {
  switch (event) {
    case LifecycleEvent.CREATE:
      hooks.onCreate?.(owner);
      break;
    case LifecycleEvent.START:
      hooks.onStart?.(owner);
      break;
    case LifecycleEvent.RESUME:
      hooks.onResume?.(owner);
      break;
    case LifecycleEvent.PAUSE:
      hooks.onPause?.(owner);
      break;
    case LifecycleEvent.STOP:
      hooks.onStop?.(owner);
      break;
    case LifecycleEvent.DESTROY:
      hooks.onDestroy?.(owner);
      break;
  }
}
