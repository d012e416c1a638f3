/**
 * The designated context on which lifecycle transitions, registry mutation and
 * value delivery run.
 *
 * JavaScript runs every callback on one event loop, so the default executor
 * treats the caller as always being on the main context and defers posted
 * work to a microtask. Hosts that juggle several contexts (worker bridges,
 * test harnesses) supply their own executor through component options.
 *
 * @module scheduling/task-executor
 */

import { ThreadingError } from '../errors/tether-error.js';

export type Task = () => void;

export interface TaskExecutor {
  /** Whether the caller is running on the designated context */
  isMainThread(): boolean;
  /** Schedule `task` to run later on the designated context */
  postToMainThread(task: Task): void;
  /** Run `task` on the designated context, synchronously if already there */
  executeOnMainThread(task: Task): void;
}

/**
 * Default executor: always on the main context, posts through `queueMicrotask`.
 */
export class MicrotaskExecutor implements TaskExecutor {
  isMainThread(): boolean {
    return true;
  }

  postToMainThread(task: Task): void {
    queueMicrotask(task);
  }

  executeOnMainThread(task: Task): void {
    if (this.isMainThread()) {
      task();
    } else {
      this.postToMainThread(task);
    }
  }
}

const microtaskExecutor = new MicrotaskExecutor();

/** The executor used by components that are not given one */
export function defaultTaskExecutor(): TaskExecutor {
  return microtaskExecutor;
}

/**
 * @throws ThreadingError when called off the executor's main context
 */
export function assertMainThread(executor: TaskExecutor, operation: string): void {
  if (!executor.isMainThread()) {
    throw new ThreadingError(operation);
  }
}
