import type { Task, TaskExecutor } from '@tether/core';

/**
 * Executor that queues posted tasks until the test calls {@link flush}, and
 * can pretend the caller is on a foreign context.
 */
export class ManualTaskExecutor implements TaskExecutor {
  private readonly queue: Task[] = [];
  private onMainThread = true;

  /** Number of posted tasks waiting to run */
  get pendingCount(): number {
    return this.queue.length;
  }

  isMainThread(): boolean {
    return this.onMainThread;
  }

  postToMainThread(task: Task): void {
    this.queue.push(task);
  }

  executeOnMainThread(task: Task): void {
    if (this.onMainThread) {
      task();
    } else {
      this.postToMainThread(task);
    }
  }

  /**
   * Run queued tasks on the main context, including tasks they post.
   *
   * @returns the number of tasks run
   */
  flush(): number {
    const wasOnMainThread = this.onMainThread;
    this.onMainThread = true;
    let ran = 0;
    try {
      let task = this.queue.shift();
      while (task) {
        task();
        ran++;
        task = this.queue.shift();
      }
    } finally {
      this.onMainThread = wasOnMainThread;
    }
    return ran;
  }

  /** Run `fn` as if called from a context other than the main one */
  runOffMainThread<R>(fn: () => R): R {
    const wasOnMainThread = this.onMainThread;
    this.onMainThread = false;
    try {
      return fn();
    } finally {
      this.onMainThread = wasOnMainThread;
    }
  }
}

/**
 * Executor that runs every posted task synchronously on the spot.
 */
export class InstantTaskExecutor implements TaskExecutor {
  isMainThread(): boolean {
    return true;
  }

  postToMainThread(task: Task): void {
    task();
  }

  executeOnMainThread(task: Task): void {
    task();
  }
}

export function createManualTaskExecutor(): ManualTaskExecutor {
  return new ManualTaskExecutor();
}

export function createInstantTaskExecutor(): InstantTaskExecutor {
  return new InstantTaskExecutor();
}
