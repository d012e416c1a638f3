export {
  MicrotaskExecutor,
  assertMainThread,
  defaultTaskExecutor,
  type Task,
  type TaskExecutor,
} from './task-executor.js';
