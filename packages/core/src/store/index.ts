export {
  RetainedHandle,
  RetainedStore,
  bindRetainedStore,
  type BindRetainedStoreOptions,
  type Closeable,
  type RetainedStoreOptions,
} from './retained-store.js';
