export {
  DataHolder,
  MutableDataHolder,
  START_VERSION,
  type DataHolderOptions,
  type ValueObserver,
} from './data-holder.js';
