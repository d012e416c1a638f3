export {
  ObservableDataHolder,
  fromObservable,
  type FromObservableOptions,
} from './from-observable.js';
export { takeUntilDestroyed, whileAtLeast } from './operators.js';
