import type { Observable, Subscription } from 'rxjs';
import { ensureTetherError } from '../errors/tether-error.js';
import { DataHolder, type DataHolderOptions } from '../live-data/data-holder.js';

export interface FromObservableOptions<T> extends DataHolderOptions<T> {
  /**
   * Receives errors raised by the source. Without it the error is logged and
   * rethrown on the designated context.
   */
  readonly onError?: (error: Error) => void;
}

/**
 * Data holder fed by an rxjs source. The source is subscribed while the holder
 * has active observers and unsubscribed when it has none; the last value is
 * kept across the gap.
 */
export class ObservableDataHolder<T> extends DataHolder<T> {
  private subscription: Subscription | undefined;
  private readonly onError: ((error: Error) => void) | undefined;

  constructor(
    private readonly source$: Observable<T>,
    options: FromObservableOptions<T> = {}
  ) {
    super(options);
    this.onError = options.onError;
  }

  protected override onActive(): void {
    this.subscription = this.source$.subscribe({
      next: (value) => this.postValue(value),
      error: (err: unknown) => this.handleError(err instanceof Error ? err : ensureTetherError(err)),
    });
  }

  protected override onInactive(): void {
    this.subscription?.unsubscribe();
    this.subscription = undefined;
  }

  private handleError(error: Error): void {
    if (this.onError) {
      this.onError(error);
      return;
    }
    this.logger.error('Source observable failed', error);
    this.executor.postToMainThread(() => {
      throw error;
    });
  }
}

/**
 * Expose `source$` as a lifecycle-aware {@link DataHolder}.
 *
 * @example
 * ```typescript
 * const prices = fromObservable(priceFeed$);
 * prices.observe(screen, renderPrice); // feed runs only while the screen is visible
 * ```
 */
export function fromObservable<T>(
  source$: Observable<T>,
  options?: FromObservableOptions<T>
): ObservableDataHolder<T> {
  return new ObservableDataHolder(source$, options);
}
