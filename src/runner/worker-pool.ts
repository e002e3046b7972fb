import { DEFAULT_MAX_CONCURRENCY } from './config.js';
import { InternalError } from './errors.js';

export interface PoolResult<T, R> {
  item: T;
  value: R;
}

/**
 * Runs a worker over a list of items with at most `maxConcurrency` in flight.
 * Results are yielded in completion order. A freed slot is refilled as soon
 * as its task settles, whether or not the consumer has read the result yet.
 */
export class WorkerPool {
  readonly maxConcurrency: number;

  constructor(maxConcurrency: number = DEFAULT_MAX_CONCURRENCY) {
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new InternalError(`maxConcurrency must be a positive integer, got ${maxConcurrency}`);
    }
    this.maxConcurrency = maxConcurrency;
  }

  async *run<T, R>(items: Iterable<T>, worker: (item: T) => Promise<R>): AsyncGenerator<PoolResult<T, R>> {
    const queue = Array.from(items);
    const completed: PoolResult<T, R>[] = [];
    let next = 0;
    let active = 0;
    const state: { failure: { error: unknown } | null } = { failure: null };
    let wake: (() => void) | null = null;

    const notify = (): void => {
      const resume = wake;
      wake = null;
      resume?.();
    };

    const settle = (): void => {
      active--;
      launch();
      notify();
    };

    // Once a worker has rejected, nothing new is started; in-flight tasks still settle.
    const launch = (): void => {
      while (state.failure === null && active < this.maxConcurrency && next < queue.length) {
        const item = queue[next++];
        active++;
        void worker(item).then(
          value => {
            completed.push({ item, value });
            settle();
          },
          (error: unknown) => {
            state.failure ??= { error };
            settle();
          },
        );
      }
    };

    launch();

    while (active > 0 || completed.length > 0) {
      const result = completed.shift();
      if (result) {
        yield result;
        continue;
      }
      await new Promise<void>(resolve => {
        wake = resolve;
      });
    }

    if (state.failure !== null) {
      throw state.failure.error;
    }
  }
}
