import { availableParallelism } from 'os';
import { toError } from '@/errors/error-types';

export type Settled<T, R> =
  | { status: 'fulfilled'; item: T; value: R }
  | { status: 'rejected'; item: T; reason: Error };

/**
 * How a pass over the input ended. `inputError` is set when the input itself
 * threw; no further items were pulled after it.
 */
export interface PoolSummary {
  completed: number;
  inputError?: Error;
}

export interface PoolRun<T, R> extends PoolSummary {
  settled: Settled<T, R>[];
}

/**
 * Pool size for I/O-bound work: a few more workers than cores, capped at 32
 */
export function defaultPoolSize(): number {
  return Math.min(32, availableParallelism() + 4);
}

/**
 * Runs tasks with at most `size` in flight. Workers pull from one shared
 * iterator, so the input is consumed lazily and may be unbounded in length.
 */
export class WorkerPool {
  readonly size: number;

  constructor(size: number = defaultPoolSize()) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Pool size must be a positive integer, got ${size}`);
    }
    this.size = size;
  }

  /**
   * Settle every task and hand each result to `onSettled` as it completes.
   * Nothing is retained, so memory stays flat however long the input is.
   * A failing task never cancels the others, and a failing input stops the
   * pulling but lets tasks already in flight finish. Rejects only when
   * `onSettled` throws.
   */
  async forEach<T, R>(
    items: Iterable<T>,
    task: (item: T) => Promise<R>,
    onSettled: (entry: Settled<T, R>) => void
  ): Promise<PoolSummary> {
    let iterator: Iterator<T> | undefined;
    let completed = 0;
    let inputError: Error | undefined;

    const pull = (): IteratorResult<T> | undefined => {
      if (inputError) {
        return undefined;
      }
      try {
        if (!iterator) {
          iterator = items[Symbol.iterator]();
        }
        return iterator.next();
      } catch (error) {
        inputError = toError(error);
        return undefined;
      }
    };

    const worker = async (): Promise<void> => {
      for (;;) {
        const next = pull();
        if (!next || next.done) {
          return;
        }

        const item = next.value;
        let entry: Settled<T, R>;
        try {
          entry = { status: 'fulfilled', item, value: await task(item) };
        } catch (error) {
          entry = { status: 'rejected', item, reason: toError(error) };
        }
        completed++;
        onSettled(entry);
      }
    };

    const workers: Promise<void>[] = [];
    for (let w = 0; w < this.size; w++) {
      workers.push(worker());
    }

    await Promise.all(workers);
    return inputError ? { completed, inputError } : { completed };
  }

  /**
   * Like `forEach`, collecting the results in completion order
   */
  async run<T, R>(items: Iterable<T>, task: (item: T) => Promise<R>): Promise<PoolRun<T, R>> {
    const settled: Settled<T, R>[] = [];
    const summary = await this.forEach(items, task, entry => settled.push(entry));
    return { ...summary, settled };
  }
}
