import pLimit from "p-limit";

import { InvariantError } from "../lib/errors.js";

interface PendingReceive<T> {
  resolve: (result: IteratorResult<T, undefined>) => void;
  reject: (error: unknown) => void;
}

/**
 * Many-producer, single-consumer queue. Values are delivered in the order
 * they were sent; the consumer drains it with `for await`.
 */
export class CompletionChannel<T> implements AsyncIterable<T> {
  private readonly buffered: T[] = [];
  private readonly pending: PendingReceive<T>[] = [];
  private closed = false;
  private failure: { error: unknown } | undefined;

  get isClosed(): boolean {
    return this.closed;
  }

  /** Values sent after `fail` are dropped; the consumer already has the error. */
  send(value: T): void {
    if (this.failure) {
      return;
    }
    if (this.closed) {
      throw new InvariantError("send on a closed completion channel");
    }

    const receiver = this.pending.shift();
    if (receiver) {
      receiver.resolve({ done: false, value });
      return;
    }
    this.buffered.push(value);
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const receiver of this.pending.splice(0)) {
      receiver.resolve({ done: true, value: undefined });
    }
  }

  /** Close the channel so the consumer's next read rejects with `error`. */
  fail(error: unknown): void {
    if (this.closed) {
      return;
    }
    this.failure = { error };
    this.closed = true;
    for (const receiver of this.pending.splice(0)) {
      receiver.reject(error);
    }
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    if (this.buffered.length > 0) {
      const [value] = this.buffered.splice(0, 1);
      return Promise.resolve<IteratorResult<T, undefined>>({
        done: false,
        value,
      });
    }
    if (this.failure) {
      return Promise.reject(this.failure.error);
    }
    if (this.closed) {
      return Promise.resolve<IteratorResult<T, undefined>>({
        done: true,
        value: undefined,
      });
    }
    return new Promise((resolve, reject) => {
      this.pending.push({ resolve, reject });
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return { next: () => this.receive() };
  }
}

export interface WorkerPoolOptions {
  concurrency: number;
}

/**
 * Run `worker` once per item with at most `concurrency` in flight. Results
 * arrive on the returned channel in completion order; the channel closes
 * after the last one.
 */
export const startWorkerPool = <TItem, TResult>(
  items: readonly TItem[],
  worker: (item: TItem) => Promise<TResult>,
  options: WorkerPoolOptions,
): CompletionChannel<TResult> => {
  if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
    throw new InvariantError(
      `worker pool concurrency must be a positive integer, got ${options.concurrency}`,
    );
  }

  const channel = new CompletionChannel<TResult>();
  const limit = pLimit(options.concurrency);

  const tasks = items.map((item) =>
    limit(async () => {
      channel.send(await worker(item));
    }),
  );

  void Promise.all(tasks).then(
    () => {
      channel.close();
    },
    (error: unknown) => {
      channel.fail(error);
    },
  );

  return channel;
};
