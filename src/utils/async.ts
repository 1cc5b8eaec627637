/**
 * Concurrency primitives for the worker pool and comparison fan-out
 */

/**
 * Run `fn` over items with at most `concurrency` calls in flight.
 * Results keep the order of `items`. Items not yet started when
 * `signal` aborts are skipped and left undefined.
 */
export async function parallel<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  concurrency: number = 5,
  signal?: AbortSignal,
): Promise<(R | undefined)[]> {
  const results = Array.from<R | undefined>({ length: items.length });
  const executing = new Map<number, Promise<void>>();

  for (let i = 0; i < items.length; i++) {
    if (signal?.aborted) break;
    const item = items[i];
    if (item === undefined) continue;

    const promise = fn(item, i)
      .then((result) => {
        results[i] = result;
      })
      .finally(() => {
        executing.delete(i);
      });
    executing.set(i, promise);

    if (executing.size >= concurrency) {
      await Promise.race(executing.values());
    }
  }

  await Promise.all(executing.values());
  return results;
}

/**
 * Bounded multi-producer, single-consumer channel
 */
export interface Channel<T> extends AsyncIterable<T> {
  /**
   * Deliver a value, waiting while the buffer is full.
   * Resolves false when the channel was closed and the value dropped.
   */
  send(value: T): Promise<boolean>;
  /** Stop accepting values; buffered values are still delivered */
  close(): void;
  readonly closed: boolean;
}

/**
 * Create a bounded channel
 *
 * @example
 * const channel = createChannel<number>(4);
 * void producer(channel).finally(() => channel.close());
 * for await (const n of channel) console.log(n);
 */
export function createChannel<T>(capacity: number = 1): Channel<T> {
  const size = Math.max(1, Math.floor(capacity));
  const buffer: { value: T }[] = [];
  const receivers: ((result: IteratorResult<T>) => void)[] = [];
  const senders: (() => void)[] = [];
  let closed = false;

  async function send(value: T): Promise<boolean> {
    for (;;) {
      if (closed) return false;

      const receiver = receivers.shift();
      if (receiver) {
        receiver({ value, done: false });
        return true;
      }

      if (buffer.length < size) {
        buffer.push({ value });
        return true;
      }

      await new Promise<void>((resolve) => senders.push(resolve));
    }
  }

  function receive(): Promise<IteratorResult<T>> {
    const item = buffer.shift();
    if (item) {
      senders.shift()?.();
      return Promise.resolve({ value: item.value, done: false });
    }
    if (closed) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise((resolve) => receivers.push(resolve));
  }

  function close(): void {
    if (closed) return;
    closed = true;
    for (const receiver of receivers.splice(0)) {
      receiver({ value: undefined, done: true });
    }
    for (const sender of senders.splice(0)) {
      sender();
    }
  }

  return {
    send,
    close,
    get closed() {
      return closed;
    },
    [Symbol.asyncIterator](): AsyncIterator<T> {
      return {
        next: receive,
        return: async () => {
          // Consumer gave up: drop whatever is buffered and release blocked producers
          buffer.length = 0;
          close();
          return { value: undefined, done: true };
        },
      };
    },
  };
}
