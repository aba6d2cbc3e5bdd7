import {
  ChannelClosedError,
  ChannelEmptyError,
  ChannelFullError,
  ChannelStateError,
  DrainTimeoutError,
} from "./errors.js";

/** Sentinel telling the consumer to stop once it reaches this point of the stream. */
export const END_OF_STREAM: unique symbol = Symbol("end-of-stream");
export type EndOfStream = typeof END_OF_STREAM;

type Timer = ReturnType<typeof setTimeout>;

interface PendingPut<T> {
  item: T;
  resolve: () => void;
  reject: (error: Error) => void;
  timer?: Timer;
}

interface PendingGet<T> {
  resolve: (item: T) => void;
  reject: (error: Error) => void;
  timer?: Timer;
}

function removeWaiter<W>(waiters: W[], waiter: W): void {
  const index = waiters.indexOf(waiter);
  if (index !== -1) {
    waiters.splice(index, 1);
  }
}

/**
 * Fixed-capacity FIFO shared by the producer and consumer loops.
 *
 * `put` waits for free space and `get` waits for an item, each up to a
 * timeout in seconds (0 means fail at once). Every successful `put` counts
 * as in-flight work until the consumer calls `markDone`; `join` resolves
 * once that count is back to zero. Blocked putters are admitted in arrival
 * order, so delivery order always matches enqueue order.
 */
export class BoundedChannel<T> {
  private readonly items: T[] = [];
  private readonly putters: PendingPut<T>[] = [];
  private readonly getters: PendingGet<T>[] = [];
  private joiners: Array<() => void> = [];
  private unfinished = 0;
  private closed = false;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ChannelStateError(`Channel capacity must be a positive integer, received ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  /** Items put but not yet marked done. */
  get pending(): number {
    return this.unfinished;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  put(item: T, timeoutSec: number): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ChannelClosedError());
    }

    if (this.putters.length === 0 && this.items.length < this.capacity) {
      this.enqueue(item);
      return Promise.resolve();
    }

    if (timeoutSec <= 0) {
      return Promise.reject(new ChannelFullError(timeoutSec));
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: PendingPut<T> = { item, resolve, reject };
      waiter.timer = setTimeout(() => {
        removeWaiter(this.putters, waiter);
        reject(new ChannelFullError(timeoutSec));
      }, timeoutSec * 1000);
      this.putters.push(waiter);
    });
  }

  get(timeoutSec: number): Promise<T> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      this.admitPutters();
      return Promise.resolve(item);
    }

    if (this.closed) {
      return Promise.reject(new ChannelClosedError());
    }

    if (timeoutSec <= 0) {
      return Promise.reject(new ChannelEmptyError(timeoutSec));
    }

    return new Promise<T>((resolve, reject) => {
      const waiter: PendingGet<T> = { resolve, reject };
      waiter.timer = setTimeout(() => {
        removeWaiter(this.getters, waiter);
        reject(new ChannelEmptyError(timeoutSec));
      }, timeoutSec * 1000);
      this.getters.push(waiter);
    });
  }

  markDone(): void {
    if (this.unfinished <= 0) {
      throw new ChannelStateError("markDone() called more times than items were put");
    }
    this.unfinished -= 1;
    if (this.unfinished === 0) {
      const joiners = this.joiners;
      this.joiners = [];
      joiners.forEach((release) => release());
    }
  }

  /**
   * Resolves when every item put so far has been marked done. With a
   * timeout, rejects with `DrainTimeoutError` instead of waiting longer.
   */
  join(timeoutSec?: number): Promise<void> {
    if (this.unfinished === 0) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      let timer: Timer | undefined;
      const release = (): void => {
        if (timer) clearTimeout(timer);
        resolve();
      };
      this.joiners.push(release);

      if (timeoutSec !== undefined) {
        timer = setTimeout(() => {
          this.joiners = this.joiners.filter((joiner) => joiner !== release);
          reject(new DrainTimeoutError(timeoutSec, this.unfinished));
        }, timeoutSec * 1000);
      }
    });
  }

  /**
   * Rejects every blocked `put` and `get` with `ChannelClosedError`. Items
   * already queued can still be taken; new puts fail.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const waiter of this.putters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(new ChannelClosedError());
    }
    for (const waiter of this.getters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.reject(new ChannelClosedError());
    }
  }

  private enqueue(item: T): void {
    this.unfinished += 1;
    const getter = this.getters.shift();
    if (getter) {
      clearTimeout(getter.timer);
      getter.resolve(item);
      return;
    }
    this.items.push(item);
  }

  private admitPutters(): void {
    while (this.items.length < this.capacity) {
      const putter = this.putters.shift();
      if (!putter) {
        return;
      }
      clearTimeout(putter.timer);
      this.enqueue(putter.item);
      putter.resolve();
    }
  }
}
