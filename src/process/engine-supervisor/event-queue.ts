/**
 * Single-consumer async channel.
 *
 * Producers push without waiting; one consumer takes items in order, either
 * by async iteration or with a timed `next()` so it can interleave periodic
 * checks with event handling.
 */

export type QueueTake<T> =
  | { kind: "item"; value: T }
  | { kind: "timeout" }
  | { kind: "closed" };

export class EventQueue<T extends NonNullable<unknown>> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private waiter: ((take: QueueTake<T>) => void) | null = null;
  private closed = false;

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(item: T): void {
    if (this.closed) {
      return;
    }
    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter({ kind: "item", value: item });
      return;
    }
    this.items.push(item);
  }

  /** Remove and return the oldest pending item without waiting. */
  shift(): T | undefined {
    return this.items.shift();
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.({ kind: "closed" });
  }

  /**
   * Take the next item. Pending items are returned before a close is
   * reported; a timeout only fires while nothing is pending.
   */
  next(timeoutMs?: number): Promise<QueueTake<T>> {
    const pending = this.items.shift();
    if (pending !== undefined) {
      return Promise.resolve({ kind: "item", value: pending });
    }
    if (this.closed) {
      return Promise.resolve({ kind: "closed" });
    }
    if (this.waiter) {
      return Promise.reject(new Error("EventQueue supports a single consumer"));
    }

    return new Promise<QueueTake<T>>((resolve) => {
      let timer: NodeJS.Timeout | null = null;
      this.waiter = (take) => {
        if (timer) {
          clearTimeout(timer);
        }
        resolve(take);
      };
      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          this.waiter = null;
          resolve({ kind: "timeout" });
        }, timeoutMs);
      }
    });
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const take = await this.next();
      if (take.kind !== "item") {
        return;
      }
      yield take.value;
    }
  }
}
