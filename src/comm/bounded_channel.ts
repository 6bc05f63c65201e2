import { ChannelClosedError, SendCancelledError } from "./comm_errors";

type BlockedSender<T> = {
  item: T;
  resolve: () => void;
  reject: (error: Error) => void;
};

/**
 * FIFO queue with a fixed capacity and explicit closure.
 *
 * - send() waits while the queue is full and rejects once the channel closes,
 *   or with SendCancelledError when its signal aborts first.
 * - trySend() never waits; it reports false when the queue is full.
 * - receive() yields queued items even after close, then resolves null.
 */
export class BoundedChannel<T extends object> {
  private readonly items: T[] = [];
  private readonly receivers: Array<(item: T | null) => void> = [];
  private readonly senders: Array<BlockedSender<T>> = [];
  private isClosed = false;
  private readonly closedSignal: Promise<void>;
  private signalClosed: () => void = () => {};

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`channel capacity must be a positive integer: ${capacity}`);
    }
    this.closedSignal = new Promise<void>((resolve) => {
      this.signalClosed = resolve;
    });
  }

  get closed(): boolean {
    return this.isClosed;
  }

  get size(): number {
    return this.items.length;
  }

  /** Resolves once close() has been called. */
  whenClosed(): Promise<void> {
    return this.closedSignal;
  }

  async send(item: T, signal?: AbortSignal): Promise<void> {
    if (this.isClosed) {
      throw new ChannelClosedError();
    }
    if (signal?.aborted) {
      throw new SendCancelledError();
    }
    if (this.deliver(item)) return;
    await new Promise<void>((resolve, reject) => {
      const sender: BlockedSender<T> = { item, resolve, reject };
      this.senders.push(sender);
      signal?.addEventListener(
        "abort",
        () => {
          const index = this.senders.indexOf(sender);
          if (index === -1) return;
          this.senders.splice(index, 1);
          reject(new SendCancelledError());
        },
        { once: true }
      );
    });
  }

  trySend(item: T): boolean {
    if (this.isClosed) {
      throw new ChannelClosedError();
    }
    return this.deliver(item);
  }

  async receive(): Promise<T | null> {
    const next = this.items.shift();
    if (next !== undefined) {
      this.admitBlockedSender();
      return next;
    }
    if (this.isClosed) return null;
    return new Promise<T | null>((resolve) => {
      this.receivers.push(resolve);
    });
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    for (const receiver of this.receivers.splice(0)) {
      receiver(null);
    }
    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError());
    }
    this.signalClosed();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T> {
    while (true) {
      const item = await this.receive();
      if (item === null) return;
      yield item;
    }
  }

  private deliver(item: T): boolean {
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(item);
      return true;
    }
    if (this.items.length < this.capacity) {
      this.items.push(item);
      return true;
    }
    return false;
  }

  private admitBlockedSender() {
    const sender = this.senders.shift();
    if (!sender) return;
    this.items.push(sender.item);
    sender.resolve();
  }
}
