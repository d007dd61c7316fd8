import { ChannelClosedError } from "./errors";

interface BlockedSend<T> {
  value: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

type Received<T> = IteratorResult<T, undefined>;

class ChannelCore<T> {
  private readonly buffer: Array<{ value: T }> = [];
  private readonly blockedSends: BlockedSend<T>[] = [];
  private waitingReceive: ((result: Received<T>) => void) | null = null;
  private openSenders = 0;
  private receiverClosed = false;

  constructor(readonly capacity: number) {}

  get size(): number {
    return this.buffer.length;
  }

  attachSender(): void {
    this.openSenders++;
  }

  detachSender(): void {
    this.openSenders--;
    if (this.openSenders === 0 && this.waitingReceive && this.buffer.length === 0) {
      const resolve = this.waitingReceive;
      this.waitingReceive = null;
      resolve({ done: true, value: undefined });
    }
  }

  push(value: T): Promise<void> {
    if (this.receiverClosed) {
      return Promise.reject(new ChannelClosedError());
    }

    if (this.waitingReceive) {
      const resolve = this.waitingReceive;
      this.waitingReceive = null;
      resolve({ done: false, value });
      return Promise.resolve();
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push({ value });
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.blockedSends.push({ value, resolve, reject });
    });
  }

  pull(): Promise<Received<T>> {
    if (this.waitingReceive) {
      return Promise.reject(new Error("Channel already has a pending receive; it supports a single consumer"));
    }

    const entry = this.buffer.shift();
    if (entry) {
      const blocked = this.blockedSends.shift();
      if (blocked) {
        this.buffer.push({ value: blocked.value });
        blocked.resolve();
      }
      return Promise.resolve({ done: false, value: entry.value });
    }

    if (this.receiverClosed || this.openSenders === 0) {
      return Promise.resolve({ done: true, value: undefined });
    }

    return new Promise<Received<T>>((resolve) => {
      this.waitingReceive = resolve;
    });
  }

  closeReceiver(): void {
    if (this.receiverClosed) return;
    this.receiverClosed = true;
    this.buffer.length = 0;

    const error = new ChannelClosedError();
    for (const blocked of this.blockedSends.splice(0)) {
      blocked.reject(error);
    }
  }
}

/**
 * Producer handle. Every handle must be closed; the channel ends once the last one is.
 */
export class Sender<T> {
  private closed = false;

  constructor(private readonly core: ChannelCore<T>) {
    core.attachSender();
  }

  /** Resolves once the value is buffered or handed to the receiver; suspends while the buffer is full. */
  send(value: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ChannelClosedError("Sender is closed"));
    }
    return this.core.push(value);
  }

  clone(): Sender<T> {
    if (this.closed) {
      throw new ChannelClosedError("Cannot clone a closed sender");
    }
    return new Sender(this.core);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.core.detachSender();
  }
}

export class Receiver<T> {
  constructor(private readonly core: ChannelCore<T>) {}

  get pending(): number {
    return this.core.size;
  }

  /** Resolves `{ done: true }` only once every sender is closed and the buffer is drained. */
  receive(): Promise<Received<T>> {
    return this.core.pull();
  }

  /** Stops consuming: buffered values are discarded and pending or later sends reject. */
  close(): void {
    this.core.closeReceiver();
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    while (true) {
      const next = await this.receive();
      if (next.done) return;
      yield next.value;
    }
  }
}

export interface Channel<T> {
  sender: Sender<T>;
  receiver: Receiver<T>;
}

/** Bounded multi-producer, single-consumer channel with close-and-drain shutdown. */
export function createChannel<T>(capacity: number): Channel<T> {
  if (!Number.isInteger(capacity) || capacity < 1) {
    throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
  }

  const core = new ChannelCore<T>(capacity);
  return {
    sender: new Sender(core),
    receiver: new Receiver(core),
  };
}
