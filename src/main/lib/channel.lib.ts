/**
 * Channel library
 * Bounded hand-off channels and broadcast fan-out used between the engine
 * relays and the session forwarding loops
 */

export class ChannelClosedError extends Error {
  constructor(message = 'Channel closed') {
    super(message);
    this.name = 'ChannelClosedError';
  }
}

/**
 * A broadcast receiver fell behind and lost messages. The receiver stays usable.
 */
export class ChannelLaggedError extends Error {
  readonly skipped: number;

  constructor(skipped: number) {
    super(`Receiver lagged behind, ${skipped} message(s) skipped`);
    this.name = 'ChannelLaggedError';
    this.skipped = skipped;
  }
}

export interface Receiver<T> {
  recv(signal?: AbortSignal): Promise<T>;
  close(): void;
}

export interface Sink<T> {
  send(value: T): void;
}

interface Waiter<T> {
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
}

interface PendingSend<T> extends Waiter<void> {
  value: T;
}

/**
 * Registers `waiter` in `queue` until it settles or `signal` aborts
 */
function waitOn<T, W extends Waiter<T>>(
  queue: W[],
  build: (resolve: (value: T) => void, reject: (err: unknown) => void) => W,
  signal?: AbortSignal
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      const index = queue.indexOf(waiter);
      if (index !== -1) {
        queue.splice(index, 1);
      }
      reject(signal?.reason);
    };

    const waiter = build(
      (value) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err) => {
        signal?.removeEventListener('abort', onAbort);
        reject(err);
      }
    );

    queue.push(waiter);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Multi-producer, multi-consumer queue with a fixed capacity.
 * `send` stalls while the buffer is full.
 */
export class BoundedChannel<T> implements Receiver<T> {
  private buffer: T[] = [];
  private receivers: Waiter<T>[] = [];
  private senders: PendingSend<T>[] = [];
  private closed = false;

  constructor(readonly capacity: number = 1) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  send(value: T, signal?: AbortSignal): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ChannelClosedError());
    }
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver.resolve(value);
      return Promise.resolve();
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(value);
      return Promise.resolve();
    }

    return waitOn<void, PendingSend<T>>(
      this.senders,
      (resolve, reject) => ({ value, resolve, reject }),
      signal
    );
  }

  recv(signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    if (this.buffer.length > 0) {
      const value = this.buffer[0];
      this.buffer.shift();
      const sender = this.senders.shift();
      if (sender) {
        this.buffer.push(sender.value);
        sender.resolve();
      }
      return Promise.resolve(value);
    }

    if (this.closed) {
      return Promise.reject(new ChannelClosedError());
    }

    return waitOn<T, Waiter<T>>(this.receivers, (resolve, reject) => ({ resolve, reject }), signal);
  }

  /**
   * Buffered values stay readable; waiting senders and receivers are rejected.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const receiver of this.receivers.splice(0)) {
      receiver.reject(new ChannelClosedError());
    }
    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError());
    }
  }
}

class BroadcastReceiver<T> implements Receiver<T> {
  private queue: T[] = [];
  private waiters: Waiter<T>[] = [];
  private skipped = 0;
  private closed = false;

  constructor(
    private readonly capacity: number,
    private readonly detach: (receiver: BroadcastReceiver<T>) => void
  ) {}

  push(value: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(value);
      return;
    }

    this.queue.push(value);
    if (this.queue.length > this.capacity) {
      this.queue.shift();
      this.skipped++;
    }
  }

  recv(signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    if (this.skipped > 0) {
      const skipped = this.skipped;
      this.skipped = 0;
      return Promise.reject(new ChannelLaggedError(skipped));
    }

    if (this.queue.length > 0) {
      const value = this.queue[0];
      this.queue.shift();
      return Promise.resolve(value);
    }

    if (this.closed) {
      return Promise.reject(new ChannelClosedError());
    }

    return waitOn<T, Waiter<T>>(this.waiters, (resolve, reject) => ({ resolve, reject }), signal);
  }

  shutdown(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(new ChannelClosedError());
    }
  }

  close(): void {
    this.detach(this);
    this.shutdown();
  }
}

/**
 * Fan-out channel: every subscriber sees each value sent after it subscribed.
 * A subscriber more than `capacity` values behind loses the oldest ones and
 * gets a ChannelLaggedError on its next receive.
 */
export class Broadcaster<T> implements Sink<T> {
  private subscribers = new Set<BroadcastReceiver<T>>();
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Broadcast capacity must be a positive integer, got ${capacity}`);
    }
  }

  get receiverCount(): number {
    return this.subscribers.size;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  send(value: T): void {
    if (this.closed) {
      throw new ChannelClosedError('Broadcast channel closed');
    }
    for (const subscriber of this.subscribers) {
      subscriber.push(value);
    }
  }

  subscribe(): Receiver<T> {
    const receiver = new BroadcastReceiver<T>(this.capacity, (it) => this.subscribers.delete(it));
    if (this.closed) {
      receiver.shutdown();
    } else {
      this.subscribers.add(receiver);
    }
    return receiver;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const subscriber of this.subscribers) {
      subscriber.shutdown();
    }
    this.subscribers.clear();
  }
}
