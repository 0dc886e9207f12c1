/**
 * Publish/subscribe fan-out for live-reload events.
 *
 * Every scope (one tracked file, or the index page) has its own set of sinks.
 * Publishing never waits on a subscriber: a sink whose buffer is full drops
 * the message. Reload events carry no state, so a dropped event is harmless as
 * long as a later one gets through.
 */

import { SINK_CAPACITY } from "./config.js";

export const INDEX_SCOPE: unique symbol = Symbol("index");

/** An absolute file path, or the index-page feed. */
export type Scope = string | typeof INDEX_SCOPE;

export interface SubscribeOptions {
  /** Messages buffered while the consumer is not reading. */
  capacity?: number;
}

export class Sink {
  private readonly buffer: string[] = [];
  private waiter:
    | { promise: Promise<string | undefined>; resolve: (value: string | undefined) => void }
    | undefined;
  private closed = false;

  constructor(readonly capacity: number = SINK_CAPACITY) {}

  get isClosed(): boolean {
    return this.closed;
  }

  get pending(): number {
    return this.buffer.length;
  }

  /** Hands the message over without waiting. False when dropped. */
  offer(message: string): boolean {
    if (this.closed) {
      return false;
    }
    if (this.waiter) {
      const { resolve } = this.waiter;
      this.waiter = undefined;
      resolve(message);
      return true;
    }
    if (this.buffer.length >= this.capacity) {
      return false;
    }
    this.buffer.push(message);
    return true;
  }

  /**
   * Next message, or undefined once the sink is closed. Calls made while a
   * read is already waiting share that read.
   */
  next(): Promise<string | undefined> {
    const buffered = this.buffer.shift();
    if (buffered !== undefined) {
      return Promise.resolve(buffered);
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    if (!this.waiter) {
      let resolve: (value: string | undefined) => void = () => {};
      const promise = new Promise<string | undefined>((done) => {
        resolve = done;
      });
      this.waiter = { promise, resolve };
    }
    return this.waiter.promise;
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.buffer.length = 0;
    const waiter = this.waiter;
    this.waiter = undefined;
    waiter?.resolve(undefined);
  }
}

export class NotificationHub {
  private readonly scopes = new Map<Scope, Set<Sink>>();

  subscribe(scope: Scope, options: SubscribeOptions = {}): Sink {
    const sink = new Sink(options.capacity);
    let sinks = this.scopes.get(scope);
    if (!sinks) {
      sinks = new Set();
      this.scopes.set(scope, sinks);
    }
    sinks.add(sink);
    return sink;
  }

  unsubscribe(scope: Scope, sink: Sink): void {
    sink.close();
    const sinks = this.scopes.get(scope);
    if (!sinks) {
      return;
    }
    sinks.delete(sink);
    if (sinks.size === 0) {
      this.scopes.delete(scope);
    }
  }

  /** Returns how many sinks accepted the message. */
  publish(scope: Scope, message: string): number {
    const sinks = this.scopes.get(scope);
    if (!sinks) {
      return 0;
    }
    let delivered = 0;
    for (const sink of sinks) {
      if (sink.offer(message)) {
        delivered += 1;
      }
    }
    return delivered;
  }

  subscriberCount(scope: Scope): number {
    return this.scopes.get(scope)?.size ?? 0;
  }

  closeAll(): void {
    for (const sinks of this.scopes.values()) {
      for (const sink of sinks) {
        sink.close();
      }
    }
    this.scopes.clear();
  }
}
