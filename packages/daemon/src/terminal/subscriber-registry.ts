/**
 * Subscriber Registry - tracks live subscriber streams and fans output out.
 *
 * Each attached subscriber gets a service loop that replays the scrollback,
 * makes sure the process is running, then relays its input into the PTY until
 * the stream closes.
 */

import { setImmediate as yieldToLoop } from "node:timers/promises";
import { SubscriberClosedError, getErrorMessage } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import type { RingBuffer } from "./ring-buffer.js";
import type { Subscriber } from "./types.js";

/**
 * What the registry needs from the process side.
 */
export interface ProcessControl {
  isStarted(): boolean;
  start(): void | Promise<void>;
  writeInput(data: Buffer): void;
}

export class SubscriberRegistry {
  /** Insertion order is kept for diagnostics */
  private subscribers = new Set<Subscriber>();
  private loops = new Map<Subscriber, Promise<void>>();

  constructor(
    private readonly scrollback: RingBuffer,
    private readonly process: ProcessControl,
    private readonly logger: Logger
  ) {}

  get size(): number {
    return this.subscribers.size;
  }

  has(subscriber: Subscriber): boolean {
    return this.subscribers.has(subscriber);
  }

  list(): Subscriber[] {
    return Array.from(this.subscribers);
  }

  /**
   * Register a subscriber and start its service loop. Idempotent.
   */
  attach(subscriber: Subscriber): void {
    if (this.subscribers.has(subscriber)) return;

    this.subscribers.add(subscriber);
    const loop = this.serve(subscriber).finally(() => {
      this.loops.delete(subscriber);
    });
    this.loops.set(subscriber, loop);
    this.logger.debug(`Subscriber attached (${this.subscribers.size} total)`);
  }

  /**
   * Resolves once the subscriber's service loop has ended.
   */
  whenDetached(subscriber: Subscriber): Promise<void> {
    return this.loops.get(subscriber) ?? Promise.resolve();
  }

  /**
   * Send bytes to every open subscriber, then prune the ones found closed.
   * A failing send is logged and does not affect the others.
   */
  async broadcast(data: Buffer): Promise<void> {
    const closed: Subscriber[] = [];
    const sends: Promise<void>[] = [];

    for (const subscriber of Array.from(this.subscribers)) {
      if (subscriber.isClosed()) {
        closed.push(subscriber);
        continue;
      }
      sends.push(this.sendTo(subscriber, data));
    }

    await Promise.all(sends);

    for (const subscriber of closed) {
      this.remove(subscriber);
    }
  }

  /**
   * Close every open stream. Bookkeeping is left to the caller (see clear()).
   */
  detachAll(): void {
    for (const subscriber of this.subscribers) {
      if (!subscriber.isClosed()) {
        this.closeQuietly(subscriber);
      }
    }
  }

  /** Forget every subscriber. */
  clear(): void {
    this.subscribers.clear();
  }

  /**
   * Drop a subscriber observed as closed. Internal: callers never request it.
   */
  private remove(subscriber: Subscriber): void {
    if (!this.subscribers.delete(subscriber)) return;
    if (!subscriber.isClosed()) {
      this.closeQuietly(subscriber);
    }
    this.logger.debug(`Subscriber pruned (${this.subscribers.size} left)`);
  }

  private async sendTo(subscriber: Subscriber, data: Buffer): Promise<void> {
    try {
      await subscriber.send(data);
    } catch (error) {
      this.logger.warn(`Send to subscriber failed: ${getErrorMessage(error)}`);
    }
  }

  private closeQuietly(subscriber: Subscriber): void {
    try {
      subscriber.close();
    } catch (error) {
      this.logger.warn(`Closing subscriber failed: ${getErrorMessage(error)}`);
    }
  }

  private async serve(subscriber: Subscriber): Promise<void> {
    try {
      // Issued synchronously from attach(), so no broadcast can overtake it
      await subscriber.send(this.scrollback.snapshot());
      if (!this.process.isStarted()) {
        await this.process.start();
      }
    } catch (error) {
      this.logger.error("Subscriber setup failed", error);
    }

    while (!subscriber.isClosed()) {
      try {
        const message = await subscriber.receive();
        const data = typeof message === "string" ? Buffer.from(message, "utf8") : message;
        this.process.writeInput(data);
      } catch (error) {
        if (!(error instanceof SubscriberClosedError)) {
          this.logger.warn(`Subscriber input error: ${getErrorMessage(error)}`);
        }
      }
      await yieldToLoop();
    }
  }
}
