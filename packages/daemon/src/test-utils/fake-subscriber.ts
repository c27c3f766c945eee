/**
 * In-process subscriber stream for tests.
 */

import { SubscriberClosedError } from "../utils/errors.js";
import type { Subscriber } from "../terminal/types.js";

export class FakeSubscriber implements Subscriber {
  /** Messages the session sent, in order */
  readonly sent: Buffer[] = [];
  failSend: Error | null = null;
  closeCalls = 0;

  private inbox: Array<Buffer | string> = [];
  private waiting: Array<{
    resolve: (message: Buffer | string) => void;
    reject: (error: Error) => void;
  }> = [];
  private closed = false;

  isClosed(): boolean {
    return this.closed;
  }

  async send(data: Buffer): Promise<void> {
    if (this.failSend) throw this.failSend;
    this.sent.push(Buffer.from(data));
  }

  receive(): Promise<Buffer | string> {
    const next = this.inbox.shift();
    if (next !== undefined) return Promise.resolve(next);
    if (this.closed) return Promise.reject(new SubscriberClosedError());
    return new Promise((resolve, reject) => {
      this.waiting.push({ resolve, reject });
    });
  }

  close(): void {
    this.closeCalls++;
    this.disconnect();
  }

  /** Queue a message as if the remote end sent it */
  push(message: Buffer | string): void {
    const waiter = this.waiting.shift();
    if (waiter) {
      waiter.resolve(message);
    } else {
      this.inbox.push(message);
    }
  }

  /** Close from the remote side, without going through close() */
  disconnect(): void {
    if (this.closed) return;
    this.closed = true;
    const waiting = this.waiting;
    this.waiting = [];
    for (const waiter of waiting) {
      waiter.reject(new SubscriberClosedError());
    }
  }

  /** Sent messages decoded as UTF-8 */
  sentText(): string[] {
    return this.sent.map((b) => b.toString("utf8"));
  }
}
