/**
 * Adapts a `ws` WebSocket connection to the session's Subscriber interface.
 *
 * Incoming frames are queued until receive() asks for them. Binary frames
 * arrive as Buffers, text frames as strings. Once the socket closes, pending
 * and future receive() calls reject with SubscriberClosedError.
 */

import { WebSocket, type RawData } from "ws";
import { SubscriberClosedError } from "../utils/errors.js";
import type { Subscriber } from "../terminal/types.js";

interface PendingReceive {
  resolve: (message: Buffer | string) => void;
  reject: (error: Error) => void;
}

/**
 * Normalize the shapes `ws` may hand us into one Buffer.
 */
export function rawDataToBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

export class WsSubscriber implements Subscriber {
  private inbox: Array<Buffer | string> = [];
  private waiting: PendingReceive[] = [];
  private closed = false;

  constructor(private readonly ws: WebSocket) {
    ws.on("message", (data: RawData, isBinary: boolean) => {
      const buffer = rawDataToBuffer(data);
      this.deliver(isBinary ? buffer : buffer.toString("utf8"));
    });
    ws.on("close", () => this.markClosed());
    ws.on("error", () => this.markClosed());
  }

  isClosed(): boolean {
    return (
      this.closed ||
      this.ws.readyState === WebSocket.CLOSING ||
      this.ws.readyState === WebSocket.CLOSED
    );
  }

  send(data: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      this.ws.send(data, { binary: true }, (err) => {
        if (err) {
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  receive(): Promise<Buffer | string> {
    const next = this.inbox.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.isClosed()) {
      return Promise.reject(new SubscriberClosedError());
    }
    return new Promise((resolve, reject) => {
      this.waiting.push({ resolve, reject });
    });
  }

  close(): void {
    this.ws.close(1000, "Terminal session closed");
    this.markClosed();
  }

  private deliver(message: Buffer | string): void {
    const waiter = this.waiting.shift();
    if (waiter) {
      waiter.resolve(message);
    } else {
      this.inbox.push(message);
    }
  }

  private markClosed(): void {
    if (this.closed) return;
    this.closed = true;
    const waiting = this.waiting;
    this.waiting = [];
    for (const waiter of waiting) {
      waiter.reject(new SubscriberClosedError());
    }
  }
}
