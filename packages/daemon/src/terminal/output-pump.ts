/**
 * Output Pump - drains PTY output into the scrollback and the fan-out.
 *
 * Chunks go through a single-worker queue, so each one is appended and
 * broadcast before the next is touched: subscribers see output in the order
 * the PTY produced it.
 */

import fastq from "fastq";
import type { queueAsPromised } from "fastq";
import { setImmediate as yieldToLoop } from "node:timers/promises";
import type { Logger } from "../utils/logger.js";
import type { RingBuffer } from "./ring-buffer.js";
import type { Disposable, PtyHandle } from "./types.js";

export interface OutputSink {
  scrollback: RingBuffer;
  broadcast: (data: Buffer) => Promise<void>;
}

export class OutputPump {
  private readonly queue: queueAsPromised<Buffer>;
  private subscriptions: Disposable[] = [];
  private running = false;

  constructor(
    private readonly sink: OutputSink,
    private readonly logger: Logger
  ) {
    this.queue = fastq.promise((chunk: Buffer) => this.deliver(chunk), 1);
  }

  /**
   * Start draining a PTY. The pump detaches by itself when the process exits;
   * chunks already queued are still delivered.
   */
  start(pty: PtyHandle): void {
    if (this.running) return;
    this.running = true;

    this.subscriptions = [
      pty.onData((data) => {
        if (data.length === 0) return;
        this.queue.push(data).catch((error: unknown) => {
          this.logger.error("Output chunk dropped", error);
        });
      }),
      pty.onExit(() => this.detach()),
    ];
  }

  /**
   * Stop draining immediately, discarding queued chunks.
   */
  stop(): void {
    this.detach();
    this.queue.kill();
  }

  /**
   * Resolve once every queued chunk has been delivered.
   */
  drained(): Promise<void> {
    return this.queue.idle() ? Promise.resolve() : this.queue.drained();
  }

  private detach(): void {
    for (const subscription of this.subscriptions) {
      subscription.dispose();
    }
    this.subscriptions = [];
    this.running = false;
  }

  private async deliver(chunk: Buffer): Promise<void> {
    try {
      this.sink.scrollback.append(chunk);
      await this.sink.broadcast(chunk);
    } catch (error) {
      this.logger.error("Failed to deliver PTY output", error);
    }
    await yieldToLoop();
  }
}
