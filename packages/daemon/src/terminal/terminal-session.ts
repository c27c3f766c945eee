/**
 * Terminal Session - the single shared terminal exposed by the daemon.
 *
 * Composes the scrollback, the process supervisor, the output pump and the
 * subscriber registry into lifecycle operations:
 *
 *   unstarted -> running -> completed
 *        \__________\__________\______-> shutdown
 *
 * The process is created lazily, either by start() or when the first
 * subscriber attaches.
 */

import {
  PTY_COMMAND,
  PTY_DEFAULT_COLS,
  PTY_DEFAULT_ROWS,
  SCROLLBACK_SIZE_BYTES,
} from "../config/index.js";
import { SessionClosedError } from "../utils/errors.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { OutputPump } from "./output-pump.js";
import { ProcessSupervisor } from "./process-supervisor.js";
import { spawnNodePty } from "./pty-process.js";
import { RingBuffer } from "./ring-buffer.js";
import { SubscriberRegistry } from "./subscriber-registry.js";
import type { PtyFactory, SessionState, SessionStatus, Subscriber } from "./types.js";

export interface TerminalSessionOptions {
  /** Shell-interpreted command line (default: TERMRELAY_COMMAND or /bin/bash) */
  commandLine?: string;
  rows?: number;
  cols?: number;
  scrollbackBytes?: number;
  /** PTY spawner; node-pty unless overridden */
  ptyFactory?: PtyFactory;
  logger?: Logger;
  /** Home directory for the child (default: $HOME) */
  home?: string;
  baseEnv?: NodeJS.ProcessEnv;
  killTimeoutMs?: number;
}

export class TerminalSession {
  readonly scrollback: RingBuffer;
  private readonly supervisor: ProcessSupervisor;
  private readonly pump: OutputPump;
  private readonly registry: SubscriberRegistry;
  private readonly logger: Logger;
  private shutDown = false;

  constructor(options: TerminalSessionOptions = {}) {
    this.logger = options.logger ?? createLogger("PTY");
    this.scrollback = new RingBuffer(options.scrollbackBytes ?? SCROLLBACK_SIZE_BYTES);

    this.pump = new OutputPump(
      {
        scrollback: this.scrollback,
        broadcast: (data) => this.registry.broadcast(data),
      },
      this.logger
    );

    this.supervisor = new ProcessSupervisor({
      commandLine: options.commandLine ?? PTY_COMMAND,
      rows: options.rows ?? PTY_DEFAULT_ROWS,
      cols: options.cols ?? PTY_DEFAULT_COLS,
      ptyFactory: options.ptyFactory ?? spawnNodePty,
      pump: this.pump,
      logger: this.logger,
      home: options.home,
      baseEnv: options.baseEnv,
      killTimeoutMs: options.killTimeoutMs,
    });

    this.registry = new SubscriberRegistry(
      this.scrollback,
      {
        isStarted: () => this.supervisor.isStarted(),
        start: () => this.start(),
        writeInput: (data) => this.supervisor.writeInput(data),
      },
      this.logger
    );
  }

  get commandLine(): string {
    return this.supervisor.commandLine;
  }

  get rows(): number {
    return this.supervisor.rows;
  }

  get cols(): number {
    return this.supervisor.cols;
  }

  get subscriberCount(): number {
    return this.registry.size;
  }

  get state(): SessionState {
    if (this.shutDown) return "shutdown";
    if (this.supervisor.isAlive()) return "running";
    if (this.supervisor.isCompleted()) return "completed";
    return "unstarted";
  }

  isStarted(): boolean {
    return this.supervisor.isStarted();
  }

  isAlive(): boolean {
    return this.supervisor.isAlive();
  }

  isCompleted(): boolean {
    return this.supervisor.isCompleted();
  }

  /**
   * Spawn the process if it has not been created yet.
   *
   * @throws SessionClosedError after shutdown()
   * @throws PtySpawnError if the spawn fails
   */
  async start(): Promise<void> {
    if (this.shutDown) {
      throw new SessionClosedError("start");
    }
    this.supervisor.start();
  }

  /**
   * Kill the process, close every subscriber and empty the registry.
   * Safe to call more than once.
   */
  async shutdown(): Promise<void> {
    const first = !this.shutDown;
    this.shutDown = true;

    await this.supervisor.kill();
    this.registry.detachAll();
    this.registry.clear();

    if (first) {
      const stats = this.scrollback.getStats();
      this.logger.info(
        `Session shut down (${stats.totalWritten} bytes of output, ${stats.bytes} in scrollback)`
      );
    }
  }

  /**
   * Resize the terminal. Only takes effect while the process is running.
   */
  async resize(rows: number, cols: number): Promise<void> {
    if (this.shutDown) return;
    this.supervisor.resize(rows, cols);
  }

  /**
   * Attach a subscriber: it is sent the scrollback, then its input is relayed
   * to the process. Attaching the same stream twice has no effect.
   */
  attachSubscriber(subscriber: Subscriber): void {
    if (this.shutDown) {
      this.logger.warn("Subscriber refused: session has been shut down");
      subscriber.close();
      return;
    }
    this.registry.attach(subscriber);
  }

  /**
   * Whether the stream is currently registered.
   */
  hasSubscriber(subscriber: Subscriber): boolean {
    return this.registry.has(subscriber);
  }

  /**
   * Resolves when the subscriber's relay loop has ended.
   */
  whenDetached(subscriber: Subscriber): Promise<void> {
    return this.registry.whenDetached(subscriber);
  }

  /**
   * Resolves once all PTY output received so far has been broadcast.
   */
  flushOutput(): Promise<void> {
    return this.pump.drained();
  }

  /**
   * Status snapshot for the control surface.
   */
  serialize(): SessionStatus {
    const status: SessionStatus = {
      isStarted: this.supervisor.isStarted(),
      isCompleted: this.supervisor.isCompleted(),
      rows: this.supervisor.rows,
      cols: this.supervisor.cols,
      subscribers: this.registry.size,
    };

    const pid = this.supervisor.pid;
    if (pid !== undefined) {
      status.pid = pid;
      const exitCode = this.supervisor.exitCode;
      if (exitCode !== undefined) {
        status.exitCode = exitCode;
      }
    }

    return status;
  }
}
