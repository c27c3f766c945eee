/**
 * Process Supervisor - owns the PTY and the child process attached to it.
 *
 * Responsibilities:
 * - Spawn the session command on a PTY with the terminal environment
 * - Resize (device, SIGWINCH, then the xterm size report)
 * - Forward input to the PTY master
 * - Kill and release the PTY
 */

import os from "node:os";
import { PTY_KILL_TIMEOUT_MS, PTY_TERM_NAME } from "../config/index.js";
import { PtySpawnError, getErrorMessage } from "../utils/errors.js";
import type { Logger } from "../utils/logger.js";
import { TimeoutError, withTimeout } from "../utils/timeout.js";
import type { OutputPump } from "./output-pump.js";
import { SESSION_SHELL, buildShellArgs } from "./pty-process.js";
import type { PtyExit, PtyFactory, PtyHandle } from "./types.js";

export interface ProcessSupervisorOptions {
  commandLine: string;
  rows: number;
  cols: number;
  ptyFactory: PtyFactory;
  pump: OutputPump;
  logger: Logger;
  /** Home directory used for the working directory and PWD */
  home?: string;
  /** Environment the child inherits (defaults to process.env) */
  baseEnv?: NodeJS.ProcessEnv;
  killTimeoutMs?: number;
}

/**
 * xterm "resize text area" sequence: CSI 8 ; rows ; cols t
 */
export function resizeSequence(rows: number, cols: number): Buffer {
  return Buffer.from(`\x1b[8;${rows};${cols}t`, "latin1");
}

/**
 * Child environment: the parent's, with the terminal variables overridden.
 * SSH_TTY is filled in by the shell prelude once the slave device exists.
 */
export function buildTerminalEnv(
  baseEnv: NodeJS.ProcessEnv,
  home: string,
  rows: number,
  cols: number
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(baseEnv)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }
  delete env.SSH_TTY;

  env.TERM = PTY_TERM_NAME;
  env.PWD = home;
  env.LINES = String(rows);
  env.COLUMNS = String(cols);
  return env;
}

export class ProcessSupervisor {
  readonly commandLine: string;
  private _rows: number;
  private _cols: number;

  private pty: PtyHandle | null = null;
  private _pid: number | undefined;
  private _exitCode: number | undefined;
  private exited: Promise<PtyExit> | null = null;
  private released = false;

  private readonly ptyFactory: PtyFactory;
  private readonly pump: OutputPump;
  private readonly logger: Logger;
  private readonly home: string;
  private readonly baseEnv: NodeJS.ProcessEnv;
  private readonly killTimeoutMs: number;

  constructor(options: ProcessSupervisorOptions) {
    this.commandLine = options.commandLine;
    this._rows = options.rows;
    this._cols = options.cols;
    this.ptyFactory = options.ptyFactory;
    this.pump = options.pump;
    this.logger = options.logger;
    this.baseEnv = options.baseEnv ?? process.env;
    this.home = options.home ?? this.baseEnv.HOME ?? os.homedir();
    this.killTimeoutMs = options.killTimeoutMs ?? PTY_KILL_TIMEOUT_MS;
  }

  get rows(): number {
    return this._rows;
  }

  get cols(): number {
    return this._cols;
  }

  get pid(): number | undefined {
    return this._pid;
  }

  get exitCode(): number | undefined {
    return this._exitCode;
  }

  /** A process has been created at some point */
  isStarted(): boolean {
    return this._pid !== undefined;
  }

  /** Started and no exit recorded yet */
  isAlive(): boolean {
    return this.isStarted() && this._exitCode === undefined;
  }

  /** Started and exited */
  isCompleted(): boolean {
    return this.isStarted() && !this.isAlive();
  }

  /**
   * Spawn the command on a new PTY and start pumping its output.
   * A no-op once a process has been created.
   *
   * @throws PtySpawnError if the PTY cannot be allocated or the spawn fails
   */
  start(): void {
    if (this.isStarted()) {
      this.logger.debug(`start ignored, process ${this._pid} already created`);
      return;
    }

    let handle: PtyHandle;
    try {
      handle = this.ptyFactory({
        file: SESSION_SHELL,
        args: buildShellArgs(this.commandLine),
        name: PTY_TERM_NAME,
        cols: this._cols,
        rows: this._rows,
        cwd: this.home,
        env: buildTerminalEnv(this.baseEnv, this.home, this._rows, this._cols),
      });
    } catch (error) {
      throw new PtySpawnError(this.commandLine, error);
    }

    this.pty = handle;
    this._pid = handle.pid;
    this.exited = new Promise<PtyExit>((resolve) => {
      handle.onExit((exit) => {
        this._exitCode = exit.exitCode;
        this.logger.info(
          `Process ${handle.pid} exited (code=${exit.exitCode}${exit.signal ? `, signal=${exit.signal}` : ""})`
        );
        resolve(exit);
      });
    });
    this.pump.start(handle);

    this.logger.info(`Started "${this.commandLine}" (pid=${handle.pid}, ${this._rows}x${this._cols})`);
  }

  /**
   * Change the window size. Ignored unless the process is alive.
   * A failing device resize is logged and skips the signal and size report;
   * the later two steps are attempted independently.
   */
  resize(rows: number, cols: number): void {
    const handle = this.pty;
    if (!handle || !this.isAlive()) return;

    try {
      handle.resize(cols, rows);
    } catch (error) {
      this.logger.error(`Failed to resize PTY to ${rows}x${cols}`, error);
      return;
    }
    this._rows = rows;
    this._cols = cols;

    try {
      handle.kill("SIGWINCH");
    } catch (error) {
      this.logger.warn(`SIGWINCH to process ${handle.pid} failed: ${getErrorMessage(error)}`);
    }

    try {
      handle.write(resizeSequence(rows, cols));
    } catch (error) {
      this.logger.warn(`Size report write failed: ${getErrorMessage(error)}`);
    }
  }

  /**
   * Write input bytes to the PTY master.
   * Errors are left to the caller; they are never fatal to the session.
   */
  writeInput(data: Buffer): void {
    if (!this.pty || this.released) {
      throw new Error("PTY is not open");
    }
    this.pty.write(data);
  }

  /**
   * Kill the process if it is still alive, then release the PTY.
   * Safe to call repeatedly.
   */
  async kill(): Promise<void> {
    const handle = this.pty;
    if (!handle) return;

    if (this.isAlive()) {
      try {
        handle.kill("SIGKILL");
        if (this.exited) {
          await withTimeout(this.exited, this.killTimeoutMs, `Process ${handle.pid} did not exit`);
        }
      } catch (error) {
        if (error instanceof TimeoutError) {
          this.logger.warn(error.message);
        } else {
          this.logger.error(`Failed to kill process ${handle.pid}`, error);
        }
      }
    }

    if (this.released) return;
    this.released = true;
    this.pump.stop();
    try {
      handle.close();
    } catch (error) {
      this.logger.error("Failed to release PTY", error);
    }
  }
}
