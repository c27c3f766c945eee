/**
 * In-process PTY stand-in for tests.
 *
 * Records every call made by the supervisor in `calls` (in order) so tests can
 * assert on sequences such as resize -> SIGWINCH -> size report.
 */

import type {
  Disposable,
  PtyExit,
  PtyFactory,
  PtyHandle,
  PtySpawnOptions,
} from "../terminal/types.js";

export type FakePtyCall =
  | { op: "resize"; cols: number; rows: number }
  | { op: "write"; data: string }
  | { op: "kill"; signal: NodeJS.Signals }
  | { op: "close" };

export class FakePty implements PtyHandle {
  readonly calls: FakePtyCall[] = [];
  readonly writes: Buffer[] = [];
  cols: number;
  rows: number;
  /** Emit an exit when SIGKILL is delivered */
  exitOnKill = true;
  failResize: Error | null = null;
  failWrite: Error | null = null;
  failClose: Error | null = null;
  /** Thrown by kill() for any signal but SIGKILL */
  failSignal: Error | null = null;

  private dataListeners = new Set<(data: Buffer) => void>();
  private exitListeners = new Set<(exit: PtyExit) => void>();
  private exitInfo: PtyExit | null = null;

  constructor(
    readonly options: PtySpawnOptions,
    readonly pid = 4242
  ) {
    this.cols = options.cols;
    this.rows = options.rows;
  }

  get hasExited(): boolean {
    return this.exitInfo !== null;
  }

  onData(listener: (data: Buffer) => void): Disposable {
    this.dataListeners.add(listener);
    return { dispose: () => this.dataListeners.delete(listener) };
  }

  onExit(listener: (exit: PtyExit) => void): Disposable {
    this.exitListeners.add(listener);
    return { dispose: () => this.exitListeners.delete(listener) };
  }

  resize(cols: number, rows: number): void {
    if (this.failResize) throw this.failResize;
    this.calls.push({ op: "resize", cols, rows });
    this.cols = cols;
    this.rows = rows;
  }

  write(data: Buffer): void {
    if (this.failWrite) throw this.failWrite;
    this.calls.push({ op: "write", data: data.toString("utf8") });
    this.writes.push(Buffer.from(data));
  }

  kill(signal: NodeJS.Signals): void {
    if (this.failSignal && signal !== "SIGKILL") throw this.failSignal;
    this.calls.push({ op: "kill", signal });
    if (signal === "SIGKILL" && this.exitOnKill) {
      this.emitExit(137, 9);
    }
  }

  close(): void {
    this.calls.push({ op: "close" });
    if (this.failClose) throw this.failClose;
  }

  /** Simulate output from the child */
  emitData(data: string | Buffer): void {
    const chunk = typeof data === "string" ? Buffer.from(data, "utf8") : data;
    for (const listener of Array.from(this.dataListeners)) {
      listener(chunk);
    }
  }

  /** Simulate the child exiting */
  emitExit(exitCode: number, signal?: number): void {
    if (this.exitInfo) return;
    this.exitInfo = { exitCode, signal };
    for (const listener of Array.from(this.exitListeners)) {
      listener(this.exitInfo);
    }
  }

  /** Everything written to the master, decoded as UTF-8 */
  writtenText(): string {
    return Buffer.concat(this.writes).toString("utf8");
  }
}

/**
 * PtyFactory that records every spawned FakePty.
 */
export function createFakePtyFactory(): { factory: PtyFactory; spawned: FakePty[] } {
  const spawned: FakePty[] = [];
  const factory: PtyFactory = (options) => {
    const fake = new FakePty(options, 4242 + spawned.length);
    spawned.push(fake);
    return fake;
  };
  return { factory, spawned };
}
