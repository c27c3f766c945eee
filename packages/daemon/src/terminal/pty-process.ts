/**
 * node-pty backed implementation of PtyHandle.
 */

import * as pty from "node-pty";
import type { Disposable, PtyExit, PtyHandle, PtySpawnOptions } from "./types.js";

/** Shell used to interpret the session command line */
export const SESSION_SHELL = "/bin/sh";

/**
 * Script run by SESSION_SHELL before the command line (passed as $0).
 * node-pty allocates the slave device inside spawn, so its path is only
 * known to the child: export it as SSH_TTY, then exec the command.
 */
export const SSH_TTY_PRELUDE = 'SSH_TTY="$(tty)"; export SSH_TTY; exec /bin/sh -c "$0"';

/**
 * Build the argv that runs `commandLine` shell-interpreted with SSH_TTY set.
 */
export function buildShellArgs(commandLine: string): string[] {
  return ["-c", SSH_TTY_PRELUDE, commandLine];
}

class NodePtyHandle implements PtyHandle {
  private readonly dataListeners = new Set<(data: Buffer) => void>();
  private readonly forwarder: pty.IDisposable;
  private exited = false;

  constructor(private readonly proc: pty.IPty) {
    proc.onExit(() => {
      this.exited = true;
    });
    // With `encoding: null` node-pty emits Buffers, despite the string typing
    this.forwarder = proc.onData((data: string | Buffer) => {
      const chunk = typeof data === "string" ? Buffer.from(data, "utf8") : data;
      for (const listener of this.dataListeners) {
        listener(chunk);
      }
    });
  }

  get pid(): number {
    return this.proc.pid;
  }

  onData(listener: (data: Buffer) => void): Disposable {
    this.dataListeners.add(listener);
    return { dispose: () => this.dataListeners.delete(listener) };
  }

  onExit(listener: (exit: PtyExit) => void): Disposable {
    return this.proc.onExit(({ exitCode, signal }) => {
      listener({ exitCode, signal });
    });
  }

  resize(cols: number, rows: number): void {
    this.proc.resize(cols, rows);
  }

  write(data: Buffer): void {
    // Bytes go to the master untouched; input need not be valid UTF-8
    this.proc.write(data);
  }

  kill(signal: NodeJS.Signals): void {
    this.proc.kill(signal);
  }

  close(): void {
    this.forwarder.dispose();
    this.dataListeners.clear();
    if (!this.exited) {
      // Same effect as the master closing under a live session
      this.proc.kill("SIGHUP");
    }
  }
}

/**
 * Spawn a process attached to a fresh PTY.
 */
export function spawnNodePty(options: PtySpawnOptions): PtyHandle {
  const proc = pty.spawn(options.file, options.args, {
    name: options.name,
    cols: options.cols,
    rows: options.rows,
    cwd: options.cwd,
    env: options.env,
    encoding: null,
  });
  return new NodePtyHandle(proc);
}
