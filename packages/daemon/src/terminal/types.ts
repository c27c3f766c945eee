/**
 * Type definitions for the terminal session module.
 */

/**
 * A subscriber's duplex message stream, owned by the transport layer.
 * The session only holds a reference; removing it from the registry does not
 * close the underlying connection unless the registry closes it explicitly.
 */
export interface Subscriber {
  /** Whether the stream has closed (or is closing) */
  isClosed(): boolean;
  /** Send one binary message */
  send(data: Buffer): Promise<void>;
  /** Receive the next message; text frames arrive as strings */
  receive(): Promise<Buffer | string>;
  /** Close the stream */
  close(): void;
}

/** Handle returned by event registrations. */
export interface Disposable {
  dispose(): void;
}

/** Exit information reported by the PTY. */
export interface PtyExit {
  exitCode: number;
  signal?: number;
}

/**
 * The slice of a PTY-attached child process the supervisor works with.
 * Implemented over node-pty in production and by a fake in tests.
 */
export interface PtyHandle {
  readonly pid: number;
  onData(listener: (data: Buffer) => void): Disposable;
  onExit(listener: (exit: PtyExit) => void): Disposable;
  /** Apply a new window size to the PTY device */
  resize(cols: number, rows: number): void;
  /** Write to the PTY master */
  write(data: Buffer): void;
  /** Deliver a signal to the child process */
  kill(signal: NodeJS.Signals): void;
  /** Release the master side of the PTY */
  close(): void;
}

/**
 * Options for spawning a PTY process.
 */
export interface PtySpawnOptions {
  /** Executable to run */
  file: string;
  args: string[];
  /** Terminal type name */
  name: string;
  cols: number;
  rows: number;
  cwd: string;
  env: Record<string, string>;
}

export type PtyFactory = (options: PtySpawnOptions) => PtyHandle;

/**
 * Lifecycle state of the terminal session.
 */
export type SessionState = "unstarted" | "running" | "completed" | "shutdown";

/**
 * Serializable status snapshot.
 * `pid` is present once a process exists, `exitCode` once it has exited.
 */
export interface SessionStatus {
  isStarted: boolean;
  isCompleted: boolean;
  pid?: number;
  exitCode?: number;
  rows: number;
  cols: number;
  subscribers: number;
}
