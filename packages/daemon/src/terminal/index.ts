/**
 * Terminal module - the shared PTY session.
 *
 * Provides:
 * - TerminalSession: lifecycle facade (start, shutdown, resize, attach, serialize)
 * - RingBuffer: scrollback store
 * - Types: Subscriber, PtyHandle, SessionStatus
 */

export { TerminalSession } from "./terminal-session.js";
export type { TerminalSessionOptions } from "./terminal-session.js";
export { RingBuffer } from "./ring-buffer.js";
export { ProcessSupervisor, buildTerminalEnv, resizeSequence } from "./process-supervisor.js";
export { OutputPump } from "./output-pump.js";
export { SubscriberRegistry } from "./subscriber-registry.js";
export { spawnNodePty, buildShellArgs } from "./pty-process.js";
export type {
  Subscriber,
  PtyHandle,
  PtyExit,
  PtyFactory,
  PtySpawnOptions,
  SessionState,
  SessionStatus,
  Disposable,
} from "./types.js";
