/**
 * Standardized error handling utilities.
 * Provides consistent error message extraction and the daemon's error types.
 */

/**
 * Extract a human-readable error message from an unknown error.
 * Handles Error objects, strings, and other thrown values.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return String(error);
}

/**
 * Raised when the PTY cannot be allocated or the command cannot be spawned.
 * Fatal for start(); never retried.
 */
export class PtySpawnError extends Error {
  constructor(
    public readonly commandLine: string,
    cause: unknown
  ) {
    super(`Failed to spawn "${commandLine}": ${getErrorMessage(cause)}`, { cause });
    this.name = "PtySpawnError";
  }
}

/**
 * Raised when an operation is requested on a session that was shut down.
 */
export class SessionClosedError extends Error {
  constructor(operation: string) {
    super(`Cannot ${operation}: terminal session has been shut down`);
    this.name = "SessionClosedError";
  }
}

/** Raised by receive() once a subscriber stream has closed. */
export class SubscriberClosedError extends Error {
  constructor() {
    super("Subscriber stream is closed");
    this.name = "SubscriberClosedError";
  }
}
