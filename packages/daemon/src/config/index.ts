/**
 * Centralized configuration for the daemon.
 * All tunable constants and environment variables are defined here.
 *
 * This module re-exports from domain-specific config files:
 * - pty.ts: terminal session defaults
 * - server.ts: listeners and shutdown timing
 */

// Helpers (also exported for use by other modules)
export { parsePositiveInt, parseNonEmpty } from "./helpers.js";

// PTY
export {
  PTY_COMMAND,
  PTY_DEFAULT_ROWS,
  PTY_DEFAULT_COLS,
  SCROLLBACK_SIZE_BYTES,
  PTY_TERM_NAME,
  PTY_KILL_TIMEOUT_MS,
} from "./pty.js";

// Server lifecycle
export {
  WS_HOST,
  WS_PORT,
  API_PORT,
  API_PREFIX,
  SHUTDOWN_TIMEOUT_MS,
  getWsUrl,
} from "./server.js";
