/**
 * PTY (terminal session) configuration.
 */

import { parseNonEmpty, parsePositiveInt } from "./helpers.js";

/** Command line run by the session shell (`/bin/sh -c <command>`) */
export const PTY_COMMAND = parseNonEmpty(process.env.TERMRELAY_COMMAND, "/bin/bash");

/** Default terminal rows */
export const PTY_DEFAULT_ROWS = parsePositiveInt(process.env.TERMRELAY_ROWS, 24);

/** Default terminal columns */
export const PTY_DEFAULT_COLS = parsePositiveInt(process.env.TERMRELAY_COLS, 80);

/** Scrollback kept for late-joining subscribers, in bytes */
export const SCROLLBACK_SIZE_BYTES = parsePositiveInt(process.env.TERMRELAY_SCROLLBACK_BYTES, 4096);

/** TERM value exported to the child process */
export const PTY_TERM_NAME = "xterm-256color";

/** How long kill() waits for the exit to be observed after SIGKILL (ms) */
export const PTY_KILL_TIMEOUT_MS = 2000;
