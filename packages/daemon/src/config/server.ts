/**
 * Network listeners and daemon lifecycle configuration.
 */

import { parsePositiveInt } from "./helpers.js";

/** Host for the terminal WebSocket server and the control API */
export const WS_HOST = process.env.TERMRELAY_WS_HOST ?? "127.0.0.1";

/** Port for the terminal WebSocket server */
export const WS_PORT = parsePositiveInt(process.env.TERMRELAY_WS_PORT, 4460);

/** Port for the HTTP control API */
export const API_PORT = parsePositiveInt(process.env.TERMRELAY_API_PORT, 4461);

/** Route prefix for the HTTP control API */
export const API_PREFIX = "/api";

/** Maximum time to wait for graceful shutdown (ms) */
export const SHUTDOWN_TIMEOUT_MS = 5000;

/** Construct the terminal WebSocket URL */
export function getWsUrl(host = WS_HOST, port = WS_PORT): string {
  return `ws://${host}:${port}`;
}
