/**
 * WebSocket server for terminal I/O.
 *
 * Handles:
 * - WebSocket upgrade at /terminal (or /)
 * - Wrapping each connection as a session subscriber
 *
 * Binary frames from the session carry raw PTY output; frames from clients are
 * written to the PTY verbatim (text frames as UTF-8).
 */

import { WebSocketServer, WebSocket } from "ws";
import type { IncomingMessage } from "node:http";
import { WS_HOST, WS_PORT } from "../config/index.js";
import type { TerminalSession } from "../terminal/index.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { WsSubscriber } from "./ws-subscriber.js";

/** Paths accepted for terminal connections */
export const TERMINAL_WS_PATHS = ["/", "/terminal"];

export interface TerminalWsServerOptions {
  /** The shared terminal session */
  session: TerminalSession;
  /** Host to bind to (default: 127.0.0.1) */
  host?: string;
  /** Port to listen on (default: 4460) */
  port?: number;
  logger?: Logger;
}

/**
 * Build the `connection` handler that attaches sockets to the session.
 */
export function createConnectionHandler(
  session: TerminalSession,
  logger: Logger
): (ws: WebSocket, req: IncomingMessage) => void {
  return (ws, req) => {
    const url = new URL(req.url || "/", `http://${req.headers.host ?? "localhost"}`);

    if (!TERMINAL_WS_PATHS.includes(url.pathname)) {
      ws.close(4000, "Invalid path");
      return;
    }

    const subscriber = new WsSubscriber(ws);
    session.attachSubscriber(subscriber);
    logger.info(`Client connected from ${req.socket.remoteAddress ?? "unknown"}`);

    ws.on("close", () => {
      logger.debug("Client disconnected");
    });
  };
}

/**
 * Create and start the terminal WebSocket server.
 */
export function createTerminalWsServer(options: TerminalWsServerOptions): WebSocketServer {
  const { session, host = WS_HOST, port = WS_PORT } = options;
  const logger = options.logger ?? createLogger("WS");

  const wss = new WebSocketServer({
    host,
    port,
    // Note: Don't use `path` option as it only matches exact paths.
    // We handle path validation in the connection handler instead.
  });

  wss.on("connection", createConnectionHandler(session, logger));
  wss.on("listening", () => {
    logger.info(`Listening on ws://${host}:${port}`);
  });

  return wss;
}

/**
 * Close the WebSocket server gracefully.
 */
export function closeTerminalWsServer(wss: WebSocketServer): Promise<void> {
  return new Promise((resolve, reject) => {
    // Close all client connections
    for (const client of wss.clients) {
      client.close(1001, "Server shutting down");
    }

    wss.close((err) => {
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}
