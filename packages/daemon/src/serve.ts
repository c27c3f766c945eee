#!/usr/bin/env node
/**
 * termrelay daemon
 *
 * Owns one shared terminal session and exposes it through:
 * - a WebSocket server: each connection becomes a subscriber
 * - a REST API: start / resize / shutdown / status
 */

import "./load-env.js";

import { serve } from "@hono/node-server";
import { Hono } from "hono";
import {
  API_PORT,
  API_PREFIX,
  SHUTDOWN_TIMEOUT_MS,
  WS_HOST,
  WS_PORT,
  getWsUrl,
} from "./config/index.js";
import { logConfigSummary, validateConfigOrThrow } from "./config/validation.js";
import { createApiRouter } from "./api/router.js";
import { TerminalSession } from "./terminal/index.js";
import { closeTerminalWsServer, createTerminalWsServer } from "./transport/ws-server.js";
import { colors, paint } from "./utils/colors.js";
import { getErrorMessage } from "./utils/errors.js";
import { withTimeout } from "./utils/timeout.js";

async function main(): Promise<void> {
  // Global error handlers to prevent silent crashes
  process.on("unhandledRejection", (reason) => {
    console.error(`${paint("red", "[FATAL]")} Unhandled Rejection:`, reason);
    // Don't exit - log and continue to keep daemon running
  });

  process.on("uncaughtException", (error) => {
    console.error(`${paint("red", "[FATAL]")} Uncaught Exception:`, error);
    process.exit(1);
  });

  validateConfigOrThrow();

  console.log(`${colors.bold}termrelay${colors.reset}`);
  logConfigSummary();
  console.log();

  // One session for the life of the daemon, handed to both surfaces
  const session = new TerminalSession();

  const wss = createTerminalWsServer({ session, host: WS_HOST, port: WS_PORT });

  const app = new Hono();
  app.route(API_PREFIX, createApiRouter({ session }));

  const apiServer = serve({
    fetch: app.fetch,
    port: API_PORT,
    hostname: WS_HOST,
  });

  console.log(`Terminal: ${paint("cyan", getWsUrl())}`);
  console.log(`API server: ${paint("cyan", `http://${WS_HOST}:${API_PORT}${API_PREFIX}`)}`);

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log();
    console.log(`${colors.dim}Received ${signal}, shutting down...${colors.reset}`);

    try {
      await withTimeout(
        (async () => {
          await session.shutdown();
          await closeTerminalWsServer(wss);
          apiServer.close();
        })(),
        SHUTDOWN_TIMEOUT_MS,
        "Shutdown"
      );
      process.exit(0);
    } catch (error) {
      console.error(`${paint("yellow", "[WARN]")} ${getErrorMessage(error)}, forcing exit`);
      process.exit(1);
    }
  };

  process.on("SIGINT", (signal) => void shutdown(signal));
  process.on("SIGTERM", (signal) => void shutdown(signal));

  console.log();
  console.log(`${paint("green", "✓")} Ready - process starts on first connection`);
  console.log(`${colors.dim}Press Ctrl+C to exit${colors.reset}`);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
