/**
 * Hono API router for the terminal control surface.
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import type { RouterDependencies } from "./types.js";
import { createTerminalRoutes } from "./routes/terminal.js";
import { logSilentError } from "../utils/logger.js";

/**
 * Create the API router with all terminal control endpoints.
 */
export function createApiRouter(deps: RouterDependencies): Hono {
  const api = new Hono();

  // Enable CORS for local UIs (any localhost port)
  api.use(
    "*",
    cors({
      origin: (origin) => {
        if (!origin) return origin;
        try {
          const url = new URL(origin);
          if (url.hostname === "localhost" || url.hostname === "127.0.0.1") {
            return origin;
          }
          return null;
        } catch (error) {
          logSilentError(`cors: unparseable origin ${origin}`, error);
          return null;
        }
      },
    })
  );

  api.get("/health", (c) => c.json({ ok: true, state: deps.session.state }));

  api.route("/", createTerminalRoutes(deps));

  return api;
}
