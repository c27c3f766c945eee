/**
 * Terminal control routes.
 *
 * Endpoints:
 * - GET /terminal - Session status
 * - POST /terminal/start - Spawn the process if needed
 * - POST /terminal/resize - Resize the PTY
 * - POST /terminal/shutdown - Kill the process and close subscribers
 */

import { Hono } from "hono";
import { z } from "zod";
import type { RouterDependencies } from "../types.js";
import { SessionClosedError, getErrorMessage } from "../../utils/errors.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("API");

const ResizeRequestSchema = z.object({
  rows: z.number().int().positive().max(0xffff),
  cols: z.number().int().positive().max(0xffff),
});

/**
 * Create terminal control routes.
 */
export function createTerminalRoutes(deps: RouterDependencies): Hono {
  const { session } = deps;
  const router = new Hono();

  router.get("/terminal", (c) => c.json(session.serialize()));

  router.post("/terminal/start", async (c) => {
    try {
      await session.start();
      return c.json(session.serialize());
    } catch (error) {
      if (error instanceof SessionClosedError) {
        return c.json({ error: error.message }, 409);
      }
      logger.error("Start failed", error);
      return c.json({ error: getErrorMessage(error) }, 500);
    }
  });

  router.post("/terminal/resize", async (c) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ error: "Invalid JSON body" }, 400);
    }

    const parsed = ResizeRequestSchema.safeParse(body);
    if (!parsed.success) {
      return c.json({ error: `Invalid request: ${parsed.error.message}` }, 400);
    }

    const { rows, cols } = parsed.data;
    await session.resize(rows, cols);
    return c.json({ ...session.serialize(), applied: session.rows === rows && session.cols === cols });
  });

  router.post("/terminal/shutdown", async (c) => {
    await session.shutdown();
    return c.json(session.serialize());
  });

  return router;
}
