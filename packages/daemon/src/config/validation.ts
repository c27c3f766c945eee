/**
 * Configuration validation - checks resolved settings on startup.
 * Fails fast with clear error messages rather than silent runtime failures.
 */

import { z } from "zod";
import {
  PTY_COMMAND,
  PTY_DEFAULT_ROWS,
  PTY_DEFAULT_COLS,
  SCROLLBACK_SIZE_BYTES,
} from "./pty.js";
import { WS_HOST, WS_PORT, API_PORT } from "./server.js";

export interface ConfigError {
  field: string;
  message: string;
}

const PortSchema = z.number().int().min(1).max(65535);

export const ConfigSchema = z
  .object({
    PTY_COMMAND: z.string().min(1),
    PTY_DEFAULT_ROWS: z.number().int().positive().max(0xffff),
    PTY_DEFAULT_COLS: z.number().int().positive().max(0xffff),
    SCROLLBACK_SIZE_BYTES: z.number().int().positive(),
    WS_HOST: z.string().min(1),
    WS_PORT: PortSchema,
    API_PORT: PortSchema,
  })
  .refine((config) => config.WS_PORT !== config.API_PORT, {
    message: "WebSocket and API ports must differ",
    path: ["API_PORT"],
  });

export type DaemonConfig = z.infer<typeof ConfigSchema>;

/**
 * Snapshot of the resolved configuration values.
 */
export function currentConfig(): DaemonConfig {
  return {
    PTY_COMMAND,
    PTY_DEFAULT_ROWS,
    PTY_DEFAULT_COLS,
    SCROLLBACK_SIZE_BYTES,
    WS_HOST,
    WS_PORT,
    API_PORT,
  };
}

/**
 * Validate configuration.
 * @returns Array of configuration errors (empty if valid)
 */
export function validateConfig(config: DaemonConfig = currentConfig()): ConfigError[] {
  const result = ConfigSchema.safeParse(config);
  if (result.success) {
    return [];
  }
  return result.error.issues.map((issue) => ({
    field: issue.path.join(".") || "config",
    message: issue.message,
  }));
}

/**
 * Validate configuration or throw with detailed error message.
 * Call this early in startup to fail fast.
 */
export function validateConfigOrThrow(config: DaemonConfig = currentConfig()): void {
  const errors = validateConfig(config);
  if (errors.length > 0) {
    const messages = errors.map((e) => `  - ${e.field}: ${e.message}`).join("\n");
    throw new Error(`Configuration validation failed:\n${messages}`);
  }
}

/**
 * Log configuration summary for debugging.
 */
export function logConfigSummary(config: DaemonConfig = currentConfig()): void {
  console.log("[CONFIG] Terminal session:");
  console.log(`  - command: ${config.PTY_COMMAND}`);
  console.log(`  - size: ${config.PTY_DEFAULT_ROWS}x${config.PTY_DEFAULT_COLS}`);
  console.log(`  - scrollback: ${config.SCROLLBACK_SIZE_BYTES} bytes`);
  console.log(`  - listeners: ws=${config.WS_HOST}:${config.WS_PORT} api=${config.WS_HOST}:${config.API_PORT}`);
}
