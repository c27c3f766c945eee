/**
 * Type definitions for the API router.
 */

import type { TerminalSession } from "../terminal/index.js";

export interface RouterDependencies {
  /** The daemon's single terminal session */
  session: TerminalSession;
}
