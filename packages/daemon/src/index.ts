/**
 * Public entry for embedding the terminal relay.
 */

export * from "./terminal/index.js";
export { WsSubscriber, rawDataToBuffer } from "./transport/ws-subscriber.js";
export {
  createTerminalWsServer,
  closeTerminalWsServer,
  createConnectionHandler,
} from "./transport/ws-server.js";
export type { TerminalWsServerOptions } from "./transport/ws-server.js";
export { createApiRouter } from "./api/router.js";
export type { RouterDependencies } from "./api/types.js";
export { createLogger, silentLogger } from "./utils/logger.js";
export type { Logger } from "./utils/logger.js";
export { PtySpawnError, SessionClosedError, SubscriberClosedError } from "./utils/errors.js";
