import type { Config } from "./config.js";
import { Dispatcher } from "./dispatcher.js";
import { createLogger } from "./logging.js";
import type { Logger } from "./logging.js";
import { SessionManager } from "./sessionManager.js";
import type { BrowserLauncher } from "./sessionManager.js";

export { Dispatcher, SERVER_INFO } from "./dispatcher.js";
export type { DispatcherOptions } from "./dispatcher.js";
export { SessionManager } from "./sessionManager.js";
export type {
  BrowserHandle,
  BrowserLauncher,
  PageProvider,
  SessionPage,
} from "./sessionManager.js";
export { resolveConfig } from "./config.js";
export type { CLIOptions, Config } from "./config.js";
export { createLogger } from "./logging.js";
export type { Logger, LogLevel } from "./logging.js";
export * from "./errors.js";
export * from "./protocol.js";
export { TOOLS } from "./tools/index.js";
export type { Tool, ToolOutput, ToolPage } from "./tools/tool.js";
export { eventStream, formatSseEvent } from "./sse.js";
export type { StreamEvent } from "./sse.js";
export {
  createRequestListener,
  serverUrl,
  startHttpTransport,
} from "./transport.js";

export type BrowserServer = {
  dispatcher: Dispatcher;
  sessions: SessionManager;
  logger: Logger;
};

/**
 * Wires one session manager into one dispatcher. The session launches its
 * browser on the first tool call, not here.
 */
export function createBrowserServer(
  config: Config,
  options: { launcher?: BrowserLauncher; logger?: Logger } = {},
): BrowserServer {
  const logger =
    options.logger ?? createLogger("mcp-browser", { level: config.logLevel });
  const sessions = new SessionManager(config.browser, {
    launcher: options.launcher,
    logger: logger.child("SessionManager"),
  });
  const dispatcher = new Dispatcher({
    sessions,
    logger: logger.child("Dispatcher"),
  });
  return { dispatcher, sessions, logger };
}
