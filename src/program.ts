#!/usr/bin/env node
import dotenv from "dotenv";
dotenv.config();

import { program } from "commander";
import * as fs from "fs";
import * as path from "path";
import { fileURLToPath } from "url";
import type { Server } from "node:http";
import { z } from "zod";

import { resolveConfig } from "./config.js";
import type { CLIOptions } from "./config.js";
import { errorMessage } from "./errors.js";
import { createBrowserServer } from "./index.js";
import type { BrowserServer } from "./index.js";
import { RPC_PATH, serverUrl, startHttpTransport } from "./transport.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const PackageJsonSchema = z.object({ name: z.string(), version: z.string() });

// Load package.json using fs
const packageJSONPath = path.resolve(__dirname, "../package.json");
const packageJSON = PackageJsonSchema.parse(
  JSON.parse(fs.readFileSync(packageJSONPath, "utf8")),
);

program
  .version("Version " + packageJSON.version)
  .name(packageJSON.name)
  .option("--host <host>", "Host to bind to. Default is 127.0.0.1. Use 0.0.0.0 to bind to all interfaces.")
  .option("--port <port>", "Port to listen on. Default is 3333.")
  .option("--headed", "Show the browser window instead of running headless.")
  .option("--channel <channel>", "Installed browser channel to use, e.g. chrome or msedge.")
  .option("--executablePath <path>", "Path to the Chromium executable to launch.")
  .option("--timeout <ms>", "Default timeout for navigation and element actions.")
  .option("--heartbeatInterval <ms>", "Interval between event-stream heartbeats. Default is 10000.")
  .option("--logLevel <level>", "debug, info, warn or error. Default is info.")
  .action(async (options: CLIOptions) => {
    const config = resolveConfig(options);
    const server = createBrowserServer(config);
    const httpServer = await startHttpTransport(server.dispatcher, config.server, {
      heartbeatIntervalMs: config.heartbeatIntervalMs,
      logger: server.logger.child("HttpTransport"),
    });
    setupExitWatchdog(server, httpServer);

    const url = serverUrl(httpServer);
    const message = [
      `Listening on ${url}`,
      "Put this in your client config:",
      JSON.stringify(
        { mcpServers: { browser: { url: `${url}${RPC_PATH}` } } },
        undefined,
        2,
      ),
    ].join("\n");
    console.log(message);
  });

function setupExitWatchdog(server: BrowserServer, httpServer: Server) {
  let exiting = false;
  const handleExit = async () => {
    if (exiting) return;
    exiting = true;
    setTimeout(() => process.exit(0), 15000).unref();
    httpServer.closeAllConnections();
    httpServer.close();
    await server.sessions.shutdown();
    process.exit(0);
  };

  const onExit = () => {
    handleExit().catch((error: unknown) => {
      server.logger.error(`Shutdown failed: ${errorMessage(error)}`);
      process.exit(1);
    });
  };
  process.on("SIGINT", onExit);
  process.on("SIGTERM", onExit);
}

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exit(1);
});
