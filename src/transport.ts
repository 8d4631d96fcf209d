import http from "node:http";
import assert from "node:assert";
import type { AddressInfo } from "node:net";

import type { Dispatcher } from "./dispatcher.js";
import { errorMessage } from "./errors.js";
import { createLogger } from "./logging.js";
import type { Logger } from "./logging.js";
import { eventStream, formatSseEvent } from "./sse.js";

export const RPC_PATH = "/";

export type HttpTransportOptions = {
  heartbeatIntervalMs: number;
  logger?: Logger;
};

const SSE_HEADERS = {
  "Content-Type": "text/event-stream",
  "Cache-Control": "no-cache",
  Connection: "keep-alive",
  "X-Accel-Buffering": "no",
};

const ALLOWED_METHODS = "GET, POST, OPTIONS";

// Open to every origin. With credentials allowed the origin has to be
// reflected, browsers reject a literal "*" alongside credentials.
function applyCors(req: http.IncomingMessage, res: http.ServerResponse) {
  res.setHeader("Access-Control-Allow-Origin", req.headers.origin ?? "*");
  res.setHeader("Access-Control-Allow-Credentials", "true");
  res.setHeader("Vary", "Origin");
}

function handlePreflight(req: http.IncomingMessage, res: http.ServerResponse) {
  const requestedHeaders = req.headers["access-control-request-headers"];
  res.setHeader("Access-Control-Allow-Methods", ALLOWED_METHODS);
  res.setHeader("Access-Control-Allow-Headers", requestedHeaders ?? "*");
  res.setHeader("Access-Control-Max-Age", "600");
  res.statusCode = 204;
  res.end();
}

async function readBody(req: http.IncomingMessage): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

function writeJson(res: http.ServerResponse, statusCode: number, body: unknown) {
  res.writeHead(statusCode, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

async function handleRpc(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  dispatcher: Dispatcher,
) {
  const body = await readBody(req);
  const response = await dispatcher.handle(body);
  writeJson(res, 200, response);
}

async function handleEventStream(
  res: http.ServerResponse,
  options: HttpTransportOptions,
  logger: Logger,
) {
  const controller = new AbortController();
  res.on("close", () => controller.abort());
  res.writeHead(200, SSE_HEADERS);
  logger.debug("Event stream opened");

  try {
    for await (const event of eventStream({
      intervalMs: options.heartbeatIntervalMs,
      signal: controller.signal,
    })) {
      if (controller.signal.aborted) break;
      res.write(formatSseEvent(event));
    }
  } finally {
    logger.debug("Event stream closed");
    res.end();
  }
}

export function createRequestListener(
  dispatcher: Dispatcher,
  options: HttpTransportOptions,
): http.RequestListener {
  const logger = options.logger ?? createLogger("HttpTransport");

  const route = async (req: http.IncomingMessage, res: http.ServerResponse) => {
    applyCors(req, res);
    const url = new URL(req.url ?? RPC_PATH, "http://localhost");
    if (url.pathname !== RPC_PATH) {
      res.writeHead(404, { "Content-Type": "text/plain" });
      res.end("Not Found");
      return;
    }

    switch (req.method) {
      case "POST":
        return handleRpc(req, res, dispatcher);
      case "GET":
        return handleEventStream(res, options, logger);
      case "OPTIONS":
        return handlePreflight(req, res);
      default:
        res.writeHead(405, { Allow: ALLOWED_METHODS, "Content-Type": "text/plain" });
        res.end("Method Not Allowed");
    }
  };

  return (req, res) => {
    route(req, res).catch((error: unknown) => {
      logger.error(`${req.method} ${req.url} failed: ${errorMessage(error)}`);
      if (!res.headersSent) {
        writeJson(res, 500, { error: errorMessage(error) });
      } else {
        res.end();
      }
    });
  };
}

export function serverUrl(server: http.Server): string {
  const address = server.address();
  assert(address, "Could not bind server socket");
  if (typeof address === "string") return address;
  return formatAddress(address);
}

function formatAddress(address: AddressInfo): string {
  let host =
    address.family === "IPv4" ? address.address : `[${address.address}]`;
  if (host === "0.0.0.0" || host === "[::]") host = "localhost";
  return `http://${host}:${address.port}`;
}

export async function startHttpTransport(
  dispatcher: Dispatcher,
  bind: { host: string; port: number },
  options: HttpTransportOptions,
): Promise<http.Server> {
  const httpServer = http.createServer(createRequestListener(dispatcher, options));
  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(bind.port, bind.host, () => {
      httpServer.off("error", reject);
      resolve();
    });
  });
  return httpServer;
}
