import { z } from "zod";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { InvalidParamsError, UnknownMethodError } from "./errors.js";
import type { RpcError } from "./errors.js";

export const JSONRPC_VERSION = "2.0";
export const DEFAULT_PROTOCOL_VERSION = "2025-06-18";

export const RequestIdSchema = z.union([z.string(), z.number()]);
/** `null` is echoed back as sent; only an absent id becomes `0`. */
export type RequestId = z.infer<typeof RequestIdSchema> | null;

export const RpcEnvelopeSchema = z.object({
  jsonrpc: z.string().optional(),
  id: RequestIdSchema.nullable().optional(),
  method: z.unknown(),
  params: z.unknown().optional(),
});
export type RpcEnvelope = z.infer<typeof RpcEnvelopeSchema>;

// --- Per-method params ---

export const InitializeParamsSchema = z
  .object({ protocolVersion: z.string().optional() })
  .passthrough();
export type InitializeParams = z.infer<typeof InitializeParamsSchema>;

export const ListToolsParamsSchema = z.object({}).passthrough();

export const CallToolParamsSchema = z
  .object({
    name: z.string({ required_error: "tool name is required" }),
    arguments: z.record(z.unknown()).nullish(),
  })
  .passthrough();
export type CallToolParams = z.infer<typeof CallToolParamsSchema>;

export const NotificationParamsSchema = z.object({}).passthrough();

export const CancelledParamsSchema = z
  .object({
    requestId: RequestIdSchema.optional(),
    reason: z.string().optional(),
  })
  .passthrough();
export type CancelledParams = z.infer<typeof CancelledParamsSchema>;

/**
 * One variant per recognised method. Anything else, a missing or non-string
 * method included, never becomes a `Command`: {@link parseCommand} throws
 * {@link UnknownMethodError}.
 */
export type Command =
  | { method: "initialize"; params: InitializeParams }
  | { method: "tools/list" }
  | { method: "tools/call"; params: CallToolParams }
  | { method: "notifications/initialized" }
  | { method: "notifications/cancelled"; params: CancelledParams };

export type MethodName = Command["method"];

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message,
    )
    .join("; ");
}

function parseParams<Schema extends z.ZodTypeAny>(
  schema: Schema,
  method: MethodName,
  params: unknown,
): z.output<Schema> {
  const parsed = schema.safeParse(params ?? {});
  if (!parsed.success) {
    throw new InvalidParamsError(method, formatIssues(parsed.error));
  }
  return parsed.data;
}

export function parseCommand(method: unknown, params: unknown): Command {
  if (typeof method !== "string") throw new UnknownMethodError(String(method));
  switch (method) {
    case "initialize":
      return {
        method,
        params: parseParams(InitializeParamsSchema, method, params),
      };
    case "tools/list":
      parseParams(ListToolsParamsSchema, method, params);
      return { method };
    case "tools/call":
      return {
        method,
        params: parseParams(CallToolParamsSchema, method, params),
      };
    case "notifications/initialized":
      parseParams(NotificationParamsSchema, method, params);
      return { method };
    case "notifications/cancelled":
      return {
        method,
        params: parseParams(CancelledParamsSchema, method, params),
      };
    default:
      throw new UnknownMethodError(method);
  }
}

// --- Responses ---

export type ServerInfo = {
  name: string;
  version: string;
  description: string;
};

export type InitializeResult = {
  protocolVersion: string;
  capabilities: {
    tools: { supported: boolean };
    browsing: { supported: boolean };
    experimental: Record<string, never>;
  };
  serverInfo: ServerInfo;
};

export type AckResult = { ack: true };

export type JsonRpcSuccess<Result = unknown> = {
  jsonrpc: typeof JSONRPC_VERSION;
  id: RequestId;
  result: Result;
};

export type JsonRpcError = {
  code: number;
  message: string;
};

export type JsonRpcFailure = {
  jsonrpc: typeof JSONRPC_VERSION;
  id: RequestId;
  error: JsonRpcError;
};

export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;

/** Reply to a body that is not JSON at all; deliberately outside the envelope. */
export type MalformedBodyResponse = { error: "invalid JSON" };

export const MALFORMED_BODY_RESPONSE: MalformedBodyResponse = {
  error: "invalid JSON",
};

export type DispatchResponse = JsonRpcResponse | MalformedBodyResponse;

export type ToolCallResult = CallToolResult;

export function success<Result>(
  id: RequestId,
  result: Result,
): JsonRpcSuccess<Result> {
  return { jsonrpc: JSONRPC_VERSION, id, result };
}

export function failure(id: RequestId, error: RpcError): JsonRpcFailure {
  return {
    jsonrpc: JSONRPC_VERSION,
    id,
    error: { code: error.code, message: error.message },
  };
}
