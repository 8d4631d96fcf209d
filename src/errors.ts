import { ErrorCode } from "@modelcontextprotocol/sdk/types.js";

/** JSON-RPC server-error code used for every failure inside `tools/call`. */
export const TOOL_EXECUTION_ERROR = -32000;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * An error that maps onto a JSON-RPC error object.
 */
export class RpcError extends Error {
  readonly code: number;

  constructor(code: number, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidRequestError extends RpcError {
  constructor(detail: string) {
    super(ErrorCode.InvalidRequest, `Invalid Request: ${detail}`);
  }
}

export class UnknownMethodError extends RpcError {
  readonly method: string;

  constructor(method: string) {
    super(ErrorCode.MethodNotFound, `Method '${method}' not implemented`);
    this.method = method;
  }
}

export class InvalidParamsError extends RpcError {
  constructor(method: string, detail: string) {
    super(ErrorCode.InvalidParams, `Invalid params for '${method}': ${detail}`);
  }
}

export class ToolExecutionError extends RpcError {
  constructor(message: string, options?: ErrorOptions) {
    super(TOOL_EXECUTION_ERROR, message, options);
  }
}

export class UnknownToolError extends ToolExecutionError {
  readonly toolName: string;

  constructor(toolName: string) {
    super(`Unknown tool: ${toolName}`);
    this.toolName = toolName;
  }
}

export class ToolArgumentsError extends ToolExecutionError {
  constructor(toolName: string, detail: string) {
    super(`Invalid arguments for tool '${toolName}': ${detail}`);
  }
}

export class BrowserLaunchError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "BrowserLaunchError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
