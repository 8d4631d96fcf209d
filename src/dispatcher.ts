import type { Tool as ToolDescriptor } from "@modelcontextprotocol/sdk/types.js";
import {
  InvalidRequestError,
  RpcError,
  ToolArgumentsError,
  ToolExecutionError,
  UnknownToolError,
  errorMessage,
} from "./errors.js";
import { createLogger } from "./logging.js";
import type { Logger } from "./logging.js";
import {
  DEFAULT_PROTOCOL_VERSION,
  MALFORMED_BODY_RESPONSE,
  RpcEnvelopeSchema,
  failure,
  formatIssues,
  parseCommand,
  success,
} from "./protocol.js";
import type {
  AckResult,
  CallToolParams,
  CancelledParams,
  Command,
  DispatchResponse,
  InitializeParams,
  InitializeResult,
  JsonRpcResponse,
  RequestId,
  ServerInfo,
  ToolCallResult,
} from "./protocol.js";
import type { PageProvider } from "./sessionManager.js";
import { TOOLS } from "./tools/index.js";
import { describeTool } from "./tools/tool.js";
import type { Tool } from "./tools/tool.js";

export const SERVER_INFO: ServerInfo = {
  name: "mcp-browser",
  version: "0.2.0",
  description: "Async Playwright MCP browser agent",
};

export type DispatcherOptions = {
  sessions: PageProvider;
  tools?: readonly Tool[];
  serverInfo?: ServerInfo;
  logger?: Logger;
};

/**
 * Turns one raw JSON-RPC body into one response. Every tool runs against the
 * page handed out by `sessions`; concurrent calls share that page unguarded.
 */
export class Dispatcher {
  private readonly sessions: PageProvider;
  private readonly tools: ReadonlyMap<string, Tool>;
  private readonly catalog: readonly ToolDescriptor[];
  private readonly serverInfo: ServerInfo;
  private readonly logger: Logger;

  constructor(options: DispatcherOptions) {
    const tools = options.tools ?? TOOLS;
    this.sessions = options.sessions;
    this.tools = new Map(
      tools.map((tool): [string, Tool] => [tool.schema.name, tool]),
    );
    this.catalog = tools.map(describeTool);
    this.serverInfo = options.serverInfo ?? SERVER_INFO;
    this.logger = options.logger ?? createLogger("Dispatcher");
  }

  async handle(rawBody: string): Promise<DispatchResponse> {
    let body: unknown;
    try {
      body = JSON.parse(rawBody);
    } catch (error) {
      this.logger.warn(`Could not parse request body: ${errorMessage(error)}`);
      return MALFORMED_BODY_RESPONSE;
    }
    this.logger.debug(`Request body: ${JSON.stringify(body)}`);

    const envelope = RpcEnvelopeSchema.safeParse(body);
    if (!envelope.success) {
      return failure(
        readableId(body),
        new InvalidRequestError(formatIssues(envelope.error)),
      );
    }
    const id = envelope.data.id === undefined ? 0 : envelope.data.id;

    let command: Command;
    try {
      command = parseCommand(envelope.data.method, envelope.data.params);
    } catch (error) {
      if (!(error instanceof RpcError)) throw error;
      this.logger.warn(error.message);
      return failure(id, error);
    }
    return this.execute(id, command);
  }

  private async execute(
    id: RequestId,
    command: Command,
  ): Promise<JsonRpcResponse> {
    switch (command.method) {
      case "initialize":
        return success(id, this.initialize(command.params));
      case "tools/list":
        this.logger.info(`Listing ${this.catalog.length} tools`);
        return success(id, { tools: this.catalog });
      case "tools/call":
        return this.callTool(id, command.params);
      case "notifications/initialized":
        this.logger.info("Client initialized");
        return success(id, ack());
      case "notifications/cancelled":
        return success(id, this.cancelled(command.params));
      default: {
        const unhandled: never = command;
        throw new Error(`Unhandled command: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private initialize(params: InitializeParams): InitializeResult {
    const protocolVersion = params.protocolVersion ?? DEFAULT_PROTOCOL_VERSION;
    this.logger.info(`Initializing with protocol version ${protocolVersion}`);
    return {
      protocolVersion,
      capabilities: {
        tools: { supported: true },
        browsing: { supported: true },
        experimental: {},
      },
      serverInfo: { ...this.serverInfo },
    };
  }

  private async callTool(
    id: RequestId,
    params: CallToolParams,
  ): Promise<JsonRpcResponse> {
    const { name } = params;
    const args = params.arguments ?? {};
    this.logger.info(`Tool call requested: ${name} with args ${JSON.stringify(args)}`);

    try {
      const result = await this.runTool(name, args);
      this.logger.info(`Tool ${name} executed successfully`);
      return success(id, result);
    } catch (error) {
      const wrapped =
        error instanceof ToolExecutionError
          ? error
          : new ToolExecutionError(errorMessage(error), { cause: error });
      this.logger.error(`Tool execution failed: ${wrapped.message}`);
      return failure(id, wrapped);
    }
  }

  private async runTool(
    name: string,
    args: Record<string, unknown>,
  ): Promise<ToolCallResult> {
    const tool = this.tools.get(name);
    if (!tool) throw new UnknownToolError(name);

    const parsed = tool.schema.inputSchema.safeParse(args);
    if (!parsed.success) {
      throw new ToolArgumentsError(name, formatIssues(parsed.error));
    }

    const page = await this.sessions.acquirePage();
    const output = await tool.handle(page, parsed.data);
    return {
      content: [{ type: "text", text: JSON.stringify(output, null, 2) }],
    };
  }

  private cancelled(params: CancelledParams): AckResult {
    // Nothing in flight can be aborted; the notification is only recorded.
    this.logger.info(`Operation cancelled: ${JSON.stringify(params)}`);
    return ack();
  }
}

function ack(): AckResult {
  return { ack: true };
}

function readableId(body: unknown): RequestId {
  if (typeof body !== "object" || body === null || !("id" in body)) return 0;
  const { id } = body;
  return typeof id === "string" || typeof id === "number" || id === null ? id : 0;
}
