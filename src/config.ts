import { z } from "zod";
import { ConfigError } from "./errors.js";
import { LOG_LEVELS } from "./logging.js";
import type { LogLevel } from "./logging.js";
import { formatIssues } from "./protocol.js";

export type Config = {
  server: {
    /** @default "127.0.0.1" */
    host: string;
    /** @default 3333 */
    port: number;
  };
  browser: {
    /** @default true */
    headless: boolean;
    /**
     * Installed browser to drive instead of Playwright's bundled Chromium,
     * e.g. "chrome" or "msedge".
     */
    channel?: string;
    executablePath?: string;
    /** Default timeout for navigation and element actions, in milliseconds. */
    timeoutMs?: number;
  };
  /** Interval between SSE heartbeat events. @default 10000 */
  heartbeatIntervalMs: number;
  /** @default "info" */
  logLevel: LogLevel;
};

// Define Command Line Options Structure
export type CLIOptions = {
  host?: string;
  port?: string;
  headed?: boolean;
  channel?: string;
  executablePath?: string;
  timeout?: string;
  heartbeatInterval?: string;
  logLevel?: string;
};

export type Env = Record<string, string | undefined>;

const defaultConfig: Config = {
  server: {
    host: "127.0.0.1",
    port: 3333,
  },
  browser: {
    headless: true,
  },
  heartbeatIntervalMs: 10_000,
  logLevel: "info",
};

const ConfigSchema = z.object({
  server: z.object({
    host: z.string().min(1),
    port: z.coerce.number().int().min(0).max(65535),
  }),
  browser: z.object({
    headless: z.boolean(),
    channel: z.string().min(1).optional(),
    executablePath: z.string().min(1).optional(),
    timeoutMs: z.coerce.number().int().positive().optional(),
  }),
  heartbeatIntervalMs: z.coerce.number().int().positive(),
  logLevel: z.enum(LOG_LEVELS),
});

export type RawConfig = {
  server?: { host?: string; port?: string | number };
  browser?: {
    headless?: boolean;
    channel?: string;
    executablePath?: string;
    timeoutMs?: string | number;
  };
  heartbeatIntervalMs?: string | number;
  logLevel?: string;
};

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) return undefined;
  return !["false", "0", "no", "off"].includes(value.trim().toLowerCase());
}

// An empty variable counts as unset.
function fromEnv(env: Env, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value.trim() === "" ? undefined : value;
}

// Later layers win; undefined values never override.
function mergeConfig(...layers: RawConfig[]): RawConfig {
  return layers.reduce<RawConfig>(
    (merged, layer) => ({
      server: {
        host: layer.server?.host ?? merged.server?.host,
        port: layer.server?.port ?? merged.server?.port,
      },
      browser: {
        headless: layer.browser?.headless ?? merged.browser?.headless,
        channel: layer.browser?.channel ?? merged.browser?.channel,
        executablePath:
          layer.browser?.executablePath ?? merged.browser?.executablePath,
        timeoutMs: layer.browser?.timeoutMs ?? merged.browser?.timeoutMs,
      },
      heartbeatIntervalMs:
        layer.heartbeatIntervalMs ?? merged.heartbeatIntervalMs,
      logLevel: layer.logLevel ?? merged.logLevel,
    }),
    {},
  );
}

export function configFromEnv(env: Env): RawConfig {
  return {
    server: {
      host: fromEnv(env, "MCP_BROWSER_HOST"),
      port: fromEnv(env, "MCP_BROWSER_PORT"),
    },
    browser: {
      headless: parseBoolean(fromEnv(env, "MCP_BROWSER_HEADLESS")),
      channel: fromEnv(env, "MCP_BROWSER_CHANNEL"),
      executablePath: fromEnv(env, "MCP_BROWSER_EXECUTABLE_PATH"),
      timeoutMs: fromEnv(env, "MCP_BROWSER_TIMEOUT_MS"),
    },
    heartbeatIntervalMs: fromEnv(env, "MCP_BROWSER_HEARTBEAT_MS"),
    logLevel: fromEnv(env, "MCP_BROWSER_LOG_LEVEL"),
  };
}

// Create Config structure based on CLI options
export function configFromCLIOptions(cliOptions: CLIOptions): RawConfig {
  return {
    server: {
      host: cliOptions.host,
      port: cliOptions.port,
    },
    browser: {
      headless: cliOptions.headed ? false : undefined,
      channel: cliOptions.channel,
      executablePath: cliOptions.executablePath,
      timeoutMs: cliOptions.timeout,
    },
    heartbeatIntervalMs: cliOptions.heartbeatInterval,
    logLevel: cliOptions.logLevel,
  };
}

/**
 * Resolves the final configuration.
 * Order: defaults < environment < CLI flags.
 */
export function resolveConfig(
  cliOptions: CLIOptions = {},
  env: Env = process.env,
): Config {
  const merged = mergeConfig(
    defaultConfig,
    configFromEnv(env),
    configFromCLIOptions(cliOptions),
  );
  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}
