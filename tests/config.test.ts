import { describe, it, expect } from "vitest";
import { resolveConfig } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

describe("resolveConfig", () => {
  it("uses the defaults when nothing is set", () => {
    expect(resolveConfig({}, {})).toEqual({
      server: { host: "127.0.0.1", port: 3333 },
      browser: { headless: true },
      heartbeatIntervalMs: 10000,
      logLevel: "info",
    });
  });

  it("reads the environment", () => {
    const config = resolveConfig(
      {},
      {
        MCP_BROWSER_HOST: "0.0.0.0",
        MCP_BROWSER_PORT: "8080",
        MCP_BROWSER_HEADLESS: "false",
        MCP_BROWSER_CHANNEL: "chrome",
        MCP_BROWSER_TIMEOUT_MS: "15000",
        MCP_BROWSER_HEARTBEAT_MS: "2500",
        MCP_BROWSER_LOG_LEVEL: "debug",
      },
    );
    expect(config).toEqual({
      server: { host: "0.0.0.0", port: 8080 },
      browser: { headless: false, channel: "chrome", timeoutMs: 15000 },
      heartbeatIntervalMs: 2500,
      logLevel: "debug",
    });
  });

  it("lets CLI flags override the environment", () => {
    const config = resolveConfig(
      { port: "9090", headed: true, logLevel: "warn" },
      { MCP_BROWSER_PORT: "8080", MCP_BROWSER_HEADLESS: "true", MCP_BROWSER_LOG_LEVEL: "debug" },
    );
    expect(config.server.port).toBe(9090);
    expect(config.browser.headless).toBe(false);
    expect(config.logLevel).toBe("warn");
  });

  it("treats empty environment variables as unset", () => {
    const config = resolveConfig({}, { MCP_BROWSER_CHANNEL: "", MCP_BROWSER_PORT: " " });
    expect(config.browser.channel).toBeUndefined();
    expect(config.server.port).toBe(3333);
  });

  it("rejects a port that is not a number", () => {
    expect(() => resolveConfig({ port: "abc" }, {})).toThrow(ConfigError);
    expect(() => resolveConfig({ port: "abc" }, {})).toThrow(
      "Invalid configuration: server.port: Expected number, received nan",
    );
  });

  it("rejects an unknown log level", () => {
    expect(() => resolveConfig({}, { MCP_BROWSER_LOG_LEVEL: "verbose" })).toThrow(
      /^Invalid configuration: logLevel: /,
    );
  });
});
