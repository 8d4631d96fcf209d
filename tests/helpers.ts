import { vi } from "vitest";
import type { LaunchOptions } from "playwright-core";
import { createLogger } from "../src/logging.js";
import type { Logger } from "../src/logging.js";
import type { BrowserHandle, SessionPage } from "../src/sessionManager.js";

export type FakeDocument = {
  title: string;
  body: string;
  selectors: string[];
};

export type FakeSite = Record<string, FakeDocument>;

export const EXAMPLE_URL = "https://example.com";

export const EXAMPLE_SITE: FakeSite = {
  [EXAMPLE_URL]: {
    title: "Example Domain",
    body: "Example Domain\nThis domain is for use in documentation examples.",
    selectors: ["#name", "a"],
  },
};

/** A page that serves documents from `site` instead of the network. */
export function createFakePage(site: FakeSite = EXAMPLE_SITE) {
  let current: FakeDocument = { title: "", body: "", selectors: [] };

  const requireSelector = (selector: string) => {
    if (!current.selectors.includes(selector)) {
      throw new Error(`No element matches selector "${selector}"`);
    }
  };

  const page = {
    goto: vi.fn(async (url: string) => {
      const document = site[url];
      if (!document) throw new Error(`net::ERR_NAME_NOT_RESOLVED at ${url}`);
      current = document;
      return null;
    }),
    title: vi.fn(async () => current.title),
    click: vi.fn(async (selector: string) => {
      requireSelector(selector);
    }),
    fill: vi.fn(async (selector: string, _value: string) => {
      requireSelector(selector);
    }),
    innerText: vi.fn(async (selector: string) =>
      selector === "body" ? current.body : "",
    ),
    setDefaultTimeout: vi.fn((_timeout: number) => undefined),
  } satisfies SessionPage;
  return page;
}

export type FakePage = ReturnType<typeof createFakePage>;

export class FakeBrowser implements BrowserHandle {
  private readonly listeners: Array<() => void> = [];
  readonly page: SessionPage;
  readonly newPage = vi.fn(async (): Promise<SessionPage> => this.page);
  readonly close = vi.fn(async () => undefined);

  constructor(page: SessionPage) {
    this.page = page;
  }

  on(_event: "disconnected", listener: () => void): this {
    this.listeners.push(listener);
    return this;
  }

  disconnect() {
    for (const listener of this.listeners) listener();
  }
}

export function createFakeLauncher(page: SessionPage = createFakePage()) {
  const browsers: FakeBrowser[] = [];
  const launcher = vi.fn(
    async (_options: LaunchOptions): Promise<BrowserHandle> => {
      // Resolve on a later tick so concurrent callers overlap the launch.
      await new Promise((resolve) => setTimeout(resolve, 5));
      const browser = new FakeBrowser(page);
      browsers.push(browser);
      return browser;
    },
  );
  return { launcher, browsers, page };
}

export function createCapturingLogger(scope: string): {
  logger: Logger;
  lines: string[];
} {
  const lines: string[] = [];
  const logger = createLogger(scope, {
    level: "debug",
    sink: (line) => lines.push(line),
  });
  return { logger, lines };
}

export const silentLogger = createLogger("test", { level: "error", sink: () => {} });
