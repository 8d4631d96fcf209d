import { chromium } from "playwright-core";
import type { LaunchOptions, Page } from "playwright-core";
import type { Config } from "./config.js";
import { BrowserLaunchError, errorMessage } from "./errors.js";
import { createLogger } from "./logging.js";
import type { Logger } from "./logging.js";
import type { ToolPage } from "./tools/tool.js";

export type SessionPage = ToolPage & Pick<Page, "setDefaultTimeout">;

/** What the session needs from a launched browser; a Playwright `Browser` fits. */
export interface BrowserHandle {
  newPage(): Promise<SessionPage>;
  close(): Promise<void>;
  on(event: "disconnected", listener: () => void): unknown;
}

export type BrowserLauncher = (options: LaunchOptions) => Promise<BrowserHandle>;

export type BrowserSession = {
  browser: BrowserHandle;
  page: SessionPage;
};

/** Hands out the page the tools act on. */
export interface PageProvider {
  acquirePage(): Promise<ToolPage>;
}

const launchChromium: BrowserLauncher = (options) => chromium.launch(options);

export class SessionManager implements PageProvider {
  private readonly browserConfig: Config["browser"];
  private readonly launcher: BrowserLauncher;
  private readonly logger: Logger;
  private session: BrowserSession | null = null;
  // Shared by every caller that arrives while the first launch is running.
  private launching: Promise<BrowserSession> | null = null;

  constructor(
    browserConfig: Config["browser"],
    options: { launcher?: BrowserLauncher; logger?: Logger } = {},
  ) {
    this.browserConfig = browserConfig;
    this.launcher = options.launcher ?? launchChromium;
    this.logger = options.logger ?? createLogger("SessionManager");
  }

  get isActive(): boolean {
    return this.session !== null;
  }

  async acquirePage(): Promise<ToolPage> {
    if (this.session) return this.session.page;
    if (!this.launching) {
      this.launching = this.createSession().finally(() => {
        this.launching = null;
      });
    }
    const session = await this.launching;
    return session.page;
  }

  /**
   * Closes the browser if one was launched. Safe to call more than once.
   */
  async shutdown(): Promise<void> {
    if (this.launching) {
      // A failed launch already rejected its callers and left no session.
      await this.launching.catch((error: unknown) => {
        this.logger.debug(`Pending launch failed: ${errorMessage(error)}`);
      });
    }
    const session = this.session;
    if (!session) return;
    this.session = null;

    this.logger.info("Closing browser instance...");
    try {
      await session.browser.close();
    } catch (error) {
      this.logger.warn(`Error closing browser: ${errorMessage(error)}`);
    }
  }

  private async createSession(): Promise<BrowserSession> {
    const { headless, channel, executablePath, timeoutMs } =
      this.browserConfig;
    this.logger.info(
      `Launching Chromium (headless: ${headless}${channel ? `, channel: ${channel}` : ""})`,
    );

    let browser: BrowserHandle;
    try {
      browser = await this.launcher({ headless, channel, executablePath });
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Launching browser failed: ${message}`);
      throw new BrowserLaunchError(`Failed to launch browser: ${message}`, {
        cause: error,
      });
    }

    let page: SessionPage;
    try {
      page = await browser.newPage();
    } catch (error) {
      await browser.close().catch((closeError: unknown) => {
        this.logger.warn(`Error closing browser: ${errorMessage(closeError)}`);
      });
      throw new BrowserLaunchError(
        `Failed to open page: ${errorMessage(error)}`,
        { cause: error },
      );
    }
    if (timeoutMs !== undefined) page.setDefaultTimeout(timeoutMs);

    const session: BrowserSession = { browser, page };
    browser.on("disconnected", () => {
      if (this.session !== session) return;
      this.logger.warn("Browser disconnected; next tool call relaunches it");
      this.session = null;
    });

    this.session = session;
    this.logger.info("Browser launched");
    return session;
  }
}
