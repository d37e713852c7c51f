import { clickAction } from "./actions/click";
import { navigateAction } from "./actions/navigate";
import { runAction } from "./actions/run";
import { typeAction } from "./actions/type";
import { launchSession } from "./browser/launch";
import { loadPageState, savePageState } from "./browser/state";
import {
  BrowserActionResult,
  BrowserDriver,
  BrowserKind,
  BrowserSession,
  ClickParams,
  OpenParams,
  PageLike,
  SessionLauncher,
  TypeParams,
} from "./types";

export interface WebRunnerOptions {
  browser?: BrowserKind;
  headless?: boolean;
  profileDir?: string;
  attachEndpoint?: string;
  stateFile?: string;
  navigationTimeoutMs?: number;
  loadTimeoutMs?: number;
  actionTimeoutMs?: number;
  launcher?: SessionLauncher;
}

const defaultBrowser: BrowserKind = "chromium";

export const webRunnerDefaults = {
  browser: defaultBrowser,
  headless: false,
  navigationTimeoutMs: 30_000,
  loadTimeoutMs: 15_000,
  actionTimeoutMs: 10_000,
};

interface PageRequest {
  resume: boolean;
  browser?: BrowserKind;
  headless?: boolean;
}

/**
 * One browser session shared by the `browser-*` steps of a run. The session
 * is launched lazily; when a state file is configured, steps that find no
 * open page resume from the last URL recorded there.
 */
export class WebRunner implements BrowserDriver {
  private options: WebRunnerOptions;
  private launcher: SessionLauncher;
  private session: BrowserSession | null = null;
  private page: PageLike | null = null;
  private browser: BrowserKind | null = null;

  constructor(options: WebRunnerOptions = {}) {
    this.options = options;
    this.launcher = options.launcher ?? launchSession;
  }

  get started(): boolean {
    return this.session !== null;
  }

  async open(params: OpenParams): Promise<BrowserActionResult> {
    return runAction("browser-open", async () => {
      const browser = params.browser ?? this.options.browser ?? webRunnerDefaults.browser;
      if (this.session && this.browser !== browser) {
        await this.close();
      }
      const page = await this.ensurePage({
        resume: false,
        browser,
        headless: params.headless,
      });
      await navigateAction(page, params.url, this.navigationTimeout());
      await page.waitForLoadState("domcontentloaded", {
        timeout: this.options.loadTimeoutMs ?? webRunnerDefaults.loadTimeoutMs,
      });
      return this.settle(page, true);
    });
  }

  async navigate(url: string): Promise<BrowserActionResult> {
    return runAction("browser-navigate", async () => {
      const page = await this.ensurePage({ resume: false });
      await navigateAction(page, url, this.navigationTimeout());
      return this.settle(page, true);
    });
  }

  async click(params: ClickParams): Promise<BrowserActionResult> {
    return runAction("browser-click", async () => {
      const page = await this.ensurePage({ resume: true });
      await clickAction(page, params, this.actionTimeout());
      return this.settle(page, false);
    });
  }

  async type(params: TypeParams): Promise<BrowserActionResult> {
    return runAction("browser-type", async () => {
      const page = await this.ensurePage({ resume: true });
      await typeAction(page, params, this.actionTimeout());
      return this.settle(page, false);
    });
  }

  async evaluate(script: string): Promise<BrowserActionResult> {
    return runAction("browser-eval", async () => {
      const page = await this.ensurePage({ resume: true });
      const result = await page.evaluate(script);
      return { url: page.url(), result };
    });
  }

  async close(): Promise<void> {
    const session = this.session;
    this.session = null;
    this.page = null;
    this.browser = null;
    if (session) {
      await session.close();
    }
  }

  private navigationTimeout(): number {
    return this.options.navigationTimeoutMs ?? webRunnerDefaults.navigationTimeoutMs;
  }

  private actionTimeout(): number {
    return this.options.actionTimeoutMs ?? webRunnerDefaults.actionTimeoutMs;
  }

  private async ensurePage(request: PageRequest): Promise<PageLike> {
    if (this.page) {
      return this.page;
    }
    const stored = this.options.stateFile ? await loadPageState(this.options.stateFile) : null;
    const browser =
      request.browser ?? stored?.browser ?? this.options.browser ?? webRunnerDefaults.browser;
    const session = await this.launcher({
      browser,
      headless: request.headless ?? this.options.headless ?? webRunnerDefaults.headless,
      profileDir: this.options.profileDir,
      attachEndpoint: this.options.attachEndpoint,
    });
    this.session = session;
    this.browser = browser;

    const page = session.pages()[0] ?? (await session.newPage());
    this.page = page;
    if (request.resume && stored) {
      await navigateAction(page, stored.url, this.navigationTimeout());
    }
    return page;
  }

  private async settle(page: PageLike, withTitle: boolean): Promise<BrowserActionResult> {
    const url = page.url();
    if (this.options.stateFile && this.browser) {
      await savePageState(this.options.stateFile, { url, browser: this.browser });
    }
    if (!withTitle) {
      return { url };
    }
    return { url, title: await page.title() };
  }
}

export { WebActionError } from "./actions/run";
export { launchSession } from "./browser/launch";
export { attachBrowser } from "./browser/attach";
export { loadPageState, savePageState } from "./browser/state";
export { BROWSER_KINDS } from "./types";
export type {
  BrowserActionResult,
  BrowserDriver,
  BrowserKind,
  BrowserSession,
  ClickParams,
  LaunchRequest,
  LocatorLike,
  OpenParams,
  PageLike,
  PageState,
  SessionLauncher,
  TypeParams,
} from "./types";
