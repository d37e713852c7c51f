export type BrowserKind = "chromium" | "firefox" | "webkit";

export const BROWSER_KINDS: readonly BrowserKind[] = ["chromium", "firefox", "webkit"];

interface TimeoutOption {
  timeout?: number;
}

// Structural slices of Playwright's Locator and Page; the real objects
// satisfy them and tests substitute in-process fakes.
export interface LocatorLike {
  first(): LocatorLike;
  click(options?: TimeoutOption): Promise<void>;
  clear(options?: TimeoutOption): Promise<void>;
  pressSequentially(text: string, options?: TimeoutOption): Promise<void>;
  press(key: string, options?: TimeoutOption): Promise<void>;
}

export interface PageLike {
  url(): string;
  title(): Promise<string>;
  goto(
    url: string,
    options?: { waitUntil?: "domcontentloaded"; timeout?: number },
  ): Promise<unknown>;
  waitForLoadState(state?: "domcontentloaded", options?: TimeoutOption): Promise<void>;
  locator(selector: string): LocatorLike;
  getByText(text: string, options?: { exact?: boolean }): LocatorLike;
  evaluate(script: string): Promise<unknown>;
}

export interface BrowserSession {
  pages(): PageLike[];
  newPage(): Promise<PageLike>;
  close(): Promise<void>;
}

export interface LaunchRequest {
  browser: BrowserKind;
  headless: boolean;
  profileDir?: string;
  attachEndpoint?: string;
}

export type SessionLauncher = (request: LaunchRequest) => Promise<BrowserSession>;

/** Last page a session was on, persisted so later runs can resume it. */
export interface PageState {
  url: string;
  browser: BrowserKind;
}

export interface OpenParams {
  url: string;
  browser?: BrowserKind;
  headless?: boolean;
}

export interface ClickParams {
  selector?: string;
  text?: string;
  exact?: boolean;
}

export interface TypeParams {
  selector: string;
  text: string;
  clear?: boolean;
  enter?: boolean;
}

export interface BrowserActionResult {
  url: string;
  title?: string;
  result?: unknown;
}

export interface BrowserDriver {
  open(params: OpenParams): Promise<BrowserActionResult>;
  navigate(url: string): Promise<BrowserActionResult>;
  click(params: ClickParams): Promise<BrowserActionResult>;
  type(params: TypeParams): Promise<BrowserActionResult>;
  evaluate(script: string): Promise<BrowserActionResult>;
  close(): Promise<void>;
}
