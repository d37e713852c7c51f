import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { WebActionError, WebRunner, loadPageState } from "../src";
import type { BrowserSession, LaunchRequest, LocatorLike, PageLike } from "../src";

class FakeLocator implements LocatorLike {
  constructor(
    private page: FakePage,
    private label: string,
  ) {}

  first(): LocatorLike {
    return this;
  }

  async click(): Promise<void> {
    if (this.page.failClicks) {
      throw new Error("element detached");
    }
    this.page.calls.push(`${this.label}.click`);
  }

  async clear(): Promise<void> {
    this.page.calls.push(`${this.label}.clear`);
  }

  async pressSequentially(text: string): Promise<void> {
    this.page.calls.push(`${this.label}.type ${text}`);
  }

  async press(key: string): Promise<void> {
    this.page.calls.push(`${this.label}.press ${key}`);
  }
}

class FakePage implements PageLike {
  calls: string[] = [];
  currentUrl = "about:blank";
  failClicks = false;
  evalResult: unknown = null;

  url(): string {
    return this.currentUrl;
  }

  async title(): Promise<string> {
    return `Title of ${this.currentUrl}`;
  }

  async goto(url: string): Promise<unknown> {
    this.calls.push(`goto ${url}`);
    this.currentUrl = url;
    return null;
  }

  async waitForLoadState(): Promise<void> {}

  locator(selector: string): LocatorLike {
    return new FakeLocator(this, `css(${selector})`);
  }

  getByText(text: string, options?: { exact?: boolean }): LocatorLike {
    return new FakeLocator(this, `text(${text},${options?.exact ?? false})`);
  }

  async evaluate(script: string): Promise<unknown> {
    this.calls.push(`eval ${script}`);
    return this.evalResult;
  }
}

class FakeSession implements BrowserSession {
  closed = false;
  readonly page = new FakePage();

  pages(): PageLike[] {
    return [this.page];
  }

  async newPage(): Promise<PageLike> {
    return this.page;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

function fakeLauncher() {
  const launches: LaunchRequest[] = [];
  const sessions: FakeSession[] = [];
  const launcher = async (request: LaunchRequest): Promise<BrowserSession> => {
    launches.push(request);
    const session = new FakeSession();
    sessions.push(session);
    return session;
  };
  return { launches, sessions, launcher };
}

describe("WebRunner", () => {
  let stateDir: string;

  beforeEach(async () => {
    stateDir = await fs.mkdtemp(path.join(os.tmpdir(), "web-runner-"));
  });

  afterEach(async () => {
    await fs.rm(stateDir, { recursive: true, force: true });
  });

  it("opens a page in the requested browser", async () => {
    const { launches, sessions, launcher } = fakeLauncher();
    const runner = new WebRunner({ launcher });

    const result = await runner.open({
      url: "https://app.test/login",
      browser: "firefox",
      headless: true,
    });

    expect(result).toEqual({
      url: "https://app.test/login",
      title: "Title of https://app.test/login",
    });
    expect(launches).toEqual([{ browser: "firefox", headless: true }]);
    expect(sessions[0].page.calls).toEqual(["goto https://app.test/login"]);
  });

  it("persists the last page and resumes from it", async () => {
    const stateFile = path.join(stateDir, "state", "browser.json");
    const first = fakeLauncher();
    const runner = new WebRunner({ launcher: first.launcher, stateFile });
    await runner.open({ url: "https://app.test/inbox" });
    await runner.close();

    expect(JSON.parse(await fs.readFile(stateFile, "utf-8"))).toEqual({
      url: "https://app.test/inbox",
      browser: "chromium",
    });

    const second = fakeLauncher();
    const resumed = new WebRunner({ launcher: second.launcher, stateFile });
    const result = await resumed.click({ text: "Compose" });

    expect(result).toEqual({ url: "https://app.test/inbox" });
    expect(second.launches).toEqual([{ browser: "chromium", headless: false }]);
    expect(second.sessions[0].page.calls).toEqual([
      "goto https://app.test/inbox",
      "text(Compose,false).click",
    ]);
  });

  it("navigates without replaying the stored page", async () => {
    const stateFile = path.join(stateDir, "browser.json");
    await fs.writeFile(
      stateFile,
      JSON.stringify({ url: "https://app.test/old", browser: "webkit" }),
      "utf-8",
    );
    const { launches, sessions, launcher } = fakeLauncher();
    const runner = new WebRunner({ launcher, stateFile });

    await runner.navigate("https://app.test/new");

    expect(launches[0].browser).toBe("webkit");
    expect(sessions[0].page.calls).toEqual(["goto https://app.test/new"]);
    await expect(loadPageState(stateFile)).resolves.toEqual({
      url: "https://app.test/new",
      browser: "webkit",
    });
  });

  it("clears, types and submits a field", async () => {
    const { sessions, launcher } = fakeLauncher();
    const runner = new WebRunner({ launcher });
    await runner.open({ url: "https://search.test" });

    await runner.type({ selector: "#q", text: "hello", enter: true });
    await runner.type({ selector: "#q", text: " world", clear: false });

    expect(sessions[0].page.calls).toEqual([
      "goto https://search.test",
      "css(#q).clear",
      "css(#q).type hello",
      "css(#q).press Enter",
      "css(#q).type  world",
    ]);
  });

  it("clicks by css selector before text", async () => {
    const { sessions, launcher } = fakeLauncher();
    const runner = new WebRunner({ launcher });

    await runner.click({ selector: "button.primary", text: "Save", exact: true });
    await runner.click({ text: "Save", exact: true });

    expect(sessions[0].page.calls).toEqual([
      "css(button.primary).click",
      "text(Save,true).click",
    ]);
  });

  it("wraps failures with the step action", async () => {
    const { sessions, launcher } = fakeLauncher();
    const runner = new WebRunner({ launcher });
    await runner.open({ url: "https://app.test" });
    sessions[0].page.failClicks = true;

    const failure = runner.click({ selector: "#gone" });
    await expect(failure).rejects.toBeInstanceOf(WebActionError);
    await expect(runner.click({ selector: "#gone" })).rejects.toThrow(
      "browser-click failed: element detached",
    );
    await expect(runner.click({})).rejects.toThrow(
      "browser-click failed: browser-click needs selector or text",
    );
  });

  it("evaluates scripts in the current page", async () => {
    const { sessions, launcher } = fakeLauncher();
    const runner = new WebRunner({ launcher });
    await runner.open({ url: "https://app.test" });
    sessions[0].page.evalResult = 42;

    await expect(runner.evaluate("() => 6 * 7")).resolves.toEqual({
      url: "https://app.test",
      result: 42,
    });
  });

  it("relaunches when a different browser is requested", async () => {
    const { launches, sessions, launcher } = fakeLauncher();
    const runner = new WebRunner({ launcher });

    await runner.open({ url: "https://app.test" });
    await runner.open({ url: "https://app.test", browser: "webkit" });

    expect(launches.map((request) => request.browser)).toEqual(["chromium", "webkit"]);
    expect(sessions[0].closed).toBe(true);
    expect(sessions[1].closed).toBe(false);
  });

  it("closes once", async () => {
    const { sessions, launcher } = fakeLauncher();
    const runner = new WebRunner({ launcher });
    await runner.navigate("https://app.test");

    await runner.close();
    await runner.close();

    expect(runner.started).toBe(false);
    expect(sessions).toHaveLength(1);
    expect(sessions[0].closed).toBe(true);
  });
});

describe("loadPageState", () => {
  let stateDir: string;

  beforeEach(async () => {
    stateDir = await fs.mkdtemp(path.join(os.tmpdir(), "web-state-"));
  });

  afterEach(async () => {
    await fs.rm(stateDir, { recursive: true, force: true });
  });

  it("treats a missing file as no state", async () => {
    await expect(loadPageState(path.join(stateDir, "none.json"))).resolves.toBeNull();
  });

  it("ignores state with an unknown browser", async () => {
    const file = path.join(stateDir, "state.json");
    await fs.writeFile(file, JSON.stringify({ url: "https://a.test", browser: "lynx" }));
    await expect(loadPageState(file)).resolves.toBeNull();
  });

  it("rejects a corrupt file", async () => {
    const file = path.join(stateDir, "state.json");
    await fs.writeFile(file, "{");
    await expect(loadPageState(file)).rejects.toThrow(
      `Browser state file ${file} is not valid JSON`,
    );
  });
});
