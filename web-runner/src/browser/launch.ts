import path from "path";
import { BrowserType, chromium, firefox, webkit } from "playwright";
import { BrowserKind, BrowserSession, LaunchRequest } from "../types";
import { attachBrowser } from "./attach";

function engineFor(browser: BrowserKind): BrowserType {
  switch (browser) {
    case "firefox":
      return firefox;
    case "webkit":
      return webkit;
    default:
      return chromium;
  }
}

/**
 * Opens a browser session. With `profileDir` the context is persistent, one
 * profile per browser kind, so cookies and logins carry over between runs.
 */
export async function launchSession(request: LaunchRequest): Promise<BrowserSession> {
  if (request.attachEndpoint) {
    return attachBrowser({ endpoint: request.attachEndpoint });
  }

  const engine = engineFor(request.browser);
  if (request.profileDir) {
    return engine.launchPersistentContext(path.join(request.profileDir, request.browser), {
      headless: request.headless,
      viewport: request.headless ? { width: 1280, height: 800 } : null,
    });
  }

  const browser = await engine.launch({ headless: request.headless });
  const context = await browser.newContext();
  return {
    pages: () => context.pages(),
    newPage: () => context.newPage(),
    close: async () => {
      await context.close();
      await browser.close();
    },
  };
}
