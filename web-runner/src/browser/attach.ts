import { chromium } from "playwright";
import { BrowserSession } from "../types";

export interface AttachOptions {
  endpoint: string;
}

export async function attachBrowser(options: AttachOptions): Promise<BrowserSession> {
  if (!options.endpoint) {
    throw new Error("Missing attach endpoint");
  }
  const browser = await chromium.connectOverCDP(options.endpoint);
  const context = browser.contexts()[0] ?? (await browser.newContext());
  return {
    pages: () => context.pages(),
    newPage: () => context.newPage(),
    // Disconnects; the attached browser keeps running.
    close: () => browser.close(),
  };
}
