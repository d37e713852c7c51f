import { promises as fs } from "fs";
import path from "path";
import { BROWSER_KINDS, BrowserKind, PageState } from "../types";

function isBrowserKind(value: unknown): value is BrowserKind {
  return BROWSER_KINDS.some((kind) => kind === value);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export async function loadPageState(file: string): Promise<PageState | null> {
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Browser state file ${file} is not valid JSON`, { cause: error });
  }
  if (typeof data !== "object" || data === null) {
    return null;
  }
  const url = "url" in data ? data.url : undefined;
  const browser = "browser" in data ? data.browser : undefined;
  if (typeof url !== "string" || !isBrowserKind(browser)) {
    return null;
  }
  return { url, browser };
}

export async function savePageState(file: string, state: PageState): Promise<void> {
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, JSON.stringify(state, null, 2), "utf-8");
}
