import { PageLike } from "../types";

export async function navigateAction(
  page: PageLike,
  url: string,
  timeoutMs: number,
): Promise<void> {
  await page.goto(url, { waitUntil: "domcontentloaded", timeout: timeoutMs });
}
