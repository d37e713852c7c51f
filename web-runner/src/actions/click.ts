import { ClickParams, PageLike } from "../types";

export async function clickAction(
  page: PageLike,
  params: ClickParams,
  timeoutMs?: number,
): Promise<void> {
  if (params.selector) {
    await page.locator(params.selector).first().click({ timeout: timeoutMs });
    return;
  }
  if (params.text) {
    await page
      .getByText(params.text, { exact: params.exact ?? false })
      .first()
      .click({ timeout: timeoutMs });
    return;
  }
  throw new Error("browser-click needs selector or text");
}
