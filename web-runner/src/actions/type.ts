import { PageLike, TypeParams } from "../types";

export async function typeAction(
  page: PageLike,
  params: TypeParams,
  timeoutMs?: number,
): Promise<void> {
  const field = page.locator(params.selector).first();
  if (params.clear ?? true) {
    await field.clear({ timeout: timeoutMs });
  }
  await field.pressSequentially(params.text, { timeout: timeoutMs });
  if (params.enter) {
    await field.press("Enter", { timeout: timeoutMs });
  }
}
