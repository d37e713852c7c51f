export class WebActionError extends Error {
  readonly action: string;

  constructor(action: string, cause: unknown) {
    super(`${action} failed: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
    this.name = "WebActionError";
    this.action = action;
  }
}

export async function runAction<T>(action: string, task: () => Promise<T>): Promise<T> {
  try {
    return await task();
  } catch (error) {
    if (error instanceof WebActionError) {
      throw error;
    }
    throw new WebActionError(action, error);
  }
}
