import type { MatchAttempt } from "./selector";

export type MacroErrorCode =
  | "NOT_FOUND"
  | "DETACHED_ELEMENT"
  | "UNRESOLVABLE"
  | "NO_ACTIVE_WINDOW"
  | "UNKNOWN_ACTION"
  | "INJECTION_FAILURE"
  | "MACRO_SYNTAX";

export interface MacroErrorOptions {
  cause?: unknown;
  data?: unknown;
}

export class MacroError extends Error {
  code: MacroErrorCode;
  data?: unknown;

  constructor(code: MacroErrorCode, message: string, options: MacroErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.data = options.data;
  }
}

export class NotFoundError extends MacroError {
  constructor(message: string, options?: MacroErrorOptions) {
    super("NOT_FOUND", message, options);
  }
}

export class DetachedElementError extends MacroError {
  constructor(message: string, options?: MacroErrorOptions) {
    super("DETACHED_ELEMENT", message, options);
  }
}

export class UnresolvableError extends MacroError {
  attempts: MatchAttempt[];

  constructor(message: string, attempts: MatchAttempt[], options?: MacroErrorOptions) {
    super("UNRESOLVABLE", message, options);
    this.attempts = attempts;
  }
}

export class NoActiveWindowError extends MacroError {
  constructor(message = "No active window. Use a 'focus' step first.") {
    super("NO_ACTIVE_WINDOW", message);
  }
}

export class UnknownActionError extends MacroError {
  action: string;
  stepIndex: number;

  constructor(action: string, stepIndex: number) {
    super("UNKNOWN_ACTION", `Unknown action at step ${stepIndex}: ${action}`);
    this.action = action;
    this.stepIndex = stepIndex;
  }
}

export class InjectionFailureError extends MacroError {
  constructor(message: string, options?: MacroErrorOptions) {
    super("INJECTION_FAILURE", message, options);
  }
}

export class MacroSyntaxError extends MacroError {
  constructor(message: string, options?: MacroErrorOptions) {
    super("MACRO_SYNTAX", message, options);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
