import {
  AutomationEngine,
  ClickArgs,
  ControlRef,
  LocateArgs,
  Logger,
  MacroError,
  MacroStep,
  MacroSyntaxError,
  MatchAttempt,
  NoActiveWindowError,
  Point,
  Selector,
  StepOf,
  TypeArgs,
  UnresolvableError,
  WindowDescriptor,
  WindowRef,
  consoleLogger,
  describeError,
  loadMacro,
  unwrap,
} from "@uimacro/shared";
import type { BrowserDriver } from "@uimacro/web-runner";
import { RuntimeConfig, defaultConfig } from "../config/defaults";
import { WindowLocator } from "../desktop/windows";
import { findClassic, hasClassicArgs } from "../selector/classic";
import { resolveSelector } from "../selector/resolve";
import { RuntimeClock, clampDelay, systemClock } from "./timing";
import { StepTrace, TraceWriter, createRunId } from "./traces";

export interface MacroEngineOptions {
  desktop: AutomationEngine;
  /** Creates the browser driver on the first `browser-*` step. */
  browser?: () => BrowserDriver;
  runtime?: Partial<RuntimeConfig>;
  clock?: RuntimeClock;
  logger?: Logger;
  traces?: TraceWriter;
  runId?: string;
}

export interface RunSummary {
  runId: string;
  steps: number;
  degraded: number;
}

interface StepOutcome {
  degraded: boolean;
  attempts: MatchAttempt[];
}

interface Located {
  control: ControlRef;
  attempts: MatchAttempt[];
}

type TargetPlan =
  | { kind: "selectors"; selectors: Selector[] }
  | { kind: "classic" }
  | { kind: "none" };

function planTarget(args: LocateArgs): TargetPlan {
  const candidates = args.selector_candidates ?? [];
  if (candidates.length > 0) {
    return { kind: "selectors", selectors: candidates };
  }
  if (args.selector) {
    return { kind: "selectors", selectors: [args.selector] };
  }
  if (hasClassicArgs(args)) {
    return { kind: "classic" };
  }
  return { kind: "none" };
}

function pointOf(args: ClickArgs): Point | null {
  if (args.x === undefined || args.y === undefined) {
    return null;
  }
  return { x: args.x, y: args.y };
}

function windowFields(args: WindowDescriptor): WindowDescriptor | null {
  const descriptor: WindowDescriptor = {};
  if (args.handle !== undefined) {
    descriptor.handle = args.handle;
  }
  if (args.title !== undefined) {
    descriptor.title = args.title;
  }
  if (args.title_regex !== undefined) {
    descriptor.title_regex = args.title_regex;
  }
  return Object.keys(descriptor).length > 0 ? descriptor : null;
}

// Syntax errors and a missing focus do not get better by waiting.
function isRetryable(error: unknown): boolean {
  return !(error instanceof MacroSyntaxError || error instanceof NoActiveWindowError);
}

function isResolutionFailure(error: unknown): boolean {
  return error instanceof UnresolvableError || error instanceof NoActiveWindowError;
}

/**
 * Replays macro steps strictly in order. `current_window` starts empty and
 * moves on every `focus` step and every selector resolution; classic find
 * arguments are matched inside it.
 */
export class MacroEngine {
  readonly runId: string;
  private desktop: AutomationEngine;
  private windows: WindowLocator;
  private browserFactory?: () => BrowserDriver;
  private browserDriver: BrowserDriver | null = null;
  private runtime: RuntimeConfig;
  private clock: RuntimeClock;
  private logger: Logger;
  private traces?: TraceWriter;
  private currentWindow: WindowRef | null = null;

  constructor(options: MacroEngineOptions) {
    this.desktop = options.desktop;
    this.windows = new WindowLocator(options.desktop);
    this.browserFactory = options.browser;
    this.runtime = { ...defaultConfig.runtime, ...(options.runtime ?? {}) };
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? consoleLogger;
    this.traces = options.traces;
    this.runId = options.runId ?? createRunId();
  }

  get activeWindow(): WindowRef | null {
    return this.currentWindow;
  }

  /** Loads and validates the whole macro before the first step runs. */
  async runFile(macroPath: string): Promise<RunSummary> {
    const steps = await loadMacro(macroPath);
    return this.run(steps);
  }

  async run(steps: readonly MacroStep[]): Promise<RunSummary> {
    this.currentWindow = null;
    let degraded = 0;
    this.logger.info(`[run:${this.runId}] ${steps.length} step(s)`);

    try {
      for (let index = 0; index < steps.length; index += 1) {
        const outcome = await this.runStep(steps[index], index);
        if (outcome.degraded) {
          degraded += 1;
        }
      }
    } finally {
      await this.closeBrowser();
    }

    this.logger.info(
      `[run:${this.runId}] finished ${steps.length} step(s), ${degraded} degraded`,
    );
    return { runId: this.runId, steps: steps.length, degraded };
  }

  async runStep(step: MacroStep, index: number): Promise<StepOutcome> {
    const startedAt = new Date().toISOString();
    this.logger.info(`[run:${this.runId}] step ${index} (${step.action})`);

    try {
      const delay = clampDelay(step.args.delay_before, this.runtime.maxStepDelayMs);
      if (delay > 0) {
        await this.clock.sleep(delay);
      }
      const outcome = await this.execute(step, index);
      await this.trace({
        run_id: this.runId,
        step_index: index,
        action: step.action,
        started_at: startedAt,
        ended_at: new Date().toISOString(),
        ok: true,
        degraded: outcome.degraded,
        match_attempts: outcome.attempts,
      });
      return outcome;
    } catch (error) {
      const message = describeError(error);
      this.logger.error(`[run:${this.runId}] step ${index} (${step.action}) failed: ${message}`);
      const trace: StepTrace = {
        run_id: this.runId,
        step_index: index,
        action: step.action,
        started_at: startedAt,
        ended_at: new Date().toISOString(),
        ok: false,
        degraded: false,
        match_attempts: error instanceof UnresolvableError ? error.attempts : [],
        error: message,
      };
      if (error instanceof MacroError) {
        trace.error_code = error.code;
      }
      await this.trace(trace);
      throw error;
    }
  }

  private async execute(step: MacroStep, index: number): Promise<StepOutcome> {
    switch (step.action) {
      case "focus": {
        const descriptor = windowFields(step.args);
        if (!descriptor) {
          throw new MacroSyntaxError(`Step ${index} (focus) needs title, title_regex or handle`);
        }
        this.currentWindow = await this.windows.locateAndFocus(descriptor);
        return { degraded: false, attempts: [] };
      }
      case "click":
        return this.click(step.args, index);
      case "type":
        return this.type(step.args, index);
      case "sleep":
        await this.clock.sleep(step.args.seconds * 1_000);
        return { degraded: false, attempts: [] };
      case "start-app":
        await this.desktop.launchApp(step.args.app, { delayMs: step.args.delay_ms });
        return { degraded: false, attempts: [] };
      case "drag":
        await this.drag(step.args);
        return { degraded: false, attempts: [] };
      case "browser-open":
      case "browser-navigate":
      case "browser-click":
      case "browser-type":
      case "browser-eval":
        await this.browserStep(step);
        return { degraded: false, attempts: [] };
      default: {
        const unhandled: never = step;
        throw new Error(`Unhandled step ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private async click(args: ClickArgs, index: number): Promise<StepOutcome> {
    const point = pointOf(args);
    const plan = planTarget(args);

    if (plan.kind === "none") {
      if (!point) {
        throw new MacroSyntaxError(
          `Step ${index} (click) needs a selector, find arguments or x/y coordinates`,
        );
      }
      return this.clickAtPoint(point, index, "no selector recorded");
    }

    try {
      const located = await this.locate(args, plan, index, "click");
      await located.control.click();
      return { degraded: false, attempts: located.attempts };
    } catch (error) {
      if (!point || !isResolutionFailure(error)) {
        throw error;
      }
      const outcome = await this.clickAtPoint(point, index, describeError(error));
      return {
        degraded: outcome.degraded,
        attempts: error instanceof UnresolvableError ? error.attempts : [],
      };
    }
  }

  private async clickAtPoint(point: Point, index: number, reason: string): Promise<StepOutcome> {
    this.logger.warn(
      `[run:${this.runId}] step ${index} (click) degraded to coordinates (${point.x},${point.y}): ${reason}`,
    );
    await this.desktop.clickAt(point);
    return { degraded: true, attempts: [] };
  }

  private async type(args: TypeArgs, index: number): Promise<StepOutcome> {
    const plan = planTarget(args);
    const located = await this.locate(args, plan, index, "type");
    await located.control.setText(args.text, { enter: args.enter });
    return { degraded: false, attempts: located.attempts };
  }

  private async drag(args: StepOf<"drag">["args"]): Promise<void> {
    let offset: Point = { x: 0, y: 0 };
    const descriptor = windowFields(args);
    if (descriptor) {
      const window = await this.windows.locateAndFocus(descriptor);
      this.currentWindow = window;
      const rect = unwrap(await window.rectangle());
      offset = { x: rect.left, y: rect.top };
    }
    await this.desktop.drag(
      { x: args.start_x + offset.x, y: args.start_y + offset.y },
      { x: args.end_x + offset.x, y: args.end_y + offset.y },
      { durationMs: args.duration_ms, steps: args.steps },
    );
  }

  /**
   * Resolves a click/type target, retrying until the step timeout elapses.
   * Every failure leaves as Unresolvable except syntax errors and a missing
   * focus, which surface immediately.
   */
  private async locate(
    args: LocateArgs,
    plan: TargetPlan,
    index: number,
    action: "click" | "type",
  ): Promise<Located> {
    if (plan.kind === "none") {
      throw new UnresolvableError(`Step ${index} (${action}) has no selector or find arguments`, []);
    }

    const timeoutMs =
      args.timeout !== undefined ? args.timeout * 1_000 : this.runtime.defaultTimeoutMs;
    const deadline = this.clock.now() + timeoutMs;
    let lastError: unknown = null;
    let attempts: MatchAttempt[] = [];

    for (;;) {
      try {
        return plan.kind === "selectors"
          ? await this.resolveSelectors(plan.selectors, args)
          : await this.resolveClassic(args);
      } catch (error) {
        if (!isRetryable(error)) {
          throw error;
        }
        lastError = error;
        if (error instanceof UnresolvableError) {
          attempts = error.attempts;
        }
      }

      const remaining = deadline - this.clock.now();
      if (remaining <= 0) {
        break;
      }
      await this.clock.sleep(Math.min(this.runtime.pollIntervalMs, remaining));
    }

    throw new UnresolvableError(
      `Step ${index} (${action}) unresolved after ${timeoutMs} ms: ${describeError(lastError)}`,
      attempts,
      { cause: lastError },
    );
  }

  private async resolveSelectors(selectors: Selector[], args: LocateArgs): Promise<Located> {
    const window: WindowDescriptor | undefined = args.window_title_regex
      ? { title_regex: args.window_title_regex }
      : undefined;
    const attempts: MatchAttempt[] = [];
    let lastError: unknown = null;

    for (let index = 0; index < selectors.length; index += 1) {
      try {
        const resolution = await resolveSelector(this.windows, selectors[index], {
          window,
          selectorIndex: index,
          now: () => this.clock.now(),
        });
        attempts.push(...resolution.attempts);
        this.currentWindow = resolution.window;
        return { control: resolution.control, attempts };
      } catch (error) {
        if (error instanceof MacroSyntaxError) {
          throw error;
        }
        if (error instanceof UnresolvableError) {
          attempts.push(...error.attempts);
        }
        lastError = error;
      }
    }

    throw new UnresolvableError(
      selectors.length === 1
        ? describeError(lastError)
        : `None of ${selectors.length} selectors resolved; last: ${describeError(lastError)}`,
      attempts,
      { cause: lastError },
    );
  }

  private async resolveClassic(args: LocateArgs): Promise<Located> {
    const window = this.currentWindow;
    if (!window) {
      throw new NoActiveWindowError();
    }
    const started = this.clock.now();
    try {
      const match = await findClassic(window, args);
      return {
        control: match.control,
        attempts: [
          {
            candidate_index: 0,
            kind: "classic",
            matched_count: match.matchedCount,
            duration_ms: this.clock.now() - started,
            ok: true,
          },
        ],
      };
    } catch (error) {
      if (error instanceof MacroSyntaxError) {
        throw error;
      }
      throw new UnresolvableError(
        describeError(error),
        [
          {
            candidate_index: 0,
            kind: "classic",
            matched_count: 0,
            duration_ms: this.clock.now() - started,
            ok: false,
            error: describeError(error),
          },
        ],
        { cause: error },
      );
    }
  }

  private driver(): BrowserDriver {
    if (!this.browserDriver) {
      if (!this.browserFactory) {
        throw new Error("Browser steps need a browser driver");
      }
      this.browserDriver = this.browserFactory();
    }
    return this.browserDriver;
  }

  private async browserStep(
    step: StepOf<
      "browser-open" | "browser-navigate" | "browser-click" | "browser-type" | "browser-eval"
    >,
  ): Promise<void> {
    const driver = this.driver();
    switch (step.action) {
      case "browser-open": {
        const page = await driver.open({
          url: step.args.url,
          browser: step.args.browser,
          headless: step.args.headless,
        });
        this.logger.info(`[run:${this.runId}] browser at ${page.url} (${page.title ?? ""})`);
        return;
      }
      case "browser-navigate": {
        const page = await driver.navigate(step.args.url);
        this.logger.info(`[run:${this.runId}] browser at ${page.url}`);
        return;
      }
      case "browser-click":
        await driver.click({
          selector: step.args.selector,
          text: step.args.text,
          exact: step.args.exact,
        });
        return;
      case "browser-type":
        await driver.type({
          selector: step.args.selector,
          text: step.args.text,
          clear: step.args.clear,
          enter: step.args.enter,
        });
        return;
      case "browser-eval": {
        const evaluated = await driver.evaluate(step.args.script);
        this.logger.info(`[run:${this.runId}] eval result: ${JSON.stringify(evaluated.result)}`);
        return;
      }
    }
  }

  private async closeBrowser(): Promise<void> {
    const driver = this.browserDriver;
    this.browserDriver = null;
    if (driver) {
      await driver.close();
    }
  }

  private async trace(trace: StepTrace): Promise<void> {
    if (this.traces) {
      await this.traces.write(trace);
    }
  }
}
