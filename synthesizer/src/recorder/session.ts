import {
  AutomationEngine,
  InputEventSource,
  KeyEvent,
  Logger,
  MacroStep,
  Point,
  PointerEvent,
  Result,
  Selector,
  attempt,
  consoleLogger,
  describeError,
  saveMacro,
} from "@uimacro/shared";
import { selectorForElement } from "../candidates/desktop";
import { classifyKey } from "./keys";
import {
  RecorderState,
  TransitionContext,
  TransitionLock,
  createRecorderState,
  enterKey,
  idleTick,
  keystroke,
  pointerPress,
  specialKey,
  stopRecording,
} from "./state";

export interface PassiveRecorderOptions {
  engine: AutomationEngine;
  pointer: InputEventSource<PointerEvent>;
  keyboard: InputEventSource<KeyEvent>;
  idleFlushMs?: number;
  idlePollMs?: number;
  stopKey?: string;
  stepTimeoutSec?: number;
  now?: () => number;
  logger?: Logger;
  verbose?: boolean;
  /** Aborting stops the recording as the stop key would. */
  signal?: AbortSignal;
}

export const recorderDefaults = {
  idleFlushMs: 1_500,
  idlePollMs: 250,
  stopKey: "F9",
  stepTimeoutSec: 20,
};

export class PassiveRecorder {
  private engine: AutomationEngine;
  private pointer: InputEventSource<PointerEvent>;
  private keyboard: InputEventSource<KeyEvent>;
  private idleFlushMs: number;
  private idlePollMs: number;
  private stopKey: string;
  private stepTimeoutSec: number;
  private now: () => number;
  private logger: Logger;
  private verbose: boolean;
  private signal?: AbortSignal;
  private state: RecorderState = createRecorderState();
  private lock = new TransitionLock();
  private queue: Promise<void> = Promise.resolve();
  private idleTimer: NodeJS.Timeout | null = null;
  private started = false;
  private stopRequested = false;
  private idleTickQueued = false;
  private markStopped: (() => void) | null = null;
  private stopped = new Promise<void>((resolve) => {
    this.markStopped = resolve;
  });

  constructor(options: PassiveRecorderOptions) {
    this.engine = options.engine;
    this.pointer = options.pointer;
    this.keyboard = options.keyboard;
    this.idleFlushMs = options.idleFlushMs ?? recorderDefaults.idleFlushMs;
    this.idlePollMs = options.idlePollMs ?? recorderDefaults.idlePollMs;
    this.stopKey = options.stopKey ?? recorderDefaults.stopKey;
    this.stepTimeoutSec = options.stepTimeoutSec ?? recorderDefaults.stepTimeoutSec;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? consoleLogger;
    this.verbose = options.verbose ?? false;
    this.signal = options.signal;
  }

  get steps(): MacroStep[] {
    return [...this.state.steps];
  }

  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    this.started = true;

    await this.pointer.start((event) => this.onPointer(event));
    await this.keyboard.start((event) => this.onKey(event));
    this.idleTimer = setInterval(() => this.onIdleTick(), this.idlePollMs);
    if (this.signal?.aborted) {
      this.requestStop();
    } else {
      this.signal?.addEventListener("abort", () => this.requestStop(), { once: true });
    }

    this.logger.info(`[record] started; press ${this.stopKey} to stop`);
  }

  requestStop(): void {
    if (this.stopRequested) {
      return;
    }
    this.stopRequested = true;
    const at = this.now();
    this.enqueue(async () => {
      const flushed = this.lock.run(() => stopRecording(this.state, this.context(at)));
      this.report(flushed);
      this.markStopped?.();
    });
  }

  async waitForStop(): Promise<MacroStep[]> {
    await this.stopped;
    if (this.idleTimer) {
      clearInterval(this.idleTimer);
      this.idleTimer = null;
    }
    await this.pointer.stop();
    await this.keyboard.stop();
    this.logger.info(`[record] stopped; ${this.state.steps.length} step(s) recorded`);
    return this.steps;
  }

  async record(): Promise<MacroStep[]> {
    await this.start();
    return this.waitForStop();
  }

  private context(now: number): TransitionContext {
    return { now, stepTimeoutSec: this.stepTimeoutSec };
  }

  private enqueue(task: () => Promise<void>): void {
    this.queue = this.queue.then(task).catch((error: unknown) => {
      this.logger.error(`[record] event handling failed: ${describeError(error)}`);
    });
  }

  private onPointer(event: PointerEvent): void {
    if (event.button !== "left" || !event.pressed || this.stopRequested) {
      return;
    }
    const at = this.now();
    const point = { x: event.x, y: event.y };
    this.enqueue(() => this.handlePress(point, at));
  }

  private onKey(event: KeyEvent): void {
    if (this.stopRequested) {
      return;
    }
    const at = this.now();
    const kind = classifyKey(event, this.stopKey);
    switch (kind) {
      case "stop":
        this.requestStop();
        return;
      case "printable": {
        const char = event.char ?? "";
        this.enqueue(async () => {
          this.lock.run(() => keystroke(this.state, this.context(at), char));
        });
        return;
      }
      case "enter":
        this.enqueue(async () => {
          this.report(this.lock.run(() => enterKey(this.state, this.context(at))));
        });
        return;
      default:
        this.enqueue(async () => {
          this.report(this.lock.run(() => specialKey(this.state, this.context(at))));
        });
    }
  }

  // Ticks join the event queue so a flush never overtakes a pending click.
  private onIdleTick(): void {
    if (this.stopRequested || this.idleTickQueued) {
      return;
    }
    this.idleTickQueued = true;
    const at = this.now();
    this.enqueue(async () => {
      this.idleTickQueued = false;
      this.report(
        this.lock.run(() => idleTick(this.state, this.context(at), this.idleFlushMs)),
      );
    });
  }

  private async handlePress(point: Point, at: number): Promise<void> {
    // Tree lookups happen outside the lock; only the result is passed in.
    const lookup = await this.lookup(point);
    if (!lookup.ok) {
      this.logger.warn(
        `[record] lookup failed at (${point.x},${point.y}); recording coordinates only: ${describeError(lookup.error)}`,
      );
    }
    const selector = lookup.ok ? lookup.value : null;
    this.report(
      this.lock.run(() => pointerPress(this.state, this.context(at), point, selector)),
    );
  }

  private async lookup(point: Point): Promise<Result<Selector>> {
    const element = await this.engine.elementFromPoint(point);
    if (!element.ok) {
      return element;
    }
    return attempt(() => selectorForElement(this.engine, element.value));
  }

  private report(steps: MacroStep[]): void {
    if (!this.verbose) {
      return;
    }
    for (const step of steps) {
      this.logger.info(`[record] ${describeRecordedStep(step)}`);
    }
  }
}

export function describeRecordedStep(step: MacroStep): string {
  switch (step.action) {
    case "click": {
      const selector = step.args.selector_candidates?.[0];
      const where = `(${step.args.x ?? "?"},${step.args.y ?? "?"})`;
      if (!selector) {
        return `click coords-only ${where}`;
      }
      const first = selector.targets[0];
      const control = "name" in first ? first.name : "stable_id" in first ? first.stable_id : "path";
      return `click window=${JSON.stringify(selector.window.title ?? "")} ctrl=${JSON.stringify(control)} ${where}`;
    }
    case "type":
      return `${step.args.enter ? "type+enter" : "type"} ${JSON.stringify(step.args.text)}`;
    default:
      return step.action;
  }
}

export async function recordMacro(
  outPath: string,
  options: PassiveRecorderOptions,
): Promise<MacroStep[]> {
  const recorder = new PassiveRecorder(options);
  const steps = await recorder.record();
  const saved = await saveMacro(outPath, steps);
  (options.logger ?? consoleLogger).info(`[record] saved ${steps.length} step(s) to ${saved}`);
  return steps;
}
