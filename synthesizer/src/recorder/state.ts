import type { MacroStep, Point, Selector } from "@uimacro/shared";

export type RecorderPhase = "idle" | "accumulating" | "stopped";

export interface RecorderState {
  phase: RecorderPhase;
  buffer: string[];
  lastSelector: Selector | null;
  lastKeyAt: number | null;
  lastStepAt: number | null;
  steps: MacroStep[];
}

export interface TransitionContext {
  now: number;
  stepTimeoutSec: number;
}

export function createRecorderState(): RecorderState {
  return {
    phase: "idle",
    buffer: [],
    lastSelector: null,
    lastKeyAt: null,
    lastStepAt: null,
    steps: [],
  };
}

/**
 * Serializes recorder transitions. Transitions are synchronous, so the lock
 * is never held across an engine call; re-entry is a programming error.
 */
export class TransitionLock {
  private held = false;

  get locked(): boolean {
    return this.held;
  }

  run<T>(transition: () => T): T {
    if (this.held) {
      throw new Error("Recorder transition attempted while another is in progress");
    }
    this.held = true;
    try {
      return transition();
    } finally {
      this.held = false;
    }
  }
}

function takeDelay(state: RecorderState, now: number): number {
  const last = state.lastStepAt;
  state.lastStepAt = now;
  return last === null ? 0 : Math.max(0, Math.round(now - last));
}

function flushText(
  state: RecorderState,
  ctx: TransitionContext,
  enter: boolean,
): MacroStep | null {
  const text = state.buffer.join("");
  if (text.length === 0 && !enter) {
    return null;
  }

  const selector = state.lastSelector;
  let step: MacroStep | null = null;
  if (selector !== null || text.length > 0) {
    step = {
      action: "type",
      args: {
        selector_candidates: selector ? [selector] : [],
        text,
        enter,
        timeout: ctx.stepTimeoutSec,
        delay_before: takeDelay(state, ctx.now),
      },
    };
    state.steps.push(step);
  }

  state.buffer = [];
  state.lastKeyAt = null;
  state.phase = "idle";
  return step;
}

function emitted(step: MacroStep | null): MacroStep[] {
  return step ? [step] : [];
}

export function keystroke(state: RecorderState, ctx: TransitionContext, char: string): void {
  if (state.phase === "stopped") {
    return;
  }
  state.buffer.push(char);
  state.lastKeyAt = ctx.now;
  state.phase = "accumulating";
}

export function enterKey(state: RecorderState, ctx: TransitionContext): MacroStep[] {
  if (state.phase === "stopped") {
    return [];
  }
  return emitted(flushText(state, ctx, true));
}

export function specialKey(state: RecorderState, ctx: TransitionContext): MacroStep[] {
  if (state.phase === "stopped") {
    return [];
  }
  return emitted(flushText(state, ctx, false));
}

export function pointerPress(
  state: RecorderState,
  ctx: TransitionContext,
  point: Point,
  selector: Selector | null,
): MacroStep[] {
  if (state.phase === "stopped") {
    return [];
  }
  // A click moves focus, so pending text belongs to the previous target.
  const out = emitted(flushText(state, ctx, false));

  state.lastSelector = selector;
  const step: MacroStep = {
    action: "click",
    args: {
      ...(selector ? { selector_candidates: [selector] } : {}),
      x: point.x,
      y: point.y,
      timeout: ctx.stepTimeoutSec,
      delay_before: takeDelay(state, ctx.now),
    },
  };
  state.steps.push(step);
  out.push(step);
  return out;
}

export function idleTick(
  state: RecorderState,
  ctx: TransitionContext,
  idleFlushMs: number,
): MacroStep[] {
  if (
    state.phase !== "accumulating" ||
    state.buffer.length === 0 ||
    state.lastKeyAt === null ||
    ctx.now - state.lastKeyAt <= idleFlushMs
  ) {
    return [];
  }
  return emitted(flushText(state, ctx, false));
}

export function stopRecording(state: RecorderState, ctx: TransitionContext): MacroStep[] {
  if (state.phase === "stopped") {
    return [];
  }
  const out = emitted(flushText(state, ctx, false));
  state.phase = "stopped";
  return out;
}
