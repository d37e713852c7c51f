import fs from "fs/promises";
import {
  AutomationEngine,
  InputEventSource,
  KeyEvent,
  Logger,
  MacroSyntaxError,
  PointerEvent,
  Selector,
  parseSelectorJson,
  unwrap,
} from "@uimacro/shared";
import { recordMacro, selectorForElement } from "@uimacro/synthesizer";
import type { BrowserDriver } from "@uimacro/web-runner";
import type { MacroConfig } from "../config/defaults";
import { WindowLocator } from "../desktop/windows";
import { resolveSelector } from "../selector/resolve";
import { MacroEngine } from "../runtime/engine";
import { FileTraceWriter, createRunId } from "../runtime/traces";
import { CliArgs } from "./args";

export interface CliContext {
  config: MacroConfig;
  desktop: AutomationEngine;
  pointer: InputEventSource<PointerEvent>;
  keyboard: InputEventSource<KeyEvent>;
  browser: () => BrowserDriver;
  logger: Logger;
  print: (text: string) => void;
  /** Stops a recording early, e.g. on SIGINT. */
  signal?: AbortSignal;
}

async function readSelector(args: CliArgs): Promise<Selector> {
  if (args.selectorJson !== undefined) {
    return parseSelectorJson(args.selectorJson);
  }
  if (args.selectorFile !== undefined) {
    return parseSelectorJson(await fs.readFile(args.selectorFile, "utf-8"));
  }
  throw new MacroSyntaxError("resolve needs --selector-json or --selector-file");
}

async function runMacro(args: CliArgs, context: CliContext): Promise<void> {
  const macroPath = args.positional[0];
  if (!macroPath) {
    throw new MacroSyntaxError("run needs a macro file");
  }
  const runId = createRunId();
  const traceDir = context.config.runtime.traceDir;
  const engine = new MacroEngine({
    desktop: context.desktop,
    browser: context.browser,
    runtime: context.config.runtime,
    logger: context.logger,
    traces: traceDir ? new FileTraceWriter(traceDir, runId) : undefined,
    runId,
  });
  await engine.runFile(macroPath);
}

async function record(args: CliArgs, context: CliContext): Promise<void> {
  await recordMacro(args.out ?? "macro.yaml", {
    engine: context.desktop,
    pointer: context.pointer,
    keyboard: context.keyboard,
    ...context.config.recorder,
    logger: context.logger,
    verbose: args.verbose,
    signal: context.signal,
  });
}

async function inspect(context: CliContext): Promise<void> {
  const point = await context.desktop.cursorPosition();
  const element = unwrap(await context.desktop.elementFromPoint(point));
  const selector = await selectorForElement(context.desktop, element);
  context.print(JSON.stringify(selector, null, 2));
}

async function resolve(args: CliArgs, context: CliContext): Promise<void> {
  const selector = await readSelector(args);
  const resolution = await resolveSelector(new WindowLocator(context.desktop), selector, {
    window: args.titleRegex !== undefined ? { title_regex: args.titleRegex } : undefined,
  });
  const attributes = unwrap(await resolution.control.attributes());
  const rectangle = await resolution.control.rectangle();
  context.print(
    JSON.stringify(
      {
        window: { handle: resolution.window.handle, title: resolution.window.title },
        candidate_index: resolution.candidateIndex,
        control: { ...attributes, rectangle: rectangle.ok ? rectangle.value : null },
        match_attempts: resolution.attempts,
      },
      null,
      2,
    ),
  );
}

export async function runCommand(args: CliArgs, context: CliContext): Promise<void> {
  switch (args.command) {
    case "run":
      return runMacro(args, context);
    case "record":
      return record(args, context);
    case "inspect":
      return inspect(context);
    case "resolve":
      return resolve(args, context);
    default:
      throw new MacroSyntaxError("No command given");
  }
}
