import fs from "fs/promises";
import path from "path";
import { parse, stringify } from "yaml";
import { z } from "zod";
import { MacroSyntaxError, UnknownActionError } from "./errors";
import { formatIssues, selectorSchema } from "./selector";

export const MACRO_ACTIONS = [
  "focus",
  "click",
  "type",
  "sleep",
  "start-app",
  "drag",
  "browser-open",
  "browser-navigate",
  "browser-click",
  "browser-type",
  "browser-eval",
] as const;

export type MacroAction = (typeof MACRO_ACTIONS)[number];

export function isMacroAction(value: string): value is MacroAction {
  return MACRO_ACTIONS.some((action) => action === value);
}

const timing = {
  delay_before: z.number().nonnegative().optional(),
};

const windowFields = {
  title: z.string().optional(),
  title_regex: z.string().optional(),
  handle: z.number().int().optional(),
};

const locateFields = {
  ...timing,
  selector: selectorSchema.optional(),
  selector_candidates: z.array(selectorSchema).optional(),
  control: z.string().optional(),
  stable_id: z.string().optional(),
  auto_id: z.string().optional(),
  control_type: z.string().optional(),
  name: z.string().optional(),
  name_regex: z.string().optional(),
  x: z.number().optional(),
  y: z.number().optional(),
  window_title_regex: z.string().optional(),
  timeout: z.number().nonnegative().optional(),
};

export const focusArgsSchema = z
  .object({ ...timing, ...windowFields, pid: z.number().int().optional() })
  .passthrough()
  .refine(
    (args) =>
      args.title !== undefined ||
      args.title_regex !== undefined ||
      args.handle !== undefined,
    { message: "focus needs one of title, title_regex or handle" },
  );

export const clickArgsSchema = z.object(locateFields).passthrough();

export const typeArgsSchema = z
  .object({
    ...locateFields,
    text: z.string().default(""),
    enter: z.boolean().default(false),
  })
  .passthrough();

export const sleepArgsSchema = z
  .object({ ...timing, seconds: z.number().nonnegative().default(1) })
  .passthrough();

export const startAppArgsSchema = z
  .object({
    ...timing,
    app: z.string().min(1),
    delay_ms: z.number().int().nonnegative().default(250),
  })
  .passthrough();

export const dragArgsSchema = z
  .object({
    ...timing,
    ...windowFields,
    start_x: z.number(),
    start_y: z.number(),
    end_x: z.number(),
    end_y: z.number(),
    duration_ms: z.number().int().nonnegative().default(600),
    steps: z.number().int().positive().default(40),
  })
  .passthrough();

export const browserOpenArgsSchema = z
  .object({
    ...timing,
    url: z.string().min(1),
    browser: z.enum(["chromium", "firefox", "webkit"]).optional(),
    headless: z.boolean().optional(),
  })
  .passthrough();

export const browserNavigateArgsSchema = z
  .object({ ...timing, url: z.string().min(1) })
  .passthrough();

export const browserClickArgsSchema = z
  .object({
    ...timing,
    selector: z.string().optional(),
    text: z.string().optional(),
    exact: z.boolean().default(false),
  })
  .passthrough()
  .refine((args) => args.selector !== undefined || args.text !== undefined, {
    message: "browser-click needs selector or text",
  });

export const browserTypeArgsSchema = z
  .object({
    ...timing,
    selector: z.string().min(1),
    text: z.string(),
    clear: z.boolean().default(true),
    enter: z.boolean().default(false),
  })
  .passthrough();

export const browserEvalArgsSchema = z
  .object({ ...timing, script: z.string().min(1) })
  .passthrough();

export const macroStepSchema = z.discriminatedUnion("action", [
  z.object({ action: z.literal("focus"), args: focusArgsSchema }),
  z.object({ action: z.literal("click"), args: clickArgsSchema }),
  z.object({ action: z.literal("type"), args: typeArgsSchema }),
  z.object({ action: z.literal("sleep"), args: sleepArgsSchema }),
  z.object({ action: z.literal("start-app"), args: startAppArgsSchema }),
  z.object({ action: z.literal("drag"), args: dragArgsSchema }),
  z.object({ action: z.literal("browser-open"), args: browserOpenArgsSchema }),
  z.object({
    action: z.literal("browser-navigate"),
    args: browserNavigateArgsSchema,
  }),
  z.object({ action: z.literal("browser-click"), args: browserClickArgsSchema }),
  z.object({ action: z.literal("browser-type"), args: browserTypeArgsSchema }),
  z.object({ action: z.literal("browser-eval"), args: browserEvalArgsSchema }),
]);

export type MacroStep = z.infer<typeof macroStepSchema>;
export type MacroStepInput = z.input<typeof macroStepSchema>;
export type StepOf<A extends MacroAction> = Extract<MacroStep, { action: A }>;
export type ClickArgs = StepOf<"click">["args"];
export type TypeArgs = StepOf<"type">["args"];
export type LocateArgs = ClickArgs | TypeArgs;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseMacroStep(item: unknown, index: number): MacroStep {
  if (!isRecord(item) || typeof item.action !== "string") {
    throw new MacroSyntaxError(
      `Invalid step at index ${index}: expected mapping with 'action'`,
    );
  }
  if (!isMacroAction(item.action)) {
    throw new UnknownActionError(item.action, index);
  }
  const args = item.args ?? {};
  if (!isRecord(args)) {
    throw new MacroSyntaxError(
      `Invalid step at index ${index}: 'args' must be a mapping`,
    );
  }
  const parsed = macroStepSchema.safeParse({ action: item.action, args });
  if (!parsed.success) {
    throw new MacroSyntaxError(
      `Invalid args for step ${index} (${item.action}): ${formatIssues(parsed.error)}`,
    );
  }
  return parsed.data;
}

export function parseMacro(text: string): MacroStep[] {
  let data: unknown;
  try {
    data = parse(text);
  } catch (error) {
    throw new MacroSyntaxError("Macro is not valid YAML", { cause: error });
  }
  if (data === null || data === undefined) {
    return [];
  }
  if (!Array.isArray(data)) {
    throw new MacroSyntaxError("Macro YAML must be a list of steps");
  }
  return data.map((item, index) => parseMacroStep(item, index));
}

export function stringifyMacro(steps: readonly MacroStepInput[]): string {
  return stringify(steps);
}

export async function loadMacro(filePath: string): Promise<MacroStep[]> {
  const raw = await fs.readFile(path.resolve(filePath), "utf-8");
  return parseMacro(raw);
}

export async function saveMacro(
  filePath: string,
  steps: readonly MacroStepInput[],
): Promise<string> {
  const resolved = path.resolve(filePath);
  await fs.mkdir(path.dirname(resolved), { recursive: true });
  await fs.writeFile(resolved, stringifyMacro(steps), "utf-8");
  return resolved;
}
