import { z } from "zod";
import type { ControlAttributes } from "./automation";
import { MacroSyntaxError } from "./errors";

export interface WindowDescriptor {
  title?: string;
  title_regex?: string;
  handle?: number;
  pid?: number;
}

export interface SelectorStep {
  control_type?: string;
  name?: string;
  stable_id?: string;
  native_class?: string;
  sibling_index?: number;
}

export interface StableIdCandidate {
  stable_id: string;
  control_type: string;
  native_class?: string;
}

export interface NameCandidate {
  name: string;
  control_type: string;
  native_class?: string;
}

export interface PathCandidate {
  path: SelectorStep[];
}

// Ranked most to least stable; builder and resolver share this order.
export type TargetCandidate = StableIdCandidate | NameCandidate | PathCandidate;

export type CandidateKind = "stable_id" | "name" | "path";

export interface Selector {
  window: WindowDescriptor;
  targets: TargetCandidate[];
}

export interface MatchAttempt {
  selector_index?: number;
  candidate_index: number;
  kind: CandidateKind | "classic";
  matched_count: number;
  duration_ms: number;
  ok: boolean;
  error?: string;
}

export function candidateKind(candidate: TargetCandidate): CandidateKind {
  if ("path" in candidate) {
    return "path";
  }
  if ("stable_id" in candidate) {
    return "stable_id";
  }
  return "name";
}

/** Set attributes on the step must all match; absent ones are wildcards. */
export function stepMatches(attrs: ControlAttributes, step: SelectorStep): boolean {
  if (step.control_type && attrs.control_type !== step.control_type) {
    return false;
  }
  if (step.stable_id && attrs.stable_id !== step.stable_id) {
    return false;
  }
  if (step.native_class && attrs.native_class !== step.native_class) {
    return false;
  }
  if (step.name && (attrs.name ?? "") !== step.name) {
    return false;
  }
  return true;
}

function present(value?: string): string | undefined {
  return value && value.trim().length > 0 ? value : undefined;
}

export function stepFromAttributes(attrs: ControlAttributes): SelectorStep {
  const step: SelectorStep = {};
  const controlType = present(attrs.control_type);
  const name = present(attrs.name);
  const stableId = present(attrs.stable_id);
  const nativeClass = present(attrs.native_class);
  if (controlType) {
    step.control_type = controlType;
  }
  if (name) {
    step.name = name;
  }
  if (stableId) {
    step.stable_id = stableId;
  }
  if (nativeClass) {
    step.native_class = nativeClass;
  }
  return step;
}

const nonEmpty = z.string().min(1);

export const windowDescriptorSchema = z
  .object({
    title: z.string().optional(),
    title_regex: z.string().optional(),
    handle: z.number().int().optional(),
    pid: z.number().int().optional(),
  })
  .refine(
    (window) =>
      window.title !== undefined ||
      window.title_regex !== undefined ||
      window.handle !== undefined,
    { message: "window needs one of title, title_regex or handle" },
  );

export const selectorStepSchema = z.object({
  control_type: z.string().optional(),
  name: z.string().optional(),
  stable_id: z.string().optional(),
  native_class: z.string().optional(),
  sibling_index: z.number().int().nonnegative().optional(),
});

const pathCandidateSchema = z.object({
  path: z.array(selectorStepSchema),
});

const stableIdCandidateSchema = z.object({
  stable_id: nonEmpty,
  control_type: nonEmpty,
  native_class: z.string().optional(),
});

const nameCandidateSchema = z.object({
  name: nonEmpty,
  control_type: nonEmpty,
  native_class: z.string().optional(),
});

export const targetCandidateSchema = z.union([
  pathCandidateSchema,
  stableIdCandidateSchema,
  nameCandidateSchema,
]);

export const selectorSchema = z.object({
  window: windowDescriptorSchema,
  targets: z.array(targetCandidateSchema).min(1),
});

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${where}: ${issue.message}`;
    })
    .join("; ");
}

export function parseSelector(input: unknown): Selector {
  const parsed = selectorSchema.safeParse(input);
  if (!parsed.success) {
    throw new MacroSyntaxError(`Invalid selector: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function parseSelectorJson(text: string): Selector {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new MacroSyntaxError("Selector is not valid JSON", { cause: error });
  }
  return parseSelector(raw);
}

export function describeWindow(window: WindowDescriptor): string {
  if (window.handle !== undefined) {
    return `handle=${window.handle}`;
  }
  if (window.title !== undefined) {
    return `title=${JSON.stringify(window.title)}`;
  }
  return `title_regex=${JSON.stringify(window.title_regex ?? "")}`;
}
