import {
  ControlQuery,
  ControlRef,
  MatchAttempt,
  Selector,
  SelectorStep,
  TargetCandidate,
  UnresolvableError,
  WindowDescriptor,
  WindowRef,
  candidateKind,
  describeError,
  describeWindow,
  stepMatches,
} from "@uimacro/shared";
import { WindowLocator } from "../desktop/windows";

export interface ResolveOptions {
  /** Replaces the selector's own window descriptor. */
  window?: WindowDescriptor;
  /** Position of the selector within a step's `selector_candidates`. */
  selectorIndex?: number;
  now?: () => number;
}

export interface Resolution {
  control: ControlRef;
  window: WindowRef;
  candidateIndex: number;
  attempts: MatchAttempt[];
}

type CandidateOutcome =
  | { ok: true; control: ControlRef; matchedCount: number }
  | { ok: false; matchedCount: number; error: string };

function miss(error: string, matchedCount = 0): CandidateOutcome {
  return { ok: false, matchedCount, error };
}

function describeQuery(query: Record<string, string | undefined>): string {
  return Object.entries(query)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
    .join(" ");
}

// Candidates 1 and 2 must identify exactly one descendant; an ambiguous
// match is left to the structural path, which can tell siblings apart.
async function matchIndexed(
  root: ControlRef,
  query: { stable_id?: string; name?: string; control_type: string },
): Promise<CandidateOutcome> {
  const found = await root.findAll(query, "descendants");
  if (!found.ok) {
    return miss(describeError(found.error));
  }
  const count = found.value.length;
  if (count !== 1) {
    return miss(`${count} controls match ${describeQuery(query)}`, count);
  }
  return { ok: true, control: found.value[0], matchedCount: 1 };
}

async function fastChild(parent: ControlRef, step: SelectorStep): Promise<ControlRef | null> {
  if (!step.control_type) {
    return null;
  }
  // With a stable id recorded, only it is looked up; the filter checks the rest.
  let query: ControlQuery | null = null;
  if (step.stable_id) {
    query = { stable_id: step.stable_id, control_type: step.control_type };
  } else if (step.name) {
    query = { name: step.name, control_type: step.control_type };
  }
  if (!query) {
    return null;
  }
  const found = await parent.findAll(query, "children");
  return found.ok && found.value.length === 1 ? found.value[0] : null;
}

/**
 * Walks a structural path from `root`. Each hop tries the indexed fast path
 * and otherwise filters the children by every attribute the hop records,
 * taking `sibling_index` (clamped) among the matches. There is no
 * backtracking: a hop with no match fails the whole path.
 */
export async function resolvePath(root: ControlRef, path: SelectorStep[]): Promise<ControlRef> {
  let current = root;
  for (let hop = 0; hop < path.length; hop += 1) {
    const step = path[hop];
    const fast = await fastChild(current, step);
    if (fast) {
      current = fast;
      continue;
    }

    const children = await current.children();
    if (!children.ok) {
      throw new Error(`Hop ${hop}: ${describeError(children.error)}`);
    }
    const matches: ControlRef[] = [];
    for (const child of children.value) {
      const attrs = await child.attributes();
      if (attrs.ok && stepMatches(attrs.value, step)) {
        matches.push(child);
      }
    }
    if (matches.length === 0) {
      throw new Error(`Hop ${hop}: no child matches ${describeQuery({ ...step, sibling_index: undefined })}`);
    }
    const index = Math.min(Math.max(step.sibling_index ?? 0, 0), matches.length - 1);
    current = matches[index];
  }
  return current;
}

async function matchCandidate(
  window: WindowRef,
  candidate: TargetCandidate,
): Promise<CandidateOutcome> {
  if ("path" in candidate) {
    try {
      return { ok: true, control: await resolvePath(window, candidate.path), matchedCount: 1 };
    } catch (error) {
      return miss(describeError(error));
    }
  }
  if ("stable_id" in candidate) {
    return matchIndexed(window, {
      stable_id: candidate.stable_id,
      control_type: candidate.control_type,
    });
  }
  return matchIndexed(window, { name: candidate.name, control_type: candidate.control_type });
}

/**
 * Resolves a selector to a live control. Candidates are tried in order and
 * the first success wins; every try is logged in the returned attempts.
 * Locating the window may throw NotFound; candidate failures never escape
 * individually, only as an Unresolvable once all are exhausted.
 */
export async function resolveSelector(
  windows: WindowLocator,
  selector: Selector,
  options: ResolveOptions = {},
): Promise<Resolution> {
  const now = options.now ?? Date.now;
  const descriptor = options.window ?? selector.window;
  const window = await windows.locate(descriptor);
  const attempts: MatchAttempt[] = [];
  let lastError = "selector has no candidates";

  for (let index = 0; index < selector.targets.length; index += 1) {
    const candidate = selector.targets[index];
    const started = now();
    const outcome = await matchCandidate(window, candidate);
    const attempt: MatchAttempt = {
      candidate_index: index,
      kind: candidateKind(candidate),
      matched_count: outcome.matchedCount,
      duration_ms: now() - started,
      ok: outcome.ok,
    };
    if (options.selectorIndex !== undefined) {
      attempt.selector_index = options.selectorIndex;
    }
    if (!outcome.ok) {
      attempt.error = outcome.error;
      lastError = outcome.error;
    }
    attempts.push(attempt);

    if (outcome.ok) {
      return { control: outcome.control, window, candidateIndex: index, attempts };
    }
  }

  throw new UnresolvableError(
    `No candidate resolved in window ${describeWindow(descriptor)}: ${lastError}`,
    attempts,
  );
}
