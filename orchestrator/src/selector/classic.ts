import {
  ControlAttributes,
  ControlRef,
  MacroSyntaxError,
  NotFoundError,
  WindowRef,
} from "@uimacro/shared";
import { compilePattern } from "../desktop/windows";

export const MAX_CLASSIC_NODES = 5_000;

/** Ad hoc find arguments for steps recorded or written without a selector. */
export interface ClassicArgs {
  control?: string;
  stable_id?: string;
  auto_id?: string;
  control_type?: string;
  name?: string;
  name_regex?: string;
}

export interface ClassicMatch {
  control: ControlRef;
  matchedCount: number;
}

interface VisitedNode {
  control: ControlRef;
  attrs: ControlAttributes;
}

export function hasClassicArgs(args: ClassicArgs): boolean {
  return Boolean(
    args.control || args.stable_id || args.auto_id || args.name || args.name_regex,
  );
}

function normalize(text: string): string {
  return text.toLowerCase().replace(/[^a-z0-9]/g, "");
}

// Depth-first, pre-order, capped at `maxNodes`; unreadable subtrees are skipped.
async function descendants(root: ControlRef, maxNodes: number): Promise<VisitedNode[]> {
  const visited: VisitedNode[] = [];
  const stack: ControlRef[] = [];

  const pushChildren = async (node: ControlRef): Promise<void> => {
    const children = await node.children();
    if (children.ok) {
      for (let index = children.value.length - 1; index >= 0; index -= 1) {
        stack.push(children.value[index]);
      }
    }
  };

  await pushChildren(root);
  while (stack.length > 0 && visited.length < maxNodes) {
    const node = stack.pop();
    if (!node) {
      break;
    }
    const attrs = await node.attributes();
    if (attrs.ok) {
      visited.push({ control: node, attrs: attrs.value });
    }
    await pushChildren(node);
  }
  return visited;
}

// 3: name or name+type equals the query; 2: control type equals it;
// 1: the name contains it. Comparison ignores case and punctuation.
function bestMatchScore(attrs: ControlAttributes, query: string): number {
  const name = normalize(attrs.name ?? "");
  const type = normalize(attrs.control_type ?? "");
  if (name.length > 0 && (name === query || name + type === query)) {
    return 3;
  }
  if (type.length > 0 && type === query) {
    return 2;
  }
  if (name.length > 0 && name.includes(query)) {
    return 1;
  }
  return 0;
}

function pickBest(nodes: VisitedNode[], control: string): VisitedNode[] {
  const query = normalize(control);
  let best = 0;
  let winners: VisitedNode[] = [];
  for (const node of nodes) {
    const score = bestMatchScore(node.attrs, query);
    if (score > best) {
      best = score;
      winners = [node];
    } else if (score === best && score > 0) {
      winners.push(node);
    }
  }
  return winners;
}

/**
 * Classic matching inside `window`, in precedence order: `control` best
 * match, then `stable_id` (alias `auto_id`), `name_regex`, `name`; the last
 * three narrow by `control_type` when given. The first match wins.
 */
export async function findClassic(
  window: WindowRef,
  args: ClassicArgs,
  maxNodes = MAX_CLASSIC_NODES,
): Promise<ClassicMatch> {
  const typeMatches = (attrs: ControlAttributes) =>
    !args.control_type || attrs.control_type === args.control_type;
  const stableId = args.stable_id ?? args.auto_id;

  let label: string;
  let select: (nodes: VisitedNode[]) => VisitedNode[];
  if (args.control) {
    const control = args.control;
    label = `best match ${JSON.stringify(control)}`;
    select = (nodes) => pickBest(nodes, control);
  } else if (stableId) {
    label = `stable_id=${JSON.stringify(stableId)}`;
    select = (nodes) =>
      nodes.filter((node) => node.attrs.stable_id === stableId && typeMatches(node.attrs));
  } else if (args.name_regex) {
    const pattern = compilePattern(args.name_regex, "control name");
    label = `name_regex=${JSON.stringify(args.name_regex)}`;
    select = (nodes) =>
      nodes.filter((node) => pattern.test(node.attrs.name ?? "") && typeMatches(node.attrs));
  } else if (args.name) {
    const name = args.name;
    label = `name=${JSON.stringify(name)}`;
    select = (nodes) =>
      nodes.filter((node) => node.attrs.name === name && typeMatches(node.attrs));
  } else {
    throw new MacroSyntaxError("Provide one of: control, stable_id, name, name_regex");
  }

  const matches = select(await descendants(window, maxNodes));
  if (matches.length === 0) {
    throw new NotFoundError(`No control matches ${label} in window ${JSON.stringify(window.title)}`);
  }
  return { control: matches[0].control, matchedCount: matches.length };
}
