import {
  ControlRef,
  DetachedElementError,
  SelectorStep,
  describeError,
  stepFromAttributes,
  stepMatches,
  unwrap,
} from "@uimacro/shared";

export const MAX_ANCESTOR_HOPS = 256;

/** Returns `control` first and `root` last. */
export async function ancestorChain(
  control: ControlRef,
  root: ControlRef,
  maxHops = MAX_ANCESTOR_HOPS,
): Promise<ControlRef[]> {
  const chain: ControlRef[] = [];
  let current = control;

  for (let hops = 0; hops < maxHops; hops += 1) {
    chain.push(current);
    if (current.id === root.id) {
      return chain;
    }
    const parent = await current.parent();
    if (!parent.ok) {
      throw new DetachedElementError(
        `Lost the ancestor chain at ${current.id}: ${describeError(parent.error)}`,
        { cause: parent.error },
      );
    }
    if (parent.value === null) {
      throw new DetachedElementError("Element is not within the given window root");
    }
    current = parent.value;
  }

  throw new DetachedElementError(
    `Window root not reached within ${maxHops} hops from ${control.id}`,
  );
}

// Index among the siblings that share the step's attributes, which is the
// list the resolver indexes into when attribute matching is ambiguous.
async function siblingIndex(
  parent: ControlRef,
  node: ControlRef,
  step: SelectorStep,
): Promise<number | undefined> {
  const siblings = await parent.children();
  if (!siblings.ok) {
    return undefined;
  }
  let index = 0;
  for (const sibling of siblings.value) {
    if (sibling.id === node.id) {
      return index;
    }
    const attrs = await sibling.attributes();
    if (attrs.ok && stepMatches(attrs.value, step)) {
      index += 1;
    }
  }
  return undefined;
}

export async function structuralPath(
  control: ControlRef,
  root: ControlRef,
  maxHops = MAX_ANCESTOR_HOPS,
): Promise<SelectorStep[]> {
  const chain = (await ancestorChain(control, root, maxHops)).reverse();
  const path: SelectorStep[] = [];

  for (let index = 1; index < chain.length; index += 1) {
    const node = chain[index];
    const step = stepFromAttributes(unwrap(await node.attributes()));
    const position = await siblingIndex(chain[index - 1], node, step);
    if (position !== undefined) {
      step.sibling_index = position;
    }
    path.push(step);
  }

  return path;
}
