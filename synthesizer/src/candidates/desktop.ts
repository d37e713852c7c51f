import {
  AutomationEngine,
  ControlAttributes,
  ControlRef,
  Selector,
  SelectorStep,
  TargetCandidate,
  WindowDescriptor,
  WindowRef,
  unwrap,
} from "@uimacro/shared";
import { structuralPath } from "../path/ancestry";

function hasValue(value?: string): value is string {
  return Boolean(value && value.trim().length > 0);
}

function addCandidate(
  targets: TargetCandidate[],
  candidate: TargetCandidate,
  nativeClass?: string,
): void {
  if (hasValue(nativeClass) && !("path" in candidate)) {
    targets.push({ ...candidate, native_class: nativeClass });
    return;
  }
  targets.push(candidate);
}

export function buildTargetCandidates(
  attrs: ControlAttributes,
  path: SelectorStep[],
): TargetCandidate[] {
  const targets: TargetCandidate[] = [];
  const controlType = attrs.control_type;

  if (hasValue(attrs.stable_id) && hasValue(controlType)) {
    addCandidate(
      targets,
      { stable_id: attrs.stable_id, control_type: controlType },
      attrs.native_class,
    );
  }
  if (hasValue(attrs.name) && hasValue(controlType)) {
    addCandidate(
      targets,
      { name: attrs.name, control_type: controlType },
      attrs.native_class,
    );
  }
  targets.push({ path });

  return targets;
}

export function describeWindowRoot(window: WindowRef): WindowDescriptor {
  const descriptor: WindowDescriptor = hasValue(window.title)
    ? { title: window.title }
    : { handle: window.handle };
  if (window.pid !== undefined) {
    descriptor.pid = window.pid;
  }
  return descriptor;
}

export async function buildSelector(
  control: ControlRef,
  windowRoot: WindowRef,
): Promise<Selector> {
  const attrs = unwrap(await control.attributes());
  const path = await structuralPath(control, windowRoot);
  return {
    window: describeWindowRoot(windowRoot),
    targets: buildTargetCandidates(attrs, path),
  };
}

export async function selectorForElement(
  engine: AutomationEngine,
  control: ControlRef,
): Promise<Selector> {
  const windowRoot = unwrap(await engine.windowOf(control));
  return buildSelector(control, windowRoot);
}
