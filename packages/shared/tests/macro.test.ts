import fs from "fs";
import os from "os";
import path from "path";
import { describe, expect, it } from "vitest";
import {
  MacroSyntaxError,
  UnknownActionError,
  loadMacro,
  parseMacro,
  saveMacro,
  stringifyMacro,
} from "../src";

const recorded = `
- action: focus
  args:
    title_regex: "Notepad$"
- action: click
  args:
    selector_candidates:
      - window:
          title: Untitled - Notepad
        targets:
          - name: Text Editor
            control_type: Edit
          - path:
              - control_type: Edit
                sibling_index: 0
    x: 310
    y: 220
    timeout: 20
    delay_before: 1250
- action: type
  args:
    text: hello
    enter: true
    recorded_by: operator
- action: sleep
  args:
    seconds: 0.5
`;

describe("parseMacro", () => {
  it("parses recorded steps and applies defaults", () => {
    const steps = parseMacro(recorded);
    expect(steps.map((step) => step.action)).toEqual(["focus", "click", "type", "sleep"]);

    const click = steps[1];
    if (click.action !== "click") {
      throw new Error("expected click");
    }
    expect(click.args.selector_candidates?.[0].targets).toHaveLength(2);
    expect(click.args.delay_before).toBe(1250);
  });

  it("keeps unrecognised arg keys", () => {
    const steps = parseMacro(recorded);
    expect(steps[2].args).toMatchObject({ recorded_by: "operator", text: "hello" });
  });

  it("treats missing or null args as an empty mapping", () => {
    const steps = parseMacro("- action: sleep\n- action: sleep\n  args: null\n");
    expect(steps).toEqual([
      { action: "sleep", args: { seconds: 1 } },
      { action: "sleep", args: { seconds: 1 } },
    ]);
  });

  it("fails on an unknown action with its index", () => {
    const parse = () => parseMacro("- action: focus\n  args: {title: A}\n- action: teleport\n");
    expect(parse).toThrow(UnknownActionError);
    expect(parse).toThrow("Unknown action at step 1: teleport");
  });

  it("fails on malformed structure", () => {
    expect(() => parseMacro("action: click")).toThrow("Macro YAML must be a list of steps");
    expect(() => parseMacro("- click")).toThrow(
      "Invalid step at index 0: expected mapping with 'action'",
    );
    expect(() => parseMacro("- action: focus\n  args: {}\n")).toThrow(MacroSyntaxError);
  });

  it("returns no steps for an empty document", () => {
    expect(parseMacro("")).toEqual([]);
  });
});

describe("macro files", () => {
  it("round-trips every recorded field", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "macro-"));
    const file = path.join(dir, "nested", "macro.yaml");
    const steps = parseMacro(recorded);

    await saveMacro(file, steps);
    const reloaded = await loadMacro(file);

    expect(reloaded).toEqual(steps);
    expect(parseMacro(stringifyMacro(reloaded))).toEqual(steps);
  });
});
