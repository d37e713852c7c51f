import { describe, expect, it } from "vitest";
import {
  MacroSyntaxError,
  candidateKind,
  describeWindow,
  parseSelector,
  parseSelectorJson,
} from "../src";

describe("parseSelector", () => {
  it("accepts the three candidate shapes in order", () => {
    const selector = parseSelector({
      window: { title: "Untitled - Notepad", pid: 4120 },
      targets: [
        { stable_id: "15", control_type: "Edit", native_class: "Edit" },
        { name: "Text Editor", control_type: "Edit" },
        {
          path: [
            { control_type: "Pane", sibling_index: 0 },
            { control_type: "Edit", name: "Text Editor", sibling_index: 2 },
          ],
        },
      ],
    });

    expect(selector.targets.map(candidateKind)).toEqual(["stable_id", "name", "path"]);
    expect(selector.window).toEqual({ title: "Untitled - Notepad", pid: 4120 });
  });

  it("rejects a window without any locating key", () => {
    expect(() =>
      parseSelector({ window: { pid: 1 }, targets: [{ path: [] }] }),
    ).toThrow(MacroSyntaxError);
  });

  it("rejects an empty target list", () => {
    expect(() => parseSelector({ window: { title: "A" }, targets: [] })).toThrow(
      "Invalid selector: targets:",
    );
  });

  it("wraps JSON syntax errors", () => {
    expect(() => parseSelectorJson("{window")).toThrow("Selector is not valid JSON");
  });
});

describe("describeWindow", () => {
  it("prefers handle, then title, then pattern", () => {
    expect(describeWindow({ handle: 42, title: "A" })).toBe("handle=42");
    expect(describeWindow({ title: "A", title_regex: "B" })).toBe('title="A"');
    expect(describeWindow({ title_regex: "^B" })).toBe('title_regex="^B"');
  });
});
