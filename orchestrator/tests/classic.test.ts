import { describe, expect, it } from "vitest";
import { MacroSyntaxError, NotFoundError } from "@uimacro/shared";
import { findClassic, hasClassicArgs } from "../src/selector/classic";
import { officeDesktop } from "./support/desktops";

describe("findClassic", () => {
  it("scores best matches by name, then type, then substring", async () => {
    const { desktop, editor } = officeDesktop();

    const exact = await findClassic(editor, { control: "text editor" });
    const withType = await findClassic(editor, { control: "SaveAllButton" });
    const byType = await findClassic(editor, { control: "statusbar" });
    const partial = await findClassic(editor, { control: "save" });

    expect(exact.control.id).toBe(desktop.control("editor").id);
    expect(withType.control.id).toBe(desktop.control("save-button").id);
    expect(byType.control.id).toBe(desktop.control("status").id);
    expect(partial.control.id).toBe(desktop.control("save-button").id);
  });

  it("returns the first of several equal best matches", async () => {
    const { desktop, editor } = officeDesktop();

    const match = await findClassic(editor, { control: "OK" });

    expect(match.control.id).toBe(desktop.control("find-ok").id);
    expect(match.matchedCount).toBe(2);
  });

  it("prefers stable_id, accepting auto_id as an alias", async () => {
    const { desktop, editor } = officeDesktop();

    const byStableId = await findClassic(editor, { stable_id: "15", name: "OK" });
    const byAutoId = await findClassic(editor, { auto_id: "save", control_type: "Button" });

    expect(byStableId.control.id).toBe(desktop.control("editor").id);
    expect(byAutoId.control.id).toBe(desktop.control("save-button").id);
  });

  it("narrows name and name_regex by control type", async () => {
    const { desktop, editor } = officeDesktop();

    const byRegex = await findClassic(editor, { name_regex: "^(Find|OK)$", control_type: "Button" });
    const byName = await findClassic(editor, { name: "Find" });

    expect(byRegex.control.id).toBe(desktop.control("find-ok").id);
    expect(byName.control.id).toBe(desktop.control("find-bar").id);
  });

  it("stops walking after the node cap", async () => {
    const { editor } = officeDesktop();

    await expect(findClassic(editor, { name: "Save All" }, 3)).rejects.toBeInstanceOf(
      NotFoundError,
    );
  });

  it("names the query and window when nothing matches", async () => {
    const { editor } = officeDesktop();

    await expect(findClassic(editor, { name: "Print" })).rejects.toThrow(
      'No control matches name="Print" in window "Untitled - Notepad"',
    );
  });

  it("requires at least one find argument", async () => {
    const { editor } = officeDesktop();

    expect(hasClassicArgs({ control_type: "Button" })).toBe(false);
    await expect(findClassic(editor, { control_type: "Button" })).rejects.toBeInstanceOf(
      MacroSyntaxError,
    );
  });
});
