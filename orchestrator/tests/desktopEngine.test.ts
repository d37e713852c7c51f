import { describe, expect, it, vi } from "vitest";
import { InjectionFailureError, NotFoundError } from "@uimacro/shared";
import type { PointerEvent } from "@uimacro/shared";
import { DesktopClient } from "../src/rpc/desktopClient";
import { RpcAutomationEngine, pointerEvents } from "../src/rpc/desktopEngine";
import { FakeRunner, RecordingLogger, Responder, runnerConfig } from "./support/fakeRunner";

async function connect(respond: Responder) {
  const runner = new FakeRunner(respond);
  const client = new DesktopClient(runnerConfig, () => runner, new RecordingLogger());
  await client.start();
  return { client, runner, engine: new RpcAutomationEngine(client) };
}

describe("RpcAutomationEngine", () => {
  it("maps window.list entries to window refs", async () => {
    const { client, engine } = await connect(() => ({
      result: {
        windows: [
          { element: "w1", handle: 101, title: "Untitled - Notepad", pid: 4120 },
          { element: "w2", handle: 102, title: null },
        ],
      },
    }));

    const windows = await engine.listWindows();

    expect(windows.map((window) => [window.id, window.handle, window.title, window.pid])).toEqual([
      ["w1", 101, "Untitled - Notepad", 4120],
      ["w2", 102, "", undefined],
    ]);
    await client.stop();
  });

  it("reads attributes and children as results", async () => {
    const { client, engine, runner } = await connect((request) => {
      switch (request.method) {
        case "element.fromPoint":
          return { result: { element: "e5" } };
        case "element.attributes":
          return {
            result: { control_type: "Button", name: "OK", stable_id: null, native_class: null },
          };
        case "element.children":
          return { error: { code: -32004, message: "element gone" } };
        default:
          return null;
      }
    });

    const found = await engine.elementFromPoint({ x: 5, y: 6 });
    expect(found.ok).toBe(true);
    if (!found.ok) {
      return;
    }
    await expect(found.value.attributes()).resolves.toEqual({
      ok: true,
      value: { control_type: "Button", name: "OK", stable_id: undefined, native_class: undefined },
    });
    const children = await found.value.children();
    expect(children.ok).toBe(false);
    expect(runner.requests.slice(1).map((request) => request.params)).toEqual([
      { x: 5, y: 6 },
      { element: "e5" },
      { element: "e5" },
    ]);
    await client.stop();
  });

  it("reports an empty point as NotFound", async () => {
    const { client, engine } = await connect(() => ({ result: { element: null } }));

    const found = await engine.elementFromPoint({ x: 1, y: 2 });

    expect(found.ok).toBe(false);
    if (!found.ok) {
      expect(found.error).toBeInstanceOf(NotFoundError);
      expect(found.error.message).toBe("No element at (1,2)");
    }
    await client.stop();
  });

  it("wraps failed injections as InjectionFailure", async () => {
    const { client, engine } = await connect(() => ({
      error: { code: -32010, message: "input blocked" },
    }));

    const click = engine.clickAt({ x: 5, y: 6 });
    await expect(click).rejects.toBeInstanceOf(InjectionFailureError);
    await expect(click).rejects.toThrow("click at (5,6) failed: input blocked");
    await client.stop();
  });

  it("sends drag parameters on the wire", async () => {
    const { client, engine, runner } = await connect(() => ({ result: { ok: true } }));

    await engine.drag({ x: 1, y: 2 }, { x: 30, y: 40 }, { durationMs: 600, steps: 40 });

    expect(runner.requests[1]).toMatchObject({
      method: "input.drag",
      params: { from: { x: 1, y: 2 }, to: { x: 30, y: 40 }, duration_ms: 600, steps: 40 },
    });
    await client.stop();
  });
});

describe("RpcInputSource", () => {
  it("subscribes, forwards valid events and unsubscribes", async () => {
    const { client, runner } = await connect(() => ({ result: { ok: true } }));
    const source = pointerEvents(client);
    const events: PointerEvent[] = [];

    await source.start((event) => events.push(event));
    runner.notify("input.pointer", { x: 3, y: 4, button: "wheel", pressed: true });
    runner.notify("input.pointer", { x: 3, y: 4, button: "left", pressed: true });
    await vi.waitFor(() =>
      expect(events).toEqual([{ x: 3, y: 4, button: "left", pressed: true }]),
    );

    await source.stop();
    expect(runner.methods().slice(1)).toEqual(["input.subscribe", "input.unsubscribe"]);
    expect(runner.requests[1].params).toEqual({ channel: "pointer" });
    await client.stop();
  });
});
