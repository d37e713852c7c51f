import { describe, expect, it, vi } from "vitest";
import { z } from "zod";
import {
  DesktopClient,
  DesktopRpcError,
  RPC_INTERNAL_ERROR,
  RPC_PROCESS_EXITED,
  RPC_TIMEOUT,
} from "../src/rpc/desktopClient";
import { DesktopRpcMethods, windowListResultSchema } from "../src/rpc/contracts";
import { FakeRunner, RecordingLogger, Responder, runnerConfig } from "./support/fakeRunner";

async function startClient(respond?: Responder, requestTimeoutMs = 1_000) {
  const runner = new FakeRunner(respond);
  const logger = new RecordingLogger();
  const client = new DesktopClient({ ...runnerConfig, requestTimeoutMs }, () => runner, logger);
  await client.start();
  return { client, runner, logger };
}

describe("DesktopClient", () => {
  it("pings the runner on start", async () => {
    const { client, runner, logger } = await startClient();

    expect(runner.requests).toEqual([{ id: 1, method: "system.ping", params: {} }]);
    expect(logger.lines).toEqual(["info [desktop-runner] desktop-runner 0.3.0 ready"]);
    expect(client.running).toBe(true);

    await client.stop();
    expect(runner.killed).toBe(true);
    expect(client.running).toBe(false);
  });

  it("returns schema-validated results", async () => {
    const { client, runner } = await startClient(() => ({
      result: { windows: [{ element: "w1", handle: 42, title: null, pid: null }] },
    }));

    const result = await client.call(DesktopRpcMethods.windowList, {}, windowListResultSchema);

    expect(result).toEqual({
      windows: [{ element: "w1", handle: 42, title: "", pid: undefined }],
    });
    expect(runner.requests[1]).toEqual({ id: 2, method: "window.list", params: {} });
    await client.stop();
  });

  it("rejects a result that does not match the schema", async () => {
    const { client } = await startClient(() => ({ result: { windows: "none" } }));

    const call = client.call(DesktopRpcMethods.windowList, {}, windowListResultSchema);
    await expect(call).rejects.toMatchObject({
      code: RPC_INTERNAL_ERROR,
      message: "Malformed window.list result: windows: Expected array, received string",
      data: { windows: "none" },
    });
    await client.stop();
  });

  it("surfaces runner errors with their code and data", async () => {
    const { client } = await startClient(() => ({
      error: { code: -32004, message: "element gone", data: { element: "e7" } },
    }));

    const call = client.call(
      DesktopRpcMethods.elementAttributes,
      { element: "e7" },
      z.object({}),
    );
    await expect(call).rejects.toBeInstanceOf(DesktopRpcError);
    await expect(call).rejects.toMatchObject({
      code: -32004,
      message: "element gone",
      data: { element: "e7" },
    });
    await client.stop();
  });

  it("times out requests the runner never answers", async () => {
    const { client } = await startClient(() => null, 20);

    await expect(
      client.call(DesktopRpcMethods.windowList, {}, windowListResultSchema),
    ).rejects.toMatchObject({ code: RPC_TIMEOUT, message: "Request timed out: window.list" });
    await client.stop();
  });

  it("rejects pending requests when the runner exits", async () => {
    const { client, runner } = await startClient(() => null);

    const call = client.call(DesktopRpcMethods.windowList, {}, windowListResultSchema);
    runner.emit("exit", 3);

    await expect(call).rejects.toMatchObject({
      code: RPC_PROCESS_EXITED,
      message: "Desktop runner exited with code 3",
    });
    expect(client.running).toBe(false);
  });

  it("rejects the ping and detaches when the runner cannot be spawned", async () => {
    const runner = new FakeRunner(undefined, null);
    const logger = new RecordingLogger();
    const client = new DesktopClient(runnerConfig, () => runner, logger);

    const start = client.start();
    runner.emit("error", new Error("spawn uimacro-desktop-runner ENOENT"));

    await expect(start).rejects.toMatchObject({
      code: RPC_PROCESS_EXITED,
      message: "Desktop runner failed: spawn uimacro-desktop-runner ENOENT",
    });
    expect(client.running).toBe(false);
    expect(logger.lines).toEqual(["error [desktop-runner] spawn uimacro-desktop-runner ENOENT"]);
  });

  it("rejects pending requests when the runner's stdin fails", async () => {
    const { client, runner } = await startClient(() => null);

    const call = client.call(DesktopRpcMethods.windowList, {}, windowListResultSchema);
    runner.stdin.emit("error", new Error("write EPIPE"));

    await expect(call).rejects.toMatchObject({
      code: RPC_PROCESS_EXITED,
      message: "Desktop runner failed: write EPIPE",
    });
    expect(client.running).toBe(false);
  });

  it("kills the runner when the startup ping fails", async () => {
    const runner = new FakeRunner(undefined, {
      error: { code: -32603, message: "accessibility backend unavailable" },
    });
    const client = new DesktopClient(runnerConfig, () => runner, new RecordingLogger());

    await expect(client.start()).rejects.toMatchObject({
      code: -32603,
      message: "accessibility backend unavailable",
    });
    expect(client.running).toBe(false);
    expect(runner.killed).toBe(true);
  });

  it("refuses calls before start", async () => {
    const client = new DesktopClient(runnerConfig, () => new FakeRunner());

    await expect(
      client.call(DesktopRpcMethods.windowList, {}, windowListResultSchema),
    ).rejects.toThrow("Desktop runner is not started");
  });

  it("dispatches notifications until unsubscribed", async () => {
    const { client, runner } = await startClient();
    const received: unknown[] = [];
    const unsubscribe = client.onNotification("input.key", (params) => {
      received.push(params);
    });

    runner.notify("input.key", { key: "a", char: "a" });
    await vi.waitFor(() => expect(received).toEqual([{ key: "a", char: "a" }]));

    unsubscribe();
    runner.notify("input.key", { key: "b", char: "b" });
    runner.notify("input.pointer", { x: 1, y: 2, button: "left", pressed: true });
    await client.call(DesktopRpcMethods.systemPing, {}, z.object({ ok: z.boolean() }));
    expect(received).toEqual([{ key: "a", char: "a" }]);
    await client.stop();
  });

  it("logs runner stderr and stray output", async () => {
    const { client, runner, logger } = await startClient();

    runner.stderr.write("accessibility backend warming up\n");
    runner.stdout.write("not json\n");
    runner.stdout.write('{"id":"seven"}\n');

    await vi.waitFor(() =>
      expect(logger.lines.slice(1).sort()).toEqual([
        "warn [desktop-runner] accessibility backend warming up",
        'warn [desktop-runner] ignoring malformed message: {"id":"seven"}',
        "warn [desktop-runner] ignoring non-JSON output: not json",
      ]),
    );
    await client.stop();
  });
});
