import { spawn } from "child_process";
import readline from "readline";
import type { Readable, Writable } from "stream";
import { z } from "zod";
import { Logger, consoleLogger, formatIssues } from "@uimacro/shared";
import type { DesktopRunnerConfig } from "../config/defaults";
import {
  DesktopRpcMethod,
  DesktopRpcMethods,
  DesktopRpcNotification,
  JsonRpcErrorPayload,
  pingResultSchema,
  rpcMessageSchema,
} from "./contracts";

export class DesktopRpcError extends Error {
  code: number;
  data?: unknown;

  constructor(payload: JsonRpcErrorPayload) {
    super(payload.message);
    this.name = "DesktopRpcError";
    this.code = payload.code;
    this.data = payload.data;
  }
}

// JSON-RPC 2.0 reserved codes used for client-side failures.
export const RPC_INTERNAL_ERROR = -32603;
export const RPC_TIMEOUT = -32000;
export const RPC_PROCESS_EXITED = -32001;

/** The parts of a child process the client uses. */
export interface RunnerProcess {
  stdin: Writable;
  stdout: Readable;
  stderr: Readable;
  on(event: "exit", listener: (code: number | null) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
  kill(): boolean;
}

export type SpawnDesktopRunner = (config: DesktopRunnerConfig) => RunnerProcess;

export type NotificationHandler = (params: unknown) => void;

type PendingRequest = {
  method: string;
  resolve: (value: unknown) => void;
  reject: (reason: Error) => void;
  timeoutId: NodeJS.Timeout;
};

/**
 * Line-delimited JSON-RPC 2.0 client for the desktop runner process. Every
 * result is validated against a schema before it reaches the caller.
 */
export class DesktopClient {
  private config: DesktopRunnerConfig;
  private spawnDesktopRunner: SpawnDesktopRunner;
  private logger: Logger;
  private process: RunnerProcess | null = null;
  private pending = new Map<number, PendingRequest>();
  private handlers = new Map<string, Set<NotificationHandler>>();
  private nextId = 1;

  constructor(
    config: DesktopRunnerConfig,
    spawnDesktopRunner: SpawnDesktopRunner = defaultSpawn,
    logger: Logger = consoleLogger,
  ) {
    this.config = config;
    this.spawnDesktopRunner = spawnDesktopRunner;
    this.logger = logger;
  }

  get running(): boolean {
    return this.process !== null;
  }

  async start(): Promise<void> {
    if (this.process) {
      return;
    }

    const child = this.spawnDesktopRunner(this.config);
    this.process = child;
    const rl = readline.createInterface({ input: child.stdout });
    rl.on("line", (line) => {
      this.handleLine(line);
    });
    readline.createInterface({ input: child.stderr }).on("line", (line) => {
      this.logger.warn(`[desktop-runner] ${line}`);
    });

    child.on("exit", (code) => {
      this.detach(child, `Desktop runner exited with code ${code ?? "unknown"}`);
    });
    // Spawn failures (ENOENT) and broken pipes arrive as error events.
    child.on("error", (error) => {
      this.logger.error(`[desktop-runner] ${error.message}`);
      this.detach(child, `Desktop runner failed: ${error.message}`);
    });
    child.stdin.on("error", (error) => {
      this.logger.error(`[desktop-runner] stdin: ${error.message}`);
      this.detach(child, `Desktop runner failed: ${error.message}`);
    });

    try {
      const pong = await this.call(
        DesktopRpcMethods.systemPing,
        {},
        pingResultSchema,
        this.config.spawnTimeoutMs,
      );
      this.logger.info(`[desktop-runner] ${pong.service} ${pong.version} ready`);
    } catch (error) {
      if (this.process === child) {
        this.process = null;
      }
      child.kill();
      throw error;
    }
  }

  async stop(): Promise<void> {
    if (!this.process) {
      return;
    }

    const child = this.process;
    this.process = null;
    child.kill();
    this.rejectAll(
      new DesktopRpcError({ code: RPC_PROCESS_EXITED, message: "Desktop runner stopped" }),
    );
  }

  async call<T>(
    method: DesktopRpcMethod,
    params: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    timeoutMs = this.config.requestTimeoutMs,
  ): Promise<T> {
    const raw = await this.sendRequest(method, params, timeoutMs);
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new DesktopRpcError({
        code: RPC_INTERNAL_ERROR,
        message: `Malformed ${method} result: ${formatIssues(parsed.error)}`,
        data: raw,
      });
    }
    return parsed.data;
  }

  /** Registers a handler for a runner notification; returns the unsubscribe. */
  onNotification(method: DesktopRpcNotification, handler: NotificationHandler): () => void {
    const handlers = this.handlers.get(method) ?? new Set<NotificationHandler>();
    handlers.add(handler);
    this.handlers.set(method, handlers);
    return () => {
      handlers.delete(handler);
    };
  }

  private sendRequest(
    method: string,
    params: Record<string, unknown>,
    timeoutMs: number,
  ): Promise<unknown> {
    const child = this.process;
    if (!child) {
      return Promise.reject(new Error("Desktop runner is not started"));
    }

    const id = this.nextId++;
    const payload = {
      jsonrpc: "2.0",
      id,
      method,
      params,
    };

    return new Promise((resolve, reject) => {
      const timeoutId = setTimeout(() => {
        this.pending.delete(id);
        reject(
          new DesktopRpcError({ code: RPC_TIMEOUT, message: `Request timed out: ${method}` }),
        );
      }, timeoutMs);

      this.pending.set(id, { method, resolve, reject, timeoutId });
      child.stdin.write(`${JSON.stringify(payload)}\n`);
    });
  }

  private handleLine(line: string): void {
    if (line.trim().length === 0) {
      return;
    }
    let data: unknown;
    try {
      data = JSON.parse(line);
    } catch (error) {
      this.logger.warn(`[desktop-runner] ignoring non-JSON output: ${line}`);
      return;
    }
    const parsed = rpcMessageSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.warn(`[desktop-runner] ignoring malformed message: ${line}`);
      return;
    }
    const message = parsed.data;

    if (typeof message.id !== "number") {
      if (message.method) {
        this.dispatch(message.method, message.params);
      }
      return;
    }

    const pending = this.pending.get(message.id);
    if (!pending) {
      return;
    }

    this.pending.delete(message.id);
    clearTimeout(pending.timeoutId);

    if (message.error) {
      pending.reject(new DesktopRpcError(message.error));
      return;
    }

    pending.resolve(message.result);
  }

  private dispatch(method: string, params: unknown): void {
    for (const handler of this.handlers.get(method) ?? []) {
      try {
        handler(params);
      } catch (error) {
        this.logger.error(
          `[desktop-runner] ${method} handler failed: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }
  }

  private detach(child: RunnerProcess, message: string): void {
    if (this.process === child) {
      this.process = null;
    }
    this.rejectAll(new DesktopRpcError({ code: RPC_PROCESS_EXITED, message }));
  }

  private rejectAll(error: Error): void {
    for (const pending of this.pending.values()) {
      clearTimeout(pending.timeoutId);
      pending.reject(error);
    }
    this.pending.clear();
  }
}

function defaultSpawn(config: DesktopRunnerConfig): RunnerProcess {
  return spawn(config.executable, config.args, { stdio: "pipe" });
}
