import fs from "fs";
import os from "os";
import path from "path";
import { z } from "zod";
import { MacroSyntaxError, formatIssues } from "@uimacro/shared";
import type { BrowserKind } from "@uimacro/web-runner";

export interface DesktopRunnerConfig {
  executable: string;
  args: string[];
  requestTimeoutMs: number;
  spawnTimeoutMs: number;
}

export interface WebRunnerConfig {
  browser: BrowserKind;
  headless: boolean;
  profileDir?: string;
  stateFile?: string;
  attachEndpoint?: string;
}

export interface RuntimeConfig {
  defaultTimeoutMs: number;
  pollIntervalMs: number;
  maxStepDelayMs: number;
  traceDir?: string;
}

export interface RecorderConfig {
  idleFlushMs: number;
  idlePollMs: number;
  stopKey: string;
  stepTimeoutSec: number;
}

export interface MacroConfig {
  desktopRunner: DesktopRunnerConfig;
  webRunner: WebRunnerConfig;
  runtime: RuntimeConfig;
  recorder: RecorderConfig;
}

const homeDir = path.join(os.homedir(), ".uimacro");

export const defaultConfig: MacroConfig = {
  desktopRunner: {
    executable: "uimacro-desktop-runner",
    args: [],
    requestTimeoutMs: 10_000,
    spawnTimeoutMs: 5_000,
  },
  webRunner: {
    browser: "chromium",
    headless: false,
    profileDir: path.join(homeDir, "browser-profiles"),
    stateFile: path.join(homeDir, "browser-state.json"),
  },
  runtime: {
    defaultTimeoutMs: 20_000,
    pollIntervalMs: 500,
    maxStepDelayMs: 5_000,
  },
  recorder: {
    idleFlushMs: 1_500,
    idlePollMs: 250,
    stopKey: "F9",
    stepTimeoutSec: 20,
  },
};

const millis = z.number().int().nonnegative();

const configFileSchema = z.object({
  desktopRunner: z
    .object({
      executable: z.string().min(1),
      args: z.array(z.string()),
      requestTimeoutMs: millis,
      spawnTimeoutMs: millis,
    })
    .partial()
    .optional(),
  webRunner: z
    .object({
      browser: z.enum(["chromium", "firefox", "webkit"]),
      headless: z.boolean(),
      profileDir: z.string(),
      stateFile: z.string(),
      attachEndpoint: z.string(),
    })
    .partial()
    .optional(),
  runtime: z
    .object({
      defaultTimeoutMs: millis,
      pollIntervalMs: millis,
      maxStepDelayMs: millis,
      traceDir: z.string(),
    })
    .partial()
    .optional(),
  recorder: z
    .object({
      idleFlushMs: millis,
      idlePollMs: millis.min(1),
      stopKey: z.string().min(1),
      stepTimeoutSec: z.number().nonnegative(),
    })
    .partial()
    .optional(),
});

export function loadConfig(configPath?: string): MacroConfig {
  if (!configPath) {
    return defaultConfig;
  }

  const resolved = path.resolve(configPath);
  const raw = fs.readFileSync(resolved, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new MacroSyntaxError(`Config ${resolved} is not valid JSON`, { cause: error });
  }
  const parsed = configFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new MacroSyntaxError(`Invalid config ${resolved}: ${formatIssues(parsed.error)}`);
  }

  return {
    desktopRunner: {
      ...defaultConfig.desktopRunner,
      ...(parsed.data.desktopRunner ?? {}),
    },
    webRunner: {
      ...defaultConfig.webRunner,
      ...(parsed.data.webRunner ?? {}),
    },
    runtime: {
      ...defaultConfig.runtime,
      ...(parsed.data.runtime ?? {}),
    },
    recorder: {
      ...defaultConfig.recorder,
      ...(parsed.data.recorder ?? {}),
    },
  };
}
