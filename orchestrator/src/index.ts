export { defaultConfig, loadConfig } from "./config/defaults";
export type {
  DesktopRunnerConfig,
  MacroConfig,
  RecorderConfig,
  RuntimeConfig,
  WebRunnerConfig,
} from "./config/defaults";
export { WindowLocator, compilePattern } from "./desktop/windows";
export { resolvePath, resolveSelector } from "./selector/resolve";
export type { Resolution, ResolveOptions } from "./selector/resolve";
export { MAX_CLASSIC_NODES, findClassic, hasClassicArgs } from "./selector/classic";
export type { ClassicArgs, ClassicMatch } from "./selector/classic";
export { MacroEngine } from "./runtime/engine";
export type { MacroEngineOptions, RunSummary } from "./runtime/engine";
export { clampDelay, systemClock } from "./runtime/timing";
export type { RuntimeClock } from "./runtime/timing";
export { FileTraceWriter, MemoryTraceWriter, createRunId } from "./runtime/traces";
export type { StepTrace, TraceWriter } from "./runtime/traces";
export {
  DesktopClient,
  DesktopRpcError,
  RPC_INTERNAL_ERROR,
  RPC_PROCESS_EXITED,
  RPC_TIMEOUT,
} from "./rpc/desktopClient";
export type { RunnerProcess, SpawnDesktopRunner } from "./rpc/desktopClient";
export {
  RpcAutomationEngine,
  RpcControl,
  RpcInputSource,
  RpcWindow,
  keyEvents,
  pointerEvents,
} from "./rpc/desktopEngine";
export { DesktopRpcMethods, DesktopRpcNotifications } from "./rpc/contracts";
export { parseArgs, usage } from "./cli/args";
export type { CliArgs, CommandName } from "./cli/args";
export { runCommand } from "./cli/commands";
export type { CliContext } from "./cli/commands";
