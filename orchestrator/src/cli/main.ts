import { consoleLogger } from "@uimacro/shared";
import { WebRunner } from "@uimacro/web-runner";
import { loadConfig } from "../config/defaults";
import { DesktopClient } from "../rpc/desktopClient";
import { RpcAutomationEngine, keyEvents, pointerEvents } from "../rpc/desktopEngine";
import { parseArgs, usage } from "./args";
import { runCommand } from "./commands";

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help || !args.command) {
    console.log(usage);
    return;
  }
  const config = loadConfig(args.config);

  // Ctrl+C ends a recording and saves it; other commands keep the default.
  const interrupt = new AbortController();
  const onInterrupt = () => interrupt.abort();
  if (args.command === "record") {
    process.once("SIGINT", onInterrupt);
  }

  const desktopClient = new DesktopClient(config.desktopRunner);
  try {
    await desktopClient.start();
    await runCommand(args, {
      config,
      desktop: new RpcAutomationEngine(desktopClient),
      pointer: pointerEvents(desktopClient),
      keyboard: keyEvents(desktopClient),
      browser: () => new WebRunner({ ...config.webRunner }),
      logger: consoleLogger,
      print: (text) => console.log(text),
      signal: interrupt.signal,
    });
  } finally {
    process.off("SIGINT", onInterrupt);
    await desktopClient.stop();
  }
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
