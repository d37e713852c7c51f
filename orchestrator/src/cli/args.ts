export const COMMANDS = ["run", "record", "inspect", "resolve"] as const;

export type CommandName = (typeof COMMANDS)[number];

export interface CliArgs {
  command?: CommandName;
  positional: string[];
  out?: string;
  config?: string;
  selectorJson?: string;
  selectorFile?: string;
  titleRegex?: string;
  verbose: boolean;
  help: boolean;
}

const valueFlags = {
  out: "out",
  config: "config",
  "selector-json": "selectorJson",
  "selector-file": "selectorFile",
  "title-regex": "titleRegex",
} as const;

type ValueFlag = keyof typeof valueFlags;

function isValueFlag(name: string): name is ValueFlag {
  return Object.prototype.hasOwnProperty.call(valueFlags, name);
}

function isCommand(name: string): name is CommandName {
  return COMMANDS.some((command) => command === name);
}

export const usage = `Usage: uimacro <command> [options]

Commands:
  run <macro.yaml>                    Replay a macro
  record [--out <macro.yaml>]         Record clicks and typing until the stop key
  inspect                             Print the selector of the control under the cursor
  resolve --selector-json <json>      Resolve a selector and print the control
          --selector-file <path>
          [--title-regex <regex>]     Override the selector's window

Options:
  --config <file>   JSON config merged over the defaults
  --verbose         Log each recorded step
  --help            Show this message`;

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { positional: [], verbose: false, help: false };
  let index = 0;

  while (index < argv.length) {
    const token = argv[index];
    if (!token.startsWith("--")) {
      if (args.command === undefined && args.positional.length === 0) {
        if (!isCommand(token)) {
          throw new Error(`Unknown command: ${token}`);
        }
        args.command = token;
      } else {
        args.positional.push(token);
      }
      index += 1;
      continue;
    }

    const [name, inline] = token.slice(2).split("=", 2);
    if (name === "verbose") {
      args.verbose = true;
      index += 1;
      continue;
    }
    if (name === "help") {
      args.help = true;
      index += 1;
      continue;
    }
    if (!isValueFlag(name)) {
      throw new Error(`Unknown option: --${name}`);
    }

    if (inline !== undefined) {
      args[valueFlags[name]] = inline;
      index += 1;
      continue;
    }
    const value = argv[index + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new Error(`Missing value for --${name}`);
    }
    args[valueFlags[name]] = value;
    index += 2;
  }

  return args;
}
