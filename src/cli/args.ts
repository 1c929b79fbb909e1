import { createUsageError } from "./errors";

export type CliCommand = "serve" | "search" | "categories" | "providers" | "help" | "version";
export type OutputFormat = "json" | "text";

export interface ParsedArgs {
  command: CliCommand;
  format: OutputFormat;
  keyword?: string;
  page?: number;
  provider?: string;
  host?: string;
  port?: number;
  configPath?: string;
}

const COMMANDS: ReadonlySet<string> = new Set(["serve", "search", "categories", "providers"]);

const SHORT_FLAGS: Record<string, string> = {
  "-h": "--help",
  "-v": "--version",
  "-p": "--provider",
  "-c": "--config"
};

const VALUE_FLAGS = new Set(["--page", "--provider", "--host", "--port", "--config", "--format"]);
const BOOLEAN_FLAGS = new Set(["--help", "--version"]);

const ALLOWED_FLAGS: Record<Exclude<CliCommand, "help" | "version">, ReadonlySet<string>> = {
  serve: new Set(["--host", "--port", "--config", "--format"]),
  search: new Set(["--page", "--provider", "--config", "--format"]),
  categories: new Set(["--provider", "--config", "--format"]),
  providers: new Set(["--config", "--format"])
};

function isCommand(value: string): value is Exclude<CliCommand, "help" | "version"> {
  return COMMANDS.has(value);
}

function parseInteger(flag: string, value: string, min: number, max: number): number {
  if (!/^\d+$/.test(value)) {
    throw createUsageError(`${flag} expects an integer, got "${value}"`);
  }
  const parsed = Number.parseInt(value, 10);
  if (parsed < min || parsed > max) {
    throw createUsageError(`${flag} must be between ${min} and ${max}`);
  }
  return parsed;
}

/** Splits argv into positionals and flag values; `--flag=value` and `--flag value` are both accepted. */
function tokenize(args: string[]): { positionals: string[]; flags: Map<string, string | true> } {
  const positionals: string[] = [];
  const flags = new Map<string, string | true>();

  for (let index = 0; index < args.length; index += 1) {
    const raw = args[index] ?? "";
    if (!raw.startsWith("-") || raw === "-") {
      positionals.push(raw);
      continue;
    }

    const [head = "", inline] = raw.split(/=(.*)/s, 2);
    const flag = SHORT_FLAGS[head] ?? head;
    if (BOOLEAN_FLAGS.has(flag)) {
      flags.set(flag, true);
      continue;
    }
    if (!VALUE_FLAGS.has(flag)) {
      throw createUsageError(`Unknown flag: ${head}`);
    }
    const value = inline ?? args[index + 1];
    if (value === undefined || (inline === undefined && value.startsWith("--"))) {
      throw createUsageError(`Missing value for ${flag}`);
    }
    if (inline === undefined) {
      index += 1;
    }
    flags.set(flag, value);
  }

  return { positionals, flags };
}

export function parseArgs(argv: string[]): ParsedArgs {
  const { positionals, flags } = tokenize(argv.slice(2));

  if (flags.has("--help")) {
    return { command: "help", format: "text" };
  }
  if (flags.has("--version")) {
    return { command: "version", format: "text" };
  }

  const [commandName, ...rest] = positionals;
  if (commandName === undefined) {
    return { command: "help", format: "text" };
  }
  if (!isCommand(commandName)) {
    throw createUsageError(`Unknown command: ${commandName}`);
  }

  const allowed = ALLOWED_FLAGS[commandName];
  for (const flag of flags.keys()) {
    if (!allowed.has(flag)) {
      throw createUsageError(`${flag} is not valid for ${commandName}`);
    }
  }

  const readFlag = (flag: string): string | undefined => {
    const value = flags.get(flag);
    return typeof value === "string" ? value : undefined;
  };

  const format = readFlag("--format") ?? "json";
  if (format !== "json" && format !== "text") {
    throw createUsageError(`--format must be json or text, got "${format}"`);
  }

  const parsed: ParsedArgs = { command: commandName, format };
  const configPath = readFlag("--config");
  if (configPath) parsed.configPath = configPath;
  const provider = readFlag("--provider");
  if (provider) parsed.provider = provider;
  const host = readFlag("--host");
  if (host) parsed.host = host;
  const port = readFlag("--port");
  if (port !== undefined) parsed.port = parseInteger("--port", port, 0, 65535);
  const page = readFlag("--page");
  if (page !== undefined) parsed.page = parseInteger("--page", page, 1, 100000);

  if (commandName === "search") {
    const keyword = rest.join(" ").trim();
    if (!keyword) {
      throw createUsageError("search requires a keyword");
    }
    parsed.keyword = keyword;
  } else if (rest.length > 0) {
    throw createUsageError(`Unexpected argument: ${rest[0]}`);
  }

  return parsed;
}

export function getHelpText(): string {
  return `
reelhub - query short-drama listing providers through one canonical interface

USAGE:
  reelhub <command> [options]

COMMANDS:
  serve                     Start the HTTP query server
  search <keyword>          Search the active (or named) provider
  categories                List categories offered by a provider
  providers                 List registered providers and their capabilities

OPTIONS:
  --page <n>                Result page for search (default: 1)
  -p, --provider <id>       Query a specific provider instead of the active one
  --host <host>             Bind address for serve (default from config)
  --port <port>             Port for serve (default from config)
  -c, --config <path>       Config file (default: ~/.config/reelhub/reelhub.jsonc)
  --format <json|text>      Output format (default: json)
  -h, --help                Show this help message
  -v, --version             Show version number

ENVIRONMENT:
  REELHUB_CONFIG            Path to the config file
  REELHUB_CONFIG_DIR        Directory holding reelhub.jsonc

EXAMPLES:
  reelhub search 总裁 --page 2
  reelhub categories --provider uuuka
  reelhub serve --port 8080
`.trim();
}
