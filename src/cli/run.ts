import { createLogger, type LogEnvelope, type LogSink } from "../core/logging";
import { getConfigPath, loadConfig } from "../config";
import type { ProviderRuntime } from "../providers";
import { createConfiguredRuntime, type RuntimeFactoryOptions } from "../providers/runtime-factory";
import { getHelpText, parseArgs } from "./args";
import { EXIT_SUCCESS, EXIT_USAGE, formatErrorPayload, toCliError } from "./errors";
import { writeOutput } from "./output";
import { categoriesCommand, providersCommand, searchCommand } from "./commands/query";
import { serveCommand } from "./commands/serve";
import type { CommandDefinition } from "./commands/types";

export const VERSION = "0.1.0";

const COMMANDS: Record<CommandDefinition["name"], CommandDefinition | undefined> = {
  serve: serveCommand,
  search: searchCommand,
  categories: categoriesCommand,
  providers: providersCommand,
  help: undefined,
  version: undefined
};

export interface CliDeps extends Pick<RuntimeFactoryOptions, "fetcher" | "now" | "sleep"> {
  write?: (line: string) => void;
  writeError?: (line: string) => void;
  env?: NodeJS.ProcessEnv;
}

const stderrSink = (writeError: (line: string) => void, verbose: boolean): LogSink => {
  return (entry: LogEnvelope) => {
    if (entry.level === "debug" && !verbose) return;
    writeError(JSON.stringify(entry));
  };
};

/**
 * Runs one CLI invocation. Resolves to the exit code, or null when the
 * command keeps the process alive.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number | null> {
  const write = deps.write ?? ((line: string) => console.log(line));
  const writeError = deps.writeError ?? ((line: string) => console.error(line));
  const env = deps.env ?? process.env;
  let runtime: ProviderRuntime | undefined;
  let keepAlive = false;

  try {
    const args = parseArgs(argv);
    if (args.command === "help") {
      write(getHelpText());
      return EXIT_SUCCESS;
    }
    if (args.command === "version") {
      write(`reelhub v${VERSION}`);
      return EXIT_SUCCESS;
    }

    const command = COMMANDS[args.command];
    if (!command) {
      write(getHelpText());
      return EXIT_USAGE;
    }

    const logger = createLogger("cli", stderrSink(writeError, Boolean(env.REELHUB_DEBUG)));
    const config = loadConfig(args.configPath ?? getConfigPath(env));
    runtime = createConfiguredRuntime(config, {
      fetcher: deps.fetcher,
      now: deps.now,
      sleep: deps.sleep,
      logger
    });

    const result = await command.run(args, { config, runtime, logger });
    writeOutput(args.format === "text" ? result.message ?? "" : result, { format: args.format, write });
    if (result.exitCode === null) {
      keepAlive = true;
      return null;
    }
    return result.exitCode ?? (result.success ? EXIT_SUCCESS : EXIT_USAGE);
  } catch (error) {
    const cliError = toCliError(error);
    writeError(JSON.stringify(formatErrorPayload(cliError)));
    if (cliError.exitCode === EXIT_USAGE) {
      writeError("For help: reelhub --help");
    }
    return cliError.exitCode;
  } finally {
    if (!keepAlive) {
      runtime?.dispose();
    }
  }
}
