import type { Logger } from "../../core/logging";
import type { ReelhubConfig } from "../../config";
import type { ProviderRuntime } from "../../providers";
import type { ParsedArgs } from "../args";

export type CommandResult = {
  success: boolean;
  message?: string;
  data?: unknown;
  /** null keeps the process alive (long-running commands). */
  exitCode?: number | null;
};

export interface CommandContext {
  config: ReelhubConfig;
  runtime: ProviderRuntime;
  logger: Logger;
}

export type CommandDefinition = {
  name: ParsedArgs["command"];
  description: string;
  run: (args: ParsedArgs, context: CommandContext) => Promise<CommandResult>;
};
