import type { OutputFormat } from "./args";

export type OutputOptions = {
  format: OutputFormat;
  quiet?: boolean;
  write?: (line: string) => void;
};

export function writeOutput(payload: unknown, options: OutputOptions): void {
  if (options.quiet) {
    return;
  }
  const write = options.write ?? ((line: string) => console.log(line));

  if (options.format === "text") {
    if (typeof payload === "string") {
      write(payload);
    } else {
      write(JSON.stringify(payload, null, 2));
    }
    return;
  }

  write(JSON.stringify(payload));
}
