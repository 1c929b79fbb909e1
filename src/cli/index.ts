#!/usr/bin/env node

import { runCli } from "./run";

runCli(process.argv).then(
  (exitCode) => {
    if (exitCode !== null) {
      process.exit(exitCode);
    }
  },
  (error: unknown) => {
    console.error("Unexpected error:", error);
    process.exit(1);
  }
);
