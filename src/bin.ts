#!/usr/bin/env node

import { runCli, EXIT_SYSTEM_ERROR } from "./cli";
import { formatErrorChain } from "./error";

runCli(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (error: unknown) => {
    process.stderr.write(`${formatErrorChain("Unexpected failure", error)}\n`);
    process.exit(EXIT_SYSTEM_ERROR);
  }
);
