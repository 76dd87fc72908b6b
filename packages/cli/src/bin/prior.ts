#!/usr/bin/env node

/**
 * Prior CLI entry point.
 */

import { runCli } from "../cli/main.js";

runCli()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    const message = err instanceof Error ? err.message : String(err);
    if (process.argv.includes("--json")) {
      console.log(JSON.stringify({
        schema: "prior.error.v1",
        code: "cli_error",
        message,
      }, null, 2));
    } else {
      console.error(message);
    }
    process.exit(1);
  });
