#!/usr/bin/env node
import { runCli } from "./cli";
import { EXIT_FAILED, errorMessage } from "./core/errors";

// Errors that escape runCli happen before a logger exists, such as an unreadable config file.
runCli(process.argv.slice(2)).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    process.stderr.write(`archive-harvest: ${errorMessage(error)}\n`);
    process.exitCode = EXIT_FAILED;
  },
);
