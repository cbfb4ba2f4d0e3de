#!/usr/bin/env node
import { runCli } from "./cli";
import { errorMessage } from "./core/errors";

runCli(process.argv.slice(2)).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error(`shard-harvest: unexpected failure: ${errorMessage(error)}`);
    process.exitCode = 1;
  },
);
