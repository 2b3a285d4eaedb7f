#!/usr/bin/env node
import "dotenv/config";
import { runCli } from "./cli.js";

runCli(process.argv.slice(2))
  .then((status) => {
    process.exitCode = status;
  })
  .catch((err: unknown) => {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(`Error: ${msg}`);
    process.exitCode = 1;
  });
