#!/usr/bin/env node
/**
 * drover — spawn and manage independent coding agents.
 * Usage:
 *   drover spawn <name> [task] [--type T]
 *   drover spawn-multi <count> <prefix> [task] [--type T]
 *   drover list
 *   drover attach <name>
 *   drover stop <name> | --all
 *   drover clean
 *   drover logs <name>
 */
import { handlesInterrupt, runCli } from "./cli/run.js";
import { openPager } from "./cli/pager.js";
import { fail } from "./cli/format.js";
import { loadConfig } from "./config.js";
import { errorToString } from "./errors.js";
import { createDrover } from "./index.js";
import { createLogger } from "./logger.js";

async function main(): Promise<number> {
  const config = loadConfig();
  const logger = createLogger(config);
  const { manager, batch } = createDrover(config, logger);

  const argv = process.argv.slice(2);

  // Ctrl+C only ends the viewing side of `attach` and `logs`; agents keep
  // running. Every other command keeps the default handler and exits.
  const interrupt = new AbortController();
  if (handlesInterrupt(argv)) {
    process.once("SIGINT", () => interrupt.abort());
  }

  return runCli(argv, {
    manager,
    batch,
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    interrupt: interrupt.signal,
    openPager,
  });
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(fail(errorToString(err)));
    process.exitCode = 1;
  });
