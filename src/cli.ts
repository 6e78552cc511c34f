#!/usr/bin/env node
// src/cli.ts
import { Command } from "commander";
import { cliEntrypoint } from "./cli-util.js";
import {
  autoflushFor,
  cliOptsToMirrorConfig,
  resolveSyncFrom,
  type MirrorCliOptions,
  type MirrorConfig,
} from "./config.js";
import { CLI_NAME, VERSION } from "./constants.js";
import { classifyOutcome, errorMessage } from "./errors.js";
import { collectIgnoreOption } from "./ignore.js";
import { KuboStoreClient } from "./kubo-client.js";
import { ConsoleLogger, LOG_LEVELS, type Logger } from "./logger.js";
import { runMirror } from "./mirror.js";
import { Output, type LineWriter } from "./output.js";
import type { ContentStore } from "./store.js";
import { writeSyncStamp } from "./sync-stamp.js";

export const EXIT_OK = 0;
export const EXIT_ENTRY_ERRORS = 1;
export const EXIT_FATAL = 2;

export function exitCodeFor(errors: number): number {
  return classifyOutcome(errors) === "ok" ? EXIT_OK : EXIT_ENTRY_ERRORS;
}

const noIgnores: string[] = [];

function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}

export function configureMirrorCommand(command: Command): Command {
  return command
    .name(CLI_NAME)
    .description(
      "Sync a local folder to an MFS folder based on file existence and size (or change time)",
    )
    .version(VERSION)
    .requiredOption("-s, --src <path>", "source path")
    .requiredOption("-d, --dst <path>", "destination MFS path")
    .option("-H, --api-host <host>", "api host (default: 127.0.0.1)")
    .option("-p, --api-port <port>", "api port (default: 5001)")
    .option(
      "-f, --flush <duration>",
      "flush interval, e.g. 30s or 5m; only the final flushes run if unset",
    )
    .option(
      "--sync-from <time>",
      "only upload files whose ctime is after this time (RFC 3339 or @<unix-seconds>)",
    )
    .option(
      "--sync-stamp <file>",
      "read --sync-from from this file if not given; store this run's start time in it on success",
    )
    .option("-l, --nocopy", "use the filestore", false)
    .option(
      "-i, --ignore <pattern>",
      "gitignore-style ignore rule (repeat or comma-separated)",
      collectIgnoreOption,
      noIgnores,
    )
    .option("-v, --verbose", "verbosity (repeatable)", increaseVerbosity, 0)
    .option(
      "--log-level <level>",
      `diagnostics written to stderr (${LOG_LEVELS.join(", ")})`,
    );
}

export function buildProgram(): Command {
  return configureMirrorCommand(new Command());
}

export interface CliDeps {
  createStore?: (config: MirrorConfig, logger: Logger) => ContentStore;
  write?: LineWriter;
  logger?: Logger;
  now?: () => number;
}

function defaultStore(config: MirrorConfig, logger: Logger): ContentStore {
  return new KuboStoreClient({
    apiUrl: config.apiUrl,
    autoflush: autoflushFor(config.flushIntervalMs),
    logger: logger.child("api"),
  });
}

/** Runs one mirror and prints the root hash; resolves to the exit code. */
export async function runMirrorCommand(
  opts: MirrorCliOptions,
  deps: CliDeps = {},
): Promise<number> {
  const output = new Output(opts.verbose ?? 0, deps.write);
  const now = deps.now ?? Date.now;
  try {
    const config = cliOptsToMirrorConfig(opts);
    const logger = deps.logger ?? new ConsoleLogger(config.logLevel);
    const startedAt = Math.floor(now() / 1000);
    const syncFrom = await resolveSyncFrom(config, logger);
    const store = (deps.createStore ?? defaultStore)(config, logger);
    const result = await runMirror({
      src: config.src,
      dst: config.dst,
      store,
      nocopy: config.nocopy,
      syncFrom,
      flushIntervalMs: config.flushIntervalMs,
      ignoreRules: config.ignoreRules,
      output,
      logger,
    });
    if (config.syncStamp && result.errors === 0) {
      try {
        await writeSyncStamp(config.syncStamp, startedAt);
      } catch (err) {
        logger.warn("cannot write sync stamp", {
          file: config.syncStamp,
          err: errorMessage(err),
        });
      }
    }
    output.result(result.hash);
    return exitCodeFor(result.errors);
  } catch (err) {
    output.result(`Error: ${errorMessage(err)}`);
    return EXIT_FATAL;
  }
}

cliEntrypoint<MirrorCliOptions>(
  require.main === module,
  buildProgram,
  (opts) => runMirrorCommand(opts),
  { label: CLI_NAME },
);
