// src/mirror.ts
//
// One run: INIT → TREE_WALK → FLUSH_1 → SYMLINK_PASS → FLUSH_2 → REPORT.
// Each phase runs exactly once, in this order.

import { realpath, stat } from "node:fs/promises";
import { ErrorAccumulator, FatalError, errorMessage } from "./errors.js";
import { FlushScheduler, type Clock } from "./flush-scheduler.js";
import { createIgnorer, readIgnoreFile } from "./ignore.js";
import { NullLogger, type Logger } from "./logger.js";
import { Output } from "./output.js";
import { normalizeRemotePath } from "./path-rel.js";
import { emptyStats, reconcile, type MirrorStats } from "./reconcile.js";
import type { ContentStore } from "./store.js";
import { materializeSymlinks } from "./symlinks.js";

export type MirrorPhase =
  | "init"
  | "tree-walk"
  | "flush-1"
  | "symlink-pass"
  | "flush-2"
  | "report";

export interface MirrorOptions {
  src: string;
  dst: string;
  store: ContentStore;
  nocopy?: boolean;
  /** UNIX seconds; files with ctime at or below it are presumed unchanged. */
  syncFrom?: number;
  flushIntervalMs?: number;
  ignoreRules?: string[];
  output?: Output;
  logger?: Logger;
  clock?: Clock;
}

export interface RunStats extends MirrorStats {
  flushes: number;
}

export interface RunResult {
  hash: string;
  errors: number;
  stats: RunStats;
}

async function resolveSourceRoot(src: string): Promise<string> {
  let root: string;
  try {
    root = await realpath(src);
  } catch (err) {
    throw new FatalError(`cannot access source ${src}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
  const st = await fatalOnFailure(`cannot stat source ${src}`, () =>
    stat(root),
  );
  if (!st.isDirectory()) {
    throw new FatalError(`source ${src} is not a directory`);
  }
  return root;
}

async function fatalOnFailure<T>(
  what: string,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof FatalError) throw err;
    throw new FatalError(`${what}: ${errorMessage(err)}`, { cause: err });
  }
}

export async function runMirror(opts: MirrorOptions): Promise<RunResult> {
  const {
    store,
    nocopy = false,
    syncFrom,
    flushIntervalMs,
    output = new Output(0),
    logger = new NullLogger(),
    clock,
  } = opts;
  const enter = (phase: MirrorPhase) => {
    logger.debug(`phase ${phase}`);
  };
  enter("init");

  const localRoot = await resolveSourceRoot(opts.src);
  const remoteRoot = normalizeRemotePath(opts.dst);
  if (remoteRoot === null) {
    throw new FatalError(`destination ${opts.dst} is not an absolute MFS path`);
  }
  const ignoreRules = [
    ...(opts.ignoreRules ?? []),
    ...(await fatalOnFailure("cannot read ignore file", () =>
      readIgnoreFile(localRoot),
    )),
  ];
  const stats = emptyStats();
  const errors = new ErrorAccumulator(logger.child("walk"));
  const scheduler = new FlushScheduler(
    () => store.flush(remoteRoot),
    flushIntervalMs,
    clock,
  );

  enter("tree-walk");
  const walked = await fatalOnFailure(`cannot sync ${remoteRoot}`, () =>
    reconcile(localRoot, remoteRoot, {
      store,
      localRoot,
      nocopy,
      syncFrom,
      ignorer: createIgnorer(ignoreRules),
      scheduler,
      output,
      errors,
      logger: logger.child("walk"),
      stats,
    }),
  );

  enter("flush-1");
  await fatalOnFailure("flush failed", () => scheduler.flushNow());

  enter("symlink-pass");
  const symlinkErrors = new ErrorAccumulator(logger.child("symlinks"));
  stats.symlinks = await materializeSymlinks(walked.symlinks, {
    store,
    remoteRoot,
    output,
    errors: symlinkErrors,
    logger: logger.child("symlinks"),
  });
  errors.merge(symlinkErrors);

  enter("flush-2");
  await fatalOnFailure("flush failed", () => scheduler.flushNow());

  enter("report");
  const { hash } = await fatalOnFailure(`cannot stat ${remoteRoot}`, () =>
    store.stat(remoteRoot),
  );
  logger.info("mirror complete", {
    hash,
    errors: errors.count,
    ...stats,
    flushes: scheduler.flushes,
  });
  return {
    hash,
    errors: errors.count,
    stats: { ...stats, flushes: scheduler.flushes },
  };
}
