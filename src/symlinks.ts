// src/symlinks.ts
//
// Symlinks are not stored as links. The walk only records them; once every
// regular path has been written and flushed, each one is materialized as a
// copy of whatever its target currently is in the destination tree.

import path from "node:path";
import { realpath } from "node:fs/promises";
import { EntryError, type ErrorAccumulator } from "./errors.js";
import type { Logger } from "./logger.js";
import type { Output } from "./output.js";
import { isInside, remoteJoin, toPosix, toRel } from "./path-rel.js";
import type { ContentStore } from "./store.js";

export interface SymlinkTask {
  /** Location of the link, relative to the sync root. */
  sourcePath: string;
  /** From the link's location to its resolved target. */
  targetRelativePath: string;
}

export async function deferSymlink(
  linkPath: string,
  localRoot: string,
): Promise<SymlinkTask> {
  const target = await realpath(linkPath);
  const targetRel = toRel(target, localRoot);
  if (!isInside(targetRel)) {
    throw new EntryError(
      linkPath,
      `symlink target ${target} is outside of ${localRoot}`,
    );
  }
  const sourcePath = toRel(linkPath, localRoot);
  // a copy of an ancestor lands inside that ancestor and changes its hash,
  // so the copy would be stale again on every run
  if (targetRel === "" || sourcePath.startsWith(`${targetRel}/`)) {
    throw new EntryError(
      linkPath,
      `symlink target ${target} contains the link itself`,
    );
  }
  return {
    sourcePath,
    targetRelativePath: toPosix(path.relative(linkPath, target)),
  };
}

export interface MaterializeContext {
  store: ContentStore;
  remoteRoot: string;
  output: Output;
  errors: ErrorAccumulator;
  logger: Logger;
}

async function currentHash(
  store: ContentStore,
  remotePath: string,
): Promise<string | undefined> {
  try {
    return (await store.stat(remotePath)).hash;
  } catch {
    // nothing there yet
    return undefined;
  }
}

/**
 * Second pass. Returns how many links were (re)copied; links whose copy
 * already matches the target are left alone.
 */
export async function materializeSymlinks(
  tasks: readonly SymlinkTask[],
  ctx: MaterializeContext,
): Promise<number> {
  const { store, remoteRoot, output, errors, logger } = ctx;
  let copied = 0;
  for (const task of tasks) {
    const source = remoteJoin(remoteRoot, task.sourcePath);
    const target = remoteJoin(source, task.targetRelativePath);
    try {
      const resolved = await store.stat(target);
      if ((await currentHash(store, source)) === resolved.hash) {
        logger.debug("symlink copy is current", { source, target });
        continue;
      }
      await store.copyHashTo(source, resolved.hash);
      output.stored(resolved.hash, source);
      copied += 1;
    } catch (err) {
      errors.record(source, err);
    }
  }
  return copied;
}
