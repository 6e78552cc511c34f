// src/reconcile.ts
import { shouldUpload } from "./change-filter.js";
import { EntryError, errorMessage, type ErrorAccumulator } from "./errors.js";
import type { FlushScheduler } from "./flush-scheduler.js";
import type { Ignorer } from "./ignore.js";
import { listLocalDirectory, type LocalEntry } from "./local-fs.js";
import type { Logger } from "./logger.js";
import type { Output } from "./output.js";
import { remoteJoin, toRel } from "./path-rel.js";
import type { ContentStore, RemoteEntry } from "./store.js";
import { deferSymlink, type SymlinkTask } from "./symlinks.js";

export interface MirrorStats {
  uploads: number;
  deletions: number;
  directoriesCreated: number;
  symlinks: number;
}

export function emptyStats(): MirrorStats {
  return { uploads: 0, deletions: 0, directoriesCreated: 0, symlinks: 0 };
}

export interface ReconcileContext {
  store: ContentStore;
  localRoot: string;
  nocopy: boolean;
  syncFrom?: number;
  ignorer: Ignorer;
  scheduler: FlushScheduler;
  output: Output;
  errors: ErrorAccumulator;
  logger: Logger;
  stats: MirrorStats;
}

export interface ReconcileResult {
  symlinks: SymlinkTask[];
  /** Per-entry errors recorded under this directory. */
  errors: number;
}

// name -> entry for the remote children not yet matched by a local entry
type RemoteDirectoryState = Map<string, RemoteEntry>;

async function ensureRemoteDirectory(
  remoteDir: string,
  ctx: ReconcileContext,
): Promise<RemoteDirectoryState> {
  const { store, output, logger, stats } = ctx;
  try {
    const entries = await store.list(remoteDir);
    return new Map(entries.map((e) => [e.name, e]));
  } catch (err) {
    output.listFailed(remoteDir, errorMessage(err));
  }
  try {
    await store.remove(remoteDir, { recursive: true });
  } catch (err) {
    // usually there was simply nothing at this path
    logger.debug("remove before mkdir failed", {
      path: remoteDir,
      err: errorMessage(err),
    });
  }
  await store.createDirectory(remoteDir);
  stats.directoriesCreated += 1;
  if (output.verbosity >= 1) {
    const { hash } = await store.stat(remoteDir);
    output.stored(hash, remoteDir);
  }
  return new Map();
}

async function uploadFile(
  entry: LocalEntry,
  remotePath: string,
  ctx: ReconcileContext,
): Promise<void> {
  const { store, nocopy, output, scheduler, stats } = ctx;
  const hash = await store.add(entry.path, { pin: false, nocopy });
  await store.copyHashTo(remotePath, hash);
  stats.uploads += 1;
  output.stored(hash, remotePath);
  await scheduler.tick();
}

async function reconcileEntry(
  entry: LocalEntry,
  remoteDir: string,
  remote: RemoteDirectoryState,
  symlinks: SymlinkTask[],
  ctx: ReconcileContext,
): Promise<void> {
  if (!entry.utf8Name) {
    throw new EntryError(
      entry.path,
      `could not parse file name ${JSON.stringify(entry.name)} as unicode`,
    );
  }
  const existing = remote.get(entry.name);
  const remotePath = remoteJoin(remoteDir, entry.name);

  switch (entry.type) {
    case "directory": {
      remote.delete(entry.name);
      const child = await reconcile(entry.path, remotePath, ctx);
      symlinks.push(...child.symlinks);
      return;
    }
    case "symlink": {
      // a link that cannot be deferred keeps its name in the set, so its old
      // remote copy is removed with the other stale names
      symlinks.push(await deferSymlink(entry.path, ctx.localRoot));
      remote.delete(entry.name);
      ctx.output.postponed(entry.path);
      return;
    }
    case "file": {
      remote.delete(entry.name);
      if (shouldUpload(existing, entry, { syncFrom: ctx.syncFrom })) {
        await uploadFile(entry, remotePath, ctx);
      }
      return;
    }
    default:
      throw new EntryError(entry.path, "not a regular file or directory");
  }
}

/**
 * Make `remoteDir` mirror `localDir`.
 *
 * Failures of single entries are recorded in `ctx.errors` and do not stop
 * the walk. Failures to create `remoteDir` or to list `localDir` are thrown
 * to the caller, which treats them as a failure of this directory's entry.
 */
export async function reconcile(
  localDir: string,
  remoteDir: string,
  ctx: ReconcileContext,
): Promise<ReconcileResult> {
  const { store, ignorer, errors, output, stats } = ctx;
  const errorsBefore = errors.count;
  output.entering(remoteDir);

  const remote = await ensureRemoteDirectory(remoteDir, ctx);
  const local = await listLocalDirectory(localDir);
  const symlinks: SymlinkTask[] = [];

  for (const entry of local) {
    const rel = toRel(entry.path, ctx.localRoot);
    if (ignorer.ignores(rel, entry.type === "directory")) {
      continue;
    }
    try {
      await reconcileEntry(entry, remoteDir, remote, symlinks, ctx);
    } catch (err) {
      errors.record(entry.path, err);
    }
  }

  // whatever was not matched has no local counterpart any more
  for (const name of remote.keys()) {
    const stale = remoteJoin(remoteDir, name);
    try {
      await store.remove(stale, { recursive: true });
      stats.deletions += 1;
    } catch (err) {
      errors.record(stale, err);
    }
  }

  return { symlinks, errors: errors.count - errorsBefore };
}
