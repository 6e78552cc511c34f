// src/change-filter.ts
import type { RemoteEntry } from "./store.js";

export interface LocalFileInfo {
  size: number;
  ctimeMs: number;
}

export interface ChangeFilterOptions {
  /** UNIX seconds; selects change-time mode when set. */
  syncFrom?: number;
}

/**
 * Decide whether a local file must be (re)uploaded.
 *
 * Without `syncFrom` only a size difference counts as a change, so an edit
 * that keeps the byte length is not noticed. With `syncFrom` the size is not
 * looked at and a file whose ctime is not past the threshold is assumed to
 * be unchanged.
 */
export function shouldUpload(
  remote: RemoteEntry | undefined,
  local: LocalFileInfo,
  { syncFrom }: ChangeFilterOptions = {},
): boolean {
  if (remote === undefined || remote.type !== "file") {
    return true;
  }
  if (syncFrom !== undefined) {
    return local.ctimeMs > syncFrom * 1000;
  }
  return remote.size !== local.size;
}
