// src/local-fs.ts
import * as walk from "@nodelib/fs.walk";
import type { Stats } from "node:fs";
import { lstat, readdir } from "node:fs/promises";

export type LocalEntryType = "file" | "directory" | "symlink" | "other";

export interface LocalEntry {
  name: string;
  path: string;
  type: LocalEntryType;
  size: number;
  ctimeMs: number;
  /** False when the on-disk name is not valid UTF-8. */
  utf8Name: boolean;
}

type TypeProbe = Pick<Stats, "isSymbolicLink" | "isDirectory" | "isFile">;

function entryType(st: TypeProbe): LocalEntryType {
  if (st.isSymbolicLink()) return "symlink";
  if (st.isDirectory()) return "directory";
  if (st.isFile()) return "file";
  return "other";
}

function readLevel(dir: string): Promise<walk.Entry[]> {
  return new Promise((resolve, reject) => {
    walk.walk(
      dir,
      {
        // lstat is ours: it fails on names that do not decode
        stats: false,
        followSymbolicLinks: false,
        // one level only; the reconciler recurses itself
        deepFilter: () => false,
      },
      (err, entries) => {
        if (err) reject(err);
        else resolve(entries);
      },
    );
  });
}

// readdir decodes names as UTF-8 and substitutes U+FFFD for invalid bytes,
// so such a name cannot be mapped back to the file on disk.
export function isUtf8Name(raw: Buffer): boolean {
  return Buffer.from(raw.toString("utf8"), "utf8").equals(raw);
}

// Decoded names that stand for at least one invalid on-disk name. Only
// names containing U+FFFD can be affected.
async function undecodableNames(
  dir: string,
  names: readonly string[],
): Promise<Set<string>> {
  const out = new Set<string>();
  if (!names.some((name) => name.includes("\uFFFD"))) return out;
  for (const raw of await readdir(dir, { encoding: "buffer" })) {
    if (!isUtf8Name(raw)) out.add(raw.toString("utf8"));
  }
  return out;
}

/**
 * Lists the immediate children of `dir` with lstat metadata, in whatever
 * order the filesystem reports them.
 */
export async function listLocalDirectory(dir: string): Promise<LocalEntry[]> {
  const entries = await readLevel(dir);
  const undecodable = await undecodableNames(
    dir,
    entries.map((e) => e.name),
  );
  const out: LocalEntry[] = [];
  for (const e of entries) {
    if (undecodable.has(e.name)) {
      out.push({
        name: e.name,
        path: e.path,
        type: entryType(e.dirent),
        size: 0,
        ctimeMs: 0,
        utf8Name: false,
      });
      continue;
    }
    const st = await lstat(e.path);
    out.push({
      name: e.name,
      path: e.path,
      type: entryType(st),
      size: st.size,
      ctimeMs: st.ctimeMs,
      utf8Name: true,
    });
  }
  return out;
}
