import ignore from "ignore";
import path from "node:path";
import { readFile } from "node:fs/promises";
import { IGNORE_FILE } from "./constants.js";
import { errorCode } from "./errors.js";

export type Ignorer = {
  // rel is root-relative with posix separators
  ignores: (rel: string, isDir: boolean) => boolean;
};

function cleanPattern(pattern: string): string | null {
  const trimmed = pattern.trim();
  if (!trimmed) return null;
  return trimmed.replace(/\\/g, "/");
}

export function normalizeIgnorePatterns(patterns: string[]): string[] {
  const out = new Set<string>();
  for (const raw of patterns) {
    const cleaned = cleanPattern(raw);
    if (cleaned) out.add(cleaned);
  }
  return Array.from(out);
}

export function collectIgnoreOption(
  value: string,
  previous: string[] = [],
): string[] {
  const parts = value
    .split(",")
    .map((p) => p.trim())
    .filter(Boolean);
  return [...previous, ...parts];
}

export function createIgnorer(patterns: string[] = []): Ignorer {
  const cleaned = normalizeIgnorePatterns(patterns);
  if (!cleaned.length) {
    return { ignores: () => false };
  }
  const ig = ignore().add(cleaned);
  return {
    ignores: (rel, isDir) => {
      if (!rel) return false;
      return ig.ignores(isDir ? `${rel}/` : rel);
    },
  };
}

/** Rules from the ignore file at the top of the source tree, if any. */
export async function readIgnoreFile(root: string): Promise<string[]> {
  try {
    const raw = await readFile(path.join(root, IGNORE_FILE), "utf8");
    return raw
      .replace(/\r\n/g, "\n")
      .split("\n")
      .filter((line) => line.trim() && !line.trimStart().startsWith("#"));
  } catch (err) {
    if (errorCode(err) === "ENOENT") return [];
    throw err;
  }
}
