// src/path-rel.ts
import path from "node:path";

export function toPosix(p: string): string {
  return path.sep === "/" ? p : p.split(path.sep).join("/");
}

// root-relative, posix separators, "" for the root itself
export function toRel(abs: string, root: string): string {
  return toPosix(path.relative(root, abs));
}

export function isInside(rel: string): boolean {
  return rel !== ".." && !rel.startsWith("../") && !path.isAbsolute(rel);
}

export function remoteJoin(dir: string, ...parts: string[]): string {
  return path.posix.join(dir, ...parts);
}

export function normalizeRemotePath(raw: string): string | null {
  const trimmed = raw.trim();
  if (!trimmed.startsWith("/")) return null;
  const normalized = path.posix.normalize(trimmed);
  return normalized.length > 1 && normalized.endsWith("/")
    ? normalized.slice(0, -1)
    : normalized;
}
