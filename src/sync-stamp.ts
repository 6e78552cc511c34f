// src/sync-stamp.ts
//
// The stamp file holds the UNIX time (seconds) at which the last clean run
// started. It is the fallback change-time threshold for the next run.

import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { errorCode, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";

/** Returns 0 (full resync) when the file is missing or unreadable. */
export async function readSyncStamp(
  file: string,
  logger: Logger,
): Promise<number> {
  let raw: string;
  try {
    raw = await readFile(file, "utf8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      logger.info("no sync stamp yet, doing a full sync", { file });
    } else {
      logger.warn("cannot read sync stamp, doing a full sync", {
        file,
        err: errorMessage(err),
      });
    }
    return 0;
  }
  const text = raw.trim().replace(/^@/, "");
  if (!/^-?\d+$/.test(text)) {
    logger.warn("invalid sync stamp, doing a full sync", { file, raw: text });
    return 0;
  }
  return Number(text);
}

export async function writeSyncStamp(
  file: string,
  seconds: number,
): Promise<void> {
  await mkdir(path.dirname(file), { recursive: true });
  await writeFile(file, `${Math.floor(seconds)}\n`);
}
