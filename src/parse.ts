// src/parse.ts
import { FatalError } from "./errors.js";

const UNIT_MS: Record<string, number> = {
  ms: 1,
  msec: 1,
  s: 1000,
  sec: 1000,
  secs: 1000,
  m: 60_000,
  min: 60_000,
  mins: 60_000,
  h: 3_600_000,
  hr: 3_600_000,
  hrs: 3_600_000,
  d: 86_400_000,
  day: 86_400_000,
  days: 86_400_000,
};

/** "250ms", "30s", "5m", "1h 30m", "1h30m"; returns milliseconds. */
export function parseDuration(raw: string): number {
  const text = raw.trim().toLowerCase();
  if (text === "0") return 0;
  const re = /(\d+(?:\.\d+)?)\s*([a-z]+)\s*/y;
  let total = 0;
  let pos = 0;
  while (pos < text.length) {
    re.lastIndex = pos;
    const m = re.exec(text);
    const unit = m ? UNIT_MS[m[2]] : undefined;
    if (!m || unit === undefined) {
      throw new FatalError(`could not parse duration '${raw}'`);
    }
    total += Number(m[1]) * unit;
    pos = re.lastIndex;
  }
  if (pos === 0) {
    throw new FatalError(`could not parse duration '${raw}'`);
  }
  return Math.round(total);
}

/**
 * Change-time threshold in UNIX seconds: either `@<seconds>` or a timestamp
 * Date can parse (RFC 3339 / ISO 8601).
 */
export function parseSyncFrom(raw: string): number {
  const text = raw.trim();
  const at = /^@(-?\d+)$/.exec(text);
  if (at) return Number(at[1]);
  const ms = text ? Date.parse(text) : Number.NaN;
  if (Number.isNaN(ms)) {
    throw new FatalError(`could not parse timestamp '${raw}'`);
  }
  return Math.floor(ms / 1000);
}

export function parsePort(raw: string | number): number {
  const port = typeof raw === "number" ? raw : Number(raw.trim());
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new FatalError(`could not parse API port '${raw}'`);
  }
  return port;
}
