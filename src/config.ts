// src/config.ts
import { DEFAULT_API_HOST, DEFAULT_API_PORT } from "./constants.js";
import { parseLogLevel, type LogLevel, type Logger } from "./logger.js";
import { normalizeIgnorePatterns } from "./ignore.js";
import { parseDuration, parsePort, parseSyncFrom } from "./parse.js";
import { readSyncStamp } from "./sync-stamp.js";

// raw values as commander hands them over
export type MirrorCliOptions = {
  src: string;
  dst: string;
  apiHost?: string;
  apiPort?: string;
  flush?: string;
  syncFrom?: string;
  syncStamp?: string;
  nocopy?: boolean;
  ignore?: string[];
  verbose?: number;
  logLevel?: string;
};

export interface MirrorConfig {
  src: string;
  dst: string;
  apiUrl: string;
  /** Absent: flush only after the walk and after the symlink pass. */
  flushIntervalMs?: number;
  syncFrom?: number;
  syncStamp?: string;
  nocopy: boolean;
  ignoreRules: string[];
  verbosity: number;
  logLevel: LogLevel;
}

function resolveApiUrl(
  opts: MirrorCliOptions,
  env: NodeJS.ProcessEnv,
): string {
  const envUrl = env.MFS_MIRROR_API?.trim();
  if (envUrl && opts.apiHost === undefined && opts.apiPort === undefined) {
    return envUrl;
  }
  const host = opts.apiHost?.trim() || DEFAULT_API_HOST;
  const port =
    opts.apiPort !== undefined ? parsePort(opts.apiPort) : DEFAULT_API_PORT;
  return `http://${host.includes(":") ? `[${host}]` : host}:${port}`;
}

/** Throws FatalError on any value that does not parse. */
export function cliOptsToMirrorConfig(
  opts: MirrorCliOptions,
  env: NodeJS.ProcessEnv = process.env,
): MirrorConfig {
  return {
    src: opts.src,
    dst: opts.dst,
    apiUrl: resolveApiUrl(opts, env),
    flushIntervalMs:
      opts.flush !== undefined ? parseDuration(opts.flush) : undefined,
    syncFrom:
      opts.syncFrom !== undefined ? parseSyncFrom(opts.syncFrom) : undefined,
    syncStamp: opts.syncStamp?.trim() || undefined,
    nocopy: opts.nocopy === true,
    ignoreRules: normalizeIgnorePatterns(opts.ignore ?? []),
    verbosity: opts.verbose ?? 0,
    logLevel: parseLogLevel(
      opts.logLevel ?? env.MFS_MIRROR_LOG_LEVEL,
      "warn",
    ),
  };
}

/** An explicit threshold wins; the stamp file is the fallback. */
export async function resolveSyncFrom(
  config: MirrorConfig,
  logger: Logger,
): Promise<number | undefined> {
  if (config.syncFrom !== undefined) return config.syncFrom;
  if (config.syncStamp) return readSyncStamp(config.syncStamp, logger);
  return undefined;
}

// A zero interval asks for a commit on every write, which the daemon does
// by itself; any other setting leaves committing to the flush scheduler.
export function autoflushFor(flushIntervalMs: number | undefined): boolean {
  return flushIntervalMs !== undefined && flushIntervalMs <= 0;
}
