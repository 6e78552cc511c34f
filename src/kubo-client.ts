// src/kubo-client.ts
//
// ContentStore over the kubo RPC API (POST /api/v0/<command>). Every files/*
// write passes flush=<autoflush>; with autoflush off the caller is expected
// to call flush() itself.

import { randomUUID } from "node:crypto";
import { openAsBlob } from "node:fs";
import path from "node:path";
import {
  DEFAULT_ADD_TIMEOUT_MS,
  DEFAULT_REQUEST_TIMEOUT_MS,
} from "./constants.js";
import { StoreError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type {
  AddOptions,
  ContentStore,
  RemoteEntry,
  RemoteEntryType,
  RemoteStat,
} from "./store.js";

export type FetchLike = typeof fetch;

export interface KuboClientOptions {
  /** e.g. http://127.0.0.1:5001 */
  apiUrl: string;
  autoflush?: boolean;
  timeoutMs?: number;
  addTimeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

type Params = [string, string][];

function field(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null || !(key in value)) {
    return undefined;
  }
  return Reflect.get(value, key);
}

function stringField(value: unknown, key: string): string {
  const v = field(value, key);
  if (typeof v !== "string") {
    throw new StoreError(`malformed response: missing ${key}`);
  }
  return v;
}

function numberField(value: unknown, key: string): number {
  const v = field(value, key);
  return typeof v === "number" && Number.isFinite(v) ? v : 0;
}

// files/ls reports 0 = file, 1 = directory; files/stat reports a string
function entryType(raw: unknown): RemoteEntryType {
  return raw === 1 || raw === "directory" ? "directory" : "file";
}

export function isNotFound(err: unknown): boolean {
  return /does not exist|no link named|not found/i.test(errorMessage(err));
}

// kubo answers errors with {"Message": "...", "Code": 0, "Type": "error"};
// proxies in front of it may answer with plain text
function daemonMessage(text: string): string | undefined {
  try {
    const m = field(JSON.parse(text), "Message");
    return typeof m === "string" && m ? m : undefined;
  } catch {
    return undefined;
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new StoreError(`malformed response: ${errorMessage(err)}`);
  }
}

export class KuboStoreClient implements ContentStore {
  private readonly base: string;
  private readonly autoflush: boolean;
  private readonly timeoutMs: number;
  private readonly addTimeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly logger?: Logger;

  constructor(opts: KuboClientOptions) {
    this.base = `${opts.apiUrl.replace(/\/+$/, "")}/api/v0`;
    this.autoflush = opts.autoflush ?? false;
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.addTimeoutMs = opts.addTimeoutMs ?? DEFAULT_ADD_TIMEOUT_MS;
    this.fetchImpl = opts.fetch ?? fetch;
    this.logger = opts.logger;
  }

  private async request(
    command: string,
    params: Params,
    init: { body?: Blob; contentType?: string; timeoutMs?: number } = {},
  ): Promise<string> {
    const query = new URLSearchParams(params).toString();
    const url = `${this.base}/${command}${query ? `?${query}` : ""}`;
    this.logger?.debug("request", { command, params });
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: "POST",
        body: init.body,
        headers: init.contentType
          ? { "Content-Type": init.contentType }
          : undefined,
        signal: AbortSignal.timeout(init.timeoutMs ?? this.timeoutMs),
      });
    } catch (err) {
      throw new StoreError(`${command}: ${errorMessage(err)}`, undefined, {
        cause: err,
      });
    }
    const text = await response.text();
    if (!response.ok) {
      const message =
        daemonMessage(text) ?? (text.trim() || response.statusText);
      throw new StoreError(`${command}: ${message}`, response.status);
    }
    return text;
  }

  private flushParam(): [string, string] {
    return ["flush", String(this.autoflush)];
  }

  async list(remotePath: string): Promise<RemoteEntry[]> {
    // files/ls on a file answers with the file itself
    const { type } = await this.stat(remotePath);
    if (type !== "directory") {
      throw new StoreError(`files/ls: ${remotePath} is not a directory`);
    }
    const body = parseJson(
      await this.request("files/ls", [
        ["arg", remotePath],
        ["long", "true"],
        ["U", "true"],
      ]),
    );
    const entries = field(body, "Entries");
    if (!Array.isArray(entries)) return [];
    return entries.map((e: unknown) => ({
      name: stringField(e, "Name"),
      type: entryType(field(e, "Type")),
      size: numberField(e, "Size"),
      hash: stringField(e, "Hash"),
    }));
  }

  async createDirectory(remotePath: string): Promise<void> {
    await this.request("files/mkdir", [
      ["arg", remotePath],
      ["parents", "true"],
      this.flushParam(),
    ]);
  }

  async remove(
    remotePath: string,
    { recursive }: { recursive: boolean },
  ): Promise<void> {
    const params: Params = [["arg", remotePath], this.flushParam()];
    if (recursive) {
      params.push(["recursive", "true"], ["force", "true"]);
    }
    await this.request("files/rm", params);
  }

  async stat(remotePath: string): Promise<RemoteStat> {
    const body = parseJson(
      await this.request("files/stat", [["arg", remotePath]]),
    );
    return {
      hash: stringField(body, "Hash"),
      size: numberField(body, "Size"),
      type: entryType(field(body, "Type")),
    };
  }

  async add(localPath: string, { pin, nocopy }: AddOptions): Promise<string> {
    const boundary = `----mfs-mirror-${randomUUID()}`;
    const headers = [
      `--${boundary}`,
      `Content-Disposition: form-data; name="file"; filename="${encodeURIComponent(path.basename(localPath))}"`,
      "Content-Type: application/octet-stream",
    ];
    if (nocopy) {
      // the filestore references the file by this path instead of a copy
      headers.push(`Abspath: ${localPath}`);
    }
    const body = new Blob([
      `${headers.join("\r\n")}\r\n\r\n`,
      await openAsBlob(localPath),
      `\r\n--${boundary}--\r\n`,
    ]);
    const text = await this.request(
      "add",
      [
        ["pin", String(pin)],
        ["nocopy", String(nocopy)],
        ["quieter", "true"],
      ],
      {
        body,
        contentType: `multipart/form-data; boundary=${boundary}`,
        timeoutMs: this.addTimeoutMs,
      },
    );
    // newline-delimited progress objects; the last one names the root
    const lines = text.split("\n").filter((line) => line.trim());
    const last = lines[lines.length - 1];
    if (last === undefined) {
      throw new StoreError("add: empty response");
    }
    return stringField(parseJson(last), "Hash");
  }

  async copyHashTo(remotePath: string, hash: string): Promise<void> {
    try {
      await this.remove(remotePath, { recursive: true });
    } catch (err) {
      if (!isNotFound(err)) throw err;
    }
    await this.request("files/cp", [
      ["arg", `/ipfs/${hash}`],
      ["arg", remotePath],
      this.flushParam(),
    ]);
  }

  async flush(remotePath: string): Promise<void> {
    await this.request("files/flush", [["arg", remotePath]]);
  }
}
