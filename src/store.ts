// src/store.ts
//
// What the mirror needs from the store daemon. Paths are absolute MFS paths
// with posix separators.

export type RemoteEntryType = "file" | "directory";

export interface RemoteEntry {
  name: string;
  type: RemoteEntryType;
  size: number;
  hash: string;
}

export interface RemoteStat {
  hash: string;
  size: number;
  type: RemoteEntryType;
}

export interface AddOptions {
  // always false: the MFS reference keeps the content alive
  pin: false;
  nocopy: boolean;
}

export interface ContentStore {
  list(path: string): Promise<RemoteEntry[]>;
  createDirectory(path: string): Promise<void>;
  remove(path: string, opts: { recursive: boolean }): Promise<void>;
  stat(path: string): Promise<RemoteStat>;
  add(localPath: string, opts: AddOptions): Promise<string>;
  /** Points `path` at `hash`, replacing whatever was there. */
  copyHashTo(path: string, hash: string): Promise<void>;
  flush(path: string): Promise<void>;
}
