export { runMirror } from "./mirror.js";
export type {
  MirrorOptions,
  MirrorPhase,
  RunResult,
  RunStats,
} from "./mirror.js";
export { reconcile } from "./reconcile.js";
export type { ReconcileContext, ReconcileResult } from "./reconcile.js";
export { shouldUpload } from "./change-filter.js";
export { FlushScheduler } from "./flush-scheduler.js";
export { deferSymlink, materializeSymlinks } from "./symlinks.js";
export type { SymlinkTask } from "./symlinks.js";
export {
  EntryError,
  ErrorAccumulator,
  FatalError,
  StoreError,
} from "./errors.js";
export { KuboStoreClient } from "./kubo-client.js";
export type { KuboClientOptions } from "./kubo-client.js";
export type {
  ContentStore,
  RemoteEntry,
  RemoteStat,
  AddOptions,
} from "./store.js";
export { Output } from "./output.js";
export {
  ConsoleLogger,
  NullLogger,
  StructuredLogger,
  type Logger,
} from "./logger.js";
