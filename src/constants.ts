export const CLI_NAME = "mfs-mirror";
export const VERSION = "0.4.0";

export const DEFAULT_API_HOST = "127.0.0.1";
export const DEFAULT_API_PORT = 5001;

// kubo can take a long time to chunk and hash large files
export const DEFAULT_ADD_TIMEOUT_MS = 10 * 60_000;
export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

// gitignore-style rules read from the top of the source tree
export const IGNORE_FILE = ".mfsignore";
