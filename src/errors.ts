// src/errors.ts
import type { Logger } from "./logger.js";

/** Aborts the whole run; no root hash is produced. */
export class FatalError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "FatalError";
  }
}

/** A failure scoped to one local entry or one deferred symlink. */
export class EntryError extends Error {
  constructor(
    readonly path: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "EntryError";
  }
}

/** The store daemon rejected a request or could not be reached. */
export class StoreError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "StoreError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) {
    return undefined;
  }
  return typeof err.code === "string" ? err.code : undefined;
}

export type RunOutcome = "ok" | "partial";

export function classifyOutcome(errors: number): RunOutcome {
  return errors > 0 ? "partial" : "ok";
}

export class ErrorAccumulator {
  private total = 0;

  constructor(private readonly logger: Logger) {}

  get count(): number {
    return this.total;
  }

  record(path: string, err: unknown): void {
    this.total += 1;
    this.logger.error(`Error processing ${path}: ${errorMessage(err)}`, {
      path,
    });
  }

  merge(other: ErrorAccumulator): void {
    this.total += other.count;
  }
}
