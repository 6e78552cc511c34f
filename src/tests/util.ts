import fsp from "node:fs/promises";
import { dirname, join } from "node:path";
import { ErrorAccumulator } from "../errors";
import { FlushScheduler } from "../flush-scheduler";
import { createIgnorer } from "../ignore";
import { StructuredLogger, type LogEntry } from "../logger";
import { runMirror, type MirrorOptions, type RunResult } from "../mirror";
import { Output } from "../output";
import { emptyStats, type ReconcileContext } from "../reconcile";
import { MemoryStore } from "./memory-store";

export async function fileExists(p: string) {
  try {
    await fsp.stat(p);
    return true;
  } catch {
    return false;
  }
}

export async function mkCase(tmpBase: string, name: string): Promise<string> {
  const src = join(tmpBase, name, "src");
  await fsp.mkdir(src, { recursive: true });
  // realpath so that paths compare equal to what the walker reports
  return fsp.realpath(src);
}

export async function writeTree(
  root: string,
  files: Record<string, string>,
): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const abs = join(root, rel);
    await fsp.mkdir(dirname(abs), { recursive: true });
    await fsp.writeFile(abs, content);
  }
}

export interface Capture {
  lines: string[];
  logs: LogEntry[];
  output: Output;
  logger: StructuredLogger;
}

export function capture(verbosity = 0): Capture {
  const lines: string[] = [];
  const logs: LogEntry[] = [];
  return {
    lines,
    logs,
    output: new Output(verbosity, (line) => lines.push(line)),
    logger: new StructuredLogger({ sink: (entry) => logs.push(entry) }),
  };
}

export function errorLogs(c: Capture): string[] {
  return c.logs.filter((e) => e.level === "error").map((e) => e.message);
}

export function makeContext(
  store: MemoryStore,
  localRoot: string,
  c: Capture,
  overrides: Partial<ReconcileContext> = {},
): ReconcileContext {
  return {
    store,
    localRoot,
    nocopy: false,
    ignorer: createIgnorer([]),
    scheduler: new FlushScheduler(() => store.flush("/dst"), undefined),
    output: c.output,
    errors: new ErrorAccumulator(c.logger),
    logger: c.logger,
    stats: emptyStats(),
    ...overrides,
  };
}

export function mirror(
  store: MemoryStore,
  src: string,
  c: Capture = capture(),
  opts: Partial<MirrorOptions> = {},
): Promise<RunResult> {
  return runMirror({
    src,
    dst: "/dst",
    store,
    output: c.output,
    logger: c.logger,
    ...opts,
  });
}
