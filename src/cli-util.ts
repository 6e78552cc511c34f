// src/cli-util.ts
import { Command, type OptionValues } from "commander";
import { errorMessage } from "./errors.js";

/**
 * Minimal CLI bootstrap:
 * - If this module is the process entry point, parse argv, call `run(opts)`
 *   and exit with the code it returns
 * - If imported, do nothing (so caller can call run() directly)
 */
export function cliEntrypoint<T extends OptionValues>(
  isMain: boolean,
  buildProgram: () => Command,
  run: (opts: T, program: Command) => Promise<number>,
  opts?: { label?: string },
): void {
  if (!isMain) return;

  const program = buildProgram();
  const options = program.parse(process.argv).opts<T>();
  run(options, program).then(
    (code) => process.exit(code),
    (err: unknown) => {
      const label = opts?.label || program.name() || "command";
      const msg =
        err instanceof Error && err.stack ? err.stack : errorMessage(err);
      console.error(`${label} fatal:\n${msg}`);
      process.exit(2);
    },
  );
}

/** Handy for tests: run a command with custom argv without process.exit */
export async function parseAndRun<T extends OptionValues>(
  buildProgram: () => Command,
  run: (opts: T, program: Command) => Promise<number>,
  argv: string[],
): Promise<number> {
  const program = buildProgram();
  program.exitOverride();
  const options = program.parse(argv, { from: "user" }).opts<T>();
  return run(options, program);
}
