// src/cli-util.ts
import { readFileSync } from "node:fs";
import path from "node:path";
import { Command, CommanderError } from "commander";
import { z } from "zod";

const packageSchema = z.object({ version: z.string() });

export function readVersion(): string {
  // package.json sits one level above both src/ and dist/
  const file = path.join(__dirname, "..", "package.json");
  const parsed = packageSchema.safeParse(
    JSON.parse(readFileSync(file, "utf8")),
  );
  return parsed.success ? parsed.data.version : "0.0.0";
}

/**
 * Parse argv and run the program's action.  Fatal errors are reported
 * through commander (which prints and exits 1).
 */
export async function cliEntrypoint(
  buildProgram: () => Command,
  argv: string[] = process.argv,
): Promise<void> {
  const program = buildProgram();
  try {
    await program.parseAsync(argv);
  } catch (err) {
    if (err instanceof CommanderError) throw err;
    const msg = err instanceof Error ? (err.stack ?? err.message) : String(err);
    // usage text is for argument errors, not for failures while running
    program.showHelpAfterError(false);
    program.error(`${program.name()} fatal:\n${msg}`);
  }
}

/** Handy for tests: run with user argv, throwing instead of exiting. */
export async function parseAndRun(
  buildProgram: () => Command,
  argv: string[],
): Promise<void> {
  const program = buildProgram()
    .exitOverride()
    .configureOutput({ writeOut: () => {}, writeErr: () => {} });
  await program.parseAsync(argv, { from: "user" });
}
