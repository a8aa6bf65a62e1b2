import { randomUUID } from "node:crypto";
import { rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { extname, join } from "node:path";
import { getErrorMessage, InternalError } from "@linewise/errors";

export interface ScratchFileOptions {
  /** Directory to create the file in (default: OS temp dir) */
  readonly dir?: string | undefined;
  /** Path of the buffer being mirrored; its extension is kept */
  readonly sourcePath: string;
}

/**
 * Mirror unsaved buffer contents to a temporary file for the duration of
 * `task`. The file is removed on every exit path, including a write that
 * fails partway.
 */
export async function withScratchFile<T>(
  contents: string,
  options: ScratchFileOptions,
  task: (scratchPath: string) => Promise<T>,
): Promise<T> {
  const scratchPath = join(
    options.dir ?? tmpdir(),
    `linewise-${randomUUID()}${extname(options.sourcePath)}`,
  );
  try {
    await writeScratch(scratchPath, contents);
    return await task(scratchPath);
  } finally {
    await rm(scratchPath, { force: true });
  }
}

async function writeScratch(scratchPath: string, contents: string): Promise<void> {
  try {
    await writeFile(scratchPath, contents, { encoding: "utf8", flag: "wx" });
  } catch (err) {
    throw new InternalError({
      code: "COMPLETER_SCRATCH_WRITE_FAILED",
      message: `Failed to write scratch file '${scratchPath}': ${getErrorMessage(err)}`,
      metadata: { scratchPath },
      cause: err instanceof Error ? err : undefined,
    });
  }
}
