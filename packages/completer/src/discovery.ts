import { constants } from "node:fs";
import { access, stat } from "node:fs/promises";
import { delimiter, extname, join } from "node:path";

export interface BinaryLookup {
  readonly binaryPath?: string | undefined;
  readonly binaryName: string;
  readonly searchDirs: readonly string[];
}

/**
 * Find the helper executable. An explicit `binaryPath` is used as-is or
 * not at all; otherwise bundled `searchDirs` win over PATH.
 */
export async function findHelperBinary(
  lookup: BinaryLookup,
  env: NodeJS.ProcessEnv,
): Promise<string | undefined> {
  if (lookup.binaryPath) {
    return (await isFile(lookup.binaryPath)) ? lookup.binaryPath : undefined;
  }

  const name = executableName(lookup.binaryName);
  for (const dir of lookup.searchDirs) {
    const candidate = join(dir, name);
    if (await isExecutable(candidate)) return candidate;
  }
  return findOnPath(name, env);
}

/** First executable named `name` in the directories listed by PATH. */
export async function findOnPath(name: string, env: NodeJS.ProcessEnv): Promise<string | undefined> {
  const dirs = (env.PATH ?? "").split(delimiter).filter((dir) => dir.length > 0);
  for (const dir of dirs) {
    const candidate = join(dir, name);
    if (await isExecutable(candidate)) return candidate;
  }
  return undefined;
}

function executableName(name: string): string {
  return process.platform === "win32" && extname(name) === "" ? `${name}.exe` : name;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

async function isExecutable(path: string): Promise<boolean> {
  if (!(await isFile(path))) return false;
  try {
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
