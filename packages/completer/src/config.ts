import { stat } from "node:fs/promises";
import { ValidationError } from "@linewise/errors";
import { z } from "zod";
import { findHelperBinary } from "./discovery.js";
import type { CompleterLogger } from "./logger.js";

/** Configuration for the completion helper and its session */
export const CompleterConfigSchema = z.object({
  /** Explicit path to the helper binary; must exist when given */
  binaryPath: z.string().min(1).optional(),
  /** Executable name looked up in `searchDirs` and then on PATH */
  binaryName: z.string().min(1).default("racer"),
  /** Directories holding a bundled helper build, searched before PATH */
  searchDirs: z.array(z.string().min(1)).default([]),
  /** Source-index location handed to the helper */
  sourceIndexPath: z.string().min(1).optional(),
  /** Environment variable that carries the source index (also read from the host env) */
  sourceIndexEnvVar: z.string().min(1).default("RUST_SRC_PATH"),
  /** Extra leading arguments, placed before the daemon sub-mode */
  args: z.array(z.string()).default([]),
  /** Argument that puts the helper into its line-protocol server mode */
  daemonCommand: z.string().min(1).default("daemon"),
  /** Extra environment variables for the helper process */
  env: z.record(z.string()).optional(),
  /** File types served by this completer */
  filetypes: z.array(z.string().min(1)).min(1).default(["rust"]),
  /** Read deadline per request; unset waits until END or end of stream */
  requestTimeoutMs: z.number().int().positive().optional(),
  /** Grace period after SIGTERM before SIGKILL on restart (default: 5000) */
  killTimeoutMs: z.number().int().positive().default(5000),
  /** Directory for scratch copies of unsaved buffers (default: OS temp dir) */
  scratchDir: z.string().min(1).optional(),
});

export type CompleterConfig = z.infer<typeof CompleterConfigSchema>;

/** Everything needed to launch the helper, with discovery already done. */
export interface ResolvedHelperConfig {
  readonly binary: string;
  readonly args: readonly string[];
  readonly sourceIndexPath: string;
  readonly env: NodeJS.ProcessEnv;
}

export function parseCompleterConfig(raw: unknown): CompleterConfig {
  const result = CompleterConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError({
      code: "CONFIG_INVALID",
      message: `Invalid completer configuration: ${result.error.issues
        .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
        .join("; ")}`,
      issues: result.error.issues.map((issue) => ({
        field: issue.path.join("."),
        message: issue.message,
        code: issue.code,
      })),
    });
  }
  return result.data;
}

/**
 * Locate the helper binary and the source index. Either one missing is a
 * configuration error: the completer does not come up without both.
 */
export async function resolveHelperConfig(
  config: CompleterConfig,
  env: NodeJS.ProcessEnv,
  logger: CompleterLogger,
): Promise<ResolvedHelperConfig> {
  const binary = await findHelperBinary(config, env);
  if (binary === undefined) {
    const message = config.binaryPath
      ? `Helper binary not found at '${config.binaryPath}'`
      : `Helper binary '${config.binaryName}' not found`;
    logger.error(message);
    throw new ValidationError({
      code: "CONFIG_HELPER_BINARY_NOT_FOUND",
      message,
      metadata: { binaryName: config.binaryName },
    });
  }

  const sourceIndexPath = config.sourceIndexPath ?? env[config.sourceIndexEnvVar];
  if (!sourceIndexPath || !(await pathExists(sourceIndexPath))) {
    const message = sourceIndexPath
      ? `Source index path '${sourceIndexPath}' does not exist`
      : `Source index path not found. Set ${config.sourceIndexEnvVar} or sourceIndexPath`;
    logger.error(message);
    throw new ValidationError({
      code: "CONFIG_SOURCE_INDEX_NOT_FOUND",
      message,
      metadata: { envVar: config.sourceIndexEnvVar },
    });
  }

  return {
    binary,
    args: [...config.args, config.daemonCommand],
    sourceIndexPath,
    env: { ...env, ...config.env, [config.sourceIndexEnvVar]: sourceIndexPath },
  };
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}
