import { ExternalError, NotFoundError, TimeoutError } from "@linewise/errors";
import pLimit from "p-limit";
import { parseCompleterConfig, resolveHelperConfig } from "./config.js";
import { type CompleterLogger, createConsoleLogger } from "./logger.js";
import type { HelperProcessHandle } from "./process.js";
import {
  type CommandArgument,
  decodeMatchLine,
  encodeCommand,
  type HelperCommand,
  isTerminator,
} from "./protocol.js";
import type { RequestContext } from "./request.js";
import {
  buildCompletionItem,
  buildGoToLocation,
  type CompletionItem,
  type GoToLocation,
} from "./responses.js";
import { withScratchFile } from "./scratch.js";
import {
  executeSubcommand,
  SUBCOMMANDS,
  type Subcommand,
  type SubcommandResult,
  type SubcommandTarget,
} from "./subcommands.js";
import { type HelperSpawner, type HelperState, HelperSupervisor } from "./supervisor.js";

export interface CompletionSessionOptions {
  /** Read deadline per request; on expiry the helper is restarted */
  readonly requestTimeoutMs?: number | undefined;
  /** Directory for scratch files (default: OS temp dir) */
  readonly scratchDir?: string | undefined;
  /** File types this session serves (default: ["rust"]) */
  readonly filetypes?: readonly string[];
  readonly logger?: CompleterLogger;
}

export interface HelperDebugInfo {
  readonly binary: string;
  readonly sourceIndexPath: string;
  readonly pid: number | undefined;
  readonly state: HelperState;
}

/**
 * Talks to the helper on behalf of the host. Every exchange, and every
 * start/stop/restart, runs through a concurrency-1 queue: the protocol
 * carries no request ids, so only one request may be in flight on the
 * pipes.
 */
export class CompletionSession implements SubcommandTarget {
  private readonly serialize = pLimit(1);
  private readonly requestTimeoutMs: number | undefined;
  private readonly scratchDir: string | undefined;
  private readonly logger: CompleterLogger;
  readonly filetypes: readonly string[];

  constructor(
    private readonly supervisor: HelperSupervisor,
    options: CompletionSessionOptions = {},
  ) {
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.scratchDir = options.scratchDir;
    this.filetypes = options.filetypes ?? ["rust"];
    this.logger = options.logger ?? createConsoleLogger("CompletionSession");
  }

  /**
   * Completion candidates at `startColumn`. The buffer is mirrored to a
   * scratch file because the helper only reads from disk.
   */
  complete(request: RequestContext): Promise<CompletionItem[]> {
    return this.serialize(async () => {
      this.requireRunning();
      if (!request.filepath) return [];

      const lines = await withScratchFile(
        request.contents,
        { dir: this.scratchDir, sourcePath: request.filepath },
        (scratchPath) =>
          this.exchange("complete", [
            request.lineNum,
            request.startColumn ?? request.columnNum,
            request.filepath,
            scratchPath,
          ]),
      );

      const items: CompletionItem[] = [];
      for (const line of lines) {
        const match = decodeMatchLine(line);
        if (match) items.push(buildCompletionItem(match));
      }
      return items;
    });
  }

  /** Location of the first match the helper reports. */
  goToDefinition(request: RequestContext): Promise<GoToLocation> {
    return this.serialize(async () => {
      const lines = await this.exchange("find-definition", [
        request.lineNum,
        request.columnNum,
        request.filepath,
      ]);

      for (const line of lines) {
        const match = decodeMatchLine(line);
        if (match) return buildGoToLocation(match);
      }
      throw new NotFoundError({
        code: "COMPLETER_DEFINITION_NOT_FOUND",
        message: "Could not find definition",
        metadata: { filepath: request.filepath, lineNum: String(request.lineNum) },
      });
    });
  }

  startServer(): Promise<void> {
    return this.serialize(() => {
      this.supervisor.start();
    });
  }

  stopServer(): Promise<void> {
    return this.serialize(() => {
      this.supervisor.stop();
    });
  }

  restartServer(): Promise<void> {
    return this.serialize(async () => {
      await this.supervisor.restart();
    });
  }

  isServerRunning(): boolean {
    return this.supervisor.isAlive();
  }

  execute(subcommand: string, request?: unknown): Promise<SubcommandResult> {
    return executeSubcommand(this, subcommand, request);
  }

  subcommands(): readonly Subcommand[] {
    return SUBCOMMANDS;
  }

  supportsFiletype(filetype: string): boolean {
    return this.filetypes.includes(filetype);
  }

  debugInfo(): HelperDebugInfo {
    return {
      binary: this.supervisor.config.binary,
      sourceIndexPath: this.supervisor.config.sourceIndexPath,
      pid: this.supervisor.pid,
      state: this.supervisor.state,
    };
  }

  private requireRunning(): HelperProcessHandle {
    const handle = this.supervisor.handle;
    if (!handle?.isAlive) {
      throw new ExternalError({
        code: "HELPER_NOT_RUNNING",
        message: "Helper server not running",
        metadata: { state: this.supervisor.state },
      });
    }
    return handle;
  }

  /** Send one command and collect response lines up to the terminator. */
  private async exchange(
    command: HelperCommand,
    args: readonly CommandArgument[],
  ): Promise<string[]> {
    const handle = this.requireRunning();
    await handle.send(encodeCommand(command, args));

    const timeoutMs = this.requestTimeoutMs;
    if (timeoutMs === undefined) return readResponse(handle);

    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(
          new TimeoutError({
            code: "HELPER_RESPONSE_TIMEOUT",
            message: `Helper did not answer '${command}' within ${timeoutMs}ms`,
            timeoutMs,
          }),
        );
      }, timeoutMs);
    });

    try {
      return await Promise.race([readResponse(handle), deadline]);
    } catch (err) {
      if (err instanceof TimeoutError) {
        this.logger.warn(`${err.message}; restarting helper`);
        await this.supervisor.restart();
      }
      throw err;
    } finally {
      clearTimeout(timer);
    }
  }
}

async function readResponse(handle: HelperProcessHandle): Promise<string[]> {
  const response: string[] = [];
  for (;;) {
    const raw = await handle.readLine();
    if (raw === undefined) {
      throw new ExternalError({
        code: "HELPER_STREAM_CLOSED",
        message: "Helper server closed its output before finishing a response",
        metadata: { linesRead: String(response.length) },
      });
    }
    const line = raw.trim();
    if (isTerminator(line)) return response;
    response.push(line);
  }
}

export interface CreateCompletionSessionOptions {
  /** Environment the helper inherits (default: process.env) */
  readonly env?: NodeJS.ProcessEnv;
  readonly logger?: CompleterLogger;
  readonly spawn?: HelperSpawner;
}

/**
 * Validate configuration, locate the helper and start it. Configuration
 * errors propagate; there is no degraded mode.
 */
export async function createCompletionSession(
  rawConfig: unknown,
  options: CreateCompletionSessionOptions = {},
): Promise<CompletionSession> {
  const logger = options.logger ?? createConsoleLogger("CompletionSession");
  const config = parseCompleterConfig(rawConfig);
  const resolved = await resolveHelperConfig(config, options.env ?? process.env, logger);

  const supervisor = new HelperSupervisor(resolved, {
    killTimeoutMs: config.killTimeoutMs,
    logger,
    ...(options.spawn ? { spawn: options.spawn } : {}),
  });
  const session = new CompletionSession(supervisor, {
    requestTimeoutMs: config.requestTimeoutMs,
    scratchDir: config.scratchDir,
    filetypes: config.filetypes,
    logger,
  });

  await session.startServer();
  logger.info(`Enabling completion for ${config.filetypes.join(", ")}`);
  return session;
}
