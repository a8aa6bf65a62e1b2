import type { ResolvedHelperConfig } from "./config.js";
import { type CompleterLogger, createConsoleLogger } from "./logger.js";
import { type HelperProcessHandle, spawnHelper } from "./process.js";

/**
 * - stopped: no helper, or it was stopped on purpose
 * - running: the helper process is alive
 * - crashed: the helper exited on its own (noticed on the next probe)
 */
export type HelperState = "stopped" | "running" | "crashed";

export type HelperSpawner = (
  config: ResolvedHelperConfig,
  logger: CompleterLogger,
) => HelperProcessHandle;

export interface HelperSupervisorOptions {
  readonly spawn?: HelperSpawner;
  /** Grace period before SIGKILL when a restart drains the old helper (default: 5000) */
  readonly killTimeoutMs?: number;
  readonly logger?: CompleterLogger;
}

/**
 * Exclusive owner of the helper process handle. The handle is swapped
 * wholesale on restart; callers serialize access through the session queue.
 */
export class HelperSupervisor {
  private current: HelperProcessHandle | undefined;
  private readonly spawner: HelperSpawner;
  private readonly killTimeoutMs: number;
  private readonly logger: CompleterLogger;

  constructor(
    readonly config: ResolvedHelperConfig,
    options: HelperSupervisorOptions = {},
  ) {
    this.spawner = options.spawn ?? spawnHelper;
    this.killTimeoutMs = options.killTimeoutMs ?? 5000;
    this.logger = options.logger ?? createConsoleLogger("HelperSupervisor");
  }

  /** Launch the helper. A helper that is already alive is kept. */
  start(): HelperProcessHandle {
    if (this.current?.isAlive) {
      this.logger.debug("Helper server already running");
      return this.current;
    }
    this.current = this.spawner(this.config, this.logger);
    this.logger.info(`Started helper server ${pidLabel(this.current)}`);
    return this.current;
  }

  /** Signal the helper to exit without waiting for it. */
  stop(): void {
    const handle = this.current;
    if (!handle) return;
    handle.terminate();
    this.current = undefined;
    this.logger.info(`Stopped helper server ${pidLabel(handle)}`);
  }

  /** Terminate and drain the current helper, then launch a fresh one. */
  async restart(): Promise<HelperProcessHandle> {
    const previous = this.current;
    this.current = undefined;
    if (previous) {
      await previous.terminateAndDrain(this.killTimeoutMs);
    }
    this.current = this.spawner(this.config, this.logger);
    this.logger.info(`Restarted helper server ${pidLabel(this.current)}`);
    return this.current;
  }

  isAlive(): boolean {
    return this.current?.isAlive ?? false;
  }

  get state(): HelperState {
    if (!this.current) return "stopped";
    return this.current.isAlive ? "running" : "crashed";
  }

  get handle(): HelperProcessHandle | undefined {
    return this.current;
  }

  get pid(): number | undefined {
    return this.current?.pid;
  }
}

function pidLabel(handle: HelperProcessHandle): string {
  return handle.pid === undefined ? "(no pid)" : `(pid ${handle.pid})`;
}
