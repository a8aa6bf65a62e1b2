import { spawn } from "node:child_process";
import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import { ExternalError } from "@linewise/errors";
import type { ResolvedHelperConfig } from "./config.js";
import { LineReader } from "./line-reader.js";
import type { CompleterLogger } from "./logger.js";

/**
 * The parts of a child process the handle relies on. Node's
 * `ChildProcess` satisfies it; tests supply an in-process fake.
 */
export interface HelperChild {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly pid?: number | undefined;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(
    event: "close",
    listener: (code: number | null, signal: NodeJS.Signals | null) => void,
  ): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
}

/**
 * Wraps one spawned helper: request writes, response line reads, stderr
 * draining and termination.
 */
export class HelperProcessHandle {
  private readonly stdin: Writable;
  private readonly reader: LineReader;
  private readonly closed: Promise<void>;
  private spawnError: Error | undefined;

  constructor(
    private readonly child: HelperChild,
    private readonly logger: CompleterLogger,
  ) {
    const { stdin, stdout, stderr } = child;
    if (!stdin || !stdout || !stderr) {
      throw new ExternalError({
        code: "HELPER_NOT_RUNNING",
        message: "Helper process was started without stdio pipes",
      });
    }
    this.stdin = stdin;
    this.reader = new LineReader(stdout);

    this.closed = new Promise<void>((resolve) => {
      child.once("close", (code, signal) => {
        this.logger.debug(`Helper ${this.describe()} closed (code ${code}, signal ${signal})`);
        resolve();
      });
    });

    child.on("error", (err) => {
      this.spawnError = err;
      this.logger.error(`Helper ${this.describe()} failed: ${err.message}`);
    });

    // EPIPE after the helper dies surfaces through the write callback
    stdin.on("error", (err) => {
      this.logger.debug(`Helper stdin error: ${err.message}`);
    });
    stdout.on("error", (err) => {
      this.logger.debug(`Helper stdout error: ${err.message}`);
    });
    stderr.on("error", (err) => {
      this.logger.debug(`Helper stderr error: ${err.message}`);
    });

    // Keep stderr flowing so a chatty helper never blocks on a full pipe
    createInterface({ input: stderr, crlfDelay: Number.POSITIVE_INFINITY }).on("line", (line) => {
      this.logger.debug(`helper stderr: ${line}`);
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  /** Non-blocking liveness probe; does not tell a crash from a clean exit. */
  get isAlive(): boolean {
    return (
      this.spawnError === undefined && this.child.exitCode === null && this.child.signalCode === null
    );
  }

  /** Write one encoded request line. */
  send(line: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (!this.stdin.writable) {
        reject(
          new ExternalError({
            code: "HELPER_WRITE_FAILED",
            message: "Helper input pipe is closed",
          }),
        );
        return;
      }
      this.stdin.write(line, (err) => {
        if (err) {
          reject(
            new ExternalError({
              code: "HELPER_WRITE_FAILED",
              message: `Failed to write to helper: ${err.message}`,
              cause: err,
            }),
          );
        } else {
          resolve();
        }
      });
    });
  }

  /** Next stdout line, or `undefined` once the helper's output has closed. */
  readLine(): Promise<string | undefined> {
    return this.reader.next();
  }

  /** Send SIGTERM without waiting for the process to go away. */
  terminate(): void {
    if (this.isAlive) this.child.kill("SIGTERM");
  }

  /**
   * Send SIGTERM and wait until the helper's pipes have closed, escalating
   * to SIGKILL after `timeoutMs`. The wait after SIGKILL is bounded by
   * `timeoutMs` as well.
   */
  async terminateAndDrain(timeoutMs: number): Promise<void> {
    if (this.spawnError) return;
    this.terminate();

    if (!(await this.waitForClose(timeoutMs))) {
      this.logger.warn(`Helper ${this.describe()} ignored SIGTERM for ${timeoutMs}ms, killing`);
      this.child.kill("SIGKILL");
      if (!(await this.waitForClose(timeoutMs))) {
        this.logger.error(`Helper ${this.describe()} still open ${timeoutMs}ms after SIGKILL`);
      }
    }
    this.reader.close();
  }

  /** Resolves true once the child has closed, false if `timeoutMs` passes first. */
  private async waitForClose(timeoutMs: number): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([this.closed.then(() => true), expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  private describe(): string {
    return this.child.pid === undefined ? "(no pid)" : `(pid ${this.child.pid})`;
  }
}

/**
 * Launch the helper in its server sub-mode with piped stdio.
 */
export function spawnHelper(
  config: ResolvedHelperConfig,
  logger: CompleterLogger,
): HelperProcessHandle {
  const proc = spawn(config.binary, [...config.args], {
    stdio: ["pipe", "pipe", "pipe"],
    env: config.env,
  });
  return new HelperProcessHandle(proc, logger);
}
