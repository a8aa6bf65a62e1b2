import { createInterface, type Interface } from "node:readline";
import type { Readable } from "node:stream";

/**
 * Pull-based line reader over a stream. Lines that arrive while nobody is
 * waiting are buffered; once the stream ends, `next()` resolves
 * `undefined`.
 */
export class LineReader {
  private readonly rl: Interface;
  private readonly buffered: string[] = [];
  private readonly waiters: Array<(line: string | undefined) => void> = [];
  private ended = false;

  constructor(input: Readable) {
    this.rl = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY });
    this.rl.on("line", (line) => {
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(line);
      } else {
        this.buffered.push(line);
      }
    });
    this.rl.on("close", () => {
      this.ended = true;
      for (const waiter of this.waiters.splice(0)) waiter(undefined);
    });
  }

  next(): Promise<string | undefined> {
    const line = this.buffered.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.ended) return Promise.resolve(undefined);
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  close(): void {
    this.rl.close();
  }
}
