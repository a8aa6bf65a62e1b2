import { ExternalError } from "@linewise/errors";
import { describe, expect, it, vi } from "vitest";
import { silentLogger } from "../../logger.js";
import { HelperProcessHandle } from "../../process.js";
import { FakeHelperChild, scriptedResponder } from "../helpers/fake-helper.js";
import { createRecordingLogger } from "../helpers/fixtures.js";

function createHandle(child: FakeHelperChild): HelperProcessHandle {
  return new HelperProcessHandle(child, silentLogger);
}

describe("HelperProcessHandle", () => {
  it("writes request lines and reads replies", async () => {
    const child = new FakeHelperChild(1, scriptedResponder({ complete: ["MATCH a,1,0,/f,fn,x", "END"] }));
    const handle = createHandle(child);

    await handle.send("complete 1 1 /f /tmp/s\n");

    expect(await handle.readLine()).toBe("MATCH a,1,0,/f,fn,x");
    expect(await handle.readLine()).toBe("END");
    expect(child.received).toEqual(["complete 1 1 /f /tmp/s"]);
  });

  it("reports liveness from the exit status", () => {
    const child = new FakeHelperChild(2, () => {});
    const handle = createHandle(child);

    expect(handle.isAlive).toBe(true);
    expect(handle.pid).toBe(2);
    child.crash(3);
    expect(handle.isAlive).toBe(false);
    expect(child.exitCode).toBe(3);
  });

  it("is not alive after a spawn error", () => {
    const logger = createRecordingLogger();
    const child = new FakeHelperChild(3, () => {});
    const handle = new HelperProcessHandle(child, logger);

    child.emit("error", new Error("spawn racer ENOENT"));

    expect(handle.isAlive).toBe(false);
    expect(logger.lines).toContain("error: Helper (pid 3) failed: spawn racer ENOENT");
  });

  it("resolves undefined from readLine after the helper exits", async () => {
    const child = new FakeHelperChild(4, () => {});
    const handle = createHandle(child);

    child.crash();

    expect(await handle.readLine()).toBeUndefined();
  });

  it("rejects writes once the input pipe is gone", async () => {
    const child = new FakeHelperChild(5, () => {});
    const handle = createHandle(child);
    child.crash();

    const error = await handle.send("complete\n").catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ExternalError);
    expect(error).toMatchObject({ code: "HELPER_WRITE_FAILED" });
  });

  it("forwards stderr lines to the debug log", async () => {
    const logger = createRecordingLogger();
    const child = new FakeHelperChild(6, () => {});
    new HelperProcessHandle(child, logger);

    child.writeStderr("warning: index stale\n");
    await vi.waitFor(() => {
      expect(logger.lines).toContain("debug: helper stderr: warning: index stale");
    });
  });

  it("terminate sends SIGTERM without waiting", () => {
    const child = new FakeHelperChild(7, () => {});
    const handle = createHandle(child);

    handle.terminate();

    expect(child.signals).toEqual(["SIGTERM"]);
    expect(handle.isAlive).toBe(false);
  });

  it("terminate is a no-op for a dead helper", () => {
    const child = new FakeHelperChild(8, () => {});
    const handle = createHandle(child);
    child.crash();

    handle.terminate();

    expect(child.signals).toEqual([]);
  });

  it("terminateAndDrain waits for the pipes to close", async () => {
    const child = new FakeHelperChild(9, () => {});
    const handle = createHandle(child);
    let closed = false;
    child.once("close", () => {
      closed = true;
    });

    await handle.terminateAndDrain(1000);

    expect(closed).toBe(true);
    expect(child.signals).toEqual(["SIGTERM"]);
  });

  it("terminateAndDrain escalates to SIGKILL and waits for the close", async () => {
    const logger = createRecordingLogger();
    const child = new FakeHelperChild(10, () => {});
    child.ignoreSigterm = true;
    const handle = new HelperProcessHandle(child, logger);
    let closed = false;
    child.once("close", () => {
      closed = true;
    });

    await handle.terminateAndDrain(20);

    expect(child.signals).toEqual(["SIGTERM", "SIGKILL"]);
    expect(child.signalCode).toBe("SIGKILL");
    expect(closed).toBe(true);
    expect(logger.lines).toContain("warn: Helper (pid 10) ignored SIGTERM for 20ms, killing");
  });

  it("terminateAndDrain gives up on a helper that never closes", async () => {
    const logger = createRecordingLogger();
    const child = new FakeHelperChild(11, () => {});
    child.ignoreSigterm = true;
    child.kill = (signal: NodeJS.Signals = "SIGTERM") => {
      child.signals.push(signal);
      return true;
    };
    const handle = new HelperProcessHandle(child, logger);

    await handle.terminateAndDrain(10);

    expect(child.signals).toEqual(["SIGTERM", "SIGKILL"]);
    expect(logger.lines).toContain("error: Helper (pid 11) still open 10ms after SIGKILL");
  });
});
