import { InternalError, ValidationError } from "@linewise/errors";
import { describe, expect, it, vi } from "vitest";
import { parseRequestContext } from "../../request.js";
import { executeSubcommand, isSubcommand, type SubcommandTarget } from "../../subcommands.js";
import { createTestRequest } from "../helpers/fixtures.js";

function createTarget(running = true) {
  return {
    goToDefinition: vi.fn(async () => ({ lineNum: 4, columnNum: 12, filepath: "/workspace/src/lib.rs" })),
    startServer: vi.fn(async () => {}),
    stopServer: vi.fn(async () => {}),
    restartServer: vi.fn(async () => {}),
    isServerRunning: vi.fn(() => running),
  } satisfies SubcommandTarget;
}

describe("isSubcommand", () => {
  it("accepts the advertised names only", () => {
    expect(isSubcommand("GoTo")).toBe(true);
    expect(isSubcommand("ServerRunning")).toBe(true);
    expect(isSubcommand("goto")).toBe(false);
    expect(isSubcommand("GetType")).toBe(false);
  });
});

describe("executeSubcommand", () => {
  it.each(["GoToDefinition", "GoToDeclaration", "GoTo"])(
    "%s routes to the definition lookup",
    async (name) => {
      const target = createTarget();
      const request = createTestRequest();

      const result = await executeSubcommand(target, name, request);

      expect(result).toEqual({ lineNum: 4, columnNum: 12, filepath: "/workspace/src/lib.rs" });
      expect(target.goToDefinition).toHaveBeenCalledWith(request);
    },
  );

  it("fills request defaults before the lookup", async () => {
    const target = createTarget();

    await executeSubcommand(target, "GoTo", { filepath: "/a.rs", lineNum: 1, columnNum: 1 });

    expect(target.goToDefinition).toHaveBeenCalledWith({
      filepath: "/a.rs",
      lineNum: 1,
      columnNum: 1,
      contents: "",
    });
  });

  it("rejects a go-to without a request", async () => {
    const target = createTarget();

    await expect(executeSubcommand(target, "GoToDefinition")).rejects.toMatchObject({
      code: "COMPLETER_REQUEST_INVALID",
    });
    expect(target.goToDefinition).not.toHaveBeenCalled();
  });

  it("rejects a go-to with a malformed request", async () => {
    const target = createTarget();

    const failure = executeSubcommand(target, "GoTo", { filepath: "/a.rs", lineNum: 0, columnNum: 2 });

    await expect(failure).rejects.toBeInstanceOf(ValidationError);
    await expect(failure).rejects.toMatchObject({
      issues: [expect.objectContaining({ field: "lineNum" })],
    });
  });

  it("runs server control subcommands", async () => {
    const target = createTarget();

    expect(await executeSubcommand(target, "StartServer")).toBeUndefined();
    expect(await executeSubcommand(target, "StopServer")).toBeUndefined();
    expect(await executeSubcommand(target, "RestartServer")).toBeUndefined();

    expect(target.startServer).toHaveBeenCalledTimes(1);
    expect(target.stopServer).toHaveBeenCalledTimes(1);
    expect(target.restartServer).toHaveBeenCalledTimes(1);
  });

  it("reports liveness for ServerRunning", async () => {
    expect(await executeSubcommand(createTarget(true), "ServerRunning")).toBe(true);
    expect(await executeSubcommand(createTarget(false), "ServerRunning")).toBe(false);
  });

  it("rejects unknown subcommands with the supported list", async () => {
    const failure = executeSubcommand(createTarget(), "FixIt");

    await expect(failure).rejects.toBeInstanceOf(ValidationError);
    await expect(failure).rejects.toMatchObject({
      code: "COMPLETER_UNKNOWN_SUBCOMMAND",
      message:
        "Unknown subcommand 'FixIt'. Supported: GoToDefinition, GoToDeclaration, GoTo, StartServer, StopServer, RestartServer, ServerRunning",
    });
    await expect(failure).rejects.not.toBeInstanceOf(InternalError);
  });
});

describe("parseRequestContext", () => {
  it("keeps the optional start column", () => {
    expect(
      parseRequestContext({ filepath: "/a.rs", lineNum: 2, columnNum: 5, startColumn: 3, contents: "x" }),
    ).toEqual({ filepath: "/a.rs", lineNum: 2, columnNum: 5, startColumn: 3, contents: "x" });
  });

  it("rejects non-integer positions", () => {
    expect(() => parseRequestContext({ filepath: "/a.rs", lineNum: 1.5, columnNum: 1 })).toThrow(
      "Invalid request context",
    );
  });
});
