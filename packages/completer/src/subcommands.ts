import { InternalError, ValidationError } from "@linewise/errors";
import { parseRequestContext, type RequestContext } from "./request.js";
import type { GoToLocation } from "./responses.js";

/** Subcommands the host may invoke, in the order they are advertised. */
export const SUBCOMMANDS = [
  "GoToDefinition",
  "GoToDeclaration",
  "GoTo",
  "StartServer",
  "StopServer",
  "RestartServer",
  "ServerRunning",
] as const;

export type Subcommand = (typeof SUBCOMMANDS)[number];

export type SubcommandResult = GoToLocation | boolean | undefined;

/** Operations a subcommand can be bound to. */
export interface SubcommandTarget {
  goToDefinition(request: RequestContext): Promise<GoToLocation>;
  startServer(): Promise<void>;
  stopServer(): Promise<void>;
  restartServer(): Promise<void>;
  isServerRunning(): boolean;
}

export function isSubcommand(name: string): name is Subcommand {
  return SUBCOMMANDS.some((subcommand) => subcommand === name);
}

/**
 * Run a subcommand by name. The helper protocol has a single lookup, so
 * declaration and definition requests share it.
 */
export async function executeSubcommand(
  target: SubcommandTarget,
  name: string,
  request?: unknown,
): Promise<SubcommandResult> {
  if (!isSubcommand(name)) {
    throw new ValidationError({
      code: "COMPLETER_UNKNOWN_SUBCOMMAND",
      message: `Unknown subcommand '${name}'. Supported: ${SUBCOMMANDS.join(", ")}`,
      metadata: { subcommand: name },
    });
  }

  switch (name) {
    case "GoToDefinition":
    case "GoToDeclaration":
    case "GoTo":
      return target.goToDefinition(parseRequestContext(request));
    case "StartServer":
      await target.startServer();
      return undefined;
    case "StopServer":
      await target.stopServer();
      return undefined;
    case "RestartServer":
      await target.restartServer();
      return undefined;
    case "ServerRunning":
      return target.isServerRunning();
    default: {
      const unhandled: never = name;
      throw new InternalError(`Unhandled subcommand '${String(unhandled)}'`);
    }
  }
}
