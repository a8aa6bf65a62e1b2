/**
 * @linewise/completer
 *
 * Supervises a long-lived completion helper process and speaks its
 * newline-delimited protocol: code completion and go-to-definition for
 * the host's completion pipeline.
 */

// Main API
export {
  type CompletionSessionOptions,
  CompletionSession,
  type CreateCompletionSessionOptions,
  createCompletionSession,
  type HelperDebugInfo,
} from "./session.js";

// Config
export {
  type CompleterConfig,
  CompleterConfigSchema,
  parseCompleterConfig,
  type ResolvedHelperConfig,
  resolveHelperConfig,
} from "./config.js";
export { type BinaryLookup, findHelperBinary, findOnPath } from "./discovery.js";

// Protocol
export {
  type CommandArgument,
  decodeMatchLine,
  encodeCommand,
  type HelperCommand,
  isTerminator,
  MATCH_PREFIX,
  type MatchRecord,
  TERMINATOR,
} from "./protocol.js";
export { parseRequestContext, type RequestContext, RequestContextSchema } from "./request.js";
export {
  buildCompletionItem,
  buildGoToLocation,
  type CompletionItem,
  type GoToLocation,
} from "./responses.js";

// Subcommands
export {
  executeSubcommand,
  isSubcommand,
  SUBCOMMANDS,
  type Subcommand,
  type SubcommandResult,
  type SubcommandTarget,
} from "./subcommands.js";

// Process management
export { type HelperChild, HelperProcessHandle, spawnHelper } from "./process.js";
export {
  type HelperSpawner,
  type HelperState,
  HelperSupervisor,
  type HelperSupervisorOptions,
} from "./supervisor.js";
export { LineReader } from "./line-reader.js";
export { type ScratchFileOptions, withScratchFile } from "./scratch.js";
export { type CompleterLogger, createConsoleLogger, silentLogger } from "./logger.js";

// Package metadata
export const PACKAGE_NAME = "@linewise/completer";
export const PACKAGE_VERSION = "0.1.0";
