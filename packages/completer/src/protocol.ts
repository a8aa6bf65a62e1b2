/**
 * Line protocol spoken by the helper over stdin/stdout.
 *
 * Requests are one line: the command followed by its arguments, separated
 * by single spaces. Arguments are not quoted or escaped, so a value that
 * contains a space or newline cannot be sent intact.
 *
 * Responses are any number of lines followed by a line reading exactly
 * `END`. Lines starting with `MATCH ` carry a candidate; everything else
 * is helper chatter.
 */

export const MATCH_PREFIX = "MATCH ";
export const TERMINATOR = "END";

/** Number of comma-separated fields in a match line. The last one keeps any further commas. */
const MATCH_FIELD_COUNT = 6;
const UNSIGNED_INTEGER = /^\d+$/;

export type HelperCommand = "complete" | "find-definition";

export type CommandArgument = string | number;

/**
 * One candidate from a `MATCH` line. `column` is 0-based as the helper
 * reports it; output shapes add one.
 */
export interface MatchRecord {
  readonly name: string;
  readonly line: number;
  readonly column: number;
  readonly filepath: string;
  readonly kind: string;
  readonly snippet: string;
}

export function encodeCommand(command: string, args: readonly CommandArgument[] = []): string {
  return `${[command, ...args.map(String)].join(" ")}\n`;
}

export function isTerminator(line: string): boolean {
  return line === TERMINATOR;
}

/**
 * Decode a response line. Returns `undefined` for anything that is not a
 * well-formed match line; never throws.
 */
export function decodeMatchLine(line: string): MatchRecord | undefined {
  if (!line.startsWith(MATCH_PREFIX)) return undefined;

  const fields = splitBounded(line.slice(MATCH_PREFIX.length), ",", MATCH_FIELD_COUNT);
  const [name, lineText, columnText, filepath, kind, snippet] = fields;
  if (
    name === undefined ||
    lineText === undefined ||
    columnText === undefined ||
    filepath === undefined ||
    kind === undefined ||
    snippet === undefined
  ) {
    return undefined;
  }
  if (!UNSIGNED_INTEGER.test(lineText) || !UNSIGNED_INTEGER.test(columnText)) return undefined;

  return {
    name,
    line: Number(lineText),
    column: Number(columnText),
    filepath,
    kind,
    snippet,
  };
}

/**
 * Split on `separator` into at most `limit` parts; the final part holds
 * the unsplit remainder.
 */
function splitBounded(text: string, separator: string, limit: number): string[] {
  const parts: string[] = [];
  let rest = text;
  while (parts.length < limit - 1) {
    const index = rest.indexOf(separator);
    if (index === -1) break;
    parts.push(rest.slice(0, index));
    rest = rest.slice(index + separator.length);
  }
  parts.push(rest);
  return parts;
}
