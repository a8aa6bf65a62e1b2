import type { MatchRecord } from "./protocol.js";

/** Completion candidate in the shape the host's completion pipeline renders. */
export interface CompletionItem {
  readonly insertionText: string;
  readonly menuText: string;
  readonly kind: string;
  readonly extraMenuInfo: string;
}

/** Go-to target; `lineNum` and `columnNum` are 1-based. */
export interface GoToLocation {
  readonly lineNum: number;
  readonly columnNum: number;
  readonly filepath: string;
}

export function buildCompletionItem(match: MatchRecord): CompletionItem {
  return {
    insertionText: match.name,
    menuText: match.name,
    kind: match.kind,
    extraMenuInfo: match.snippet,
  };
}

export function buildGoToLocation(match: MatchRecord): GoToLocation {
  return {
    lineNum: match.line,
    columnNum: match.column + 1,
    filepath: match.filepath,
  };
}
