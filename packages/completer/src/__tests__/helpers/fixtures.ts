import type { ResolvedHelperConfig } from "../../config.js";
import type { CompleterLogger } from "../../logger.js";
import type { RequestContext } from "../../request.js";

export const TEST_RESOLVED_CONFIG: ResolvedHelperConfig = {
  binary: "/opt/helper/bin/racer",
  args: ["daemon"],
  sourceIndexPath: "/opt/helper/src",
  env: { RUST_SRC_PATH: "/opt/helper/src" },
};

/** Sample buffer with unsaved edits */
export const SAMPLE_RS_CONTENT = `
fn main() {
    let v = Vec::new();
    v.pu
}
`.trim();

export function createTestRequest(overrides: Partial<RequestContext> = {}): RequestContext {
  return {
    filepath: "/workspace/src/main.rs",
    lineNum: 3,
    columnNum: 9,
    startColumn: 7,
    contents: SAMPLE_RS_CONTENT,
    ...overrides,
  };
}

export interface RecordingLogger extends CompleterLogger {
  readonly lines: string[];
}

/** Logger that keeps `level: message` lines for assertions. */
export function createRecordingLogger(): RecordingLogger {
  const lines: string[] = [];
  return {
    lines,
    debug: (message) => lines.push(`debug: ${message}`),
    info: (message) => lines.push(`info: ${message}`),
    warn: (message) => lines.push(`warn: ${message}`),
    error: (message) => lines.push(`error: ${message}`),
  };
}
