import { ValidationError } from "@linewise/errors";
import { z } from "zod";

/**
 * Query context supplied by the host: which buffer, where the cursor is
 * (1-based) and the buffer's possibly unsaved contents.
 */
export const RequestContextSchema = z.object({
  filepath: z.string(),
  lineNum: z.number().int().positive(),
  columnNum: z.number().int().positive(),
  /** Column where the identifier being completed starts; defaults to `columnNum` */
  startColumn: z.number().int().positive().optional(),
  contents: z.string().default(""),
});

export type RequestContext = z.infer<typeof RequestContextSchema>;

export function parseRequestContext(raw: unknown): RequestContext {
  const result = RequestContextSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError({
      code: "COMPLETER_REQUEST_INVALID",
      message: "Invalid request context",
      issues: result.error.issues.map((issue) => ({
        field: issue.path.join("."),
        message: issue.message,
        code: issue.code,
      })),
    });
  }
  return result.data;
}
