import { ScriptFormatError } from "./errors.ts";
import { ScriptSchema } from "./schema.ts";
import type { ScriptLoadResult } from "./types.ts";

/**
 * Parses a JSON script document into the script model.
 *
 * Only the document shape is checked here: ids, talker references and links
 * are validated by the compiler.
 */
export function parseScript(source: string): ScriptLoadResult {
  let document: unknown;
  try {
    document = JSON.parse(source);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return {
      value: null,
      errors: [new ScriptFormatError(`Invalid JSON: ${message}`)],
      valid: false,
    };
  }

  const parsed = ScriptSchema.safeParse(document);
  if (!parsed.success) {
    return {
      value: null,
      errors: parsed.error.issues.map(
        (issue) => new ScriptFormatError(issue.message, issue.path.join(".")),
      ),
      valid: false,
    };
  }

  return { value: parsed.data, errors: [], valid: true };
}
