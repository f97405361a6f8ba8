/**
 * Processed set serialization.
 *
 * processed.json is the hand-off to the indexing collaborator; reading it
 * back re-validates every record so a hand-edited or stale file is caught
 * before it reaches the index.
 */

import { ProcessedStandardSetSchema, type ProcessedStandardSet } from "./record-schema.js";
import { MalformedInputError, formatZodIssues } from "./errors.js";
import { deepFreeze } from "./freeze.js";

/**
 * Serialize a processed set to JSON.
 * `parent_id: null` is kept; omitted optional fields stay omitted.
 */
export function serializeProcessedSet(set: ProcessedStandardSet, indent = 2): string {
  return JSON.stringify(set, null, indent > 0 ? indent : undefined);
}

/**
 * Parse and validate a processed set.
 *
 * @throws MalformedInputError if the JSON is unreadable or any record is invalid
 */
export function deserializeProcessedSet(json: string): Readonly<ProcessedStandardSet> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new MalformedInputError("Failed to parse processed set JSON", [
      {
        path: "(root)",
        message: err instanceof Error ? err.message : String(err),
        code: "invalid_json",
      },
    ]);
  }

  const result = ProcessedStandardSetSchema.safeParse(parsed);
  if (!result.success) {
    throw new MalformedInputError(
      `Invalid processed set: ${result.error.issues.length} validation error(s)`,
      formatZodIssues(result.error.issues)
    );
  }

  return deepFreeze(result.data);
}
