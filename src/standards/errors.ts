/**
 * Typed failures raised around standard set processing.
 */

import type { ZodIssue } from "zod";

/**
 * Individual validation issue.
 */
export interface StandardSetIssue {
  /** Dotted path to the offending value, "(root)" for the whole input */
  path: string;
  message: string;
  /** Zod issue code, or one of "duplicate_id" / "key_mismatch" / "reserved_key" */
  code: string;
}

export function formatZodIssues(zodIssues: ZodIssue[]): StandardSetIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.join(".") || "(root)",
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * The raw value does not have the shape of a standard set.
 * No output is produced for that set.
 */
export class MalformedInputError extends Error {
  public readonly issues: StandardSetIssue[];

  constructor(message: string, issues: StandardSetIssue[]) {
    super(message);
    this.name = "MalformedInputError";
    this.issues = issues;
  }

  format(): string {
    const lines = ["Standard set validation failed:"];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Unexpected failure while processing a valid set.
 * The whole set is aborted.
 */
export class StandardSetProcessingError extends Error {
  public readonly setId: string;

  constructor(setId: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to process standard set ${setId}: ${detail}`, { cause });
    this.name = "StandardSetProcessingError";
    this.setId = setId;
  }
}

/**
 * A set could not be read from or written to local storage.
 */
export class StandardSetLoadError extends Error {
  public readonly filePath: string;

  constructor(message: string, filePath: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "StandardSetLoadError";
    this.filePath = filePath;
  }
}
