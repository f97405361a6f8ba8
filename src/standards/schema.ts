/**
 * Raw standard set schema.
 *
 * Describes a standard set as delivered by the standards source: a flat
 * collection of nodes keyed by identifier, linked only through
 * `parentId`. Nothing about ordering or acyclicity is assumed here; the
 * resolver in hierarchy.ts deals with unordered, cyclic and dangling input.
 *
 * Extra fields the source adds (license blocks, status metadata, per-node
 * `ancestorIds`) are tolerated and passed through untouched. The source's
 * own ancestor hints are never read; ancestry is rebuilt from `parentId`.
 */

import { z } from "zod";
import type { StandardSetIssue } from "./errors.js";

const optionalText = z.string().optional();

/**
 * A single node of the hierarchy.
 */
export const RawStandardNodeSchema = z
  .object({
    id: z.string().min(1, "Node id must be a non-empty string"),

    /** Null or absent for roots */
    parentId: z.string().min(1).nullish().transform((value) => value ?? null),

    description: z.string({ required_error: "Node description is required" }),

    /** e.g. "1.G.A.3" */
    statementNotation: optionalText,

    /** e.g. "Standard", "Benchmark", "Domain" */
    statementLabel: optionalText,

    asnIdentifier: optionalText,

    depth: z.number().int().min(0),

    /** Document order within siblings */
    position: z.number().int(),
  })
  .passthrough();

export type RawStandardNode = z.infer<typeof RawStandardNodeSchema>;

export const StandardDocumentSchema = z
  .object({
    id: z.string().min(1),
    /** Valid year, as a string */
    valid: z.string(),
    title: optionalText,
    asnIdentifier: optionalText,
    publicationStatus: z.string().nullish(),
  })
  .passthrough();

export type StandardDocument = z.infer<typeof StandardDocumentSchema>;

export const JurisdictionRefSchema = z
  .object({
    id: z.string().min(1),
    title: z.string(),
  })
  .passthrough();

export type JurisdictionRef = z.infer<typeof JurisdictionRefSchema>;

/**
 * Fields shared by the engine input and the source's wire envelope.
 */
const StandardSetFieldsSchema = z.object({
  id: z.string().min(1),
  title: z.string(),
  subject: z.string(),
  normalizedSubject: z.string().nullish(),

  /** May contain comma-packed values such as "01,02" */
  educationLevels: z.array(z.string()),

  document: StandardDocumentSchema,
  jurisdiction: JurisdictionRefSchema,
});

/**
 * Engine input: one standard set with its nodes.
 */
export const RawStandardSetSchema = StandardSetFieldsSchema.extend({
  nodes: z.record(z.string(), RawStandardNodeSchema, {
    required_error: "Standard set has no node collection",
  }),
}).passthrough();

export type RawStandardSet = z.infer<typeof RawStandardSetSchema>;

/**
 * Wire envelope of a downloaded set (`data.json`).
 * The source names the node collection `standards`.
 */
export const StandardSetResponseSchema = z.object({
  data: StandardSetFieldsSchema.extend({
    standards: z.record(z.string(), z.unknown(), {
      required_error: "Standard set has no node collection",
    }),
  }).passthrough(),
});

export type StandardSetResponse = z.infer<typeof StandardSetResponseSchema>;

/**
 * Map a wire envelope onto the engine input shape.
 * Node contents are left for the orchestrator to validate.
 */
export function toRawStandardSetInput(response: StandardSetResponse): Record<string, unknown> {
  const { standards, ...rest } = response.data;
  return { ...rest, nodes: standards };
}

/**
 * Keys of a raw node collection that did not survive parsing.
 * zod's record parser skips an own `__proto__` key, which would otherwise
 * lose that node without an error.
 */
export function findDroppedKeys(
  raw: unknown,
  parsed: Record<string, unknown>,
  path: string
): StandardSetIssue[] {
  if (typeof raw !== "object" || raw === null) {
    return [];
  }
  return Object.keys(raw)
    .filter((key) => !Object.hasOwn(parsed, key))
    .map((key) => ({
      path: `${path}.${key}`,
      message: `Node key "${key}" is reserved and cannot be read`,
      code: "reserved_key",
    }));
}
