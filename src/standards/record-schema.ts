/**
 * Processed record schema.
 *
 * One record per hierarchy node, self-describing and queryable on its own:
 * set context copied onto every record, plus the node's resolved position
 * in the hierarchy and a text block for indexing.
 *
 * Field names are snake_case to match the index metadata they feed.
 */

import { z } from "zod";

export const ProcessedRecordSchema = z
  .object({
    id: z.string().min(1),

    /** Depth-annotated hierarchy text (see content.ts) */
    content: z.string().min(1),

    // ── Standard set context ─────────────────────────────────────────────
    standard_set_id: z.string(),
    standard_set_title: z.string(),
    subject: z.string(),
    normalized_subject: z.string().nullable(),
    education_levels: z.array(z.string()),
    document_id: z.string(),
    document_valid: z.string(),
    publication_status: z.string().nullable(),
    jurisdiction_id: z.string(),
    jurisdiction_title: z.string(),

    // ── Node identity ────────────────────────────────────────────────────
    /** Omitted when the source node has none */
    asn_identifier: z.string().min(1).optional(),
    statement_notation: z.string().min(1).optional(),
    statement_label: z.string().min(1).optional(),
    depth: z.number().int().min(0),
    is_leaf: z.boolean(),
    is_root: z.boolean(),

    // ── Hierarchy ────────────────────────────────────────────────────────
    /** Always present; null only for roots */
    parent_id: z.string().nullable(),
    root_id: z.string(),
    ancestor_ids: z.array(z.string()),
    child_ids: z.array(z.string()),
    sibling_count: z.number().int().min(0),
  })
  .strict()
  .refine((record) => record.ancestor_ids.length === record.depth, {
    message: "ancestor_ids length must equal depth",
    path: ["ancestor_ids"],
  })
  .refine((record) => record.is_leaf === (record.child_ids.length === 0), {
    message: "is_leaf must be true exactly when child_ids is empty",
    path: ["is_leaf"],
  })
  .refine((record) => record.is_root === (record.parent_id === null), {
    message: "parent_id must be null exactly when is_root is true",
    path: ["parent_id"],
  })
  .refine((record) => !record.is_root || record.root_id === record.id, {
    message: "root records must be their own root",
    path: ["root_id"],
  });

export type ProcessedRecord = z.infer<typeof ProcessedRecordSchema>;

export const ProcessedStandardSetSchema = z.object({
  records: z.array(ProcessedRecordSchema),
});

export type ProcessedStandardSet = z.infer<typeof ProcessedStandardSetSchema>;
