/**
 * Record transformer.
 *
 * Merges set-level context with the per-node hierarchy fields into one
 * ProcessedRecord per node. Set context is computed once per set and copied
 * onto every record; nodes never carry their own grade levels.
 */

import type { RawStandardNode, RawStandardSet } from "./schema.js";
import type { RelationshipMaps } from "./relationships.js";
import type { ProcessedRecord } from "./record-schema.js";
import { resolveHierarchy, computeSiblingCount, type HierarchyResolution } from "./hierarchy.js";
import { buildContent } from "./content.js";
import { deepFreeze } from "./freeze.js";

/**
 * Set-level fields shared by every record of one standard set.
 */
export interface SetContext {
  readonly standard_set_id: string;
  readonly standard_set_title: string;
  readonly subject: string;
  readonly normalized_subject: string | null;
  readonly education_levels: readonly string[];
  readonly document_id: string;
  readonly document_valid: string;
  readonly publication_status: string | null;
  readonly jurisdiction_id: string;
  readonly jurisdiction_title: string;
}

/**
 * Normalize education levels.
 *
 * Source values may be comma-packed ("01,02"). Every element is split on
 * commas, trimmed and flattened; duplicates are dropped keeping first-seen
 * order. The result stays a list.
 *
 * @example
 *   normalizeEducationLevels(["01,02", "02", "03"]); // ["01", "02", "03"]
 */
export function normalizeEducationLevels(levels: readonly string[]): string[] {
  const seen = new Set<string>();

  for (const level of levels) {
    for (const part of level.split(",")) {
      const trimmed = part.trim();
      if (trimmed !== "") {
        seen.add(trimmed);
      }
    }
  }

  return [...seen];
}

/**
 * Build the set context copied onto every record of a set.
 */
export function buildSetContext(set: RawStandardSet): SetContext {
  return {
    standard_set_id: set.id,
    standard_set_title: set.title,
    subject: set.subject,
    normalized_subject: set.normalizedSubject ?? null,
    education_levels: normalizeEducationLevels(set.educationLevels),
    document_id: set.document.id,
    document_valid: set.document.valid,
    publication_status: set.document.publicationStatus ?? null,
    jurisdiction_id: set.jurisdiction.id,
    jurisdiction_title: set.jurisdiction.title,
  };
}

/**
 * Transform one node into a frozen ProcessedRecord.
 *
 * `resolution` may be passed when the caller has already walked the node's
 * chain. Optional source fields are omitted when absent or empty;
 * `parent_id` is always present.
 *
 * `depth` is the resolved ancestor count, while each `content` line prints
 * the source `depth`; on a broken chain the two can disagree.
 */
export function transformNode(
  node: RawStandardNode,
  maps: RelationshipMaps,
  setContext: SetContext,
  resolution: HierarchyResolution = resolveHierarchy(node, maps.idToNode)
): Readonly<ProcessedRecord> {
  const childIds = maps.parentToChildren.get(node.id) ?? [];

  const record: ProcessedRecord = {
    id: node.id,
    content: buildContent(node, resolution.ancestorIds, maps.idToNode),
    ...setContext,
    education_levels: [...setContext.education_levels],
    depth: resolution.ancestorIds.length,
    is_leaf: maps.leafIds.has(node.id),
    is_root: node.parentId === null,
    parent_id: node.parentId,
    root_id: resolution.rootId,
    ancestor_ids: resolution.ancestorIds,
    child_ids: [...childIds],
    sibling_count: computeSiblingCount(node, maps),
  };

  if (node.asnIdentifier) {
    record.asn_identifier = node.asnIdentifier;
  }
  if (node.statementNotation) {
    record.statement_notation = node.statementNotation;
  }
  if (node.statementLabel) {
    record.statement_label = node.statementLabel;
  }

  return deepFreeze(record);
}
