/**
 * Batch orchestrator.
 *
 * Runs the whole pipeline over one raw standard set:
 *
 *   raw input ─▶ validate ─▶ relationship maps ─▶ per node:
 *     resolve ancestry ─▶ content text ─▶ record ─▶ processed set
 *
 * A call either returns every record of the set or throws; there is no
 * partial output. Processing is synchronous and holds no shared state, so
 * independent sets can be processed in parallel without coordination.
 *
 * Dangling parent references and cycles never abort a run. They are
 * truncated by the resolver and reported through ProcessingDiagnostics.
 */

import type { Logger } from "../logging/index.js";
import { RawStandardSetSchema, findDroppedKeys, type RawStandardSet } from "./schema.js";
import {
  ProcessedStandardSetSchema,
  type ProcessedRecord,
  type ProcessedStandardSet,
} from "./record-schema.js";
import { buildRelationshipMaps } from "./relationships.js";
import { resolveHierarchy } from "./hierarchy.js";
import { buildSetContext, transformNode } from "./record.js";
import { deepFreeze } from "./freeze.js";
import {
  MalformedInputError,
  StandardSetProcessingError,
  formatZodIssues,
  type StandardSetIssue,
} from "./errors.js";

export interface ProcessingDiagnostics {
  totalNodes: number;
  rootCount: number;
  leafCount: number;
  /** Nodes whose chain ends at a parent missing from the set */
  danglingReferences: number;
  /** Nodes whose chain revisits an identifier */
  cyclesDetected: number;
  /** Nodes whose source depth differs from their resolved ancestor count */
  depthMismatches: number;
}

export interface ProcessingWarning {
  code: "empty_result";
  setId: string;
  message: string;
}

export interface ProcessStandardSetResult {
  processed: Readonly<ProcessedStandardSet>;
  diagnostics: ProcessingDiagnostics;
  warnings: ProcessingWarning[];
}

export interface ProcessStandardSetOptions {
  /** Receives progress and diagnostic lines; nothing is logged without one */
  logger?: Logger;
}

export interface StandardSetValidationResult {
  success: boolean;
  set?: RawStandardSet;
  issues?: StandardSetIssue[];
}

/**
 * Identifier checks zod can't express: every key must match its node's
 * `id`, and no `id` may appear twice.
 */
function findIdentifierIssues(set: RawStandardSet): StandardSetIssue[] {
  const issues: StandardSetIssue[] = [];
  const firstKeyById = new Map<string, string>();

  for (const [key, node] of Object.entries(set.nodes)) {
    if (node.id !== key) {
      issues.push({
        path: `nodes.${key}.id`,
        message: `Node keyed "${key}" declares id "${node.id}"`,
        code: "key_mismatch",
      });
    }

    const firstKey = firstKeyById.get(node.id);
    if (firstKey !== undefined) {
      issues.push({
        path: `nodes.${key}.id`,
        message: `Duplicate node id "${node.id}" (first declared under "${firstKey}")`,
        code: "duplicate_id",
      });
    } else {
      firstKeyById.set(node.id, key);
    }
  }

  return issues;
}

/**
 * Validate a raw standard set without processing it.
 */
export function validateStandardSet(input: unknown): StandardSetValidationResult {
  const result = RawStandardSetSchema.safeParse(input);
  if (!result.success) {
    return { success: false, issues: formatZodIssues(result.error.issues) };
  }

  const rawNodes =
    typeof input === "object" && input !== null && "nodes" in input ? input.nodes : undefined;
  const issues = [
    ...findDroppedKeys(rawNodes, result.data.nodes, "nodes"),
    ...findIdentifierIssues(result.data),
  ];
  if (issues.length > 0) {
    return { success: false, issues };
  }

  return { success: true, set: result.data };
}

function buildRecords(set: RawStandardSet): {
  records: Readonly<ProcessedRecord>[];
  diagnostics: ProcessingDiagnostics;
} {
  const maps = buildRelationshipMaps(set.nodes);
  const setContext = buildSetContext(set);
  const diagnostics: ProcessingDiagnostics = {
    totalNodes: maps.idToNode.size,
    rootCount: maps.rootIds.size,
    leafCount: maps.leafIds.size,
    danglingReferences: 0,
    cyclesDetected: 0,
    depthMismatches: 0,
  };

  const records: Readonly<ProcessedRecord>[] = [];
  for (const node of maps.idToNode.values()) {
    const resolution = resolveHierarchy(node, maps.idToNode);

    if (resolution.termination === "dangling") {
      diagnostics.danglingReferences++;
    } else if (resolution.termination === "cycle") {
      diagnostics.cyclesDetected++;
    }
    if (resolution.ancestorIds.length !== node.depth) {
      diagnostics.depthMismatches++;
    }

    records.push(transformNode(node, maps, setContext, resolution));
  }

  return { records, diagnostics };
}

/**
 * Process a raw standard set into one record per node.
 *
 * @param input - Parsed standard set, validated here
 * @returns The processed set with diagnostics and warnings
 * @throws MalformedInputError if the input is not a valid standard set
 * @throws StandardSetProcessingError on any unexpected internal failure
 *
 * @example
 *   const { processed, diagnostics } = processStandardSet(rawSet, { logger });
 *   for (const record of processed.records) {
 *     console.log(record.id, record.ancestor_ids);
 *   }
 */
export function processStandardSet(
  input: unknown,
  options: ProcessStandardSetOptions = {}
): ProcessStandardSetResult {
  const { logger } = options;

  const validation = validateStandardSet(input);
  if (!validation.success || !validation.set) {
    const issues = validation.issues ?? [];
    logger?.error("Malformed standard set", { issues: issues.length });
    throw new MalformedInputError(
      `Invalid standard set: ${issues.length} validation error(s)`,
      issues
    );
  }

  const set = validation.set;
  logger?.debug("Processing standard set", {
    setId: set.id,
    nodes: Object.keys(set.nodes).length,
  });

  let records: Readonly<ProcessedRecord>[];
  let diagnostics: ProcessingDiagnostics;
  try {
    ({ records, diagnostics } = buildRecords(set));
  } catch (err) {
    throw new StandardSetProcessingError(set.id, err);
  }

  const output = ProcessedStandardSetSchema.safeParse({ records });
  if (!output.success) {
    const detail = formatZodIssues(output.error.issues)
      .map((i) => `${i.path}: ${i.message}`)
      .join("; ");
    throw new StandardSetProcessingError(set.id, new Error(`Invalid output: ${detail}`));
  }

  const warnings: ProcessingWarning[] = [];
  if (records.length === 0) {
    const warning: ProcessingWarning = {
      code: "empty_result",
      setId: set.id,
      message: `Standard set ${set.id} has no nodes; produced no records`,
    };
    warnings.push(warning);
    logger?.warn(warning.message, { setId: set.id });
  }

  if (diagnostics.danglingReferences > 0 || diagnostics.cyclesDetected > 0) {
    logger?.warn("Broken parent chains truncated", {
      setId: set.id,
      danglingReferences: diagnostics.danglingReferences,
      cyclesDetected: diagnostics.cyclesDetected,
    });
  }

  logger?.info("Processed standard set", { setId: set.id, records: records.length });

  return {
    processed: deepFreeze({ records }),
    diagnostics,
    warnings,
  };
}
