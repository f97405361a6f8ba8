/**
 * Standard set resolution engine.
 *
 * Flattens a curriculum standards hierarchy (nodes linked only by
 * `parentId`) into one self-describing record per node.
 *
 * ```
 * ┌──────────────────┐
 * │  RawStandardSet  │  nodes keyed by id, unordered, possibly broken
 * └────────┬─────────┘
 *          ▼
 * ┌──────────────────┐
 * │ RelationshipMaps │  idToNode, parentToChildren, leafIds, rootIds
 * └────────┬─────────┘
 *          ▼  (per node)
 * ┌──────────────────┐     ┌──────────────────┐
 * │ resolveHierarchy │ ──▶ │   buildContent   │
 * └────────┬─────────┘     └────────┬─────────┘
 *          └───────────┬────────────┘
 *                      ▼
 *             ┌─────────────────┐
 *             │ ProcessedRecord │  one per node, frozen
 *             └─────────────────┘
 * ```
 *
 * Usage:
 *   import { loadStandardSetFromFile, processStandardSet } from "./standards/index.js";
 *
 *   const rawSet = loadStandardSetFromFile("data/raw/standardSets/SET_ID/data.json");
 *   const { processed, diagnostics } = processStandardSet(rawSet);
 */

// Input schema and types
export {
  RawStandardNodeSchema,
  RawStandardSetSchema,
  StandardDocumentSchema,
  JurisdictionRefSchema,
  StandardSetResponseSchema,
  toRawStandardSetInput,
  findDroppedKeys,
  type RawStandardNode,
  type RawStandardSet,
  type StandardDocument,
  type JurisdictionRef,
  type StandardSetResponse,
} from "./schema.js";

// Output schema and types
export {
  ProcessedRecordSchema,
  ProcessedStandardSetSchema,
  type ProcessedRecord,
  type ProcessedStandardSet,
} from "./record-schema.js";

// Engine stages
export { buildRelationshipMaps, type RelationshipMaps } from "./relationships.js";
export {
  resolveHierarchy,
  findRootId,
  buildOrderedAncestors,
  computeSiblingCount,
  type HierarchyResolution,
  type WalkTermination,
} from "./hierarchy.js";
export { buildContent, formatContentLine } from "./content.js";
export {
  normalizeEducationLevels,
  buildSetContext,
  transformNode,
  type SetContext,
} from "./record.js";
export {
  processStandardSet,
  validateStandardSet,
  type ProcessStandardSetResult,
  type ProcessStandardSetOptions,
  type ProcessingDiagnostics,
  type ProcessingWarning,
  type StandardSetValidationResult,
} from "./processor.js";

// Errors
export {
  MalformedInputError,
  StandardSetProcessingError,
  StandardSetLoadError,
  formatZodIssues,
  type StandardSetIssue,
} from "./errors.js";

// Local data boundary
export {
  loadStandardSetFromFile,
  processAndSave,
  listDownloadedStandardSets,
  getStandardSetPaths,
  DATA_FILENAME,
  PROCESSED_FILENAME,
  type ProcessAndSaveOptions,
  type ProcessAndSaveResult,
  type StandardSetInfo,
  type StandardSetPaths,
  type ListStandardSetsOptions,
} from "./loader.js";
export { serializeProcessedSet, deserializeProcessedSet } from "./serialization.js";
