/**
 * Local data boundary for standard sets.
 *
 * Downloaded sets live one directory per set:
 *
 *   {standardSetsDir}/
 *     {setId}/
 *       data.json        ← source response, written by the downloader
 *       processed.json   ← records, written here
 *
 * All file access happens here, strictly before and after the in-memory
 * processing in processor.ts.
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import type { Logger } from "../logging/index.js";
import {
  StandardSetResponseSchema,
  findDroppedKeys,
  toRawStandardSetInput,
  type RawStandardSet,
  type StandardSetResponse,
} from "./schema.js";
import { processStandardSet, validateStandardSet, type ProcessingDiagnostics } from "./processor.js";
import { serializeProcessedSet } from "./serialization.js";
import { MalformedInputError, StandardSetLoadError, formatZodIssues } from "./errors.js";

export const DATA_FILENAME = "data.json";
export const PROCESSED_FILENAME = "processed.json";

export interface StandardSetPaths {
  dataFile: string;
  processedFile: string;
}

export function getStandardSetPaths(standardSetsDir: string, setId: string): StandardSetPaths {
  const setDir = join(standardSetsDir, setId);
  return {
    dataFile: join(setDir, DATA_FILENAME),
    processedFile: join(setDir, PROCESSED_FILENAME),
  };
}

function readJsonFile(filePath: string): unknown {
  if (!existsSync(filePath)) {
    throw new StandardSetLoadError(`File not found: ${filePath}`, filePath);
  }

  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new StandardSetLoadError(
      `Failed to read ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
      err
    );
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    throw new StandardSetLoadError(
      `Invalid JSON in ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
      err
    );
  }
}

function parseResponse(raw: unknown, filePath: string): StandardSetResponse {
  const result = StandardSetResponseSchema.safeParse(raw);
  if (!result.success) {
    throw new MalformedInputError(
      `Invalid standard set response in ${filePath}`,
      formatZodIssues(result.error.issues)
    );
  }

  const rawStandards =
    typeof raw === "object" && raw !== null && "data" in raw &&
    typeof raw.data === "object" && raw.data !== null && "standards" in raw.data
      ? raw.data.standards
      : undefined;
  const dropped = findDroppedKeys(rawStandards, result.data.data.standards, "data.standards");
  if (dropped.length > 0) {
    throw new MalformedInputError(`Invalid standard set response in ${filePath}`, dropped);
  }

  return result.data;
}

/**
 * Load and validate a downloaded set from a `data.json` file.
 *
 * @throws StandardSetLoadError if the file is missing or not JSON
 * @throws MalformedInputError if the content is not a valid standard set
 */
export function loadStandardSetFromFile(filePath: string): RawStandardSet {
  const response = parseResponse(readJsonFile(filePath), filePath);
  const validation = validateStandardSet(toRawStandardSetInput(response));

  if (!validation.success || !validation.set) {
    const issues = validation.issues ?? [];
    throw new MalformedInputError(
      `Invalid standard set in ${filePath}: ${issues.length} validation error(s)`,
      issues
    );
  }

  return validation.set;
}

export interface ProcessAndSaveOptions {
  standardSetsDir: string;
  /** JSON indentation of processed.json (default: 2) */
  indent?: number;
  logger?: Logger;
}

export interface ProcessAndSaveResult {
  outputPath: string;
  recordCount: number;
  diagnostics: ProcessingDiagnostics;
}

/**
 * Process a downloaded set and write its records next to its data.json.
 * `setId` names the set's directory under `standardSetsDir`, which need not
 * match the id recorded inside data.json.
 */
export function processAndSave(
  setId: string,
  options: ProcessAndSaveOptions
): ProcessAndSaveResult {
  const { standardSetsDir, indent = 2, logger } = options;
  const { dataFile, processedFile } = getStandardSetPaths(standardSetsDir, setId);

  if (!existsSync(dataFile)) {
    logger?.warn("data.json not found, skipping", { setId });
    throw new StandardSetLoadError(`data.json not found for set ${setId}`, dataFile);
  }

  const rawSet = loadStandardSetFromFile(dataFile);
  const { processed, diagnostics } = processStandardSet(rawSet, { logger });

  mkdirSync(dirname(processedFile), { recursive: true });
  writeFileSync(processedFile, serializeProcessedSet(processed, indent), "utf-8");

  logger?.info(`Processed ${setId}: ${processed.records.length} records`, {
    outputPath: processedFile,
  });

  return {
    outputPath: processedFile,
    recordCount: processed.records.length,
    diagnostics,
  };
}

/**
 * Summary of a downloaded set and its processing status.
 */
export interface StandardSetInfo {
  setId: string;
  /** Directory the set was found in; pass this to processAndSave */
  dirName: string;
  title: string;
  subject: string;
  educationLevels: string[];
  jurisdiction: string;
  publicationStatus: string;
  validYear: string;
  processed: boolean;
}

export interface ListStandardSetsOptions {
  logger?: Logger;
}

/**
 * List every downloaded set under `standardSetsDir`, sorted by set id.
 * Directories without a readable data.json are skipped.
 */
export function listDownloadedStandardSets(
  standardSetsDir: string,
  options: ListStandardSetsOptions = {}
): StandardSetInfo[] {
  const { logger } = options;
  if (!existsSync(standardSetsDir)) {
    return [];
  }

  const sets: StandardSetInfo[] = [];
  for (const entry of readdirSync(standardSetsDir, { withFileTypes: true })) {
    if (!entry.isDirectory()) {
      continue;
    }

    const { dataFile, processedFile } = getStandardSetPaths(standardSetsDir, entry.name);
    if (!existsSync(dataFile)) {
      continue;
    }

    try {
      const { data } = parseResponse(readJsonFile(dataFile), dataFile);
      sets.push({
        setId: data.id,
        dirName: entry.name,
        title: data.title,
        subject: data.subject,
        educationLevels: data.educationLevels,
        jurisdiction: data.jurisdiction.title,
        publicationStatus: data.document.publicationStatus ?? "Unknown",
        validYear: data.document.valid,
        processed: existsSync(processedFile),
      });
    } catch (err) {
      if (!(err instanceof StandardSetLoadError || err instanceof MalformedInputError)) {
        throw err;
      }
      logger?.warn(`Failed to read ${dataFile}`, { error: err.message });
    }
  }

  logger?.debug(`Found ${sets.length} downloaded standard sets`);
  return sets.sort((a, b) => a.setId.localeCompare(b.setId));
}
