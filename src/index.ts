/**
 * Entry point: processes every downloaded standard set into records.
 */

import { config, validateConfig, ConfigError } from "./config/index.js";
import { initRunId, createLogger, isLogLevel } from "./logging/index.js";
import {
  listDownloadedStandardSets,
  processAndSave,
  MalformedInputError,
  StandardSetLoadError,
  StandardSetProcessingError,
} from "./standards/index.js";

function main(): void {
  const runId = initRunId();

  const logger = createLogger({
    level: isLogLevel(config.logLevel) ? config.logLevel : "info",
    component: config.appName,
    logDir: config.logDir,
  });

  try {
    validateConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error("Configuration error", { message: err.message });
      process.exit(1);
    }
    throw err;
  }

  logger.info("Application starting", {
    runId,
    env: config.env,
    standardSetsDir: config.standardSetsDir,
  });

  const processorLogger = logger.child("processor");
  const sets = listDownloadedStandardSets(config.standardSetsDir, { logger });
  let failed = 0;

  for (const set of sets) {
    try {
      processAndSave(set.dirName, {
        standardSetsDir: config.standardSetsDir,
        indent: config.outputIndent,
        logger: processorLogger,
      });
    } catch (err) {
      if (err instanceof MalformedInputError) {
        failed++;
        logger.error(`Skipping malformed set ${set.setId}`, { details: err.format() });
      } else if (err instanceof StandardSetLoadError || err instanceof StandardSetProcessingError) {
        failed++;
        logger.error(`Failed to process set ${set.setId}`, { message: err.message });
      } else {
        throw err;
      }
    }
  }

  logger.info("Run complete", { sets: sets.length, failed });
  if (failed > 0) {
    process.exitCode = 1;
  }
}

main();
