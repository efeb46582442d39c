#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from '../config';
import { createPool, closePool } from '../db/client';
import { PostgresStore } from '../db/store';
import { createListingSource } from '../sources';
import { IngestionPipeline } from '../services/pipeline';
import { STARTUP_FAILURE_EXIT_CODE } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Batch entry point
 * Exits with 0 on success, with the number of the stage that failed, or
 * with 10 when configuration or startup fails
 */
async function main(): Promise<number> {
  const config = loadConfig();
  const pool = createPool(config);

  try {
    const pipeline = new IngestionPipeline({
      config,
      source: createListingSource(config),
      store: new PostgresStore(pool),
    });

    const outcome = await pipeline.run();
    logger.info(`Run finished in ${(outcome.durationMs / 1000).toFixed(1)}s`, {
      exitCode: outcome.exitCode,
      message: outcome.message,
    });
    return outcome.exitCode;
  } finally {
    await closePool(pool);
  }
}

main()
  .then(exitCode => {
    process.exit(exitCode);
  })
  .catch(error => {
    logger.error('Run aborted before the pipeline started', error, {
      exitCode: STARTUP_FAILURE_EXIT_CODE,
    });
    process.exit(STARTUP_FAILURE_EXIT_CODE);
  });
