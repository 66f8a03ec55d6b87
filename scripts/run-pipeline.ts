#!/usr/bin/env node

/**
 * Runs the feed ingestion pipeline once.
 * Loads environment variables, executes every stage, and exits non-zero on failure.
 */

import dotenv from 'dotenv';
import path from 'path';

import { loadEnvironmentConfig, type EnvironmentConfig } from '../src/config/environment';
import { runPipeline } from '../src/pipeline/run-pipeline';
import { PipelineError, describeError } from '../src/types/errors';
import { logger } from '../src/utils/logger';

// Scripts live one level below the project root (two when compiled into dist/)
const projectRoot = path.basename(path.resolve(__dirname, '..')) === 'dist'
  ? path.resolve(__dirname, '../..')
  : path.resolve(__dirname, '..');

// Try to load .env.local first, then .env from project root
dotenv.config({ path: path.join(projectRoot, '.env.local') });
dotenv.config({ path: path.join(projectRoot, '.env') });

export function failureMessage(error: unknown): string {
  if (error instanceof PipelineError) {
    return `Pipeline failed at ${error.stage} stage: ${error.message}`;
  }
  return `Pipeline failed: ${describeError(error)}`;
}

/**
 * Run once and resolve to the process exit code: 0 on success, 1 on any failure.
 */
export async function main(env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let config: EnvironmentConfig;
  try {
    config = loadEnvironmentConfig(env);
  } catch (error) {
    logger.error(`Configuration error: ${describeError(error)}`);
    return 1;
  }
  logger.setLevel(config.logging.level);

  try {
    const result = await runPipeline(config);
    const { stats } = result;

    logger.info('Summary', {
      totalEntries: stats.totalEntries,
      newArticles: stats.newArticles,
      updatedArticles: stats.updatedArticles,
      skippedEntries: stats.skippedEntries,
      partialFailures: stats.partialFailures,
      storedArticles: stats.storedArticles,
    });
    for (const file of result.chartFiles) {
      logger.info(`Chart written: ${file}`);
    }
    return 0;
  } catch (error) {
    logger.error(failureMessage(error), error instanceof Error ? error.cause : undefined);
    return 1;
  }
}

if (require.main === module) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      console.error(error);
      process.exitCode = 1;
    });
}
