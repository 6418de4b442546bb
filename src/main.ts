#!/usr/bin/env node
/**
 * Roll-up entry point
 * Reads the source files, computes practice and network deprivation scores,
 * and writes both tables to the output directory.
 */

import path from 'node:path';

import dotenv from 'dotenv';

import { parseEnv, createConfig } from './infra/config/index.js';
import { createLogger } from './infra/logger/index.js';
import {
  describeDeprivationError,
  makeCsvResultWriter,
  makeSourceFilesRepo,
  publishRollupResult,
  runDeprivationRollup,
} from './modules/deprivation/index.js';

dotenv.config({ path: path.resolve(process.cwd(), '.env') });

const main = async (): Promise<void> => {
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    name: 'practice-imd-rollup',
    pretty: config.logger.pretty,
  });

  logger.info({ sources: config.sources, output: config.output }, 'Starting deprivation roll-up');

  const repo = makeSourceFilesRepo({ ...config.sources, logger });
  const writer = makeCsvResultWriter({ outputDir: config.output.dir });

  const rollup = await runDeprivationRollup({ repo, logger });
  if (rollup.isErr()) {
    logger.fatal(describeDeprivationError(rollup.error));
    process.exit(1);
  }

  const { membership, practices, networks } = rollup.value.diagnostics;
  logger.info(
    {
      unallocatedPractices: membership.unallocatedRegistrants.length,
      excludedPracticePopulation: practices.aggregation.excludedPopulation,
      excludedNetworkPopulation: networks.aggregation.excludedPopulation,
    },
    'Roll-up diagnostics'
  );

  const published = await publishRollupResult({ writer, logger }, rollup.value);
  if (published.isErr()) {
    logger.fatal(describeDeprivationError(published.error));
    process.exit(1);
  }
};

await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
