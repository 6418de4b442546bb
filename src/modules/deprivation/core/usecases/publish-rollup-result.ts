import { err, ok, type Result } from 'neverthrow';

import type { WriteError } from '../errors.js';
import type { RollupResultWriter } from '../ports.js';
import type { RollupResult } from '../types.js';
import type { Logger } from 'pino';

export interface PublishRollupResultDeps {
  writer: RollupResultWriter;
  logger: Logger;
}

export interface PublishedRollup {
  practicePath: string;
  networkPath: string;
}

/**
 * Hands both result tables to the writer, practices first.
 * A failed network write leaves the practice file in place; re-running the
 * roll-up rewrites both.
 */
export const publishRollupResult = async (
  deps: PublishRollupResultDeps,
  result: RollupResult
): Promise<Result<PublishedRollup, WriteError>> => {
  const log = deps.logger.child({ usecase: 'publishRollupResult' });

  const practiceResult = await deps.writer.writePracticeScores(result.practices);
  if (practiceResult.isErr()) {
    log.error({ error: practiceResult.error }, 'Failed to write practice scores');
    return err(practiceResult.error);
  }

  const networkResult = await deps.writer.writeNetworkScores(result.networks);
  if (networkResult.isErr()) {
    log.error(
      { error: networkResult.error, written: [practiceResult.value] },
      'Failed to write network scores; practice scores were already written'
    );
    return err(networkResult.error);
  }

  log.info(
    { practicePath: practiceResult.value, networkPath: networkResult.value },
    'Wrote roll-up tables'
  );

  return ok({ practicePath: practiceResult.value, networkPath: networkResult.value });
};
