import { isFatalForRun } from '../errors.js';
import { logger } from '../logger.js';
import type { Platform } from '../types.js';
import { chunk } from './pagination.js';
import type { AddTracksResult } from './types.js';

/**
 * Send track IDs in fixed-size batches, recording failed batches
 * instead of aborting; auth and rate-limit failures still propagate
 */
export async function addInBatches(
  platform: Platform,
  trackIds: readonly string[],
  batchSize: number,
  addBatch: (batch: string[]) => Promise<void>
): Promise<AddTracksResult> {
  const result: AddTracksResult = { added: 0, failed: [] };

  for (const [index, batch] of chunk(trackIds, batchSize).entries()) {
    try {
      await addBatch(batch);
      result.added += batch.length;
    } catch (error) {
      if (isFatalForRun(error) || !(error instanceof Error)) {
        throw error;
      }
      logger.warn({ platform, batchSize: batch.length, error: error.message }, 'failed to add track batch');
      result.failed.push({ offset: index * batchSize, trackIds: batch, error });
    }
  }

  return result;
}
