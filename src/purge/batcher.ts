import { MAX_PURGE_BATCH_SIZE } from '../config/index.js';
import { ValidationError } from '../protocol/errors.js';

/**
 * Split a URL set into request-sized batches of at most `maxBatchSize`.
 * Duplicates are dropped first; order within and across batches follows first occurrence.
 */
export function splitIntoBatches(urls: Iterable<string>, maxBatchSize: number): string[][] {
  if (!Number.isInteger(maxBatchSize) || maxBatchSize < 1 || maxBatchSize > MAX_PURGE_BATCH_SIZE) {
    throw new ValidationError(
      `Batch size must be an integer between 1 and ${MAX_PURGE_BATCH_SIZE}, got ${maxBatchSize}.`,
    );
  }

  const unique = Array.from(new Set(urls));
  const batches: string[][] = [];
  for (let i = 0; i < unique.length; i += maxBatchSize) {
    batches.push(unique.slice(i, i + maxBatchSize));
  }
  return batches;
}
