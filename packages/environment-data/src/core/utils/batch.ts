/**
 * Per-dataset batch execution
 *
 * Runs one task per dataset in batches of `concurrency`, isolating failures
 * so a single dataset never prevents the others from being attempted.
 */

import { toError, type DatasetFailure, type PipelineStage } from '../errors.js';

export interface BatchOutcome<K extends string, V> {
  readonly results: ReadonlyMap<K, V>;
  readonly failures: readonly DatasetFailure[];
}

export async function settleInBatches<K extends DatasetFailure['dataset'], V>(
  keys: readonly K[],
  stage: PipelineStage,
  task: (key: K) => Promise<V>,
  concurrency = 1
): Promise<BatchOutcome<K, V>> {
  const results = new Map<K, V>();
  const failures: DatasetFailure[] = [];
  const batchSize = Math.max(1, Math.floor(concurrency));

  for (let i = 0; i < keys.length; i += batchSize) {
    const batch = keys.slice(i, i + batchSize);
    const settled = await Promise.allSettled(batch.map((key) => task(key)));

    settled.forEach((result, j) => {
      const key = batch[j];
      if (result.status === 'fulfilled') {
        results.set(key, result.value);
      } else {
        failures.push({ dataset: key, stage, error: toError(result.reason) });
      }
    });
  }

  return { results, failures };
}
