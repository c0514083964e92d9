import { describeError } from '../errors.js';
import { logger } from '../logger.js';
import type {
  BatchEntry,
  BatchResult,
  ClassificationOutcome,
  Profile,
  ProgressObserver,
  RelevancePolicy,
} from '../types.js';
import { fallbackOutcome } from './extractor.js';

export interface BatchClassifier {
  readonly policy: RelevancePolicy;
  classify(profile: Profile): Promise<ClassificationOutcome>;
}

export interface BatchOptions {
  /** Maximum in-flight model calls. Defaults to 1 (sequential). */
  concurrency?: number;
  onProgress?: ProgressObserver;
}

/**
 * Classify profiles with a bounded worker pool. Results land in index-tagged
 * slots so the output order always matches the input order, whatever order
 * calls complete in.
 */
export async function runBatch(
  profiles: readonly Profile[],
  classifier: BatchClassifier,
  opts: BatchOptions = {},
): Promise<BatchResult> {
  const total = profiles.length;
  if (total === 0) return [];

  const requested = opts.concurrency !== undefined && Number.isFinite(opts.concurrency) ? Math.floor(opts.concurrency) : 1;
  const concurrency = Math.max(1, Math.min(requested, total));
  const slots = new Array<BatchEntry | undefined>(total);
  let next = 0;
  let completed = 0;

  const report = () => {
    if (!opts.onProgress) return;
    try {
      opts.onProgress(completed, total);
    } catch (err) {
      logger.warn({ err: describeError(err), completed, total }, 'Progress observer failed');
    }
  };

  const worker = async () => {
    while (next < total) {
      const index = next++;
      const profile = profiles[index];
      const outcome = await classifier.classify(profile).catch(
        (err: unknown): ClassificationOutcome =>
          fallbackOutcome(classifier.policy, { kind: 'provider_error', detail: describeError(err) }),
      );
      slots[index] = { index, profile, ...outcome };
      completed += 1;
      report();
    }
  };

  await Promise.all(Array.from({ length: concurrency }, () => worker()));

  const result: BatchResult = [];
  for (const entry of slots) {
    if (entry) result.push(entry);
  }
  logger.info(
    { total, fallbacks: result.filter((e) => e.failure).length, concurrency },
    'Batch classification finished',
  );
  return result;
}
