import { assertRequiredConfig, type AppConfig } from '../config.js';
import { logger } from '../logger.js';
import { ProfileClassifier } from './classifier.js';
import { createModelInvoker, type ModelInvoker } from './modelClient.js';
import { resolvePolicy } from './policy.js';

/**
 * Build the classifier once at start-up. Throws ConfigurationError before
 * any profile is processed when configuration is unusable.
 */
export async function createEngine(cfg: AppConfig, invoker?: ModelInvoker): Promise<ProfileClassifier> {
  assertRequiredConfig(cfg);
  const policy = await resolvePolicy(cfg);
  const classifier = new ProfileClassifier({
    invoker: invoker ?? createModelInvoker(cfg, policy),
    policy,
    maxTokens: cfg.model.maxTokens,
    temperature: cfg.model.temperature,
    timeoutMs: cfg.model.timeoutMs,
  });
  logger.info(
    {
      provider: cfg.model.provider,
      model: cfg.model.name,
      policy: policy.id,
      policyVersion: policy.version,
      temperature: cfg.model.temperature,
    },
    'Classification engine ready',
  );
  return classifier;
}
