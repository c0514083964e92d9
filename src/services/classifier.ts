import { ProviderError, describeError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../logger.js';
import type { ClassificationOutcome, Profile, RelevancePolicy } from '../types.js';
import { withTimeout } from '../utils/async.js';
import { extractOutcome, fallbackOutcome } from './extractor.js';
import type { ModelInvoker } from './modelClient.js';
import { compilePrompt } from './prompt.js';

export interface ClassifierOptions {
  invoker: ModelInvoker;
  policy: RelevancePolicy;
  maxTokens: number;
  temperature: number;
  timeoutMs: number;
  logger?: Logger;
}

/**
 * Single-profile pipeline: compile prompt, invoke model, extract verdict.
 * `classify` never rejects; failures become fallback verdicts.
 */
export class ProfileClassifier {
  readonly policy: RelevancePolicy;
  private readonly invoker: ModelInvoker;
  private readonly maxTokens: number;
  private readonly temperature: number;
  private readonly timeoutMs: number;
  private readonly log: Logger;

  constructor(opts: ClassifierOptions) {
    this.invoker = opts.invoker;
    this.policy = opts.policy;
    this.maxTokens = opts.maxTokens;
    this.temperature = opts.temperature;
    this.timeoutMs = opts.timeoutMs;
    this.log = opts.logger ?? defaultLogger;
  }

  async classify(profile: Profile): Promise<ClassificationOutcome> {
    const prompt = compilePrompt(profile, this.policy);

    let raw: string;
    try {
      raw = await withTimeout(this.timeoutMs, (signal) =>
        this.invoker.complete(prompt, {
          maxTokens: this.maxTokens,
          temperature: this.temperature,
          signal,
        }),
      );
    } catch (err) {
      const detail = err instanceof ProviderError ? `${err.kind}: ${err.message}` : describeError(err);
      this.log.warn({ policy: this.policy.id, detail }, 'Model call failed; using fallback verdict');
      return fallbackOutcome(this.policy, { kind: 'provider_error', detail });
    }

    const outcome = extractOutcome(raw, this.policy);
    if (outcome.failure) {
      this.log.warn(
        { policy: this.policy.id, failure: outcome.failure.kind, detail: outcome.failure.detail, outputChars: raw.length },
        'Model output rejected; using fallback verdict',
      );
    } else {
      this.log.debug({ policy: this.policy.id, tier: outcome.verdict.tier }, 'Profile classified');
    }
    return outcome;
  }
}
