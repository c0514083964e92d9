import { describe, expect, it } from 'vitest';
import { WIFI_INFRA_V2 } from '../src/constants/policies.js';
import { ProviderError } from '../src/errors.js';
import { runBatch, type BatchClassifier } from '../src/services/batch.js';
import { ProfileClassifier } from '../src/services/classifier.js';
import type { ModelInvoker } from '../src/services/modelClient.js';
import { delay, FakeModel, modelAnswer } from './helpers.js';

const HIGH_ANSWER = modelAnswer({ designation_relevance: 'High', how_relevant: 'Owns the network.' });

function classifierFor(invoker: ModelInvoker) {
  return new ProfileClassifier({ invoker, policy: WIFI_INFRA_V2, maxTokens: 1500, temperature: 0.3, timeoutMs: 1000 });
}

describe('runBatch', () => {
  it('returns an empty result for no profiles without reporting progress', async () => {
    const events: Array<[number, number]> = [];
    const result = await runBatch([], classifierFor(new FakeModel(() => HIGH_ANSWER)), {
      onProgress: (done, total) => events.push([done, total]),
    });
    expect(result).toEqual([]);
    expect(events).toEqual([]);
  });

  it('keeps going when one model call fails', async () => {
    const model = new FakeModel((prompt) => {
      if (prompt.includes('Profile two')) {
        throw new ProviderError('network', 'Provider unreachable: connect ECONNREFUSED');
      }
      return HIGH_ANSWER;
    });
    const events: Array<[number, number]> = [];
    const profiles = ['Profile one, CIO', 'Profile two, CTO', 'Profile three, Network Architect'];

    const result = await runBatch(profiles, classifierFor(model), {
      onProgress: (done, total) => events.push([done, total]),
    });

    expect(result).toHaveLength(3);
    expect(result.map((e) => e.index)).toEqual([0, 1, 2]);
    expect(result.map((e) => e.profile)).toEqual(profiles);
    expect(result[0].failure).toBeUndefined();
    expect(result[0].verdict).toStrictEqual({ tier: 'High', rationale: 'Owns the network.' });
    expect(result[2].failure).toBeUndefined();
    expect(result[1].failure).toEqual({
      kind: 'provider_error',
      detail: 'network: Provider unreachable: connect ECONNREFUSED',
    });
    expect(result[1].verdict.tier).toBe('No');
    expect(result[1].verdict.recommendedTargetPersona).toBe('CIO/Head of IT Infrastructure');
    expect(events).toEqual([
      [1, 3],
      [2, 3],
      [3, 3],
    ]);
  });

  it('returns one fallback per profile when every call fails', async () => {
    const model = new FakeModel(() => {
      throw new ProviderError('auth', 'Provider rejected the credential (HTTP 401)', { status: 401 });
    });
    const result = await runBatch(['a', 'b', 'c', 'd'], classifierFor(model));

    expect(result).toHaveLength(4);
    expect(result.every((e) => e.failure?.kind === 'provider_error' && e.verdict.tier === 'No')).toBe(true);
  });

  it('processes one profile at a time by default', async () => {
    let inFlight = 0;
    let peak = 0;
    const model = new FakeModel(async () => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await delay(5);
      inFlight -= 1;
      return HIGH_ANSWER;
    });
    await runBatch(['a', 'b', 'c'], classifierFor(model));
    expect(peak).toBe(1);
    expect(model.calls.map((c) => c.prompt.includes('<<<PROFILE\na\n'))).toEqual([true, false, false]);
  });

  it('preserves input order when calls finish out of order', async () => {
    const waits: Record<string, number> = { slow: 40, medium: 20, fast: 1 };
    let inFlight = 0;
    let peak = 0;
    const model = new FakeModel(async (prompt) => {
      const name = Object.keys(waits).find((k) => prompt.includes(`<<<PROFILE\n${k}\n`)) ?? 'fast';
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await delay(waits[name]);
      inFlight -= 1;
      return modelAnswer({ designation_relevance: 'High', how_relevant: `answer for ${name}` });
    });
    const events: number[] = [];

    const result = await runBatch(['slow', 'medium', 'fast'], classifierFor(model), {
      concurrency: 3,
      onProgress: (done) => events.push(done),
    });

    expect(peak).toBe(3);
    expect(result.map((e) => e.verdict.rationale)).toEqual(['answer for slow', 'answer for medium', 'answer for fast']);
    expect(events).toEqual([1, 2, 3]);
  });

  it('bounds the number of in-flight calls', async () => {
    let inFlight = 0;
    let peak = 0;
    const model = new FakeModel(async () => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await delay(5);
      inFlight -= 1;
      return HIGH_ANSWER;
    });
    const result = await runBatch(['a', 'b', 'c', 'd', 'e'], classifierFor(model), { concurrency: 2 });
    expect(result).toHaveLength(5);
    expect(peak).toBe(2);
  });

  it('treats a non-finite concurrency as sequential', async () => {
    const model = new FakeModel(() => HIGH_ANSWER);
    const result = await runBatch(['a', 'b', 'c'], classifierFor(model), { concurrency: Number.NaN });
    expect(result).toHaveLength(3);
    expect(result.map((e) => e.index)).toEqual([0, 1, 2]);
    expect(result.map((e) => e.profile)).toEqual(['a', 'b', 'c']);
  });

  it('survives a throwing progress observer', async () => {
    const result = await runBatch(['a', 'b'], classifierFor(new FakeModel(() => HIGH_ANSWER)), {
      onProgress: () => {
        throw new Error('render failed');
      },
    });
    expect(result).toHaveLength(2);
  });

  it('falls back when a classifier rejects', async () => {
    const rejecting: BatchClassifier = {
      policy: WIFI_INFRA_V2,
      classify: async () => {
        throw new Error('unexpected');
      },
    };
    const result = await runBatch(['a'], rejecting);
    expect(result).toEqual([
      {
        index: 0,
        profile: 'a',
        verdict: {
          tier: 'No',
          rationale: 'Manual analysis required - model provider error: unexpected',
          recommendedTargetPersona: 'CIO/Head of IT Infrastructure',
          recommendedNextStep: WIFI_INFRA_V2.manualReviewStep,
        },
        failure: { kind: 'provider_error', detail: 'unexpected' },
      },
    ]);
  });
});
