import { describe, expect, it } from 'vitest';
import { WIFI_INFRA_V1, WIFI_INFRA_V2 } from '../src/constants/policies.js';
import {
  extractOutcome,
  extractVerdict,
  fallbackVerdict,
  findJsonObjectSpans,
} from '../src/services/extractor.js';

describe('findJsonObjectSpans', () => {
  it('returns a span for every opening brace, enclosing spans first', () => {
    expect(findJsonObjectSpans('a {x} b {"y": {"z": 1}} c')).toEqual(['{x}', '{"y": {"z": 1}}', '{"z": 1}']);
  });

  it('ignores braces inside string literals', () => {
    expect(findJsonObjectSpans('pre {"a": "close } and open {", "b": "quote \\" }"} post')).toEqual([
      '{"a": "close } and open {", "b": "quote \\" }"}',
      '{", "b": "quote \\" }"}',
    ]);
  });

  it('scans each start on its own so a quoted brace in prose does not hide the object', () => {
    expect(findJsonObjectSpans('say "{" then {"a":1} and "}"')).toEqual(['{" then {"a":1} and "}', '{"a":1}']);
  });

  it('skips an opening brace that never balances', () => {
    expect(findJsonObjectSpans('start { oops {"a":1}')).toEqual(['{"a":1}']);
  });

  it('returns nothing when there is no object', () => {
    expect(findJsonObjectSpans('I think this is Medium relevance')).toEqual([]);
    expect(findJsonObjectSpans('} {')).toEqual([]);
  });
});

describe('extractOutcome', () => {
  it('recovers an object embedded in prose', () => {
    const raw =
      'Here is the result: {"designation_relevance": "High", "how_relevant": "...", "target_persona": "", "next_step": "..."}  Hope this helps!';
    const outcome = extractOutcome(raw, WIFI_INFRA_V2);
    expect(outcome.failure).toBeUndefined();
    expect(outcome.verdict).toStrictEqual({ tier: 'High', rationale: '...', recommendedNextStep: '...' });
  });

  it('handles nested objects and braces inside strings', () => {
    const raw = [
      '```json',
      '{"designation_relevance": "medium", "how_relevant": "Runs plants {north, south}",',
      ' "next_step": "Call the COO", "geography": "Pune, India", "meta": {"confidence": {"value": 0.7}}}',
      '```',
    ].join('\n');
    expect(extractVerdict(raw, WIFI_INFRA_V2)).toStrictEqual({
      tier: 'Medium',
      rationale: 'Runs plants {north, south}',
      recommendedNextStep: 'Call the COO',
      geography: 'Pune, India',
    });
  });

  it('prefers the object that carries a tier over earlier objects', () => {
    const raw = 'Schema {} then answer {"designation_relevance":"HIGH","how_relevant":"Owns the network budget"}';
    expect(extractVerdict(raw, WIFI_INFRA_V2)).toStrictEqual({
      tier: 'High',
      rationale: 'Owns the network budget',
    });
  });

  it('recovers the object when prose around it quotes braces', () => {
    const raw = 'Braces like "{" are tricky: {"designation_relevance":"High","how_relevant":"CIO"} and "}" too';
    const outcome = extractOutcome(raw, WIFI_INFRA_V2);
    expect(outcome.failure).toBeUndefined();
    expect(outcome.verdict).toStrictEqual({ tier: 'High', rationale: 'CIO' });
  });

  it('recovers an object wrapped in an invalid outer object', () => {
    const raw = 'Answer {here: {"designation_relevance":"High","how_relevant":"CIO"}}';
    const outcome = extractOutcome(raw, WIFI_INFRA_V2);
    expect(outcome.failure).toBeUndefined();
    expect(outcome.verdict).toStrictEqual({ tier: 'High', rationale: 'CIO' });
  });

  it('falls back with a no-structured-output cause when there is no JSON', () => {
    const outcome = extractOutcome('I think this is Medium relevance', WIFI_INFRA_V2);
    expect(outcome.failure).toEqual({ kind: 'no_structured_output', detail: 'no balanced JSON object found' });
    expect(outcome.verdict).toStrictEqual({
      tier: 'No',
      rationale: 'Manual analysis required - no structured output in model response: no balanced JSON object found',
      recommendedTargetPersona: 'CIO/Head of IT Infrastructure',
      recommendedNextStep: WIFI_INFRA_V2.manualReviewStep,
    });
  });

  it('reports empty model text', () => {
    expect(extractOutcome('   ', WIFI_INFRA_V1).failure).toEqual({
      kind: 'no_structured_output',
      detail: 'model returned empty text',
    });
  });

  it('falls back with a parse-error cause on malformed JSON', () => {
    const outcome = extractOutcome('{designation_relevance: High}', WIFI_INFRA_V2);
    expect(outcome.failure?.kind).toBe('parse_error');
    expect(outcome.verdict.tier).toBe('No');
    expect(outcome.verdict.rationale.startsWith('Manual analysis required - invalid JSON in model response: ')).toBe(
      true,
    );
  });

  it('rejects an unknown tier value', () => {
    const outcome = extractOutcome('{"designation_relevance":"Very High","how_relevant":"x"}', WIFI_INFRA_V2);
    expect(outcome.failure).toEqual({
      kind: 'schema_violation',
      detail: 'unknown tier "Very High" (expected one of High, Medium, Low, No)',
    });
    expect(outcome.verdict.rationale).toBe(
      'Manual analysis required - schema violation in model response: unknown tier "Very High" (expected one of High, Medium, Low, No)',
    );
  });

  it('rejects a tier from another policy version', () => {
    const outcome = extractOutcome(
      '{"designation_relevance":"No","how_relevant":"HR role","target_persona":"CIO","next_step":"Ask"}',
      WIFI_INFRA_V1,
    );
    expect(outcome.failure?.kind).toBe('schema_violation');
    expect(outcome.verdict.tier).toBe('Low');
  });

  it('rejects a missing tier key', () => {
    expect(extractOutcome('{"how_relevant":"x"}', WIFI_INFRA_V2).failure).toEqual({
      kind: 'schema_violation',
      detail: 'designation_relevance: missing tier',
    });
  });

  it('requires the fields the resolved tier demands', () => {
    const raw = '{"designation_relevance":"Low","how_relevant":"Developer","target_persona":"  ","next_step":"Ask for intro"}';
    expect(extractOutcome(raw, WIFI_INFRA_V2).failure).toEqual({
      kind: 'schema_violation',
      detail: 'tier Low requires a non-empty target_persona',
    });
  });

  it('requires a rationale for every tier', () => {
    expect(extractOutcome('{"designation_relevance":"High","how_relevant":""}', WIFI_INFRA_V2).failure).toEqual({
      kind: 'schema_violation',
      detail: 'tier High requires a non-empty how_relevant',
    });
  });

  it('applies per-version requirements to the same answer', () => {
    const raw = '{"designation_relevance":"Medium","how_relevant":"Runs the plant","next_step":"Book a site survey"}';
    expect(extractOutcome(raw, WIFI_INFRA_V2).failure).toBeUndefined();
    expect(extractOutcome(raw, WIFI_INFRA_V1).failure).toEqual({
      kind: 'schema_violation',
      detail: 'tier Medium requires a non-empty target_persona',
    });
  });

  it('rejects non-string field types', () => {
    const outcome = extractOutcome('{"designation_relevance":"High","how_relevant":42}', WIFI_INFRA_V2);
    expect(outcome.failure?.kind).toBe('schema_violation');
    expect(outcome.failure?.detail.startsWith('how_relevant: ')).toBe(true);
  });
});

describe('fallbackVerdict', () => {
  it('is well formed for every failure kind', () => {
    for (const kind of ['provider_error', 'no_structured_output', 'parse_error', 'schema_violation'] as const) {
      const verdict = fallbackVerdict(WIFI_INFRA_V1, { kind, detail: '' });
      expect(verdict.tier).toBe('Low');
      expect(verdict.rationale.length).toBeGreaterThan(0);
      expect(verdict.recommendedTargetPersona).toBe('CIO/Head of IT Infrastructure');
      expect(Object.isFrozen(verdict)).toBe(true);
    }
  });

  it('keeps failure kinds distinguishable', () => {
    const provider = fallbackVerdict(WIFI_INFRA_V2, { kind: 'provider_error', detail: 'x' }).rationale;
    const schema = fallbackVerdict(WIFI_INFRA_V2, { kind: 'schema_violation', detail: 'x' }).rationale;
    expect(provider).toBe('Manual analysis required - model provider error: x');
    expect(schema).toBe('Manual analysis required - schema violation in model response: x');
  });
});
