import { SchemaViolation, describeError } from '../errors.js';
import { formatZodIssues } from '../schemas/policy.js';
import { FIELD_KEYS, ModelVerdictSchema, VERDICT_KEYS } from '../schemas/verdict.js';
import type { ClassificationOutcome, FailureCause, FailureKind, RelevancePolicy, Verdict } from '../types.js';
import { lowestTier, normalizeTier, requiredFields } from './policy.js';

/**
 * Turns untrusted model text into a verdict. Every path returns a verdict:
 * output that cannot be trusted becomes the policy's fallback.
 */

const FAILURE_LABELS: Record<FailureKind, string> = {
  provider_error: 'model provider error',
  no_structured_output: 'no structured output in model response',
  parse_error: 'invalid JSON in model response',
  schema_violation: 'schema violation in model response',
};

/**
 * Return the balanced `{...}` span that starts at each opening brace in
 * `text`, ordered by start position, so an enclosing span comes before the
 * spans nested in it. Each start is scanned on its own, with braces inside
 * JSON string literals ignored; an opening brace that never balances yields
 * no span.
 */
export function findJsonObjectSpans(text: string): string[] {
  const spans: string[] = [];
  for (let from = text.indexOf('{'); from !== -1; from = text.indexOf('{', from + 1)) {
    const end = matchingBrace(text, from);
    if (end !== -1) spans.push(text.slice(from, end + 1));
  }
  return spans;
}

function matchingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeCandidates(spans: string[]): { object?: Record<string, unknown>; error: string } {
  let first: Record<string, unknown> | undefined;
  let error = 'no candidate decoded to a JSON object';

  for (const span of spans) {
    try {
      const value: unknown = JSON.parse(span);
      if (!isPlainObject(value)) continue;
      if (VERDICT_KEYS.tier in value) return { object: value, error };
      first ??= value;
    } catch (err) {
      error = describeError(err);
    }
  }
  return { object: first, error };
}

function clean(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Validate a decoded object against the response contract and the policy.
 * Throws SchemaViolation.
 */
export function toVerdict(decoded: Record<string, unknown>, policy: RelevancePolicy): Verdict {
  const parsed = ModelVerdictSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new SchemaViolation(formatZodIssues(parsed.error));
  }
  const data = parsed.data;

  const rawTier = data[VERDICT_KEYS.tier];
  const tier = normalizeTier(policy, rawTier);
  if (!tier) {
    const allowed = policy.tiers.map((t) => t.tier).join(', ');
    throw new SchemaViolation(`unknown tier "${rawTier}" (expected one of ${allowed})`);
  }

  const rationale = clean(data[VERDICT_KEYS.rationale]);
  const targetPersona = clean(data[VERDICT_KEYS.targetPersona]);
  const nextStep = clean(data[VERDICT_KEYS.nextStep]);
  if (!rationale) {
    throw new SchemaViolation(`tier ${tier} requires a non-empty ${VERDICT_KEYS.rationale}`);
  }

  const present = { rationale, targetPersona, nextStep };
  const missing = requiredFields(policy, tier).filter((field) => !present[field]);
  if (missing.length) {
    const keys = missing.map((field) => FIELD_KEYS[field]).join(', ');
    throw new SchemaViolation(`tier ${tier} requires a non-empty ${keys}`);
  }

  return createVerdict({
    tier,
    rationale,
    recommendedTargetPersona: targetPersona,
    recommendedNextStep: nextStep,
    geography: clean(data[VERDICT_KEYS.geography]),
  });
}

/** Freeze a verdict, leaving out optional fields that have no value. */
export function createVerdict(fields: Verdict): Verdict {
  const verdict: {
    tier: string;
    rationale: string;
    recommendedTargetPersona?: string;
    recommendedNextStep?: string;
    geography?: string;
  } = { tier: fields.tier, rationale: fields.rationale };
  if (fields.recommendedTargetPersona) verdict.recommendedTargetPersona = fields.recommendedTargetPersona;
  if (fields.recommendedNextStep) verdict.recommendedNextStep = fields.recommendedNextStep;
  if (fields.geography) verdict.geography = fields.geography;
  return Object.freeze(verdict);
}

export function fallbackVerdict(policy: RelevancePolicy, cause: FailureCause): Verdict {
  const detail = cause.detail.trim() || 'no further detail';
  return createVerdict({
    tier: lowestTier(policy),
    rationale: `Manual analysis required - ${FAILURE_LABELS[cause.kind]}: ${detail}`,
    recommendedTargetPersona: policy.idealBuyer,
    recommendedNextStep: policy.manualReviewStep,
  });
}

export function fallbackOutcome(policy: RelevancePolicy, cause: FailureCause): ClassificationOutcome {
  return { verdict: fallbackVerdict(policy, cause), failure: cause };
}

export function extractOutcome(raw: string, policy: RelevancePolicy): ClassificationOutcome {
  const text = raw.trim();
  const spans = findJsonObjectSpans(text);
  if (!spans.length) {
    return fallbackOutcome(policy, {
      kind: 'no_structured_output',
      detail: text ? 'no balanced JSON object found' : 'model returned empty text',
    });
  }

  const { object, error } = decodeCandidates(spans);
  if (!object) {
    return fallbackOutcome(policy, { kind: 'parse_error', detail: error });
  }

  try {
    return { verdict: toVerdict(object, policy) };
  } catch (err) {
    return fallbackOutcome(policy, { kind: 'schema_violation', detail: describeError(err) });
  }
}

export function extractVerdict(raw: string, policy: RelevancePolicy): Verdict {
  return extractOutcome(raw, policy).verdict;
}
