import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { VerdictField } from '../types.js';

/**
 * JSON keys of the object the model is asked to return.
 * Shared by the prompt compiler and the result extractor.
 */
export const VERDICT_KEYS = {
  tier: 'designation_relevance',
  rationale: 'how_relevant',
  targetPersona: 'target_persona',
  nextStep: 'next_step',
  geography: 'geography',
} as const;

export const FIELD_KEYS: Record<VerdictField, string> = {
  rationale: VERDICT_KEYS.rationale,
  targetPersona: VERDICT_KEYS.targetPersona,
  nextStep: VERDICT_KEYS.nextStep,
};

const optionalText = z.string().nullable().optional();

export const ModelVerdictSchema = z.object({
  [VERDICT_KEYS.tier]: z.string({ required_error: 'missing tier', invalid_type_error: 'tier must be a string' }),
  [VERDICT_KEYS.rationale]: optionalText,
  [VERDICT_KEYS.targetPersona]: optionalText,
  [VERDICT_KEYS.nextStep]: optionalText,
  [VERDICT_KEYS.geography]: optionalText,
});

export const VerdictSchema = z.object({
  tier: z.string(),
  rationale: z.string().min(1),
  recommendedTargetPersona: z.string().optional(),
  recommendedNextStep: z.string().optional(),
  geography: z.string().optional(),
});

const FailureSchema = z.object({
  kind: z.enum(['provider_error', 'no_structured_output', 'parse_error', 'schema_violation']),
  detail: z.string(),
});

export const ClassifyProfileSchema = z.object({
  policy: z.string(),
  verdict: VerdictSchema,
  fallback: z.boolean(),
  failure: FailureSchema.optional(),
});

export const ClassifyProfilesSchema = z.object({
  policy: z.string(),
  total: z.number(),
  fallbacks: z.number(),
  results: z.array(
    z.object({
      index: z.number(),
      verdict: VerdictSchema,
      failure: FailureSchema.optional(),
    }),
  ),
});

// MCP output schemas must be inline objects, so references are expanded.
function toToolOutputSchema(schema: z.ZodTypeAny) {
  return { ...zodToJsonSchema(schema, { $refStrategy: 'none' }), type: 'object' as const };
}

export const classifyProfileJsonSchema = toToolOutputSchema(ClassifyProfileSchema);

export const classifyProfilesJsonSchema = toToolOutputSchema(ClassifyProfilesSchema);
