import { z } from 'zod';
import type { RelevancePolicy } from '../types.js';

const VerdictFieldSchema = z.enum(['rationale', 'targetPersona', 'nextStep']);

const TierRuleSchema = z.object({
  tier: z.string().trim().min(1),
  summary: z.string().min(1),
  criteria: z.array(z.string().min(1)).min(1),
  requires: z.array(VerdictFieldSchema),
});

export const RelevancePolicySchema: z.ZodType<RelevancePolicy> = z
  .object({
    id: z.string().min(1),
    version: z.number().int().positive(),
    description: z.string(),
    context: z.object({
      company: z.string().min(1),
      offering: z.string().min(1),
      targetRoles: z.array(z.string()),
      targetIndustries: z.array(z.string()),
      geographyFocus: z.string(),
    }),
    tiers: z.array(TierRuleSchema).min(1),
    idealBuyer: z.string().trim().min(1),
    manualReviewStep: z.string().trim().min(1),
  })
  .superRefine((policy, ctx) => {
    const seen = new Set<string>();
    policy.tiers.forEach((rule, i) => {
      const key = rule.tier.toLowerCase();
      if (seen.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tiers', i, 'tier'],
          message: `Duplicate tier "${rule.tier}"`,
        });
      }
      seen.add(key);
      if (!rule.requires.includes('rationale')) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tiers', i, 'requires'],
          message: `Tier "${rule.tier}" must require a rationale`,
        });
      }
    });
  });

export function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
