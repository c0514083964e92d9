import { FIELD_KEYS, VERDICT_KEYS } from '../schemas/verdict.js';
import type { Profile, RelevancePolicy } from '../types.js';

export const PROFILE_START = '<<<PROFILE';
export const PROFILE_END = 'PROFILE>>>';

/**
 * Render a policy and one profile into the model instruction.
 * Pure: the same inputs always give the same string.
 */
export function compilePrompt(profile: Profile, policy: RelevancePolicy): string {
  const { context } = policy;
  const tierNames = policy.tiers.map((t) => t.tier);
  const order = tierNames.join(' -> ');

  const tierSections = policy.tiers.map((rule, i) => {
    const criteria = rule.criteria.map((c) => `   - ${c}`).join('\n');
    const required = rule.requires.map((f) => FIELD_KEYS[f]).join(', ');
    return `${i + 1}. ${rule.tier}: ${rule.summary}\n${criteria}\n   Required non-empty fields: ${required}`;
  });

  return [
    'Classify the professional profile below by its relevance to our sales motion.',
    '',
    'SALES CONTEXT:',
    `- Company: ${context.company}`,
    `- Offering: ${context.offering}`,
    `- Target roles: ${context.targetRoles.join(', ')}`,
    `- Target industries: ${context.targetIndustries.join(', ')}`,
    `- Geography focus: ${context.geographyFocus}`,
    `- Ideal buyer: ${policy.idealBuyer}`,
    '',
    `PROFILE TEXT (verbatim, between ${PROFILE_START} and ${PROFILE_END}):`,
    PROFILE_START,
    profile,
    PROFILE_END,
    '',
    'RELEVANCE TIERS (highest priority first):',
    ...tierSections,
    '',
    `DECISION RULE: check the tiers in the order ${order} and assign the first tier whose criteria match.`,
    `Assign exactly one tier. If nothing matches, assign ${tierNames[tierNames.length - 1]}.`,
    '',
    'OUTPUT CONTRACT:',
    'Return a single JSON object with exactly these keys:',
    `- "${VERDICT_KEYS.tier}": one of ${tierNames.map((t) => `"${t}"`).join(', ')}`,
    `- "${VERDICT_KEYS.rationale}": why this person is or is not relevant, based on their responsibilities and influence on network purchasing`,
    `- "${VERDICT_KEYS.targetPersona}": if the person is not the right buyer, the exact persona to target instead; otherwise ""`,
    `- "${VERDICT_KEYS.nextStep}": the recommended next sales action; "" if not required`,
    `- "${VERDICT_KEYS.geography}": the person's primary location as stated in the profile; "" if unknown`,
    'Respond with ONLY the JSON object. No markdown, no code fences, no text before or after it.',
  ].join('\n');
}
