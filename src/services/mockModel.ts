import { VERDICT_KEYS } from '../schemas/verdict.js';
import type { RelevancePolicy, TierRule } from '../types.js';
import type { CompletionOptions, ModelInvoker } from './modelClient.js';
import { PROFILE_END, PROFILE_START } from './prompt.js';

const DIRECT_TITLES = [
  'chief information officer',
  'chief technology officer',
  'cio',
  'cto',
  'it infrastructure',
  'network architect',
  'wireless engineer',
  'head of it',
];

const INFLUENCER_TITLES = [
  'chief operating officer',
  'coo',
  'operations head',
  'head of operations',
  'facilities manager',
  'head of plant',
  'plant head',
  'warehouse manager',
];

/**
 * Offline stand-in for the model: classifies by title keywords and answers
 * in the same JSON contract the real model is asked for.
 */
export class MockModelClient implements ModelInvoker {
  constructor(private readonly policy: RelevancePolicy) {}

  async complete(prompt: string, _options: CompletionOptions): Promise<string> {
    const profile = profileFromPrompt(prompt).toLowerCase();
    const tiers = this.policy.tiers;

    let rule: TierRule;
    let reason: string;
    const direct = DIRECT_TITLES.find((t) => containsWord(profile, t));
    const influencer = INFLUENCER_TITLES.find((t) => containsWord(profile, t));
    if (direct) {
      rule = tiers[0];
      reason = `Profile mentions "${direct}", a direct IT infrastructure decision role.`;
    } else if (influencer && tiers.length > 1) {
      rule = tiers[1];
      reason = `Profile mentions "${influencer}", a role that influences site connectivity purchases.`;
    } else {
      rule = tiers[tiers.length - 1];
      reason = 'Profile shows no IT infrastructure or site operations responsibility.';
    }

    const needsPersona = rule.requires.includes('targetPersona');
    const needsNextStep = rule.requires.includes('nextStep');

    return JSON.stringify({
      [VERDICT_KEYS.tier]: rule.tier,
      [VERDICT_KEYS.rationale]: reason,
      [VERDICT_KEYS.targetPersona]: needsPersona ? this.policy.idealBuyer : '',
      [VERDICT_KEYS.nextStep]: needsNextStep
        ? `Ask for an introduction to the ${this.policy.idealBuyer}.`
        : 'Book a discovery call about site connectivity.',
      [VERDICT_KEYS.geography]: '',
    });
  }
}

function profileFromPrompt(prompt: string): string {
  const start = prompt.indexOf(`${PROFILE_START}\n`);
  const end = prompt.lastIndexOf(`\n${PROFILE_END}`);
  if (start === -1 || end === -1 || end < start) return prompt;
  return prompt.slice(start + PROFILE_START.length + 1, end);
}

function containsWord(text: string, phrase: string): boolean {
  const escaped = phrase.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`\\b${escaped}\\b`).test(text);
}
