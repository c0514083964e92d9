import { promises as fs } from 'node:fs';
import path from 'node:path';
import { BUILT_IN_POLICIES } from '../constants/policies.js';
import { ConfigurationError, describeError } from '../errors.js';
import { RelevancePolicySchema, formatZodIssues } from '../schemas/policy.js';
import type { AppConfig } from '../config.js';
import type { RelevancePolicy, RelevanceTier, TierRule, VerdictField } from '../types.js';

export interface PolicySummary {
  id: string;
  version: number;
  description: string;
  tiers: RelevanceTier[];
}

export function listPolicies(): PolicySummary[] {
  return BUILT_IN_POLICIES.map(summarizePolicy);
}

export function summarizePolicy(policy: RelevancePolicy): PolicySummary {
  return {
    id: policy.id,
    version: policy.version,
    description: policy.description,
    tiers: policy.tiers.map((t) => t.tier),
  };
}

export function getPolicy(id: string): RelevancePolicy {
  const policy = BUILT_IN_POLICIES.find((p) => p.id === id);
  if (!policy) {
    const known = BUILT_IN_POLICIES.map((p) => p.id).join(', ');
    throw new ConfigurationError(`Unknown policy "${id}". Known policies: ${known}`);
  }
  return policy;
}

/**
 * Load and validate a policy from a JSON file. Relative paths resolve
 * against the working directory.
 */
export async function loadPolicyFile(file: string): Promise<RelevancePolicy> {
  const resolved = path.resolve(file);
  let raw: string;
  try {
    raw = await fs.readFile(resolved, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read policy file ${resolved}: ${describeError(err)}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Policy file ${resolved} is not valid JSON: ${describeError(err)}`);
  }

  const parsed = RelevancePolicySchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigurationError(`Policy file ${resolved} is invalid: ${formatZodIssues(parsed.error)}`);
  }
  return parsed.data;
}

export async function resolvePolicy(cfg: AppConfig): Promise<RelevancePolicy> {
  return cfg.policy.file ? loadPolicyFile(cfg.policy.file) : getPolicy(cfg.policy.id);
}

export function lowestTier(policy: RelevancePolicy): RelevanceTier {
  return policy.tiers[policy.tiers.length - 1].tier;
}

/**
 * Map a model-supplied tier label onto the policy's canonical spelling.
 * Matching ignores case and surrounding whitespace.
 */
export function normalizeTier(policy: RelevancePolicy, raw: string): RelevanceTier | undefined {
  const wanted = raw.trim().toLowerCase();
  if (!wanted) return undefined;
  return policy.tiers.find((t) => t.tier.toLowerCase() === wanted)?.tier;
}

/** Rule for a tier; unknown tiers get the lowest tier's rule. */
export function tierRule(policy: RelevancePolicy, tier: string): TierRule {
  const canonical = normalizeTier(policy, tier);
  const rule = policy.tiers.find((t) => t.tier === canonical);
  return rule ?? policy.tiers[policy.tiers.length - 1];
}

export function requiredFields(policy: RelevancePolicy, tier: string): VerdictField[] {
  return tierRule(policy, tier).requires;
}

/** Negative when `a` outranks `b`. Unknown tiers rank below every defined tier. */
export function compareTiers(policy: RelevancePolicy, a: string, b: string): number {
  return rank(policy, a) - rank(policy, b);
}

function rank(policy: RelevancePolicy, tier: string): number {
  const canonical = normalizeTier(policy, tier);
  const index = policy.tiers.findIndex((t) => t.tier === canonical);
  return index === -1 ? policy.tiers.length : index;
}
