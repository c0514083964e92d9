/**
 * Shared types for the profile relevance engine.
 */

/** Unstructured text describing one person's professional role. */
export type Profile = string;

/** A tier name as spelled by the active policy (e.g. "High"). */
export type RelevanceTier = string;

export type VerdictField = 'rationale' | 'targetPersona' | 'nextStep';

export interface SalesContext {
  company: string;
  offering: string;
  targetRoles: string[];
  targetIndustries: string[];
  geographyFocus: string;
}

export interface TierRule {
  tier: RelevanceTier;
  summary: string;
  criteria: string[];
  requires: VerdictField[];
}

export interface RelevancePolicy {
  id: string;
  version: number;
  description: string;
  context: SalesContext;
  tiers: TierRule[]; // priority order, highest first
  idealBuyer: string;
  manualReviewStep: string;
}

export interface Verdict {
  readonly tier: RelevanceTier;
  readonly rationale: string;
  readonly recommendedTargetPersona?: string;
  readonly recommendedNextStep?: string;
  readonly geography?: string;
}

export type FailureKind = 'provider_error' | 'no_structured_output' | 'parse_error' | 'schema_violation';

export interface FailureCause {
  kind: FailureKind;
  detail: string;
}

export interface ClassificationOutcome {
  verdict: Verdict;
  failure?: FailureCause; // present iff verdict is the fallback
}

export interface BatchEntry extends ClassificationOutcome {
  index: number;
  profile: Profile;
}

export type BatchResult = BatchEntry[];

export type ProgressObserver = (completed: number, total: number) => void;
