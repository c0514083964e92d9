import type { RelevancePolicy, SalesContext } from '../types.js';

/**
 * Built-in relevance policies for the enterprise Wi-Fi / network infrastructure motion.
 * Tiers are listed in priority order; the first tier whose criteria match wins.
 * Custom policies with the same shape can be loaded from JSON (POLICY_FILE).
 */

const WIFI_CONTEXT: SalesContext = {
  company: 'Enterprise Wi-Fi and network infrastructure vendor',
  offering: 'Wi-Fi and network infrastructure solutions for large sites',
  targetRoles: [
    'CIO',
    'CTO',
    'IT Infrastructure Manager',
    'Network Architect',
    'Operations Head',
  ],
  targetIndustries: [
    'Manufacturing',
    'Warehouses',
    'BFSI',
    'Education',
    'Healthcare',
    'Hospitality',
  ],
  geographyFocus: 'India',
};

const IDEAL_BUYER = 'CIO/Head of IT Infrastructure';

const MANUAL_REVIEW_STEP =
  'Review this profile manually before outreach; automated classification was not possible.';

export const WIFI_INFRA_V2: RelevancePolicy = {
  id: 'wifi-infra-v2',
  version: 2,
  description: 'Four-tier policy (High/Medium/Low/No); persona and next step required for Low and No.',
  context: WIFI_CONTEXT,
  tiers: [
    {
      tier: 'High',
      summary: 'Direct ownership of IT or network infrastructure decisions.',
      criteria: [
        'Holds a direct IT or network infrastructure role: CIO, CTO, IT Infrastructure Manager, Network Architect, Wireless Engineer',
        'Owns IT infrastructure budget, vendor selection or network rollouts',
      ],
      requires: ['rationale'],
    },
    {
      tier: 'Medium',
      summary: 'Indirect influence on infrastructure purchases.',
      criteria: [
        'Runs operations or physical sites where connectivity matters: Operations Head, Facilities Manager, COO, Head of Plant',
        'Is consulted on, but does not own, IT purchasing decisions',
      ],
      requires: ['rationale', 'nextStep'],
    },
    {
      tier: 'Low',
      summary: 'Limited involvement in IT decisions.',
      criteria: [
        'Works in or near technology but without infrastructure responsibility (e.g. software developer, IT support, business analyst)',
        'Could refer the buyer but has no say in network purchasing',
      ],
      requires: ['rationale', 'targetPersona', 'nextStep'],
    },
    {
      tier: 'No',
      summary: 'No relevance to IT infrastructure.',
      criteria: [
        'Function unrelated to IT or site operations (e.g. HR, finance, marketing, sales, legal)',
        'Any profile that matches none of the tiers above',
      ],
      requires: ['rationale', 'targetPersona', 'nextStep'],
    },
  ],
  idealBuyer: IDEAL_BUYER,
  manualReviewStep: MANUAL_REVIEW_STEP,
};

export const WIFI_INFRA_V1: RelevancePolicy = {
  id: 'wifi-infra-v1',
  version: 1,
  description: 'Three-tier policy (High/Medium/Low); persona and next step required for every tier below High.',
  context: WIFI_CONTEXT,
  tiers: [
    {
      tier: 'High',
      summary: 'Direct IT or network infrastructure decision maker.',
      criteria: [
        'CIO, CTO, IT Infrastructure Manager, Network Architect or equivalent',
        'Owns infrastructure budget or vendor selection',
      ],
      requires: ['rationale'],
    },
    {
      tier: 'Medium',
      summary: 'Influences infrastructure decisions without owning them.',
      criteria: [
        'Operations Head, Facilities Manager, COO, Head of Plant',
        'Responsible for sites, warehouses or campuses that depend on connectivity',
      ],
      requires: ['rationale', 'targetPersona', 'nextStep'],
    },
    {
      tier: 'Low',
      summary: 'Little or no involvement in IT infrastructure.',
      criteria: ['Any other function, or a profile that matches none of the tiers above'],
      requires: ['rationale', 'targetPersona', 'nextStep'],
    },
  ],
  idealBuyer: IDEAL_BUYER,
  manualReviewStep: MANUAL_REVIEW_STEP,
};

export const BUILT_IN_POLICIES: readonly RelevancePolicy[] = [WIFI_INFRA_V2, WIFI_INFRA_V1];
