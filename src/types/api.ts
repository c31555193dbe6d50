/**
 * API types: shapes for request/response payloads exchanged with callers.
 * Decoupled from domain models so the surface can evolve independently.
 */

import type {
  AccessTier,
  ActivationType,
  AudienceCapability,
  AudienceRequirements,
  ConsentInfo,
  CounterTerms,
  DealType,
  Embedding,
  PricingDecision,
  ProposalEvaluation,
  Recommendation,
  SignalType,
  UpsellSuggestion,
} from './models.js';

// ── Requests ──

export interface ProposalRequest {
  productId: string;
  impressions: number;
  /** ISO-8601 date. */
  startDate: string;
  /** ISO-8601 date. */
  endDate: string;
  proposalLineId?: string;
  /** Offered CPM. */
  price?: number;
  dealType?: string;
  audienceTargeting?: AudienceRequirements;
  /** Buyer-supplied audience embedding; generated from targeting when absent. */
  buyerEmbedding?: Embedding;
  consent?: ConsentInfo;
  buyerOrganizationId?: string;
}

export interface CreateDealOptions {
  /** Required to turn a counter into a deal; the counter terms replace the buyer's. */
  counterAccepted?: boolean;
  activationType?: ActivationType;
  buyerOrganizationId?: string;
}

// ── Responses ──

export type ProposalStage =
  | 'received'
  | 'product_validated'
  | 'audience_validated'
  | 'pricing_evaluated'
  | 'availability_checked'
  | 'scored'
  | 'decided'
  | 'counter_terms_generated'
  | 'upsell_identified'
  | 'finalized';

export type EvaluationStatus =
  | 'received'
  | 'evaluating'
  | 'counter_pending'
  | 'accepted'
  | 'rejected'
  | 'failed';

export type DecisionSource = 'advisory' | 'rule_based' | 'validation';

export interface EvaluationResult {
  proposalId: string;
  status: EvaluationStatus;
  recommendation: Recommendation | null;
  decisionSource: DecisionSource | null;
  evaluation: ProposalEvaluation | null;
  pricing: PricingDecision | null;
  counterTerms: CounterTerms | null;
  upsellSuggestions: UpsellSuggestion[];
  stages: ProposalStage[];
  errors: string[];
  warnings: string[];
  startedAt: Date;
  completedAt: Date | null;
  /** Validated request, kept for deal creation. Null when the request failed validation. */
  request: ProposalRequest | null;
}

export type PriceDisplay =
  | {
      type: 'exact';
      price: number;
      currency: string;
      negotiationEnabled: boolean;
    }
  | {
      type: 'range';
      low: number;
      high: number;
      currency: string;
      display: string;
    };

export interface PriceAcceptability {
  acceptable: boolean;
  reason: string;
}

export type CoverageConfidence = 'high' | 'medium' | 'low';

export interface CoverageEstimate {
  coveragePercentage: number;
  estimatedImpressions: number;
  matchedCapabilities: string[];
  confidence: CoverageConfidence;
  limitingFactors: string[];
}

export interface TargetingCoverageEstimate {
  coveragePercentage: number;
  estimatedImpressions: number;
  totalInventory: number;
  confidence: CoverageConfidence;
  breakdown: Record<string, number>;
  limitingFactors: string[];
  layers: number;
  isDeliverable: boolean;
}

export interface CapabilityReport {
  capabilities: AudienceCapability[];
  bySignalType: Partial<Record<SignalType, Array<Pick<AudienceCapability, 'capabilityId' | 'name' | 'coveragePercentage' | 'ucpCompatible'>>>>;
  totalCapabilities: number;
  ucpCompatibleCount: number;
}

export interface OpenRtbDealParams {
  id: string;
  bidfloor: number;
  bidfloorcur: string;
  /** 1 = first price auction, 3 = fixed price. */
  at: 1 | 3;
  wseat: string[];
  wadomain: string[];
  ext?: { guaranteed: true; impressions: number | null };
}

export interface BuyerSummary {
  tier: AccessTier;
  pricingKey: string;
  authenticated: boolean;
}

export interface DealTypeResolution {
  dealType: DealType;
  recognized: boolean;
}

// ── Errors ──

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'PROPOSAL_NOT_ACCEPTED'
  | 'CONFIGURATION_ERROR'
  | 'TIMEOUT'
  | 'COLLABORATOR_ERROR';
