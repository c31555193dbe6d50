/**
 * Domain models: core entities as the deal desk understands them.
 * Decoupled from both API shapes and database row shapes.
 */

// ── Buyer Identity ──

export const ACCESS_TIERS = ['public', 'seat', 'agency', 'advertiser'] as const;

/** Ordered by increasing identity disclosure and pricing privilege. */
export type AccessTier = (typeof ACCESS_TIERS)[number];

export type IdentityLevel =
  | 'anonymous'
  | 'seat_only'
  | 'agency_only'
  | 'agency_and_advertiser';

export interface BuyerIdentity {
  readonly seatId?: string;
  readonly seatName?: string;
  /** DSP platform behind the seat, e.g. "ttd", "dv360". */
  readonly dspPlatform?: string;
  readonly agencyId?: string;
  readonly agencyName?: string;
  readonly agencyHoldingCompany?: string;
  readonly advertiserId?: string;
  readonly advertiserName?: string;
  readonly advertiserIndustry?: string;
  readonly campaignId?: string;
  readonly campaignName?: string;
}

export type PaymentHistory = 'excellent' | 'good' | 'fair' | 'poor' | 'unknown';
export type RelationshipTier = 'standard' | 'preferred' | 'strategic';

export interface BuyerRelationship {
  readonly buyerId: string;
  readonly buyerType: 'seat' | 'agency' | 'advertiser';
  readonly totalHistoricalSpend: number;
  readonly totalDeals: number;
  readonly activeDeals: number;
  readonly paymentHistory: PaymentHistory;
  readonly relationshipTier: RelationshipTier;
}

export type AuthenticationMethod = 'oauth' | 'api_key' | 'a2a';

/**
 * A buyer as seen by one request. Anonymous buyers may still claim an
 * identity; the claim never changes their tier.
 */
export type BuyerContext =
  | {
      readonly kind: 'anonymous';
      readonly claimedIdentity?: BuyerIdentity;
    }
  | {
      readonly kind: 'authenticated';
      readonly identity: BuyerIdentity;
      readonly relationship?: BuyerRelationship;
      readonly authenticationMethod?: AuthenticationMethod;
    };

// ── Catalog ──

export type InventoryType = 'display' | 'video' | 'ctv' | 'mobile_app' | 'native';

export const DEAL_TYPES = [
  'programmatic_guaranteed',
  'preferred_deal',
  'private_auction',
] as const;

export type DealType = (typeof DEAL_TYPES)[number];

export type PricingModel = 'cpm' | 'cpv' | 'cpc' | 'cpcv' | 'flat_fee';

export interface ProductDefinition {
  readonly productId: string;
  readonly name: string;
  readonly inventoryType: InventoryType;
  readonly baseCpm: number;
  readonly floorCpm: number;
  readonly currency: string;
  readonly supportedDealTypes: readonly DealType[];
  readonly supportedPricingModels: readonly PricingModel[];
  readonly minimumImpressions: number;
  readonly maximumImpressions?: number;
  readonly audienceCapabilityIds?: readonly string[];
  /** Pre-computed embedding of the product's audience, when the catalog has one. */
  readonly audienceEmbedding?: Embedding;
}

// ── Pricing ──

export type DiscountType = 'percentage' | 'fixed_amount' | 'fixed_price';

export interface VolumeDiscount {
  readonly minImpressions: number;
  readonly maxImpressions?: number;
  readonly discountType: DiscountType;
  /** Fraction (0-1) for percentage rungs. */
  readonly discountValue: number;
}

export interface PricingRule {
  readonly ruleId: string;
  readonly ruleName: string;
  /** Higher priority rules are evaluated first. */
  readonly priority: number;

  readonly accessTier?: AccessTier;
  readonly agencyIds: readonly string[];
  readonly advertiserIds: readonly string[];
  readonly holdingCompanyIds: readonly string[];
  readonly productIds: readonly string[];
  readonly inventoryTypes: readonly string[];

  readonly basePriceOverride?: number;
  readonly discountPercentage: number;
  readonly volumeDiscounts: readonly VolumeDiscount[];

  readonly negotiationEnabled: boolean;
  readonly maxNegotiationDiscount: number;

  /** ISO-8601 dates; only checked when the caller supplies an evaluation date. */
  readonly validFrom?: string;
  readonly validTo?: string;
  readonly isActive: boolean;
}

export type AvailsGranularity = 'high_level' | 'moderate' | 'detailed';

export interface PricingTier {
  readonly tier: AccessTier;
  readonly tierName: string;
  readonly description: string;
  /** False shows a price range instead of a number. */
  readonly showExactPrice: boolean;
  readonly priceRangeVariance: number;
  readonly tierDiscount: number;
  readonly negotiationEnabled: boolean;
  readonly premiumInventoryAccess: boolean;
  readonly customDealsEnabled: boolean;
  readonly volumeDiscountsEnabled: boolean;
  readonly availsGranularity: AvailsGranularity;
}

export interface TieredPricingConfig {
  readonly sellerOrganizationId: string;
  readonly tiers: Readonly<Partial<Record<AccessTier, PricingTier>>>;
  readonly rules: readonly PricingRule[];
  readonly defaultCurrency: string;
  readonly globalFloorCpm: number;
  readonly globalCeilingCpm?: number;
  /** Same advertiser, same price, whichever agency buys. */
  readonly advertiserPricingConsistent: boolean;
}

export interface PricingDecision {
  readonly productId: string;
  readonly dealType: DealType;
  readonly buyerTier: AccessTier;
  readonly pricingKey: string;
  readonly basePrice: number;
  readonly tierDiscount: number;
  readonly ruleDiscount: number;
  readonly priceOverride: number | null;
  readonly volumeDiscount: number;
  readonly finalPrice: number;
  readonly currency: string;
  readonly pricingModel: PricingModel;
  readonly rationale: string;
  readonly appliedRules: readonly string[];
}

// ── Audience ──

export type SignalType = 'identity' | 'contextual' | 'reinforcement';
export type SimilarityMetric = 'cosine' | 'dot' | 'l2';
export type EmbeddingType = 'context' | 'creative' | 'user_intent' | 'inventory' | 'query';

export interface AudienceCapability {
  readonly capabilityId: string;
  readonly name: string;
  readonly signalType: SignalType;
  /** 0-100. */
  readonly coveragePercentage: number;
  readonly availableSegments: readonly string[];
  readonly ucpCompatible: boolean;
  readonly embeddingDimension?: number;
}

export interface ConsentInfo {
  /** e.g. "IAB-TCFv2". */
  readonly framework: string;
  readonly consentString?: string;
  readonly permissibleUses: readonly string[];
  readonly ttlSeconds: number;
}

export interface EmbeddingModel {
  readonly id: string;
  readonly version: string;
  readonly dimension: number;
  readonly metric: SimilarityMetric;
}

export interface Embedding {
  readonly vector: readonly number[];
  readonly dimension: number;
  readonly embeddingType: EmbeddingType;
  readonly signalType: SignalType;
  readonly model: EmbeddingModel;
  readonly consent?: ConsentInfo;
  readonly createdAt: Date;
  readonly ttlSeconds: number;
}

export type AudienceValidationStatus = 'valid' | 'partial_match' | 'no_match' | 'invalid';

export interface AudienceAlternative {
  readonly gap: string;
  readonly suggestion: string;
}

export interface AudienceValidationResult {
  readonly validationStatus: AudienceValidationStatus;
  /** 0-100. */
  readonly coveragePercentage: number;
  /** 0-1, null when no similarity was computed. */
  readonly similarityScore: number | null;
  readonly matchedCapabilities: readonly string[];
  readonly gaps: readonly string[];
  readonly alternatives: readonly AudienceAlternative[];
  readonly targetingCompatible: boolean;
  readonly estimatedReach: number | null;
  readonly validationNotes: readonly string[];
}

/** Buyer's audience requirements, keyed by targeting dimension. */
export type AudienceRequirements = Readonly<Record<string, unknown>>;

// ── Evaluation ──

export type Recommendation = 'accept' | 'counter' | 'reject';

export interface YieldScore {
  readonly overallScore: number;
  readonly revenueScore: number;
  readonly relationshipScore: number;
  readonly fillRateImpact: number;
  readonly pricingPowerImpact: number;
  readonly recommendation: Recommendation;
  readonly rationale: string;
}

export interface CounterTerms {
  readonly proposedPrice: number;
  readonly floorPrice: number;
  readonly maxImpressions: number;
  /** Extra discount a strategic buyer may still negotiate. */
  readonly negotiationRoom: number | null;
  readonly reason: string;
}

export type UpsellType = 'volume_upgrade' | 'cross_sell' | 'commitment_bonus' | 'alternative_product';

export interface UpsellSuggestion {
  readonly type: UpsellType;
  readonly message: string;
}

export interface ProposalEvaluation {
  proposalId: string;
  proposalLineId: string;
  productId: string;
  evaluatedAt: Date;

  isValid: boolean;
  validationErrors: string[];

  requestedPrice: number;
  minimumAcceptablePrice: number;
  recommendedPrice: number;
  priceAcceptable: boolean;
  priceReason: string;

  requestedImpressions: number;
  availableImpressions: number;
  impressionsAvailable: boolean;

  targetingCompatible: boolean;
  audienceValidated: boolean;
  audienceCoverage: number;
  audienceGaps: string[];
  similarityScore: number | null;

  yieldScore: YieldScore | null;
}

// ── Deals ──

export type ActivationType = 'traditional_dsp' | 'agentic';

export interface DealOutput {
  readonly dealId: string;
  readonly dealType: DealType;
  readonly proposalId: string;
  readonly productId: string;
  readonly price: number;
  readonly pricingModel: PricingModel;
  readonly currency: string;
  /** PG deals only. */
  readonly guaranteedImpressions: number | null;
  /** PD and PA deals only. */
  readonly floorPrice: number | null;
  readonly buyerOrganizationId: string;
  readonly sellerOrganizationId: string;
  readonly flightStart: string;
  readonly flightEnd: string;
  readonly activationType: ActivationType;
  readonly dspCompatible: boolean;
  readonly createdAt: Date;
}
