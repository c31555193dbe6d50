/**
 * Shared builders for test data.
 */

import type {
  BuyerContext,
  BuyerRelationship,
  ConsentInfo,
  Embedding,
  PricingRule,
  ProductDefinition,
  ProposalEvaluation,
} from '../src/types/models.js';
import { anonymousBuyer, authenticatedBuyer } from '../src/services/BuyerIdentityResolver.js';

export const PUBLIC_BUYER: BuyerContext = anonymousBuyer();
export const SEAT_BUYER: BuyerContext = authenticatedBuyer({ seatId: 'seat-1' });
export const AGENCY_BUYER: BuyerContext = authenticatedBuyer({
  seatId: 'seat-1',
  agencyId: 'agency-1',
  agencyHoldingCompany: 'holdco-1',
});
export const ADVERTISER_BUYER: BuyerContext = authenticatedBuyer({
  seatId: 'seat-1',
  agencyId: 'agency-1',
  advertiserId: 'adv-1',
});

export const CONSENT: ConsentInfo = {
  framework: 'IAB-TCFv2',
  consentString: 'test-consent',
  permissibleUses: ['audience_matching'],
  ttlSeconds: 3600,
};

export function relationship(overrides: Partial<BuyerRelationship> = {}): BuyerRelationship {
  return {
    buyerId: 'adv-1',
    buyerType: 'advertiser',
    totalHistoricalSpend: 0,
    totalDeals: 0,
    activeDeals: 0,
    paymentHistory: 'unknown',
    relationshipTier: 'standard',
    ...overrides,
  };
}

export function product(overrides: Partial<ProductDefinition> = {}): ProductDefinition {
  return {
    productId: 'prod-display',
    name: 'Homepage Display',
    inventoryType: 'display',
    baseCpm: 20,
    floorCpm: 5,
    currency: 'USD',
    supportedDealTypes: ['programmatic_guaranteed', 'preferred_deal', 'private_auction'],
    supportedPricingModels: ['cpm'],
    minimumImpressions: 10_000,
    ...overrides,
  };
}

export function rule(overrides: Partial<PricingRule> & { ruleId: string }): PricingRule {
  return {
    ruleName: overrides.ruleId,
    priority: 0,
    agencyIds: [],
    advertiserIds: [],
    holdingCompanyIds: [],
    productIds: [],
    inventoryTypes: [],
    discountPercentage: 0,
    volumeDiscounts: [],
    negotiationEnabled: false,
    maxNegotiationDiscount: 0,
    isActive: true,
    ...overrides,
  };
}

export function embedding(vector: number[], overrides: Partial<Embedding> = {}): Embedding {
  return {
    vector,
    dimension: vector.length,
    embeddingType: 'query',
    signalType: 'contextual',
    model: { id: 'test', version: '1', dimension: vector.length, metric: 'cosine' },
    consent: CONSENT,
    createdAt: new Date('2026-03-01T00:00:00.000Z'),
    ttlSeconds: 3600,
    ...overrides,
  };
}

export function evaluation(overrides: Partial<ProposalEvaluation> = {}): ProposalEvaluation {
  return {
    proposalId: 'prop-1',
    proposalLineId: '',
    productId: 'prod-display',
    evaluatedAt: new Date('2026-03-01T00:00:00.000Z'),
    isValid: true,
    validationErrors: [],
    requestedPrice: 20,
    minimumAcceptablePrice: 5,
    recommendedPrice: 20,
    priceAcceptable: true,
    priceReason: 'Price acceptable',
    requestedImpressions: 1_000_000,
    availableImpressions: 5_000_000,
    impressionsAvailable: true,
    targetingCompatible: true,
    audienceValidated: false,
    audienceCoverage: 0,
    audienceGaps: [],
    similarityScore: null,
    yieldScore: null,
    ...overrides,
  };
}

/** A proposal payload as a buyer would send it. */
export function proposalPayload(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    productId: 'prod-display',
    impressions: 1_000_000,
    startDate: '2026-04-01',
    endDate: '2026-04-30',
    price: 20,
    dealType: 'PD',
    ...overrides,
  };
}
