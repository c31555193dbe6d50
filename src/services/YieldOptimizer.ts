/**
 * Yield optimizer.
 * Scores a proposal on short-term revenue and longer-term value (buyer
 * relationship, fill rate, pricing power) and turns the score into an
 * accept/counter/reject recommendation.
 */

import type {
  AccessTier,
  BuyerContext,
  ProposalEvaluation,
  Recommendation,
  UpsellSuggestion,
  YieldScore,
} from '../types/models.js';
import type { YieldConfig } from '../config.js';
import { effectiveTier, relationshipOf } from './BuyerIdentityResolver.js';

/** Counter-proposal adjustments; fields are present only when they apply. */
export interface CounterRecommendation {
  price?: number;
  impressions?: number;
  negotiationRoom?: number;
  rationale: string;
}

const TIER_RELATIONSHIP_BASE: Record<AccessTier, number> = {
  public: 0.2,
  seat: 0.4,
  agency: 0.6,
  advertiser: 0.8,
};

const STRATEGIC_NEGOTIATION_ROOM = 0.05;

export class YieldOptimizer {
  constructor(private readonly config: YieldConfig) {}

  scoreDeal(
    evaluation: ProposalEvaluation,
    buyer: BuyerContext,
    currentFillRate: number = this.config.currentFillRate,
    marketCpm: number = this.config.marketCpm
  ): YieldScore {
    const revenueScore = revenueScoreFor(evaluation.requestedPrice, evaluation.recommendedPrice);
    const relationshipScore = relationshipScoreFor(buyer);
    const fillRateImpact = this.fillRateImpact(currentFillRate, evaluation.impressionsAvailable);
    const pricingPowerImpact = pricingPowerFor(evaluation.requestedPrice, marketCpm);

    const w = this.config.weights;
    const overallScore =
      revenueScore * w.revenue +
      relationshipScore * w.relationship +
      fillRateImpact * w.fillRate +
      pricingPowerImpact * w.pricingPower;

    const [recommendation, rationale] = recommend(
      overallScore,
      evaluation,
      revenueScore,
      relationshipScore
    );

    return {
      overallScore,
      revenueScore,
      relationshipScore,
      fillRateImpact,
      pricingPowerImpact,
      recommendation,
      rationale,
    };
  }

  recommendCounterTerms(
    evaluation: ProposalEvaluation,
    buyer: BuyerContext
  ): CounterRecommendation {
    const terms: CounterRecommendation = { rationale: '' };
    const parts: string[] = [];

    if (!evaluation.priceAcceptable) {
      terms.price = evaluation.recommendedPrice;
      parts.push(`Increase price to $${evaluation.recommendedPrice.toFixed(2)} CPM`);
    }

    if (evaluation.requestedImpressions > evaluation.availableImpressions) {
      terms.impressions = evaluation.availableImpressions;
      parts.push(`Reduce impressions to ${evaluation.availableImpressions.toLocaleString('en-US')}`);
    }

    const tier = effectiveTier(buyer);
    if (tier === 'agency' || tier === 'advertiser') {
      terms.negotiationRoom = STRATEGIC_NEGOTIATION_ROOM;
      parts.push('Strategic buyer - limited negotiation available');
    }

    terms.rationale = parts.length > 0 ? parts.join('; ') : 'Standard counter terms';
    return terms;
  }

  /**
   * Upsell ideas, best first. Cross-sells follow product-type adjacency:
   * display to video or CTV, video to CTV.
   */
  identifyUpsell(
    evaluation: ProposalEvaluation,
    buyer: BuyerContext,
    availableProductTypes: readonly string[] = [],
    productType: string = evaluation.productId
  ): UpsellSuggestion[] {
    const suggestions: UpsellSuggestion[] = [];

    if (evaluation.impressionsAvailable) {
      suggestions.push({
        type: 'volume_upgrade',
        message: 'Volume upgrade: Add 20% more impressions at 10% volume discount',
      });
    }

    const type = productType.toLowerCase();
    const offers = (t: string) => availableProductTypes.includes(t);
    if (type.includes('display') && offers('video')) {
      suggestions.push({
        type: 'cross_sell',
        message: 'Cross-sell: Add video for higher engagement and brand lift',
      });
    }
    if (type.includes('display') && offers('ctv')) {
      suggestions.push({
        type: 'cross_sell',
        message: 'Cross-sell: Extend to CTV for full-funnel coverage',
      });
    }
    if (type.includes('video') && offers('ctv')) {
      suggestions.push({
        type: 'cross_sell',
        message: 'Cross-sell: Add CTV for household-level reach',
      });
    }

    if (effectiveTier(buyer) !== 'public') {
      suggestions.push({
        type: 'commitment_bonus',
        message: 'Commitment bonus: Lock in next quarter now for preferred pricing',
      });
    }

    return suggestions;
  }

  private fillRateImpact(currentFillRate: number, inventoryAvailable: boolean): number {
    if (!inventoryAvailable) return 0;

    const target = this.config.fillRateTarget;
    if (currentFillRate < target) {
      return Math.min(1, 0.5 + (target - currentFillRate) * 2);
    }
    return Math.max(0.3, 1 - (currentFillRate - target) * 2);
  }
}

// ── Scoring functions ──

export function revenueScoreFor(offeredPrice: number, recommendedPrice: number): number {
  if (recommendedPrice <= 0) return 0.5;

  const ratio = offeredPrice / recommendedPrice;
  if (ratio >= 1) return Math.min(1, 0.8 + (ratio - 1) * 0.2);
  if (ratio >= 0.9) return 0.6 + (ratio - 0.9) * 2;
  if (ratio >= 0.8) return 0.4 + (ratio - 0.8) * 2;
  return Math.max(0, ratio * 0.5);
}

export function relationshipScoreFor(buyer: BuyerContext): number {
  let score = TIER_RELATIONSHIP_BASE[effectiveTier(buyer)];

  const rel = relationshipOf(buyer);
  if (rel) {
    if (rel.totalHistoricalSpend > 1_000_000) score += 0.15;
    else if (rel.totalHistoricalSpend > 100_000) score += 0.1;

    if (rel.activeDeals > 5) score += 0.05;
    if (rel.paymentHistory === 'excellent') score += 0.05;
  }

  return Math.min(1, score);
}

export function pricingPowerFor(offeredPrice: number, marketCpm: number): number {
  if (marketCpm <= 0) return 0.5;

  const ratio = offeredPrice / marketCpm;
  if (ratio >= 1) return Math.min(1, 0.7 + (ratio - 1) * 0.3);
  if (ratio >= 0.9) return 0.5 + (ratio - 0.9) * 2;
  return Math.max(0.2, ratio * 0.5);
}

function recommend(
  overall: number,
  evaluation: ProposalEvaluation,
  revenueScore: number,
  relationshipScore: number
): [Recommendation, string] {
  if (!evaluation.isValid) {
    return ['reject', `Invalid proposal: ${evaluation.validationErrors.join(', ')}`];
  }
  if (!evaluation.impressionsAvailable) {
    return ['reject', 'Insufficient inventory availability'];
  }

  const score = overall.toFixed(2);
  if (overall >= 0.7) {
    return [
      'accept',
      `Strong yield opportunity (score: ${score}). ` +
        `Revenue: ${revenueScore.toFixed(2)}, Relationship: ${relationshipScore.toFixed(2)}`,
    ];
  }
  if (overall >= 0.5) {
    if (revenueScore < 0.5 && relationshipScore >= 0.6) {
      return [
        'counter',
        'Strategic buyer but price needs improvement. Counter with recommended price for better yield.',
      ];
    }
    return ['accept', `Acceptable yield (score: ${score}). Consider upsell opportunities.`];
  }
  if (overall >= 0.3) {
    return [
      'counter',
      `Below yield threshold (score: ${score}). ` +
        'Counter with terms that improve revenue or relationship value.',
    ];
  }
  return [
    'reject',
    `Poor yield opportunity (score: ${score}). Price and/or terms are not acceptable.`,
  ];
}
