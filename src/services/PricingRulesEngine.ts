/**
 * Tiered pricing by buyer identity.
 *
 * Order of operations for a price:
 *   1. tier discount
 *   2. highest-priority price override, else the largest rule discount
 *   3. steepest volume discount (rule ladders, else built-in breakpoints)
 *   4. clamp to the global floor and ceiling
 *   5. round to cents
 *
 * The engine holds only the frozen pricing config, so a call is a pure
 * function of its arguments and never throws.
 */

import type {
  AccessTier,
  BuyerContext,
  DealType,
  PricingDecision,
  PricingRule,
  PricingTier,
  TieredPricingConfig,
} from '../types/models.js';
import type { PriceAcceptability, PriceDisplay } from '../types/api.js';
import { effectiveTier, pricingKey, verifiedIdentity } from './BuyerIdentityResolver.js';

export interface PriceRequest {
  productId: string;
  /** Base (rate card) CPM. */
  basePrice: number;
  buyer: BuyerContext;
  dealType?: DealType;
  /** Requested impressions. */
  volume?: number;
  inventoryType?: string;
  /** When set, rules outside their validity window are skipped. */
  asOf?: Date;
}

export interface RuleMatchContext {
  tier: AccessTier;
  agencyId?: string;
  advertiserId?: string;
  holdingCompany?: string;
  productId?: string;
  inventoryType?: string;
  asOf?: Date;
}

/** Applied when no matched rule defines a volume ladder. Steepest first. */
export const DEFAULT_VOLUME_BREAKPOINTS: ReadonlyArray<{ minImpressions: number; discount: number }> = [
  { minImpressions: 50_000_000, discount: 0.2 },
  { minImpressions: 20_000_000, discount: 0.15 },
  { minImpressions: 10_000_000, discount: 0.1 },
  { minImpressions: 5_000_000, discount: 0.05 },
];

const DEFAULT_NEGOTIATION_DISCOUNT = 0.1;

export class PricingRulesEngine {
  constructor(private readonly config: TieredPricingConfig) {}

  get currency(): string {
    return this.config.defaultCurrency;
  }

  calculatePrice(request: PriceRequest): PricingDecision {
    const { productId, basePrice, buyer } = request;
    const dealType = request.dealType ?? 'preferred_deal';
    const volume = request.volume ?? 0;

    const tier = effectiveTier(buyer);
    const tierConfig = this.tierConfig(tier);
    const appliedRules: string[] = [];

    let price = basePrice;

    // 1. Tier discount
    const tierDiscount = tierConfig.tierDiscount;
    if (tierDiscount > 0) {
      price = price * (1 - tierDiscount);
      appliedRules.push(`Tier discount: -${percent(tierDiscount, 0)}`);
    }

    // 2. Rules
    const identity = verifiedIdentity(buyer);
    const matchingRules = this.findMatchingRules({
      tier,
      agencyId: identity.agencyId,
      advertiserId: identity.advertiserId,
      holdingCompany: identity.agencyHoldingCompany,
      productId,
      inventoryType: request.inventoryType,
      asOf: request.asOf,
    });

    const overrideRule = matchingRules.find((r) => r.basePriceOverride !== undefined);
    let priceOverride: number | null = null;
    let ruleDiscount = 0;

    if (overrideRule?.basePriceOverride !== undefined) {
      priceOverride = overrideRule.basePriceOverride;
      price = priceOverride;
      appliedRules.push(
        `Rule '${overrideRule.ruleName}': Price override ${money(priceOverride)}`
      );
    } else {
      ruleDiscount = Math.max(0, ...matchingRules.map((r) => r.discountPercentage));
      if (ruleDiscount > 0) {
        price = price * (1 - ruleDiscount);
        appliedRules.push(`Rule discount: -${percent(ruleDiscount, 0)}`);
      }
    }

    // 3. Volume
    let volumeDiscount = 0;
    if (tierConfig.volumeDiscountsEnabled && volume > 0) {
      volumeDiscount = this.volumeDiscount(volume, matchingRules);
      if (volumeDiscount > 0) {
        price = price * (1 - volumeDiscount);
        appliedRules.push(`Volume discount: -${percent(volumeDiscount, 1)}`);
      }
    }

    // 4. Floor and ceiling always win
    const { globalFloorCpm, globalCeilingCpm } = this.config;
    if (price < globalFloorCpm) {
      price = globalFloorCpm;
      appliedRules.push(`Floor enforced: ${money(globalFloorCpm)}`);
    }
    if (globalCeilingCpm !== undefined && price > globalCeilingCpm) {
      price = globalCeilingCpm;
      appliedRules.push(`Ceiling enforced: ${money(globalCeilingCpm)}`);
    }

    // 5. Cents, without rounding past a bound
    const finalPrice = this.clamp(roundCents(price));

    return {
      productId,
      dealType,
      buyerTier: tier,
      pricingKey: pricingKey(buyer),
      basePrice,
      tierDiscount,
      ruleDiscount,
      priceOverride,
      volumeDiscount,
      finalPrice,
      currency: this.config.defaultCurrency,
      pricingModel: 'cpm',
      rationale: buildRationale({
        basePrice,
        finalPrice,
        tier,
        tierDiscount,
        ruleDiscount,
        priceOverride,
        volumeDiscount,
      }),
      appliedRules,
    };
  }

  /** Public tiers see a range around the base price; the rest see their tier price. */
  getPriceDisplay(basePrice: number, buyer: BuyerContext): PriceDisplay {
    const tierConfig = this.tierConfig(effectiveTier(buyer));
    const currency = this.config.defaultCurrency;

    if (tierConfig.showExactPrice) {
      return {
        type: 'exact',
        price: roundCents(basePrice * (1 - tierConfig.tierDiscount)),
        currency,
        negotiationEnabled: tierConfig.negotiationEnabled,
      };
    }

    const variance = tierConfig.priceRangeVariance;
    const low = Math.round(basePrice * (1 - variance));
    const high = Math.round(basePrice * (1 + variance));
    return {
      type: 'range',
      low,
      high,
      currency,
      display: `$${low}-$${high} CPM`,
    };
  }

  isPriceAcceptable(
    offeredPrice: number,
    productFloor: number,
    buyer: BuyerContext
  ): PriceAcceptability {
    const globalFloor = this.config.globalFloorCpm;
    if (offeredPrice < globalFloor) {
      return { acceptable: false, reason: `Below global floor (${money(globalFloor)} CPM)` };
    }

    if (offeredPrice < productFloor) {
      return { acceptable: false, reason: `Below product floor (${money(productFloor)} CPM)` };
    }

    const tier = effectiveTier(buyer);
    if (this.tierConfig(tier).negotiationEnabled) {
      const identity = verifiedIdentity(buyer);
      const rules = this.findMatchingRules({
        tier,
        agencyId: identity.agencyId,
        advertiserId: identity.advertiserId,
      });
      const negotiable = rules.filter((r) => r.negotiationEnabled);
      const maxNegotiation =
        negotiable.length > 0
          ? Math.max(...negotiable.map((r) => r.maxNegotiationDiscount))
          : DEFAULT_NEGOTIATION_DISCOUNT;

      const minAcceptable = productFloor * (1 - maxNegotiation);
      if (offeredPrice < minAcceptable) {
        return {
          acceptable: false,
          reason: `Below negotiation floor (${money(minAcceptable)} CPM)`,
        };
      }
    }

    return { acceptable: true, reason: 'Price acceptable' };
  }

  /** Active rules matching the context, highest priority first. */
  findMatchingRules(context: RuleMatchContext): PricingRule[] {
    return this.config.rules
      .filter((rule) => rule.isActive && ruleMatches(rule, context))
      .sort((a, b) => b.priority - a.priority);
  }

  tierConfig(tier: AccessTier): PricingTier {
    const configured = this.config.tiers[tier] ?? this.config.tiers.public;
    // Config construction guarantees a public tier.
    if (!configured) {
      throw new Error('Pricing config has no public tier');
    }
    return configured;
  }

  // ── Private ──

  private volumeDiscount(volume: number, rules: PricingRule[]): number {
    const rungs = rules.flatMap((r) =>
      r.volumeDiscounts.filter((vd) => vd.discountType === 'percentage')
    );

    if (rungs.length > 0) {
      const applicable = rungs.filter(
        (vd) =>
          volume >= vd.minImpressions &&
          (vd.maxImpressions === undefined || volume <= vd.maxImpressions)
      );
      return Math.max(0, ...applicable.map((vd) => vd.discountValue));
    }

    const breakpoint = DEFAULT_VOLUME_BREAKPOINTS.find((b) => volume >= b.minImpressions);
    return breakpoint?.discount ?? 0;
  }

  private clamp(price: number): number {
    const { globalFloorCpm, globalCeilingCpm } = this.config;
    let bounded = Math.max(price, globalFloorCpm);
    if (globalCeilingCpm !== undefined) {
      bounded = Math.min(bounded, globalCeilingCpm);
    }
    return bounded;
  }
}

// ── Helpers ──

export function ruleMatches(rule: PricingRule, context: RuleMatchContext): boolean {
  if (rule.accessTier && rule.accessTier !== context.tier) return false;
  if (!listAllows(rule.agencyIds, context.agencyId)) return false;
  if (!listAllows(rule.advertiserIds, context.advertiserId)) return false;
  if (!listAllows(rule.holdingCompanyIds, context.holdingCompany)) return false;
  if (!listAllows(rule.productIds, context.productId)) return false;
  if (!listAllows(rule.inventoryTypes, context.inventoryType)) return false;
  if (context.asOf && !withinValidity(rule, context.asOf)) return false;
  return true;
}

/** An empty list matches anything. */
function listAllows(allowed: readonly string[], value: string | undefined): boolean {
  if (allowed.length === 0) return true;
  return value !== undefined && allowed.includes(value);
}

function withinValidity(rule: PricingRule, asOf: Date): boolean {
  const time = asOf.getTime();
  const from = rule.validFrom ? Date.parse(rule.validFrom) : NaN;
  const to = rule.validTo ? Date.parse(rule.validTo) : NaN;
  if (!Number.isNaN(from) && time < from) return false;
  if (!Number.isNaN(to) && time > to) return false;
  return true;
}

function buildRationale(parts: {
  basePrice: number;
  finalPrice: number;
  tier: AccessTier;
  tierDiscount: number;
  ruleDiscount: number;
  priceOverride: number | null;
  volumeDiscount: number;
}): string {
  const lines = [`Base price: ${money(parts.basePrice)} CPM`];

  if (parts.tierDiscount > 0) {
    const tierName = parts.tier.charAt(0).toUpperCase() + parts.tier.slice(1);
    lines.push(`${tierName} tier: -${percent(parts.tierDiscount, 0)}`);
  }
  if (parts.priceOverride !== null) {
    lines.push(`Custom rule: override to ${money(parts.priceOverride)}`);
  }
  if (parts.ruleDiscount > 0) {
    lines.push(`Custom rule: -${percent(parts.ruleDiscount, 0)}`);
  }
  if (parts.volumeDiscount > 0) {
    lines.push(`Volume discount: -${percent(parts.volumeDiscount, 1)}`);
  }

  lines.push(`Final price: ${money(parts.finalPrice)} CPM`);

  const totalDiscount = parts.basePrice > 0 ? 1 - parts.finalPrice / parts.basePrice : 0;
  if (totalDiscount > 0) {
    lines.push(`(Total savings: ${percent(totalDiscount, 1)})`);
  }

  return lines.join(' | ');
}

export function roundCents(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

function money(value: number): string {
  return `$${value.toFixed(2)}`;
}

function percent(fraction: number, digits: number): string {
  return `${(fraction * 100).toFixed(digits)}%`;
}
