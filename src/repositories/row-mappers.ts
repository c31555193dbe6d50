/**
 * Row ↔ domain mapping for the Supabase repositories.
 * Enum-like text columns are checked on the way in; an unexpected value
 * means the table and the code disagree, which is an error.
 */

import type {
  AccessTier,
  ActivationType,
  AudienceCapability,
  DealOutput,
  DealType,
  DiscountType,
  InventoryType,
  PricingModel,
  PricingRule,
  ProductDefinition,
  SignalType,
  VolumeDiscount,
} from '../types/models.js';
import { ACCESS_TIERS, DEAL_TYPES } from '../types/models.js';
import type {
  AudienceCapabilityRow,
  DealRow,
  PricingRuleRow,
  ProductRow,
} from '../types/database.js';

const INVENTORY_TYPES: readonly InventoryType[] = ['display', 'video', 'ctv', 'mobile_app', 'native'];
const PRICING_MODELS: readonly PricingModel[] = ['cpm', 'cpv', 'cpc', 'cpcv', 'flat_fee'];
const SIGNAL_TYPES: readonly SignalType[] = ['identity', 'contextual', 'reinforcement'];
const DISCOUNT_TYPES: readonly DiscountType[] = ['percentage', 'fixed_amount', 'fixed_price'];
const ACTIVATION_TYPES: readonly ActivationType[] = ['traditional_dsp', 'agentic'];

export function oneOf<T extends string>(allowed: readonly T[], value: string, column: string): T {
  const match = allowed.find((a) => a === value);
  if (match === undefined) {
    throw new Error(`Unexpected ${column} value "${value}"`);
  }
  return match;
}

export function toProduct(row: ProductRow): ProductDefinition {
  return {
    productId: row.product_id,
    name: row.name,
    inventoryType: oneOf(INVENTORY_TYPES, row.inventory_type, 'inventory_type'),
    baseCpm: Number(row.base_cpm),
    floorCpm: Number(row.floor_cpm),
    currency: row.currency,
    supportedDealTypes: row.supported_deal_types.map((d) => oneOf(DEAL_TYPES, d, 'deal_type')),
    supportedPricingModels: row.supported_pricing_models.map((m) =>
      oneOf(PRICING_MODELS, m, 'pricing_model')
    ),
    minimumImpressions: row.minimum_impressions,
    ...(row.maximum_impressions !== null && { maximumImpressions: row.maximum_impressions }),
    ...(row.audience_capability_ids && { audienceCapabilityIds: row.audience_capability_ids }),
  };
}

export function toCapability(row: AudienceCapabilityRow): AudienceCapability {
  return {
    capabilityId: row.capability_id,
    name: row.name,
    signalType: oneOf(SIGNAL_TYPES, row.signal_type, 'signal_type'),
    coveragePercentage: Number(row.coverage_percentage),
    availableSegments: row.available_segments,
    ucpCompatible: row.ucp_compatible,
    ...(row.embedding_dimension !== null && { embeddingDimension: row.embedding_dimension }),
  };
}

export function toPricingRule(row: PricingRuleRow): PricingRule {
  const accessTier: AccessTier | undefined =
    row.access_tier === null ? undefined : oneOf(ACCESS_TIERS, row.access_tier, 'access_tier');

  return {
    ruleId: row.rule_id,
    ruleName: row.rule_name,
    priority: row.priority,
    ...(accessTier && { accessTier }),
    agencyIds: row.agency_ids,
    advertiserIds: row.advertiser_ids,
    holdingCompanyIds: row.holding_company_ids,
    productIds: row.product_ids,
    inventoryTypes: row.inventory_types,
    ...(row.base_price_override !== null && {
      basePriceOverride: Number(row.base_price_override),
    }),
    discountPercentage: Number(row.discount_percentage),
    volumeDiscounts: toVolumeDiscounts(row.volume_discounts, row.rule_id),
    negotiationEnabled: row.negotiation_enabled,
    maxNegotiationDiscount: Number(row.max_negotiation_discount),
    ...(row.valid_from !== null && { validFrom: row.valid_from }),
    ...(row.valid_to !== null && { validTo: row.valid_to }),
    isActive: row.is_active,
  };
}

export function toVolumeDiscounts(value: unknown, ruleId: string): VolumeDiscount[] {
  if (value === null || value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new Error(`Rule "${ruleId}" volume_discounts must be an array`);
  }

  return value.map((item: unknown): VolumeDiscount => {
    if (typeof item !== 'object' || item === null) {
      throw new Error(`Rule "${ruleId}" has a malformed volume discount`);
    }
    const min: unknown = Reflect.get(item, 'min_impressions');
    const max: unknown = Reflect.get(item, 'max_impressions');
    const type: unknown = Reflect.get(item, 'discount_type');
    const amount: unknown = Reflect.get(item, 'discount_value');

    if (typeof min !== 'number' || typeof amount !== 'number' || typeof type !== 'string') {
      throw new Error(`Rule "${ruleId}" has a malformed volume discount`);
    }

    return {
      minImpressions: min,
      ...(typeof max === 'number' && { maxImpressions: max }),
      discountType: oneOf(DISCOUNT_TYPES, type, 'discount_type'),
      discountValue: amount,
    };
  });
}

export function toDealRow(deal: DealOutput): DealRow {
  return {
    deal_id: deal.dealId,
    deal_type: deal.dealType,
    proposal_id: deal.proposalId,
    product_id: deal.productId,
    price: deal.price,
    pricing_model: deal.pricingModel,
    currency: deal.currency,
    guaranteed_impressions: deal.guaranteedImpressions,
    floor_price: deal.floorPrice,
    buyer_organization_id: deal.buyerOrganizationId,
    seller_organization_id: deal.sellerOrganizationId,
    flight_start: deal.flightStart,
    flight_end: deal.flightEnd,
    activation_type: deal.activationType,
    dsp_compatible: deal.dspCompatible,
    created_at: deal.createdAt.toISOString(),
  };
}

export function toDeal(row: DealRow): DealOutput {
  const dealType: DealType = oneOf(DEAL_TYPES, row.deal_type, 'deal_type');
  return {
    dealId: row.deal_id,
    dealType,
    proposalId: row.proposal_id,
    productId: row.product_id,
    price: Number(row.price),
    pricingModel: oneOf(PRICING_MODELS, row.pricing_model, 'pricing_model'),
    currency: row.currency,
    guaranteedImpressions: row.guaranteed_impressions,
    floorPrice: row.floor_price === null ? null : Number(row.floor_price),
    buyerOrganizationId: row.buyer_organization_id,
    sellerOrganizationId: row.seller_organization_id,
    flightStart: row.flight_start,
    flightEnd: row.flight_end,
    activationType: oneOf(ACTIVATION_TYPES, row.activation_type, 'activation_type'),
    dspCompatible: row.dsp_compatible,
    createdAt: new Date(row.created_at),
  };
}
