/**
 * Seller configuration.
 * Built once at startup, validated, deep-frozen and passed by reference
 * into every engine. Nothing reads settings from ambient state.
 */

import type {
  AccessTier,
  PricingRule,
  PricingTier,
  TieredPricingConfig,
} from './types/models.js';
import { ACCESS_TIERS } from './types/models.js';
import { ConfigurationError } from './errors.js';

export interface YieldWeights {
  readonly revenue: number;
  readonly relationship: number;
  readonly fillRate: number;
  readonly pricingPower: number;
}

export interface YieldConfig {
  readonly fillRateTarget: number;
  readonly weights: YieldWeights;
  /** Used when the caller does not pass a live fill rate. */
  readonly currentFillRate: number;
  readonly marketCpm: number;
}

export interface AudienceConfig {
  /** Coverage percentage (0-100) at which targeting counts as compatible. */
  readonly minimumCoverageThreshold: number;
}

export interface SellerConfig {
  readonly sellerOrganizationId: string;
  readonly currency: string;
  readonly pricing: TieredPricingConfig;
  readonly yield: YieldConfig;
  readonly audience: AudienceConfig;
  readonly collaboratorTimeoutMs: number;
  /** Product types the seller can cross-sell into. */
  readonly availableProductTypes: readonly string[];
}

export const DEFAULT_YIELD_WEIGHTS: YieldWeights = {
  revenue: 0.4,
  relationship: 0.3,
  fillRate: 0.2,
  pricingPower: 0.1,
};

const DEFAULT_COLLABORATOR_TIMEOUT_MS = 5_000;
const WEIGHT_TOLERANCE = 1e-9;

export function defaultPricingTiers(): Record<AccessTier, PricingTier> {
  return {
    public: {
      tier: 'public',
      tierName: 'Public',
      description: 'General product catalog with price ranges',
      showExactPrice: false,
      priceRangeVariance: 0.2,
      tierDiscount: 0,
      negotiationEnabled: false,
      premiumInventoryAccess: false,
      customDealsEnabled: false,
      volumeDiscountsEnabled: false,
      availsGranularity: 'high_level',
    },
    seat: {
      tier: 'seat',
      tierName: 'Seat',
      description: 'Authenticated DSP seat with standard pricing',
      showExactPrice: true,
      priceRangeVariance: 0.2,
      tierDiscount: 0.05,
      negotiationEnabled: false,
      premiumInventoryAccess: false,
      customDealsEnabled: true,
      volumeDiscountsEnabled: false,
      availsGranularity: 'moderate',
    },
    agency: {
      tier: 'agency',
      tierName: 'Agency',
      description: 'Agency-specific pricing with negotiation',
      showExactPrice: true,
      priceRangeVariance: 0.2,
      tierDiscount: 0.1,
      negotiationEnabled: true,
      premiumInventoryAccess: true,
      customDealsEnabled: true,
      volumeDiscountsEnabled: true,
      availsGranularity: 'detailed',
    },
    advertiser: {
      tier: 'advertiser',
      tierName: 'Advertiser',
      description: 'Best available rates with full negotiation',
      showExactPrice: true,
      priceRangeVariance: 0.2,
      tierDiscount: 0.15,
      negotiationEnabled: true,
      premiumInventoryAccess: true,
      customDealsEnabled: true,
      volumeDiscountsEnabled: true,
      availsGranularity: 'detailed',
    },
  };
}

export interface TieredPricingInput {
  sellerOrganizationId: string;
  tiers?: Partial<Record<AccessTier, PricingTier>>;
  rules?: PricingRule[];
  defaultCurrency?: string;
  globalFloorCpm?: number;
  globalCeilingCpm?: number;
  advertiserPricingConsistent?: boolean;
}

/** Fills defaults and validates a tiered pricing configuration. */
export function createTieredPricingConfig(input: TieredPricingInput): TieredPricingConfig {
  // Copies, so freezing never reaches the caller's objects.
  const tiers =
    input.tiers && Object.keys(input.tiers).length > 0
      ? structuredClone(input.tiers)
      : defaultPricingTiers();

  const config: TieredPricingConfig = {
    sellerOrganizationId: input.sellerOrganizationId,
    tiers,
    rules: structuredClone(input.rules ?? []),
    defaultCurrency: input.defaultCurrency ?? 'USD',
    globalFloorCpm: input.globalFloorCpm ?? 1.0,
    globalCeilingCpm: input.globalCeilingCpm,
    advertiserPricingConsistent: input.advertiserPricingConsistent ?? true,
  };

  validatePricingConfig(config);
  return deepFreeze(config);
}

export interface SellerConfigInput {
  sellerOrganizationId: string;
  currency?: string;
  pricing?: Omit<TieredPricingInput, 'sellerOrganizationId' | 'defaultCurrency'>;
  yield?: Partial<Omit<YieldConfig, 'weights'>> & { weights?: YieldWeights };
  audience?: Partial<AudienceConfig>;
  collaboratorTimeoutMs?: number;
  availableProductTypes?: string[];
}

export function createSellerConfig(input: SellerConfigInput): SellerConfig {
  const currency = input.currency ?? 'USD';
  const pricing = createTieredPricingConfig({
    ...input.pricing,
    sellerOrganizationId: input.sellerOrganizationId,
    defaultCurrency: currency,
  });

  const config: SellerConfig = {
    sellerOrganizationId: input.sellerOrganizationId,
    currency,
    pricing,
    yield: {
      fillRateTarget: input.yield?.fillRateTarget ?? 0.85,
      weights: { ...(input.yield?.weights ?? DEFAULT_YIELD_WEIGHTS) },
      currentFillRate: input.yield?.currentFillRate ?? 0.75,
      marketCpm: input.yield?.marketCpm ?? 15.0,
    },
    audience: {
      minimumCoverageThreshold: input.audience?.minimumCoverageThreshold ?? 50,
    },
    collaboratorTimeoutMs: input.collaboratorTimeoutMs ?? DEFAULT_COLLABORATOR_TIMEOUT_MS,
    availableProductTypes: [...(input.availableProductTypes ?? ['display', 'video', 'ctv'])],
  };

  validateYieldConfig(config.yield);

  const threshold = config.audience.minimumCoverageThreshold;
  if (!(threshold > 0 && threshold <= 100)) {
    throw new ConfigurationError(
      `minimumCoverageThreshold must be in (0, 100], got ${threshold}`
    );
  }
  if (!(config.collaboratorTimeoutMs > 0)) {
    throw new ConfigurationError(
      `collaboratorTimeoutMs must be positive, got ${config.collaboratorTimeoutMs}`
    );
  }

  return deepFreeze(config);
}

/**
 * Reads seller settings from environment variables.
 * Unset variables fall back to defaults; malformed numbers abort startup.
 */
export function loadSellerConfigFromEnv(
  env: NodeJS.ProcessEnv,
  rules: PricingRule[] = []
): SellerConfig {
  const ceiling = readNumber(env, 'GLOBAL_CEILING_CPM');

  return createSellerConfig({
    sellerOrganizationId: env.SELLER_ORGANIZATION_ID ?? '',
    currency: env.DEFAULT_CURRENCY,
    pricing: {
      rules,
      globalFloorCpm: readNumber(env, 'GLOBAL_FLOOR_CPM'),
      ...(ceiling !== undefined && { globalCeilingCpm: ceiling }),
    },
    yield: {
      fillRateTarget: readNumber(env, 'FILL_RATE_TARGET'),
      currentFillRate: readNumber(env, 'CURRENT_FILL_RATE'),
      marketCpm: readNumber(env, 'MARKET_CPM'),
    },
    audience: {
      minimumCoverageThreshold: readNumber(env, 'AUDIENCE_COVERAGE_THRESHOLD'),
    },
    collaboratorTimeoutMs: readNumber(env, 'COLLABORATOR_TIMEOUT_MS'),
  });
}

// ── Private ──

function readNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

function validatePricingConfig(config: TieredPricingConfig): void {
  if (!(config.globalFloorCpm >= 0)) {
    throw new ConfigurationError(
      `globalFloorCpm must be non-negative, got ${config.globalFloorCpm}`
    );
  }
  if (
    config.globalCeilingCpm !== undefined &&
    config.globalCeilingCpm < config.globalFloorCpm
  ) {
    throw new ConfigurationError(
      `globalCeilingCpm (${config.globalCeilingCpm}) is below globalFloorCpm (${config.globalFloorCpm})`
    );
  }
  if (!config.tiers.public) {
    throw new ConfigurationError('Pricing tiers must include a public tier');
  }

  for (const tier of ACCESS_TIERS) {
    const tierConfig = config.tiers[tier];
    if (!tierConfig) continue;
    if (!isFraction(tierConfig.tierDiscount)) {
      throw new ConfigurationError(
        `Tier "${tier}" discount must be in [0, 1], got ${tierConfig.tierDiscount}`
      );
    }
    if (!isFraction(tierConfig.priceRangeVariance)) {
      throw new ConfigurationError(
        `Tier "${tier}" price range variance must be in [0, 1], got ${tierConfig.priceRangeVariance}`
      );
    }
  }

  const ruleIds = new Set<string>();
  for (const rule of config.rules) {
    if (ruleIds.has(rule.ruleId)) {
      throw new ConfigurationError(`Duplicate pricing rule id "${rule.ruleId}"`);
    }
    ruleIds.add(rule.ruleId);

    if (!isFraction(rule.discountPercentage) || !isFraction(rule.maxNegotiationDiscount)) {
      throw new ConfigurationError(
        `Rule "${rule.ruleId}" discounts must be fractions in [0, 1]`
      );
    }
    for (const rung of rule.volumeDiscounts) {
      if (rung.discountType === 'percentage' && !isFraction(rung.discountValue)) {
        throw new ConfigurationError(
          `Rule "${rule.ruleId}" volume discount must be in [0, 1], got ${rung.discountValue}`
        );
      }
    }
  }
}

function validateYieldConfig(config: YieldConfig): void {
  const { revenue, relationship, fillRate, pricingPower } = config.weights;
  const weights = [revenue, relationship, fillRate, pricingPower];

  if (weights.some((w) => w < 0)) {
    throw new ConfigurationError('Yield weights must be non-negative');
  }
  const total = weights.reduce((sum, w) => sum + w, 0);
  if (Math.abs(total - 1) > WEIGHT_TOLERANCE) {
    throw new ConfigurationError(`Yield weights must sum to 1, got ${total}`);
  }
  if (!isFraction(config.fillRateTarget) || !isFraction(config.currentFillRate)) {
    throw new ConfigurationError('Fill rates must be in [0, 1]');
  }
}

function isFraction(value: number): boolean {
  return value >= 0 && value <= 1;
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
