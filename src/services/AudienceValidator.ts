/**
 * Audience coverage validation.
 *
 * Compares a buyer's audience embedding with a product's, grades the
 * resulting coverage, and reports targeting dimensions the product's
 * capabilities cannot serve. Consent is checked before anything else.
 */

import { readFileSync } from 'node:fs';
import type {
  AudienceAlternative,
  AudienceCapability,
  AudienceRequirements,
  AudienceValidationResult,
  AudienceValidationStatus,
  Embedding,
  SignalType,
  SimilarityMetric,
} from '../types/models.js';
import type {
  CapabilityReport,
  CoverageConfidence,
  CoverageEstimate,
  TargetingCoverageEstimate,
} from '../types/api.js';
import type { AudienceConfig } from '../config.js';
import { ConfigurationError } from '../errors.js';

/** Per-targeting-key share of inventory that can be targeted (0-1). */
export interface CoverageFactorTable {
  readonly factors: ReadonlyArray<readonly [string, number]>;
  readonly unknownFactor: number;
}

const FACTORS_URL = new URL('../../data/targeting-coverage-factors.json', import.meta.url);

const PARTIAL_MATCH_FLOOR = 30;
const REACH_PER_CAPABILITY = 1_000_000;
const MIN_COMBINED_COVERAGE = 0.01;
const DELIVERABLE_COVERAGE = 0.05;

interface GapRule {
  requirement: string;
  signalType: SignalType;
  gap: string;
  suggestion?: string;
}

const GAP_RULES: readonly GapRule[] = [
  {
    requirement: 'demographics',
    signalType: 'identity',
    gap: 'demographic_targeting',
    suggestion: 'Use contextual signals as proxy for demographics',
  },
  {
    requirement: 'interests',
    signalType: 'contextual',
    gap: 'interest_targeting',
  },
  {
    requirement: 'behaviors',
    signalType: 'reinforcement',
    gap: 'behavioral_targeting',
    suggestion: 'Use contextual signals with frequency capping',
  },
];

export class AudienceValidator {
  private readonly coverageFactors: CoverageFactorTable;

  constructor(
    private readonly config: AudienceConfig,
    coverageFactors?: CoverageFactorTable
  ) {
    this.coverageFactors = coverageFactors ?? loadCoverageFactors();
  }

  validate(
    buyerEmbedding: Embedding,
    productEmbedding: Embedding,
    capabilities: readonly AudienceCapability[],
    requirements?: AudienceRequirements,
    now?: Date
  ): AudienceValidationResult {
    const consent = buyerEmbedding.consent;
    if (!consent || consent.permissibleUses.length === 0) {
      return invalidResult('Missing or invalid consent');
    }
    if (now && isEmbeddingExpired(buyerEmbedding, now)) {
      return invalidResult('Embedding expired');
    }

    const similarity = computeSimilarity(
      buyerEmbedding,
      productEmbedding,
      productEmbedding.model.metric
    );
    const coverage = Math.min(100, Math.max(0, similarity * 100));

    const matchedCapabilities = capabilities
      .filter((c) => c.ucpCompatible && c.coveragePercentage > 0)
      .map((c) => c.capabilityId);

    const { gaps, alternatives } = requirements
      ? analyzeGaps(requirements, capabilities)
      : { gaps: [], alternatives: [] };

    const threshold = this.config.minimumCoverageThreshold;
    let validationStatus: AudienceValidationStatus;
    let targetingCompatible: boolean;
    if (coverage >= threshold) {
      validationStatus = 'valid';
      targetingCompatible = true;
    } else if (coverage >= PARTIAL_MATCH_FLOOR) {
      validationStatus = 'partial_match';
      // Unreachable true branch, kept as the documented edge case.
      targetingCompatible = coverage >= threshold;
    } else if (coverage > 0) {
      validationStatus = 'partial_match';
      targetingCompatible = false;
    } else {
      validationStatus = 'no_match';
      targetingCompatible = false;
    }

    let estimatedReach: number | null = null;
    if (capabilities.length > 0) {
      const reachable = capabilities.filter((c) => c.coveragePercentage > 0).length;
      estimatedReach = Math.trunc(reachable * REACH_PER_CAPABILITY * (coverage / 100));
    }

    return {
      validationStatus,
      coveragePercentage: coverage,
      similarityScore: similarity,
      matchedCapabilities,
      gaps,
      alternatives,
      targetingCompatible,
      estimatedReach,
      validationNotes: [
        `Embedding similarity: ${similarity.toFixed(2)}`,
        `Coverage: ${coverage.toFixed(1)}%`,
        `Matched ${matchedCapabilities.length} of ${capabilities.length} capabilities`,
      ],
    };
  }

  /**
   * Treats every capability with coverage as an independent filter and
   * multiplies their shares. The product is floored at 1%.
   */
  calculateCoverage(
    _targeting: AudienceRequirements,
    capabilities: readonly AudienceCapability[],
    totalImpressions = 1_000_000
  ): CoverageEstimate {
    const matched = capabilities.filter((c) => c.coveragePercentage > 0);
    if (matched.length === 0) {
      return {
        coveragePercentage: 0,
        estimatedImpressions: 0,
        matchedCapabilities: [],
        confidence: 'low',
        limitingFactors: [],
      };
    }

    const combined = Math.max(
      MIN_COMBINED_COVERAGE,
      matched.reduce((product, c) => product * (c.coveragePercentage / 100), 1)
    );

    return {
      coveragePercentage: combined * 100,
      estimatedImpressions: Math.trunc(totalImpressions * combined),
      matchedCapabilities: matched.map((c) => c.capabilityId),
      confidence: matched.length > 1 ? 'high' : 'medium',
      limitingFactors: matched.filter((c) => c.coveragePercentage < 50).map((c) => c.name),
    };
  }

  /** Coverage estimate from the targeting keys alone, without capabilities. */
  estimateTargetingCoverage(
    targeting: AudienceRequirements,
    totalInventory = 10_000_000
  ): TargetingCoverageEstimate {
    const breakdown: Record<string, number> = {};
    const limitingFactors: string[] = [];
    const active: number[] = [];

    for (const [key, value] of Object.entries(targeting)) {
      if (!isPresent(value)) continue;

      const factor = this.factorFor(key);
      active.push(factor);
      breakdown[key] = factor;
      if (factor < 0.5) {
        limitingFactors.push(`${key} (${(factor * 100).toFixed(0)}% coverage)`);
      }
    }

    const combined =
      active.length === 0
        ? 1
        : Math.max(MIN_COMBINED_COVERAGE, active.reduce((p, f) => p * f, 1));

    let confidence: CoverageConfidence = 'low';
    if (active.length <= 2) confidence = 'high';
    else if (active.length <= 4) confidence = 'medium';

    return {
      coveragePercentage: combined * 100,
      estimatedImpressions: Math.trunc(totalInventory * combined),
      totalInventory,
      confidence,
      breakdown,
      limitingFactors,
      layers: active.length,
      isDeliverable: combined >= DELIVERABLE_COVERAGE,
    };
  }

  reportCapabilities(capabilities: readonly AudienceCapability[]): CapabilityReport {
    const bySignalType: CapabilityReport['bySignalType'] = {};
    for (const cap of capabilities) {
      const group = bySignalType[cap.signalType] ?? [];
      group.push({
        capabilityId: cap.capabilityId,
        name: cap.name,
        coveragePercentage: cap.coveragePercentage,
        ucpCompatible: cap.ucpCompatible,
      });
      bySignalType[cap.signalType] = group;
    }

    return {
      capabilities: [...capabilities],
      bySignalType,
      totalCapabilities: capabilities.length,
      ucpCompatibleCount: capabilities.filter((c) => c.ucpCompatible).length,
    };
  }

  private factorFor(key: string): number {
    const normalized = key.toLowerCase().replace(/-/g, '_');
    const match = this.coverageFactors.factors.find(
      ([factorKey]) => normalized.includes(factorKey) || factorKey.includes(normalized)
    );
    return match ? match[1] : this.coverageFactors.unknownFactor;
  }
}

// ── Similarity ──

/**
 * Similarity in [0, 1] under the given metric. Vectors of different
 * dimension are not comparable and score 0.
 */
export function computeSimilarity(
  a: Embedding,
  b: Embedding,
  metric: SimilarityMetric
): number {
  const u = a.vector;
  const v = b.vector;
  if (u.length === 0 || u.length !== v.length) return 0;

  switch (metric) {
    case 'cosine': {
      const normU = Math.sqrt(dot(u, u));
      const normV = Math.sqrt(dot(v, v));
      if (normU === 0 || normV === 0) return 0;
      return clampUnit(dot(u, v) / (normU * normV));
    }
    case 'dot':
      return clampUnit(dot(u, v));
    case 'l2': {
      let sum = 0;
      for (let i = 0; i < u.length; i++) {
        const d = (u[i] ?? 0) - (v[i] ?? 0);
        sum += d * d;
      }
      return 1 / (1 + Math.sqrt(sum));
    }
  }
}

export function isEmbeddingExpired(embedding: Embedding, now: Date): boolean {
  return now.getTime() - embedding.createdAt.getTime() > embedding.ttlSeconds * 1000;
}

/** Capabilities assumed for a product whose catalog entry lists none. */
export function defaultCapabilities(productId: string): AudienceCapability[] {
  return [
    {
      capabilityId: `${productId}_ctx`,
      name: 'Contextual Targeting',
      signalType: 'contextual',
      coveragePercentage: 95,
      availableSegments: [],
      ucpCompatible: true,
      embeddingDimension: 512,
    },
    {
      capabilityId: `${productId}_geo`,
      name: 'Geographic Targeting',
      signalType: 'contextual',
      coveragePercentage: 98,
      availableSegments: [],
      ucpCompatible: true,
      embeddingDimension: 512,
    },
    {
      capabilityId: `${productId}_demo`,
      name: 'Demographic Targeting',
      signalType: 'identity',
      coveragePercentage: 70,
      availableSegments: [],
      ucpCompatible: true,
      embeddingDimension: 512,
    },
  ];
}

/** Reads and checks the targeting coverage factor table. */
export function loadCoverageFactors(url: URL = FACTORS_URL): CoverageFactorTable {
  const raw: unknown = JSON.parse(readFileSync(url, 'utf8'));
  return parseCoverageFactors(raw);
}

export function parseCoverageFactors(raw: unknown): CoverageFactorTable {
  if (typeof raw !== 'object' || raw === null) {
    throw new ConfigurationError('Coverage factor table must be an object');
  }

  const unknownFactor: unknown = Reflect.get(raw, 'unknownFactor');
  const factors: unknown = Reflect.get(raw, 'factors');
  if (!isUnitNumber(unknownFactor)) {
    throw new ConfigurationError('unknownFactor must be a number in [0, 1]');
  }
  if (typeof factors !== 'object' || factors === null || Array.isArray(factors)) {
    throw new ConfigurationError('factors must be an object of key to coverage share');
  }

  const entries: Array<readonly [string, number]> = [];
  for (const [key, value] of Object.entries(factors)) {
    if (!isUnitNumber(value)) {
      throw new ConfigurationError(`Coverage factor "${key}" must be a number in [0, 1]`);
    }
    entries.push([key, value]);
  }

  return Object.freeze({ factors: Object.freeze(entries), unknownFactor });
}

// ── Private ──

function invalidResult(note: string): AudienceValidationResult {
  return {
    validationStatus: 'invalid',
    coveragePercentage: 0,
    similarityScore: null,
    matchedCapabilities: [],
    gaps: [],
    alternatives: [],
    targetingCompatible: false,
    estimatedReach: null,
    validationNotes: [note],
  };
}

function analyzeGaps(
  requirements: AudienceRequirements,
  capabilities: readonly AudienceCapability[]
): { gaps: string[]; alternatives: AudienceAlternative[] } {
  const gaps: string[] = [];
  const alternatives: AudienceAlternative[] = [];

  for (const rule of GAP_RULES) {
    if (!isPresent(requirements[rule.requirement])) continue;
    if (capabilities.some((c) => c.signalType === rule.signalType)) continue;

    gaps.push(rule.gap);
    if (rule.suggestion) {
      alternatives.push({ gap: rule.gap, suggestion: rule.suggestion });
    }
  }

  return { gaps, alternatives };
}

/** Non-empty targeting value: empty strings, lists and objects don't count. */
function isPresent(value: unknown): boolean {
  if (value === undefined || value === null || value === false || value === 0) return false;
  if (typeof value === 'string' || Array.isArray(value)) return value.length > 0;
  if (typeof value === 'object') return Object.keys(value).length > 0;
  return true;
}

function dot(u: readonly number[], v: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < u.length; i++) {
    sum += (u[i] ?? 0) * (v[i] ?? 0);
  }
  return sum;
}

function clampUnit(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function isUnitNumber(value: unknown): value is number {
  return typeof value === 'number' && value >= 0 && value <= 1;
}
