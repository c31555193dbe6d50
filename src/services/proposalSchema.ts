/**
 * Proposal payload schema.
 * Turns an untyped proposal into a `ProposalRequest`. Only the required
 * fields can fail intake; a malformed optional field is dropped with a
 * warning.
 */

import type { BodySchema } from '../types/common.js';
import type { DealTypeResolution, ProposalRequest } from '../types/api.js';
import type {
  ConsentInfo,
  DealType,
  Embedding,
  EmbeddingType,
  SignalType,
  SimilarityMetric,
} from '../types/models.js';
import { isRecord, validateFields } from '../validation/validate-fields.js';

const REQUIRED_FIELDS: BodySchema = {
  productId: { type: 'string', required: true, maxLength: 128 },
  impressions: { type: 'number', required: true, min: 1 },
  startDate: { type: 'date', required: true },
  endDate: { type: 'date', required: true },
};

const OPTIONAL_FIELDS: BodySchema = {
  proposalLineId: { type: 'string', required: false, maxLength: 128 },
  price: { type: 'number', required: false, min: 0 },
  dealType: { type: 'string', required: false, maxLength: 64 },
  audienceTargeting: { type: 'object', required: false },
  buyerEmbedding: { type: 'object', required: false },
  consent: { type: 'object', required: false },
  buyerOrganizationId: { type: 'string', required: false, maxLength: 128 },
};

export const PROPOSAL_SCHEMA: BodySchema = { ...REQUIRED_FIELDS, ...OPTIONAL_FIELDS };

export type ProposalParseResult =
  | { ok: true; request: ProposalRequest; warnings: string[] }
  | { ok: false; errors: string[] };

export function parseProposal(payload: unknown): ProposalParseResult {
  if (!isRecord(payload)) {
    return { ok: false, errors: ['proposal must be an object'] };
  }

  const errors = validateFields(payload, REQUIRED_FIELDS);
  if (errors.length > 0) {
    return { ok: false, errors };
  }

  const { productId, impressions, startDate, endDate } = payload;

  // Schema checks above guarantee the shapes; these narrow for the compiler.
  if (
    typeof productId !== 'string' ||
    typeof impressions !== 'number' ||
    typeof startDate !== 'string' ||
    typeof endDate !== 'string'
  ) {
    return { ok: false, errors: ['proposal fields have unexpected types'] };
  }

  if (Date.parse(endDate) < Date.parse(startDate)) {
    return { ok: false, errors: ['endDate must not be before startDate'] };
  }

  const warnings: string[] = [];
  const {
    proposalLineId,
    price,
    dealType,
    audienceTargeting,
    buyerEmbedding,
    consent,
    buyerOrganizationId,
  } = wellFormedOptionals(payload, warnings);

  const request: ProposalRequest = { productId, impressions, startDate, endDate };
  if (typeof proposalLineId === 'string') request.proposalLineId = proposalLineId;
  if (typeof price === 'number') request.price = price;
  if (typeof dealType === 'string') request.dealType = dealType;
  if (typeof buyerOrganizationId === 'string') request.buyerOrganizationId = buyerOrganizationId;
  if (isRecord(audienceTargeting)) request.audienceTargeting = audienceTargeting;

  if (consent !== undefined) {
    const parsed = parseConsent(consent, 'consent');
    if (typeof parsed === 'string') warnings.push(ignored(parsed));
    else request.consent = parsed;
  }

  if (buyerEmbedding !== undefined) {
    const parsed = parseEmbedding(buyerEmbedding);
    if (typeof parsed === 'string') warnings.push(ignored(parsed));
    else request.buyerEmbedding = parsed;
  }

  return { ok: true, request, warnings };
}

/** Optional fields that pass their schema; the rest are reported and left out. */
function wellFormedOptionals(
  payload: Record<string, unknown>,
  warnings: string[]
): Record<string, unknown> {
  const kept: Record<string, unknown> = {};
  for (const [field, schema] of Object.entries(OPTIONAL_FIELDS)) {
    const value = payload[field];
    if (value === undefined || value === null) continue;

    const problems = validateFields({ [field]: value }, { [field]: schema });
    if (problems.length > 0) {
      warnings.push(...problems.map(ignored));
    } else {
      kept[field] = value;
    }
  }
  return kept;
}

function ignored(problem: string): string {
  return `Ignored optional field: ${problem}`;
}

// ── Deal types ──

const DEAL_TYPE_ALIASES: Record<string, DealType> = {
  pg: 'programmatic_guaranteed',
  programmatic_guaranteed: 'programmatic_guaranteed',
  programmaticguaranteed: 'programmatic_guaranteed',
  guaranteed: 'programmatic_guaranteed',
  pd: 'preferred_deal',
  preferred_deal: 'preferred_deal',
  preferreddeal: 'preferred_deal',
  preferred: 'preferred_deal',
  pa: 'private_auction',
  private_auction: 'private_auction',
  privateauction: 'private_auction',
};

/** Unrecognised spellings fall back to a preferred deal. */
export function normalizeDealType(raw: string | undefined): DealTypeResolution {
  if (raw === undefined) {
    return { dealType: 'preferred_deal', recognized: true };
  }

  const key = raw.trim().toLowerCase().replace(/[\s-]+/g, '_');
  const dealType = DEAL_TYPE_ALIASES[key];
  return dealType
    ? { dealType, recognized: true }
    : { dealType: 'preferred_deal', recognized: false };
}

// ── Nested shapes ──

const SIGNAL_TYPES: readonly SignalType[] = ['identity', 'contextual', 'reinforcement'];
const METRICS: readonly SimilarityMetric[] = ['cosine', 'dot', 'l2'];
const EMBEDDING_TYPES: readonly EmbeddingType[] = [
  'context',
  'creative',
  'user_intent',
  'inventory',
  'query',
];

function parseConsent(value: unknown, field: string): ConsentInfo | string {
  if (!isRecord(value)) return `${field} must be an object`;

  const { framework, consentString, permissibleUses, ttlSeconds } = value;
  if (typeof framework !== 'string') return `${field}.framework must be a string`;
  if (!Array.isArray(permissibleUses) || !permissibleUses.every(isString)) {
    return `${field}.permissibleUses must be an array of strings`;
  }
  if (ttlSeconds !== undefined && typeof ttlSeconds !== 'number') {
    return `${field}.ttlSeconds must be a number`;
  }

  return {
    framework,
    permissibleUses,
    ttlSeconds: typeof ttlSeconds === 'number' ? ttlSeconds : 3600,
    ...(typeof consentString === 'string' && { consentString }),
  };
}

function parseEmbedding(value: unknown): Embedding | string {
  if (!isRecord(value)) return 'buyerEmbedding must be an object';

  const { vector, embeddingType, signalType, model, consent, createdAt, ttlSeconds } = value;
  if (!Array.isArray(vector) || !vector.every(isFiniteNumber)) {
    return 'buyerEmbedding.vector must be an array of numbers';
  }

  const metric = isRecord(model) ? model.metric : undefined;
  const resolvedMetric = METRICS.find((m) => m === (metric ?? 'cosine'));
  if (!resolvedMetric) {
    return `buyerEmbedding.model.metric must be one of: ${METRICS.join(', ')}`;
  }

  const resolvedSignal = SIGNAL_TYPES.find((s) => s === (signalType ?? 'contextual'));
  if (!resolvedSignal) {
    return `buyerEmbedding.signalType must be one of: ${SIGNAL_TYPES.join(', ')}`;
  }

  const resolvedType = EMBEDDING_TYPES.find((t) => t === (embeddingType ?? 'query'));
  if (!resolvedType) {
    return `buyerEmbedding.embeddingType must be one of: ${EMBEDDING_TYPES.join(', ')}`;
  }

  let parsedConsent: ConsentInfo | undefined;
  if (consent !== undefined && consent !== null) {
    const result = parseConsent(consent, 'buyerEmbedding.consent');
    if (typeof result === 'string') return result;
    parsedConsent = result;
  }

  const created =
    typeof createdAt === 'string' && !Number.isNaN(Date.parse(createdAt))
      ? new Date(createdAt)
      : new Date();

  const modelId = isRecord(model) && typeof model.id === 'string' ? model.id : 'buyer-supplied';
  const modelVersion =
    isRecord(model) && typeof model.version === 'string' ? model.version : '1';

  return {
    vector,
    dimension: vector.length,
    embeddingType: resolvedType,
    signalType: resolvedSignal,
    model: { id: modelId, version: modelVersion, dimension: vector.length, metric: resolvedMetric },
    ...(parsedConsent && { consent: parsedConsent }),
    createdAt: created,
    ttlSeconds: typeof ttlSeconds === 'number' ? ttlSeconds : 3600,
  };
}

function isString(value: unknown): value is string {
  return typeof value === 'string';
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}
