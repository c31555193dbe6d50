/**
 * Proposal evaluation pipeline.
 *
 *   received → product_validated → audience_validated → pricing_evaluated
 *     → availability_checked → scored → decided
 *     → (counter_terms_generated | upsell_identified) → finalized
 *
 * Only a malformed request is fatal. Every collaborator call is
 * timeout-guarded and degrades to a warning plus a conservative default,
 * so each run ends in a terminal status. Runs for the same proposal id are
 * serialized; different ids run concurrently.
 */

import type {
  AudienceCapability,
  BuyerContext,
  DealType,
  Embedding,
  ProductDefinition,
  ProposalEvaluation,
  Recommendation,
} from '../types/models.js';
import type {
  DecisionSource,
  EvaluationResult,
  ProposalRequest,
  ProposalStage,
} from '../types/api.js';
import type { SellerConfig } from '../config.js';
import type { IProductRepository } from '../repositories/IProductRepository.js';
import type { IAvailabilityRepository } from '../repositories/IAvailabilityRepository.js';
import type { IEvaluationRepository } from '../repositories/IEvaluationRepository.js';
import type { IEmbeddingProvider } from '../providers/IEmbeddingProvider.js';
import type { IAdvisoryProvider } from '../providers/IAdvisoryProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { ruleBasedDecision } from '../providers/RuleBasedAdvisoryProvider.js';
import type { PricingRulesEngine } from './PricingRulesEngine.js';
import type { AudienceValidator } from './AudienceValidator.js';
import type { YieldOptimizer } from './YieldOptimizer.js';
import { defaultCapabilities } from './AudienceValidator.js';
import { effectiveTier } from './BuyerIdentityResolver.js';
import { normalizeDealType, parseProposal } from './proposalSchema.js';
import { CollaboratorError, errorMessage } from '../errors.js';
import { KeyedLock } from '../utils/keyed-lock.js';
import { withTimeout } from '../utils/timeout.js';

export interface ProposalEvaluationDeps {
  config: SellerConfig;
  pricing: PricingRulesEngine;
  audience: AudienceValidator;
  yieldOptimizer: YieldOptimizer;
  productRepo: IProductRepository;
  availabilityRepo: IAvailabilityRepository;
  logger: ILogProvider;
  evaluationRepo?: IEvaluationRepository;
  embeddingProvider?: IEmbeddingProvider;
  /** External advisor. Without one, the rule-based decision is used. */
  advisoryProvider?: IAdvisoryProvider;
}

export interface EvaluateOptions {
  /** Checked between stages; an aborted run finalizes as failed. */
  signal?: AbortSignal;
  /** Evaluation clock, for rule validity windows and embedding expiry. */
  now?: Date;
  /** Live fill rate; the configured one is used otherwise. */
  currentFillRate?: number;
}

interface RunContext {
  result: EvaluationResult;
  buyer: BuyerContext;
  options: EvaluateOptions;
  /** Evaluation clock, fixed once per run. */
  now: Date;
  log: ILogProvider;
}

const CANCELLED = 'Evaluation cancelled';

export class ProposalEvaluationService {
  private readonly lock = new KeyedLock();
  private readonly accepted: string[] = [];
  private readonly rejected: string[] = [];

  constructor(private readonly deps: ProposalEvaluationDeps) {}

  /** Proposal ids accepted so far, in decision order. */
  get acceptedProposals(): readonly string[] {
    return [...this.accepted];
  }

  /** Proposal ids rejected so far, in decision order. */
  get rejectedProposals(): readonly string[] {
    return [...this.rejected];
  }

  async evaluate(
    proposalId: string,
    payload: unknown,
    buyer: BuyerContext,
    options: EvaluateOptions = {}
  ): Promise<EvaluationResult> {
    return this.lock.run(proposalId, () => this.run(proposalId, payload, buyer, options));
  }

  // ── Pipeline ──

  private async run(
    proposalId: string,
    payload: unknown,
    buyer: BuyerContext,
    options: EvaluateOptions
  ): Promise<EvaluationResult> {
    const log = this.deps.logger.child({ proposalId });
    const ctx: RunContext = {
      result: {
        proposalId,
        status: 'received',
        recommendation: null,
        decisionSource: null,
        evaluation: null,
        pricing: null,
        counterTerms: null,
        upsellSuggestions: [],
        stages: ['received'],
        errors: [],
        warnings: [],
        startedAt: new Date(),
        completedAt: null,
        request: null,
      },
      buyer,
      options,
      now: options.now ?? new Date(),
      log,
    };
    const { result } = ctx;

    log.info('Proposal received', { buyerTier: effectiveTier(buyer) });

    const parsed = parseProposal(payload);
    if (!parsed.ok) {
      result.status = 'failed';
      result.errors.push(...parsed.errors);
      log.warn('Proposal rejected at intake', { errors: parsed.errors });
      return this.finish(ctx);
    }
    const request = parsed.request;
    result.request = request;
    for (const warning of parsed.warnings) this.warn(ctx, warning);
    if (this.cancelled(ctx)) return this.finish(ctx);

    // product_validated
    result.status = 'evaluating';
    const { dealType, product } = await this.validateProduct(ctx, request);
    const evaluation = newEvaluation(proposalId, request, product, ctx.now);
    if (!product) {
      evaluation.isValid = false;
      evaluation.validationErrors.push(`Product not found: ${request.productId}`);
    }
    result.evaluation = evaluation;
    this.enter(ctx, 'product_validated');
    if (this.cancelled(ctx)) return this.finish(ctx);

    // audience_validated
    if (product && hasTargeting(request)) {
      await this.validateAudience(ctx, request, product, evaluation);
    }
    this.enter(ctx, 'audience_validated');
    if (this.cancelled(ctx)) return this.finish(ctx);

    // pricing_evaluated
    if (product) {
      this.evaluatePricing(ctx, request, product, dealType, evaluation);
    } else {
      evaluation.priceReason = 'Product not found';
    }
    this.enter(ctx, 'pricing_evaluated');
    if (this.cancelled(ctx)) return this.finish(ctx);

    // availability_checked
    if (product) {
      await this.checkAvailability(ctx, request, evaluation);
    }
    this.enter(ctx, 'availability_checked');
    if (this.cancelled(ctx)) return this.finish(ctx);

    // scored
    const yieldScore = this.deps.yieldOptimizer.scoreDeal(
      evaluation,
      buyer,
      options.currentFillRate
    );
    evaluation.yieldScore = yieldScore;
    const decision = await this.decide(ctx, request, evaluation);
    this.enter(ctx, 'scored');
    if (this.cancelled(ctx)) return this.finish(ctx);

    // decided
    result.recommendation = decision.recommendation;
    result.decisionSource = decision.source;
    this.enter(ctx, 'decided');
    log.info('Decision made', {
      recommendation: decision.recommendation,
      source: decision.source,
      rationale: decision.rationale,
      yieldScore: yieldScore.overallScore,
    });

    this.applyDecision(ctx, decision.recommendation, evaluation, product);
    return this.finish(ctx);
  }

  private async validateProduct(
    ctx: RunContext,
    request: ProposalRequest
  ): Promise<{ dealType: DealType; product: ProductDefinition | null }> {
    const resolution = normalizeDealType(request.dealType);
    if (!resolution.recognized) {
      this.warn(ctx, `Unrecognized deal type "${request.dealType}", treating as preferred_deal`);
    }

    let product: ProductDefinition | null = null;
    try {
      product = await this.call('product lookup', () =>
        this.deps.productRepo.findById(request.productId)
      );
    } catch (err) {
      this.warn(ctx, `Product lookup failed: ${errorMessage(err)}`);
    }

    if (product) {
      if (!product.supportedDealTypes.includes(resolution.dealType)) {
        this.warn(ctx, `Requested deal type ${resolution.dealType} not supported for product`);
      }
      if (request.impressions < product.minimumImpressions) {
        this.warn(
          ctx,
          `Requested impressions below product minimum of ${formatCount(product.minimumImpressions)}`
        );
      }
    }

    return { dealType: resolution.dealType, product };
  }

  private async validateAudience(
    ctx: RunContext,
    request: ProposalRequest,
    product: ProductDefinition,
    evaluation: ProposalEvaluation
  ): Promise<void> {
    const targeting = request.audienceTargeting ?? {};

    try {
      const validation = await this.call('audience validation', async () => {
        const capabilities = await this.capabilitiesFor(product);
        const buyerEmbedding = await this.buyerEmbedding(request);
        const productEmbedding = await this.productEmbedding(product);
        return this.deps.audience.validate(
          buyerEmbedding,
          productEmbedding,
          capabilities,
          targeting,
          ctx.now
        );
      });

      evaluation.audienceValidated = true;
      evaluation.audienceCoverage = validation.coveragePercentage;
      evaluation.audienceGaps = [...validation.gaps];
      evaluation.similarityScore = validation.similarityScore;
      evaluation.targetingCompatible = validation.targetingCompatible;

      if (!validation.targetingCompatible) {
        this.warn(
          ctx,
          `Audience coverage below threshold: ${validation.coveragePercentage.toFixed(1)}%`
        );
      }
      ctx.log.debug('Audience validated', {
        status: validation.validationStatus,
        coverage: validation.coveragePercentage,
        gaps: validation.gaps,
      });
    } catch (err) {
      this.warn(ctx, `Audience validation warning: ${errorMessage(err)}`);
      evaluation.audienceValidated = false;
      evaluation.audienceCoverage = 0;
      evaluation.audienceGaps = ['validation_error'];
      evaluation.similarityScore = null;
      evaluation.targetingCompatible = true;
    }
  }

  private evaluatePricing(
    ctx: RunContext,
    request: ProposalRequest,
    product: ProductDefinition,
    dealType: DealType,
    evaluation: ProposalEvaluation
  ): void {
    const { pricing } = this.deps;

    const acceptability = pricing.isPriceAcceptable(
      evaluation.requestedPrice,
      product.floorCpm,
      ctx.buyer
    );
    const decision = pricing.calculatePrice({
      productId: product.productId,
      basePrice: product.baseCpm,
      buyer: ctx.buyer,
      dealType,
      volume: request.impressions,
      inventoryType: product.inventoryType,
      asOf: ctx.now,
    });

    evaluation.priceAcceptable = acceptability.acceptable;
    evaluation.priceReason = acceptability.reason;
    evaluation.minimumAcceptablePrice = product.floorCpm;
    evaluation.recommendedPrice = decision.finalPrice;
    ctx.result.pricing = decision;

    ctx.log.debug('Pricing evaluated', {
      offered: evaluation.requestedPrice,
      recommended: decision.finalPrice,
      acceptable: acceptability.acceptable,
      reason: acceptability.reason,
    });
  }

  private async checkAvailability(
    ctx: RunContext,
    request: ProposalRequest,
    evaluation: ProposalEvaluation
  ): Promise<void> {
    let available = 0;
    try {
      available = await this.call('availability check', () =>
        this.deps.availabilityRepo.availableImpressions(request.productId, {
          start: request.startDate,
          end: request.endDate,
        })
      );
    } catch (err) {
      this.warn(ctx, `Availability check failed, assuming no inventory: ${errorMessage(err)}`);
    }

    const requested = evaluation.requestedImpressions;
    evaluation.availableImpressions = available;
    evaluation.impressionsAvailable = requested <= available;

    if (!evaluation.impressionsAvailable) {
      evaluation.validationErrors.push(
        `Requested ${formatCount(requested)} impressions but only ${formatCount(available)} available`
      );
    }
  }

  private async decide(
    ctx: RunContext,
    request: ProposalRequest,
    evaluation: ProposalEvaluation
  ): Promise<{ recommendation: Recommendation; rationale: string; source: DecisionSource }> {
    if (!evaluation.isValid) {
      return {
        recommendation: 'reject',
        rationale: `Invalid proposal: ${evaluation.validationErrors.join(', ')}`,
        source: 'validation',
      };
    }

    const advisor = this.deps.advisoryProvider;
    if (advisor) {
      try {
        const advice = await this.call(`advisory (${advisor.name})`, () =>
          advisor.evaluate({
            proposalId: ctx.result.proposalId,
            request,
            evaluation,
            buyerTier: effectiveTier(ctx.buyer),
          })
        );
        return { ...advice, source: 'advisory' };
      } catch (err) {
        this.warn(ctx, `Advisory evaluation failed: ${errorMessage(err)}`);
      }
    }

    return { ...ruleBasedDecision(evaluation), source: 'rule_based' };
  }

  private applyDecision(
    ctx: RunContext,
    recommendation: Recommendation,
    evaluation: ProposalEvaluation,
    product: ProductDefinition | null
  ): void {
    const { result, buyer } = ctx;
    const { yieldOptimizer, config } = this.deps;

    if (recommendation === 'reject') {
      this.rejected.push(result.proposalId);
      result.status = 'rejected';
      result.upsellSuggestions = [
        { type: 'alternative_product', message: 'Consider our other inventory options' },
      ];
      this.enter(ctx, 'upsell_identified');
      return;
    }

    result.upsellSuggestions = yieldOptimizer.identifyUpsell(
      evaluation,
      buyer,
      config.availableProductTypes,
      product?.inventoryType
    );

    if (recommendation === 'counter') {
      const counter = yieldOptimizer.recommendCounterTerms(evaluation, buyer);
      result.counterTerms = {
        proposedPrice: evaluation.recommendedPrice,
        floorPrice: evaluation.minimumAcceptablePrice,
        maxImpressions: Math.min(evaluation.requestedImpressions, evaluation.availableImpressions),
        negotiationRoom: counter.negotiationRoom ?? null,
        reason: counter.rationale,
      };
      result.status = 'counter_pending';
      this.enter(ctx, 'counter_terms_generated');
      return;
    }

    this.accepted.push(result.proposalId);
    result.status = 'accepted';
    this.enter(ctx, 'upsell_identified');
  }

  private async finish(ctx: RunContext): Promise<EvaluationResult> {
    const { result, log } = ctx;

    result.completedAt = new Date();
    this.enter(ctx, 'finalized');
    log.info('Proposal evaluated', {
      status: result.status,
      recommendation: result.recommendation,
      decisionSource: result.decisionSource,
      warnings: result.warnings.length,
      durationMs: result.completedAt.getTime() - result.startedAt.getTime(),
    });

    await this.persist(ctx);
    return result;
  }

  private async persist(ctx: RunContext): Promise<void> {
    const repo = this.deps.evaluationRepo;
    if (!repo) return;

    const { result } = ctx;
    const pricing = result.pricing;
    try {
      if (pricing) {
        await this.call('pricing decision save', () =>
          repo.savePricingDecision(result.proposalId, pricing)
        );
      }
      await this.call('evaluation save', () => repo.saveEvaluation(result));
    } catch (err) {
      this.warn(ctx, `Failed to persist evaluation: ${errorMessage(err)}`);
    }
  }

  // ── Collaborators ──

  private async capabilitiesFor(product: ProductDefinition): Promise<AudienceCapability[]> {
    const capabilities = await this.deps.productRepo.findCapabilities(product.productId);
    return capabilities.length > 0 ? capabilities : defaultCapabilities(product.productId);
  }

  private async buyerEmbedding(request: ProposalRequest): Promise<Embedding> {
    const supplied = request.buyerEmbedding;
    if (supplied) {
      return !supplied.consent && request.consent
        ? { ...supplied, consent: request.consent }
        : supplied;
    }
    return this.embedder().embedTargeting(request.audienceTargeting ?? {}, request.consent);
  }

  private async productEmbedding(product: ProductDefinition): Promise<Embedding> {
    return product.audienceEmbedding ?? this.embedder().embedProduct(product);
  }

  private embedder(): IEmbeddingProvider {
    if (!this.deps.embeddingProvider) {
      throw new CollaboratorError('embedding', 'no embedding provider configured');
    }
    return this.deps.embeddingProvider;
  }

  private call<T>(operation: string, task: () => Promise<T>): Promise<T> {
    return withTimeout(operation, this.deps.config.collaboratorTimeoutMs, task);
  }

  // ── Bookkeeping ──

  private enter(ctx: RunContext, stage: ProposalStage): void {
    ctx.result.stages.push(stage);
    ctx.log.debug(`Stage ${stage}`);
  }

  private warn(ctx: RunContext, message: string): void {
    ctx.result.warnings.push(message);
    ctx.log.warn(message);
  }

  private cancelled(ctx: RunContext): boolean {
    if (!ctx.options.signal?.aborted) return false;

    ctx.result.status = 'failed';
    ctx.result.errors.push(CANCELLED);
    ctx.log.warn(CANCELLED, { lastStage: ctx.result.stages[ctx.result.stages.length - 1] });
    return true;
  }
}

// ── Helpers ──

function newEvaluation(
  proposalId: string,
  request: ProposalRequest,
  product: ProductDefinition | null,
  now: Date
): ProposalEvaluation {
  return {
    proposalId,
    proposalLineId: request.proposalLineId ?? '',
    productId: request.productId,
    evaluatedAt: now,
    isValid: true,
    validationErrors: [],
    requestedPrice: request.price ?? 0,
    minimumAcceptablePrice: product?.floorCpm ?? 0,
    recommendedPrice: product?.baseCpm ?? 0,
    priceAcceptable: false,
    priceReason: '',
    requestedImpressions: request.impressions,
    availableImpressions: 0,
    impressionsAvailable: false,
    targetingCompatible: true,
    audienceValidated: false,
    audienceCoverage: 0,
    audienceGaps: [],
    similarityScore: null,
    yieldScore: null,
  };
}

function hasTargeting(request: ProposalRequest): boolean {
  return request.audienceTargeting !== undefined && Object.keys(request.audienceTargeting).length > 0;
}

function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}
