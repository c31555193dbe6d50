import { describe, it, expect, beforeEach } from 'vitest';
import { createContainer } from '../../src/container.js';
import { createSellerConfig } from '../../src/config.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import type { ProposalEvaluationService } from '../../src/services/ProposalEvaluationService.js';
import type {
  DateRange,
  IAvailabilityRepository,
} from '../../src/repositories/IAvailabilityRepository.js';
import type { IEmbeddingProvider } from '../../src/providers/IEmbeddingProvider.js';
import type { IAdvisoryProvider } from '../../src/providers/IAdvisoryProvider.js';
import type { EvaluationStatus } from '../../src/types/api.js';
import { MockProductRepository } from '../mocks/MockProductRepository.js';
import { MockAvailabilityRepository } from '../mocks/MockAvailabilityRepository.js';
import { MockEvaluationRepository } from '../mocks/MockEvaluationRepository.js';
import { MockDealRepository } from '../mocks/MockDealRepository.js';
import { MockEmbeddingProvider } from '../mocks/MockEmbeddingProvider.js';
import { MockAdvisoryProvider } from '../mocks/MockAdvisoryProvider.js';
import { AGENCY_BUYER, PUBLIC_BUYER, embedding, product, proposalPayload } from '../fixtures.js';

const TERMINAL: EvaluationStatus[] = ['accepted', 'rejected', 'counter_pending', 'failed'];

describe('ProposalEvaluationService', () => {
  let productRepo: MockProductRepository;
  let availabilityRepo: MockAvailabilityRepository;
  let evaluationRepo: MockEvaluationRepository;
  let logger: ConsoleLogProvider;
  let service: ProposalEvaluationService;

  function build(
    extra: {
      embeddingProvider?: IEmbeddingProvider;
      advisoryProvider?: IAdvisoryProvider;
      availability?: IAvailabilityRepository;
    } = {}
  ): ProposalEvaluationService {
    return createContainer({
      config: createSellerConfig({ sellerOrganizationId: 'seller-1', collaboratorTimeoutMs: 50 }),
      productRepo,
      availabilityRepo: extra.availability ?? availabilityRepo,
      evaluationRepo,
      dealRepo: new MockDealRepository(),
      logProvider: logger,
      embeddingProvider: extra.embeddingProvider,
      advisoryProvider: extra.advisoryProvider,
    }).proposalService;
  }

  beforeEach(() => {
    productRepo = new MockProductRepository();
    availabilityRepo = new MockAvailabilityRepository();
    evaluationRepo = new MockEvaluationRepository();
    logger = new ConsoleLogProvider();

    productRepo.add(product());
    availabilityRepo.set('prod-display', 5_000_000);
    service = build();
  });

  // ── intake ──

  describe('intake', () => {
    it('should fail a proposal missing its start date', async () => {
      const payload = proposalPayload();
      delete payload.startDate;

      const result = await service.evaluate('prop-1', payload, AGENCY_BUYER);

      expect(result.status).toBe('failed');
      expect(result.errors).toEqual(['startDate is required']);
      expect(result.stages).toEqual(['received', 'finalized']);
      expect(result.evaluation).toBeNull();
      expect(result.recommendation).toBeNull();
      expect(result.request).toBeNull();
      expect(result.completedAt).toBeInstanceOf(Date);
      expect(productRepo.lookups).toBe(0);
    });

    it('should reach a terminal status for any payload', async () => {
      const payloads: unknown[] = [
        null,
        42,
        'proposal',
        [],
        {},
        proposalPayload({ impressions: -5 }),
        proposalPayload({ productId: 'missing' }),
        proposalPayload({ price: 0.1 }),
        proposalPayload(),
      ];

      for (const [i, payload] of payloads.entries()) {
        const result = await service.evaluate(`prop-${i}`, payload, PUBLIC_BUYER);
        expect(TERMINAL).toContain(result.status);
        expect(result.stages[result.stages.length - 1]).toBe('finalized');
      }
    });
  });

  describe('malformed optional fields', () => {
    it('should drop a malformed buyer embedding and keep evaluating', async () => {
      const result = await service.evaluate(
        'prop-1',
        proposalPayload({ audienceTargeting: { interests: ['autos'] }, buyerEmbedding: { vector: ['x'] } }),
        AGENCY_BUYER
      );

      expect(result.status).toBe('accepted');
      expect(result.request?.buyerEmbedding).toBeUndefined();
      expect(result.warnings).toEqual([
        'Ignored optional field: buyerEmbedding.vector must be an array of numbers',
        'Audience validation warning: embedding: no embedding provider configured',
      ]);
      expect(result.evaluation?.targetingCompatible).toBe(true);
    });

    it('should drop malformed consent and keep evaluating', async () => {
      const result = await service.evaluate(
        'prop-2',
        proposalPayload({ consent: { framework: 'IAB-TCFv2' } }),
        AGENCY_BUYER
      );

      expect(result.status).toBe('accepted');
      expect(result.request?.consent).toBeUndefined();
      expect(result.warnings).toEqual([
        'Ignored optional field: consent.permissibleUses must be an array of strings',
      ]);
    });
  });

  // ── full pipeline ──

  describe('accepted proposals', () => {
    it('should accept a proposal that meets price, availability and targeting', async () => {
      const now = new Date('2026-03-15T00:00:00.000Z');
      const result = await service.evaluate('prop-1', proposalPayload(), AGENCY_BUYER, { now });

      expect(result.status).toBe('accepted');
      expect(result.recommendation).toBe('accept');
      expect(result.decisionSource).toBe('rule_based');
      expect(result.stages).toEqual([
        'received',
        'product_validated',
        'audience_validated',
        'pricing_evaluated',
        'availability_checked',
        'scored',
        'decided',
        'upsell_identified',
        'finalized',
      ]);
      expect(result.warnings).toEqual([]);
      expect(result.errors).toEqual([]);
      expect(result.counterTerms).toBeNull();

      const evaluation = result.evaluation;
      expect(evaluation).toMatchObject({
        proposalId: 'prop-1',
        productId: 'prod-display',
        evaluatedAt: now,
        isValid: true,
        requestedPrice: 20,
        minimumAcceptablePrice: 5,
        recommendedPrice: 18,
        priceAcceptable: true,
        priceReason: 'Price acceptable',
        requestedImpressions: 1_000_000,
        availableImpressions: 5_000_000,
        impressionsAvailable: true,
        targetingCompatible: true,
        audienceValidated: false,
      });
      expect(evaluation?.yieldScore?.recommendation).toBe('accept');

      expect(result.pricing?.finalPrice).toBe(18);
      expect(result.pricing?.dealType).toBe('preferred_deal');
      expect(result.upsellSuggestions.map((s) => s.type)).toEqual([
        'volume_upgrade',
        'cross_sell',
        'cross_sell',
        'commitment_bonus',
      ]);
      expect(service.acceptedProposals).toEqual(['prop-1']);
      expect(service.rejectedProposals).toEqual([]);
    });

    it('should query availability over the flight dates', async () => {
      await service.evaluate('prop-1', proposalPayload(), AGENCY_BUYER);

      expect(availabilityRepo.calls).toEqual([
        { productId: 'prod-display', range: { start: '2026-04-01', end: '2026-04-30' } },
      ]);
    });

    it('should score with a live fill rate when given one', async () => {
      const result = await service.evaluate('prop-1', proposalPayload(), AGENCY_BUYER, {
        currentFillRate: 0.5,
      });

      expect(result.evaluation?.yieldScore?.fillRateImpact).toBe(1);
    });
  });

  describe('product validation', () => {
    it('should reject an unknown product without consulting the advisor', async () => {
      const advisor = new MockAdvisoryProvider();
      service = build({ advisoryProvider: advisor });

      const result = await service.evaluate(
        'prop-1',
        proposalPayload({ productId: 'nope' }),
        AGENCY_BUYER
      );

      expect(result.status).toBe('rejected');
      expect(result.decisionSource).toBe('validation');
      expect(result.evaluation?.isValid).toBe(false);
      expect(result.evaluation?.validationErrors).toEqual(['Product not found: nope']);
      expect(result.evaluation?.priceReason).toBe('Product not found');
      expect(result.pricing).toBeNull();
      expect(result.upsellSuggestions).toEqual([
        { type: 'alternative_product', message: 'Consider our other inventory options' },
      ]);
      expect(advisor.inputs).toHaveLength(0);
      expect(availabilityRepo.calls).toHaveLength(0);
      expect(service.rejectedProposals).toEqual(['prop-1']);
    });

    it('should warn and reject when the catalog fails', async () => {
      productRepo.failWith = new Error('catalog down');

      const result = await service.evaluate('prop-1', proposalPayload(), AGENCY_BUYER);

      expect(result.status).toBe('rejected');
      expect(result.warnings).toEqual(['Product lookup failed: catalog down']);
    });

    it('should time out a stalled catalog lookup', async () => {
      productRepo.delayMs = 200;

      const result = await service.evaluate('prop-1', proposalPayload(), AGENCY_BUYER);

      expect(result.status).toBe('rejected');
      expect(result.warnings).toEqual([
        'Product lookup failed: product lookup timed out after 50ms',
      ]);
    });

    it('should warn about unrecognised and unsupported deal types', async () => {
      productRepo.add(product({ supportedDealTypes: ['preferred_deal'] }));

      const unknown = await service.evaluate(
        'prop-1',
        proposalPayload({ dealType: 'open auction' }),
        AGENCY_BUYER
      );
      expect(unknown.warnings).toEqual([
        'Unrecognized deal type "open auction", treating as preferred_deal',
      ]);

      const unsupported = await service.evaluate(
        'prop-2',
        proposalPayload({ dealType: 'PG' }),
        AGENCY_BUYER
      );
      expect(unsupported.warnings).toEqual([
        'Requested deal type programmatic_guaranteed not supported for product',
      ]);
      expect(unsupported.pricing?.dealType).toBe('programmatic_guaranteed');
    });

    it('should warn about volumes under the product minimum', async () => {
      const result = await service.evaluate(
        'prop-1',
        proposalPayload({ impressions: 5_000 }),
        AGENCY_BUYER
      );

      expect(result.warnings).toEqual(['Requested impressions below product minimum of 10,000']);
    });
  });

  describe('availability', () => {
    it('should reject a shortfall with a validation error', async () => {
      availabilityRepo.set('prod-display', 500_000);

      const result = await service.evaluate('prop-1', proposalPayload(), AGENCY_BUYER);

      expect(result.status).toBe('rejected');
      expect(result.decisionSource).toBe('rule_based');
      expect(result.evaluation?.impressionsAvailable).toBe(false);
      expect(result.evaluation?.availableImpressions).toBe(500_000);
      expect(result.evaluation?.validationErrors).toEqual([
        'Requested 1,000,000 impressions but only 500,000 available',
      ]);
    });

    it('should assume no inventory when the availability source fails', async () => {
      availabilityRepo.failWith = new Error('avails down');

      const result = await service.evaluate('prop-1', proposalPayload(), AGENCY_BUYER);

      expect(result.status).toBe('rejected');
      expect(result.evaluation?.availableImpressions).toBe(0);
      expect(result.warnings).toEqual([
        'Availability check failed, assuming no inventory: avails down',
      ]);
    });
  });

  describe('counter proposals', () => {
    it('should counter a price below the product floor', async () => {
      const result = await service.evaluate(
        'prop-1',
        proposalPayload({ price: 4 }),
        AGENCY_BUYER
      );

      expect(result.status).toBe('counter_pending');
      expect(result.recommendation).toBe('counter');
      expect(result.evaluation?.priceReason).toBe('Below product floor ($5.00 CPM)');
      expect(result.counterTerms).toEqual({
        proposedPrice: 18,
        floorPrice: 5,
        maxImpressions: 1_000_000,
        negotiationRoom: 0.05,
        reason: 'Increase price to $18.00 CPM; Strategic buyer - limited negotiation available',
      });
      expect(result.stages.slice(-3)).toEqual(['decided', 'counter_terms_generated', 'finalized']);
      expect(result.upsellSuggestions.length).toBeGreaterThan(0);
      expect(service.acceptedProposals).toEqual([]);
      expect(service.rejectedProposals).toEqual([]);
    });
  });

  // ── audience ──

  describe('audience validation', () => {
    const targeting = { geography: ['US'], interests: ['sports'] };
    const consent = { framework: 'IAB-TCFv2', permissibleUses: ['audience_matching'] };

    it('should validate targeting through the embedding provider', async () => {
      const embedder = new MockEmbeddingProvider();
      embedder.fixedVector = [1, 0];
      service = build({ embeddingProvider: embedder });

      const result = await service.evaluate(
        'prop-1',
        proposalPayload({ audienceTargeting: targeting, consent }),
        AGENCY_BUYER
      );

      expect(result.status).toBe('accepted');
      expect(result.evaluation).toMatchObject({
        audienceValidated: true,
        audienceCoverage: 100,
        similarityScore: 1,
        targetingCompatible: true,
        audienceGaps: [],
      });
      expect(embedder.callCount).toBe(2);
    });

    it('should counter when the buyer embedding carries no consent', async () => {
      const embedder = new MockEmbeddingProvider();
      embedder.fixedVector = [1, 0];
      service = build({ embeddingProvider: embedder });

      const result = await service.evaluate(
        'prop-1',
        proposalPayload({ audienceTargeting: targeting }),
        AGENCY_BUYER
      );

      expect(result.warnings).toEqual(['Audience coverage below threshold: 0.0%']);
      expect(result.evaluation?.targetingCompatible).toBe(false);
      expect(result.status).toBe('counter_pending');
    });

    it('should use supplied embeddings without an embedding provider', async () => {
      productRepo.add(product({ audienceEmbedding: embedding([1, 0]) }));

      const result = await service.evaluate(
        'prop-1',
        proposalPayload({ audienceTargeting: targeting, consent, buyerEmbedding: { vector: [1, 0] } }),
        AGENCY_BUYER
      );

      expect(result.warnings).toEqual([]);
      expect(result.evaluation?.audienceValidated).toBe(true);
      expect(result.evaluation?.similarityScore).toBe(1);
    });

    it('should treat an expired buyer embedding as invalid on the default clock', async () => {
      productRepo.add(product({ audienceEmbedding: embedding([1, 0]) }));

      const result = await service.evaluate(
        'prop-1',
        proposalPayload({
          audienceTargeting: targeting,
          consent,
          buyerEmbedding: { vector: [1, 0], createdAt: '2020-01-01T00:00:00.000Z', ttlSeconds: 60 },
        }),
        AGENCY_BUYER
      );

      expect(result.evaluation).toMatchObject({
        audienceValidated: true,
        audienceCoverage: 0,
        similarityScore: null,
        targetingCompatible: false,
      });
      expect(result.warnings).toEqual(['Audience coverage below threshold: 0.0%']);
      expect(result.status).toBe('counter_pending');
    });

    it('should degrade to compatible when embeddings are unavailable', async () => {
      const result = await service.evaluate(
        'prop-1',
        proposalPayload({ audienceTargeting: targeting, consent }),
        AGENCY_BUYER
      );

      expect(result.warnings).toEqual([
        'Audience validation warning: embedding: no embedding provider configured',
      ]);
      expect(result.evaluation).toMatchObject({
        audienceValidated: false,
        audienceGaps: ['validation_error'],
        targetingCompatible: true,
      });
      expect(result.status).toBe('accepted');
    });

    it('should degrade when the embedding provider fails', async () => {
      const embedder = new MockEmbeddingProvider();
      embedder.failWith = new Error('rate limited');
      service = build({ embeddingProvider: embedder });

      const result = await service.evaluate(
        'prop-1',
        proposalPayload({ audienceTargeting: targeting, consent }),
        AGENCY_BUYER
      );

      expect(result.warnings).toEqual(['Audience validation warning: rate limited']);
      expect(result.evaluation?.targetingCompatible).toBe(true);
    });
  });

  // ── advisory ──

  describe('advisory decisions', () => {
    it('should follow the advisor when it answers', async () => {
      const advisor = new MockAdvisoryProvider();
      advisor.decision = { recommendation: 'counter', rationale: 'Hold out for more' };
      service = build({ advisoryProvider: advisor });

      const result = await service.evaluate('prop-1', proposalPayload(), AGENCY_BUYER);

      expect(result.recommendation).toBe('counter');
      expect(result.decisionSource).toBe('advisory');
      expect(result.status).toBe('counter_pending');
      expect(advisor.inputs[0]).toMatchObject({ proposalId: 'prop-1', buyerTier: 'agency' });
    });

    it('should fall back to the rule-based decision when the advisor fails', async () => {
      const advisor = new MockAdvisoryProvider();
      advisor.failWith = new Error('model offline');
      service = build({ advisoryProvider: advisor });

      const result = await service.evaluate('prop-1', proposalPayload(), AGENCY_BUYER);

      expect(result.warnings).toEqual(['Advisory evaluation failed: model offline']);
      expect(result.decisionSource).toBe('rule_based');
      expect(result.status).toBe('accepted');
    });

    it('should fall back when the advisor never answers', async () => {
      const advisor = new MockAdvisoryProvider();
      advisor.hang = true;
      service = build({ advisoryProvider: advisor });

      const result = await service.evaluate('prop-1', proposalPayload(), AGENCY_BUYER);

      expect(result.warnings).toEqual([
        'Advisory evaluation failed: advisory (mock) timed out after 50ms',
      ]);
      expect(result.decisionSource).toBe('rule_based');
    });
  });

  // ── persistence ──

  describe('persistence', () => {
    it('should save the pricing decision and the final result', async () => {
      await service.evaluate('prop-1', proposalPayload(), AGENCY_BUYER);

      expect(evaluationRepo.pricingDecisions).toHaveLength(1);
      expect(evaluationRepo.pricingDecisions[0]?.proposalId).toBe('prop-1');
      expect(evaluationRepo.pricingDecisions[0]?.decision.finalPrice).toBe(18);
      expect(evaluationRepo.evaluations).toHaveLength(1);
      expect(evaluationRepo.evaluations[0]?.status).toBe('accepted');
      expect(evaluationRepo.evaluations[0]?.stages).toContain('finalized');
    });

    it('should append a record for every run', async () => {
      await service.evaluate('prop-1', proposalPayload(), AGENCY_BUYER);
      await service.evaluate('prop-1', proposalPayload({ price: 4 }), AGENCY_BUYER);

      expect(evaluationRepo.evaluations.map((e) => e.status)).toEqual([
        'accepted',
        'counter_pending',
      ]);
    });

    it('should warn when the result cannot be saved', async () => {
      evaluationRepo.failWith = new Error('db down');

      const result = await service.evaluate('prop-1', proposalPayload(), AGENCY_BUYER);

      expect(result.status).toBe('accepted');
      expect(result.warnings).toEqual(['Failed to persist evaluation: db down']);
    });
  });

  // ── concurrency ──

  describe('concurrency', () => {
    class CountingAvailability implements IAvailabilityRepository {
      active = 0;
      maxActive = 0;

      async availableImpressions(_productId: string, _range: DateRange): Promise<number> {
        this.active++;
        this.maxActive = Math.max(this.maxActive, this.active);
        await new Promise((resolve) => setTimeout(resolve, 10));
        this.active--;
        return 5_000_000;
      }
    }

    it('should run evaluations of one proposal one at a time', async () => {
      const availability = new CountingAvailability();
      service = build({ availability });

      const results = await Promise.all([
        service.evaluate('prop-1', proposalPayload(), AGENCY_BUYER),
        service.evaluate('prop-1', proposalPayload({ price: 4 }), AGENCY_BUYER),
      ]);

      expect(availability.maxActive).toBe(1);
      expect(results.map((r) => r.status)).toEqual(['accepted', 'counter_pending']);
    });

    it('should run different proposals concurrently', async () => {
      const availability = new CountingAvailability();
      service = build({ availability });

      await Promise.all([
        service.evaluate('prop-1', proposalPayload(), AGENCY_BUYER),
        service.evaluate('prop-2', proposalPayload(), AGENCY_BUYER),
      ]);

      expect(availability.maxActive).toBe(2);
    });

    it('should finalize a cancelled evaluation as failed', async () => {
      const controller = new AbortController();
      controller.abort();

      const result = await service.evaluate('prop-1', proposalPayload(), AGENCY_BUYER, {
        signal: controller.signal,
      });

      expect(result.status).toBe('failed');
      expect(result.errors).toEqual(['Evaluation cancelled']);
      expect(result.stages).toEqual(['received', 'finalized']);
      expect(productRepo.lookups).toBe(0);
    });
  });

  // ── logging ──

  describe('logging', () => {
    it('should tag every event with the proposal id', async () => {
      await service.evaluate('prop-1', proposalPayload(), AGENCY_BUYER);

      expect(logger.events.length).toBeGreaterThan(0);
      for (const event of logger.events) {
        expect(event.fields?.proposalId).toBe('prop-1');
      }
      expect(logger.eventsAt('info')[0]).toMatchObject({
        message: 'Proposal received',
        fields: { proposalId: 'prop-1', buyerTier: 'agency' },
      });
    });

    it('should log a debug event per stage', async () => {
      await service.evaluate('prop-1', proposalPayload(), AGENCY_BUYER);

      const stages = logger
        .eventsAt('debug')
        .map((e) => e.message)
        .filter((m) => m.startsWith('Stage '));
      expect(stages).toEqual([
        'Stage product_validated',
        'Stage audience_validated',
        'Stage pricing_evaluated',
        'Stage availability_checked',
        'Stage scored',
        'Stage decided',
        'Stage upsell_identified',
        'Stage finalized',
      ]);
    });

    it('should log degradations as warnings', async () => {
      availabilityRepo.failWith = new Error('avails down');
      await service.evaluate('prop-1', proposalPayload(), AGENCY_BUYER);

      expect(logger.eventsAt('warn').map((e) => e.message)).toEqual([
        'Availability check failed, assuming no inventory: avails down',
      ]);
    });
  });
});
