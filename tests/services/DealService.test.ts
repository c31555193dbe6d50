import { describe, it, expect, beforeEach } from 'vitest';
import { createContainer, type Container } from '../../src/container.js';
import { createSellerConfig } from '../../src/config.js';
import { ConsoleLogProvider } from '../../src/providers/ConsoleLogProvider.js';
import { ConflictError, NotFoundError, ValidationError } from '../../src/errors.js';
import type { EvaluationResult } from '../../src/types/api.js';
import { MockProductRepository } from '../mocks/MockProductRepository.js';
import { MockAvailabilityRepository } from '../mocks/MockAvailabilityRepository.js';
import { MockDealRepository } from '../mocks/MockDealRepository.js';
import { AGENCY_BUYER, product, proposalPayload } from '../fixtures.js';

describe('DealService', () => {
  let dealRepo: MockDealRepository;
  let logger: ConsoleLogProvider;
  let container: Container;

  function build(sellerOrganizationId: string): Container {
    const productRepo = new MockProductRepository();
    productRepo.add(product());
    const availabilityRepo = new MockAvailabilityRepository();
    availabilityRepo.set('prod-display', 5_000_000);

    return createContainer({
      config: createSellerConfig({ sellerOrganizationId }),
      productRepo,
      availabilityRepo,
      dealRepo,
      logProvider: logger,
    });
  }

  function evaluate(payload: Record<string, unknown>): Promise<EvaluationResult> {
    return container.proposalService.evaluate('prop-1', payload, AGENCY_BUYER);
  }

  beforeEach(() => {
    dealRepo = new MockDealRepository();
    logger = new ConsoleLogProvider();
    container = build('acme-media');
  });

  // ── createDeal ──

  describe('createDeal', () => {
    it('should turn an accepted preferred deal into a deal record', async () => {
      const result = await evaluate(proposalPayload({ buyerOrganizationId: 'org-9' }));
      const deal = await container.dealService.createDeal(result);

      expect(deal.dealId).toMatch(/^ACME-[0-9A-F]{12}$/);
      expect(deal).toMatchObject({
        dealType: 'preferred_deal',
        proposalId: 'prop-1',
        productId: 'prod-display',
        price: 20,
        pricingModel: 'cpm',
        currency: 'USD',
        guaranteedImpressions: null,
        floorPrice: 20,
        buyerOrganizationId: 'org-9',
        sellerOrganizationId: 'acme-media',
        flightStart: '2026-04-01',
        flightEnd: '2026-04-30',
        activationType: 'traditional_dsp',
        dspCompatible: true,
      });
      expect(await container.dealService.getDeal(deal.dealId)).toEqual(deal);
      expect(logger.eventsAt('info').map((e) => e.message)).toContain('Deal created');
    });

    it('should guarantee impressions on a programmatic guaranteed deal', async () => {
      const result = await evaluate(proposalPayload({ dealType: 'PG' }));
      const deal = await container.dealService.createDeal(result);

      expect(deal.dealType).toBe('programmatic_guaranteed');
      expect(deal.guaranteedImpressions).toBe(1_000_000);
      expect(deal.floorPrice).toBeNull();
    });

    it('should price at the recommendation when the buyer named no price', async () => {
      const payload = proposalPayload();
      delete payload.price;
      const result = await evaluate(payload);

      // No offer scores as a counter; the buyer takes the counter terms.
      expect(result.status).toBe('counter_pending');
      const deal = await container.dealService.createDeal(result, { counterAccepted: true });
      expect(deal.price).toBe(18);
    });

    it('should apply counter terms once the buyer accepts them', async () => {
      const result = await evaluate(proposalPayload({ price: 4 }));
      expect(result.status).toBe('counter_pending');

      const deal = await container.dealService.createDeal(result, {
        counterAccepted: true,
        activationType: 'agentic',
        buyerOrganizationId: 'org-override',
      });

      expect(deal.price).toBe(18);
      expect(deal.floorPrice).toBe(18);
      expect(deal.activationType).toBe('agentic');
      expect(deal.buyerOrganizationId).toBe('org-override');
    });

    it('should refuse a counter the buyer has not accepted', async () => {
      const result = await evaluate(proposalPayload({ price: 4 }));

      await expect(container.dealService.createDeal(result)).rejects.toMatchObject({
        code: 'PROPOSAL_NOT_ACCEPTED',
        message: 'Proposal prop-1 is counter_pending; only accepted proposals become deals',
      });
      expect(dealRepo.size).toBe(0);
    });

    it('should refuse rejected and failed proposals', async () => {
      const rejected = await evaluate(proposalPayload({ productId: 'nope' }));
      await expect(container.dealService.createDeal(rejected)).rejects.toThrow(ConflictError);

      const failed = await evaluate({});
      await expect(
        container.dealService.createDeal(failed, { counterAccepted: true })
      ).rejects.toThrow(ConflictError);
    });

    it('should fall back to the SELL prefix without a seller id', async () => {
      container = build('');
      const result = await evaluate(proposalPayload());
      const deal = await container.dealService.createDeal(result);

      expect(deal.dealId).toMatch(/^SELL-[0-9A-F]{12}$/);
      expect(deal.buyerOrganizationId).toBe('');
    });

    it('should log and rethrow when the deal cannot be saved', async () => {
      const result = await evaluate(proposalPayload());
      dealRepo.failWith = new Error('db down');

      await expect(container.dealService.createDeal(result)).rejects.toThrow('db down');
      expect(logger.eventsAt('error').map((e) => e.message)).toEqual(['Deal save failed']);
    });
  });

  // ── getDeal ──

  it('should report a missing deal', async () => {
    await expect(container.dealService.getDeal('ACME-000000000000')).rejects.toThrow(NotFoundError);
    await expect(container.dealService.getDeal('ACME-000000000000')).rejects.toThrow(
      'Deal not found: ACME-000000000000'
    );
  });

  it('should reject a blank deal id', async () => {
    await expect(container.dealService.getDeal('  ')).rejects.toThrow(ValidationError);
  });

  // ── activation ──

  describe('openRtbParams', () => {
    it('should run private auctions first price against the floor', async () => {
      const deal = await container.dealService.createDeal(
        await evaluate(proposalPayload({ dealType: 'PA' }))
      );

      expect(container.dealService.openRtbParams(deal)).toEqual({
        id: deal.dealId,
        bidfloor: 20,
        bidfloorcur: 'USD',
        at: 1,
        wseat: [],
        wadomain: [],
      });
    });

    it('should mark guaranteed deals fixed price with their impressions', async () => {
      const deal = await container.dealService.createDeal(
        await evaluate(proposalPayload({ dealType: 'PG' }))
      );

      expect(container.dealService.openRtbParams(deal)).toEqual({
        id: deal.dealId,
        bidfloor: 20,
        bidfloorcur: 'USD',
        at: 3,
        wseat: [],
        wadomain: [],
        ext: { guaranteed: true, impressions: 1_000_000 },
      });
    });
  });

  it('should describe how to activate a deal', async () => {
    const deal = await container.dealService.createDeal(await evaluate(proposalPayload()));

    expect(container.dealService.activationInstructions(deal)).toEqual({
      agentic: 'Activate through the buyer agent over MCP or A2A',
      traditionalDsp: `Enter Deal ID '${deal.dealId}' in your DSP`,
    });
  });
});
