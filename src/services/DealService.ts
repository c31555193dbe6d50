/**
 * Deal record builder.
 * Turns an accepted proposal (or an accepted counter) into a deal that a
 * DSP can activate. Deals carry pricing only; budget lives with the buyer.
 */

import { randomBytes } from 'node:crypto';
import type { DealOutput } from '../types/models.js';
import type { CreateDealOptions, EvaluationResult, OpenRtbDealParams } from '../types/api.js';
import type { SellerConfig } from '../config.js';
import type { IDealRepository } from '../repositories/IDealRepository.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import { normalizeDealType } from './proposalSchema.js';
import { ConflictError, NotFoundError, ValidationError, errorMessage } from '../errors.js';
import { withTimeout } from '../utils/timeout.js';

const DEFAULT_PREFIX = 'SELL';

export interface ActivationInstructions {
  agentic: string;
  traditionalDsp: string;
}

export class DealService {
  constructor(
    private readonly config: SellerConfig,
    private readonly dealRepo: IDealRepository,
    private readonly logger: ILogProvider
  ) {}

  /**
   * Throws ConflictError('PROPOSAL_NOT_ACCEPTED') unless the evaluation
   * ended `accepted`, or `counter_pending` with `counterAccepted` set.
   */
  async createDeal(result: EvaluationResult, options: CreateDealOptions = {}): Promise<DealOutput> {
    const fromCounter = result.status === 'counter_pending' && options.counterAccepted === true;
    if (result.status !== 'accepted' && !fromCounter) {
      throw new ConflictError(
        'PROPOSAL_NOT_ACCEPTED',
        `Proposal ${result.proposalId} is ${result.status}; only accepted proposals become deals`,
        { proposalId: result.proposalId, status: result.status }
      );
    }

    const { request, evaluation } = result;
    if (!request || !evaluation) {
      throw new ConflictError(
        'PROPOSAL_NOT_ACCEPTED',
        `Proposal ${result.proposalId} has no evaluated request`,
        { proposalId: result.proposalId }
      );
    }

    const counter = fromCounter ? result.counterTerms : null;
    const dealType = result.pricing?.dealType ?? normalizeDealType(request.dealType).dealType;
    const price = counter?.proposedPrice ?? request.price ?? evaluation.recommendedPrice;
    const impressions = counter?.maxImpressions ?? request.impressions;
    const guaranteed = dealType === 'programmatic_guaranteed';

    const deal: DealOutput = {
      dealId: this.generateDealId(),
      dealType,
      proposalId: result.proposalId,
      productId: request.productId,
      price,
      pricingModel: 'cpm',
      currency: this.config.currency,
      guaranteedImpressions: guaranteed ? impressions : null,
      floorPrice: guaranteed ? null : price,
      buyerOrganizationId: options.buyerOrganizationId ?? request.buyerOrganizationId ?? '',
      sellerOrganizationId: this.config.sellerOrganizationId,
      flightStart: request.startDate,
      flightEnd: request.endDate,
      activationType: options.activationType ?? 'traditional_dsp',
      dspCompatible: true,
      createdAt: new Date(),
    };

    try {
      await withTimeout('deal save', this.config.collaboratorTimeoutMs, () =>
        this.dealRepo.save(deal)
      );
    } catch (err) {
      this.logger.error('Deal save failed', { dealId: deal.dealId, error: errorMessage(err) });
      throw err;
    }

    this.logger.info('Deal created', {
      dealId: deal.dealId,
      proposalId: deal.proposalId,
      dealType: deal.dealType,
      price: deal.price,
      fromCounter,
    });
    return deal;
  }

  async getDeal(dealId: string): Promise<DealOutput> {
    if (!dealId.trim()) throw new ValidationError('dealId is required');

    const deal = await withTimeout('deal lookup', this.config.collaboratorTimeoutMs, () =>
      this.dealRepo.findById(dealId)
    );
    if (!deal) throw new NotFoundError(`Deal not found: ${dealId}`);
    return deal;
  }

  /** OpenRTB 2.5 deal object: fixed price except private auctions, which run first price. */
  openRtbParams(deal: DealOutput): OpenRtbDealParams {
    const params: OpenRtbDealParams = {
      id: deal.dealId,
      bidfloor: deal.floorPrice ?? deal.price,
      bidfloorcur: deal.currency,
      at: deal.dealType === 'private_auction' ? 1 : 3,
      wseat: [],
      wadomain: [],
    };

    if (deal.dealType === 'programmatic_guaranteed') {
      params.ext = { guaranteed: true, impressions: deal.guaranteedImpressions };
    }
    return params;
  }

  activationInstructions(deal: DealOutput): ActivationInstructions {
    return {
      agentic: 'Activate through the buyer agent over MCP or A2A',
      traditionalDsp: `Enter Deal ID '${deal.dealId}' in your DSP`,
    };
  }

  private generateDealId(): string {
    const seller = this.config.sellerOrganizationId;
    const prefix = seller ? seller.slice(0, 4).toUpperCase() : DEFAULT_PREFIX;
    return `${prefix}-${randomBytes(6).toString('hex').toUpperCase()}`;
  }
}
