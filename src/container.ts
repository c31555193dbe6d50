/**
 * Dependency wiring.
 * Constructs all services with their dependencies.
 * In production, repositories are Supabase implementations;
 * in tests, swap in the in-memory mocks.
 */

import type { SellerConfig } from './config.js';
import type { IProductRepository } from './repositories/IProductRepository.js';
import type { IAvailabilityRepository } from './repositories/IAvailabilityRepository.js';
import type { IEvaluationRepository } from './repositories/IEvaluationRepository.js';
import type { IDealRepository } from './repositories/IDealRepository.js';
import type { IEmbeddingProvider } from './providers/IEmbeddingProvider.js';
import type { IAdvisoryProvider } from './providers/IAdvisoryProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { CoverageFactorTable } from './services/AudienceValidator.js';
import { PricingRulesEngine } from './services/PricingRulesEngine.js';
import { AudienceValidator } from './services/AudienceValidator.js';
import { YieldOptimizer } from './services/YieldOptimizer.js';
import { ProposalEvaluationService } from './services/ProposalEvaluationService.js';
import { DealService } from './services/DealService.js';

export interface Container {
  config: SellerConfig;
  pricingEngine: PricingRulesEngine;
  audienceValidator: AudienceValidator;
  yieldOptimizer: YieldOptimizer;
  proposalService: ProposalEvaluationService;
  dealService: DealService;
  logProvider: ILogProvider;
}

export function createContainer(deps: {
  config: SellerConfig;
  productRepo: IProductRepository;
  availabilityRepo: IAvailabilityRepository;
  dealRepo: IDealRepository;
  logProvider: ILogProvider;
  evaluationRepo?: IEvaluationRepository;
  embeddingProvider?: IEmbeddingProvider;
  advisoryProvider?: IAdvisoryProvider;
  coverageFactors?: CoverageFactorTable;
}): Container {
  const pricingEngine = new PricingRulesEngine(deps.config.pricing);
  const audienceValidator = new AudienceValidator(deps.config.audience, deps.coverageFactors);
  const yieldOptimizer = new YieldOptimizer(deps.config.yield);

  const proposalService = new ProposalEvaluationService({
    config: deps.config,
    pricing: pricingEngine,
    audience: audienceValidator,
    yieldOptimizer,
    productRepo: deps.productRepo,
    availabilityRepo: deps.availabilityRepo,
    logger: deps.logProvider,
    evaluationRepo: deps.evaluationRepo,
    embeddingProvider: deps.embeddingProvider,
    advisoryProvider: deps.advisoryProvider,
  });
  const dealService = new DealService(deps.config, deps.dealRepo, deps.logProvider);

  return {
    config: deps.config,
    pricingEngine,
    audienceValidator,
    yieldOptimizer,
    proposalService,
    dealService,
    logProvider: deps.logProvider,
  };
}
