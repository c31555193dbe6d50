export * from './types/models.js';
export type * from './types/api.js';
export type * from './types/common.js';

export * from './errors.js';
export * from './config.js';

export * from './services/BuyerIdentityResolver.js';
export * from './services/PricingRulesEngine.js';
export * from './services/AudienceValidator.js';
export * from './services/YieldOptimizer.js';
export * from './services/proposalSchema.js';
export * from './services/ProposalEvaluationService.js';
export * from './services/DealService.js';

export type * from './repositories/IProductRepository.js';
export type * from './repositories/IAvailabilityRepository.js';
export type * from './repositories/IPricingRuleRepository.js';
export type * from './repositories/IEvaluationRepository.js';
export type * from './repositories/IDealRepository.js';

export * from './providers/index.js';

export { flattenRecord, type FlatRecord, type FlatValue } from './utils/flatten.js';
export { withTimeout } from './utils/timeout.js';

export { createContainer, type Container } from './container.js';
export { getProductionContainer } from './container.production.js';
