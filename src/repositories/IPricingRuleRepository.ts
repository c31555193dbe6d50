/**
 * Pricing rule storage. Read once at startup into the frozen pricing config.
 */

import type { PricingRule } from '../types/models.js';

export interface IPricingRuleRepository {
  findActive(): Promise<PricingRule[]>;
}
