/**
 * Supabase implementation of IPricingRuleRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IPricingRuleRepository } from './IPricingRuleRepository.js';
import type { PricingRule } from '../types/models.js';
import type { PricingRuleRow } from '../types/database.js';
import { toPricingRule } from './row-mappers.js';

export class SupabasePricingRuleRepository implements IPricingRuleRepository {
  constructor(private readonly db: SupabaseClient) {}

  async findActive(): Promise<PricingRule[]> {
    const { data, error } = await this.db
      .from('pricing_rules')
      .select('*')
      .eq('is_active', true)
      .order('priority', { ascending: false });

    if (error) throw new Error(`Failed to fetch pricing rules: ${error.message}`);
    return ((data ?? []) as PricingRuleRow[]).map(toPricingRule);
  }
}
