/**
 * Supabase implementation of IDealRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IDealRepository } from './IDealRepository.js';
import type { DealOutput } from '../types/models.js';
import type { DealRow } from '../types/database.js';
import { toDeal, toDealRow } from './row-mappers.js';

export class SupabaseDealRepository implements IDealRepository {
  constructor(private readonly db: SupabaseClient) {}

  async save(deal: DealOutput): Promise<void> {
    const { error } = await this.db.from('deals').insert(toDealRow(deal));

    if (error) throw new Error(`Failed to save deal: ${error.message}`);
  }

  async findById(dealId: string): Promise<DealOutput | null> {
    const { data, error } = await this.db
      .from('deals')
      .select('*')
      .eq('deal_id', dealId)
      .maybeSingle();

    if (error) throw new Error(`Failed to fetch deal: ${error.message}`);
    return data ? toDeal(data as DealRow) : null;
  }
}
