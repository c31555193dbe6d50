/**
 * Supabase implementation of IAvailabilityRepository.
 * Avails are computed in the database by `get_available_impressions`.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { DateRange, IAvailabilityRepository } from './IAvailabilityRepository.js';

export class SupabaseAvailabilityRepository implements IAvailabilityRepository {
  constructor(private readonly db: SupabaseClient) {}

  async availableImpressions(productId: string, range: DateRange): Promise<number> {
    const { data, error } = await this.db.rpc('get_available_impressions', {
      p_product_id: productId,
      p_start: range.start,
      p_end: range.end,
    });

    if (error) throw new Error(`Failed to fetch availability: ${error.message}`);

    const available = Number(data ?? 0);
    if (!Number.isFinite(available)) {
      throw new Error(`Failed to fetch availability: non-numeric result for ${productId}`);
    }
    return Math.max(0, Math.trunc(available));
  }
}
