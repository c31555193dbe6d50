/**
 * Deal record persistence.
 */

import type { DealOutput } from '../types/models.js';

export interface IDealRepository {
  /** Insert a new deal. Deal ids are unique; saving one twice is an error. */
  save(deal: DealOutput): Promise<void>;

  findById(dealId: string): Promise<DealOutput | null>;
}
