/**
 * Supabase implementation of IProductRepository.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IProductRepository } from './IProductRepository.js';
import type { AudienceCapability, ProductDefinition } from '../types/models.js';
import type { AudienceCapabilityRow, ProductRow } from '../types/database.js';
import { toCapability, toProduct } from './row-mappers.js';

export class SupabaseProductRepository implements IProductRepository {
  constructor(private readonly db: SupabaseClient) {}

  async findById(productId: string): Promise<ProductDefinition | null> {
    const { data, error } = await this.db
      .from('products')
      .select('*')
      .eq('product_id', productId)
      .maybeSingle();

    if (error) throw new Error(`Failed to fetch product: ${error.message}`);
    return data ? toProduct(data as ProductRow) : null;
  }

  async findCapabilities(productId: string): Promise<AudienceCapability[]> {
    const { data, error } = await this.db
      .from('audience_capabilities')
      .select('*')
      .eq('product_id', productId)
      .order('coverage_percentage', { ascending: false });

    if (error) throw new Error(`Failed to fetch audience capabilities: ${error.message}`);
    return ((data ?? []) as AudienceCapabilityRow[]).map(toCapability);
  }
}
