/**
 * Product catalog access.
 */

import type { AudienceCapability, ProductDefinition } from '../types/models.js';

export interface IProductRepository {
  /** Null when the catalog has no such product. */
  findById(productId: string): Promise<ProductDefinition | null>;

  /** Audience capabilities the product can serve. Empty when none are registered. */
  findCapabilities(productId: string): Promise<AudienceCapability[]>;
}
