/**
 * Audience embedding provider interface.
 * Produces embeddings for buyer targeting and seller inventory; the
 * evaluation core only consumes them.
 */

import type {
  AudienceRequirements,
  ConsentInfo,
  Embedding,
  ProductDefinition,
} from '../types/models.js';

export interface IEmbeddingProvider {
  /** Vector dimension of every embedding this provider returns. */
  readonly dimensions: number;

  /**
   * Embed a buyer's targeting request. The embedding carries `consent`
   * unchanged; without it the embedding cannot pass audience validation.
   */
  embedTargeting(targeting: AudienceRequirements, consent?: ConsentInfo): Promise<Embedding>;

  /** Embed the audience a product's inventory reaches. */
  embedProduct(product: ProductDefinition): Promise<Embedding>;
}
