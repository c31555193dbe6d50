/**
 * OpenAI embedding provider.
 * Wraps the OpenAI API for text-embedding-3-small, shortened to 512
 * dimensions, and packages the vectors as cosine-metric audience embeddings.
 */

import OpenAI from 'openai';
import type {
  CreateEmbeddingResponse,
  EmbeddingCreateParams,
} from 'openai/resources/embeddings';
import type { IEmbeddingProvider } from './IEmbeddingProvider.js';
import type {
  AudienceRequirements,
  ConsentInfo,
  Embedding,
  EmbeddingModel,
  EmbeddingType,
  ProductDefinition,
  SignalType,
} from '../types/models.js';
import { describeProduct, describeTargeting } from './embedding-text.js';

const DEFAULT_MODEL = 'text-embedding-3-small';
const DEFAULT_DIMENSIONS = 512;
const EMBEDDING_TTL_SECONDS = 3600;

/** Seller inventory embeddings are generated from first-party catalog data. */
const INVENTORY_CONSENT: ConsentInfo = {
  framework: 'seller-first-party',
  permissibleUses: ['measurement', 'audience_matching'],
  ttlSeconds: 86_400,
};

/** The part of the OpenAI client this provider calls. */
export interface EmbeddingsClient {
  embeddings: {
    create(body: EmbeddingCreateParams): PromiseLike<CreateEmbeddingResponse>;
  };
}

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  private client: EmbeddingsClient;
  private model: string;
  readonly dimensions: number;

  constructor(opts?: {
    apiKey?: string;
    model?: string;
    dimensions?: number;
    client?: EmbeddingsClient;
  }) {
    this.client =
      opts?.client ??
      new OpenAI({
        apiKey: opts?.apiKey ?? process.env.OPENAI_API_KEY,
      });
    this.model = opts?.model ?? DEFAULT_MODEL;
    this.dimensions = opts?.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embedTargeting(
    targeting: AudienceRequirements,
    consent?: ConsentInfo
  ): Promise<Embedding> {
    const vector = await this.generate(describeTargeting(targeting));
    return this.package(vector, 'query', 'contextual', consent);
  }

  async embedProduct(product: ProductDefinition): Promise<Embedding> {
    const vector = await this.generate(describeProduct(product));
    return this.package(vector, 'inventory', 'contextual', INVENTORY_CONSENT);
  }

  private async generate(text: string): Promise<number[]> {
    const response = await this.client.embeddings.create({
      model: this.model,
      input: text,
      dimensions: this.dimensions,
    });

    const first = response.data[0];
    if (!first) {
      throw new Error('OpenAI returned no embedding');
    }
    return first.embedding;
  }

  private package(
    vector: number[],
    embeddingType: EmbeddingType,
    signalType: SignalType,
    consent: ConsentInfo | undefined
  ): Embedding {
    const model: EmbeddingModel = {
      id: this.model,
      version: '1',
      dimension: vector.length,
      metric: 'cosine',
    };

    return {
      vector,
      dimension: vector.length,
      embeddingType,
      signalType,
      model,
      ...(consent && { consent }),
      createdAt: new Date(),
      ttlSeconds: EMBEDDING_TTL_SECONDS,
    };
  }
}
