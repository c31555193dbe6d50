/**
 * Production container: uses real Supabase, plus OpenAI when configured.
 * Pricing rules are read once here and frozen into the seller config.
 */

import { createContainer, type Container } from './container.js';
import { getSupabaseClient } from './db.js';
import { loadSellerConfigFromEnv } from './config.js';
import { SupabaseProductRepository } from './repositories/SupabaseProductRepository.js';
import { SupabaseAvailabilityRepository } from './repositories/SupabaseAvailabilityRepository.js';
import { SupabasePricingRuleRepository } from './repositories/SupabasePricingRuleRepository.js';
import { SupabaseEvaluationRepository } from './repositories/SupabaseEvaluationRepository.js';
import { SupabaseDealRepository } from './repositories/SupabaseDealRepository.js';
import { OpenAIEmbeddingProvider } from './providers/OpenAIEmbeddingProvider.js';
import { OpenAIAdvisoryProvider } from './providers/OpenAIAdvisoryProvider.js';
import { AxiomLogProvider } from './providers/AxiomLogProvider.js';
import { ConsoleLogProvider } from './providers/ConsoleLogProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';

let cached: Promise<Container> | null = null;

export function getProductionContainer(env: NodeJS.ProcessEnv = process.env): Promise<Container> {
  cached ??= buildContainer(env).catch((err: unknown) => {
    cached = null;
    throw err;
  });
  return cached;
}

async function buildContainer(env: NodeJS.ProcessEnv): Promise<Container> {
  const db = getSupabaseClient(env.SUPABASE_URL, env.SUPABASE_SERVICE_ROLE_KEY);

  const rules = await new SupabasePricingRuleRepository(db).findActive();
  const config = loadSellerConfigFromEnv(env, rules);

  const logProvider = createLogProvider(env);

  // OpenAI-backed audience embeddings and advisory when a key is present.
  const openAiKey = env.OPENAI_API_KEY;

  const container = createContainer({
    config,
    productRepo: new SupabaseProductRepository(db),
    availabilityRepo: new SupabaseAvailabilityRepository(db),
    evaluationRepo: new SupabaseEvaluationRepository(db),
    dealRepo: new SupabaseDealRepository(db),
    logProvider,
    ...(openAiKey && {
      embeddingProvider: new OpenAIEmbeddingProvider({ apiKey: openAiKey }),
      advisoryProvider: new OpenAIAdvisoryProvider({ apiKey: openAiKey }),
    }),
  });

  logProvider.info('Deal desk started', {
    sellerOrganizationId: config.sellerOrganizationId,
    pricingRules: rules.length,
    advisory: openAiKey ? 'openai' : 'rule-based',
  });
  return container;
}

function createLogProvider(env: NodeJS.ProcessEnv): ILogProvider {
  const apiToken = env.AXIOM_API_KEY;
  const dataset = env.AXIOM_DATASET;
  return apiToken && dataset
    ? new AxiomLogProvider({ apiToken, dataset })
    : new ConsoleLogProvider({ outputToConsole: true });
}
