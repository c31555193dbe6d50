/**
 * Supabase implementation of IEvaluationRepository.
 * Payloads are stored flattened so they can be filtered on in SQL.
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type { IEvaluationRepository } from './IEvaluationRepository.js';
import type { PricingDecision } from '../types/models.js';
import type { EvaluationResult } from '../types/api.js';
import type { PricingDecisionRow, ProposalEvaluationRow } from '../types/database.js';
import { flattenRecord } from '../utils/flatten.js';

export class SupabaseEvaluationRepository implements IEvaluationRepository {
  constructor(private readonly db: SupabaseClient) {}

  async saveEvaluation(result: EvaluationResult): Promise<void> {
    const row: Omit<ProposalEvaluationRow, 'id' | 'created_at'> = {
      proposal_id: result.proposalId,
      status: result.status,
      recommendation: result.recommendation,
      decision_source: result.decisionSource,
      payload: flattenRecord(withoutEmbedding(result)),
    };
    const { error } = await this.db.from('proposal_evaluations').insert(row);

    if (error) throw new Error(`Failed to save evaluation: ${error.message}`);
  }

  async savePricingDecision(proposalId: string, decision: PricingDecision): Promise<void> {
    const row: Omit<PricingDecisionRow, 'id' | 'created_at'> = {
      proposal_id: proposalId,
      product_id: decision.productId,
      pricing_key: decision.pricingKey,
      buyer_tier: decision.buyerTier,
      final_price: decision.finalPrice,
      currency: decision.currency,
      payload: flattenRecord(decision),
    };
    const { error } = await this.db.from('pricing_decisions').insert(row);

    if (error) throw new Error(`Failed to save pricing decision: ${error.message}`);
  }
}

/** Embedding vectors are large and not useful in the audit trail. */
function withoutEmbedding(result: EvaluationResult): EvaluationResult {
  if (!result.request?.buyerEmbedding) return result;
  const { buyerEmbedding: _omitted, ...request } = result.request;
  return { ...result, request };
}
