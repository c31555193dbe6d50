/**
 * Evaluation audit trail. Append-only: every evaluation run and every
 * pricing decision is a new record.
 */

import type { PricingDecision } from '../types/models.js';
import type { EvaluationResult } from '../types/api.js';

export interface IEvaluationRepository {
  saveEvaluation(result: EvaluationResult): Promise<void>;

  savePricingDecision(proposalId: string, decision: PricingDecision): Promise<void>;
}
