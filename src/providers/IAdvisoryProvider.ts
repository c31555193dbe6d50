/**
 * Advisory decision provider interface.
 * An external advisor may recommend accept/counter/reject for an evaluated
 * proposal. It is treated as unreliable: the orchestrator always pairs it
 * with the rule-based provider.
 */

import type { AccessTier, ProposalEvaluation, Recommendation } from '../types/models.js';
import type { ProposalRequest } from '../types/api.js';

export interface AdvisoryInput {
  proposalId: string;
  request: ProposalRequest;
  evaluation: ProposalEvaluation;
  buyerTier: AccessTier;
}

export interface AdvisoryDecision {
  recommendation: Recommendation;
  rationale: string;
}

export interface IAdvisoryProvider {
  /** Short identifier used in logs. */
  readonly name: string;

  evaluate(input: AdvisoryInput): Promise<AdvisoryDecision>;
}
