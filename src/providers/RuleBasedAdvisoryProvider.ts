/**
 * Deterministic advisory provider.
 * Accepts only when price, availability and targeting all pass; counters
 * when inventory is there but something else is off; otherwise rejects.
 */

import type { IAdvisoryProvider, AdvisoryDecision, AdvisoryInput } from './IAdvisoryProvider.js';
import type { ProposalEvaluation } from '../types/models.js';

export function ruleBasedDecision(evaluation: ProposalEvaluation): AdvisoryDecision {
  if (
    evaluation.priceAcceptable &&
    evaluation.impressionsAvailable &&
    evaluation.targetingCompatible
  ) {
    return {
      recommendation: 'accept',
      rationale: 'Price, availability and targeting requirements are met',
    };
  }

  if (evaluation.impressionsAvailable) {
    const issues: string[] = [];
    if (!evaluation.priceAcceptable) issues.push(evaluation.priceReason);
    if (!evaluation.targetingCompatible) issues.push('audience coverage below threshold');
    return {
      recommendation: 'counter',
      rationale: `Inventory available; counter on: ${issues.join('; ')}`,
    };
  }

  return {
    recommendation: 'reject',
    rationale: 'Requested impressions are not available',
  };
}

export class RuleBasedAdvisoryProvider implements IAdvisoryProvider {
  readonly name = 'rule-based';

  async evaluate(input: AdvisoryInput): Promise<AdvisoryDecision> {
    return ruleBasedDecision(input.evaluation);
  }
}
