/**
 * OpenAI advisory provider.
 * Asks a chat model for an accept/counter/reject call on an evaluated
 * proposal. Replies must be JSON; anything else is a collaborator error
 * and the orchestrator falls back to the rule-based provider.
 */

import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from 'openai/resources/chat/completions';
import type { IAdvisoryProvider, AdvisoryDecision, AdvisoryInput } from './IAdvisoryProvider.js';
import type { Recommendation } from '../types/models.js';
import { CollaboratorError } from '../errors.js';

const DEFAULT_MODEL = 'gpt-4o-mini';
const RECOMMENDATIONS: readonly Recommendation[] = ['accept', 'counter', 'reject'];

const SYSTEM_PROMPT =
  'You review advertising inventory proposals for a publisher. ' +
  'Weigh price against floor and recommended price, availability, audience fit ' +
  'and the yield score. Reply with JSON only: ' +
  '{"recommendation": "accept" | "counter" | "reject", "rationale": string}.';

/** The part of the OpenAI client this provider calls. */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): PromiseLike<ChatCompletion>;
    };
  };
}

export class OpenAIAdvisoryProvider implements IAdvisoryProvider {
  readonly name = 'openai';
  private client: ChatCompletionClient;
  private model: string;
  private temperature: number;

  constructor(opts?: {
    apiKey?: string;
    model?: string;
    temperature?: number;
    client?: ChatCompletionClient;
  }) {
    this.client =
      opts?.client ??
      new OpenAI({
        apiKey: opts?.apiKey ?? process.env.OPENAI_API_KEY,
      });
    this.model = opts?.model ?? DEFAULT_MODEL;
    this.temperature = opts?.temperature ?? 0.3;
  }

  async evaluate(input: AdvisoryInput): Promise<AdvisoryDecision> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      temperature: this.temperature,
      response_format: { type: 'json_object' },
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: this.buildPrompt(input) },
      ],
    });

    const content = completion.choices[0]?.message.content;
    if (!content) {
      throw new CollaboratorError(this.name, 'empty completion');
    }

    return parseDecision(content, this.name);
  }

  private buildPrompt(input: AdvisoryInput): string {
    const { evaluation, request } = input;
    const summary = {
      proposalId: input.proposalId,
      buyerTier: input.buyerTier,
      productId: evaluation.productId,
      dealType: request.dealType ?? 'preferred_deal',
      flight: `${request.startDate} to ${request.endDate}`,
      offeredPrice: evaluation.requestedPrice,
      floorPrice: evaluation.minimumAcceptablePrice,
      recommendedPrice: evaluation.recommendedPrice,
      priceAcceptable: evaluation.priceAcceptable,
      requestedImpressions: evaluation.requestedImpressions,
      availableImpressions: evaluation.availableImpressions,
      targetingCompatible: evaluation.targetingCompatible,
      audienceCoverage: evaluation.audienceCoverage,
      yieldScore: evaluation.yieldScore,
      validationErrors: evaluation.validationErrors,
    };
    return `Evaluate this proposal:\n${JSON.stringify(summary, null, 2)}`;
  }
}

export function parseDecision(content: string, source: string): AdvisoryDecision {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new CollaboratorError(source, 'reply was not valid JSON');
  }

  if (typeof parsed !== 'object' || parsed === null) {
    throw new CollaboratorError(source, 'reply was not a JSON object');
  }

  const recommendation: unknown = Reflect.get(parsed, 'recommendation');
  const rationale: unknown = Reflect.get(parsed, 'rationale');

  const match = RECOMMENDATIONS.find((r) => r === recommendation);
  if (!match) {
    throw new CollaboratorError(source, `unknown recommendation "${String(recommendation)}"`);
  }

  return {
    recommendation: match,
    rationale: typeof rationale === 'string' ? rationale : '',
  };
}
