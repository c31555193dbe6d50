import { describe, it, expect, vi } from 'vitest';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from 'openai/resources/chat/completions';
import { OpenAIAdvisoryProvider, parseDecision } from '../../src/providers/OpenAIAdvisoryProvider.js';
import type { AdvisoryInput } from '../../src/providers/IAdvisoryProvider.js';
import { CollaboratorError } from '../../src/errors.js';
import { evaluation } from '../fixtures.js';

function completion(content: string | null): ChatCompletion {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 0,
    model: 'gpt-4o-mini',
    choices: [
      {
        index: 0,
        finish_reason: 'stop',
        logprobs: null,
        message: { role: 'assistant', content, refusal: null },
      },
    ],
  };
}

function stubClient(content: string | null) {
  const create = vi.fn(async (_body: ChatCompletionCreateParamsNonStreaming) => completion(content));
  return { create, client: { chat: { completions: { create } } } };
}

const input: AdvisoryInput = {
  proposalId: 'prop-1',
  buyerTier: 'seat',
  request: {
    productId: 'prod-display',
    impressions: 1_000_000,
    startDate: '2026-04-01',
    endDate: '2026-04-30',
    price: 20,
  },
  evaluation: evaluation(),
};

describe('parseDecision', () => {
  it('should read recommendation and rationale', () => {
    expect(parseDecision('{"recommendation":"counter","rationale":"price low"}', 'openai')).toEqual({
      recommendation: 'counter',
      rationale: 'price low',
    });
  });

  it('should default a missing rationale to an empty string', () => {
    expect(parseDecision('{"recommendation":"accept"}', 'openai')).toEqual({
      recommendation: 'accept',
      rationale: '',
    });
  });

  it('should reject non-JSON replies', () => {
    expect(() => parseDecision('accept it', 'openai')).toThrow('openai: reply was not valid JSON');
  });

  it('should reject JSON that is not an object', () => {
    expect(() => parseDecision('"accept"', 'openai')).toThrow('openai: reply was not a JSON object');
    expect(() => parseDecision('null', 'openai')).toThrow(CollaboratorError);
  });

  it('should reject unknown recommendations', () => {
    expect(() => parseDecision('{"recommendation":"maybe"}', 'openai')).toThrow(
      'openai: unknown recommendation "maybe"'
    );
  });
});

describe('OpenAIAdvisoryProvider', () => {
  it('should be named openai', () => {
    const { client } = stubClient('{}');
    expect(new OpenAIAdvisoryProvider({ client }).name).toBe('openai');
  });

  it('should request a JSON reply from the configured model', async () => {
    const { create, client } = stubClient('{"recommendation":"accept","rationale":"fits"}');
    const provider = new OpenAIAdvisoryProvider({ client, model: 'test-model', temperature: 0 });

    const decision = await provider.evaluate(input);

    expect(decision).toEqual({ recommendation: 'accept', rationale: 'fits' });
    expect(create).toHaveBeenCalledTimes(1);
    const body = create.mock.calls[0][0];
    expect(body.model).toBe('test-model');
    expect(body.temperature).toBe(0);
    expect(body.response_format).toEqual({ type: 'json_object' });
    expect(body.messages).toHaveLength(2);
    expect(body.messages[0].role).toBe('system');
    expect(body.messages[1].role).toBe('user');
  });

  it('should summarize the evaluation in the user prompt', async () => {
    const { create, client } = stubClient('{"recommendation":"accept"}');
    await new OpenAIAdvisoryProvider({ client }).evaluate(input);

    const prompt = String(create.mock.calls[0][0].messages[1].content);
    expect(prompt).toContain('"proposalId": "prop-1"');
    expect(prompt).toContain('"buyerTier": "seat"');
    expect(prompt).toContain('"dealType": "preferred_deal"');
    expect(prompt).toContain('"flight": "2026-04-01 to 2026-04-30"');
    expect(prompt).toContain('"availableImpressions": 5000000');
  });

  it('should throw a CollaboratorError on an empty completion', async () => {
    const { client } = stubClient(null);
    await expect(new OpenAIAdvisoryProvider({ client }).evaluate(input)).rejects.toThrow(
      'openai: empty completion'
    );
  });

  it('should propagate unparseable replies', async () => {
    const { client } = stubClient('not json');
    await expect(new OpenAIAdvisoryProvider({ client }).evaluate(input)).rejects.toThrow(
      CollaboratorError
    );
  });
});
