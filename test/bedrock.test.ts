import { afterEach, describe, it, expect, vi } from 'vitest';
import type { ConverseCommand, ConverseCommandOutput } from '@aws-sdk/client-bedrock-runtime';
import { BedrockModelClient, resolveModelId, splitReasoningAndJson } from '../lib/lambda/shared/bedrock';

const REPLY: ConverseCommandOutput = {
  output: {
    message: { role: 'assistant', content: [{ text: 'Here you go:\n' }, { text: '{"narrative_text":"Rain."}' }] },
  },
  stopReason: 'end_turn',
  usage: { inputTokens: 120, outputTokens: 30, totalTokens: 150 },
  metrics: { latencyMs: 800 },
  $metadata: {},
};

describe('resolveModelId', () => {
  it('prefers the per-kind override, then the config default, then the fallback', () => {
    const config = { default: 'sonnet', kinds: { choices: 'opus' } };

    expect(resolveModelId('choices', 'fallback-model', config)).toBe('us.anthropic.claude-opus-4-6-v1');
    expect(resolveModelId('opening', 'fallback-model', config)).toBe('us.anthropic.claude-sonnet-4-5-20250929-v1:0');
    expect(resolveModelId('opening', 'fallback-model')).toBe('fallback-model');
  });

  it('expands shortcuts regardless of case and passes full ids through', () => {
    expect(resolveModelId('choices', ' Haiku ')).toBe('us.anthropic.claude-haiku-4-5-20251001-v1:0');
    expect(resolveModelId('choices', 'eu.anthropic.some-model-v1:0')).toBe('eu.anthropic.some-model-v1:0');
  });
});

describe('splitReasoningAndJson', () => {
  it('separates a preamble from a fenced block', () => {
    expect(splitReasoningAndJson('Thinking aloud.\n```json\n{"a":1}\n```\ntrailer')).toEqual({
      reasoning: 'Thinking aloud.',
      jsonStr: '{"a":1}',
    });
  });

  it('separates a preamble from bare JSON', () => {
    expect(splitReasoningAndJson('Sure! {"a":[1]}')).toEqual({ reasoning: 'Sure!', jsonStr: '{"a":[1]}' });
  });

  it('returns text with no JSON marker as is', () => {
    expect(splitReasoningAndJson('  no json here ')).toEqual({ reasoning: '', jsonStr: 'no json here' });
  });
});

describe('BedrockModelClient', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sends one Converse request and joins the text blocks', async () => {
    const send = vi.fn(async (_command: ConverseCommand) => REPLY);
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const model = new BedrockModelClient({ send }, 'haiku', { default: 'haiku', kinds: { continuation: 'sonnet4' } });

    const response = await model.complete({
      kind: 'continuation',
      systemPrompt: 'You write spy fiction.',
      userPrompt: 'Continue.',
      maxTokens: 500,
      temperature: 0.5,
    });

    expect(response).toEqual({
      text: 'Here you go:\n{"narrative_text":"Rain."}',
      modelId: 'us.anthropic.claude-sonnet-4-20250514-v1:0',
      stopReason: 'end_turn',
    });
    expect(send).toHaveBeenCalledTimes(1);
    expect(send.mock.calls[0][0].input).toEqual({
      modelId: 'us.anthropic.claude-sonnet-4-20250514-v1:0',
      system: [{ text: 'You write spy fiction.' }],
      messages: [{ role: 'user', content: [{ text: 'Continue.' }] }],
      inferenceConfig: { maxTokens: 500, temperature: 0.5 },
    });
    expect(JSON.parse(String(log.mock.calls[0][0]))).toMatchObject({
      event: 'model_call',
      kind: 'continuation',
      model: 'us.anthropic.claude-sonnet-4-20250514-v1:0',
      stopReason: 'end_turn',
      inputTokens: 120,
      outputTokens: 30,
      totalTokens: 150,
    });
  });

  it('lets transport errors through', async () => {
    const send = vi.fn(async (_command: ConverseCommand): Promise<ConverseCommandOutput> => {
      throw new Error('ThrottlingException');
    });
    const model = new BedrockModelClient({ send }, 'haiku');

    await expect(
      model.complete({ kind: 'opening', systemPrompt: 's', userPrompt: 'u', maxTokens: 10, temperature: 0 }),
    ).rejects.toThrow('ThrottlingException');
  });
});
