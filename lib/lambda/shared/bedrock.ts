import {
  ConverseCommand,
  type ContentBlock,
  type ConverseCommandOutput,
  type TokenUsage,
} from '@aws-sdk/client-bedrock-runtime';
import type { GenerationKind, GenerationModelConfig } from './generation-schemas';

// ============================================
// Model Shortcuts (US inference profiles)
// ============================================

/** Short names -> full Bedrock inference profile IDs. */
export const MODEL_SHORTCUTS: Record<string, string> = {
  haiku: 'us.anthropic.claude-haiku-4-5-20251001-v1:0',
  sonnet: 'us.anthropic.claude-sonnet-4-5-20250929-v1:0',
  sonnet4: 'us.anthropic.claude-sonnet-4-20250514-v1:0',
  opus: 'us.anthropic.claude-opus-4-6-v1',
  opus45: 'us.anthropic.claude-opus-4-5-20251101-v1:0',
  opus41: 'us.anthropic.claude-opus-4-1-20250805-v1:0',
};

function expandModelId(idOrShortcut: string): string {
  const lower = idOrShortcut.toLowerCase().trim();
  return MODEL_SHORTCUTS[lower] ?? idOrShortcut;
}

// ============================================
// Model Resolution
// ============================================

/**
 * Resolve which Bedrock model ID to use for a request kind.
 *
 * Priority (highest first):
 *   1. Per-kind override in modelConfig.kinds[kind]
 *   2. modelConfig.default
 *   3. The configured default model
 *
 * Both full inference profile IDs and shortcuts (e.g. "haiku", "sonnet") are accepted.
 */
export function resolveModelId(
  kind: GenerationKind,
  defaultModelId: string,
  modelConfig?: GenerationModelConfig,
): string {
  const raw =
    modelConfig?.kinds?.[kind]
    ?? modelConfig?.default
    ?? defaultModelId;
  return expandModelId(raw);
}

// ============================================
// ModelClient: the transport seam
// ============================================

export interface ModelRequest {
  /** Request kind, for model resolution and logging */
  kind: GenerationKind;
  /** System prompt providing context and instructions */
  systemPrompt: string;
  /** User message with the specific generation request */
  userPrompt: string;
  maxTokens: number;
  temperature: number;
}

export interface ModelResponse {
  /** Raw text of the model's reply */
  text: string;
  /** The model ID that was actually used */
  modelId: string;
  /** Why generation stopped, as the upstream reports it */
  stopReason?: string;
}

/**
 * Sends one prompt to a text model and returns its raw reply. Throws on
 * transport errors; interpreting the reply is the gateway's job.
 */
export interface ModelClient {
  complete(request: ModelRequest): Promise<ModelResponse>;
}

/** Stop reasons that mean the upstream refused or aborted the generation. */
export const UPSTREAM_ERROR_STOP_REASONS: ReadonlySet<string> = new Set([
  'guardrail_intervened',
  'content_filtered',
]);

/** The part of BedrockRuntimeClient this module calls. */
export interface ConverseSender {
  send(command: ConverseCommand): Promise<ConverseCommandOutput>;
}

/**
 * ModelClient over the Bedrock Converse API. One call per request, no
 * retries.
 */
export class BedrockModelClient implements ModelClient {
  constructor(
    private readonly client: ConverseSender,
    private readonly defaultModelId: string,
    private readonly modelConfig?: GenerationModelConfig,
  ) {}

  async complete(request: ModelRequest): Promise<ModelResponse> {
    const { kind, systemPrompt, userPrompt, maxTokens, temperature } = request;
    const modelId = resolveModelId(kind, this.defaultModelId, this.modelConfig);
    const startMs = Date.now();

    const response = await this.client.send(
      new ConverseCommand({
        modelId,
        system: [{ text: systemPrompt }],
        messages: [{ role: 'user', content: [{ text: userPrompt }] }],
        inferenceConfig: {
          maxTokens,
          temperature,
        },
      }),
    );

    logCall({
      kind,
      modelId,
      latencyMs: Date.now() - startMs,
      usage: response.usage,
      stopReason: response.stopReason,
    });

    return {
      text: extractText(response.output?.message?.content),
      modelId,
      stopReason: response.stopReason,
    };
  }
}

// ============================================
// Logging
// ============================================

interface LogCallParams {
  kind: GenerationKind;
  modelId: string;
  latencyMs: number;
  usage?: TokenUsage;
  stopReason?: string;
}

function logCall(params: LogCallParams): void {
  const { kind, modelId, latencyMs, usage, stopReason } = params;
  console.log(
    JSON.stringify({
      event: 'model_call',
      kind,
      model: modelId,
      latencyMs,
      stopReason: stopReason ?? null,
      inputTokens: usage?.inputTokens ?? null,
      outputTokens: usage?.outputTokens ?? null,
      totalTokens: usage?.totalTokens ?? null,
    }),
  );
}

// ============================================
// Helpers
// ============================================

/** Extract text content from Bedrock Converse response content blocks */
function extractText(content?: ContentBlock[]): string {
  if (!content) return '';
  return content
    .map((block) => {
      if ('text' in block && typeof block.text === 'string') return block.text;
      return '';
    })
    .join('');
}

/**
 * Split a model response into any preamble and the JSON content.
 *
 * Models sometimes wrap the JSON in a markdown fence or lead with a sentence
 * of commentary. Everything before the JSON is returned as the preamble.
 */
export function splitReasoningAndJson(text: string): { reasoning: string; jsonStr: string } {
  // Markdown-fenced JSON block; everything before the fence is reasoning
  const fenceMatch = text.match(/^([\s\S]*?)```(?:json)?\s*\n?([\s\S]*?)```/);
  if (fenceMatch) {
    return {
      reasoning: fenceMatch[1].trim(),
      jsonStr: fenceMatch[2].trim(),
    };
  }

  // Try to find the first { or [ that starts the JSON
  const objectStart = text.indexOf('{');
  const arrayStart = text.indexOf('[');

  let jsonStart = -1;
  if (objectStart >= 0 && arrayStart >= 0) {
    jsonStart = Math.min(objectStart, arrayStart);
  } else if (objectStart >= 0) {
    jsonStart = objectStart;
  } else if (arrayStart >= 0) {
    jsonStart = arrayStart;
  }

  if (jsonStart > 0) {
    const reasoning = text.slice(0, jsonStart).trim();
    const jsonStr = text.slice(jsonStart).trim();
    return { reasoning, jsonStr };
  }

  // No preamble found, so the whole text should be JSON
  return { reasoning: '', jsonStr: text.trim() };
}
