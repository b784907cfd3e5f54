import type { z } from 'zod';
import { fail, type GameResult } from '../types/result';
import {
  UPSTREAM_ERROR_STOP_REASONS,
  splitReasoningAndJson,
  type ModelClient,
} from '../lambda/shared/bedrock';
import {
  ChoicesResponseSchema,
  FIELD_LIMITS,
  FullMissionResponseSchema,
  MissionBriefingResponseSchema,
  NarrativeResponseSchema,
  OpeningResponseSchema,
  type ChoicesResponse,
  type FullMissionResponse,
  type GenerationKind,
  type MissionBriefingResponse,
  type NarrativeResponse,
  type OpeningResponse,
} from '../lambda/shared/generation-schemas';
import {
  buildPrompt,
  type ChoicesRequest,
  type ContinuationRequest,
  type CustomResponseRequest,
  type FullMissionRequest,
  type GenerationRequest,
  type MissionBriefingRequest,
  type OpeningRequest,
} from './prompts';

// ============================================
// Outcome types
// ============================================

export type GenerationErrorKind = 'GatewayUnavailable' | 'GatewayMalformedResponse';

export interface GenerationError {
  kind: GenerationErrorKind;
  message: string;
}

export type GenerationOutcome<T> =
  | { ok: true; data: T }
  | { ok: false; error: GenerationError };

export interface GatewayOptions {
  /** Upper bound on one model call */
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
}

/** A failed generation as the failure of a game operation. */
export function generationFailure<T>(error: GenerationError): GameResult<T> {
  return fail(error.kind, error.message);
}

class GenerationTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Generation timed out after ${timeoutMs}ms`);
    this.name = 'GenerationTimeoutError';
  }
}

/**
 * Content Generation Gateway
 *
 * Turns a typed generation request into a validated payload. One model call
 * per request, bounded by the configured timeout; never retries and never
 * throws. Every failure comes back as a GenerationOutcome the caller can
 * pass straight into its own result.
 *
 * Over-long string fields are cut to their limit before validation (see
 * FIELD_LIMITS) and logged; they are not an error.
 */
export class ContentGateway {
  constructor(
    private readonly model: ModelClient,
    private readonly options: GatewayOptions,
  ) {}

  generateFullMission(request: FullMissionRequest): Promise<GenerationOutcome<FullMissionResponse>> {
    return this.run(request, FullMissionResponseSchema);
  }

  generateMissionBriefing(request: MissionBriefingRequest): Promise<GenerationOutcome<MissionBriefingResponse>> {
    return this.run(request, MissionBriefingResponseSchema);
  }

  generateOpening(request: OpeningRequest): Promise<GenerationOutcome<OpeningResponse>> {
    return this.run(request, OpeningResponseSchema);
  }

  generateChoices(request: ChoicesRequest): Promise<GenerationOutcome<ChoicesResponse>> {
    return this.run(request, ChoicesResponseSchema);
  }

  generateContinuation(request: ContinuationRequest): Promise<GenerationOutcome<NarrativeResponse>> {
    return this.run(request, NarrativeResponseSchema);
  }

  generateCustomResponse(request: CustomResponseRequest): Promise<GenerationOutcome<NarrativeResponse>> {
    return this.run(request, NarrativeResponseSchema);
  }

  private async run<T>(
    request: GenerationRequest,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<GenerationOutcome<T>> {
    const { kind } = request;
    const { systemPrompt, userPrompt } = buildPrompt(request);

    let text: string;
    try {
      const response = await withTimeout(
        this.model.complete({
          kind,
          systemPrompt,
          userPrompt,
          maxTokens: this.options.maxTokens,
          temperature: this.options.temperature,
        }),
        this.options.timeoutMs,
      );
      if (response.stopReason && UPSTREAM_ERROR_STOP_REASONS.has(response.stopReason)) {
        return failed(kind, 'GatewayUnavailable', `Generation stopped upstream: ${response.stopReason}`);
      }
      text = response.text;
    } catch (error) {
      return failed(kind, 'GatewayUnavailable', error instanceof Error ? error.message : String(error));
    }

    if (!text.trim()) {
      return failed(kind, 'GatewayMalformedResponse', 'Empty response from model');
    }

    const { jsonStr } = splitReasoningAndJson(text);
    let raw: unknown;
    try {
      raw = JSON.parse(jsonStr);
    } catch (error) {
      return failed(
        kind,
        'GatewayMalformedResponse',
        `Response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    // Some upstreams answer with a JSON error envelope instead of content
    if (isRecord(raw) && 'error' in raw) {
      return failed(kind, 'GatewayUnavailable', `Upstream reported an error: ${JSON.stringify(raw.error)}`);
    }

    const truncated = truncateFields(raw, FIELD_LIMITS[kind], kind);
    const parsed = schema.safeParse(truncated);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
        .join('; ');
      return failed(kind, 'GatewayMalformedResponse', `Response failed validation: ${issues}`);
    }

    return { ok: true, data: parsed.data };
  }
}

// ============================================
// Truncation
// ============================================

/**
 * Returns a copy of `value` with every string field named in `limits` cut
 * to exactly its limit, at any depth. Logs one `field_truncated` line per
 * cut. Strings at or under the limit and unlisted fields pass unchanged.
 */
export function truncateFields(
  value: unknown,
  limits: Readonly<Record<string, number>>,
  kind: GenerationKind,
  path = '',
): unknown {
  if (Array.isArray(value)) {
    return value.map((item, i) => truncateFields(item, limits, kind, `${path}[${i}]`));
  }
  if (!isRecord(value)) return value;

  const out: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(value)) {
    const fieldPath = path ? `${path}.${key}` : key;
    const limit = limits[key];
    // Lengths count code points, so a cut never splits a surrogate pair
    const chars = typeof field === 'string' && limit !== undefined ? Array.from(field) : undefined;
    if (chars && limit !== undefined && chars.length > limit) {
      console.warn(
        JSON.stringify({
          event: 'field_truncated',
          kind,
          field: fieldPath,
          originalLength: chars.length,
          truncatedLength: limit,
        }),
      );
      out[key] = chars.slice(0, limit).join('');
    } else {
      out[key] = truncateFields(field, limits, kind, fieldPath);
    }
  }
  return out;
}

// ============================================
// Helpers
// ============================================

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new GenerationTimeoutError(timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function failed<T>(kind: GenerationKind, errorKind: GenerationErrorKind, message: string): GenerationOutcome<T> {
  console.error(JSON.stringify({ event: 'generation_failed', kind, errorKind, message }));
  return { ok: false, error: { kind: errorKind, message } };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
