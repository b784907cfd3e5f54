import type { APIGatewayProxyEvent } from 'aws-lambda';
import type { z } from 'zod';

export type Parsed<T> = { ok: true; value: T } | { ok: false; message: string };

/** Parses and validates a JSON request body. A missing body validates as `{}`. */
export function parseBody<T>(event: APIGatewayProxyEvent, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Parsed<T> {
  let raw: unknown;
  try {
    raw = event.body ? JSON.parse(event.body) : {};
  } catch {
    return { ok: false, message: 'Request body must be valid JSON' };
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    return {
      ok: false,
      message: parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; '),
    };
  }
  return { ok: true, value: parsed.data };
}

export function pathParam(event: APIGatewayProxyEvent, name: string): string | undefined {
  const value = event.pathParameters?.[name]?.trim();
  return value ? value : undefined;
}
