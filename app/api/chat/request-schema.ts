import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';

export const DEFAULT_THREAD_ID = '1';

const threadIdSchema = z
  .union([z.string().trim().min(1), z.number()])
  .transform((value) => String(value))
  .default(DEFAULT_THREAD_ID);

export const chatRequestSchema = z.object({
  message: z.string({ required_error: 'Message is required' }).trim().min(1, 'Message is required'),
  thread_id: threadIdSchema,
});

export const clearRequestSchema = z.object({
  thread_id: threadIdSchema,
});

export type ParsedBody<T> = { ok: true; data: T } | { ok: false; response: NextResponse };

/**
 * Read and validate a JSON body. An empty body counts as `{}`.
 */
export async function parseJsonBody<S extends z.ZodTypeAny>(
  request: NextRequest,
  schema: S,
): Promise<ParsedBody<z.output<S>>> {
  const text = await request.text();

  let body: unknown = {};
  if (text.trim() !== '') {
    try {
      body = JSON.parse(text);
    } catch {
      return { ok: false, response: NextResponse.json({ error: 'Request body must be valid JSON' }, { status: 400 }) };
    }
  }

  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    const message = parsed.error.issues[0]?.message ?? 'Invalid request';
    return { ok: false, response: NextResponse.json({ error: message }, { status: 400 }) };
  }
  return { ok: true, data: parsed.data };
}
