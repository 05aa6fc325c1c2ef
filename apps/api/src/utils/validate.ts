import type { Context } from 'hono';
import type { z } from 'zod';
import { createBadRequestError, errorMessage } from '../lib/errors.js';

/** Parses and validates a JSON body, throwing a 400 that names every failing field. */
export const parseBody = async <T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.output<T>> => {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch (err) {
    throw createBadRequestError(`Request body must be valid JSON: ${errorMessage(err)}`);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`)
      .join('; ');
    throw createBadRequestError(`Invalid request body: ${issues}`);
  }
  return parsed.data;
};
