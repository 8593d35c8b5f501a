import type { z } from 'zod';
import { InvalidParameterError } from '../errors.js';
import { msg, type ErrKey } from '../lib/error-messages.js';

export interface FieldIssue {
  path: string;
  message: string;
}

/**
 * Parses request input against a zod schema. Failures become
 * InvalidParameterError so they share the engine's 400 response shape.
 */
export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  messageKey: ErrKey = 'BAD_INPUT_SCHEMA'
): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues: FieldIssue[] = result.error.issues.map((issue) => ({
      path: issue.path.join('.') || '/',
      message: issue.message,
    }));
    throw new InvalidParameterError(msg(messageKey), { details: { issues } });
  }
  return result.data;
}

export const parseBody = <S extends z.ZodTypeAny>(schema: S, value: unknown) => parseInput(schema, value, 'BAD_INPUT_SCHEMA');
export const parseQuery = <S extends z.ZodTypeAny>(schema: S, value: unknown) => parseInput(schema, value, 'BAD_QUERY_PARAMS');
