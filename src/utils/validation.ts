/**
 * Zod validation helpers
 *
 * @module utils/validation
 */

import { z } from 'zod';

/**
 * Input that does not match its zod schema
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Render zod issues as "path: message; path: message"
 */
export function formatIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    })
    .join('; ');
}

/**
 * Parse untyped input (a fetched record, a config file) or throw.
 * The loader maps ValidationError to INVALID_RECORD.
 */
export function validateInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(formatIssues(result.error));
  }
  return result.data;
}
