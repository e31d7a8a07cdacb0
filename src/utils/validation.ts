/**
 * School Data MCP - Zod Validation Schemas
 *
 * Input validation for both MCP tools. Each schema includes:
 * - Type validation
 * - Constraint validation
 * - Descriptive error messages
 *
 * @module utils/validation
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @param schema - Zod schema to validate against
 * @param input - Input value to validate
 * @returns Validated and typed input data
 * @throws ValidationError with descriptive message if validation fails
 */
export function validateInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// RELATIONAL QUERY SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Schema for query_schools_and_neighborhoods
 */
export const NeighborhoodQueryInput = z.object({
  query: z
    .string({ required_error: 'query is required' })
    .min(1, 'query must not be empty'),
});

// ═══════════════════════════════════════════════════════════════════════════════
// WEBSITE SEARCH SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Schema for query_school_websites.
 * Blank questions are rejected again by the search executor after trimming.
 */
export const WebsiteSearchInput = z.object({
  question: z
    .string({ required_error: 'question is required' })
    .min(1, 'question must not be empty'),
  school_name: z.string().nullish(),
});
