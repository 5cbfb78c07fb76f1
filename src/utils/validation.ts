import { z } from 'zod';
import { ValidationError } from './errors';

const nonBlank = z.string().trim().min(1);

/** Wiki language codes such as `en`, `pt-br` or `zh-min-nan`. */
export const languageCodeSchema = z
  .string()
  .trim()
  .regex(/^[a-z]{2,8}(-[a-z0-9]{1,8})*$/i, 'must be a language code');

export const parsedDateInfoSchema = z.object({
  originalText: z.string(),
  displayText: z.string(),
  precision: z.enum(['day', 'month', 'year', 'decade', 'century', 'millennium', 'era', 'unknown']),
  startYear: z.number().int().nullable().optional(),
  startMonth: z.number().int().min(1).max(12).nullable().optional(),
  startDay: z.number().int().min(1).max(31).nullable().optional(),
  endYear: z.number().int().nullable().optional(),
  endMonth: z.number().int().min(1).max(12).nullable().optional(),
  endDay: z.number().int().min(1).max(31).nullable().optional(),
  isBce: z.boolean(),
});

export const entityRequestSchema = z.object({
  name: nonBlank,
  entityType: nonBlank,
  language: languageCodeSchema,
});

export const sourceDocumentMetadataSchema = z.object({
  title: nonBlank,
  language: languageCodeSchema,
  sourceType: nonBlank,
  url: z.string().trim().min(1).optional(),
  pageId: z.union([z.string(), z.number()]).transform(String).optional(),
  textContent: z.string().optional(),
});

export const extractedEventSchema = z.object({
  description: nonBlank,
  dateStr: nonBlank,
  dateInfo: z.record(z.unknown()).nullable().optional(),
  sourceTextSnippet: z.string().nullable().optional(),
  entityIds: z.array(z.string().uuid()).default([]),
});

/**
 * Parse `value` with `schema`, turning zod issues into a ValidationError
 * whose message lists each failing path.
 */
export function parseInput<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  label: string
): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new ValidationError(`Invalid ${label}: ${issues.join('; ')}`);
  }
  return result.data;
}

/**
 * Date info is advisory: a malformed payload is kept as-is and only reported.
 */
export function checkDateInfo(value: unknown): { valid: boolean; errors: string[] } {
  if (value === null || value === undefined) {
    return { valid: true, errors: [] };
  }
  const result = parsedDateInfoSchema.safeParse(value);
  if (result.success) {
    return { valid: true, errors: [] };
  }
  return {
    valid: false,
    errors: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
  };
}

export function assertNotBlank(value: string | null | undefined, field: string): string {
  if (value === null || value === undefined || value.trim().length === 0) {
    throw new ValidationError(`${field} cannot be empty or contain only whitespace`);
  }
  return value;
}
