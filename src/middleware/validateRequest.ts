import { z } from 'zod';
import { RequestValidationError, type ValidationIssue } from '../errors.js';

export type RequestLocation = 'path' | 'query' | 'body';

export const activityParamsSchema = z.object({
  activityName: z.string()
});

// A repeated query parameter arrives as an array; the last occurrence wins
const lastValue = (value: unknown): unknown =>
  Array.isArray(value) ? value[value.length - 1] : value;

export const participantQuerySchema = z.object({
  email: z.preprocess(
    lastValue,
    z.string({ required_error: 'Field required', invalid_type_error: 'Input should be a valid string' })
  )
});

export function toValidationIssues(error: z.ZodError, location: RequestLocation): ValidationIssue[] {
  return error.issues.map(issue => ({
    loc: [location, ...issue.path.map(String)],
    msg: issue.message,
    type: issue.code
  }));
}

/**
 * Parses one part of a request against a zod schema.
 * Throws a RequestValidationError (HTTP 422) listing every failing field.
 */
export function validateRequest<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  location: RequestLocation
): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new RequestValidationError(toValidationIssues(result.error, location));
  }
  return result.data;
}
