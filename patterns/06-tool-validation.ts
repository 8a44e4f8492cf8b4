/**
 * Pattern 3.3: Tool Validation
 *
 * Never hand model output straight to a tool. Coerce it into the shape the
 * tool expects, and when that is impossible, say exactly which field is
 * wrong so the proposer can correct itself.
 *
 * Models routinely send "3" where 3 is expected, so integer fields accept
 * numeric strings. Anything else that is not an integer is rejected, and so
 * is an integer too large to be represented exactly.
 */

import { z } from 'zod';

const NUMERIC_STRING = /^\s*[+-]?\d+\s*$/;

function numericStringToNumber(value: unknown): unknown {
  return typeof value === 'string' && NUMERIC_STRING.test(value) ? Number(value) : value;
}

const integerMessages = {
  required_error: 'is required',
  invalid_type_error: 'expected an integer',
};

export const nonNegativeInteger = z.preprocess(
  numericStringToNumber,
  z
    .number(integerMessages)
    .int('expected an integer')
    .safe('is out of range')
    .min(0, 'must be 0 or greater')
);

export const positiveInteger = z.preprocess(
  numericStringToNumber,
  z
    .number(integerMessages)
    .int('expected an integer')
    .safe('is out of range')
    .min(1, 'must be 1 or greater')
);

export const identifier = z
  .string({ required_error: 'is required', invalid_type_error: 'expected a string' })
  .trim()
  .min(1, 'must not be empty');

export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; issues: string[] };

/**
 * Format zod issues as "<path>: <message>" lines.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}

export function validate<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown
): ValidationResult<z.output<S>> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return { valid: true, value: parsed.data };
  }
  return { valid: false, issues: formatIssues(parsed.error) };
}
