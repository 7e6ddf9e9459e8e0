/**
 * @fileoverview Zod validation helpers
 */

import type { ZodError, ZodType, ZodTypeDef } from 'zod';
import { ValidationError, type ValidationIssue } from '../errors/errors.js';
import { ErrorCodes, type ErrorCode } from '../errors/codes.js';

/**
 * Convert a Zod error to validation issues
 */
export function zodErrorToIssues(error: ZodError): ValidationIssue[] {
  return error.errors.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Format validation issues into a human-readable message
 */
export function formatValidationMessage(issues: ValidationIssue[]): string {
  return issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ');
}

/**
 * Parse `input` with `schema`, throwing a ValidationError that lists every issue
 */
export function parseWithSchema<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  input: unknown,
  label: string,
  code: ErrorCode = ErrorCodes.VALIDATION_FAILED
): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = zodErrorToIssues(result.error);
    throw new ValidationError(`Invalid ${label}: ${formatValidationMessage(issues)}`, { code, issues });
  }
  return result.data;
}
