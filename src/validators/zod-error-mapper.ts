/**
 * Zod Error Mapper
 *
 * Converts Zod validation errors to the ValidationIssue format.
 *
 * @module validators/zod-error-mapper
 */

import { ZodError, type ZodIssue } from "zod";
import type { ValidationIssue } from "./validation.types.js";

/**
 * Convert Zod path to a JSON pointer-style string.
 * e.g., ["units", 0, "span"] → "units[0].span"
 */
export function formatZodPath(path: readonly (string | number)[]): string {
  return path.reduce<string>((acc, segment, index) => {
    if (typeof segment === "number") {
      return `${acc}[${segment}]`;
    }
    return index === 0 ? segment : `${acc}.${segment}`;
  }, "");
}

function zodIssueToValidationIssue(issue: ZodIssue): ValidationIssue {
  return {
    code: "ZOD_VALIDATION_ERROR",
    severity: "error",
    message: issue.message,
    path: formatZodPath(issue.path),
    context: { zodCode: issue.code },
  };
}

export function zodToValidationErrors(error: ZodError): ValidationIssue[] {
  return error.issues.map(zodIssueToValidationIssue);
}

export function isZodError(error: unknown): error is ZodError {
  return error instanceof ZodError;
}
