import { ZodError } from "zod";

/**
 * Error codes for structured error records
 */
export type ErrorCode =
  | "BAD_INPUT"
  | "CONFIGURATION"
  | "PRECONDITION"
  | "STRUCTURAL"
  | "INVARIANT"
  | "INTERNAL";

export type ConfigurationErrorCode = "UNKNOWN_STRATEGY" | "INVALID_CONFIG";

export type PreconditionErrorCode =
  | "MISSING_SENTENCES"
  | "MISSING_NUCLEARITY"
  | "MISSING_RANKS"
  | "NOT_FITTED";

export type StructuralErrorCode =
  | "NO_ROOT"
  | "MULTIPLE_ROOTS"
  | "SPAN_OVERLAP"
  | "UNREACHABLE_NODES"
  | "INVALID_TREE";

export type InvariantErrorCode = "RANK_NOT_PERMUTATION";

/**
 * Identifying details attached to an error (offending node, head, roots...)
 */
export type ErrorContext = Record<string, unknown>;

/**
 * Base class for conversion failures.
 *
 * Every failure aborts the conversion of the tree at hand; callers decide
 * whether to skip the document or stop.
 */
export abstract class Dep2ConError extends Error {
  abstract readonly category: ErrorCode;
  abstract readonly code: string;

  constructor(message: string, public readonly context: ErrorContext = {}) {
    super(message);
    this.name = new.target.name;
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): { name: string; code: string; message: string; context: ErrorContext } {
    return { name: this.name, code: this.code, message: this.message, context: this.context };
  }
}

/**
 * Unknown strategy name or invalid environment configuration.
 * Raised when a component is constructed, never at prediction time.
 */
export class ConfigurationError extends Dep2ConError {
  readonly category = "CONFIGURATION" as const;

  constructor(message: string, public readonly code: ConfigurationErrorCode, context: ErrorContext = {}) {
    super(message, context);
  }
}

/**
 * Input lacks data the requested operation depends on.
 */
export class PreconditionError extends Dep2ConError {
  readonly category = "PRECONDITION" as const;

  constructor(message: string, public readonly code: PreconditionErrorCode, context: ErrorContext = {}) {
    super(message, context);
  }
}

/**
 * Dependency tree cannot be turned into a constituency tree.
 */
export class StructuralError extends Dep2ConError {
  readonly category = "STRUCTURAL" as const;

  constructor(message: string, public readonly code: StructuralErrorCode, context: ErrorContext = {}) {
    super(message, context);
  }
}

/**
 * Internal postcondition failed. Unreachable on valid input.
 */
export class InvariantViolation extends Dep2ConError {
  readonly category = "INVARIANT" as const;

  constructor(message: string, public readonly code: InvariantErrorCode, context: ErrorContext = {}) {
    super(message, context);
  }
}

/**
 * Structured error record (error.v1 schema)
 */
export interface ErrorV1 {
  schema: "error.v1";
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  document_id?: string;
}

/**
 * Build a structured error record
 */
export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  documentId?: string
): ErrorV1 {
  const error: ErrorV1 = {
    schema: "error.v1",
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  if (documentId) {
    error.document_id = documentId;
  }

  return error;
}

/**
 * Convert Zod validation error to ErrorV1
 */
export function zodErrorToErrorV1(error: ZodError, documentId?: string): ErrorV1 {
  return buildErrorV1(
    "BAD_INPUT",
    "Validation failed",
    {
      validation_errors: error.flatten(),
    },
    documentId
  );
}

/**
 * Convert any thrown value to ErrorV1
 *
 * @param error The error to convert
 * @param documentId Optional id of the document being converted
 */
export function toErrorV1(error: unknown, documentId?: string): ErrorV1 {
  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error, documentId);
  }

  if (error instanceof Dep2ConError) {
    return buildErrorV1(
      error.category,
      error.message,
      { reason: error.code, ...error.context },
      documentId
    );
  }

  if (error instanceof Error) {
    return buildErrorV1("INTERNAL", error.message || "An unexpected error occurred", undefined, documentId);
  }

  return buildErrorV1("INTERNAL", "An unexpected error occurred", undefined, documentId);
}

export function isDep2ConError(error: unknown): error is Dep2ConError {
  return error instanceof Dep2ConError;
}
