/**
 * Validation Types
 *
 * Issue records shared by the dependency tree and constituency tree
 * validators.
 *
 * @module validators/validation.types
 */

import type { DependencyTree } from "../dep2con/types.js";

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Dependency tree input errors
 */
export type DependencyTreeErrorCode =
  | "NO_ROOT"
  | "MULTIPLE_ROOTS"
  | "HEAD_OUT_OF_RANGE"
  | "SELF_ATTACHMENT"
  | "CYCLE_DETECTED"
  | "MISSING_LABEL"
  | "UNIT_OUT_OF_RANGE"
  | "UNIT_INDEX_MISMATCH"
  | "DUPLICATE_UNIT_REFERENCE"
  | "UNREFERENCED_UNIT";

/**
 * Constituency tree invariant errors
 */
export type ConstituencyErrorCode =
  | "LEAF_SPAN_MISMATCH"
  | "EDU_SPAN_NOT_UNION"
  | "EDU_SPAN_GAP"
  | "CHAR_SPAN_NOT_UNION"
  | "CHILD_SPAN_OVERLAP"
  | "ROOT_NUCLEARITY";

export type ValidationErrorCode = DependencyTreeErrorCode | ConstituencyErrorCode | "ZOD_VALIDATION_ERROR";

export type ValidationWarningCode = "UNIT_SPAN_OVERLAP" | "UNITS_NOT_IN_TEXT_ORDER";

// =============================================================================
// Validation Issue
// =============================================================================

export type ValidationSeverity = "error" | "warn";

export interface ValidationIssue {
  code: ValidationErrorCode | ValidationWarningCode;
  severity: ValidationSeverity;
  /** Human-readable message */
  message: string;
  /** Path to the issue location (e.g., 'heads[3]', 'tree.children[0]') */
  path?: string;
  /** Additional context for debugging */
  context?: Record<string, unknown>;
}

// =============================================================================
// Results
// =============================================================================

export interface DependencyTreeValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
  /** Parsed tree, present when valid */
  tree?: DependencyTree;
}
