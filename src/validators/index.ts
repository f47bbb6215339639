/**
 * Validators module
 *
 * Deterministic validation of dependency tree input and constituency tree
 * output.
 */

export { validateDependencyTree, parseDependencyTree } from "./dependency-tree-validator.js";

export { checkConstituencyTree, leavesOf } from "./constituency-validator.js";

export { zodToValidationErrors, isZodError, formatZodPath } from "./zod-error-mapper.js";

export {
  type ValidationIssue,
  type ValidationErrorCode,
  type ValidationWarningCode,
  type ValidationSeverity,
  type DependencyTreeErrorCode,
  type ConstituencyErrorCode,
  type DependencyTreeValidationResult,
} from "./validation.types.js";
