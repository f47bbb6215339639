/**
 * Dependency Tree Validator
 *
 * Validates corpus-reader input: shape through Zod, then the structural
 * invariants the tree builder relies on (one real root, heads in range,
 * no cycles, labelled attachments, one node per unit).
 *
 * @module validators/dependency-tree-validator
 */

import { positionOf } from "../dep2con/dependency-tree.js";
import { FAKE_ROOT, type DependencyTree } from "../dep2con/types.js";
import { DependencyTreeInput } from "../schemas/dependency-tree.js";
import { StructuralError } from "../utils/errors.js";
import { log } from "../utils/telemetry.js";
import type { DependencyTreeValidationResult, ValidationIssue } from "./validation.types.js";
import { zodToValidationErrors } from "./zod-error-mapper.js";

// =============================================================================
// Structural checks
// =============================================================================

function validateHeads(tree: DependencyTree): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const count = tree.heads.length;

  for (let node = 1; node < count; node++) {
    const head = tree.heads[node];
    if (head < 0 || head >= count) {
      issues.push({
        code: "HEAD_OUT_OF_RANGE",
        severity: "error",
        message: `Node ${node} attaches to unknown node ${head}`,
        path: `heads[${node}]`,
        context: { node, head },
      });
    } else if (head === node) {
      issues.push({
        code: "SELF_ATTACHMENT",
        severity: "error",
        message: `Node ${node} attaches to itself`,
        path: `heads[${node}]`,
        context: { node },
      });
    }

    if (tree.labels[node] === null) {
      issues.push({
        code: "MISSING_LABEL",
        severity: "error",
        message: `Attachment of node ${node} has no relation label`,
        path: `labels[${node}]`,
        context: { node },
      });
    }

    const position = positionOf(tree, node);
    if (position < 0 || position >= tree.units.length) {
      issues.push({
        code: "UNIT_OUT_OF_RANGE",
        severity: "error",
        message: `Node ${node} maps to missing unit ${position}`,
        path: tree.idx ? `idx[${node}]` : `units`,
        context: { node, position },
      });
    }
  }

  return issues;
}

/**
 * Units must sit at their own index, and nodes must map one-to-one onto
 * them. Out-of-range positions are left to `validateHeads`.
 */
function validateUnits(tree: DependencyTree): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  tree.units.forEach((unit, position) => {
    if (unit.index !== position) {
      issues.push({
        code: "UNIT_INDEX_MISMATCH",
        severity: "error",
        message: `Unit at position ${position} has index ${unit.index}`,
        path: `units[${position}].index`,
        context: { position, index: unit.index },
      });
    }
  });

  const owners = new Map<number, number>();
  for (let node = 1; node < tree.heads.length; node++) {
    const position = positionOf(tree, node);
    if (position < 0 || position >= tree.units.length) continue;

    const owner = owners.get(position);
    if (owner === undefined) {
      owners.set(position, node);
    } else {
      issues.push({
        code: "DUPLICATE_UNIT_REFERENCE",
        severity: "error",
        message: `Nodes ${owner} and ${node} both map to unit ${position}`,
        path: `idx[${node}]`,
        context: { nodes: [owner, node], position },
      });
    }
  }

  for (let position = 0; position < tree.units.length; position++) {
    if (!owners.has(position)) {
      issues.push({
        code: "UNREFERENCED_UNIT",
        severity: "error",
        message: `Unit ${position} belongs to no node`,
        path: `units[${position}]`,
        context: { position },
      });
    }
  }

  return issues;
}

function validateRoots(tree: DependencyTree): ValidationIssue[] {
  const roots: number[] = [];
  for (let node = 1; node < tree.heads.length; node++) {
    if (tree.heads[node] === FAKE_ROOT) roots.push(node);
  }

  if (roots.length === 0) {
    return [{ code: "NO_ROOT", severity: "error", message: "No node attaches to the fake root", path: "heads" }];
  }
  if (roots.length > 1) {
    return [
      {
        code: "MULTIPLE_ROOTS",
        severity: "error",
        message: `Multiple real roots: ${roots.join(", ")}`,
        path: "heads",
        context: { roots },
      },
    ];
  }
  return [];
}

/**
 * Follow head links from every node; a walk that comes back to a node of
 * its own path is a cycle.
 */
function validateAcyclic(tree: DependencyTree): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const count = tree.heads.length;
  // 0 = unvisited, 1 = on current path, 2 = known to reach the fake root or a bad head
  const state = new Array<number>(count).fill(0);
  state[FAKE_ROOT] = 2;

  for (let start = 1; start < count; start++) {
    const path: number[] = [];
    let node = start;
    while (node > 0 && node < count && state[node] === 0) {
      state[node] = 1;
      path.push(node);
      node = tree.heads[node];
    }

    if (node > 0 && node < count && state[node] === 1) {
      const cycle = path.slice(path.indexOf(node));
      issues.push({
        code: "CYCLE_DETECTED",
        severity: "error",
        message: `Attachment cycle through nodes ${cycle.join(", ")}`,
        path: `heads[${node}]`,
        context: { nodes: cycle },
      });
    }
    for (const visited of path) state[visited] = 2;
  }

  return issues;
}

function structuralErrors(tree: DependencyTree): ValidationIssue[] {
  return [...validateHeads(tree), ...validateUnits(tree), ...validateRoots(tree), ...validateAcyclic(tree)];
}

function validateUnitOrder(tree: DependencyTree): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const units = tree.units;

  for (let i = 1; i < units.length; i++) {
    if (units[i].span.start < units[i - 1].span.start) {
      issues.push({
        code: "UNITS_NOT_IN_TEXT_ORDER",
        severity: "warn",
        message: `Unit ${i} starts before unit ${i - 1}`,
        path: `units[${i}]`,
      });
    }
  }

  const sorted = [...units].sort((a, b) => a.span.start - b.span.start);
  for (let i = 1; i < sorted.length; i++) {
    if (sorted[i].span.start < sorted[i - 1].span.end) {
      issues.push({
        code: "UNIT_SPAN_OVERLAP",
        severity: "warn",
        message: `Units ${sorted[i - 1].index} and ${sorted[i].index} overlap`,
        context: { units: [sorted[i - 1].index, sorted[i].index] },
      });
    }
  }

  return issues;
}

// =============================================================================
// Entry points
// =============================================================================

/**
 * Validate raw dependency tree input.
 */
export function validateDependencyTree(raw: unknown): DependencyTreeValidationResult {
  const parsed = DependencyTreeInput.safeParse(raw);
  if (!parsed.success) {
    return { valid: false, errors: zodToValidationErrors(parsed.error), warnings: [] };
  }

  const tree: DependencyTree = parsed.data;
  const errors = structuralErrors(tree);
  const warnings = validateUnitOrder(tree);

  if (errors.length > 0) {
    log.debug({ documentId: tree.id, errors: errors.map((e) => e.code) }, "Dependency tree failed validation");
    return { valid: false, errors, warnings };
  }
  return { valid: true, errors, warnings, tree };
}

/**
 * Parse raw dependency tree input.
 *
 * @throws ZodError when the input does not have the expected shape
 * @throws StructuralError when the tree breaks a structural invariant
 */
export function parseDependencyTree(raw: unknown): DependencyTree {
  const tree: DependencyTree = DependencyTreeInput.parse(raw);
  const errors = structuralErrors(tree);
  if (errors.length > 0) {
    throw new StructuralError(
      `Invalid dependency tree: ${errors.map((issue) => issue.message).join("; ")}`,
      "INVALID_TREE",
      { documentId: tree.id, issues: errors }
    );
  }
  return tree;
}
