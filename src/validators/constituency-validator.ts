/**
 * Constituency Tree Validator
 *
 * Checks the span invariants of a built constituency tree: leaves cover
 * exactly their unit, every branch covers the union of its two children,
 * and the children are contiguous and do not overlap.
 *
 * @module validators/constituency-validator
 */

import { mergeSpans, spansEqual, spansOverlap } from "../dep2con/span.js";
import type { ConstituencyTree, ConstituentLeaf } from "../dep2con/types.js";
import type { ValidationIssue } from "./validation.types.js";

function checkNode(node: ConstituencyTree, path: string, isTop: boolean, issues: ValidationIssue[]): void {
  if ((node.nuclearity === "Root") !== isTop) {
    issues.push({
      code: "ROOT_NUCLEARITY",
      severity: "error",
      message: isTop ? "Top node must have Root nuclearity" : "Only the top node may have Root nuclearity",
      path,
      context: { nuclearity: node.nuclearity },
    });
  }

  if (node.kind === "leaf") {
    const { index, span } = node.unit;
    if (node.eduSpan[0] !== index || node.eduSpan[1] !== index || !spansEqual(node.charSpan, span)) {
      issues.push({
        code: "LEAF_SPAN_MISMATCH",
        severity: "error",
        message: `Leaf spans do not match unit ${index}`,
        path,
        context: { eduSpan: node.eduSpan, charSpan: node.charSpan, unit: node.unit },
      });
    }
    return;
  }

  const [left, right] = node.children;

  if (left.eduSpan[1] + 1 !== right.eduSpan[0]) {
    issues.push({
      code: "EDU_SPAN_GAP",
      severity: "error",
      message: `Children cover units ${left.eduSpan.join("-")} and ${right.eduSpan.join("-")}`,
      path,
    });
  }
  if (node.eduSpan[0] !== left.eduSpan[0] || node.eduSpan[1] !== right.eduSpan[1]) {
    issues.push({
      code: "EDU_SPAN_NOT_UNION",
      severity: "error",
      message: `Unit span ${node.eduSpan.join("-")} is not the union of its children`,
      path,
    });
  }
  if (spansOverlap(left.charSpan, right.charSpan) || left.charSpan.start > right.charSpan.start) {
    issues.push({
      code: "CHILD_SPAN_OVERLAP",
      severity: "error",
      message: "Children overlap or are out of text order",
      path,
      context: { left: left.charSpan, right: right.charSpan },
    });
  }
  if (!spansEqual(node.charSpan, mergeSpans(left.charSpan, right.charSpan))) {
    issues.push({
      code: "CHAR_SPAN_NOT_UNION",
      severity: "error",
      message: "Character span is not the union of its children",
      path,
      context: { charSpan: node.charSpan },
    });
  }

  checkNode(left, `${path}.children[0]`, false, issues);
  checkNode(right, `${path}.children[1]`, false, issues);
}

/**
 * Check a constituency tree; an empty result means every invariant holds.
 */
export function checkConstituencyTree(tree: ConstituencyTree): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  checkNode(tree, "tree", true, issues);
  return issues;
}

/**
 * Leaves in left-to-right order.
 */
export function leavesOf(tree: ConstituencyTree): ConstituentLeaf[] {
  if (tree.kind === "leaf") return [tree];
  return [...leavesOf(tree.children[0]), ...leavesOf(tree.children[1])];
}
