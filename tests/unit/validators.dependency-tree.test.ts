/**
 * Dependency Tree Validator Tests
 *
 * Input shape through Zod, then the structural checks run before
 * conversion.
 */

import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { NO_HEAD } from "../../src/dep2con/types.js";
import { StructuralError } from "../../src/utils/errors.js";
import { parseDependencyTree, validateDependencyTree } from "../../src/validators/dependency-tree-validator.js";
import { formatZodPath, isZodError } from "../../src/validators/zod-error-mapper.js";
import { buildDependencyTree, captureError, createFourUnitTree } from "../utils/discourse-builders.js";

function codes(raw: unknown): string[] {
  return validateDependencyTree(raw).errors.map((issue) => issue.code);
}

// =============================================================================
// Shape
// =============================================================================

describe("validateDependencyTree - shape", () => {
  it("accepts a well-formed tree and returns it", () => {
    const result = validateDependencyTree(createFourUnitTree());
    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
    expect(result.tree?.heads).toEqual([NO_HEAD, 2, 0, 2, 2]);
  });

  it("reports missing fields with their path", () => {
    const result = validateDependencyTree({ units: [], labels: [] });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      {
        code: "ZOD_VALIDATION_ERROR",
        severity: "error",
        message: "Required",
        path: "heads",
        context: { zodCode: "invalid_type" },
      },
    ]);
  });

  it("reports parallel arrays of the wrong length", () => {
    const tree = createFourUnitTree();
    const result = validateDependencyTree({ ...tree, labels: tree.labels.slice(0, 3) });
    expect(result.errors).toEqual([
      {
        code: "ZOD_VALIDATION_ERROR",
        severity: "error",
        message: "Expected 5 entries (one per node), received 3",
        path: "labels",
        context: { zodCode: "custom" },
      },
    ]);
  });

  it("reports a unit count that does not match the nodes", () => {
    const tree = createFourUnitTree();
    const result = validateDependencyTree({ ...tree, units: tree.units.slice(1) });
    expect(result.errors.map((issue) => [issue.path, issue.message])).toEqual([
      ["units", "Expected 4 units, received 3"],
    ]);
  });

  it("rejects a span that ends before it starts", () => {
    const tree = createFourUnitTree();
    const units = [{ index: 0, span: { start: 9, end: 2 } }, ...tree.units.slice(1)];
    const result = validateDependencyTree({ ...tree, units });
    expect(result.errors.map((issue) => issue.path)).toEqual(["units[0].span"]);
  });

  it("rejects unknown nuclearity values", () => {
    const tree = createFourUnitTree();
    expect(codes({ ...tree, nuclearity: [null, "Satellite", "Root", "Satellite", "Satellite"] })).toEqual([
      "ZOD_VALIDATION_ERROR",
    ]);
  });
});

// =============================================================================
// Structure
// =============================================================================

describe("validateDependencyTree - structure", () => {
  it("reports a missing root", () => {
    expect(codes(buildDependencyTree({ heads: [2, 1] }))).toEqual(["NO_ROOT", "CYCLE_DETECTED"]);
  });

  it("reports several roots", () => {
    const result = validateDependencyTree(buildDependencyTree({ heads: [0, 0, 1] }));
    expect(result.errors).toEqual([
      {
        code: "MULTIPLE_ROOTS",
        severity: "error",
        message: "Multiple real roots: 1, 2",
        path: "heads",
        context: { roots: [1, 2] },
      },
    ]);
  });

  it("reports heads outside the tree", () => {
    const result = validateDependencyTree(buildDependencyTree({ heads: [0, 7] }));
    expect(result.errors).toEqual([
      {
        code: "HEAD_OUT_OF_RANGE",
        severity: "error",
        message: "Node 2 attaches to unknown node 7",
        path: "heads[2]",
        context: { node: 2, head: 7 },
      },
    ]);
  });

  it("reports self attachment as a one-node cycle", () => {
    expect(codes(buildDependencyTree({ heads: [0, 2] }))).toEqual(["SELF_ATTACHMENT", "CYCLE_DETECTED"]);
  });

  it("reports a cycle detached from the root", () => {
    const result = validateDependencyTree(buildDependencyTree({ heads: [0, 3, 2] }));
    expect(result.errors).toEqual([
      {
        code: "CYCLE_DETECTED",
        severity: "error",
        message: "Attachment cycle through nodes 2, 3",
        path: "heads[2]",
        context: { nodes: [2, 3] },
      },
    ]);
  });

  it("reports unlabelled attachments", () => {
    const tree = createFourUnitTree();
    const result = validateDependencyTree({ ...tree, labels: [null, "L", null, "R1", "R2"] });
    expect(result.errors.map((issue) => [issue.code, issue.path])).toEqual([["MISSING_LABEL", "labels[2]"]]);
  });

  it("reports idx entries pointing past the units", () => {
    const tree = buildDependencyTree({ heads: [0, 1] });
    const result = validateDependencyTree({ ...tree, idx: [-1, 0, 5] });
    expect(result.errors.map((issue) => [issue.code, issue.path])).toEqual([
      ["UNIT_OUT_OF_RANGE", "idx[2]"],
      ["UNREFERENCED_UNIT", "units[1]"],
    ]);
  });

  it("warns about units out of text order and overlapping units", () => {
    const result = validateDependencyTree({
      units: [
        { index: 0, span: { start: 10, end: 20 } },
        { index: 1, span: { start: 0, end: 15 } },
      ],
      heads: [NO_HEAD, 0, 1],
      labels: [null, "ROOT", "a"],
    });

    expect(result.valid).toBe(true);
    expect(result.warnings.map((issue) => issue.code)).toEqual(["UNITS_NOT_IN_TEXT_ORDER", "UNIT_SPAN_OVERLAP"]);
    expect(result.warnings[1].context).toEqual({ units: [1, 0] });
  });
});

// =============================================================================
// Units
// =============================================================================

describe("validateDependencyTree - units", () => {
  const threeUnits = [
    { index: 0, span: { start: 0, end: 10 } },
    { index: 1, span: { start: 10, end: 20 } },
    { index: 2, span: { start: 20, end: 30 } },
  ];

  it("reports a unit that no node maps to", () => {
    const result = validateDependencyTree({
      units: threeUnits,
      heads: [NO_HEAD, 0, 1],
      labels: [null, "ROOT", "a"],
      idx: [-1, 0, 2],
    });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      {
        code: "UNREFERENCED_UNIT",
        severity: "error",
        message: "Unit 1 belongs to no node",
        path: "units[1]",
        context: { position: 1 },
      },
    ]);
  });

  it("reports two nodes mapped to the same unit", () => {
    const tree = buildDependencyTree({ heads: [0, 1, 1] });
    const result = validateDependencyTree({ ...tree, idx: [-1, 0, 0, 2] });
    expect(result.errors).toEqual([
      {
        code: "DUPLICATE_UNIT_REFERENCE",
        severity: "error",
        message: "Nodes 1 and 2 both map to unit 0",
        path: "idx[2]",
        context: { nodes: [1, 2], position: 0 },
      },
      {
        code: "UNREFERENCED_UNIT",
        severity: "error",
        message: "Unit 1 belongs to no node",
        path: "units[1]",
        context: { position: 1 },
      },
    ]);
  });

  it("reports units whose index differs from their position", () => {
    const tree = buildDependencyTree({ heads: [0, 1] });
    const units = [
      { index: 0, span: { start: 0, end: 10 } },
      { index: 0, span: { start: 10, end: 20 } },
    ];
    const result = validateDependencyTree({ ...tree, units });
    expect(result.errors).toEqual([
      {
        code: "UNIT_INDEX_MISMATCH",
        severity: "error",
        message: "Unit at position 1 has index 0",
        path: "units[1].index",
        context: { position: 1, index: 0 },
      },
    ]);
  });

  it("accepts an explicit one-to-one idx", () => {
    const tree = buildDependencyTree({ heads: [0, 1, 1] });
    expect(codes({ ...tree, idx: [-1, 0, 1, 2] })).toEqual([]);
  });
});

// =============================================================================
// parseDependencyTree
// =============================================================================

describe("parseDependencyTree", () => {
  it("returns the parsed tree", () => {
    const tree = createFourUnitTree();
    expect(parseDependencyTree(tree)).toEqual(tree);
  });

  it("rejects units left out of the tree before conversion", () => {
    // three units, two nodes: unit 1 is skipped
    const tree = buildDependencyTree({ id: "gap", heads: [0, 1, 1] });
    const raw = { ...tree, heads: [NO_HEAD, 0, 1], labels: [null, "ROOT", "a"], idx: [-1, 0, 2] };
    const error = captureError(() => parseDependencyTree(raw));
    expect(error).toBeInstanceOf(StructuralError);
    expect(error).toMatchObject({
      code: "INVALID_TREE",
      message: "Invalid dependency tree: Unit 1 belongs to no node",
      context: { documentId: "gap" },
    });
  });

  it("throws ZodError on malformed input", () => {
    expect(() => parseDependencyTree({ heads: "0 1" })).toThrow(ZodError);
  });

  it("throws StructuralError listing every structural issue", () => {
    const error = captureError(() => parseDependencyTree(buildDependencyTree({ id: "doc-7", heads: [0, 0] })));
    expect(error).toBeInstanceOf(StructuralError);
    expect(error).toMatchObject({
      code: "INVALID_TREE",
      message: "Invalid dependency tree: Multiple real roots: 1, 2",
      context: { documentId: "doc-7" },
    });
  });
});

describe("formatZodPath", () => {
  it("joins keys with dots and indexes with brackets", () => {
    expect(formatZodPath(["units", 0, "span", "end"])).toBe("units[0].span.end");
    expect(formatZodPath([])).toBe("");
  });
});

describe("isZodError", () => {
  it("recognises Zod validation errors only", () => {
    expect(isZodError(new ZodError([]))).toBe(true);
    expect(isZodError(new StructuralError("x", "INVALID_TREE"))).toBe(false);
    expect(isZodError("Validation failed")).toBe(false);
  });
});
