/**
 * Tree Builder
 *
 * Folds a ranked, nuclearity-annotated dependency tree into a binary
 * constituency tree.
 *
 * A dependency link `src -r-> tgt` is rotated into `r(src, tgt)`, ordered by
 * text position. A head with several dependents is folded rather than
 * mapped: each dependent, in rank order, is connected to the tree built so
 * far for its head, so
 *
 *   src +-r1-> tgt1
 *       +-r2-> tgt2
 *
 * becomes `r2(r1(src, tgt1), tgt2)`.
 *
 * The walk recurses once per dependency level. Trees deeper than the call
 * stack allows need an explicit-stack version of `walk`, pushing
 * (accumulator, pending dependents) frames.
 *
 * @module dep2con/tree-builder
 */

import { StructuralError } from "../utils/errors.js";
import { log } from "../utils/telemetry.js";
import {
  nodeCount,
  nuclearityOf,
  rankedDependents,
  realRoots,
  unitOf,
} from "./dependency-tree.js";
import { compareSpans, formatSpan, mergeEduSpans, mergeSpans, spansOverlap } from "./span.js";
import {
  LEAF_RELATION,
  type CharSpan,
  type ConstituencyTree,
  type ConstituentNuclearity,
  type DependencyTree,
  type EduSpan,
  type Nuclearity,
  type Unit,
} from "./types.js";

/**
 * Partially built constituency tree.
 */
interface TreeParts {
  readonly anchor: Unit;
  readonly eduSpan: EduSpan;
  readonly span: CharSpan;
  readonly relation: string;
  readonly children: readonly [] | readonly [ConstituencyTree, ConstituencyTree];
}

function leafParts(unit: Unit): TreeParts {
  return {
    anchor: unit,
    eduSpan: [unit.index, unit.index],
    span: unit.span,
    relation: LEAF_RELATION,
    children: [],
  };
}

/**
 * Close a partial tree under the given nuclearity.
 */
function partsToTree(nuclearity: ConstituentNuclearity, parts: TreeParts): ConstituencyTree {
  const base = {
    nuclearity,
    eduSpan: parts.eduSpan,
    charSpan: parts.span,
    relation: parts.relation,
  };
  if (parts.children.length === 0) {
    return { ...base, kind: "leaf", unit: parts.anchor };
  }
  return { ...base, kind: "branch", children: parts.children };
}

export class TreeBuilder {
  /**
   * Convert one dependency tree.
   *
   * @throws StructuralError on zero or several real roots, overlapping
   *   spans, or nodes unreachable from the root
   * @throws PreconditionError when ranks or nuclearity are missing
   */
  convert(tree: DependencyTree): ConstituencyTree {
    const roots = realRoots(tree);
    if (roots.length === 0) {
      throw new StructuralError("Cannot convert dependency tree: no real root", "NO_ROOT", {
        documentId: tree.id,
        roots,
      });
    }
    if (roots.length > 1) {
      throw new StructuralError(
        `Cannot convert dependency tree: multiple roots ${roots.join(", ")}`,
        "MULTIPLE_ROOTS",
        { documentId: tree.id, roots }
      );
    }

    const children = rankedDependents(tree);
    const visited = new Set<number>();

    const walk = (ancestor: TreeParts | null, node: number): TreeParts => {
      visited.add(node);
      let src = leafParts(unitOf(tree, node));
      for (const child of children.get(node) ?? []) {
        src = walk(src, child);
      }
      if (ancestor === null) return src;
      return connect(tree, node, ancestor, src, relationOf(tree, node), nuclearityOf(tree, node));
    };

    const rootParts = walk(null, roots[0]);

    const total = nodeCount(tree) - 1;
    if (visited.size !== total) {
      const unreachable: number[] = [];
      for (let node = 1; node <= total; node++) {
        if (!visited.has(node)) unreachable.push(node);
      }
      throw new StructuralError(
        `Cannot convert dependency tree: nodes ${unreachable.join(", ")} are not reachable from root ${roots[0]}`,
        "UNREACHABLE_NODES",
        { documentId: tree.id, root: roots[0], nodes: unreachable }
      );
    }

    log.debug({ documentId: tree.id, units: total, root: roots[0] }, "Converted dependency tree");
    return partsToTree("Root", rootParts);
  }

  /**
   * Convert each tree; the first failure aborts the batch.
   */
  convertAll(trees: readonly DependencyTree[]): ConstituencyTree[] {
    return trees.map((tree) => this.convert(tree));
  }
}

function relationOf(tree: DependencyTree, node: number): string {
  const label = tree.labels[node];
  if (label === null || label === undefined) {
    throw new StructuralError(`Attachment of node ${node} has no relation label`, "INVALID_TREE", {
      documentId: tree.id,
      node,
      head: tree.heads[node],
    });
  }
  return label;
}

/**
 * Join the head-side partial tree `src` with the dependent-side `tgt`.
 * `src` is always the nucleus; `tgt` takes the edge's nuclearity.
 */
function connect(
  tree: DependencyTree,
  node: number,
  src: TreeParts,
  tgt: TreeParts,
  relation: string,
  nuclearity: Nuclearity
): TreeParts {
  if (spansOverlap(src.span, tgt.span)) {
    throw new StructuralError(
      `Span ${formatSpan(src.span)} overlaps with ${formatSpan(tgt.span)}`,
      "SPAN_OVERLAP",
      {
        documentId: tree.id,
        head: tree.heads[node],
        node,
        relation,
        headSpan: src.span,
        dependentSpan: tgt.span,
      }
    );
  }

  const srcTree = partsToTree("Nucleus", src);
  const tgtTree = partsToTree(nuclearity, tgt);
  const [left, right] = compareSpans(src.span, tgt.span) <= 0 ? [srcTree, tgtTree] : [tgtTree, srcTree];

  return {
    anchor: src.anchor,
    eduSpan: mergeEduSpans(left.eduSpan, right.eduSpan),
    span: mergeSpans(src.span, tgt.span),
    relation,
    children: [left, right],
  };
}
