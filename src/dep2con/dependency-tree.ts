/**
 * Accessors over array-indexed dependency trees.
 *
 * @module dep2con/dependency-tree
 */

import { PreconditionError } from "../utils/errors.js";
import {
  FAKE_ROOT,
  type DependencyTree,
  type Nuclearity,
  type NuclearityAssignment,
  type RankAssignment,
  type Unit,
} from "./types.js";

/** Number of nodes, fake root included */
export function nodeCount(tree: DependencyTree): number {
  return tree.heads.length;
}

/** Position of a node in `units`, also used as its text distance coordinate */
export function positionOf(tree: DependencyTree, node: number): number {
  return tree.idx?.[node] ?? node - 1;
}

export function unitOf(tree: DependencyTree, node: number): Unit {
  const unit = tree.units[positionOf(tree, node)];
  if (unit === undefined) {
    throw new RangeError(`Node ${node} has no unit`);
  }
  return unit;
}

/** Start offset of a node's unit; the fake root sorts before everything */
export function startOf(tree: DependencyTree, node: number): number {
  return node === FAKE_ROOT ? Number.NEGATIVE_INFINITY : unitOf(tree, node).span.start;
}

/** Nodes attached directly to the fake root */
export function realRoots(tree: DependencyTree): number[] {
  const roots: number[] = [];
  for (let i = 1; i < tree.heads.length; i++) {
    if (tree.heads[i] === FAKE_ROOT) roots.push(i);
  }
  return roots;
}

/**
 * Children of every head, in node order.
 * The fake root's own entry in `heads` is skipped.
 */
export function siblingGroups(tree: DependencyTree): Map<number, number[]> {
  const groups = new Map<number, number[]>();
  for (let i = 1; i < tree.heads.length; i++) {
    const head = tree.heads[i];
    const group = groups.get(head) ?? [];
    group.push(i);
    groups.set(head, group);
  }
  return groups;
}

/**
 * Sibling groups with each group sorted by attachment rank (node order
 * breaks ties).
 */
export function rankedDependents(tree: DependencyTree): Map<number, number[]> {
  const ranks = requireRanks(tree);
  const groups = siblingGroups(tree);
  for (const group of groups.values()) {
    group.sort((a, b) => ranks[a] - ranks[b]);
  }
  return groups;
}

export function requireRanks(tree: DependencyTree): RankAssignment {
  const ranks = tree.ranks;
  if (!ranks || ranks.length !== tree.heads.length) {
    throw new PreconditionError(
      "Dependency tree has no attachment ranks; run the attachment ranker first",
      "MISSING_RANKS",
      { documentId: tree.id, expected: tree.heads.length, received: ranks?.length ?? 0 }
    );
  }
  return ranks;
}

/**
 * Nuclearity of a real node, failing when the classifier has not run.
 */
export function nuclearityOf(tree: DependencyTree, node: number): Nuclearity {
  const nuc = tree.nuclearity?.[node];
  if (nuc === undefined || nuc === null) {
    throw new PreconditionError(
      `Node ${node} has no nuclearity; run the nuclearity classifier first`,
      "MISSING_NUCLEARITY",
      { documentId: tree.id, node }
    );
  }
  return nuc;
}

export function hasCompleteNuclearity(tree: DependencyTree): boolean {
  const nucs = tree.nuclearity;
  if (!nucs || nucs.length !== tree.heads.length) return false;
  return nucs.every((nuc, i) => i === FAKE_ROOT || (nuc !== null && nuc !== undefined));
}

export function withNuclearity(tree: DependencyTree, nuclearity: NuclearityAssignment): DependencyTree {
  return { ...tree, nuclearity };
}

export function withRanks(tree: DependencyTree, ranks: RankAssignment): DependencyTree {
  return { ...tree, ranks };
}
