/**
 * Discourse tree types
 *
 * Dependency trees are array-indexed over `n + 1` nodes; node 0 is a
 * synthetic fake root with no unit of its own.
 *
 * @module dep2con/types
 */

// ============================================================================
// Units
// ============================================================================

/**
 * Half-open character span `[start, end)`.
 */
export interface CharSpan {
  readonly start: number;
  readonly end: number;
}

/**
 * Elementary discourse unit.
 */
export interface Unit {
  /** Position of the unit in left-to-right textual order */
  readonly index: number;
  readonly span: CharSpan;
}

// ============================================================================
// Dependency trees
// ============================================================================

export type Nuclearity = "Nucleus" | "Satellite";

export type ConstituentNuclearity = Nuclearity | "Root";

/** Index of the fake root */
export const FAKE_ROOT = 0;

/** Head recorded for the fake root itself */
export const NO_HEAD = -1;

export interface DependencyTree {
  /** Optional document id, carried into error records */
  readonly id?: string;
  /** Real units; node `i` is `units[idx[i]]` */
  readonly units: readonly Unit[];
  /** Governing node per node; `heads[0]` is NO_HEAD */
  readonly heads: readonly number[];
  /** Relation of the edge `heads[i] -> i`; `labels[0]` is null */
  readonly labels: readonly (string | null)[];
  readonly nuclearity?: readonly (Nuclearity | null)[];
  /** Attachment order within each sibling group */
  readonly ranks?: readonly number[];
  /** Sentence-group id per node */
  readonly sentences?: readonly (number | null)[];
  /** Node index to position in `units`; defaults to `i - 1` */
  readonly idx?: readonly number[];
}

/** Rank array parallel to a tree's nodes */
export type RankAssignment = readonly number[];

/** Nuclearity array parallel to a tree's nodes */
export type NuclearityAssignment = readonly Nuclearity[];

// ============================================================================
// Constituency trees
// ============================================================================

export type EduSpan = readonly [number, number];

interface ConstituentBase {
  readonly nuclearity: ConstituentNuclearity;
  readonly eduSpan: EduSpan;
  readonly charSpan: CharSpan;
  readonly relation: string;
}

export interface ConstituentLeaf extends ConstituentBase {
  readonly kind: "leaf";
  readonly unit: Unit;
}

export interface ConstituentBranch extends ConstituentBase {
  readonly kind: "branch";
  readonly children: readonly [ConstituencyTree, ConstituencyTree];
}

export type ConstituencyTree = ConstituentLeaf | ConstituentBranch;

/** Relation carried by leaves */
export const LEAF_RELATION = "leaf";
