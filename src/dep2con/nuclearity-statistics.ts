/**
 * Nuclearity statistics per relation label.
 *
 * Supplies the `most_frequent_by_rel` classifier strategy with the majority
 * nuclearity pattern of each relation.
 *
 * @module dep2con/nuclearity-statistics
 */

import { nodeCount, positionOf } from "./dependency-tree.js";
import { FAKE_ROOT, type DependencyTree, type Nuclearity } from "./types.js";

/**
 * Nuclearity of the (left, right) arguments of a relation.
 */
export type NuclearityPattern = "NN" | "NS" | "SN";

/** Tie-break order when two patterns are equally frequent */
const PATTERN_PRIORITY: readonly NuclearityPattern[] = ["NS", "SN", "NN"];

export interface NuclearityStatisticsProvider {
  mostFrequentNuclearity(): ReadonlyMap<string, NuclearityPattern>;
}

/**
 * Provider over a fixed table, e.g. one loaded from corpus statistics.
 */
export class StaticNuclearityStatistics implements NuclearityStatisticsProvider {
  private readonly table: ReadonlyMap<string, NuclearityPattern>;

  constructor(table: Iterable<readonly [string, NuclearityPattern]>) {
    this.table = new Map(table);
  }

  mostFrequentNuclearity(): ReadonlyMap<string, NuclearityPattern> {
    return this.table;
  }
}

/**
 * Pattern of the attachment `heads[node] -> node`.
 * A multinuclear dependent gives NN; otherwise the head is the nucleus and
 * sits left (NS) or right (SN) of its dependent.
 */
export function attachmentPattern(tree: DependencyTree, node: number, nuclearity: Nuclearity): NuclearityPattern {
  if (nuclearity === "Nucleus") return "NN";
  const head = tree.heads[node];
  if (head === FAKE_ROOT) return "NS";
  return positionOf(tree, head) < positionOf(tree, node) ? "NS" : "SN";
}

/**
 * Majority nuclearity pattern per relation label over a training set.
 *
 * @param trees Training trees
 * @param labels Gold nuclearity per tree; defaults to each tree's own
 *   `nuclearity` array. Nodes with no nuclearity are not counted.
 */
export function mostFrequentNuclearityByRelation(
  trees: readonly DependencyTree[],
  labels?: readonly (readonly (Nuclearity | null)[])[]
): Map<string, NuclearityPattern> {
  const counts = new Map<string, Map<NuclearityPattern, number>>();

  trees.forEach((tree, t) => {
    const nucs = labels?.[t] ?? tree.nuclearity ?? [];
    for (let node = 1; node < nodeCount(tree); node++) {
      const relation = tree.labels[node];
      const nuc = nucs[node];
      if (relation === null || relation === undefined || nuc === null || nuc === undefined) continue;

      const pattern = attachmentPattern(tree, node, nuc);
      const byPattern = counts.get(relation) ?? new Map<NuclearityPattern, number>();
      byPattern.set(pattern, (byPattern.get(pattern) ?? 0) + 1);
      counts.set(relation, byPattern);
    }
  });

  const result = new Map<string, NuclearityPattern>();
  for (const [relation, byPattern] of counts) {
    let best: NuclearityPattern = PATTERN_PRIORITY[0];
    let bestCount = -1;
    for (const pattern of PATTERN_PRIORITY) {
      const count = byPattern.get(pattern) ?? 0;
      if (count > bestCount) {
        best = pattern;
        bestCount = count;
      }
    }
    result.set(relation, best);
  }
  return result;
}
