/**
 * Attachment Ranker
 *
 * Orders the dependents of every head into one deterministic sequence and
 * returns the positions as a rank array parallel to the tree's nodes.
 *
 * Dependents are first split into the left and right sides of their head,
 * each read inside-out; the selected policy then interleaves the two sides.
 *
 * @module dep2con/attachment-ranker
 */

import { config } from "../config/index.js";
import { ConfigurationError, InvariantViolation, PreconditionError } from "../utils/errors.js";
import { log } from "../utils/telemetry.js";
import { nodeCount, positionOf, siblingGroups, startOf } from "./dependency-tree.js";
import { RANKING_POLICIES, type RankingPolicy, type SiblingGroup } from "./ranking-policies.js";
import { RankingStrategy, SENTENCE_AWARE_STRATEGIES, type RankingStrategyT } from "./strategies.js";
import { FAKE_ROOT, type DependencyTree, type RankAssignment } from "./types.js";

export class AttachmentRanker {
  readonly strategy: RankingStrategyT;
  private readonly policy: RankingPolicy;

  constructor(strategy: string = config.conversion.rankingStrategy) {
    this.strategy = parseRankingStrategy(strategy);
    this.policy = RANKING_POLICIES[this.strategy];
  }

  get requiresSentences(): boolean {
    return SENTENCE_AWARE_STRATEGIES.has(this.strategy);
  }

  /**
   * Rank the dependents of every head, for each tree.
   */
  predict(trees: readonly DependencyTree[]): RankAssignment[] {
    return trees.map((tree) => this.rankTree(tree));
  }

  private rankTree(tree: DependencyTree): RankAssignment {
    const sentence = this.requiresSentences ? sentenceLookup(tree, this.strategy) : noSentences;
    const ranks = new Array<number>(nodeCount(tree)).fill(0);

    for (const [head, targets] of siblingGroups(tree)) {
      const group = buildSiblingGroup(tree, head, targets, sentence);
      const order = this.policy(group);
      assertPermutation(tree, head, targets, order);
      order.forEach((target, rank) => {
        ranks[target] = rank;
      });
      log.debug({ documentId: tree.id, head, order, strategy: this.strategy }, "Ranked sibling group");
    }

    return ranks;
  }
}

export function parseRankingStrategy(strategy: string): RankingStrategyT {
  const parsed = RankingStrategy.safeParse(strategy);
  if (!parsed.success) {
    throw new ConfigurationError(`Unknown transformation strategy ${strategy}`, "UNKNOWN_STRATEGY", {
      strategy,
      allowed: RankingStrategy.options,
    });
  }
  return parsed.data;
}

// ============================================================================
// Helpers
// ============================================================================

function noSentences(): number {
  return Number.NaN;
}

/**
 * Sentence id per node; the fake root belongs to no sentence.
 */
function sentenceLookup(tree: DependencyTree, strategy: RankingStrategyT): (node: number) => number {
  const sentences = tree.sentences;
  const missing: number[] = [];
  for (let node = 1; node < nodeCount(tree); node++) {
    const id = sentences?.[node];
    if (id === null || id === undefined) missing.push(node);
  }
  if (!sentences || missing.length > 0) {
    throw new PreconditionError(
      `Strategy ${strategy} depends on sentential information which is missing here`,
      "MISSING_SENTENCES",
      { documentId: tree.id, strategy, nodes: missing }
    );
  }

  return (node) => (node === FAKE_ROOT ? Number.NaN : sentences[node] ?? Number.NaN);
}

export function buildSiblingGroup(
  tree: DependencyTree,
  head: number,
  targets: readonly number[],
  sentence: (node: number) => number = noSentences
): SiblingGroup {
  const sorted = [head, ...targets].sort((a, b) => startOf(tree, a) - startOf(tree, b));
  const centre = sorted.indexOf(head);
  const left = sorted.slice(0, centre).reverse();
  const right = sorted.slice(centre + 1);

  const ranks = tree.ranks;
  const attachmentOrder =
    ranks && ranks.length === nodeCount(tree) ? [...targets].sort((a, b) => ranks[a] - ranks[b]) : [...targets];

  return {
    head,
    targets,
    attachmentOrder,
    left,
    right,
    position: (node) => positionOf(tree, node),
    sentence,
  };
}

/**
 * Ranks within a sibling group must be a permutation of 0..k-1.
 */
function assertPermutation(
  tree: DependencyTree,
  head: number,
  targets: readonly number[],
  order: readonly number[]
): void {
  const expected = new Set(targets);
  const seen = new Set<number>();
  const valid =
    order.length === targets.length &&
    order.every((node) => {
      if (!expected.has(node) || seen.has(node)) return false;
      seen.add(node);
      return true;
    });

  if (!valid) {
    throw new InvariantViolation(
      `Ranking of the dependents of node ${head} is not a permutation`,
      "RANK_NOT_PERMUTATION",
      { documentId: tree.id, head, targets: [...targets], order: [...order] }
    );
  }
}
