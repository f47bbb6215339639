/**
 * Attachment ranking policies
 *
 * Each policy orders the dependents of one head. Positions in the returned
 * sequence become the dependents' ranks.
 *
 * @module dep2con/ranking-policies
 */

import type { RankingStrategyT } from "./strategies.js";

/**
 * The dependents of one head, seen from that head.
 */
export interface SiblingGroup {
  readonly head: number;
  /** Dependents in node order */
  readonly targets: readonly number[];
  /** Dependents in the order they were attached in the input tree */
  readonly attachmentOrder: readonly number[];
  /** Dependents left of the head, nearest first */
  readonly left: readonly number[];
  /** Dependents right of the head, nearest first */
  readonly right: readonly number[];
  /** Text position of a node, used for distances */
  position(node: number): number;
  /** Sentence id of a node; only defined for sentence-aware policies */
  sentence(node: number): number;
}

export type RankingPolicy = (group: SiblingGroup) => number[];

type Side = "left" | "right";

// ============================================================================
// Side-based policies
// ============================================================================

/**
 * Keep the left/right interleaving of the attachment order, filling each
 * side's slots inside-out: slots `L R R L L R` over `l3 r1 r3 l2 l1 r2`
 * give `l1 r1 r2 l2 l3 r3`.
 */
const identity: RankingPolicy = (group) => {
  const onLeft = new Set(group.left);
  let nextLeft = 0;
  let nextRight = 0;
  return group.attachmentOrder.map((target) =>
    onLeft.has(target) ? group.left[nextLeft++] : group.right[nextRight++]
  );
};

function sideFirst(first: Side): RankingPolicy {
  return (group) =>
    first === "left" ? [...group.left, ...group.right] : [...group.right, ...group.left];
}

function alternating(first: Side): RankingPolicy {
  return (group) => {
    const [a, b] = first === "left" ? [group.left, group.right] : [group.right, group.left];
    const result: number[] = [];
    for (let i = 0; i < Math.max(a.length, b.length); i++) {
      if (i < a.length) result.push(a[i]);
      if (i < b.length) result.push(b[i]);
    }
    return result;
  };
}

// ============================================================================
// Distance-based policies
// ============================================================================

interface ClosestOptions {
  /** Side preferred on equal distance, for same-sentence dependents */
  intra: Side;
  /** Side preferred on equal distance, for dependents in other sentences */
  inter: Side;
  /** Whether same-sentence dependents come before all others */
  sentenceAware: boolean;
}

function closest({ intra, inter, sentenceAware }: ClosestOptions): RankingPolicy {
  return (group) => {
    const headPos = group.position(group.head);
    const headSentence = sentenceAware ? group.sentence(group.head) : Number.NaN;

    const key = (node: number): [number, number, number] => {
      const pos = group.position(node);
      const sameSentence = sentenceAware && group.sentence(node) === headSentence;
      const preferred = sentenceAware && !sameSentence ? inter : intra;
      const side: Side = pos > headPos ? "right" : "left";
      return [sameSentence || !sentenceAware ? 1 : 2, Math.abs(pos - headPos), side === preferred ? 1 : 2];
    };

    return [...group.targets].sort((a, b) => {
      const ka = key(a);
      const kb = key(b);
      return ka[0] - kb[0] || ka[1] - kb[1] || ka[2] - kb[2];
    });
  };
}

// ============================================================================
// Registry
// ============================================================================

export const RANKING_POLICIES: Readonly<Record<RankingStrategyT, RankingPolicy>> = {
  id: identity,
  lllrrr: sideFirst("left"),
  rrrlll: sideFirst("right"),
  lrlrlr: alternating("left"),
  rlrlrl: alternating("right"),
  "closest-lr": closest({ intra: "left", inter: "left", sentenceAware: false }),
  "closest-rl": closest({ intra: "right", inter: "right", sentenceAware: false }),
  "closest-intra-lr-inter-lr": closest({ intra: "left", inter: "left", sentenceAware: true }),
  "closest-intra-rl-inter-rl": closest({ intra: "right", inter: "right", sentenceAware: true }),
  "closest-intra-rl-inter-lr": closest({ intra: "right", inter: "left", sentenceAware: true }),
};
