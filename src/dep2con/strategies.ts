import { z } from "zod";

/**
 * Attachment ranking policies.
 *
 * - `id`: keep the given left/right interleaving, inside-out on each side
 * - `lllrrr` / `rrrlll`: one side entirely before the other
 * - `lrlrlr` / `rlrlrl`: alternate sides
 * - `closest-*`: nearest dependents first, with a side tie-break
 * - `closest-intra-*-inter-*`: same-sentence dependents before the others
 */
export const RankingStrategy = z.enum([
  "id",
  "lllrrr",
  "rrrlll",
  "lrlrlr",
  "rlrlrl",
  "closest-lr",
  "closest-rl",
  "closest-intra-lr-inter-lr",
  "closest-intra-rl-inter-rl",
  "closest-intra-rl-inter-lr",
]);

export type RankingStrategyT = z.infer<typeof RankingStrategy>;

/**
 * Nuclearity prediction policies.
 */
export const NuclearityStrategy = z.enum(["unamb_else_most_frequent", "most_frequent_by_rel"]);

export type NuclearityStrategyT = z.infer<typeof NuclearityStrategy>;

/**
 * Relations treated as multinuclear by `unamb_else_most_frequent`.
 */
export const DEFAULT_MULTINUCLEAR_LABELS = ["joint", "same-unit", "textual"] as const;

/**
 * Strategies that read sentence ids from the tree.
 */
export const SENTENCE_AWARE_STRATEGIES: ReadonlySet<RankingStrategyT> = new Set<RankingStrategyT>([
  "closest-intra-lr-inter-lr",
  "closest-intra-rl-inter-rl",
  "closest-intra-rl-inter-lr",
]);
