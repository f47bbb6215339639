/**
 * Nuclearity Classifier
 *
 * Rule-based nucleus/satellite prediction per attachment: a node is a
 * Nucleus when its relation label is multinuclear, a Satellite otherwise.
 *
 * Pure over its inputs; the label set is fixed once `fit` returns.
 *
 * @module dep2con/nuclearity-classifier
 */

import { config } from "../config/index.js";
import { ConfigurationError, PreconditionError } from "../utils/errors.js";
import { emit, log, TelemetryEvents } from "../utils/telemetry.js";
import { nodeCount } from "./dependency-tree.js";
import {
  mostFrequentNuclearityByRelation,
  type NuclearityStatisticsProvider,
} from "./nuclearity-statistics.js";
import { NuclearityStrategy, type NuclearityStrategyT } from "./strategies.js";
import type { DependencyTree, Nuclearity, NuclearityAssignment } from "./types.js";

export interface NuclearityClassifierOptions {
  /** Frequency table for `most_frequent_by_rel`; derived from training data when absent */
  statistics?: NuclearityStatisticsProvider;
  /** Label set for `unamb_else_most_frequent`; defaults to the configured one */
  multinuclearLabels?: readonly string[];
}

export class NuclearityClassifier {
  readonly strategy: NuclearityStrategyT;
  private readonly options: NuclearityClassifierOptions;
  private multinuclearLabels: ReadonlySet<string> | null = null;

  constructor(strategy: string = config.conversion.nuclearityStrategy, options: NuclearityClassifierOptions = {}) {
    this.strategy = parseNuclearityStrategy(strategy);
    this.options = options;
  }

  /**
   * Build the multinuclear label set.
   *
   * @param trainingTrees Trees the statistics are derived from
   * @param trainingLabels Gold nuclearity per training tree, parallel to nodes
   */
  fit(
    trainingTrees: readonly DependencyTree[] = [],
    trainingLabels?: readonly (readonly (Nuclearity | null)[])[]
  ): this {
    const labels = this.buildLabelSet(trainingTrees, trainingLabels);
    this.multinuclearLabels = labels;

    emit(TelemetryEvents.ClassifierFitted, {
      strategy: this.strategy,
      multinuclear_labels: [...labels],
    });
    return this;
  }

  /**
   * Predict one nuclearity label per node of each tree.
   * The fake root has no label and comes out as a Satellite.
   */
  predict(trees: readonly DependencyTree[]): NuclearityAssignment[] {
    const multinuclear = this.multinuclearLabels;
    if (multinuclear === null) {
      throw new PreconditionError("Nuclearity classifier must be fitted before predict", "NOT_FITTED", {
        strategy: this.strategy,
      });
    }

    return trees.map((tree) => {
      const result: Nuclearity[] = [];
      for (let node = 0; node < nodeCount(tree); node++) {
        const label = tree.labels[node];
        result.push(label !== null && label !== undefined && multinuclear.has(label) ? "Nucleus" : "Satellite");
      }
      return result;
    });
  }

  private buildLabelSet(
    trainingTrees: readonly DependencyTree[],
    trainingLabels?: readonly (readonly (Nuclearity | null)[])[]
  ): ReadonlySet<string> {
    if (this.strategy === "unamb_else_most_frequent") {
      return new Set(this.options.multinuclearLabels ?? config.conversion.multinuclearLabels);
    }

    const table =
      this.options.statistics?.mostFrequentNuclearity() ??
      mostFrequentNuclearityByRelation(trainingTrees, trainingLabels);
    if (table.size === 0) {
      log.warn(
        { strategy: this.strategy, trainingTrees: trainingTrees.length },
        "No nuclearity statistics available; every attachment will be a satellite"
      );
    }

    const labels = new Set<string>();
    for (const [relation, pattern] of table) {
      if (pattern === "NN") labels.add(relation);
    }
    return labels;
  }

  isMultinuclear(label: string): boolean {
    return this.multinuclearLabels?.has(label) ?? false;
  }
}

export function parseNuclearityStrategy(strategy: string): NuclearityStrategyT {
  const parsed = NuclearityStrategy.safeParse(strategy);
  if (!parsed.success) {
    throw new ConfigurationError(`Unknown nuclearity strategy ${strategy}`, "UNKNOWN_STRATEGY", {
      strategy,
      allowed: NuclearityStrategy.options,
    });
  }
  return parsed.data;
}
