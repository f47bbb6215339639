/**
 * dep2con
 *
 * Dependency to constituency conversion for discourse trees.
 */

export { LIBRARY_VERSION } from "./version.js";

export {
  FAKE_ROOT,
  NO_HEAD,
  LEAF_RELATION,
  type CharSpan,
  type Unit,
  type Nuclearity,
  type ConstituentNuclearity,
  type DependencyTree,
  type RankAssignment,
  type NuclearityAssignment,
  type EduSpan,
  type ConstituentLeaf,
  type ConstituentBranch,
  type ConstituencyTree,
} from "./dep2con/types.js";

export {
  RankingStrategy,
  NuclearityStrategy,
  DEFAULT_MULTINUCLEAR_LABELS,
  SENTENCE_AWARE_STRATEGIES,
  type RankingStrategyT,
  type NuclearityStrategyT,
} from "./dep2con/strategies.js";

export {
  nodeCount,
  positionOf,
  unitOf,
  realRoots,
  siblingGroups,
  rankedDependents,
  hasCompleteNuclearity,
  withNuclearity,
  withRanks,
} from "./dep2con/dependency-tree.js";

export {
  NuclearityClassifier,
  parseNuclearityStrategy,
  type NuclearityClassifierOptions,
} from "./dep2con/nuclearity-classifier.js";

export {
  StaticNuclearityStatistics,
  mostFrequentNuclearityByRelation,
  attachmentPattern,
  type NuclearityPattern,
  type NuclearityStatisticsProvider,
} from "./dep2con/nuclearity-statistics.js";

export { AttachmentRanker, parseRankingStrategy } from "./dep2con/attachment-ranker.js";
export { RANKING_POLICIES, type RankingPolicy, type SiblingGroup } from "./dep2con/ranking-policies.js";

export { TreeBuilder } from "./dep2con/tree-builder.js";
export { toDependencyTree, ROOT_RELATION } from "./dep2con/dependency-extractor.js";

export {
  dependencyToConstituency,
  convertCorpus,
  type ConversionOptions,
  type ConversionBatchResult,
  type DocumentResult,
} from "./dep2con/pipeline.js";

export { DependencyTreeInput, type DependencyTreeInputT } from "./schemas/dependency-tree.js";

export * from "./validators/index.js";

export {
  Dep2ConError,
  ConfigurationError,
  PreconditionError,
  StructuralError,
  InvariantViolation,
  buildErrorV1,
  toErrorV1,
  isDep2ConError,
  type ErrorV1,
  type ErrorCode,
  type ErrorContext,
} from "./utils/errors.js";
