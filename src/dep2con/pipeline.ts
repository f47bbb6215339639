/**
 * Conversion pipeline
 *
 * Classifier and ranker annotate the dependency tree, then the builder
 * folds it. `convertCorpus` runs the pipeline over many documents and
 * reports failures per document, leaving skip-or-stop to the caller.
 *
 * @module dep2con/pipeline
 */

import { isDep2ConError, toErrorV1, type ErrorV1 } from "../utils/errors.js";
import { emit, TelemetryEvents } from "../utils/telemetry.js";
import { parseDependencyTree } from "../validators/dependency-tree-validator.js";
import { isZodError } from "../validators/zod-error-mapper.js";
import { AttachmentRanker } from "./attachment-ranker.js";
import { hasCompleteNuclearity, nodeCount, withNuclearity, withRanks } from "./dependency-tree.js";
import { NuclearityClassifier } from "./nuclearity-classifier.js";
import { TreeBuilder } from "./tree-builder.js";
import type { ConstituencyTree, DependencyTree, NuclearityAssignment } from "./types.js";

export interface ConversionOptions {
  /** Fitted classifier, used for trees without nuclearity */
  classifier?: NuclearityClassifier;
  ranker?: AttachmentRanker;
  builder?: TreeBuilder;
}

export type DocumentResult =
  | { documentId: string; ok: true; tree: ConstituencyTree }
  | { documentId: string; ok: false; error: ErrorV1 };

export interface ConversionBatchResult {
  results: DocumentResult[];
  succeeded: number;
  failed: number;
}

/**
 * Stages resolved once per call, so a batch shares one classifier fit.
 */
class Stages {
  private classifier: NuclearityClassifier | undefined;
  readonly ranker: AttachmentRanker;
  readonly builder: TreeBuilder;

  constructor(options: ConversionOptions) {
    this.classifier = options.classifier;
    this.ranker = options.ranker ?? new AttachmentRanker();
    this.builder = options.builder ?? new TreeBuilder();
  }

  nuclearityClassifier(): NuclearityClassifier {
    if (this.classifier === undefined) {
      this.classifier = new NuclearityClassifier().fit();
    }
    return this.classifier;
  }

  run(tree: DependencyTree): ConstituencyTree {
    let annotated = tree;
    if (!hasCompleteNuclearity(annotated)) {
      const [predicted] = this.nuclearityClassifier().predict([annotated]);
      annotated = withNuclearity(annotated, fillNuclearity(annotated, predicted));
    }
    const [ranks] = this.ranker.predict([annotated]);
    return this.builder.convert(withRanks(annotated, ranks));
  }
}

/**
 * Predicted nuclearity for the nodes the tree leaves unannotated; given
 * entries win.
 */
function fillNuclearity(tree: DependencyTree, predicted: NuclearityAssignment): NuclearityAssignment {
  return predicted.map((value, node) => tree.nuclearity?.[node] ?? value);
}

/**
 * Convert one dependency tree. Nuclearity already on the tree is kept and
 * only its gaps are classified; ranks are always recomputed by the ranker.
 */
export function dependencyToConstituency(tree: DependencyTree, options: ConversionOptions = {}): ConstituencyTree {
  return new Stages(options).run(tree);
}

/**
 * Id of a raw document, read before validation so that failures can be
 * reported against it; `#<index>` when it has none.
 */
function rawDocumentId(raw: unknown, index: number): string {
  if (typeof raw === "object" && raw !== null && "id" in raw && typeof raw.id === "string" && raw.id.length > 0) {
    return raw.id;
  }
  return `#${index}`;
}

/**
 * Parse and convert each raw document.
 *
 * Conversion failures (invalid input, structural problems, missing
 * annotations) are recorded per document; any other error is rethrown.
 */
export function convertCorpus(documents: readonly unknown[], options: ConversionOptions = {}): ConversionBatchResult {
  const stages = new Stages(options);
  const startTime = Date.now();
  const results: DocumentResult[] = [];

  documents.forEach((raw, index) => {
    const documentId = rawDocumentId(raw, index);
    try {
      const tree = parseDependencyTree(raw);
      const converted = stages.run(tree);
      results.push({ documentId, ok: true, tree: converted });
      emit(TelemetryEvents.ConvertSucceeded, { document_id: documentId, units: nodeCount(tree) - 1 });
    } catch (error) {
      if (!isZodError(error) && !isDep2ConError(error)) {
        throw error;
      }
      const record = toErrorV1(error, documentId);
      results.push({ documentId, ok: false, error: record });
      emit(TelemetryEvents.ConvertFailed, { document_id: documentId, code: record.code, message: record.message });
    }
  });

  const succeeded = results.filter((result) => result.ok).length;
  const failed = results.length - succeeded;
  emit(TelemetryEvents.BatchCompleted, {
    documents: documents.length,
    succeeded,
    failed,
    ranking_strategy: stages.ranker.strategy,
    latency_ms: Date.now() - startTime,
  });

  return { results, succeeded, failed };
}
