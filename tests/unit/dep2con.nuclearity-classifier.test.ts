import { describe, it, expect, afterEach, vi } from "vitest";
import { NuclearityClassifier, parseNuclearityStrategy } from "../../src/dep2con/nuclearity-classifier.js";
import { StaticNuclearityStatistics } from "../../src/dep2con/nuclearity-statistics.js";
import type { Nuclearity } from "../../src/dep2con/types.js";
import { ConfigurationError, PreconditionError } from "../../src/utils/errors.js";
import { setTestSink, TelemetryEvents, type TelemetryShape } from "../../src/utils/telemetry.js";
import { captureError, createFourUnitTree, createThreeSentenceTree } from "../utils/discourse-builders.js";

describe("NuclearityClassifier", () => {
  afterEach(() => {
    setTestSink(null);
    vi.unstubAllEnvs();
  });

  describe("construction", () => {
    it("defaults to unamb_else_most_frequent", () => {
      expect(new NuclearityClassifier().strategy).toBe("unamb_else_most_frequent");
    });

    it("takes its default strategy from the environment", () => {
      vi.stubEnv("DEP2CON_NUCLEARITY_STRATEGY", "most_frequent_by_rel");
      expect(new NuclearityClassifier().strategy).toBe("most_frequent_by_rel");
    });

    it("rejects unknown strategies before fit", () => {
      const error = captureError(() => new NuclearityClassifier("always_nucleus"));
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error).toMatchObject({
        code: "UNKNOWN_STRATEGY",
        message: "Unknown nuclearity strategy always_nucleus",
        context: { strategy: "always_nucleus", allowed: ["unamb_else_most_frequent", "most_frequent_by_rel"] },
      });
    });

    it("parses known strategy names", () => {
      expect(parseNuclearityStrategy("most_frequent_by_rel")).toBe("most_frequent_by_rel");
    });
  });

  describe("predict", () => {
    it("requires fit first", () => {
      const error = captureError(() => new NuclearityClassifier().predict([createFourUnitTree()]));
      expect(error).toBeInstanceOf(PreconditionError);
      expect(error).toMatchObject({ code: "NOT_FITTED" });
    });

    it("predicts Satellite everywhere when no label is multinuclear", () => {
      const classifier = new NuclearityClassifier().fit();
      expect(classifier.predict([createFourUnitTree()])).toEqual([
        ["Satellite", "Satellite", "Satellite", "Satellite", "Satellite"],
      ]);
    });

    it("predicts Nucleus for the default multinuclear labels", () => {
      const classifier = new NuclearityClassifier("unamb_else_most_frequent").fit();
      const [nuclearity] = classifier.predict([createThreeSentenceTree()]);
      // nodes 5 and 8 are "joint"
      expect(nuclearity).toEqual([
        "Satellite",
        "Satellite",
        "Satellite",
        "Satellite",
        "Satellite",
        "Nucleus",
        "Satellite",
        "Satellite",
        "Nucleus",
      ]);
    });

    it("returns one assignment per tree, each as long as its tree", () => {
      const classifier = new NuclearityClassifier().fit();
      const results = classifier.predict([createFourUnitTree(), createThreeSentenceTree()]);
      expect(results.map((r) => r.length)).toEqual([5, 9]);
    });

    it("accepts an explicit label set", () => {
      const classifier = new NuclearityClassifier("unamb_else_most_frequent", { multinuclearLabels: ["R1"] }).fit();
      expect(classifier.predict([createFourUnitTree()])[0][3]).toBe("Nucleus");
      expect(classifier.isMultinuclear("joint")).toBe(false);
    });

    it("reads the label set from the environment", () => {
      vi.stubEnv("DEP2CON_MULTINUCLEAR_LABELS", "L, R2");
      const classifier = new NuclearityClassifier().fit();
      expect(classifier.predict([createFourUnitTree()])[0]).toEqual([
        "Satellite",
        "Nucleus",
        "Satellite",
        "Satellite",
        "Nucleus",
      ]);
    });
  });

  describe("most_frequent_by_rel", () => {
    it("uses a supplied statistics table", () => {
      const statistics = new StaticNuclearityStatistics([
        ["list", "NN"],
        ["elaboration", "NS"],
        ["attribution", "SN"],
      ]);
      const classifier = new NuclearityClassifier("most_frequent_by_rel", { statistics }).fit();

      expect(classifier.isMultinuclear("list")).toBe(true);
      expect(classifier.isMultinuclear("elaboration")).toBe(false);
      expect(classifier.isMultinuclear("joint")).toBe(false);
    });

    it("derives the table from training trees", () => {
      const classifier = new NuclearityClassifier("most_frequent_by_rel").fit([createThreeSentenceTree()]);
      expect(classifier.isMultinuclear("joint")).toBe(true);
      expect(classifier.isMultinuclear("condition")).toBe(false);
    });

    it("prefers separate gold labels over the trees' own nuclearity", () => {
      const tree = createThreeSentenceTree();
      const gold = tree.heads.map((_, node): Nuclearity => (node === 6 ? "Nucleus" : "Satellite"));
      const classifier = new NuclearityClassifier("most_frequent_by_rel").fit([tree], [gold]);

      expect(classifier.isMultinuclear("condition")).toBe(true);
      expect(classifier.isMultinuclear("joint")).toBe(false);
    });

    it("predicts Satellite everywhere without statistics", () => {
      const classifier = new NuclearityClassifier("most_frequent_by_rel").fit();
      expect(classifier.predict([createThreeSentenceTree()])[0].every((n) => n === "Satellite")).toBe(true);
    });
  });

  describe("telemetry", () => {
    it("emits the fitted label set", () => {
      const events: Array<{ name: string; data: TelemetryShape }> = [];
      setTestSink((name, data) => events.push({ name, data }));

      new NuclearityClassifier("unamb_else_most_frequent", { multinuclearLabels: ["joint", "list"] }).fit();

      expect(events).toEqual([
        {
          name: TelemetryEvents.ClassifierFitted,
          data: { strategy: "unamb_else_most_frequent", multinuclear_labels: ["joint", "list"] },
        },
      ]);
    });
  });
});
