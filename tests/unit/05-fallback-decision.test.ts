import { describe, expect, it } from "vitest";
import {
  FALLBACK_FLAG,
  antigenicityPoints,
  fallbackDecision,
  flagPenalty,
  lengthPoints,
  scoreFallback,
} from "../../src/pipeline/fallbackDecision.js";
import type { AdvisorDecision } from "../../src/types.js";
import { makeSummary } from "../support/fixtures.js";

const VERDICT_RANK: Record<AdvisorDecision["verdict"], number> = { discard: 0, deprioritize: 1, advance: 2 };

describe("L5 · fallbackDecision", () => {
  it("advances a strong outer-membrane candidate with high confidence", () => {
    const summary = makeSummary({ antigenicityScore: 0.8, localization: "outer_membrane", sequenceLength: 400 });

    expect(scoreFallback(summary)).toBe(7);
    expect(fallbackDecision(summary)).toEqual({
      verdict: "advance",
      confidence: "high",
      reasoning: "High antigenicity (0.80) and good localization (outer_membrane)",
      flags: [FALLBACK_FLAG],
    });
  });

  it("advances a moderate candidate with medium confidence", () => {
    const summary = makeSummary({ antigenicityScore: 0.6, localization: "inner_membrane", sequenceLength: 60 });

    expect(scoreFallback(summary)).toBe(3);
    expect(fallbackDecision(summary)).toEqual({
      verdict: "advance",
      confidence: "medium",
      reasoning: "Moderate scores: antigenicity 0.60, localization inner_membrane",
      flags: ["fallback_decision"],
    });
  });

  it("deprioritizes a weak candidate", () => {
    const summary = makeSummary({ antigenicityScore: 0.4, localization: "cytoplasmic", sequenceLength: 60 });

    expect(scoreFallback(summary)).toBe(1);
    expect(fallbackDecision(summary)).toEqual({
      verdict: "deprioritize",
      confidence: "low",
      reasoning: "Low scores but keeping for potential: antigenicity 0.40, localization cytoplasmic",
      flags: ["fallback_decision"],
    });
  });

  it("discards a short peptide", () => {
    const summary = makeSummary({
      antigenicityScore: 0.25,
      localization: "cytoplasmic",
      sequenceLength: 30,
      flags: ["too_short"],
    });

    expect(scoreFallback(summary)).toBe(-3);
    expect(fallbackDecision(summary)).toEqual({
      verdict: "discard",
      confidence: "low",
      reasoning: "Poor vaccine candidate: low antigenicity (0.25), localization cytoplasmic",
      flags: ["fallback_decision"],
    });
  });

  it("treats missing scores as zero and unknown after a failed screening", () => {
    const summary = makeSummary({
      antigenicityScore: null,
      localization: null,
      sequenceLength: 400,
      flags: ["screening_failed"],
    });

    expect(scoreFallback(summary)).toBe(-2);
    expect(fallbackDecision(summary).reasoning).toBe(
      "Poor vaccine candidate: low antigenicity (0.00), localization unknown"
    );
  });

  it("uses strict thresholds on the antigenicity ladder", () => {
    expect(antigenicityPoints(0.71)).toBe(3);
    expect(antigenicityPoints(0.7)).toBe(2);
    expect(antigenicityPoints(0.5)).toBe(1);
    expect(antigenicityPoints(0.3)).toBe(0);
  });

  it("scores length inclusively between 100 and 1000", () => {
    expect(lengthPoints(99)).toBe(0);
    expect(lengthPoints(100)).toBe(1);
    expect(lengthPoints(1000)).toBe(1);
    expect(lengthPoints(1001)).toBe(0);
    expect(lengthPoints(50)).toBe(0);
    expect(lengthPoints(49)).toBe(-1);
    expect(lengthPoints(2000)).toBe(0);
    expect(lengthPoints(2001)).toBe(-1);
  });

  it("penalises length flags once and a failed screening separately", () => {
    expect(flagPenalty([])).toBe(0);
    expect(flagPenalty(["too_short", "very_long"])).toBe(-2);
    expect(flagPenalty(["screening_failed"])).toBe(-3);
    expect(flagPenalty(["very_long", "screening_failed", "repetitive_sequence"])).toBe(-5);
  });

  it("never lowers the verdict when antigenicity rises", () => {
    const scores = [0, 0.2, 0.31, 0.45, 0.51, 0.65, 0.71, 0.9, 1];
    for (const localization of ["cytoplasmic", "inner_membrane", "periplasmic", "extracellular"] as const) {
      let previous = -1;
      for (const antigenicityScore of scores) {
        const rank = VERDICT_RANK[fallbackDecision(makeSummary({ antigenicityScore, localization })).verdict];
        expect(rank).toBeGreaterThanOrEqual(previous);
        previous = rank;
      }
    }
  });

  it("never lowers the verdict when localization moves toward the surface", () => {
    const ladder = ["unknown", "cytoplasmic", "inner_membrane", "periplasmic", "outer_membrane"] as const;
    for (const antigenicityScore of [0.1, 0.4, 0.6, 0.8]) {
      const ranks = ladder.map(
        (localization) => VERDICT_RANK[fallbackDecision(makeSummary({ antigenicityScore, localization })).verdict]
      );
      expect(ranks).toEqual([...ranks].sort((a, b) => a - b));
    }
  });

  it("is deterministic", () => {
    const summary = makeSummary({ antigenicityScore: 0.55, localization: "periplasmic" });
    expect(fallbackDecision(summary)).toEqual(fallbackDecision(summary));
  });
});
