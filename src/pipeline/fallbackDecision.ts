import type { AdvisorDecision, LocalizationLabel, ScreeningSummary } from "../types.js";

export const FALLBACK_FLAG = "fallback_decision";

const LOCALIZATION_POINTS: Readonly<Record<LocalizationLabel, number>> = {
  outer_membrane: 3,
  extracellular: 3,
  periplasmic: 2,
  inner_membrane: 1,
  cytoplasmic: 0,
  unknown: 0,
};

export function antigenicityPoints(score: number): number {
  if (score > 0.7) return 3;
  if (score > 0.5) return 2;
  if (score > 0.3) return 1;
  return 0;
}

export function lengthPoints(length: number): number {
  if (length >= 100 && length <= 1000) return 1;
  if (length < 50 || length > 2000) return -1;
  return 0;
}

export function flagPenalty(flags: readonly string[]): number {
  let penalty = 0;
  if (flags.includes("too_short") || flags.includes("very_long")) penalty -= 2;
  if (flags.includes("screening_failed")) penalty -= 3;
  return penalty;
}

/** Integer score summing the antigenicity, localization and length ladders plus flag penalties. */
export function scoreFallback(summary: ScreeningSummary): number {
  return (
    antigenicityPoints(summary.antigenicityScore ?? 0) +
    LOCALIZATION_POINTS[summary.localization ?? "unknown"] +
    lengthPoints(summary.sequenceLength) +
    flagPenalty(summary.flags)
  );
}

/**
 * Rule-based verdict used whenever the advisor cannot be used.
 *   score ≥ 5 → advance / high
 *   score ≥ 3 → advance / medium
 *   score ≥ 1 → deprioritize / low
 *   otherwise → discard / low
 */
export function fallbackDecision(summary: ScreeningSummary): AdvisorDecision {
  const score = scoreFallback(summary);
  const antigenicity = (summary.antigenicityScore ?? 0).toFixed(2);
  const location = summary.localization ?? "unknown";
  const flags = [FALLBACK_FLAG];

  if (score >= 5) {
    return {
      verdict: "advance",
      confidence: "high",
      reasoning: `High antigenicity (${antigenicity}) and good localization (${location})`,
      flags,
    };
  }
  if (score >= 3) {
    return {
      verdict: "advance",
      confidence: "medium",
      reasoning: `Moderate scores: antigenicity ${antigenicity}, localization ${location}`,
      flags,
    };
  }
  if (score >= 1) {
    return {
      verdict: "deprioritize",
      confidence: "low",
      reasoning: `Low scores but keeping for potential: antigenicity ${antigenicity}, localization ${location}`,
      flags,
    };
  }
  return {
    verdict: "discard",
    confidence: "low",
    reasoning: `Poor vaccine candidate: low antigenicity (${antigenicity}), localization ${location}`,
    flags,
  };
}
