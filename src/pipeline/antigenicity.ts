import type { OrganismCategory } from "../types.js";
import { AROMATIC, CHARGED, HYDROPHOBIC, POLAR, fractionIn } from "./residues.js";

/** Score returned for sequences too short to carry a meaningful signal. */
export const SHORT_SEQUENCE_SCORE = 0.25;
export const MIN_SCORED_LENGTH = 50;

const SCORE_FLOOR = 0.1;
const SCORE_CEILING = 1.0;

/**
 * Composition-based antigenicity estimate in [0.1, 1.0].
 *
 * Viral proteins reward moderate hydrophobic and aromatic content and are
 * penalised for polar ratios above 0.3; other organisms use a lower base with
 * separate caps and a small polar bonus. Length 200–1000 earns +0.05, over
 * 1000 costs 0.05, and ≥16 distinct residues earns +0.05.
 */
export function predictAntigenicity(
  sequence: string,
  organism: OrganismCategory = "virus"
): number {
  if (sequence.length < MIN_SCORED_LENGTH) return SHORT_SEQUENCE_SCORE;

  const hydrophobic = fractionIn(sequence, HYDROPHOBIC);
  const aromatic = fractionIn(sequence, AROMATIC);
  const charged = fractionIn(sequence, CHARGED);
  const polar = fractionIn(sequence, POLAR);

  let score =
    organism === "virus"
      ? 0.4 +
        Math.min(hydrophobic * 0.8, 0.25) +
        Math.min(aromatic * 2.0, 0.15) +
        Math.min(charged * 0.6, 0.15) -
        Math.max(polar - 0.3, 0) * 0.2
      : 0.3 +
        Math.min(hydrophobic * 0.7, 0.2) +
        Math.min(aromatic * 1.5, 0.1) +
        Math.min(charged * 0.8, 0.2) +
        Math.min(polar * 0.4, 0.1);

  const length = sequence.length;
  if (length >= 200 && length <= 1000) {
    score += 0.05;
  } else if (length > 1000) {
    score -= 0.05;
  }

  if (new Set(sequence).size >= 16) score += 0.05;

  return Math.min(Math.max(score, SCORE_FLOOR), SCORE_CEILING);
}
