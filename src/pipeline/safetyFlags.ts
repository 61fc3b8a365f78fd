import { HYDROPHOBIC, STANDARD_RESIDUES, fractionIn, longestRun } from "./residues.js";

export type SafetyFlag =
  | "too_short"
  | "very_long"
  | "invalid_amino_acids"
  | "repetitive_sequence"
  | "signal_peptide";

export const MIN_LENGTH = 50;
export const MAX_LENGTH = 2000;

/**
 * Sequence-level red flags checked before a decision is made. Every check is
 * independent; flags come back in check order.
 */
export function detectSafetyFlags(sequence: string): SafetyFlag[] {
  const flags: SafetyFlag[] = [];

  if (sequence.length < MIN_LENGTH) {
    flags.push("too_short");
  } else if (sequence.length > MAX_LENGTH) {
    flags.push("very_long");
  }

  if (hasNonStandardResidue(sequence)) flags.push("invalid_amino_acids");
  if (isHighlyRepetitive(sequence)) flags.push("repetitive_sequence");
  if (hasHydrophobicNTerminus(sequence)) flags.push("signal_peptide");

  return flags;
}

export function hasNonStandardResidue(sequence: string): boolean {
  for (const aa of sequence) {
    if (!STANDARD_RESIDUES.has(aa)) return true;
  }
  return false;
}

/** Longest single-residue run over 10, or over 30% of the sequence. */
export function isHighlyRepetitive(sequence: string): boolean {
  if (sequence.length < 20) return false;
  const run = longestRun(sequence);
  return run > 10 || run > sequence.length * 0.3;
}

/** Coarser than the localization signal-peptide check: hydrophobicity only. */
export function hasHydrophobicNTerminus(sequence: string): boolean {
  if (sequence.length < 25) return false;
  return fractionIn(sequence.slice(0, 25), HYDROPHOBIC) > 0.5;
}
