import { describe, expect, it } from "vitest";
import {
  detectSafetyFlags,
  hasHydrophobicNTerminus,
  hasNonStandardResidue,
  isHighlyRepetitive,
} from "../../src/pipeline/safetyFlags.js";
import { DIVERSE } from "../support/fixtures.js";

describe("L3 · safetyFlags", () => {
  it("flags a short hydrophobic homopolymer three ways, in check order", () => {
    expect(detectSafetyFlags("A".repeat(30))).toEqual(["too_short", "repetitive_sequence", "signal_peptide"]);
  });

  it("returns no flags for a clean sequence", () => {
    expect(detectSafetyFlags(DIVERSE.repeat(3))).toEqual([]);
  });

  it("flags very long sequences", () => {
    expect(detectSafetyFlags("G".repeat(2001))).toEqual(["very_long", "repetitive_sequence"]);
    expect(detectSafetyFlags(DIVERSE.repeat(100))).toEqual([]);
  });

  it("flags residues outside the standard twenty", () => {
    expect(detectSafetyFlags(DIVERSE.repeat(3) + "X")).toEqual(["invalid_amino_acids"]);
    expect(hasNonStandardResidue("acdef")).toBe(true);
    expect(hasNonStandardResidue("ACDEF")).toBe(false);
  });

  it("flags a run longer than 30% of a short sequence", () => {
    expect(detectSafetyFlags("GGGGGGG" + "ACDEFHIKLMNPQ")).toEqual(["too_short", "repetitive_sequence"]);
  });

  it("does not check repetition below 20 residues", () => {
    expect(detectSafetyFlags("G".repeat(19))).toEqual(["too_short"]);
  });

  it("tolerates a run of exactly ten in a longer sequence", () => {
    expect(isHighlyRepetitive("G".repeat(10) + DIVERSE.repeat(3))).toBe(false);
    expect(isHighlyRepetitive("G".repeat(11) + DIVERSE.repeat(3))).toBe(true);
  });

  it("needs more than half of the first 25 residues hydrophobic", () => {
    expect(hasHydrophobicNTerminus("L".repeat(13) + "G".repeat(12))).toBe(true);
    expect(hasHydrophobicNTerminus("L".repeat(12) + "G".repeat(13))).toBe(false);
    expect(hasHydrophobicNTerminus("L".repeat(24))).toBe(false);
  });
});
