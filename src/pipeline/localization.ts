import type {
  Compartment,
  LocalizationLabel,
  LocalizationResult,
  OrganismClass,
} from "../types.js";
import { HYDROPHOBIC, POSITIVE, countIn, fractionIn } from "./residues.js";

const SIGNAL_WINDOW = 30;
const SIGNAL_MIN_LENGTH = 15;
const SIGNAL_HYDROPHOBIC_MIN = 0.4;

const TM_WINDOW = 20;
const TM_HYDROPHOBIC_MIN = 0.65;

const LIPOBOX_WINDOW = 20;
const LIPOBOX_MINUS_2: ReadonlySet<string> = new Set("LVI");
const LIPOBOX_MINUS_1: ReadonlySet<string> = new Set("ASTVI");

export const SURFACE_SCORES: Readonly<Record<LocalizationLabel, number>> = {
  outer_membrane: 1.0,
  extracellular: 1.0,
  periplasmic: 0.6,
  inner_membrane: 0.3,
  cytoplasmic: 0.1,
  unknown: 0.0,
};

export function unknownLocalization(): LocalizationResult {
  return { label: "unknown", confidence: 0, surfaceScore: 0, scores: {} };
}

/**
 * Rule-based subcellular localization from N-terminal signals and
 * transmembrane segments. Label priority, first match wins:
 *
 *   lipobox            → outer_membrane  (0.8)
 *   > 2 TM regions     → inner_membrane  (0.7)
 *   signal, no TM      → extracellular (gram+) / periplasmic  (0.6)
 *   exactly 1 TM       → inner_membrane  (0.5)
 *   otherwise          → cytoplasmic     (0.7)
 *
 * Never throws: an empty sequence or an internal error yields `unknown`.
 */
export function predictLocalization(
  sequence: string,
  organismClass: OrganismClass = "gram_negative"
): LocalizationResult {
  if (sequence.length === 0) return unknownLocalization();
  try {
    return classify(sequence, organismClass);
  } catch {
    return unknownLocalization();
  }
}

function classify(sequence: string, organismClass: OrganismClass): LocalizationResult {
  const signalPeptide = hasSignalPeptide(sequence);
  const transmembraneRegions = countTransmembraneRegions(sequence);
  const lipoproteinSignal = hasLipoproteinSignal(sequence);

  let label: Compartment;
  let confidence: number;
  if (lipoproteinSignal) {
    label = "outer_membrane";
    confidence = 0.8;
  } else if (transmembraneRegions > 2) {
    label = "inner_membrane";
    confidence = 0.7;
  } else if (signalPeptide && transmembraneRegions === 0) {
    label = organismClass === "gram_positive" ? "extracellular" : "periplasmic";
    confidence = 0.6;
  } else if (transmembraneRegions === 1) {
    label = "inner_membrane";
    confidence = 0.5;
  } else {
    label = "cytoplasmic";
    confidence = 0.7;
  }

  return {
    label,
    confidence,
    surfaceScore: SURFACE_SCORES[label],
    scores: compartmentScores(label, confidence),
    features: { signalPeptide, transmembraneRegions, lipoproteinSignal },
  };
}

function compartmentScores(
  label: Compartment,
  confidence: number
): Record<Compartment, number> {
  const scoreFor = (c: Compartment, base: number) => (c === label ? confidence : base);
  return {
    cytoplasmic: scoreFor("cytoplasmic", 0.2),
    inner_membrane: scoreFor("inner_membrane", 0.1),
    periplasmic: scoreFor("periplasmic", 0.1),
    outer_membrane: scoreFor("outer_membrane", 0.1),
    extracellular: scoreFor("extracellular", 0.1),
  };
}

/**
 * Positively charged n-region (residues 1–5) followed by a hydrophobic
 * h-region (residues 6–15).
 */
export function hasSignalPeptide(sequence: string): boolean {
  const nTerminal = sequence.slice(0, SIGNAL_WINDOW);
  if (nTerminal.length < SIGNAL_MIN_LENGTH) return false;

  const nRegion = nTerminal.slice(0, 5);
  const hRegion = nTerminal.slice(5, 15);
  return (
    countIn(nRegion, POSITIVE) >= 1 &&
    fractionIn(hRegion, HYDROPHOBIC) > SIGNAL_HYDROPHOBIC_MIN
  );
}

/** Hydrophobic 20-residue windows; a hit skips a full window ahead. */
export function countTransmembraneRegions(sequence: string): number {
  let count = 0;
  let i = 0;
  while (i <= sequence.length - TM_WINDOW) {
    const window = sequence.slice(i, i + TM_WINDOW);
    if (fractionIn(window, HYDROPHOBIC) >= TM_HYDROPHOBIC_MIN) {
      count++;
      i += TM_WINDOW;
    } else {
      i++;
    }
  }
  return count;
}

/** Lipobox-like [LVI][ASTVI]C within the first 20 residues. */
export function hasLipoproteinSignal(sequence: string): boolean {
  if (sequence.length < LIPOBOX_WINDOW) return false;
  const nTerminal = sequence.slice(0, LIPOBOX_WINDOW);
  for (let i = 2; i < nTerminal.length; i++) {
    if (
      nTerminal[i] === "C" &&
      LIPOBOX_MINUS_2.has(nTerminal[i - 2]) &&
      LIPOBOX_MINUS_1.has(nTerminal[i - 1])
    ) {
      return true;
    }
  }
  return false;
}
