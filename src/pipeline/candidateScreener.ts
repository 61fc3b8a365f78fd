import type {
  Candidate,
  LocalizationResult,
  OrganismCategory,
  OrganismClass,
} from "../types.js";
import { errorMessage } from "../libs/errors.js";
import type { StageLog } from "../libs/logger.js";
import { predictAntigenicity } from "./antigenicity.js";
import { predictLocalization } from "./localization.js";
import { detectSafetyFlags } from "./safetyFlags.js";

export const SCREENING_FAILED = "screening_failed";

export interface Analyzers {
  localize: (sequence: string, organismClass: OrganismClass) => LocalizationResult;
  antigenicity: (sequence: string, organism: OrganismCategory) => number;
  safetyFlags: (sequence: string) => string[];
}

export const DEFAULT_ANALYZERS: Analyzers = {
  localize: predictLocalization,
  antigenicity: predictAntigenicity,
  safetyFlags: detectSafetyFlags,
};

export interface ScreeningOptions {
  organismClass: OrganismClass;
  organismCategory: OrganismCategory;
  analyzers?: Analyzers;
}

/**
 * Runs localization → antigenicity → safety flags on one candidate, writing
 * each result as soon as it is known. An analyzer that throws stops the
 * sequence: earlier results stay, `screening_failed` is flagged, nothing is
 * rethrown.
 */
export function screenCandidate(
  candidate: Candidate,
  options: ScreeningOptions,
  log: StageLog
): Candidate {
  const analyzers = options.analyzers ?? DEFAULT_ANALYZERS;

  try {
    const localization = analyzers.localize(candidate.sequence, options.organismClass);
    candidate.localization = localization.label;
    candidate.transmembraneRegions = localization.features?.transmembraneRegions ?? null;

    candidate.antigenicityScore = analyzers.antigenicity(
      candidate.sequence,
      options.organismCategory
    );

    candidate.flags.push(...analyzers.safetyFlags(candidate.sequence));

    log.debug(
      {
        proteinId: candidate.proteinId,
        localization: candidate.localization,
        antigenicity: candidate.antigenicityScore,
        flags: candidate.flags,
      },
      "Screening complete"
    );
  } catch (err) {
    log.error(
      { proteinId: candidate.proteinId, err: errorMessage(err) },
      "Screening failed"
    );
    candidate.flags.push(SCREENING_FAILED);
  }

  return candidate;
}
