import { vi } from "vitest";
import type { AdvisoryService, Candidate, ScreeningSummary } from "../../src/types.js";
import type { StageLog } from "../../src/libs/logger.js";
import { createCandidate } from "../../src/pipeline/candidateState.js";

/** All 20 standard residues once each. */
export const DIVERSE = "ACDEFGHIKLMNPQRSTVWY";

/**
 * 300 residues, no signal peptide, three 20-residue hydrophobic stretches
 * separated by glycine.
 */
export const THREE_TM_SEQUENCE =
  "G".repeat(40) +
  "L".repeat(20) +
  "G".repeat(60) +
  "L".repeat(20) +
  "G".repeat(60) +
  "L".repeat(20) +
  "G".repeat(80);

export function spyLog() {
  return {
    debug: vi.fn((_o: unknown, _msg: string) => undefined),
    info: vi.fn((_o: unknown, _msg: string) => undefined),
    warn: vi.fn((_o: unknown, _msg: string) => undefined),
    error: vi.fn((_o: unknown, _msg: string) => undefined),
  } satisfies StageLog;
}

export function scriptedAdvisor(reply: (userPrompt: string) => Promise<string>) {
  return {
    model: "test-model",
    complete: vi.fn((_systemPrompt: string, userPrompt: string) => reply(userPrompt)),
  } satisfies AdvisoryService;
}

export function makeCandidate(overrides: Partial<Candidate> & { proteinId: string }): Candidate {
  return {
    ...createCandidate(
      {
        proteinId: overrides.proteinId,
        proteinName: `Protein ${overrides.proteinId}`,
        sequence: DIVERSE.repeat(10),
        source: "user_input",
      },
      "data_curation"
    ),
    ...overrides,
  };
}

export function makeSummary(overrides: Partial<ScreeningSummary> = {}): ScreeningSummary {
  return {
    proteinName: "Test protein",
    proteinId: "TEST1",
    sequenceLength: 400,
    localization: "cytoplasmic",
    antigenicityScore: 0.5,
    flags: [],
    source: "user_input",
    ...overrides,
  };
}
