import { describe, expect, it } from "vitest";
import {
  DEFAULT_ANALYZERS,
  SCREENING_FAILED,
  screenCandidate,
} from "../../src/pipeline/candidateScreener.js";
import { THREE_TM_SEQUENCE, makeCandidate, spyLog } from "../support/fixtures.js";

const OPTIONS = { organismClass: "gram_negative", organismCategory: "virus" } as const;

describe("L4 · candidateScreener", () => {
  it("writes localization, TM count, antigenicity and safety flags", () => {
    const log = spyLog();
    const candidate = makeCandidate({ proteinId: "TM3", sequence: THREE_TM_SEQUENCE });

    screenCandidate(candidate, OPTIONS, log);

    expect(candidate.localization).toBe("inner_membrane");
    expect(candidate.transmembraneRegions).toBe(3);
    expect(candidate.antigenicityScore).toBeCloseTo(0.61, 10);
    expect(candidate.flags).toEqual(["repetitive_sequence"]);
    expect(log.error).not.toHaveBeenCalled();
  });

  it("returns the same candidate it was given", () => {
    const candidate = makeCandidate({ proteinId: "SAME" });
    expect(screenCandidate(candidate, OPTIONS, spyLog())).toBe(candidate);
  });

  it("keeps earlier results and flags screening_failed when an analyzer throws", () => {
    const log = spyLog();
    const candidate = makeCandidate({ proteinId: "BROKEN", sequence: THREE_TM_SEQUENCE });

    screenCandidate(
      candidate,
      {
        ...OPTIONS,
        analyzers: {
          ...DEFAULT_ANALYZERS,
          antigenicity: () => {
            throw new Error("model offline");
          },
        },
      },
      log
    );

    expect(candidate.localization).toBe("inner_membrane");
    expect(candidate.antigenicityScore).toBeNull();
    expect(candidate.flags).toEqual([SCREENING_FAILED]);
    expect(log.error).toHaveBeenCalledWith({ proteinId: "BROKEN", err: "model offline" }, "Screening failed");
  });

  it("leaves every result empty when localization throws first", () => {
    const candidate = makeCandidate({ proteinId: "EARLY" });

    screenCandidate(
      candidate,
      {
        ...OPTIONS,
        analyzers: {
          ...DEFAULT_ANALYZERS,
          localize: () => {
            throw new Error("bad input");
          },
        },
      },
      spyLog()
    );

    expect(candidate.localization).toBeNull();
    expect(candidate.transmembraneRegions).toBeNull();
    expect(candidate.antigenicityScore).toBeNull();
    expect(candidate.flags).toEqual(["screening_failed"]);
  });

  it("passes the run's organism settings to the analyzers", () => {
    const candidate = makeCandidate({ proteinId: "POS", sequence: "MKGGG" + "LLLLLLGGGG" + "G".repeat(85) });

    screenCandidate(candidate, { organismClass: "gram_positive", organismCategory: "bacteria" }, spyLog());

    expect(candidate.localization).toBe("extracellular");
    expect(candidate.transmembraneRegions).toBe(0);
  });
});
