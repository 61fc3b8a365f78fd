import { describe, expect, it } from "vitest";
import { parseArgs } from "../../src/cli.js";

describe("L11 · cli", () => {
  it("reads the input type and input", () => {
    expect(parseArgs(["single_id", "P0A910"])).toEqual({
      inputType: "single_id",
      rawInput: "P0A910",
      pathogenName: "P0A910",
    });
  });

  it("takes the pathogen name from --pathogen in any position", () => {
    expect(parseArgs(["--pathogen", "Test pathogen", "search_term", "porin"])).toEqual({
      inputType: "search_term",
      rawInput: "porin",
      pathogenName: "Test pathogen",
    });
  });

  it("truncates a derived pathogen name to 50 characters", () => {
    const fasta = ">seq\n" + "M".repeat(100);
    expect(parseArgs(["raw_text", fasta])?.pathogenName).toBe(fasta.slice(0, 50));
  });

  it("rejects an unknown input type or a missing input", () => {
    expect(parseArgs(["fasta", "MKT"])).toBeNull();
    expect(parseArgs(["raw_text"])).toBeNull();
    expect(parseArgs([])).toBeNull();
  });
});
