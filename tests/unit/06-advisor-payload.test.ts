import { describe, expect, it } from "vitest";
import { extractJsonBlock, parseAdvisorPayload } from "../../src/pipeline/advisorPayload.js";
import { getUserPrompt } from "../../src/pipeline/advisorPrompt.js";
import { makeSummary } from "../support/fixtures.js";

const VALID = JSON.stringify({
  decision: "advance",
  reasoning: "Surface exposed with strong antigenicity",
  confidence: "high",
  flags: ["surface_exposed"],
});

describe("L6 · advisorPayload", () => {
  it("parses a bare JSON reply", () => {
    expect(parseAdvisorPayload(VALID)).toEqual({
      verdict: "advance",
      reasoning: "Surface exposed with strong antigenicity",
      confidence: "high",
      flags: ["surface_exposed"],
    });
  });

  it("unwraps a ```json fence", () => {
    const reply = "Here is my assessment:\n```json\n" + VALID + "\n```\nThanks.";
    expect(parseAdvisorPayload(reply)?.verdict).toBe("advance");
  });

  it("unwraps a bare ``` fence", () => {
    expect(extractJsonBlock("```\n{\"decision\": \"discard\"}\n```")).toBe('{"decision": "discard"}');
  });

  it("finds the object inside surrounding prose", () => {
    expect(parseAdvisorPayload(`Here you go: ${VALID} Let me know if you need more.`)).toEqual({
      verdict: "advance",
      reasoning: "Surface exposed with strong antigenicity",
      confidence: "high",
      flags: ["surface_exposed"],
    });
    expect(extractJsonBlock('Verdict follows {"decision": "discard"} done')).toBe('{"decision": "discard"}');
  });

  it("rejects text that is not JSON", () => {
    expect(parseAdvisorPayload("not json")).toBeNull();
    expect(parseAdvisorPayload("")).toBeNull();
    expect(parseAdvisorPayload(null)).toBeNull();
  });

  it("rejects JSON that is not an object", () => {
    expect(parseAdvisorPayload("[1, 2]")).toBeNull();
    expect(parseAdvisorPayload('"advance"')).toBeNull();
  });

  it("rejects an unknown verdict", () => {
    expect(parseAdvisorPayload(JSON.stringify({ decision: "maybe", reasoning: "unsure" }))).toBeNull();
  });

  it("rejects a missing or blank reasoning", () => {
    expect(parseAdvisorPayload(JSON.stringify({ decision: "discard" }))).toBeNull();
    expect(parseAdvisorPayload(JSON.stringify({ decision: "discard", reasoning: "   " }))).toBeNull();
  });

  it("drops an unrecognised confidence and non-string flags", () => {
    const reply = JSON.stringify({
      decision: "deprioritize",
      reasoning: " Borderline ",
      confidence: "very high",
      flags: ["weak", 3, "", null, "cytoplasmic"],
    });

    expect(parseAdvisorPayload(reply)).toEqual({
      verdict: "deprioritize",
      reasoning: "Borderline",
      flags: ["weak", "cytoplasmic"],
    });
  });
});

describe("L6 · advisorPrompt", () => {
  it("lists the screening results the advisor decides on", () => {
    const prompt = getUserPrompt(
      makeSummary({ antigenicityScore: 0.8, localization: "outer_membrane", flags: ["signal_peptide"] })
    );

    expect(prompt).toContain("Antigenicity score: 0.800");
    expect(prompt).toContain("- Cellular location: outer_membrane\n");
    expect(prompt).toContain("- Flags: signal_peptide\n");
  });

  it("says so when antigenicity was not calculated", () => {
    expect(getUserPrompt(makeSummary({ antigenicityScore: null }))).toContain("Not calculated");
  });
});
