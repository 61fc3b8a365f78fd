import type { ScreeningSummary } from "../types.js";

export function getSystemPrompt(): string {
  return (
    "You are evaluating proteins for vaccine candidate screening. " +
    "Classify each protein from the screening data you are given and answer with a single JSON object only."
  );
}

export function getUserPrompt(summary: ScreeningSummary): string {
  const antigenicity =
    summary.antigenicityScore == null ? "Not calculated" : summary.antigenicityScore.toFixed(3);
  const flags = summary.flags.length > 0 ? summary.flags.join(", ") : "none";

  return (
    "Protein information:\n" +
    `- Name: ${summary.proteinName}\n` +
    `- Identifier: ${summary.proteinId}\n` +
    `- Length: ${summary.sequenceLength} amino acids\n` +
    `- Cellular location: ${summary.localization ?? "unknown"}\n` +
    `- Antigenicity score: ${antigenicity} (>0.5 is good)\n` +
    `- Source: ${summary.source}\n` +
    `- Flags: ${flags}\n\n` +
    "Decision criteria:\n" +
    "- Surface proteins (extracellular, outer_membrane) are preferred\n" +
    "- Antigenicity scores above 0.5 indicate a good immune response\n" +
    "- Reasonable length (50-2000 amino acids) for vaccine development\n" +
    "- Safety flags count against the protein\n\n" +
    "Respond in JSON only:\n" +
    '{"decision": "advance" | "deprioritize" | "discard", ' +
    '"reasoning": "one sentence explanation", ' +
    '"confidence": "high" | "medium" | "low", ' +
    '"flags": ["flag", ...]}'
  );
}
