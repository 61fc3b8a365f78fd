import type { Candidate, DecisionRecord, ProteinRecord } from "../types.js";
import { assertUnreachable } from "../libs/errors.js";

export function createCandidate(record: ProteinRecord, stage: string): Candidate {
  const now = new Date().toISOString();
  return {
    proteinId: record.proteinId,
    proteinName: record.proteinName,
    sequence: record.sequence,
    source: record.source,
    organism: record.organism ?? null,
    keywords: [...(record.keywords ?? [])],
    annotatedLocation: record.annotatedLocation ?? null,
    stage,
    status: "active",
    confidenceTier: "unscored",
    flags: [],
    localization: null,
    transmembraneRegions: null,
    antigenicityScore: null,
    decisions: [],
    createdAt: now,
    updatedAt: now,
  };
}

/** Appends to the audit trail; earlier entries are never touched. */
export function appendDecision(candidate: Candidate, record: DecisionRecord): void {
  candidate.decisions.push(record);
  candidate.updatedAt = new Date().toISOString();
}

/**
 * Records the decision and moves status and confidence tier together:
 *   advance      → active,        tier from the record (medium if absent)
 *   deprioritize → deprioritized, low
 *   discard      → discarded,     uncertain
 * Flags carried by the record are added to the candidate.
 */
export function applyDecision(candidate: Candidate, record: DecisionRecord): Candidate {
  appendDecision(candidate, record);

  switch (record.verdict) {
    case "advance":
      candidate.status = "active";
      candidate.confidenceTier = record.confidence ?? "medium";
      break;
    case "deprioritize":
      candidate.status = "deprioritized";
      candidate.confidenceTier = "low";
      break;
    case "discard":
      candidate.status = "discarded";
      candidate.confidenceTier = "uncertain";
      break;
    default:
      assertUnreachable(record.verdict);
  }

  candidate.flags.push(...record.flags);
  return candidate;
}
