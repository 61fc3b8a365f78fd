import { randomUUID } from "node:crypto";
import type { Candidate, PipelineRun, RunDescriptor, RunSummary } from "../types.js";

export const DEFAULT_COVERAGE_THRESHOLD = 0.7;
export const DEFAULT_MAX_CANDIDATES = 20;

export function createPipelineRun(descriptor: RunDescriptor): PipelineRun {
  return {
    runId: descriptor.runId ?? randomUUID(),
    pathogenName: descriptor.pathogenName,
    inputType: descriptor.inputType,
    rawInput: descriptor.rawInput,
    targetPopulations: descriptor.targetPopulations ?? ["global"],
    coverageThreshold: descriptor.coverageThreshold ?? DEFAULT_COVERAGE_THRESHOLD,
    maxCandidatesOutput: descriptor.maxCandidatesOutput ?? DEFAULT_MAX_CANDIDATES,
    organismClass: descriptor.organismClass ?? "gram_negative",
    organismCategory: descriptor.organismCategory ?? "virus",
    currentStage: "initialization",
    candidates: [],
    activeCandidateCount: 0,
    errors: [],
    warnings: [],
    createdAt: new Date().toISOString(),
    completedAt: null,
  };
}

export function addRunError(run: PipelineRun, stage: string, error: string): void {
  run.errors.push({ stage, error, timestamp: new Date().toISOString() });
}

export function addRunWarning(run: PipelineRun, warning: string): void {
  run.warnings.push(`${new Date().toISOString()}: ${warning}`);
}

export function getActiveCandidates(run: PipelineRun): Candidate[] {
  return run.candidates.filter((c) => c.status === "active");
}

/** Buckets the run's candidates by status, the way downstream stages read them. */
export function summarizeRun(run: PipelineRun, durationMs: number): RunSummary {
  return {
    runId: run.runId,
    pathogenName: run.pathogenName,
    currentStage: run.currentStage,
    totalCandidates: run.candidates.length,
    active: getActiveCandidates(run),
    deprioritized: run.candidates.filter((c) => c.status === "deprioritized"),
    discarded: run.candidates.filter((c) => c.status === "discarded"),
    fallbackDecisions: run.candidates.filter((c) => c.decisions.at(-1)?.source === "fallback").length,
    errors: run.errors,
    warnings: run.warnings,
    durationMs,
  };
}
