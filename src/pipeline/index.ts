import type { PersistenceStore, PipelineRun, ProteinRecord, Result, SequenceSource } from "../types.js";
import { errorMessage } from "../libs/errors.js";
import type { StageLog } from "../libs/logger.js";
import { settle } from "../libs/result.js";
import { type Analyzers, screenCandidate } from "./candidateScreener.js";
import { applyDecision, createCandidate } from "./candidateState.js";
import { type DecisionFusionEngine, summarizeScreening } from "./decisionFusion.js";
import { addRunError, addRunWarning, getActiveCandidates } from "./runState.js";

export const CURATION_STAGE = "data_curation";
export const SCREENING_COMPLETE_STAGE = "antigen_screening_complete";

export interface PipelineDeps {
  source: SequenceSource;
  fusion: DecisionFusionEngine;
  store: PersistenceStore;
  log: StageLog;
  analyzers?: Analyzers;
}

/**
 * Data-curation stage:
 *   1. Fetch protein records for the run's input
 *   2. Screen, decide and apply the decision for each one, in order
 *   3. Persist each candidate (failures become run warnings, never fatal)
 *   4. Count active candidates and advance the run's stage marker
 *
 * A failed or empty fetch leaves a `data_curation` error on the run.
 */
export async function runPipeline(
  run: PipelineRun,
  deps: PipelineDeps
): Promise<PipelineRun> {
  deps.log.info(
    { runId: run.runId, pathogen: run.pathogenName, inputType: run.inputType },
    "Starting data curation"
  );

  let records: ProteinRecord[];
  try {
    records = await deps.source.fetchProteins(
      run.inputType,
      run.rawInput.trim(),
      run.maxCandidatesOutput
    );
  } catch (err) {
    deps.log.error({ runId: run.runId, err: errorMessage(err) }, "Protein fetch failed");
    addRunError(run, CURATION_STAGE, `Protein fetch failed: ${errorMessage(err)}`);
    return run;
  }

  deps.log.info({ runId: run.runId, count: records.length }, "Fetched proteins");
  if (records.length === 0) {
    addRunError(run, CURATION_STAGE, "No proteins found for input");
    return run;
  }

  return screenRecords(run, records, deps);
}

/** Runs the per-candidate steps over records that have already been fetched. */
export async function screenRecords(
  run: PipelineRun,
  records: ProteinRecord[],
  deps: Omit<PipelineDeps, "source">
): Promise<PipelineRun> {
  const { fusion, store, log } = deps;

  try {
    for (const [i, record] of records.entries()) {
      log.info(
        { runId: run.runId, proteinId: record.proteinId, position: i + 1, of: records.length },
        "Processing protein"
      );

      const candidate = createCandidate(record, CURATION_STAGE);
      screenCandidate(
        candidate,
        {
          organismClass: run.organismClass,
          organismCategory: run.organismCategory,
          analyzers: deps.analyzers,
        },
        log
      );

      const decision = await fusion.decide(summarizeScreening(candidate));
      applyDecision(candidate, decision);
      run.candidates.push(candidate);

      const saved = await persist(() => store.saveCandidate(run.runId, candidate));
      if (!saved.ok) {
        log.warn(
          { runId: run.runId, proteinId: candidate.proteinId, err: saved.error.message },
          "Failed to save candidate"
        );
        addRunWarning(run, `Failed to save candidate ${candidate.proteinId}: ${saved.error.message}`);
      }
    }

    run.activeCandidateCount = getActiveCandidates(run).length;
    run.currentStage = SCREENING_COMPLETE_STAGE;

    const staged = await persist(() => store.updateRunStage(run.runId, SCREENING_COMPLETE_STAGE));
    if (!staged.ok) {
      log.warn({ runId: run.runId, err: staged.error.message }, "Failed to update run stage");
      addRunWarning(run, `Failed to record stage ${SCREENING_COMPLETE_STAGE}: ${staged.error.message}`);
    }

    log.info(
      { runId: run.runId, active: run.activeCandidateCount, total: run.candidates.length },
      "Data curation complete"
    );
  } catch (err) {
    log.error({ runId: run.runId, err: errorMessage(err) }, "Data curation failed");
    addRunError(run, CURATION_STAGE, errorMessage(err));
    run.activeCandidateCount = getActiveCandidates(run).length;
  }

  return run;
}

/** A store call that rejects is folded into a failed Result like one that reports failure. */
async function persist<T>(op: () => Promise<Result<T>>): Promise<Result<T>> {
  const settled = await settle("PERSISTENCE_ERROR", op);
  return settled.ok ? settled.value : settled;
}
