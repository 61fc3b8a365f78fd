import type { Candidate, PersistenceStore, PipelineRun, Result, StoredRun } from "../types.js";
import { AppError } from "../libs/errors.js";
import { err, ok } from "../libs/result.js";

/**
 * Process-local store. Keeps cloned snapshots, so later in-memory mutation of a
 * candidate does not leak into what was saved.
 */
export class InMemoryStore implements PersistenceStore {
  private readonly runs = new Map<string, StoredRun>();
  private readonly candidates = new Map<string, Map<string, Candidate>>();

  async createRun(run: PipelineRun): Promise<Result<string>> {
    this.runs.set(run.runId, {
      runId: run.runId,
      pathogenName: run.pathogenName,
      inputType: run.inputType,
      currentStage: run.currentStage,
      createdAt: run.createdAt,
    });
    return ok(run.runId);
  }

  async saveCandidate(runId: string, candidate: Candidate): Promise<Result<string>> {
    let byProtein = this.candidates.get(runId);
    if (!byProtein) {
      byProtein = new Map();
      this.candidates.set(runId, byProtein);
    }
    byProtein.set(candidate.proteinId, structuredClone(candidate));
    return ok(`${runId}:${candidate.proteinId}`);
  }

  async updateRunStage(runId: string, stage: string): Promise<Result<void>> {
    const run = this.runs.get(runId);
    if (!run) {
      return err(new AppError({ code: "NOT_FOUND", message: `Run ${runId} not found` }));
    }
    run.currentStage = stage;
    return ok(undefined);
  }

  async getRun(runId: string): Promise<Result<StoredRun | null>> {
    const run = this.runs.get(runId);
    return ok(run ? { ...run } : null);
  }

  async getCandidatesForRun(runId: string): Promise<Result<Candidate[]>> {
    const byProtein = this.candidates.get(runId);
    return ok(byProtein ? [...byProtein.values()].map((c) => structuredClone(c)) : []);
  }
}
