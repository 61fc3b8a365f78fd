import { MongoClient, type Collection, type Db } from "mongodb";
import type {
  Candidate,
  CandidateStatus,
  ConfidenceTier,
  DecisionRecord,
  InputType,
  LocalizationLabel,
  PersistenceStore,
  PipelineRun,
  Result,
  StoredRun,
} from "../types.js";
import { settle } from "../libs/result.js";

export type RunDocument = {
  run_id: string;
  pathogen_name: string;
  input_type: InputType;
  raw_input: string;
  target_populations: string[];
  coverage_threshold: number;
  max_candidates_output: number;
  current_stage: string;
  created_at: Date;
  updated_at: Date;
  completed_at: Date | null;
};

export type DecisionDocument = {
  stage: string;
  decision: DecisionRecord["verdict"];
  reasoning: string;
  confidence: DecisionRecord["confidence"] | null;
  flags: string[];
  source: DecisionRecord["source"];
  timestamp: string;
};

export type CandidateDocument = {
  run_id: string;
  protein_id: string;
  protein_name: string;
  sequence: string;
  source: string;
  organism: string | null;
  keywords: string[];
  annotated_location: string | null;
  stage: string;
  status: CandidateStatus;
  confidence_tier: ConfidenceTier;
  flags: string[];
  localization: LocalizationLabel | null;
  transmembrane_regions: number | null;
  antigenicity_score: number | null;
  decisions: DecisionDocument[];
  created_at: string;
  updated_at: string;
};

/**
 * MongoDB-backed store. Runs and candidates live in two collections; a
 * candidate's decision trail is embedded in its document.
 */
export class MongoStore implements PersistenceStore {
  private readonly runs: Collection<RunDocument>;
  private readonly candidates: Collection<CandidateDocument>;

  constructor(db: Db) {
    this.runs = db.collection<RunDocument>("runs");
    this.candidates = db.collection<CandidateDocument>("candidates");
  }

  static async connect(url: string, dbName: string): Promise<{ store: MongoStore; client: MongoClient }> {
    const client = new MongoClient(url);
    await client.connect();
    const store = await closeOnFailure(client, async (connected) => {
      const opened = new MongoStore(connected.db(dbName));
      await opened.ensureIndexes();
      return opened;
    });
    return { store, client };
  }

  async ensureIndexes(): Promise<void> {
    await this.runs.createIndex({ run_id: 1 }, { unique: true });
    await this.candidates.createIndex({ run_id: 1, protein_id: 1 }, { unique: true });
  }

  createRun(run: PipelineRun): Promise<Result<string>> {
    return settle("PERSISTENCE_ERROR", async () => {
      const now = new Date();
      await this.runs.insertOne({
        run_id: run.runId,
        pathogen_name: run.pathogenName,
        input_type: run.inputType,
        raw_input: run.rawInput,
        target_populations: run.targetPopulations,
        coverage_threshold: run.coverageThreshold,
        max_candidates_output: run.maxCandidatesOutput,
        current_stage: run.currentStage,
        created_at: now,
        updated_at: now,
        completed_at: null,
      });
      return run.runId;
    });
  }

  saveCandidate(runId: string, candidate: Candidate): Promise<Result<string>> {
    return settle("PERSISTENCE_ERROR", async () => {
      const doc = toCandidateDocument(runId, candidate);
      await this.candidates.updateOne(
        { run_id: runId, protein_id: candidate.proteinId },
        { $set: doc },
        { upsert: true }
      );
      return `${runId}:${candidate.proteinId}`;
    });
  }

  updateRunStage(runId: string, stage: string): Promise<Result<void>> {
    return settle("PERSISTENCE_ERROR", async () => {
      await this.runs.updateOne(
        { run_id: runId },
        { $set: { current_stage: stage, updated_at: new Date() } }
      );
    });
  }

  getRun(runId: string): Promise<Result<StoredRun | null>> {
    return settle("PERSISTENCE_ERROR", async () => {
      const doc = await this.runs.findOne({ run_id: runId });
      if (!doc) return null;
      return {
        runId: doc.run_id,
        pathogenName: doc.pathogen_name,
        inputType: doc.input_type,
        currentStage: doc.current_stage,
        createdAt: doc.created_at.toISOString(),
      };
    });
  }

  getCandidatesForRun(runId: string): Promise<Result<Candidate[]>> {
    return settle("PERSISTENCE_ERROR", async () => {
      const docs = await this.candidates.find({ run_id: runId }).toArray();
      return docs.map(fromCandidateDocument);
    });
  }
}

/**
 * Runs `init` against an open client. If it fails the client is closed before
 * the error propagates.
 */
export async function closeOnFailure<C extends { close(): Promise<void> }, T>(
  client: C,
  init: (client: C) => Promise<T>
): Promise<T> {
  try {
    return await init(client);
  } catch (e) {
    await client.close();
    throw e;
  }
}

export function toCandidateDocument(runId: string, candidate: Candidate): CandidateDocument {
  return {
    run_id: runId,
    protein_id: candidate.proteinId,
    protein_name: candidate.proteinName,
    sequence: candidate.sequence,
    source: candidate.source,
    organism: candidate.organism,
    keywords: [...candidate.keywords],
    annotated_location: candidate.annotatedLocation,
    stage: candidate.stage,
    status: candidate.status,
    confidence_tier: candidate.confidenceTier,
    flags: [...candidate.flags],
    localization: candidate.localization,
    transmembrane_regions: candidate.transmembraneRegions,
    antigenicity_score: candidate.antigenicityScore,
    decisions: candidate.decisions.map((d) => ({
      stage: d.stage,
      decision: d.verdict,
      reasoning: d.reasoning,
      confidence: d.confidence ?? null,
      flags: [...d.flags],
      source: d.source,
      timestamp: d.createdAt,
    })),
    created_at: candidate.createdAt,
    updated_at: candidate.updatedAt,
  };
}

export function fromCandidateDocument(doc: CandidateDocument): Candidate {
  return {
    proteinId: doc.protein_id,
    proteinName: doc.protein_name,
    sequence: doc.sequence,
    source: doc.source,
    organism: doc.organism ?? null,
    keywords: [...(doc.keywords ?? [])],
    annotatedLocation: doc.annotated_location ?? null,
    stage: doc.stage,
    status: doc.status,
    confidenceTier: doc.confidence_tier,
    flags: [...doc.flags],
    localization: doc.localization,
    transmembraneRegions: doc.transmembrane_regions,
    antigenicityScore: doc.antigenicity_score,
    decisions: doc.decisions.map((d) =>
      Object.freeze({
        stage: d.stage,
        verdict: d.decision,
        reasoning: d.reasoning,
        ...(d.confidence == null ? {} : { confidence: d.confidence }),
        flags: Object.freeze([...d.flags]),
        source: d.source,
        createdAt: d.timestamp,
      })
    ),
    createdAt: doc.created_at,
    updatedAt: doc.updated_at,
  };
}
