// ── Sequence input ────────────────────────────────────────────────────────────

export type InputType = "single_id" | "raw_text" | "search_term";

/** Cell-envelope class used by the localization heuristics. */
export type OrganismClass = "gram_positive" | "gram_negative" | "archaea";

/** Pathogen category used by the antigenicity weighting. */
export type OrganismCategory = "virus" | "bacteria" | "parasite" | "tumor";

export interface ProteinRecord {
  proteinId: string;
  proteinName: string;
  sequence: string;
  /** Provenance tag, e.g. "uniprot" or "user_input" */
  source: string;
  organism?: string;
  keywords?: string[];
  /** Curated location from the upstream database, when it has one */
  annotatedLocation?: string;
}

// ── Localization ──────────────────────────────────────────────────────────────

export type LocalizationLabel =
  | "cytoplasmic"
  | "inner_membrane"
  | "periplasmic"
  | "outer_membrane"
  | "extracellular"
  | "unknown";

export type Compartment = Exclude<LocalizationLabel, "unknown">;

export interface LocalizationFeatures {
  signalPeptide: boolean;
  transmembraneRegions: number;
  lipoproteinSignal: boolean;
}

export interface LocalizationResult {
  label: LocalizationLabel;
  /** 0–1 */
  confidence: number;
  /** 0–1, higher for more surface-exposed compartments */
  surfaceScore: number;
  scores: Partial<Record<Compartment, number>>;
  features?: LocalizationFeatures;
}

// ── Candidate ─────────────────────────────────────────────────────────────────

export type CandidateStatus = "active" | "deprioritized" | "discarded";

export type ConfidenceTier = "high" | "medium" | "low" | "uncertain" | "unscored";

/** Confidence an advisor or the fallback rules may attach to a verdict. */
export type ConfidenceLabel = Exclude<ConfidenceTier, "unscored">;

export type Verdict = "advance" | "deprioritize" | "discard";

export type DecisionSource = "advisor" | "fallback";

export interface DecisionRecord {
  readonly stage: string;
  readonly verdict: Verdict;
  readonly reasoning: string;
  readonly confidence?: ConfidenceLabel;
  readonly flags: readonly string[];
  readonly source: DecisionSource;
  /** ISO-8601 */
  readonly createdAt: string;
}

export interface Candidate {
  proteinId: string;
  proteinName: string;
  sequence: string;
  source: string;
  /** Source annotations; null when the source gave none */
  organism: string | null;
  keywords: string[];
  annotatedLocation: string | null;
  stage: string;
  status: CandidateStatus;
  confidenceTier: ConfidenceTier;
  flags: string[];
  localization: LocalizationLabel | null;
  transmembraneRegions: number | null;
  antigenicityScore: number | null;
  /** Append-only audit trail */
  decisions: DecisionRecord[];
  createdAt: string;
  updatedAt: string;
}

// ── Decision fusion ───────────────────────────────────────────────────────────

/** Compact view of a screened candidate handed to the advisor and fallback rules. */
export interface ScreeningSummary {
  proteinName: string;
  proteinId: string;
  sequenceLength: number;
  localization: LocalizationLabel | null;
  antigenicityScore: number | null;
  flags: string[];
  source: string;
}

export interface AdvisorDecision {
  verdict: Verdict;
  reasoning: string;
  confidence?: ConfidenceLabel;
  flags: string[];
}

export type AdvisorFaultKind = "unavailable" | "transport" | "timeout" | "malformed";

export interface AdvisorFault {
  kind: AdvisorFaultKind;
  message: string;
}

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

// ── Collaborators ─────────────────────────────────────────────────────────────

export interface SequenceSource {
  /** An empty list is a valid outcome, not an error. */
  fetchProteins(
    inputType: InputType,
    rawInput: string,
    limit: number
  ): Promise<ProteinRecord[]>;
}

/** Prompt-driven classifier. Resolves with the model's raw reply text. */
export interface AdvisoryService {
  readonly model: string;
  complete(systemPrompt: string, userPrompt: string): Promise<string>;
}

export interface PersistenceStore {
  createRun(run: PipelineRun): Promise<Result<string>>;
  /** Upserts by run id + protein id; returns the stored candidate id. */
  saveCandidate(runId: string, candidate: Candidate): Promise<Result<string>>;
  updateRunStage(runId: string, stage: string): Promise<Result<void>>;
  getRun(runId: string): Promise<Result<StoredRun | null>>;
  getCandidatesForRun(runId: string): Promise<Result<Candidate[]>>;
}

export interface StoredRun {
  runId: string;
  pathogenName: string;
  inputType: InputType;
  currentStage: string;
  createdAt: string;
}

// ── Pipeline ──────────────────────────────────────────────────────────────────

export interface RunError {
  stage: string;
  error: string;
  timestamp: string;
}

export interface RunDescriptor {
  pathogenName: string;
  inputType: InputType;
  rawInput: string;
  targetPopulations?: string[];
  coverageThreshold?: number;
  maxCandidatesOutput?: number;
  organismClass?: OrganismClass;
  organismCategory?: OrganismCategory;
  runId?: string;
}

export interface PipelineRun {
  runId: string;
  pathogenName: string;
  inputType: InputType;
  rawInput: string;
  targetPopulations: string[];
  coverageThreshold: number;
  /** Also caps how many proteins a search may return */
  maxCandidatesOutput: number;
  organismClass: OrganismClass;
  organismCategory: OrganismCategory;
  currentStage: string;
  candidates: Candidate[];
  activeCandidateCount: number;
  errors: RunError[];
  warnings: string[];
  createdAt: string;
  completedAt: string | null;
}

export interface RunSummary {
  runId: string;
  pathogenName: string;
  currentStage: string;
  totalCandidates: number;
  active: Candidate[];
  deprioritized: Candidate[];
  discarded: Candidate[];
  /** Candidates whose latest decision came from the rule-based fallback */
  fallbackDecisions: number;
  errors: RunError[];
  warnings: string[];
  durationMs: number;
}
