import type {
  AdvisorDecision,
  AdvisorFault,
  AdvisoryService,
  Candidate,
  DecisionRecord,
  DecisionSource,
  Result,
  ScreeningSummary,
} from "../types.js";
import { AppError, errorMessage } from "../libs/errors.js";
import type { StageLog } from "../libs/logger.js";
import { err, ok } from "../libs/result.js";
import { withTimeout } from "../libs/timeout.js";
import { getSystemPrompt, getUserPrompt } from "./advisorPrompt.js";
import { parseAdvisorPayload } from "./advisorPayload.js";
import { fallbackDecision } from "./fallbackDecision.js";

export const DECISION_STAGE = "antigen_screening";
const DEFAULT_TIMEOUT_MS = 30_000;

export interface DecisionFusionOptions {
  log: StageLog;
  stage?: string;
  /** Upper bound on one advisor call; exceeding it counts as unavailable */
  timeoutMs?: number;
}

export function summarizeScreening(candidate: Candidate): ScreeningSummary {
  return {
    proteinName: candidate.proteinName,
    proteinId: candidate.proteinId,
    sequenceLength: candidate.sequence.length,
    localization: candidate.localization,
    antigenicityScore: candidate.antigenicityScore,
    flags: [...candidate.flags],
    source: candidate.source,
  };
}

export function createDecisionRecord(
  stage: string,
  decision: AdvisorDecision,
  source: DecisionSource
): DecisionRecord {
  const record: DecisionRecord = {
    stage,
    verdict: decision.verdict,
    reasoning: decision.reasoning,
    ...(decision.confidence === undefined ? {} : { confidence: decision.confidence }),
    flags: Object.freeze([...decision.flags]),
    source,
    createdAt: new Date().toISOString(),
  };
  return Object.freeze(record);
}

/**
 * Turns screening results into a verdict. The advisor is asked first; when it
 * is absent, throws, times out or replies with something unusable, the
 * rule-based fallback decides instead. `decide` never rejects.
 */
export class DecisionFusionEngine {
  private readonly log: StageLog;
  private readonly stage: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly advisor: AdvisoryService | null,
    options: DecisionFusionOptions
  ) {
    this.log = options.log;
    this.stage = options.stage ?? DECISION_STAGE;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async decide(summary: ScreeningSummary): Promise<DecisionRecord> {
    const advice = await this.requestAdvice(summary);
    if (advice.ok) {
      this.log.info(
        { proteinId: summary.proteinId, verdict: advice.value.verdict },
        "Advisor decision"
      );
      return createDecisionRecord(this.stage, advice.value, "advisor");
    }

    this.log.warn(
      { proteinId: summary.proteinId, fault: advice.error.kind, reason: advice.error.message },
      "Advisor unusable, using rule-based decision"
    );
    return createDecisionRecord(this.stage, fallbackDecision(summary), "fallback");
  }

  async requestAdvice(summary: ScreeningSummary): Promise<Result<AdvisorDecision, AdvisorFault>> {
    if (this.advisor === null) {
      return err({ kind: "unavailable", message: "No advisor configured" });
    }

    let reply: string;
    try {
      reply = await withTimeout(
        this.advisor.complete(getSystemPrompt(), getUserPrompt(summary)),
        this.timeoutMs,
        `Advisor ${this.advisor.model}`
      );
    } catch (e) {
      const timedOut = e instanceof AppError && e.code === "ADVISOR_TIMEOUT";
      return err({ kind: timedOut ? "timeout" : "transport", message: errorMessage(e) });
    }

    const decision = parseAdvisorPayload(reply);
    if (decision === null) {
      return err({ kind: "malformed", message: `Unparsable advisor reply: ${reply.slice(0, 200)}` });
    }
    return ok(decision);
  }
}
