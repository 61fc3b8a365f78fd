import type { AdvisorDecision, ConfidenceLabel, Verdict } from "../types.js";

const VERDICTS: readonly Verdict[] = ["advance", "deprioritize", "discard"];
const CONFIDENCE_LABELS: readonly ConfidenceLabel[] = ["high", "medium", "low", "uncertain"];

/**
 * Pulls the JSON body out of a reply that may wrap it in a ```json fence, in
 * a bare ``` fence, or in surrounding prose.
 */
export function extractJsonBlock(text: string): string {
  const trimmed = text.trim();
  const jsonFence = trimmed.match(/```json\s*([\s\S]*?)```/i);
  if (jsonFence) return jsonFence[1].trim();

  if (trimmed.includes("```")) {
    const part = trimmed.split("```").find((p) => p.includes("{") && p.includes("}"));
    if (part !== undefined) return part.trim();
  }
  return outermostObject(trimmed);
}

/** First `{` through last `}`; the text unchanged when there is no such span. */
function outermostObject(text: string): string {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  return start >= 0 && end > start ? text.slice(start, end + 1) : text;
}

/**
 * Validates an advisor reply. Returns null when the reply is unusable: not
 * JSON, not an object, an unknown verdict, or no reasoning. An unrecognised
 * confidence is dropped; non-string flags are ignored.
 */
export function parseAdvisorPayload(text: string | null | undefined): AdvisorDecision | null {
  if (text == null || text.trim() === "") return null;

  const parsed = tryParseJson(extractJsonBlock(text));
  if (!isRecord(parsed)) return null;

  const verdict = VERDICTS.find((v) => v === parsed.decision);
  if (verdict === undefined) return null;

  const reasoning = typeof parsed.reasoning === "string" ? parsed.reasoning.trim() : "";
  if (reasoning === "") return null;

  const confidence = CONFIDENCE_LABELS.find((c) => c === parsed.confidence);
  const flags = Array.isArray(parsed.flags)
    ? parsed.flags.filter((f): f is string => typeof f === "string" && f.length > 0)
    : [];

  return confidence === undefined
    ? { verdict, reasoning, flags }
    : { verdict, reasoning, confidence, flags };
}

function tryParseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
