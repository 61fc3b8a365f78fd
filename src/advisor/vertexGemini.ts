/**
 * Gemini on Vertex AI as the screening advisor. Low temperature and a small
 * token budget: the reply is a single JSON verdict.
 */

import { GoogleAuth } from "google-auth-library";
import type { AdvisoryService } from "../types.js";
import { DEFAULT_GEMINI_MODEL, DEFAULT_VERTEX_LOCATION } from "../libs/config.js";
import { AppError } from "../libs/errors.js";

const MAX_OUTPUT_TOKENS = 256;
const TEMPERATURE = 0.2;
const SCOPES = ["https://www.googleapis.com/auth/cloud-platform"];

export type TokenProvider = () => Promise<string | null | undefined>;

export type VertexGeminiOptions = {
  projectId: string;
  location?: string;
  model?: string;
  /** Defaults to application-default credentials via google-auth-library */
  getAccessToken?: TokenProvider;
  fetchImpl?: (url: string, init: RequestInit) => Promise<Response>;
};

export class VertexGeminiAdvisor implements AdvisoryService {
  readonly model: string;
  private readonly projectId: string;
  private readonly location: string;
  private readonly getAccessToken: TokenProvider;
  private readonly fetchImpl: (url: string, init: RequestInit) => Promise<Response>;

  constructor(opts: VertexGeminiOptions) {
    this.projectId = opts.projectId;
    this.location = opts.location ?? DEFAULT_VERTEX_LOCATION;
    this.model = opts.model ?? DEFAULT_GEMINI_MODEL;
    this.getAccessToken = opts.getAccessToken ?? googleAccessToken();
    this.fetchImpl = opts.fetchImpl ?? ((url, init) => fetch(url, init));
  }

  /** One `generateContent` call; resolves with the first candidate's text. */
  async complete(systemPrompt: string, userPrompt: string): Promise<string> {
    const token = await this.getAccessToken();
    if (!token) {
      throw new AppError({ code: "UPSTREAM_ERROR", message: "Failed to get Vertex AI access token" });
    }

    const url =
      `https://${this.location}-aiplatform.googleapis.com/v1/projects/${this.projectId}` +
      `/locations/${this.location}/publishers/google/models/${this.model}:generateContent`;
    const body = {
      contents: [{ role: "user", parts: [{ text: userPrompt }] }],
      system_instruction: { parts: [{ text: systemPrompt }] },
      generationConfig: {
        maxOutputTokens: MAX_OUTPUT_TOKENS,
        temperature: TEMPERATURE,
      },
    };

    const res = await this.fetchImpl(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${token}`,
      },
      body: JSON.stringify(body),
    });

    if (!res.ok) {
      const errText = await res.text();
      throw new AppError({
        code: "UPSTREAM_ERROR",
        message: `Vertex AI error ${res.status}`,
        details: errText.slice(0, 500),
      });
    }

    const text = firstCandidateText(await res.json());
    if (text === undefined) {
      throw new AppError({ code: "UPSTREAM_ERROR", message: "Vertex AI returned no text" });
    }
    return text;
  }
}

function googleAccessToken(): TokenProvider {
  const auth = new GoogleAuth({ scopes: SCOPES });
  return async () => {
    const client = await auth.getClient();
    const token = await client.getAccessToken();
    return token.token;
  };
}

/** candidates[0].content.parts[0].text, if the response has one. */
export function firstCandidateText(data: unknown): string | undefined {
  const candidates = field(data, "candidates");
  if (!Array.isArray(candidates) || candidates.length === 0) return undefined;
  const parts = field(field(candidates[0], "content"), "parts");
  if (!Array.isArray(parts) || parts.length === 0) return undefined;
  const text = field(parts[0], "text");
  return typeof text === "string" ? text : undefined;
}

function field(value: unknown, key: string): unknown {
  if (typeof value !== "object" || value === null) return undefined;
  return Reflect.get(value, key);
}
