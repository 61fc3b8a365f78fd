import type { InputType, ProteinRecord, SequenceSource } from "../types.js";
import { DEFAULT_UNIPROT_BASE_URL } from "../libs/config.js";
import { AppError, assertUnreachable } from "../libs/errors.js";
import type { StageLog } from "../libs/logger.js";
import { cleanSequence, parseFasta } from "./fasta.js";

const USER_AGENT = "antigen-screen/0.1 (vaccine candidate screening)";

export type FetchLike = (url: string, init?: { headers?: Record<string, string> }) => Promise<Response>;

export type UniProtSourceOptions = {
  log: StageLog;
  baseUrl?: string;
  fetchImpl?: FetchLike;
};

/**
 * Sequence source backed by the UniProt REST API. `raw_text` input never
 * leaves the process; it is parsed as FASTA.
 */
export class UniProtSource implements SequenceSource {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private readonly log: StageLog;

  constructor(opts: UniProtSourceOptions) {
    this.baseUrl = (opts.baseUrl ?? DEFAULT_UNIPROT_BASE_URL).replace(/\/+$/, "");
    this.fetchImpl = opts.fetchImpl ?? ((url, init) => fetch(url, init));
    this.log = opts.log;
  }

  async fetchProteins(inputType: InputType, rawInput: string, limit: number): Promise<ProteinRecord[]> {
    switch (inputType) {
      case "single_id": {
        const record = await this.fetchById(rawInput);
        return record ? [record] : [];
      }
      case "raw_text": {
        const records = parseFasta(rawInput);
        this.log.info({ count: records.length }, "Parsed FASTA input");
        return records;
      }
      case "search_term":
        return this.search(rawInput, limit);
      default:
        return assertUnreachable(inputType);
    }
  }

  /** null when the accession does not exist. */
  async fetchById(accession: string): Promise<ProteinRecord | null> {
    const url = `${this.baseUrl}/uniprotkb/${encodeURIComponent(accession)}.json`;
    this.log.info({ accession }, "Fetching protein from UniProt");

    const res = await this.get(url);
    if (res.status === 404) {
      this.log.warn({ accession }, "Protein not found in UniProt");
      return null;
    }
    await assertOk(res, accession);
    return toProteinRecord(await res.json(), accession);
  }

  async search(term: string, limit: number): Promise<ProteinRecord[]> {
    const query = new URLSearchParams({ query: term, format: "json", size: String(limit) });
    const res = await this.get(`${this.baseUrl}/uniprotkb/search?${query.toString()}`);
    await assertOk(res, term);

    const body: unknown = await res.json();
    const results = isRecord(body) && Array.isArray(body.results) ? body.results : [];
    return results
      .map((entry: unknown) => toProteinRecord(entry, null))
      .filter((r): r is ProteinRecord => r !== null)
      .slice(0, limit);
  }

  private get(url: string): Promise<Response> {
    return this.fetchImpl(url, { headers: { Accept: "application/json", "User-Agent": USER_AGENT } });
  }
}

async function assertOk(res: Response, subject: string): Promise<void> {
  if (res.ok) return;
  const body = await res.text();
  throw new AppError({
    code: "UPSTREAM_ERROR",
    message: `UniProt error ${res.status} for ${subject}`,
    details: body.slice(0, 500),
  });
}

/** Maps one UniProtKB JSON entry; null when it carries no sequence. */
export function toProteinRecord(entry: unknown, accession: string | null): ProteinRecord | null {
  if (!isRecord(entry)) return null;
  const sequence = cleanSequence(str(path(entry, "sequence", "value")) ?? "");
  const proteinId = accession ?? str(entry.primaryAccession);
  if (!proteinId || sequence.length === 0) return null;

  return {
    proteinId,
    proteinName: extractProteinName(entry),
    sequence,
    source: "uniprot",
    organism: str(path(entry, "organism", "scientificName")) ?? "Unknown organism",
    keywords: extractKeywords(entry),
    annotatedLocation: extractLocation(entry),
  };
}

function extractProteinName(entry: Record<string, unknown>): string {
  const recommended = str(path(entry, "proteinDescription", "recommendedName", "fullName", "value"));
  if (recommended) return recommended;

  const alternatives = path(entry, "proteinDescription", "alternativeNames");
  if (Array.isArray(alternatives) && alternatives.length > 0) {
    const alt = str(path(alternatives[0], "fullName", "value"));
    if (alt) return alt;
  }
  return str(entry.uniProtkbId) ?? "Unknown protein";
}

function extractKeywords(entry: Record<string, unknown>): string[] {
  const keywords = entry.keywords;
  if (!Array.isArray(keywords)) return [];
  return keywords
    .map((kw: unknown) => str(path(kw, "name")))
    .filter((name): name is string => typeof name === "string" && name.length > 0);
}

function extractLocation(entry: Record<string, unknown>): string {
  const comments = entry.comments;
  if (!Array.isArray(comments)) return "Unknown";
  for (const comment of comments) {
    if (path(comment, "commentType") !== "SUBCELLULAR LOCATION") continue;
    const locations = path(comment, "subcellularLocations");
    if (Array.isArray(locations) && locations.length > 0) {
      return str(path(locations[0], "location", "value")) ?? "Unknown";
    }
  }
  return "Unknown";
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function path(value: unknown, ...keys: string[]): unknown {
  let current = value;
  for (const key of keys) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

function str(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}
