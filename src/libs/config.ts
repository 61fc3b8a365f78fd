import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import type { LevelWithSilent } from "pino";
import type { OrganismCategory, OrganismClass } from "../types.js";
import { AppError } from "./errors.js";

export const DEFAULT_VERTEX_LOCATION = "us-central1";
export const DEFAULT_GEMINI_MODEL = "gemini-1.5-flash";
export const DEFAULT_UNIPROT_BASE_URL = "https://rest.uniprot.org";

const LOG_LEVELS: readonly LevelWithSilent[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];
const ORGANISM_CLASSES: readonly OrganismClass[] = ["gram_positive", "gram_negative", "archaea"];
const ORGANISM_CATEGORIES: readonly OrganismCategory[] = ["virus", "bacteria", "parasite", "tumor"];

export type AdvisorConfig = {
  projectId: string;
  location: string;
  model: string;
  timeoutMs: number;
};

export type MongoConfig = {
  url: string;
  dbName: string;
};

export type AppConfig = {
  logLevel: LevelWithSilent;
  organismClass: OrganismClass;
  organismCategory: OrganismCategory;
  /** null: no advisor, every decision uses the rule-based fallback */
  advisor: AdvisorConfig | null;
  /** null: candidates are kept in memory only */
  mongo: MongoConfig | null;
  uniprot: { baseUrl: string };
};

type Env = Record<string, string | undefined>;

/**
 * Loads the first env file found. DOTENV_CONFIG_PATH overrides the lookup.
 * Values already present in process.env win over the file.
 */
export function loadEnvFiles(cwd = process.cwd()): string | undefined {
  const candidates = [
    process.env.DOTENV_CONFIG_PATH,
    path.resolve(cwd, ".env.local"),
    path.resolve(cwd, ".env"),
  ].filter((p): p is string => typeof p === "string" && p.length > 0);

  const found = candidates.find((p) => fs.existsSync(p));
  if (found) dotenv.config({ path: found });
  return found;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const projectId = nonEmpty(env.GCP_PROJECT) ?? nonEmpty(env.GOOGLE_CLOUD_PROJECT);
  const mongoUrl = nonEmpty(env.MONGODB_URL);

  return {
    logLevel: oneOf("LOG_LEVEL", env.LOG_LEVEL, LOG_LEVELS, "info"),
    organismClass: oneOf("ORGANISM_CLASS", env.ORGANISM_CLASS, ORGANISM_CLASSES, "gram_negative"),
    organismCategory: oneOf("ORGANISM_CATEGORY", env.ORGANISM_CATEGORY, ORGANISM_CATEGORIES, "virus"),
    advisor: projectId
      ? {
          projectId,
          location: nonEmpty(env.VERTEX_AI_LOCATION) ?? DEFAULT_VERTEX_LOCATION,
          model: nonEmpty(env.GEMINI_MODEL) ?? DEFAULT_GEMINI_MODEL,
          timeoutMs: positiveInt("ADVISOR_TIMEOUT_MS", env.ADVISOR_TIMEOUT_MS, 30_000),
        }
      : null,
    mongo: mongoUrl ? { url: mongoUrl, dbName: nonEmpty(env.MONGODB_DB) ?? "antigen_screen" } : null,
    uniprot: { baseUrl: nonEmpty(env.UNIPROT_BASE_URL) ?? DEFAULT_UNIPROT_BASE_URL },
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function oneOf<T extends string>(name: string, raw: string | undefined, allowed: readonly T[], fallback: T): T {
  const value = nonEmpty(raw);
  if (value === undefined) return fallback;
  const match = allowed.find((a) => a === value);
  if (match === undefined) {
    throw new AppError({
      code: "VALIDATION_ERROR",
      message: `${name} must be one of ${allowed.join(", ")}; got "${value}"`,
    });
  }
  return match;
}

function positiveInt(name: string, raw: string | undefined, fallback: number): number {
  const value = nonEmpty(raw);
  if (value === undefined) return fallback;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) {
    throw new AppError({ code: "VALIDATION_ERROR", message: `${name} must be a positive integer; got "${value}"` });
  }
  return n;
}
