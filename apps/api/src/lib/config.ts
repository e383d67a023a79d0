import fs from "node:fs";
import path from "node:path";
import { config as loadEnv } from "dotenv";
import { z } from "zod";

/** Unset and blank variables both fall back to the default. */
const blankAsUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const envSchema = z.object({
  PORT: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(4000)),
  MEALGEN_API_KEY: z.preprocess(blankAsUndefined, z.string().optional()),
  RAG_BASE_URL: z.preprocess(blankAsUndefined, z.string().url().default("http://localhost:8000")),
  RAG_SECRET: z.preprocess(blankAsUndefined, z.string().optional()),
  RAG_TIMEOUT_MS: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(60000)),
  MEALGEN_DEFAULT_STORE: z.preprocess(blankAsUndefined, z.string().trim().min(1).default("TRADER_JOES"))
});

export type ApiConfig = {
  port: number;
  apiKey: string | undefined;
  ragBaseUrl: string;
  ragSecret: string | undefined;
  ragTimeoutMs: number;
  defaultStore: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(", ");
    throw new Error(`Invalid environment configuration: ${fields}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    apiKey: vars.MEALGEN_API_KEY,
    ragBaseUrl: vars.RAG_BASE_URL.replace(/\/+$/, ""),
    ragSecret: vars.RAG_SECRET,
    ragTimeoutMs: vars.RAG_TIMEOUT_MS,
    defaultStore: vars.MEALGEN_DEFAULT_STORE
  };
}

/**
 * `.env` locations tried in order: an explicit `MEALGEN_ENV_FILE`, then the
 * working directory, the repo root seen from a workspace, and the repo root
 * seen from `moduleDir` (apps/api/src).
 */
export function envFileCandidates(cwd: string, moduleDir: string, explicit?: string): string[] {
  const candidates = [
    path.resolve(cwd, ".env"),
    path.resolve(cwd, "../../.env"),
    path.resolve(moduleDir, "../../../.env")
  ];
  if (explicit && explicit.trim()) candidates.unshift(path.resolve(cwd, explicit.trim()));
  return [...new Set(candidates)];
}

/** Loads the first candidate that exists; variables already set win. */
export function loadEnvFile(candidates: readonly string[]): string | null {
  const envPath = candidates.find((candidate) => fs.existsSync(candidate));
  if (!envPath) return null;
  loadEnv({ path: envPath, override: false });
  return envPath;
}
