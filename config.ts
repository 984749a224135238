import fs from "fs";
import path from "path";
import dotenv from "dotenv";
import {
  DEFAULT_CHAT_MODEL,
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_INDEX_PATH,
  DEFAULT_MAX_HISTORY,
  DEFAULT_MAX_OUTPUT_TOKENS,
  DEFAULT_MAX_RESULTS,
  DEFAULT_OPENAI_COMPAT_TIMEOUT_MS,
} from "./constants";

export type LlmProvider = "gemini" | "openai-compatible";

export interface OpenAICompatibleConfig {
  endpoint: string;
  model: string;
  apiKey: string;
  timeoutMs: number;
}

export interface AppConfig {
  llmProvider: LlmProvider;
  geminiApiKey: string;
  chatModel: string;
  embeddingModel: string;
  openaiCompatible: OpenAICompatibleConfig;
  chunkSize: number;
  chunkOverlap: number;
  maxResults: number;
  maxHistory: number;
  maxOutputTokens: number;
  /** Empty string keeps the index in memory only. */
  indexPath: string;
  /** Unset means the closest catalog title is always accepted. */
  maxCourseDistance?: number;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  envPath?: string;
}

const positiveNumber = (raw: string | undefined, fallback: number): number => {
  const parsed = Number(raw);
  return raw !== undefined && raw.trim() !== "" && Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const positiveInteger = (raw: string | undefined, fallback: number): number => {
  const parsed = positiveNumber(raw, fallback);
  return Number.isInteger(parsed) ? parsed : fallback;
};

const optionalNumber = (raw: string | undefined): number | undefined => {
  if (raw === undefined || raw.trim() === "") return undefined;
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : undefined;
};

const firstNonEmpty = (...values: (string | undefined)[]): string =>
  values.find((v) => v !== undefined && v.trim().length > 0)?.trim() ?? "";

const readEnvFile = (filePath: string): Record<string, string> => {
  if (!fs.existsSync(filePath)) return {};
  return dotenv.parse(fs.readFileSync(filePath, "utf8"));
};

/** Variables already in the environment win over the .env file. */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const fileEnv = readEnvFile(options.envPath ?? path.resolve(process.cwd(), ".env"));
  const env: NodeJS.ProcessEnv = { ...fileEnv, ...(options.env ?? process.env) };

  const provider: LlmProvider = env.LLM_PROVIDER === "openai-compatible" ? "openai-compatible" : "gemini";

  const config: AppConfig = {
    llmProvider: provider,
    geminiApiKey: firstNonEmpty(env.GEMINI_API_KEY, env.GOOGLE_API_KEY, env.API_KEY),
    chatModel: firstNonEmpty(env.GEMINI_CHAT_MODEL) || DEFAULT_CHAT_MODEL,
    embeddingModel: firstNonEmpty(env.EMBEDDING_MODEL) || DEFAULT_EMBEDDING_MODEL,
    openaiCompatible: {
      endpoint: firstNonEmpty(env.OPENAI_COMPAT_ENDPOINT),
      model: firstNonEmpty(env.OPENAI_COMPAT_MODEL),
      apiKey: firstNonEmpty(env.OPENAI_COMPAT_API_KEY),
      timeoutMs: positiveNumber(env.OPENAI_COMPAT_TIMEOUT_MS, DEFAULT_OPENAI_COMPAT_TIMEOUT_MS),
    },
    chunkSize: positiveNumber(env.CHUNK_SIZE, DEFAULT_CHUNK_SIZE),
    chunkOverlap: optionalNumber(env.CHUNK_OVERLAP) ?? DEFAULT_CHUNK_OVERLAP,
    maxResults: positiveInteger(env.MAX_RESULTS, DEFAULT_MAX_RESULTS),
    maxHistory: positiveInteger(env.MAX_HISTORY, DEFAULT_MAX_HISTORY),
    maxOutputTokens: positiveInteger(env.MAX_OUTPUT_TOKENS, DEFAULT_MAX_OUTPUT_TOKENS),
    indexPath: env.COURSE_INDEX_PATH ?? DEFAULT_INDEX_PATH,
    maxCourseDistance: optionalNumber(env.COURSE_MATCH_MAX_DISTANCE),
  };

  // Log only presence, never values.
  console.log("[Config] Loaded:", {
    llmProvider: config.llmProvider,
    geminiApiKey: config.geminiApiKey.length > 0,
    openaiCompatApiKey: config.openaiCompatible.apiKey.length > 0,
    chatModel: config.chatModel,
    embeddingModel: config.embeddingModel,
    indexPath: config.indexPath || "(memory)",
  });

  return config;
}
