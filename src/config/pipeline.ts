/**
 * Pipeline configuration
 * Parses environment variables into a typed config with defaults
 */

import path from "path";
import { logger } from "../lib/logger";

export type Provider = "openai" | "bailian" | "custom";

export const PROVIDER_BASE_URLS: Record<Exclude<Provider, "custom">, string> = {
  openai: "https://api.openai.com/v1",
  bailian: "https://dashscope.aliyuncs.com/compatible-mode/v1",
};

/**
 * Vault file names. The embedding of `<name>.md` lives in `<name>.vec`.
 */
export const VAULT_FILES = {
  extracted: "extracted.md",
  summary: "summarized.md",
  shortSummary: "short_summarized.md",
  tldr: "tldr.md",
  tags: "tags.json",
  tagDescription: "description.md",
  tagSurvey: "survey.md",
} as const;

export interface ModelConfig {
  default: string;
  fast: string;
  tag: string;
  embedding: string;
}

export interface TokenLimits {
  summaryPass: number;
  summaryMerge: number;
  shortSummary: number;
  tldr: number;
  tags: number;
  tagDescription: number;
  tagSurveyArticle: number;
  tagSurvey: number;
}

export interface PipelineConfig {
  vaultDir: string;
  docsDir: string;
  tagsDir: string;
  promptsDir: string;

  provider: Provider;
  baseUrl: string;
  apiKey: string;
  embeddingBaseUrl: string;
  embeddingApiKey: string;
  models: ModelConfig;

  maxConcurrent: number;
  temperature: number;
  thinking: boolean;
  stream: boolean;

  rebuild: boolean;
  fromScratch: boolean;
  rebuildTags: boolean;
  pruneTags: boolean;
  enableRag: boolean;
  ragTopK: number;
  surveyMinArticles: number;
  surveySeedArticles: number;
  descriptionContextArticles: number;
  shortSummaryInputChars: number;
  embeddingInputChars: number;

  maxTokens: TokenLimits;
  usageReportIntervalMs: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

function readBool(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const normalized = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  logger.warn(`Invalid boolean for ${key}, using default`, { value: raw, fallback });
  return fallback;
}

function readInt(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    logger.warn(`Invalid integer for ${key}, using default`, { value: raw, fallback });
    return fallback;
  }
  return parsed;
}

function readFloat(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = parseFloat(raw);
  if (Number.isNaN(parsed)) {
    logger.warn(`Invalid number for ${key}, using default`, { value: raw, fallback });
    return fallback;
  }
  return parsed;
}

function readProvider(env: Env): Provider {
  const raw = (env.PROVIDER ?? "openai").trim().toLowerCase();
  if (raw === "openai" || raw === "bailian" || raw === "custom") {
    return raw;
  }
  throw new ConfigError(`Unknown provider: ${raw}`);
}

function resolveBaseUrl(provider: Provider, env: Env): string {
  if (provider === "custom") {
    const custom = env.BASE_URL?.trim();
    if (!custom) {
      throw new ConfigError("PROVIDER=custom requires BASE_URL");
    }
    return custom;
  }
  return env.BASE_URL?.trim() || PROVIDER_BASE_URLS[provider];
}

/**
 * Build the pipeline config from an environment map (process.env by default)
 */
export function loadPipelineConfig(env: Env = process.env): PipelineConfig {
  const vaultDir = path.resolve(env.VAULT_DIR ?? "vault");
  const provider = readProvider(env);
  const baseUrl = resolveBaseUrl(provider, env);
  const apiKey = env.API_KEY ?? env.OPENAI_API_KEY ?? "";
  const defaultModel = env.MODEL_DEFAULT ?? "gpt-4o-mini";
  const defaultMaxTokens = readInt(env, "DEFAULT_MAX_TOKENS", 10240);
  const preferTldrTokens = readInt(env, "PREFER_TLDR_TOKENS", 200);

  return {
    vaultDir,
    docsDir: path.join(vaultDir, "docs"),
    tagsDir: path.join(vaultDir, "tags"),
    promptsDir: path.resolve(env.PROMPTS_DIR ?? "prompts"),

    provider,
    baseUrl,
    apiKey,
    embeddingBaseUrl: env.EMBEDDING_BASE_URL?.trim() || baseUrl,
    embeddingApiKey: env.EMBEDDING_API_KEY ?? apiKey,
    models: {
      default: defaultModel,
      fast: env.MODEL_FAST ?? defaultModel,
      tag: env.MODEL_TAG ?? defaultModel,
      embedding: env.EMBEDDING_MODEL ?? "text-embedding-3-small",
    },

    maxConcurrent: readInt(env, "MAX_CONCURRENT", 4),
    temperature: readFloat(env, "DEFAULT_TEMPERATURE", 0.7),
    thinking: readBool(env, "ENABLE_THINKING", false),
    stream: readBool(env, "ENABLE_STREAM", false),

    rebuild: readBool(env, "REBUILD", false),
    fromScratch: readBool(env, "FROM_SCRATCH", false),
    rebuildTags: readBool(env, "REBUILD_TAGS", false),
    pruneTags: readBool(env, "PRUNE_TAGS", true),
    enableRag: readBool(env, "ENABLE_RAG", true),
    ragTopK: readInt(env, "RAG_TOP_K", 3),
    surveyMinArticles: readInt(env, "SURVEY_MIN_ARTICLES", 2),
    surveySeedArticles: readInt(env, "SURVEY_SEED_ARTICLES", 3),
    descriptionContextArticles: readInt(env, "DESCRIPTION_CONTEXT_ARTICLES", 5),
    shortSummaryInputChars: readInt(env, "SHORT_SUMMARY_INPUT_CHARS", 20000),
    embeddingInputChars: readInt(env, "EMBEDDING_INPUT_CHARS", 8000),

    maxTokens: {
      summaryPass: readInt(env, "MAX_TOKENS_PER_ARTICLE_SUMMARY_PASS", Math.floor(defaultMaxTokens / 2)),
      summaryMerge: readInt(env, "MAX_TOKENS_SUMMARY", defaultMaxTokens),
      shortSummary: readInt(env, "MAX_TOKENS_SHORT_SUMMARY", 1024),
      tldr: readInt(env, "MAX_TOKENS_TLDR", Math.floor(preferTldrTokens * 1.5)),
      tags: readInt(env, "MAX_TOKENS_TAGS", 200),
      tagDescription: readInt(env, "MAX_TOKENS_TAG_DESCRIPTION", 1024),
      tagSurveyArticle: readInt(env, "MAX_TOKENS_TAG_ARTICLE", 1024),
      tagSurvey: readInt(env, "MAX_TOKENS_TAG_SURVEY", defaultMaxTokens),
    },
    usageReportIntervalMs: readInt(env, "USAGE_REPORT_INTERVAL_MS", 0),
  };
}

/**
 * Fail fast when the config cannot reach a provider
 */
export function assertRunnable(config: PipelineConfig): void {
  if (!config.apiKey) {
    throw new ConfigError("API_KEY (or OPENAI_API_KEY) must be set");
  }
}
