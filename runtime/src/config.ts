import { config as loadDotenv } from "dotenv";
import { homedir } from "os";
import { join, resolve } from "path";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

export const LUCID_HOME = join(homedir(), ".lucid");

/**
 * Load environment variables from ./.env, then ~/.lucid/.env.
 * Values already present in the environment win. Only loads once.
 */
let envLoaded = false;
export function ensureEnvLoaded(): void {
  if (envLoaded) return;
  loadDotenv();
  loadDotenv({ path: join(LUCID_HOME, ".env") });
  envLoaded = true;
}

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const positiveMs = z.coerce.number().int().positive();

// Blank entries in a .env file mean "unset".
const blankAsUnset = (value: unknown) => (value === "" ? undefined : value);
const optionalSecret = z.preprocess(blankAsUnset, z.string().min(1).optional());

const envSchema = z.object({
  LUCID_LLM_PROVIDER: z.enum(["openai", "anthropic"]).default("openai"),
  LUCID_LLM_MODEL: z.string().min(1).default("gpt-4o-mini"),
  LUCID_LLM_BASE_URL: z.preprocess(blankAsUnset, z.string().url().optional()),
  LUCID_LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
  LUCID_LLM_MAX_TOKENS: z.coerce.number().int().positive().default(700),
  OPENAI_API_KEY: optionalSecret,
  ANTHROPIC_API_KEY: optionalSecret,

  LUCID_HISTORY_LIMIT: z.coerce.number().int().min(1).max(100).default(6),
  LUCID_MAX_QUERY_LENGTH: z.coerce.number().int().positive().default(500),
  LUCID_TYPO_CANDIDATES: z.coerce.number().int().min(1).max(9).default(3),

  LUCID_REFERENCE_SEARCH_URL: z
    .string()
    .default("https://en.wikipedia.org/w/index.php?fulltext=1&ns0=1&search={term}"),
  LUCID_REFERENCE_MAX_CHARS: z.coerce.number().int().positive().default(2500),
  LUCID_REFERENCE_MIN_CHARS: z.coerce.number().int().min(0).default(100),
  LUCID_REFERENCE_SETTLE: z.enum(["networkidle", "domcontentloaded"]).default("domcontentloaded"),

  LUCID_BROWSER_HEADLESS: booleanFlag.default("true"),

  LUCID_NAVIGATION_TIMEOUT_MS: positiveMs.default(15_000),
  LUCID_SETTLE_TIMEOUT_MS: positiveMs.default(10_000),
  LUCID_ACTION_TIMEOUT_MS: positiveMs.default(5_000),
  LUCID_MODEL_TIMEOUT_MS: positiveMs.default(30_000),
  LUCID_POST_ACTION_DELAY_MS: z.coerce.number().int().min(0).default(300),

  LUCID_DB_PATH: z.string().min(1).default(join(LUCID_HOME, "conversations.db")),
  LUCID_TASKS_PATH: z.string().min(1).default(join(LUCID_HOME, "tasks.json")),
  LUCID_PROMPTS_PATH: z.string().min(1).default("prompts.json"),

  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  LUCID_HOST: z.string().min(1).default("127.0.0.1"),
  LUCID_CORS_ORIGIN: z.string().min(1).default("http://localhost:5173"),

  LUCID_LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export interface LlmConfig {
  provider: "openai" | "anthropic";
  model: string;
  apiKey?: string;
  baseUrl?: string;
  temperature: number;
  maxTokens: number;
}

export interface PhaseTimeouts {
  navigationMs: number;
  settleMs: number;
  actionMs: number;
  modelMs: number;
}

export type SettleSignal = "networkidle" | "domcontentloaded";

export interface ReferenceConfig {
  searchUrl: string;
  maxChars: number;
  minChars: number;
  settle: SettleSignal;
}

export interface LucidConfig {
  llm: LlmConfig;
  chat: {
    historyLimit: number;
    maxQueryLength: number;
    typoCandidates: number;
  };
  reference: ReferenceConfig;
  browser: { headless: boolean };
  timeouts: PhaseTimeouts;
  postActionDelayMs: number;
  storage: {
    dbPath: string;
    tasksPath: string;
    promptsPath: string;
  };
  server: {
    port: number;
    host: string;
    corsOrigin: string;
  };
  logLevel: string;
}

export function loadLucidConfig(env: NodeJS.ProcessEnv = process.env): LucidConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment configuration: ${details}`);
  }
  const values = parsed.data;

  if (!values.LUCID_REFERENCE_SEARCH_URL.includes("{term}")) {
    throw new ConfigurationError(
      "LUCID_REFERENCE_SEARCH_URL must contain a {term} placeholder",
    );
  }

  const apiKey =
    values.LUCID_LLM_PROVIDER === "anthropic"
      ? values.ANTHROPIC_API_KEY
      : values.OPENAI_API_KEY;
  if (!apiKey && !values.LUCID_LLM_BASE_URL) {
    throw new ConfigurationError(
      `No API key for provider '${values.LUCID_LLM_PROVIDER}' and no LUCID_LLM_BASE_URL set`,
    );
  }

  return {
    llm: {
      provider: values.LUCID_LLM_PROVIDER,
      model: values.LUCID_LLM_MODEL,
      apiKey,
      baseUrl: values.LUCID_LLM_BASE_URL,
      temperature: values.LUCID_LLM_TEMPERATURE,
      maxTokens: values.LUCID_LLM_MAX_TOKENS,
    },
    chat: {
      historyLimit: values.LUCID_HISTORY_LIMIT,
      maxQueryLength: values.LUCID_MAX_QUERY_LENGTH,
      typoCandidates: values.LUCID_TYPO_CANDIDATES,
    },
    reference: {
      searchUrl: values.LUCID_REFERENCE_SEARCH_URL,
      maxChars: values.LUCID_REFERENCE_MAX_CHARS,
      minChars: values.LUCID_REFERENCE_MIN_CHARS,
      settle: values.LUCID_REFERENCE_SETTLE,
    },
    browser: { headless: values.LUCID_BROWSER_HEADLESS },
    timeouts: {
      navigationMs: values.LUCID_NAVIGATION_TIMEOUT_MS,
      settleMs: values.LUCID_SETTLE_TIMEOUT_MS,
      actionMs: values.LUCID_ACTION_TIMEOUT_MS,
      modelMs: values.LUCID_MODEL_TIMEOUT_MS,
    },
    postActionDelayMs: values.LUCID_POST_ACTION_DELAY_MS,
    storage: {
      dbPath: resolve(values.LUCID_DB_PATH),
      tasksPath: resolve(values.LUCID_TASKS_PATH),
      promptsPath: resolve(values.LUCID_PROMPTS_PATH),
    },
    server: {
      port: values.PORT,
      host: values.LUCID_HOST,
      corsOrigin: values.LUCID_CORS_ORIGIN,
    },
    logLevel: values.LUCID_LOG_LEVEL,
  };
}
