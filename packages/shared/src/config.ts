// =============================================================================
// @newsdesk/shared — Environment variable config with validation
// =============================================================================
// Loads configuration from environment variables with sensible defaults.
// The result is an immutable value built once at startup and passed by
// reference to the orchestrator, selector, and backends. Invalid values
// surface as a ConfigurationError naming the offending variable.
// =============================================================================

import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import type { ProviderName } from "./types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Fallback order used when the requested provider has no credential. */
export const PROVIDER_PRIORITY: readonly ProviderName[] = [
  "anthropic",
  "openai",
  "gemini",
];

export const DEFAULT_MODELS: Record<ProviderName, string> = {
  openai: "gpt-4o-mini",
  gemini: "gemini-1.5-flash",
  anthropic: "claude-3-haiku-20240307",
};

export const CREDENTIAL_KEYS: Record<ProviderName, keyof Config> = {
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
  gemini: "GEMINI_API_KEY",
};

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

/** Empty strings behave like unset variables. */
const optionalSecret = z
  .string()
  .optional()
  .transform((val) => (val && val.trim() !== "" ? val.trim() : undefined));

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("true")
  .transform((val) => val === "true" || val === "1");

export const providerNameSchema = z.enum(["anthropic", "openai", "gemini"]);

const configSchema = z.object({
  // Credentials
  ANTHROPIC_API_KEY: optionalSecret,
  OPENAI_API_KEY: optionalSecret,
  GEMINI_API_KEY: optionalSecret,

  // LLM settings
  DEFAULT_LLM_PROVIDER: providerNameSchema.default("openai"),
  DEFAULT_LLM_MODEL: z.string().default(""),
  MAX_TOKENS: z.coerce.number().int().min(1).default(4096),
  SEMANTIC_FILTER: booleanFlag,

  // Directories
  DATA_DIR: z.string().min(1).default("data"),
  OUTPUT_DIR: z.string().min(1).default("outputs"),
  LOG_DIR: z.string().min(1).default("logs"),

  // Fetcher
  MAX_ARTICLES_PER_SOURCE: z.coerce.number().int().min(1).default(10),
  FETCH_TIMEOUT_MS: z.coerce.number().int().min(1).default(15_000),
  FETCH_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(3),

  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal"])
    .default("info"),
});

// ---------------------------------------------------------------------------
// Exported type
// ---------------------------------------------------------------------------

export type Config = Readonly<z.infer<typeof configSchema>>;

// ---------------------------------------------------------------------------
// Loader
// ---------------------------------------------------------------------------

/**
 * Load and validate configuration from environment variables.
 *
 * Throws a ConfigurationError for the first invalid variable, with the zod
 * error kept as the cause.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Config {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue?.path.join(".") || "environment";
    throw new ConfigurationError(key, issue?.message ?? "invalid value", {
      cause: parsed.error,
    });
  }
  return Object.freeze(parsed.data);
}

// ---------------------------------------------------------------------------
// Derived lookups
// ---------------------------------------------------------------------------

export function credentialFor(
  config: Config,
  provider: ProviderName,
): string | undefined {
  switch (provider) {
    case "anthropic":
      return config.ANTHROPIC_API_KEY;
    case "openai":
      return config.OPENAI_API_KEY;
    case "gemini":
      return config.GEMINI_API_KEY;
  }
}

/** Providers with a credential, in PROVIDER_PRIORITY order. */
export function availableProviders(config: Config): ProviderName[] {
  return PROVIDER_PRIORITY.filter(
    (provider) => credentialFor(config, provider) !== undefined,
  );
}

/**
 * Model to use for a provider: the explicit DEFAULT_LLM_MODEL only applies
 * to the configured default provider, since model names are not portable.
 */
export function modelFor(config: Config, provider: ProviderName): string {
  if (config.DEFAULT_LLM_MODEL && provider === config.DEFAULT_LLM_PROVIDER) {
    return config.DEFAULT_LLM_MODEL;
  }
  return DEFAULT_MODELS[provider];
}

/** Human-readable configuration problems. Empty when the config is usable. */
export function validateConfig(config: Config): string[] {
  const problems: string[] = [];
  if (availableProviders(config).length === 0) {
    problems.push(
      "No LLM API keys found. Set at least one: ANTHROPIC_API_KEY, OPENAI_API_KEY, or GEMINI_API_KEY",
    );
  }
  return problems;
}
