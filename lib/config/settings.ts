/**
 * Settings
 *
 * Process configuration parsed once from environment variables and passed
 * explicitly into every factory. Core modules never read `process.env`.
 */

import { z } from "zod"

import { fromZodError } from "@/lib/errors/error-handler"

// =============================================================================
// Schemas
// =============================================================================

export const SearchStrategySchema = z.enum(["simple", "multiquery"])

export type SearchStrategy = z.infer<typeof SearchStrategySchema>

const LogLevelSchema = z.enum(["DEBUG", "INFO", "WARN", "ERROR"])

/** "true" / "false" / "1" / "0" from the environment */
const EnvBooleanSchema = z
  .enum(["true", "false", "1", "0"])
  .transform(value => value === "true" || value === "1")

export const SettingsSchema = z.object({
  /** Recipe manager base URL used to build recipe links in answers */
  recipeManagerExternalUrl: z.string().url().default("http://localhost:9000"),

  vectordbUrl: z.string().url().default("http://localhost:6333"),
  vectordbApiKey: z.string().optional(),
  vectordbCollectionName: z.string().min(1).default("recipes"),
  /** Number of recipes returned per search */
  vectordbK: z.coerce.number().int().positive().default(3),

  embeddingModel: z.string().min(1).default("text-embedding-3-small"),
  embeddingDimensions: z.coerce.number().int().positive().default(1536),

  /** OpenAI-compatible endpoint; unset means api.openai.com */
  llmBaseUrl: z.string().url().optional(),
  llmApiKey: z.string().optional(),
  llmModel: z.string().min(1).default("gpt-4o-mini"),
  llmTemperature: z.coerce.number().min(0).max(2).default(0.2),
  llmSeed: z.coerce.number().int().optional(),
  /** Model of the evaluation judges; defaults to llmModel */
  judgeModel: z.string().min(1).optional(),

  searchStrategy: SearchStrategySchema.default("simple"),
  enableQueryExpansion: EnvBooleanSchema.default("true"),
  enableCulinaryBrainstorm: EnvBooleanSchema.default("true"),
  promptLabel: z.string().min(1).default("production"),

  deleteCollectionIfExists: EnvBooleanSchema.default("false"),

  logLevel: LogLevelSchema.default("INFO")
})

export type Settings = Readonly<z.infer<typeof SettingsSchema>>

/**
 * Environment variable → settings field
 */
const ENV_KEYS: Record<keyof z.input<typeof SettingsSchema>, string> = {
  recipeManagerExternalUrl: "RECIPE_MANAGER_EXTERNAL_URL",
  vectordbUrl: "VECTORDB_URL",
  vectordbApiKey: "VECTORDB_API_KEY",
  vectordbCollectionName: "VECTORDB_COLLECTION_NAME",
  vectordbK: "VECTORDB_K",
  embeddingModel: "EMBEDDING_MODEL",
  embeddingDimensions: "EMBEDDING_DIMENSIONS",
  llmBaseUrl: "LLM_BASE_URL",
  llmApiKey: "LLM_API_KEY",
  llmModel: "LLM_MODEL",
  llmTemperature: "LLM_TEMPERATURE",
  llmSeed: "LLM_SEED",
  judgeModel: "JUDGE_MODEL",
  searchStrategy: "SEARCH_STRATEGY",
  enableQueryExpansion: "ENABLE_QUERY_EXPANSION",
  enableCulinaryBrainstorm: "ENABLE_CULINARY_BRAINSTORM",
  promptLabel: "PROMPT_LABEL",
  deleteCollectionIfExists: "DELETE_COLLECTION_IF_EXISTS",
  logLevel: "LOG_LEVEL"
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Parses settings from an environment map
 *
 * Empty strings count as unset. `LLM_API_KEY` falls back to `OPENAI_API_KEY`.
 *
 * @throws ValidationError listing every invalid variable
 */
export function loadSettings(
  env: Record<string, string | undefined> = process.env
): Settings {
  const raw: Record<string, string> = {}

  for (const [field, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey]?.trim()
    if (value) {
      raw[field] = value
    }
  }

  const openAIKey = env.OPENAI_API_KEY?.trim()
  if (!raw.llmApiKey && openAIKey) {
    raw.llmApiKey = openAIKey
  }

  const parsed = SettingsSchema.safeParse(raw)
  if (!parsed.success) {
    throw fromZodError("Invalid configuration", parsed.error)
  }

  return Object.freeze(parsed.data)
}

/**
 * Settings safe to print or attach to experiment records
 */
export function redactSettings(settings: Settings): Record<string, unknown> {
  return {
    ...settings,
    llmApiKey: settings.llmApiKey ? "***" : undefined,
    vectordbApiKey: settings.vectordbApiKey ? "***" : undefined
  }
}
