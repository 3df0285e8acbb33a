/**
 * Query Extraction
 *
 * Turns raw user text into a QueryExtraction.
 *
 * - passthrough: the input is the only query, no constraints, no model call
 * - llm-assisted: optional expansion (one structured call producing several
 *   phrasings and the explicit constraints), then optional brainstorm (one
 *   call per phrasing, run sequentially, rewriting it as a cooking
 *   instruction)
 *
 * Model errors propagate: no retry, no fallback.
 */

import type { ChatClient, ChatOptions } from "@/lib/llm/chat-client"
import { createNoopLogger, type Logger } from "@/lib/logging/logger"
import type { PromptStore } from "@/lib/prompts/prompt-store"
import { PromptType } from "@/lib/prompts/recipe-prompts"

import {
  QueryExtractionSchema,
  passthroughExtraction,
  type QueryExtraction
} from "./schemas/query-extraction"

// =============================================================================
// Strategies
// =============================================================================

export interface LlmAssistedQueryBuilder {
  kind: "llm-assisted"
  /** Ask the model for several phrasings and the constraints */
  expand: boolean
  /** Rewrite each phrasing as a cooking instruction */
  brainstorm: boolean
  chatClient: ChatClient
  promptStore: PromptStore
  chatOptions: ChatOptions
  promptLabel?: string
}

export type QueryBuilderConfig = { kind: "passthrough" } | LlmAssistedQueryBuilder

// =============================================================================
// Extraction
// =============================================================================

export async function buildQueryExtraction(
  userInput: string,
  config: QueryBuilderConfig,
  logger: Logger = createNoopLogger()
): Promise<QueryExtraction> {
  switch (config.kind) {
    case "passthrough":
      return passthroughExtraction(userInput)
    case "llm-assisted":
      return buildAssistedExtraction(userInput, config, logger)
  }
}

async function buildAssistedExtraction(
  userInput: string,
  config: LlmAssistedQueryBuilder,
  logger: Logger
): Promise<QueryExtraction> {
  const extraction = config.expand
    ? await expandQuery(userInput, config)
    : passthroughExtraction(userInput)

  logger.debug("Query extraction", {
    expanded: config.expand,
    queries: extraction.expanded_queries.length,
    negativeIngredients: extraction.negative_ingredients ?? []
  })

  if (!config.brainstorm) {
    return extraction
  }

  const rewritten: string[] = []
  for (const query of extraction.expanded_queries) {
    rewritten.push(await brainstormQuery(query, config))
  }

  logger.debug("Culinary brainstorm", { queries: rewritten })

  return { ...extraction, expanded_queries: rewritten }
}

/**
 * One structured call validated against the QueryExtraction schema
 */
export async function expandQuery(
  userInput: string,
  config: LlmAssistedQueryBuilder
): Promise<QueryExtraction> {
  const prompt = await config.promptStore.getPrompt(
    PromptType.MULTI_QUERY_BUILDER,
    config.promptLabel
  )

  const messages = prompt.compile({ user_input: userInput })

  return config.chatClient.chatStructured(
    messages,
    { ...config.chatOptions, tags: [...(config.chatOptions.tags ?? []), "query-expansion"] },
    QueryExtractionSchema,
    "QueryExtraction"
  )
}

/**
 * Rewrites one query as a short cooking instruction
 */
export async function brainstormQuery(
  query: string,
  config: LlmAssistedQueryBuilder
): Promise<string> {
  const prompt = await config.promptStore.getPrompt(
    PromptType.CULINARY_BRAINSTORM,
    config.promptLabel
  )

  const answer = await config.chatClient.chat(
    prompt.compile({ user_input: query }),
    { ...config.chatOptions, tags: [...(config.chatOptions.tags ?? []), "culinary-brainstorm"] }
  )

  return answer.trim()
}
