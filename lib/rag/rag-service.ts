/**
 * Recipe RAG Service
 *
 * Orchestrates one question end to end:
 * extraction → embedding → filter → retrieval → context → generation
 *
 * Strategy is fixed at construction from settings:
 * - simple: passthrough extraction + single-vector retrieval
 * - multiquery: LLM-assisted extraction + RRF retrieval
 *
 * Clients are built once and only read afterwards.
 */

import type { Settings } from "@/lib/config/settings"
import { OpenAIEmbeddingProvider } from "@/lib/embeddings/generate-embeddings"
import type { EmbeddingProvider } from "@/lib/embeddings/types"
import {
  OpenAIChatClient,
  type ChatClient,
  type ChatMessage,
  type ChatOptions
} from "@/lib/llm/chat-client"
import { createLogger, createNoopLogger, type Logger } from "@/lib/logging/logger"
import {
  PIPELINE_STEP_NAMES,
  createStepTraceOptions,
  traceable
} from "@/lib/monitoring/langsmith-setup"
import { LocalPromptStore, type PromptStore } from "@/lib/prompts/prompt-store"

import { populateMessages } from "./chat-context"
import { buildQueryFilter } from "./filter-builder"
import {
  buildQueryExtraction,
  type LlmAssistedQueryBuilder,
  type QueryBuilderConfig
} from "./query-builder"
import { retrieveResults, type RetrievalStrategy } from "./retrieval"
import type { QueryExtraction } from "./schemas/query-extraction"
import { createQdrantVectorIndex } from "./vector-index/qdrant-index"
import type { ScoredRecipe, VectorIndex } from "./vector-index/types"

// =============================================================================
// Types
// =============================================================================

export interface RagServiceDeps {
  settings: Settings
  chatClient: ChatClient
  embeddings: EmbeddingProvider
  index: VectorIndex
  promptStore: PromptStore
  logger?: Logger
}

export interface RagAnswer {
  extraction: QueryExtraction
  hits: ScoredRecipe[]
  messages: ChatMessage[]
  answer: string
}

// =============================================================================
// Strategy selection
// =============================================================================

type ModelAccess = Pick<
  LlmAssistedQueryBuilder,
  "chatClient" | "promptStore" | "chatOptions"
>

export function selectStrategy(
  settings: Settings,
  models: ModelAccess
): { queryBuilder: QueryBuilderConfig; retrievalStrategy: RetrievalStrategy } {
  switch (settings.searchStrategy) {
    case "multiquery":
      return {
        queryBuilder: {
          kind: "llm-assisted",
          expand: settings.enableQueryExpansion,
          brainstorm: settings.enableCulinaryBrainstorm,
          promptLabel: settings.promptLabel,
          ...models
        },
        retrievalStrategy: "rrf"
      }
    case "simple":
      return {
        queryBuilder: { kind: "passthrough" },
        retrievalStrategy: "simple"
      }
  }
}

// =============================================================================
// Service
// =============================================================================

export class RecipeRagService {
  readonly queryBuilder: QueryBuilderConfig
  readonly retrievalStrategy: RetrievalStrategy

  private readonly settings: Settings
  private readonly chatClient: ChatClient
  private readonly embeddings: EmbeddingProvider
  private readonly index: VectorIndex
  private readonly promptStore: PromptStore
  private readonly logger: Logger
  private readonly chatOptions: ChatOptions

  private readonly tracedGenerateQueries: (
    userInput: string
  ) => Promise<QueryExtraction>
  private readonly tracedRetrieveRecipes: (
    extraction: QueryExtraction
  ) => Promise<ScoredRecipe[]>

  constructor(deps: RagServiceDeps) {
    this.settings = deps.settings
    this.chatClient = deps.chatClient
    this.embeddings = deps.embeddings
    this.index = deps.index
    this.promptStore = deps.promptStore
    this.logger = deps.logger ?? createNoopLogger()

    this.chatOptions = {
      model: this.settings.llmModel,
      temperature: this.settings.llmTemperature,
      seed: this.settings.llmSeed
    }

    const strategy = selectStrategy(this.settings, {
      chatClient: this.chatClient,
      promptStore: this.promptStore,
      chatOptions: this.chatOptions
    })
    this.queryBuilder = strategy.queryBuilder
    this.retrievalStrategy = strategy.retrievalStrategy

    this.tracedGenerateQueries = traceable(
      (userInput: string) => this.runGenerateQueries(userInput),
      createStepTraceOptions(PIPELINE_STEP_NAMES.GENERATE_QUERIES, {
        strategy: this.settings.searchStrategy
      })
    )
    this.tracedRetrieveRecipes = traceable(
      (extraction: QueryExtraction) => this.runRetrieveRecipes(extraction),
      createStepTraceOptions(PIPELINE_STEP_NAMES.RETRIEVE_RECIPES, {
        strategy: this.retrievalStrategy,
        k: this.settings.vectordbK
      })
    )
  }

  /**
   * Interprets the user input into search phrasings and constraints
   */
  generateQueries(userInput: string): Promise<QueryExtraction> {
    return this.tracedGenerateQueries(userInput)
  }

  /**
   * Embeds every phrasing in one batch and searches with the synthesized
   * filter. Returns [] when nothing could be embedded.
   */
  retrieveRecipes(extraction: QueryExtraction): Promise<ScoredRecipe[]> {
    return this.tracedRetrieveRecipes(extraction)
  }

  populateMessages(
    userInput: string,
    hits: ScoredRecipe[]
  ): Promise<ChatMessage[]> {
    this.logger.debug("Populating messages", { hits: hits.length })
    return populateMessages(userInput, hits, {
      promptStore: this.promptStore,
      externalUrl: this.settings.recipeManagerExternalUrl,
      promptLabel: this.settings.promptLabel
    })
  }

  /**
   * Streams the answer as text deltas. Stop iterating to cancel.
   */
  chat(messages: ChatMessage[]): AsyncGenerator<string, void, undefined> {
    this.logger.debug("Generating chat response", { messages: messages.length })
    return this.chatClient.streamingChat(messages, {
      ...this.chatOptions,
      tags: ["chat-generation"]
    })
  }

  /**
   * Runs the whole pipeline and collects the streamed answer
   */
  async answer(userInput: string): Promise<RagAnswer> {
    const extraction = await this.generateQueries(userInput)
    const hits = await this.retrieveRecipes(extraction)
    const messages = await this.populateMessages(userInput, hits)

    let answer = ""
    for await (const delta of this.chat(messages)) {
      answer += delta
    }

    return { extraction, hits, messages, answer }
  }

  /**
   * Whether the configured collection exists
   */
  async checkHealth(): Promise<boolean> {
    const collection = this.settings.vectordbCollectionName
    const healthy = await this.index.collectionExists(collection)
    if (!healthy) {
      this.logger.error("Collection not found", { collection })
    }
    return healthy
  }

  private async runGenerateQueries(userInput: string): Promise<QueryExtraction> {
    this.logger.debug("Generating queries", { kind: this.queryBuilder.kind })
    return buildQueryExtraction(userInput, this.queryBuilder, this.logger)
  }

  private async runRetrieveRecipes(
    extraction: QueryExtraction
  ): Promise<ScoredRecipe[]> {
    this.logger.debug("Retrieving recipes", {
      queries: extraction.expanded_queries.length
    })

    const vectors = await this.embeddings.embed(extraction.expanded_queries)
    if (vectors.length === 0) {
      this.logger.warn("No embeddings generated for queries")
      return []
    }

    return retrieveResults(this.retrievalStrategy, {
      vectors,
      index: this.index,
      collection: this.settings.vectordbCollectionName,
      filter: buildQueryFilter(extraction),
      k: this.settings.vectordbK,
      logger: this.logger
    })
  }
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Builds the OpenAI-compatible and Qdrant clients, once per process
 */
export function createRecipeRagDeps(
  settings: Settings,
  logger: Logger = createLogger("recipe-rag", { level: settings.logLevel })
): RagServiceDeps {
  const chatClient = new OpenAIChatClient({
    apiKey: settings.llmApiKey,
    baseURL: settings.llmBaseUrl
  })

  const embeddings = new OpenAIEmbeddingProvider({
    model: settings.embeddingModel,
    apiKey: settings.llmApiKey,
    baseURL: settings.llmBaseUrl,
    dimensions: settings.embeddingDimensions
  })

  const index = createQdrantVectorIndex(
    { url: settings.vectordbUrl, apiKey: settings.vectordbApiKey },
    logger
  )

  return {
    settings,
    chatClient,
    embeddings,
    index,
    promptStore: new LocalPromptStore(settings.promptLabel),
    logger
  }
}

export function createRecipeRagService(
  settings: Settings,
  logger?: Logger
): RecipeRagService {
  return new RecipeRagService(createRecipeRagDeps(settings, logger))
}
