#!/usr/bin/env npx tsx
/**
 * Indexes an exported recipe file into the vector index
 *
 * Usage:
 *   npx tsx scripts/ingest.ts <recipes.json> [--recreate] [--enrich] [--normalize]
 *
 * --recreate    drop the collection first (same as DELETE_COLLECTION_IF_EXISTS=true)
 * --enrich      fill missing categories, tags, tools, methods, healthiness, time
 * --normalize   re-derive normalized ingredient names
 */

import { loadSettings } from "@/lib/config/settings"
import { OpenAIEmbeddingProvider } from "@/lib/embeddings/generate-embeddings"
import { OpenAIChatClient } from "@/lib/llm/chat-client"
import { createLogger } from "@/lib/logging/logger"
import { LocalPromptStore } from "@/lib/prompts/prompt-store"
import { createQdrantVectorIndex } from "@/lib/rag/vector-index/qdrant-index"
import { ingestRecipes, loadRecipesFromFile } from "@/lib/recipes/ingest"

async function main(): Promise<void> {
  const args = process.argv.slice(2)
  const file = args.find(arg => !arg.startsWith("--"))

  if (!file) {
    console.error("Usage: npx tsx scripts/ingest.ts <recipes.json> [--recreate] [--enrich] [--normalize]")
    process.exit(1)
  }

  const settings = loadSettings()
  const logger = createLogger("ingest", { level: settings.logLevel })

  const recipes = await loadRecipesFromFile(file)
  logger.info("Recipes loaded", { file, count: recipes.length })

  const summary = await ingestRecipes(recipes, {
    index: createQdrantVectorIndex(
      { url: settings.vectordbUrl, apiKey: settings.vectordbApiKey },
      logger
    ),
    embeddings: new OpenAIEmbeddingProvider({
      model: settings.embeddingModel,
      apiKey: settings.llmApiKey,
      baseURL: settings.llmBaseUrl,
      dimensions: settings.embeddingDimensions
    }),
    collection: settings.vectordbCollectionName,
    vectorSize: settings.embeddingDimensions,
    recreate: args.includes("--recreate") || settings.deleteCollectionIfExists,
    enrich: args.includes("--enrich"),
    normalize: args.includes("--normalize"),
    llm: {
      chatClient: new OpenAIChatClient({
        apiKey: settings.llmApiKey,
        baseURL: settings.llmBaseUrl
      }),
      promptStore: new LocalPromptStore(settings.promptLabel),
      chatOptions: {
        model: settings.llmModel,
        temperature: settings.llmTemperature,
        seed: settings.llmSeed
      },
      logger
    },
    logger
  })

  logger.info("Ingestion finished", { ...summary })
}

main()
  .then(() => process.exit(0))
  .catch(err => {
    console.error("❌ Fatal error:", err)
    process.exit(1)
  })
