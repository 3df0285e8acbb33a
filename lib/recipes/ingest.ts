/**
 * Recipe ingestion
 *
 * Loads an exported recipe file, optionally enriches and normalizes each
 * recipe, embeds them in batches and upserts them into the vector index.
 */

import { readFile } from "node:fs/promises"

import { z } from "zod"

import type { EmbeddingProvider } from "@/lib/embeddings/types"
import { fromZodError } from "@/lib/errors/error-handler"
import { createNoopLogger, type Logger } from "@/lib/logging/logger"
import type { IndexPoint, VectorIndex } from "@/lib/rag/vector-index/types"

import {
  enrichRecipeProperties,
  normalizeIngredients,
  type RecipeLlmContext
} from "./enrichment"
import { createPointFromRecipe } from "./index-entry"
import { RecipeSchema, getTextForEmbedding, type Recipe } from "./recipe"

// =============================================================================
// Loading
// =============================================================================

/** A bare list, or the recipe manager's paginated `{ items }` response */
const RecipeFileSchema = z.union([
  z.array(RecipeSchema),
  z.object({ items: z.array(RecipeSchema) }).transform(file => file.items)
])

export function parseRecipes(data: unknown, source: string = "input"): Recipe[] {
  const parsed = RecipeFileSchema.safeParse(data)
  if (!parsed.success) {
    throw fromZodError(`Invalid recipe file ${source}`, parsed.error)
  }
  return parsed.data
}

export async function loadRecipesFromFile(path: string): Promise<Recipe[]> {
  const content = await readFile(path, "utf-8")
  return parseRecipes(JSON.parse(content), path)
}

// =============================================================================
// Ingestion
// =============================================================================

export interface IngestOptions {
  index: VectorIndex
  embeddings: EmbeddingProvider
  collection: string
  vectorSize: number
  /** Drop and recreate the collection first */
  recreate?: boolean
  /** Recipes embedded per request (default: 32) */
  batchSize?: number
  /** Fill missing properties with the model before indexing */
  enrich?: boolean
  /** Re-derive normalized ingredients with the model before indexing */
  normalize?: boolean
  /** Required when enrich or normalize is set */
  llm?: RecipeLlmContext
  logger?: Logger
}

export interface IngestSummary {
  total: number
  indexed: number
  /** Recipes without id */
  skipped: number
}

const DEFAULT_BATCH_SIZE = 32

export async function ingestRecipes(
  recipes: Recipe[],
  options: IngestOptions
): Promise<IngestSummary> {
  const logger = options.logger ?? createNoopLogger()
  const batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE

  if ((options.enrich || options.normalize) && !options.llm) {
    throw new Error("Enrichment and normalization need an LLM context")
  }

  if (options.recreate) {
    await options.index.recreateCollection(options.collection, options.vectorSize)
  } else {
    await options.index.ensureCollection(options.collection, options.vectorSize)
  }

  const prepared: Recipe[] = []
  let skipped = 0

  for (const recipe of recipes) {
    if (!recipe.id) {
      logger.warn("Recipe has no ID, skipped", { recipe: recipe.name })
      skipped++
      continue
    }

    let current = recipe
    if (options.llm && options.enrich) {
      current = await enrichRecipeProperties(current, options.llm)
    }
    if (options.llm && options.normalize) {
      current = await normalizeIngredients(current, options.llm)
    }
    prepared.push(current)
  }

  for (let start = 0; start < prepared.length; start += batchSize) {
    const batch = prepared.slice(start, start + batchSize)
    const vectors = await options.embeddings.embed(batch.map(getTextForEmbedding))

    const points: IndexPoint[] = batch.map((recipe, i) =>
      createPointFromRecipe(recipe, vectors[i])
    )
    await options.index.upsert(options.collection, points)

    logger.info("Batch indexed", {
      collection: options.collection,
      indexed: start + batch.length,
      total: prepared.length
    })
  }

  return { total: recipes.length, indexed: prepared.length, skipped }
}
