/**
 * Fusion Retrieval
 *
 * Two read-only entry points over the vector index:
 * - simple: one query vector, nearest neighbours
 * - rrf: one candidate list per query vector, fused with Reciprocal Rank
 *   Fusion by the index
 */

import type { Embedding } from "@/lib/embeddings/types"
import { ValidationError } from "@/lib/errors/error-handler"
import { createNoopLogger, type Logger } from "@/lib/logging/logger"

import type { RecipeFilter } from "./filter-builder"
import type { ScoredRecipe, VectorIndex } from "./vector-index/types"

export type RetrievalStrategy = "simple" | "rrf"

export interface RetrievalRequest {
  vectors: Embedding[]
  index: VectorIndex
  collection: string
  filter: RecipeFilter | null
  /** Number of results (default: 3) */
  k?: number
  logger?: Logger
}

const DEFAULT_K = 3

/**
 * Top-k nearest neighbours of a single query vector
 *
 * @throws ValidationError unless exactly one vector is given
 */
export async function retrieveResultsSimple(
  request: RetrievalRequest
): Promise<ScoredRecipe[]> {
  const { vectors, index, collection, filter } = request
  const k = request.k ?? DEFAULT_K
  const logger = request.logger ?? createNoopLogger()

  if (vectors.length !== 1) {
    throw new ValidationError(
      `Simple retrieval supports exactly one query vector, got ${vectors.length}`,
      vectors.length
    )
  }

  logger.debug("Simple retrieval", { collection, k, filter })

  return index.query({ collection, vector: vectors[0], filter, limit: k })
}

/**
 * Reciprocal Rank Fusion over one filtered candidate list per vector
 *
 * @throws ValidationError when no vector is given
 */
export async function retrieveResultsRrf(
  request: RetrievalRequest
): Promise<ScoredRecipe[]> {
  const { vectors, index, collection, filter } = request
  const k = request.k ?? DEFAULT_K
  const logger = request.logger ?? createNoopLogger()

  if (vectors.length === 0) {
    throw new ValidationError(
      "RRF retrieval needs at least one query vector, got 0",
      vectors.length
    )
  }

  logger.debug("RRF retrieval", {
    collection,
    k,
    vectors: vectors.length,
    filter
  })

  return index.queryFused({ collection, vectors, filter, limit: k })
}

export function retrieveResults(
  strategy: RetrievalStrategy,
  request: RetrievalRequest
): Promise<ScoredRecipe[]> {
  switch (strategy) {
    case "simple":
      return retrieveResultsSimple(request)
    case "rrf":
      return retrieveResultsRrf(request)
  }
}
