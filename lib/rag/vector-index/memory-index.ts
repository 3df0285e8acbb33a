/**
 * In-process vector index
 *
 * Same contract as the Qdrant index, evaluated in memory: cosine similarity,
 * the filter predicate tree, standard RRF fusion. Used by tests and for
 * small local experiments.
 */

import { cosineSimilarity } from "@/lib/embeddings/generate-embeddings"
import { createNoopLogger, type Logger } from "@/lib/logging/logger"
import {
  isFieldCondition,
  type Condition,
  type FieldCondition,
  type RecipeFilter
} from "@/lib/rag/filter-builder"
import {
  calculateFusionStats,
  reciprocalRankFusion
} from "@/lib/rag/result-fusion"
import type { RecipeIndexEntry } from "@/lib/recipes/index-entry"

import type {
  FusedVectorQuery,
  IndexPoint,
  PointId,
  ScoredRecipe,
  ScrollPage,
  ScrollRequest,
  VectorIndex,
  VectorQuery
} from "./types"

interface Collection {
  vectorSize: number
  points: Map<PointId, IndexPoint>
}

// =============================================================================
// Filter evaluation
// =============================================================================

function asStrings(value: unknown): string[] {
  if (typeof value === "string") return [value]
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === "string")
  }
  return []
}

function matchesField(
  payload: RecipeIndexEntry,
  condition: FieldCondition
): boolean {
  const value: unknown = payload[condition.key]
  const { match, range } = condition

  if (match) {
    if ("text" in match) {
      const needle = match.text.toLowerCase()
      if (!asStrings(value).some(s => s.toLowerCase().includes(needle))) {
        return false
      }
    } else if ("value" in match) {
      const matched = Array.isArray(value)
        ? value.includes(match.value)
        : value === match.value
      if (!matched) return false
    } else {
      const present = asStrings(value)
      if (!match.any.some(candidate => present.includes(candidate))) {
        return false
      }
    }
  }

  if (range) {
    if (typeof value !== "number") return false
    if (range.gte !== undefined && !(value >= range.gte)) return false
    if (range.gt !== undefined && !(value > range.gt)) return false
    if (range.lte !== undefined && !(value <= range.lte)) return false
    if (range.lt !== undefined && !(value < range.lt)) return false
  }

  return true
}

function matchesCondition(
  payload: RecipeIndexEntry,
  condition: Condition
): boolean {
  return isFieldCondition(condition)
    ? matchesField(payload, condition)
    : matchesFilter(payload, condition)
}

/**
 * must: all hold, must_not: none holds, should: at least one holds
 */
export function matchesFilter(
  payload: RecipeIndexEntry,
  filter: RecipeFilter | null
): boolean {
  if (!filter) return true

  const { must, must_not: mustNot, should } = filter

  if (must && !must.every(c => matchesCondition(payload, c))) {
    return false
  }
  if (mustNot && mustNot.some(c => matchesCondition(payload, c))) {
    return false
  }
  if (should && should.length > 0) {
    return should.some(c => matchesCondition(payload, c))
  }
  return true
}

// =============================================================================
// Index
// =============================================================================

export class InMemoryVectorIndex implements VectorIndex {
  private readonly collections = new Map<string, Collection>()
  private readonly logger: Logger

  constructor(logger: Logger = createNoopLogger()) {
    this.logger = logger
  }

  async query(request: VectorQuery): Promise<ScoredRecipe[]> {
    const collection = this.getCollection(request.collection)

    const scored: ScoredRecipe[] = []
    for (const point of collection.points.values()) {
      if (!matchesFilter(point.payload, request.filter)) continue
      scored.push({
        id: point.id,
        score: cosineSimilarity(request.vector, point.vector),
        payload: point.payload
      })
    }

    scored.sort((a, b) => b.score - a.score)
    return scored.slice(0, request.limit)
  }

  async queryFused(request: FusedVectorQuery): Promise<ScoredRecipe[]> {
    const rankedLists: ScoredRecipe[][] = []
    for (const vector of request.vectors) {
      rankedLists.push(
        await this.query({
          collection: request.collection,
          vector,
          filter: request.filter,
          limit: request.limit
        })
      )
    }

    const fused = reciprocalRankFusion(rankedLists, { topK: request.limit })
    this.logger.debug("RRF fusion", { ...calculateFusionStats(rankedLists, fused) })

    return fused.map(item => ({
      id: item.id,
      score: item.rrfScore,
      payload: item.payload
    }))
  }

  async collectionExists(collection: string): Promise<boolean> {
    return this.collections.has(collection)
  }

  async recreateCollection(
    collection: string,
    vectorSize: number
  ): Promise<void> {
    this.collections.set(collection, { vectorSize, points: new Map() })
  }

  async ensureCollection(collection: string, vectorSize: number): Promise<void> {
    if (!this.collections.has(collection)) {
      await this.recreateCollection(collection, vectorSize)
    }
  }

  async upsert(collection: string, points: IndexPoint[]): Promise<void> {
    const target = this.getCollection(collection)

    for (const point of points) {
      if (point.vector.length !== target.vectorSize) {
        throw new Error(
          `Point ${point.id} has ${point.vector.length} dimensions, collection '${collection}' expects ${target.vectorSize}`
        )
      }
      target.points.set(point.id, point)
    }
  }

  /**
   * Offsets are positions in insertion order
   */
  async scroll(collection: string, request: ScrollRequest): Promise<ScrollPage> {
    const matching = [...this.getCollection(collection).points.values()]
      .filter(point => matchesFilter(point.payload, request.filter))
      .map(point => point.id)

    const start = typeof request.offset === "number" ? request.offset : 0
    const end = start + request.limit

    return {
      ids: matching.slice(start, end),
      nextOffset: end < matching.length ? end : null
    }
  }

  private getCollection(name: string): Collection {
    const collection = this.collections.get(name)
    if (!collection) {
      throw new Error(`Collection '${name}' not found`)
    }
    return collection
  }
}
