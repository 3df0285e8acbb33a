/**
 * Vector index contract
 *
 * Implemented by the Qdrant-backed index and by the in-process index used in
 * tests and local experiments.
 */

import type { Embedding } from "@/lib/embeddings/types"
import type { RecipeIndexEntry } from "@/lib/recipes/index-entry"
import type { RecipeFilter } from "@/lib/rag/filter-builder"

export type PointId = string

export type ScrollOffset = string | number

export interface IndexPoint {
  id: PointId
  vector: Embedding
  payload: RecipeIndexEntry
}

export interface ScoredRecipe {
  id: PointId
  score: number
  payload: RecipeIndexEntry
}

export interface VectorQuery {
  collection: string
  vector: Embedding
  filter: RecipeFilter | null
  limit: number
}

export interface FusedVectorQuery {
  collection: string
  vectors: Embedding[]
  /** Applied to every per-vector candidate list */
  filter: RecipeFilter | null
  /** Also the candidate count fetched per vector */
  limit: number
}

export interface ScrollRequest {
  filter: RecipeFilter | null
  limit: number
  offset?: ScrollOffset
}

export interface ScrollPage {
  ids: PointId[]
  /** null once the last page was returned */
  nextOffset: ScrollOffset | null
}

export interface VectorIndex {
  /** Top `limit` points by similarity, best first */
  query(request: VectorQuery): Promise<ScoredRecipe[]>

  /** Reciprocal Rank Fusion over one candidate list per vector */
  queryFused(request: FusedVectorQuery): Promise<ScoredRecipe[]>

  collectionExists(collection: string): Promise<boolean>

  /** Drops the collection if present and creates it empty */
  recreateCollection(collection: string, vectorSize: number): Promise<void>

  /** Creates the collection when missing; existing collections are kept */
  ensureCollection(collection: string, vectorSize: number): Promise<void>

  upsert(collection: string, points: IndexPoint[]): Promise<void>

  scroll(collection: string, request: ScrollRequest): Promise<ScrollPage>
}
