/**
 * Qdrant-backed vector index
 *
 * Filters are forwarded as-is: the predicate tree already has the shape of
 * Qdrant's REST filter. Fused queries use the Query API with one prefetch
 * per vector and server-side RRF.
 */

import { QdrantClient } from "@qdrant/js-client-rest"

import { fromZodError } from "@/lib/errors/error-handler"
import { createNoopLogger, type Logger } from "@/lib/logging/logger"
import {
  RecipeIndexEntrySchema,
  type RecipeIndexEntry
} from "@/lib/recipes/index-entry"

import type {
  FusedVectorQuery,
  IndexPoint,
  ScoredRecipe,
  ScrollPage,
  ScrollRequest,
  VectorIndex,
  VectorQuery
} from "./types"

/**
 * The part of the Qdrant client the index uses
 */
export type QdrantApi = Pick<
  QdrantClient,
  | "query"
  | "scroll"
  | "collectionExists"
  | "createCollection"
  | "deleteCollection"
  | "upsert"
>

export interface QdrantIndexConfig {
  url: string
  apiKey?: string
}

interface RawScoredPoint {
  id: string | number
  score: number
  payload?: Record<string, unknown> | null
}

export class QdrantVectorIndex implements VectorIndex {
  private readonly client: QdrantApi
  private readonly logger: Logger

  constructor(client: QdrantApi, logger: Logger = createNoopLogger()) {
    this.client = client
    this.logger = logger
  }

  async query(request: VectorQuery): Promise<ScoredRecipe[]> {
    const response = await this.client.query(request.collection, {
      query: request.vector,
      filter: request.filter ?? undefined,
      limit: request.limit,
      with_payload: true
    })

    return response.points.map(point => this.toScoredRecipe(point))
  }

  async queryFused(request: FusedVectorQuery): Promise<ScoredRecipe[]> {
    const filter = request.filter ?? undefined

    const response = await this.client.query(request.collection, {
      prefetch: request.vectors.map(vector => ({
        query: vector,
        filter,
        limit: request.limit
      })),
      query: { fusion: "rrf" },
      limit: request.limit,
      with_payload: true
    })

    return response.points.map(point => this.toScoredRecipe(point))
  }

  async collectionExists(collection: string): Promise<boolean> {
    const response = await this.client.collectionExists(collection)
    return response.exists
  }

  async recreateCollection(
    collection: string,
    vectorSize: number
  ): Promise<void> {
    if (await this.collectionExists(collection)) {
      this.logger.info("Deleting existing collection", { collection })
      await this.client.deleteCollection(collection)
    }
    await this.createCollection(collection, vectorSize)
  }

  async ensureCollection(collection: string, vectorSize: number): Promise<void> {
    if (!(await this.collectionExists(collection))) {
      await this.createCollection(collection, vectorSize)
    }
  }

  async upsert(collection: string, points: IndexPoint[]): Promise<void> {
    await this.client.upsert(collection, {
      wait: true,
      points: points.map(point => ({
        id: point.id,
        vector: point.vector,
        payload: point.payload
      }))
    })
  }

  async scroll(collection: string, request: ScrollRequest): Promise<ScrollPage> {
    const response = await this.client.scroll(collection, {
      filter: request.filter ?? undefined,
      limit: request.limit,
      offset: request.offset,
      with_payload: false,
      with_vector: false
    })

    const next = response.next_page_offset
    return {
      ids: response.points.map(point => String(point.id)),
      nextOffset: typeof next === "string" || typeof next === "number" ? next : null
    }
  }

  private async createCollection(
    collection: string,
    vectorSize: number
  ): Promise<void> {
    this.logger.info("Creating collection", { collection, vectorSize })
    await this.client.createCollection(collection, {
      vectors: { size: vectorSize, distance: "Cosine" }
    })
  }

  private toScoredRecipe(point: RawScoredPoint): ScoredRecipe {
    const parsed = RecipeIndexEntrySchema.safeParse(point.payload)
    if (!parsed.success) {
      throw fromZodError(
        `Point ${point.id} has an invalid recipe payload`,
        parsed.error,
        point.payload
      )
    }

    const payload: RecipeIndexEntry = parsed.data
    return { id: String(point.id), score: point.score, payload }
  }
}

export function createQdrantVectorIndex(
  config: QdrantIndexConfig,
  logger?: Logger
): QdrantVectorIndex {
  const client = new QdrantClient({ url: config.url, apiKey: config.apiKey })
  return new QdrantVectorIndex(client, logger)
}
