import { describe, it, expect, vi } from "vitest"

import { ValidationError } from "@/lib/errors/error-handler"
import { createIndexEntry, createPointFromRecipe } from "@/lib/recipes/index-entry"
import { makeRecipe } from "@/lib/testing/fakes"

import {
  retrieveResults,
  retrieveResultsRrf,
  retrieveResultsSimple
} from "../retrieval"
import { InMemoryVectorIndex } from "../vector-index/memory-index"
import { QdrantVectorIndex, type QdrantApi } from "../vector-index/qdrant-index"

function fakeQdrant(points: unknown[] = []) {
  const client = {
    query: vi.fn().mockResolvedValue({ points }),
    scroll: vi.fn(),
    collectionExists: vi.fn(),
    createCollection: vi.fn(),
    deleteCollection: vi.fn(),
    upsert: vi.fn()
  }
  const api: QdrantApi = client
  return { client, index: new QdrantVectorIndex(api) }
}

async function seededIndex(): Promise<InMemoryVectorIndex> {
  const index = new InMemoryVectorIndex()
  await index.recreateCollection("recipes", 2)
  await index.upsert("recipes", [
    createPointFromRecipe(makeRecipe({ name: "Apple Pie", rating: 5 }), [1, 0]),
    createPointFromRecipe(makeRecipe({ name: "Banana Bread", rating: 3 }), [0.8, 0.2]),
    createPointFromRecipe(makeRecipe({ name: "Carrot Soup", rating: 4 }), [0, 1])
  ])
  return index
}

describe("retrieveResultsSimple", () => {
  it("should reject more than one vector", async () => {
    const { index } = fakeQdrant()

    const call = retrieveResultsSimple({
      vectors: [[1, 0], [0, 1]],
      index,
      collection: "recipes",
      filter: null
    })

    await expect(call).rejects.toBeInstanceOf(ValidationError)
    await expect(call).rejects.toThrow(
      "Simple retrieval supports exactly one query vector, got 2"
    )
  })

  it("should return the k nearest recipes, best first", async () => {
    const hits = await retrieveResultsSimple({
      vectors: [[1, 0]],
      index: await seededIndex(),
      collection: "recipes",
      filter: null,
      k: 2
    })

    expect(hits.map(hit => hit.id)).toEqual(["apple-pie", "banana-bread"])
  })

  it("should apply the filter before ranking", async () => {
    const hits = await retrieveResultsSimple({
      vectors: [[1, 0]],
      index: await seededIndex(),
      collection: "recipes",
      filter: { must: [{ key: "rating", range: { gte: 4 } }] }
    })

    expect(hits.map(hit => hit.id)).toEqual(["apple-pie", "carrot-soup"])
  })

  it("should send one plain query to Qdrant", async () => {
    const { client, index } = fakeQdrant()

    await retrieveResultsSimple({
      vectors: [[0.1, 0.2]],
      index,
      collection: "recipes",
      filter: null
    })

    expect(client.query).toHaveBeenCalledWith("recipes", {
      query: [0.1, 0.2],
      filter: undefined,
      limit: 3,
      with_payload: true
    })
  })
})

describe("retrieveResultsRrf", () => {
  it("should reject an empty vector list", async () => {
    const { index } = fakeQdrant()

    await expect(
      retrieveResultsRrf({ vectors: [], index, collection: "recipes", filter: null })
    ).rejects.toThrow("RRF retrieval needs at least one query vector, got 0")
  })

  it("should prefetch one filtered candidate list per vector", async () => {
    const payload = createIndexEntry(makeRecipe({ name: "Apple Pie" }))
    const { client, index } = fakeQdrant([
      { id: "apple-pie", version: 1, score: 0.5, payload }
    ])
    const filter = { must: [{ key: "is_healthy" as const, match: { value: true } }] }

    const hits = await retrieveResultsRrf({
      vectors: [[1, 0], [0, 1], [1, 1], [0.5, 0.5]],
      index,
      collection: "recipes",
      filter,
      k: 5
    })

    expect(client.query).toHaveBeenCalledTimes(1)
    expect(client.query).toHaveBeenCalledWith("recipes", {
      prefetch: [
        { query: [1, 0], filter, limit: 5 },
        { query: [0, 1], filter, limit: 5 },
        { query: [1, 1], filter, limit: 5 },
        { query: [0.5, 0.5], filter, limit: 5 }
      ],
      query: { fusion: "rrf" },
      limit: 5,
      with_payload: true
    })
    expect(hits).toEqual([{ id: "apple-pie", score: 0.5, payload }])
  })

  it("should reject a point whose payload is not a recipe", async () => {
    const { index } = fakeQdrant([{ id: 7, version: 1, score: 1, payload: { name: 1 } }])

    await expect(
      retrieveResultsRrf({
        vectors: [[1, 0]],
        index,
        collection: "recipes",
        filter: null
      })
    ).rejects.toThrow(/Point 7 has an invalid recipe payload/)
  })

  it("should favour recipes ranked well by several vectors", async () => {
    const hits = await retrieveResultsRrf({
      vectors: [[1, 0], [0.9, 0.1]],
      index: await seededIndex(),
      collection: "recipes",
      filter: null,
      k: 3
    })

    expect(hits.map(hit => hit.id)).toEqual([
      "apple-pie",
      "banana-bread",
      "carrot-soup"
    ])
    expect(hits[0].score).toBeCloseTo(2 / 61, 12)
  })
})

describe("retrieveResults", () => {
  it("should dispatch on the strategy", async () => {
    const { client, index } = fakeQdrant()
    const request = {
      vectors: [[1, 0]],
      index,
      collection: "recipes",
      filter: null
    }

    await retrieveResults("simple", request)
    await retrieveResults("rrf", request)

    expect(client.query).toHaveBeenNthCalledWith(
      1,
      "recipes",
      expect.objectContaining({ query: [1, 0] })
    )
    expect(client.query).toHaveBeenNthCalledWith(
      2,
      "recipes",
      expect.objectContaining({ query: { fusion: "rrf" } })
    )
  })
})
