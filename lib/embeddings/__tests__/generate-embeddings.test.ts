import { describe, it, expect, vi } from "vitest"
import type OpenAI from "openai"

import { OpenAIEmbeddingProvider, cosineSimilarity, type EmbeddingsApi } from "../generate-embeddings"
import { EmbeddingError } from "../types"

function fakeApi(vectors: number[][], order?: number[]) {
  const create = vi.fn(
    async (body: OpenAI.EmbeddingCreateParams): Promise<OpenAI.CreateEmbeddingResponse> => ({
      object: "list",
      model: body.model,
      data: (order ?? vectors.map((_, i) => i)).map(index => ({
        object: "embedding",
        index,
        embedding: vectors[index]
      })),
      usage: { prompt_tokens: 1, total_tokens: 1 }
    })
  )
  const api: EmbeddingsApi = { embeddings: { create } }
  return { api, create }
}

describe("OpenAIEmbeddingProvider", () => {
  it("should embed the whole batch in one request, ordered by index", async () => {
    const { api, create } = fakeApi([[1, 0], [0, 1]], [1, 0])
    const provider = new OpenAIEmbeddingProvider({ model: "test-embed", dimensions: 2 }, api)

    const vectors = await provider.embed(["soup", "cake"])

    expect(vectors).toEqual([[1, 0], [0, 1]])
    expect(create).toHaveBeenCalledTimes(1)
    expect(create).toHaveBeenCalledWith({
      model: "test-embed",
      input: ["soup", "cake"],
      encoding_format: "float"
    })
  })

  it("should reject empty batches and blank texts", async () => {
    const { api, create } = fakeApi([])
    const provider = new OpenAIEmbeddingProvider({ model: "test-embed" }, api)

    await expect(provider.embed([])).rejects.toThrow(EmbeddingError)
    await expect(provider.embed(["soup", "  "])).rejects.toThrow(
      "Text 1 of the batch is blank"
    )
    expect(create).not.toHaveBeenCalled()
  })

  it("should reject vectors of unexpected size", async () => {
    const { api } = fakeApi([[1, 0, 0]])
    const provider = new OpenAIEmbeddingProvider({ model: "test-embed", dimensions: 2 }, api)

    await expect(provider.embed(["soup"])).rejects.toThrow(
      "Embedding 0 has wrong dimensions: 3 (expected: 2)"
    )
  })

  it("should reject a response missing vectors", async () => {
    const { api } = fakeApi([[1, 0]])
    const provider = new OpenAIEmbeddingProvider({ model: "test-embed" }, api)

    await expect(provider.embed(["soup", "cake"])).rejects.toThrow(
      "Wrong number of embeddings returned: 1 (expected: 2)"
    )
  })

  it("should require a key for the hosted endpoint", () => {
    expect(() => new OpenAIEmbeddingProvider({ model: "test-embed" })).toThrow(
      EmbeddingError
    )
  })
})

describe("cosineSimilarity", () => {
  it("should compare directions", () => {
    expect(cosineSimilarity([1, 0], [2, 0])).toBeCloseTo(1, 10)
    expect(cosineSimilarity([1, 0], [0, 3])).toBe(0)
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0)
  })

  it("should reject vectors of different length", () => {
    expect(() => cosineSimilarity([1], [1, 2])).toThrow(
      "Embeddings must have the same length"
    )
  })
})
