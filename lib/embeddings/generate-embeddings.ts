import OpenAI from "openai"

import type { Embedding, EmbeddingConfig, EmbeddingProvider } from "./types"
import { EmbeddingError } from "./types"

/**
 * The part of the OpenAI client the provider uses
 */
export interface EmbeddingsApi {
  embeddings: {
    create(
      body: OpenAI.EmbeddingCreateParams
    ): Promise<OpenAI.CreateEmbeddingResponse>
  }
}

/**
 * Embeds texts through an OpenAI-compatible embeddings endpoint
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private readonly client: EmbeddingsApi
  private readonly config: EmbeddingConfig

  constructor(config: EmbeddingConfig, client?: EmbeddingsApi) {
    this.config = config

    if (client) {
      this.client = client
      return
    }

    // Local OpenAI-compatible servers accept any key
    if (!config.apiKey && !config.baseURL) {
      throw new EmbeddingError(
        "LLM_API_KEY (or OPENAI_API_KEY) is required when LLM_BASE_URL is not set",
        "missing_api_key"
      )
    }

    this.client = new OpenAI({
      apiKey: config.apiKey ?? "local",
      baseURL: config.baseURL,
      maxRetries: 0
    })
  }

  /**
   * Embeds all texts in a single request
   *
   * @throws EmbeddingError if the batch is empty, a text is blank, or the
   * response does not hold one vector of the expected size per text
   */
  async embed(texts: string[]): Promise<Embedding[]> {
    if (texts.length === 0) {
      throw new EmbeddingError("Empty text batch provided for embedding")
    }

    const blankIndex = texts.findIndex(text => text.trim().length === 0)
    if (blankIndex !== -1) {
      throw new EmbeddingError(`Text ${blankIndex} of the batch is blank`)
    }

    try {
      const response = await this.client.embeddings.create({
        model: this.config.model,
        input: texts,
        encoding_format: "float"
      })

      if (response.data.length !== texts.length) {
        throw new EmbeddingError(
          `Wrong number of embeddings returned: ${response.data.length} (expected: ${texts.length})`
        )
      }

      // The API may reorder items; `index` is authoritative
      const ordered = [...response.data].sort((a, b) => a.index - b.index)

      return ordered.map((item, index) => {
        const embedding = item.embedding

        if (
          this.config.dimensions !== undefined &&
          embedding.length !== this.config.dimensions
        ) {
          throw new EmbeddingError(
            `Embedding ${index} has wrong dimensions: ${embedding.length} (expected: ${this.config.dimensions})`
          )
        }

        return embedding
      })
    } catch (error) {
      if (error instanceof OpenAI.APIError) {
        throw new EmbeddingError(
          `Embedding API error (${error.status}): ${error.message}`,
          error.code ?? undefined,
          error.status
        )
      }

      throw error
    }
  }
}

/**
 * Cosine similarity between two embeddings
 *
 * @returns Value between -1 and 1 (0 when either vector is all zeros)
 */
export function cosineSimilarity(
  embedding1: number[],
  embedding2: number[]
): number {
  if (embedding1.length !== embedding2.length) {
    throw new EmbeddingError("Embeddings must have the same length")
  }

  let dotProduct = 0
  let norm1 = 0
  let norm2 = 0

  for (let i = 0; i < embedding1.length; i++) {
    dotProduct += embedding1[i] * embedding2[i]
    norm1 += embedding1[i] * embedding1[i]
    norm2 += embedding2[i] * embedding2[i]
  }

  const magnitude = Math.sqrt(norm1) * Math.sqrt(norm2)

  if (magnitude === 0) {
    return 0
  }

  return dotProduct / magnitude
}
