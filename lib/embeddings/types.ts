/**
 * Types and interfaces for embedding generation
 */

export type Embedding = number[]

/**
 * Embedding provider contract: one vector per input text, same order.
 * Must throw on failure, never return a partial or empty result.
 */
export interface EmbeddingProvider {
  embed(texts: string[]): Promise<Embedding[]>
}

/**
 * Configuration of the OpenAI-compatible embedding provider
 */
export interface EmbeddingConfig {
  model: string
  apiKey?: string
  /** OpenAI-compatible endpoint (e.g. Ollama's /v1) */
  baseURL?: string
  /** Expected vector size; responses with another size are rejected */
  dimensions?: number
}

/**
 * Embedding generation error
 */
export class EmbeddingError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly statusCode?: number
  ) {
    super(message)
    this.name = "EmbeddingError"
  }
}
