/**
 * Chat Client
 *
 * Chat/completion provider behind a narrow interface:
 * - chat: raw text completion
 * - chatStructured: completion constrained to a zod schema
 * - streamingChat: lazy sequence of text deltas
 *
 * The default implementation talks to any OpenAI-compatible endpoint through
 * ChatOpenAI, so OpenAI and Ollama (`/v1`) both work.
 */

import { ChatOpenAI } from "@langchain/openai"
import {
  AIMessage,
  HumanMessage,
  SystemMessage,
  type BaseMessage
} from "@langchain/core/messages"
import type { z } from "zod"

// =============================================================================
// Types
// =============================================================================

export type ChatRole = "system" | "user" | "assistant"

export interface ChatMessage {
  role: ChatRole
  content: string
}

export interface ChatOptions {
  model: string
  temperature: number
  /** Fixed seed for reproducible sampling (provider permitting) */
  seed?: number
  /** Extra tags for LangSmith */
  tags?: string[]
}

export interface ChatClient {
  chat(messages: ChatMessage[], options: ChatOptions): Promise<string>

  chatStructured<T extends Record<string, unknown>>(
    messages: ChatMessage[],
    options: ChatOptions,
    schema: z.ZodType<T>,
    schemaName: string
  ): Promise<T>

  /**
   * Finite, not restartable. Stopping iteration early is the only
   * cancellation needed: nothing runs in the background.
   */
  streamingChat(
    messages: ChatMessage[],
    options: ChatOptions
  ): AsyncGenerator<string, void, undefined>
}

export interface OpenAIChatClientConfig {
  apiKey?: string
  /** OpenAI-compatible endpoint; unset means api.openai.com */
  baseURL?: string
}

// =============================================================================
// Message conversion
// =============================================================================

export function toLangChainMessages(messages: ChatMessage[]): BaseMessage[] {
  return messages.map(message => {
    switch (message.role) {
      case "system":
        return new SystemMessage(message.content)
      case "assistant":
        return new AIMessage(message.content)
      case "user":
        return new HumanMessage(message.content)
    }
  })
}

function contentToText(content: BaseMessage["content"]): string {
  return typeof content === "string" ? content : JSON.stringify(content)
}

// =============================================================================
// OpenAI-compatible client
// =============================================================================

export class OpenAIChatClient implements ChatClient {
  private readonly config: OpenAIChatClientConfig

  constructor(config: OpenAIChatClientConfig = {}) {
    this.config = config
  }

  async chat(messages: ChatMessage[], options: ChatOptions): Promise<string> {
    const llm = this.createModel(options, false)
    const response = await llm.invoke(toLangChainMessages(messages))
    return contentToText(response.content)
  }

  async chatStructured<T extends Record<string, unknown>>(
    messages: ChatMessage[],
    options: ChatOptions,
    schema: z.ZodType<T>,
    schemaName: string
  ): Promise<T> {
    const llm = this.createModel(options, false)
    const structured = llm.withStructuredOutput(schema, { name: schemaName })
    return structured.invoke(toLangChainMessages(messages))
  }

  async *streamingChat(
    messages: ChatMessage[],
    options: ChatOptions
  ): AsyncGenerator<string, void, undefined> {
    const llm = this.createModel(options, true)
    const stream = await llm.stream(toLangChainMessages(messages))

    for await (const chunk of stream) {
      if (typeof chunk.content === "string" && chunk.content.length > 0) {
        yield chunk.content
      }
    }
  }

  /**
   * No retries at this layer: failures surface to the caller
   */
  private createModel(options: ChatOptions, streaming: boolean): ChatOpenAI {
    return new ChatOpenAI({
      model: options.model,
      temperature: options.temperature,
      apiKey: this.config.apiKey ?? (this.config.baseURL ? "local" : undefined),
      maxRetries: 0,
      streaming,
      tags: ["recipe-rag", ...(options.tags ?? [])],
      ...(this.config.baseURL
        ? { configuration: { baseURL: this.config.baseURL } }
        : {}),
      ...(options.seed !== undefined
        ? { modelKwargs: { seed: options.seed } }
        : {})
    })
  }
}
