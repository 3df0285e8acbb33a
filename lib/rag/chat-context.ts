/**
 * Generation context: retrieved recipes rendered into the chat prompt
 */

import type { ChatMessage } from "@/lib/llm/chat-client"
import type { PromptStore } from "@/lib/prompts/prompt-store"
import { PromptType } from "@/lib/prompts/recipe-prompts"
import { getTextForContext } from "@/lib/recipes/recipe"

import type { ScoredRecipe } from "./vector-index/types"

export const RECIPE_START = "[RECIPE_START]"
export const RECIPE_END = "[RECIPE_END]"

/**
 * One delimited block per hit, rebuilt from the payload snapshot
 */
export function populateContext(hits: ScoredRecipe[]): string {
  return hits
    .map(
      hit => `${RECIPE_START}\n${getTextForContext(hit.payload.recipe)}${RECIPE_END}\n`
    )
    .join("")
}

export interface PopulateMessagesOptions {
  promptStore: PromptStore
  externalUrl: string
  promptLabel?: string
}

export async function populateMessages(
  query: string,
  hits: ScoredRecipe[],
  options: PopulateMessagesOptions
): Promise<ChatMessage[]> {
  const prompt = await options.promptStore.getPrompt(
    PromptType.CHAT_GENERATION,
    options.promptLabel
  )

  return prompt.compile({
    external_url: options.externalUrl,
    context_text: populateContext(hits),
    query
  })
}
