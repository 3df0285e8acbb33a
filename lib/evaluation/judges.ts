/**
 * Generation judges
 *
 * LLM-as-judge scores for one answer:
 * - relevancy: 1 (unrelated) to 5 (fully answers)
 * - faithfulness: "faithful" or "hallucination" against the retrieved recipes
 */

import { z } from "zod"

import type { ChatClient, ChatOptions } from "@/lib/llm/chat-client"
import type { PromptStore } from "@/lib/prompts/prompt-store"
import { PromptType } from "@/lib/prompts/recipe-prompts"
import type { RagServiceDeps } from "@/lib/rag/rag-service"
import type { ScoredRecipe } from "@/lib/rag/vector-index/types"

export interface JudgeContext {
  chatClient: ChatClient
  promptStore: PromptStore
  chatOptions: ChatOptions
  promptLabel?: string
}

/**
 * Judges reuse the service's chat client and prompts, on JUDGE_MODEL when set
 */
export function createJudgeContext(
  deps: Pick<RagServiceDeps, "settings" | "chatClient" | "promptStore">
): JudgeContext {
  const { settings } = deps
  return {
    chatClient: deps.chatClient,
    promptStore: deps.promptStore,
    chatOptions: {
      model: settings.judgeModel ?? settings.llmModel,
      temperature: settings.llmTemperature,
      seed: settings.llmSeed
    },
    promptLabel: settings.promptLabel
  }
}

// =============================================================================
// Schemas
// =============================================================================

export const RelevancyJudgementSchema = z.object({
  score: z.number().int().min(1).max(5),
  reason: z.string()
})

export type RelevancyJudgement = z.infer<typeof RelevancyJudgementSchema>

export const FaithfulnessVerdictSchema = z.enum(["faithful", "hallucination"])

export type FaithfulnessVerdict = z.infer<typeof FaithfulnessVerdictSchema>

export const FaithfulnessJudgementSchema = z.object({
  verdict: FaithfulnessVerdictSchema,
  reason: z.string()
})

export type FaithfulnessJudgement = z.infer<typeof FaithfulnessJudgementSchema>

// =============================================================================
// Context
// =============================================================================

/**
 * The retrieved recipes as the judge sees them, plus their names
 */
export function formatJudgeContext(hits: ScoredRecipe[]): {
  context: string
  recipeNames: string[]
} {
  const blocks = hits.map(({ payload }) =>
    [
      "[RECIPE START]",
      `Name: ${payload.name}`,
      `Rating: ${payload.rating ?? "Unknown"}`,
      `Description: ${payload.description ?? ""}`,
      "Ingredients:",
      ...payload.ingredients.map(line => `- ${line}`),
      "Instructions:",
      ...payload.instructions.map(line => `- ${line}`),
      "[RECIPE END]"
    ].join("\n")
  )

  return {
    context: blocks.join("\n"),
    recipeNames: hits.map(hit => hit.payload.name)
  }
}

// =============================================================================
// Judges
// =============================================================================

export async function judgeRelevancy(
  query: string,
  answer: string,
  judge: JudgeContext
): Promise<RelevancyJudgement> {
  const prompt = await judge.promptStore.getPrompt(
    PromptType.METRIC_RELEVANCY,
    judge.promptLabel
  )

  return judge.chatClient.chatStructured(
    prompt.compile({ query, answer }),
    { ...judge.chatOptions, tags: ["judge", "relevancy"] },
    RelevancyJudgementSchema,
    "RelevancyJudgement"
  )
}

export async function judgeFaithfulness(
  query: string,
  context: string,
  answer: string,
  judge: JudgeContext
): Promise<FaithfulnessJudgement> {
  const prompt = await judge.promptStore.getPrompt(
    PromptType.METRIC_FAITHFULNESS,
    judge.promptLabel
  )

  return judge.chatClient.chatStructured(
    prompt.compile({ query, context, answer }),
    { ...judge.chatOptions, tags: ["judge", "faithfulness"] },
    FaithfulnessJudgementSchema,
    "FaithfulnessJudgement"
  )
}
