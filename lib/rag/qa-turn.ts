/**
 * One question/answer turn of the interactive assistant
 *
 * Progress and the streamed answer go to `write`. "No relevant recipes" is
 * an answer, not a failure. A failing stage is logged with detail and the
 * user sees a friendly message for that stage.
 */

import {
  classifyError,
  getApologyMessage,
  type PipelineStage
} from "@/lib/errors/error-handler"
import { createNoopLogger, type Logger } from "@/lib/logging/logger"

import type { RecipeRagService } from "./rag-service"
import type { ScoredRecipe } from "./vector-index/types"

export const NO_RECIPES_MESSAGE = "No relevant recipes found."

export type QaTurnOutcome = "answered" | "no-recipes" | "failed"

export type QaPipeline = Pick<
  RecipeRagService,
  "generateQueries" | "retrieveRecipes" | "populateMessages" | "chat"
>

export function formatHit(hit: ScoredRecipe): string {
  const { name, rating, tags, category } = hit.payload
  return `**Name:** ${name} **Rating:** ${rating ?? "-"} **Tags:** ${tags.join(", ")} **Category:** ${category.join(", ")}`
}

export async function runQaTurn(
  service: QaPipeline,
  userInput: string,
  write: (text: string) => void,
  logger: Logger = createNoopLogger()
): Promise<QaTurnOutcome> {
  let stage: PipelineStage = "query_extraction"

  try {
    write(" 👾 Understanding your request...\n")
    const extraction = await service.generateQueries(userInput)

    stage = "retrieval"
    write(" 🔍 Finding relevant recipes...\n")
    const hits = await service.retrieveRecipes(extraction)

    if (hits.length === 0) {
      write(`${NO_RECIPES_MESSAGE}\n`)
      return "no-recipes"
    }

    for (const hit of hits) {
      write(`${formatHit(hit)}\n`)
    }

    stage = "generation"
    const messages = await service.populateMessages(userInput, hits)

    write("\n🤖 Chef: ")
    for await (const delta of service.chat(messages)) {
      write(delta)
    }
    write("\n")

    return "answered"
  } catch (error) {
    const classified = classifyError(error, stage)
    logger.error(
      `${classified.stageName} failed`,
      { type: classified.type, stage },
      error
    )
    const userMessage =
      stage === "generation" ? getApologyMessage(stage) : classified.userMessage
    write(`\n${userMessage}\n`)
    return "failed"
  }
}
