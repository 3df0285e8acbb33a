/**
 * Recipe enrichment
 *
 * Fills metadata the export left empty (categories, tags, tools, methods,
 * healthiness, total time) and normalizes ingredient lines, both with
 * structured chat calls.
 *
 * The model is only asked for the properties that are missing: the response
 * schema is picked from a static list of enrichable properties.
 */

import { z } from "zod"

import type { ChatClient, ChatOptions } from "@/lib/llm/chat-client"
import { createNoopLogger, type Logger } from "@/lib/logging/logger"
import type { PromptStore } from "@/lib/prompts/prompt-store"
import { PromptType } from "@/lib/prompts/recipe-prompts"

import {
  NormalizedIngredientsSchema,
  getTextRepresentation,
  type Recipe
} from "./recipe"

export interface RecipeLlmContext {
  chatClient: ChatClient
  promptStore: PromptStore
  chatOptions: ChatOptions
  promptLabel?: string
  logger?: Logger
}

// =============================================================================
// Enrichable properties
// =============================================================================

export const RecipeEnrichmentSchema = z.object({
  recipeCategory: z
    .array(z.string())
    .nullish()
    .describe("Categories of the recipe, e.g. ['Dinner', 'Lunch', 'Breakfast']"),
  tags: z
    .array(z.string())
    .nullish()
    .describe("Tags of the recipe, e.g. ['Healthy', 'Quick', 'Easy']"),
  tools: z
    .array(z.string())
    .nullish()
    .describe("Tools needed to make the recipe, e.g. ['Oven', 'Stove', 'Microwave']"),
  method: z
    .array(z.string())
    .nullish()
    .describe("Cooking methods used, e.g. ['Fried', 'Baked', 'Grilled', 'Slow Cooked']"),
  is_healthy: z
    .boolean()
    .nullish()
    .describe("True if the recipe is healthy based on ingredients and cooking method"),
  total_time_minutes: z
    .number()
    .int()
    .nullish()
    .describe("Total (prep + cook) time in minutes, estimated from the instructions")
})

export type RecipeEnrichment = z.infer<typeof RecipeEnrichmentSchema>

export type EnrichableProperty = keyof RecipeEnrichment

const isEmptyList = (values: string[]): boolean => values.length === 0

/**
 * Presence predicate per enrichable property
 */
export const ENRICHABLE_PROPERTIES: Record<
  EnrichableProperty,
  (recipe: Recipe) => boolean
> = {
  recipeCategory: recipe => isEmptyList(recipe.recipeCategory),
  tags: recipe => isEmptyList(recipe.tags),
  tools: recipe => isEmptyList(recipe.tools),
  method: recipe => isEmptyList(recipe.method),
  is_healthy: recipe => recipe.is_healthy === null || recipe.is_healthy === undefined,
  total_time_minutes: recipe =>
    recipe.total_time_minutes === null || recipe.total_time_minutes === undefined
}

export function findMissingProperties(recipe: Recipe): EnrichableProperty[] {
  return RecipeEnrichmentSchema.keyof().options.filter(property =>
    ENRICHABLE_PROPERTIES[property](recipe)
  )
}

/**
 * Non-null response values overwrite the recipe's
 */
export function mergeEnrichment(
  recipe: Recipe,
  enrichment: RecipeEnrichment
): Recipe {
  const merged: Recipe = { ...recipe }

  if (enrichment.recipeCategory) merged.recipeCategory = enrichment.recipeCategory
  if (enrichment.tags) merged.tags = enrichment.tags
  if (enrichment.tools) merged.tools = enrichment.tools
  if (enrichment.method) merged.method = enrichment.method
  if (enrichment.is_healthy !== null && enrichment.is_healthy !== undefined) {
    merged.is_healthy = enrichment.is_healthy
  }
  if (
    enrichment.total_time_minutes !== null &&
    enrichment.total_time_minutes !== undefined
  ) {
    merged.total_time_minutes = enrichment.total_time_minutes
  }

  return merged
}

// =============================================================================
// Enrichment
// =============================================================================

/**
 * Asks the model once for the missing properties
 *
 * A failed call is logged and leaves the recipe unchanged.
 */
export async function enrichRecipeProperties(
  recipe: Recipe,
  context: RecipeLlmContext
): Promise<Recipe> {
  const logger = context.logger ?? createNoopLogger()
  const missing = findMissingProperties(recipe)

  if (missing.length === 0) {
    return recipe
  }

  const mask: Partial<Record<EnrichableProperty, true>> = {}
  for (const property of missing) {
    mask[property] = true
  }
  const schema = RecipeEnrichmentSchema.pick(mask)

  try {
    const prompt = await context.promptStore.getPrompt(
      PromptType.RECIPE_ENRICHMENT,
      context.promptLabel
    )
    const messages = prompt.compile({
      recipe: getTextRepresentation(recipe, [
        "name",
        "description",
        "recipeIngredients",
        "recipeInstructions"
      ])
    })

    const response = await context.chatClient.chatStructured(
      messages,
      { ...context.chatOptions, tags: ["recipe-enrichment"] },
      schema,
      "RecipeEnrichment"
    )

    logger.debug("Recipe enriched", { recipe: recipe.name, properties: missing })
    return mergeEnrichment(recipe, response)
  } catch (error) {
    logger.error("Error enriching recipe", { recipe: recipe.name }, error)
    return recipe
  }
}

/**
 * Replaces the normalized ingredients with the model's reading of the
 * ingredient lines
 */
export async function normalizeIngredients(
  recipe: Recipe,
  context: RecipeLlmContext
): Promise<Recipe> {
  const prompt = await context.promptStore.getPrompt(
    PromptType.INGREDIENT_NORMALIZATION,
    context.promptLabel
  )

  const messages = prompt.compile({
    ingredients: JSON.stringify(recipe.recipeIngredients.map(i => i.display))
  })

  const normalized = await context.chatClient.chatStructured(
    messages,
    { ...context.chatOptions, tags: ["ingredient-normalization"] },
    NormalizedIngredientsSchema,
    "NormalizedIngredients"
  )

  return { ...recipe, normalizedRecipeIngredients: normalized }
}
