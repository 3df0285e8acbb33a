/**
 * Vector index payload of a recipe
 */

import { z } from "zod"

import { ValidationError } from "@/lib/errors/error-handler"
import type { Embedding } from "@/lib/embeddings/types"
import type { IndexPoint } from "@/lib/rag/vector-index/types"

import {
  RecipeSchema,
  flattenNormalizedIngredients,
  getTextForEmbedding,
  type Recipe
} from "./recipe"

export const RecipeIndexEntrySchema = z.object({
  recipe_id: z.string(),
  name: z.string(),
  slug: z.string(),
  total_time_minutes: z.number().nullable(),
  description: z.string().nullable(),
  /** Lowercased */
  category: z.array(z.string()),
  /** Lowercased */
  tags: z.array(z.string()),
  /** Lowercased */
  tools: z.array(z.string()),
  /** Lowercased */
  method: z.array(z.string()),
  rating: z.number().nullable(),
  is_healthy: z.boolean().nullable(),
  text: z.string(),
  ingredients: z.array(z.string()),
  instructions: z.array(z.string()),
  normalized_ingredients: z.array(z.string()),
  ingredient_count: z.number().int(),
  /** Full snapshot, used to rebuild the recipe at query time */
  recipe: RecipeSchema
})

export type RecipeIndexEntry = z.infer<typeof RecipeIndexEntrySchema>

/**
 * Keys the filter predicate tree may reference
 */
export type RecipePayloadKey = Exclude<keyof RecipeIndexEntry, "recipe">

const lower = (values: string[]): string[] =>
  values.map(value => value.toLowerCase())

/**
 * @throws ValidationError when the recipe has no id
 */
export function createIndexEntry(recipe: Recipe): RecipeIndexEntry {
  if (!recipe.id) {
    throw new ValidationError(`Recipe '${recipe.name}' has no ID.`, recipe)
  }

  return {
    recipe_id: recipe.id,
    name: recipe.name,
    slug: recipe.slug,
    total_time_minutes: recipe.total_time_minutes ?? null,
    description: recipe.description ?? null,
    category: lower(recipe.recipeCategory),
    tags: lower(recipe.tags),
    tools: lower(recipe.tools),
    method: lower(recipe.method),
    rating: recipe.rating ?? null,
    is_healthy: recipe.is_healthy ?? null,
    text: getTextForEmbedding(recipe),
    ingredients: recipe.recipeIngredients.map(i => i.display),
    instructions: recipe.recipeInstructions.map(s => s.text),
    normalized_ingredients: flattenNormalizedIngredients(
      recipe.normalizedRecipeIngredients
    ),
    ingredient_count: recipe.recipeIngredients.length,
    recipe
  }
}

export function createPointFromRecipe(
  recipe: Recipe,
  vector: Embedding
): IndexPoint {
  const payload = createIndexEntry(recipe)
  return { id: payload.recipe_id, vector, payload }
}
