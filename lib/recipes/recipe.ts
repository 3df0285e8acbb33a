/**
 * Recipe model
 *
 * Mirrors the recipe manager's export and renders recipes as text for
 * embedding, for the generation context and for LLM prompts.
 */

import { z } from "zod"

// =============================================================================
// Schemas
// =============================================================================

export const RecipeIngredientSchema = z
  .object({
    display: z.string()
  })
  .passthrough()

export const RecipeInstructionSchema = z
  .object({
    text: z.string()
  })
  .passthrough()

export const NormalizedIngredientSchema = z.object({
  /** Generic ingredient names, singular lowercase */
  names: z.array(z.string())
})

export const NormalizedIngredientsSchema = z.object({
  ingredients: z.array(NormalizedIngredientSchema)
})

export const RecipeSchema = z.object({
  id: z.string().nullish(),
  name: z.string(),
  slug: z.string(),
  image: z.string().nullish(),
  /** Free-form total time as exported, e.g. "1 hour 15 minutes" */
  totalTime: z.string().nullish(),
  /** Total (prep + cook) time in minutes */
  total_time_minutes: z.number().int().nullish(),
  description: z.string().nullish(),
  recipeCategory: z.array(z.string()).default([]),
  tags: z.array(z.string()).default([]),
  tools: z.array(z.string()).default([]),
  method: z.array(z.string()).default([]),
  /** Between 1 and 5 */
  rating: z.number().nullish(),
  is_healthy: z.boolean().nullish(),
  recipeIngredients: z.array(RecipeIngredientSchema).default([]),
  recipeInstructions: z.array(RecipeInstructionSchema).default([]),
  normalizedRecipeIngredients: NormalizedIngredientsSchema.default({
    ingredients: []
  })
})

export type RecipeIngredient = z.infer<typeof RecipeIngredientSchema>
export type RecipeInstruction = z.infer<typeof RecipeInstructionSchema>
export type NormalizedIngredients = z.infer<typeof NormalizedIngredientsSchema>
export type Recipe = z.infer<typeof RecipeSchema>
export type RecipeInput = z.input<typeof RecipeSchema>

export type RecipeProperty = keyof Recipe

// =============================================================================
// Helpers
// =============================================================================

export function flattenNormalizedIngredients(
  normalized: NormalizedIngredients
): string[] {
  return normalized.ingredients.flatMap(ingredient => ingredient.names)
}

function formatScalar(value: unknown): string {
  return value === null || value === undefined ? "None" : String(value)
}

// =============================================================================
// Renderings
// =============================================================================

/**
 * Text the recipe is embedded from: name, description, tags, then one line
 * per ingredient and per instruction
 */
export function getTextForEmbedding(recipe: Recipe): string {
  let text = `${recipe.name}. ${formatScalar(recipe.description)}\n${recipe.tags.join(", ")}\n`

  for (const ingredient of recipe.recipeIngredients) {
    text += `${ingredient.display}\n`
  }
  for (const step of recipe.recipeInstructions) {
    text += `${step.text}\n`
  }

  return text
}

/**
 * Text shown to the generator for one retrieved recipe
 */
export function getTextForContext(recipe: Recipe): string {
  let text = `RecipeName: ${recipe.name}\nRecipeID: ${formatScalar(recipe.id)}\nRating: ${formatScalar(recipe.rating)}\n`

  text += "Ingredients:\n"
  for (const ingredient of recipe.recipeIngredients) {
    text += `- ${ingredient.display}\n`
  }

  text += "Instructions:\n"
  for (const step of recipe.recipeInstructions) {
    text += `- ${step.text}\n`
  }

  return text
}

function renderProperty(recipe: Recipe, property: RecipeProperty): string | null {
  switch (property) {
    case "recipeIngredients":
      return recipe.recipeIngredients.length > 0
        ? `\n${recipe.recipeIngredients.map(i => `- ${i.display}\n`).join("")}`
        : "\n\n"
    case "recipeInstructions":
      return recipe.recipeInstructions.length > 0
        ? `\n${recipe.recipeInstructions.map(s => `- ${s.text}\n`).join("")}`
        : "\n\n"
    case "normalizedRecipeIngredients": {
      const joined = recipe.normalizedRecipeIngredients.ingredients
        .map(ingredient => ingredient.names.join(", "))
        .join(", ")
      return `\n- ${joined}\n`
    }
    default: {
      const value = recipe[property]
      if (value === null || value === undefined) {
        return null
      }
      if (Array.isArray(value)) {
        return `\n${value.map(String).join(", ")}\n`
      }
      return ` ${String(value)}\n`
    }
  }
}

/**
 * Markdown-ish rendering of the selected properties, used as LLM input.
 * Absent values are skipped.
 */
export function getTextRepresentation(
  recipe: Recipe,
  properties: RecipeProperty[]
): string {
  let text = ""

  for (const property of properties) {
    const rendered = renderProperty(recipe, property)
    if (rendered === null) {
      continue
    }
    text += `**${property}:**${rendered}`
  }

  return text.trim()
}
