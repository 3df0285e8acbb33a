import { describe, it, expect } from "vitest"

import { makeRecipe } from "@/lib/testing/fakes"

import {
  RecipeSchema,
  flattenNormalizedIngredients,
  getTextForContext,
  getTextForEmbedding,
  getTextRepresentation
} from "../recipe"

const PANCAKES = makeRecipe({
  name: "Pancakes",
  description: "Fluffy",
  tags: ["Breakfast", "Sweet"],
  recipeIngredients: [{ display: "2 eggs" }, { display: "1 cup flour" }],
  recipeInstructions: [{ text: "Whisk." }, { text: "Fry." }]
})

describe("RecipeSchema", () => {
  it("should default lists and keep unknown ingredient fields", () => {
    const recipe = RecipeSchema.parse({
      name: "Toast",
      slug: "toast",
      recipeIngredients: [{ display: "1 slice bread", quantity: 1 }]
    })

    expect(recipe.tags).toEqual([])
    expect(recipe.recipeInstructions).toEqual([])
    expect(recipe.normalizedRecipeIngredients).toEqual({ ingredients: [] })
    expect(recipe.recipeIngredients[0]).toEqual({
      display: "1 slice bread",
      quantity: 1
    })
  })

  it("should reject a non-integer total time", () => {
    expect(
      RecipeSchema.safeParse({ name: "Toast", slug: "toast", total_time_minutes: 2.5 })
        .success
    ).toBe(false)
  })
})

describe("getTextForEmbedding", () => {
  it("should join name, description, tags, ingredients and steps", () => {
    expect(getTextForEmbedding(PANCAKES)).toBe(
      "Pancakes. Fluffy\nBreakfast, Sweet\n2 eggs\n1 cup flour\nWhisk.\nFry.\n"
    )
  })

  it("should print None for a missing description", () => {
    expect(getTextForEmbedding(makeRecipe({ name: "Toast" }))).toBe("Toast. None\n\n")
  })
})

describe("getTextForContext", () => {
  it("should list ingredients and instructions as bullets", () => {
    expect(getTextForContext(PANCAKES)).toBe(
      "RecipeName: Pancakes\nRecipeID: pancakes\nRating: None\n" +
        "Ingredients:\n- 2 eggs\n- 1 cup flour\n" +
        "Instructions:\n- Whisk.\n- Fry.\n"
    )
  })
})

describe("getTextRepresentation", () => {
  it("should render the selected properties and skip absent ones", () => {
    expect(
      getTextRepresentation(PANCAKES, [
        "name",
        "description",
        "recipeIngredients",
        "rating",
        "tags"
      ])
    ).toBe(
      "**name:** Pancakes\n**description:** Fluffy\n" +
        "**recipeIngredients:**\n- 2 eggs\n- 1 cup flour\n" +
        "**tags:**\nBreakfast, Sweet"
    )
  })

  it("should render normalized ingredients on one line", () => {
    const recipe = makeRecipe({
      name: "Salad",
      normalizedRecipeIngredients: {
        ingredients: [{ names: ["lettuce"] }, { names: ["olive oil", "oil"] }]
      }
    })

    expect(getTextRepresentation(recipe, ["normalizedRecipeIngredients"])).toBe(
      "**normalizedRecipeIngredients:**\n- lettuce, olive oil, oil"
    )
  })
})

describe("flattenNormalizedIngredients", () => {
  it("should concatenate the names of every ingredient", () => {
    expect(
      flattenNormalizedIngredients({
        ingredients: [{ names: ["egg"] }, { names: ["flour", "wheat flour"] }]
      })
    ).toEqual(["egg", "flour", "wheat flour"])
  })
})
