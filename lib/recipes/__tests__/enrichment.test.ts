import { describe, it, expect, vi } from "vitest"

import { LocalPromptStore } from "@/lib/prompts/prompt-store"
import { ScriptedChatClient, makeRecipe } from "@/lib/testing/fakes"

import {
  enrichRecipeProperties,
  findMissingProperties,
  mergeEnrichment,
  normalizeIngredients,
  type RecipeLlmContext
} from "../enrichment"
import { getTextRepresentation } from "../recipe"

function context(chatClient: ScriptedChatClient) {
  return {
    chatClient,
    promptStore: new LocalPromptStore(),
    chatOptions: { model: "test-model", temperature: 0 },
    logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
  } satisfies RecipeLlmContext
}

const STEW = makeRecipe({
  name: "Bean Stew",
  description: "Smoky and filling",
  tags: ["Winter"],
  recipeIngredients: [{ display: "2 cans of beans" }, { display: "1 onion" }],
  recipeInstructions: [{ text: "Simmer for 30 minutes." }]
})

describe("findMissingProperties", () => {
  it("should list empty lists and absent values", () => {
    expect(findMissingProperties(STEW)).toEqual([
      "recipeCategory",
      "tools",
      "method",
      "is_healthy",
      "total_time_minutes"
    ])
  })

  it("should treat is_healthy false as present", () => {
    const recipe = makeRecipe({ name: "Fries", is_healthy: false })

    expect(findMissingProperties(recipe)).not.toContain("is_healthy")
  })
})

describe("mergeEnrichment", () => {
  it("should overwrite only with non-null values", () => {
    const merged = mergeEnrichment(STEW, {
      tags: null,
      tools: ["Pot"],
      is_healthy: false
    })

    expect(merged.tags).toEqual(["Winter"])
    expect(merged.tools).toEqual(["Pot"])
    expect(merged.is_healthy).toBe(false)
    expect(STEW.tools).toEqual([])
  })
})

describe("enrichRecipeProperties", () => {
  it("should ask once for the missing properties and merge them", async () => {
    const client = new ScriptedChatClient({
      structured: () => ({
        recipeCategory: ["Dinner"],
        tags: ["ignored"],
        tools: ["Pot"],
        method: null,
        is_healthy: true,
        total_time_minutes: 40
      })
    })

    const enriched = await enrichRecipeProperties(STEW, context(client))

    expect(client.count("chatStructured")).toBe(1)
    expect(client.calls[0].schemaName).toBe("RecipeEnrichment")
    expect(client.calls[0].messages[1].content).toBe(
      getTextRepresentation(STEW, [
        "name",
        "description",
        "recipeIngredients",
        "recipeInstructions"
      ])
    )
    expect(enriched).toMatchObject({
      recipeCategory: ["Dinner"],
      tags: ["Winter"],
      tools: ["Pot"],
      method: [],
      is_healthy: true,
      total_time_minutes: 40
    })
  })

  it("should make no call for a complete recipe", async () => {
    const client = new ScriptedChatClient()
    const complete = makeRecipe({
      name: "Omelette",
      recipeCategory: ["Breakfast"],
      tags: ["Quick"],
      tools: ["Pan"],
      method: ["Fried"],
      is_healthy: true,
      total_time_minutes: 10
    })

    expect(await enrichRecipeProperties(complete, context(client))).toBe(complete)
    expect(client.count()).toBe(0)
  })

  it("should log and keep the recipe when the model fails", async () => {
    const ctx = context(new ScriptedChatClient())

    const result = await enrichRecipeProperties(STEW, ctx)

    expect(result).toBe(STEW)
    expect(ctx.logger.error).toHaveBeenCalledWith(
      "Error enriching recipe",
      { recipe: "Bean Stew" },
      expect.any(Error)
    )
  })
})

describe("normalizeIngredients", () => {
  it("should send the ingredient lines as JSON and store the answer", async () => {
    const client = new ScriptedChatClient({
      structured: () => ({
        ingredients: [{ names: ["bean"] }, { names: ["onion"] }]
      })
    })

    const normalized = await normalizeIngredients(STEW, context(client))

    expect(client.calls[0].messages[1].content).toBe('["2 cans of beans","1 onion"]')
    expect(normalized.normalizedRecipeIngredients).toEqual({
      ingredients: [{ names: ["bean"] }, { names: ["onion"] }]
    })
  })
})
