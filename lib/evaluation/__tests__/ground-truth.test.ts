import { describe, it, expect, vi } from "vitest"

import { ValidationError } from "@/lib/errors/error-handler"
import type { Logger } from "@/lib/logging/logger"
import { InMemoryVectorIndex } from "@/lib/rag/vector-index/memory-index"
import type { VectorIndex } from "@/lib/rag/vector-index/types"
import { createPointFromRecipe } from "@/lib/recipes/index-entry"
import { makeRecipe } from "@/lib/testing/fakes"

import {
  INGREDIENT_CATEGORIES,
  buildGroundTruthFilters,
  expandIngredient,
  getRelevantIds,
  parseExpectedProperties
} from "../ground-truth"

function spyLogger(): Logger & { warn: ReturnType<typeof vi.fn> } {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }
}

describe("expandIngredient", () => {
  it("should fold case and append the category members", () => {
    const expanded = expandIngredient("MEAT")

    expect(expanded[0]).toBe("meat")
    expect(expanded).toContain("chicken")
    expect(expanded).toEqual(["meat", ...INGREDIENT_CATEGORIES.meat])
  })

  it("should return the name alone when it is no category", () => {
    expect(expandIngredient("quinoa")).toEqual(["quinoa"])
  })
})

describe("buildGroundTruthFilters", () => {
  it("should return null for an empty map", () => {
    expect(buildGroundTruthFilters({})).toBeNull()
  })

  it("should produce no condition for tags and limit", () => {
    const filter = buildGroundTruthFilters({ tags: ["Quick"], limit: 5 })

    expect(filter).toEqual({})
    expect(filter?.must).toBeUndefined()
    expect(filter?.must_not).toBeUndefined()
  })

  it("should require one of the expanded candidates for each must-have ingredient", () => {
    const filter = buildGroundTruthFilters({ must_have_ingredients: ["meat"] })

    expect(filter?.must).toHaveLength(1)
    const [clause] = filter?.must ?? []
    expect(clause).toEqual({
      should: ["meat", ...INGREDIENT_CATEGORIES.meat].map(text => ({
        key: "normalized_ingredients",
        match: { text }
      }))
    })
    expect(JSON.stringify(clause)).toContain('"text":"beef"')
  })

  it("should exclude every expanded candidate of a must-not-have ingredient", () => {
    const filter = buildGroundTruthFilters({
      must_not_have_ingredients: ["Seafood"]
    })

    expect(filter?.must).toBeUndefined()
    expect(filter?.must_not).toHaveLength(1 + INGREDIENT_CATEGORIES.seafood.length)
    expect(filter?.must_not?.[0]).toEqual({
      key: "normalized_ingredients",
      match: { text: "seafood" }
    })
    expect(filter?.must_not?.[1]).toEqual({
      key: "normalized_ingredients",
      match: { text: "shrimp" }
    })
  })

  it("should map scalar and list properties to must conditions", () => {
    const filter = buildGroundTruthFilters({
      is_healthy: true,
      min_rating: 4,
      max_total_time_minutes: 45,
      max_ingredient_count: 8,
      tools: ["Oven"],
      method: ["Baked", "Grilled"],
      recipeCategory: ["Dinner"]
    })

    expect(filter).toEqual({
      must: [
        { key: "is_healthy", match: { value: true } },
        { key: "rating", range: { gte: 4 } },
        { key: "total_time_minutes", range: { lte: 45 } },
        { key: "ingredient_count", range: { lte: 8 } },
        { key: "tools", match: { any: ["oven"] } },
        { key: "method", match: { any: ["baked", "grilled"] } },
        { key: "category", match: { any: ["dinner"] } }
      ]
    })
  })

  it("should warn about unknown keys and skip them", () => {
    const logger = spyLogger()

    const filter = buildGroundTruthFilters(
      { cuisine: "thai", is_healthy: false },
      logger
    )

    expect(filter).toEqual({
      must: [{ key: "is_healthy", match: { value: false } }]
    })
    expect(logger.warn).toHaveBeenCalledWith(
      "Unknown expected_properties key skipped",
      { key: "cuisine" }
    )
  })

  it("should reject a known key holding the wrong type", () => {
    expect(() => buildGroundTruthFilters({ min_rating: "high" })).toThrow(
      ValidationError
    )
    expect(() =>
      buildGroundTruthFilters({ must_have_ingredients: "chicken" })
    ).toThrow(/must_have_ingredients/)
  })
})

describe("parseExpectedProperties", () => {
  it("should treat missing values as an empty map", () => {
    expect(parseExpectedProperties(null)).toEqual({})
    expect(parseExpectedProperties(undefined)).toEqual({})
    expect(parseExpectedProperties("")).toEqual({})
  })

  it("should return maps as they are and parse JSON text", () => {
    expect(parseExpectedProperties({ is_healthy: true })).toEqual({
      is_healthy: true
    })
    expect(parseExpectedProperties('{"tools": ["oven"]}')).toEqual({
      tools: ["oven"]
    })
  })

  it("should read repr-style literals with single quotes and True/False/None", () => {
    expect(
      parseExpectedProperties("{'must_have_ingredients': ['meat'], 'is_healthy': True}")
    ).toEqual({ must_have_ingredients: ["meat"], is_healthy: true })
    expect(
      parseExpectedProperties("{'cuisine': None, 'name': 'Mom\\'s \"pie\"', 'is_vegan': False}")
    ).toEqual({ cuisine: null, name: 'Mom\'s "pie"', is_vegan: false })
    expect(() => parseExpectedProperties("{'is_healthy': Maybe}")).toThrow(
      "expected_properties is neither JSON nor a literal mapping: {'is_healthy': Maybe}"
    )
  })

  it("should reject values that are not a map, carrying the raw value", () => {
    try {
      parseExpectedProperties("[1, 2]")
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError)
      if (error instanceof ValidationError) {
        expect(error.value).toBe("[1, 2]")
      }
    }

    expect(() => parseExpectedProperties("not json")).toThrow(ValidationError)
    expect(() => parseExpectedProperties(42)).toThrow(ValidationError)
  })
})

describe("getRelevantIds", () => {
  it("should collect the ids of every matching point", async () => {
    const index = new InMemoryVectorIndex()
    await index.recreateCollection("recipes", 2)
    await index.upsert("recipes", [
      createPointFromRecipe(
        makeRecipe({
          name: "Chicken Curry",
          normalizedRecipeIngredients: {
            ingredients: [{ names: ["chicken"] }, { names: ["rice"] }]
          }
        }),
        [1, 0]
      ),
      createPointFromRecipe(
        makeRecipe({
          name: "Lentil Soup",
          normalizedRecipeIngredients: { ingredients: [{ names: ["lentil"] }] }
        }),
        [0, 1]
      ),
      createPointFromRecipe(
        makeRecipe({
          name: "Beef Stew",
          normalizedRecipeIngredients: { ingredients: [{ names: ["beef"] }] }
        }),
        [1, 1]
      )
    ])

    const filter = buildGroundTruthFilters({ must_have_ingredients: ["meat"] })
    const ids = await getRelevantIds(index, "recipes", filter)

    expect(ids).toEqual(new Set(["chicken-curry", "beef-stew"]))
  })

  it("should follow scroll pages until the offset runs out", async () => {
    const scroll = vi
      .fn()
      .mockResolvedValueOnce({ ids: ["a", "b"], nextOffset: "b" })
      .mockResolvedValueOnce({ ids: ["c"], nextOffset: null })

    const index: VectorIndex = {
      query: vi.fn(),
      queryFused: vi.fn(),
      collectionExists: vi.fn(),
      recreateCollection: vi.fn(),
      ensureCollection: vi.fn(),
      upsert: vi.fn(),
      scroll
    }

    const ids = await getRelevantIds(index, "recipes", null)

    expect(ids).toEqual(new Set(["a", "b", "c"]))
    expect(scroll).toHaveBeenCalledTimes(2)
    expect(scroll).toHaveBeenNthCalledWith(1, "recipes", {
      filter: null,
      limit: 1000,
      offset: undefined
    })
    expect(scroll).toHaveBeenNthCalledWith(2, "recipes", {
      filter: null,
      limit: 1000,
      offset: "b"
    })
  })
})
