/**
 * Ground truth for retrieval metrics
 *
 * Dataset rows carry an `expected_properties` map. It is translated into a
 * filter and the whole collection is enumerated with it, giving the set of
 * recipe ids a perfect retriever could return.
 *
 * Unlike the live query filter, ingredients are expanded through the
 * category table ("meat" also matches "chicken", "beef", ...).
 */

import { z } from "zod"

import { ValidationError, fromZodError } from "@/lib/errors/error-handler"
import { createNoopLogger, type Logger } from "@/lib/logging/logger"
import {
  anyMatch,
  composeFilter,
  range,
  textMatch,
  valueMatch,
  type Condition,
  type RecipeFilter
} from "@/lib/rag/filter-builder"
import type { PointId, ScrollOffset, VectorIndex } from "@/lib/rag/vector-index/types"

import ingredientCategories from "./ingredient-categories.json"

export type ExpectedProperties = Record<string, unknown>

// =============================================================================
// Ingredient categories
// =============================================================================

export const INGREDIENT_CATEGORIES: Readonly<Record<string, string[]>> = z
  .record(z.array(z.string()))
  .parse(ingredientCategories)

/**
 * The lowercased name followed by its category members, if it names one
 */
export function expandIngredient(name: string): string[] {
  const lower = name.toLowerCase()
  return [lower, ...(INGREDIENT_CATEGORIES[lower] ?? [])]
}

// =============================================================================
// Expected properties
// =============================================================================

const StringListSchema = z.array(z.string())
const NumberSchema = z.number()
const BooleanSchema = z.boolean()

function readValue<T>(key: string, schema: z.ZodType<T>, value: unknown): T {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    throw fromZodError(`Invalid expected property "${key}"`, parsed.error, value)
  }
  return parsed.data
}

const LITERAL_CONSTANTS: Readonly<Record<string, string>> = {
  True: "true",
  False: "false",
  None: "null"
}

const LITERAL_ESCAPES: Readonly<Record<string, string>> = {
  n: "\n",
  t: "\t",
  r: "\r",
  "\\": "\\",
  "'": "'",
  '"': '"'
}

/**
 * Rewrites repr-style literal text as JSON: single- or double-quoted strings
 * become double-quoted, `True`/`False`/`None` become `true`/`false`/`null`.
 * Anything else is copied, so invalid input stays invalid.
 */
export function reprLiteralToJson(text: string): string {
  let json = ""
  let i = 0

  while (i < text.length) {
    const char = text[i]

    if (char === "'" || char === '"') {
      let value = ""
      i++
      while (i < text.length && text[i] !== char) {
        if (text[i] === "\\" && i + 1 < text.length) {
          const escaped = text[i + 1]
          value += LITERAL_ESCAPES[escaped] ?? `\\${escaped}`
          i += 2
        } else {
          value += text[i]
          i++
        }
      }
      json += JSON.stringify(value)
      i++
      continue
    }

    const word = /^[A-Za-z_]\w*/.exec(text.slice(i))
    if (word) {
      json += LITERAL_CONSTANTS[word[0]] ?? word[0]
      i += word[0].length
      continue
    }

    json += char
    i++
  }

  return json
}

function parseMappingText(raw: string): unknown {
  try {
    return JSON.parse(raw)
  } catch {
    return JSON.parse(reprLiteralToJson(raw))
  }
}

/**
 * Accepts a map, its JSON or repr-style text, or nothing
 *
 * @throws ValidationError when the value does not hold a map
 */
export function parseExpectedProperties(raw: unknown): ExpectedProperties {
  if (raw === null || raw === undefined || raw === "") {
    return {}
  }

  let value: unknown = raw
  if (typeof raw === "string") {
    try {
      value = parseMappingText(raw)
    } catch {
      throw new ValidationError(
        `expected_properties is neither JSON nor a literal mapping: ${raw}`,
        raw
      )
    }
  }

  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new ValidationError(
      `expected_properties must be a mapping, got: ${JSON.stringify(raw)}`,
      raw
    )
  }

  return Object.fromEntries(Object.entries(value))
}

/**
 * Translates expected properties into a ground-truth filter
 *
 * `tags` (not matched yet) and `limit` (not a filter) produce no condition.
 * Unknown keys are logged and skipped.
 *
 * @returns null for an empty map
 * @throws ValidationError when a known key holds a value of the wrong type
 */
export function buildGroundTruthFilters(
  expected: ExpectedProperties,
  logger: Logger = createNoopLogger()
): RecipeFilter | null {
  if (Object.keys(expected).length === 0) {
    return null
  }

  const must: Condition[] = []
  const mustNot: Condition[] = []

  for (const [key, value] of Object.entries(expected)) {
    switch (key) {
      case "must_have_ingredients":
        // At least one candidate must match for each required ingredient
        for (const ingredient of readValue(key, StringListSchema, value)) {
          must.push({
            should: expandIngredient(ingredient).map(candidate =>
              textMatch("normalized_ingredients", candidate)
            )
          })
        }
        break

      case "must_not_have_ingredients":
        for (const ingredient of readValue(key, StringListSchema, value)) {
          for (const candidate of expandIngredient(ingredient)) {
            mustNot.push(textMatch("normalized_ingredients", candidate))
          }
        }
        break

      case "is_healthy":
        must.push(valueMatch("is_healthy", readValue(key, BooleanSchema, value)))
        break

      case "min_rating":
        must.push(range("rating", { gte: readValue(key, NumberSchema, value) }))
        break

      case "max_total_time_minutes":
        must.push(
          range("total_time_minutes", {
            lte: readValue(key, NumberSchema, value)
          })
        )
        break

      case "max_ingredient_count":
        must.push(
          range("ingredient_count", { lte: readValue(key, NumberSchema, value) })
        )
        break

      case "tools":
        must.push(anyMatch("tools", readValue(key, StringListSchema, value)))
        break

      case "method":
        must.push(anyMatch("method", readValue(key, StringListSchema, value)))
        break

      case "recipeCategory":
        must.push(anyMatch("category", readValue(key, StringListSchema, value)))
        break

      case "tags":
      case "limit":
        break

      default:
        logger.warn("Unknown expected_properties key skipped", { key })
    }
  }

  return composeFilter(must, mustNot)
}

// =============================================================================
// Enumeration
// =============================================================================

const SCROLL_PAGE_SIZE = 1000

/**
 * Ids of every point matching the filter, across all scroll pages
 */
export async function getRelevantIds(
  index: VectorIndex,
  collection: string,
  filter: RecipeFilter | null
): Promise<Set<PointId>> {
  const relevant = new Set<PointId>()
  let offset: ScrollOffset | undefined

  while (true) {
    const page = await index.scroll(collection, {
      filter,
      limit: SCROLL_PAGE_SIZE,
      offset
    })

    for (const id of page.ids) {
      relevant.add(id)
    }

    if (page.nextOffset === null) {
      return relevant
    }
    offset = page.nextOffset
  }
}
