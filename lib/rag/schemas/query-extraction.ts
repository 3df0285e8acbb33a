/**
 * Query Extraction schema
 *
 * Structured interpretation of one user request: search phrasings plus
 * explicit constraints. Keys are snake_case and form a stable contract with
 * the multi-query-builder prompt.
 */

import { z } from "zod"

// =============================================================================
// Schema
// =============================================================================

export const QueryExtractionSchema = z.object({
  /** Search phrasings, at least one */
  expanded_queries: z
    .array(z.string())
    .min(1, "expanded_queries must hold at least one query")
    .describe(
      "5 diverse search variations. Transform general terms (meat) to specific ones (chicken, beef, etc)."
    ),

  negative_ingredients: z
    .array(z.string())
    .nullish()
    .describe(
      "Individual food items to exclude. Singular lowercase nouns only (e.g. 'shrimp', 'mushroom')."
    ),

  other_negative_constraints: z
    .array(z.string())
    .nullish()
    .describe(
      "Non-ingredient exclusions like equipment (no oven), time (no long prep), or diet (no fried)."
    ),

  negative_tools: z
    .array(z.string())
    .nullish()
    .describe("Equipment to avoid (e.g. 'oven')."),

  negative_methods: z
    .array(z.string())
    .nullish()
    .describe("Cooking methods to avoid (e.g. 'fried')."),

  /** Inclusive */
  min_rating: z
    .number()
    .nullish()
    .describe(
      "Minimum recipe rating, inclusive. Only use if explicitly specified."
    ),

  /** Exclusive */
  max_rating: z
    .number()
    .nullish()
    .describe(
      "Maximum recipe rating, exclusive. Only use if explicitly specified."
    ),

  /** Inclusive */
  max_total_time_minutes: z
    .number()
    .nullish()
    .describe("Maximum total (prep + cook) time in minutes."),

  tools: z
    .array(z.string())
    .nullish()
    .describe("Equipment the user wants to use; any of them is fine."),

  methods: z
    .array(z.string())
    .nullish()
    .describe("Cooking methods the user wants; any of them is fine."),

  is_healthy: z
    .boolean()
    .nullish()
    .describe("True only when the user explicitly asks for healthy food.")
})

export type QueryExtraction = z.infer<typeof QueryExtractionSchema>

/**
 * Extraction holding only the raw input
 */
export function passthroughExtraction(userInput: string): QueryExtraction {
  return { expanded_queries: [userInput] }
}
