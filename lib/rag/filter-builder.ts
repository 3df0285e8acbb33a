/**
 * Filter Synthesis
 *
 * Turns the constraints of a QueryExtraction into a filter predicate tree
 * over recipe payloads. The tree has the shape the Qdrant REST API accepts,
 * so the Qdrant index forwards it untouched.
 *
 * - must: every condition holds
 * - must_not: no condition holds
 * - should: at least one condition holds
 *
 * Negative ingredients are matched as typed by the user: no synonym
 * expansion at query time.
 */

import type { RecipePayloadKey } from "@/lib/recipes/index-entry"
import type { QueryExtraction } from "./schemas/query-extraction"

// =============================================================================
// Predicate tree
// =============================================================================

export interface MatchText {
  text: string
}

export interface MatchValue {
  value: string | number | boolean
}

export interface MatchAny {
  any: string[]
}

export interface RangeBounds {
  gte?: number
  gt?: number
  lt?: number
  lte?: number
}

export interface FieldCondition {
  key: RecipePayloadKey
  match?: MatchText | MatchValue | MatchAny
  range?: RangeBounds
}

export interface RecipeFilter {
  must?: Condition[]
  must_not?: Condition[]
  should?: Condition[]
}

export type Condition = FieldCondition | RecipeFilter

export function isFieldCondition(
  condition: Condition
): condition is FieldCondition {
  return "key" in condition
}

// =============================================================================
// Leaf primitives
// =============================================================================

/** Case-insensitive token match inside a text or list field */
export function textMatch(key: RecipePayloadKey, text: string): FieldCondition {
  return { key, match: { text } }
}

export function valueMatch(
  key: RecipePayloadKey,
  value: string | number | boolean
): FieldCondition {
  return { key, match: { value } }
}

/** Field holds any of the values; values are lowercased */
export function anyMatch(
  key: RecipePayloadKey,
  values: string[]
): FieldCondition {
  return { key, match: { any: values.map(value => value.toLowerCase()) } }
}

export function range(
  key: RecipePayloadKey,
  bounds: RangeBounds
): FieldCondition {
  const cleaned: RangeBounds = {}
  if (bounds.gte !== undefined) cleaned.gte = bounds.gte
  if (bounds.gt !== undefined) cleaned.gt = bounds.gt
  if (bounds.lt !== undefined) cleaned.lt = bounds.lt
  if (bounds.lte !== undefined) cleaned.lte = bounds.lte
  return { key, range: cleaned }
}

/**
 * Assembles must / must_not groups, omitting empty ones
 */
export function composeFilter(
  must: Condition[],
  mustNot: Condition[]
): RecipeFilter {
  const filter: RecipeFilter = {}
  if (must.length > 0) filter.must = must
  if (mustNot.length > 0) filter.must_not = mustNot
  return filter
}

function present<T>(values: T[] | null | undefined): values is T[] {
  return values !== null && values !== undefined && values.length > 0
}

// =============================================================================
// From QueryExtraction
// =============================================================================

/**
 * Builds the live query filter
 *
 * `other_negative_constraints` stays for the generator and produces no leaf.
 *
 * @returns null when no constraint produced a leaf
 */
export function buildQueryFilter(
  extraction: QueryExtraction
): RecipeFilter | null {
  const must: Condition[] = []
  const mustNot: Condition[] = []

  if (present(extraction.negative_ingredients)) {
    for (const ingredient of extraction.negative_ingredients) {
      mustNot.push(textMatch("normalized_ingredients", ingredient))
    }
  }

  const minRating = extraction.min_rating ?? undefined
  const maxRating = extraction.max_rating ?? undefined
  if (minRating !== undefined || maxRating !== undefined) {
    // Lower bound inclusive, upper bound exclusive
    must.push(range("rating", { gte: minRating, lt: maxRating }))
  }

  if (
    extraction.max_total_time_minutes !== null &&
    extraction.max_total_time_minutes !== undefined
  ) {
    must.push(
      range("total_time_minutes", { lte: extraction.max_total_time_minutes })
    )
  }

  if (present(extraction.tools)) {
    must.push(anyMatch("tools", extraction.tools))
  }

  if (present(extraction.methods)) {
    must.push(anyMatch("method", extraction.methods))
  }

  if (present(extraction.negative_tools)) {
    mustNot.push(anyMatch("tools", extraction.negative_tools))
  }

  if (present(extraction.negative_methods)) {
    mustNot.push(anyMatch("method", extraction.negative_methods))
  }

  if (extraction.is_healthy !== null && extraction.is_healthy !== undefined) {
    must.push(valueMatch("is_healthy", extraction.is_healthy))
  }

  if (must.length === 0 && mustNot.length === 0) {
    return null
  }

  return composeFilter(must, mustNot)
}
