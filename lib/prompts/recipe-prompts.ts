/**
 * Recipe Prompts
 *
 * Chat templates served by the local prompt store.
 *
 * Placeholders use `{name}` and are filled by `PromptTemplate.compile`.
 * Literal braces followed by a word character must not appear elsewhere.
 */

import type { ChatMessage } from "@/lib/llm/chat-client"

// =============================================================================
// Prompt types
// =============================================================================

export const PromptType = {
  CHAT_GENERATION: "chat-generation",
  MULTI_QUERY_BUILDER: "multi-query-builder-generation",
  CULINARY_BRAINSTORM: "culinary-brainstorm",
  RECIPE_ENRICHMENT: "recipe-enrichment",
  INGREDIENT_NORMALIZATION: "ingredient-normalization",
  METRIC_RELEVANCY: "metric-relevancy",
  METRIC_FAITHFULNESS: "metric-faithfulness"
} as const

export type PromptType = (typeof PromptType)[keyof typeof PromptType]

export interface PromptDefinition {
  version: number
  labels: string[]
  messages: ChatMessage[]
}

const DEFAULT_LABELS = ["production", "development"]

// =============================================================================
// Query understanding
// =============================================================================

const MULTI_QUERY_BUILDER_SYSTEM = `You are a culinary search assistant for a personal recipe collection.

Given a user request, produce a structured search extraction.

## expanded_queries
Write exactly 5 diverse search queries, each covering a different angle:
1. A synonym rephrasing of the request
2. A focus on the main ingredients
3. A focus on the cooking technique
4. A focus on the occasion or meal type
5. A focus on sensory descriptors (texture, flavour, aroma)
Turn general terms into specific ones (e.g. "meat" → "chicken, beef, pork").

## Constraints (only when the user states them)
- negative_ingredients: food items to exclude, singular lowercase nouns ("shrimp", "mushroom")
- other_negative_constraints: non-ingredient exclusions ("no frying", "no long prep")
- negative_tools / negative_methods: equipment or techniques to avoid ("oven", "deep fried")
- tools / methods: equipment or techniques the user wants (any of them is fine)
- min_rating (inclusive) / max_rating (exclusive): rating bounds between 1 and 5
- max_total_time_minutes: upper bound for total preparation time
- is_healthy: true when the user explicitly asks for healthy food

Leave every constraint empty when the user does not mention it.`

const CULINARY_BRAINSTORM_SYSTEM = `You rewrite recipe search queries.

Turn the query into ONE short sentence written like a step of a recipe, naming the
ingredients and the technique it implies. Example:
Query: "crispy chicken for a weeknight"
Sentence: "Roast the chicken thighs skin-side up until golden and crispy."

Answer with the sentence only.`

// =============================================================================
// Generation
// =============================================================================

const CHAT_GENERATION_SYSTEM = `You are a friendly cooking assistant answering questions about the user's own recipe collection.

Rules:
1. Only use the recipes between [RECIPE_START] and [RECIPE_END] below.
2. If none of them answers the question, say so plainly. Never invent recipes.
3. Mention each recipe you recommend with a link: [Recipe Name]({external_url}/g/home/r/RECIPE_SLUG_OR_ID)
4. Keep answers short and practical.

Recipes:
{context_text}`

// =============================================================================
// Ingestion
// =============================================================================

const RECIPE_ENRICHMENT_SYSTEM = `You complete missing metadata of a recipe.

Read the recipe and fill in ONLY the fields you are asked for:
- recipeCategory: meal categories, e.g. ["Dinner", "Lunch", "Breakfast"]
- tags: short descriptors, e.g. ["Healthy", "Quick", "Easy"]
- tools: equipment needed, e.g. ["Oven", "Stove", "Microwave"]
- method: cooking methods, e.g. ["Fried", "Baked", "Grilled", "Slow Cooked"]
- is_healthy: true if the recipe is healthy given its ingredients and method
- total_time_minutes: total (prep + cook) time in minutes, estimated from the instructions

Leave a field empty when you cannot tell.`

const INGREDIENT_NORMALIZATION_SYSTEM = `You normalize recipe ingredient lines.

For each ingredient line, return the generic ingredient names it contains as
singular lowercase nouns, without quantities, units or preparation notes.
Example: "2 large red onions, finely diced" → ["onion"]
Example: "salt and pepper to taste" → ["salt", "pepper"]`

// =============================================================================
// Evaluation judges
// =============================================================================

const METRIC_RELEVANCY_SYSTEM = `You grade how relevant an answer is to a cooking question.

Score from 1 to 5:
1 - unrelated or refuses without reason
2 - mostly off-topic
3 - partially answers
4 - answers with minor gaps
5 - fully and directly answers

Give a one or two sentence reason.`

const METRIC_FAITHFULNESS_SYSTEM = `You check whether an answer is faithful to the retrieved recipes.

Verdict:
- "faithful": every recipe, ingredient and step mentioned is supported by the context
- "hallucination": the answer mentions anything the context does not contain

Give a one or two sentence reason.`

// =============================================================================
// Registry
// =============================================================================

export const RECIPE_PROMPTS: Record<PromptType, PromptDefinition> = {
  [PromptType.MULTI_QUERY_BUILDER]: {
    version: 3,
    labels: DEFAULT_LABELS,
    messages: [
      { role: "system", content: MULTI_QUERY_BUILDER_SYSTEM },
      { role: "user", content: "{user_input}" }
    ]
  },
  [PromptType.CULINARY_BRAINSTORM]: {
    version: 1,
    labels: DEFAULT_LABELS,
    messages: [
      { role: "system", content: CULINARY_BRAINSTORM_SYSTEM },
      { role: "user", content: "Query: {user_input}" }
    ]
  },
  [PromptType.CHAT_GENERATION]: {
    version: 2,
    labels: DEFAULT_LABELS,
    messages: [
      { role: "system", content: CHAT_GENERATION_SYSTEM },
      { role: "user", content: "{query}" }
    ]
  },
  [PromptType.RECIPE_ENRICHMENT]: {
    version: 1,
    labels: DEFAULT_LABELS,
    messages: [
      { role: "system", content: RECIPE_ENRICHMENT_SYSTEM },
      { role: "user", content: "{recipe}" }
    ]
  },
  [PromptType.INGREDIENT_NORMALIZATION]: {
    version: 1,
    labels: DEFAULT_LABELS,
    messages: [
      { role: "system", content: INGREDIENT_NORMALIZATION_SYSTEM },
      { role: "user", content: "{ingredients}" }
    ]
  },
  [PromptType.METRIC_RELEVANCY]: {
    version: 1,
    labels: DEFAULT_LABELS,
    messages: [
      { role: "system", content: METRIC_RELEVANCY_SYSTEM },
      { role: "user", content: "Question: {query}\n\nAnswer: {answer}" }
    ]
  },
  [PromptType.METRIC_FAITHFULNESS]: {
    version: 1,
    labels: DEFAULT_LABELS,
    messages: [
      { role: "system", content: METRIC_FAITHFULNESS_SYSTEM },
      {
        role: "user",
        content: "Context:\n{context}\n\nQuestion: {query}\n\nAnswer: {answer}"
      }
    ]
  }
}
