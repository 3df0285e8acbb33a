/**
 * LangSmith Setup
 *
 * Tracing for the pipeline stages using the official abstractions:
 * - traceable: wraps stage functions as runs
 * - checkLangSmithConfig: reports whether tracing is usable
 *
 * Tracing is active only when LANGSMITH_TRACING=true; otherwise traceable
 * functions run untouched.
 */

import { traceable } from "langsmith/traceable"

// =============================================================================
// TYPES
// =============================================================================

export type LangSmithRunType =
  | "chain"
  | "llm"
  | "tool"
  | "retriever"
  | "embedding"

export interface TraceableOptions {
  name: string
  run_type: LangSmithRunType
  project_name: string
  tags: string[]
  metadata: Record<string, unknown>
}

export interface ConfigCheckResult {
  valid: boolean
  enabled: boolean
  errors: string[]
  warnings: string[]
  project: string
}

// =============================================================================
// CONSTANTS
// =============================================================================

export const PIPELINE_STEP_NAMES = {
  GENERATE_QUERIES: "generateQueries",
  RETRIEVE_RECIPES: "retrieveRecipes",
  EVALUATE_ROW: "evaluateRow"
} as const

export type PipelineStepName =
  (typeof PIPELINE_STEP_NAMES)[keyof typeof PIPELINE_STEP_NAMES]

const STEP_RUN_TYPES: Record<PipelineStepName, LangSmithRunType> = {
  generateQueries: "chain",
  retrieveRecipes: "retriever",
  evaluateRow: "chain"
}

export const DEFAULT_PROJECT = "recipe-rag"

// =============================================================================
// CONFIGURATION CHECK
// =============================================================================

/**
 * Checks whether LangSmith tracing is configured
 */
export function checkLangSmithConfig(
  env: Record<string, string | undefined> = process.env
): ConfigCheckResult {
  const errors: string[] = []
  const warnings: string[] = []

  const apiKey = env.LANGSMITH_API_KEY
  const tracing = env.LANGSMITH_TRACING === "true"

  if (tracing && !apiKey) {
    errors.push("LANGSMITH_TRACING is 'true' but LANGSMITH_API_KEY is not set")
  }

  if (tracing && !env.LANGSMITH_PROJECT) {
    warnings.push(
      `LANGSMITH_PROJECT not set, runs go to the default project "${DEFAULT_PROJECT}"`
    )
  }

  return {
    valid: errors.length === 0,
    enabled: tracing && !!apiKey,
    errors,
    warnings,
    project: env.LANGSMITH_PROJECT || DEFAULT_PROJECT
  }
}

// =============================================================================
// TRACEABLE HELPERS
// =============================================================================

/**
 * Builds traceable options for a pipeline step, sent to LANGSMITH_PROJECT
 * or DEFAULT_PROJECT
 */
export function createStepTraceOptions(
  stepName: PipelineStepName,
  additionalMetadata?: Record<string, unknown>,
  env: Record<string, string | undefined> = process.env
): TraceableOptions {
  return {
    name: stepName,
    run_type: STEP_RUN_TYPES[stepName],
    project_name: env.LANGSMITH_PROJECT || DEFAULT_PROJECT,
    tags: ["recipe-rag", stepName],
    metadata: {
      stepName,
      ...additionalMetadata
    }
  }
}

export { traceable }
