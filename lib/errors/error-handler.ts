/**
 * Recipe RAG Error Handler
 *
 * Classifies errors raised along the query → answer pipeline and produces
 * friendly messages for the interactive front ends.
 *
 * Provider errors (embedding, chat, vector index) are never caught inside
 * the core; callers use `classifyError` to decide how to report them.
 */

import { ZodError } from "zod"

// =============================================================================
// TYPES
// =============================================================================

/**
 * Error type classification
 */
export enum ErrorType {
  VALIDATION = "ValidationError",
  API = "APIError",
  NETWORK = "NetworkError",
  RATE_LIMIT = "RateLimitError",
  UNKNOWN = "UnknownError"
}

/**
 * Pipeline stage where an error surfaced
 */
export type PipelineStage =
  | "query_extraction"
  | "embedding"
  | "retrieval"
  | "generation"
  | "evaluation"

/**
 * Classified error with context
 */
export interface ClassifiedError {
  stage: PipelineStage
  stageName: string
  type: ErrorType
  message: string
  userMessage: string
  originalError?: Error
}

const STAGE_NAMES: Record<PipelineStage, string> = {
  query_extraction: "Query understanding",
  embedding: "Query embedding",
  retrieval: "Recipe search",
  generation: "Answer generation",
  evaluation: "Evaluation"
}

// =============================================================================
// VALIDATION ERROR
// =============================================================================

/**
 * Raised for malformed input: wrong vector counts, bad expected properties,
 * missing prompt variables. Carries the offending value.
 */
export class ValidationError extends Error {
  public readonly value: unknown

  constructor(message: string, value?: unknown) {
    super(message)
    this.name = "ValidationError"
    this.value = value
  }
}

/**
 * Wraps a zod failure into a ValidationError prefixed with `context`
 */
export function fromZodError(
  context: string,
  error: ZodError,
  value?: unknown
): ValidationError {
  const issues = error.issues
    .map(issue => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ")
  return new ValidationError(`${context}: ${issues}`, value)
}

// =============================================================================
// CLASSIFICATION
// =============================================================================

/**
 * Classifies an error and returns structured error info
 *
 * @param error - The error to classify
 * @param stage - The pipeline stage where the error occurred
 */
export function classifyError(
  error: unknown,
  stage: PipelineStage
): ClassifiedError {
  const stageName = STAGE_NAMES[stage]

  if (error instanceof ValidationError || error instanceof ZodError) {
    return {
      stage,
      stageName,
      type: ErrorType.VALIDATION,
      message: error.message,
      userMessage:
        "I couldn't understand that request. Could you rephrase it?",
      originalError: error
    }
  }

  if (error instanceof Error) {
    const errorMessage = error.message.toLowerCase()

    if (
      errorMessage.includes("rate limit") ||
      errorMessage.includes("too many requests") ||
      errorMessage.includes("429")
    ) {
      return {
        stage,
        stageName,
        type: ErrorType.RATE_LIMIT,
        message: error.message,
        userMessage:
          "The assistant is receiving too many requests. Please wait a few seconds and try again.",
        originalError: error
      }
    }

    if (
      errorMessage.includes("econnrefused") ||
      errorMessage.includes("fetch failed") ||
      errorMessage.includes("network") ||
      errorMessage.includes("connection")
    ) {
      return {
        stage,
        stageName,
        type: ErrorType.NETWORK,
        message: error.message,
        userMessage:
          "I couldn't reach one of the services I depend on. Please check that they are running and try again.",
        originalError: error
      }
    }

    if (
      errorMessage.includes("api") ||
      errorMessage.includes("500") ||
      errorMessage.includes("502") ||
      errorMessage.includes("503")
    ) {
      return {
        stage,
        stageName,
        type: ErrorType.API,
        message: error.message,
        userMessage: getApologyMessage(stage),
        originalError: error
      }
    }

    return {
      stage,
      stageName,
      type: ErrorType.UNKNOWN,
      message: error.message,
      userMessage: getApologyMessage(stage),
      originalError: error
    }
  }

  return {
    stage,
    stageName,
    type: ErrorType.UNKNOWN,
    message: String(error),
    userMessage: getApologyMessage(stage)
  }
}

/**
 * Friendly apology shown when a stage fails for a non-validation reason
 */
export function getApologyMessage(stage: PipelineStage): string {
  if (stage === "generation") {
    return "Sorry, I encountered an error talking to the AI."
  }
  return `Sorry, something went wrong during "${STAGE_NAMES[stage]}". Please try again.`
}

/**
 * Renders any thrown value as a single-line string (for result records)
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`
  }
  return String(error)
}
