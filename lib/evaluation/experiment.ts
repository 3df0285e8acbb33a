/**
 * Evaluation experiment
 *
 * Runs every dataset row through the RAG pipeline, scores retrieval against
 * the ground truth and the answer with the judges, then aggregates.
 *
 * A failing row is recorded with success=false and its error; the run goes
 * on with the next row.
 */

import { mkdir, writeFile } from "node:fs/promises"
import { join } from "node:path"

import { v4 as uuidv4 } from "uuid"

import { describeError } from "@/lib/errors/error-handler"
import { createNoopLogger, type Logger } from "@/lib/logging/logger"
import {
  PIPELINE_STEP_NAMES,
  createStepTraceOptions,
  traceable
} from "@/lib/monitoring/langsmith-setup"
import type { RecipeRagService } from "@/lib/rag/rag-service"
import type { VectorIndex } from "@/lib/rag/vector-index/types"

import type { DatasetRow } from "./dataset"
import {
  buildGroundTruthFilters,
  getRelevantIds,
  parseExpectedProperties
} from "./ground-truth"
import {
  formatJudgeContext,
  judgeFaithfulness,
  judgeRelevancy,
  type FaithfulnessJudgement,
  type FaithfulnessVerdict,
  type JudgeContext,
  type RelevancyJudgement
} from "./judges"
import {
  computeRetrievalMetrics,
  formatRetrievalMetrics,
  mean,
  type RetrievalMetrics
} from "./retrieval-metrics"

// =============================================================================
// Types
// =============================================================================

export interface EvaluationDeps {
  service: Pick<RecipeRagService, "answer">
  index: VectorIndex
  collection: string
  judge: JudgeContext
  logger?: Logger
}

export interface EvaluationRowResult {
  id: string | number | null
  question: string
  response: string
  relevancy_score: number | null
  relevancy_reasoning: string | null
  faithfulness_score: FaithfulnessVerdict | null
  faithfulness_reasoning: string | null
  retrieval_precision: number | null
  retrieval_recall: number | null
  retrieval_recall_capped: number | null
  retrieval_mrr: number | null
  retrieval_ndcg: number | null
  retrieval_hit: boolean | null
  retrieval_relevant_count: number | null
  /** One "- name" line per retrieved recipe */
  recipe_context: string
  /** QueryExtraction as JSON */
  query_extraction: string | null
  success: boolean
  error: string | null
}

export interface ExperimentSummary {
  rows: number
  failed: number
  /** Percentage of judged answers found faithful */
  faithfulness_rate: number
  faithful_count: number
  faithfulness_total: number
  mean_relevancy: number
  mean_precision: number
  mean_recall: number
  mean_recall_capped: number
  mean_mrr: number
  mean_ndcg: number
  /** Percentage of rows with at least one relevant recipe retrieved */
  hit_rate: number
}

export interface ExperimentResult {
  runId: string
  name: string
  startedAt: string
  config: Record<string, unknown>
  rows: EvaluationRowResult[]
  summary: ExperimentSummary
}

export interface RunExperimentOptions {
  /** Experiment name suffix */
  label?: string
  /** Rows evaluated at once (default: 1, keeps logs in row order) */
  concurrency?: number
  /** Recorded with the results (redacted settings, CLI flags) */
  config?: Record<string, unknown>
  now?: () => Date
}

// =============================================================================
// Row evaluation
// =============================================================================

export async function evaluateRow(
  row: DatasetRow,
  deps: EvaluationDeps
): Promise<EvaluationRowResult> {
  const logger = deps.logger ?? createNoopLogger()
  const query = row.question

  logger.info("Evaluating", { query })

  let response = ""
  let recipeNames: string[] = []
  let queryExtraction: string | null = null
  let retrieval: RetrievalMetrics | null = null
  let relevancy: RelevancyJudgement | null = null
  let faithfulness: FaithfulnessJudgement | null = null
  let error: string | null = null

  try {
    const result = await deps.service.answer(query)
    response = result.answer
    queryExtraction = JSON.stringify(result.extraction)

    const judgeContext = formatJudgeContext(result.hits)
    recipeNames = judgeContext.recipeNames

    const expected = parseExpectedProperties(row.expected_properties)
    const groundTruth = buildGroundTruthFilters(expected, logger)

    if (groundTruth === null) {
      logger.warn("No expected_properties, retrieval metrics skipped", { query })
    } else {
      const relevantIds = await getRelevantIds(
        deps.index,
        deps.collection,
        groundTruth
      )
      retrieval = computeRetrievalMetrics(
        result.hits.map(hit => hit.id),
        relevantIds
      )
      logger.info(formatRetrievalMetrics(retrieval))
    }

    relevancy = await judgeRelevancy(query, response, deps.judge)
    logger.info("Answer relevancy", { score: relevancy.score })

    faithfulness = await judgeFaithfulness(
      query,
      judgeContext.context,
      response,
      deps.judge
    )
    logger.info("Answer faithfulness", { verdict: faithfulness.verdict })
  } catch (caught) {
    logger.error("Error evaluating query", { query }, caught)
    error = describeError(caught)
  }

  return {
    id: row.id ?? null,
    question: query,
    response,
    relevancy_score: relevancy?.score ?? null,
    relevancy_reasoning: relevancy?.reason ?? null,
    faithfulness_score: faithfulness?.verdict ?? null,
    faithfulness_reasoning: faithfulness?.reason ?? null,
    retrieval_precision: retrieval?.precision ?? null,
    retrieval_recall: retrieval?.recall ?? null,
    retrieval_recall_capped: retrieval?.recall_capped ?? null,
    retrieval_mrr: retrieval?.mrr ?? null,
    retrieval_ndcg: retrieval?.ndcg ?? null,
    retrieval_hit: retrieval?.hit ?? null,
    retrieval_relevant_count: retrieval?.relevant_count ?? null,
    recipe_context: recipeNames.map(name => `- ${name}`).join("\n"),
    query_extraction: queryExtraction,
    success: error === null,
    error
  }
}

// =============================================================================
// Aggregation
// =============================================================================

function present<T>(values: (T | null)[]): T[] {
  return values.filter((value): value is T => value !== null)
}

export function summarizeResults(rows: EvaluationRowResult[]): ExperimentSummary {
  const verdicts = present(rows.map(row => row.faithfulness_score))
  const faithfulCount = verdicts.filter(v => v === "faithful").length
  const hits = present(rows.map(row => row.retrieval_hit))

  return {
    rows: rows.length,
    failed: rows.filter(row => !row.success).length,
    faithfulness_rate:
      verdicts.length > 0 ? (faithfulCount / verdicts.length) * 100 : 0,
    faithful_count: faithfulCount,
    faithfulness_total: verdicts.length,
    mean_relevancy: mean(present(rows.map(row => row.relevancy_score))),
    mean_precision: mean(present(rows.map(row => row.retrieval_precision))),
    mean_recall: mean(present(rows.map(row => row.retrieval_recall))),
    mean_recall_capped: mean(
      present(rows.map(row => row.retrieval_recall_capped))
    ),
    mean_mrr: mean(present(rows.map(row => row.retrieval_mrr))),
    mean_ndcg: mean(present(rows.map(row => row.retrieval_ndcg))),
    hit_rate: mean(hits.map(hit => (hit ? 1 : 0))) * 100
  }
}

/**
 * Timestamp in local time, optionally suffixed: 20240102_030405_label
 */
export function makeExperimentName(label?: string, now: Date = new Date()): string {
  const pad = (value: number) => String(value).padStart(2, "0")
  const timestamp =
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  return label ? `${timestamp}_${label}` : timestamp
}

// =============================================================================
// Experiment
// =============================================================================

/**
 * Maps items with at most `concurrency` calls in flight, keeping order
 */
async function mapWithConcurrency<T, R>(
  items: T[],
  concurrency: number,
  fn: (item: T) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length)
  let next = 0

  const worker = async () => {
    while (next < items.length) {
      const index = next++
      results[index] = await fn(items[index])
    }
  }

  const workers = Array.from(
    { length: Math.max(1, Math.min(concurrency, items.length)) },
    () => worker()
  )
  await Promise.all(workers)

  return results
}

export async function runExperiment(
  rows: DatasetRow[],
  deps: EvaluationDeps,
  options: RunExperimentOptions = {}
): Promise<ExperimentResult> {
  const logger = deps.logger ?? createNoopLogger()
  const now = options.now ?? (() => new Date())
  const startedAt = now()
  const name = makeExperimentName(options.label, startedAt)
  const runId = uuidv4()

  logger.info("Starting experiment", { name, runId, rows: rows.length })

  const tracedEvaluateRow = traceable(
    (row: DatasetRow) => evaluateRow(row, deps),
    createStepTraceOptions(PIPELINE_STEP_NAMES.EVALUATE_ROW, {
      experiment: name,
      runId
    })
  )

  const results = await mapWithConcurrency(
    rows,
    options.concurrency ?? 1,
    row => tracedEvaluateRow(row)
  )

  const summary = summarizeResults(results)

  logger.info("Experiment finished", {
    name,
    faithfulnessRate: `${summary.faithfulness_rate.toFixed(1)}% (${summary.faithful_count} / ${summary.faithfulness_total})`,
    meanRelevancy: Number(summary.mean_relevancy.toFixed(2)),
    hitRate: `${summary.hit_rate.toFixed(1)}%`,
    failed: summary.failed
  })

  return {
    runId,
    name,
    startedAt: startedAt.toISOString(),
    config: options.config ?? {},
    rows: results,
    summary
  }
}

/**
 * Writes `<dir>/<name>.json` and returns its path
 */
export async function saveExperiment(
  result: ExperimentResult,
  dir: string
): Promise<string> {
  await mkdir(dir, { recursive: true })
  const path = join(dir, `${result.name}.json`)
  await writeFile(path, JSON.stringify(result, null, 2), "utf-8")
  return path
}
