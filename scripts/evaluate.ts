#!/usr/bin/env npx tsx
/**
 * End-to-end evaluation over a question dataset
 *
 * Usage:
 *   npx tsx scripts/evaluate.ts <dataset.json> [--limit N] [--concurrency N]
 *     [--name LABEL] [--out DIR]
 *
 * Results (every row plus the summary) are written to
 * <out>/<timestamp>[_LABEL].json, default out dir: experiments
 */

import { loadSettings, redactSettings } from "@/lib/config/settings"
import { loadDataset } from "@/lib/evaluation/dataset"
import { runExperiment, saveExperiment } from "@/lib/evaluation/experiment"
import { createJudgeContext } from "@/lib/evaluation/judges"
import { createLogger } from "@/lib/logging/logger"
import { checkLangSmithConfig } from "@/lib/monitoring/langsmith-setup"
import { RecipeRagService, createRecipeRagDeps } from "@/lib/rag/rag-service"

function readOption(args: string[], name: string): string | undefined {
  const index = args.indexOf(name)
  return index !== -1 ? args[index + 1] : undefined
}

function readNumber(args: string[], name: string): number | undefined {
  const raw = readOption(args, name)
  if (raw === undefined) return undefined

  const value = Number.parseInt(raw, 10)
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} expects a positive integer, got "${raw}"`)
  }
  return value
}

async function main(): Promise<void> {
  const args = process.argv.slice(2)
  const datasetPath = args[0]

  if (!datasetPath || datasetPath.startsWith("--")) {
    console.error(
      "Usage: npx tsx scripts/evaluate.ts <dataset.json> [--limit N] [--concurrency N] [--name LABEL] [--out DIR]"
    )
    process.exit(1)
  }

  const limit = readNumber(args, "--limit")
  const concurrency = readNumber(args, "--concurrency")
  const label = readOption(args, "--name")
  const outDir = readOption(args, "--out") ?? "experiments"

  const settings = loadSettings()
  const logger = createLogger("evaluate", { level: settings.logLevel })

  const tracing = checkLangSmithConfig()
  for (const warning of tracing.warnings) logger.warn(warning)
  for (const error of tracing.errors) logger.error(error)

  const rows = await loadDataset(datasetPath, limit)
  logger.info("Dataset loaded", { datasetPath, rows: rows.length })

  const deps = createRecipeRagDeps(settings, logger)

  const result = await runExperiment(
    rows,
    {
      service: new RecipeRagService(deps),
      index: deps.index,
      collection: settings.vectordbCollectionName,
      judge: createJudgeContext(deps),
      logger
    },
    {
      label,
      concurrency,
      config: {
        settings: redactSettings(settings),
        dataset: datasetPath,
        limit: limit ?? null
      }
    }
  )

  const path = await saveExperiment(result, outDir)
  logger.info("Experiment results saved", { path })
}

main()
  .then(() => process.exit(0))
  .catch(err => {
    console.error("❌ Fatal error:", err)
    process.exit(1)
  })
