#!/usr/bin/env npx tsx
/**
 * Interactive recipe assistant in the terminal
 *
 * Usage:
 *   npx tsx scripts/qa-cli.ts
 *
 * Type "exit" or "quit" to leave.
 */

import { createInterface } from "node:readline/promises"

import { loadSettings } from "@/lib/config/settings"
import { createLogger } from "@/lib/logging/logger"
import { checkLangSmithConfig } from "@/lib/monitoring/langsmith-setup"
import { runQaTurn } from "@/lib/rag/qa-turn"
import { createRecipeRagService } from "@/lib/rag/rag-service"

async function main(): Promise<number> {
  const settings = loadSettings()
  const logger = createLogger("qa-cli", { level: settings.logLevel })

  const tracing = checkLangSmithConfig()
  for (const warning of tracing.warnings) logger.warn(warning)
  for (const error of tracing.errors) logger.error(error)

  const service = createRecipeRagService(settings, logger)

  if (!(await service.checkHealth())) {
    logger.error("Service not healthy. Exiting...")
    return 1
  }

  const rl = createInterface({ input: process.stdin, output: process.stdout })
  const write = (text: string) => {
    process.stdout.write(text)
  }

  console.log("Welcome to the recipe assistant! (Type 'exit' to quit)")

  try {
    while (true) {
      const userInput = (await rl.question("\n👤 You: ")).trim()

      if (["exit", "quit"].includes(userInput.toLowerCase())) break
      if (!userInput) continue

      await runQaTurn(service, userInput, write, logger)
    }
  } finally {
    rl.close()
  }

  console.log("Goodbye!")
  return 0
}

main()
  .then(code => process.exit(code))
  .catch(err => {
    console.error("❌ Fatal error:", err)
    process.exit(1)
  })
