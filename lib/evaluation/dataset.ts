/**
 * Evaluation dataset
 *
 * A JSON list of questions, each optionally carrying the properties a
 * relevant recipe must have (see ground-truth.ts for the accepted keys).
 */

import { readFile } from "node:fs/promises"

import { z } from "zod"

import { fromZodError } from "@/lib/errors/error-handler"

export const DatasetRowSchema = z
  .object({
    id: z.union([z.string(), z.number()]).optional(),
    question: z.string().min(1),
    /** Map, its JSON text, or nothing */
    expected_properties: z.unknown().optional()
  })
  .passthrough()

export type DatasetRow = z.infer<typeof DatasetRowSchema>

export const DatasetSchema = z.array(DatasetRowSchema)

export function parseDataset(data: unknown, limit?: number): DatasetRow[] {
  const parsed = DatasetSchema.safeParse(data)
  if (!parsed.success) {
    throw fromZodError("Invalid evaluation dataset", parsed.error)
  }
  return limit !== undefined ? parsed.data.slice(0, limit) : parsed.data
}

export async function loadDataset(
  path: string,
  limit?: number
): Promise<DatasetRow[]> {
  const content = await readFile(path, "utf-8")
  return parseDataset(JSON.parse(content), limit)
}
