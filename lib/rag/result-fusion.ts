/**
 * Result Fusion - Reciprocal Rank Fusion (RRF)
 *
 * Merges several ranked lists into one. Items found by several lists rank
 * higher.
 *
 * score(d) = Σ 1/(k + rank(d, list)), rank is 1-based, k defaults to 60.
 * Equal scores keep the order in which items were first seen.
 */

export interface Identified {
  id: string
}

export type Fused<T extends Identified> = T & {
  rrfScore: number
  /** Number of lists the item appeared in */
  appearances: number
}

export interface RRFOptions {
  /** Rank constant (default: 60) */
  k?: number
  /** Maximum number of items returned (default: all) */
  topK?: number
  /** Multiply the score of items found by several lists (default: false) */
  multiQueryBoost?: boolean
  /** Boost per additional appearance (default: 0.1) */
  boostFactor?: number
}

export const RRF_RANK_CONSTANT = 60

const DEFAULT_OPTIONS: Required<RRFOptions> = {
  k: RRF_RANK_CONSTANT,
  topK: Number.POSITIVE_INFINITY,
  multiQueryBoost: false,
  boostFactor: 0.1
}

/**
 * Applies Reciprocal Rank Fusion to ranked lists, best first
 */
export function reciprocalRankFusion<T extends Identified>(
  rankedLists: T[][],
  options: RRFOptions = {}
): Fused<T>[] {
  const opts = { ...DEFAULT_OPTIONS, ...options }

  const scoreMap = new Map<
    string,
    { item: T; score: number; appearances: number }
  >()

  for (const list of rankedLists) {
    for (let rank = 0; rank < list.length; rank++) {
      const item = list[rank]
      const rrfScore = 1 / (opts.k + rank + 1)

      const existing = scoreMap.get(item.id)
      if (existing) {
        existing.score += rrfScore
        existing.appearances += 1
      } else {
        scoreMap.set(item.id, { item, score: rrfScore, appearances: 1 })
      }
    }
  }

  const fused: Fused<T>[] = Array.from(scoreMap.values()).map(entry => {
    let finalScore = entry.score

    if (opts.multiQueryBoost && entry.appearances > 1) {
      finalScore *= 1 + opts.boostFactor * (entry.appearances - 1)
    }

    return {
      ...entry.item,
      rrfScore: finalScore,
      appearances: entry.appearances
    }
  })

  // Array.prototype.sort is stable: ties keep first-seen order
  fused.sort((a, b) => b.rrfScore - a.rrfScore)

  return fused.slice(0, opts.topK)
}

export interface FusionStats {
  totalLists: number
  totalItems: number
  uniqueItems: number
  avgAppearances: number
  maxAppearances: number
  topId: string | null
  topScore: number
}

export function calculateFusionStats<T extends Identified>(
  rankedLists: T[][],
  fused: Fused<T>[]
): FusionStats {
  const totalItems = rankedLists.reduce((sum, list) => sum + list.length, 0)

  const avgAppearances =
    fused.length > 0
      ? fused.reduce((sum, item) => sum + item.appearances, 0) / fused.length
      : 0

  const maxAppearances =
    fused.length > 0 ? Math.max(...fused.map(item => item.appearances)) : 0

  return {
    totalLists: rankedLists.length,
    totalItems,
    uniqueItems: fused.length,
    avgAppearances: Math.round(avgAppearances * 100) / 100,
    maxAppearances,
    topId: fused[0]?.id ?? null,
    topScore: fused[0]?.rrfScore ?? 0
  }
}
