/**
 * Retrieval Metrics
 *
 * Scores one ranked list of retrieved ids against the ground-truth id set.
 * K is the length of the retrieved list. Degenerate inputs score 0 / false.
 */

export interface RetrievalMetrics {
  /** |retrieved ∩ relevant| / K */
  readonly precision: number
  /** |retrieved ∩ relevant| / |relevant| */
  readonly recall: number
  /** |retrieved ∩ relevant| / min(K, |relevant|) */
  readonly recall_capped: number
  /** 1 / rank of the first relevant id */
  readonly mrr: number
  /** nDCG@K with binary relevance */
  readonly ndcg: number
  readonly hit: boolean
  readonly relevant_count: number
}

function calculateNdcg(
  retrievedIds: string[],
  relevantIds: ReadonlySet<string>,
  k: number
): number {
  let dcg = 0
  retrievedIds.slice(0, k).forEach((id, i) => {
    if (relevantIds.has(id)) {
      dcg += 1 / Math.log2(i + 2)
    }
  })

  let idcg = 0
  const idealHits = Math.min(relevantIds.size, k)
  for (let i = 0; i < idealHits; i++) {
    idcg += 1 / Math.log2(i + 2)
  }

  return idcg > 0 ? dcg / idcg : 0
}

export function computeRetrievalMetrics(
  retrievedIds: string[],
  relevantIds: ReadonlySet<string>
): RetrievalMetrics {
  const k = retrievedIds.length
  const relevantCount = relevantIds.size
  const relevantRetrieved = retrievedIds.filter(id => relevantIds.has(id)).length

  const firstHit = retrievedIds.findIndex(id => relevantIds.has(id))

  return Object.freeze({
    precision: k > 0 ? relevantRetrieved / k : 0,
    recall: relevantCount > 0 ? relevantRetrieved / relevantCount : 0,
    recall_capped:
      k > 0 && relevantCount > 0
        ? relevantRetrieved / Math.min(k, relevantCount)
        : 0,
    mrr: firstHit === -1 ? 0 : 1 / (firstHit + 1),
    ndcg: calculateNdcg(retrievedIds, relevantIds, k),
    hit: firstHit !== -1,
    relevant_count: relevantCount
  })
}

/**
 * One log line with every score
 */
export function formatRetrievalMetrics(metrics: RetrievalMetrics): string {
  const f = (value: number) => value.toFixed(3)
  return (
    `Retrieval P@K=${f(metrics.precision)} R@K=${f(metrics.recall)} ` +
    `R_capped@K=${f(metrics.recall_capped)} MRR=${f(metrics.mrr)} ` +
    `nDCG=${f(metrics.ndcg)} Hit=${metrics.hit} (relevant=${metrics.relevant_count})`
  )
}

export function mean(values: number[]): number {
  if (values.length === 0) return 0
  return values.reduce((sum, value) => sum + value, 0) / values.length
}
