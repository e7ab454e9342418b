import type { CandidateUrl, RecordStore } from "./types.js"

export interface DedupStores {
  target: RecordStore
  master: RecordStore
}

export interface DedupResult {
  remaining: CandidateUrl[]
  alreadyProcessed: CandidateUrl[]
}

/**
 * Splits a page of candidates into work still to do and URLs either store
 * already holds. Store errors propagate.
 */
export const filterUnprocessed = async (
  candidates: readonly CandidateUrl[],
  stores: DedupStores,
): Promise<DedupResult> => {
  if (candidates.length === 0) {
    return { remaining: [], alreadyProcessed: [] }
  }
  const urls = [...new Set(candidates.map((candidate) => candidate.url))]
  const [inTarget, inMaster] = await Promise.all([
    stores.target.findExistingSourceUrls(urls),
    stores.master.findExistingSourceUrls(urls),
  ])

  const remaining: CandidateUrl[] = []
  const alreadyProcessed: CandidateUrl[] = []
  for (const candidate of candidates) {
    if (inTarget.has(candidate.url) || inMaster.has(candidate.url)) {
      alreadyProcessed.push(candidate)
    } else {
      remaining.push(candidate)
    }
  }
  return { remaining, alreadyProcessed }
}
