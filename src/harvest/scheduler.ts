import pLimit from "p-limit"

import { resolveFieldValue } from "../adapters/fields.js"
import type { AdapterEntry, ExtractedFields } from "../adapters/types.js"
import type { BrowserInteraction, BrowserPage, LightweightFetchResult } from "../fetch/types.js"
import type { AdapterRegistry } from "./registry.js"
import {
  MISSING_VALUE,
  getErrorMessage,
  silentLogger,
  toHarvestError,
  type CandidateUrl,
  type HarvestError,
  type HarvestLogger,
  type NormalizedRecord,
} from "./types.js"
import { toDomainKey } from "../utils/url.js"

export interface MarkupFetcher {
  fetch(url: string): Promise<LightweightFetchResult>
}

export interface PageFetcher {
  withPage<T>(
    url: string,
    interaction: BrowserInteraction | undefined,
    consume: (page: BrowserPage) => Promise<T>,
  ): Promise<T>
}

export interface SchedulerProgress {
  /** URLs dispatched to a slot (registered domains only). */
  total: number
  settled: number
  records: number
  failures: number
}

export interface SchedulerOptions {
  registry: AdapterRegistry
  lightweight: MarkupFetcher
  browser: PageFetcher
  concurrency: number
  onRecord?: (record: NormalizedRecord) => Promise<void>
  onProgress?: (progress: SchedulerProgress) => void
  logger?: HarvestLogger
}

export interface SchedulerResult {
  /** Completion order. */
  records: NormalizedRecord[]
  errors: HarvestError[]
  skipped: CandidateUrl[]
  attempted: number
}

const RESERVED_FIELDS = new Set(["source_url", "record_id", "client_name", "client_city", "client_specialty"])

/**
 * Flattens adapter output into the stored shape: `source_url` first, adapter
 * fields in adapter order, candidate metadata last.
 */
export const buildRecord = (candidate: CandidateUrl, fields: ExtractedFields): NormalizedRecord => {
  const extracted: Record<string, string> = {}
  for (const [name, value] of fields) {
    if (!name || RESERVED_FIELDS.has(name)) {
      continue
    }
    extracted[name] = resolveFieldValue(value)
  }
  return {
    source_url: candidate.url,
    ...extracted,
    record_id: candidate.recordId ?? MISSING_VALUE,
    client_name: candidate.clientName ?? MISSING_VALUE,
    client_city: candidate.clientCity ?? MISSING_VALUE,
    client_specialty: candidate.clientSpecialty ?? MISSING_VALUE,
  }
}

class PipelineStepError extends Error {
  constructor(
    readonly step: "fetch" | "extract",
    readonly original: unknown,
  ) {
    super(getErrorMessage(original))
    this.name = "PipelineStepError"
  }
}

export const runScheduler = async (
  candidates: readonly CandidateUrl[],
  options: SchedulerOptions,
): Promise<SchedulerResult> => {
  const logger = options.logger ?? silentLogger
  const records: NormalizedRecord[] = []
  const errors: HarvestError[] = []
  const skipped: CandidateUrl[] = []

  // Dispatch happens before any slot is requested
  const work: Array<{ candidate: CandidateUrl; entry: AdapterEntry }> = []
  for (const candidate of candidates) {
    const entry = options.registry.resolve(candidate.url)
    if (!entry) {
      const domainKey = toDomainKey(candidate.url) ?? "invalid url"
      logger.verbose("scheduler", `Skipping ${candidate.url} (no adapter for ${domainKey})`)
      errors.push(toHarvestError("UNREGISTERED_DOMAIN", "dispatch", candidate.url, `No adapter for ${domainKey}`))
      skipped.push(candidate)
      continue
    }
    work.push({ candidate, entry })
  }

  const progress: SchedulerProgress = { total: work.length, settled: 0, records: 0, failures: 0 }
  options.onProgress?.({ ...progress })

  const extract = async (url: string, entry: AdapterEntry): Promise<ExtractedFields> => {
    if (entry.strategy === "lightweight") {
      const fetched = await options.lightweight.fetch(url)
      if (!fetched.success) {
        throw new PipelineStepError("fetch", fetched.error)
      }
      try {
        return entry.adapter.extract(fetched.html, url)
      } catch (error) {
        throw new PipelineStepError("extract", error)
      }
    }

    const { adapter } = entry
    let step: "fetch" | "extract" = "fetch"
    try {
      return await options.browser.withPage(url, entry.interaction, async (page) => {
        if (adapter.kind === "interactive") {
          step = "extract"
          return adapter.extract(page, url, logger.verbose)
        }
        const html = await page.content()
        step = "extract"
        return adapter.extract(html, url)
      })
    } catch (error) {
      throw new PipelineStepError(step, error)
    }
  }

  const runPipeline = async (candidate: CandidateUrl, entry: AdapterEntry): Promise<NormalizedRecord | null> => {
    const startedAt = Date.now()
    try {
      const fields = await extract(candidate.url, entry)
      const record = buildRecord(candidate, fields)
      logger.verbose(entry.adapter.name, `${candidate.url} extracted in ${Date.now() - startedAt}ms`)
      return record
    } catch (error) {
      const step = error instanceof PipelineStepError ? error.step : "extract"
      const cause = error instanceof PipelineStepError ? error.original : error
      const harvestError = toHarvestError(
        step === "fetch" ? "FETCH_FAILED" : "EXTRACT_FAILED",
        step,
        candidate.url,
        cause,
      )
      errors.push(harvestError)
      logger.warn(`${harvestError.code} ${candidate.url}: ${harvestError.message}`)
      return null
    }
  }

  const deliver = async (record: NormalizedRecord): Promise<void> => {
    if (!options.onRecord) {
      return
    }
    try {
      await options.onRecord(record)
    } catch (error) {
      const harvestError = toHarvestError("STORE_WRITE_FAILED", "record-sink", record.source_url, error)
      errors.push(harvestError)
      logger.warn(`${harvestError.code} ${record.source_url}: ${harvestError.message}`)
    }
  }

  const limit = pLimit(options.concurrency)
  await Promise.all(
    work.map(async ({ candidate, entry }) => {
      // The slot covers resolve, fetch and extract only; delivery runs after it is released
      const record = await limit(() => runPipeline(candidate, entry))
      progress.settled += 1
      if (record) {
        records.push(record)
        progress.records += 1
        await deliver(record)
      } else {
        progress.failures += 1
      }
      options.onProgress?.({ ...progress })
    }),
  )

  return { records, errors, skipped, attempted: work.length }
}
