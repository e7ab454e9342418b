import { throwIfAborted } from "../utils/cancel.js"
import { BatchWriter, type BatchWriterStats } from "./batch-writer.js"
import { filterUnprocessed } from "./dedup.js"
import type { AdapterRegistry } from "./registry.js"
import { runScheduler, type MarkupFetcher, type PageFetcher, type SchedulerProgress } from "./scheduler.js"
import {
  silentLogger,
  type CandidateSource,
  type CandidateUrl,
  type HarvestErrorCode,
  type HarvestLogger,
  type RecordStore,
} from "./types.js"

export const DEFAULT_PAGE_SIZE = 10_000
export const DEFAULT_CONCURRENCY = 5

export interface HarvestConfig {
  concurrency: number
  pageSize: number
  flushThreshold: number
  /** Zero-based page to resume from. */
  startPage?: number
}

export interface PageStart {
  pageIndex: number
  pageCount: number
  offset: number
  rows: number
  candidates: number
  alreadyProcessed: number
  remaining: number
}

export interface PageSummary {
  pageIndex: number
  candidates: number
  alreadyProcessed: number
  unregistered: number
  attempted: number
  records: number
  failures: number
  writer: BatchWriterStats
}

export interface HarvestObserver {
  onPageStart?(page: PageStart): void
  onProgress?(pageIndex: number, progress: SchedulerProgress): void
  onPageComplete?(page: PageSummary): void
}

export interface HarvestDependencies {
  source: CandidateSource
  master: RecordStore
  target: RecordStore
  registry: AdapterRegistry
  lightweight: MarkupFetcher
  browser: PageFetcher
  logger?: HarvestLogger
  observer?: HarvestObserver
  /** Checked between pages only; the running page always finishes and flushes. */
  signal?: AbortSignal
}

export interface HarvestSummary {
  totalCandidates: number
  pageCount: number
  pagesProcessed: number
  candidates: number
  alreadyProcessed: number
  unregistered: number
  attempted: number
  records: number
  failures: number
  errorCounts: Record<HarvestErrorCode, number>
  writer: BatchWriterStats
}

const emptyWriterStats = (): BatchWriterStats => ({
  masterInserted: 0,
  masterFailed: 0,
  targetInserted: 0,
  targetBatches: 0,
  targetDropped: 0,
})

const addWriterStats = (left: BatchWriterStats, right: BatchWriterStats): BatchWriterStats => ({
  masterInserted: left.masterInserted + right.masterInserted,
  masterFailed: left.masterFailed + right.masterFailed,
  targetInserted: left.targetInserted + right.targetInserted,
  targetBatches: left.targetBatches + right.targetBatches,
  targetDropped: left.targetDropped + right.targetDropped,
})

/** Drops rows without a URL and keeps the first row for each repeated URL. */
export const collapseByUrl = (rows: readonly CandidateUrl[]): CandidateUrl[] => {
  const byUrl = new Map<string, CandidateUrl>()
  for (const row of rows) {
    const url = row.url.trim()
    if (!url || byUrl.has(url)) {
      continue
    }
    byUrl.set(url, { ...row, url })
  }
  return [...byUrl.values()]
}

const assertPositiveInteger = (name: string, value: number): void => {
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${name} must be a positive integer, got ${value}`)
  }
}

export const runHarvest = async (deps: HarvestDependencies, config: HarvestConfig): Promise<HarvestSummary> => {
  assertPositiveInteger("concurrency", config.concurrency)
  assertPositiveInteger("pageSize", config.pageSize)
  assertPositiveInteger("flushThreshold", config.flushThreshold)
  const logger = deps.logger ?? silentLogger
  const startPage = config.startPage ?? 0

  const totalCandidates = await deps.source.count()
  const pageCount = Math.ceil(totalCandidates / config.pageSize)
  logger.verbose("driver", `${totalCandidates} candidates in ${pageCount} page(s) of ${config.pageSize}`)

  const summary: HarvestSummary = {
    totalCandidates,
    pageCount,
    pagesProcessed: 0,
    candidates: 0,
    alreadyProcessed: 0,
    unregistered: 0,
    attempted: 0,
    records: 0,
    failures: 0,
    errorCounts: { UNREGISTERED_DOMAIN: 0, FETCH_FAILED: 0, EXTRACT_FAILED: 0, STORE_WRITE_FAILED: 0 },
    writer: emptyWriterStats(),
  }

  for (let pageIndex = startPage; pageIndex < pageCount; pageIndex++) {
    throwIfAborted(deps.signal)
    const offset = pageIndex * config.pageSize
    const rows = await deps.source.readPage(offset, config.pageSize)
    const candidates = collapseByUrl(rows)
    const { remaining, alreadyProcessed } = await filterUnprocessed(candidates, {
      target: deps.target,
      master: deps.master,
    })

    summary.pagesProcessed += 1
    summary.candidates += candidates.length
    summary.alreadyProcessed += alreadyProcessed.length
    deps.observer?.onPageStart?.({
      pageIndex,
      pageCount,
      offset,
      rows: rows.length,
      candidates: candidates.length,
      alreadyProcessed: alreadyProcessed.length,
      remaining: remaining.length,
    })
    logger.verbose("driver", `Page ${pageIndex}: ${alreadyProcessed.length} already processed URL(s) skipped`)

    if (remaining.length === 0) {
      logger.verbose("driver", `Page ${pageIndex}: nothing left to harvest`)
      deps.observer?.onPageComplete?.({
        pageIndex,
        candidates: candidates.length,
        alreadyProcessed: alreadyProcessed.length,
        unregistered: 0,
        attempted: 0,
        records: 0,
        failures: 0,
        writer: emptyWriterStats(),
      })
      continue
    }

    const writer = new BatchWriter({
      master: deps.master,
      target: deps.target,
      flushThreshold: config.flushThreshold,
      logger,
    })
    const result = await runScheduler(remaining, {
      registry: deps.registry,
      lightweight: deps.lightweight,
      browser: deps.browser,
      concurrency: config.concurrency,
      logger,
      onRecord: (record) => writer.add(record),
      onProgress: (progress) => deps.observer?.onProgress?.(pageIndex, progress),
    })
    await writer.flush()

    const writerStats = writer.stats()
    const errors = [...result.errors, ...writer.errors()]
    for (const error of errors) {
      summary.errorCounts[error.code] += 1
    }
    const failures = result.attempted - result.records.length
    summary.unregistered += result.skipped.length
    summary.attempted += result.attempted
    summary.records += result.records.length
    summary.failures += failures
    summary.writer = addWriterStats(summary.writer, writerStats)

    deps.observer?.onPageComplete?.({
      pageIndex,
      candidates: candidates.length,
      alreadyProcessed: alreadyProcessed.length,
      unregistered: result.skipped.length,
      attempted: result.attempted,
      records: result.records.length,
      failures,
      writer: writerStats,
    })
  }

  return summary
}
