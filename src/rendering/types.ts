import type { HarvestSummary, PageStart, PageSummary } from "../harvest/driver.js"
import type { SchedulerProgress } from "../harvest/scheduler.js"

export interface RunHeader {
  dbPath: string
  masterDbPath: string
  concurrency: number
  pageSize: number
  flushThreshold: number
  headless: boolean
  domains: string[]
}

export interface StoreCount {
  name: string
  rows: number
}

export interface SpinnerHandle {
  update(text: string): void
  succeed(text: string): void
  fail(text: string): void
}

export interface CliRenderer {
  // --- Setup ---
  header(header: RunHeader): void

  // --- Paging ---
  pageStarted(page: PageStart): void
  pageProgress(pageIndex: number, progress: SchedulerProgress): void
  pageComplete(page: PageSummary): void

  // --- Other commands ---
  createSpinner(text: string): SpinnerHandle
  storeTable(counts: StoreCount[]): void

  // --- General ---
  harvestComplete(summary: HarvestSummary, elapsedSeconds: number): void
  logVerbose(scope: string, message: string, elapsedSec: number): void
  warn(message: string): void
  error(message: string): void
}
