import type { HarvestSummary, PageStart, PageSummary } from "../harvest/driver.js"
import type { SchedulerProgress } from "../harvest/scheduler.js"
import type { CliRenderer, RunHeader, SpinnerHandle, StoreCount } from "./types.js"

export class PlainRenderer implements CliRenderer {
  private lastBucket = -1

  header(header: RunHeader): void {
    console.log("=== Profile Harvest ===")
    console.log(`Source:       ${header.dbPath}`)
    console.log(`Master:       ${header.masterDbPath}`)
    console.log(`Concurrency:  ${header.concurrency}`)
    console.log(`Page size:    ${header.pageSize}`)
    console.log(`Flush at:     ${header.flushThreshold}`)
    console.log(`Browser:      ${header.headless ? "headless" : "headed"}`)
    console.log(`Domains:      ${header.domains.join(", ")}`)
    console.log("")
  }

  pageStarted(page: PageStart): void {
    this.lastBucket = -1
    console.log(
      `[page ${page.pageIndex + 1}/${page.pageCount}] ${page.candidates} candidates, ${page.alreadyProcessed} already processed, ${page.remaining} to harvest`,
    )
  }

  pageProgress(pageIndex: number, progress: SchedulerProgress): void {
    // One line per tenth of the page, plus the first and last
    const ratio = progress.total > 0 ? progress.settled / progress.total : 0
    const bucket = Math.floor(ratio * 10)
    const done = progress.total > 0 && progress.settled >= progress.total
    if (bucket === this.lastBucket && !done) {
      return
    }
    this.lastBucket = bucket
    console.log(
      `[page ${pageIndex + 1}] ${progress.settled}/${progress.total} settled, ${progress.records} records, ${progress.failures} failed`,
    )
  }

  pageComplete(page: PageSummary): void {
    if (page.attempted === 0 && page.unregistered === 0) {
      return
    }
    console.log(
      `[page ${page.pageIndex + 1}] done: ${page.records}/${page.attempted} extracted, ${page.unregistered} unregistered, ${page.writer.targetInserted} written, ${page.writer.targetDropped} dropped`,
    )
  }

  createSpinner(text: string): SpinnerHandle {
    console.log(text)
    return {
      update(nextText) {
        console.log(nextText)
      },
      succeed(finalText) {
        console.log(`[OK] ${finalText}`)
      },
      fail(finalText) {
        console.error(`[ERR] ${finalText}`)
      },
    }
  }

  storeTable(counts: StoreCount[]): void {
    console.log("Table            Rows")
    for (const entry of counts) {
      console.log(`${entry.name.padEnd(16)} ${entry.rows}`)
    }
  }

  harvestComplete(summary: HarvestSummary, elapsedSeconds: number): void {
    console.log("")
    console.log("=== Harvest Complete ===")
    console.log(`Pages:              ${summary.pagesProcessed}/${summary.pageCount}`)
    console.log(`Candidates:         ${summary.candidates}`)
    console.log(`Already processed:  ${summary.alreadyProcessed}`)
    console.log(`Unregistered:       ${summary.unregistered}`)
    console.log(`Attempted:          ${summary.attempted}`)
    console.log(`Records:            ${summary.records}`)
    console.log(`Failures:           ${summary.failures}`)
    console.log(`Master inserted:    ${summary.writer.masterInserted}`)
    console.log(`Target inserted:    ${summary.writer.targetInserted}`)
    console.log(`Target dropped:     ${summary.writer.targetDropped}`)
    console.log(`Duration:           ${elapsedSeconds}s`)
  }

  logVerbose(scope: string, message: string, elapsedSec: number): void {
    console.log(`[+${elapsedSec.toFixed(2)}s] [${scope}] ${message}`)
  }

  warn(message: string): void {
    console.warn(`[WARN] ${message}`)
  }

  error(message: string): void {
    console.error(`[ERR] ${message}`)
  }
}
