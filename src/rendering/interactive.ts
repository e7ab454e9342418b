import boxen from "boxen"
import chalk from "chalk"
import cliProgress from "cli-progress"
import Table from "cli-table3"
import ora from "ora"

import type { HarvestSummary, PageStart, PageSummary } from "../harvest/driver.js"
import type { SchedulerProgress } from "../harvest/scheduler.js"
import type { CliRenderer, RunHeader, SpinnerHandle, StoreCount } from "./types.js"

export class InteractiveRenderer implements CliRenderer {
  private multiBar: cliProgress.MultiBar | null = null
  private pageBar: cliProgress.SingleBar | null = null

  header(header: RunHeader): void {
    const body = [
      `${chalk.bold("Source")}       ${header.dbPath}`,
      `${chalk.bold("Master")}       ${header.masterDbPath}`,
      `${chalk.bold("Concurrency")}  ${header.concurrency}`,
      `${chalk.bold("Page size")}    ${header.pageSize}`,
      `${chalk.bold("Flush at")}     ${header.flushThreshold}`,
      `${chalk.bold("Browser")}      ${header.headless ? "headless" : chalk.yellow("headed")}`,
      `${chalk.bold("Domains")}      ${header.domains.length}`,
    ].join("\n")

    console.log(
      boxen(body, {
        title: chalk.bold("Profile Harvest"),
        borderColor: "blue",
        padding: 1,
      }),
    )
  }

  pageStarted(page: PageStart): void {
    const label = `Page ${page.pageIndex + 1}/${page.pageCount}`
    console.log(
      chalk.cyan(
        `${label} - ${page.candidates} candidates, ${page.alreadyProcessed} already processed, ${page.remaining} to harvest`,
      ),
    )
    if (page.remaining === 0) {
      return
    }
    const multi = this.getOrCreateMultiBar()
    this.pageBar = multi.create(page.remaining, 0, { label, records: 0, failures: 0 })
  }

  pageProgress(pageIndex: number, progress: SchedulerProgress): void {
    if (!this.pageBar) {
      return
    }
    if (progress.total > 0) {
      this.pageBar.setTotal(progress.total)
    }
    this.pageBar.update(progress.settled, {
      label: `Page ${pageIndex + 1}`,
      records: progress.records,
      failures: progress.failures,
    })
  }

  pageComplete(page: PageSummary): void {
    this.stopProgress()
    if (page.attempted === 0 && page.unregistered === 0) {
      return
    }
    const dropped = page.writer.targetDropped > 0 ? chalk.red(`, ${page.writer.targetDropped} dropped`) : ""
    console.log(
      chalk.green(
        `[OK] Page ${page.pageIndex + 1} - ${page.records}/${page.attempted} extracted, ${page.unregistered} unregistered, ${page.writer.targetInserted} written`,
      ) + dropped,
    )
  }

  createSpinner(text: string): SpinnerHandle {
    const spinner = ora(text).start()
    return {
      update(nextText) {
        spinner.text = nextText
      },
      succeed(finalText) {
        spinner.succeed(finalText)
      },
      fail(finalText) {
        spinner.fail(finalText)
      },
    }
  }

  storeTable(counts: StoreCount[]): void {
    const table = new Table({
      head: [chalk.bold("Table"), chalk.bold("Rows")],
    })
    for (const entry of counts) {
      table.push([entry.name, entry.rows.toString()])
    }
    console.log(table.toString())
  }

  harvestComplete(summary: HarvestSummary, elapsedSeconds: number): void {
    this.stopProgress()
    const table = new Table({
      head: [chalk.bold("Metric"), chalk.bold("Count")],
    })
    table.push(
      ["Pages", `${summary.pagesProcessed}/${summary.pageCount}`],
      ["Candidates", summary.candidates.toString()],
      ["Already processed", summary.alreadyProcessed.toString()],
      ["Unregistered", summary.unregistered.toString()],
      ["Attempted", summary.attempted.toString()],
      ["Records", chalk.green(summary.records.toString())],
      ["Failures", summary.failures > 0 ? chalk.red(summary.failures.toString()) : "0"],
      ["Master inserted", summary.writer.masterInserted.toString()],
      ["Target inserted", summary.writer.targetInserted.toString()],
      ["Target dropped", summary.writer.targetDropped > 0 ? chalk.red(summary.writer.targetDropped.toString()) : "0"],
    )
    console.log(table.toString())
    console.log(
      boxen(`${chalk.bold("Duration")}    ${elapsedSeconds}s`, {
        title: chalk.green("Harvest Complete"),
        borderColor: "green",
        padding: 1,
      }),
    )
  }

  logVerbose(scope: string, message: string, elapsedSec: number): void {
    this.print(chalk.gray(`[+${elapsedSec.toFixed(2)}s] [${scope}] ${message}`))
  }

  warn(message: string): void {
    if (this.multiBar) {
      this.multiBar.log(`${chalk.yellow(message)}\n`)
      return
    }
    console.warn(chalk.yellow(message))
  }

  error(message: string): void {
    this.stopProgress()
    console.error(chalk.red(message))
  }

  private print(line: string): void {
    if (this.multiBar) {
      this.multiBar.log(`${line}\n`)
      return
    }
    console.log(line)
  }

  private stopProgress(): void {
    this.multiBar?.stop()
    this.multiBar = null
    this.pageBar = null
  }

  private getOrCreateMultiBar(): cliProgress.MultiBar {
    if (!this.multiBar) {
      this.multiBar = new cliProgress.MultiBar(
        {
          clearOnComplete: false,
          hideCursor: true,
          emptyOnZero: true,
          format: (options, params, payload: Record<string, unknown>) => {
            const label = typeof payload.label === "string" ? payload.label : ""
            const records = typeof payload.records === "number" ? payload.records : 0
            const failures = typeof payload.failures === "number" ? payload.failures : 0

            const barSize = options.barsize ?? 20
            const completeSize = Math.round(params.progress * barSize)
            const bar =
              (options.barCompleteString ?? "").substring(0, completeSize) +
              (options.barIncompleteString ?? "").substring(0, barSize - completeSize)
            const failed = failures > 0 ? chalk.red(`${failures} failed`) : chalk.dim("0 failed")
            return `  ${bar} ${params.value}/${params.total} | ${label} | ${records} records | ${failed}`
          },
        },
        cliProgress.Presets.shades_classic,
      )
    }

    return this.multiBar
  }
}
