#!/usr/bin/env node
import { Command } from "commander"

import { DEFAULT_ADAPTER_ENTRIES } from "./adapters/index.js"
import { readEnvConfig } from "./config.js"
import { readCandidateCsv } from "./db/import-csv.js"
import { HarvestDatabase, SqliteCandidateSource, SqliteRecordStore } from "./db/store.js"
import { BrowserFetcher, createChromiumLauncher } from "./fetch/browser.js"
import { LightweightFetcher } from "./fetch/lightweight.js"
import { runHarvest } from "./harvest/driver.js"
import { createAdapterRegistry } from "./harvest/registry.js"
import { getErrorMessage } from "./harvest/types.js"
import { InvalidOptionError, parseHarvestOptions, parseStoreOptions } from "./options.js"
import { createHarvestLogger, createRenderer } from "./rendering/index.js"
import type { CliRenderer } from "./rendering/types.js"
import { isCancellationError } from "./utils/cancel.js"

const rendererMode = (plain: boolean): "interactive" | "plain" =>
  plain || !process.stdout.isTTY ? "plain" : "interactive"

interface SigintCancellationHandle {
  signal: AbortSignal
  dispose: () => void
}

const setupSigintCancellation = (renderer: CliRenderer): SigintCancellationHandle => {
  const controller = new AbortController()
  let sigintCount = 0
  const onSigint = () => {
    sigintCount += 1
    if (sigintCount === 1) {
      renderer.warn("\nInterrupted (CTRL+C). Finishing the current page before stopping...")
      controller.abort(new Error("Interrupted by user (SIGINT)"))
      return
    }
    renderer.error("Force exit requested.")
    process.exit(130)
  }
  process.on("SIGINT", onSigint)
  return {
    signal: controller.signal,
    dispose: () => process.off("SIGINT", onSigint),
  }
}

// ── Commands ────────────────────────────────────────────────────────

const harvestCommand = async (opts: Record<string, unknown>): Promise<number> => {
  const startedAt = Date.now()
  const env = readEnvConfig()
  const options = parseHarvestOptions(opts, env)
  const renderer = createRenderer(rendererMode(options.plain))
  const logger = createHarvestLogger(renderer, { verbose: options.verbose, startedAt })
  const registry = createAdapterRegistry(DEFAULT_ADAPTER_ENTRIES)
  const { signal, dispose } = setupSigintCancellation(renderer)

  const sourceDb = await HarvestDatabase.open(options.dbPath)
  const masterDb =
    options.masterDbPath === options.dbPath ? sourceDb : await HarvestDatabase.open(options.masterDbPath)

  try {
    renderer.header({
      dbPath: options.dbPath,
      masterDbPath: options.masterDbPath,
      concurrency: options.concurrency,
      pageSize: options.pageSize,
      flushThreshold: options.flushThreshold,
      headless: !options.headed,
      domains: registry.domainKeys(),
    })

    const summary = await runHarvest(
      {
        source: new SqliteCandidateSource(sourceDb),
        master: SqliteRecordStore.master(masterDb),
        target: SqliteRecordStore.target(sourceDb),
        registry,
        lightweight: new LightweightFetcher({
          userAgent: env.userAgent,
          timeoutMs: options.fetchTimeoutMs,
        }),
        browser: new BrowserFetcher({
          launch: createChromiumLauncher({
            headless: !options.headed,
            executablePath: env.chromiumPath ?? undefined,
          }),
          userAgent: env.userAgent,
          navigationTimeoutMs: options.navigationTimeoutMs,
          logger,
        }),
        logger,
        signal,
        observer: {
          onPageStart: (page) => renderer.pageStarted(page),
          onProgress: (pageIndex, progress) => renderer.pageProgress(pageIndex, progress),
          onPageComplete: (page) => renderer.pageComplete(page),
        },
      },
      {
        concurrency: options.concurrency,
        pageSize: options.pageSize,
        flushThreshold: options.flushThreshold,
        startPage: options.startPage,
      },
    )

    renderer.harvestComplete(summary, Math.round((Date.now() - startedAt) / 1000))
    return 0
  } catch (error) {
    if (signal.aborted && isCancellationError(error)) {
      renderer.warn("Run cancelled by user.")
      return 130
    }
    throw error
  } finally {
    dispose()
    if (masterDb !== sourceDb) {
      masterDb.close()
    }
    sourceDb.close()
  }
}

const importCandidatesCommand = async (file: string, opts: Record<string, unknown>): Promise<number> => {
  const options = parseStoreOptions(opts, readEnvConfig())
  const renderer = createRenderer(rendererMode(options.plain))
  const spinner = renderer.createSpinner(`Reading ${file}`)
  const database = await HarvestDatabase.open(options.dbPath)
  try {
    const { rows, skipped } = await readCandidateCsv(file)
    spinner.update(`Inserting ${rows.length} candidate(s)`)
    const inserted = await new SqliteCandidateSource(database).insertMany(rows)
    spinner.succeed(`Imported ${inserted} candidate(s) into ${options.dbPath}`)
    if (skipped > 0) {
      renderer.warn(`${skipped} row(s) without a URL were skipped`)
    }
    return 0
  } catch (error) {
    spinner.fail(`Import failed: ${getErrorMessage(error)}`)
    return 1
  } finally {
    database.close()
  }
}

const statsCommand = async (opts: Record<string, unknown>): Promise<number> => {
  const options = parseStoreOptions(opts, readEnvConfig())
  const renderer = createRenderer(rendererMode(options.plain))
  const sourceDb = await HarvestDatabase.open(options.dbPath)
  const masterDb =
    options.masterDbPath === options.dbPath ? sourceDb : await HarvestDatabase.open(options.masterDbPath)
  try {
    renderer.storeTable([
      { name: "candidates", rows: await new SqliteCandidateSource(sourceDb).count() },
      { name: "master_records", rows: await SqliteRecordStore.master(masterDb).count() },
      { name: "target_records", rows: await SqliteRecordStore.target(sourceDb).count() },
    ])
    return 0
  } finally {
    if (masterDb !== sourceDb) {
      masterDb.close()
    }
    sourceDb.close()
  }
}

// ── Program ─────────────────────────────────────────────────────────

const createProgram = (setExitCode: (code: number) => void): Command => {
  const program = new Command()
  program.name("profile-harvester").description("Harvest profile pages into the master and target stores")

  program
    .command("harvest")
    .description("Page through the candidate table and harvest every unprocessed URL")
    .option("--db <path>", "Candidate + target database (default: $HARVEST_DB_PATH)")
    .option("--master-db <path>", "Master database (default: $HARVEST_MASTER_DB_PATH)")
    .option("--concurrency <number>", "Concurrent URL pipelines", "5")
    .option("--page-size <number>", "Candidate rows per page", "10000")
    .option("--start-page <number>", "Zero-based page to resume from", "0")
    .option("--flush-threshold <number>", "Buffered records per target batch", "50")
    .option("--navigation-timeout-ms <number>", "Browser navigation timeout", "60000")
    .option("--fetch-timeout-ms <number>", "Lightweight fetch timeout", "30000")
    .option("--headed", "Show the browser window", false)
    .option("--plain", "Plain output (no progress bars)", false)
    .option("--verbose", "Show detailed timing logs", false)
    .action(async (_options: unknown, command: Command) => {
      setExitCode(await harvestCommand(command.opts<Record<string, unknown>>()))
    })

  program
    .command("import-candidates")
    .description("Load candidate URLs from a CSV file")
    .argument("<file>", "CSV with a url (or link) column")
    .option("--db <path>", "Candidate database (default: $HARVEST_DB_PATH)")
    .option("--plain", "Plain output", false)
    .action(async (file: string, _options: unknown, command: Command) => {
      setExitCode(await importCandidatesCommand(file, command.opts<Record<string, unknown>>()))
    })

  program
    .command("stats")
    .description("Row counts of the candidate, master and target tables")
    .option("--db <path>", "Candidate + target database (default: $HARVEST_DB_PATH)")
    .option("--master-db <path>", "Master database (default: $HARVEST_MASTER_DB_PATH)")
    .option("--plain", "Plain output", false)
    .action(async (_options: unknown, command: Command) => {
      setExitCode(await statsCommand(command.opts<Record<string, unknown>>()))
    })

  return program
}

// ── Main ────────────────────────────────────────────────────────────

const main = async (): Promise<number> => {
  let exitCode = 0
  const program = createProgram((code) => {
    exitCode = code
  })
  const rawArgs = process.argv.slice(2)
  const normalizedArgs = rawArgs[0] === "--" ? rawArgs.slice(1) : rawArgs
  await program.parseAsync(["node", "profile-harvester", ...normalizedArgs])
  return exitCode
}

main()
  .then((code) => {
    process.exit(code)
  })
  .catch((error: unknown) => {
    if (isCancellationError(error)) {
      console.error("Run cancelled by user.")
      process.exit(130)
    }
    if (error instanceof InvalidOptionError) {
      console.error(error.message)
      process.exit(1)
    }
    console.error(`Unexpected error: ${getErrorMessage(error)}`)
    if (error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exit(1)
  })
