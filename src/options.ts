import { z } from "zod"

import type { EnvConfig } from "./config.js"
import { DEFAULT_NAVIGATION_TIMEOUT_MS } from "./fetch/browser.js"
import { DEFAULT_FETCH_TIMEOUT_MS } from "./fetch/lightweight.js"
import { DEFAULT_FLUSH_THRESHOLD } from "./harvest/batch-writer.js"
import { DEFAULT_CONCURRENCY, DEFAULT_PAGE_SIZE } from "./harvest/driver.js"

export interface HarvestCliOptions {
  dbPath: string
  masterDbPath: string
  concurrency: number
  pageSize: number
  flushThreshold: number
  startPage: number
  navigationTimeoutMs: number
  fetchTimeoutMs: number
  headed: boolean
  plain: boolean
  verbose: boolean
}

export interface StoreCliOptions {
  dbPath: string
  masterDbPath: string
  plain: boolean
}

const integerOption = (min: number, max?: number) => {
  const base = z.number().int().min(min)
  return z
    .union([z.string(), z.number()])
    .transform((v) => Number(v))
    .pipe(max === undefined ? base : base.max(max))
}

const harvestOptionsSchema = z.object({
  dbPath: z.string().min(1),
  masterDbPath: z.string().min(1),
  concurrency: integerOption(1, 50),
  pageSize: integerOption(1),
  // Upper bound keeps one target batch within SQLite's bound-parameter limit
  flushThreshold: integerOption(1, 5000),
  startPage: integerOption(0),
  navigationTimeoutMs: integerOption(1000),
  fetchTimeoutMs: integerOption(1000),
  headed: z.boolean().default(false),
  plain: z.boolean().default(false),
  verbose: z.boolean().default(false),
})

const storeOptionsSchema = z.object({
  dbPath: z.string().min(1),
  masterDbPath: z.string().min(1),
  plain: z.boolean().default(false),
})

export class InvalidOptionError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "InvalidOptionError"
  }
}

const firstIssueError = (error: z.ZodError): InvalidOptionError => {
  const issue = error.issues[0]
  const path = issue.path.join(".")
  return new InvalidOptionError(`Invalid option${path ? ` (${path})` : ""}: ${issue.message}`)
}

export const parseHarvestOptions = (opts: Record<string, unknown>, env: EnvConfig): HarvestCliOptions => {
  const raw = {
    dbPath: opts["db"] ?? env.dbPath,
    masterDbPath: opts["masterDb"] ?? env.masterDbPath,
    concurrency: opts["concurrency"] ?? DEFAULT_CONCURRENCY,
    pageSize: opts["pageSize"] ?? DEFAULT_PAGE_SIZE,
    flushThreshold: opts["flushThreshold"] ?? DEFAULT_FLUSH_THRESHOLD,
    startPage: opts["startPage"] ?? 0,
    navigationTimeoutMs: opts["navigationTimeoutMs"] ?? DEFAULT_NAVIGATION_TIMEOUT_MS,
    fetchTimeoutMs: opts["fetchTimeoutMs"] ?? DEFAULT_FETCH_TIMEOUT_MS,
    headed: opts["headed"] ?? false,
    plain: opts["plain"] ?? false,
    verbose: opts["verbose"] ?? false,
  }
  const parsed = harvestOptionsSchema.safeParse(raw)
  if (!parsed.success) {
    throw firstIssueError(parsed.error)
  }
  return parsed.data
}

export const parseStoreOptions = (opts: Record<string, unknown>, env: EnvConfig): StoreCliOptions => {
  const parsed = storeOptionsSchema.safeParse({
    dbPath: opts["db"] ?? env.dbPath,
    masterDbPath: opts["masterDb"] ?? env.masterDbPath,
    plain: opts["plain"] ?? false,
  })
  if (!parsed.success) {
    throw firstIssueError(parsed.error)
  }
  return parsed.data
}
