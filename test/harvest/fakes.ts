import type { BrowserInstance, BrowserLauncher, BrowserPage, LightweightFetchResult } from "../../src/fetch/types.js"
import type { MarkupFetcher } from "../../src/harvest/scheduler.js"
import type { CandidateSource, CandidateUrl, NormalizedRecord, RecordStore } from "../../src/harvest/types.js"

export const candidate = (url: string, recordId: string | null = null): CandidateUrl => ({
  url,
  recordId,
  clientName: null,
  clientCity: null,
  clientSpecialty: null,
})

/** Keyed by source_url like the sqlite tables: a duplicate rejects the whole call. */
export class InMemoryRecordStore implements RecordStore {
  readonly rows = new Map<string, NormalizedRecord>()
  readonly insertOneCalls: string[] = []
  readonly insertManyBatchSizes: number[] = []
  readonly lookups: string[][] = []
  failInsertMany = false
  failLookup = false

  constructor(readonly name: string) {}

  seed(...urls: string[]): this {
    for (const url of urls) {
      this.rows.set(url, { source_url: url, record_id: "seed" })
    }
    return this
  }

  findExistingSourceUrls(urls: readonly string[]): Promise<Set<string>> {
    this.lookups.push([...urls])
    if (this.failLookup) {
      return Promise.reject(new Error(`${this.name} store unreachable`))
    }
    return Promise.resolve(new Set(urls.filter((url) => this.rows.has(url))))
  }

  insertOne(record: NormalizedRecord): Promise<void> {
    this.insertOneCalls.push(record.source_url)
    if (this.rows.has(record.source_url)) {
      return Promise.reject(new Error(`duplicate key ${record.source_url}`))
    }
    this.rows.set(record.source_url, record)
    return Promise.resolve()
  }

  insertMany(records: readonly NormalizedRecord[]): Promise<void> {
    this.insertManyBatchSizes.push(records.length)
    if (this.failInsertMany) {
      return Promise.reject(new Error("connection reset"))
    }
    if (records.some((record) => this.rows.has(record.source_url))) {
      return Promise.reject(new Error("duplicate key in batch"))
    }
    for (const record of records) {
      this.rows.set(record.source_url, record)
    }
    return Promise.resolve()
  }
}

export class InMemoryCandidateSource implements CandidateSource {
  readonly pageReads: Array<{ offset: number; limit: number }> = []

  constructor(private readonly rows: CandidateUrl[]) {}

  count(): Promise<number> {
    return Promise.resolve(this.rows.length)
  }

  readPage(offset: number, limit: number): Promise<CandidateUrl[]> {
    this.pageReads.push({ offset, limit })
    return Promise.resolve(this.rows.slice(offset, offset + limit))
  }
}

export class StubMarkupFetcher implements MarkupFetcher {
  readonly calls: string[] = []

  constructor(private readonly pages: Record<string, string>) {}

  fetch(url: string): Promise<LightweightFetchResult> {
    this.calls.push(url)
    const html = this.pages[url]
    if (html === undefined) {
      return Promise.resolve({ success: false, url, error: "HTTP 404" })
    }
    return Promise.resolve({ success: true, url, html })
  }
}

export interface FakeBrowserOptions {
  pages?: Record<string, string>
  /** URLs whose navigation rejects, as a timeout would. */
  failNavigation?: Set<string>
  missingSelectors?: Set<string>
  visibleSelectors?: Set<string>
  failClicks?: Set<string>
  failPageClose?: boolean
}

/** Counts every open and close across all launches. */
export class FakeBrowserFactory {
  launched = 0
  contextsOpened = 0
  pagesOpened = 0
  browsersClosed = 0
  contextsClosed = 0
  pagesClosed = 0
  readonly navigations: string[] = []
  readonly clicks: string[] = []
  readonly userAgents: string[] = []
  wheelSteps = 0
  waits: number[] = []

  constructor(private readonly options: FakeBrowserOptions = {}) {}

  readonly launch: BrowserLauncher = () => {
    this.launched += 1
    return Promise.resolve(this.createBrowser())
  }

  private createBrowser(): BrowserInstance {
    return {
      newContext: ({ userAgent }) => {
        this.contextsOpened += 1
        this.userAgents.push(userAgent)
        return Promise.resolve({
          newPage: () => {
            this.pagesOpened += 1
            return Promise.resolve(this.createPage())
          },
          close: () => {
            this.contextsClosed += 1
            return Promise.resolve()
          },
        })
      },
      close: () => {
        this.browsersClosed += 1
        return Promise.resolve()
      },
    }
  }

  private createPage(): BrowserPage {
    const options = this.options
    let currentUrl = ""
    return {
      goto: (url) => {
        this.navigations.push(url)
        currentUrl = url
        if (options.failNavigation?.has(url)) {
          return Promise.reject(new Error(`Timeout 60000ms exceeded navigating to ${url}`))
        }
        return Promise.resolve(null)
      },
      waitForSelector: (selector) => {
        if (options.missingSelectors?.has(selector)) {
          return Promise.reject(new Error(`waiting for ${selector} timed out`))
        }
        return Promise.resolve(null)
      },
      locator: (selector) => ({
        isVisible: () => Promise.resolve(options.visibleSelectors?.has(selector) ?? false),
        click: () => {
          if (options.failClicks?.has(selector)) {
            return Promise.reject(new Error(`element ${selector} detached`))
          }
          this.clicks.push(selector)
          return Promise.resolve()
        },
      }),
      mouse: {
        wheel: () => {
          this.wheelSteps += 1
          return Promise.resolve()
        },
      },
      waitForTimeout: (timeout) => {
        this.waits.push(timeout)
        return Promise.resolve()
      },
      content: () => Promise.resolve(options.pages?.[currentUrl] ?? "<html><body></body></html>"),
      close: () => {
        this.pagesClosed += 1
        if (options.failPageClose) {
          return Promise.reject(new Error("page already closed"))
        }
        return Promise.resolve()
      },
    }
  }
}

/** A promise with its resolver exposed, for holding pipelines open. */
export const deferred = <T = void>(): { promise: Promise<T>; resolve: (value: T) => void } => {
  let resolve: (value: T) => void = () => undefined
  const promise = new Promise<T>((innerResolve) => {
    resolve = innerResolve
  })
  return { promise, resolve }
}
