import { getErrorMessage, sanitizeForError } from "../harvest/types.js"
import { httpGetText, mergeHeaders, type HttpHeaders } from "../utils/http.js"
import type { LightweightFetchResult } from "./types.js"

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000

export interface LightweightFetcherOptions {
  userAgent: string
  timeoutMs?: number
  signal?: AbortSignal
}

const NO_CACHE_HEADERS: HttpHeaders = {
  "cache-control": "no-cache",
  pragma: "no-cache",
}

/** Static markup retrieval. Never throws: every failure becomes `{ success: false }`. */
export class LightweightFetcher {
  private readonly headers: HttpHeaders
  private readonly timeoutMs: number

  constructor(private readonly options: LightweightFetcherOptions) {
    this.headers = mergeHeaders(NO_CACHE_HEADERS, {
      accept: "text/html,application/xhtml+xml",
      "user-agent": options.userAgent,
    })
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS
  }

  async fetch(url: string): Promise<LightweightFetchResult> {
    try {
      const response = await httpGetText(url, {
        headers: this.headers,
        timeoutMs: this.timeoutMs,
        signal: this.options.signal,
      })
      if (!response.body) {
        return { success: false, url, error: "Empty response body" }
      }
      return { success: true, url, html: response.body }
    } catch (error) {
      return { success: false, url, error: sanitizeForError(getErrorMessage(error)) }
    }
  }
}
