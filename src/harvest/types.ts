// ── Candidate source rows ───────────────────────────────────────────

export interface CandidateUrl {
  url: string
  recordId: string | null
  clientName: string | null
  clientCity: string | null
  clientSpecialty: string | null
}

// ── Normalized output ───────────────────────────────────────────────

/** Sentinel written for every field an adapter could not locate. */
export const MISSING_VALUE = "NA"

/**
 * Flat field mapping produced for one URL. Key order is insertion order:
 * `source_url`, adapter fields, then the candidate metadata.
 */
export type NormalizedRecord = Readonly<{ source_url: string; record_id: string } & Record<string, string>>

// ── Store contracts ─────────────────────────────────────────────────

export interface CandidateSource {
  count(): Promise<number>
  readPage(offset: number, limit: number): Promise<CandidateUrl[]>
}

export interface RecordStore {
  readonly name: string
  /** Subset of `urls` already present in the store, keyed by `source_url`. */
  findExistingSourceUrls(urls: readonly string[]): Promise<Set<string>>
  insertOne(record: NormalizedRecord): Promise<void>
  insertMany(records: readonly NormalizedRecord[]): Promise<void>
}

// ── Logging ─────────────────────────────────────────────────────────

export type VerboseLog = (scope: string, message: string) => void

export interface HarvestLogger {
  verbose: VerboseLog
  warn(message: string): void
}

export const silentLogger: HarvestLogger = {
  verbose: () => undefined,
  warn: () => undefined,
}

// ── Error model ─────────────────────────────────────────────────────

export type HarvestErrorCode =
  | "UNREGISTERED_DOMAIN"
  | "FETCH_FAILED"
  | "EXTRACT_FAILED"
  | "STORE_WRITE_FAILED"

export interface HarvestError {
  code: HarvestErrorCode
  step: "dispatch" | "fetch" | "extract" | "master-insert" | "target-insert" | "record-sink"
  /** URL of the failing candidate, or null for batch-level failures. */
  target: string | null
  /** Human-readable message. Never contains auth tokens or API keys. */
  message: string
}

const SENSITIVE_PARAM_NAMES = new Set([
  "apikey",
  "api_key",
  "token",
  "auth",
  "key",
  "secret",
  "password",
  "access_token",
  "bearer",
])

const MAX_MESSAGE_LENGTH = 200

/**
 * Strip sensitive query parameters and auth tokens from a URL or message
 * before including it in a HarvestError.
 */
export const sanitizeForError = (input: string): string => {
  let cleaned = input.replaceAll(/\b(Bearer|Basic)\s+[A-Za-z0-9\-._~+/]+=*/gi, "$1 [REDACTED]")

  try {
    const url = new URL(cleaned)
    let hasSensitive = false
    for (const key of url.searchParams.keys()) {
      if (SENSITIVE_PARAM_NAMES.has(key.toLowerCase())) {
        url.searchParams.set(key, "[REDACTED]")
        hasSensitive = true
      }
    }
    if (hasSensitive) {
      cleaned = url.toString()
    }
  } catch {
    // Not a bare URL: redact inline query strings instead
    cleaned = cleaned.replaceAll(
      /([?&])(apikey|api_key|token|auth|key|secret|password|access_token|bearer)=[^&\s]*/gi,
      "$1$2=[REDACTED]",
    )
  }

  if (cleaned.length > MAX_MESSAGE_LENGTH) {
    return `${cleaned.slice(0, MAX_MESSAGE_LENGTH - 3)}...`
  }
  return cleaned
}

export const getErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}

export const toHarvestError = (
  code: HarvestErrorCode,
  step: HarvestError["step"],
  target: string | null,
  error: unknown,
): HarvestError => ({
  code,
  step,
  target,
  message: sanitizeForError(getErrorMessage(error)),
})
