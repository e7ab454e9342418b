import type { BrowserInteraction, BrowserPage } from "../fetch/types.js"
import type { VerboseLog } from "../harvest/types.js"

export type FieldValue = { kind: "present"; value: string } | { kind: "missing" }

export type ExtractedFields = ReadonlyArray<readonly [name: string, value: FieldValue]>

/** Extraction routine over static markup. */
export interface SyncAdapter {
  readonly kind: "sync"
  readonly name: string
  extract(html: string, url: string): ExtractedFields
}

/** Extraction routine driving a live page (expanding sections before reading). */
export interface InteractiveAdapter {
  readonly kind: "interactive"
  readonly name: string
  extract(page: BrowserPage, url: string, log: VerboseLog): Promise<ExtractedFields>
}

export type SiteAdapter = SyncAdapter | InteractiveAdapter

export type AdapterEntry =
  | { domainKey: string; strategy: "lightweight"; adapter: SyncAdapter }
  | {
      domainKey: string
      strategy: "browser"
      adapter: SiteAdapter
      interaction?: BrowserInteraction
    }

export type FetchStrategy = AdapterEntry["strategy"]
