import type { AdapterEntry } from "../adapters/types.js"
import { normalizeDomainKey, toDomainKey } from "../utils/url.js"

export class DuplicateAdapterError extends Error {
  constructor(readonly domainKey: string) {
    super(`Adapter already registered for domain "${domainKey}"`)
    this.name = "DuplicateAdapterError"
  }
}

export interface AdapterRegistry {
  /** Exact match on a normalized domain key. */
  lookup(domainKey: string): AdapterEntry | null
  resolve(url: string): AdapterEntry | null
  domainKeys(): string[]
}

export const createAdapterRegistry = (entries: readonly AdapterEntry[]): AdapterRegistry => {
  const table = new Map<string, AdapterEntry>()
  for (const entry of entries) {
    const domainKey = normalizeDomainKey(entry.domainKey)
    if (table.has(domainKey)) {
      throw new DuplicateAdapterError(domainKey)
    }
    table.set(domainKey, Object.freeze({ ...entry, domainKey }))
  }

  const lookup = (domainKey: string): AdapterEntry | null => table.get(normalizeDomainKey(domainKey)) ?? null

  return Object.freeze({
    lookup,
    resolve: (url: string) => {
      const domainKey = toDomainKey(url)
      return domainKey === null ? null : lookup(domainKey)
    },
    domainKeys: () => [...table.keys()],
  })
}
