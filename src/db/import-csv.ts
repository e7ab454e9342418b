import { readFile } from "node:fs/promises"

import { parse as parseCSV } from "csv-parse/sync"
import { z } from "zod"

import type { CandidateUrl } from "../harvest/types.js"

const csvRowsSchema = z.array(z.record(z.string(), z.string()))

// Accepted header spellings per column, first match wins
const COLUMN_ALIASES = {
  url: ["url", "link"],
  recordId: ["record_id", "Record_id"],
  clientName: ["client_name", "Client_Name"],
  clientCity: ["client_city", "City"],
  clientSpecialty: ["client_specialty", "Specialty"],
} as const

export interface CandidateCsv {
  rows: CandidateUrl[]
  /** Rows with no URL in any accepted column. */
  skipped: number
}

const pick = (row: Record<string, string>, aliases: readonly string[]): string | null => {
  for (const alias of aliases) {
    const value = row[alias]?.trim()
    if (value) {
      return value
    }
  }
  return null
}

export const parseCandidateCsv = (text: string): CandidateCsv => {
  const records = csvRowsSchema.parse(
    parseCSV(text, {
      columns: true,
      skip_empty_lines: true,
      bom: true,
    }),
  )

  const rows: CandidateUrl[] = []
  let skipped = 0
  for (const record of records) {
    const url = pick(record, COLUMN_ALIASES.url)
    if (!url) {
      skipped += 1
      continue
    }
    rows.push({
      url,
      recordId: pick(record, COLUMN_ALIASES.recordId),
      clientName: pick(record, COLUMN_ALIASES.clientName),
      clientCity: pick(record, COLUMN_ALIASES.clientCity),
      clientSpecialty: pick(record, COLUMN_ALIASES.clientSpecialty),
    })
  }
  return { rows, skipped }
}

export const readCandidateCsv = async (path: string): Promise<CandidateCsv> =>
  parseCandidateCsv(await readFile(path, "utf-8"))
