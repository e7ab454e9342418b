import { mkdir } from "node:fs/promises"
import { dirname } from "node:path"

import Database from "better-sqlite3"
import { drizzle } from "drizzle-orm/better-sqlite3"
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3"
import { asc, count, eq, inArray } from "drizzle-orm"
import { z } from "zod"

import * as schema from "./schema.js"
import type { CandidateSource, CandidateUrl, NormalizedRecord, RecordStore } from "../harvest/types.js"

// Tables are created in place; there is no migration history to replay.
const BOOTSTRAP_SQL = `
CREATE TABLE IF NOT EXISTS candidates (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  url TEXT NOT NULL,
  record_id TEXT,
  client_name TEXT,
  client_city TEXT,
  client_specialty TEXT
);
CREATE TABLE IF NOT EXISTS master_records (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  source_url TEXT NOT NULL UNIQUE,
  record_id TEXT NOT NULL,
  record_json TEXT NOT NULL,
  created_at TEXT NOT NULL
);
CREATE TABLE IF NOT EXISTS target_records (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  source_url TEXT NOT NULL UNIQUE,
  record_id TEXT NOT NULL,
  record_json TEXT NOT NULL,
  created_at TEXT NOT NULL
);
`

/** Bound on `IN (...)` list length for membership queries. */
const URL_QUERY_CHUNK = 500
const CANDIDATE_INSERT_CHUNK = 500

// Validates record_json we serialized ourselves
const normalizedRecordSchema = z
  .object({ source_url: z.string(), record_id: z.string() })
  .catchall(z.string())

const chunk = <T>(items: readonly T[], size: number): T[][] => {
  const chunks: T[][] = []
  for (let index = 0; index < items.length; index += size) {
    chunks.push(items.slice(index, index + size))
  }
  return chunks
}

type HarvestDb = BetterSQLite3Database<typeof schema>

export class HarvestDatabase {
  private constructor(
    readonly db: HarvestDb,
    private readonly sqlite: InstanceType<typeof Database>,
    readonly path: string,
  ) {}

  /** Factory: opens the file (WAL mode), creates missing tables, returns ready instance. */
  static async open(dbPath: string): Promise<HarvestDatabase> {
    if (dbPath !== ":memory:") {
      await mkdir(dirname(dbPath), { recursive: true })
    }
    const sqlite = new Database(dbPath)
    sqlite.pragma("journal_mode = WAL")
    sqlite.exec(BOOTSTRAP_SQL)
    return new HarvestDatabase(drizzle(sqlite, { schema }), sqlite, dbPath)
  }

  close(): void {
    this.sqlite.close()
  }
}

export class SqliteCandidateSource implements CandidateSource {
  constructor(private readonly database: HarvestDatabase) {}

  async count(): Promise<number> {
    const rows = await this.database.db.select({ value: count() }).from(schema.candidates)
    return rows.length > 0 ? rows[0].value : 0
  }

  /** Rows ordered by insertion id, so offsets stay stable while the table is unchanged. */
  async readPage(offset: number, limit: number): Promise<CandidateUrl[]> {
    const rows = await this.database.db
      .select()
      .from(schema.candidates)
      .orderBy(asc(schema.candidates.id))
      .limit(limit)
      .offset(offset)
    return rows.map((row) => ({
      url: row.url,
      recordId: row.recordId,
      clientName: row.clientName,
      clientCity: row.clientCity,
      clientSpecialty: row.clientSpecialty,
    }))
  }

  async insertMany(rows: readonly CandidateUrl[]): Promise<number> {
    for (const batch of chunk(rows, CANDIDATE_INSERT_CHUNK)) {
      await this.database.db.insert(schema.candidates).values(
        batch.map((row) => ({
          url: row.url,
          recordId: row.recordId,
          clientName: row.clientName,
          clientCity: row.clientCity,
          clientSpecialty: row.clientSpecialty,
        })),
      )
    }
    return rows.length
  }
}

export class SqliteRecordStore implements RecordStore {
  constructor(
    private readonly database: HarvestDatabase,
    private readonly table: schema.RecordTable,
    readonly name: string,
  ) {}

  static master(database: HarvestDatabase): SqliteRecordStore {
    return new SqliteRecordStore(database, schema.masterRecords, "master")
  }

  static target(database: HarvestDatabase): SqliteRecordStore {
    return new SqliteRecordStore(database, schema.targetRecords, "target")
  }

  async findExistingSourceUrls(urls: readonly string[]): Promise<Set<string>> {
    const found = new Set<string>()
    for (const batch of chunk([...new Set(urls)], URL_QUERY_CHUNK)) {
      const rows = await this.database.db
        .select({ sourceUrl: this.table.sourceUrl })
        .from(this.table)
        .where(inArray(this.table.sourceUrl, batch))
      for (const row of rows) {
        found.add(row.sourceUrl)
      }
    }
    return found
  }

  async insertOne(record: NormalizedRecord): Promise<void> {
    await this.database.db.insert(this.table).values(this.toRow(record))
  }

  /** One statement: a constraint violation on any row rejects the whole batch. */
  async insertMany(records: readonly NormalizedRecord[]): Promise<void> {
    if (records.length === 0) {
      return
    }
    await this.database.db.insert(this.table).values(records.map((record) => this.toRow(record)))
  }

  async count(): Promise<number> {
    const rows = await this.database.db.select({ value: count() }).from(this.table)
    return rows.length > 0 ? rows[0].value : 0
  }

  async findBySourceUrl(sourceUrl: string): Promise<NormalizedRecord | null> {
    const rows = await this.database.db
      .select({ recordJson: this.table.recordJson })
      .from(this.table)
      .where(eq(this.table.sourceUrl, sourceUrl))
      .limit(1)
    if (rows.length === 0) {
      return null
    }
    return normalizedRecordSchema.parse(JSON.parse(rows[0].recordJson))
  }

  private toRow(record: NormalizedRecord) {
    return {
      sourceUrl: record.source_url,
      recordId: record.record_id,
      recordJson: JSON.stringify(record),
      createdAt: new Date().toISOString(),
    }
  }
}
