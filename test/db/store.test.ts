import { mkdtemp, rm } from "node:fs/promises"
import { join } from "node:path"
import { tmpdir } from "node:os"
import { afterEach, beforeEach, describe, expect, it } from "vitest"

import { HarvestDatabase, SqliteCandidateSource, SqliteRecordStore } from "../../src/db/store.js"
import type { CandidateUrl, NormalizedRecord } from "../../src/harvest/types.js"

const makeRecord = (url: string, overrides: Record<string, string> = {}): NormalizedRecord => ({
  source_url: url,
  name: "Dr Test",
  phone: "NA",
  record_id: "R1",
  client_name: "NA",
  client_city: "Pune",
  client_specialty: "NA",
  ...overrides,
})

const makeCandidate = (url: string, recordId: string | null = null): CandidateUrl => ({
  url,
  recordId,
  clientName: null,
  clientCity: "Pune",
  clientSpecialty: null,
})

describe("SqliteRecordStore", () => {
  let tmpDir: string
  let dbPath: string

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "harvest-store-test-"))
    dbPath = join(tmpDir, "nested", "harvest.db")
  })

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true })
  })

  it("creates the database directory and empty tables", async () => {
    const database = await HarvestDatabase.open(dbPath)
    const store = SqliteRecordStore.target(database)

    expect(await store.count()).toBe(0)
    expect(await new SqliteCandidateSource(database).count()).toBe(0)
    database.close()
  })

  it("round-trips a record", async () => {
    const database = await HarvestDatabase.open(dbPath)
    const store = SqliteRecordStore.master(database)
    const record = makeRecord("https://a.com/1")

    await store.insertOne(record)
    const loaded = await store.findBySourceUrl("https://a.com/1")

    expect(loaded).toEqual(record)
    expect(await store.findBySourceUrl("https://a.com/404")).toBeNull()
    database.close()
  })

  it("reports which URLs are already stored", async () => {
    const database = await HarvestDatabase.open(dbPath)
    const store = SqliteRecordStore.target(database)
    await store.insertMany([makeRecord("https://a.com/1"), makeRecord("https://a.com/2")])

    const found = await store.findExistingSourceUrls(["https://a.com/2", "https://a.com/3", "https://a.com/2"])

    expect([...found]).toEqual(["https://a.com/2"])
    expect(await store.findExistingSourceUrls([])).toEqual(new Set())
    database.close()
  })

  it("rejects a duplicate source_url", async () => {
    const database = await HarvestDatabase.open(dbPath)
    const store = SqliteRecordStore.master(database)
    await store.insertOne(makeRecord("https://a.com/1"))

    await expect(store.insertOne(makeRecord("https://a.com/1"))).rejects.toThrow()
    expect(await store.count()).toBe(1)
    database.close()
  })

  it("writes nothing from a batch containing a duplicate", async () => {
    const database = await HarvestDatabase.open(dbPath)
    const store = SqliteRecordStore.target(database)
    await store.insertOne(makeRecord("https://a.com/1"))

    await expect(
      store.insertMany([makeRecord("https://a.com/2"), makeRecord("https://a.com/1")]),
    ).rejects.toThrow()
    expect(await store.count()).toBe(1)
    database.close()
  })

  it("keeps master and target rows apart", async () => {
    const database = await HarvestDatabase.open(dbPath)
    const master = SqliteRecordStore.master(database)
    const target = SqliteRecordStore.target(database)

    await master.insertOne(makeRecord("https://a.com/1"))

    expect(await master.count()).toBe(1)
    expect(await target.count()).toBe(0)
    expect(master.name).toBe("master")
    expect(target.name).toBe("target")
    database.close()
  })

  it("persists across close and reopen", async () => {
    const first = await HarvestDatabase.open(dbPath)
    await SqliteRecordStore.target(first).insertOne(makeRecord("https://a.com/1"))
    first.close()

    const second = await HarvestDatabase.open(dbPath)
    expect(await SqliteRecordStore.target(second).count()).toBe(1)
    second.close()
  })
})

describe("SqliteCandidateSource", () => {
  it("pages rows in insertion order", async () => {
    const database = await HarvestDatabase.open(":memory:")
    const source = new SqliteCandidateSource(database)
    const inserted = await source.insertMany([
      makeCandidate("https://a.com/1", "R1"),
      makeCandidate("https://a.com/2"),
      makeCandidate("https://a.com/3"),
    ])

    expect(inserted).toBe(3)
    expect(await source.count()).toBe(3)
    expect(await source.readPage(1, 5)).toEqual([makeCandidate("https://a.com/2"), makeCandidate("https://a.com/3")])
    expect((await source.readPage(0, 1))[0]).toEqual(makeCandidate("https://a.com/1", "R1"))
    expect(await source.readPage(3, 5)).toEqual([])
    database.close()
  })
})
