import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core"

export const candidates = sqliteTable("candidates", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  url: text("url").notNull(),
  recordId: text("record_id"),
  clientName: text("client_name"),
  clientCity: text("client_city"),
  clientSpecialty: text("client_specialty"),
})

// Master and target stores share one shape; source_url is the processed marker
const recordTable = (name: string) =>
  sqliteTable(name, {
    id: integer("id").primaryKey({ autoIncrement: true }),
    sourceUrl: text("source_url").notNull().unique(),
    recordId: text("record_id").notNull(),
    recordJson: text("record_json").notNull(), // JSON-serialized NormalizedRecord
    createdAt: text("created_at").notNull(), // ISO timestamp
  })

export const masterRecords = recordTable("master_records")
export const targetRecords = recordTable("target_records")

export type RecordTable = typeof masterRecords
