import * as cheerio from "cheerio"

import { fieldsBuilder, fromText, queryDocument, selectNth, selectText } from "./fields.js"
import type { FieldsBuilder } from "./fields.js"
import type { FieldValue, SyncAdapter } from "./types.js"

// Section heading keyword → output field
const SECTION_FIELDS: ReadonlyArray<readonly [keyword: string, field: string]> = [
  ["registration", "mci"],
  ["education", "full_education"],
  ["language", "Languages spoken"],
  ["services", "services"],
  ["specialization", "specializations"],
]

const assignSection = (fields: FieldsBuilder, label: string, value: FieldValue): void => {
  const lowered = label.toLowerCase()
  const match = SECTION_FIELDS.find(([keyword]) => lowered.includes(keyword))
  if (match) {
    fields.set(match[1], value)
  }
}

export const drlogyAdapter: SyncAdapter = {
  kind: "sync",
  name: "drlogy",
  extract: (html) => {
    const $ = cheerio.load(html)
    const query = queryDocument($)
    const fields = fieldsBuilder()
      .set("name", selectText(query, ".hph1"))
      .set("education", selectNth(query, ".hph2", 0))
      .set("speciality", selectNth(query, ".hph2", 1))
      .set("experience", selectText(query, ".hpd-v"))
      .set("Services Provided", selectText(query, ".hpd-v1"))

    // Detail blocks pair the n-th heading with the n-th list
    const headings = query(".dtls-pra h4")
    const lists = query(".dtls-pra ul")
    for (const [index, label] of headings.entries()) {
      assignSection(fields, label, fromText(lists.at(index)))
    }

    for (const node of $(".hph-2.view-all-par").toArray()) {
      const section = $(node)
      const label = section.find("h2").first().text()
      if (!label) {
        continue
      }
      const items = section
        .find("ul li")
        .toArray()
        .map((item) => $(item).text())
      assignSection(fields, label, fromText(items.map((item) => item.trim()).filter(Boolean).join(", ")))
    }

    const timings = query(".dr-hp .dr-fee p")
    const fees = query(".dr-hp .dr-tim p")
    return fields
      .set("clinic_name", selectText(query, ".dr-hp .hp-h-2"))
      .set("address", selectText(query, ".dr-hp .pc-docs-adress"))
      .set("timing", fromText(timings.join(", ")))
      .set("fees", fromText(fees.join(", ")))
      .build()
  },
}
