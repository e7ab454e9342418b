import * as cheerio from "cheerio"

import { fieldsBuilder, fromText, queryDocument, selectAllText, selectText } from "./fields.js"
import type { BrowserInteraction } from "../fetch/types.js"
import type { ExtractedFields, SyncAdapter } from "./types.js"

const extractPracto = (html: string): ExtractedFields => {
  const $ = cheerio.load(html)
  const query = queryDocument($)
  const fields = fieldsBuilder()
    .set("name", selectText(query, "h1", "#container h1"))
    .set("clinic_name", selectText(query, "div.c-profile__clinic__name h2 a", ".c-profile--clinic__name"))
    .set("education", selectText(query, "#education p", "div.info-section p"))
    .set("experience", selectText(query, "#experience h2", "div.info-section h2"))
    .set(
      "speciality",
      selectText(
        query,
        ".u-d-inline-flex",
        "#container div span > h2",
        "#container div span",
        ".c-profile--doctor__speciality",
      ),
    )
    .set(
      "address",
      selectText(query, "div.c-profile--clinic__address", "div p.address", ".c-profile--clinic__address"),
    )
    .set("mci", selectText(query, "#registrations .pure-u-1", "#registrations div"))
    .set("passing_year", selectText(query, "#education span span"))
    .set("memberships", selectAllText(query, "#memberships .p-entity--list"))
    .set(
      "fees",
      selectText(
        query,
        "[data-qa-id='consultation_fee']",
        "#container div:nth-of-type(3) > div",
        ".c-profile--clinic__fee",
      ),
    )
    .set("timing", selectText(query, "[data-qa-id='timings_list']", "div.u-cushion--left"))
    .set("awards", selectAllText(query, "[id='awards and recognitions'] .pure-u-1"))
    .set("specializations", selectAllText(query, "#specializations .pure-u-1"))
    .set("full_education", selectAllText(query, "#education .pure-u-1"))
    .set("full_experience", selectAllText(query, "#experience .pure-u-1"))
    .set("registrations", selectAllText(query, "#registrations .pure-u-1"))
    .set("services", selectAllText(query, "#services .pure-u-1-3"))

  // One numbered group per distinct clinic name, starting at 1
  const seenClinics = new Set<string>()
  let index = 1
  for (const node of $(".c-profile--clinic--item").toArray()) {
    const clinic = $(node)
    const textWithin = (selector: string) => fromText(clinic.find(selector).first().text())
    const nameField = textWithin(".c-profile--clinic__name")
    const nameKey = nameField.kind === "present" ? nameField.value : ""
    if (seenClinics.has(nameKey)) {
      continue
    }
    seenClinics.add(nameKey)
    fields
      .set(`clinic__name${index}`, nameField)
      .set(`address${index}`, textWithin(".c-profile--clinic__address"))
      .set(`timing${index}`, textWithin(".u-cushion--left"))
      .set(`fee${index}`, textWithin("[data-qa-id='consultation_fee']"))
    index += 1
  }

  return fields.build()
}

export const practoAdapter: SyncAdapter = {
  kind: "sync",
  name: "practo",
  extract: (html) => extractPracto(html),
}

export const PRACTO_INTERACTION: BrowserInteraction = {
  waitSelectors: ["h1"],
  clickSelectors: [],
  scroll: true,
}
