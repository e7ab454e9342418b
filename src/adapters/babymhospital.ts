import { getErrorMessage } from "../harvest/types.js"
import { fieldsBuilder, fromText, loadDocument, missing, present, selectAllText, selectText } from "./fields.js"
import type { TextQuery } from "./fields.js"
import type { InteractiveAdapter } from "./types.js"

export const ACCORDION_SECTIONS = ["Qualification", "Work Experience", "Research", "Publications", "Awards"] as const

const CLICK_TIMEOUT_MS = 5_000
const SECTION_SETTLE_MS = 1_000
const HOSPITAL_NAME = "Baby Memorial Hospital"
const ROOT = "div.container > div.tab_container"

// Reads inside the tab container when the page has one, else from the whole document
const scopedQuery = (query: TextQuery): TextQuery => {
  if (query(ROOT).length === 0) {
    return query
  }
  return (selector) => query(`${ROOT} ${selector}`)
}

const accordionBody = (section: string): string => `div.item:has(a:contains('${section}')) div.inner`

export const babymhospitalAdapter: InteractiveAdapter = {
  kind: "interactive",
  name: "babymhospital",
  extract: async (page, url, log) => {
    for (const section of ACCORDION_SECTIONS) {
      try {
        await page.locator(`text=${section}`).click({ timeout: CLICK_TIMEOUT_MS })
        await page.waitForTimeout(SECTION_SETTLE_MS)
      } catch (error) {
        log("babymhospital", `Could not expand "${section}" on ${url}: ${getErrorMessage(error)}`)
      }
    }

    const query = scopedQuery(loadDocument(await page.content()))
    const name = selectText(query, "#tab1 > div.tat-det > h5")
    const speciality = selectText(query, "#tab1 > div.tat-det > p.dr-postion:nth-of-type(1)")
    const education = selectText(query, accordionBody("Qualification"))
    const experience = selectText(query, accordionBody("Work Experience"))
    const address = selectText(query, "div.address-block p")
    const timing = fromText(query("div.doc-img > div.opening-times > ul").at(0))

    return fieldsBuilder()
      .set("name", name)
      .set("clinic_name", present(HOSPITAL_NAME))
      .set("education", education)
      .set("experience", experience)
      .set("speciality", speciality)
      .set("address", address)
      .set("mci", missing)
      .set("passing_year", missing)
      .set("memberships", missing)
      .set("fees", missing)
      .set("timing", timing)
      .set("awards", selectAllText(query, accordionBody("Awards")))
      .set("research", selectText(query, accordionBody("Research")))
      .set("publications", selectText(query, accordionBody("Publications")))
      .set("specializations", speciality)
      .set("full_education", education)
      .set("full_experience", experience)
      .set("registrations", missing)
      .set("services", missing)
      .set("clinic__name1", present(HOSPITAL_NAME))
      .set("address1", address)
      .set("timing1", timing)
      .set("fee1", missing)
      .build()
  },
}
