import { fieldsBuilder, loadDocument, selectAllText, selectText } from "./fields.js"
import type { SyncAdapter } from "./types.js"

// Class names carry build hashes; they change whenever the site redeploys.
const CARD = {
  name: ".DoctorProfileCard_doctorName__MIyRL",
  speciality: ".DoctorProfileCard_specialty__NqwMO",
  experience: ".DoctorProfileCard_experience__Sc9lA",
  languages: ".DoctorProfileCard_languages__quMKs",
  clinicName: ".DoctorProfileCard_value__Dl2aa",
  address: ".DoctorProfileCard_address__9LhAg",
} as const

const SECTIONS = {
  registration: ".Sections_registration__efQuF p",
  education: ".Sections_education__F_ZfH p",
  conditions: ".Sections_conditions__WlGKt li",
  fee: ".slots_heading__1iC9I p",
  availability: ".slots_availabilityText__qX8fg",
} as const

export const apollo247Adapter: SyncAdapter = {
  kind: "sync",
  name: "apollo247",
  extract: (html) => {
    const query = loadDocument(html)
    return fieldsBuilder()
      .set("name", selectText(query, CARD.name))
      .set("speciality", selectText(query, CARD.speciality))
      .set("experience", selectText(query, CARD.experience))
      .set("Languages spoken", selectText(query, CARD.languages))
      .set("clinic_name", selectText(query, CARD.clinicName))
      .set("address", selectText(query, CARD.address))
      .set("mci", selectAllText(query, SECTIONS.registration))
      .set("full_education", selectAllText(query, SECTIONS.education))
      .set("services", selectAllText(query, SECTIONS.conditions))
      .set("fee", selectAllText(query, SECTIONS.fee))
      .set("timing", selectText(query, SECTIONS.availability))
      .build()
  },
}
