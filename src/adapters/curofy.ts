import { fieldsBuilder, fromText, missing, present } from "./fields.js"
import type { FieldValue, SyncAdapter } from "./types.js"

const escapeRegExp = (value: string): string => value.replaceAll(/[.*+?^${}()|[\]\\]/g, String.raw`\$&`)

/**
 * Reads the first `"key":"value"` pair from the profile state the page embeds
 * as serialized JSON.
 */
export const readEmbeddedString = (source: string, key: string): FieldValue => {
  const pattern = new RegExp(String.raw`"${escapeRegExp(key)}"\s*:\s*"((?:[^"\\]|\\.)*)"`)
  const match = pattern.exec(source)
  if (!match) {
    return missing
  }
  return fromText(match[1])
}

export const curofyAdapter: SyncAdapter = {
  kind: "sync",
  name: "curofy",
  extract: (html) => {
    const username = readEmbeddedString(html, "alternate_username")
    return fieldsBuilder()
      .set("mci", readEmbeddedString(html, "mci_reg_no"))
      .set("phone", readEmbeddedString(html, "mob_no"))
      .set("name", readEmbeddedString(html, "display_name"))
      .set("speciality", readEmbeddedString(html, "specialty_name"))
      .set("alternate_email", username.kind === "present" ? present(`${username.value}@gmail.com`) : missing)
      .set("email", readEmbeddedString(html, "email"))
      .set("address", readEmbeddedString(html, "clinic_address"))
      .set("locality", readEmbeddedString(html, "locality"))
      .set("education", readEmbeddedString(html, "degrees"))
      .build()
  },
}
