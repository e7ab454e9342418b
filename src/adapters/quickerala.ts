import { fieldsBuilder, loadDocument, selectText } from "./fields.js"
import type { SyncAdapter } from "./types.js"

export const quickeralaAdapter: SyncAdapter = {
  kind: "sync",
  name: "quickerala",
  extract: (html) => {
    const query = loadDocument(html)
    return fieldsBuilder()
      .set("name", selectText(query, "div.c-left h2"))
      .set("education", selectText(query, "div.c-left div > span"))
      .set("speciality", selectText(query, "div.c-left span"))
      .set("clinic_name", selectText(query, "div.c-right h4"))
      .set("address", selectText(query, "div.c-right p"))
      .build()
  },
}
