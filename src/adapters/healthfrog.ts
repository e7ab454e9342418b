import { fieldsBuilder, loadDocument, selectText } from "./fields.js"
import type { SyncAdapter } from "./types.js"

export const healthfrogAdapter: SyncAdapter = {
  kind: "sync",
  name: "healthfrog",
  extract: (html) => {
    const query = loadDocument(html)
    return fieldsBuilder()
      .set("name", selectText(query, "div.col-sm-9 > div:nth-of-type(1)"))
      .set("address", selectText(query, "div.col-sm-9 > div:nth-of-type(2) div p:nth-of-type(1)"))
      .set("phone", selectText(query, "div.col-sm-9 > div:nth-of-type(2) div p:nth-of-type(3)"))
      .build()
  },
}
