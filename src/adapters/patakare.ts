import { fieldsBuilder, loadDocument, selectText } from "./fields.js"
import type { SyncAdapter } from "./types.js"

const PROFILE_BLOCK = "div.container > div.row > div > div"
const CONTACT_BLOCK = "div.row > div > div > div > div"

export const patakareAdapter: SyncAdapter = {
  kind: "sync",
  name: "patakare",
  extract: (html) => {
    const query = loadDocument(html)
    return fieldsBuilder()
      .set("name", selectText(query, `${PROFILE_BLOCK} h1`))
      .set("phone", selectText(query, `${CONTACT_BLOCK} > p:nth-of-type(2)`))
      .set("speciality", selectText(query, `${PROFILE_BLOCK} p:nth-of-type(2)`))
      .set("email", selectText(query, `${CONTACT_BLOCK} > p:nth-of-type(2) a`))
      .set("address", selectText(query, `${PROFILE_BLOCK} p:nth-of-type(5)`))
      .build()
  },
}
