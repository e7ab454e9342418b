import { describe, expect, it } from "vitest"

import { curofyAdapter, readEmbeddedString } from "../../src/adapters/curofy.js"
import { missing, present } from "../../src/adapters/fields.js"
import { resolved } from "./resolve.js"

const STATE_PAGE = `
  <html>
    <body>
      <script>
        window.__STATE__ = {"doctor":{"display_name":"Dr Vik Shah","mob_no":"0000000000",
          "alternate_username":"vikshah","degrees":"MBBS, MD","mci_reg_no":"","locality":"Andheri"}}
      </script>
    </body>
  </html>
`

describe("readEmbeddedString", () => {
  it("reads the first value for a key", () => {
    expect(readEmbeddedString(`{"a": "one", "a": "two"}`, "a")).toEqual(present("one"))
  })

  it("is missing for absent keys and empty values", () => {
    expect(readEmbeddedString(`{"a":""}`, "a")).toEqual(missing)
    expect(readEmbeddedString(`{"a":"x"}`, "b")).toEqual(missing)
  })

  it("does not treat key characters as patterns", () => {
    expect(readEmbeddedString(`{"axb":"wrong","a.b":"right"}`, "a.b")).toEqual(present("right"))
  })
})

describe("curofy adapter", () => {
  it("maps the embedded profile state to fields", () => {
    expect(resolved(curofyAdapter.extract(STATE_PAGE, "https://curofy.com/vikshah"))).toEqual({
      mci: "NA",
      phone: "0000000000",
      name: "Dr Vik Shah",
      speciality: "NA",
      alternate_email: "vikshah@gmail.com",
      email: "NA",
      address: "NA",
      locality: "Andheri",
      education: "MBBS, MD",
    })
  })

  it("leaves the alternate email missing without a username", () => {
    const record = resolved(curofyAdapter.extract(`{"display_name":"Dr A"}`, "https://curofy.com/a"))

    expect(record.alternate_email).toBe("NA")
  })
})
