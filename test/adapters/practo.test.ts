import { describe, expect, it } from "vitest"

import { practoAdapter } from "../../src/adapters/practo.js"
import { resolved } from "./resolve.js"

const PROFILE = `
  <html>
    <body>
      <div id="container"><h1>Dr Asha Rao</h1></div>
      <div class="c-profile--clinic--item">
        <h2 class="c-profile--clinic__name">Rao Dental Care</h2>
        <p class="c-profile--clinic__address">12 Lake Road</p>
        <div class="u-cushion--left">Mon-Fri 10:00-13:00</div>
        <span data-qa-id="consultation_fee">Rs 500</span>
      </div>
      <div class="c-profile--clinic--item">
        <h2 class="c-profile--clinic__name">Rao Dental Care</h2>
        <p class="c-profile--clinic__address">Listed twice</p>
      </div>
      <div class="c-profile--clinic--item">
        <h2 class="c-profile--clinic__name">City Smiles</h2>
        <p class="c-profile--clinic__address">4 Hill Street</p>
      </div>
      <div id="services">
        <div class="pure-u-1-3">Root Canal</div>
        <div class="pure-u-1-3">Braces</div>
      </div>
    </body>
  </html>
`

describe("practo adapter", () => {
  it("reads the profile header fields", () => {
    const record = resolved(practoAdapter.extract(PROFILE, "https://www.practo.com/x"))

    expect(record).toMatchObject({
      name: "Dr Asha Rao",
      clinic_name: "Rao Dental Care",
      address: "12 Lake Road",
      timing: "Mon-Fri 10:00-13:00",
      fees: "Rs 500",
      speciality: "NA",
      services: "Root Canal, Braces",
    })
  })

  it("numbers one group of fields per distinct clinic", () => {
    const record = resolved(practoAdapter.extract(PROFILE, "https://www.practo.com/x"))

    expect(record).toMatchObject({
      clinic__name1: "Rao Dental Care",
      address1: "12 Lake Road",
      timing1: "Mon-Fri 10:00-13:00",
      fee1: "Rs 500",
      clinic__name2: "City Smiles",
      address2: "4 Hill Street",
      timing2: "NA",
      fee2: "NA",
    })
    expect(record).not.toHaveProperty("clinic__name3")
  })

  it("marks everything missing on an unrelated page", () => {
    const record = resolved(practoAdapter.extract("<html><body><p>Not found</p></body></html>", "https://x"))

    expect(Object.values(record).every((value) => value === "NA")).toBe(true)
    expect(record).not.toHaveProperty("clinic__name1")
  })
})
