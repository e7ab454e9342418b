import { describe, expect, it } from "vitest"

import {
  fieldsBuilder,
  fromText,
  loadDocument,
  missing,
  normalizeSpaces,
  present,
  resolveFieldValue,
  selectAllText,
  selectNth,
  selectText,
} from "../../src/adapters/fields.js"

describe("normalizeSpaces", () => {
  it("collapses newlines, tabs and non-breaking spaces", () => {
    expect(normalizeSpaces("  Dr\n\tAsha\u00a0 Rao \r")).toBe("Dr Asha Rao")
  })
})

describe("fromText", () => {
  it("is missing for null, undefined and blank text", () => {
    expect(fromText(null)).toEqual(missing)
    expect(fromText(undefined)).toEqual(missing)
    expect(fromText(" \n ")).toEqual(missing)
  })

  it("is present for non-blank text", () => {
    expect(fromText(" MBBS ")).toEqual(present("MBBS"))
  })
})

describe("resolveFieldValue", () => {
  it("writes NA for missing values and keeps present ones", () => {
    expect(resolveFieldValue(missing)).toBe("NA")
    expect(resolveFieldValue(present("Rs 500"))).toBe("Rs 500")
  })
})

describe("selectors", () => {
  const query = loadDocument(`
    <div class="a">   </div>
    <p class="b">Second choice</p>
    <ul>
      <li>One</li>
      <li></li>
      <li>Two</li>
    </ul>
  `)

  it("falls through selectors until one yields text", () => {
    expect(selectText(query, ".a", ".b")).toEqual(present("Second choice"))
    expect(selectText(query, ".a", ".nothing")).toEqual(missing)
  })

  it("joins every non-empty match", () => {
    expect(selectAllText(query, "li")).toEqual(present("One, Two"))
    expect(selectAllText(query, "dd")).toEqual(missing)
  })

  it("reads the n-th match", () => {
    expect(selectNth(query, "li", 2)).toEqual(present("Two"))
    expect(selectNth(query, "li", 1)).toEqual(missing)
    expect(selectNth(query, "li", 5)).toEqual(missing)
  })
})

describe("fieldsBuilder", () => {
  it("keeps first-insertion order when a field is replaced", () => {
    const fields = fieldsBuilder().set("name", missing).set("phone", present("1")).set("name", present("Dr A"))

    expect(fields.build()).toEqual([
      ["name", present("Dr A")],
      ["phone", present("1")],
    ])
  })

  it("only fills missing values with setIfMissing", () => {
    const fields = fieldsBuilder()
      .set("name", present("Dr A"))
      .set("phone", missing)
      .setIfMissing("name", present("Dr B"))
      .setIfMissing("phone", present("2"))
      .setIfMissing("email", missing)

    expect(fields.get("name")).toEqual(present("Dr A"))
    expect(fields.get("phone")).toEqual(present("2"))
    expect(fields.get("email")).toEqual(missing)
    expect(fields.get("unknown")).toEqual(missing)
    expect(fields.build().map(([name]) => name)).toEqual(["name", "phone", "email"])
  })
})
