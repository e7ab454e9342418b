import { describe, expect, it } from "vitest"

import { normalizeDomainKey, toDomainKey } from "../../src/utils/url.js"

describe("toDomainKey", () => {
  it("strips a leading www label", () => {
    expect(toDomainKey("https://www.practo.com/delhi/doctor/x")).toBe("practo.com")
  })

  it("keeps the last two labels of deeper hosts", () => {
    expect(toDomainKey("https://converse.rgcross.com/profile/7")).toBe("rgcross.com")
    expect(toDomainKey("http://m.Quickerala.COM/a")).toBe("quickerala.com")
  })

  it("returns the host unchanged when it has two labels", () => {
    expect(toDomainKey("https://healthfrog.in/doctor/1")).toBe("healthfrog.in")
  })

  it("returns null for unparseable input", () => {
    expect(toDomainKey("not a url")).toBeNull()
    expect(toDomainKey("")).toBeNull()
  })
})

describe("normalizeDomainKey", () => {
  it("trims, lowercases and drops www", () => {
    expect(normalizeDomainKey("  WWW.Drlogy.com ")).toBe("drlogy.com")
  })

  it("leaves other subdomains alone", () => {
    expect(normalizeDomainKey("converse.rgcross.com")).toBe("converse.rgcross.com")
  })
})
