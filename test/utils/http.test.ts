import { describe, expect, it } from "vitest"

import { mergeHeaders } from "../../src/utils/http.js"

describe("mergeHeaders", () => {
  it("lets later sets override earlier ones regardless of case", () => {
    expect(mergeHeaders({ "User-Agent": "a", Accept: "text/html" }, undefined, { "user-agent": "b" })).toEqual({
      "user-agent": "b",
      accept: "text/html",
    })
  })
})
