import { afterEach, describe, expect, it, vi } from "vitest"

import { LightweightFetcher } from "../../src/fetch/lightweight.js"

const URL_Q = "https://quickerala.com/doc/1"

const stubFetch = (respond: () => Promise<Response>) => {
  const fetchMock = vi.fn((_input: string, _init?: RequestInit) => respond())
  vi.stubGlobal("fetch", fetchMock)
  return fetchMock
}

describe("LightweightFetcher", () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it("returns markup on a 2xx response", async () => {
    stubFetch(() => Promise.resolve(new Response("<h2>Dr Q</h2>", { status: 200 })))
    const fetcher = new LightweightFetcher({ userAgent: "test-agent" })

    await expect(fetcher.fetch(URL_Q)).resolves.toEqual({ success: true, url: URL_Q, html: "<h2>Dr Q</h2>" })
  })

  it("sends the user agent and disables caching", async () => {
    const fetchMock = stubFetch(() => Promise.resolve(new Response("ok", { status: 200 })))
    const fetcher = new LightweightFetcher({ userAgent: "test-agent" })

    await fetcher.fetch(URL_Q)

    expect(fetchMock).toHaveBeenCalledTimes(1)
    const init = fetchMock.mock.calls[0][1]
    expect(init?.method).toBe("GET")
    expect(init?.headers).toEqual({
      "cache-control": "no-cache",
      pragma: "no-cache",
      accept: "text/html,application/xhtml+xml",
      "user-agent": "test-agent",
    })
  })

  it("turns a non-2xx status into a failed result", async () => {
    stubFetch(() => Promise.resolve(new Response("gone", { status: 503 })))
    const fetcher = new LightweightFetcher({ userAgent: "test-agent" })

    await expect(fetcher.fetch(URL_Q)).resolves.toEqual({
      success: false,
      url: URL_Q,
      error: `HTTP 503 on GET ${URL_Q}`,
    })
  })

  it("turns a network error into a failed result", async () => {
    stubFetch(() => Promise.reject(new TypeError("fetch failed")))
    const fetcher = new LightweightFetcher({ userAgent: "test-agent" })

    await expect(fetcher.fetch(URL_Q)).resolves.toEqual({ success: false, url: URL_Q, error: "fetch failed" })
  })

  it("treats an empty body as a failure", async () => {
    stubFetch(() => Promise.resolve(new Response("", { status: 200 })))
    const fetcher = new LightweightFetcher({ userAgent: "test-agent" })

    await expect(fetcher.fetch(URL_Q)).resolves.toEqual({
      success: false,
      url: URL_Q,
      error: "Empty response body",
    })
  })
})
