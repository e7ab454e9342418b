export type HttpHeaders = Record<string, string>

export interface HttpTextResponse {
  status: number
  contentType: string
  /** Final URL after redirects. */
  url: string
  body: string
}

export interface HttpGetOptions {
  timeoutMs: number
  headers: HttpHeaders
  signal?: AbortSignal
}

/** Later sets win; names are compared case-insensitively and emitted lowercase. */
export const mergeHeaders = (...sets: ReadonlyArray<HttpHeaders | undefined>): HttpHeaders => {
  const merged: HttpHeaders = {}
  for (const set of sets) {
    for (const [name, value] of Object.entries(set ?? {})) {
      merged[name.toLowerCase()] = value
    }
  }
  return merged
}

const requestSignal = (timeoutMs: number, signal?: AbortSignal): AbortSignal => {
  const timeout = AbortSignal.timeout(timeoutMs)
  return signal ? AbortSignal.any([timeout, signal]) : timeout
}

export const httpGetText = async (url: string, options: HttpGetOptions): Promise<HttpTextResponse> => {
  const response = await fetch(url, {
    method: "GET",
    headers: options.headers,
    redirect: "follow",
    signal: requestSignal(options.timeoutMs, options.signal),
  })
  if (!response.ok) {
    throw new Error(`HTTP ${response.status} on GET ${url}`)
  }
  return {
    status: response.status,
    contentType: response.headers.get("content-type") ?? "",
    url: response.url,
    body: await response.text(),
  }
}
