const WWW_PREFIX = "www."

/**
 * Normalizes a registry key or host name: trimmed, lowercased, one leading
 * `www.` label removed.
 */
export const normalizeDomainKey = (value: string): string => {
  const lowered = value.trim().toLowerCase()
  return lowered.startsWith(WWW_PREFIX) ? lowered.slice(WWW_PREFIX.length) : lowered
}

/**
 * Dispatch key for a URL: the last two dot-separated labels of its host.
 * `https://www.practo.com/x` and `https://m.practo.com/y` both give `practo.com`.
 */
export const toDomainKey = (url: string): string | null => {
  let host: string
  try {
    host = new URL(url.trim()).hostname
  } catch {
    return null
  }
  const labels = normalizeDomainKey(host)
    .split(".")
    .filter((label) => label.length > 0)
  if (labels.length === 0) {
    return null
  }
  return labels.slice(-2).join(".")
}
