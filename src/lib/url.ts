/**
 * URL checks shared by the services and the CLI.
 */

/** Hosts of the archives themselves — submitting these would archive an archive. */
export const EXCLUDED_DOMAINS: ReadonlySet<string> = new Set([
  'archive.is',
  'archive.org',
  'archive.ph',
  'archive.today',
  'web.archive.org',
])

function parseUrl(raw: string): URL | null {
  try {
    return new URL(raw)
  } catch {
    return null
  }
}

/** True for a syntactically valid absolute http(s) URL with a host */
export function isAbsoluteHttpUrl(raw: string): boolean {
  const url = parseUrl(raw)
  if (!url) return false
  return (url.protocol === 'http:' || url.protocol === 'https:') && url.hostname !== ''
}

/** True when the URL points at one of the archive hosts */
export function isExcludedUrl(raw: string): boolean {
  const url = parseUrl(raw)
  return url !== null && EXCLUDED_DOMAINS.has(url.hostname.toLowerCase())
}

/** Drop trailing slashes so paths can be appended */
export function trimBaseUrl(base: string): string {
  return base.replace(/\/+$/, '')
}
