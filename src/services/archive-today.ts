/**
 * archive.today adapter.
 *
 * POSTs the target to /submit/ as a form. archive.today answers in one of
 * three ways, checked in this order:
 *   - a redirect whose Location is the snapshot (page already archived)
 *   - a Refresh header pointing at /wip/<id> (capture in progress)
 *   - an HTML page carrying the snapshot short link or a /wip/ link
 */

import { trimBaseUrl } from '../lib/url.js'
import { BaseArchiveService, resolveLink, type ProviderRequest, type ServiceOptions } from './base-service.js'

export interface ArchiveTodayOptions extends ServiceOptions {
  /** Mirror to submit to, e.g. https://archive.ph */
  baseUrl: string
}

const ARCHIVE_TODAY_HOSTS = 'archive\\.(?:today|ph|is|li|vn|fo|md)'

/** /<short id>, /wip/<id> or /<14-digit timestamp>/<original url> */
const SNAPSHOT_PATH = /^\/(?:[A-Za-z0-9]{5}\/?$|wip\/[A-Za-z0-9]+\/?$|\d{14}\/\S+)/

export class ArchiveTodayService extends BaseArchiveService {
  readonly name = 'archivetoday' as const
  readonly label = 'archive.today'

  private readonly baseUrl: string

  constructor(options: ArchiveTodayOptions) {
    super(options)
    this.baseUrl = trimBaseUrl(options.baseUrl)
  }

  protected buildRequest(targetUrl: string): ProviderRequest {
    return {
      url: `${this.baseUrl}/submit/`,
      init: {
        method: 'POST',
        headers: { 'content-type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({ url: targetUrl, anyway: '1' }).toString(),
      },
    }
  }

  protected async extractArchiveUrl(res: Response): Promise<string | null> {
    const location = res.headers.get('location')
    if (location) {
      const link = this.snapshotLink(location)
      if (link) return link
    }

    const refresh = res.headers.get('refresh')?.match(/url=(.+)$/i)
    if (refresh) {
      const link = this.snapshotLink(refresh[1])
      if (link) return link
    }

    return parseArchiveLink(await res.text(), this.baseUrl)
  }

  /** Absolute snapshot URL for a link, or null for the homepage, /submit/, captcha pages and the like */
  private snapshotLink(value: string): string | null {
    const link = resolveLink(value, this.baseUrl)
    return link && SNAPSHOT_PATH.test(new URL(link).pathname) ? link : null
  }
}

/**
 * Find the snapshot link in an archive.today HTML page.
 * Regex parsing: the pages are small and their markup is stable.
 */
export function parseArchiveLink(html: string, baseUrl: string): string | null {
  if (!html) return null

  // Snapshot page: <input id="SHARE_SHORTLINK" ... value="https://archive.ph/AbCdE">
  const inputRegex = /<input\b[^>]*>/gi
  let match: RegExpExecArray | null
  while ((match = inputRegex.exec(html)) !== null) {
    const tag = match[0]
    if (!/id=["']SHARE_SHORTLINK["']/i.test(tag)) continue
    const value = tag.match(/value=["']([^"']+)["']/i)?.[1]
    const link = value ? resolveLink(value, baseUrl) : null
    if (link) return link
  }

  // Capture in progress: https://archive.ph/wip/AbCdE
  const wip = html.match(new RegExp(`https?://${ARCHIVE_TODAY_HOSTS}/wip/[A-Za-z0-9]+`, 'i'))
  return wip ? wip[0] : null
}
