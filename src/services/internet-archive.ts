/**
 * Internet Archive adapter — Wayback Machine "Save Page Now".
 *
 * GET /save/<target>. The snapshot location comes back as a
 * Content-Location header, a redirect to /web/<timestamp>/<target>,
 * or (from the JSON flavour of the endpoint) a body with the capture
 * timestamp.
 */

import { SubmissionError } from '../core/errors.js'
import { trimBaseUrl } from '../lib/url.js'
import { BaseArchiveService, resolveLink, type ProviderRequest, type ServiceOptions } from './base-service.js'

export interface InternetArchiveOptions extends ServiceOptions {
  baseUrl: string
}

/** Path of a Wayback snapshot: /web/<14-digit timestamp>[flags]/<original url> */
const SNAPSHOT_PATH = /^\/web\/\d{14}[^/]*\/\S+/

export class InternetArchiveService extends BaseArchiveService {
  readonly name = 'internetarchive' as const
  readonly label = 'Internet Archive'

  private readonly baseUrl: string

  constructor(options: InternetArchiveOptions) {
    super(options)
    this.baseUrl = trimBaseUrl(options.baseUrl)
  }

  protected buildRequest(targetUrl: string): ProviderRequest {
    return {
      url: `${this.baseUrl}/save/${targetUrl}`,
      init: { method: 'GET' },
    }
  }

  protected async extractArchiveUrl(res: Response, targetUrl: string): Promise<string | null> {
    for (const header of ['content-location', 'location']) {
      const value = res.headers.get(header)
      const link = value ? this.snapshotLink(value) : null
      if (link) return link
    }

    // Only a followed redirect puts the snapshot in res.url; otherwise it is the /save/ request
    if (res.redirected && res.url) {
      const link = this.snapshotLink(res.url)
      if (link) return link
    }

    const contentType = res.headers.get('content-type') ?? ''
    if (contentType.includes('application/json')) {
      return this.parseJsonBody(await res.text(), targetUrl, res.status)
    }

    return null
  }

  /** Absolute snapshot URL for a link, or null when its path is not a snapshot */
  private snapshotLink(value: string): string | null {
    const link = resolveLink(value, this.baseUrl)
    return link && SNAPSHOT_PATH.test(new URL(link).pathname) ? link : null
  }

  private parseJsonBody(text: string, targetUrl: string, status: number): string | null {
    let body: unknown
    try {
      body = JSON.parse(text)
    } catch (err) {
      throw new SubmissionError(this.name, `${this.label} returned a malformed response`, {
        status,
        cause: err,
      })
    }

    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
      throw new SubmissionError(this.name, `${this.label} returned a malformed response`, { status })
    }

    // Finished capture: { "timestamp": "20240101000000", "original_url": "https://…" }
    const fields = new Map<string, unknown>(Object.entries(body))
    const timestamp = fields.get('timestamp')
    if (typeof timestamp !== 'string' || !/^\d{14}$/.test(timestamp)) return null

    const originalUrl = fields.get('original_url')
    const url = fields.get('url')
    const original =
      typeof originalUrl === 'string' ? originalUrl
        : typeof url === 'string' ? url
          : targetUrl
    return `${this.baseUrl}/web/${timestamp}/${original}`
  }
}
