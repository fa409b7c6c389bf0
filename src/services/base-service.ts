/**
 * Base archive service — both provider adapters extend this.
 *
 * Provides: URL validation, the HTTP exchange (user agent, timeout, no
 * redirect following), status checking, and conversion of every failure
 * into InvalidURLError or SubmissionError. Subclasses only build the
 * provider request and read the archive URL out of the response.
 */

import { withTimeout, type FetchLike } from '../core/fetch-with-timeout.js'
import { InvalidURLError, RxvError, SubmissionError, toError } from '../core/errors.js'
import { silentLogger, type Logger } from '../core/logger.js'
import { isAbsoluteHttpUrl } from '../lib/url.js'
import type { ArchiveResponse, ArchiveResult, ArchiveService, ServiceName } from '../schema/archive.js'

export interface ServiceOptions {
  fetch: FetchLike
  userAgent: string
  timeoutMs?: number
  logger?: Logger
}

export interface ProviderRequest {
  url: string
  init: RequestInit
}

export abstract class BaseArchiveService implements ArchiveService {
  abstract readonly name: ServiceName
  abstract readonly label: string

  protected readonly logger: Logger

  constructor(protected readonly options: ServiceOptions) {
    this.logger = options.logger ?? silentLogger
  }

  /** Provider-specific submission request for a validated target URL */
  protected abstract buildRequest(targetUrl: string): ProviderRequest

  /** Read the archive URL out of a successful response; null when absent */
  protected abstract extractArchiveUrl(res: Response, targetUrl: string): Promise<string | null>

  async submit(url: string): Promise<ArchiveResult> {
    // 1. Validate before touching the network
    if (!isAbsoluteHttpUrl(url)) {
      throw new InvalidURLError(url)
    }

    const request = this.buildRequest(url)
    this.logger.info(`[${this.name}] Submitting ${url} → ${request.url}`)

    // 2-4. Submit, check status, locate the archive URL, all under one deadline
    try {
      const result = await withTimeout(this.options.timeoutMs, request.url, signal =>
        this.exchange(url, request, signal)
      )
      this.logger.info(`[${this.name}] Archived ${url} → ${result.archiveUrl}`)
      return result
    } catch (err) {
      if (err instanceof RxvError) throw err
      const error = toError(err)
      throw new SubmissionError(this.name, `${this.label} request failed: ${error.message}`, {
        cause: error,
      })
    }
  }

  private async exchange(
    url: string,
    request: ProviderRequest,
    signal: AbortSignal | undefined
  ): Promise<ArchiveResult> {
    const headers = new Headers(request.init.headers)
    headers.set('user-agent', this.options.userAgent)

    const init: RequestInit = { ...request.init, headers, redirect: 'manual' }
    if (signal) init.signal = signal

    const res = await this.options.fetch(request.url, init)

    if (res.status < 200 || res.status >= 400) {
      const statusLine = `HTTP ${res.status}${res.statusText ? ` ${res.statusText}` : ''}`
      throw new SubmissionError(this.name, `${this.label} returned ${statusLine}`, {
        status: res.status,
      })
    }

    const archiveUrl = await this.extractArchiveUrl(res, url)
    if (!archiveUrl) {
      throw new SubmissionError(
        this.name,
        `${this.label} response (HTTP ${res.status}) did not contain an archive URL`,
        { status: res.status }
      )
    }

    return {
      service: this.name,
      targetUrl: url,
      response: snapshotResponse(res),
      archiveUrl,
    }
  }
}

/** Resolve a possibly relative link against a base URL; null if it cannot be parsed */
export function resolveLink(link: string, base: string): string | null {
  try {
    return new URL(link.trim(), base).href
  } catch {
    return null
  }
}

function snapshotResponse(res: Response): ArchiveResponse {
  const headers: Record<string, string> = {}
  res.headers.forEach((value, key) => {
    headers[key] = value
  })
  return {
    status: res.status,
    statusText: res.statusText,
    url: res.url,
    headers,
  }
}
