/**
 * Dispatch core — resolves services through the registry and submits URLs.
 *
 * Strictly sequential: one provider request at a time, in the order the
 * URLs and services are given. Batch calls collect each failure into its
 * outcome instead of aborting.
 */

import type { ServiceRegistry } from '../services/registry.js'
import type { ArchiveOutcome, ArchiveRequest, ArchiveResult, UrlReport } from '../schema/archive.js'
import { toError } from './errors.js'
import { silentLogger, type Logger } from './logger.js'

export interface ArchiveUrlsOptions {
  /** Called as each (url, service) submission settles */
  onOutcome?: (url: string, outcome: ArchiveOutcome) => void
}

export class Archiver {
  constructor(
    private readonly registry: ServiceRegistry,
    private readonly logger: Logger = silentLogger
  ) {}

  /** Submit one request. Errors propagate unchanged. */
  async submit(request: ArchiveRequest): Promise<ArchiveResult> {
    const service = this.registry.resolve(request.serviceName)
    return service.submit(request.targetUrl)
  }

  async archiveWith(serviceName: string, url: string): Promise<ArchiveResult> {
    return this.submit({ serviceName, targetUrl: url })
  }

  async archiveWithArchiveToday(url: string): Promise<ArchiveResult> {
    return this.archiveWith('archivetoday', url)
  }

  async archiveWithInternetArchive(url: string): Promise<ArchiveResult> {
    return this.archiveWith('internetarchive', url)
  }

  /** One outcome per service, in the order given */
  async archiveWithMany(serviceNames: Iterable<string>, url: string): Promise<ArchiveOutcome[]> {
    const outcomes: ArchiveOutcome[] = []
    for (const service of serviceNames) {
      outcomes.push(await this.settle(service, url))
    }
    return outcomes
  }

  /** One report per URL, in the order given. Duplicate URLs are submitted again. */
  async archiveUrls(
    urls: Iterable<string>,
    serviceNames: Iterable<string>,
    options: ArchiveUrlsOptions = {}
  ): Promise<UrlReport[]> {
    const services = [...serviceNames]
    const reports: UrlReport[] = []

    for (const url of urls) {
      const outcomes: ArchiveOutcome[] = []
      for (const service of services) {
        const outcome = await this.settle(service, url)
        outcomes.push(outcome)
        options.onOutcome?.(url, outcome)
      }
      reports.push({ url, outcomes })
    }

    return reports
  }

  private async settle(service: string, url: string): Promise<ArchiveOutcome> {
    try {
      const result = await this.archiveWith(service, url)
      return { ok: true, service, result }
    } catch (err) {
      const error = toError(err)
      this.logger.error(`[${service}] ${url}: ${error.message}`)
      return { ok: false, service, error }
    }
  }
}
