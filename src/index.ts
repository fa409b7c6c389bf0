/**
 * rxv — submit URLs to web archives (archive.today, the Internet Archive)
 * and get back the archive URL.
 *
 *   import { archiveWith } from 'rxv'
 *   const result = await archiveWith('ia', 'https://example.com')
 *   console.log(result.archiveUrl)
 */

import { Archiver } from './core/dispatch.js'
import type { FetchLike } from './core/fetch-with-timeout.js'
import type { Logger } from './core/logger.js'
import { DEFAULT_CONFIG } from './lib/config.js'
import type { ArchiveResult } from './schema/archive.js'
import { createDefaultRegistry } from './services/registry.js'

export * from './core/errors.js'
export * from './schema/archive.js'
export { Archiver, type ArchiveUrlsOptions } from './core/dispatch.js'
export type { FetchLike } from './core/fetch-with-timeout.js'
export { consoleLogger, silentLogger, type Logger } from './core/logger.js'
export { DEFAULT_CONFIG, loadConfig, type RxvConfig } from './lib/config.js'
export { EXCLUDED_DOMAINS, isAbsoluteHttpUrl, isExcludedUrl } from './lib/url.js'
export { BaseArchiveService, type ServiceOptions } from './services/base-service.js'
export { ArchiveTodayService } from './services/archive-today.js'
export { InternetArchiveService } from './services/internet-archive.js'
export {
  DEFAULT_ALIASES,
  ServiceRegistry,
  createDefaultRegistry,
  type RegistryEntry,
  type RegistryOptions,
} from './services/registry.js'

export interface ArchiverOptions {
  /** Defaults to the global fetch */
  fetch?: FetchLike
  userAgent?: string
  timeoutMs?: number
  archiveTodayUrl?: string
  internetArchiveUrl?: string
  logger?: Logger
}

/**
 * Archiver over a registry of the built-in services. Build one and reuse it
 * for repeated submissions; the archiveWith* helpers below build a new one
 * per call.
 */
export function createArchiver(options: ArchiverOptions = {}): Archiver {
  const registry = createDefaultRegistry({
    fetch: options.fetch ?? ((url, init) => fetch(url, init)),
    userAgent: options.userAgent ?? DEFAULT_CONFIG.userAgent,
    timeoutMs: options.timeoutMs ?? DEFAULT_CONFIG.timeoutMs,
    archiveTodayUrl: options.archiveTodayUrl ?? DEFAULT_CONFIG.archiveTodayUrl,
    internetArchiveUrl: options.internetArchiveUrl ?? DEFAULT_CONFIG.internetArchiveUrl,
    logger: options.logger,
  })
  return new Archiver(registry, options.logger)
}

/**
 * One-off submission. Constructs a fresh registry and Archiver on every call;
 * callers submitting more than once should hold on to createArchiver() instead.
 */
export async function archiveWith(
  service: string,
  url: string,
  options?: ArchiverOptions
): Promise<ArchiveResult> {
  return createArchiver(options).archiveWith(service, url)
}

/** One-off archive.today submission; see archiveWith */
export async function archiveWithArchiveToday(url: string, options?: ArchiverOptions): Promise<ArchiveResult> {
  return archiveWith('archivetoday', url, options)
}

/** One-off Internet Archive submission; see archiveWith */
export async function archiveWithInternetArchive(url: string, options?: ArchiverOptions): Promise<ArchiveResult> {
  return archiveWith('internetarchive', url, options)
}
