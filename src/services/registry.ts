/**
 * Service registry — maps service names and aliases to adapters.
 *
 * Names and aliases share one case-insensitive namespace. Build one
 * registry at startup with createDefaultRegistry() and hand it to the
 * Archiver; there is no module-level instance.
 */

import { DuplicateServiceError, UnknownServiceError } from '../core/errors.js'
import type { Logger } from '../core/logger.js'
import type { FetchLike } from '../core/fetch-with-timeout.js'
import type { ArchiveService, ServiceName } from '../schema/archive.js'
import { ArchiveTodayService } from './archive-today.js'
import { InternetArchiveService } from './internet-archive.js'

export interface RegistryEntry {
  canonicalName: ServiceName
  aliases: ReadonlySet<string>
  service: ArchiveService
}

export class ServiceRegistry {
  private readonly byName = new Map<ServiceName, RegistryEntry>()
  private readonly lookup = new Map<string, ServiceName>()

  register(name: ServiceName, aliases: Iterable<string>, service: ArchiveService): void {
    const keys = [name, ...aliases].map(normalizeKey)
    const taken = keys.find((key, i) => this.lookup.has(key) || keys.indexOf(key) !== i)
    if (taken !== undefined) {
      throw new DuplicateServiceError(taken)
    }

    const entry: RegistryEntry = {
      canonicalName: name,
      aliases: new Set(keys.slice(1)),
      service,
    }
    this.byName.set(name, entry)
    for (const key of keys) this.lookup.set(key, name)
  }

  resolve(nameOrAlias: string): ArchiveService {
    return this.entry(nameOrAlias).service
  }

  canonicalName(nameOrAlias: string): ServiceName {
    return this.entry(nameOrAlias).canonicalName
  }

  has(nameOrAlias: string): boolean {
    return this.lookup.has(normalizeKey(nameOrAlias))
  }

  /** All entries, in registration order */
  entries(): RegistryEntry[] {
    return [...this.byName.values()]
  }

  private entry(nameOrAlias: string): RegistryEntry {
    const name = this.lookup.get(normalizeKey(nameOrAlias))
    const entry = name ? this.byName.get(name) : undefined
    if (!entry) {
      throw new UnknownServiceError(nameOrAlias)
    }
    return entry
  }
}

function normalizeKey(key: string): string {
  return key.trim().toLowerCase()
}

export const DEFAULT_ALIASES: Record<ServiceName, readonly string[]> = {
  archivetoday: ['at', 'archive.today', 'archive.ph', 'archive.is'],
  internetarchive: ['ia', 'wayback', 'web.archive.org'],
}

export interface RegistryOptions {
  fetch: FetchLike
  userAgent: string
  timeoutMs?: number
  archiveTodayUrl: string
  internetArchiveUrl: string
  logger?: Logger
}

/** Registry holding the built-in services */
export function createDefaultRegistry(options: RegistryOptions): ServiceRegistry {
  const { archiveTodayUrl, internetArchiveUrl, ...serviceOptions } = options
  const registry = new ServiceRegistry()

  registry.register(
    'archivetoday',
    DEFAULT_ALIASES.archivetoday,
    new ArchiveTodayService({ ...serviceOptions, baseUrl: archiveTodayUrl })
  )
  registry.register(
    'internetarchive',
    DEFAULT_ALIASES.internetarchive,
    new InternetArchiveService({ ...serviceOptions, baseUrl: internetArchiveUrl })
  )

  return registry
}
