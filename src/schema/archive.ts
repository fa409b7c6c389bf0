/**
 * Shared archive types — every service adapter normalizes into ArchiveResult.
 */

export const SERVICE_NAMES = ['archivetoday', 'internetarchive'] as const

/** Closed set of built-in archival providers */
export type ServiceName = (typeof SERVICE_NAMES)[number]

export interface ArchiveRequest {
  readonly targetUrl: string
  readonly serviceName: string
}

/** Plain snapshot of the provider's HTTP response */
export interface ArchiveResponse {
  status: number
  statusText: string
  url: string
  headers: Record<string, string>
}

export interface ArchiveResult {
  service: ServiceName
  targetUrl: string
  response: ArchiveResponse
  /** Permanent or in-progress snapshot link returned by the provider */
  archiveUrl: string
}

/** Capability every provider adapter implements */
export interface ArchiveService {
  readonly name: ServiceName
  /** Human-readable provider name, used in messages */
  readonly label: string
  submit(url: string): Promise<ArchiveResult>
}

/** Per-item outcome of a batch — failures are collected, not thrown */
export type ArchiveOutcome =
  | { ok: true; service: string; result: ArchiveResult }
  | { ok: false; service: string; error: Error }

export interface UrlReport {
  url: string
  outcomes: ArchiveOutcome[]
}
