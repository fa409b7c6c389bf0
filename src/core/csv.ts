/**
 * CSV writer — writes one row per (url, service) outcome.
 */

import { writeFileSync } from 'node:fs'
import type { UrlReport } from '../schema/archive.js'
import { SubmissionError } from './errors.js'

const COLUMNS = ['url', 'service', 'status', 'httpStatus', 'archiveUrl', 'error'] as const

type CsvRow = Record<(typeof COLUMNS)[number], string | number | null>

/** Escape a value for CSV (RFC 4180) */
function esc(val: string | number | null): string {
  const str = val == null ? '' : String(val)
  if (str.includes('"') || str.includes(',') || str.includes('\n')) {
    return '"' + str.replace(/"/g, '""') + '"'
  }
  return str
}

export function toRows(reports: UrlReport[]): CsvRow[] {
  return reports.flatMap(report =>
    report.outcomes.map(outcome =>
      outcome.ok
        ? {
            url: report.url,
            service: outcome.result.service,
            status: 'success',
            httpStatus: outcome.result.response.status,
            archiveUrl: outcome.result.archiveUrl,
            error: null,
          }
        : {
            url: report.url,
            service: outcome.service,
            status: 'failure',
            httpStatus: outcome.error instanceof SubmissionError ? outcome.error.status : null,
            archiveUrl: null,
            error: outcome.error.message,
          }
    )
  )
}

export function formatCsv(reports: UrlReport[]): string {
  const header = COLUMNS.join(',')
  const rows = toRows(reports).map(row =>
    COLUMNS.map(col => esc(row[col])).join(',')
  )
  return header + '\n' + rows.map(r => r + '\n').join('')
}

/** Write archive outcomes to a CSV file */
export function writeCsv(reports: UrlReport[], outputPath: string): void {
  writeFileSync(outputPath, formatCsv(reports), 'utf-8')
}
