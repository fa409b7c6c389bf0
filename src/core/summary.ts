/**
 * Summary builder — generates summary.json from the archive reports.
 */

import { writeFileSync } from 'node:fs'
import type { UrlReport } from '../schema/archive.js'

export interface Summary {
  urlCount: number
  submissions: number
  succeeded: number
  failed: number
  byService: Record<string, { succeeded: number; failed: number }>
  generatedAt: string
}

export function buildSummary(reports: UrlReport[]): Summary {
  const byService: Summary['byService'] = {}
  let succeeded = 0
  let failed = 0

  for (const report of reports) {
    for (const outcome of report.outcomes) {
      const key = outcome.ok ? outcome.result.service : outcome.service
      if (!byService[key]) byService[key] = { succeeded: 0, failed: 0 }
      if (outcome.ok) {
        byService[key].succeeded++
        succeeded++
      } else {
        byService[key].failed++
        failed++
      }
    }
  }

  return {
    urlCount: reports.length,
    submissions: succeeded + failed,
    succeeded,
    failed,
    byService,
    generatedAt: new Date().toISOString(),
  }
}

export function writeSummary(summary: Summary, outputPath: string): void {
  writeFileSync(outputPath, JSON.stringify(summary, null, 2) + '\n', 'utf-8')
}
