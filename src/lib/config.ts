/**
 * Environment configuration. The CLI loads `.env` through dotenv before
 * calling loadConfig(process.env).
 */

import { ConfigError } from '../core/errors.js'
import { isAbsoluteHttpUrl, trimBaseUrl } from './url.js'

export interface RxvConfig {
  userAgent: string
  timeoutMs: number | undefined
  archiveTodayUrl: string
  internetArchiveUrl: string
}

export const VERSION = '0.1.0'

export const DEFAULT_CONFIG: RxvConfig = {
  userAgent: `rxv/${VERSION}`,
  timeoutMs: undefined,
  archiveTodayUrl: 'https://archive.today',
  internetArchiveUrl: 'https://web.archive.org',
}

type Env = Record<string, string | undefined>

function readBaseUrl(env: Env, key: string, fallback: string): string {
  const raw = env[key]?.trim()
  if (!raw) return fallback
  if (!isAbsoluteHttpUrl(raw)) {
    throw new ConfigError(`Invalid ${key}: "${raw}" (expected an absolute http(s) URL)`)
  }
  return trimBaseUrl(raw)
}

function readTimeout(env: Env): number | undefined {
  const raw = env.RXV_TIMEOUT_MS?.trim()
  if (!raw) return undefined
  if (!/^\d+$/.test(raw) || Number(raw) <= 0) {
    throw new ConfigError(`Invalid RXV_TIMEOUT_MS: "${raw}" (expected a positive integer)`)
  }
  return Number(raw)
}

export function loadConfig(env: Env = process.env): RxvConfig {
  return {
    userAgent: env.RXV_USER_AGENT?.trim() || DEFAULT_CONFIG.userAgent,
    timeoutMs: readTimeout(env),
    archiveTodayUrl: readBaseUrl(env, 'RXV_ARCHIVE_TODAY_URL', DEFAULT_CONFIG.archiveTodayUrl),
    internetArchiveUrl: readBaseUrl(env, 'RXV_INTERNET_ARCHIVE_URL', DEFAULT_CONFIG.internetArchiveUrl),
  }
}
