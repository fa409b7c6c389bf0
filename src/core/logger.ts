/**
 * Minimal logger. Callers prefix their own lines, `[archivetoday] Submitting …`.
 *
 * The CLI writes these to stderr: stdout carries only archive results.
 */

export interface Logger {
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
}

export function consoleLogger(write: (line: string) => void = line => console.error(line)): Logger {
  return {
    info: message => write(message),
    warn: message => write(`WARNING: ${message}`),
    error: message => write(`ERROR: ${message}`),
  }
}
