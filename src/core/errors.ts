/**
 * Error kinds raised by the archive services, the registry and the dispatch core.
 */

export class RxvError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
  }
}

/** Input is not a well-formed absolute http(s) URL. Raised before any request. */
export class InvalidURLError extends RxvError {
  readonly url: string

  constructor(url: string) {
    super(`Invalid URL: "${url}"`)
    this.url = url
  }
}

export class UnknownServiceError extends RxvError {
  readonly service: string

  constructor(service: string) {
    super(`Unknown service: "${service}"`)
    this.service = service
  }
}

export class DuplicateServiceError extends RxvError {
  readonly service: string

  constructor(service: string) {
    super(`Service already registered: "${service}"`)
    this.service = service
  }
}

/**
 * Network failure, non-success HTTP status, or a provider response the
 * archive URL could not be read from.
 */
export class SubmissionError extends RxvError {
  readonly service: string
  readonly status: number | null

  constructor(
    service: string,
    message: string,
    options: { status?: number; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause })
    this.service = service
    this.status = options.status ?? null
  }
}

export class ConfigError extends RxvError {}

/** Normalize anything thrown into an Error */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}
