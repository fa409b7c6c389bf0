import { describe, expect, it, vi } from 'vitest'
import { InvalidURLError, SubmissionError } from '../core/errors.js'
import { InternetArchiveService } from './internet-archive.js'

const TARGET = 'https://example.com'
const SNAPSHOT = 'https://web.archive.org/web/20240101120000/https://example.com'

function makeService(handler: () => Response | Promise<Response>, baseUrl = 'https://web.archive.org') {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => handler())
  const service = new InternetArchiveService({ fetch: fetchMock, userAgent: 'test-agent', baseUrl })
  return { service, fetchMock }
}

describe('InternetArchiveService', () => {
  it('requests Save Page Now without following redirects', async () => {
    const { service, fetchMock } = makeService(
      () => new Response(null, { status: 302, headers: { location: SNAPSHOT } })
    )

    await service.submit(TARGET)

    expect(fetchMock).toHaveBeenCalledTimes(1)
    const [url, init] = fetchMock.mock.calls[0]
    expect(url).toBe('https://web.archive.org/save/https://example.com')
    expect(init?.method).toBe('GET')
    expect(init?.redirect).toBe('manual')
    expect(new Headers(init?.headers).get('user-agent')).toBe('test-agent')
  })

  it('reads the snapshot from a redirect Location', async () => {
    const { service } = makeService(
      () => new Response(null, { status: 302, headers: { location: SNAPSHOT } })
    )

    const result = await service.submit(TARGET)

    expect(result.archiveUrl).toBe(SNAPSHOT)
    expect(result.service).toBe('internetarchive')
    expect(result.targetUrl).toBe(TARGET)
    expect(result.response.status).toBe(302)
    expect(result.response.headers.location).toBe(SNAPSHOT)
  })

  it('resolves a relative Content-Location against the base URL', async () => {
    const { service } = makeService(
      () => new Response('<html></html>', {
        status: 200,
        headers: { 'content-location': '/web/20240101120000/https://example.com/' },
      })
    )

    const result = await service.submit(TARGET)

    expect(result.archiveUrl).toBe('https://web.archive.org/web/20240101120000/https://example.com/')
  })

  it('ignores a Location that is not a snapshot', async () => {
    const { service } = makeService(
      () => new Response(null, { status: 302, headers: { location: '/login' } })
    )

    await expect(service.submit(TARGET)).rejects.toThrow(
      'Internet Archive response (HTTP 302) did not contain an archive URL'
    )
  })

  it('builds the snapshot URL from a JSON capture body', async () => {
    const { service } = makeService(
      () => new Response('{"timestamp":"20240101120000","original_url":"https://example.com/page"}', {
        status: 200,
        headers: { 'content-type': 'application/json' },
      })
    )

    const result = await service.submit('https://example.com/page')

    expect(result.archiveUrl).toBe('https://web.archive.org/web/20240101120000/https://example.com/page')
  })

  it('falls back to the target URL when the JSON body names no original', async () => {
    const { service } = makeService(
      () => new Response('{"timestamp":"20240101120000"}', {
        status: 200,
        headers: { 'content-type': 'application/json' },
      })
    )

    const result = await service.submit(TARGET)

    expect(result.archiveUrl).toBe(SNAPSHOT)
  })

  it('rejects a malformed JSON body', async () => {
    const { service } = makeService(
      () => new Response('{not json', {
        status: 200,
        headers: { 'content-type': 'application/json' },
      })
    )

    const err = await service.submit(TARGET).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(SubmissionError)
    expect(err).toMatchObject({
      message: 'Internet Archive returned a malformed response',
      service: 'internetarchive',
      status: 200,
    })
  })

  it('fails on a non-success status', async () => {
    const { service } = makeService(
      () => new Response('busy', { status: 503, statusText: 'Service Unavailable' })
    )

    const err = await service.submit(TARGET).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(SubmissionError)
    expect(err).toMatchObject({
      message: 'Internet Archive returned HTTP 503 Service Unavailable',
      status: 503,
    })
  })

  it('fails when a 200 response carries no archive URL', async () => {
    const { service } = makeService(() => new Response('<html>Saving page…</html>', { status: 200 }))

    await expect(service.submit(TARGET)).rejects.toThrow(
      'Internet Archive response (HTTP 200) did not contain an archive URL'
    )
  })

  it('wraps network errors in SubmissionError', async () => {
    const networkError = new TypeError('fetch failed')
    const { service } = makeService(() => Promise.reject(networkError))

    const err = await service.submit(TARGET).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(SubmissionError)
    expect(err).toMatchObject({ message: 'Internet Archive request failed: fetch failed', status: null })
    expect(err instanceof Error ? err.cause : undefined).toBe(networkError)
  })

  it.each(['not a url', 'ftp://example.com/file', '/relative/path', ''])(
    'rejects %j without a request',
    async input => {
      const { service, fetchMock } = makeService(() => new Response(null, { status: 200 }))

      await expect(service.submit(input)).rejects.toBeInstanceOf(InvalidURLError)
      expect(fetchMock).not.toHaveBeenCalled()
    }
  )

  it('trims a trailing slash from the base URL', async () => {
    const { service, fetchMock } = makeService(
      () => new Response(null, { status: 302, headers: { location: '/web/20240101120000/https://example.com' } }),
      'http://localhost:8080/'
    )

    const result = await service.submit(TARGET)

    expect(fetchMock.mock.calls[0][0]).toBe('http://localhost:8080/save/https://example.com')
    expect(result.archiveUrl).toBe('http://localhost:8080/web/20240101120000/https://example.com')
  })

  it('does not mistake a target path containing /web/<timestamp>/ for a snapshot', async () => {
    const target = 'https://example.com/web/20240101120000/page'
    const { service } = makeService(() => {
      const res = new Response('<html>Saving page…</html>', { status: 200 })
      Object.defineProperty(res, 'url', { value: `https://web.archive.org/save/${target}` })
      return res
    })

    await expect(service.submit(target)).rejects.toThrow(
      'Internet Archive response (HTTP 200) did not contain an archive URL'
    )
  })

  it('rejects a Location pointing back at the save endpoint', async () => {
    const target = 'https://example.com/web/20240101120000/page'
    const { service } = makeService(
      () => new Response(null, {
        status: 302,
        headers: { location: `https://web.archive.org/save/${target}` },
      })
    )

    await expect(service.submit(target)).rejects.toBeInstanceOf(SubmissionError)
  })

  it('takes the final URL of a followed redirect', async () => {
    const { service } = makeService(() => {
      const res = new Response('<html></html>', { status: 200 })
      Object.defineProperty(res, 'url', { value: SNAPSHOT })
      Object.defineProperty(res, 'redirected', { value: true })
      return res
    })

    const result = await service.submit(TARGET)

    expect(result.archiveUrl).toBe(SNAPSHOT)
  })

  it('times out a response body that stalls', async () => {
    const fetchMock = vi.fn(async (_url: string, init?: RequestInit) => {
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          init?.signal?.addEventListener('abort', () => controller.error(new Error('aborted')))
        },
      })
      return new Response(body, { status: 200, headers: { 'content-type': 'application/json' } })
    })
    const service = new InternetArchiveService({
      fetch: fetchMock,
      userAgent: 'test-agent',
      baseUrl: 'https://web.archive.org',
      timeoutMs: 20,
    })

    const err = await service.submit(TARGET).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(SubmissionError)
    expect(err).toMatchObject({
      message: 'Internet Archive request failed: Request to https://web.archive.org/save/https://example.com timed out after 20ms',
    })
    expect(fetchMock.mock.calls[0][1]?.signal).toBeInstanceOf(AbortSignal)
  })

  it('sends no abort signal when no timeout is configured', async () => {
    const { service, fetchMock } = makeService(
      () => new Response(null, { status: 302, headers: { location: SNAPSHOT } })
    )

    await service.submit(TARGET)

    expect(fetchMock.mock.calls[0][1]?.signal).toBeUndefined()
  })
})
