/**
 * Injectable fetch type and a deadline helper for a whole HTTP exchange.
 */

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>

/**
 * Run `task` with an abort signal that fires after `timeoutMs`. The timer
 * covers everything the task awaits (headers and body alike) and is cleared
 * only once the task settles. Unset timeout: the task gets no signal.
 */
export async function withTimeout<T>(
  timeoutMs: number | undefined,
  url: string,
  task: (signal: AbortSignal | undefined) => Promise<T>
): Promise<T> {
  if (timeoutMs === undefined) {
    return task(undefined)
  }

  const controller = new AbortController()
  const timer = setTimeout(() => controller.abort(), timeoutMs)

  try {
    return await task(controller.signal)
  } catch (err) {
    if (controller.signal.aborted) {
      throw new Error(`Request to ${url} timed out after ${timeoutMs}ms`, { cause: err })
    }
    throw err
  } finally {
    clearTimeout(timer)
  }
}
