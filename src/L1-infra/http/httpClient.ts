import { CookieJar } from 'tough-cookie'
import { openFileForWrite } from '../fileSystem/fileSystem.js'

/** Raw fetch wrapper. Returns the full Response for callers that read headers or stream the body. */
export async function fetchRaw(url: string, options?: RequestInit): Promise<Response> {
  return fetch(url, options)
}

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308])
const DEFAULT_MAX_REDIRECTS = 10

export interface SessionResponse {
  response: Response
  /** URL of the request that produced `response`, after redirects. */
  url: string
}

/**
 * GET-only HTTP session that keeps cookies across requests.
 *
 * Redirects are followed by hand so that cookies set on intermediate hops
 * (confirmation walls set theirs on the 302) land in the jar. With a
 * `timeoutMs` above 0 every request, body included, is aborted after that long.
 */
export class CookieSession {
  private readonly jar = new CookieJar()

  constructor(
    private readonly defaultHeaders: Record<string, string> = {},
    private readonly maxRedirects = DEFAULT_MAX_REDIRECTS,
    private readonly timeoutMs = 0,
  ) {}

  async get(url: string, headers: Record<string, string> = {}): Promise<SessionResponse> {
    let current = url
    for (let hop = 0; hop <= this.maxRedirects; hop++) {
      const cookie = await this.jar.getCookieString(current)
      const response = await fetchRaw(current, {
        method: 'GET',
        redirect: 'manual',
        headers: { ...this.defaultHeaders, ...headers, ...(cookie ? { Cookie: cookie } : {}) },
        ...(this.timeoutMs > 0 ? { signal: AbortSignal.timeout(this.timeoutMs) } : {}),
      })

      for (const setCookie of response.headers.getSetCookie()) {
        await this.jar.setCookie(setCookie, current, { ignoreError: true })
      }

      const location = response.headers.get('location')
      if (REDIRECT_STATUSES.has(response.status) && location) {
        await response.body?.cancel()
        current = new URL(location, current).toString()
        continue
      }
      return { response, url: current }
    }
    throw new Error(`Too many redirects (>${this.maxRedirects}) fetching ${url}`)
  }
}

/** Declared body length, or undefined when the header is missing or not a number. */
export function contentLength(response: Response): number | undefined {
  const raw = response.headers.get('content-length')
  if (!raw) return undefined
  const parsed = Number.parseInt(raw, 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined
}

export function isHtmlResponse(response: Response): boolean {
  return (response.headers.get('content-type') ?? '').includes('text/html')
}

/**
 * Stream a response body to `filePath` one chunk at a time.
 * `onChunk` gets the running byte count after every write. Returns the total.
 * A failed write cancels the body so the connection is released.
 */
export async function saveResponseBody(
  response: Response,
  filePath: string,
  onChunk?: (receivedBytes: number) => void,
): Promise<number> {
  const handle = await openFileForWrite(filePath)
  let received = 0
  try {
    if (!response.body) return 0
    const reader = response.body.getReader()
    while (true) {
      const { done, value } = await reader.read()
      if (done) break
      if (value && value.byteLength > 0) {
        try {
          await handle.write(value)
        } catch (err: unknown) {
          await reader.cancel()
          throw err
        }
        received += value.byteLength
        onChunk?.(received)
      }
    }
    return received
  } finally {
    await handle.close()
  }
}
