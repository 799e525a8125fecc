import {
  buildDirectDownloadUrl,
  extractConfirmToken,
  findMediaUrls,
} from '../../L0-pure/driveLinks/driveLinks.js'
import { BYTES_PER_MB } from '../../L0-pure/segments/segmentPlan.js'
import { formatBytes } from '../../L0-pure/text/text.js'
import {
  CookieSession,
  contentLength,
  isHtmlResponse,
  saveResponseBody,
} from '../../L1-infra/http/httpClient.js'
import type { SessionResponse } from '../../L1-infra/http/httpClient.js'
import logger, { sanitizeForLog } from '../../L1-infra/logger/configLogger.js'
import type { DownloadStrategy } from './downloadResolver.js'

export interface DirectLinkOptions {
  /** Provider origin, e.g. `https://drive.google.com`. */
  baseUrl: string
  /** Host suffix of the URLs that serve the media bytes. */
  mediaHost: string
  /** Abort any single request, body included, after this many seconds. 0 = no limit. */
  timeoutSeconds?: number
}

const BROWSER_HEADERS: Record<string, string> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/96.0.4664.110 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.5',
}

const UNKNOWN_SIZE_LOG_STEP = 10 * BYTES_PER_MB

async function assertOk({ response, url }: SessionResponse): Promise<void> {
  if (!response.ok) {
    await response.body?.cancel()
    throw new Error(`HTTP ${response.status} from ${url}`)
  }
}

/** Logs at every 10% when the size is known, every 10 MiB otherwise. */
function progressLogger(total: number | undefined): (received: number) => void {
  let nextMark = total ? total / 10 : UNKNOWN_SIZE_LOG_STEP
  return (received) => {
    if (received < nextMark) return
    if (total) {
      logger.info(`Downloaded ${Math.floor((received / total) * 100)}% (${formatBytes(received)} of ${formatBytes(total)})`)
      while (nextMark <= received) nextMark += total / 10
    } else {
      logger.info(`Downloaded ${formatBytes(received)}`)
      while (nextMark <= received) nextMark += UNKNOWN_SIZE_LOG_STEP
    }
  }
}

/** Body text when the response is an HTML page, else undefined (body left unread). */
async function readPage({ response }: SessionResponse): Promise<string | undefined> {
  return isHtmlResponse(response) ? response.text() : undefined
}

/**
 * Plain HTTP download through the public `uc?export=download` endpoint.
 *
 * Large files answer with an HTML "can't scan for viruses" page first; the
 * confirm token is taken from the redirect URL or that page and the request is
 * repeated with it. When the answer is still HTML (a viewer page), the first
 * embedded media URL is fetched instead.
 */
export async function downloadDirect(fileId: string, destinationPath: string, options: DirectLinkOptions): Promise<number> {
  const base = options.baseUrl.replace(/\/+$/, '')
  const session = new CookieSession(
    { ...BROWSER_HEADERS, Referer: `${base}/` },
    undefined,
    (options.timeoutSeconds ?? 0) * 1000,
  )

  let current = await session.get(buildDirectDownloadUrl(base, fileId))
  await assertOk(current)
  let page = await readPage(current)

  const token = extractConfirmToken(current.url) ?? (page !== undefined ? extractConfirmToken(page) : undefined)
  if (token) {
    logger.info(`Confirmation required for ${fileId}, retrying with token`)
    if (page === undefined) await current.response.body?.cancel()
    current = await session.get(buildDirectDownloadUrl(base, fileId, token))
    await assertOk(current)
    page = await readPage(current)
  }

  if (page !== undefined) {
    const [mediaUrl] = findMediaUrls(page, options.mediaHost)
    if (!mediaUrl) {
      throw new Error(`Got an HTML page without a media link for ${fileId}`)
    }
    logger.info(`Following embedded media URL: ${sanitizeForLog(mediaUrl)}`)
    current = await session.get(mediaUrl)
    await assertOk(current)
    if (isHtmlResponse(current.response)) {
      await current.response.body?.cancel()
      throw new Error(`Media URL for ${fileId} answered with an HTML page`)
    }
  }

  const total = contentLength(current.response)
  const bytes = await saveResponseBody(current.response, destinationPath, progressLogger(total))
  logger.info(`Direct download finished: ${formatBytes(bytes)}`)
  return bytes
}

export function createDirectLinkStrategy(options: DirectLinkOptions): DownloadStrategy {
  return {
    name: 'direct-link',
    async attempt(request) {
      await downloadDirect(request.fileId, request.destinationPath, options)
    },
  }
}
