import { InvalidUrlError } from '../errors/errors.js'
import type { ResourceId } from '../types/index.js'

const FILE_ID_PATTERN = /\/d\/([a-zA-Z0-9_-]+)/
const QUERY_ID_PATTERN = /[?&]id=([a-zA-Z0-9_-]+)/
const BARE_ID_PATTERN = /^[a-zA-Z0-9_-]+$/
const CONFIRM_PATTERN = /confirm=([0-9A-Za-z_-]+)/

/** Extract the file id from the first `/d/<id>` segment of a sharing URL. */
export function extractId(url: string): ResourceId {
  const match = url.match(FILE_ID_PATTERN)
  if (!match) {
    throw new InvalidUrlError(url)
  }
  return match[1]
}

/**
 * Lenient id resolution: a bare id, a `/d/<id>` link, or any link carrying
 * `?id=<id>` (the `open?id=` and `uc?id=` forms).
 */
export function resolveFileIdFuzzy(input: string): ResourceId {
  const trimmed = input.trim()
  if (BARE_ID_PATTERN.test(trimmed)) return trimmed

  const path = trimmed.match(FILE_ID_PATTERN)
  if (path) return path[1]

  const query = trimmed.match(QUERY_ID_PATTERN)
  if (query) return query[1]

  throw new InvalidUrlError(input)
}

/** `<base>/uc?id=<id>&export=download[&confirm=<token>]` */
export function buildDirectDownloadUrl(baseUrl: string, fileId: ResourceId, confirmToken?: string): string {
  const base = baseUrl.replace(/\/+$/, '')
  const url = `${base}/uc?id=${fileId}&export=download`
  return confirmToken ? `${url}&confirm=${confirmToken}` : url
}

/** First `confirm=<token>` value in a URL or page body. */
export function extractConfirmToken(text: string): string | undefined {
  return text.match(CONFIRM_PATTERN)?.[1]
}

/**
 * Undo the escaping viewer pages apply to URLs embedded in inline scripts
 * (`https:\/\/…`, `&`, `=`).
 */
export function unescapeEmbeddedUrls(html: string): string {
  return html
    .replace(/\\\//g, '/')
    .replace(/\\u0026/gi, '&')
    .replace(/\\u003d/gi, '=')
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Direct-media URLs embedded in a viewer page, in page order.
 * Only links under `mediaHost` whose text contains `videoplayback` or `media` qualify.
 */
export function findMediaUrls(html: string, mediaHost: string): string[] {
  const pattern = new RegExp(`https://[^\\s"'<>]*?${escapeRegExp(mediaHost)}/[^"'&?\\s<>\\\\]+`, 'g')
  const found = unescapeEmbeddedUrls(html).match(pattern) ?? []
  return found.filter((u) => u.includes('videoplayback') || u.includes('media'))
}
