import { downloadWithYtDlp } from '../../L2-clients/ytdlp/ytdlp.js'
import type { YtDlpOptions } from '../../L2-clients/ytdlp/ytdlp.js'
import type { DownloadStrategy } from './downloadResolver.js'

export function createGenericExtractorStrategy(options: YtDlpOptions): DownloadStrategy {
  return {
    name: 'generic-extractor',
    attempt: (request) => downloadWithYtDlp(request.url, request.destinationPath, options),
  }
}
