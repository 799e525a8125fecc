import { resolveFileIdFuzzy } from '../../L0-pure/driveLinks/driveLinks.js'
import { MissingCredentialError } from '../../L0-pure/errors/errors.js'
import { formatBytes } from '../../L0-pure/text/text.js'
import { downloadDriveFile } from '../../L2-clients/drive/driveClient.js'
import logger from '../../L1-infra/logger/configLogger.js'
import type { DownloadStrategy } from './downloadResolver.js'

export interface ProviderSdkOptions {
  apiKey: string
  /** Request timeout in seconds. 0 = no limit. */
  timeoutSeconds?: number
}

/** Drive API v3 `files.get?alt=media`. Fails when no API key is configured. */
export function createProviderSdkStrategy(options: ProviderSdkOptions): DownloadStrategy {
  return {
    name: 'provider-sdk',
    async attempt(request) {
      if (!options.apiKey) {
        throw new MissingCredentialError('GOOGLE_API_KEY', 'needed by the Drive API download')
      }
      const fileId = resolveFileIdFuzzy(request.fileId)
      const bytes = await downloadDriveFile(fileId, request.destinationPath, options.apiKey, options.timeoutSeconds)
      logger.info(`Drive API download finished: ${formatBytes(bytes)}`)
    },
  }
}
