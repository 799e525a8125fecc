import { extractId } from '../../L0-pure/driveLinks/driveLinks.js'
import { DownloadFailedError, errorMessage } from '../../L0-pure/errors/errors.js'
import type { DownloadAttempt, DownloadOutcome, DownloadRequest, StrategyName } from '../../L0-pure/types/index.js'
import { ensureDirectory, fileHasContent, removeFile } from '../../L1-infra/fileSystem/fileSystem.js'
import { dirname } from '../../L1-infra/paths/paths.js'
import logger, { sanitizeForLog } from '../../L1-infra/logger/configLogger.js'
import { createGenericExtractorStrategy } from './genericExtractor.js'
import { createDirectLinkStrategy } from './directLink.js'
import { createProviderSdkStrategy } from './providerSdk.js'

/**
 * One way of getting a remote file onto disk.
 * `attempt` writes to `request.destinationPath` and throws on failure.
 */
export interface DownloadStrategy {
  readonly name: StrategyName
  attempt(request: DownloadRequest): Promise<void>
}

export interface DownloadSettings {
  ytdlpPath: string
  toolTimeoutSeconds: number
  driveBaseUrl: string
  driveMediaHost: string
  googleApiKey: string
}

/** generic extractor → direct link → provider SDK */
export function createDefaultStrategies(settings: DownloadSettings): DownloadStrategy[] {
  return [
    createGenericExtractorStrategy({ binary: settings.ytdlpPath, timeoutSeconds: settings.toolTimeoutSeconds }),
    createDirectLinkStrategy({
      baseUrl: settings.driveBaseUrl,
      mediaHost: settings.driveMediaHost,
      timeoutSeconds: settings.toolTimeoutSeconds,
    }),
    createProviderSdkStrategy({ apiKey: settings.googleApiKey, timeoutSeconds: settings.toolTimeoutSeconds }),
  ]
}

/**
 * Tries each strategy in order until one leaves a non-empty file at the destination.
 */
export class DownloadResolver {
  constructor(private readonly strategies: readonly DownloadStrategy[]) {}

  async resolve(url: string, destinationPath: string): Promise<DownloadOutcome> {
    const fileId = extractId(url)
    const request: DownloadRequest = { url, fileId, destinationPath }
    await ensureDirectory(dirname(destinationPath))

    const attempts: DownloadAttempt[] = []
    for (const strategy of this.strategies) {
      logger.info(`[download] ${fileId}: trying ${strategy.name}`)
      let failure: string | undefined
      try {
        await strategy.attempt(request)
        if (!(await fileHasContent(destinationPath))) {
          failure = 'finished without writing any data'
        }
      } catch (err: unknown) {
        failure = errorMessage(err)
      }

      if (failure === undefined) {
        attempts.push({ strategy: strategy.name, success: true, path: destinationPath })
        logger.info(`[download] ${fileId}: saved with ${strategy.name} → ${sanitizeForLog(destinationPath)}`)
        return { strategy: strategy.name, path: destinationPath, attempts }
      }

      attempts.push({ strategy: strategy.name, success: false, error: failure })
      logger.warn(`[download] ${fileId}: ${strategy.name} failed: ${sanitizeForLog(failure)}`)
      await removeFile(destinationPath)
    }

    throw new DownloadFailedError(destinationPath, attempts)
  }
}
