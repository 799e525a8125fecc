/**
 * Tool discovery for the doctor command.
 *
 * Wraps the L2 path resolvers so that L7 can reach them without importing L2.
 */
import { getFFmpegPath as _getFFmpegPath, getFFprobePath as _getFFprobePath } from '../../L2-clients/ffmpeg/ffmpeg.js'
import { spawnCommand } from '../../L1-infra/process/process.js'
import logger from '../../L1-infra/logger/configLogger.js'

export function getFFmpegPath(...args: Parameters<typeof _getFFmpegPath>): ReturnType<typeof _getFFmpegPath> {
  return _getFFmpegPath(...args)
}

export function getFFprobePath(...args: Parameters<typeof _getFFprobePath>): ReturnType<typeof _getFFprobePath> {
  return _getFFprobePath(...args)
}

export interface ToolProbe {
  found: boolean
  version?: string
}

const PROBE_TIMEOUT_MS = 10_000

/** First `x.y[.z]` token in a version banner (`2024.08.06` for yt-dlp). */
export function parseVersionFromOutput(output: string): string {
  const match = output.match(/(\d+\.\d+(?:\.\d+)?)/)
  return match ? match[1] : 'unknown'
}

/** Run `<binary> <versionFlag>` and report whether it answered. */
export function probeTool(binary: string, versionFlag: string): ToolProbe {
  try {
    const result = spawnCommand(binary, [versionFlag], { timeout: PROBE_TIMEOUT_MS })
    if (result.error || result.status !== 0 || !result.stdout) {
      return { found: false }
    }
    return { found: true, version: parseVersionFromOutput(result.stdout) }
  } catch (err: unknown) {
    logger.debug(`Could not run ${binary}: ${err instanceof Error ? err.message : String(err)}`)
    return { found: false }
  }
}
