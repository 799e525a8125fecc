import { fluentFfmpeg as ffmpegLib } from '../../L1-infra/ffmpeg/ffmpeg.js'
import type { FfmpegCommand, FfprobeData } from '../../L1-infra/ffmpeg/ffmpeg.js'
import { createModuleRequire } from '../../L1-infra/process/process.js'
import { fileExistsSync } from '../../L1-infra/fileSystem/fileSystem.js'
import logger from '../../L1-infra/logger/configLogger.js'

const require = createModuleRequire(import.meta.url)

/**
 * Where to find the binaries and how long a single invocation may run.
 * Paths left at their bare command names fall back to the installer packages.
 */
export interface MediaToolSettings {
  ffmpegPath?: string
  ffprobePath?: string
  /** Kill ffmpeg after this many seconds. 0 or absent = no limit. */
  timeoutSeconds?: number
}

/** Binary path exported by an installer package, if it is installed and present on disk. */
function installerBinary(pkg: string): string | undefined {
  try {
    const mod: unknown = require(pkg)
    if (typeof mod === 'object' && mod !== null && 'path' in mod && typeof mod.path === 'string' && fileExistsSync(mod.path)) {
      return mod.path
    }
  } catch (err: unknown) {
    logger.debug(`${pkg} not available: ${err instanceof Error ? err.message : String(err)}`)
  }
  return undefined
}

/** Get the resolved path to the FFmpeg binary. */
export function getFFmpegPath(configured?: string): string {
  if (configured && configured !== 'ffmpeg') {
    logger.debug(`FFmpeg: using FFMPEG_PATH config: ${configured}`)
    return configured
  }
  const installed = installerBinary('@ffmpeg-installer/ffmpeg')
  if (installed) {
    logger.debug(`FFmpeg: using @ffmpeg-installer/ffmpeg: ${installed}`)
    return installed
  }
  logger.debug('FFmpeg: falling back to system PATH')
  return 'ffmpeg'
}

/** Get the resolved path to the FFprobe binary. */
export function getFFprobePath(configured?: string): string {
  if (configured && configured !== 'ffprobe') {
    logger.debug(`FFprobe: using FFPROBE_PATH config: ${configured}`)
    return configured
  }
  const installed = installerBinary('@ffprobe-installer/ffprobe')
  if (installed) {
    logger.debug(`FFprobe: using @ffprobe-installer/ffprobe: ${installed}`)
    return installed
  }
  logger.debug('FFprobe: falling back to system PATH')
  return 'ffprobe'
}

/** Create a pre-configured fluent-ffmpeg instance. */
export function createFFmpeg(input: string, settings: MediaToolSettings = {}): FfmpegCommand {
  const cmd = settings.timeoutSeconds
    ? ffmpegLib(input, { timeout: settings.timeoutSeconds })
    : ffmpegLib(input)
  cmd.setFfmpegPath(getFFmpegPath(settings.ffmpegPath))
  cmd.setFfprobePath(getFFprobePath(settings.ffprobePath))
  return cmd
}

/** Promisified ffprobe returning media file metadata. */
export function ffprobe(filePath: string, settings: MediaToolSettings = {}): Promise<FfprobeData> {
  return new Promise((resolve, reject) => {
    ffmpegLib.setFfprobePath(getFFprobePath(settings.ffprobePath))
    ffmpegLib.ffprobe(filePath, (err, data) => {
      if (err) reject(err)
      else resolve(data)
    })
  })
}

/** Run a configured command to completion. Rejects with ffmpeg's stderr attached to the message. */
export function runFFmpeg(cmd: FfmpegCommand): Promise<void> {
  return new Promise((resolve, reject) => {
    cmd
      .on('end', () => resolve())
      .on('error', (err: Error, _stdout: string | null, stderr: string | null) => {
        reject(new FFmpegRunError(err.message, stderr ?? ''))
      })
      .run()
  })
}

const STDERR_TAIL_LINES = 15

/** ffmpeg failure with the tail of its diagnostic output. */
export class FFmpegRunError extends Error {
  readonly stderr: string

  constructor(message: string, stderr: string) {
    super(message)
    this.name = 'FFmpegRunError'
    this.stderr = stderr.trim().split(/\r?\n/).slice(-STDERR_TAIL_LINES).join('\n')
  }
}
