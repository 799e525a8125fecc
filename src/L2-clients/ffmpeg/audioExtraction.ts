import { createFFmpeg, ffprobe, runFFmpeg, FFmpegRunError } from './ffmpeg.js'
import type { MediaToolSettings } from './ffmpeg.js'
import { ensureDirectory, getFileStats } from '../../L1-infra/fileSystem/fileSystem.js'
import { basename, dirname, extname, join } from '../../L1-infra/paths/paths.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { ExtractionFailedError, errorMessage } from '../../L0-pure/errors/errors.js'
import { bytesToMb, planSegments } from '../../L0-pure/segments/segmentPlan.js'
import { formatDuration } from '../../L0-pure/text/text.js'
import type { AudioSegment } from '../../L0-pure/types/index.js'

/**
 * Extract audio from a video file to mono MP3 at 64kbps, 16 kHz.
 * A one-hour meeting comes out around 28 MB, a little over the upload limit.
 */
export async function extractAudio(
  videoPath: string,
  outputPath: string,
  settings: MediaToolSettings = {},
): Promise<string> {
  await ensureDirectory(dirname(outputPath))

  logger.info(`Extracting audio: ${videoPath} → ${outputPath}`)

  const command = createFFmpeg(videoPath, settings)
    .noVideo()
    .audioChannels(1)
    .audioCodec('libmp3lame')
    .audioBitrate('64k')
    .audioFrequency(16000)
    .output(outputPath)

  try {
    await runFFmpeg(command)
  } catch (err: unknown) {
    const diagnostic = err instanceof FFmpegRunError ? err.stderr : ''
    logger.error(`Audio extraction failed: ${errorMessage(err)}`)
    throw new ExtractionFailedError(`Audio extraction failed for ${videoPath}: ${errorMessage(err)}`, diagnostic)
  }

  logger.info(`Audio extraction complete: ${outputPath}`)
  return outputPath
}

/** Duration of a media file in seconds, or undefined when ffprobe cannot tell. */
export async function probeDuration(filePath: string, settings: MediaToolSettings = {}): Promise<number | undefined> {
  try {
    const metadata = await ffprobe(filePath, settings)
    const duration = metadata.format.duration
    return typeof duration === 'number' && duration > 0 ? duration : undefined
  } catch (err: unknown) {
    logger.warn(`ffprobe failed for ${filePath}: ${errorMessage(err)}`)
    return undefined
  }
}

export interface SplitAudioOptions extends MediaToolSettings {
  /** Where the parts go. Defaults to the directory of the input. */
  outputDir?: string
}

/**
 * Split an audio file into parts of roughly `maxChunkMb` each, by time.
 *
 * Files at or under the limit come back as a single segment pointing at the
 * input. When the duration cannot be probed, or no part could be cut, the
 * input is returned whole and the upload is left to succeed or fail on its own.
 * Parts that fail to cut are skipped.
 */
export async function splitAudio(
  audioPath: string,
  maxChunkMb: number,
  options: SplitAudioOptions = {},
): Promise<AudioSegment[]> {
  const { size } = await getFileStats(audioPath)
  const whole: AudioSegment[] = [{ index: 0, path: audioPath, sizeBytes: size, startSeconds: 0 }]

  if (bytesToMb(size) <= maxChunkMb) {
    logger.info(`Audio file is ${bytesToMb(size).toFixed(1)}MB, no splitting needed`)
    return whole
  }

  const duration = await probeDuration(audioPath, options)
  if (duration === undefined) {
    logger.warn(`Could not determine duration of ${audioPath}, sending it unsplit`)
    return whole
  }

  const windows = planSegments(size, duration, maxChunkMb)
  logger.info(
    `Splitting ${bytesToMb(size).toFixed(1)}MB audio (${formatDuration(duration)}) into ${windows.length} parts`,
  )

  const outputDir = options.outputDir ?? dirname(audioPath)
  await ensureDirectory(outputDir)
  const ext = extname(audioPath)
  const stem = basename(audioPath, ext)

  const segments: AudioSegment[] = []
  for (const window of windows) {
    const partPath = join(outputDir, `${stem}_part${window.index + 1}${ext}`)
    const command = createFFmpeg(audioPath, options)
      .setStartTime(window.startSeconds)
      .setDuration(window.durationSeconds)
      .audioCodec('copy')
      .output(partPath)

    try {
      await runFFmpeg(command)
      const stats = await getFileStats(partPath)
      if (stats.size === 0) {
        throw new Error(`${partPath} is empty`)
      }
      segments.push({
        index: window.index,
        path: partPath,
        sizeBytes: stats.size,
        startSeconds: window.startSeconds,
        durationSeconds: window.durationSeconds,
      })
      logger.info(`Part ${window.index + 1}/${windows.length}: ${partPath} (${bytesToMb(stats.size).toFixed(1)}MB)`)
    } catch (err: unknown) {
      logger.warn(`Skipping part ${window.index + 1}: ${errorMessage(err)}`)
    }
  }

  if (segments.length === 0) {
    logger.warn('No parts could be cut, sending the audio unsplit')
    return whole
  }
  return segments
}
