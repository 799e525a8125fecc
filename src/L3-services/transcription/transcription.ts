import { MissingCredentialError, TranscriptionFailedError, errorMessage } from '../../L0-pure/errors/errors.js'
import type { AudioSegment } from '../../L0-pure/types/index.js'
import { removeFile, withTempDir, writeTextFile } from '../../L1-infra/fileSystem/fileSystem.js'
import { basename, extname, join } from '../../L1-infra/paths/paths.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { extractAudio, splitAudio } from '../../L2-clients/ffmpeg/audioExtraction.js'
import { transcribeFile } from '../../L2-clients/openai/whisperClient.js'

/** Turns one audio file into text. */
export type Transcriber = (audioPath: string) => Promise<string>

/** Delete a scratch file; a failure is logged and otherwise ignored. */
export async function releaseFile(filePath: string): Promise<void> {
  try {
    await removeFile(filePath)
  } catch (err: unknown) {
    logger.warn(`Could not delete ${filePath}: ${errorMessage(err)}`)
  }
}

/**
 * Transcribe segments one after another, in order.
 *
 * A failed segment is logged and left out. Each segment file is deleted once
 * its call returns, except `originalAudioPath`, which the caller owns.
 */
export async function transcribeSegments(
  segments: readonly AudioSegment[],
  transcriber: Transcriber,
  originalAudioPath: string,
): Promise<string> {
  let transcript = ''
  let succeeded = 0

  for (const segment of segments) {
    logger.info(`Transcribing segment ${segment.index + 1}/${segments.length}`)
    try {
      const text = await transcriber(segment.path)
      transcript += `${text}\n\n`
      succeeded++
    } catch (err: unknown) {
      logger.error(`Segment ${segment.index + 1} failed: ${errorMessage(err)}`)
    } finally {
      if (segment.path !== originalAudioPath) {
        await releaseFile(segment.path)
      }
    }
  }

  if (succeeded === 0) {
    throw new TranscriptionFailedError(`None of the ${segments.length} audio segments could be transcribed`)
  }
  return transcript
}

export interface TranscribeVideoOptions {
  apiKey: string
  model: string
  maxChunkMb: number
  ffmpegPath?: string
  ffprobePath?: string
  toolTimeoutSeconds?: number
}

/**
 * Video → audio → segments → text file at `outputPath`.
 * All intermediate audio lives in a temporary directory removed on exit.
 */
export async function transcribeVideo(
  videoPath: string,
  outputPath: string,
  options: TranscribeVideoOptions,
): Promise<string> {
  if (!options.apiKey) {
    throw new MissingCredentialError('OPENAI_API_KEY', 'set via --api-key or env var')
  }

  const media = {
    ffmpegPath: options.ffmpegPath,
    ffprobePath: options.ffprobePath,
    timeoutSeconds: options.toolTimeoutSeconds,
  }

  const transcript = await withTempDir('recfetch-audio-', async (tempDir) => {
    const audioPath = join(tempDir, `${basename(videoPath, extname(videoPath))}.mp3`)
    await extractAudio(videoPath, audioPath, media)

    const segments = await splitAudio(audioPath, options.maxChunkMb, { ...media, outputDir: tempDir })
    const text = await transcribeSegments(
      segments,
      (segmentPath) => transcribeFile(segmentPath, {
        apiKey: options.apiKey,
        model: options.model,
        maxFileMb: options.maxChunkMb,
      }),
      audioPath,
    )

    await releaseFile(audioPath)
    return text
  })

  await writeTextFile(outputPath, transcript)
  logger.info(`Transcript saved: ${outputPath}`)
  return outputPath
}
