import { createOpenAI } from '../llm/ai.js'
import { fileExistsSync, getFileStatsSync, openReadStream } from '../../L1-infra/fileSystem/fileSystem.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { normalizeTranscriptionResponse } from '../../L0-pure/responses/responses.js'
import { bytesToMb } from '../../L0-pure/segments/segmentPlan.js'

export interface WhisperOptions {
  apiKey: string
  model: string
  /** Upload limit in MiB. Larger files are still sent, with a warning. */
  maxFileMb?: number
}

/**
 * Send one audio file to the speech-to-text endpoint and return its text.
 * Throws on a missing file, an API error, or a response with no text in it.
 */
export async function transcribeFile(audioPath: string, options: WhisperOptions): Promise<string> {
  if (!fileExistsSync(audioPath)) {
    throw new Error(`Audio file not found: ${audioPath}`)
  }

  const sizeMb = bytesToMb(getFileStatsSync(audioPath).size)
  if (options.maxFileMb !== undefined && sizeMb > options.maxFileMb) {
    logger.warn(`Audio file is ${sizeMb.toFixed(1)}MB, over the ${options.maxFileMb}MB upload limit`)
  }

  logger.info(`Transcribing ${audioPath} (${sizeMb.toFixed(1)}MB) with ${options.model}`)

  const openai = createOpenAI({ apiKey: options.apiKey })
  const response: unknown = await openai.audio.transcriptions.create({
    model: options.model,
    file: openReadStream(audioPath),
  })

  const normalized = normalizeTranscriptionResponse(response)
  if (normalized.kind === 'unrecognized') {
    throw new Error(`Unrecognized transcription response: ${normalized.preview}`)
  }
  return normalized.text
}
