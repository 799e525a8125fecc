import { MissingCredentialError, SummaryFailedError, errorMessage } from '../../L0-pure/errors/errors.js'
import { SUMMARY_SYSTEM_PROMPT, buildSummaryPrompt } from '../../L0-pure/prompts/summaryPrompt.js'
import { readTextFile, writeTextFile } from '../../L1-infra/fileSystem/fileSystem.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { completeChat } from '../../L2-clients/openai/chatClient.js'

export interface SummaryOptions {
  apiKey: string
  model: string
  language: string
}

const SUMMARY_TEMPERATURE = 0.5
const SUMMARY_MAX_TOKENS = 4000

/** Meeting notes in Markdown for `transcript`, written in `options.language`. */
export async function summarize(transcript: string, options: SummaryOptions): Promise<string> {
  if (!options.apiKey) {
    throw new MissingCredentialError('OPENAI_API_KEY', 'set via --api-key or env var')
  }

  logger.info(`Summarizing ${transcript.length} characters with ${options.model} (${options.language})`)
  try {
    return await completeChat(
      [
        { role: 'system', content: SUMMARY_SYSTEM_PROMPT },
        { role: 'user', content: buildSummaryPrompt(transcript, options.language) },
      ],
      {
        apiKey: options.apiKey,
        model: options.model,
        temperature: SUMMARY_TEMPERATURE,
        maxTokens: SUMMARY_MAX_TOKENS,
      },
    )
  } catch (err: unknown) {
    throw new SummaryFailedError(`Summary request failed: ${errorMessage(err)}`, { cause: err })
  }
}

/** Read a transcript file and write its summary to `outputPath`. The transcript is left as it is. */
export async function summarizeTranscriptFile(
  transcriptPath: string,
  outputPath: string,
  options: SummaryOptions,
): Promise<string> {
  const transcript = await readTextFile(transcriptPath)
  const summary = await summarize(transcript, options)
  await writeTextFile(outputPath, summary)
  logger.info(`Summary saved: ${outputPath}`)
  return outputPath
}
