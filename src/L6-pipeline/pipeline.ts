import { basename, join, resolve } from '../L1-infra/paths/paths.js'
import { ensureDirectory } from '../L1-infra/fileSystem/fileSystem.js'
import { sha256Hex } from '../L1-infra/hash/hash.js'
import logger, { popPipe, pushPipe, sanitizeForLog } from '../L1-infra/logger/configLogger.js'
import { getConfig } from '../L1-infra/config/environment.js'
import type { AppEnvironment } from '../L1-infra/config/environment.js'
import { extractId } from '../L0-pure/driveLinks/driveLinks.js'
import { errorMessage } from '../L0-pure/errors/errors.js'
import {
  formatRunTimestamp,
  parseOutputFileName,
  summaryFileName,
  transcriptionFileName,
  videoFileName,
} from '../L0-pure/text/text.js'
import type { ItemResult, ResourceId, RunMetadataEntry, RunMode, StageResult } from '../L0-pure/types/index.js'
import { PipelineStage } from '../L0-pure/types/index.js'
import { DownloadResolver, createDefaultStrategies } from '../L3-services/download/downloadResolver.js'
import { transcribeVideo } from '../L3-services/transcription/transcription.js'
import type { TranscribeVideoOptions } from '../L3-services/transcription/transcription.js'
import { summarizeTranscriptFile } from '../L3-services/summary/summary.js'
import type { SummaryOptions } from '../L3-services/summary/summary.js'
import {
  ensureEntry,
  existingOutput,
  existingOutputs,
  findKeyByOutput,
  loadMetadata,
  recordOutput,
  saveMetadata,
} from '../L3-services/runMetadata/runMetadata.js'
import type { OutputField } from '../L3-services/runMetadata/runMetadata.js'
import { readUrls } from '../L3-services/urlList/urlList.js'

/**
 * Execute a single pipeline stage with error isolation and timing.
 *
 * ### Stage contract
 * - Each stage is wrapped in a try/catch so a failure **does not abort** the
 *   batch. The next item proceeds regardless.
 * - Returns `undefined` on failure (callers must null-check before using the result).
 * - Records success/failure, error message, and wall-clock duration in `stageResults`.
 *
 * @param stageName - Enum value identifying the stage (used in logs and results)
 * @param key - Identifier of the item being processed, for the log line
 * @param fn - Async function that performs the stage's work
 * @param stageResults - Mutable array that accumulates per-stage outcome records
 * @returns The stage result on success, or `undefined` on failure
 */
export async function runStage<T>(
  stageName: PipelineStage,
  key: ResourceId,
  fn: () => Promise<T>,
  stageResults: StageResult[],
): Promise<T | undefined> {
  const start = Date.now()
  try {
    const result = await fn()
    const duration = Date.now() - start
    stageResults.push({ stage: stageName, success: true, duration })
    logger.info(`Stage ${stageName} [${key}] completed in ${duration}ms`)
    return result
  } catch (err: unknown) {
    const duration = Date.now() - start
    const message = errorMessage(err)
    stageResults.push({ stage: stageName, success: false, error: message, duration })
    logger.error(`Stage ${stageName} [${key}] failed after ${duration}ms: ${message}`)
    return undefined
  }
}

// ── Helpers ──────────────────────────────────────────────────────────────────

/** Id for a file the metadata store has never seen: parsed from its name, else hashed from its path. */
export function localIdFor(filePath: string): ResourceId {
  return parseOutputFileName(basename(filePath)) ?? `local-${sha256Hex(resolve(filePath)).slice(0, 12)}`
}

function transcriptionOptions(config: AppEnvironment): TranscribeVideoOptions {
  return {
    apiKey: config.OPENAI_API_KEY,
    model: config.TRANSCRIPTION_MODEL,
    maxChunkMb: config.MAX_CHUNK_MB,
    ffmpegPath: config.FFMPEG_PATH,
    ffprobePath: config.FFPROBE_PATH,
    toolTimeoutSeconds: config.TOOL_TIMEOUT_SECONDS,
  }
}

function summaryOptions(config: AppEnvironment): SummaryOptions {
  return {
    apiKey: config.OPENAI_API_KEY,
    model: config.SUMMARY_MODEL,
    language: config.SUMMARY_LANGUAGE,
  }
}

export function createResolver(config: AppEnvironment = getConfig()): DownloadResolver {
  return new DownloadResolver(createDefaultStrategies({
    ytdlpPath: config.YTDLP_PATH,
    toolTimeoutSeconds: config.TOOL_TIMEOUT_SECONDS,
    driveBaseUrl: config.DRIVE_BASE_URL,
    driveMediaHost: config.DRIVE_MEDIA_HOST,
    googleApiKey: config.GOOGLE_API_KEY,
  }))
}

interface StageFlags {
  download: boolean
  transcribe: boolean
  summarize: boolean
}

/** Which stages a mode runs. `all` defers to the ENABLE_* switches. */
export function stagesFor(mode: RunMode, config: AppEnvironment): StageFlags {
  return {
    download: mode === 'download' || (mode === 'all' && config.ENABLE_DOWNLOAD),
    transcribe: mode === 'transcribe' || (mode === 'all' && config.ENABLE_TRANSCRIPTION),
    summarize: mode === 'summarize' || (mode === 'all' && config.ENABLE_SUMMARY),
  }
}

/** Run one output-producing stage unless its recorded output is still on disk. */
async function produceOnce(
  stage: PipelineStage,
  field: OutputField,
  entry: RunMetadataEntry,
  result: ItemResult,
  persist: () => Promise<void>,
  produce: () => Promise<string>,
): Promise<string | undefined> {
  const existing = await existingOutput(entry, field)
  if (existing) {
    logger.info(`${stage} already done for ${result.key}: ${existing}`)
    return existing
  }
  const outputPath = await runStage(stage, result.key, produce, result.stageResults)
  if (outputPath) {
    recordOutput(entry, field, outputPath)
    await persist()
  }
  return outputPath
}

// ── Items ────────────────────────────────────────────────────────────────────

/**
 * Download, transcribe and summarize one sharing URL, as far as `mode` asks.
 * Returns undefined when the URL carries no file id.
 */
export async function processUrl(
  url: string,
  mode: RunMode,
  resolver: DownloadResolver = createResolver(),
): Promise<ItemResult | undefined> {
  const config = getConfig()

  let fileId: ResourceId
  try {
    fileId = extractId(url)
  } catch (err: unknown) {
    logger.error(errorMessage(err))
    return undefined
  }

  const metadata = await loadMetadata(config.METADATA_PATH)
  const entry = ensureEntry(metadata, fileId, { url, fileId })
  const persist = (): Promise<void> => saveMetadata(config.METADATA_PATH, metadata)
  const timestamp = formatRunTimestamp(new Date())
  const stages = stagesFor(mode, config)
  const result: ItemResult = { key: fileId, stageResults: [] }

  let videoPath: string | undefined
  if (stages.download) {
    const destination = join(config.VIDEO_OUTPUT_DIR, videoFileName(fileId, timestamp))
    logger.info(`Downloading ${sanitizeForLog(url)}`)
    const outcome = await runStage(PipelineStage.Download, fileId, () => resolver.resolve(url, destination), result.stageResults)
    if (outcome) {
      recordOutput(entry, 'videoPath', outcome.path)
      await persist()
      videoPath = outcome.path
    }
  } else {
    videoPath = await existingOutput(entry, 'videoPath')
  }
  result.videoPath = videoPath

  let transcriptionPath = await existingOutput(entry, 'transcriptionPath')
  if (stages.transcribe) {
    if (videoPath) {
      const source = videoPath
      const destination = join(config.TRANSCRIPTION_OUTPUT_DIR, transcriptionFileName(fileId, timestamp))
      transcriptionPath = await produceOnce(PipelineStage.Transcription, 'transcriptionPath', entry, result, persist,
        () => transcribeVideo(source, destination, transcriptionOptions(config)))
    } else {
      logger.error(`No video available to transcribe for ${fileId}`)
    }
  }
  result.transcriptionPath = transcriptionPath

  if (stages.summarize) {
    if (transcriptionPath) {
      const source = transcriptionPath
      const destination = join(config.SUMMARY_OUTPUT_DIR, summaryFileName(fileId, timestamp))
      result.summaryPath = await produceOnce(PipelineStage.Summary, 'summaryPath', entry, result, persist,
        () => summarizeTranscriptFile(source, destination, summaryOptions(config)))
    } else {
      logger.error(`No transcript available to summarize for ${fileId}`)
    }
  }

  return result
}

/** Look up (or register) the metadata entry owning `filePath` as its `field` output. */
async function entryForFile(
  metadataPath: string,
  field: OutputField,
  filePath: string,
): Promise<{ key: ResourceId; entry: RunMetadataEntry; persist: () => Promise<void> }> {
  const metadata = await loadMetadata(metadataPath)
  const persist = (): Promise<void> => saveMetadata(metadataPath, metadata)
  const known = findKeyByOutput(metadata, field, filePath)
  const key = known ?? localIdFor(filePath)
  const entry = ensureEntry(metadata, key, { fileId: key })
  if (!known) {
    recordOutput(entry, field, filePath)
    await persist()
  }
  return { key, entry, persist }
}

/**
 * Transcribe a video already on disk. With mode `all` the summary follows
 * when ENABLE_SUMMARY is set.
 */
export async function processVideoFile(videoPath: string, mode: RunMode = 'transcribe'): Promise<ItemResult> {
  const config = getConfig()
  const { key, entry, persist } = await entryForFile(config.METADATA_PATH, 'videoPath', videoPath)
  const timestamp = formatRunTimestamp(new Date())
  const result: ItemResult = { key, videoPath, stageResults: [] }

  const destination = join(config.TRANSCRIPTION_OUTPUT_DIR, transcriptionFileName(entry.fileId, timestamp))
  logger.info(`Transcribing ${sanitizeForLog(videoPath)}`)
  result.transcriptionPath = await produceOnce(PipelineStage.Transcription, 'transcriptionPath', entry, result, persist,
    () => transcribeVideo(videoPath, destination, transcriptionOptions(config)))

  if (mode === 'all' && config.ENABLE_SUMMARY && result.transcriptionPath) {
    const source = result.transcriptionPath
    const summaryPath = join(config.SUMMARY_OUTPUT_DIR, summaryFileName(entry.fileId, timestamp))
    result.summaryPath = await produceOnce(PipelineStage.Summary, 'summaryPath', entry, result, persist,
      () => summarizeTranscriptFile(source, summaryPath, summaryOptions(config)))
  }
  return result
}

/** Summarize a transcript already on disk. */
export async function processTranscriptFile(transcriptPath: string): Promise<ItemResult> {
  const config = getConfig()
  const { key, entry, persist } = await entryForFile(config.METADATA_PATH, 'transcriptionPath', transcriptPath)
  const timestamp = formatRunTimestamp(new Date())
  const result: ItemResult = { key, transcriptionPath: transcriptPath, stageResults: [] }

  const destination = join(config.SUMMARY_OUTPUT_DIR, summaryFileName(entry.fileId, timestamp))
  logger.info(`Summarizing ${sanitizeForLog(transcriptPath)}`)
  result.summaryPath = await produceOnce(PipelineStage.Summary, 'summaryPath', entry, result, persist,
    () => summarizeTranscriptFile(transcriptPath, destination, summaryOptions(config)))
  return result
}

/** Recorded videos that still exist. */
export async function findAllVideos(): Promise<string[]> {
  return existingOutputs(await loadMetadata(getConfig().METADATA_PATH), 'videoPath')
}

/** Recorded transcripts that still exist. */
export async function findAllTranscriptions(): Promise<string[]> {
  return existingOutputs(await loadMetadata(getConfig().METADATA_PATH), 'transcriptionPath')
}

// ── Batches ──────────────────────────────────────────────────────────────────

/**
 * Process `items` one at a time, pausing `delayMinutes` between consecutive
 * items (never after the last one). An item whose `fn` rejects is logged and
 * left out of the results; the batch carries on with the next one.
 */
export async function runBatch<T, R>(
  items: readonly T[],
  fn: (item: T) => Promise<R>,
  delayMinutes: number,
): Promise<R[]> {
  const results: R[] = []
  for (let i = 0; i < items.length; i++) {
    logger.info(`[${i + 1}/${items.length}] ${sanitizeForLog(items[i])}`)
    try {
      results.push(await fn(items[i]))
    } catch (err: unknown) {
      logger.error(`[${i + 1}/${items.length}] ${sanitizeForLog(items[i])} failed: ${errorMessage(err)}`)
    }

    if (i < items.length - 1 && delayMinutes > 0) {
      logger.info(`Waiting ${delayMinutes} minute(s) before the next item...`)
      await new Promise<void>((done) => setTimeout(done, delayMinutes * 60_000))
    }
  }
  return results
}

export interface RunRequest {
  mode: RunMode
  /** Process this one URL. */
  url?: string
  /** Process this local video (transcribe) or transcript (summarize). */
  input?: string
  /** Process every recorded video / transcript instead of the URL file (transcribe and summarize modes). */
  all?: boolean
}

/** Outcome of a whole run; `exitCode` is what the CLI should exit with. */
export interface RunSummary {
  exitCode: number
  items: ItemResult[]
}

function failedStages(items: readonly ItemResult[]): number {
  return items.reduce((n, item) => n + item.stageResults.filter((s) => !s.success).length, 0)
}

/** Pick the work a CLI invocation describes and run it, tee-ing the log to OUTPUT_DIR/pipeline.log. */
export async function runPipeline(request: RunRequest): Promise<RunSummary> {
  const config = getConfig()
  await ensureDirectory(config.OUTPUT_DIR)
  await ensureDirectory(config.VIDEO_OUTPUT_DIR)
  await ensureDirectory(config.TRANSCRIPTION_OUTPUT_DIR)
  await ensureDirectory(config.SUMMARY_OUTPUT_DIR)

  pushPipe(config.OUTPUT_DIR)
  try {
    const items = await dispatch(request, config)
    if (items === undefined) return { exitCode: 1, items: [] }

    const failures = failedStages(items)
    logger.info(`Processed ${items.length} item(s), ${failures} failed stage(s)`)
    return { exitCode: 0, items }
  } finally {
    popPipe()
  }
}

async function dispatch(request: RunRequest, config: AppEnvironment): Promise<ItemResult[] | undefined> {
  const { mode } = request
  const present = (r: ItemResult | undefined): r is ItemResult => r !== undefined

  if (request.url) {
    const result = await processUrl(request.url, mode)
    return result ? [result] : []
  }

  if (request.input) {
    if (mode === 'transcribe') return [await processVideoFile(request.input, mode)]
    if (mode === 'summarize') return [await processTranscriptFile(request.input)]
    logger.error(`Mode '${mode}' cannot be used with --input (use --transcribe or --summarize)`)
    return undefined
  }

  if (request.all && mode === 'transcribe') {
    const videos = await findAllVideos()
    if (videos.length === 0) logger.warn('No recorded videos to transcribe')
    return runBatch(videos, (v) => processVideoFile(v, mode), config.DELAY_MINUTES)
  }

  if (request.all && mode === 'summarize') {
    const transcripts = await findAllTranscriptions()
    if (transcripts.length === 0) logger.warn('No recorded transcripts to summarize')
    return runBatch(transcripts, (t) => processTranscriptFile(t), config.DELAY_MINUTES)
  }

  const urls = await readUrls(config.URL_FILE)
  if (urls.length === 0) {
    logger.warn(`No URLs found in ${config.URL_FILE}`)
    return []
  }
  logger.info(`Processing ${urls.length} URL(s)`)
  const results = await runBatch(urls, (u) => processUrl(u, mode), config.DELAY_MINUTES)
  return results.filter(present)
}
