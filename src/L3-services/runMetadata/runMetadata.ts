import { errorMessage } from '../../L0-pure/errors/errors.js'
import type { ResourceId, RunMetadata, RunMetadataEntry } from '../../L0-pure/types/index.js'
import { fileExists, readJsonFile, writeJsonFile } from '../../L1-infra/fileSystem/fileSystem.js'
import logger from '../../L1-infra/logger/configLogger.js'

// ── Types ────────────────────────────────────────────────────────────────────

/** Stage outputs tracked per entry, each with a matching `<stage>Date`. */
export type OutputField = 'videoPath' | 'transcriptionPath' | 'summaryPath'

const DATE_FIELD = {
  videoPath: 'downloadDate',
  transcriptionPath: 'transcriptionDate',
  summaryPath: 'summaryDate',
} as const satisfies Record<OutputField, keyof RunMetadataEntry>

// ── Parsing ──────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function optionalString(raw: Record<string, unknown>, field: string): string | undefined {
  const value = raw[field]
  return typeof value === 'string' ? value : undefined
}

function parseEntry(key: string, raw: unknown): RunMetadataEntry | undefined {
  if (!isRecord(raw)) return undefined
  const entry: RunMetadataEntry = {
    fileId: optionalString(raw, 'fileId') ?? key,
    createdAt: optionalString(raw, 'createdAt') ?? new Date(0).toISOString(),
  }
  const optional = [
    'url', 'videoPath', 'downloadDate', 'transcriptionPath',
    'transcriptionDate', 'summaryPath', 'summaryDate',
  ] as const
  for (const field of optional) {
    const value = optionalString(raw, field)
    if (value !== undefined) entry[field] = value
  }
  return entry
}

// ── Read / Write ─────────────────────────────────────────────────────────────

/** Load the store. A missing file is an empty store; an unreadable one is replaced. */
export async function loadMetadata(metadataPath: string): Promise<RunMetadata> {
  let raw: unknown
  try {
    raw = await readJsonFile<unknown>(metadataPath, {})
  } catch (err: unknown) {
    logger.warn(`[RunMetadata] Corrupted metadata file, starting fresh: ${errorMessage(err)}`)
    return {}
  }
  if (!isRecord(raw)) {
    logger.warn(`[RunMetadata] Unexpected content in ${metadataPath}, starting fresh`)
    return {}
  }

  const metadata: RunMetadata = {}
  for (const [key, value] of Object.entries(raw)) {
    const entry = parseEntry(key, value)
    if (entry) metadata[key] = entry
    else logger.warn(`[RunMetadata] Dropping malformed entry: ${key}`)
  }
  return metadata
}

export async function saveMetadata(metadataPath: string, metadata: RunMetadata): Promise<void> {
  await writeJsonFile(metadataPath, metadata)
}

// ── Entries ──────────────────────────────────────────────────────────────────

/** Get the entry for `key`, creating it when absent. */
export function ensureEntry(
  metadata: RunMetadata,
  key: ResourceId,
  init: Partial<RunMetadataEntry> = {},
): RunMetadataEntry {
  const existing = metadata[key]
  if (existing) return existing
  const entry: RunMetadataEntry = { ...init, fileId: init.fileId ?? key, createdAt: new Date().toISOString() }
  metadata[key] = entry
  return entry
}

/** Store a stage output path with the current time. */
export function recordOutput(entry: RunMetadataEntry, field: OutputField, outputPath: string): void {
  entry[field] = outputPath
  entry[DATE_FIELD[field]] = new Date().toISOString()
}

/** Key of the entry whose `field` equals `outputPath`. */
export function findKeyByOutput(metadata: RunMetadata, field: OutputField, outputPath: string): ResourceId | undefined {
  return Object.keys(metadata).find((key) => metadata[key]?.[field] === outputPath)
}

/** Recorded `field` paths that are still on disk, in store order. */
export async function existingOutputs(metadata: RunMetadata, field: OutputField): Promise<string[]> {
  const found: string[] = []
  for (const entry of Object.values(metadata)) {
    const outputPath = entry[field]
    if (outputPath && (await fileExists(outputPath))) found.push(outputPath)
  }
  return found
}

/** The entry's `field` path, if recorded and still on disk. */
export async function existingOutput(entry: RunMetadataEntry, field: OutputField): Promise<string | undefined> {
  const outputPath = entry[field]
  return outputPath && (await fileExists(outputPath)) ? outputPath : undefined
}
