/**
 * Type definitions for the recfetch pipeline.
 *
 * Recordings flow through download → audio extraction → segmentation →
 * transcription → summary. Each stage can fail on its own; the orchestrator
 * records what it got and moves on.
 */

// ============================================================================
// DOWNLOAD
// ============================================================================

/** Opaque identifier of a remote recording, taken from its sharing URL. */
export type ResourceId = string

export type StrategyName = 'generic-extractor' | 'direct-link' | 'provider-sdk'

/**
 * What a download strategy gets to work with.
 *
 * @property url - The sharing URL as given by the user
 * @property fileId - Identifier extracted from `url`
 * @property destinationPath - Where the media file must end up
 */
export interface DownloadRequest {
  url: string
  fileId: ResourceId
  destinationPath: string
}

/** Outcome of a single strategy run. Not persisted. */
export interface DownloadAttempt {
  strategy: StrategyName
  success: boolean
  path?: string
  error?: string
}

export interface DownloadOutcome {
  strategy: StrategyName
  path: string
  attempts: DownloadAttempt[]
}

// ============================================================================
// AUDIO
// ============================================================================

/**
 * A slice of an audio file small enough for the speech-to-text upload limit.
 *
 * `durationSeconds` is absent when the file was small enough to pass through
 * unsplit (no probe is run in that case).
 */
export interface AudioSegment {
  index: number
  path: string
  sizeBytes: number
  startSeconds: number
  durationSeconds?: number
}

/** Time range of one planned cut, before ffmpeg runs. */
export interface SegmentWindow {
  index: number
  startSeconds: number
  durationSeconds: number
}

// ============================================================================
// PIPELINE
// ============================================================================

export type RunMode = 'all' | 'download' | 'transcribe' | 'summarize'

export enum PipelineStage {
  Download = 'download',
  Transcription = 'transcription',
  Summary = 'summary',
}

export interface StageResult {
  stage: PipelineStage
  success: boolean
  error?: string
  duration: number
}

/**
 * What one orchestrated item produced.
 *
 * Output paths are optional because stages fail independently: a run can
 * yield a video but no transcript, or a transcript but no summary.
 */
export interface ItemResult {
  key: ResourceId
  videoPath?: string
  transcriptionPath?: string
  summaryPath?: string
  stageResults: StageResult[]
}

// ============================================================================
// RUN METADATA
// ============================================================================

export interface RunMetadataEntry {
  url?: string
  fileId: ResourceId
  createdAt: string
  videoPath?: string
  downloadDate?: string
  transcriptionPath?: string
  transcriptionDate?: string
  summaryPath?: string
  summaryDate?: string
}

export type RunMetadata = Record<ResourceId, RunMetadataEntry>

// ============================================================================
// MODEL RESPONSES
// ============================================================================

/** Text pulled out of a speech-to-text or chat response, whatever shape it came in. */
export type NormalizedText =
  | { kind: 'text'; text: string }
  | { kind: 'unrecognized'; preview: string }
