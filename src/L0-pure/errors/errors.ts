import type { DownloadAttempt } from '../types/index.js'

export type ErrorCode =
  | 'INVALID_URL'
  | 'DOWNLOAD_FAILED'
  | 'EXTRACTION_FAILED'
  | 'TRANSCRIPTION_FAILED'
  | 'SUMMARY_FAILED'
  | 'MISSING_CREDENTIAL'

/** Base class for every failure the pipeline reports by name. */
export class RecfetchError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

/** The input does not carry a `/d/<id>` segment. Unrecoverable for that item. */
export class InvalidUrlError extends RecfetchError {
  readonly input: string

  constructor(input: string) {
    super('INVALID_URL', `Could not extract a file id from URL: ${input}`)
    this.input = input
  }
}

/** Every download strategy failed. */
export class DownloadFailedError extends RecfetchError {
  readonly attempts: DownloadAttempt[]

  constructor(destinationPath: string, attempts: DownloadAttempt[]) {
    const tried = attempts.map((a) => a.strategy).join(', ')
    super('DOWNLOAD_FAILED', `All download strategies failed for ${destinationPath} (tried: ${tried})`)
    this.attempts = attempts
  }
}

/** ffmpeg could not demux audio from the video. */
export class ExtractionFailedError extends RecfetchError {
  readonly diagnostic: string

  constructor(message: string, diagnostic = '') {
    super('EXTRACTION_FAILED', diagnostic ? `${message}\n${diagnostic}` : message)
    this.diagnostic = diagnostic
  }
}

/** No segment produced any text. */
export class TranscriptionFailedError extends RecfetchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSCRIPTION_FAILED', message, options)
  }
}

export class SummaryFailedError extends RecfetchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SUMMARY_FAILED', message, options)
  }
}

/** A required key is not configured. Raised before any API call is made. */
export class MissingCredentialError extends RecfetchError {
  readonly variable: string

  constructor(variable: string, hint = '') {
    super('MISSING_CREDENTIAL', `Missing required: ${variable}${hint ? ` (${hint})` : ''}`)
    this.variable = variable
  }
}

/** Message of any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
