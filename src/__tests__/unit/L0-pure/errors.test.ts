import { describe, it, expect } from 'vitest'
import {
  RecfetchError,
  DownloadFailedError,
  ExtractionFailedError,
  MissingCredentialError,
  SummaryFailedError,
  errorMessage,
} from '../../../L0-pure/errors/errors.js'

describe('error classes', () => {
  it('lists the strategies tried', () => {
    const err = new DownloadFailedError('/out/v.mp4', [
      { strategy: 'generic-extractor', success: false, error: 'nope' },
      { strategy: 'direct-link', success: false, error: 'HTTP 403' },
    ])
    expect(err.message).toBe('All download strategies failed for /out/v.mp4 (tried: generic-extractor, direct-link)')
    expect(err.code).toBe('DOWNLOAD_FAILED')
    expect(err.attempts).toHaveLength(2)
    expect(err).toBeInstanceOf(RecfetchError)
  })

  it('takes the subclass name', () => {
    expect(new SummaryFailedError('x').name).toBe('SummaryFailedError')
  })

  it('appends the tool diagnostic', () => {
    const err = new ExtractionFailedError('Audio extraction failed', 'Invalid data found')
    expect(err.message).toBe('Audio extraction failed\nInvalid data found')
    expect(err.diagnostic).toBe('Invalid data found')
  })

  it('formats a missing credential with its hint', () => {
    expect(new MissingCredentialError('OPENAI_API_KEY', 'set via --api-key or env var').message)
      .toBe('Missing required: OPENAI_API_KEY (set via --api-key or env var)')
    expect(new MissingCredentialError('GOOGLE_API_KEY').message).toBe('Missing required: GOOGLE_API_KEY')
  })

  it('errorMessage handles non-errors', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom')
    expect(errorMessage('plain')).toBe('plain')
  })
})
