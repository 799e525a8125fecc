import { describe, it, expect, vi, beforeEach } from 'vitest'

const mockFileExistsSync = vi.hoisted(() => vi.fn())
const mockGetFileStatsSync = vi.hoisted(() => vi.fn())
const mockOpenReadStream = vi.hoisted(() => vi.fn())

vi.mock('../../../L1-infra/fileSystem/fileSystem.js', () => ({
  fileExistsSync: mockFileExistsSync,
  getFileStatsSync: mockGetFileStatsSync,
  openReadStream: mockOpenReadStream,
}))

const mockTranscriptionCreate = vi.hoisted(() => vi.fn())
const mockCreateOpenAI = vi.hoisted(() => vi.fn())

vi.mock('../../../L2-clients/llm/ai.js', () => ({
  createOpenAI: mockCreateOpenAI,
}))

import { transcribeFile } from '../../../L2-clients/openai/whisperClient.js'

describe('transcribeFile', () => {
  beforeEach(() => {
    mockFileExistsSync.mockReset().mockReturnValue(true)
    mockGetFileStatsSync.mockReset().mockReturnValue({ size: 1024 * 1024 })
    mockOpenReadStream.mockReset().mockReturnValue('fake-stream')
    mockTranscriptionCreate.mockReset().mockResolvedValue({ text: 'Hello world' })
    mockCreateOpenAI.mockReset().mockReturnValue({ audio: { transcriptions: { create: mockTranscriptionCreate } } })
  })

  it('uploads the file with the configured model and key', async () => {
    const text = await transcribeFile('/tmp/part1.mp3', { apiKey: 'test-key', model: 'whisper-1' })

    expect(text).toBe('Hello world')
    expect(mockCreateOpenAI).toHaveBeenCalledWith({ apiKey: 'test-key' })
    expect(mockTranscriptionCreate).toHaveBeenCalledWith({ model: 'whisper-1', file: 'fake-stream' })
    expect(mockOpenReadStream).toHaveBeenCalledWith('/tmp/part1.mp3')
  })

  it('accepts a plain-text response', async () => {
    mockTranscriptionCreate.mockResolvedValue('just text')

    expect(await transcribeFile('/tmp/a.mp3', { apiKey: 'test-key', model: 'whisper-1' })).toBe('just text')
  })

  it('throws on a response without text', async () => {
    mockTranscriptionCreate.mockResolvedValue({ segments: [] })

    await expect(transcribeFile('/tmp/a.mp3', { apiKey: 'test-key', model: 'whisper-1' }))
      .rejects.toThrow('Unrecognized transcription response: {"segments":[]}')
  })

  it('throws when the file is missing', async () => {
    mockFileExistsSync.mockReturnValue(false)

    await expect(transcribeFile('/tmp/gone.mp3', { apiKey: 'test-key', model: 'whisper-1' }))
      .rejects.toThrow('Audio file not found: /tmp/gone.mp3')
    expect(mockTranscriptionCreate).not.toHaveBeenCalled()
  })

  it('still sends files over the limit', async () => {
    mockGetFileStatsSync.mockReturnValue({ size: 30 * 1024 * 1024 })

    await transcribeFile('/tmp/big.mp3', { apiKey: 'test-key', model: 'whisper-1', maxFileMb: 25 })

    expect(mockTranscriptionCreate).toHaveBeenCalledTimes(1)
  })

  it('propagates API errors', async () => {
    mockTranscriptionCreate.mockRejectedValue(new Error('429 rate limited'))

    await expect(transcribeFile('/tmp/a.mp3', { apiKey: 'test-key', model: 'whisper-1' }))
      .rejects.toThrow('429 rate limited')
  })
})
