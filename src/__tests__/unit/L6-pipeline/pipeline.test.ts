import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { DownloadRequest, StageResult } from '../../../L0-pure/types/index.js'
import { PipelineStage } from '../../../L0-pure/types/index.js'
import type { AppEnvironment } from '../../../L1-infra/config/environment.js'

// ---- Hoisted mock variables (vi.mock is hoisted above imports) ----

const {
  files,
  mockGetConfig,
  mockTranscribeVideo,
  mockSummarizeTranscriptFile,
  mockGenericAttempt,
  mockDirectAttempt,
  mockSdkAttempt,
} = vi.hoisted(() => ({
  files: new Map<string, string>(),
  mockGetConfig: vi.fn(),
  mockTranscribeVideo: vi.fn(),
  mockSummarizeTranscriptFile: vi.fn(),
  mockGenericAttempt: vi.fn(),
  mockDirectAttempt: vi.fn(),
  mockSdkAttempt: vi.fn(),
}))

// ---- Mock L1 dependencies: an in-memory file system ----

vi.mock('../../../L1-infra/config/environment.js', () => ({ getConfig: mockGetConfig }))
vi.mock('../../../L1-infra/fileSystem/fileSystem.js', () => ({
  ensureDirectory: vi.fn(async () => {}),
  fileExists: vi.fn(async (path: string) => files.has(path)),
  fileHasContent: vi.fn(async (path: string) => (files.get(path) ?? '').length > 0),
  removeFile: vi.fn(async (path: string) => {
    files.delete(path)
  }),
  readJsonFile: vi.fn(async (path: string, fallback: unknown) => {
    const raw = files.get(path)
    return raw === undefined ? fallback : JSON.parse(raw)
  }),
  writeJsonFile: vi.fn(async (path: string, data: unknown) => {
    files.set(path, JSON.stringify(data))
  }),
  readTextFile: vi.fn(async (path: string) => {
    const raw = files.get(path)
    if (raw === undefined) throw new Error(`File not found: ${path}`)
    return raw
  }),
  writeTextFile: vi.fn(async (path: string, content: string) => {
    files.set(path, content)
  }),
}))

// ---- Mock L3 stage services and download strategies ----

vi.mock('../../../L3-services/transcription/transcription.js', () => ({ transcribeVideo: mockTranscribeVideo }))
vi.mock('../../../L3-services/summary/summary.js', () => ({ summarizeTranscriptFile: mockSummarizeTranscriptFile }))
vi.mock('../../../L3-services/download/genericExtractor.js', () => ({
  createGenericExtractorStrategy: () => ({ name: 'generic-extractor', attempt: mockGenericAttempt }),
}))
vi.mock('../../../L3-services/download/directLink.js', () => ({
  createDirectLinkStrategy: () => ({ name: 'direct-link', attempt: mockDirectAttempt }),
}))
vi.mock('../../../L3-services/download/providerSdk.js', () => ({
  createProviderSdkStrategy: () => ({ name: 'provider-sdk', attempt: mockSdkAttempt }),
}))

import {
  runStage,
  stagesFor,
  localIdFor,
  processUrl,
  processVideoFile,
  processTranscriptFile,
  runBatch,
  runPipeline,
} from '../../../L6-pipeline/pipeline.js'
import logger, { pushPipe, popPipe } from '../../../L1-infra/logger/configLogger.js'
import { sha256Hex } from '../../../L1-infra/hash/hash.js'
import { resolve } from '../../../L1-infra/paths/paths.js'
import { writeJsonFile } from '../../../L1-infra/fileSystem/fileSystem.js'

const RUN_DATE = new Date(2026, 2, 1, 10, 0, 0)
const RUN_ISO = RUN_DATE.toISOString()
const TS = '20260301_100000'
const URL = 'https://drive.google.com/file/d/abc123/view?usp=sharing'
const METADATA = '/out/metadata.json'

function makeConfig(overrides: Partial<AppEnvironment> = {}): AppEnvironment {
  return {
    URL_FILE: '/out/urls.txt',
    DELAY_MINUTES: 0,
    OUTPUT_DIR: '/out',
    METADATA_PATH: METADATA,
    VIDEO_OUTPUT_DIR: '/out/videos',
    TRANSCRIPTION_OUTPUT_DIR: '/out/transcriptions',
    SUMMARY_OUTPUT_DIR: '/out/summaries',
    ENABLE_DOWNLOAD: true,
    ENABLE_TRANSCRIPTION: true,
    ENABLE_SUMMARY: true,
    OPENAI_API_KEY: 'test-key',
    TRANSCRIPTION_MODEL: 'whisper-1',
    SUMMARY_MODEL: 'gpt-4o',
    SUMMARY_LANGUAGE: 'English',
    MAX_CHUNK_MB: 25,
    GOOGLE_API_KEY: '',
    DRIVE_BASE_URL: 'https://drive.google.com',
    DRIVE_MEDIA_HOST: 'googlevideo.com',
    YTDLP_PATH: 'yt-dlp',
    FFMPEG_PATH: 'ffmpeg',
    FFPROBE_PATH: 'ffprobe',
    TOOL_TIMEOUT_SECONDS: 600,
    VERBOSE: false,
    ...overrides,
  }
}

function storedMetadata(): unknown {
  const raw = files.get(METADATA)
  return raw === undefined ? undefined : JSON.parse(raw)
}

beforeEach(() => {
  vi.clearAllMocks()
  vi.useFakeTimers()
  vi.setSystemTime(RUN_DATE)
  files.clear()
  mockGetConfig.mockReturnValue(makeConfig())

  mockGenericAttempt.mockImplementation(async (request: DownloadRequest) => {
    files.set(request.destinationPath, 'video-bytes')
  })
  mockDirectAttempt.mockRejectedValue(new Error('HTTP 403'))
  mockSdkAttempt.mockRejectedValue(new Error('Missing required: GOOGLE_API_KEY'))
  mockTranscribeVideo.mockImplementation(async (_video: string, outputPath: string) => {
    files.set(outputPath, 'hello world\n\n')
    return outputPath
  })
  mockSummarizeTranscriptFile.mockImplementation(async (_transcript: string, outputPath: string) => {
    files.set(outputPath, '# Notes')
    return outputPath
  })
})

afterEach(() => {
  vi.useRealTimers()
})

// ---- runStage ----

describe('runStage', () => {
  it('records a successful stage and returns its value', async () => {
    const results: StageResult[] = []

    const value = await runStage(PipelineStage.Download, 'abc', async () => 'done', results)

    expect(value).toBe('done')
    expect(results).toEqual([{ stage: PipelineStage.Download, success: true, duration: 0 }])
  })

  it('records a failure without throwing', async () => {
    const results: StageResult[] = []

    const value = await runStage(PipelineStage.Summary, 'abc', async () => { throw new Error('quota') }, results)

    expect(value).toBeUndefined()
    expect(results).toEqual([{ stage: PipelineStage.Summary, success: false, error: 'quota', duration: 0 }])
    expect(logger.error).toHaveBeenCalledWith('Stage summary [abc] failed after 0ms: quota')
  })
})

// ---- stagesFor ----

describe('stagesFor', () => {
  it('runs exactly one stage for the single-stage modes', () => {
    const config = makeConfig({ ENABLE_DOWNLOAD: false, ENABLE_TRANSCRIPTION: false, ENABLE_SUMMARY: false })

    expect(stagesFor('download', config)).toEqual({ download: true, transcribe: false, summarize: false })
    expect(stagesFor('transcribe', config)).toEqual({ download: false, transcribe: true, summarize: false })
    expect(stagesFor('summarize', config)).toEqual({ download: false, transcribe: false, summarize: true })
  })

  it('follows the ENABLE_* switches in all mode', () => {
    const config = makeConfig({ ENABLE_DOWNLOAD: true, ENABLE_TRANSCRIPTION: false, ENABLE_SUMMARY: true })

    expect(stagesFor('all', config)).toEqual({ download: true, transcribe: false, summarize: true })
  })
})

// ---- localIdFor ----

describe('localIdFor', () => {
  it('recovers the id from a name the pipeline produced', () => {
    expect(localIdFor(`/somewhere/video_abc123_${TS}.mp4`)).toBe('abc123')
    expect(localIdFor(`transcription_x-y_z_${TS}.txt`)).toBe('x-y_z')
  })

  it('hashes the absolute path of any other file', () => {
    const id = localIdFor('/recordings/standup.mp4')

    expect(id).toBe(`local-${sha256Hex(resolve('/recordings/standup.mp4')).slice(0, 12)}`)
    expect(id).toMatch(/^local-[0-9a-f]{12}$/)
    expect(localIdFor('/recordings/standup.mp4')).toBe(id)
    expect(localIdFor('/recordings/retro.mp4')).not.toBe(id)
  })
})

// ---- processUrl ----

describe('processUrl', () => {
  it('downloads, transcribes and summarizes in all mode, persisting each output', async () => {
    const result = await processUrl(URL, 'all')

    const videoPath = `/out/videos/video_abc123_${TS}.mp4`
    const transcriptionPath = `/out/transcriptions/transcription_abc123_${TS}.txt`
    const summaryPath = `/out/summaries/summary_abc123_${TS}.md`
    expect(result).toEqual({
      key: 'abc123',
      videoPath,
      transcriptionPath,
      summaryPath,
      stageResults: [
        { stage: PipelineStage.Download, success: true, duration: 0 },
        { stage: PipelineStage.Transcription, success: true, duration: 0 },
        { stage: PipelineStage.Summary, success: true, duration: 0 },
      ],
    })
    expect(mockTranscribeVideo).toHaveBeenCalledWith(videoPath, transcriptionPath, {
      apiKey: 'test-key',
      model: 'whisper-1',
      maxChunkMb: 25,
      ffmpegPath: 'ffmpeg',
      ffprobePath: 'ffprobe',
      toolTimeoutSeconds: 600,
    })
    expect(mockSummarizeTranscriptFile).toHaveBeenCalledWith(transcriptionPath, summaryPath, {
      apiKey: 'test-key',
      model: 'gpt-4o',
      language: 'English',
    })
    expect(storedMetadata()).toEqual({
      abc123: {
        url: URL,
        fileId: 'abc123',
        createdAt: RUN_ISO,
        videoPath,
        downloadDate: RUN_ISO,
        transcriptionPath,
        transcriptionDate: RUN_ISO,
        summaryPath,
        summaryDate: RUN_ISO,
      },
    })
  })

  it('returns undefined for a URL without a file id', async () => {
    expect(await processUrl('https://example.com/meeting', 'all')).toBeUndefined()
    expect(mockGenericAttempt).not.toHaveBeenCalled()
    expect(files.has(METADATA)).toBe(false)
  })

  it('skips transcription and summary when every download strategy fails', async () => {
    mockGenericAttempt.mockRejectedValue(new Error('yt-dlp not found on PATH'))

    const result = await processUrl(URL, 'all')

    expect(result?.videoPath).toBeUndefined()
    expect(result?.stageResults).toEqual([
      {
        stage: PipelineStage.Download,
        success: false,
        error: `All download strategies failed for /out/videos/video_abc123_${TS}.mp4 (tried: generic-extractor, direct-link, provider-sdk)`,
        duration: 0,
      },
    ])
    expect(mockTranscribeVideo).not.toHaveBeenCalled()
    expect(mockSummarizeTranscriptFile).not.toHaveBeenCalled()
    expect(logger.error).toHaveBeenCalledWith('No video available to transcribe for abc123')
  })

  it('falls back to the next strategy when the first fails', async () => {
    mockGenericAttempt.mockRejectedValue(new Error('exit 1'))
    mockDirectAttempt.mockImplementation(async (request: DownloadRequest) => {
      files.set(request.destinationPath, 'video-bytes')
    })

    const result = await processUrl(URL, 'download')

    expect(result?.videoPath).toBe(`/out/videos/video_abc123_${TS}.mp4`)
    expect(mockSdkAttempt).not.toHaveBeenCalled()
  })

  it('reuses recorded outputs that are still on disk', async () => {
    files.set('/old/video.mp4', 'video-bytes')
    files.set('/old/transcript.txt', 'text')
    files.set(METADATA, JSON.stringify({
      abc123: {
        url: URL,
        fileId: 'abc123',
        createdAt: '2025-01-01T00:00:00.000Z',
        videoPath: '/old/video.mp4',
        transcriptionPath: '/old/transcript.txt',
      },
    }))

    const result = await processUrl(URL, 'transcribe')

    expect(result).toEqual({
      key: 'abc123',
      videoPath: '/old/video.mp4',
      transcriptionPath: '/old/transcript.txt',
      stageResults: [],
    })
    expect(mockGenericAttempt).not.toHaveBeenCalled()
    expect(mockTranscribeVideo).not.toHaveBeenCalled()
  })

  it('summarizes a recorded transcript in summarize mode without downloading', async () => {
    files.set('/old/transcript.txt', 'text')
    files.set(METADATA, JSON.stringify({
      abc123: { fileId: 'abc123', createdAt: '2025-01-01T00:00:00.000Z', transcriptionPath: '/old/transcript.txt' },
    }))

    const result = await processUrl(URL, 'summarize')

    expect(result?.summaryPath).toBe(`/out/summaries/summary_abc123_${TS}.md`)
    expect(mockSummarizeTranscriptFile).toHaveBeenCalledWith(
      '/old/transcript.txt',
      `/out/summaries/summary_abc123_${TS}.md`,
      { apiKey: 'test-key', model: 'gpt-4o', language: 'English' },
    )
    expect(mockGenericAttempt).not.toHaveBeenCalled()
  })

  it('keeps the video when transcription fails', async () => {
    mockTranscribeVideo.mockRejectedValue(new Error('None of the 2 audio segments could be transcribed'))

    const result = await processUrl(URL, 'all')

    expect(result?.videoPath).toBe(`/out/videos/video_abc123_${TS}.mp4`)
    expect(result?.transcriptionPath).toBeUndefined()
    expect(result?.stageResults.map((s) => [s.stage, s.success])).toEqual([
      [PipelineStage.Download, true],
      [PipelineStage.Transcription, false],
    ])
    expect(logger.error).toHaveBeenCalledWith('No transcript available to summarize for abc123')
  })
})

// ---- local files ----

describe('processVideoFile', () => {
  it('registers an unknown video under a local id and transcribes it', async () => {
    const id = localIdFor('/recordings/standup.mp4')

    const result = await processVideoFile('/recordings/standup.mp4')

    expect(result.key).toBe(id)
    expect(result.transcriptionPath).toBe(`/out/transcriptions/transcription_${id}_${TS}.txt`)
    expect(result.summaryPath).toBeUndefined()
    expect(storedMetadata()).toEqual({
      [id]: {
        fileId: id,
        createdAt: RUN_ISO,
        videoPath: '/recordings/standup.mp4',
        downloadDate: RUN_ISO,
        transcriptionPath: `/out/transcriptions/transcription_${id}_${TS}.txt`,
        transcriptionDate: RUN_ISO,
      },
    })
  })

  it('reuses the entry that recorded the video', async () => {
    files.set(METADATA, JSON.stringify({
      abc123: { fileId: 'abc123', createdAt: '2025-01-01T00:00:00.000Z', videoPath: '/v/a.mp4' },
    }))

    const result = await processVideoFile('/v/a.mp4')

    expect(result.key).toBe('abc123')
    expect(mockTranscribeVideo.mock.calls[0][1]).toBe(`/out/transcriptions/transcription_abc123_${TS}.txt`)
  })

  it('follows with a summary in all mode', async () => {
    const result = await processVideoFile(`/v/video_abc123_${TS}.mp4`, 'all')

    expect(result.summaryPath).toBe(`/out/summaries/summary_abc123_${TS}.md`)
  })
})

describe('processTranscriptFile', () => {
  it('summarizes a transcript on disk', async () => {
    const result = await processTranscriptFile(`/t/transcription_abc123_${TS}.txt`)

    expect(result).toEqual({
      key: 'abc123',
      transcriptionPath: `/t/transcription_abc123_${TS}.txt`,
      summaryPath: `/out/summaries/summary_abc123_${TS}.md`,
      stageResults: [{ stage: PipelineStage.Summary, success: true, duration: 0 }],
    })
  })
})

// ---- runBatch ----

describe('runBatch', () => {
  it('waits between items but not after the last one', async () => {
    const seen: string[] = []
    const fn = vi.fn(async (item: string) => {
      seen.push(item)
      return item.toUpperCase()
    })

    const pending = runBatch(['a', 'b'], fn, 2)
    await vi.advanceTimersByTimeAsync(0)
    expect(seen).toEqual(['a'])

    await vi.advanceTimersByTimeAsync(2 * 60_000 - 1)
    expect(seen).toEqual(['a'])

    await vi.advanceTimersByTimeAsync(1)
    expect(await pending).toEqual(['A', 'B'])
    expect(vi.getTimerCount()).toBe(0)
  })

  it('does not wait with a zero delay', async () => {
    expect(await runBatch([1, 2, 3], async (n) => n * 2, 0)).toEqual([2, 4, 6])
  })

  it('logs a rejected item and carries on with the rest', async () => {
    const fn = vi.fn(async (n: number) => {
      if (n === 2) throw new Error('disk full')
      return n * 10
    })

    expect(await runBatch([1, 2, 3], fn, 0)).toEqual([10, 30])
    expect(fn).toHaveBeenCalledTimes(3)
    expect(logger.error).toHaveBeenCalledWith('[2/3] 2 failed: disk full')
  })

  it('keeps going when saving metadata for one URL fails', async () => {
    vi.mocked(writeJsonFile).mockRejectedValueOnce(new Error('EACCES: permission denied'))
    const second = 'https://drive.google.com/file/d/def456/view'

    const results = await runBatch([URL, second], (u) => processUrl(u, 'download'), 0)

    expect(results.map((r) => r?.key)).toEqual(['def456'])
    expect(mockGenericAttempt).toHaveBeenCalledTimes(2)
    expect(storedMetadata()).toEqual({ def456: expect.objectContaining({ fileId: 'def456' }) })
  })
})

// ---- runPipeline ----

describe('runPipeline', () => {
  it('processes the URL file, dropping lines without a file id', async () => {
    files.set('/out/urls.txt', '# Add recording sharing URLs, one per line\nhttps://drive.google.com/file/d/aaa/view\nnot-a-link\n')

    const summary = await runPipeline({ mode: 'download' })

    expect(summary.exitCode).toBe(0)
    expect(summary.items.map((i) => i.key)).toEqual(['aaa'])
    expect(pushPipe).toHaveBeenCalledWith('/out')
    expect(popPipe).toHaveBeenCalledOnce()
  })

  it('creates the URL file when it is missing and does nothing else', async () => {
    const summary = await runPipeline({ mode: 'all' })

    expect(summary).toEqual({ exitCode: 0, items: [] })
    expect(files.get('/out/urls.txt')).toBe('# Add recording sharing URLs, one per line\n')
  })

  it('processes a single URL', async () => {
    const summary = await runPipeline({ mode: 'download', url: URL })

    expect(summary.items).toHaveLength(1)
    expect(summary.items[0].videoPath).toBe(`/out/videos/video_abc123_${TS}.mp4`)
  })

  it('rejects --input outside transcribe and summarize modes', async () => {
    const summary = await runPipeline({ mode: 'download', input: '/v/a.mp4' })

    expect(summary).toEqual({ exitCode: 1, items: [] })
    expect(popPipe).toHaveBeenCalledOnce()
  })

  it('transcribes every recorded video that still exists', async () => {
    files.set('/v/a.mp4', 'x')
    files.set(METADATA, JSON.stringify({
      a: { fileId: 'a', createdAt: RUN_ISO, videoPath: '/v/a.mp4' },
      b: { fileId: 'b', createdAt: RUN_ISO, videoPath: '/v/gone.mp4' },
    }))

    const summary = await runPipeline({ mode: 'transcribe', all: true })

    expect(summary.items.map((i) => i.key)).toEqual(['a'])
    expect(mockTranscribeVideo).toHaveBeenCalledTimes(1)
  })

  it('summarizes every recorded transcript that still exists', async () => {
    files.set('/t/a.txt', 'x')
    files.set('/t/b.txt', 'y')
    files.set(METADATA, JSON.stringify({
      a: { fileId: 'a', createdAt: RUN_ISO, transcriptionPath: '/t/a.txt' },
      b: { fileId: 'b', createdAt: RUN_ISO, transcriptionPath: '/t/b.txt' },
    }))

    const summary = await runPipeline({ mode: 'summarize', all: true })

    expect(summary.items.map((i) => i.summaryPath)).toEqual([
      `/out/summaries/summary_a_${TS}.md`,
      `/out/summaries/summary_b_${TS}.md`,
    ])
  })
})
