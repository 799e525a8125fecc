import { join } from '../paths/paths.js'
import { fileExistsSync } from '../fileSystem/fileSystem.js'
import { loadEnvFile } from '../env/env.js'
import { MissingCredentialError } from '../../L0-pure/errors/errors.js'

// Load .env file from the working directory
const envPath = join(process.cwd(), '.env')
if (fileExistsSync(envPath)) {
  loadEnvFile(envPath)
}

export interface AppEnvironment {
  URL_FILE: string
  DELAY_MINUTES: number
  OUTPUT_DIR: string
  METADATA_PATH: string
  VIDEO_OUTPUT_DIR: string
  TRANSCRIPTION_OUTPUT_DIR: string
  SUMMARY_OUTPUT_DIR: string
  ENABLE_DOWNLOAD: boolean
  ENABLE_TRANSCRIPTION: boolean
  ENABLE_SUMMARY: boolean
  OPENAI_API_KEY: string
  TRANSCRIPTION_MODEL: string
  SUMMARY_MODEL: string
  SUMMARY_LANGUAGE: string
  MAX_CHUNK_MB: number
  GOOGLE_API_KEY: string
  DRIVE_BASE_URL: string
  DRIVE_MEDIA_HOST: string
  YTDLP_PATH: string
  FFMPEG_PATH: string
  FFPROBE_PATH: string
  TOOL_TIMEOUT_SECONDS: number
  VERBOSE: boolean
}

export interface CLIOptions {
  apiKey?: string
  verbose?: boolean
}

let config: AppEnvironment | null = null

function envFlag(name: string, fallback: boolean): boolean {
  const raw = process.env[name]
  if (raw === undefined || raw.trim() === '') return fallback
  return raw.trim().toLowerCase() === 'true'
}

function envNumber(name: string, fallback: number): number {
  const parsed = Number.parseFloat(process.env[name] ?? '')
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback
}

/** Throw when the OpenAI key is needed by an enabled stage but missing. */
export function validateRequiredKeys(needsOpenAI: boolean): void {
  if (needsOpenAI && !getConfig().OPENAI_API_KEY) {
    throw new MissingCredentialError('OPENAI_API_KEY', 'set via --api-key or env var')
  }
}

/** Merge CLI options → env vars → defaults. Call before getConfig(). */
export function initConfig(cli: CLIOptions = {}): AppEnvironment {
  const outputDir = process.env.OUTPUT_DIR || 'output'

  config = {
    URL_FILE: process.env.URL_FILE || 'urls.txt',
    DELAY_MINUTES: envNumber('DELAY_MINUTES', 5),
    OUTPUT_DIR: outputDir,
    METADATA_PATH: join(outputDir, 'metadata.json'),
    VIDEO_OUTPUT_DIR: process.env.VIDEO_OUTPUT_DIR || join(outputDir, 'videos'),
    TRANSCRIPTION_OUTPUT_DIR: process.env.TRANSCRIPTION_OUTPUT_DIR || join(outputDir, 'transcriptions'),
    SUMMARY_OUTPUT_DIR: process.env.SUMMARY_OUTPUT_DIR || join(outputDir, 'summaries'),
    ENABLE_DOWNLOAD: envFlag('ENABLE_DOWNLOAD', true),
    ENABLE_TRANSCRIPTION: envFlag('ENABLE_TRANSCRIPTION', false),
    ENABLE_SUMMARY: envFlag('ENABLE_SUMMARY', false),
    OPENAI_API_KEY: cli.apiKey || process.env.OPENAI_API_KEY || '',
    TRANSCRIPTION_MODEL: process.env.TRANSCRIPTION_MODEL || 'whisper-1',
    SUMMARY_MODEL: process.env.SUMMARY_MODEL || 'gpt-4',
    SUMMARY_LANGUAGE: process.env.SUMMARY_LANGUAGE || 'pt-br',
    MAX_CHUNK_MB: envNumber('MAX_CHUNK_MB', 25) || 25,
    GOOGLE_API_KEY: process.env.GOOGLE_API_KEY || '',
    DRIVE_BASE_URL: process.env.DRIVE_BASE_URL || 'https://drive.google.com',
    DRIVE_MEDIA_HOST: process.env.DRIVE_MEDIA_HOST || 'googleusercontent.com',
    YTDLP_PATH: process.env.YTDLP_PATH || 'yt-dlp',
    FFMPEG_PATH: process.env.FFMPEG_PATH || 'ffmpeg',
    FFPROBE_PATH: process.env.FFPROBE_PATH || 'ffprobe',
    TOOL_TIMEOUT_SECONDS: envNumber('TOOL_TIMEOUT_SECONDS', 3600),
    VERBOSE: cli.verbose ?? false,
  }

  return config
}

export function getConfig(): AppEnvironment {
  if (config) {
    return config
  }

  // Fallback: init with no CLI options (pure env-var mode)
  return initConfig()
}
