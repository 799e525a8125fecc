import { writeTextFileExclusive } from '../../L1-infra/fileSystem/fileSystem.js'
import { join } from '../../L1-infra/paths/paths.js'

export const ENV_TEMPLATE = `# recfetch configuration
URL_FILE=urls.txt
DELAY_MINUTES=5

# Output
OUTPUT_DIR=output
VIDEO_OUTPUT_DIR=output/videos
TRANSCRIPTION_OUTPUT_DIR=output/transcriptions
SUMMARY_OUTPUT_DIR=output/summaries

# Stages run by default
ENABLE_DOWNLOAD=true
ENABLE_TRANSCRIPTION=false
ENABLE_SUMMARY=false

# Transcription and summaries
OPENAI_API_KEY=
TRANSCRIPTION_MODEL=whisper-1
SUMMARY_MODEL=gpt-4
SUMMARY_LANGUAGE=pt-br
MAX_CHUNK_MB=25

# Downloads
# GOOGLE_API_KEY=
# YTDLP_PATH=yt-dlp
# TOOL_TIMEOUT_SECONDS=3600
# FFMPEG_PATH=
# FFPROBE_PATH=
`

/** Write a commented .env into `dir`. Returns 1 without touching anything when one exists. */
export async function runInit(dir: string = process.cwd()): Promise<number> {
  const envPath = join(dir, '.env')
  const created = await writeTextFileExclusive(envPath, ENV_TEMPLATE)
  if (!created) {
    console.error(`${envPath} already exists, leaving it as it is.`)
    return 1
  }
  console.log(`Created ${envPath}. Fill in OPENAI_API_KEY and run again.`)
  return 0
}
