import { getConfig } from '../../L1-infra/config/environment.js'
import { getFFmpegPath, getFFprobePath, probeTool } from '../../L3-services/diagnostics/diagnostics.js'

interface CheckResult {
  label: string
  ok: boolean
  required: boolean
  message: string
}

function getFFmpegInstallHint(): string {
  const platform = process.platform
  const lines = ['Install FFmpeg:']
  if (platform === 'win32') {
    lines.push('  winget install Gyan.FFmpeg')
    lines.push('  choco install ffmpeg        (alternative)')
  } else if (platform === 'darwin') {
    lines.push('  brew install ffmpeg')
  } else {
    lines.push('  sudo apt install ffmpeg     (Debian/Ubuntu)')
    lines.push('  sudo dnf install ffmpeg     (Fedora)')
    lines.push('  sudo pacman -S ffmpeg       (Arch)')
  }
  lines.push('  Or set FFMPEG_PATH to a custom binary location')
  return lines.join('\n          ')
}

function checkNode(): CheckResult {
  const raw = process.version // e.g. "v20.11.1"
  const major = parseInt(raw.slice(1), 10)
  const ok = major >= 20
  return {
    label: 'Node.js',
    ok,
    required: true,
    message: ok
      ? `Node.js ${raw} (required: ≥20)`
      : `Node.js ${raw} — version ≥20 required`,
  }
}

function checkFFmpeg(): CheckResult {
  const probe = probeTool(getFFmpegPath(getConfig().FFMPEG_PATH), '-version')
  return probe.found
    ? { label: 'FFmpeg', ok: true, required: true, message: `FFmpeg ${probe.version}` }
    : { label: 'FFmpeg', ok: false, required: true, message: `FFmpeg not found — ${getFFmpegInstallHint()}` }
}

function checkFFprobe(): CheckResult {
  const probe = probeTool(getFFprobePath(getConfig().FFPROBE_PATH), '-version')
  return probe.found
    ? { label: 'FFprobe', ok: true, required: true, message: `FFprobe ${probe.version}` }
    : {
        label: 'FFprobe',
        ok: false,
        required: true,
        message: `FFprobe not found — usually included with FFmpeg.\n          ${getFFmpegInstallHint()}`,
      }
}

function checkYtDlp(): CheckResult {
  const binary = getConfig().YTDLP_PATH
  const probe = probeTool(binary, '--version')
  return probe.found
    ? { label: 'yt-dlp', ok: true, required: false, message: `yt-dlp ${probe.version}` }
    : {
        label: 'yt-dlp',
        ok: false,
        required: false,
        message: `yt-dlp not found at "${binary}" (optional — first download strategy; pipx install yt-dlp)`,
      }
}

function checkOpenAIKey(): CheckResult {
  const config = getConfig()
  const needed = config.ENABLE_TRANSCRIPTION || config.ENABLE_SUMMARY
  const set = !!config.OPENAI_API_KEY
  return {
    label: 'OPENAI_API_KEY',
    ok: set,
    required: needed,
    message: set
      ? 'OPENAI_API_KEY is set'
      : `OPENAI_API_KEY not set${needed ? '' : ' (only needed for transcription and summaries)'} — get one at https://platform.openai.com/api-keys`,
  }
}

function checkGoogleKey(): CheckResult {
  const set = !!getConfig().GOOGLE_API_KEY
  return {
    label: 'GOOGLE_API_KEY',
    ok: set,
    required: false,
    message: set
      ? 'GOOGLE_API_KEY is set'
      : 'GOOGLE_API_KEY not set (optional — Drive API download fallback)',
  }
}

/** Print every prerequisite check. Returns the process exit code. */
export async function runDoctor(): Promise<number> {
  console.log('\n🔍 recfetch doctor — checking prerequisites...\n')

  const results: CheckResult[] = [
    checkNode(),
    checkFFmpeg(),
    checkFFprobe(),
    checkYtDlp(),
    checkOpenAIKey(),
    checkGoogleKey(),
  ]

  for (const r of results) {
    const icon = r.ok ? '✅' : r.required ? '❌' : '⬚'
    console.log(`  ${icon} ${r.message}`)
  }

  const failedRequired = results.filter(r => r.required && !r.ok)
  console.log()
  if (failedRequired.length === 0) {
    console.log('  All required checks passed ✅\n')
    return 0
  }
  console.log(`  ${failedRequired.length} required check${failedRequired.length > 1 ? 's' : ''} failed ❌\n`)
  return 1
}
