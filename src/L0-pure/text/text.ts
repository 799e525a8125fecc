/** Human-readable byte count, e.g. `12.50 MB`. */
export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB']
  let size = bytes
  for (const unit of units) {
    if (size < 1024) return `${size.toFixed(2)} ${unit}`
    size /= 1024
  }
  return `${size.toFixed(2)} PB`
}

/** `1h 2m 3s` / `2m 3s` / `3s` */
export function formatDuration(totalSeconds: number): string {
  const whole = Math.max(0, Math.floor(totalSeconds))
  const h = Math.floor(whole / 3600)
  const m = Math.floor((whole % 3600) / 60)
  const s = whole % 60
  if (h > 0) return `${h}h ${m}m ${s}s`
  if (m > 0) return `${m}m ${s}s`
  return `${s}s`
}

const pad = (n: number): string => String(n).padStart(2, '0')

/** Local-time stamp used in output file names: `YYYYMMDD_HHMMSS`. */
export function formatRunTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  )
}

export function videoFileName(fileId: string, timestamp: string): string {
  return `video_${fileId}_${timestamp}.mp4`
}

export function transcriptionFileName(fileId: string, timestamp: string): string {
  return `transcription_${fileId}_${timestamp}.txt`
}

export function summaryFileName(fileId: string, timestamp: string): string {
  return `summary_${fileId}_${timestamp}.md`
}

const OUTPUT_NAME_PATTERN = /^(?:video|transcription)_([A-Za-z0-9_-]+)_\d{8}_\d{6}\.[A-Za-z0-9]+$/

/** Recover the file id from a name produced by videoFileName / transcriptionFileName. */
export function parseOutputFileName(fileName: string): string | undefined {
  return fileName.match(OUTPUT_NAME_PATTERN)?.[1]
}
