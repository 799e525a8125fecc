import type { SegmentWindow } from '../types/index.js'

export const BYTES_PER_MB = 1024 * 1024

/** Size in MiB, the unit the upload limit is expressed in. */
export function bytesToMb(bytes: number): number {
  return bytes / BYTES_PER_MB
}

/**
 * Plan contiguous cuts for an audio file that exceeds `maxChunkMb`.
 *
 * `numParts = ceil(sizeMb / maxChunkMb)` windows of `ceil(duration / numParts)`
 * seconds each; the last window is clipped to the end of the audio. Windows
 * that would start at or past the end (possible after rounding up) are dropped.
 */
export function planSegments(sizeBytes: number, durationSeconds: number, maxChunkMb: number): SegmentWindow[] {
  const numParts = Math.ceil(bytesToMb(sizeBytes) / maxChunkMb)
  const segmentSeconds = Math.ceil(durationSeconds / numParts)
  const windows: SegmentWindow[] = []

  for (let i = 0; i < numParts; i++) {
    const startSeconds = i * segmentSeconds
    if (startSeconds >= durationSeconds) break
    windows.push({
      index: i,
      startSeconds,
      durationSeconds: Math.min(segmentSeconds, durationSeconds - startSeconds),
    })
  }

  return windows
}
