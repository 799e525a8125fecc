export { default as fluentFfmpeg } from 'fluent-ffmpeg'
export type { FfmpegCommand, FfprobeData } from 'fluent-ffmpeg'
