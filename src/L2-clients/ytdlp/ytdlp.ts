import { execCommand } from '../../L1-infra/process/process.js'
import type { ExecError } from '../../L1-infra/process/process.js'
import logger from '../../L1-infra/logger/configLogger.js'

export interface YtDlpOptions {
  /** Executable name or path. */
  binary?: string
  /** Kill the process after this many seconds. 0 = no limit. */
  timeoutSeconds?: number
}

const STDERR_TAIL_CHARS = 500

function isExecError(err: unknown): err is ExecError {
  return err instanceof Error && 'stderr' in err && typeof err.stderr === 'string'
}

/** yt-dlp reads `--output` as a template; `%` must be doubled to stay literal. */
export function escapeOutputTemplate(path: string): string {
  return path.replace(/%/g, '%%')
}

/**
 * Download `url` with yt-dlp, best single-file format, to `outputPath`.
 * Writes straight to `outputPath` (no `.part` file is left behind on failure).
 * Rejects when the executable is missing, times out, or exits non-zero.
 */
export async function downloadWithYtDlp(url: string, outputPath: string, options: YtDlpOptions = {}): Promise<void> {
  const binary = options.binary ?? 'yt-dlp'
  const args = ['--format', 'best', '--no-part', '--output', escapeOutputTemplate(outputPath), '--no-progress', url]
  logger.debug(`Running ${binary} ${args.join(' ')}`)

  try {
    await execCommand(binary, args, {
      timeout: (options.timeoutSeconds ?? 0) * 1000,
      maxBuffer: 50 * 1024 * 1024,
    })
  } catch (err: unknown) {
    if (isExecError(err)) {
      if (err.code === 'ENOENT') throw new Error(`${binary} not found on PATH`)
      if (err.killed) throw new Error(`${binary} timed out after ${options.timeoutSeconds}s`)
      const tail = err.stderr.trim().slice(-STDERR_TAIL_CHARS)
      throw new Error(`${binary} exited with code ${String(err.code)}${tail ? `: ${tail}` : ''}`)
    }
    throw err
  }
}
