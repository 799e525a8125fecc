import { execFile as nodeExecFile, spawnSync as nodeSpawnSync } from 'child_process'
import type { SpawnSyncReturns } from 'child_process'
import { createRequire } from 'module'

export interface ExecResult {
  stdout: string
  stderr: string
}

export interface ExecCommandOptions {
  cwd?: string
  /** Milliseconds before the child is killed. 0 = no limit. */
  timeout?: number
  maxBuffer?: number
  env?: NodeJS.ProcessEnv
}

/** Error raised by execCommand, with the child's output attached. */
export interface ExecError extends Error {
  stdout: string
  stderr: string
  code?: number | string | null
  killed?: boolean
}

/**
 * Execute a command asynchronously via execFile.
 * Returns promise of { stdout, stderr }; rejects with an ExecError.
 */
export function execCommand(cmd: string, args: string[], opts: ExecCommandOptions = {}): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    nodeExecFile(cmd, args, { ...opts, encoding: 'utf-8' }, (error, stdout, stderr) => {
      if (error) {
        const execError: ExecError = Object.assign(error, { stdout: String(stdout ?? ''), stderr: String(stderr ?? '') })
        reject(execError)
      } else {
        resolve({ stdout: String(stdout ?? ''), stderr: String(stderr ?? '') })
      }
    })
  })
}

/**
 * Spawn a command synchronously. Returns full result including status.
 */
export function spawnCommand(
  cmd: string,
  args: string[],
  opts?: { timeout?: number; cwd?: string },
): SpawnSyncReturns<string> {
  return nodeSpawnSync(cmd, args, { encoding: 'utf-8', ...opts })
}

/**
 * Create a require function for ESM modules to use CommonJS require().
 * Usage: const require = createModuleRequire(import.meta.url)
 */
export function createModuleRequire(metaUrl: string): NodeRequire {
  return createRequire(metaUrl)
}
