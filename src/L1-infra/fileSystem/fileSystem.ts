import {
  promises as fsp,
  existsSync,
  readFileSync,
  statSync,
  createReadStream,
  createWriteStream,
} from 'fs'
import type { Stats, ReadStream } from 'fs'
import type { FileHandle } from 'fs/promises'
import type { Readable } from 'stream'
import { pipeline } from 'stream/promises'
import tmp from 'tmp'
import { dirname } from '../paths/paths.js'

// Enable graceful cleanup of all tmp resources on process exit
tmp.setGracefulCleanup()

export type { Stats, ReadStream, FileHandle }

function hasErrorCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code
}

// ── Reads ──────────────────────────────────────────────────────

/**
 * Read and parse a JSON file. Throws descriptive error on ENOENT or parse failure,
 * unless `defaultValue` is given, in which case a missing file yields it.
 */
export async function readJsonFile<T>(filePath: string, defaultValue?: T): Promise<T> {
  let raw: string
  try {
    raw = await fsp.readFile(filePath, 'utf-8')
  } catch (err: unknown) {
    if (hasErrorCode(err, 'ENOENT')) {
      if (defaultValue !== undefined) return defaultValue
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
  try {
    return JSON.parse(raw)
  } catch (err: unknown) {
    throw new Error(`Failed to parse JSON at ${filePath}: ${err instanceof Error ? err.message : String(err)}`)
  }
}

/** Read a text file as UTF-8 string. Throws "File not found: <path>" on ENOENT. */
export async function readTextFile(filePath: string): Promise<string> {
  try {
    return await fsp.readFile(filePath, 'utf-8')
  } catch (err: unknown) {
    if (hasErrorCode(err, 'ENOENT')) {
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
}

/** Sync variant of readTextFile. */
export function readTextFileSync(filePath: string): string {
  try {
    return readFileSync(filePath, 'utf-8')
  } catch (err: unknown) {
    if (hasErrorCode(err, 'ENOENT')) {
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
}

/** Check if file/dir exists (async, using stat). */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsp.stat(filePath)
    return true
  } catch {
    return false
  }
}

/** Check if file/dir exists (sync). */
export function fileExistsSync(filePath: string): boolean {
  return existsSync(filePath)
}

/** True when `filePath` is a file of at least one byte. */
export async function fileHasContent(filePath: string): Promise<boolean> {
  try {
    const stats = await fsp.stat(filePath)
    return stats.isFile() && stats.size > 0
  } catch {
    return false
  }
}

/** Get file stats. Throws "File not found: <path>" on ENOENT. */
export async function getFileStats(filePath: string): Promise<Stats> {
  try {
    return await fsp.stat(filePath)
  } catch (err: unknown) {
    if (hasErrorCode(err, 'ENOENT')) {
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
}

/** Sync variant. */
export function getFileStatsSync(filePath: string): Stats {
  try {
    return statSync(filePath)
  } catch (err: unknown) {
    if (hasErrorCode(err, 'ENOENT')) {
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
}

/** Create a read stream. */
export function openReadStream(filePath: string): ReadStream {
  return createReadStream(filePath)
}

// ── Writes ─────────────────────────────────────────────────────

/** Write data as JSON. Creates parent dirs. */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await fsp.mkdir(dirname(filePath), { recursive: true })
  await fsp.writeFile(filePath, JSON.stringify(data, null, 2), { encoding: 'utf-8' })
}

/** Write text file (UTF-8). Creates parent dirs. */
export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await fsp.mkdir(dirname(filePath), { recursive: true })
  await fsp.writeFile(filePath, content, { encoding: 'utf-8' })
}

/** Write a file only if it does not exist yet. Returns false when it was already there. */
export async function writeTextFileExclusive(filePath: string, content: string): Promise<boolean> {
  try {
    await fsp.writeFile(filePath, content, { encoding: 'utf-8', flag: 'wx' })
    return true
  } catch (err: unknown) {
    if (hasErrorCode(err, 'EEXIST')) return false
    throw err
  }
}

/** Ensure directory exists (recursive). */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fsp.mkdir(dirPath, { recursive: true })
}

/** Remove file (ignores ENOENT). */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await fsp.unlink(filePath)
  } catch (err: unknown) {
    if (hasErrorCode(err, 'ENOENT')) return
    throw err
  }
}

/** Remove directory. */
export async function removeDirectory(
  dirPath: string,
  opts?: { recursive?: boolean; force?: boolean },
): Promise<void> {
  try {
    await fsp.rm(dirPath, { recursive: opts?.recursive ?? false, force: opts?.force ?? false })
  } catch (err: unknown) {
    if (hasErrorCode(err, 'ENOENT')) return
    throw err
  }
}

/** Pipe a readable stream into `filePath` (truncates). Resolves with the bytes written. */
export async function writeStreamToFile(source: Readable, filePath: string): Promise<number> {
  const sink = createWriteStream(filePath)
  await pipeline(source, sink)
  return sink.bytesWritten
}

/** Open a file for binary writing (truncates). Caller closes the handle. */
export async function openFileForWrite(filePath: string): Promise<FileHandle> {
  return fsp.open(filePath, 'w')
}

// ── Temp Dir ───────────────────────────────────────────────────

/** Create a temporary directory with the given prefix. Caller is responsible for cleanup. */
export async function makeTempDir(prefix: string): Promise<string> {
  return new Promise((resolve, reject) => {
    // mode 0o700: owner-only access
    tmp.dir({ prefix, mode: 0o700 }, (err, path) => {
      if (err) reject(err)
      else resolve(path)
    })
  })
}

/** Run fn inside a temp directory, auto-cleanup on completion or error. */
export async function withTempDir<T>(prefix: string, fn: (tempDir: string) => Promise<T>): Promise<T> {
  const tempDir = await makeTempDir(prefix)
  try {
    return await fn(tempDir)
  } finally {
    await removeDirectory(tempDir, { recursive: true, force: true })
  }
}
