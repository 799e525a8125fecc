import { drive } from '../../L1-infra/drive/drive.js'
import { writeStreamToFile } from '../../L1-infra/fileSystem/fileSystem.js'
import logger from '../../L1-infra/logger/configLogger.js'

/**
 * Fetch a file's content through the Drive v3 API and write it to `destinationPath`.
 * Works for files shared publicly; the API key only identifies the project.
 * `timeoutSeconds` above 0 bounds the request.
 */
export async function downloadDriveFile(
  fileId: string,
  destinationPath: string,
  apiKey: string,
  timeoutSeconds = 0,
): Promise<number> {
  const client = drive({ version: 'v3', auth: apiKey })
  logger.debug(`Drive API: files.get ${fileId}`)

  const res = await client.files.get(
    { fileId, alt: 'media', supportsAllDrives: true },
    { responseType: 'stream', ...(timeoutSeconds > 0 ? { timeout: timeoutSeconds * 1000 } : {}) },
  )
  return writeStreamToFile(res.data, destinationPath)
}
