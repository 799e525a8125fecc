import { fileExists, readTextFile, writeTextFile } from '../../L1-infra/fileSystem/fileSystem.js'
import logger from '../../L1-infra/logger/configLogger.js'

export const URL_FILE_HEADER = '# Add recording sharing URLs, one per line\n'

/** Non-blank, non-comment lines, trimmed. */
export function parseUrlList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'))
}

/** Read the URL list; a missing file is created with a comment header and yields nothing. */
export async function readUrls(urlFile: string): Promise<string[]> {
  if (!(await fileExists(urlFile))) {
    logger.warn(`URL file ${urlFile} not found, creating an empty one`)
    await writeTextFile(urlFile, URL_FILE_HEADER)
    return []
  }
  return parseUrlList(await readTextFile(urlFile))
}
