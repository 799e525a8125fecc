import { describe, it, expect, vi, beforeEach } from 'vitest'

const mockFs = vi.hoisted(() => ({
  fileExists: vi.fn(),
  readTextFile: vi.fn(),
  writeTextFile: vi.fn(),
}))
vi.mock('../../../L1-infra/fileSystem/fileSystem.js', () => mockFs)

import { parseUrlList, readUrls, URL_FILE_HEADER } from '../../../L3-services/urlList/urlList.js'

describe('parseUrlList', () => {
  it('keeps non-blank lines that are not comments, trimmed', () => {
    const content = '# recordings\n  https://x/d/a/view  \n\n#https://x/d/skipped\r\nhttps://x/d/b\n'

    expect(parseUrlList(content)).toEqual(['https://x/d/a/view', 'https://x/d/b'])
  })

  it('returns nothing for a header-only file', () => {
    expect(parseUrlList(URL_FILE_HEADER)).toEqual([])
  })
})

describe('readUrls', () => {
  beforeEach(() => {
    vi.clearAllMocks()
    mockFs.writeTextFile.mockResolvedValue(undefined)
  })

  it('creates a missing file with the header and yields no URLs', async () => {
    mockFs.fileExists.mockResolvedValue(false)

    expect(await readUrls('/data/urls.txt')).toEqual([])
    expect(mockFs.writeTextFile).toHaveBeenCalledWith('/data/urls.txt', '# Add recording sharing URLs, one per line\n')
  })

  it('parses an existing file', async () => {
    mockFs.fileExists.mockResolvedValue(true)
    mockFs.readTextFile.mockResolvedValue('https://x/d/a\n# note\nhttps://x/d/b')

    expect(await readUrls('/data/urls.txt')).toEqual(['https://x/d/a', 'https://x/d/b'])
    expect(mockFs.writeTextFile).not.toHaveBeenCalled()
  })
})
