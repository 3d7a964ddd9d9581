import { promises as fs } from 'node:fs'
import { describeError, isFileNotFound } from '../../utils/errors'
import { logger } from '../../utils/logger'
import type { ReadingDictionary } from './reading-annotations'

const COMMENT_MARKER = '#'
const ENTRY_PATTERN = /^([^<>\s]+)<([^<>]+)>$/

export interface DictionaryParseResult {
  dictionary: ReadingDictionary
  /** 解釈できなかった行番号 (1始まり) */
  rejectedLines: number[]
}

export const parseReadingDictionary = (content: string): DictionaryParseResult => {
  const dictionary = new Map<string, string>()
  const rejectedLines: number[] = []

  content.split(/\r?\n/).forEach((line, index) => {
    const trimmed = line.trim()
    if (!trimmed || trimmed.startsWith(COMMENT_MARKER)) return
    const match = ENTRY_PATTERN.exec(trimmed)
    if (!match) {
      rejectedLines.push(index + 1)
      return
    }
    dictionary.set(match[1], match[2].trim())
  })

  return { dictionary, rejectedLines }
}

/**
 * 読み辞書を読み込む。ファイルがない・読めない場合は空の辞書を返す。
 */
export const loadReadingDictionary = async (filePath: string | undefined): Promise<ReadingDictionary> => {
  if (!filePath) return new Map()

  let content: string
  try {
    content = await fs.readFile(filePath, 'utf8')
  } catch (error) {
    if (!isFileNotFound(error)) {
      logger.warn({ filePath, error: describeError(error) }, 'Reading dictionary could not be read; skipping substitution')
    }
    return new Map()
  }

  const { dictionary, rejectedLines } = parseReadingDictionary(content)
  if (rejectedLines.length) {
    logger.warn({ filePath, lines: rejectedLines }, 'Ignored malformed reading dictionary lines')
  }
  logger.info({ filePath, entries: dictionary.size }, 'Reading dictionary loaded')
  return dictionary
}
