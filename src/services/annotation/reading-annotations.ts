/**
 * 台本1行から読み上げ用テキストと字幕用テキストを作る。
 *
 * 記法（この順に適用）:
 * - `[[...]]` 表示専用。読み上げからは除去し、字幕には中身を残す
 * - `単語<よみ>` 読み注釈。読み上げは「よみ」、字幕は「単語」
 * - 読み辞書による置換。読み上げのみ、読み注釈の内側は対象外
 */

export type ReadingDictionary = ReadonlyMap<string, string>

export interface AnnotatedText {
  narrationText: string
  captionText: string
}

/** 発話可能な文字がない行に差し込む無音の長さ（秒） */
export const SILENCE_DURATION_SEC = 0.5

const EMPTY_DICTIONARY: ReadingDictionary = new Map()

const DISPLAY_ONLY_PATTERN = /\[\[([\s\S]+?)\]\]/g
// ひらがなを含めると助詞まで巻き込むため、漢字・カタカナ・英数字のみ
const INLINE_READING_PATTERN = /([\u3400-\u9FFF々〆ヶa-zA-Z0-9ａ-ｚＡ-Ｚ０-９\u30A0-\u30FF]+)<([^<>]+)>/g
const ANY_READING_PATTERN = /<[^<>]+>/g
const BRACKET_PAIR_PATTERN = /\[\[|\]\]/g
const HAS_BRACKET_PAIR = /\[\[|\]\]/
const ANGLE_PATTERN = /[<>]/g
const SPEAKABLE_PATTERN = /[\p{L}\p{N}_]/u

interface Segment {
  text: string
  /** 読み注釈由来。辞書置換の対象外 */
  locked: boolean
}

const stripBracketPairs = (text: string): string => {
  let current = text
  // 除去で新しい [[ / ]] ができることがあるので収束するまで繰り返す
  while (HAS_BRACKET_PAIR.test(current)) {
    current = current.replace(BRACKET_PAIR_PATTERN, '')
  }
  return current
}

const sanitize = (text: string): string => stripBracketPairs(text.replace(ANGLE_PATTERN, ''))

const splitReadings = (text: string): Segment[] => {
  const segments: Segment[] = []
  let cursor = 0
  for (const match of text.matchAll(INLINE_READING_PATTERN)) {
    const start = match.index ?? 0
    if (start > cursor) {
      segments.push({ text: text.slice(cursor, start), locked: false })
    }
    segments.push({ text: match[2], locked: true })
    cursor = start + match[0].length
  }
  if (cursor < text.length) {
    segments.push({ text: text.slice(cursor), locked: false })
  }
  return segments
}

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')

const buildDictionaryPattern = (dictionary: ReadingDictionary): RegExp | null => {
  const words = [...dictionary.keys()].filter((word) => word.length > 0)
  if (!words.length) return null
  // 長い語を優先
  words.sort((a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0))
  return new RegExp(words.map(escapeRegExp).join('|'), 'g')
}

const applyDictionary = (text: string, dictionary: ReadingDictionary, pattern: RegExp | null): string => {
  if (!pattern) return text
  return text.replace(pattern, (word) => dictionary.get(word) ?? word)
}

export const processAnnotations = (
  rawText: string,
  dictionary: ReadingDictionary = EMPTY_DICTIONARY
): AnnotatedText => {
  // 1. 表示専用
  const narrationBase = rawText.replace(DISPLAY_ONLY_PATTERN, '')
  const captionBase = rawText.replace(DISPLAY_ONLY_PATTERN, '$1')

  // 2. 読み注釈 / 3. 辞書置換
  const pattern = buildDictionaryPattern(dictionary)
  const narration = splitReadings(narrationBase)
    .map((segment) => (segment.locked ? segment.text : applyDictionary(segment.text, dictionary, pattern)))
    .join('')
    .replace(ANY_READING_PATTERN, '')

  const caption = captionBase.replace(INLINE_READING_PATTERN, '$1').replace(ANY_READING_PATTERN, '')

  return {
    narrationText: sanitize(narration),
    captionText: sanitize(caption),
  }
}

export const hasSpeakableCharacters = (text: string): boolean => SPEAKABLE_PATTERN.test(text)
