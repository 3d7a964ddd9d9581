export {
  processAnnotations,
  hasSpeakableCharacters,
  SILENCE_DURATION_SEC,
  type AnnotatedText,
  type ReadingDictionary,
} from './reading-annotations'
export { loadReadingDictionary, parseReadingDictionary } from './reading-dictionary'
