import { promises as fs } from 'node:fs'
import path from 'node:path'
import process from 'node:process'
import { EMOTIONS, type Emotion, type Speaker } from '../types/script'
import type { ScreenSide } from '../types/schedule'
import { configSchema, type PipelineConfig, type VoiceConfig } from './schema'

export interface CharacterImages {
  closed: string
  open: string
}

export interface ResolvedCharacter {
  id: Speaker
  displayName: string
  side: ScreenSide
  voices: VoiceConfig[]
  /** 絶対パス。normal は必ず存在する */
  images: Partial<Record<Emotion, CharacterImages>> & { normal: CharacterImages }
}

export interface ResolvedPaths {
  projectRoot: string
  outputDir: string
  assetsDir: string
  readingDictionary: string
  fontPath: string
  logo?: string
}

export interface ResolvedOpenAiConfig {
  apiKey?: string
  baseUrl?: string
}

export interface ResolvedConfig extends Omit<PipelineConfig, 'characters' | 'paths' | 'logo'> {
  paths: ResolvedPaths
  characters: ResolvedCharacter[]
  characterMap: Map<Speaker, ResolvedCharacter>
  openai: ResolvedOpenAiConfig
}

export const loadConfig = async (configPath: string): Promise<ResolvedConfig> => {
  const raw = await fs.readFile(configPath, 'utf8')
  const config = resolveConfig(configSchema.parse(JSON.parse(raw)), configPath)
  await fs.mkdir(config.paths.outputDir, { recursive: true })
  return config
}

/** config/ の親をプロジェクトルートとしてパスを解決する */
export const resolveConfig = (
  parsed: PipelineConfig,
  configPath: string,
  env: NodeJS.ProcessEnv = process.env
): ResolvedConfig => {
  const projectRoot = path.resolve(path.dirname(configPath), '..')
  const assetsDir = path.resolve(projectRoot, parsed.paths.assetsDir)
  const resolveAsset = createAssetResolver(assetsDir)
  const characters = parsed.characters.map((character) => resolveCharacter(character, resolveAsset))

  return {
    ...parsed,
    paths: {
      projectRoot,
      outputDir: path.resolve(projectRoot, parsed.paths.outputDir),
      assetsDir,
      readingDictionary: path.resolve(projectRoot, parsed.paths.readingDictionary),
      fontPath: path.resolve(projectRoot, parsed.caption.fontPath),
      logo: parsed.logo ? resolveAsset(parsed.logo) : undefined,
    },
    characters,
    characterMap: new Map(characters.map((character) => [character.id, character])),
    openai: {
      apiKey: env.OPENAI_API_KEY?.trim() || undefined,
      baseUrl: env.OPENAI_BASE_URL?.trim() || undefined,
    },
  }
}

const resolveCharacter = (
  character: PipelineConfig['characters'][number],
  resolveAsset: (assetPath: string) => string
): ResolvedCharacter => {
  const resolvePair = (pair: CharacterImages): CharacterImages => ({
    closed: resolveAsset(pair.closed),
    open: resolveAsset(pair.open),
  })

  const normal = character.images.normal
  if (!normal) {
    throw new Error(`${character.id}: normal の images は必須です`)
  }
  const images: ResolvedCharacter['images'] = { normal: resolvePair(normal) }
  for (const [emotion, pair] of Object.entries(character.images)) {
    if (pair && isEmotionKey(emotion)) {
      images[emotion] = resolvePair(pair)
    }
  }

  return {
    id: character.id,
    displayName: character.displayName,
    side: character.side,
    voices: character.voices,
    images,
  }
}

const EMOTION_KEYS: ReadonlySet<string> = new Set<string>(EMOTIONS)
const isEmotionKey = (value: string): value is Emotion => EMOTION_KEYS.has(value)

const createAssetResolver = (assetsDir: string) => {
  return (relativePath: string) => {
    const trimmed = relativePath.trim()
    if (!trimmed) {
      throw new Error('アセットの path は必須です')
    }
    if (path.isAbsolute(trimmed)) {
      throw new Error(`アセットの path は assets/ 配下の相対パスで指定してください: ${trimmed}`)
    }
    const resolved = path.resolve(assetsDir, trimmed)
    const relative = path.relative(assetsDir, resolved)
    if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) {
      throw new Error(`アセットの path は assets/ 配下の相対パスで指定してください: ${trimmed}`)
    }
    return resolved
  }
}

/** 感情に対応する画像。未設定なら normal */
export const resolveCharacterImages = (character: ResolvedCharacter, emotion: Emotion): CharacterImages =>
  character.images[emotion] ?? character.images.normal

/** 感情に対応する声。未設定なら normal */
export const resolveVoice = (character: ResolvedCharacter, emotion: Emotion): VoiceConfig => {
  const voice =
    character.voices.find((candidate) => candidate.emotion === emotion) ??
    character.voices.find((candidate) => candidate.emotion === 'normal') ??
    character.voices[0]
  if (!voice) {
    throw new Error(`${character.id}: voice が設定されていません`)
  }
  return voice
}
