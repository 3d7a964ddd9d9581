import { promises as fs } from 'node:fs'
import path from 'node:path'
import { resolveCharacterImages, type ResolvedCharacter } from '../../config/loader'
import type { Speaker } from '../../types/script'
import type { CharacterPlacement, RenderSchedule, ScheduledLine } from '../../types/schedule'
import { DataIntegrityError } from '../../utils/errors'
import { logger } from '../../utils/logger'
import { runCommand } from '../../utils/process'
import { AUDIO_SAMPLE_RATE } from '../media-pipeline'
import {
  bounceExpr,
  enableBetween,
  floatExpr,
  fmt,
  mergeMouthSegments,
  quoteFilterValue,
  shakeExpr,
} from './filter-graph'

export interface RenderAssets {
  background: string
  audio: string
  fontPath: string
  logo?: string
  characters: ReadonlyMap<Speaker, ResolvedCharacter>
}

export interface TextFile {
  path: string
  content: string
}

export interface RenderPlan {
  args: string[]
  filterScriptPath: string
  filterGraph: string
  textFiles: TextFile[]
}

const BUBBLE_COLORS = { left: 'white', right: '0xd8f5c4' } as const
const TEXT_COLOR = '0x222222'
const LOGO_HEIGHT_RATIO = 0.12
const LOGO_MARGIN = 40

class FilterGraphBuilder {
  private readonly imageInputs: string[] = []
  private readonly filters: string[] = []
  private current = 'base'
  private counter = 0

  constructor(
    /** 画像入力の前にある入力の数 */
    private readonly inputOffset: number
  ) {}

  get images(): readonly string[] {
    return this.imageInputs
  }

  start(filter: string) {
    this.filters.push(`[0:v]${filter}[base]`)
  }

  apply(filter: string) {
    const next = `v${this.counter++}`
    this.filters.push(`[${this.current}]${filter}[${next}]`)
    this.current = next
  }

  overlay(imagePath: string, prepare: string, overlayArgs: string) {
    let index = this.imageInputs.indexOf(imagePath)
    if (index < 0) {
      index = this.imageInputs.push(imagePath) - 1
    }
    const image = `img${this.counter++}`
    this.filters.push(`[${index + this.inputOffset}:v]${prepare}[${image}]`)
    const next = `v${this.counter++}`
    this.filters.push(`[${this.current}][${image}]overlay=${overlayArgs}[${next}]`)
    this.current = next
  }

  finish(): string {
    this.filters.push(`[${this.current}]format=yuv420p[vout]`)
    return this.filters.join(';\n')
  }
}

const lineWindow = (line: ScheduledLine, frameRate: number) => ({
  startSec: line.startFrame / frameRate,
  endSec: (line.startFrame + line.frameCount) / frameRate,
})

const prepareCharacter = (placement: CharacterPlacement) => {
  const filters = [`scale=-1:${Math.round(placement.height)}`]
  if (placement.brightness < 1) {
    const b = fmt(placement.brightness)
    filters.push(`colorchannelmixer=rr=${b}:gg=${b}:bb=${b}`)
  }
  return filters.join(',')
}

const characterPosition = (placement: CharacterPlacement, float: string) =>
  `x=${fmt(placement.centerX)}-overlay_w/2:y=${fmt(placement.baselineY)}-overlay_h+${float}`

/**
 * RenderSchedule から ffmpeg の引数とフィルタスクリプトを組み立てる
 */
export const buildRenderPlan = (
  schedule: RenderSchedule,
  assets: RenderAssets,
  outputPath: string,
  workDir: string
): RenderPlan => {
  if (schedule.totalFrames === 0) {
    throw new DataIntegrityError(`${schedule.layout} のスケジュールにフレームがありません`)
  }

  const { frameRate, width, height, motion } = schedule
  const builder = new FilterGraphBuilder(2)
  const textFiles: TextFile[] = []
  const float = floatExpr(motion)
  const font = quoteFilterValue(assets.fontPath)

  builder.start(
    `scale=${width}:${height}:force_original_aspect_ratio=increase,crop=${width}:${height},setsar=1,fps=${fmt(frameRate)}`
  )

  const drawCharacter = (placement: CharacterPlacement, line: ScheduledLine, animateMouth: boolean) => {
    const character = assets.characters.get(placement.speaker)
    if (!character) {
      throw new DataIntegrityError(`話者 ${placement.speaker} の画像設定がありません`)
    }
    const images = resolveCharacterImages(character, placement.emotion)
    const window = lineWindow(line, frameRate)
    const prepare = prepareCharacter(placement)
    const position = characterPosition(placement, float)

    if (!animateMouth) {
      builder.overlay(images.closed, prepare, `${position}:${enableBetween(window.startSec, window.endSec)}`)
      return
    }
    const frames = schedule.frames.slice(line.startFrame, line.startFrame + line.frameCount)
    for (const segment of mergeMouthSegments(frames, frameRate)) {
      builder.overlay(
        segment.mouthOpen ? images.open : images.closed,
        prepare,
        `${position}:${enableBetween(segment.startSec, segment.endSec)}`
      )
    }
  }

  for (const line of schedule.lines) {
    const window = lineWindow(line, frameRate)
    const decoration = line.decoration

    switch (decoration.kind) {
      case 'wide': {
        // 奥のキャラクターを先に描く
        const ordered = [...decoration.characters].sort((a, b) =>
          a.role === b.role ? 0 : a.role === 'background' ? -1 : 1
        )
        for (const placement of ordered) {
          drawCharacter(placement, line, placement.role === 'foreground')
        }
        const textPath = path.join(workDir, `caption_${line.lineIndex}.txt`)
        textFiles.push({ path: textPath, content: decoration.caption.lines.join('\n') })
        builder.apply(
          [
            `drawtext=fontfile=${font}`,
            `textfile=${quoteFilterValue(textPath)}`,
            'expansion=none',
            `fontsize=${decoration.caption.fontSize}`,
            'fontcolor=white',
            'borderw=4',
            'bordercolor=black',
            'line_spacing=12',
            'x=(w-text_w)/2',
            `y=${fmt(decoration.caption.y)}-text_h`,
            enableBetween(window.startSec, window.endSec),
          ].join(':')
        )
        break
      }
      case 'tall': {
        for (const bubble of decoration.bubbles) {
          const enable = enableBetween(window.startSec, window.endSec)
          const alpha = fmt(bubble.opacity)
          builder.apply(
            `drawbox=x=${fmt(bubble.x)}:y=${fmt(bubble.y)}:w=${fmt(bubble.width)}:h=${fmt(bubble.height)}:color=${BUBBLE_COLORS[bubble.side]}@${alpha}:t=fill:${enable}`
          )
          const textPath = path.join(workDir, `bubble_${bubble.lineIndex}.txt`)
          if (!textFiles.some((file) => file.path === textPath)) {
            textFiles.push({ path: textPath, content: bubble.lines.join('\n') })
          }
          builder.apply(
            [
              `drawtext=fontfile=${font}`,
              `textfile=${quoteFilterValue(textPath)}`,
              'expansion=none',
              `fontsize=${bubble.fontSize}`,
              `fontcolor=${TEXT_COLOR}`,
              `alpha=${alpha}`,
              `x=${fmt(bubble.x)}+(${fmt(bubble.width)}-text_w)/2`,
              `y=${fmt(bubble.y)}+(${fmt(bubble.height)}-text_h)/2`,
              enable,
            ].join(':')
          )
        }
        drawCharacter(decoration.avatar, line, true)
        break
      }
      default: {
        const _exhaustiveCheck: never = decoration
        throw new Error(`Unknown layout: ${JSON.stringify(_exhaustiveCheck)}`)
      }
    }
  }

  if (assets.logo) {
    const logoHeight = Math.round(height * LOGO_HEIGHT_RATIO)
    if (motion.logo) {
      builder.overlay(
        assets.logo,
        `scale=-1:${logoHeight}`,
        `x=W-overlay_w-${LOGO_MARGIN}+${shakeExpr(motion)}:y=${LOGO_MARGIN}:${enableBetween(motion.logo.startSec, motion.logo.endSec)}`
      )
    }
    if (motion.ending) {
      const travel = Math.round(height * 0.08)
      builder.overlay(
        assets.logo,
        `scale=-1:${logoHeight}`,
        `x=(W-overlay_w)/2:y=${Math.round(height * 0.15)}-${travel}*${bounceExpr(motion.ending.startSec, motion.ending.periodSec)}:${enableBetween(motion.ending.startSec, motion.ending.endSec)}`
      )
    }
  }

  const filterGraph = builder.finish()
  const filterScriptPath = path.join(workDir, `filter_${schedule.layout}.txt`)
  const args = ['-y', '-hide_banner', '-loglevel', 'error', '-loop', '1', '-framerate', fmt(frameRate), '-i', assets.background, '-i', assets.audio]
  for (const image of builder.images) {
    args.push('-loop', '1', '-i', image)
  }
  args.push(
    '-filter_complex_script',
    filterScriptPath,
    '-map',
    '[vout]',
    '-map',
    '1:a',
    '-c:v',
    'libx264',
    '-preset',
    'medium',
    '-crf',
    '20',
    '-r',
    fmt(frameRate),
    '-c:a',
    'aac',
    '-b:a',
    '192k',
    '-ar',
    AUDIO_SAMPLE_RATE.toString(),
    '-t',
    fmt(schedule.durationSec),
    '-movflags',
    '+faststart',
    outputPath
  )

  return { args, filterScriptPath, filterGraph, textFiles }
}

export class ScheduleRenderer {
  async render(
    schedule: RenderSchedule,
    assets: RenderAssets,
    outputPath: string,
    workDir: string,
    signal?: AbortSignal
  ): Promise<string> {
    const plan = buildRenderPlan(schedule, assets, outputPath, workDir)
    await fs.mkdir(workDir, { recursive: true })
    await Promise.all(plan.textFiles.map((file) => fs.writeFile(file.path, file.content, 'utf8')))
    await fs.writeFile(plan.filterScriptPath, plan.filterGraph, 'utf8')

    logger.info(
      { layout: schedule.layout, frames: schedule.totalFrames, durationSec: schedule.durationSec, outputPath },
      'Rendering video'
    )
    await runCommand('ffmpeg', plan.args, { signal })
    return outputPath
  }
}
