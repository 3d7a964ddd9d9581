import type { DialogueLine, Speaker } from '../../types/script'
import type { CharacterPlacement, ChatBubble, ScreenSide, TallDecoration, WideDecoration } from '../../types/schedule'

export interface CastMember {
  speaker: Speaker
  side: ScreenSide
}

export interface EmphasisStyle {
  scale: number
  brightness: number
}

export interface WideLayoutOptions {
  /** 画面高さに対するキャラクター高さ */
  characterHeightRatio: number
  /** 画面下端からキャラクター足元までの距離 */
  characterBottomMargin: number
  foreground: EmphasisStyle
  background: EmphasisStyle
  captionFontSize: number
  /** 画面下端から字幕までの距離 */
  captionBottomOffset: number
  captionWidthRatio: number
}

export interface TallLayoutOptions {
  fontSize: number
  lineHeight: number
  paddingX: number
  paddingY: number
  gap: number
  sideMargin: number
  /** 最新の吹き出しの下端と画面下端の距離。話者はこの領域に描く */
  bottomMargin: number
  avatarMargin: number
  maxWidthRatio: number
  opacityStep: number
  minOpacity: number
}

export const DEFAULT_WIDE_LAYOUT: WideLayoutOptions = {
  characterHeightRatio: 0.6,
  characterBottomMargin: 0,
  foreground: { scale: 1.1, brightness: 1 },
  background: { scale: 1, brightness: 0.5 },
  captionFontSize: 56,
  captionBottomOffset: 120,
  captionWidthRatio: 0.8,
}

export const DEFAULT_TALL_LAYOUT: TallLayoutOptions = {
  fontSize: 48,
  lineHeight: 64,
  paddingX: 32,
  paddingY: 24,
  gap: 28,
  sideMargin: 48,
  bottomMargin: 320,
  avatarMargin: 24,
  maxWidthRatio: 0.72,
  opacityStep: 0.2,
  minOpacity: 0.35,
}

/** 文字数で折り返す。既存の改行は維持する */
export const wrapText = (text: string, charsPerLine: number): string[] => {
  const limit = Math.max(1, Math.floor(charsPerLine))
  return text.split('\n').flatMap((paragraph) => {
    const chars = [...paragraph]
    if (!chars.length) return ['']
    const lines: string[] = []
    for (let i = 0; i < chars.length; i += limit) {
      lines.push(chars.slice(i, i + limit).join(''))
    }
    return lines
  })
}

const sideCenterX = (side: ScreenSide, width: number) => (side === 'left' ? width * 0.25 : width * 0.75)

export const buildWideDecoration = (
  line: DialogueLine,
  captionText: string,
  cast: readonly CastMember[],
  size: { width: number; height: number },
  options: WideLayoutOptions
): WideDecoration => {
  const characters: CharacterPlacement[] = cast.map((member) => {
    const speaking = member.speaker === line.speaker
    const style = speaking ? options.foreground : options.background
    return {
      speaker: member.speaker,
      side: member.side,
      role: speaking ? 'foreground' : 'background',
      emotion: speaking ? line.emotion : 'normal',
      centerX: sideCenterX(member.side, size.width),
      baselineY: size.height - options.characterBottomMargin,
      height: Math.round(size.height * options.characterHeightRatio * style.scale),
      scale: style.scale,
      brightness: style.brightness,
    }
  })

  const maxWidth = size.width * options.captionWidthRatio
  return {
    kind: 'wide',
    characters,
    caption: {
      text: captionText,
      lines: wrapText(captionText, maxWidth / options.captionFontSize),
      centerX: size.width / 2,
      y: size.height - options.captionBottomOffset,
      maxWidth,
      fontSize: options.captionFontSize,
    },
  }
}

export interface BubbleShape {
  lineIndex: number
  speaker: Speaker
  side: ScreenSide
  lines: string[]
  width: number
  height: number
}

/** 行ごとに独立に計算できる吹き出しの形 */
export const measureBubble = (
  lineIndex: number,
  speaker: Speaker,
  side: ScreenSide,
  captionText: string,
  screenWidth: number,
  options: TallLayoutOptions
): BubbleShape => {
  const maxWidth = screenWidth * options.maxWidthRatio
  const charsPerLine = (maxWidth - options.paddingX * 2) / options.fontSize
  const lines = wrapText(captionText, charsPerLine)
  const longest = Math.max(1, ...lines.map((text) => [...text].length))
  return {
    lineIndex,
    speaker,
    side,
    lines,
    width: Math.round(Math.min(maxWidth, longest * options.fontSize + options.paddingX * 2)),
    height: lines.length * options.lineHeight + options.paddingY * 2,
  }
}

export const bubbleOpacity = (age: number, options: Pick<TallLayoutOptions, 'opacityStep' | 'minOpacity'>): number =>
  age === 0 ? 1 : Math.max(options.minOpacity, 1 - age * options.opacityStep)

/**
 * チャット風の積み上げ。history は古い順で、末尾が現在の行。
 * 新しい吹き出しほど下に置き、画面上端より上に出たものは描かない。
 */
export const buildTallDecoration = (
  line: DialogueLine,
  history: readonly BubbleShape[],
  size: { width: number; height: number },
  options: TallLayoutOptions
): TallDecoration => {
  const bubbles: ChatBubble[] = []
  let bottom = size.height - options.bottomMargin

  for (let age = 0; age < history.length; age++) {
    const shape = history[history.length - 1 - age]
    const y = bottom - shape.height
    if (y + shape.height <= 0) break
    const x = shape.side === 'left' ? options.sideMargin : size.width - options.sideMargin - shape.width
    bubbles.push({
      lineIndex: shape.lineIndex,
      speaker: shape.speaker,
      side: shape.side,
      lines: shape.lines,
      x,
      y,
      width: shape.width,
      height: shape.height,
      fontSize: options.fontSize,
      age,
      opacity: bubbleOpacity(age, options),
    })
    bottom = y - options.gap
  }

  const side = history.length ? history[history.length - 1].side : 'left'
  const avatar: CharacterPlacement = {
    speaker: line.speaker,
    side,
    role: 'foreground',
    emotion: line.emotion,
    centerX: side === 'left' ? size.width * 0.2 : size.width * 0.8,
    baselineY: size.height - options.avatarMargin,
    height: Math.max(1, Math.round(options.bottomMargin - options.avatarMargin * 2)),
    scale: 1,
    brightness: 1,
  }

  // 描画順は古い順
  return { kind: 'tall', bubbles: bubbles.reverse(), avatar }
}
