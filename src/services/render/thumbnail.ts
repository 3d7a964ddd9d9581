import { promises as fs } from 'node:fs'
import path from 'node:path'
import { runCommand } from '../../utils/process'
import type { Size } from '../media-pipeline'
import { fmt, quoteFilterValue } from './filter-graph'

export interface ThumbnailOptions {
  background: string
  title: string
  fontPath: string
  fontSize: number
  size: Size
  logo?: string
}

/** 先頭の【…】を外し、\n を改行にする */
export const formatThumbnailTitle = (title: string): string =>
  title
    .replace(/^\s*【[^】]*】\s*/, '')
    .replace(/\\n/g, '\n')
    .trim()

export const buildThumbnailArgs = (options: ThumbnailOptions, titlePath: string, outputPath: string): string[] => {
  const { width, height } = options.size
  const filters = [
    `[0:v]scale=${width}:${height}:force_original_aspect_ratio=increase,crop=${width}:${height},setsar=1[bg]`,
    `[bg]drawbox=x=0:y=0:w=iw:h=ih:color=black@0.35:t=fill[dim]`,
    [
      `[dim]drawtext=fontfile=${quoteFilterValue(options.fontPath)}`,
      `textfile=${quoteFilterValue(titlePath)}`,
      'expansion=none',
      `fontsize=${options.fontSize}`,
      'fontcolor=white',
      'borderw=6',
      'bordercolor=black',
      'line_spacing=16',
      'x=(w-text_w)/2',
      'y=(h-text_h)/2[titled]',
    ].join(':'),
  ]
  const args = ['-y', '-hide_banner', '-loglevel', 'error', '-i', options.background]
  let last = 'titled'
  if (options.logo) {
    args.push('-i', options.logo)
    filters.push(`[1:v]scale=-1:${fmt(Math.round(height * 0.18))}[logo]`)
    filters.push(`[titled][logo]overlay=x=W-overlay_w-32:y=32[out]`)
    last = 'out'
  }
  args.push('-filter_complex', filters.join(';'), '-map', `[${last}]`, '-frames:v', '1', outputPath)
  return args
}

/**
 * サムネイル画像を作る。入力が同じなら同じ画像になる。
 */
export const renderThumbnail = async (
  options: ThumbnailOptions,
  outputPath: string,
  workDir: string,
  signal?: AbortSignal
): Promise<string> => {
  await fs.mkdir(workDir, { recursive: true })
  const titlePath = path.join(workDir, 'thumbnail_title.txt')
  await fs.writeFile(titlePath, formatThumbnailTitle(options.title), 'utf8')
  await runCommand('ffmpeg', buildThumbnailArgs(options, titlePath, outputPath), { signal })
  return outputPath
}
