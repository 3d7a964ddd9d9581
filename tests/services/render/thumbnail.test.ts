import { promises as fs } from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'

vi.mock('../../../src/utils/process', () => ({
  runCommand: vi.fn(),
}))

import { runCommand } from '../../../src/utils/process'
import { buildThumbnailArgs, formatThumbnailTitle, renderThumbnail } from '../../../src/services/render'

const options = {
  background: '/run/background_wide.png',
  title: '【水回り】給湯器が\\n凍る前に',
  fontPath: '/fonts/font.ttf',
  fontSize: 96,
  size: { width: 1280, height: 720 },
}

describe('formatThumbnailTitle', () => {
  it('drops the leading bracket tag and expands line breaks', () => {
    expect(formatThumbnailTitle(options.title)).toBe('給湯器が\n凍る前に')
  })

  it('keeps brackets in the middle of the title', () => {
    expect(formatThumbnailTitle('冬の【必見】対策')).toBe('冬の【必見】対策')
  })
})

describe('buildThumbnailArgs', () => {
  it('dims the background and centers the title', () => {
    const args = buildThumbnailArgs(options, '/work/title.txt', '/run/thumbnail.png')

    expect(args).toEqual([
      '-y',
      '-hide_banner',
      '-loglevel',
      'error',
      '-i',
      '/run/background_wide.png',
      '-filter_complex',
      [
        '[0:v]scale=1280:720:force_original_aspect_ratio=increase,crop=1280:720,setsar=1[bg]',
        '[bg]drawbox=x=0:y=0:w=iw:h=ih:color=black@0.35:t=fill[dim]',
        "[dim]drawtext=fontfile='/fonts/font.ttf':textfile='/work/title.txt':expansion=none:fontsize=96:fontcolor=white:borderw=6:bordercolor=black:line_spacing=16:x=(w-text_w)/2:y=(h-text_h)/2[titled]",
      ].join(';'),
      '-map',
      '[titled]',
      '-frames:v',
      '1',
      '/run/thumbnail.png',
    ])
  })

  it('overlays the logo in the corner', () => {
    const args = buildThumbnailArgs({ ...options, logo: '/assets/logo.png' }, '/work/title.txt', '/run/thumbnail.png')

    expect(args.slice(4, 8)).toEqual(['-i', '/run/background_wide.png', '-i', '/assets/logo.png'])
    const filter = args[args.indexOf('-filter_complex') + 1]
    expect(filter.split(';').slice(-2)).toEqual([
      '[1:v]scale=-1:130[logo]',
      '[titled][logo]overlay=x=W-overlay_w-32:y=32[out]',
    ])
    expect(args[args.indexOf('-map') + 1]).toBe('[out]')
  })
})

describe('renderThumbnail', () => {
  let workDir: string

  beforeEach(async () => {
    workDir = path.join(await fs.mkdtemp(path.join(os.tmpdir(), 'thumbnail-')), 'work')
    vi.mocked(runCommand).mockReset()
    vi.mocked(runCommand).mockResolvedValue(undefined)
  })

  afterEach(async () => {
    await fs.rm(path.dirname(workDir), { recursive: true, force: true })
  })

  it('writes the title file and runs ffmpeg', async () => {
    const signal = new AbortController().signal

    const result = await renderThumbnail(options, '/run/thumbnail.png', workDir, signal)

    const titlePath = path.join(workDir, 'thumbnail_title.txt')
    expect(result).toBe('/run/thumbnail.png')
    await expect(fs.readFile(titlePath, 'utf8')).resolves.toBe('給湯器が\n凍る前に')
    expect(runCommand).toHaveBeenCalledWith('ffmpeg', buildThumbnailArgs(options, titlePath, '/run/thumbnail.png'), {
      signal,
    })
  })
})
