import { promises as fs } from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, it, expect, vi, type Mock } from 'vitest'
import { BackgroundService, buildBackgroundPrompt } from '../../src/services/background.service'
import { MediaPipeline } from '../../src/services/media-pipeline'
import type { ImageGenerator } from '../../src/services/openai-client'

const SIZES = {
  wide: { width: 1000, height: 500 },
  tall: { width: 500, height: 1000 },
}

describe('BackgroundService', () => {
  let dir: string
  let mediaPipeline: MediaPipeline
  let generateImage: Mock<ImageGenerator['generateImage']>

  const createService = (withGenerator = true) =>
    new BackgroundService({
      generator: withGenerator ? { generateImage } : undefined,
      mediaPipeline,
      model: 'test-image-model',
      style: 'Soft watercolor',
      fallbackColor: '#141428',
      sizes: SIZES,
      retry: { maxRetries: 1, baseDelayMs: 0, maxDelayMs: 0 },
    })

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'background-'))
    mediaPipeline = new MediaPipeline()
    vi.spyOn(mediaPipeline, 'fitImage').mockImplementation(async (_input, _size, outputPath) => {
      await fs.writeFile(outputPath, 'fitted')
      return outputPath
    })
    vi.spyOn(mediaPipeline, 'renderSolidImage').mockImplementation(async (_color, _size, outputPath) => outputPath)
    generateImage = vi.fn<ImageGenerator['generateImage']>().mockResolvedValue(Buffer.from('raw-image'))
  })

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true })
  })

  it('reuses an existing background', async () => {
    const outputPath = path.join(dir, 'background_wide.png')
    await fs.writeFile(outputPath, 'existing')

    const result = await createService().ensureBackground('給湯器', 'wide', outputPath)

    expect(result).toEqual({ path: outputPath, fallback: false })
    expect(generateImage).not.toHaveBeenCalled()
    expect(mediaPipeline.renderSolidImage).not.toHaveBeenCalled()
  })

  it('generates an image and fits it to the layout', async () => {
    const outputPath = path.join(dir, 'background_tall.png')
    const rawPath = path.join(dir, '.background_tall.png.raw.png')

    const result = await createService().ensureBackground('給湯器', 'tall', outputPath)

    expect(result).toEqual({ path: outputPath, fallback: false })
    expect(generateImage).toHaveBeenCalledWith(
      'Soft watercolor. Theme: 給湯器. Portrait composition with calm space for characters and captions.',
      '1024x1536',
      { model: 'test-image-model', signal: undefined }
    )
    expect(mediaPipeline.fitImage).toHaveBeenCalledWith(rawPath, SIZES.tall, outputPath, undefined)
    await expect(fs.access(rawPath)).rejects.toThrow()
    await expect(fs.readFile(outputPath, 'utf8')).resolves.toBe('fitted')
  })

  it('falls back to a solid color after retries run out', async () => {
    generateImage.mockRejectedValue(new Error('content policy'))
    const outputPath = path.join(dir, 'background_wide.png')

    const result = await createService().ensureBackground('給湯器', 'wide', outputPath)

    expect(result).toEqual({ path: outputPath, fallback: true })
    expect(generateImage).toHaveBeenCalledTimes(2)
    expect(mediaPipeline.renderSolidImage).toHaveBeenCalledWith('#141428', SIZES.wide, outputPath, undefined)
  })

  it('uses a solid color when no generator is configured', async () => {
    const outputPath = path.join(dir, 'background_wide.png')

    const result = await createService(false).ensureBackground('給湯器', 'wide', outputPath)

    expect(result).toEqual({ path: outputPath, fallback: true })
    expect(mediaPipeline.renderSolidImage).toHaveBeenCalledTimes(1)
  })

  it('does not fall back when aborted', async () => {
    const abort = new Error('aborted')
    abort.name = 'AbortError'
    generateImage.mockRejectedValue(abort)

    await expect(createService().ensureBackground('給湯器', 'wide', path.join(dir, 'background_wide.png'))).rejects.toBe(
      abort
    )
    expect(generateImage).toHaveBeenCalledTimes(1)
    expect(mediaPipeline.renderSolidImage).not.toHaveBeenCalled()
  })
})

describe('buildBackgroundPrompt', () => {
  it('describes the orientation', () => {
    expect(buildBackgroundPrompt('水道管', 'Flat illustration', 'wide')).toBe(
      'Flat illustration. Theme: 水道管. Landscape composition with calm space for characters and captions.'
    )
  })
})
