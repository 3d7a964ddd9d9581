import { promises as fs } from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import {
  PublishService,
  substituteVideoUrl,
  writePublishTemplates,
  type PublishServiceDeps,
} from '../../../src/services/publish/publish.service'
import type { TextPoster, VideoPublisher } from '../../../src/services/publish/webhook-publisher'
import { InvalidPayloadError, TransientExternalError } from '../../../src/utils/errors'
import { createScript } from '../../factories/script'

const retry = { maxRetries: 1, baseDelayMs: 0, maxDelayMs: 0 }

const videoPublisher = (url: string) => ({
  uploadVideo: vi.fn<VideoPublisher['uploadVideo']>().mockResolvedValue({ url }),
})

describe('substituteVideoUrl', () => {
  it('replaces every placeholder', () => {
    expect(substituteVideoUrl('{video_url} と {video_url}', 'https://v.example.com/1')).toBe(
      'https://v.example.com/1 と https://v.example.com/1'
    )
  })
})

describe('PublishService', () => {
  let runDir: string

  const input = () => ({
    runId: 'run-1',
    runDir,
    script: createScript(),
    wideVideo: path.join(runDir, 'video_wide.mp4'),
    tallVideo: path.join(runDir, 'video_tall.mp4'),
    thumbnail: path.join(runDir, 'thumbnail.png'),
  })

  const readFile = (name: string) => fs.readFile(path.join(runDir, name), 'utf8')

  beforeEach(async () => {
    runDir = await fs.mkdtemp(path.join(os.tmpdir(), 'publish-'))
  })

  afterEach(async () => {
    await fs.rm(runDir, { recursive: true, force: true })
  })

  it('writes the unpublished templates as-is', async () => {
    await writePublishTemplates(runDir, createScript())

    await expect(readFile('note.md')).resolves.toBe('動画はこちら {video_url}')
    await expect(readFile('x_post.txt')).resolves.toBe('新作です {video_url}')
  })

  it('fills in the url of an already published video', async () => {
    await writePublishTemplates(runDir, createScript(), 'https://v.example.com/main')

    await expect(readFile('note.md')).resolves.toBe('動画はこちら https://v.example.com/main')
    await expect(readFile('x_post.txt')).resolves.toBe('新作です https://v.example.com/main')
  })

  it('is disabled without a video destination', async () => {
    const service = new PublishService({ retry })

    expect(service.enabled).toBe(false)
    await expect(service.publish(input())).rejects.toThrow('動画の公開先が設定されていません')
  })

  it('publishes the video first and fills in its url', async () => {
    const video = videoPublisher('https://v.example.com/main')
    const shorts = videoPublisher('https://v.example.com/shorts')
    const post = { postText: vi.fn<TextPoster['postText']>().mockResolvedValue({ url: 'https://s.example.com/p' }) }
    const service = new PublishService({ video, shorts, post, retry })

    const result = await service.publish(input())

    expect(result).toMatchObject({
      videoUrl: 'https://v.example.com/main',
      shortsUrl: 'https://v.example.com/shorts',
      postUrl: 'https://s.example.com/p',
      errors: [],
    })
    expect(video.uploadVideo).toHaveBeenCalledWith(
      {
        videoPath: path.join(runDir, 'video_wide.mp4'),
        thumbnailPath: path.join(runDir, 'thumbnail.png'),
        title: '【冬支度】水道管の凍結を防ぐには',
        description: '動画はこちら {video_url}',
      },
      undefined
    )
    expect(shorts.uploadVideo).toHaveBeenCalledWith(
      {
        videoPath: path.join(runDir, 'video_tall.mp4'),
        title: '【冬支度】水道管の凍結を防ぐには',
        description: '新作です https://v.example.com/main',
      },
      undefined
    )
    expect(post.postText).toHaveBeenCalledWith('新作です https://v.example.com/main', undefined)
    await expect(readFile('note.md')).resolves.toBe('動画はこちら https://v.example.com/main')
    const info = JSON.parse(await readFile('upload_info.json'))
    expect(info).toMatchObject({ title: '【冬支度】水道管の凍結を防ぐには', videoUrl: 'https://v.example.com/main' })
  })

  it('records secondary failures without failing', async () => {
    const shorts = {
      uploadVideo: vi.fn<VideoPublisher['uploadVideo']>().mockRejectedValue(new InvalidPayloadError('too long', 'shorts')),
    }
    const deps: PublishServiceDeps = { video: videoPublisher('https://v.example.com/main'), shorts, retry }

    const result = await new PublishService(deps).publish(input())

    expect(result.videoUrl).toBe('https://v.example.com/main')
    expect(result.shortsUrl).toBeUndefined()
    expect(result.errors).toEqual(['shorts: too long'])
    expect(shorts.uploadVideo).toHaveBeenCalledTimes(1)
  })

  it('retries transient main upload failures', async () => {
    const video = videoPublisher('https://v.example.com/main')
    video.uploadVideo.mockRejectedValueOnce(new TransientExternalError('busy', 'video', 503))

    const result = await new PublishService({ video, retry }).publish(input())

    expect(result.videoUrl).toBe('https://v.example.com/main')
    expect(video.uploadVideo).toHaveBeenCalledTimes(2)
  })

  it('fails when the main upload fails', async () => {
    const video = {
      uploadVideo: vi.fn<VideoPublisher['uploadVideo']>().mockRejectedValue(new InvalidPayloadError('rejected', 'video')),
    }

    await expect(new PublishService({ video, retry }).publish(input())).rejects.toThrow('rejected')
    await expect(fs.access(path.join(runDir, 'upload_info.json'))).rejects.toThrow()
  })

  it('skips the text post when the post body is empty', async () => {
    const post = { postText: vi.fn<TextPoster['postText']>() }
    const service = new PublishService({ video: videoPublisher('https://v.example.com/main'), post, retry })

    await service.publish({ ...input(), script: createScript({ xPostContent: '  ' }) })

    expect(post.postText).not.toHaveBeenCalled()
  })
})
