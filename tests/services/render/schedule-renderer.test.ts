import { describe, it, expect } from 'vitest'
import { buildRenderPlan, type RenderAssets } from '../../../src/services/render'
import { compose } from '../../../src/services/timeline'
import { DataIntegrityError } from '../../../src/utils/errors'
import { createTestConfig } from '../../factories/config'
import { buildInputs, createOptions, tallOptions } from '../../factories/dialogue'

const config = createTestConfig('/project')

const assets = (overrides: Partial<RenderAssets> = {}): RenderAssets => ({
  background: '/run/background_wide.png',
  audio: '/work/audio_wide.wav',
  fontPath: '/project/assets/fonts/font.ttf',
  characters: config.characterMap,
  ...overrides,
})

const wideSchedule = () => {
  const { lines, clips, tracks } = buildInputs([{ speaker: 'tsuno', durationSec: 0.3 }])
  return compose(lines, clips, tracks, 'wide', createOptions())
}

describe('buildRenderPlan', () => {
  it('draws the listener behind the speaker and switches mouth images', () => {
    const plan = buildRenderPlan(wideSchedule(), assets(), '/work/video_wide.mp4', '/work')
    const filters = plan.filterGraph.split(';\n')

    expect(filters).toEqual([
      '[0:v]scale=1000:500:force_original_aspect_ratio=increase,crop=1000:500,setsar=1,fps=10[base]',
      '[2:v]scale=-1:300,colorchannelmixer=rr=0.5:gg=0.5:bb=0.5[img0]',
      "[base][img0]overlay=x=750-overlay_w/2:y=500-overlay_h+8*sin(2*PI*0.4*t):enable='gte(t,0)*lt(t,0.3)'[v1]",
      '[3:v]scale=-1:330[img2]',
      "[v1][img2]overlay=x=250-overlay_w/2:y=500-overlay_h+8*sin(2*PI*0.4*t):enable='gte(t,0)*lt(t,0.1)'[v3]",
      '[4:v]scale=-1:330[img4]',
      "[v3][img4]overlay=x=250-overlay_w/2:y=500-overlay_h+8*sin(2*PI*0.4*t):enable='gte(t,0.1)*lt(t,0.3)'[v5]",
      expect.stringMatching(/^\[v5\]drawtext=fontfile='\/project\/assets\/fonts\/font\.ttf':textfile='\/work\/caption_0\.txt':expansion=none:/),
      '[v6]format=yuv420p[vout]',
    ])
    expect(plan.textFiles).toEqual([{ path: '/work/caption_0.txt', content: 'あいう' }])
  })

  it('passes each image once as a looped input', () => {
    const plan = buildRenderPlan(wideSchedule(), assets(), '/work/video_wide.mp4', '/work')

    expect(plan.filterScriptPath).toBe('/work/filter_wide.txt')
    expect(plan.args.slice(0, 20)).toEqual([
      '-y',
      '-hide_banner',
      '-loglevel',
      'error',
      '-loop',
      '1',
      '-framerate',
      '10',
      '-i',
      '/run/background_wide.png',
      '-i',
      '/work/audio_wide.wav',
      '-loop',
      '1',
      '-i',
      '/project/assets/megane/normal_closed.png',
      '-loop',
      '1',
      '-i',
      '/project/assets/tsuno/normal_open.png',
    ])
    expect(plan.args.filter((arg) => arg === '-loop')).toHaveLength(4)
    expect(plan.args.slice(-4)).toEqual(['0.3', '-movflags', '+faststart', '/work/video_wide.mp4'])
  })

  it('shakes the logo in the opening and bounces it at the end', () => {
    const plan = buildRenderPlan(
      wideSchedule(),
      assets({ logo: '/project/assets/logo.png' }),
      '/work/video_wide.mp4',
      '/work'
    )
    const filters = plan.filterGraph.split(';\n')

    expect(filters).toContain(
      "[v6][img7]overlay=x=W-overlay_w-40+3*sin(2*PI*2.75*t):y=40:enable='gte(t,0)*lt(t,0.3)'[v8]"
    )
    expect(filters).toContain(
      "[v8][img9]overlay=x=(W-overlay_w)/2:y=75-40*if(lte(mod((t-0)/0.5,2),1),mod((t-0)/0.5,2),2-mod((t-0)/0.5,2)):enable='gte(t,0)*lt(t,0.3)'[v10]"
    )
    expect(filters).toContain('[5:v]scale=-1:60[img7]')
    expect(filters).toContain('[5:v]scale=-1:60[img9]')
    expect(plan.args.filter((arg) => arg === '/project/assets/logo.png')).toHaveLength(1)
  })

  it('writes one text file per bubble in the tall layout', () => {
    const { lines, clips, tracks } = buildInputs([{ durationSec: 0.2 }, { text: 'えお', durationSec: 0.2 }])
    const schedule = compose(lines, clips, tracks, 'tall', tallOptions())

    const plan = buildRenderPlan(
      schedule,
      assets({ background: '/run/background_tall.png' }),
      '/work/video_tall.mp4',
      '/work'
    )

    expect(plan.textFiles).toEqual([
      { path: '/work/bubble_0.txt', content: 'あいう' },
      { path: '/work/bubble_1.txt', content: 'えお' },
    ])
    expect(plan.filterGraph.match(/drawbox=/g)).toHaveLength(3)
  })

  it('rejects an empty schedule', () => {
    const schedule = { ...wideSchedule(), totalFrames: 0 }

    expect(() => buildRenderPlan(schedule, assets(), '/work/video_wide.mp4', '/work')).toThrow(DataIntegrityError)
  })

  it('rejects a speaker without images', () => {
    const characters = new Map(config.characterMap)
    characters.delete('megane')

    expect(() => buildRenderPlan(wideSchedule(), assets({ characters }), '/work/video_wide.mp4', '/work')).toThrow(
      '話者 megane の画像設定がありません'
    )
  })
})
