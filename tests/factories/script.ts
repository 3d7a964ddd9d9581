import type { ScriptDocument } from '../../src/types/script'

export const createScript = (overrides: Partial<ScriptDocument> = {}): ScriptDocument => ({
  meta: { theme: '冬の水道管', title: '【冬支度】水道管の凍結を防ぐには' },
  dialogue: [
    { speaker: 'tsuno', text: '水道管<すいどうかん>が凍るってほんと？', emotion: 'surprised', shortsSkip: false },
    { speaker: 'megane', text: 'ほんとだよ。[[（給湯器<きゅうとうき>も）]]', emotion: 'normal', shortsSkip: true },
    { speaker: 'tsuno', text: 'じゃあ対策しよう！', emotion: 'happy', shortsSkip: false },
  ],
  noteContent: '動画はこちら {video_url}',
  xPostContent: '新作です {video_url}',
  ...overrides,
})
