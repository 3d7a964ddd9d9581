import { runCommand } from '../utils/process'

export interface Size {
  width: number
  height: number
}

export interface AudioSegment {
  path: string
  /** 指定するとこの長さちょうどに揃える */
  durationSec?: number
}

const toSeconds = (ms: number) => (Math.max(ms, 0) / 1000).toFixed(3)
export const AUDIO_SAMPLE_RATE = 48_000
const toSamples = (sec: number) => Math.round(Math.max(sec, 0) * AUDIO_SAMPLE_RATE)
const AUDIO_CHANNEL_LAYOUT = 'mono'
const BASE_ARGS = ['-y', '-hide_banner', '-loglevel', 'error']

/** '#141428' -> '0x141428' */
export const toFfmpegColor = (hex: string) => `0x${hex.replace(/^#/, '')}`

/**
 * ffmpeg を使う素材処理。出力先はすべて呼び出し側が決める。
 */
export class MediaPipeline {
  async createSilentAudio(durationMs: number, outputPath: string, signal?: AbortSignal): Promise<string> {
    await runCommand(
      'ffmpeg',
      [
        ...BASE_ARGS,
        '-f',
        'lavfi',
        '-i',
        `anullsrc=r=${AUDIO_SAMPLE_RATE}:cl=${AUDIO_CHANNEL_LAYOUT}`,
        '-t',
        toSeconds(durationMs),
        '-c:a',
        'pcm_s16le',
        outputPath,
      ],
      { signal }
    )
    return outputPath
  }

  /**
   * 音声を順に結合する。durationSec を指定したクリップは無音で延長してからその長さで切る。
   */
  async concatAudioFiles(segments: ReadonlyArray<AudioSegment>, outputPath: string, signal?: AbortSignal): Promise<string> {
    if (!segments.length) {
      throw new Error('結合対象の音声がありません')
    }
    const args = [...BASE_ARGS]
    segments.forEach((segment) => {
      args.push('-i', segment.path)
    })

    // 行ごとにサンプルレートが違っても結合できるように揃える
    const normalized = segments
      .map((segment, index) => {
        const chain = [`aresample=${AUDIO_SAMPLE_RATE}`, `aformat=channel_layouts=${AUDIO_CHANNEL_LAYOUT}`]
        if (segment.durationSec !== undefined) {
          chain.push('apad', `atrim=end_sample=${toSamples(segment.durationSec)}`)
        }
        return `[${index}:a]${chain.join(',')}[a${index}]`
      })
      .join(';')
    const inputs = segments.map((_segment, index) => `[a${index}]`).join('')
    const filter = `${normalized};${inputs}concat=n=${segments.length}:v=0:a=1[a]`

    args.push('-filter_complex', filter, '-map', '[a]', '-c:a', 'pcm_s16le', '-ar', AUDIO_SAMPLE_RATE.toString(), outputPath)

    await runCommand('ffmpeg', args, { signal })
    return outputPath
  }

  async renderSolidImage(color: string, size: Size, outputPath: string, signal?: AbortSignal): Promise<string> {
    await runCommand(
      'ffmpeg',
      [
        ...BASE_ARGS,
        '-f',
        'lavfi',
        '-i',
        `color=c=${toFfmpegColor(color)}:s=${size.width}x${size.height}`,
        '-frames:v',
        '1',
        outputPath,
      ],
      { signal }
    )
    return outputPath
  }

  /** アスペクト比を保って拡大し、中央で切り抜く */
  async fitImage(inputPath: string, size: Size, outputPath: string, signal?: AbortSignal): Promise<string> {
    const filter = `scale=${size.width}:${size.height}:force_original_aspect_ratio=increase,crop=${size.width}:${size.height}`
    await runCommand('ffmpeg', [...BASE_ARGS, '-i', inputPath, '-vf', filter, '-frames:v', '1', outputPath], { signal })
    return outputPath
  }
}
