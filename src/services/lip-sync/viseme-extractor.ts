import type { Waveform } from '../../types/media'

export const DEFAULT_OPEN_THRESHOLD = 0.15
export const DEFAULT_MIN_OPEN_FRAMES = 2

export const frameCountFor = (durationSec: number, frameRate: number): number => Math.round(durationSec * frameRate)

/**
 * 1フレーム = 1/frameRate 秒の窓ごとに RMS を求め、ピーク正規化した値が
 * openThreshold を超えた窓を「口開き」とする。
 * 最後の窓が足りない分はゼロ埋めとして扱う。
 */
export const extractVisemes = (
  waveform: Waveform,
  frameRate: number,
  openThreshold: number = DEFAULT_OPEN_THRESHOLD,
  minOpenFrames: number = DEFAULT_MIN_OPEN_FRAMES
): boolean[] => {
  if (!(frameRate > 0)) {
    throw new RangeError(`frameRate must be positive: ${frameRate}`)
  }
  if (!(waveform.sampleRate > 0)) {
    throw new RangeError(`sampleRate must be positive: ${waveform.sampleRate}`)
  }

  const { samples, sampleRate } = waveform
  const frameCount = frameCountFor(samples.length / sampleRate, frameRate)
  const samplesPerFrame = sampleRate / frameRate
  const peak = peakAmplitude(samples)

  const states = new Array<boolean>(frameCount).fill(false)
  if (peak === 0) return states

  for (let frame = 0; frame < frameCount; frame++) {
    const start = Math.floor(frame * samplesPerFrame)
    const end = Math.floor((frame + 1) * samplesPerFrame)
    const rms = windowRms(samples, start, end) / peak
    states[frame] = rms > openThreshold
  }

  return debounceOpenRuns(states, minOpenFrames)
}

/** minOpenFrames 未満の口開き区間を閉じる */
export const debounceOpenRuns = (states: boolean[], minOpenFrames: number): boolean[] => {
  const result = [...states]
  let runStart = -1
  for (let i = 0; i <= result.length; i++) {
    const open = i < result.length && result[i]
    if (open && runStart < 0) {
      runStart = i
    } else if (!open && runStart >= 0) {
      if (i - runStart < minOpenFrames) {
        result.fill(false, runStart, i)
      }
      runStart = -1
    }
  }
  return result
}

const peakAmplitude = (samples: Float32Array): number => {
  let peak = 0
  for (const sample of samples) {
    const magnitude = Math.abs(sample)
    if (magnitude > peak) peak = magnitude
  }
  return peak
}

const windowRms = (samples: Float32Array, start: number, end: number): number => {
  const length = end - start
  if (length <= 0) return 0
  let sum = 0
  const available = Math.min(end, samples.length)
  for (let i = start; i < available; i++) {
    sum += samples[i] * samples[i]
  }
  return Math.sqrt(sum / length)
}
