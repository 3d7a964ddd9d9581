export interface WaveParams {
  amplitude: number
  frequency: number
}

export interface FrequencyBand {
  min: number
  max: number
}

export const DEFAULT_FLOAT: WaveParams = { amplitude: 8, frequency: 0.4 }
export const DEFAULT_SHAKE_AMPLITUDE = 3
export const SHAKE_FREQUENCY_BAND: FrequencyBand = { min: 2.5, max: 3 }

const sine = (t: number, { amplitude, frequency }: WaveParams) => amplitude * Math.sin(2 * Math.PI * frequency * t)

/** キャラクターのふわふわ上下動 */
export const floatOffset = (t: number, params: WaveParams = DEFAULT_FLOAT): number => sine(t, params)

/** ロゴの震え。周波数はランごとに一度だけ決めたものを渡す */
export const shakeOffset = (t: number, frequency: number, amplitude: number = DEFAULT_SHAKE_AMPLITUDE): number =>
  sine(t, { amplitude, frequency })

export const drawShakeFrequency = (
  random: () => number = Math.random,
  band: FrequencyBand = SHAKE_FREQUENCY_BAND
): number => band.min + (band.max - band.min) * random()

/**
 * 往復補間。pos を 2 で割った余りを折り返して [0, 1] の三角波にする。
 */
export const bounce = (t: number, total: number, start = 0, end = 1): number => {
  if (!(total > 0)) {
    throw new RangeError(`total must be positive: ${total}`)
  }
  const pos = start + (end - start) * (t / total)
  const posMod = ((pos % 2) + 2) % 2
  return posMod <= 1 ? posMod : 2 - posMod
}
