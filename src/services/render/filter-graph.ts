import type { FrameState, ScheduleMotion } from '../../types/schedule'

/** 小数3桁に丸めて末尾の0を落とす */
export const fmt = (value: number): string => Number(value.toFixed(3)).toString()

/** フィルタ引数のシングルクォート内に埋め込む */
export const quoteFilterValue = (value: string) => `'${value.replace(/'/g, "'\\''")}'`

/** [start, end) の区間だけ有効 */
export const enableBetween = (startSec: number, endSec: number) => `enable='gte(t,${fmt(startSec)})*lt(t,${fmt(endSec)})'`

export const floatExpr = (motion: ScheduleMotion) =>
  `${fmt(motion.float.amplitude)}*sin(2*PI*${fmt(motion.float.frequency)}*t)`

export const shakeExpr = (motion: ScheduleMotion) =>
  `${fmt(motion.shake.amplitude)}*sin(2*PI*${fmt(motion.shake.frequency)}*t)`

/** 三角波。motion-engine の bounce と同じ値を返す */
export const bounceExpr = (startSec: number, periodSec: number) => {
  const pos = `mod((t-${fmt(startSec)})/${fmt(periodSec)},2)`
  return `if(lte(${pos},1),${pos},2-${pos})`
}

export interface MouthSegment {
  mouthOpen: boolean
  startSec: number
  endSec: number
}

/**
 * 連続する同じ口の状態をまとめる
 */
export const mergeMouthSegments = (frames: readonly FrameState[], frameRate: number): MouthSegment[] => {
  const segments: MouthSegment[] = []
  for (const frame of frames) {
    const startSec = frame.frameIndex / frameRate
    const endSec = (frame.frameIndex + 1) / frameRate
    const last = segments[segments.length - 1]
    if (last && last.mouthOpen === frame.mouthOpen && Math.abs(last.endSec - startSec) < 1e-9) {
      last.endSec = endSec
    } else {
      segments.push({ mouthOpen: frame.mouthOpen, startSec, endSec })
    }
  }
  return segments
}
