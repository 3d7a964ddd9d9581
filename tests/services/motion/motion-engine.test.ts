import { describe, it, expect } from 'vitest'
import { bounce, drawShakeFrequency, floatOffset, shakeOffset } from '../../../src/services/motion/motion-engine'

describe('floatOffset', () => {
  it('follows amplitude * sin(2π f t)', () => {
    expect(floatOffset(0)).toBe(0)
    // 0.4Hz の 1/4 周期
    expect(floatOffset(0.625)).toBeCloseTo(8, 10)
    expect(floatOffset(1.875)).toBeCloseTo(-8, 10)
    expect(floatOffset(0.25, { amplitude: 2, frequency: 1 })).toBeCloseTo(2, 10)
  })
})

describe('shakeOffset', () => {
  it('uses the given frequency with the default amplitude', () => {
    expect(shakeOffset(0.1, 2.5)).toBeCloseTo(3, 10)
    expect(shakeOffset(0.1, 2.5, 5)).toBeCloseTo(5, 10)
  })
})

describe('drawShakeFrequency', () => {
  it('maps the random draw into the band', () => {
    expect(drawShakeFrequency(() => 0)).toBe(2.5)
    expect(drawShakeFrequency(() => 0.5)).toBe(2.75)
    expect(drawShakeFrequency(() => 0.5, { min: 1, max: 2 })).toBe(1.5)
  })

  it('stays inside the default band', () => {
    for (let i = 0; i < 50; i++) {
      const frequency = drawShakeFrequency()
      expect(frequency).toBeGreaterThanOrEqual(2.5)
      expect(frequency).toBeLessThanOrEqual(3)
    }
  })
})

describe('bounce', () => {
  it('moves forward then back over two periods', () => {
    expect(bounce(0, 1)).toBe(0)
    expect(bounce(0.5, 1)).toBe(0.5)
    expect(bounce(1, 1)).toBe(1)
    expect(bounce(1.5, 1)).toBe(0.5)
    expect(bounce(2, 1)).toBe(0)
  })

  it('stays within [0, 1] and is continuous at the turnaround', () => {
    const total = 0.5
    for (let t = 0; t < 2 * total; t += 0.01) {
      const value = bounce(t, total)
      expect(value).toBeGreaterThanOrEqual(0)
      expect(value).toBeLessThanOrEqual(1)
    }
    expect(Math.abs(bounce(total - 1e-6, total) - bounce(total + 1e-6, total))).toBeLessThan(1e-4)
  })

  it('handles negative time', () => {
    expect(bounce(-0.5, 1)).toBe(0.5)
  })

  it('rejects a non-positive total', () => {
    expect(() => bounce(0.1, 0)).toThrow(RangeError)
  })
})
