import { describe, it, expect } from 'vitest'
import {
  InvalidTransitionError,
  assertTransition,
  canTransition,
  hasReached,
  nextStage,
  progressOf,
} from '../../../src/services/pipeline/stages'

describe('nextStage', () => {
  it('walks the stages in order', () => {
    expect(nextStage('ScriptPending', true)).toBe('ScriptReady')
    expect(nextStage('AudioReady', true)).toBe('ScheduleReady')
    expect(nextStage('Rendered', true)).toBe('Published')
    expect(nextStage('Published', true)).toBe('Done')
  })

  it('skips publishing when no destination is configured', () => {
    expect(nextStage('Rendered', false)).toBe('Done')
  })

  it('has nothing after Done', () => {
    expect(nextStage('Done', true)).toBeNull()
  })
})

describe('progressOf', () => {
  it('uses the last completed stage of a failed run', () => {
    expect(progressOf({ stage: 'Failed', lastCompletedStage: 'AudioReady' })).toBe('AudioReady')
    expect(progressOf({ stage: 'Rendered', lastCompletedStage: 'Rendered' })).toBe('Rendered')
  })

  it('compares progress by stage order', () => {
    const run = { stage: 'Failed' as const, lastCompletedStage: 'AudioReady' as const }

    expect(hasReached(run, 'BackgroundReady')).toBe(true)
    expect(hasReached(run, 'AudioReady')).toBe(true)
    expect(hasReached(run, 'ScheduleReady')).toBe(false)
  })
})

describe('canTransition', () => {
  it('allows one step forward only', () => {
    expect(canTransition('ScriptReady', 'BackgroundReady', true)).toBe(true)
    expect(canTransition('ScriptReady', 'AudioReady', true)).toBe(false)
    expect(canTransition('AudioReady', 'ScriptReady', true)).toBe(true)
  })

  it('fails from anywhere but Done', () => {
    expect(canTransition('Rendered', 'Failed', true)).toBe(true)
    expect(canTransition('Done', 'Failed', true)).toBe(false)
    expect(canTransition('Failed', 'ScriptReady', true)).toBe(false)
  })

  it('throws a descriptive error for a rejected transition', () => {
    expect(() => assertTransition('ScriptPending', 'Rendered', true)).toThrow(InvalidTransitionError)
    expect(() => assertTransition('ScriptPending', 'Rendered', true)).toThrow('ScriptPending から Rendered へは遷移できません')
  })
})
