import { PROGRESS_STAGES, type PipelineRun, type ProgressStage, type Stage } from '../../types/run'

export class InvalidTransitionError extends Error {
  constructor(
    public readonly from: Stage,
    public readonly to: Stage,
    reason?: string
  ) {
    super(`${from} から ${to} へは遷移できません${reason ? ` (${reason})` : ''}`)
    this.name = 'InvalidTransitionError'
  }
}

export const stageIndex = (stage: ProgressStage): number => PROGRESS_STAGES.indexOf(stage)

/** Failed なら最後に完了したステージ */
export const progressOf = (run: Pick<PipelineRun, 'stage' | 'lastCompletedStage'>): ProgressStage =>
  run.stage === 'Failed' ? run.lastCompletedStage : run.stage

export const hasReached = (run: Pick<PipelineRun, 'stage' | 'lastCompletedStage'>, stage: ProgressStage): boolean =>
  stageIndex(progressOf(run)) >= stageIndex(stage)

/**
 * 次に進むステージ。公開先がなければ Rendered から Done へ進む。
 */
export const nextStage = (from: ProgressStage, publishEnabled: boolean): ProgressStage | null => {
  if (from === 'Rendered' && !publishEnabled) return 'Done'
  const index = stageIndex(from)
  return index + 1 < PROGRESS_STAGES.length ? PROGRESS_STAGES[index + 1] : null
}

export const canTransition = (from: Stage, to: Stage, publishEnabled: boolean): boolean => {
  if (to === 'Failed') return from !== 'Done'
  if (from === 'Failed') return false
  if (to === 'ScriptReady' && stageIndex(from) >= stageIndex('ScriptReady')) return true
  return nextStage(from, publishEnabled) === to
}

export const assertTransition = (from: Stage, to: Stage, publishEnabled: boolean) => {
  if (!canTransition(from, to, publishEnabled)) {
    throw new InvalidTransitionError(from, to)
  }
}
