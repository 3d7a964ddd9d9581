import { promises as fs } from 'node:fs'
import path from 'node:path'
import type { ResolvedConfig } from '../../config/loader'
import type { AudioClip } from '../../types/media'
import type { PipelineRun, ProgressStage, RegenerableArtifact } from '../../types/run'
import { LAYOUTS, type RenderSchedule } from '../../types/schedule'
import { toDialogueLines, type ScriptDocument } from '../../types/script'
import { DataIntegrityError, RunAbortedError, describeError, isAbortError } from '../../utils/errors'
import { logger } from '../../utils/logger'
import { loadReadingDictionary, type ReadingDictionary } from '../annotation'
import type { BackgroundResult, BackgroundService } from '../background.service'
import type { MediaPipeline } from '../media-pipeline'
import { writePublishTemplates, type PublishService } from '../publish/publish.service'
import { renderThumbnail, type ScheduleRenderer } from '../render'
import type { ScriptSource } from '../script.service'
import type { SpeechService } from '../speech.service'
import { drawShakeFrequency } from '../motion/motion-engine'
import {
  AUDIO_DIR,
  THUMBNAIL_FILE,
  backgroundFile,
  videoFile,
  type RunStore,
  type RunSummary,
} from './run-store'
import { buildSchedules } from './schedule-builder'
import { InvalidTransitionError, assertTransition, hasReached, nextStage, progressOf } from './stages'

export class StageFailedError extends Error {
  constructor(
    public readonly runId: string,
    public readonly stage: ProgressStage,
    public readonly lastCompletedStage: ProgressStage,
    cause: unknown
  ) {
    super(`${runId}: ${stage} に失敗しました: ${describeError(cause)}`, { cause })
    this.name = 'StageFailedError'
  }
}

export class RunBusyError extends Error {
  constructor(public readonly runId: string) {
    super(`Run ${runId} is already being processed`)
    this.name = 'RunBusyError'
  }
}

export interface CreateRunInput {
  topic: string
  instructions?: string
}

export interface OrchestratorDeps {
  config: ResolvedConfig
  store: RunStore
  scriptSource: ScriptSource
  backgrounds: BackgroundService
  speech: SpeechService
  renderer: ScheduleRenderer
  publisher: PublishService
  mediaPipeline: MediaPipeline
  loadDictionary?: (filePath: string) => Promise<ReadingDictionary>
  random?: () => number
  now?: () => Date
}

type StageExecutor = (run: PipelineRun, signal: AbortSignal) => Promise<PipelineRun['artifacts']>

/**
 * ステージを1つずつ進める状態機械。各遷移の後に run.json を保存する。
 */
export class PipelineOrchestrator {
  private readonly config: ResolvedConfig
  private readonly store: RunStore
  private readonly scriptSource: ScriptSource
  private readonly backgrounds: BackgroundService
  private readonly speech: SpeechService
  private readonly renderer: ScheduleRenderer
  private readonly publisher: PublishService
  private readonly mediaPipeline: MediaPipeline
  private readonly loadDictionary: (filePath: string) => Promise<ReadingDictionary>
  private readonly random: () => number
  private readonly now: () => Date
  private readonly active = new Map<string, AbortController>()

  constructor(deps: OrchestratorDeps) {
    this.config = deps.config
    this.store = deps.store
    this.scriptSource = deps.scriptSource
    this.backgrounds = deps.backgrounds
    this.speech = deps.speech
    this.renderer = deps.renderer
    this.publisher = deps.publisher
    this.mediaPipeline = deps.mediaPipeline
    this.loadDictionary = deps.loadDictionary ?? loadReadingDictionary
    this.random = deps.random ?? Math.random
    this.now = deps.now ?? (() => new Date())
  }

  async createRun(input: CreateRunInput): Promise<PipelineRun> {
    const topic = input.topic.trim()
    if (!topic) {
      throw new Error('テーマが空です')
    }
    const createdAt = this.now()
    const runId = await this.store.allocateRunId(createdAt)
    const { minFrequency, maxFrequency } = this.config.motion.shake
    const run: PipelineRun = {
      runId,
      topic,
      instructions: input.instructions,
      stage: 'ScriptPending',
      lastCompletedStage: 'ScriptPending',
      failure: null,
      shakeFrequency: drawShakeFrequency(this.random, { min: minFrequency, max: maxFrequency }),
      createdAt: createdAt.toISOString(),
      updatedAt: createdAt.toISOString(),
      artifacts: { script: null, backgrounds: null, audioClips: null, schedules: null, renders: null, publish: null },
    }
    await this.store.save(run)
    logger.info({ runId, topic, shakeFrequency: run.shakeFrequency }, 'Run created')
    return run
  }

  getRun(runId: string): Promise<PipelineRun> {
    return this.store.load(runId)
  }

  listRuns(): Promise<RunSummary[]> {
    return this.store.list()
  }

  isActive(runId: string): boolean {
    return this.active.has(runId)
  }

  /** 実行中の処理を中断する。中断したものがなければ false */
  cancel(runId: string): boolean {
    const controller = this.active.get(runId)
    if (!controller) return false
    controller.abort()
    logger.info({ runId }, 'Run cancellation requested')
    return true
  }

  /** 次のステージへ1つだけ進める。Failed なら最後に完了したステージから再開する */
  advance(runId: string, signal?: AbortSignal): Promise<PipelineRun> {
    return this.withRunLock(runId, signal, (combined) => this.advanceLocked(runId, combined))
  }

  /** target に到達するまで進める */
  runUntil(runId: string, target: ProgressStage, signal?: AbortSignal): Promise<PipelineRun> {
    return this.withRunLock(runId, signal, async (combined) => {
      let run = await this.store.load(runId)
      while (!hasReached(run, target)) {
        run = await this.advanceLocked(runId, combined)
      }
      return run
    })
  }

  /**
   * 人が script.json を編集した後の再開点。音声以降の成果物を捨てて ScriptReady に戻す。
   * 背景は台本に依存しないので残す。
   */
  resumeFromScript(runId: string): Promise<PipelineRun> {
    return this.withRunLock(runId, undefined, async () => {
      const run = await this.store.load(runId)
      const from = progressOf(run)
      if (from === 'ScriptPending') {
        throw new InvalidTransitionError(run.stage, 'ScriptReady', '台本がまだありません')
      }
      assertTransition(from, 'ScriptReady', this.publisher.enabled)
      const script = await this.store.loadScript(runId)
      await fs.rm(this.store.resolve(runId, AUDIO_DIR), { recursive: true, force: true })
      const updated: PipelineRun = {
        ...run,
        stage: 'ScriptReady',
        lastCompletedStage: 'ScriptReady',
        failure: null,
        updatedAt: this.now().toISOString(),
        artifacts: { ...run.artifacts, audioClips: null, schedules: null, renders: null, publish: null },
      }
      await this.store.save(updated)
      logger.info({ runId, lines: script.dialogue.length }, 'Run rewound to ScriptReady')
      return updated
    })
  }

  /**
   * 1つの成果物だけを作り直す。ステージは変えない。
   */
  regenerate(runId: string, artifact: RegenerableArtifact, signal?: AbortSignal): Promise<PipelineRun> {
    return this.withRunLock(runId, signal, async (combined) => {
      const run = await this.store.load(runId)
      const required: ProgressStage = artifact === 'schedules' ? 'ScheduleReady' : 'Rendered'
      if (!hasReached(run, required)) {
        throw new InvalidTransitionError(run.stage, required, `${artifact} の再生成には ${required} 以降が必要です`)
      }

      let artifacts: PipelineRun['artifacts']
      switch (artifact) {
        case 'thumbnail': {
          const script = await this.store.loadScript(runId)
          await this.renderThumbnail(run, script, combined)
          artifacts = run.artifacts
          break
        }
        case 'schedules':
          artifacts = await this.buildScheduleArtifacts(run)
          break
        case 'renders':
          artifacts = await this.renderArtifacts(run, combined)
          break
        default: {
          const _exhaustiveCheck: never = artifact
          throw new Error(`Unknown artifact: ${String(_exhaustiveCheck)}`)
        }
      }

      const updated: PipelineRun = { ...run, artifacts, updatedAt: this.now().toISOString() }
      await this.store.save(updated)
      logger.info({ runId, artifact }, 'Artifact regenerated')
      return updated
    })
  }

  private async withRunLock<T>(
    runId: string,
    signal: AbortSignal | undefined,
    task: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    if (this.active.has(runId)) {
      throw new RunBusyError(runId)
    }
    const controller = new AbortController()
    this.active.set(runId, controller)
    const combined = signal ? AbortSignal.any([signal, controller.signal]) : controller.signal
    try {
      return await task(combined)
    } catch (error) {
      if (combined.aborted && isAbortError(error)) {
        throw new RunAbortedError(runId)
      }
      throw error
    } finally {
      this.active.delete(runId)
    }
  }

  private async advanceLocked(runId: string, signal: AbortSignal): Promise<PipelineRun> {
    const run = await this.store.load(runId)
    const from = progressOf(run)
    const target = nextStage(from, this.publisher.enabled)
    if (!target) {
      throw new InvalidTransitionError(run.stage, 'Done', '完了済みです')
    }
    assertTransition(from, target, this.publisher.enabled)

    logger.info({ runId, from, target }, 'Stage started')
    let artifacts: PipelineRun['artifacts']
    try {
      artifacts = await this.executors[target]({ ...run, stage: from }, signal)
      signal.throwIfAborted()
    } catch (error) {
      if (signal.aborted) {
        // 保存済みのステージはそのまま残す
        logger.info({ runId, from, target }, 'Stage aborted')
        throw new RunAbortedError(runId)
      }
      const failed: PipelineRun = {
        ...run,
        stage: 'Failed',
        lastCompletedStage: from,
        failure: {
          stage: target,
          kind: error instanceof Error ? error.name : 'Error',
          message: describeError(error),
          at: this.now().toISOString(),
        },
        updatedAt: this.now().toISOString(),
      }
      await this.store.save(failed)
      logger.error({ runId, stage: target, lastCompletedStage: from, err: error }, 'Stage failed')
      throw new StageFailedError(runId, target, from, error)
    }

    const updated: PipelineRun = {
      ...run,
      stage: target,
      lastCompletedStage: target,
      failure: null,
      updatedAt: this.now().toISOString(),
      artifacts,
    }
    await this.store.save(updated)
    logger.info({ runId, stage: target }, 'Stage completed')
    return updated
  }

  private readonly executors: Record<ProgressStage, StageExecutor> = {
    ScriptPending: async (run) => run.artifacts,
    ScriptReady: async (run, signal) => {
      const script = await this.scriptSource.generate({ topic: run.topic, instructions: run.instructions }, signal)
      const fileName = await this.store.saveScript(run.runId, script)
      return { ...run.artifacts, script: fileName }
    },
    BackgroundReady: async (run, signal) => {
      const results: BackgroundResult[] = []
      for (const layout of LAYOUTS) {
        const fileName = backgroundFile(layout)
        results.push(
          await this.backgrounds.ensureBackground(run.topic, layout, this.store.resolve(run.runId, fileName), signal)
        )
      }
      return {
        ...run.artifacts,
        backgrounds: {
          wide: backgroundFile('wide'),
          tall: backgroundFile('tall'),
          fallback: results.some((result) => result.fallback),
        },
      }
    },
    AudioReady: async (run, signal) => ({ ...run.artifacts, audioClips: await this.synthesizeAudio(run, signal) }),
    ScheduleReady: async (run) => this.buildScheduleArtifacts(run),
    Rendered: async (run, signal) => this.renderArtifacts(run, signal),
    Published: async (run, signal) => {
      const renders = this.require(run, 'renders', run.artifacts.renders)
      const script = await this.store.loadScript(run.runId)
      const result = await this.publisher.publish(
        {
          runId: run.runId,
          runDir: this.store.runDir(run.runId),
          script,
          wideVideo: this.store.resolve(run.runId, renders.wide),
          tallVideo: this.store.resolve(run.runId, renders.tall),
          thumbnail: this.store.resolve(run.runId, renders.thumbnail),
        },
        signal
      )
      return { ...run.artifacts, publish: result }
    },
    Done: async (run) => run.artifacts,
  }

  private require<T>(run: PipelineRun, name: string, value: T | null): T {
    if (value === null) {
      throw new DataIntegrityError(`${run.runId}: ${name} がまだ作られていません`)
    }
    return value
  }

  /** 一時ディレクトリに書き、全行が揃ってから audio/ と入れ替える */
  private async synthesizeAudio(run: PipelineRun, signal: AbortSignal): Promise<AudioClip[]> {
    const script = await this.store.loadScript(run.runId)
    const dictionary = await this.loadDictionary(this.config.paths.readingDictionary)
    const runDir = this.store.runDir(run.runId)
    const stagingDir = await fs.mkdtemp(path.join(runDir, '.audio-'))
    try {
      const clips = await this.speech.synthesizeLines(toDialogueLines(script), {
        outputDir: stagingDir,
        relativeDir: AUDIO_DIR,
        dictionary,
        runId: run.runId,
        signal,
      })
      signal.throwIfAborted()
      const audioDir = path.join(runDir, AUDIO_DIR)
      await fs.rm(audioDir, { recursive: true, force: true })
      await fs.rename(stagingDir, audioDir)
      return clips
    } finally {
      await fs.rm(stagingDir, { recursive: true, force: true })
    }
  }

  private async buildScheduleArtifacts(run: PipelineRun): Promise<PipelineRun['artifacts']> {
    const clips = this.require(run, 'audioClips', run.artifacts.audioClips)
    const script = await this.store.loadScript(run.runId)
    const lines = toDialogueLines(script)
    if (clips.length !== lines.length) {
      throw new DataIntegrityError(
        `${run.runId}: 台本 ${lines.length} 行に対して音声が ${clips.length} 件です。resume-from-script で作り直してください`
      )
    }
    const schedules = await buildSchedules(this.config, {
      lines,
      clips,
      runDir: this.store.runDir(run.runId),
      shakeFrequency: run.shakeFrequency,
    })
    const wide = await this.store.saveSchedule(run.runId, schedules.wide)
    const tall = await this.store.saveSchedule(run.runId, schedules.tall)
    logger.info(
      {
        runId: run.runId,
        wideSec: schedules.wide.durationSec,
        tallSec: schedules.tall.durationSec,
        skippedLines: schedules.tall.skippedLines,
      },
      'Schedules composed'
    )
    return { ...run.artifacts, schedules: { wide, tall } }
  }

  /**
   * 2つのレイアウトとサムネイルを作業ディレクトリに書き出し、すべて成功してからまとめて差し替える。
   */
  private async renderArtifacts(run: PipelineRun, signal: AbortSignal): Promise<PipelineRun['artifacts']> {
    const backgrounds = this.require(run, 'backgrounds', run.artifacts.backgrounds)
    const clips = this.require(run, 'audioClips', run.artifacts.audioClips)
    this.require(run, 'schedules', run.artifacts.schedules)
    const script = await this.store.loadScript(run.runId)
    const runDir = this.store.runDir(run.runId)
    const workDir = await fs.mkdtemp(path.join(runDir, '.render-'))

    try {
      const outputs: string[] = []
      for (const layout of LAYOUTS) {
        const schedule = await this.store.loadSchedule(run.runId, layout)
        const audio = await this.concatScheduleAudio(schedule, clips, runDir, workDir, signal)
        const fileName = videoFile(layout)
        await this.renderer.render(
          schedule,
          {
            background: path.join(runDir, layout === 'wide' ? backgrounds.wide : backgrounds.tall),
            audio,
            fontPath: this.config.paths.fontPath,
            logo: this.config.paths.logo,
            characters: this.config.characterMap,
          },
          path.join(workDir, fileName),
          workDir,
          signal
        )
        outputs.push(fileName)
      }
      await this.renderThumbnailInto(run, script, workDir, signal)
      outputs.push(THUMBNAIL_FILE)

      signal.throwIfAborted()
      for (const fileName of outputs) {
        await fs.rename(path.join(workDir, fileName), path.join(runDir, fileName))
      }
      await writePublishTemplates(runDir, script, run.artifacts.publish?.videoUrl)

      return {
        ...run.artifacts,
        renders: { wide: videoFile('wide'), tall: videoFile('tall'), thumbnail: THUMBNAIL_FILE },
      }
    } finally {
      await fs.rm(workDir, { recursive: true, force: true })
    }
  }

  private async concatScheduleAudio(
    schedule: RenderSchedule,
    clips: readonly AudioClip[],
    runDir: string,
    workDir: string,
    signal: AbortSignal
  ): Promise<string> {
    // 各行の音声はタイムライン上のフレーム数ぶんの長さに揃える
    const segments = schedule.lines.map((line) => {
      const clip = clips[line.lineIndex]
      if (!clip) {
        throw new DataIntegrityError(`行 ${line.lineIndex} の音声クリップがありません`)
      }
      return { path: path.join(runDir, clip.audioPath), durationSec: line.frameCount / schedule.frameRate }
    })
    return this.mediaPipeline.concatAudioFiles(segments, path.join(workDir, `audio_${schedule.layout}.wav`), signal)
  }

  private async renderThumbnail(run: PipelineRun, script: ScriptDocument, signal: AbortSignal): Promise<void> {
    const runDir = this.store.runDir(run.runId)
    const workDir = await fs.mkdtemp(path.join(runDir, '.thumbnail-'))
    try {
      await this.renderThumbnailInto(run, script, workDir, signal)
      signal.throwIfAborted()
      await fs.rename(path.join(workDir, THUMBNAIL_FILE), path.join(runDir, THUMBNAIL_FILE))
    } finally {
      await fs.rm(workDir, { recursive: true, force: true })
    }
  }

  private async renderThumbnailInto(
    run: PipelineRun,
    script: ScriptDocument,
    workDir: string,
    signal: AbortSignal
  ): Promise<void> {
    const backgrounds = this.require(run, 'backgrounds', run.artifacts.backgrounds)
    await renderThumbnail(
      {
        background: path.join(this.store.runDir(run.runId), backgrounds.wide),
        title: script.meta.title,
        fontPath: this.config.paths.fontPath,
        fontSize: this.config.caption.titleFontSize,
        size: this.config.video.thumbnail,
        logo: this.config.paths.logo,
      },
      path.join(workDir, THUMBNAIL_FILE),
      workDir,
      signal
    )
  }
}
