import { promises as fs } from 'node:fs'
import path from 'node:path'
import { randomUUID } from 'node:crypto'
import type { ZodType, ZodTypeDef } from 'zod'
import { pipelineRunSchema, type PipelineRun } from '../../types/run'
import { renderScheduleSchema, type LayoutKind, type RenderSchedule } from '../../types/schedule'
import { scriptDocumentSchema, type ScriptDocument } from '../../types/script'
import { DataIntegrityError, InvalidPayloadError, isErrnoException, isFileNotFound } from '../../utils/errors'
import { logger } from '../../utils/logger'

export const RUN_FILE = 'run.json'
export const SCRIPT_FILE = 'script.json'
export const AUDIO_DIR = 'audio'
export const THUMBNAIL_FILE = 'thumbnail.png'
export const backgroundFile = (layout: LayoutKind) => `background_${layout}.png`
export const scheduleFile = (layout: LayoutKind) => `schedule_${layout}.json`
export const videoFile = (layout: LayoutKind) => `video_${layout}.mp4`

const RUN_ID_PATTERN = /^\d{8}_\d{6}(?:_\d+)?$/

export class RunNotFoundError extends Error {
  constructor(public readonly runId: string) {
    super(`Run not found: ${runId}`)
    this.name = 'RunNotFoundError'
  }
}

const pad = (value: number) => String(value).padStart(2, '0')

/** ソート可能な YYYYMMDD_HHmmss */
export const formatRunId = (date: Date): string =>
  `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`

export interface RunSummary {
  runId: string
  topic: string
  stage: PipelineRun['stage']
  updatedAt: string
}

/**
 * <outputDir>/<runId>/ にランの状態と成果物を置く。run.json が再開の唯一の根拠。
 */
export class RunStore {
  constructor(private readonly outputDir: string) {}

  runDir(runId: string): string {
    if (!RUN_ID_PATTERN.test(runId)) {
      throw new RunNotFoundError(runId)
    }
    return path.join(this.outputDir, runId)
  }

  resolve(runId: string, relativePath: string): string {
    return path.join(this.runDir(runId), relativePath)
  }

  /** 同じ秒に作られたランには連番を付ける */
  async allocateRunId(now: Date): Promise<string> {
    const base = formatRunId(now)
    await fs.mkdir(this.outputDir, { recursive: true })
    for (let suffix = 1; ; suffix++) {
      const runId = suffix === 1 ? base : `${base}_${suffix}`
      try {
        await fs.mkdir(path.join(this.outputDir, runId))
        return runId
      } catch (error) {
        if (isErrnoException(error) && error.code === 'EEXIST') continue
        throw error
      }
    }
  }

  async save(run: PipelineRun): Promise<void> {
    await this.writeJson(this.resolve(run.runId, RUN_FILE), run)
  }

  async load(runId: string): Promise<PipelineRun> {
    return this.readJson(this.resolve(runId, RUN_FILE), pipelineRunSchema, () => new RunNotFoundError(runId), 'run.json')
  }

  async saveScript(runId: string, script: ScriptDocument): Promise<string> {
    await this.writeJson(this.resolve(runId, SCRIPT_FILE), script)
    return SCRIPT_FILE
  }

  /** 人が編集した script.json も読む。形式違反は InvalidPayloadError */
  async loadScript(runId: string): Promise<ScriptDocument> {
    const filePath = this.resolve(runId, SCRIPT_FILE)
    let raw: string
    try {
      raw = await fs.readFile(filePath, 'utf8')
    } catch (error) {
      if (isFileNotFound(error)) {
        throw new DataIntegrityError(`${runId}: script.json がありません`)
      }
      throw error
    }
    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch {
      throw new InvalidPayloadError(`${runId}: script.json が JSON として解釈できません`, 'script')
    }
    const parsed = scriptDocumentSchema.safeParse(json)
    if (!parsed.success) {
      throw new InvalidPayloadError(`${runId}: script.json の形式が不正です`, 'script', parsed.error.message)
    }
    return parsed.data
  }

  async saveSchedule(runId: string, schedule: RenderSchedule): Promise<string> {
    const fileName = scheduleFile(schedule.layout)
    await this.writeJson(this.resolve(runId, fileName), schedule)
    return fileName
  }

  async loadSchedule(runId: string, layout: LayoutKind): Promise<RenderSchedule> {
    const fileName = scheduleFile(layout)
    return this.readJson(
      this.resolve(runId, fileName),
      renderScheduleSchema,
      () => new DataIntegrityError(`${runId}: ${fileName} がありません`),
      fileName
    )
  }

  async list(): Promise<RunSummary[]> {
    let entries: string[]
    try {
      entries = await fs.readdir(this.outputDir)
    } catch (error) {
      if (isFileNotFound(error)) return []
      throw error
    }

    const summaries: RunSummary[] = []
    for (const runId of entries.filter((entry) => RUN_ID_PATTERN.test(entry)).sort().reverse()) {
      try {
        const run = await this.load(runId)
        summaries.push({ runId, topic: run.topic, stage: run.stage, updatedAt: run.updatedAt })
      } catch (error) {
        logger.warn({ runId, err: error }, 'Skipping unreadable run')
      }
    }
    return summaries
  }

  /** 成果物ファイルの有無 */
  async artifactStatus(runId: string): Promise<Record<string, boolean>> {
    const files = [
      SCRIPT_FILE,
      backgroundFile('wide'),
      backgroundFile('tall'),
      scheduleFile('wide'),
      scheduleFile('tall'),
      videoFile('wide'),
      videoFile('tall'),
      THUMBNAIL_FILE,
      'note.md',
      'x_post.txt',
      'upload_info.json',
    ]
    const entries = await Promise.all(
      files.map(async (file) => {
        try {
          await fs.access(this.resolve(runId, file))
          return [file, true] as const
        } catch (error) {
          if (isFileNotFound(error)) return [file, false] as const
          throw error
        }
      })
    )
    return Object.fromEntries(entries)
  }

  private async writeJson(filePath: string, value: unknown): Promise<void> {
    const tempPath = `${filePath}.${randomUUID()}.tmp`
    await fs.writeFile(tempPath, `${JSON.stringify(value, null, 2)}\n`, 'utf8')
    await fs.rename(tempPath, filePath)
  }

  private async readJson<T>(
    filePath: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    notFound: () => Error,
    label: string
  ): Promise<T> {
    let raw: string
    try {
      raw = await fs.readFile(filePath, 'utf8')
    } catch (error) {
      if (isFileNotFound(error)) throw notFound()
      throw error
    }
    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch {
      throw new DataIntegrityError(`${label} が壊れています: ${filePath}`)
    }
    const parsed = schema.safeParse(json)
    if (!parsed.success) {
      throw new DataIntegrityError(`${label} の内容が不正です: ${parsed.error.message}`)
    }
    return parsed.data
  }
}
