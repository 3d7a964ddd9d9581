import { Router, type NextFunction, type Request, type Response } from 'express'
import type { PipelineOrchestrator } from '../services/pipeline/orchestrator'
import type { RunStore } from '../services/pipeline/run-store'
import { extractTopic } from '../services/script.service'
import type { ProgressStage } from '../types/run'
import { logger } from '../utils/logger'
import { advanceRequestSchema, createRunRequestSchema, regenerateRequestSchema } from './schema'

/** 新規作成時はドラフト (台本と背景) まで進める */
export const DEFAULT_CREATE_UNTIL: ProgressStage = 'BackgroundReady'

export interface RunsRouterOptions {
  apiKey?: string
}

type Handler = (req: Request, res: Response, signal: AbortSignal) => Promise<unknown>

/** クライアントが切断したら処理を中断する */
const handle =
  (handler: Handler) =>
  (req: Request, res: Response, next: NextFunction): void => {
    const controller = new AbortController()
    res.on('close', () => {
      if (!res.writableEnded) {
        logger.info({ path: req.path }, 'Client disconnected, aborting run')
        controller.abort()
      }
    })
    handler(req, res, controller.signal).catch(next)
  }

export const createRunsRouter = (
  orchestrator: PipelineOrchestrator,
  store: RunStore,
  options: RunsRouterOptions = {}
): Router => {
  const router = Router()
  const { apiKey } = options

  if (apiKey) {
    router.use((req, res, next) => {
      const providedKey = req.header('x-api-key')
      if (providedKey !== apiKey) {
        return res.status(401).json({ message: 'Invalid API key' })
      }
      return next()
    })
  }

  router.post(
    '/runs',
    handle(async (req, res, signal) => {
      const payload = createRunRequestSchema.parse(req.body ?? {})
      const topic = payload.topic ?? extractTopic(payload.instructions ?? '')
      const created = await orchestrator.createRun({ topic, instructions: payload.instructions })
      const run = await orchestrator.runUntil(created.runId, payload.until ?? DEFAULT_CREATE_UNTIL, signal)
      return res.status(201).json(run)
    })
  )

  router.get(
    '/runs',
    handle(async (_req, res) => res.json({ runs: await orchestrator.listRuns() }))
  )

  router.get(
    '/runs/:runId',
    handle(async (req, res) => {
      const { runId } = req.params
      const run = await orchestrator.getRun(runId)
      const files = await store.artifactStatus(runId)
      return res.json({ run, files, active: orchestrator.isActive(runId) })
    })
  )

  router.post(
    '/runs/:runId/advance',
    handle(async (req, res, signal) => {
      const { until } = advanceRequestSchema.parse(req.body ?? {})
      const { runId } = req.params
      const run = until ? await orchestrator.runUntil(runId, until, signal) : await orchestrator.advance(runId, signal)
      return res.json(run)
    })
  )

  router.post(
    '/runs/:runId/resume-from-script',
    handle(async (req, res, signal) => {
      const { until } = advanceRequestSchema.parse(req.body ?? {})
      const { runId } = req.params
      let run = await orchestrator.resumeFromScript(runId)
      if (until) {
        run = await orchestrator.runUntil(runId, until, signal)
      }
      return res.json(run)
    })
  )

  router.post(
    '/runs/:runId/regenerate',
    handle(async (req, res, signal) => {
      const { artifact } = regenerateRequestSchema.parse(req.body ?? {})
      return res.json(await orchestrator.regenerate(req.params.runId, artifact, signal))
    })
  )

  router.post(
    '/runs/:runId/cancel',
    handle(async (req, res) => {
      const { runId } = req.params
      await orchestrator.getRun(runId)
      return res.json({ runId, cancelled: orchestrator.cancel(runId) })
    })
  )

  return router
}
