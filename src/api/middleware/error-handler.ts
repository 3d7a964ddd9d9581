import type { Request, Response, NextFunction } from 'express'
import type { Logger } from 'pino'
import { ZodError } from 'zod'
import { RunBusyError, StageFailedError } from '../../services/pipeline/orchestrator'
import { RunNotFoundError } from '../../services/pipeline/run-store'
import { InvalidTransitionError } from '../../services/pipeline/stages'
import { InvalidPayloadError, RunAbortedError } from '../../utils/errors'

const isBodyParserError = (err: unknown): err is Error & { status: number } =>
  err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status < 500

export function createErrorHandler(logger: Logger) {
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  return (err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof ZodError) {
      res.status(400).json({ message: 'Invalid request', issues: err.issues })
      return
    }
    if (isBodyParserError(err)) {
      res.status(err.status).json({ message: err.message })
      return
    }
    if (err instanceof RunNotFoundError) {
      res.status(404).json({ message: err.message })
      return
    }
    if (err instanceof InvalidTransitionError || err instanceof RunBusyError || err instanceof RunAbortedError) {
      res.status(409).json({ message: err.message })
      return
    }
    if (err instanceof InvalidPayloadError) {
      res.status(422).json({ message: err.message, detail: err.detail })
      return
    }
    if (err instanceof StageFailedError) {
      res.status(502).json({
        message: err.message,
        runId: err.runId,
        stage: err.stage,
        lastCompletedStage: err.lastCompletedStage,
      })
      return
    }
    logger.error({ err }, 'Unhandled error')
    res.status(500).json({ message: 'Internal Server Error' })
  }
}

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ message: 'Not Found' })
}
