import pino from 'pino'

const defaultLevel = process.env.VITEST ? 'silent' : 'info'

export const logger = pino({
  name: 'dialogue-shorts',
  level: process.env.LOG_LEVEL ?? defaultLevel,
  base: undefined,
  timestamp: pino.stdTimeFunctions.isoTime,
})

export type Logger = typeof logger
