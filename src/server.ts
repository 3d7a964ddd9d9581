import { createApp } from './app'
import { logger } from './utils/logger'

export interface StartOptions {
  configPath?: string
  exit?: (code?: number) => never
}

export const start = async (options: StartOptions = {}) => {
  try {
    const configPath = options.configPath ?? process.env.PIPELINE_CONFIG
    const { app, config } = await createApp({ configPath })
    const port = Number(process.env.PORT ?? config.server.port)
    const host = process.env.HOST ?? config.server.host
    app.listen(port, host, () => {
      logger.info({ port, host, outputDir: config.paths.outputDir }, 'Server started')
    })
  } catch (error) {
    logger.error({ err: error }, 'Failed to start server')
    const exit = options.exit ?? ((code?: number) => process.exit(code))
    exit(1)
  }
}

const isMainModule = typeof require !== 'undefined' && typeof module !== 'undefined' && require.main === module

if (isMainModule) {
  void start()
}
