/** 一時的な外部サービス障害 (5xx, 429, タイムアウト)。バックオフ付きで再試行される */
export class TransientExternalError extends Error {
  constructor(
    message: string,
    public readonly service: string,
    public readonly status?: number
  ) {
    super(message)
    this.name = 'TransientExternalError'
  }
}

/** 外部サービスの応答や入力が不正。再要求かフォールバックで処理する */
export class InvalidPayloadError extends Error {
  constructor(
    message: string,
    public readonly service: string,
    public readonly detail?: string
  ) {
    super(message)
    this.name = 'InvalidPayloadError'
  }
}

/** データ整合性違反。再試行も補正もしない */
export class DataIntegrityError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'DataIntegrityError'
  }
}

/** ローカルサービスに接続できない */
export class ResourceUnavailableError extends Error {
  constructor(
    message: string,
    public readonly service: string
  ) {
    super(message)
    this.name = 'ResourceUnavailableError'
  }
}

export class RunAbortedError extends Error {
  constructor(public readonly runId: string) {
    super(`Run ${runId} was aborted`)
    this.name = 'RunAbortedError'
  }
}

export const isAbortError = (error: unknown): boolean =>
  error instanceof RunAbortedError || (error instanceof Error && error.name === 'AbortError')

export const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && 'code' in error

export const isFileNotFound = (error: unknown): boolean => isErrnoException(error) && error.code === 'ENOENT'

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error))
