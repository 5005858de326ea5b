export type AppErrorKind = 'configuration' | 'validation' | 'upstream' | 'cancellation'

export abstract class AppError extends Error {
  abstract readonly kind: AppErrorKind
}

/** 凭证缺失或配置不可用，必须在发起请求前抛出 */
export class ConfigurationError extends AppError {
  readonly kind = 'configuration'

  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/** 请求参数不合法，必须在发起请求前抛出 */
export class ValidationError extends AppError {
  readonly kind = 'validation'

  constructor(message: string) {
    super(message)
    this.name = 'ValidationError'
  }
}

/** 传输失败、非 2xx 响应或无法解析的片段 */
export class UpstreamError extends AppError {
  readonly kind = 'upstream'
  readonly status?: number

  constructor(message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause })
    this.name = 'UpstreamError'
    this.status = options?.status
  }
}

/** 用户主动停止，不是失败 */
export class CancellationSignal extends AppError {
  readonly kind = 'cancellation'

  constructor(message = 'Generation stopped by user') {
    super(message)
    this.name = 'CancellationSignal'
  }
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/** 判断 Node 系统错误码（如 ENOENT） */
export function hasErrorCode(err: unknown, code: string): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === code
}
