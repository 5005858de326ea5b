import log from 'electron-log/node'
import type { LoggingConfig } from '@shared/types/config'
import { LOG_RETENTION_DAYS } from '@shared/constants'
import { createLogPathResolver, cleanOldLogs } from './transports'

let initialized = false

export function isIgnorableStreamWriteError(err: NodeJS.ErrnoException): boolean {
  if (!err) return false
  return err.code === 'EPIPE' || err.code === 'EIO' || err.code === 'ERR_STREAM_DESTROYED'
}

export interface LoggerOptions extends LoggingConfig {
  /** 终端 UI 占用 stdout 时关闭控制台输出 */
  console: boolean
}

/**
 * 初始化日志系统（进程启动时调用一次）
 */
export function initializeLogger(options: LoggerOptions): void {
  if (initialized) return

  // 终端关闭后 stdout/stderr 写入失败（EPIPE/EIO）不应导致进程崩溃
  process.stdout?.on?.('error', (err: NodeJS.ErrnoException) => {
    if (!isIgnorableStreamWriteError(err)) throw err
  })
  process.stderr?.on?.('error', (err: NodeJS.ErrnoException) => {
    if (!isIgnorableStreamWriteError(err)) throw err
  })

  // 文件 transport 配置
  log.transports.file.resolvePathFn = createLogPathResolver(options.dir)
  log.transports.file.level = options.level
  log.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {scope} {text}'
  log.transports.file.maxSize = 0

  // 控制台 transport 配置
  log.transports.console.level = options.console ? options.level : false

  try {
    cleanOldLogs(options.dir, LOG_RETENTION_DAYS)
  } catch (err) {
    log.warn('清理旧日志失败', err)
  }

  initialized = true
}

/**
 * 获取带 scope 的 logger 实例
 */
export function getLogger(scope: string) {
  return log.scope(scope)
}

export default log
