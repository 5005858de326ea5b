import { getLogger as getScopedLogger } from '@main/logger'

/**
 * 界面层的带 scope logger，与服务层写入同一日志文件
 */
export function getLogger(scope: string) {
  return getScopedLogger(`ui:${scope}`)
}
