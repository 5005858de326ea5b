import { join } from 'path'
import { existsSync, readdirSync, statSync, unlinkSync } from 'fs'

/**
 * 生成按日期命名的日志文件路径
 * 格式: <dir>/2026-02-19.log
 */
export function resolveLogPath(dir: string, today: Date = new Date()): string {
  const yyyy = today.getFullYear()
  const mm = String(today.getMonth() + 1).padStart(2, '0')
  const dd = String(today.getDate()).padStart(2, '0')
  return join(dir, `${yyyy}-${mm}-${dd}.log`)
}

export function createLogPathResolver(dir: string): () => string {
  return () => resolveLogPath(dir)
}

/**
 * 清理超过指定天数的旧日志文件
 */
export function cleanOldLogs(logsDir: string, maxAgeDays: number = 7, now: number = Date.now()): number {
  // logs 目录还不存在
  if (!existsSync(logsDir)) return 0

  let removed = 0
  const maxAge = maxAgeDays * 24 * 60 * 60 * 1000
  for (const file of readdirSync(logsDir)) {
    if (!file.endsWith('.log')) continue
    const filePath = join(logsDir, file)
    if (now - statSync(filePath).mtimeMs > maxAge) {
      unlinkSync(filePath)
      removed++
    }
  }
  return removed
}
