import { tmpdir } from 'os'
import { join } from 'path'
import { randomUUID } from 'crypto'
import { mkdtemp, writeFile } from 'fs/promises'
import { rmSync, unlinkSync } from 'fs'
import { APP_NAME } from '@shared/constants'
import { hasErrorCode, toErrorMessage } from '../errors'
import { getLogger } from '../logger'

const log = getLogger('TempFileRegistry')

/**
 * 进程级临时文件登记表：下载用的回答、生成的图片。
 * 由应用外壳持有，进程退出时统一清理。
 */
export class TempFileRegistry {
  private readonly paths = new Set<string>()
  private dir: Promise<string> | null = null
  private createdDir: string | null = null
  private exitHookInstalled = false

  constructor(private readonly baseDir: string = tmpdir()) {}

  register(path: string): void {
    this.paths.add(path)
    log.debug('登记临时文件', { path })
  }

  list(): string[] {
    return [...this.paths]
  }

  /** 写入文本文件并登记，返回文件路径 */
  async writeTextFile(content: string, suffix = '.md'): Promise<string> {
    const path = await this.nextPath(suffix)
    await writeFile(path, content, 'utf-8')
    this.register(path)
    return path
  }

  async writeBinaryFile(data: Buffer, suffix: string): Promise<string> {
    const path = await this.nextPath(suffix)
    await writeFile(path, data)
    this.register(path)
    return path
  }

  /** 删除所有登记的文件，可重复调用 */
  cleanupAll(): number {
    let removed = 0
    if (this.paths.size > 0) {
      log.info('清理临时文件', { count: this.paths.size })
    }
    for (const path of this.paths) {
      try {
        unlinkSync(path)
        removed++
      } catch (err) {
        if (!hasErrorCode(err, 'ENOENT')) {
          log.warn('删除临时文件失败', { path, error: toErrorMessage(err) })
        }
      }
    }
    this.paths.clear()

    if (this.createdDir) {
      rmSync(this.createdDir, { recursive: true, force: true })
      this.createdDir = null
      this.dir = null
    }
    return removed
  }

  /** 进程退出时清理（只注册一次） */
  installExitHook(target: NodeJS.EventEmitter = process): void {
    if (this.exitHookInstalled) return
    target.once('exit', () => {
      this.cleanupAll()
    })
    this.exitHookInstalled = true
  }

  private async nextPath(suffix: string): Promise<string> {
    if (!this.dir) {
      this.dir = mkdtemp(join(this.baseDir, `${APP_NAME}-`)).then(
        (dir) => {
          this.createdDir = dir
          return dir
        },
        (err: unknown) => {
          // 失败不缓存，下次写入重新创建
          this.dir = null
          log.error('创建临时目录失败', { baseDir: this.baseDir, error: toErrorMessage(err) })
          throw err
        },
      )
    }
    const dir = await this.dir
    return join(dir, `${randomUUID()}${suffix}`)
  }
}
