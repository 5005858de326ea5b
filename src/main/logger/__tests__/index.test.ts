import { describe, expect, it, beforeEach, afterEach } from 'vitest'
import { tmpdir } from 'os'
import { join } from 'path'
import { mkdtempSync, rmSync, writeFileSync, utimesSync, existsSync } from 'fs'
import { isIgnorableStreamWriteError } from '../index'
import { resolveLogPath, cleanOldLogs } from '../transports'

describe('logger stream write error guard', () => {
  it('should treat common stdio teardown errors as ignorable', () => {
    expect(isIgnorableStreamWriteError({ code: 'EPIPE' } as NodeJS.ErrnoException)).toBe(true)
    expect(isIgnorableStreamWriteError({ code: 'EIO' } as NodeJS.ErrnoException)).toBe(true)
    expect(isIgnorableStreamWriteError({ code: 'ERR_STREAM_DESTROYED' } as NodeJS.ErrnoException)).toBe(true)
  })

  it('should keep unknown errors non-ignorable', () => {
    expect(isIgnorableStreamWriteError({ code: 'EINVAL' } as NodeJS.ErrnoException)).toBe(false)
    expect(isIgnorableStreamWriteError({} as NodeJS.ErrnoException)).toBe(false)
  })
})

describe('log transports', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'router-chat-logs-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('should name log files by local date', () => {
    expect(resolveLogPath('/var/log/app', new Date(2026, 1, 9))).toBe(join('/var/log/app', '2026-02-09.log'))
  })

  it('should delete only .log files older than the retention window', () => {
    const now = Date.now()
    const old = join(dir, '2020-01-01.log')
    const fresh = join(dir, 'today.log')
    const other = join(dir, 'notes.txt')
    writeFileSync(old, 'old')
    writeFileSync(fresh, 'fresh')
    writeFileSync(other, 'keep')
    const tenDaysAgo = (now - 10 * 24 * 60 * 60 * 1000) / 1000
    utimesSync(old, tenDaysAgo, tenDaysAgo)
    utimesSync(other, tenDaysAgo, tenDaysAgo)

    expect(cleanOldLogs(dir, 7, now)).toBe(1)
    expect(existsSync(old)).toBe(false)
    expect(existsSync(fresh)).toBe(true)
    expect(existsSync(other)).toBe(true)
  })

  it('should ignore a missing log directory', () => {
    expect(cleanOldLogs(join(dir, 'missing'))).toBe(0)
  })
})
