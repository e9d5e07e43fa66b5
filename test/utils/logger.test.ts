import { mkdtempSync, readFileSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, describe, it, expect, vi } from 'vitest'
import { IoError } from '../../src/errors'
import { createFileHandler, createLogger, LogLevel, noopLogger, parseLogLevel, type LogEntry } from '../../src/utils/logger'

function collect(): { entries: LogEntry[]; handler: (entry: LogEntry) => void } {
  const entries: LogEntry[] = []
  return { entries, handler: (entry) => entries.push(entry) }
}

describe('createLogger', () => {
  it('filters below the minimum level', () => {
    const { entries, handler } = collect()
    const logger = createLogger({ minLevel: LogLevel.WARN, handler })
    logger.debug('hidden')
    logger.info('hidden')
    logger.warn('shown')
    expect(entries.map((e) => e.message)).toEqual(['shown'])
  })

  it('records component, data and error details', () => {
    const { entries, handler } = collect()
    const logger = createLogger({ component: 'pack', handler })
    logger.error('Open failed', IoError.notFound('/p'), { path: '/p' })

    expect(entries).toHaveLength(1)
    const [entry] = entries
    expect(entry.level).toBe(LogLevel.ERROR)
    expect(entry.component).toBe('pack')
    expect(entry.error).toEqual({ name: 'IoError', message: 'No such file or directory: /p', code: 'NOT_FOUND' })
    expect(entry.data).toEqual({ path: '/p' })
  })

  it('merges child context into every entry', () => {
    const { entries, handler } = collect()
    const logger = createLogger({ handler, context: { run: 1 } }).child({ service: 'access' })
    logger.info('listed', { count: 3 })
    expect(entries[0].data).toEqual({ run: 1, service: 'access', count: 3 })
  })

  it('omits data when there is none', () => {
    const { entries, handler } = collect()
    createLogger({ handler }).info('bare')
    expect(entries[0].data).toBeUndefined()
  })
})

describe('parseLogLevel', () => {
  it('accepts names in any case', () => {
    expect(parseLogLevel('DEBUG')).toBe(LogLevel.DEBUG)
    expect(parseLogLevel('warn')).toBe(LogLevel.WARN)
    expect(parseLogLevel('loud')).toBeUndefined()
  })
})

describe('createFileHandler', () => {
  let dir: string | undefined

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true })
    dir = undefined
    vi.restoreAllMocks()
  })

  it('appends one JSON line per entry', () => {
    dir = mkdtempSync(join(tmpdir(), 'packlens-log-'))
    const file = join(dir, 'explorer.log')
    const logger = createLogger({ handler: createFileHandler(file) })
    logger.info('first')
    logger.warn('second', { n: 2 })

    const lines = readFileSync(file, 'utf8').trimEnd().split('\n')
    expect(lines).toHaveLength(2)
    expect(JSON.parse(lines[1])).toMatchObject({ level: 'warn', message: 'second', data: { n: 2 } })
  })

  it('reports an unwritable destination once and then drops entries', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true)
    const logger = createLogger({ handler: createFileHandler(join(tmpdir(), 'no-such-dir-packlens', 'x.log')) })
    logger.info('one')
    logger.info('two')
    expect(write).toHaveBeenCalledTimes(1)
  })
})

describe('noopLogger', () => {
  it('discards everything and returns itself as child', () => {
    expect(noopLogger.child({ a: 1 })).toBe(noopLogger)
    expect(() => noopLogger.error('x', new Error('y'))).not.toThrow()
  })
})
