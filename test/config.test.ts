import { describe, it, expect } from 'vitest'
import { loadConfig, requireLogLevel } from '../src/config'
import { DEFAULT_MAX_PREVIEW_BYTES } from '../src/constants'
import { PackLensError } from '../src/errors'
import { LogLevel } from '../src/utils/logger'

describe('loadConfig', () => {
  it('starts from defaults', () => {
    expect(loadConfig({ cwd: '/work' })).toEqual({
      repoPath: '/work',
      logLevel: LogLevel.INFO,
      sortEntries: true,
      maxPreviewBytes: DEFAULT_MAX_PREVIEW_BYTES,
      color: true,
    })
  })

  it('reads environment variables', () => {
    const config = loadConfig({
      env: {
        PACKLENS_LOG_LEVEL: 'DEBUG',
        PACKLENS_LOG_FILE: '/tmp/packlens.log',
        PACKLENS_SORT: 'off',
        PACKLENS_MAX_PREVIEW_BYTES: '128',
        NO_COLOR: '1',
      },
    })
    expect(config.logLevel).toBe(LogLevel.DEBUG)
    expect(config.logFile).toBe('/tmp/packlens.log')
    expect(config.sortEntries).toBe(false)
    expect(config.maxPreviewBytes).toBe(128)
    expect(config.color).toBe(false)
  })

  it('ignores empty environment values', () => {
    const config = loadConfig({ env: { NO_COLOR: '', PACKLENS_SORT: '' } })
    expect(config.color).toBe(true)
    expect(config.sortEntries).toBe(true)
  })

  it('lets overrides win over the environment', () => {
    const config = loadConfig({
      env: { PACKLENS_LOG_LEVEL: 'debug', PACKLENS_SORT: 'yes' },
      overrides: { logLevel: LogLevel.ERROR, sortEntries: false, repoPath: '/repo' },
      cwd: '/work',
    })
    expect(config.logLevel).toBe(LogLevel.ERROR)
    expect(config.sortEntries).toBe(false)
    expect(config.repoPath).toBe('/repo')
  })

  it.each([
    ['PACKLENS_SORT', 'maybe'],
    ['PACKLENS_MAX_PREVIEW_BYTES', '0'],
    ['PACKLENS_MAX_PREVIEW_BYTES', '12kb'],
    ['PACKLENS_LOG_LEVEL', 'verbose'],
  ])('rejects %s=%s', (name, value) => {
    try {
      loadConfig({ env: { [name]: value } })
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(PackLensError)
      if (error instanceof PackLensError) {
        expect(error.code).toBe('INVALID_ARGUMENT')
        expect(error.message).toContain(name)
      }
    }
  })
})

describe('requireLogLevel', () => {
  it('accepts names in any case', () => {
    expect(requireLogLevel('--log-level', 'Warn')).toBe(LogLevel.WARN)
  })

  it('lists the valid names', () => {
    expect(() => requireLogLevel('--log-level', 'loud')).toThrow(
      '--log-level must be one of debug, info, warn, error, got "loud"'
    )
  })
})
