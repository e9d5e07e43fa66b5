/**
 * @fileoverview Runtime configuration
 *
 * Settings come from three layers, later layers winning: built-in defaults,
 * environment variables, command-line flags.
 *
 * @module config
 *
 * @example
 * ```typescript
 * const config = loadConfig({ env: process.env, overrides: { repoPath: '../other' } })
 * ```
 */

import {
  DEFAULT_MAX_PREVIEW_BYTES,
  ENV_LOG_FILE,
  ENV_LOG_LEVEL,
  ENV_MAX_PREVIEW_BYTES,
  ENV_NO_COLOR,
  ENV_SORT,
} from './constants'
import { PackLensError } from './errors'
import { LogLevel, parseLogLevel } from './utils/logger'

export interface PackLensConfig {
  /** Working tree or storage directory to open */
  repoPath: string
  logLevel: LogLevel
  /** JSON-lines log destination; logging is off when absent */
  logFile?: string
  /** Directories first, natural name order */
  sortEntries: boolean
  /** Bytes of blob or resolved content rendered before truncation */
  maxPreviewBytes: number
  color: boolean
}

export type ConfigOverrides = Partial<PackLensConfig>

export interface LoadConfigOptions {
  env?: Record<string, string | undefined>
  overrides?: ConfigOverrides
  cwd?: string
}

function parseBoolean(name: string, value: string): boolean {
  switch (value.trim().toLowerCase()) {
    case '1':
    case 'true':
    case 'yes':
    case 'on':
      return true
    case '0':
    case 'false':
    case 'no':
    case 'off':
      return false
    default:
      throw new PackLensError(`${name} must be a boolean, got "${value}"`, 'INVALID_ARGUMENT')
  }
}

function parsePositiveInteger(name: string, value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new PackLensError(`${name} must be a positive integer, got "${value}"`, 'INVALID_ARGUMENT')
  }
  const parsed = parseInt(value, 10)
  if (parsed <= 0) {
    throw new PackLensError(`${name} must be a positive integer, got "${value}"`, 'INVALID_ARGUMENT')
  }
  return parsed
}

/**
 * Parses a log level name.
 *
 * @throws {PackLensError} INVALID_ARGUMENT for unknown names
 */
export function requireLogLevel(name: string, value: string): LogLevel {
  const level = parseLogLevel(value)
  if (!level) {
    throw new PackLensError(
      `${name} must be one of ${Object.values(LogLevel).join(', ')}, got "${value}"`,
      'INVALID_ARGUMENT'
    )
  }
  return level
}

/**
 * Builds the effective configuration.
 *
 * @throws {PackLensError} INVALID_ARGUMENT when an environment value is malformed
 */
export function loadConfig(options: LoadConfigOptions = {}): PackLensConfig {
  const env = options.env ?? {}
  const config: PackLensConfig = {
    repoPath: options.cwd ?? '.',
    logLevel: LogLevel.INFO,
    sortEntries: true,
    maxPreviewBytes: DEFAULT_MAX_PREVIEW_BYTES,
    color: true,
  }

  const level = env[ENV_LOG_LEVEL]
  if (level) config.logLevel = requireLogLevel(ENV_LOG_LEVEL, level)

  const logFile = env[ENV_LOG_FILE]
  if (logFile) config.logFile = logFile

  const sort = env[ENV_SORT]
  if (sort) config.sortEntries = parseBoolean(ENV_SORT, sort)

  const maxPreview = env[ENV_MAX_PREVIEW_BYTES]
  if (maxPreview) config.maxPreviewBytes = parsePositiveInteger(ENV_MAX_PREVIEW_BYTES, maxPreview)

  // https://no-color.org: any non-empty value disables color
  if (env[ENV_NO_COLOR]) config.color = false

  const overrides = options.overrides ?? {}
  if (overrides.repoPath !== undefined) config.repoPath = overrides.repoPath
  if (overrides.logLevel !== undefined) config.logLevel = overrides.logLevel
  if (overrides.logFile !== undefined) config.logFile = overrides.logFile
  if (overrides.sortEntries !== undefined) config.sortEntries = overrides.sortEntries
  if (overrides.maxPreviewBytes !== undefined) config.maxPreviewBytes = overrides.maxPreviewBytes
  if (overrides.color !== undefined) config.color = overrides.color

  return config
}
