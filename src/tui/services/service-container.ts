/**
 * @fileoverview Service wiring for the explorer
 *
 * Builds the collaborators the update functions depend on from a loaded
 * configuration. Tests substitute any of them through the overrides.
 *
 * @module tui/services/service-container
 */

import type { PackLensConfig } from '../../config'
import { createRepositoryAccess, type RepositoryAccess } from '../../repository/access'
import { createFileHandler, createLogger, noopLogger, type Logger } from '../../utils/logger'
import type { UpdateContext } from '../context'

export interface ServiceContainer {
  readonly config: PackLensConfig
  readonly logger: Logger
  readonly access: RepositoryAccess
  /** Context handed to every `update` call */
  readonly context: UpdateContext
}

export interface ServiceOverrides {
  logger?: Logger
  access?: RepositoryAccess
}

/**
 * Logger for the interactive explorer. The terminal belongs to the UI, so
 * entries go to the configured log file or nowhere.
 */
export function createExplorerLogger(config: PackLensConfig): Logger {
  if (config.logFile === undefined) return noopLogger
  return createLogger({
    component: 'explorer',
    minLevel: config.logLevel,
    handler: createFileHandler(config.logFile),
  })
}

/**
 * Logger for the non-interactive commands: the log file when configured,
 * otherwise stderr.
 */
export function createCommandLogger(config: PackLensConfig, component: string): Logger {
  return createLogger({
    component,
    minLevel: config.logLevel,
    ...(config.logFile !== undefined && { handler: createFileHandler(config.logFile) }),
  })
}

export function createServiceContainer(config: PackLensConfig, overrides: ServiceOverrides = {}): ServiceContainer {
  const logger = overrides.logger ?? createExplorerLogger(config)
  const access = overrides.access ?? createRepositoryAccess({ logger: logger.child({ service: 'access' }) })
  return {
    config,
    logger,
    access,
    context: {
      access,
      logger,
      config: { sortEntries: config.sortEntries, maxPreviewBytes: config.maxPreviewBytes },
    },
  }
}
