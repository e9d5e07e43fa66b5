/**
 * @fileoverview Interactive explorer command
 *
 * `packlens [path]` and `packlens tui [path]`: resolves the storage
 * directory, builds the initial state and hands the terminal to the key
 * loop until the operator quits.
 *
 * @module cli/commands/explore
 */

import { resolve } from 'node:path'
import { PackLensError } from '../../errors'
import { computeLayout } from '../../tui/model'
import { createServiceContainer } from '../../tui/services/service-container'
import { ExplorerSession } from '../../tui/session'
import { createInitialState } from '../../tui/update'
import type { CommandContext } from '../index'
import { getTerminalDimensions, runExplorer } from '../ui/terminal-ui'

export async function exploreCommand(ctx: CommandContext): Promise<void> {
  const { cwd, args, config, input, output } = ctx

  if (!input.isTTY || !output.isTTY) {
    throw new PackLensError('The explorer needs an interactive terminal; try `packlens list`', 'INVALID_ARGUMENT')
  }

  const services = createServiceContainer(config)
  const target = args[0] !== undefined ? resolve(cwd, args[0]) : config.repoPath
  const root = services.access.findStorageRoot(target)
  services.logger.info('Opening repository', { root })

  const { width, height } = getTerminalDimensions(output)
  const session = new ExplorerSession(services, createInitialState(root, services.context, computeLayout(width, height)))
  await runExplorer(session, { input, output, color: config.color })
  services.logger.info('Explorer closed', { root })
}
