import { resolve } from 'node:path'
import { PackLensError } from '../../errors'
import { formatLooseObject } from '../../tui/formatters/loose-object'
import { createCommandLogger, createServiceContainer } from '../../tui/services/service-container'
import type { CommandContext } from '../index'
import { plainText } from '../ui/styled'

/**
 * `packlens object <path>`: prints one decoded loose object.
 */
export function objectCommand(ctx: CommandContext): void {
  const [target] = ctx.args
  if (target === undefined) {
    throw new PackLensError('Usage: packlens object <path>', 'INVALID_ARGUMENT')
  }

  const { access } = createServiceContainer(ctx.config, { logger: createCommandLogger(ctx.config, 'object') })
  const object = access.readLooseObject(resolve(ctx.cwd, target))
  for (const line of formatLooseObject(object, { maxPreviewBytes: ctx.config.maxPreviewBytes })) {
    ctx.stdout(plainText(line))
  }
}
