import { join, resolve } from 'node:path'
import { describeError, hasErrorCode } from '../../errors'
import type { DirectoryEntry, RepositoryAccess } from '../../repository/access'
import { naturalCompare } from '../../repository/tree-builder'
import { createCommandLogger, createServiceContainer } from '../../tui/services/service-container'
import type { CommandContext } from '../index'

/** Listing of `dir`, or nothing when it does not exist. */
function entriesOf(access: RepositoryAccess, dir: string): DirectoryEntry[] {
  try {
    return access.listDirectory(dir).entries.sort((a, b) => naturalCompare(a.name, b.name))
  } catch (error) {
    if (hasErrorCode(error, 'NOT_FOUND')) return []
    throw error
  }
}

function countLooseObjects(access: RepositoryAccess, objectsDir: string): number {
  let count = 0
  for (const fanout of entriesOf(access, objectsDir)) {
    if (!fanout.isDir || !/^[0-9a-f]{2}$/.test(fanout.name)) continue
    count += entriesOf(access, fanout.path).filter((e) => !e.isDir && /^[0-9a-f]{38}$/.test(e.name)).length
  }
  return count
}

/**
 * `packlens list [path]`: the pack files of a repository with their
 * headers, and the number of loose objects.
 */
export function listCommand(ctx: CommandContext): void {
  const { access } = createServiceContainer(ctx.config, { logger: createCommandLogger(ctx.config, 'list') })
  const target = ctx.args[0] !== undefined ? resolve(ctx.cwd, ctx.args[0]) : ctx.config.repoPath
  const root = access.findStorageRoot(target)
  const objectsDir = join(root, 'objects')

  ctx.stdout(`Storage: ${root}`)

  const packs = entriesOf(access, join(objectsDir, 'pack')).filter((e) => !e.isDir && e.name.endsWith('.pack'))
  ctx.stdout(`Packs: ${packs.length}`)
  for (const entry of packs) {
    try {
      const pack = access.openPack(entry.path)
      const checksum = pack.checksum.valid ? 'checksum ok' : 'checksum mismatch'
      ctx.stdout(`  ${entry.name}  v${pack.header.version}  ${pack.header.objectCount} objects  ${pack.size} bytes  ${checksum}`)
    } catch (error) {
      ctx.stdout(`  ${entry.name}  error: ${describeError(error)}`)
    }
  }

  ctx.stdout(`Loose objects: ${countLooseObjects(access, objectsDir)}`)
}
