import type { PackLensConfig } from '../config'
import type { RepositoryAccess } from '../repository/access'
import type { Logger } from '../utils/logger'

/**
 * What update functions may use besides the state and the message. All
 * filesystem reads go through `access`.
 */
export interface UpdateContext {
  access: RepositoryAccess
  logger: Logger
  config: Pick<PackLensConfig, 'sortEntries' | 'maxPreviewBytes'>
}
