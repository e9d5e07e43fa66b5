/**
 * Descriptions of well-known paths inside a storage directory, keyed by the
 * path relative to the storage root with `/` separators.
 */

import * as path from 'node:path'
import notes from './educational-notes.json'

const NOTES: Readonly<Record<string, string>> = notes

/**
 * Returns the note for `absolutePath`, if it is a recognized location under
 * `rootPath`.
 */
export function educationalNoteFor(rootPath: string, absolutePath: string): string | undefined {
  const relative = path.relative(rootPath, absolutePath).split(path.sep).join('/')
  if (relative === '' || relative.startsWith('..')) {
    return undefined
  }
  return Object.prototype.hasOwnProperty.call(NOTES, relative) ? NOTES[relative] : undefined
}
