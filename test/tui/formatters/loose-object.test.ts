import { describe, it, expect } from 'vitest'
import { plainText } from '../../../src/cli/ui/styled'
import { decodeLooseObjectFile } from '../../../src/objects/loose'
import { formatLooseObject } from '../../../src/tui/formatters/loose-object'
import { hashObject } from '../../../src/utils/hash'
import { bytes, looseObjectFile } from '../../helpers/fixtures'

describe('formatLooseObject', () => {
  it('shows the header and the payload', () => {
    const content = bytes('hello')
    const id = hashObject('blob', content)
    const file = looseObjectFile('blob', content)
    const object = decodeLooseObjectFile(file, { path: `/repo/.git/objects/${id.slice(0, 2)}/${id.slice(2)}` })

    expect(formatLooseObject(object, { maxPreviewBytes: 100 }).map(plainText)).toEqual([
      'LOOSE OBJECT',
      `  id: ${id}`,
      '  kind: blob',
      '  size: 5',
      '  header: blob 5\\0 (7 bytes)',
      `  compressed: ${file.length} bytes`,
      '',
      'TEXT CONTENT (5 bytes)',
      '    1 hello',
    ])
  })
})
