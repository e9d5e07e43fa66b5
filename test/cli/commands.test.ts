import { writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { runCLI } from '../../src/cli/index'
import { hashObject } from '../../src/utils/hash'
import {
  HELLO_THERE,
  HELLO_WORLD,
  buildPack,
  bytes,
  createStorageFixture,
  samplePack,
  type StorageFixture,
} from '../helpers/fixtures'

describe('commands', () => {
  let fixture: StorageFixture
  let stdout: string[]
  let stderr: string[]

  const run = (...args: string[]) =>
    runCLI(args, {
      cwd: fixture.dir,
      env: {},
      stdout: (msg) => stdout.push(msg),
      stderr: (msg) => stderr.push(msg),
    })

  beforeEach(() => {
    fixture = createStorageFixture()
    stdout = []
    stderr = []
  })

  afterEach(() => {
    fixture.cleanup()
  })

  describe('list', () => {
    it('lists packs and counts loose objects', async () => {
      const result = await run('list')
      expect(result.exitCode).toBe(0)
      expect(stdout).toEqual([
        `Storage: ${fixture.storage}`,
        'Packs: 1',
        `  pack-sample.pack  v2  3 objects  ${samplePack().bytes.length} bytes  checksum ok`,
        'Loose objects: 1',
      ])
    })

    it('reports broken packs inline', async () => {
      writeFileSync(join(fixture.storage, 'objects', 'pack', 'pack-zzz.pack'), 'not a pack file')
      await run('list', '.')
      expect(stdout[3]).toBe(
        '  pack-zzz.pack  error: DecodeError [INVALID_SIGNATURE]: Invalid pack signature: expected "PACK", got "not "'
      )
    })

    it('fails outside a repository', async () => {
      const result = await run('list', join(fixture.storage, 'refs'))
      expect(result.exitCode).toBe(1)
      expect(stderr[0]).toMatch(/^packlens: IoError \[NOT_A_REPOSITORY\]/)
    })
  })

  describe('pack', () => {
    it('prints the header and every entry with its object id', async () => {
      const result = await run('pack', fixture.packPath)
      expect(result.exitCode).toBe(0)
      expect(stdout[0]).toBe(`pack-sample.pack: version 2, 3 objects, ${samplePack().bytes.length} bytes, checksum ok`)
      expect(stdout).toHaveLength(4)
      expect(stdout[1].startsWith('#0')).toBe(true)
      expect(stdout[1].endsWith(hashObject('blob', bytes(HELLO_WORLD)))).toBe(true)
      expect(stdout[2]).toContain('base @12')
      expect(stdout[2].endsWith(hashObject('blob', bytes(HELLO_THERE)))).toBe(true)
      expect(stdout[3].endsWith(hashObject('blob', bytes('hello\n')))).toBe(true)
    })

    it('prints the entries before a malformed one and fails', async () => {
      const truncated = buildPack([{ kind: 'blob', content: bytes(HELLO_WORLD) }], { objectCount: 2 })
      const packPath = join(fixture.dir, 'partial.pack')
      writeFileSync(packPath, truncated.bytes)

      const result = await run('pack', 'partial.pack')
      expect(result.exitCode).toBe(1)
      expect(stdout).toHaveLength(2)
      expect(stderr[0]).toMatch(/^packlens: DecodeError \[TRUNCATED_HEADER\]: /)
      expect(stderr[0]).toContain('expected 2 entries, found 1')
    })

    it('needs a file', async () => {
      const result = await run('pack')
      expect(result.exitCode).toBe(1)
      expect(stderr).toEqual(['packlens: PackLensError [INVALID_ARGUMENT]: Usage: packlens pack <file>'])
    })
  })

  describe('object', () => {
    it('prints a decoded loose object', async () => {
      const result = await run('object', fixture.loosePath)
      expect(result.exitCode).toBe(0)
      expect(stdout[0]).toBe('LOOSE OBJECT')
      expect(stdout[1]).toBe(`  id: ${fixture.looseId}`)
      expect(stdout.at(-1)).toBe('    1 hello')
    })

    it('reports missing files', async () => {
      const result = await run('object', 'nope')
      expect(result.exitCode).toBe(1)
      expect(stderr[0]).toBe(`packlens: IoError [NOT_FOUND]: No such file or directory: ${join(fixture.dir, 'nope')}`)
    })
  })
})
