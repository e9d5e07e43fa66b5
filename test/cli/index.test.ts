import { mkdirSync } from 'node:fs'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { createCLI, levenshteinDistance, parseArgs, runCLI, type CommandContext } from '../../src/cli/index'
import { createStorageFixture, type StorageFixture } from '../helpers/fixtures'

describe('parseArgs', () => {
  it('splits the command from its arguments', () => {
    const parsed = parseArgs(['pack', 'a.pack', '--no-color'], '/work')
    expect(parsed.command).toBe('pack')
    expect(parsed.args).toEqual(['a.pack'])
    expect(parsed.options.color).toBe(false)
    expect(parsed.options.sort).toBe(true)
    expect(parsed.problems).toEqual([])
    expect(parsed.cwd).toBe('/work')
  })

  it('reads value options', () => {
    const parsed = parseArgs(['-r', '../repo', '--log-level', 'debug', '--log-file', 'out.log', '--no-sort'])
    expect(parsed.command).toBeUndefined()
    expect(parsed.options.repo).toBe('../repo')
    expect(parsed.options.logLevel).toBe('debug')
    expect(parsed.options.logFile).toBe('out.log')
    expect(parsed.options.sort).toBe(false)
  })

  it('reports unknown options and missing values', () => {
    expect(parseArgs(['--bogus']).problems).toEqual(['Unknown option: --bogus'])
    expect(parseArgs(['list', '--repo']).problems).toEqual(['Option --repo needs a value'])
  })
})

describe('levenshteinDistance', () => {
  it('counts edits', () => {
    expect(levenshteinDistance('kitten', 'sitting')).toBe(3)
    expect(levenshteinDistance('lsit', 'list')).toBe(2)
    expect(levenshteinDistance('pack', 'pack')).toBe(0)
    expect(levenshteinDistance('', 'tui')).toBe(3)
  })
})

describe('CLI', () => {
  let fixture: StorageFixture
  let stdout: string[]
  let stderr: string[]

  beforeEach(() => {
    fixture = createStorageFixture()
    stdout = []
    stderr = []
  })

  afterEach(() => {
    fixture.cleanup()
  })

  const capture = {
    stdout: (msg: string) => stdout.push(msg),
    stderr: (msg: string) => stderr.push(msg),
  }

  it('prints help', async () => {
    const result = await runCLI(['--help'], capture)
    expect(result.exitCode).toBe(0)
    expect(stdout[0].split('\n')[0]).toBe('packlens v0.1.0')
  })

  it('prints help for one command', async () => {
    await runCLI(['pack', '--help'], capture)
    expect(stdout[0].split('\n')).toEqual([
      'packlens pack',
      '',
      'Print the entries of a pack file',
      '',
      'Usage: packlens pack [options] <file>',
    ])
  })

  it('prints the version', async () => {
    const result = await runCLI(['-v'], capture)
    expect(result.exitCode).toBe(0)
    expect(stdout).toEqual(['packlens 0.1.0'])
  })

  it('rejects unknown options', async () => {
    const result = await runCLI(['--bogus'], capture)
    expect(result.exitCode).toBe(1)
    expect(stderr).toEqual(["Unknown option: --bogus\nRun 'packlens --help' for available commands."])
  })

  it('suggests a command for a near miss', async () => {
    const result = await runCLI(['lsit'], { ...capture, cwd: fixture.dir })
    expect(result.exitCode).toBe(1)
    expect(stderr[0].split('\n').slice(0, 2)).toEqual(['Unknown command: lsit', "Did you mean 'list'?"])
  })

  it('rejects a bad log level', async () => {
    const result = await runCLI(['list', fixture.dir, '--log-level', 'loud'], capture)
    expect(result.exitCode).toBe(1)
    expect(stderr[0]).toBe(
      'packlens: PackLensError [INVALID_ARGUMENT]: --log-level must be one of debug, info, warn, error, got "loud"'
    )
  })

  describe('routing to the explorer', () => {
    const explorerArgs = async (args: string[]): Promise<string[] | undefined> => {
      let seen: string[] | undefined
      const cli = createCLI(capture)
      cli.registerCommand('tui', (ctx: CommandContext) => {
        seen = ctx.args
      })
      const result = await cli.run(args, { cwd: fixture.dir, env: {} })
      expect(result.exitCode).toBe(0)
      return seen
    }

    it('opens the explorer without a command', async () => {
      expect(await explorerArgs([])).toEqual([])
    })

    it('treats a bare argument as the repository path', async () => {
      expect(await explorerArgs(['some/where/else'])).toEqual(['some/where/else'])
    })

    it('prefers an existing path over a command suggestion', async () => {
      mkdirSync(join(fixture.dir, 'lsit'))
      expect(await explorerArgs(['lsit'])).toEqual(['lsit'])
    })

    it('accepts the explicit command', async () => {
      expect(await explorerArgs(['tui', '.'])).toEqual(['.'])
    })
  })
})
