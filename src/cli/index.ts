/**
 * @fileoverview CLI entry point for packlens
 *
 * Parses arguments with cac, loads the configuration and routes to one of
 * the commands. Without a command, or with a path as the only argument, the
 * interactive explorer opens.
 *
 * @module cli/index
 *
 * @example
 * // Run programmatically with captured output
 * import { runCLI } from './cli'
 *
 * const output: string[] = []
 * const result = await runCLI(['list', '/path/to/repo'], { stdout: (msg) => output.push(msg) })
 * console.log(result.exitCode) // 0
 */

import cac from 'cac'
import { existsSync } from 'node:fs'
import { resolve } from 'node:path'
import { loadConfig, requireLogLevel, type ConfigOverrides, type PackLensConfig } from '../config'
import { describeError, PackLensError } from '../errors'
import { exploreCommand } from './commands/explore'
import { listCommand } from './commands/list'
import { objectCommand } from './commands/object'
import { packCommand } from './commands/pack'

// ============================================================================
// Types
// ============================================================================

/**
 * Options for configuring CLI behavior. Every field defaults to the
 * current process.
 */
export interface CLIOptions {
  /** Working directory that relative paths resolve against */
  cwd?: string
  env?: Record<string, string | undefined>
  stdout?: (msg: string) => void
  stderr?: (msg: string) => void
  /** Terminal streams for the interactive explorer */
  input?: NodeJS.ReadStream
  output?: NodeJS.WriteStream
}

export interface CLIResult {
  /** 0 for success, 1 for failure */
  exitCode: number
  command?: string
  error?: Error
}

/**
 * Flags understood by every command.
 */
export interface GlobalOptions {
  repo?: string
  logLevel?: string
  logFile?: string
  /** False with `--no-sort` */
  sort: boolean
  /** False with `--no-color` */
  color: boolean
  help: boolean
  version: boolean
}

export interface ParsedArgs {
  command?: string
  /** Positional arguments after the command */
  args: string[]
  options: GlobalOptions
  /** Unknown flags and flags missing their value */
  problems: string[]
  cwd: string
}

/**
 * Context passed to command handlers.
 */
export interface CommandContext {
  cwd: string
  args: string[]
  config: PackLensConfig
  stdout: (msg: string) => void
  stderr: (msg: string) => void
  input: NodeJS.ReadStream
  output: NodeJS.WriteStream
}

type CommandHandler = (ctx: CommandContext) => void | Promise<void>

// ============================================================================
// Constants
// ============================================================================

const SUBCOMMANDS = ['tui', 'list', 'pack', 'object'] as const

type Subcommand = (typeof SUBCOMMANDS)[number]

const VERSION = '0.1.0'

const NAME = 'packlens'

const KNOWN_OPTIONS = new Set(['repo', 'r', 'logLevel', 'logFile', 'sort', 'color', 'help', 'h', 'version', 'v', '--'])

function isSubcommand(value: string): value is Subcommand {
  return SUBCOMMANDS.some((c) => c === value)
}

// ============================================================================
// CLI Class
// ============================================================================

export class CLI {
  public readonly name: string
  public readonly version: string

  private handlers: Map<Subcommand, CommandHandler> = new Map()
  private stdout: (msg: string) => void
  private stderr: (msg: string) => void

  constructor(options: { name?: string; version?: string; stdout?: (msg: string) => void; stderr?: (msg: string) => void } = {}) {
    this.name = options.name ?? NAME
    this.version = options.version ?? VERSION
    this.stdout = options.stdout ?? console.log
    this.stderr = options.stderr ?? console.error
  }

  registerCommand(name: Subcommand, handler: CommandHandler): void {
    this.handlers.set(name, handler)
  }

  /**
   * Runs one command. Never throws: failures are reported on stderr and in
   * the result.
   */
  async run(args: string[], options: CLIOptions = {}): Promise<CLIResult> {
    const parsed = parseArgs(args, options.cwd)

    if (parsed.options.help) {
      this.stdout(parsed.command !== undefined && isSubcommand(parsed.command) ? this.getSubcommandHelp(parsed.command) : this.getHelp())
      return { exitCode: 0, ...(parsed.command !== undefined && { command: parsed.command }) }
    }

    if (parsed.options.version) {
      this.stdout(`${this.name} ${this.version}`)
      return { exitCode: 0 }
    }

    const [problem] = parsed.problems
    if (problem !== undefined) {
      this.stderr(`${problem}\nRun '${this.name} --help' for available commands.`)
      return { exitCode: 1, error: new PackLensError(problem, 'INVALID_ARGUMENT') }
    }

    let command: Subcommand = 'tui'
    let commandArgs = parsed.args
    if (parsed.command !== undefined && isSubcommand(parsed.command)) {
      command = parsed.command
    } else if (parsed.command !== undefined) {
      // A bare argument is the repository path, unless it is a mistyped command
      const suggestion = this.suggestCommand(parsed.command)
      if (suggestion && !existsSync(resolve(parsed.cwd, parsed.command))) {
        this.stderr(
          `Unknown command: ${parsed.command}\nDid you mean '${suggestion}'?\nRun '${this.name} --help' for available commands.`
        )
        return { exitCode: 1, command: parsed.command, error: new PackLensError(`Unknown command: ${parsed.command}`, 'INVALID_ARGUMENT') }
      }
      commandArgs = [parsed.command, ...parsed.args]
    }

    const handler = this.handlers.get(command)
    if (!handler) {
      this.stderr(`Command not available: ${command}`)
      return { exitCode: 1, command, error: new PackLensError(`Command not available: ${command}`, 'INVALID_ARGUMENT') }
    }

    try {
      const config = loadConfig({
        env: options.env ?? process.env,
        overrides: toOverrides(parsed.options, parsed.cwd),
        cwd: parsed.cwd,
      })
      await handler({
        cwd: parsed.cwd,
        args: commandArgs,
        config,
        stdout: this.stdout,
        stderr: this.stderr,
        input: options.input ?? process.stdin,
        output: options.output ?? process.stdout,
      })
      return { exitCode: 0, command }
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err))
      this.stderr(`${this.name}: ${describeError(error)}`)
      return { exitCode: 1, command, error }
    }
  }

  private getHelp(): string {
    return `${this.name} v${this.version}

Usage: ${this.name} [options] [command] [path]

Commands:
  tui [path]      Open the interactive explorer (default)
  list [path]     List pack files and loose objects
  pack <file>     Print the entries of a pack file
  object <path>   Print a decoded loose object

Options:
  -r, --repo <path>       Repository or storage directory (default: .)
  --log-level <level>     debug, info, warn or error
  --log-file <path>       Append JSON log lines to this file
  --no-sort               Keep directory listing order
  --no-color              Disable colors
  -h, --help              Show help
  -v, --version           Show version`
  }

  private getSubcommandHelp(command: Subcommand): string {
    const descriptions: Record<Subcommand, [string, string]> = {
      tui: ['[path]', 'Open the interactive explorer'],
      list: ['[path]', 'List pack files and loose objects'],
      pack: ['<file>', 'Print the entries of a pack file'],
      object: ['<path>', 'Print a decoded loose object'],
    }
    const [usage, description] = descriptions[command]
    return `${this.name} ${command}

${description}

Usage: ${this.name} ${command} [options] ${usage}`
  }

  /**
   * Closest subcommand within two edits of `input`.
   */
  private suggestCommand(input: string): Subcommand | undefined {
    let minDistance = Infinity
    let suggestion: Subcommand | undefined

    for (const cmd of SUBCOMMANDS) {
      const distance = levenshteinDistance(input, cmd)
      if (distance < minDistance && distance <= 2) {
        minDistance = distance
        suggestion = cmd
      }
    }

    return suggestion
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

export function levenshteinDistance(a: string, b: string): number {
  const matrix: number[][] = []

  for (let i = 0; i <= b.length; i++) {
    matrix[i] = [i]
  }

  for (let j = 0; j <= a.length; j++) {
    matrix[0][j] = j
  }

  for (let i = 1; i <= b.length; i++) {
    for (let j = 1; j <= a.length; j++) {
      if (b.charAt(i - 1) === a.charAt(j - 1)) {
        matrix[i][j] = matrix[i - 1][j - 1]
      } else {
        matrix[i][j] = Math.min(matrix[i - 1][j - 1] + 1, matrix[i][j - 1] + 1, matrix[i - 1][j] + 1)
      }
    }
  }

  return matrix[b.length][a.length]
}

function optionalString(value: unknown): string | undefined {
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  return undefined
}

function toOverrides(options: GlobalOptions, cwd: string): ConfigOverrides {
  const overrides: ConfigOverrides = {}
  if (options.repo !== undefined) overrides.repoPath = resolve(cwd, options.repo)
  if (options.logLevel !== undefined) overrides.logLevel = requireLogLevel('--log-level', options.logLevel)
  if (options.logFile !== undefined) overrides.logFile = resolve(cwd, options.logFile)
  if (!options.sort) overrides.sortEntries = false
  if (!options.color) overrides.color = false
  return overrides
}

// ============================================================================
// Exported Functions
// ============================================================================

/**
 * Parses command-line arguments with cac.
 *
 * @example
 * const parsed = parseArgs(['pack', 'objects/pack/pack-1.pack', '--no-color'])
 * // parsed.command === 'pack', parsed.args === ['objects/pack/pack-1.pack'],
 * // parsed.options.color === false
 */
export function parseArgs(args: string[], cwd: string = process.cwd()): ParsedArgs {
  const cli = cac(NAME)

  cli.option('-r, --repo <path>', 'Repository or storage directory')
  cli.option('--log-level <level>', 'Minimum log level')
  cli.option('--log-file <path>', 'Log file')
  cli.option('--no-sort', 'Keep directory listing order')
  cli.option('--no-color', 'Disable colors')
  cli.option('-h, --help', 'Show help')
  cli.option('-v, --version', 'Show version')

  const parsed = cli.parse(['node', NAME, ...args], { run: false })
  const raw: Record<string, unknown> = parsed.options
  const [command, ...rest] = parsed.args

  const options: GlobalOptions = {
    sort: raw.sort !== false,
    color: raw.color !== false,
    help: raw.help === true,
    version: raw.version === true,
  }
  const problems = Object.keys(raw)
    .filter((key) => !KNOWN_OPTIONS.has(key))
    .map((key) => `Unknown option: --${key}`)

  const valueOptions = [
    ['repo', 'repo'],
    ['logLevel', 'log-level'],
    ['logFile', 'log-file'],
  ] as const
  for (const [key, flag] of valueOptions) {
    if (raw[key] === undefined) continue
    const value = optionalString(raw[key])
    if (value === undefined) problems.push(`Option --${flag} needs a value`)
    else options[key] = value
  }

  return {
    ...(command !== undefined && { command }),
    args: rest,
    options,
    problems,
    cwd,
  }
}

export function createCLI(options: { name?: string; version?: string; stdout?: (msg: string) => void; stderr?: (msg: string) => void } = {}): CLI {
  return new CLI(options)
}

/**
 * Creates a CLI with every command registered and runs it.
 */
export async function runCLI(args: string[], options: CLIOptions = {}): Promise<CLIResult> {
  const cli = createCLI({
    ...(options.stdout !== undefined && { stdout: options.stdout }),
    ...(options.stderr !== undefined && { stderr: options.stderr }),
  })

  cli.registerCommand('tui', exploreCommand)
  cli.registerCommand('list', listCommand)
  cli.registerCommand('pack', packCommand)
  cli.registerCommand('object', objectCommand)

  return cli.run(args, options)
}
