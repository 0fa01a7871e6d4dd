import { Command, CommanderError, InvalidArgumentError } from 'commander'
import type { ColorMode, OutputLayout } from '../../shared/types'
import { COLOR_MODES, OUTPUT_LAYOUTS } from '../../shared/types'
import { log, setLogLevel } from '../../shared/logger'
import { loadConfiguration, resolveColor } from '../core/config'
import { buildBranchTree } from '../core/utils/build-branch-tree'
import { formatBranchTree } from '../core/utils/format-branch-tree'
import { readStream } from '../core/utils/read-stream'
import { BRANCH_FORMAT } from '../shared/constants'
import { AppError } from '../shared/errors'

export type CliIo = {
  stdin: AsyncIterable<Buffer | string>
  stdout: { write: (chunk: string) => unknown }
  /** Whether stdout is an interactive terminal, for `--color auto`. */
  isTTY: boolean
  env: NodeJS.ProcessEnv
}

export type CliOptions = {
  layout?: OutputLayout
  delimiter?: string
  color?: ColorMode
  printFormat?: boolean
}

function parseChoice<T extends string>(flag: string, allowed: readonly T[]) {
  return (value: string): T => {
    const match = allowed.find((candidate) => candidate === value)
    if (match === undefined) {
      throw new InvalidArgumentError(
        `invalid ${flag} value: ${value} (allowed: ${allowed.join(', ')})`
      )
    }
    return match
  }
}

export function createProgram(): Command {
  return new Command()
    .name('git-br')
    .description('Print branches as a tree of upstream tracking, read from `git branch --format` output on stdin.')
    .option(
      '--layout <layout>',
      `output layout (${OUTPUT_LAYOUTS.join(', ')})`,
      parseChoice('--layout', OUTPUT_LAYOUTS)
    )
    .option('--delimiter <text>', 'field separator for the fields layout')
    .option(
      '--color <mode>',
      `color the table layout (${COLOR_MODES.join(', ')})`,
      parseChoice('--color', COLOR_MODES)
    )
    .option('--print-format', 'print the git branch --format string this tool expects and exit')
}

/**
 * Runs git-br against the given streams and returns the exit status.
 * Nothing reaches stdout unless the whole input was transformed.
 */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  const program = createProgram()
    .exitOverride()
    .configureOutput({
      writeOut: (text) => {
        io.stdout.write(text)
      },
      writeErr: (text) => {
        log.error(text.trimEnd())
      }
    })

  try {
    program.parse(argv, { from: 'user' })
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode
    }
    throw error
  }

  const options = program.opts<CliOptions>()
  if (options.printFormat) {
    io.stdout.write(`${BRANCH_FORMAT}\n`)
    return 0
  }

  try {
    const config = loadConfiguration(io.env)
    setLogLevel(config.logLevel)

    const input = await readStream(io.stdin)
    const records = buildBranchTree(input)
    const lines = formatBranchTree(records, {
      layout: options.layout ?? config.layout,
      delimiter: options.delimiter ?? config.delimiter,
      color: resolveColor(options.color ?? config.color, io.isTTY, io.env)
    })

    if (lines.length > 0) {
      io.stdout.write(lines.map((line) => `${line}\n`).join(''))
    }
    return 0
  } catch (error) {
    if (error instanceof AppError) {
      log.error(error.message)
      return 1
    }
    log.error('Unexpected error while building the branch tree:', error)
    return 1
  }
}
