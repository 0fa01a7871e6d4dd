import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { setLogLevel, setLogSink } from '../../../shared/logger'
import { createRecord, toInput } from '../../domain/__tests__/test-utils'
import { BRANCH_FORMAT } from '../../shared/constants'
import { runCli, type CliIo } from '../run'

async function* streamOf(text: string): AsyncGenerator<string> {
  if (text !== '') yield text
}

function createIo(input: string, env: NodeJS.ProcessEnv = {}, isTTY = false) {
  let stdout = ''
  const io: CliIo = {
    stdin: streamOf(input),
    stdout: {
      write: (chunk: string) => {
        stdout += chunk
        return true
      }
    },
    isTTY,
    env
  }
  return { io, stdout: () => stdout }
}

const input = toInput([
  createRecord('main', { isCurrent: '*', shortHash: 'aaaaaaa' }),
  createRecord('feature', { shortHash: 'bbbbbbb', tracks: 'main', upstreamTrackInfo: '[ahead 1]' })
])

describe('runCli', () => {
  const sink = vi.fn()
  let restore: (...args: unknown[]) => void

  beforeEach(() => {
    sink.mockReset()
    restore = setLogSink(sink)
  })

  afterEach(() => {
    setLogSink(restore)
    setLogLevel('warn')
  })

  it('prints the indented names', async () => {
    const { io, stdout } = createIo(input)

    expect(await runCli(['--layout', 'names'], io)).toBe(0)
    expect(stdout()).toBe('main\n  feature\n')
    expect(sink).not.toHaveBeenCalled()
  })

  it('prints an uncolored table by default when stdout is not a terminal', async () => {
    const { io, stdout } = createIo(input)

    expect(await runCli([], io)).toBe(0)
    expect(stdout()).toBe('● aaaaaaa main\n  bbbbbbb   feature [ahead 1] main\n')
  })

  it('colors the table when asked to', async () => {
    const { io, stdout } = createIo(toInput([createRecord('main', { shortHash: 'abc1234' })]))

    expect(await runCli(['--color', 'always'], io)).toBe(0)
    expect(stdout()).toBe('  \x1b[33mabc1234\x1b[39;49m main \x1b[36m\x1b[39;49m \x1b[34m\x1b[0m\n')
  })

  it('takes the layout and delimiter from the environment', async () => {
    const { io, stdout } = createIo(input, { GIT_BR_LAYOUT: 'fields', GIT_BR_DELIMITER: ';' })

    expect(await runCli([], io)).toBe(0)
    expect(stdout()).toBe(
      '*;aaaaaaa;refs/heads/main;main;;;\n' +
        ' ;bbbbbbb;refs/heads/feature;  feature;refs/heads/main;main;[ahead 1]\n'
    )
  })

  it('lets flags override the environment', async () => {
    const { io, stdout } = createIo(input, { GIT_BR_LAYOUT: 'fields' })

    expect(await runCli(['--layout', 'names'], io)).toBe(0)
    expect(stdout()).toBe('main\n  feature\n')
  })

  it('prints nothing for empty input', async () => {
    const { io, stdout } = createIo('')

    expect(await runCli([], io)).toBe(0)
    expect(stdout()).toBe('')
  })

  it('prints the expected git format', async () => {
    const { io, stdout } = createIo('')

    expect(await runCli(['--print-format'], io)).toBe(0)
    expect(stdout()).toBe(`${BRANCH_FORMAT}\n`)
  })

  it('fails on a malformed line without printing a partial tree', async () => {
    const { io, stdout } = createIo(`${input}main only\n`)

    expect(await runCli(['--layout', 'names'], io)).toBe(1)
    expect(stdout()).toBe('')
    expect(sink).toHaveBeenCalledWith(
      '\x1b[31m[ERROR]\x1b[0m',
      'Line 3: expected 7 NUL-separated fields, found 1'
    )
  })

  it('fails on an upstream cycle', async () => {
    const { io, stdout } = createIo(
      toInput([createRecord('a', { tracks: 'b' }), createRecord('b', { tracks: 'a' })])
    )

    expect(await runCli([], io)).toBe(1)
    expect(stdout()).toBe('')
    expect(sink).toHaveBeenCalledWith(
      '\x1b[31m[ERROR]\x1b[0m',
      'Upstream tracking forms a cycle: refs/heads/a -> refs/heads/b -> refs/heads/a'
    )
  })

  it('fails on an invalid environment value', async () => {
    const { io, stdout } = createIo(input, { GIT_BR_COLOR: 'rainbow' })

    expect(await runCli([], io)).toBe(1)
    expect(stdout()).toBe('')
    expect(sink).toHaveBeenCalledWith(
      '\x1b[31m[ERROR]\x1b[0m',
      'Invalid GIT_BR_COLOR: rainbow (allowed: auto, always, never)'
    )
  })

  it('rejects an unknown layout flag', async () => {
    const { io, stdout } = createIo(input)

    expect(await runCli(['--layout', 'grid'], io)).toBe(1)
    expect(stdout()).toBe('')
    expect(sink).toHaveBeenCalledTimes(1)
  })

  it('logs pipeline details at debug level', async () => {
    const { io } = createIo(input, { GIT_BR_LOG_LEVEL: 'debug' })

    expect(await runCli(['--layout', 'names'], io)).toBe(0)
    expect(sink).toHaveBeenCalledWith('\x1b[34m[DEBUG]\x1b[0m', 'Parsed 2 branch records')
    expect(sink).toHaveBeenCalledWith('\x1b[34m[DEBUG]\x1b[0m', 'Built 1 root branch(es)')
  })
})
