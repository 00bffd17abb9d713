import { describe, expect, it } from 'vitest'
import { createLogger, type LoggerOutput, renderProgressBar } from './logger'

function capture(isTTY: boolean): LoggerOutput & { out: string[]; err: string[] } {
  const out: string[] = []
  const err: string[] = []
  return {
    out,
    err,
    stdout: { isTTY, write: (chunk: string) => out.push(chunk) },
    stderr: { write: (chunk: string) => err.push(chunk) }
  }
}

describe('renderProgressBar', () => {
  it('fills in proportion to progress', () => {
    expect(renderProgressBar(1, 2)).toBe(`[${'█'.repeat(15)}${'░'.repeat(15)}] 1/2`)
    expect(renderProgressBar(3, 3)).toBe(`[${'█'.repeat(30)}] 3/3`)
    expect(renderProgressBar(0, 0)).toBe(`[${'█'.repeat(30)}] 0/0`)
  })
})

describe('createLogger', () => {
  it('writes messages to stdout and errors to stderr', () => {
    const output = capture(false)
    const logger = createLogger(false, false, output)

    logger.log('hello')
    logger.success('done')
    logger.verbose('hidden')
    logger.warn('careful')
    logger.error('broken')

    expect(output.out).toEqual(['hello\n', '  ✓ done\n'])
    expect(output.err).toEqual(['  ! careful\n', '  ✗ broken\n'])
  })

  it('keeps only errors when quiet', () => {
    const output = capture(true)
    const logger = createLogger(true, false, output)

    logger.log('hello')
    logger.warn('careful')
    logger.progress('Deploy', 1, 2)
    logger.error('broken')

    expect(output.out).toEqual([])
    expect(output.err).toEqual(['  ✗ broken\n'])
  })

  it('prints debug lines when verbose', () => {
    const output = capture(false)
    createLogger(false, true, output).verbose('details')

    expect(output.out).toEqual(['  [debug] details\n'])
  })

  it('draws progress on a terminal and ends the line before other output', () => {
    const output = capture(true)
    const logger = createLogger(false, false, output)

    logger.progress('Deploy', 1, 2)
    logger.log('next')
    logger.progress('Backups', 2, 2)

    expect(output.out).toEqual([
      `\r\x1b[2K  ${renderProgressBar(1, 2)} Deploy`,
      '\n',
      'next\n',
      `\r\x1b[2K  ${renderProgressBar(2, 2)} Backups`,
      '\n'
    ])
  })

  it('skips progress when stdout is not a terminal', () => {
    const output = capture(false)
    createLogger(false, false, output).progress('Deploy', 1, 2)

    expect(output.out).toEqual([])
  })
})
