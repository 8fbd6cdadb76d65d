import { FieldParseError } from '@brickstat/core'
import { describe, expect, it, vi } from 'vitest'

import { PrettySink } from '../src/sinks/prettySink.js'

const ANSI_ESCAPE_PATTERN = new RegExp(String.raw`\u001B\[[0-?]*[ -/]*[@-~]`, 'gu')

const captureStdout = (callback: () => void, keepAnsi = false): string => {
  const chunks: string[] = []
  const writeSpy = vi
    .spyOn(process.stdout, 'write')
    .mockImplementation((chunk: string | Uint8Array) => {
      chunks.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8'))
      return true
    })

  try {
    callback()
  } finally {
    writeSpy.mockRestore()
  }

  const output = chunks.join('')
  return keepAnsi ? output : stripAnsi(output)
}

const stripAnsi = (text: string): string => {
  return text.replaceAll(ANSI_ESCAPE_PATTERN, '')
}

describe('PrettySink', () => {
  it('prints the cycle header with scheduled volumes', () => {
    const sink = new PrettySink()

    expect(captureStdout(() => sink.onCycleStart(['gv0', 'gv1']))).toBe(
      'brickstat: profiling 2 volumes (gv0, gv1)\n'
    )
    expect(captureStdout(() => sink.onCycleStart(['gv0']))).toBe(
      'brickstat: profiling 1 volume (gv0)\n'
    )
  })

  it('prints tags before fields on one line', () => {
    const sink = new PrettySink()

    const output = captureStdout(() =>
      sink.addFields(
        'glusterfs',
        { write_pct_latency: 87.5, write_ncalls: 42 },
        { volume: 'gv0', brick: 'server1:/bricks/gv0' }
      )
    )

    expect(output).toBe(
      'glusterfs volume=gv0 brick=server1:/bricks/gv0 write_pct_latency=87.5 write_ncalls=42\n'
    )
  })

  it('colours record lines green', () => {
    const sink = new PrettySink()

    const output = captureStdout(
      () => sink.addFields('glusterfs', { read: 4096 }, { volume: 'gv0', brick: 'b2' }),
      true
    )

    expect(output).toBe('\x1b[32mglusterfs volume=gv0 brick=b2 read=4096\x1b[0m\n')
  })

  it('prints field parse errors as warnings and other errors as errors', () => {
    const sink = new PrettySink()

    const output = captureStdout(() => {
      sink.addError(new FieldParseError({ label: 'ncalls', raw: 'many', cause: 'invalid syntax' }))
      sink.addError(new Error('boom'))
    })

    expect(output).toBe('warning: Expected a numerical value for ncalls = many\nerror: boom\n')
  })

  it('prints a summary or a failure result at cycle end', () => {
    const sink = new PrettySink()

    expect(
      captureStdout(() =>
        sink.onCycleEnd({ volumes: 2, records: 8, fieldErrors: 1, durationMs: 12 })
      )
    ).toBe('Summary: volumes=2 records=8 fieldErrors=1 duration=12ms\n')
    expect(captureStdout(() => sink.onCycleEnd(null))).toBe('Result: FAIL\n')
  })
})
