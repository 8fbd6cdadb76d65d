import { ProfileCommandError } from '@brickstat/core'
import { describe, expect, it, vi } from 'vitest'

import { formatCycleReportAsJson, JsonSink } from '../src/sinks/jsonSink.js'

const captureStdout = (callback: () => void): string => {
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

  return chunks.join('')
}

describe('JsonSink', () => {
  it('writes one document per cycle', () => {
    const sink = new JsonSink()

    const output = captureStdout(() => {
      sink.onCycleStart()
      sink.addFields('glusterfs', { read: 4096 }, { volume: 'gv0', brick: 'b2' })
      sink.onCycleEnd({ volumes: 1, records: 1, fieldErrors: 0, durationMs: 3 })
    })

    expect(JSON.parse(output)).toEqual({
      records: [
        { measurement: 'glusterfs', fields: { read: 4096 }, tags: { volume: 'gv0', brick: 'b2' } },
      ],
      errors: [],
      summary: { volumes: 1, records: 1, fieldErrors: 0, durationMs: 3 },
    })
  })

  it('reports a failed cycle with a null summary', () => {
    const sink = new JsonSink()
    const error = new ProfileCommandError(
      { binary: '/usr/sbin/gluster', volume: 'gv0', timeoutMs: 1_000, useSudo: false },
      {
        successful: false,
        timedOut: false,
        durationMs: 4,
        exitCode: 2,
        signal: null,
        stdout: '',
        stderr: 'Volume gv0 does not exist',
        command: '/usr/sbin/gluster',
        args: ['volume', 'profile', 'gv0', 'info', 'cumulative'],
      }
    )

    const output = captureStdout(() => {
      sink.onCycleStart()
      sink.addError(error)
      sink.onCycleEnd(null)
    })

    expect(JSON.parse(output)).toEqual({
      records: [],
      errors: [
        {
          name: 'ProfileCommandError',
          message:
            'error gathering metrics: error running gluster command: exited with code 2 - use_sudo: false - cmdArgs: [volume profile gv0 info cumulative]',
        },
      ],
      summary: null,
    })
  })

  it('starts every cycle with an empty buffer', () => {
    const sink = new JsonSink()

    captureStdout(() => {
      sink.addFields('glusterfs', { read: 1 }, {})
      sink.onCycleEnd(null)
    })
    const output = captureStdout(() => {
      sink.onCycleStart()
      sink.onCycleEnd({ volumes: 1, records: 0, fieldErrors: 0, durationMs: 0 })
    })

    expect(JSON.parse(output)).toEqual({
      records: [],
      errors: [],
      summary: { volumes: 1, records: 0, fieldErrors: 0, durationMs: 0 },
    })
  })
})

describe('formatCycleReportAsJson', () => {
  it('honors the indentation argument', () => {
    expect(formatCycleReportAsJson({ records: [], errors: [], summary: null }, 0)).toBe(
      '{"records":[],"errors":[],"summary":null}'
    )
  })
})
