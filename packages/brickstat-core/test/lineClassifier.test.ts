import { describe, expect, it } from 'vitest'

import { classifyReportLine } from '../src/index.js'

describe('classifyReportLine', () => {
  it('captures the brick identifier verbatim, including colons and slashes', () => {
    expect(classifyReportLine('Brick: server1:/data/glusterfs/vol0/brick1')).toEqual({
      kind: 'brick_header',
      brick: 'server1:/data/glusterfs/vol0/brick1',
    })
  })

  it('only treats lines starting with the header keyword as brick headers', () => {
    expect(classifyReportLine('  Brick: server1:/data/brick1')).toEqual({ kind: 'no_match' })
  })

  it('prefers the brick header over a trailing data counter', () => {
    expect(classifyReportLine('Brick: host:/a Data Read: 5 bytes')).toEqual({
      kind: 'brick_header',
      brick: 'host:/a Data Read: 5 bytes',
    })
  })

  it('recognizes data read counters with leading padding', () => {
    expect(classifyReportLine('Data Read: 12345 bytes')).toEqual({ kind: 'data_read', bytes: 12345 })
    expect(classifyReportLine('      Data Read: 0 bytes')).toEqual({ kind: 'data_read', bytes: 0 })
  })

  it('recognizes data written counters', () => {
    expect(classifyReportLine('Data Written: 67 bytes')).toEqual({
      kind: 'data_written',
      bytes: 67,
    })
  })

  it('requires data counters to end the line', () => {
    expect(classifyReportLine('Data Read: 12345 bytes ')).toEqual({ kind: 'no_match' })
  })

  it('marks lines starting with a decimal value as fop candidates', () => {
    expect(
      classifyReportLine('      0.00       0.00 us       0.00 us       0.00 us              4     RELEASE')
    ).toEqual({ kind: 'fop_candidate' })
    expect(classifyReportLine('1.5 not really a fop line')).toEqual({ kind: 'fop_candidate' })
  })

  it('ignores headers, separators and plain integers', () => {
    expect(classifyReportLine(' %-latency   Avg-latency   Min-Latency')).toEqual({
      kind: 'no_match',
    })
    expect(classifyReportLine('------------------------------------------')).toEqual({
      kind: 'no_match',
    })
    expect(classifyReportLine('42 WRITE')).toEqual({ kind: 'no_match' })
    expect(classifyReportLine('')).toEqual({ kind: 'no_match' })
  })
})
