import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { resolve } from 'node:path'

import { afterEach, describe, expect, it } from 'vitest'

import { loadBrickstatConfig, parseBrickstatConfig } from '../src/config/loadConfig.js'
import { defineConfig } from '../src/config/types.js'

const createdDirectories: string[] = []

afterEach(async () => {
  for (const directory of createdDirectories.splice(0)) {
    await rm(directory, { recursive: true, force: true })
  }
})

const createDirectory = async (prefix: string): Promise<string> => {
  const directory = await mkdtemp(resolve(tmpdir(), prefix))
  createdDirectories.push(directory)
  return directory
}

describe('loadBrickstatConfig', () => {
  it('loads brickstat.config.json', async () => {
    const directory = await createDirectory('brickstat-cli-json-')

    await writeFile(
      resolve(directory, 'brickstat.config.json'),
      JSON.stringify({
        volumes: ['gv0', 'gv1'],
        binary: '/opt/gluster/sbin/gluster',
        timeoutMs: 2500,
        useSudo: true,
        output: { format: 'line' },
      }),
      'utf8'
    )

    const loaded = await loadBrickstatConfig(directory)

    expect(loaded.configFilePath).toBe(resolve(directory, 'brickstat.config.json'))
    expect(loaded.config.volumes).toEqual(['gv0', 'gv1'])
    expect(loaded.config.binary).toBe('/opt/gluster/sbin/gluster')
    expect(loaded.config.timeoutMs).toBe(2500)
    expect(loaded.config.useSudo).toBe(true)
    expect(loaded.config.output?.format).toBe('line')
  })

  it('loads brickstat.config.ts default export', async () => {
    const directory = await createDirectory('brickstat-cli-ts-')

    await writeFile(
      resolve(directory, 'brickstat.config.ts'),
      [
        'const intervalMs: number = 10_000',
        'export default {',
        '  volumes: ["gv0"],',
        '  intervalMs,',
        '}',
      ].join('\n'),
      'utf8'
    )

    const loaded = await loadBrickstatConfig(directory)

    expect(loaded.config.volumes).toEqual(['gv0'])
    expect(loaded.config.intervalMs).toBe(10_000)
  })

  it('prefers brickstat.config.ts over brickstat.config.json', async () => {
    const directory = await createDirectory('brickstat-cli-both-')

    await writeFile(
      resolve(directory, 'brickstat.config.ts'),
      'export const config = { volumes: ["from-ts"] }\n',
      'utf8'
    )
    await writeFile(
      resolve(directory, 'brickstat.config.json'),
      JSON.stringify({ volumes: ['from-json'] }),
      'utf8'
    )

    const loaded = await loadBrickstatConfig(directory)

    expect(loaded.configFilePath).toBe(resolve(directory, 'brickstat.config.ts'))
    expect(loaded.config.volumes).toEqual(['from-ts'])
  })

  it('returns an empty config when no file exists', async () => {
    const directory = await createDirectory('brickstat-cli-empty-')

    const loaded = await loadBrickstatConfig(directory)

    expect(loaded).toEqual({ config: {}, configFilePath: null })
  })

  it('loads an explicit config path relative to the working directory', async () => {
    const directory = await createDirectory('brickstat-cli-explicit-')

    await writeFile(
      resolve(directory, 'profile.json'),
      JSON.stringify({ volumes: ['gv2'] }),
      'utf8'
    )

    const loaded = await loadBrickstatConfig(directory, 'profile.json')

    expect(loaded.configFilePath).toBe(resolve(directory, 'profile.json'))
    expect(loaded.config.volumes).toEqual(['gv2'])
  })

  it('throws when an explicit config path is missing', async () => {
    const directory = await createDirectory('brickstat-cli-missing-')

    await expect(loadBrickstatConfig(directory, 'missing.json')).rejects.toThrow(
      `Config file not found: ${resolve(directory, 'missing.json')}`
    )
  })

  it('rejects an invalid output format from a file', async () => {
    const directory = await createDirectory('brickstat-cli-format-')

    await writeFile(
      resolve(directory, 'brickstat.config.json'),
      JSON.stringify({ output: { format: 'xml' } }),
      'utf8'
    )

    await expect(loadBrickstatConfig(directory)).rejects.toThrow(
      'output.format must be "pretty", "json" or "line"'
    )
  })
})

describe('parseBrickstatConfig', () => {
  it('accepts an empty object', () => {
    expect(parseBrickstatConfig({})).toEqual({})
  })

  it('accepts a typed config unchanged', () => {
    const config = defineConfig({ volumes: ['gv0'], useSudo: false, output: { format: 'pretty' } })

    expect(parseBrickstatConfig(config)).toEqual(config)
  })

  it('rejects non-object configs', () => {
    expect(() => parseBrickstatConfig(['vol0'])).toThrow('Config must be an object')
    expect(() => parseBrickstatConfig(null)).toThrow('Config must be an object')
  })

  it('validates volumes', () => {
    expect(() => parseBrickstatConfig({ volumes: 'vol0' })).toThrow('volumes must be an array')
    expect(() => parseBrickstatConfig({ volumes: [] })).toThrow(
      'volumes must list at least one volume'
    )
    expect(() => parseBrickstatConfig({ volumes: ['vol0', ''] })).toThrow(
      'volumes[1] must be a non-empty string'
    )
    expect(() => parseBrickstatConfig({ volumes: ['vol0', 'vol0'] })).toThrow(
      'volumes must use unique names (duplicate: vol0)'
    )
  })

  it('validates scalar settings', () => {
    expect(() => parseBrickstatConfig({ binary: '' })).toThrow('binary must be a non-empty string')
    expect(() => parseBrickstatConfig({ timeoutMs: '1000' })).toThrow(
      'timeoutMs must be a valid number'
    )
    expect(() => parseBrickstatConfig({ timeoutMs: 0 })).toThrow(
      'timeoutMs must be an integer between 1 and 2147483647'
    )
    expect(() => parseBrickstatConfig({ useSudo: 'yes' })).toThrow('useSudo must be a boolean')
    expect(() => parseBrickstatConfig({ intervalMs: -1 })).toThrow(
      'intervalMs must be an integer between 0 and 2147483647'
    )
    expect(() => parseBrickstatConfig({ output: 'json' })).toThrow('output must be an object')
  })

  it('requires timer delays to be integers within the timer range', () => {
    expect(parseBrickstatConfig({ timeoutMs: 2_147_483_647, intervalMs: 0 })).toEqual({
      timeoutMs: 2_147_483_647,
      intervalMs: 0,
    })
    expect(() => parseBrickstatConfig({ timeoutMs: 3_000_000_000 })).toThrow(
      'timeoutMs must be an integer between 1 and 2147483647'
    )
    expect(() => parseBrickstatConfig({ timeoutMs: Number.POSITIVE_INFINITY })).toThrow(
      'timeoutMs must be an integer between 1 and 2147483647'
    )
    expect(() => parseBrickstatConfig({ timeoutMs: 250.5 })).toThrow(
      'timeoutMs must be an integer between 1 and 2147483647'
    )
    expect(() => parseBrickstatConfig({ intervalMs: 2_147_483_648 })).toThrow(
      'intervalMs must be an integer between 0 and 2147483647'
    )
  })
})
