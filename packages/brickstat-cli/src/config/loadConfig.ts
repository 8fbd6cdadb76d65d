import { access, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, resolve } from 'node:path'
import { pathToFileURL } from 'node:url'

import { isTimerDelay, MAX_TIMER_DELAY_MS } from '@brickstat/core'
import ts from 'typescript'

import { OUTPUT_FORMATS, type BrickstatConfig, type OutputFormat } from './types.js'

/**
 * Loaded config together with the file it came from.
 */
export interface LoadedBrickstatConfig {
  /** Parsed config; empty when no file was found. */
  readonly config: BrickstatConfig
  /** Absolute config file path, or null when running on defaults. */
  readonly configFilePath: string | null
}

/**
 * Loads and validates a brickstat config file.
 *
 * Without an explicit path the working directory is searched for
 * `brickstat.config.ts` and `brickstat.config.json`; when neither exists an empty
 * config is returned so that defaults apply.
 *
 * @param cwd Base working directory.
 * @param configPath Optional explicit config file path.
 * @returns Parsed config with resolved metadata.
 * @throws Error when an explicit file is missing or a config is invalid.
 */
export const loadBrickstatConfig = async (
  cwd: string,
  configPath?: string
): Promise<LoadedBrickstatConfig> => {
  const resolvedConfigPath = await resolveConfigPath(cwd, configPath)
  if (!resolvedConfigPath) {
    return { config: {}, configFilePath: null }
  }

  const loadedConfig = await loadConfigByExtension(resolvedConfigPath)
  const config = parseBrickstatConfig(loadedConfig)

  return {
    config,
    configFilePath: resolvedConfigPath,
  }
}

const resolveConfigPath = async (cwd: string, configPath?: string): Promise<string | null> => {
  if (configPath) {
    const explicitPath = resolve(cwd, configPath)
    if (!(await fileExists(explicitPath))) {
      throw new Error(`Config file not found: ${explicitPath}`)
    }
    return explicitPath
  }

  const candidates = [resolve(cwd, 'brickstat.config.ts'), resolve(cwd, 'brickstat.config.json')]

  for (const candidate of candidates) {
    if (await fileExists(candidate)) {
      return candidate
    }
  }

  return null
}

const fileExists = async (filePath: string): Promise<boolean> => {
  try {
    await access(filePath)
    return true
  } catch {
    return false
  }
}

const loadConfigByExtension = async (configFilePath: string): Promise<unknown> => {
  if (configFilePath.endsWith('.json')) {
    const content = await readFile(configFilePath, 'utf8')
    return JSON.parse(content) as unknown
  }

  if (configFilePath.endsWith('.ts')) {
    return await loadTypeScriptConfig(configFilePath)
  }

  throw new Error(`Unsupported config extension: ${configFilePath}`)
}

const loadTypeScriptConfig = async (configFilePath: string): Promise<unknown> => {
  const source = await readFile(configFilePath, 'utf8')
  const transpiled = ts.transpileModule(source, {
    compilerOptions: {
      module: ts.ModuleKind.ESNext,
      target: ts.ScriptTarget.ES2022,
      esModuleInterop: true,
    },
    fileName: configFilePath,
    reportDiagnostics: true,
  })

  if (transpiled.diagnostics && transpiled.diagnostics.length > 0) {
    const message = ts.formatDiagnostics(transpiled.diagnostics, {
      getCurrentDirectory: (): string => dirname(configFilePath),
      getCanonicalFileName: (fileName: string): string => fileName,
      getNewLine: (): string => '\n',
    })
    throw new Error(`Failed to transpile ${configFilePath}\n${message}`)
  }

  const tempDirectory = await mkdtemp(resolve(tmpdir(), 'brickstat-config-'))
  const tempFilePath = resolve(tempDirectory, 'config.mjs')

  try {
    await writeFile(tempFilePath, transpiled.outputText, 'utf8')
    const moduleUrl = `${pathToFileURL(tempFilePath).href}?v=${Date.now()}`
    const loadedModule = (await import(moduleUrl)) as {
      readonly default?: unknown
      readonly config?: unknown
    }

    if (loadedModule.default !== undefined) {
      return loadedModule.default
    }

    if (loadedModule.config !== undefined) {
      return loadedModule.config
    }

    throw new Error(`Config module ${configFilePath} must export default or named "config"`)
  } finally {
    await rm(tempDirectory, { recursive: true, force: true })
  }
}

/**
 * Validates an untyped config value.
 *
 * @param value Raw value from JSON or a config module.
 * @returns Typed config.
 * @throws Error naming the first invalid path.
 */
export const parseBrickstatConfig = (value: unknown): BrickstatConfig => {
  if (!isRecord(value)) {
    throw new Error('Config must be an object')
  }

  const volumes = parseOptionalVolumes(value.volumes)
  const binary = parseOptionalNonEmptyString(value.binary, 'binary')
  const timeoutMs = parseOptionalTimerDelay(value.timeoutMs, 'timeoutMs', false)
  const useSudo = parseOptionalBoolean(value.useSudo, 'useSudo')
  const intervalMs = parseOptionalTimerDelay(value.intervalMs, 'intervalMs', true)

  const output = parseOutputConfig(value.output)

  return {
    volumes,
    binary,
    timeoutMs,
    useSudo,
    intervalMs,
    output,
  }
}

const parseOptionalVolumes = (value: unknown): readonly string[] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!Array.isArray(value)) {
    throw new Error('volumes must be an array')
  }

  if (value.length === 0) {
    throw new Error('volumes must list at least one volume')
  }

  const seen = new Set<string>()
  const volumes: string[] = []
  for (const [index, entry] of value.entries()) {
    if (typeof entry !== 'string' || entry.length === 0) {
      throw new Error(`volumes[${index}] must be a non-empty string`)
    }
    if (seen.has(entry)) {
      throw new Error(`volumes must use unique names (duplicate: ${entry})`)
    }
    seen.add(entry)
    volumes.push(entry)
  }

  return volumes
}

const parseOutputConfig = (value: unknown): BrickstatConfig['output'] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new Error('output must be an object')
  }

  const format = value.format
  if (format !== undefined && !isOutputFormat(format)) {
    throw new Error('output.format must be "pretty", "json" or "line"')
  }

  return {
    format,
  }
}

/**
 * Narrows an arbitrary value to a supported output format.
 *
 * @param value Value to check.
 * @returns True for `pretty`, `json` and `line`.
 */
export const isOutputFormat = (value: unknown): value is OutputFormat => {
  return OUTPUT_FORMATS.some((format) => format === value)
}

const parseOptionalNonEmptyString = (value: unknown, path: string): string | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`${path} must be a non-empty string`)
  }

  return value
}

const parseOptionalNumber = (value: unknown, path: string): number | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new Error(`${path} must be a valid number`)
  }

  return value
}

const parseOptionalTimerDelay = (
  value: unknown,
  path: string,
  allowZero: boolean
): number | undefined => {
  const delay = parseOptionalNumber(value, path)
  if (delay !== undefined && !isTimerDelay(delay, allowZero)) {
    throw new Error(
      `${path} must be an integer between ${allowZero ? 0 : 1} and ${MAX_TIMER_DELAY_MS}`
    )
  }

  return delay
}

const parseOptionalBoolean = (value: unknown, path: string): boolean | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'boolean') {
    throw new Error(`${path} must be a boolean`)
  }

  return value
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
