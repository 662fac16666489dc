import {readFile} from 'node:fs/promises'
import {parse as parseYaml} from 'yaml'
import {ConfigError} from '../errors.js'
import {isLogLevel, type LogLevel} from './logger.js'

/**
 * Resolved engine configuration.
 */
export type EngineConfig = {
  /** Coordinator API root */
  apiUrl: string;
  engineId: string;
  /** Path of the PEM bundle holding the client certificate and key */
  certificate?: string;
  /** Verify the coordinator's TLS certificate */
  verify: boolean;
  /** Docker daemon address (Docker's own default when unset) */
  dockerHost?: string;
  /** Keep job containers after they ran */
  keepContainers: boolean;
  /** Parent directory of staging areas */
  workdir?: string;
  scratchPath: string;
  group?: string;
  project?: string;
  idleDelaySec: number;
  logLevel: LogLevel;
}

export type ConfigKey = keyof EngineConfig

/**
 * Partial configuration from one source. Values are coerced and validated by
 * {@link resolveConfig}.
 */
export type ConfigSource = Partial<Record<ConfigKey, unknown>>

export const defaultConfigFile = '.job-engine.yml'

const configKeys: readonly ConfigKey[] = [
  'apiUrl',
  'engineId',
  'certificate',
  'verify',
  'dockerHost',
  'keepContainers',
  'workdir',
  'scratchPath',
  'group',
  'project',
  'idleDelaySec',
  'logLevel'
]

const envVariables: Partial<Record<ConfigKey, string>> = {
  apiUrl: 'JOB_ENGINE_API',
  engineId: 'JOB_ENGINE_ID',
  certificate: 'JOB_ENGINE_SSL_CERT',
  verify: 'JOB_ENGINE_VERIFY',
  keepContainers: 'JOB_ENGINE_NO_REMOVE',
  workdir: 'JOB_ENGINE_WORKDIR',
  scratchPath: 'JOB_ENGINE_SCRATCH',
  group: 'JOB_ENGINE_GROUP',
  project: 'JOB_ENGINE_PROJECT',
  idleDelaySec: 'JOB_ENGINE_IDLE_DELAY',
  logLevel: 'JOB_ENGINE_LOG_LEVEL'
}

function isConfigKey(key: string): key is ConfigKey {
  return (configKeys as readonly string[]).includes(key)
}

/**
 * Loads a YAML configuration file.
 * Returns an empty source when the file does not exist and `required` is false.
 */
export async function loadConfigFile(path: string, {required = false}: {required?: boolean} = {}): Promise<ConfigSource> {
  let content: string
  try {
    content = await readFile(path, 'utf8')
  } catch (error: unknown) {
    if (!required && (error as NodeJS.ErrnoException).code === 'ENOENT') {
      return {}
    }

    throw new ConfigError(`Cannot read configuration file ${path}`, {cause: error})
  }

  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${path}`, {cause: error})
  }

  if (parsed === null || parsed === undefined) {
    return {}
  }

  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError(`Configuration file ${path} must contain a mapping`)
  }

  const source: ConfigSource = {}
  for (const [key, value] of Object.entries(parsed)) {
    if (!isConfigKey(key)) {
      throw new ConfigError(`Unknown configuration key "${key}" in ${path}`)
    }

    source[key] = value
  }

  return source
}

/**
 * Reads the `JOB_ENGINE_*` variables of an environment.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): ConfigSource {
  const source: ConfigSource = {}
  for (const key of configKeys) {
    const variable = envVariables[key]
    const value = variable ? env[variable] : undefined
    if (value !== undefined && value !== '') {
      source[key] = value
    }
  }

  return source
}

function asString(key: ConfigKey, value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value === 'string' || typeof value === 'number') {
    return String(value)
  }

  throw new ConfigError(`${key} must be a string`)
}

function asBoolean(key: ConfigKey, value: unknown): boolean | undefined {
  if (value === undefined || value === null || typeof value === 'boolean') {
    return value ?? undefined
  }

  const normalized = String(value).trim().toLowerCase()
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true
  }

  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false
  }

  throw new ConfigError(`${key} must be a boolean, got "${String(value)}"`)
}

function asSeconds(key: ConfigKey, value: unknown): number | undefined {
  if (value === undefined || value === null) {
    return undefined
  }

  const seconds = typeof value === 'number' ? value : Number(String(value).trim())
  if (!Number.isFinite(seconds) || seconds < 0 || String(value).trim() === '') {
    throw new ConfigError(`${key} must be a non-negative number of seconds, got "${String(value)}"`)
  }

  return seconds
}

/**
 * Merges sources (later sources win) over the defaults and validates the result.
 * @throws {ConfigError} If a value is invalid or `apiUrl`/`engineId` is missing
 */
export function resolveConfig(...sources: ConfigSource[]): EngineConfig {
  const merged: ConfigSource = {}
  for (const source of sources) {
    for (const key of configKeys) {
      if (source[key] !== undefined) {
        merged[key] = source[key]
      }
    }
  }

  const apiUrl = asString('apiUrl', merged.apiUrl)
  if (!apiUrl) {
    throw new ConfigError('apiUrl is required (argument <api> or JOB_ENGINE_API)')
  }

  const engineId = asString('engineId', merged.engineId)
  if (!engineId) {
    throw new ConfigError('engineId is required (argument <engine-id> or JOB_ENGINE_ID)')
  }

  const logLevel = asString('logLevel', merged.logLevel) ?? 'info'
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`logLevel must be one of fatal, error, warn, info, debug, trace, silent, got "${logLevel}"`)
  }

  return {
    apiUrl,
    engineId,
    certificate: asString('certificate', merged.certificate),
    verify: asBoolean('verify', merged.verify) ?? true,
    dockerHost: asString('dockerHost', merged.dockerHost),
    keepContainers: asBoolean('keepContainers', merged.keepContainers) ?? false,
    workdir: asString('workdir', merged.workdir),
    scratchPath: asString('scratchPath', merged.scratchPath) ?? '/scratch',
    group: asString('group', merged.group),
    project: asString('project', merged.project),
    idleDelaySec: asSeconds('idleDelaySec', merged.idleDelaySec) ?? 10,
    logLevel
  }
}
