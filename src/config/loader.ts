import { readFileSync } from 'node:fs'
import { Value } from '@sinclair/typebox/value'
import { DatabaseConfigSchema, type DatabaseConfig } from '../types/config.js'
import { DEFAULT_CONFIG } from './defaults.js'

/** Prefix of environment variables that override configuration values. */
export const ENV_PREFIX = 'PGMODEL_'

/**
 * Configuration validation error with field-level details.
 */
export class ConfigError extends Error {
  public readonly fields: Array<{ path: string; message: string }>

  constructor(message: string, fields: Array<{ path: string; message: string }> = []) {
    super(message)
    this.name = 'ConfigError'
    this.fields = fields
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Deep merge source into target. Source values override target values.
 * Arrays from source replace target arrays (no concatenation).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...target }
  for (const key of Object.keys(source)) {
    const sourceVal = source[key]
    const targetVal = result[key]
    if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal)
    } else {
      result[key] = sourceVal
    }
  }
  return result
}

/**
 * Coerce string values to appropriate types.
 * Environment variables are always strings; this converts numeric strings
 * and boolean strings to their proper types.
 */
function coerceValue(value: string): string | number | boolean {
  if (value.toLowerCase() === 'true') return true
  if (value.toLowerCase() === 'false') return false

  if (/^\d+$/.test(value)) return parseInt(value, 10)
  if (/^\d+\.\d+$/.test(value)) return parseFloat(value)

  return value
}

/**
 * Find the actual key in an object that matches the given key case-insensitively.
 * Returns the original-cased key if found, or the input key if no match exists.
 */
function findCaseInsensitiveKey(obj: Record<string, unknown>, key: string): string {
  const lowerKey = key.toLowerCase()
  for (const k of Object.keys(obj)) {
    if (k.toLowerCase() === lowerKey) return k
  }
  return key
}

/**
 * Set a nested value in an object using a path array.
 * Resolves each path segment case-insensitively against existing keys.
 */
function setNestedValue(obj: Record<string, unknown>, path: string[], value: unknown): void {
  let current = obj
  for (let i = 0; i < path.length - 1; i++) {
    const resolvedKey = findCaseInsensitiveKey(current, path[i])
    const next = current[resolvedKey]
    if (isPlainObject(next)) {
      current = next
    } else {
      const created: Record<string, unknown> = {}
      current[resolvedKey] = created
      current = created
    }
  }
  const finalKey = findCaseInsensitiveKey(current, path[path.length - 1])
  current[finalKey] = value
}

/**
 * Apply PGMODEL_ prefixed environment variable overrides to config.
 * Double underscores (__) indicate nested paths:
 *   PGMODEL_CONNECTION__PORT=6543 -> config.connection.port = 6543
 */
function applyEnvOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue
    const path = key.slice(ENV_PREFIX.length).toLowerCase().split('__')
    setNestedValue(config, path, coerceValue(value))
  }
  return config
}

/**
 * Recursively freeze an object and all nested objects.
 */
function deepFreeze<T extends object>(obj: T): Readonly<T> {
  Object.freeze(obj)
  for (const value of Object.values(obj)) {
    if (isPlainObject(value) && !Object.isFrozen(value)) {
      deepFreeze(value)
    }
  }
  return obj
}

function readConfigFile(configPath: string): Record<string, unknown> {
  let rawContent: string
  try {
    rawContent = readFileSync(configPath, 'utf-8')
  } catch (err) {
    if (err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigError(`Configuration file not found: ${configPath}`)
    }
    throw new ConfigError(`Failed to read configuration file: ${configPath}`)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(rawContent)
  } catch {
    throw new ConfigError(`Invalid JSON in configuration file: ${configPath}`)
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Configuration file must contain a JSON object: ${configPath}`)
  }
  return parsed
}

/**
 * Load, validate, and return a frozen DatabaseConfig.
 *
 * Pipeline: read file (when given) -> merge defaults -> apply env overrides
 *           -> validate against TypeBox schema -> check connection string -> freeze
 *
 * @param configPath - Path to pgmodel.config.json; defaults and environment only when omitted
 * @param env - Environment to read overrides from
 * @throws ConfigError with field-level details on validation failure
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): DatabaseConfig {
  const userConfig = configPath === undefined ? {} : readConfigFile(configPath)

  // Deep clone so the frozen result never aliases DEFAULT_CONFIG
  const merged: Record<string, unknown> = JSON.parse(JSON.stringify(deepMerge(DEFAULT_CONFIG, userConfig)))
  const config = applyEnvOverrides(merged, env)

  if (!Value.Check(DatabaseConfigSchema, config)) {
    const fields = [...Value.Errors(DatabaseConfigSchema, config)].map((e) => ({
      path: e.path,
      message: e.message,
    }))
    const fieldMessages = fields.map((f) => `  - ${f.path}: ${f.message}`).join('\n')
    throw new ConfigError(`Configuration invalid:\n${fieldMessages}`, fields)
  }

  const { connectionString } = config.connection
  if (connectionString !== undefined && !/^postgres(ql)?:\/\//.test(connectionString)) {
    throw new ConfigError(
      `Invalid connection string: expected a postgres:// or postgresql:// URL`,
      [{ path: '/connection/connectionString', message: 'must use the postgres:// or postgresql:// scheme' }],
    )
  }

  return deepFreeze(config)
}
