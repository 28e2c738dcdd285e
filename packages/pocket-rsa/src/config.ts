/**
 * Configuration loading, validation, and defaults for pocket-rsa.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises'
import * as path from 'node:path'
import * as os from 'node:os'
import { ConfigError } from './errors.js'
import { DEFAULT_MAX_ATTEMPTS } from './keys/types.js'
import type { GenerateKeyOptions } from './keys/types.js'
import type { KeygenConfig, RsaConfig } from './types.js'

/** Return the platform-appropriate default config directory. */
export function getDefaultConfigDir(): string {
  if (process.platform === 'win32') {
    const appData = process.env.APPDATA
    if (appData !== undefined) {
      return path.join(appData, 'pocket-rsa')
    }
    return path.join(os.homedir(), 'AppData', 'Roaming', 'pocket-rsa')
  }
  return path.join(os.homedir(), '.config', 'pocket-rsa')
}

/** Default configuration when no config file exists. */
export function defaultConfig(): RsaConfig {
  return {
    version: 1,
    keygen: { maxAttempts: DEFAULT_MAX_ATTEMPTS, requireDistinctPrimes: true },
  }
}

/**
 * Type guard for plain objects.
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Validates the keygen section, filling in defaults for absent fields.
 */
function validateKeygen(section: unknown): KeygenConfig {
  const defaults = defaultConfig().keygen
  if (section === undefined) {
    return defaults
  }
  if (!isObject(section)) {
    throw new ConfigError('Config keygen must be an object')
  }

  let maxAttempts = defaults.maxAttempts
  if (section.maxAttempts !== undefined) {
    const value = section.maxAttempts
    if (value !== null && (typeof value !== 'number' || !Number.isInteger(value) || value <= 0)) {
      throw new ConfigError('Config keygen.maxAttempts must be a positive integer or null')
    }
    maxAttempts = value
  }

  let requireDistinctPrimes = defaults.requireDistinctPrimes
  if (section.requireDistinctPrimes !== undefined) {
    if (typeof section.requireDistinctPrimes !== 'boolean') {
      throw new ConfigError('Config keygen.requireDistinctPrimes must be a boolean')
    }
    requireDistinctPrimes = section.requireDistinctPrimes
  }

  return { maxAttempts, requireDistinctPrimes }
}

/**
 * Validate an unknown value as an RsaConfig, throwing on invalid structure.
 */
export function validateConfig(config: unknown): RsaConfig {
  if (!isObject(config)) {
    throw new ConfigError('Config must be an object')
  }

  if (typeof config.version !== 'number' || config.version !== 1) {
    throw new ConfigError('Config version must be 1')
  }

  return {
    version: 1,
    keygen: validateKeygen(config.keygen),
  }
}

/**
 * Load the pocket-rsa config from disk, falling back to defaults if the file
 * does not exist.
 *
 * @param configDir - Directory containing config.json. Defaults to platform-appropriate path.
 */
export async function loadConfig(configDir?: string): Promise<RsaConfig> {
  const dir = configDir ?? getDefaultConfigDir()
  const configPath = path.join(dir, 'config.json')

  let raw: string
  try {
    raw = await fs.readFile(configPath, 'utf-8')
  } catch {
    return defaultConfig()
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    throw new ConfigError(`Failed to parse config file at ${configPath}`)
  }

  return validateConfig(parsed)
}

/**
 * Translate the keygen section into key generator options.
 * A `null` cap becomes `Infinity`.
 */
export function keygenOptions(config: RsaConfig): GenerateKeyOptions {
  return {
    maxAttempts: config.keygen.maxAttempts ?? Infinity,
    requireDistinctPrimes: config.keygen.requireDistinctPrimes,
  }
}
