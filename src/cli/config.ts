/**
 * CLI Configuration
 *
 * Manages persistent settings stored in ~/.config/notion-rag/config.json (XDG standard).
 * Supports custom config file location via --config-file flag or NOTION_RAG_CONFIG env var.
 */

import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import { isPricedModel } from '../costs/calculator'
import { DEFAULT_MODELS } from '../costs/pricing'
import { ConfigError, InvalidArgumentError, UnknownModelError } from '../errors'
import type { AppConfig } from '../types/config'

/**
 * All persistable CLI settings.
 */
export interface Config {
  /** Data directory for the store registry and logs */
  dataDir?: string | undefined
  /** Default model for queries */
  queryModel?: string | undefined
  /** Model whose pricing applies to indexed tokens */
  embeddingModel?: string | undefined
  /** Model that describes images */
  visionModel?: string | undefined
  /** Incremental sync lookback in days */
  syncDays?: number | undefined
  /** Wait after uploads, in seconds */
  settleSeconds?: number | undefined
  /** Documents indexed in parallel */
  indexConcurrency?: number | undefined

  /** When settings were last updated */
  updatedAt?: string | undefined
}

/** Config keys that accept string values */
const STRING_KEYS = ['dataDir', 'queryModel', 'embeddingModel', 'visionModel'] as const
/** Config keys that accept number values */
const NUMBER_KEYS = ['syncDays', 'settleSeconds', 'indexConcurrency'] as const

type StringKey = (typeof STRING_KEYS)[number]
type NumberKey = (typeof NUMBER_KEYS)[number]

/** Valid config keys for type-safe access */
export type ConfigKey = StringKey | NumberKey

export const DEFAULT_SYNC_DAYS = 2
export const DEFAULT_SETTLE_SECONDS = 5
export const DEFAULT_INDEX_CONCURRENCY = 1

/** Descriptions for config keys (for help output) */
const CONFIG_DESCRIPTIONS: Record<ConfigKey, string> = {
  dataDir: 'Data directory (default: ~/.local/share/notion-rag)',
  queryModel: `Default query model (default: ${DEFAULT_MODELS.query})`,
  embeddingModel: `Embedding model for indexing cost (default: ${DEFAULT_MODELS.embedding})`,
  visionModel: `Image description model (default: ${DEFAULT_MODELS.vision})`,
  syncDays: `Days of edits an incremental sync looks back (default: ${DEFAULT_SYNC_DAYS})`,
  settleSeconds: `Seconds to wait after uploads (default: ${DEFAULT_SETTLE_SECONDS})`,
  indexConcurrency: `Documents indexed in parallel (default: ${DEFAULT_INDEX_CONCURRENCY})`
}

function isStringKey(key: ConfigKey): key is StringKey {
  return STRING_KEYS.some((k) => k === key)
}

/** Smallest accepted value per numeric key; all must be integers */
const NUMBER_MINIMUMS: Record<NumberKey, number> = {
  syncDays: 1,
  settleSeconds: 0,
  indexConcurrency: 1
}

/**
 * Get the type of a config key.
 */
export function getConfigType(key: ConfigKey): string {
  return isStringKey(key) ? 'string' : 'number'
}

/**
 * Get the description of a config key.
 */
export function getConfigDescription(key: ConfigKey): string {
  return CONFIG_DESCRIPTIONS[key]
}

/**
 * Get XDG config directory path for notion-rag.
 * Uses ~/.config/notion-rag on all platforms.
 */
function getDefaultConfigDir(): string {
  return join(homedir(), '.config', 'notion-rag')
}

/**
 * Get the config file path.
 * Priority: configFile arg > NOTION_RAG_CONFIG env var > default XDG path
 */
export function getConfigPath(configFile?: string): string {
  if (configFile) {
    return configFile
  }
  if (process.env.NOTION_RAG_CONFIG) {
    return process.env.NOTION_RAG_CONFIG
  }
  return join(getDefaultConfigDir(), 'config.json')
}

/**
 * Default data directory (XDG data home).
 */
export function getDefaultDataDir(): string {
  return join(homedir(), '.local', 'share', 'notion-rag')
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function checkNumber(key: NumberKey, value: number): number {
  if (!Number.isInteger(value) || value < NUMBER_MINIMUMS[key]) {
    throw new InvalidArgumentError(
      `${key} must be an integer of at least ${NUMBER_MINIMUMS[key]}, got ${value}`
    )
  }
  return value
}

/**
 * Validate parsed config JSON. Unknown keys are ignored.
 *
 * @throws ConfigError when a known key has the wrong type or range
 */
export function parseConfig(value: unknown, source: string): Config {
  if (!isObject(value)) {
    throw new ConfigError(`Invalid config at ${source}: expected a JSON object`)
  }

  const config: Config = {}
  for (const key of STRING_KEYS) {
    const field = value[key]
    if (field === undefined) continue
    if (typeof field !== 'string') {
      throw new ConfigError(`Invalid config at ${source}: ${key} must be a string`)
    }
    config[key] = field
  }
  for (const key of NUMBER_KEYS) {
    const field = value[key]
    if (field === undefined) continue
    if (typeof field !== 'number') {
      throw new ConfigError(`Invalid config at ${source}: ${key} must be a number`)
    }
    try {
      config[key] = checkNumber(key, field)
    } catch (error) {
      throw new ConfigError(
        `Invalid config at ${source}: ${error instanceof Error ? error.message : String(error)}`
      )
    }
  }
  if (typeof value['updatedAt'] === 'string') {
    config.updatedAt = value['updatedAt']
  }
  return config
}

/**
 * Load config from the config file.
 * Returns null if the file doesn't exist.
 *
 * @throws ConfigError when the file is not valid JSON or has invalid values
 */
export async function loadConfig(configFile?: string): Promise<Config | null> {
  const path = getConfigPath(configFile)
  if (!existsSync(path)) {
    return null
  }
  const content = await readFile(path, 'utf-8')
  let parsed: unknown
  try {
    parsed = JSON.parse(content)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigError(`Config file ${path} is not valid JSON: ${message}`)
  }
  return parseConfig(parsed, path)
}

/**
 * Save config to the config file.
 * Creates parent directories if needed.
 */
export async function saveConfig(config: Config, configFile?: string): Promise<void> {
  const path = getConfigPath(configFile)
  await mkdir(dirname(path), { recursive: true })
  const withTimestamp: Config = {
    ...config,
    updatedAt: new Date().toISOString()
  }
  await writeFile(path, JSON.stringify(withTimestamp, null, 2))
}

/**
 * Parse a string value into the appropriate type for a config key.
 * Model keys must name a priced model.
 */
export function parseConfigValue(key: ConfigKey, value: string): string | number {
  if (isStringKey(key)) {
    const trimmed = value.trim()
    if (!trimmed) {
      throw new InvalidArgumentError(`${key} must not be empty`)
    }
    if (key === 'embeddingModel' && !isPricedModel(trimmed, 'embedding')) {
      throw new UnknownModelError(trimmed)
    }
    if ((key === 'queryModel' || key === 'visionModel') && !isPricedModel(trimmed, 'generation')) {
      throw new UnknownModelError(trimmed)
    }
    return trimmed
  }
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(`${key} must be an integer, got '${value}'`)
  }
  return checkNumber(key, Number.parseInt(value, 10))
}

/**
 * Value used when a key is not set in the config file.
 */
export function getDefaultValue(key: ConfigKey): string | number {
  switch (key) {
    case 'dataDir':
      return getDefaultDataDir()
    case 'queryModel':
      return DEFAULT_MODELS.query
    case 'embeddingModel':
      return DEFAULT_MODELS.embedding
    case 'visionModel':
      return DEFAULT_MODELS.vision
    case 'syncDays':
      return DEFAULT_SYNC_DAYS
    case 'settleSeconds':
      return DEFAULT_SETTLE_SECONDS
    case 'indexConcurrency':
      return DEFAULT_INDEX_CONCURRENCY
  }
}

/**
 * Format a config value for display.
 */
export function formatConfigValue(value: unknown): string {
  return String(value)
}

/**
 * Check if a string is a valid config key.
 */
export function isValidConfigKey(key: string): key is ConfigKey {
  return STRING_KEYS.some((k) => k === key) || NUMBER_KEYS.some((k) => k === key)
}

/**
 * Get all valid config keys (sorted alphabetically).
 */
export function getValidConfigKeys(): ConfigKey[] {
  return [...STRING_KEYS, ...NUMBER_KEYS].sort()
}

/**
 * Set a single config value and save.
 */
export async function setConfigValue(
  key: ConfigKey,
  value: string | number,
  configFile?: string
): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  const next = parseConfig({ ...config, [key]: value }, getConfigPath(configFile))
  await saveConfig(next, configFile)
}

/**
 * Unset (remove) a config value and save.
 */
export async function unsetConfigValue(key: ConfigKey, configFile?: string): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  delete config[key]
  await saveConfig(config, configFile)
}

export interface AppConfigOverrides {
  readonly configFile?: string | undefined
  readonly dataDir?: string | undefined
}

/**
 * Resolve the settings for this process.
 * Data directory priority: --data-dir > NOTION_RAG_DATA_DIR > config dataDir > XDG default.
 */
export async function loadAppConfig(
  overrides: AppConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<AppConfig> {
  const config = (await loadConfig(overrides.configFile)) ?? {}
  return Object.freeze({
    dataDir:
      overrides.dataDir || env['NOTION_RAG_DATA_DIR'] || config.dataDir || getDefaultDataDir(),
    queryModel: config.queryModel ?? DEFAULT_MODELS.query,
    embeddingModel: config.embeddingModel ?? DEFAULT_MODELS.embedding,
    visionModel: config.visionModel ?? DEFAULT_MODELS.vision,
    syncDays: config.syncDays ?? DEFAULT_SYNC_DAYS,
    settleSeconds: config.settleSeconds ?? DEFAULT_SETTLE_SECONDS,
    indexConcurrency: config.indexConcurrency ?? DEFAULT_INDEX_CONCURRENCY
  })
}
