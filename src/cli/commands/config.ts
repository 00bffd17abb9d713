/**
 * Config Command
 *
 * Show and edit the settings in ~/.config/notion-rag/config.json. Listing
 * shows every key: its stored value, or its default when unset.
 */

import { InvalidArgumentError } from '../../errors'
import type { CLIArgs } from '../args'
import {
  type Config,
  type ConfigKey,
  formatConfigValue,
  getConfigPath,
  getDefaultValue,
  getValidConfigKeys,
  isValidConfigKey,
  loadConfig,
  parseConfigValue,
  setConfigValue,
  unsetConfigValue
} from '../config'
import type { Logger } from '../logger'

export async function cmdConfig(args: CLIArgs, logger: Logger): Promise<void> {
  const { configFile } = args
  const config = (await loadConfig(configFile)) ?? {}

  switch (args.configAction) {
    case 'list':
      logger.log(`Config file: ${getConfigPath(configFile)}`)
      for (const key of getValidConfigKeys()) {
        logger.log(`  ${describeSetting(config, key)}`)
      }
      return

    case 'get': {
      const key = requireKey(args.configKey, 'get <key>')
      console.log(formatConfigValue(config[key] ?? getDefaultValue(key)))
      return
    }

    case 'set': {
      const key = requireKey(args.configKey, 'set <key> <value>')
      if (args.configValue === undefined) {
        throw new InvalidArgumentError('Missing value. Usage: notion-rag config set <key> <value>')
      }
      const value = parseConfigValue(key, args.configValue)
      await setConfigValue(key, value, configFile)
      logger.success(`${key} = ${formatConfigValue(value)}`)
      return
    }

    case 'unset': {
      const key = requireKey(args.configKey, 'unset <key>')
      await unsetConfigValue(key, configFile)
      logger.success(`${key} reset to ${formatConfigValue(getDefaultValue(key))}`)
      return
    }
  }
}

function describeSetting(config: Config, key: ConfigKey): string {
  const stored = config[key]
  return stored === undefined
    ? `${key}: ${formatConfigValue(getDefaultValue(key))} (default)`
    : `${key}: ${formatConfigValue(stored)}`
}

function requireKey(key: string | undefined, usage: string): ConfigKey {
  if (!key) {
    throw new InvalidArgumentError(`Missing key. Usage: notion-rag config ${usage}`)
  }
  if (!isValidConfigKey(key)) {
    throw new InvalidArgumentError(
      `Unknown config key '${key}'. Valid keys: ${getValidConfigKeys().join(', ')}`
    )
  }
  return key
}
