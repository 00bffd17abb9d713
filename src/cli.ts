#!/usr/bin/env node
/**
 * notion-rag CLI
 *
 * Thin shell over RagService: resolves config and credentials, runs one
 * command and maps errors to a non-zero exit.
 *
 * @license AGPL-3.0
 */

import { type CLIArgs, parseCliArgs } from './cli/args'
import { cmdBilling } from './cli/commands/billing'
import { cmdCleanup } from './cli/commands/cleanup'
import { cmdConfig } from './cli/commands/config'
import { cmdInit } from './cli/commands/init'
import { cmdList } from './cli/commands/list'
import { cmdQuery } from './cli/commands/query'
import { cmdRemove } from './cli/commands/remove'
import { cmdSync } from './cli/commands/sync'
import { loadAppConfig } from './cli/config'
import { createLogger, type Logger } from './cli/logger'
import { createRagService, type RagService, readSecrets } from './service'

async function createService(args: CLIArgs): Promise<RagService> {
  const config = await loadAppConfig({ configFile: args.configFile, dataDir: args.dataDir })
  return createRagService(config, readSecrets())
}

async function run(args: CLIArgs, logger: Logger, signal: AbortSignal): Promise<void> {
  switch (args.command) {
    case 'config':
      await cmdConfig(args, logger)
      break

    case 'billing':
      await cmdBilling(
        args,
        logger,
        await loadAppConfig({ configFile: args.configFile, dataDir: args.dataDir })
      )
      break

    case 'init':
      await cmdInit(args, logger, await createService(args), signal)
      break

    case 'sync':
      await cmdSync(args, logger, await createService(args), signal)
      break

    case 'query':
      await cmdQuery(args, logger, await createService(args))
      break

    case 'list':
      await cmdList(args, logger, await createService(args))
      break

    case 'remove':
      await cmdRemove(args, logger, await createService(args))
      break

    case 'cleanup':
      await cmdCleanup(args, logger, await createService(args))
      break

    default:
      logger.error(`Unknown command: ${args.command}. Run 'notion-rag --help' for usage.`)
      process.exit(1)
  }
}

async function main(): Promise<void> {
  const args = parseCliArgs()
  const logger = createLogger(args.quiet, args.verbose)

  // First Ctrl-C stops scheduling new pages; a second one exits
  const controller = new AbortController()
  process.on('SIGINT', () => {
    if (controller.signal.aborted) process.exit(130)
    logger.log('\nStopping after in-flight pages finish...')
    controller.abort()
  })

  try {
    await run(args, logger, controller.signal)
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error)
    logger.error(msg)
    if (args.verbose && error instanceof Error && error.stack) {
      console.error(error.stack)
    }
    process.exit(1)
  }
}

main().catch((error: unknown) => {
  console.error(error)
  process.exit(1)
})
