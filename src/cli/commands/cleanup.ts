/**
 * Cleanup Command
 */

import type { RagService } from '../../service'
import type { CLIArgs } from '../args'
import type { Logger } from '../logger'

export async function cmdCleanup(args: CLIArgs, logger: Logger, service: RagService): Promise<void> {
  const result = await service.cleanup(args.label)
  if (!result.storeDeleted) {
    logger.log(`Store ${result.storeHandle} was already gone`)
  }
  logger.success(`Deleted '${result.label}' (${result.collectionId})`)
}
