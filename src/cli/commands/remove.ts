/**
 * Remove Command
 */

import { InvalidArgumentError } from '../../errors'
import type { RagService } from '../../service'
import type { CLIArgs } from '../args'
import type { Logger } from '../logger'

export async function cmdRemove(args: CLIArgs, logger: Logger, service: RagService): Promise<void> {
  if (args.documentId === undefined) {
    throw new InvalidArgumentError('Missing page ID. Usage: notion-rag remove [label] <pageId>')
  }

  const result = await service.removeDocument(args.label, args.documentId)
  for (const name of result.removed) {
    logger.verbose(`Deleted ${name}`)
  }
  logger.success(`Removed ${result.documentId} from '${result.label}'`)
}
