/**
 * List Command
 *
 * Without a label: every registered store. With one: that store's documents.
 */

import type { RagService } from '../../service'
import type { CLIArgs } from '../args'
import { formatDocumentTable, formatStoreTable } from '../format'
import type { Logger } from '../logger'

export async function cmdList(args: CLIArgs, logger: Logger, service: RagService): Promise<void> {
  if (args.label === undefined) {
    const stores = await service.listStores()
    if (args.json) {
      console.log(JSON.stringify(stores, null, 2))
      return
    }
    for (const line of formatStoreTable(stores)) {
      logger.log(line)
    }
    return
  }

  const documents = await service.listDocuments(args.label)
  if (args.json) {
    console.log(JSON.stringify(documents, null, 2))
    return
  }
  for (const line of formatDocumentTable(documents)) {
    logger.log(line)
  }
}
