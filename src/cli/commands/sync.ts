/**
 * Sync Command
 */

import type { RagService } from '../../service'
import type { CLIArgs } from '../args'
import { formatProgress, formatSyncResult } from '../format'
import type { Logger } from '../logger'

export async function cmdSync(
  args: CLIArgs,
  logger: Logger,
  service: RagService,
  signal?: AbortSignal
): Promise<void> {
  logger.verbose(`Looking back ${service.config.syncDays} day(s)${args.force ? ', forced' : ''}`)

  const result = await service.sync({
    label: args.label,
    force: args.force,
    signal,
    onDocument: (info) => {
      logger.progress(info.title, info.index, info.total)
      logger.verbose(formatProgress(info))
      for (const image of info.outcome?.omittedImages ?? []) {
        logger.verbose(`  image omitted (${image.reason}): ${image.url}`)
      }
    }
  })

  for (const line of formatSyncResult(result)) {
    logger.log(line)
  }
  if (result.pagesFailed > 0) {
    logger.warn(`${result.pagesFailed} page(s) failed; they will be retried by \`sync --force\``)
  }
}
