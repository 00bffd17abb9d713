/**
 * Init Command
 *
 * Register a Notion database under a label (first run) and index every page.
 */

import type { RagService } from '../../service'
import type { CLIArgs } from '../args'
import { formatInitResult, formatProgress } from '../format'
import type { Logger } from '../logger'

export async function cmdInit(
  args: CLIArgs,
  logger: Logger,
  service: RagService,
  signal?: AbortSignal
): Promise<void> {
  logger.log(
    args.collectionUrl
      ? `Indexing ${args.collectionUrl} into '${args.label ?? ''}'...`
      : `Re-indexing ${args.label ? `'${args.label}'` : 'the registered store'}...`
  )

  const result = await service.init({
    label: args.label,
    collectionUrl: args.collectionUrl,
    signal,
    onDocument: (info) => {
      logger.progress(info.title, info.index, info.total)
      logger.verbose(formatProgress(info))
    }
  })

  for (const line of formatInitResult(result)) {
    logger.log(line)
  }
  if (result.pagesFailed > 0) {
    logger.warn(`${result.pagesFailed} page(s) failed; run \`notion-rag sync --force\` to retry them`)
  } else if (!result.cancelled) {
    logger.success(`${result.pagesIndexed} pages indexed`)
  }
}
