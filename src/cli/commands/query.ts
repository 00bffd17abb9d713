/**
 * Query Command
 *
 * Ask a question against a store. The answer always goes to stdout, even
 * with --quiet; usage details are verbose output.
 */

import { formatMicrosAsDollars } from '../../costs/calculator'
import { InvalidArgumentError } from '../../errors'
import type { RagService } from '../../service'
import type { CLIArgs } from '../args'
import type { Logger } from '../logger'

export async function cmdQuery(args: CLIArgs, logger: Logger, service: RagService): Promise<void> {
  if (args.queryText === undefined) {
    throw new InvalidArgumentError('Missing question. Usage: notion-rag query [label] <text>')
  }

  const result = await service.query({
    text: args.queryText,
    label: args.label,
    model: args.model,
    source: 'cli'
  })

  if (args.json) {
    console.log(JSON.stringify(result, null, 2))
    return
  }

  console.log(result.answer)
  const { usage } = result
  logger.verbose(
    `${usage.model} on '${result.label}': ${usage.inputTokens} in / ${usage.outputTokens} out, ${formatMicrosAsDollars(usage.costMicros)}, ${result.elapsedMs}ms`
  )
}
