/**
 * Billing Command
 *
 * Summarize the cost ledger. Reads local files only, so no credentials are needed.
 */

import { aggregateCosts } from '../../ledger/billing'
import { CostLedger } from '../../ledger/cost-ledger'
import type { AppConfig } from '../../types/config'
import type { CLIArgs } from '../args'
import { formatBillingSummary } from '../format'
import type { Logger } from '../logger'

export async function cmdBilling(args: CLIArgs, logger: Logger, config: AppConfig): Promise<void> {
  const ledger = new CostLedger(config.dataDir)
  const summary = aggregateCosts(await ledger.readAll(), args.billingPeriod)
  if (args.json) {
    console.log(JSON.stringify(summary, null, 2))
    return
  }
  for (const line of formatBillingSummary(summary)) {
    logger.log(line)
  }
}
