/**
 * Query Gateway
 *
 * Resolves the store, asks the provider, prices the answer's token usage and
 * appends one `query` cost record before returning.
 */

import { createCompletionCostRecord, isPricedModel } from '../costs/calculator'
import type { CostSink } from '../costs/types'
import { InvalidArgumentError, StoreEmptyError, UnknownModelError } from '../errors'
import type { StoreRegistry } from '../registry/store-registry'
import type { VectorStoreProvider } from '../types/providers'
import type { QueryRequest, QueryResult } from '../types/sync'

export interface QueryGatewayOptions {
  readonly registry: StoreRegistry
  readonly vectorStore: VectorStoreProvider
  readonly ledger: CostSink
  readonly defaultModel: string
  /** Monotonic milliseconds, for elapsed time */
  readonly clock?: (() => number) | undefined
}

export class QueryGateway {
  private readonly options: QueryGatewayOptions
  private readonly clock: () => number

  constructor(options: QueryGatewayOptions) {
    this.options = options
    this.clock = options.clock ?? (() => performance.now())
  }

  /**
   * @throws InvalidArgumentError for empty text
   * @throws UnknownModelError when the model has no pricing
   * @throws StoreEmptyError when the store holds no documents
   * @throws ProviderQuotaError when the provider is rate limited
   */
  async query(request: QueryRequest): Promise<QueryResult> {
    const { registry, vectorStore, ledger, defaultModel } = this.options

    const text = request.text.trim()
    if (!text) {
      throw new InvalidArgumentError('Query text must not be empty')
    }
    const model = request.model ?? defaultModel
    if (!isPricedModel(model, 'generation')) {
      throw new UnknownModelError(model)
    }

    const registration = await registry.resolve(request.label)
    const documents = await vectorStore.listDocuments(registration.storeHandle)
    if (documents.length === 0) {
      throw new StoreEmptyError(registration.label)
    }

    const started = this.clock()
    const answer = await vectorStore.query(registration.storeHandle, text, model)
    const elapsedMs = Math.round(this.clock() - started)

    const record = createCompletionCostRecord('query', model, answer.usage, {
      label: registration.label,
      elapsedMs,
      source: request.source ?? 'cli'
    })
    await ledger.record(record)

    return {
      answer: answer.answer,
      label: registration.label,
      grounding: answer.grounding,
      usage: {
        model,
        inputTokens: answer.usage.inputTokens,
        outputTokens: answer.usage.outputTokens,
        costMicros: record.costMicros
      },
      elapsedMs
    }
  }
}
