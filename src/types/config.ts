/**
 * Application Configuration
 */

/** Settings resolved once per process and handed to the service */
export interface AppConfig {
  /** Directory holding stores.json and the logs/ tree */
  readonly dataDir: string
  readonly queryModel: string
  readonly embeddingModel: string
  readonly visionModel: string
  /** Lookback window of an incremental sync, in days */
  readonly syncDays: number
  /** Wait after uploads before an operation returns, in seconds */
  readonly settleSeconds: number
  /** Documents indexed in parallel during init/sync */
  readonly indexConcurrency: number
}

/** Credentials read from the environment */
export interface Secrets {
  readonly notionToken: string
  readonly geminiApiKey: string
}
