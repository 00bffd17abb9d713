/**
 * CLI Argument Parsing
 *
 * Uses commander for subcommand-based CLI with per-command options.
 */

import { Command } from 'commander'
import type { BillingPeriod } from '../costs/types'
import { VERSION } from '../index'
import { getConfigDescription, getConfigType, getValidConfigKeys } from './config'

export type ConfigAction = 'list' | 'get' | 'set' | 'unset'

export interface CLIArgs {
  command: string
  /** Store label; undefined means "the only registered one" */
  label: string | undefined
  /** Notion database URL or ID (init) */
  collectionUrl: string | undefined
  /** Question text (query) */
  queryText: string | undefined
  /** Page ID or URL (remove) */
  documentId: string | undefined
  force: boolean
  model: string | undefined
  billingPeriod: BillingPeriod
  json: boolean
  quiet: boolean
  verbose: boolean
  dataDir: string | undefined
  configFile: string | undefined
  /** For config command: action (list, get, set, unset) */
  configAction: ConfigAction
  /** For config command: key name */
  configKey: string | undefined
  /** For config command: value to set */
  configValue: string | undefined
}

const DESCRIPTION = `Index Notion databases into Gemini File Search stores, keep them in sync
and query them, with every metered call recorded to a local cost ledger.

Requires NOTION_TOKEN and GEMINI_API_KEY in the environment.

Examples:
  $ notion-rag init docs https://www.notion.so/team/0123456789abcdef0123456789abcdef
  $ notion-rag sync
  $ notion-rag query "How do we deploy?"
  $ notion-rag billing --monthly`

function createProgram(): Command {
  const program = new Command()
    .name('notion-rag')
    .description(DESCRIPTION)
    .version(VERSION, '-V, --version', 'Show version number')
    // Global options inherited by all subcommands
    .option('-q, --quiet', 'Minimal output')
    .option('-v, --verbose', 'Verbose output')
    .option('--data-dir <dir>', 'Data directory (or set NOTION_RAG_DATA_DIR)')
    .option('--config-file <path>', 'Config file path (or set NOTION_RAG_CONFIG)')

  // ============ INIT ============
  program
    .command('init')
    .description('Register a database (first time) and index all of its pages')
    .argument('[label]', 'Store label (auto-detected if omitted)')
    .argument('[url]', 'Notion database URL or ID (first-time registration)')

  // ============ SYNC ============
  program
    .command('sync')
    .description('Re-index pages edited within the sync window')
    .argument('[label]', 'Store label (auto-detected if omitted)')
    .option('--force', 'Re-index every page in the window regardless of edit time')

  // ============ QUERY ============
  program
    .command('query')
    .description('Ask a question against a store')
    .argument('<labelOrText>', 'Store label, or the question when only one argument is given')
    .argument('[text]', 'Question (when a label is given)')
    .option('--model <model>', 'Model to answer with (default: config queryModel)')
    .option('--json', 'Print the result as JSON')

  // ============ LIST ============
  program
    .command('list')
    .description('List registered stores, or the documents of one store')
    .argument('[label]', 'Store label')
    .option('--json', 'Print the result as JSON')

  // ============ REMOVE ============
  program
    .command('remove')
    .description('Remove one page from a store')
    .argument('<labelOrPageId>', 'Store label, or the page ID when only one argument is given')
    .argument('[pageId]', 'Page ID or URL (when a label is given)')

  // ============ CLEANUP ============
  program
    .command('cleanup')
    .description('Delete a store with all its documents and forget its label')
    .argument('[label]', 'Store label (auto-detected if omitted)')

  // ============ BILLING ============
  program
    .command('billing')
    .description('Summarize recorded costs')
    .option('--daily', 'Break down by UTC day')
    .option('--monthly', 'Break down by UTC month')
    .option('--json', 'Print the result as JSON')

  // ============ CONFIG ============
  const configKeys = getValidConfigKeys()
  const maxLen = Math.max(...configKeys.map((k) => `${k} (${getConfigType(k)})`.length))
  const settingsHelp = configKeys
    .map((key) => {
      const label = `${key} (${getConfigType(key)})`
      return `  ${label.padEnd(maxLen)}  ${getConfigDescription(key)}`
    })
    .join('\n')
  program
    .command('config')
    .description('Manage persistent settings')
    .argument('[action]', 'Action: list (default), get, set, unset')
    .argument('[key]', 'Config key to get/set/unset')
    .argument('[value]', 'Value to set')
    .addHelpText(
      'after',
      `
Available settings:
${settingsHelp}

Examples:
  notion-rag config                              List all settings with defaults
  notion-rag config get syncDays
  notion-rag config set queryModel gemini-2.5-pro
  notion-rag config set syncDays 7
  notion-rag config unset dataDir`
    )

  return program
}

function parseBillingPeriod(opts: Record<string, unknown>): BillingPeriod {
  if (opts['monthly'] === true) return 'monthly'
  if (opts['daily'] === true) return 'daily'
  return 'total'
}

function buildCLIArgs(commandName: string, opts: Record<string, unknown>): CLIArgs {
  return {
    command: commandName,
    label: undefined,
    collectionUrl: undefined,
    queryText: undefined,
    documentId: undefined,
    force: opts['force'] === true,
    model: typeof opts['model'] === 'string' ? opts['model'] : undefined,
    billingPeriod: parseBillingPeriod(opts),
    json: opts['json'] === true,
    quiet: opts['quiet'] === true,
    verbose: opts['verbose'] === true,
    dataDir: typeof opts['dataDir'] === 'string' ? opts['dataDir'] : undefined,
    configFile: typeof opts['configFile'] === 'string' ? opts['configFile'] : undefined,
    configAction: 'list',
    configKey: undefined,
    configValue: undefined
  }
}

function parseConfigAction(action: string | undefined): ConfigAction {
  if (action === 'get' || action === 'set' || action === 'unset') {
    return action
  }
  return 'list'
}

/**
 * Positional arguments for each command, keyed by command name.
 * `<labelOrX> [y]` means a label only when both are given.
 */
function positionalArgs(
  name: string,
  first: string | undefined,
  second: string | undefined,
  third: string | undefined
): Partial<CLIArgs> {
  switch (name) {
    case 'init':
      return { label: first, collectionUrl: second }
    case 'query':
      return second === undefined ? { queryText: first } : { label: first, queryText: second }
    case 'remove':
      return second === undefined ? { documentId: first } : { label: first, documentId: second }
    case 'sync':
    case 'list':
    case 'cleanup':
      return { label: first }
    case 'config':
      return { configAction: parseConfigAction(first), configKey: second, configValue: third }
    default:
      return {}
  }
}

/**
 * Attach action handlers that capture parsed args.
 * Uses optsWithGlobals() to include global options from the parent program.
 */
function captureArgs(program: Command): () => CLIArgs | null {
  let result: CLIArgs | null = null

  for (const cmd of program.commands) {
    cmd.action((...values: unknown[]) => {
      const [first, second, third] = values.map((v) => (typeof v === 'string' ? v : undefined))
      result = {
        ...buildCLIArgs(cmd.name(), cmd.optsWithGlobals()),
        ...positionalArgs(cmd.name(), first, second, third)
      }
    })
  }

  return () => result
}

/**
 * Parse CLI arguments and return structured args.
 * Exits on --help or --version.
 */
export function parseCliArgs(): CLIArgs {
  const program: Command = createProgram()
  const captured = captureArgs(program)

  program.parse()

  const result = captured()
  if (!result) {
    program.help()
  }
  return result
}

/**
 * Parse CLI arguments from an argv array (for testing).
 */
export function parseArgs(argv: string[], exitOnHelp = true): CLIArgs {
  const program = createProgram()
  const captured = captureArgs(program)

  if (!exitOnHelp) {
    // Subcommands already exist, so they do not inherit these settings
    for (const cmd of [program, ...program.commands]) {
      cmd.exitOverride()
      cmd.configureOutput({ writeOut: () => {}, writeErr: () => {} })
    }
  }

  try {
    program.parse(argv, { from: 'user' })
  } catch (error) {
    // exitOverride throws on help, version and usage errors
    if (exitOnHelp) throw error
  }

  return captured() ?? buildCLIArgs('help', {})
}
