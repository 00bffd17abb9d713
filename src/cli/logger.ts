/**
 * CLI Logger
 *
 * Console output for the CLI. Library code never logs; it reports through
 * callbacks and the operation journal, and the commands print here.
 */

export interface Logger {
  log: (msg: string) => void
  verbose: (msg: string) => void
  success: (msg: string) => void
  warn: (msg: string) => void
  error: (msg: string) => void
  /** Redraws one status line on a terminal; prints nothing when piped */
  progress: (msg: string, current: number, total: number) => void
}

/** Where logger output goes; stderr carries warnings and errors */
export interface LoggerOutput {
  readonly stdout: { readonly isTTY?: boolean | undefined; write(chunk: string): unknown }
  readonly stderr: { write(chunk: string): unknown }
}

const BAR_WIDTH = 30

export function renderProgressBar(current: number, total: number): string {
  const ratio = total > 0 ? Math.min(1, current / total) : 1
  const filled = Math.round(ratio * BAR_WIDTH)
  return `[${'█'.repeat(filled)}${'░'.repeat(BAR_WIDTH - filled)}] ${current}/${total}`
}

export function createLogger(
  quiet: boolean,
  verbose: boolean,
  output: LoggerOutput = process
): Logger {
  const { stdout, stderr } = output
  let progressOpen = false

  // A pending progress line is ended before anything else is printed
  const closeProgress = (): void => {
    if (progressOpen) {
      stdout.write('\n')
      progressOpen = false
    }
  }
  const out = (line: string): void => {
    closeProgress()
    stdout.write(`${line}\n`)
  }
  const err = (line: string): void => {
    closeProgress()
    stderr.write(`${line}\n`)
  }

  return {
    log: (msg) => {
      if (!quiet) out(msg)
    },
    verbose: (msg) => {
      if (verbose) out(`  [debug] ${msg}`)
    },
    success: (msg) => {
      if (!quiet) out(`  ✓ ${msg}`)
    },
    warn: (msg) => {
      if (!quiet) err(`  ! ${msg}`)
    },
    error: (msg) => {
      err(`  ✗ ${msg}`)
    },
    progress: (msg, current, total) => {
      if (quiet || verbose || !stdout.isTTY) return
      stdout.write(`\r\x1b[2K  ${renderProgressBar(current, total)} ${msg}`)
      progressOpen = current < total
      if (!progressOpen) stdout.write('\n')
    }
  }
}
