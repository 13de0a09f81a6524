export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
}

export interface LoggerOptions {
  verbose?: boolean
  // Defaults to console.error: stdout is reserved for the generated arms.
  sink?: (line: string) => void
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? ((line: string) => console.error(line))
  const verbose = options.verbose === true
  return {
    debug(message) {
      if (verbose) sink(`[debug] ${message}`)
    },
    info(message) {
      if (verbose) sink(message)
    },
    warn(message) {
      sink(`warning: ${message}`)
    },
  }
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
}
