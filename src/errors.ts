/**
 * Error types raised while extracting match arms.
 */
export class ExtractorError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ExtractorError'
  }
}

/**
 * A line carries the record prefix but not the two fields that follow it.
 */
export class MalformedLineError extends ExtractorError {
  constructor(readonly lineNumber: number, readonly text: string) {
    super(`Malformed record on line ${lineNumber}: expected at least two fields in '${text}'`)
    this.name = 'MalformedLineError'
  }
}

export class InputFileError extends ExtractorError {
  constructor(readonly filePath: string, readonly reason: unknown) {
    super(`Cannot read input file ${filePath}: ${reason instanceof Error ? reason.message : String(reason)}`)
    this.name = 'InputFileError'
  }
}

export class OutputFileError extends ExtractorError {
  constructor(readonly filePath: string, readonly reason: unknown) {
    super(`Cannot write output file ${filePath}: ${reason instanceof Error ? reason.message : String(reason)}`)
    this.name = 'OutputFileError'
  }
}

export class ConfigError extends ExtractorError {
  constructor(readonly option: string, readonly value: string, expected: string) {
    super(`Invalid value '${value}' for ${option} (expected ${expected})`)
    this.name = 'ConfigError'
  }
}
