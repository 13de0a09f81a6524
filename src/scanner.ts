import type { MalformedLinePolicy } from './config'
import { MalformedLineError } from './errors'
import { silentLogger, type Logger } from './logger'

export interface OpcodeRecord {
  // first field, verbatim
  value: string
  // second field before key cleaning
  key: string
  // 1-based
  line: number
}

export interface ScanStats {
  lines: number
  records: number
  skipped: number
}

export interface ScanOptions {
  prefix: string
  onMalformed: MalformedLinePolicy
  logger?: Logger
}

/**
 * Extract the value/key pair from one source line.
 *
 * A line is a record when, once trimmed, it starts with `prefix`. The prefix and
 * the character after it (the opening parenthesis) are dropped and the rest is
 * split on commas; fields past the second are ignored.
 */
export function scanLine(line: string, lineNumber: number, prefix: string): OpcodeRecord | null {
  const text = line.trim()
  if (!text.startsWith(prefix)) return null

  const fields = text.slice(prefix.length + 1).split(',')
  if (fields.length < 2) throw new MalformedLineError(lineNumber, text)

  const [value, key] = fields
  return { value, key, line: lineNumber }
}

export function scanSource(source: string, options: ScanOptions): { records: OpcodeRecord[]; stats: ScanStats } {
  const logger = options.logger ?? silentLogger
  const lines = source.split(/\r\n|\r|\n/)
  // a final line break does not start another line
  if (lines[lines.length - 1] === '') lines.pop()
  const records: OpcodeRecord[] = []
  let skipped = 0

  lines.forEach((line, index) => {
    let record: OpcodeRecord | null
    try {
      record = scanLine(line, index + 1, options.prefix)
    } catch (error) {
      if (!(error instanceof MalformedLineError) || options.onMalformed === 'abort') throw error
      skipped++
      if (options.onMalformed === 'warn') logger.warn(error.message)
      return
    }
    if (record) records.push(record)
  })

  return { records, stats: { lines: lines.length, records: records.length, skipped } }
}
