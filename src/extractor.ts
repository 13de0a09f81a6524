import { promises as fs } from 'node:fs'
import path from 'node:path'
import { resolveConfig, type ExtractorConfig } from './config'
import { InputFileError } from './errors'
import { groupRecords, type GroupMap } from './grouping'
import { silentLogger, type Logger } from './logger'
import { renderJson, renderReport } from './report'
import { scanSource, type ScanStats } from './scanner'

export interface ExtractionResult {
  groups: GroupMap
  output: string
  stats: ScanStats & { groups: number }
}

export function extractMatchArms(
  source: string,
  config: ExtractorConfig = resolveConfig({}, {}),
  logger: Logger = silentLogger
): ExtractionResult {
  const { records, stats } = scanSource(source, {
    prefix: config.prefix,
    onMalformed: config.onMalformed,
    logger,
  })
  const groups = groupRecords(records)
  logger.debug(`scanned ${stats.lines} lines: ${stats.records} records, ${stats.skipped} skipped, ${groups.size} groups`)

  const output = config.format === 'json'
    ? renderJson(groups)
    : renderReport(groups, { separator: config.separator, body: config.body })

  return { groups, output, stats: { ...stats, groups: groups.size } }
}

export async function extractMatchArmsFromFile(
  filePath: string,
  config: ExtractorConfig = resolveConfig({}, {}),
  logger: Logger = silentLogger
): Promise<ExtractionResult> {
  const inputPath = path.resolve(filePath)
  let source: string
  try {
    source = await fs.readFile(inputPath, 'utf-8')
  } catch (error) {
    throw new InputFileError(inputPath, error)
  }
  logger.info(`Reading: ${inputPath}`)
  return extractMatchArms(source, config, logger)
}
