#!/usr/bin/env node

/**
 * Command line interface: print match-arm skeletons grouped by mnemonic
 */

import { promises as fs } from 'node:fs'
import path from 'node:path'
import { parseMalformedPolicy, parseOutputFormat, resolveConfig, type Env, type ExtractorConfig } from './config'
import { ExtractorError, OutputFileError } from './errors'
import { extractMatchArmsFromFile } from './extractor'
import { createLogger } from './logger'

export interface CLIOptions extends Partial<ExtractorConfig> {
  output?: string
  verbose?: boolean
  help?: boolean
}

export interface ParsedArgs {
  options: CLIOptions
  // options we did not recognise; reported and ignored
  unknown: string[]
}

export interface CLIIO {
  stdout: (text: string) => void
  stderr: (line: string) => void
  env?: Env
}

export const USAGE = [
  'Usage: opcode-arms [input] [options]',
  'Options:',
  '  -o, --output <file>          Write the arms to a file instead of stdout',
  '  --prefix <text>              Record prefix (default: OpCode::new)',
  '  --body <template>            Arm body; {key} and {lower} expand to the mnemonic (default: {})',
  '  --separator <text>           Separator between opcode values (default: " | ")',
  '  --format <arms|json>         Output format (default: arms)',
  '  --json                       Same as --format json',
  '  --on-malformed <policy>      abort, skip or warn on a record with missing fields (default: abort)',
  '  -v, --verbose                Print scan statistics on stderr',
  '  -h, --help                   Show this help',
].join('\n')

function takeValue(args: string[], i: number, flag: string): string {
  const value = args[i + 1]
  if (value === undefined) throw new ExtractorError(`Missing value for ${flag}`)
  return value
}

export function parseArgs(args: string[]): ParsedArgs {
  const options: CLIOptions = {}
  const unknown: string[] = []

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    switch (arg) {
      case '-o':
      case '--output':
        options.output = takeValue(args, i++, arg)
        break
      case '--prefix':
        options.prefix = takeValue(args, i++, arg)
        break
      case '--body':
        options.body = takeValue(args, i++, arg)
        break
      case '--separator':
        options.separator = takeValue(args, i++, arg)
        break
      case '--format':
        options.format = parseOutputFormat(takeValue(args, i++, arg), arg)
        break
      case '--json':
        options.format = 'json'
        break
      case '--on-malformed':
        options.onMalformed = parseMalformedPolicy(takeValue(args, i++, arg), arg)
        break
      case '-v':
      case '--verbose':
        options.verbose = true
        break
      case '-h':
      case '--help':
        options.help = true
        break
      default:
        if (arg.startsWith('-') || options.input !== undefined) {
          unknown.push(arg)
        } else {
          options.input = arg
        }
    }
  }

  return { options, unknown }
}

export async function runCli(args: string[], io: CLIIO): Promise<number> {
  try {
    const { options, unknown } = parseArgs(args)
    if (options.help) {
      io.stdout(USAGE + '\n')
      return 0
    }
    const logger = createLogger({ sink: io.stderr, verbose: options.verbose })
    for (const arg of unknown) logger.warn(`Unknown option: ${arg}`)

    const config = resolveConfig({
      input: options.input,
      prefix: options.prefix,
      separator: options.separator,
      body: options.body,
      format: options.format,
      onMalformed: options.onMalformed,
    }, io.env ?? process.env)

    const result = await extractMatchArmsFromFile(config.input, config, logger)
    logger.info(`${result.stats.records} records in ${result.stats.groups} groups`)

    if (options.output) {
      const outputPath = path.resolve(options.output)
      try {
        await fs.writeFile(outputPath, result.output, 'utf-8')
      } catch (error) {
        throw new OutputFileError(outputPath, error)
      }
      logger.info(`Arms written to: ${outputPath}`)
    } else {
      io.stdout(result.output)
    }
    return 0
  } catch (error) {
    if (error instanceof ExtractorError) {
      io.stderr(`${error.name}: ${error.message}`)
      return 1
    }
    throw error
  }
}

// Run CLI
if (require.main === module) {
  runCli(process.argv.slice(2), {
    stdout: text => process.stdout.write(text),
    stderr: line => console.error(line),
  })
    .then(code => {
      process.exitCode = code
    })
    .catch(error => {
      console.error('CLI Error:', error)
      process.exit(1)
    })
}
