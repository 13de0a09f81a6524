/**
 * Configuration for the opcode match-arm extractor.
 * Defaults reproduce the hand-run helper: read `opcodes.rs`, pick `OpCode::new`
 * records, print `a | b => {},` arms.
 */

import { ConfigError } from './errors'

export const OUTPUT_FORMATS = ['arms', 'json'] as const
export type OutputFormat = (typeof OUTPUT_FORMATS)[number]

// What to do with a prefixed line that lacks the value and key fields
export const MALFORMED_POLICIES = ['abort', 'skip', 'warn'] as const
export type MalformedLinePolicy = (typeof MALFORMED_POLICIES)[number]

export interface ExtractorConfig {
  input: string
  prefix: string
  separator: string
  body: string
  format: OutputFormat
  onMalformed: MalformedLinePolicy
}

export const DEFAULT_EXTRACTOR_CONFIG: Readonly<ExtractorConfig> = Object.freeze({
  input: 'opcodes.rs',
  prefix: 'OpCode::new',
  separator: ' | ',
  body: '{}',
  format: 'arms',
  onMalformed: 'abort',
})

export type Env = Record<string, string | undefined>

function isOneOf<T extends string>(allowed: readonly T[], value: string): value is T {
  return allowed.some(candidate => candidate === value)
}

export function parseOutputFormat(value: string, option = 'format'): OutputFormat {
  if (!isOneOf(OUTPUT_FORMATS, value)) throw new ConfigError(option, value, `one of: ${OUTPUT_FORMATS.join(', ')}`)
  return value
}

export function parseMalformedPolicy(value: string, option = 'onMalformed'): MalformedLinePolicy {
  if (!isOneOf(MALFORMED_POLICIES, value)) throw new ConfigError(option, value, `one of: ${MALFORMED_POLICIES.join(', ')}`)
  return value
}

export function configFromEnv(env: Env): Partial<ExtractorConfig> {
  const config: Partial<ExtractorConfig> = {}
  if (env.OPCODE_ARMS_INPUT) config.input = env.OPCODE_ARMS_INPUT
  if (env.OPCODE_ARMS_PREFIX) config.prefix = env.OPCODE_ARMS_PREFIX
  if (env.OPCODE_ARMS_BODY) config.body = env.OPCODE_ARMS_BODY
  if (env.OPCODE_ARMS_FORMAT) config.format = parseOutputFormat(env.OPCODE_ARMS_FORMAT, 'OPCODE_ARMS_FORMAT')
  if (env.OPCODE_ARMS_ON_MALFORMED) {
    config.onMalformed = parseMalformedPolicy(env.OPCODE_ARMS_ON_MALFORMED, 'OPCODE_ARMS_ON_MALFORMED')
  }
  return config
}

// defaults < environment < explicit overrides
export function resolveConfig(overrides: Partial<ExtractorConfig> = {}, env: Env = process.env): ExtractorConfig {
  const explicit: Partial<ExtractorConfig> = {}
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(explicit, { [key]: value })
  }
  const config: ExtractorConfig = { ...DEFAULT_EXTRACTOR_CONFIG, ...configFromEnv(env), ...explicit }
  if (config.prefix.length === 0) throw new ConfigError('prefix', config.prefix, 'a non-empty string')
  return config
}
