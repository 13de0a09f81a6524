import { DEFAULT_EXTRACTOR_CONFIG } from './config'
import type { GroupMap } from './grouping'

export interface ReportOptions {
  separator: string
  // arm body template; `{key}` and `{lower}` expand to the group key
  body: string
}

export const DEFAULT_REPORT_OPTIONS: ReportOptions = {
  separator: DEFAULT_EXTRACTOR_CONFIG.separator,
  body: DEFAULT_EXTRACTOR_CONFIG.body,
}

export function expandBody(template: string, key: string): string {
  return template.replace(/\{(key|lower)\}/g, (_match, name: string) => (name === 'lower' ? key.toLowerCase() : key))
}

export function renderGroup(key: string, values: readonly string[], options: ReportOptions = DEFAULT_REPORT_OPTIONS): string {
  return `// ${key}\n${values.join(options.separator)} => ${expandBody(options.body, key)},\n\n`
}

export function renderReport(groups: GroupMap, options: ReportOptions = DEFAULT_REPORT_OPTIONS): string {
  let out = ''
  for (const [key, values] of groups) {
    out += renderGroup(key, values, options)
  }
  return out
}

export function renderJson(groups: GroupMap): string {
  return JSON.stringify(Object.fromEntries(groups), null, 2) + '\n'
}
