import type { OpcodeRecord } from './scanner'

// mnemonic -> opcode values, both in first-seen order
export type GroupMap = Map<string, string[]>

const KEY_TRIM = /^[ "]+|[ "]+$/g

/** Strip surrounding spaces and double quotes, nothing else. */
export function cleanGroupKey(raw: string): string {
  return raw.replace(KEY_TRIM, '')
}

export function groupRecords(records: Iterable<OpcodeRecord>): GroupMap {
  const groups: GroupMap = new Map()
  for (const record of records) {
    const key = cleanGroupKey(record.key)
    const values = groups.get(key)
    if (!values) {
      groups.set(key, [record.value])
      continue
    }
    values.push(record.value)
  }
  return groups
}
