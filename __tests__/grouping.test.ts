import { cleanGroupKey, groupRecords } from '../src/grouping'
import type { OpcodeRecord } from '../src/scanner'

const record = (value: string, key: string, line = 1): OpcodeRecord => ({ value, key, line })

describe('cleanGroupKey', () => {
  it('strips surrounding spaces and double quotes', () => {
    expect(cleanGroupKey(' "LDA"')).toBe('LDA')
    expect(cleanGroupKey('" LDA "  ')).toBe('LDA')
    expect(cleanGroupKey('LDA')).toBe('LDA')
  })

  it('keeps inner characters and other whitespace', () => {
    expect(cleanGroupKey(' "LD A"')).toBe('LD A')
    expect(cleanGroupKey('\t"LDA"')).toBe('\t"LDA')
  })

  it('is idempotent', () => {
    const once = cleanGroupKey('  ""STA"" ')
    expect(once).toBe('STA')
    expect(cleanGroupKey(once)).toBe(once)
  })
})

describe('groupRecords', () => {
  it('returns an empty map for no records', () => {
    expect(groupRecords([]).size).toBe(0)
  })

  it('collects values per cleaned key in encounter order', () => {
    const groups = groupRecords([
      record('0xA9', ' "LDA"'),
      record('0x00', ' "BRK"'),
      record('0xA5', '"LDA" '),
      record('0xB5', 'LDA'),
    ])
    expect([...groups.keys()]).toEqual(['LDA', 'BRK'])
    expect(groups.get('LDA')).toEqual(['0xA9', '0xA5', '0xB5'])
    expect(groups.get('BRK')).toEqual(['0x00'])
  })
})
