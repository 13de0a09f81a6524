import { DEFAULT_EXTRACTOR_CONFIG } from '../src/config'
import { DEFAULT_REPORT_OPTIONS, expandBody, renderGroup, renderJson, renderReport } from '../src/report'

describe('renderReport', () => {
  it('renders nothing for an empty map', () => {
    expect(renderReport(new Map())).toBe('')
  })

  it('takes its defaults from the extractor config', () => {
    expect(DEFAULT_REPORT_OPTIONS).toEqual({
      separator: DEFAULT_EXTRACTOR_CONFIG.separator,
      body: DEFAULT_EXTRACTOR_CONFIG.body,
    })
  })

  it('renders a comment line, an arm line and a blank line per group', () => {
    expect(renderReport(new Map([['LOAD', ['1']]]))).toBe('// LOAD\n1 => {},\n\n')
  })

  it('joins grouped values with the separator', () => {
    const groups = new Map([
      ['LOAD', ['1', '2']],
      ['STORE', ['3']],
    ])
    expect(renderReport(groups)).toBe('// LOAD\n1 | 2 => {},\n\n// STORE\n3 => {},\n\n')
  })

  it('applies a custom separator and body template', () => {
    const out = renderGroup('LDA', ['0xA9', '0xA5'], {
      separator: '|',
      body: '{ self.{lower}(&opcode.mode); }',
    })
    expect(out).toBe('// LDA\n0xA9|0xA5 => { self.lda(&opcode.mode); },\n\n')
  })
})

describe('expandBody', () => {
  it('substitutes every placeholder', () => {
    expect(expandBody('{key}/{lower}/{key}', 'ADC')).toBe('ADC/adc/ADC')
  })

  it('leaves other braces alone', () => {
    expect(expandBody('{}', 'ADC')).toBe('{}')
  })
})

describe('renderJson', () => {
  it('renders groups as an object in key order', () => {
    const groups = new Map([
      ['LDA', ['0xA9']],
      ['BRK', ['0x00']],
    ])
    expect(renderJson(groups)).toBe('{\n  "LDA": [\n    "0xA9"\n  ],\n  "BRK": [\n    "0x00"\n  ]\n}\n')
  })
})
