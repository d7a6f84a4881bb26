import { describe, expect, it } from '@jest/globals'
import { parseArgs, processPath, processSvg, UsageError } from '../src/main'
import { parseSvgPath } from '../src/parsers/path'
import { Capper } from '../src/stroke/cappers'
import { RoundJoin } from '../src/stroke/joiners'

describe('main', () => {
  const svg = '<svg><rect width="10" height="5"/><path d="M0 0L10 0"/></svg>'

  it('should write every path of the document', () => {
    expect(processSvg(svg)).toEqual(['M0 0H10V5H0z', 'M0 0H10'])
    expect(processSvg(svg, { format: 'string' })).toEqual(['M0 0L10 0L10 5L0 5z', 'M0 0L10 0'])
    expect(processSvg(svg, { format: 'pdf' })).toEqual([
      '0 0 m 10 0 l 10 5 l 0 5 l h',
      '0 0 m 10 0 l'
    ])
  })

  it('should stroke paths before writing them', () => {
    const out = processSvg(svg, { stroke: 2, format: 'string' })
    expect(out[1]).toBe('M0 -1L10 -1L10 1L0 1z')
  })

  it('should flatten curves', () => {
    const p = parseSvgPath('A5 5 0 0 1 10 0')
    expect(processPath(p, { format: 'string' })).toBe('M0 0A5 5 0 0 1 10 0')
    expect(processPath(p, { flatten: 0.1, format: 'string' })).not.toContain('A')
    expect(processPath(p, { format: 'pdf' })).toMatch(/^0 0 m .* c .* c$/)
  })

  it('should parse command line options', () => {
    const { input, options } = parseArgs([
      'drawing.svg',
      '--stroke',
      '2.5',
      '--cap',
      'round',
      '--join',
      'round',
      '--flatten',
      '0.1',
      '--format',
      'ps'
    ])
    expect(input).toBe('drawing.svg')
    expect(options).toEqual({
      stroke: 2.5,
      capper: Capper.Round,
      joiner: RoundJoin,
      flatten: 0.1,
      format: 'ps'
    })
  })

  it.each([
    [[], 'Missing input file'],
    [['a.svg', 'b.svg'], 'Unexpected argument: b.svg'],
    [['a.svg', '--stroke'], '--stroke needs a positive number, got nothing'],
    [['a.svg', '--flatten', '-1'], '--flatten needs a positive number, got -1'],
    [['a.svg', '--cap', 'pointy'], 'Unknown cap: pointy'],
    [['a.svg', '--join', 'mitre'], 'Unknown join: mitre'],
    [['a.svg', '--format', 'png'], 'Unknown format: png'],
    [['a.svg', '--verbose'], 'Unknown option: --verbose']
  ])('should reject %p', (args, message) => {
    expect(() => parseArgs(args)).toThrow(UsageError)
    expect(() => parseArgs(args)).toThrow(message)
  })
})
