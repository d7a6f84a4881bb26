import { describe, expect, it } from '@jest/globals'
import { ParseError } from '../../src/parsers/exceptions'
import { parseNumber, parsePoints } from '../../src/parsers/values'

describe('parseNumber', () => {
  it('should parse numeric attributes', () => {
    expect(parseNumber('12.5', 'width')).toBe(12.5)
    expect(parseNumber('10px', 'width')).toBe(10)
    expect(parseNumber('-3e2', 'x')).toBe(-300)
  })

  it('should fall back for missing attributes', () => {
    expect(parseNumber(undefined, 'x', 0)).toBe(0)
    expect(parseNumber(' ', 'x', 4)).toBe(4)
  })

  it('should reject missing and invalid attributes', () => {
    expect(() => parseNumber(undefined, 'r')).toThrow(ParseError)
    expect(() => parseNumber(undefined, 'r')).toThrow('Missing r attribute')
    expect(() => parseNumber('auto', 'width')).toThrow('Invalid width: auto')
  })
})

describe('parsePoints', () => {
  it('should parse coordinate pairs', () => {
    expect(parsePoints('0,0 10,0 10 10')).toEqual([
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 10, y: 10 }
    ])
    expect(parsePoints('  ')).toEqual([])
  })

  it('should reject malformed points', () => {
    expect(() => parsePoints('0,0 a,1')).toThrow('Invalid point value: a')
    expect(() => parsePoints('0,0 1')).toThrow('Odd number of coordinates in points: 0,0 1')
  })
})
