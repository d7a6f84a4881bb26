import { describe, expect, it } from '@jest/globals'
import { PathReadError, PathReader, readFillRule, readStyle } from '../../src/reader/path'
import { FillRule } from '../../src/types/base'
import { RawSvgElement } from '../../src/types/svg'

function element(type: string, attributes: Record<string, string>): RawSvgElement {
  return { type, attributes, children: [] }
}

describe('PathReader', () => {
  const reader = new PathReader()

  it('should parse the path data', () => {
    expect(reader.read(element('path', { d: 'm1 2h3' })).toString()).toBe('M1 2L4 2')
  })

  it('should reject other elements and bad path data', () => {
    expect(() => reader.read(element('rect', {}))).toThrow('Element is not a path')
    expect(() => reader.read(element('path', {}))).toThrow('Path element missing "d" attribute')
    expect(() => reader.read(element('path', { d: 'M0 0L' }))).toThrow(PathReadError)
    expect(() => reader.read(element('path', { d: 'M0 0L' }))).toThrow(
      "Invalid path data: Sets of 2 numbers should follow command 'L' at position 6"
    )
  })

  it('should read style declarations', () => {
    const styles = readStyle(element('path', { style: 'fill: red;stroke:none; ;' }))
    expect(styles).toEqual({ fill: 'red', stroke: 'none' })
  })

  it('should read fill rules from the style before the attribute', () => {
    const both = element('path', { 'fill-rule': 'nonzero', style: 'fill-rule: evenodd' })
    expect(readFillRule(both)).toBe(FillRule.EvenOdd)
    expect(readFillRule(element('path', { 'fill-rule': 'evenodd' }))).toBe(FillRule.EvenOdd)
    expect(readFillRule(element('path', {}))).toBeUndefined()
    expect(() => readFillRule(element('path', { 'fill-rule': 'odd' }))).toThrow(
      'Invalid fill-rule: odd'
    )
    expect(() => readFillRule(element('path', { style: 'fill-rule: odd' }))).toThrow(
      'Invalid fill-rule in style: odd'
    )
  })
})
