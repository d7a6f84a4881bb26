import { describe, expect, it } from '@jest/globals'
import { Path } from '../../src/paths/path'
import {
  ArcsJoin,
  BevelJoin,
  join,
  Joiner,
  joinerName,
  JoinerType,
  MiterClipJoin,
  MiterJoin,
  parseJoiner,
  RoundJoin
} from '../../src/stroke/joiners'

// Joins the rails of a stroke of width 2 running along the x-axis to (10,0) that turns left, or
// right, onto the y-axis.
function joined(joiner: Joiner, left: boolean): [string, string] {
  const rhs = new Path().moveTo(0, -1).lineTo(10, -1)
  const lhs = new Path().moveTo(0, 1).lineTo(10, 1)
  const n1 = left ? { x: 1, y: 0 } : { x: -1, y: 0 }
  join(joiner, rhs, lhs, 1, { x: 10, y: 0 }, { x: 0, y: -1 }, n1, NaN, NaN)
  return [rhs.toString(), lhs.toString()]
}

describe('Joiners', () => {
  it('should bevel the outside of the bend', () => {
    expect(joined(BevelJoin, true)).toEqual(['M0 -1L10 -1L11 0', 'M0 1L10 1L9 0'])
  })

  it('should round the outside of the bend', () => {
    expect(joined(RoundJoin, true)).toEqual(['M0 -1L10 -1A1 1 0 0 1 11 0', 'M0 1L10 1L9 0'])
    expect(joined(RoundJoin, false)).toEqual(['M0 -1L10 -1L9 0', 'M0 1L10 1A1 1 0 0 0 11 0'])
  })

  it('should extend the outer edges to a miter', () => {
    expect(joined(MiterJoin, true)).toEqual(['M0 -1L11 -1L11 0', 'M0 1L10 1L9 0'])
    expect(joined(MiterJoin, false)).toEqual(['M0 -1L10 -1L9 0', 'M0 1L11 1L11 0'])
  })

  it('should join lines with a miter for arcs joins', () => {
    expect(joined(ArcsJoin, true)).toEqual(joined(MiterJoin, true))
  })

  it('should fall back to the gap joiner beyond the miter limit', () => {
    const limited: Joiner = { type: JoinerType.Miter, gapJoiner: BevelJoin, limit: 1 }
    expect(joined(limited, true)).toEqual(joined(BevelJoin, true))
  })

  it('should clip the miter at the limit without gap joiner', () => {
    const clipped: Joiner = { type: JoinerType.Miter, limit: 1 }
    const t = 1.001 / Math.SQRT2
    const rhs = new Path().moveTo(0, -1).lineTo(10, -1)
    const lhs = new Path().moveTo(0, 1).lineTo(10, 1)
    join(clipped, rhs, lhs, 1, { x: 10, y: 0 }, { x: 0, y: -1 }, { x: 1, y: 0 }, NaN, NaN)
    const expected = new Path().moveTo(0, -1).lineTo(10 + t, -1).lineTo(11, -t).lineTo(11, 0)
    expect(rhs.equals(expected)).toBe(true)
    expect(lhs.toString()).toBe('M0 1L10 1L9 0')
  })

  it('should parse and name joiners', () => {
    expect(parseJoiner('miter')).toBe(MiterJoin)
    expect(parseJoiner('arcs-clip')).toEqual({ type: JoinerType.Arcs, limit: 4 })
    expect(parseJoiner('mitre')).toBeUndefined()
    expect(joinerName(MiterClipJoin)).toBe('MiterClip')
    expect(joinerName(ArcsJoin)).toBe('Arcs')
    expect(joinerName(RoundJoin)).toBe('Round')
  })
})
