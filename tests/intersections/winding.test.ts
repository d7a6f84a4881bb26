import { describe, expect, it } from '@jest/globals'
import { pathCrossings, pathWindings, rayIntersections } from '../../src/intersections/winding'
import { parseSvgPath } from '../../src/parsers/path'
import { FillRule } from '../../src/types/base'

describe('Winding', () => {
  it.each([
    ['L10 10', 2, 5, 2, 0, false],
    ['L-10 10', -2, 5, 0, 0, false],
    ['L10 0L10 10L0 10z', 5, 5, 1, 1, false],
    ['L0 10L10 10L10 0z', 5, 5, 1, -1, false],
    ['L10 0L10 10L0 10z', 0, 5, 1, 0, true],
    ['L10 0L10 10L0 10z', -1, 5, 2, 0, false],
    ['L10 0L10 10L0 10zM2 2L8 2L8 8L2 8z', 3, 3, 2, 2, false],
    ['L10 0L10 10L0 10zM2 2L2 8L8 8L8 2z', 3, 3, 2, 0, false],
    ['L5 -5L10 0L5 5z', 5, 0, 1, 1, false],
    ['L5 5L10 0L5 -5z', 5, 0, 1, -1, false],
    ['M10 0A5 5 0 0 1 0 0A5 5 0 0 1 10 0z', 5, 0, 1, 1, false],
    ['L10 10L10 -10L-10 10L-10 -10z', -1, 0, 3, 1, false]
  ])(
    'should count the ray from the point for %s at (%d,%d)',
    (d, x, y, crossings, windings, boundary) => {
      const p = parseSvgPath(d)
      expect(p.crossings(x, y)).toEqual({ crossings, boundary })
      expect(p.windings(x, y)).toEqual({ windings, boundary })
    }
  )

  it('should order hits along the ray', () => {
    const segs = parseSvgPath('L10 0L10 10L0 10zM2 2L8 2L8 8L2 8z').segments()
    const hits = rayIntersections(segs, -1, 5)
    expect(hits.map((hit) => Math.round(hit.z.point.x))).toEqual([0, 2, 8, 10])
    expect(hits.map((hit) => hit.subpath)).toEqual([0, 1, 1, 0])
    expect(hits.every((hit) => !hit.endpoint)).toBe(true)
  })

  it('should not wind around a subpath the point lies on', () => {
    const segs = parseSvgPath('L10 0L10 10L0 10zM2 2L8 2L8 8L2 8z').segments()
    expect(pathWindings(segs, 2, 5)).toEqual({ windings: 1, boundary: true })
    expect(pathCrossings(segs, 2, 5)).toEqual({ crossings: 2, boundary: true })
  })

  it('should close open subpaths back to their start', () => {
    const open = parseSvgPath('L10 0L10 10')
    expect(open.windings(2, 5)).toEqual({ windings: 0, boundary: false })
    expect(open.crossings(2, 5)).toEqual({ crossings: 2, boundary: false })
    expect(open.windings(7, 5)).toEqual({ windings: 1, boundary: false })
    expect(open.contains(2, 5, FillRule.NonZero)).toBe(false)
    expect(open.contains(5, 5, FillRule.NonZero)).toBe(true)
    expect(open.filling(FillRule.NonZero)).toEqual([true])
  })

  it('should be empty without segments', () => {
    expect(pathWindings([], 0, 0)).toEqual({ windings: 0, boundary: false })
    expect(pathCrossings([], 0, 0)).toEqual({ crossings: 0, boundary: false })
  })
})
