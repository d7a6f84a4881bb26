import { describe, expect, it } from '@jest/globals'
import {
  Intersection,
  UnsupportedIntersectionError,
  hasIntersections,
  hasSecant,
  hasTangent,
  intersectionCircleCircle,
  intersectionLineCircle,
  intersectionLineCube,
  intersectionLineEllipse,
  intersectionLineLine,
  intersectionLineQuad,
  intersectionRayCircle,
  intersectionRayLine,
  intersectionSegment
} from '../../src/intersections/intersections'
import { parseSvgPath } from '../../src/parsers/path'
import { Point } from '../../src/types/base'
import { Segment } from '../../src/types/paths'

function expectPoint(actual: Point, x: number, y: number): void {
  expect(actual.x).toBeCloseTo(x, 9)
  expect(actual.y).toBeCloseTo(y, 9)
}

// Second segment of the path data, the first one is its MoveTo.
function segment(d: string): Segment {
  return parseSvgPath(d).segments()[1]
}

const pt = (x: number, y: number): Point => ({ x, y })

const byT = (a: Intersection, b: Intersection): number => a.t[0] - b.t[0]

describe('Intersections', () => {
  describe('line-line', () => {
    it('should find a crossing', () => {
      const zs = intersectionLineLine([], pt(0, 0), pt(2, 2), pt(0, 2), pt(2, 0))
      expect(zs).toHaveLength(1)
      expectPoint(zs[0].point, 1, 1)
      expect(zs[0].t[0]).toBeCloseTo(0.5, 12)
      expect(zs[0].t[1]).toBeCloseTo(0.5, 12)
      expect(zs[0].tangent).toBe(false)
      expect(zs[0].same).toBe(false)
      expect(zs[0].into()).toBe(true)
      expect(hasSecant(zs)).toBe(true)
      expect(hasTangent(zs)).toBe(false)
    })

    it('should report whether B goes to the right of A', () => {
      const zs = intersectionLineLine([], pt(0, 2), pt(2, 0), pt(0, 0), pt(2, 2))
      expect(zs).toHaveLength(1)
      expect(zs[0].into()).toBe(false)
    })

    it('should mark touching endpoints as tangent', () => {
      const zs = intersectionLineLine([], pt(0, 0), pt(1, 0), pt(1, 0), pt(1, 1))
      expect(zs).toHaveLength(1)
      expect(zs[0].point).toEqual(pt(1, 0))
      expect(zs[0].t).toEqual([1, 0])
      expect(zs[0].tangent).toBe(true)
      expect(hasSecant(zs)).toBe(false)
      expect(hasTangent(zs)).toBe(true)
    })

    it('should return both ends of an overlap', () => {
      const zs = intersectionLineLine([], pt(0, 0), pt(2, 0), pt(1, 0), pt(3, 0))
      expect(zs).toHaveLength(2)
      expect(zs[0].point).toEqual(pt(1, 0))
      expect(zs[0].t).toEqual([0.5, 0])
      expect(zs[1].point).toEqual(pt(2, 0))
      expect(zs[1].t).toEqual([1, 0.5])
      expect(zs.every((z) => z.same && z.tangent)).toBe(true)
    })

    it('should find nothing for disjoint lines', () => {
      const parallel = intersectionLineLine([], pt(0, 0), pt(2, 0), pt(0, 1), pt(2, 1))
      const apart = intersectionLineLine([], pt(0, 0), pt(1, 1), pt(3, 0), pt(2, 1))
      expect(hasIntersections(parallel)).toBe(false)
      expect(hasIntersections(apart)).toBe(false)
    })

    it('should ignore zero-length lines', () => {
      const zs = intersectionLineLine([], pt(1, 1), pt(1, 1), pt(0, 0), pt(2, 2))
      expect(zs).toHaveLength(0)
    })
  })

  describe('line-curve', () => {
    it('should intersect a line with a quadratic Bézier', () => {
      const zs = intersectionLineQuad([], pt(0, 0.5), pt(2, 0.5), pt(0, 0), pt(1, 2), pt(2, 0))
      zs.sort(byT)
      const t0 = (1 - Math.sqrt(0.5)) / 2
      const t1 = (1 + Math.sqrt(0.5)) / 2
      expect(zs).toHaveLength(2)
      expectPoint(zs[0].point, 2 * t0, 0.5)
      expect(zs[0].t[0]).toBeCloseTo(t0, 9)
      expect(zs[0].t[1]).toBeCloseTo(t0, 9)
      expectPoint(zs[1].point, 2 * t1, 0.5)
      expect(zs[1].t[1]).toBeCloseTo(t1, 9)
      expect(hasTangent(zs)).toBe(false)
    })

    it('should turn the direction at a curve end by twice epsilon', () => {
      const [l0, l1] = [pt(0, 0), pt(2, 0)]
      const [p0, p1, p2] = [pt(1, 0), pt(1, 1), pt(2, 1)]
      for (const eps of [1e-10, 1e-6]) {
        const zs = intersectionLineQuad([], l0, l1, p0, p1, p2, eps)
        expect(zs).toHaveLength(1)
        expect(zs[0].t).toEqual([0.5, 0])
        expect(zs[0].tangent).toBe(true)
        expect(zs[0].dir[1]).toBeCloseTo(Math.PI / 2 - 2 * eps, 14)
      }
    })

    it('should intersect a line with a cubic Bézier', () => {
      const [l0, l1] = [pt(0, 0), pt(2, 0)]
      const zs = intersectionLineCube([], l0, l1, pt(0, -1), pt(1, -1), pt(1, 1), pt(2, 1))
      expect(zs).toHaveLength(1)
      expectPoint(zs[0].point, 1, 0)
      expect(zs[0].t[0]).toBeCloseTo(0.5, 9)
      expect(zs[0].t[1]).toBeCloseTo(0.5, 9)
      expect(zs[0].tangent).toBe(false)
    })

    it('should intersect a line with a circular arc', () => {
      const zs = intersectionLineCircle([], pt(0, -2), pt(0, 2), pt(0, 0), 1, 0, Math.PI)
      expect(zs).toHaveLength(1)
      expectPoint(zs[0].point, 0, 1)
      expect(zs[0].t[0]).toBeCloseTo(0.75, 9)
      expect(zs[0].t[1]).toBeCloseTo(0.5, 9)
      expect(zs[0].tangent).toBe(false)
    })

    it('should intersect a line with an elliptical arc', () => {
      const arc = {
        center: pt(0, 0),
        radius: pt(2, 1),
        phi: 0,
        theta0: 0,
        theta1: Math.PI
      }
      const zs = intersectionLineEllipse([], pt(0, -2), pt(0, 2), arc)
      expect(zs).toHaveLength(1)
      expectPoint(zs[0].point, 0, 1)
      expect(zs[0].t[0]).toBeCloseTo(0.75, 9)
      expect(zs[0].t[1]).toBeCloseTo(0.5, 9)
    })
  })

  describe('segments', () => {
    it('should swap the parameters when the line comes second', () => {
      const zs = intersectionSegment(segment('M0 0Q1 2 2 0'), segment('M0 0.5L4 0.5')).sort(byT)
      const t0 = (1 - Math.sqrt(0.5)) / 2
      expect(zs).toHaveLength(2)
      expect(zs[0].t[0]).toBeCloseTo(t0, 9)
      expect(zs[0].t[1]).toBeCloseTo(t0 / 2, 9)
    })

    it('should intersect circular arcs', () => {
      const zs = intersectionSegment(segment('M1 0A1 1 0 0 1 -1 0'), segment('M2 0A1 1 0 0 1 0 0'))
      expect(zs).toHaveLength(1)
      expectPoint(zs[0].point, 0.5, Math.sqrt(3) / 2)
      expect(zs[0].t[0]).toBeCloseTo(1 / 3, 9)
      expect(zs[0].t[1]).toBeCloseTo(2 / 3, 9)
    })

    it.each([
      ['M0 0L2 2', 'M0 2L2 0'],
      ['M0 0L2 0', 'M1 0L3 0'],
      ['M0 0.5L2 0.5', 'M0 0Q1 2 2 0'],
      ['M0 0L2 0', 'M0 -1C1 -1 1 1 2 1'],
      ['M0 -2L0 2', 'M1 0A1 1 0 0 1 -1 0'],
      ['M1 0A1 1 0 0 1 -1 0', 'M2 0A1 1 0 0 1 0 0']
    ])('should find the same intersections of %s and %s in either order', (da, db) => {
      const [a, b] = [segment(da), segment(db)]
      const zs = intersectionSegment(a, b).sort(byT)
      const swapped = intersectionSegment(b, a).sort((x, y) => x.t[1] - y.t[1])
      expect(zs.length).toBeGreaterThan(0)
      expect(swapped).toHaveLength(zs.length)
      zs.forEach((z, i) => {
        const w = swapped[i]
        expectPoint(w.point, z.point.x, z.point.y)
        expect(w.t[0]).toBeCloseTo(z.t[1], 9)
        expect(w.t[1]).toBeCloseTo(z.t[0], 9)
        expect(w.tangent).toBe(z.tangent)
        expect(w.same).toBe(z.same)
      })
    })

    it('should reject unsupported pairs', () => {
      const quad = segment('M0 0Q1 2 2 0')
      const ellipse = segment('M0 0A2 1 0 0 1 4 0')
      expect(() => intersectionSegment(quad, quad)).toThrow(UnsupportedIntersectionError)
      expect(() => intersectionSegment(ellipse, ellipse)).toThrow(
        'Unsupported intersection between A and A segments'
      )
    })
  })

  describe('rays and circles', () => {
    it('should intersect two circles', () => {
      const hits = intersectionCircleCircle(pt(0, 0), 1, pt(1, 0), 1)
      expect(hits).toBeDefined()
      if (hits !== undefined) {
        expectPoint(hits[0], 0.5, -Math.sqrt(3) / 2)
        expectPoint(hits[1], 0.5, Math.sqrt(3) / 2)
      }
      expect(intersectionCircleCircle(pt(0, 0), 1, pt(3, 0), 1)).toBeUndefined()
      expect(intersectionCircleCircle(pt(0, 0), 1, pt(0, 0), 2)).toBeUndefined()
    })

    it('should intersect a ray with a line', () => {
      const hit = intersectionRayLine(pt(0, 0), pt(1, 0), pt(5, -1), pt(5, 1))
      expect(hit).toEqual(pt(5, 0))
      const miss = intersectionRayLine(pt(0, 0), pt(1, 0), pt(5, 1), pt(5, 2))
      expect(miss).toBeUndefined()
    })

    it('should intersect a ray with a circle', () => {
      const hits = intersectionRayCircle(pt(-5, 0), pt(5, 0), pt(0, 0), 1)
      expect(hits).toBeDefined()
      if (hits !== undefined) {
        expectPoint(hits[0], 1, 0)
        expectPoint(hits[1], -1, 0)
      }
      expect(intersectionRayCircle(pt(-5, 2), pt(5, 2), pt(0, 0), 1)).toBeUndefined()
    })
  })
})
