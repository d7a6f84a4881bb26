import { describe, expect, it } from '@jest/globals'
import {
  ellipseToCubicBeziers,
  ellipseToQuadraticBeziers,
  flattenEllipticArc,
  xmonotoneEllipticArc
} from '../../src/ellipse/convert'
import { Point } from '../../src/types/base'
import { interpolate, vectorLength } from '../../src/utils/vector'

function expectPoints(actual: Point[], expected: Point[], precision: number = 9): void {
  expect(actual).toHaveLength(expected.length)
  actual.forEach((p, i) => {
    expect(p.x).toBeCloseTo(expected[i].x, precision)
    expect(p.y).toBeCloseTo(expected[i].y, precision)
  })
}

describe('Elliptic arc conversion', () => {
  const start = { x: 0.0, y: 0.0 }
  const end = { x: 200.0, y: 0.0 }

  it('should approximate a half circle by quadratic Beziers', () => {
    const beziers = ellipseToQuadraticBeziers(start, 100.0, 100.0, 0.0, false, false, end)
    expect(beziers).toHaveLength(2)
    expectPoints(beziers[0], [start, { x: 0.0, y: 100.0 }, { x: 100.0, y: 100.0 }])
    expectPoints(beziers[1], [{ x: 100.0, y: 100.0 }, { x: 200.0, y: 100.0 }, end])
  })

  it('should approximate a half circle by cubic Beziers', () => {
    const k = ((Math.sqrt(7.0) - 1.0) / 3.0) * 100.0
    const beziers = ellipseToCubicBeziers(start, 100.0, 100.0, 0.0, false, false, end)
    expect(beziers).toHaveLength(2)
    expectPoints(beziers[0], [
      start,
      { x: 0.0, y: k },
      { x: 100.0 - k, y: 100.0 },
      { x: 100.0, y: 100.0 }
    ])
    expectPoints(beziers[1], [
      { x: 100.0, y: 100.0 },
      { x: 100.0 + k, y: 100.0 },
      { x: 200.0, y: k },
      end
    ])
  })

  it('should split an arc at its vertical tangents', () => {
    const ends = xmonotoneEllipticArc(start, 100.0, 50.0, 0.0, false, false, { x: 0.0, y: 100.0 })
    expectPoints(ends, [
      { x: -100.0, y: 50.0 },
      { x: 0.0, y: 100.0 }
    ])
  })

  it('should flatten a circular arc within the tolerance', () => {
    const tolerance = 1.0
    const points = flattenEllipticArc(start, 100.0, 100.0, 0.0, false, false, end, tolerance)
    expect(points).toHaveLength(9)
    expect(points[points.length - 1]).toEqual(end)

    const center = { x: 100.0, y: 0.0 }
    let prev = start
    for (const p of points) {
      const r = vectorLength({ x: p.x - center.x, y: p.y - center.y })
      expect(r).toBeGreaterThanOrEqual(100.0 - 1e-9)
      expect(r).toBeLessThanOrEqual(100.0 + tolerance)

      const mid = interpolate(prev, p, 0.5)
      const rMid = vectorLength({ x: mid.x - center.x, y: mid.y - center.y })
      expect(rMid).toBeGreaterThanOrEqual(100.0 - tolerance)
      prev = p
    }
  })

  it('should flatten an elliptical arc through Beziers', () => {
    const tolerance = 0.1
    const target = { x: 0.0, y: 100.0 }
    const points = flattenEllipticArc(start, 100.0, 50.0, 0.0, false, false, target, tolerance)
    expect(1 < points.length).toBe(true)
    const last = points[points.length - 1]
    expect(last.x).toBeCloseTo(0.0, 9)
    expect(last.y).toBeCloseTo(100.0, 9)
    for (const p of points) {
      // The arc runs around the left half of the ellipse centered at (0,50).
      const u = p.x / 100.0
      const v = (p.y - 50.0) / 50.0
      expect(Math.abs(Math.sqrt(u * u + v * v) - 1.0)).toBeLessThan(0.01)
    }
  })
})
