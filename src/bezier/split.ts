import { Point } from '../types/base'
import { CubicCurve, QuadraticCurve } from '../types/paths'
import { interpolate } from '../utils/vector'

export interface SplitQuadraticResult {
  first: QuadraticCurve
  second: QuadraticCurve
}

export interface SplitCubicResult {
  first: CubicCurve
  second: CubicCurve
}

// De Casteljau subdivision at t.
export function splitQuadraticBezier(
  p0: Point,
  p1: Point,
  p2: Point,
  t: number
): SplitQuadraticResult {
  const q1 = interpolate(p0, p1, t)
  const r1 = interpolate(p1, p2, t)
  const mid = interpolate(q1, r1, t)
  return {
    first: [p0, q1, mid],
    second: [mid, r1, p2]
  }
}

export function splitCubicBezier(
  p0: Point,
  p1: Point,
  p2: Point,
  p3: Point,
  t: number
): SplitCubicResult {
  const pm = interpolate(p1, p2, t)

  const q1 = interpolate(p0, p1, t)
  const q2 = interpolate(q1, pm, t)

  const r2 = interpolate(p2, p3, t)
  const r1 = interpolate(pm, r2, t)

  const mid = interpolate(q2, r1, t)
  return {
    first: [p0, q1, q2, mid],
    second: [mid, r1, r2, p3]
  }
}

// Control points of the cubic Bezier that traces the same curve as the quadratic.
export function quadraticToCubicBezier(p0: Point, p1: Point, p2: Point): [Point, Point] {
  return [interpolate(p0, p1, 2.0 / 3.0), interpolate(p2, p1, 2.0 / 3.0)]
}
