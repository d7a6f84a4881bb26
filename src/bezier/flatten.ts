import { DEFAULT_EPSILON } from '../constants'
import { Point } from '../types/base'
import { CubicCurve, QuadraticCurve } from '../types/paths'
import { equal, solveQuadraticFormula } from '../utils/math'
import { add, crossProduct, pointsEqual, subtract, vectorLength } from '../utils/vector'
import {
  colinearCubicBezierTurns,
  colinearQuadraticBezierTurns,
  cubicBezierNormal,
  cubicBezierPos,
  findInflectionPointRangeCubicBezier,
  findInflectionPointsCubicBezier,
  quadraticBezierPos
} from './math'
import { splitCubicBezier, splitQuadraticBezier } from './split'

// Flattening functions return the polyline vertices after the start point. Offsetting functions
// (with d != 0) return the offset start point as the first vertex.

// Split the curve where dx/dt = 0.
export function xmonotoneQuadraticBezier(
  p0: Point,
  p1: Point,
  p2: Point,
  eps: number = DEFAULT_EPSILON
): QuadraticCurve[] {
  const tdenom = p0.x - 2 * p1.x + p2.x
  if (!equal(tdenom, 0.0, eps)) {
    const t = (p0.x - p1.x) / tdenom
    if (0.0 < t && t < 1.0) {
      const { first, second } = splitQuadraticBezier(p0, p1, p2, t)
      return [first, second]
    }
  }
  return [[p0, p1, p2]]
}

export function xmonotoneCubicBezier(
  p0: Point,
  p1: Point,
  p2: Point,
  p3: Point,
  eps: number = DEFAULT_EPSILON
): CubicCurve[] {
  const a = -p0.x + 3 * p1.x - 3 * p2.x + p3.x
  const b = 2 * p0.x - 4 * p1.x + 2 * p2.x
  const c = -p0.x + p1.x

  const curves: CubicCurve[] = []
  let rest: CubicCurve = [p0, p1, p2, p3]
  let tPrev = 0.0
  const inside = (t: number): boolean => eps < t && t < 1.0 - eps
  for (const t of solveQuadraticFormula(a, b, c, eps)) {
    if (Number.isNaN(t) || !inside(t) || t <= tPrev) {
      continue
    }
    const { first, second } = splitCubicBezier(...rest, (t - tPrev) / (1.0 - tPrev))
    curves.push(first)
    rest = second
    tPrev = t
  }
  curves.push(rest)
  return curves
}

// See Flat, precise flattening of cubic Bezier path and offset curves, by T.F. Hain et al., 2005,
// https://www.sciencedirect.com/science/article/pii/S0097849305001287
export function flattenQuadraticBezier(
  p0: Point,
  p1: Point,
  p2: Point,
  tolerance: number,
  eps: number = DEFAULT_EPSILON
): Point[] {
  const turns = colinearQuadraticBezierTurns(p0, p1, p2, eps)
  if (turns !== undefined) {
    // Straight, possibly running past p2 and back.
    return [...turns.map((t) => quadraticBezierPos(p0, p1, p2, t)), p2]
  }

  const points: Point[] = []
  let t = 0.0
  while (t < 1.0) {
    if (pointsEqual(p0, p1, eps)) {
      break
    }
    const D = subtract(p1, p0)
    const denom = Math.hypot(D.x, D.y)
    const s2nom = crossProduct(D, subtract(p2, p0))
    t = 2.0 * Math.sqrt(tolerance * Math.abs(denom / s2nom))
    if (t >= 1.0) {
      break
    }

    ;[p0, p1, p2] = splitQuadraticBezier(p0, p1, p2, t).second
    points.push(p0)
  }
  points.push(p2)
  return points
}

export function flattenCubicBezier(
  p0: Point,
  p1: Point,
  p2: Point,
  p3: Point,
  tolerance: number,
  eps: number = DEFAULT_EPSILON
): Point[] {
  const turns = colinearCubicBezierTurns(p0, p1, p2, p3, eps)
  if (turns !== undefined) {
    if (turns.length === 0 && pointsEqual(p0, p3, eps)) {
      return []
    }
    return [...turns.map((t) => cubicBezierPos(p0, p1, p2, p3, t)), p3]
  }
  return strokeCubicBezier(p0, p1, p2, p3, 0.0, tolerance, eps).slice(1)
}

// Add the start (t = 0) or end (t = 1) of the curve, offset by d to the right.
function addCubicBezierLine(
  points: Point[],
  p0: Point,
  p1: Point,
  p2: Point,
  p3: Point,
  t: 0 | 1,
  d: number,
  eps: number
): void {
  if (pointsEqual(p0, p3, eps) && (pointsEqual(p0, p1, eps) || pointsEqual(p0, p2, eps))) {
    // The curve has no surface or length.
    return
  }

  let pos = t === 0 ? p0 : p3
  if (d !== 0.0) {
    pos = add(pos, cubicBezierNormal(p0, p1, p2, p3, t, d))
  }
  points.push(pos)
}

// Replace the curve by lines as long as the maximum deviation stays within the tolerance.
function flattenSmoothCubicBezier(
  points: Point[],
  p0: Point,
  p1: Point,
  p2: Point,
  p3: Point,
  d: number,
  tolerance: number,
  eps: number
): void {
  let t = 0.0
  while (t < 1.0) {
    let D = subtract(p1, p0)
    if (pointsEqual(p0, p1, eps)) {
      D = subtract(p2, p0)
      if (pointsEqual(p0, p2, eps)) {
        // p0 = p1 = p2, straight line to p3.
        points.push(p3)
        return
      }
    }
    const denom = vectorLength(D)

    const s2nom = crossProduct(D, subtract(p2, p0))
    const s2inv = denom / s2nom
    const t2 = 2.0 * Math.sqrt((tolerance * Math.abs(s2inv)) / 3.0)

    // When s2 is small, s3 may represent the curvature more accurately.
    const s3nom = crossProduct(D, subtract(p3, p0))
    const s3inv = denom / s3nom
    const t3 = 2.0 * Math.cbrt(tolerance * Math.abs(s3inv))

    t = Math.min(t2, t3)
    if (1.0 <= t) {
      break
    }
    ;[p0, p1, p2, p3] = splitCubicBezier(p0, p1, p2, p3, t).second
    addCubicBezierLine(points, p0, p1, p2, p3, 0, d, eps)
  }
  addCubicBezierLine(points, p0, p1, p2, p3, 1, d, eps)
}

// Polyline of the curve offset by d to its right (d = 0 flattens). The first vertex is the offset
// start point. Ranges around inflection points are approximated linearly since the step size is
// unstable where the curvature vanishes.
export function strokeCubicBezier(
  p0: Point,
  p1: Point,
  p2: Point,
  p3: Point,
  d: number,
  tolerance: number,
  eps: number = DEFAULT_EPSILON
): Point[] {
  tolerance = Math.max(tolerance, eps)

  const points: Point[] = [add(p0, cubicBezierNormal(p0, p1, p2, p3, 0, d))]
  const splitAt = (t: number): CubicCurve => splitCubicBezier(p0, p1, p2, p3, t).second

  // 0 <= t1 <= t2 <= 1 where they exist.
  const [t1, t2] = findInflectionPointsCubicBezier(p0, p1, p2, p3, eps)
  if (Number.isNaN(t1) && Number.isNaN(t2)) {
    flattenSmoothCubicBezier(points, p0, p1, p2, p3, d, tolerance, eps)
    return points
  }

  const [t1min, t1max] = findInflectionPointRangeCubicBezier(p0, p1, p2, p3, t1, tolerance, eps)
  const [t2min, t2max] = findInflectionPointRangeCubicBezier(p0, p1, p2, p3, t2, tolerance, eps)

  if (Number.isNaN(t2) && t1min <= 0.0 && 1.0 <= t1max) {
    // A single inflection whose flat range covers the whole curve.
    addCubicBezierLine(points, p0, p1, p2, p3, 1, d, eps)
    return points
  }

  if (0.0 < t1min) {
    const q = splitCubicBezier(p0, p1, p2, p3, t1min).first
    flattenSmoothCubicBezier(points, ...q, d, tolerance, eps)
  }

  if (0.0 < t1max && t1max < 1.0 && t1max < t2min) {
    // The ranges of t1 and t2 do not overlap, the range of t1 becomes a line.
    const q = splitAt(t1max)
    addCubicBezierLine(points, ...q, 0, d, eps)
    if (1.0 <= t2min) {
      // No t2, subdivide the rest.
      flattenSmoothCubicBezier(points, ...q, d, tolerance, eps)
      return points
    }
  } else if (1.0 <= t2min) {
    // No t2 and the range of t1 extends past the end.
    addCubicBezierLine(points, p0, p1, p2, p3, 1, d, eps)
    return points
  }

  if (0.0 < t2min) {
    const q = splitAt(t1max)
    if (t2min < t1max) {
      // The range of t2 starts inside the range of t1.
      addCubicBezierLine(points, ...q, 0, d, eps)
    } else {
      const r = splitCubicBezier(...q, (t2min - t1max) / (1 - t1max)).first
      flattenSmoothCubicBezier(points, ...r, d, tolerance, eps)
    }
  }

  if (t2max < 1.0) {
    const q = splitAt(t2max)
    addCubicBezierLine(points, ...q, 0, d, eps)
    flattenSmoothCubicBezier(points, ...q, d, tolerance, eps)
  } else {
    addCubicBezierLine(points, p0, p1, p2, p3, 1, d, eps)
  }
  return points
}
