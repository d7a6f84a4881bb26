import { DEFAULT_EPSILON } from '../constants'
import { Point, Vector } from '../types/base'
import { CubicCurve } from '../types/paths'
import { equal, gaussLegendre7, solveCubicFormula, solveQuadraticFormula } from '../utils/math'
import {
  add,
  computePointToPointDistance,
  crossProduct,
  dotProduct,
  normalizeVector,
  rotate90CW,
  scale,
  subtract,
  vectorLength
} from '../utils/vector'
import { splitCubicBezier } from './split'

function weightedSum(points: Point[], weights: number[]): Point {
  let x = 0.0
  let y = 0.0
  for (let i = 0; i < points.length; i++) {
    x += points[i].x * weights[i]
    y += points[i].y * weights[i]
  }
  return { x, y }
}

function curvatureRadius(dp: Vector, ddp: Vector, eps: number): number {
  // Negative when the curve bends clockwise while following t.
  const a = crossProduct(dp, ddp)
  if (equal(a, 0.0, eps)) {
    return NaN
  }
  return Math.pow(dp.x * dp.x + dp.y * dp.y, 1.5) / a
}

export function quadraticBezierPos(p0: Point, p1: Point, p2: Point, t: number): Point {
  return weightedSum([p0, p1, p2], [1.0 - 2.0 * t + t * t, 2.0 * t - 2.0 * t * t, t * t])
}

export function quadraticBezierDeriv(p0: Point, p1: Point, p2: Point, t: number): Vector {
  return weightedSum([p0, p1, p2], [-2.0 + 2.0 * t, 2.0 - 4.0 * t, 2.0 * t])
}

export function quadraticBezierDeriv2(p0: Point, p1: Point, p2: Point): Vector {
  return weightedSum([p0, p1, p2], [2.0, -4.0, 2.0])
}

export function quadraticBezierCurvatureRadius(
  p0: Point,
  p1: Point,
  p2: Point,
  t: number,
  eps: number = DEFAULT_EPSILON
): number {
  const dp = quadraticBezierDeriv(p0, p1, p2, t)
  const ddp = quadraticBezierDeriv2(p0, p1, p2)
  return curvatureRadius(dp, ddp, eps)
}

// Closed form, see https://malczak.linuxpl.com/blog/quadratic-bezier-curve-length/
export function quadraticBezierLength(
  p0: Point,
  p1: Point,
  p2: Point,
  eps: number = DEFAULT_EPSILON
): number {
  const a = add(subtract(p0, scale(p1, 2.0)), p2)
  const b = subtract(scale(p1, 2.0), scale(p0, 2.0))
  const A = 4.0 * dotProduct(a, a)
  const B = 4.0 * dotProduct(a, b)
  const C = dotProduct(b, b)
  if (equal(A, 0.0, eps)) {
    // The control point lies halfway, so the curve is the straight line from p0 to p2.
    return computePointToPointDistance(p0, p2)
  }

  const turns = colinearQuadraticBezierTurns(p0, p1, p2, eps)
  if (turns !== undefined) {
    // The speed is linear in t on either side of where the curve turns back.
    const speed = (t: number): number => vectorLength(quadraticBezierDeriv(p0, p1, p2, t))
    return piecewiseGaussLegendre7(speed, turns)
  }

  const Sabc = 2.0 * Math.sqrt(A + B + C)
  const A2 = Math.sqrt(A)
  const A32 = 2.0 * A * A2
  const C2 = 2.0 * Math.sqrt(C)
  const BA = B / A2
  return (
    (A32 * Sabc +
      A2 * B * (Sabc - C2) +
      (4.0 * C * A - B * B) * Math.log((2.0 * A2 + BA + Sabc) / (BA + C2))) /
    (4.0 * A32)
  )
}

// Shortest distance from q to the curve.
export function quadraticBezierDistance(p0: Point, p1: Point, p2: Point, q: Point): number {
  const f = add(subtract(p0, scale(p1, 2.0)), p2)
  const g = subtract(scale(p1, 2.0), scale(p0, 2.0))
  const h = subtract(p0, q)

  const a = 4.0 * dotProduct(f, f)
  const b = 6.0 * dotProduct(f, g)
  const c = 2.0 * (2.0 * dotProduct(f, h) + dotProduct(g, g))
  const d = 2.0 * dotProduct(g, h)

  let dist = Infinity
  for (let t of [...solveCubicFormula(a, b, c, d), 0.0, 1.0]) {
    if (Number.isNaN(t)) {
      continue
    }
    t = Math.min(1.0, Math.max(0.0, t))
    dist = Math.min(dist, computePointToPointDistance(quadraticBezierPos(p0, p1, p2, t), q))
  }
  return dist
}

export function cubicBezierPos(p0: Point, p1: Point, p2: Point, p3: Point, t: number): Point {
  const t2 = t * t
  const t3 = t2 * t
  return weightedSum(
    [p0, p1, p2, p3],
    [1.0 - 3.0 * t + 3.0 * t2 - t3, 3.0 * t - 6.0 * t2 + 3.0 * t3, 3.0 * t2 - 3.0 * t3, t3]
  )
}

export function cubicBezierDeriv(p0: Point, p1: Point, p2: Point, p3: Point, t: number): Vector {
  const t2 = t * t
  return weightedSum(
    [p0, p1, p2, p3],
    [-3.0 + 6.0 * t - 3.0 * t2, 3.0 - 12.0 * t + 9.0 * t2, 6.0 * t - 9.0 * t2, 3.0 * t2]
  )
}

export function cubicBezierDeriv2(p0: Point, p1: Point, p2: Point, p3: Point, t: number): Vector {
  return weightedSum(
    [p0, p1, p2, p3],
    [6.0 - 6.0 * t, 18.0 * t - 12.0, 6.0 - 18.0 * t, 6.0 * t]
  )
}

export function cubicBezierDeriv3(p0: Point, p1: Point, p2: Point, p3: Point): Vector {
  return weightedSum([p0, p1, p2, p3], [-6.0, 18.0, -18.0, 6.0])
}

export function cubicBezierCurvatureRadius(
  p0: Point,
  p1: Point,
  p2: Point,
  p3: Point,
  t: number,
  eps: number = DEFAULT_EPSILON
): number {
  const dp = cubicBezierDeriv(p0, p1, p2, p3, t)
  const ddp = cubicBezierDeriv2(p0, p1, p2, p3, t)
  return curvatureRadius(dp, ddp, eps)
}

// Normal of length d at the right-hand side of the curve at either end (t is 0 or 1). Coincident
// control points fall back to the next distinct one.
export function cubicBezierNormal(
  p0: Point,
  p1: Point,
  p2: Point,
  p3: Point,
  t: 0 | 1,
  d: number
): Vector {
  const candidates =
    t === 0
      ? [subtract(p1, p0), subtract(p2, p0), subtract(p3, p0)]
      : [subtract(p3, p2), subtract(p3, p1), subtract(p3, p0)]
  for (const n of candidates) {
    if (n.x !== 0 || n.y !== 0) {
      return normalizeVector(rotate90CW(n), d)
    }
  }
  return { x: 0, y: 0 }
}

// Integrates f over [0, 1] with a separate quadrature between each of the sorted breaks.
function piecewiseGaussLegendre7(f: (t: number) => number, breaks: number[]): number {
  const ts = [0.0, ...breaks, 1.0]
  let sum = 0.0
  for (let i = 1; i < ts.length; i++) {
    sum += gaussLegendre7(f, ts[i - 1], ts[i])
  }
  return sum
}

// Projects the points after p0 onto the line through all of them. Returns undefined when the
// points are not colinear, and an empty list when they all coincide.
function colinearOffsets(p0: Point, ps: Point[], eps: number): number[] | undefined {
  const vs = ps.map((p) => subtract(p, p0))
  const dir = vs.reduce((u, v) => (vectorLength(u) < vectorLength(v) ? v : u))
  const norm = vectorLength(dir)
  if (equal(norm, 0.0, eps)) {
    return []
  } else if (!vs.every((v) => equal(crossProduct(dir, v) / norm, 0.0, eps))) {
    return undefined
  }
  return vs.map((v) => dotProduct(v, dir) / norm)
}

// Parameters in (0, 1) where a quadratic Bezier with colinear points stops and turns back along
// its line. Undefined when the points are not colinear.
export function colinearQuadraticBezierTurns(
  p0: Point,
  p1: Point,
  p2: Point,
  eps: number = DEFAULT_EPSILON
): number[] | undefined {
  const s = colinearOffsets(p0, [p1, p2], eps)
  if (s === undefined || s.length === 0) {
    return s
  }
  // s'(t) = 2.s1 + 2t.(s2 - 2.s1)
  const [t] = solveQuadraticFormula(0.0, s[1] - 2.0 * s[0], s[0], eps)
  return 0.0 < t && t < 1.0 ? [t] : []
}

// Parameters in (0, 1) where a cubic Bezier with colinear points stops and turns back along its
// line, in ascending order. Undefined when the points are not colinear.
export function colinearCubicBezierTurns(
  p0: Point,
  p1: Point,
  p2: Point,
  p3: Point,
  eps: number = DEFAULT_EPSILON
): number[] | undefined {
  const s = colinearOffsets(p0, [p1, p2, p3], eps)
  if (s === undefined || s.length === 0) {
    return s
  }
  const d0 = s[0]
  const d1 = s[1] - s[0]
  const d2 = s[2] - s[1]
  const roots = solveQuadraticFormula(d0 - 2.0 * d1 + d2, 2.0 * (d1 - d0), d0, eps)
  return roots.filter((t) => 0.0 < t && t < 1.0).sort((a, b) => a - b)
}

// Arc length with Gauss-Legendre (n=7) per piece between inflection points. The error is about 1%
// or less.
export function cubicBezierLength(
  p0: Point,
  p1: Point,
  p2: Point,
  p3: Point,
  eps: number = DEFAULT_EPSILON
): number {
  const turns = colinearCubicBezierTurns(p0, p1, p2, p3, eps)
  if (turns !== undefined) {
    const speed = (t: number): number => vectorLength(cubicBezierDeriv(p0, p1, p2, p3, t))
    return piecewiseGaussLegendre7(speed, turns)
  }

  const [t1, t2] = findInflectionPointsCubicBezier(p0, p1, p2, p3, eps)
  const beziers: CubicCurve[] = []
  if (0.0 < t1 && t1 < 1.0 && 0.0 < t2 && t2 < 1.0) {
    const { first, second } = splitCubicBezier(p0, p1, p2, p3, t1)
    const rest = splitCubicBezier(...second, (t2 - t1) / (1.0 - t1))
    beziers.push(first, rest.first, rest.second)
  } else if (0.0 < t1 && t1 < 1.0) {
    const { first, second } = splitCubicBezier(p0, p1, p2, p3, t1)
    beziers.push(first, second)
  } else {
    beziers.push([p0, p1, p2, p3])
  }

  let length = 0.0
  for (const [q0, q1, q2, q3] of beziers) {
    const speed = (t: number): number => vectorLength(cubicBezierDeriv(q0, q1, q2, q3, t))
    length += gaussLegendre7(speed, 0.0, 1.0)
  }
  return length
}

export function cubicBezierNumInflections(
  p0: Point,
  p1: Point,
  p2: Point,
  p3: Point,
  eps: number = DEFAULT_EPSILON
): number {
  const [t1, t2] = findInflectionPointsCubicBezier(p0, p1, p2, p3, eps)
  if (!Number.isNaN(t2)) {
    return 2
  } else if (!Number.isNaN(t1)) {
    return 1
  }
  return 0
}

// Inflection parameters strictly inside (0, 1), NaN when absent; the first is set before the
// second.
// See www.faculty.idc.ac.il/arik/quality/appendixa.html
export function findInflectionPointsCubicBezier(
  p0: Point,
  p1: Point,
  p2: Point,
  p3: Point,
  eps: number = DEFAULT_EPSILON
): [number, number] {
  // The factor 3 of bx, by, cx and cy cancels out in a, b and c.
  const ax = -p0.x + 3.0 * p1.x - 3.0 * p2.x + p3.x
  const ay = -p0.y + 3.0 * p1.y - 3.0 * p2.y + p3.y
  const bx = p0.x - 2.0 * p1.x + p2.x
  const by = p0.y - 2.0 * p1.y + p2.y
  const cx = -p0.x + p1.x
  const cy = -p0.y + p1.y

  const a = ay * bx - ax * by
  const b = ay * cx - ax * cy
  const c = by * cx - bx * cy
  let [x1, x2] = solveQuadraticFormula(a, b, c, eps)
  if (x1 < eps / 2.0 || 1.0 - eps / 2.0 < x1) {
    x1 = NaN
  }
  if (x2 < eps / 2.0 || 1.0 - eps / 2.0 < x2) {
    x2 = NaN
  } else if (Number.isNaN(x1)) {
    ;[x1, x2] = [x2, x1]
  }
  return [x1, x2]
}

// Parameter range around the inflection point t that is flat within the tolerance. Returns
// [Infinity, Infinity] when t is NaN.
export function findInflectionPointRangeCubicBezier(
  p0: Point,
  p1: Point,
  p2: Point,
  p3: Point,
  t: number,
  tolerance: number,
  eps: number = DEFAULT_EPSILON
): [number, number] {
  if (Number.isNaN(t)) {
    return [Infinity, Infinity]
  }

  // With s(t) = 3*s2*t^2 + (s3 - 3*s2)*t^3 perpendicular to the curve at t = 0, solve
  // s(tf) = tolerance; at an inflection point s2 = 0 so that s(t) = s3*t^3.
  if (!equal(t, 0.0, eps)) {
    ;[p0, p1, p2, p3] = splitCubicBezier(p0, p1, p2, p3, t).second
  }
  let nr = subtract(p1, p0)
  const ns = subtract(p3, p0)
  if (equal(nr.x, 0.0, eps) && equal(nr.y, 0.0, eps)) {
    // The velocity at t = 0 vanishes, use the direction towards p2 instead.
    nr = subtract(p2, p0)
  }
  if (equal(nr.x, 0.0, eps) && equal(nr.y, 0.0, eps)) {
    // p0 = p1 = p2, the curve is straight.
    return [0.0, 1.0]
  }

  const s3 = Math.abs(ns.x * nr.y - ns.y * nr.x) / Math.hypot(nr.x, nr.y)
  if (equal(s3, 0.0, eps)) {
    return [0.0, 1.0]
  }

  const tf = Math.cbrt(tolerance / s3)
  return [t - tf * (1.0 - t), t + tf * (1.0 - t)]
}
