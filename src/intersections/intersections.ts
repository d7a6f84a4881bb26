import {
  cubicBezierDeriv,
  cubicBezierDeriv2,
  cubicBezierDeriv3,
  cubicBezierPos,
  quadraticBezierDeriv,
  quadraticBezierDeriv2,
  quadraticBezierPos
} from '../bezier/math'
import { DEFAULT_EPSILON } from '../constants'
import { ellipseDeriv, ellipsePos, ellipseToCenter } from '../ellipse/math'
import { Point } from '../types/base'
import { ArcToCommand, CommandType, Segment } from '../types/paths'
import {
  angleBetween,
  angleBetweenExclusive,
  angleEqual,
  angleNorm,
  angleTime,
  equal,
  interval,
  solveCubicFormula,
  solveQuadraticFormula
} from '../utils/math'
import {
  add,
  crossProduct,
  dotProduct,
  interpolate,
  normalizeVector,
  pointsEqual,
  rotateAbout,
  scale,
  subtract,
  vectorAngle,
  vectorLength
} from '../utils/vector'

const ORIGIN: Point = { x: 0, y: 0 }

export class UnsupportedIntersectionError extends Error {
  constructor(
    public readonly typeA: CommandType,
    public readonly typeB: CommandType
  ) {
    super(`Unsupported intersection between ${typeA} and ${typeB} segments`)
    this.name = 'UnsupportedIntersectionError'
  }
}

// Intersection between segments A and B. Hits at an endpoint of either segment are tangent, the
// adjacent segment decides whether the path actually crosses there. Directions at endpoints of
// curves are rotated by a tiny angle so that into() stays meaningful when both are aligned.
export class Intersection {
  constructor(
    public point: Point,
    public t: [number, number],
    public dir: [number, number],
    public tangent: boolean,
    public same: boolean
  ) {}

  // Whether B enters the left-hand side of A, i.e. B goes to the right of A.
  into(): boolean {
    return angleBetweenExclusive(this.dir[1] - this.dir[0], Math.PI, 2.0 * Math.PI)
  }

  equals(other: Intersection, eps: number = DEFAULT_EPSILON): boolean {
    return (
      pointsEqual(this.point, other.point, eps) &&
      equal(this.t[0], other.t[0], eps) &&
      equal(this.t[1], other.t[1], eps) &&
      angleEqual(this.dir[0], other.dir[0], eps) &&
      angleEqual(this.dir[1], other.dir[1], eps) &&
      this.tangent === other.tangent &&
      this.same === other.same
    )
  }

  toString(): string {
    const deg = (theta: number): number => (angleNorm(theta) * 180.0) / Math.PI
    let extra = ''
    if (this.same) {
      extra = ' Same'
    } else if (this.tangent) {
      extra = ' Tangent'
    }
    return (
      `({${this.point.x},${this.point.y}} t={${this.t[0]},${this.t[1]}} ` +
      `dir={${deg(this.dir[0])}°,${deg(this.dir[1])}°}${extra})`
    )
  }
}

export function hasIntersections(zs: Intersection[]): boolean {
  return 0 < zs.length
}

// Whether the segments cut through each other somewhere.
export function hasSecant(zs: Intersection[]): boolean {
  return zs.some((z) => !z.tangent)
}

// Whether the segments touch without crossing somewhere.
export function hasTangent(zs: Intersection[]): boolean {
  return zs.some((z) => z.tangent)
}

function addIntersection(
  zs: Intersection[],
  point: Point,
  ta: number,
  tb: number,
  dira: number,
  dirb: number,
  tangent: boolean,
  same: boolean
): void {
  zs.push(
    new Intersection(
      point,
      [Math.min(1.0, Math.max(0.0, ta)), Math.min(1.0, Math.max(0.0, tb))],
      [dira, dirb],
      tangent,
      same
    )
  )
}

export interface ArcCenter {
  center: Point
  radius: Point
  phi: number
  theta0: number
  theta1: number
}

function arcCenter(seg: ArcToCommand & { start: Point }, eps: number): ArcCenter {
  const { cx, cy, theta0, theta1 } = ellipseToCenter(
    seg.start.x,
    seg.start.y,
    seg.rx,
    seg.ry,
    seg.rotation,
    seg.largeArc,
    seg.sweep,
    seg.end.x,
    seg.end.y,
    eps
  )
  return {
    center: { x: cx, y: cy },
    radius: { x: seg.rx, y: seg.ry },
    phi: seg.rotation,
    theta0,
    theta1
  }
}

// Intersections between two path segments, each given with its start point. At most two
// intersections are returned for line-line and line-curve pairs.
export function intersectionSegment(
  a: Segment,
  b: Segment,
  eps: number = DEFAULT_EPSILON
): Intersection[] {
  const zs: Intersection[] = []
  let swapped = false
  if (a.type === CommandType.LineTo || a.type === CommandType.Close) {
    switch (b.type) {
      case CommandType.LineTo:
      case CommandType.Close:
        intersectionLineLine(zs, a.start, a.end, b.start, b.end, eps)
        break
      case CommandType.QuadTo:
        intersectionLineQuad(zs, a.start, a.end, b.start, b.control, b.end, eps)
        break
      case CommandType.CubeTo:
        intersectionLineCube(zs, a.start, a.end, b.start, b.control1, b.control2, b.end, eps)
        break
      case CommandType.ArcTo: {
        const arc = arcCenter(b, eps)
        intersectionLineEllipse(zs, a.start, a.end, arc, eps)
        break
      }
    }
  } else if (b.type === CommandType.LineTo || b.type === CommandType.Close) {
    switch (a.type) {
      case CommandType.QuadTo:
        intersectionLineQuad(zs, b.start, b.end, a.start, a.control, a.end, eps)
        swapped = true
        break
      case CommandType.CubeTo:
        intersectionLineCube(zs, b.start, b.end, a.start, a.control1, a.control2, a.end, eps)
        swapped = true
        break
      case CommandType.ArcTo: {
        const arc = arcCenter(a, eps)
        intersectionLineEllipse(zs, b.start, b.end, arc, eps)
        swapped = true
        break
      }
    }
  } else if (a.type === CommandType.ArcTo && b.type === CommandType.ArcTo) {
    const arc0 = arcCenter(a, eps)
    const arc1 = arcCenter(b, eps)
    if (!equal(arc0.radius.x, arc0.radius.y, eps) || !equal(arc1.radius.x, arc1.radius.y, eps)) {
      throw new UnsupportedIntersectionError(a.type, b.type)
    }
    intersectionCircleArcs(zs, arc0, arc1, eps)
  } else if (a.type !== CommandType.MoveTo && b.type !== CommandType.MoveTo) {
    throw new UnsupportedIntersectionError(a.type, b.type)
  }

  if (swapped) {
    for (const z of zs) {
      z.t = [z.t[1], z.t[0]]
      z.dir = [z.dir[1], z.dir[0]]
    }
  }
  return zs
}

export function intersectionLineLine(
  zs: Intersection[],
  a0: Point,
  a1: Point,
  b0: Point,
  b1: Point,
  eps: number = DEFAULT_EPSILON
): Intersection[] {
  if (pointsEqual(a0, a1, eps) || pointsEqual(b0, b1, eps)) {
    // Zero-length Close.
    return zs
  }

  const da = subtract(a1, a0)
  const db = subtract(b1, b0)
  const anglea = vectorAngle(da)
  const angleb = vectorAngle(db)
  const lengtha = vectorLength(da)
  const lengthb = vectorLength(db)
  const div = crossProduct(da, db)

  // Relative to the lengths, otherwise the perp-dot of short segments drops below epsilon.
  if (equal(div / (lengtha * lengthb), 0.0, eps)) {
    if (equal(crossProduct(subtract(b0, a0), db) / lengthb, 0.0, eps)) {
      addLineLineOverlap(zs, a0, a1, b0, b1, anglea, angleb, eps)
    }
    return zs
  }

  // Endpoints are resolved exactly to avoid numerical noise.
  if (pointsEqual(a1, b0, eps)) {
    addIntersection(zs, a1, 1.0, 0.0, anglea, angleb, true, false)
    return zs
  } else if (pointsEqual(a0, b1, eps)) {
    addIntersection(zs, a0, 0.0, 1.0, anglea, angleb, true, false)
    return zs
  } else if (pointsEqual(a0, b0, eps)) {
    addIntersection(zs, a0, 0.0, 0.0, anglea, angleb, true, false)
    return zs
  } else if (pointsEqual(a1, b1, eps)) {
    addIntersection(zs, a1, 1.0, 1.0, anglea, angleb, true, false)
    return zs
  }

  const ta = crossProduct(db, subtract(a0, b0)) / div
  const tb = crossProduct(da, subtract(a0, b0)) / div
  if (interval(ta, 0.0, 1.0, eps) && interval(tb, 0.0, 1.0, eps)) {
    const tangent =
      equal(ta, 0.0, eps) || equal(ta, 1.0, eps) || equal(tb, 0.0, eps) || equal(tb, 1.0, eps)
    addIntersection(zs, interpolate(a0, a1, ta), ta, tb, anglea, angleb, tangent, false)
  }
  return zs
}

// Colinear segments. Positions are projected on the direction of A where A runs over [0, |A|];
// the shared run yields two tangent hits that are marked same, a single shared point one.
function addLineLineOverlap(
  zs: Intersection[],
  a0: Point,
  a1: Point,
  b0: Point,
  b1: Point,
  anglea: number,
  angleb: number,
  eps: number
): void {
  const ua = normalizeVector(subtract(a1, a0))
  const b = vectorLength(subtract(a1, a0))
  const c = dotProduct(subtract(b0, a0), ua)
  const d = dotProduct(subtract(b1, a0), ua)

  const lo = Math.max(0.0, Math.min(c, d))
  const hi = Math.min(b, Math.max(c, d))
  if (hi < lo - eps) {
    return
  }

  // Snap the ends of the run to the endpoints they come from.
  const hit = (s: number): [Point, number, number] => {
    if (equal(s, 0.0, eps)) {
      return [a0, 0.0, equal(c, 0.0, eps) ? 0.0 : equal(d, 0.0, eps) ? 1.0 : (0.0 - c) / (d - c)]
    } else if (equal(s, b, eps)) {
      return [a1, 1.0, equal(c, b, eps) ? 0.0 : equal(d, b, eps) ? 1.0 : (b - c) / (d - c)]
    } else if (equal(s, c, eps)) {
      return [b0, s / b, 0.0]
    }
    return [b1, s / b, 1.0]
  }

  if (hi - lo <= eps) {
    const [point, ta, tb] = hit(lo)
    addIntersection(zs, point, ta, tb, anglea, angleb, true, false)
    return
  }
  for (const s of [lo, hi]) {
    const [point, ta, tb] = hit(s)
    addIntersection(zs, point, ta, tb, anglea, angleb, true, true)
  }
}

// Rotation applied to a direction that is numerically parallel to the one it is compared with.
function nudgeAngle(eps: number): number {
  return 2.0 * eps
}

// Direction at an endpoint hit rotated a tiny bit towards the side the curve bends to.
function nudgeDirection(dir: number, ccw: boolean, atStart: boolean, eps: number): number {
  // At the start of a CCW curve or the end of a CW curve the direction turns anticlockwise.
  if (ccw === atStart) {
    return angleNorm(dir + nudgeAngle(eps))
  }
  return angleNorm(dir - nudgeAngle(eps))
}

function realRoots(roots: number[]): number[] {
  return roots.filter((root) => !Number.isNaN(root))
}

// The line is written as A.X = bias, see
// https://www.particleincell.com/2013/cubic-line-intersection/
export function intersectionLineQuad(
  zs: Intersection[],
  l0: Point,
  l1: Point,
  p0: Point,
  p1: Point,
  p2: Point,
  eps: number = DEFAULT_EPSILON
): Intersection[] {
  if (pointsEqual(l0, l1, eps)) {
    return zs
  }

  const A = { x: l1.y - l0.y, y: l0.x - l1.x }
  const bias = dotProduct(l0, A)
  const a = dotProduct(A, add(subtract(p0, scale(p1, 2.0)), p2))
  const b = dotProduct(A, scale(subtract(p1, p0), 2.0))
  const c = dotProduct(A, p0) - bias

  const dira = vectorAngle(subtract(l1, l0))
  const horizontal = Math.abs(l1.y - l0.y) <= Math.abs(l1.x - l0.x)
  for (const root of realRoots(solveQuadraticFormula(a, b, c, eps))) {
    if (!interval(root, 0.0, 1.0, eps)) {
      continue
    }
    const pos = quadraticBezierPos(p0, p1, p2, root)
    const s = horizontal ? (pos.x - l0.x) / (l1.x - l0.x) : (pos.y - l0.y) / (l1.y - l0.y)
    if (!interval(s, 0.0, 1.0, eps)) {
      continue
    }

    const deriv = quadraticBezierDeriv(p0, p1, p2, root)
    let dirb = vectorAngle(deriv)
    const endpoint =
      equal(root, 0.0, eps) || equal(root, 1.0, eps) || equal(s, 0.0, eps) || equal(s, 1.0, eps)
    if (endpoint) {
      const ccw = 0.0 <= crossProduct(deriv, quadraticBezierDeriv2(p0, p1, p2))
      const atStart = equal(root, 0.0, eps) || (!equal(root, 1.0, eps) && equal(s, 0.0, eps))
      dirb = nudgeDirection(dirb, ccw, atStart, eps)
    }
    const tangent = endpoint || equal(dotProduct(A, deriv), 0.0, eps)
    addIntersection(zs, pos, s, root, dira, dirb, tangent, false)
  }
  return zs
}

export function intersectionLineCube(
  zs: Intersection[],
  l0: Point,
  l1: Point,
  p0: Point,
  p1: Point,
  p2: Point,
  p3: Point,
  eps: number = DEFAULT_EPSILON
): Intersection[] {
  if (pointsEqual(l0, l1, eps)) {
    return zs
  }

  const A = { x: l1.y - l0.y, y: l0.x - l1.x }
  const bias = dotProduct(l0, A)
  const a = dotProduct(A, subtract(add(subtract(p3, p0), scale(p1, 3.0)), scale(p2, 3.0)))
  const b = dotProduct(A, add(subtract(scale(p0, 3.0), scale(p1, 6.0)), scale(p2, 3.0)))
  const c = dotProduct(A, subtract(scale(p1, 3.0), scale(p0, 3.0)))
  const d = dotProduct(A, p0) - bias

  const dira = vectorAngle(subtract(l1, l0))
  const horizontal = Math.abs(l1.y - l0.y) <= Math.abs(l1.x - l0.x)
  for (const root of realRoots(solveCubicFormula(a, b, c, d, eps))) {
    if (!interval(root, 0.0, 1.0, eps)) {
      continue
    }
    const pos = cubicBezierPos(p0, p1, p2, p3, root)
    const s = horizontal ? (pos.x - l0.x) / (l1.x - l0.x) : (pos.y - l0.y) / (l1.y - l0.y)
    if (!interval(s, 0.0, 1.0, eps)) {
      continue
    }

    const deriv = cubicBezierDeriv(p0, p1, p2, p3, root)
    let dirb = vectorAngle(deriv)
    let tangent = equal(dotProduct(A, deriv), 0.0, eps)
    const endpoint =
      equal(root, 0.0, eps) || equal(root, 1.0, eps) || equal(s, 0.0, eps) || equal(s, 1.0, eps)
    if (endpoint) {
      const ccw = 0.0 <= crossProduct(deriv, cubicBezierDeriv2(p0, p1, p2, p3, root))
      const atStart = equal(root, 0.0, eps) || (!equal(root, 1.0, eps) && equal(s, 0.0, eps))
      dirb = nudgeDirection(dirb, ccw, atStart, eps)
    } else if (angleEqual(dira, dirb, eps) || angleEqual(dira, dirb + Math.PI, eps)) {
      // Parallel at an inflection point, the curve does cross the line.
      const deriv2 = cubicBezierDeriv2(p0, p1, p2, p3, root)
      if (equal(deriv2.x, 0.0, eps) && equal(deriv2.y, 0.0, eps)) {
        const deriv3 = cubicBezierDeriv3(p0, p1, p2, p3)
        if (0.0 < crossProduct(deriv, deriv3)) {
          dirb = angleNorm(dirb + nudgeAngle(eps))
        } else {
          dirb = angleNorm(dirb - nudgeAngle(eps))
        }
        tangent = false
      }
    }
    addIntersection(zs, pos, s, root, dira, dirb, endpoint || tangent, false)
  }
  return zs
}

// Shared handling of line-arc hits: unwraps the angle into the arc's range, nudges the arc
// direction at endpoints and snaps both parameters to the segment ends.
function addLineArcIntersection(
  zs: Intersection[],
  pos: Point,
  dira: number,
  dirb: number,
  t: number,
  t0: number,
  t1: number,
  angle: number,
  theta0: number,
  theta1: number,
  tangent: boolean,
  eps: number
): void {
  if (theta0 <= theta1) {
    angle = theta0 - eps + angleNorm(angle - theta0 + eps)
  } else {
    angle = theta1 - eps + angleNorm(angle - theta1 + eps)
  }
  const endpoint =
    equal(t, t0, eps) || equal(t, t1, eps) || equal(angle, theta0, eps) || equal(angle, theta1, eps)
  if (endpoint) {
    const atStart = equal(angle, theta0, eps) || (!equal(angle, theta1, eps) && equal(t, t0, eps))
    dirb = nudgeDirection(dirb, theta0 <= theta1, atStart, eps)
  }

  if (equal(t, t0, eps)) {
    t = 0.0
  } else if (equal(t, t1, eps)) {
    t = 1.0
  } else {
    t = (t - t0) / (t1 - t0)
  }
  let s: number
  if (equal(angle, theta0, eps)) {
    s = 0.0
  } else if (equal(angle, theta1, eps)) {
    s = 1.0
  } else {
    s = (angle - theta0) / (theta1 - theta0)
  }
  addIntersection(zs, pos, t, s, dira, dirb, endpoint || tangent, false)
}

// See https://www.geometrictools.com/GTE/Mathematics/IntrLine2Circle2.h
export function intersectionLineCircle(
  zs: Intersection[],
  l0: Point,
  l1: Point,
  center: Point,
  radius: number,
  theta0: number,
  theta1: number,
  eps: number = DEFAULT_EPSILON
): Intersection[] {
  if (pointsEqual(l0, l1, eps)) {
    return zs
  }

  // With a unit direction D the roots of |l0 + t.D - C|^2 = R^2 lie in [0, length].
  const dir = subtract(l1, l0)
  const diff = subtract(l0, center)
  const length = vectorLength(dir)
  const D = scale(dir, 1.0 / length)

  const b = 2.0 * dotProduct(D, diff)
  const c = dotProduct(diff, diff) - radius * radius
  const [r0, r1] = solveQuadraticFormula(1.0, b, c, eps)
  const roots: number[] = []
  if (!Number.isNaN(r0)) {
    roots.push(r0)
    if (!Number.isNaN(r1) && !equal(r0, r1, eps)) {
      roots.push(r1)
    }
  }

  // Snap the closest root to a line endpoint lying on the circle.
  if (0 < roots.length) {
    if (equal(vectorLength(subtract(l0, center)), radius, eps)) {
      if (roots.length === 1 || Math.abs(roots[0]) < Math.abs(roots[1])) {
        roots[0] = 0.0
      } else {
        roots[1] = 0.0
      }
    }
    if (equal(vectorLength(subtract(l1, center)), radius, eps)) {
      if (roots.length === 1 || Math.abs(roots[0] - length) < Math.abs(roots[1] - length)) {
        roots[0] = length
      } else {
        roots[1] = length
      }
    }
  }

  const dira = vectorAngle(dir)
  const tangent = roots.length === 1
  for (const root of roots) {
    const pos = add(diff, scale(dir, root / length))
    const angle = Math.atan2(pos.y * radius, pos.x * radius)
    if (interval(root, 0.0, length, eps) && angleBetween(angle, theta0, theta1, eps)) {
      const dirb = vectorAngle(ellipseDeriv(radius, radius, 0.0, theta0 <= theta1, angle))
      addLineArcIntersection(
        zs,
        add(center, pos),
        dira,
        dirb,
        root,
        0.0,
        length,
        angle,
        theta0,
        theta1,
        tangent,
        eps
      )
    }
  }
  return zs
}

export function intersectionLineEllipse(
  zs: Intersection[],
  l0: Point,
  l1: Point,
  arc: ArcCenter,
  eps: number = DEFAULT_EPSILON
): Intersection[] {
  const { center, radius, phi, theta0, theta1 } = arc
  if (equal(radius.x, radius.y, eps)) {
    return intersectionLineCircle(zs, l0, l1, center, radius.x, theta0, theta1, eps)
  } else if (pointsEqual(l0, l1, eps)) {
    return zs
  }

  const dira = vectorAngle(subtract(l1, l0))

  // Take the ellipse center as origin and undo its rotation.
  l0 = rotateAbout(subtract(l0, center), -phi, ORIGIN)
  l1 = rotateAbout(subtract(l1, center), -phi, ORIGIN)

  // Line c.x + d.y + e = 0 and ellipse x^2/a + y^2/b = 1.
  const c = l0.y - l1.y
  const d = l1.x - l0.x
  const e = crossProduct(l0, l1)
  const horizontal = Math.abs(c) <= Math.abs(d)
  const a = radius.x * radius.x
  const b = radius.y * radius.y

  // Substitute y (horizontal) or x to get A.u^2 + B.u + C = 0.
  const A = a * c * c + b * d * d
  const B = horizontal ? 2.0 * a * c * e : 2.0 * b * d * e
  const C = horizontal ? a * e * e - a * b * d * d : b * e * e - a * b * c * c

  const [r0, r1] = solveQuadraticFormula(A, B, C, eps)
  const roots: number[] = []
  if (!Number.isNaN(r0)) {
    roots.push(r0)
    if (!Number.isNaN(r1) && !equal(r0, r1, eps)) {
      roots.push(r1)
    }
  }

  const tangent = roots.length === 1
  for (const root of roots) {
    const x = horizontal ? root : -e / c - (d * root) / c
    const y = horizontal ? -e / d - (c * root) / d : root
    const t0 = horizontal ? l0.x : l0.y
    const t1 = horizontal ? l1.x : l1.y

    const angle = Math.atan2(y * radius.x, x * radius.y)
    if (
      interval(root, Math.min(t0, t1), Math.max(t0, t1), eps) &&
      angleBetween(angle, theta0, theta1, eps)
    ) {
      const pos = add(rotateAbout({ x, y }, phi, ORIGIN), center)
      const dirb = vectorAngle(ellipseDeriv(radius.x, radius.y, phi, theta0 <= theta1, angle))
      addLineArcIntersection(
        zs,
        pos,
        dira,
        dirb,
        root,
        t0,
        t1,
        angle,
        theta0,
        theta1,
        tangent,
        eps
      )
    }
  }
  return zs
}

// Circular arcs only. Coincident arcs give up to four same hits (touching or overlapping).
function intersectionCircleArcs(
  zs: Intersection[],
  arc0: ArcCenter,
  arc1: ArcCenter,
  eps: number
): void {
  const direction = (theta: number, ccw: boolean): number =>
    angleNorm(theta + Math.PI / 2.0 + (ccw ? 0.0 : -Math.PI))

  const c0 = arc0.center
  const c1 = arc1.center
  const r0 = arc0.radius.x
  const r1 = arc1.radius.x

  // Angles measured from the x-axis, including the rotation of each arc.
  const dtheta0 = arc0.theta1 - arc0.theta0
  const start0 = angleNorm(arc0.theta0 + arc0.phi)
  const end0 = start0 + dtheta0
  const dtheta1 = arc1.theta1 - arc1.theta0
  let start1 = angleNorm(arc1.theta0 + arc1.phi)
  let end1 = start1 + dtheta1

  if (pointsEqual(c0, c1, eps) && equal(r0, r1, eps)) {
    let tOffset = 0.0
    let dirOffset = 0.0
    if (0.0 <= dtheta0 !== 0.0 <= dtheta1) {
      // Keep the orientation of the first arc.
      ;[start1, end1] = [end1, start1]
      dirOffset = Math.PI
      tOffset = 1.0
    }
    const ccw = 0.0 <= dtheta0
    const at = (theta: number): Point => ellipsePos(r0, r0, 0.0, c0.x, c0.y, theta)

    const t0 = angleTime(start0, start1, end1, eps)
    if (interval(t0, 0.0, 1.0, eps)) {
      const dir = direction(start0, ccw)
      const t = Math.abs(t0 - tOffset)
      addIntersection(zs, at(start0), 0.0, t, dir, angleNorm(dir + dirOffset), true, true)
    }
    const t1 = angleTime(start1, start0, end0, eps)
    if (eps < t1 && t1 < 1.0 - eps) {
      const dir = direction(start1, ccw)
      addIntersection(zs, at(start1), t1, tOffset, dir, angleNorm(dir + dirOffset), true, true)
    }
    const t2 = angleTime(end1, start0, end0, eps)
    if (eps < t2 && t2 < 1.0 - eps) {
      const dir = direction(end1, ccw)
      addIntersection(zs, at(end1), t2, 1.0 - tOffset, dir, angleNorm(dir + dirOffset), true, true)
    }
    const t3 = angleTime(end0, start1, end1, eps)
    if (interval(t3, 0.0, 1.0, eps)) {
      const dir = direction(end0, ccw)
      const t = Math.abs(t3 - tOffset)
      addIntersection(zs, at(end0), 1.0, t, dir, angleNorm(dir + dirOffset), true, true)
    }
    return
  }

  const hits = intersectionCircleCircle(c0, r0, c1, r1, eps)
  if (hits === undefined) {
    return
  }
  const tangent = pointsEqual(hits[0], hits[1], eps)
  for (const hit of tangent ? [hits[0]] : hits) {
    const angle0 = vectorAngle(subtract(hit, c0))
    const angle1 = vectorAngle(subtract(hit, c1))
    const ta = angleTime(angle0, start0, end0, eps)
    const tb = angleTime(angle1, start1, end1, eps)
    if (interval(ta, 0.0, 1.0, eps) && interval(tb, 0.0, 1.0, eps)) {
      const endpoint =
        equal(ta, 0.0, eps) || equal(ta, 1.0, eps) || equal(tb, 0.0, eps) || equal(tb, 1.0, eps)
      const dir0 = direction(angle0, 0.0 <= dtheta0)
      const dir1 = direction(angle1, 0.0 <= dtheta1)
      addIntersection(zs, hit, ta, tb, dir0, dir1, tangent || endpoint, false)
    }
  }
}

// Intersection of the infinite line through a0 and a1 with segment b0-b1.
export function intersectionRayLine(
  a0: Point,
  a1: Point,
  b0: Point,
  b1: Point,
  eps: number = DEFAULT_EPSILON
): Point | undefined {
  const da = subtract(a1, a0)
  const db = subtract(b1, b0)
  const div = crossProduct(da, db)
  if (equal(div, 0.0, eps)) {
    return undefined
  }

  const tb = crossProduct(da, subtract(a0, b0)) / div
  if (interval(tb, 0.0, 1.0, eps)) {
    return interpolate(b0, b1, tb)
  }
  return undefined
}

// Intersections of the infinite line through l0 and l1 with a circle,
// see https://mathworld.wolfram.com/Circle-LineIntersection.html
export function intersectionRayCircle(
  l0: Point,
  l1: Point,
  c: Point,
  r: number
): [Point, Point] | undefined {
  const d = normalizeVector(subtract(l1, l0))
  const D = crossProduct(subtract(l0, c), d)
  let discriminant = r * r - D * D
  if (discriminant < 0.0) {
    return undefined
  }
  discriminant = Math.sqrt(discriminant)

  const ax = D * d.y
  let bx = d.x * discriminant
  if (d.y < 0.0) {
    bx = -bx
  }
  const ay = -D * d.x
  const by = Math.abs(d.y) * discriminant
  return [add(c, { x: ax + bx, y: ay + by }), add(c, { x: ax - bx, y: ay - by })]
}

// See https://math.stackexchange.com/questions/256100
export function intersectionCircleCircle(
  c0: Point,
  r0: number,
  c1: Point,
  r1: number,
  eps: number = DEFAULT_EPSILON
): [Point, Point] | undefined {
  const R = vectorLength(subtract(c0, c1))
  if (R < Math.abs(r0 - r1) - eps || r0 + r1 + eps < R || pointsEqual(c0, c1, eps)) {
    return undefined
  }
  const R2 = R * R

  const k = r0 * r0 - r1 * r1
  const a = 0.5
  const b = (0.5 * k) / R2
  const disc = (2.0 * (r0 * r0 + r1 * r1)) / R2 - (k * k) / (R2 * R2) - 1.0
  const c = 0.5 * Math.sqrt(Math.max(0.0, disc))

  const i0 = scale(add(c0, c1), a)
  const i1 = scale(subtract(c1, c0), b)
  const i2 = scale({ x: c1.y - c0.y, y: c0.x - c1.x }, c)
  return [add(add(i0, i1), i2), subtract(add(i0, i1), i2)]
}
