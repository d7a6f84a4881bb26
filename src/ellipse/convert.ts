import { flattenCubicBezier } from '../bezier/flatten'
import { DEFAULT_EPSILON } from '../constants'
import { Point } from '../types/base'
import { CubicCurve, QuadraticCurve } from '../types/paths'
import { angleEqual, angleNorm, equal } from '../utils/math'
import { add, scale, subtract } from '../utils/vector'
import { ellipseDeriv, ellipsePos, ellipseToCenter } from './math'

// Split the sweep of the arc in pieces of at most a quarter turn.
function quarterSteps(theta0: number, theta1: number, sweep: boolean): [number, number] {
  const n = Math.ceil(Math.abs(theta1 - theta0) / (Math.PI / 2.0))
  const dtheta = Math.abs(theta1 - theta0) / n
  return [n, sweep ? dtheta : -dtheta]
}

// See Drawing an elliptical arc using polylines, quadratic or cubic Bezier curves (2003),
// L. Maisonobe, https://spaceroots.org/documents/ellipse/elliptical-arc.pdf
export function ellipseToQuadraticBeziers(
  start: Point,
  rx: number,
  ry: number,
  phi: number,
  large: boolean,
  sweep: boolean,
  end: Point,
  eps: number = DEFAULT_EPSILON
): QuadraticCurve[] {
  const { cx, cy, theta0, theta1 } = ellipseToCenter(
    start.x,
    start.y,
    rx,
    ry,
    phi,
    large,
    sweep,
    end.x,
    end.y,
    eps
  )
  const [n, dtheta] = quarterSteps(theta0, theta1, sweep)
  const kappa = Math.tan(Math.abs(dtheta) / 2.0)

  const beziers: QuadraticCurve[] = []
  let startDeriv = ellipseDeriv(rx, ry, phi, sweep, theta0)
  for (let i = 1; i < n + 1; i++) {
    const theta = theta0 + i * dtheta
    const pos = ellipsePos(rx, ry, phi, cx, cy, theta)
    beziers.push([start, add(start, scale(startDeriv, kappa)), pos])

    startDeriv = ellipseDeriv(rx, ry, phi, sweep, theta)
    start = pos
  }
  return beziers
}

export function ellipseToCubicBeziers(
  start: Point,
  rx: number,
  ry: number,
  phi: number,
  large: boolean,
  sweep: boolean,
  end: Point,
  eps: number = DEFAULT_EPSILON
): CubicCurve[] {
  const { cx, cy, theta0, theta1 } = ellipseToCenter(
    start.x,
    start.y,
    rx,
    ry,
    phi,
    large,
    sweep,
    end.x,
    end.y,
    eps
  )
  const [n, dtheta] = quarterSteps(theta0, theta1, sweep)
  const h = Math.abs(dtheta)
  const tanHalf = Math.tan(h / 2.0)
  const kappa = (Math.sin(h) * (Math.sqrt(4.0 + 3.0 * tanHalf * tanHalf) - 1.0)) / 3.0

  const beziers: CubicCurve[] = []
  let startDeriv = ellipseDeriv(rx, ry, phi, sweep, theta0)
  for (let i = 1; i < n + 1; i++) {
    const theta = theta0 + i * dtheta
    const pos = ellipsePos(rx, ry, phi, cx, cy, theta)
    const endDeriv = ellipseDeriv(rx, ry, phi, sweep, theta)

    const cp1 = add(start, scale(startDeriv, kappa))
    const cp2 = subtract(pos, scale(endDeriv, kappa))
    beziers.push([start, cp1, cp2, pos])

    startDeriv = endDeriv
    start = pos
  }
  return beziers
}

// End points of the x-monotone pieces of the arc, split at the two vertical tangents. Each piece is
// a small arc with the same radii, rotation and sweep.
export function xmonotoneEllipticArc(
  start: Point,
  rx: number,
  ry: number,
  phi: number,
  large: boolean,
  sweep: boolean,
  end: Point,
  eps: number = DEFAULT_EPSILON
): Point[] {
  const sign = sweep ? 1.0 : -1.0

  const { cx, cy, theta0, theta1 } = ellipseToCenter(
    start.x,
    start.y,
    rx,
    ry,
    phi,
    large,
    sweep,
    end.x,
    end.y,
    eps
  )
  const sinphi = Math.sin(phi)
  const cosphi = Math.cos(phi)
  const thetaRight = Math.atan2(-ry * sinphi, rx * cosphi)
  const thetaLeft = thetaRight + Math.PI

  const ends: Point[] = []
  let left =
    !angleEqual(thetaLeft, theta0, eps) &&
    angleNorm(sign * (thetaLeft - theta0)) < angleNorm(sign * (thetaRight - theta0))
  for (let t = theta0; !angleEqual(t, theta1, eps); ) {
    let dt = angleNorm(sign * (theta1 - t))
    if (left) {
      dt = Math.min(dt, angleNorm(sign * (thetaLeft - t)))
    } else {
      dt = Math.min(dt, angleNorm(sign * (thetaRight - t)))
    }
    t += sign * dt

    ends.push(ellipsePos(rx, ry, phi, cx, cy, t))
    left = !left
  }
  return ends
}

// Polyline vertices after the start point. Circular arcs are flattened directly, alternating
// between the outer and inner tolerance circles; other arcs go through cubic Beziers.
export function flattenEllipticArc(
  start: Point,
  rx: number,
  ry: number,
  phi: number,
  large: boolean,
  sweep: boolean,
  end: Point,
  tolerance: number,
  eps: number = DEFAULT_EPSILON
): Point[] {
  if (equal(rx, ry, eps)) {
    let r = rx
    const { cx, cy, ...angles } = ellipseToCenter(
      start.x,
      start.y,
      rx,
      ry,
      phi,
      large,
      sweep,
      end.x,
      end.y,
      eps
    )
    const theta0 = angles.theta0 + phi
    const theta1 = angles.theta1 + phi

    // Segments run from just outside the arc to just outside the arc, touching the inner
    // tolerance circle halfway; the first and last segments start on the arc itself.
    const dtheta = Math.abs(theta1 - theta0)
    let thetam = Math.acos(r / (r + tolerance))
    let thetat = Math.acos(r / (r + 2.0 * tolerance))
    const n = Math.ceil((dtheta - thetam * 2.0) / (thetat * 2.0))

    const ratio = dtheta / (thetam * 2.0 + thetat * 2.0 * n)
    thetam *= ratio
    thetat *= ratio
    r += ratio * tolerance

    const points: Point[] = []
    let theta = thetam + thetat
    for (let i = 0; i < n; i++) {
      const t = theta0 + Math.sign(theta1 - theta0) * theta
      points.push({ x: cx + r * Math.cos(t), y: cy + r * Math.sin(t) })
      theta += 2.0 * thetat
    }
    points.push(end)
    return points
  }

  const points: Point[] = []
  const beziers = ellipseToCubicBeziers(start, rx, ry, phi, large, sweep, end, eps)
  for (const [p0, p1, p2, p3] of beziers) {
    points.push(...flattenCubicBezier(p0, p1, p2, p3, tolerance, eps))
  }
  return points
}
