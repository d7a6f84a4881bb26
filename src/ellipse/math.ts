import { DEFAULT_EPSILON } from '../constants'
import { Point, Vector } from '../types/base'
import { angleBetween, angleNorm, equal, gaussLegendre5 } from '../utils/math'
import { crossProduct, normalizeVector, rotate90CW, subtract, vectorLength } from '../utils/vector'

// Center parametrization of an elliptical arc. The arc runs from theta0 to theta1, clockwise when
// theta1 < theta0. Angles are those of the ellipse before it is stretched and rotated.
export interface EllipseCenter {
  cx: number
  cy: number
  theta0: number
  theta1: number
}

export interface EllipseSplit {
  mid: Point
  large0: boolean
  large1: boolean
}

export function ellipsePos(
  rx: number,
  ry: number,
  phi: number,
  cx: number,
  cy: number,
  theta: number
): Point {
  const sintheta = Math.sin(theta)
  const costheta = Math.cos(theta)
  const sinphi = Math.sin(phi)
  const cosphi = Math.cos(phi)
  return {
    x: cx + rx * costheta * cosphi - ry * sintheta * sinphi,
    y: cy + rx * costheta * sinphi + ry * sintheta * cosphi
  }
}

export function ellipseDeriv(
  rx: number,
  ry: number,
  phi: number,
  sweep: boolean,
  theta: number
): Vector {
  const sintheta = Math.sin(theta)
  const costheta = Math.cos(theta)
  const sinphi = Math.sin(phi)
  const cosphi = Math.cos(phi)
  const dx = -rx * sintheta * cosphi - ry * costheta * sinphi
  const dy = -rx * sintheta * sinphi + ry * costheta * cosphi
  if (!sweep) {
    return { x: -dx, y: -dy }
  }
  return { x: dx, y: dy }
}

export function ellipseDeriv2(rx: number, ry: number, phi: number, theta: number): Vector {
  const sintheta = Math.sin(theta)
  const costheta = Math.cos(theta)
  const sinphi = Math.sin(phi)
  const cosphi = Math.cos(phi)
  return {
    x: -rx * costheta * cosphi + ry * sintheta * sinphi,
    y: -rx * costheta * sinphi - ry * sintheta * cosphi
  }
}

// Positive for anticlockwise arcs. The rotation has no influence on the curvature.
export function ellipseCurvatureRadius(
  rx: number,
  ry: number,
  sweep: boolean,
  theta: number,
  eps: number = DEFAULT_EPSILON
): number {
  const dp = ellipseDeriv(rx, ry, 0.0, sweep, theta)
  const ddp = ellipseDeriv2(rx, ry, 0.0, theta)
  const a = crossProduct(dp, ddp)
  if (equal(a, 0.0, eps)) {
    return NaN
  }
  return Math.pow(dp.x * dp.x + dp.y * dp.y, 1.5) / a
}

// Normal of length d to the right of the arc at angle theta.
export function ellipseNormal(
  rx: number,
  ry: number,
  phi: number,
  sweep: boolean,
  theta: number,
  d: number
): Vector {
  return normalizeVector(rotate90CW(ellipseDeriv(rx, ry, phi, sweep, theta)), d)
}

// Arc length with Gauss-Legendre (n=5), the error is about 1% or less.
export function ellipseLength(rx: number, ry: number, theta1: number, theta2: number): number {
  if (theta2 < theta1) {
    ;[theta1, theta2] = [theta2, theta1]
  }
  const speed = (theta: number): number => vectorLength(ellipseDeriv(rx, ry, 0.0, true, theta))
  return gaussLegendre5(speed, theta1, theta2)
}

// Convert the endpoint parametrization to the center parametrization. theta0 lies in [0, 2π) and
// theta1 in (-2π, 4π). See https://www.w3.org/TR/SVG/implnote.html#ArcImplementationNotes
export function ellipseToCenter(
  x1: number,
  y1: number,
  rx: number,
  ry: number,
  phi: number,
  large: boolean,
  sweep: boolean,
  x2: number,
  y2: number,
  eps: number = DEFAULT_EPSILON
): EllipseCenter {
  if (equal(x1, x2, eps) && equal(y1, y2, eps)) {
    return { cx: x1, cy: y1, theta0: 0.0, theta1: 0.0 }
  } else if (
    equal(Math.abs(x2 - x1), 2.0 * rx, eps) &&
    equal(y1, y2, eps) &&
    equal(phi, 0.0, eps)
  ) {
    // Half circle from (+dx,0) to (-dx,0) or back, the usual way circles are written.
    const theta = x1 < x2 ? Math.PI : 0.0
    const delta = sweep ? Math.PI : -Math.PI
    return { cx: x1 + (x2 - x1) / 2.0, cy: y1, theta0: theta, theta1: theta + delta }
  }

  // Half distance between start and end point for the unrotated ellipse.
  const sinphi = Math.sin(phi)
  const cosphi = Math.cos(phi)
  const x1p = (cosphi * (x1 - x2)) / 2.0 + (sinphi * (y1 - y2)) / 2.0
  const y1p = (-sinphi * (x1 - x2)) / 2.0 + (cosphi * (y1 - y2)) / 2.0

  // Scale up radii that are too small for the chord.
  const radiiCheck = (x1p * x1p) / rx / rx + (y1p * y1p) / ry / ry
  if (1.0 < radiiCheck) {
    const radiiScale = Math.sqrt(radiiCheck)
    rx *= radiiScale
    ry *= radiiScale
  }

  let sq =
    (rx * rx * ry * ry - rx * rx * y1p * y1p - ry * ry * x1p * x1p) /
    (rx * rx * y1p * y1p + ry * ry * x1p * x1p)
  if (sq <= eps) {
    // Start and end lie opposite each other through the center.
    sq = 0.0
  }
  let coef = Math.sqrt(sq)
  if (large === sweep) {
    coef = -coef
  }
  const cxp = (coef * rx * y1p) / ry
  const cyp = (coef * -ry * x1p) / rx
  const cx = cosphi * cxp - sinphi * cyp + (x1 + x2) / 2.0
  const cy = sinphi * cxp + cosphi * cyp + (y1 + y2) / 2.0

  const ux = (x1p - cxp) / rx
  const uy = (y1p - cyp) / ry
  const vx = -(x1p + cxp) / rx
  const vy = -(y1p + cyp) / ry

  let theta = Math.acos(ux / Math.sqrt(ux * ux + uy * uy))
  if (uy < 0.0) {
    theta = -theta
  }
  theta = angleNorm(theta)

  let deltaAcos = (ux * vx + uy * vy) / Math.sqrt((ux * ux + uy * uy) * (vx * vx + vy * vy))
  deltaAcos = Math.min(1.0, Math.max(-1.0, deltaAcos))
  let delta = Math.acos(deltaAcos)
  if (ux * vy - uy * vx < 0.0) {
    delta = -delta
  }
  if (!sweep && 0.0 < delta) {
    delta -= 2.0 * Math.PI
  } else if (sweep && delta < 0.0) {
    delta += 2.0 * Math.PI
  }
  return { cx, cy, theta0: theta, theta1: theta + delta }
}

// Factor by which the radii must grow to span the chord, see
// https://www.w3.org/TR/SVG/implnote.html#ArcCorrectionOutOfRangeRadii
export function ellipseRadiiCorrection(
  start: Point,
  rx: number,
  ry: number,
  phi: number,
  end: Point
): number {
  const diff = subtract(start, end)
  const sinphi = Math.sin(phi)
  const cosphi = Math.cos(phi)
  const x1p = (cosphi * diff.x + sinphi * diff.y) / 2.0
  const y1p = (-sinphi * diff.x + cosphi * diff.y) / 2.0
  return Math.sqrt((x1p * x1p) / rx / rx + (y1p * y1p) / ry / ry)
}

// Split the arc at angle theta, returning the split point and the large-arc flags of both halves.
// Returns undefined when theta is outside of the arc.
export function ellipseSplit(
  rx: number,
  ry: number,
  phi: number,
  cx: number,
  cy: number,
  theta0: number,
  theta1: number,
  theta: number,
  eps: number = DEFAULT_EPSILON
): EllipseSplit | undefined {
  if (!angleBetween(theta, theta0, theta1, eps)) {
    return undefined
  }

  const mid = ellipsePos(rx, ry, phi, cx, cy, theta)
  let large0 = false
  let large1 = false
  if (Math.abs(theta - theta0) > Math.PI) {
    large0 = true
  } else if (Math.abs(theta - theta1) > Math.PI) {
    large1 = true
  }
  return { mid, large0, large1 }
}
