import { DEFAULT_MITER_LIMIT } from '../constants'
import { ellipseNormal, ellipsePos, ellipseToCenter } from '../ellipse/math'
import {
  intersectionCircleCircle,
  intersectionRayCircle,
  intersectionRayLine
} from '../intersections/intersections'
import type { Path } from '../paths/path'
import { Point } from '../types/base'
import { angleNorm } from '../utils/math'
import {
  add,
  computeAngleBetweenVectors,
  dotProduct,
  interpolate,
  negate,
  normalizeVector,
  pointsEqual,
  rotate90CCW,
  rotate90CW,
  subtract,
  vectorAngle,
  vectorLength
} from '../utils/vector'

export enum JoinerType {
  Bevel = 'bevel',
  Round = 'round',
  Miter = 'miter',
  Arcs = 'arcs'
}

export interface BevelJoiner {
  type: JoinerType.Bevel
}

export interface RoundJoiner {
  type: JoinerType.Round
}

// Miter and arcs joins that reach further than limit times the half width fall back to the gap
// joiner, or are clipped at the limit when there is none.
export interface MiterJoiner {
  type: JoinerType.Miter
  gapJoiner?: Joiner
  limit: number
}

export interface ArcsJoiner {
  type: JoinerType.Arcs
  gapJoiner?: Joiner
  limit: number
}

export type Joiner = BevelJoiner | RoundJoiner | MiterJoiner | ArcsJoiner

export const BevelJoin: Joiner = { type: JoinerType.Bevel }
export const RoundJoin: Joiner = { type: JoinerType.Round }
export const MiterJoin: Joiner = {
  type: JoinerType.Miter,
  gapJoiner: BevelJoin,
  limit: DEFAULT_MITER_LIMIT
}
export const MiterClipJoin: Joiner = { type: JoinerType.Miter, limit: DEFAULT_MITER_LIMIT }
export const ArcsJoin: Joiner = {
  type: JoinerType.Arcs,
  gapJoiner: BevelJoin,
  limit: DEFAULT_MITER_LIMIT
}
export const ArcsClipJoin: Joiner = { type: JoinerType.Arcs, limit: DEFAULT_MITER_LIMIT }

export function parseJoiner(value: string): Joiner | undefined {
  switch (value) {
    case 'bevel':
      return BevelJoin
    case 'round':
      return RoundJoin
    case 'miter':
      return MiterJoin
    case 'miter-clip':
      return MiterClipJoin
    case 'arcs':
      return ArcsJoin
    case 'arcs-clip':
      return ArcsClipJoin
    default:
      return undefined
  }
}

export function joinerName(joiner: Joiner): string {
  switch (joiner.type) {
    case JoinerType.Bevel:
      return 'Bevel'
    case JoinerType.Round:
      return 'Round'
    case JoinerType.Miter:
      return joiner.gapJoiner === undefined ? 'MiterClip' : 'Miter'
    case JoinerType.Arcs:
      return joiner.gapJoiner === undefined ? 'ArcsClip' : 'Arcs'
  }
}

// Joins the right-hand side rhs and left-hand side lhs of a stroke around pivot, from the normal
// n0 of the previous segment to the normal n1 of the next one. Both normals have the half width
// as length. r0 and r1 are the curvature radii at the join, NaN for lines.
export function join(
  joiner: Joiner,
  rhs: Path,
  lhs: Path,
  halfWidth: number,
  pivot: Point,
  n0: Point,
  n1: Point,
  r0: number,
  r1: number
): void {
  switch (joiner.type) {
    case JoinerType.Bevel:
      bevelJoin(rhs, lhs, pivot, n1)
      break
    case JoinerType.Round:
      roundJoin(rhs, lhs, halfWidth, pivot, n0, n1)
      break
    case JoinerType.Miter:
      miterJoin(joiner, rhs, lhs, halfWidth, pivot, n0, n1, r0, r1)
      break
    case JoinerType.Arcs:
      arcsJoin(joiner, rhs, lhs, halfWidth, pivot, n0, n1, r0, r1)
      break
  }
}

// Whether the stroke bends to the right, that is clockwise, or turns around.
function bendsClockwise(n0: Point, n1: Point): boolean {
  return 0.0 <= dotProduct(rotate90CW(n0), n1)
}

function bevelJoin(rhs: Path, lhs: Path, pivot: Point, n1: Point): void {
  const rEnd = add(pivot, n1)
  const lEnd = subtract(pivot, n1)
  rhs.lineTo(rEnd.x, rEnd.y)
  lhs.lineTo(lEnd.x, lEnd.y)
}

function roundJoin(
  rhs: Path,
  lhs: Path,
  halfWidth: number,
  pivot: Point,
  n0: Point,
  n1: Point
): void {
  const rEnd = add(pivot, n1)
  const lEnd = subtract(pivot, n1)
  if (bendsClockwise(n0, n1)) {
    rhs.lineTo(rEnd.x, rEnd.y)
    lhs.arcTo(halfWidth, halfWidth, 0.0, false, false, lEnd.x, lEnd.y)
  } else {
    rhs.arcTo(halfWidth, halfWidth, 0.0, false, true, rEnd.x, rEnd.y)
    lhs.lineTo(lEnd.x, lEnd.y)
  }
}

function miterJoin(
  joiner: MiterJoiner | ArcsJoiner,
  rhs: Path,
  lhs: Path,
  halfWidth: number,
  pivot: Point,
  n0: Point,
  n1: Point,
  r0: number,
  r1: number
): void {
  const eps = rhs.config.epsilon
  if (pointsEqual(n0, negate(n1), eps)) {
    bevelJoin(rhs, lhs, pivot, n1)
    return
  }

  const cw = bendsClockwise(n0, n1)
  // Running clockwise the normals point to the outside of the bend, which flips the sign.
  const hw = cw ? -halfWidth : halfWidth

  // cos(theta) equals sin(theta/2) of the stroke-miterlimit definition.
  const theta = computeAngleBetweenVectors(n0, n1) / 2.0
  const d = hw / Math.cos(theta) // half the miter length
  const limit = Math.max(joiner.limit, 1.001) // keeps nearly straight joins from clipping
  const clip = !Number.isNaN(limit) && limit * halfWidth < Math.abs(d)
  if (clip && joiner.gapJoiner !== undefined) {
    join(joiner.gapJoiner, rhs, lhs, halfWidth, pivot, n0, n1, r0, r1)
    return
  }

  const rEnd = add(pivot, n1)
  const lEnd = subtract(pivot, n1)
  const mid = add(pivot, normalizeVector(add(n0, n1), d))
  if (clip) {
    const t = Math.abs((limit * halfWidth) / d)
    const side = cw ? lhs : rhs
    const mid0 = interpolate(side.pos(), mid, t)
    const mid1 = interpolate(cw ? lEnd : rEnd, mid, t)
    side.lineTo(mid0.x, mid0.y)
    side.lineTo(mid1.x, mid1.y)
  } else if (cw) {
    lhs.lineTo(mid.x, mid.y)
  } else {
    rhs.lineTo(mid.x, mid.y)
  }
  rhs.lineTo(rEnd.x, rEnd.y)
  lhs.lineTo(lEnd.x, lEnd.y)
}

// Intersection that comes first when following the circle around c from the pivot.
function closestArcIntersection(c: Point, cw: boolean, pivot: Point, i0: Point, i1: Point): Point {
  const thetaPivot = vectorAngle(subtract(pivot, c))
  let dtheta0 = vectorAngle(subtract(i0, c)) - thetaPivot
  let dtheta1 = vectorAngle(subtract(i1, c)) - thetaPivot
  if (cw) {
    dtheta0 = -dtheta0
    dtheta1 = -dtheta1
  }
  return angleNorm(dtheta1) < angleNorm(dtheta0) ? i1 : i0
}

// Extends both stroke edges as circles with the curvature at the join until they meet. Lines
// extend as lines, joins between two lines are miter joins.
function arcsJoin(
  joiner: ArcsJoiner,
  rhs: Path,
  lhs: Path,
  halfWidth: number,
  pivot: Point,
  n0: Point,
  n1: Point,
  r0: number,
  r1: number
): void {
  const eps = rhs.config.epsilon
  if (pointsEqual(n0, negate(n1), eps)) {
    bevelJoin(rhs, lhs, pivot, n1)
    return
  } else if (Number.isNaN(r0) && Number.isNaN(r1)) {
    miterJoin(joiner, rhs, lhs, halfWidth, pivot, n0, n1, r0, r1)
    return
  }
  const limit = Math.max(joiner.limit, 1.001)

  const cw = bendsClockwise(n0, n1)
  const hw = cw ? -halfWidth : halfWidth

  // r is the radius of the curve itself and R that of the stroke edge, c the circle centers.
  const c0 = add(pivot, normalizeVector(n0, -r0))
  const c1 = add(pivot, normalizeVector(n1, -r1))
  const R0 = Math.abs(r0 + hw)
  const R1 = Math.abs(r1 + hw)

  let is: [Point, Point] | undefined
  if (Number.isNaN(r0)) {
    const line = cw ? subtract(pivot, n0) : add(pivot, n0)
    is = intersectionRayCircle(line, add(line, rotate90CCW(n0)), c1, R1)
  } else if (Number.isNaN(r1)) {
    const line = cw ? subtract(pivot, n1) : add(pivot, n1)
    is = intersectionRayCircle(line, add(line, rotate90CCW(n1)), c0, R0)
  } else {
    is = intersectionCircleCircle(c0, R0, c1, R1, eps)
  }
  if (is === undefined) {
    bevelJoin(rhs, lhs, pivot, n1)
    return
  }

  let mid = Number.isNaN(r0)
    ? closestArcIntersection(c1, 0.0 <= r1, pivot, is[0], is[1])
    : closestArcIntersection(c0, r0 < 0.0, pivot, is[0], is[1])

  const d = vectorLength(subtract(mid, pivot))
  const clip = !Number.isNaN(limit) && limit * halfWidth < d
  if (clip && joiner.gapJoiner !== undefined) {
    join(joiner.gapJoiner, rhs, lhs, halfWidth, pivot, n0, n1, r0, r1)
    return
  }

  let mid2 = mid
  if (clip) {
    const start = cw ? subtract(pivot, n0) : add(pivot, n0)
    const end = cw ? subtract(pivot, n1) : add(pivot, n1)

    let clipMid: Point
    let clipNormal: Point
    if (!Number.isNaN(r0) && !Number.isNaN(r1) && 0.0 < r0 === 0.0 < r1) {
      // Circles of opposite sweep, the clipping line may be slightly tilted.
      clipMid = normalizeVector(subtract(mid, pivot), limit * halfWidth)
      clipNormal = rotate90CCW(clipMid)
    } else {
      // Circle running between both stroke edges.
      let rMid = (r0 - r1) / 2.0
      if (Number.isNaN(r0)) {
        rMid = -(r1 + hw) * 2.0
      } else if (Number.isNaN(r1)) {
        rMid = (r0 + hw) * 2.0
      }

      const sweep = 0.0 < rMid
      const RMid = Math.abs(rMid)
      const { cx, cy, theta0 } = ellipseToCenter(
        pivot.x,
        pivot.y,
        RMid,
        RMid,
        0.0,
        false,
        sweep,
        mid.x,
        mid.y,
        eps
      )
      const dtheta = (limit * halfWidth) / rMid
      clipMid = ellipsePos(RMid, RMid, 0.0, cx, cy, theta0 + dtheta)
      clipNormal = ellipseNormal(RMid, RMid, 0.0, sweep, theta0 + dtheta, 1.0)
    }
    const clipEnd = add(clipMid, clipNormal)

    if (Number.isNaN(r1)) {
      const i = intersectionRayLine(clipMid, clipEnd, mid, end, eps)
      if (i === undefined) {
        warnClipFallback()
        bevelJoin(rhs, lhs, pivot, n1)
        return
      }
      mid2 = i
    } else {
      const i = intersectionRayCircle(clipMid, clipEnd, c1, R1)
      if (i === undefined) {
        warnClipFallback()
        bevelJoin(rhs, lhs, pivot, n1)
        return
      }
      mid2 = closestArcIntersection(c1, 0.0 <= r1, pivot, i[0], i[1])
    }

    if (Number.isNaN(r0)) {
      const i = intersectionRayLine(clipMid, clipEnd, start, mid, eps)
      if (i === undefined) {
        warnClipFallback()
        bevelJoin(rhs, lhs, pivot, n1)
        return
      }
      mid = i
    } else {
      const i = intersectionRayCircle(clipMid, clipEnd, c0, R0)
      if (i === undefined) {
        warnClipFallback()
        bevelJoin(rhs, lhs, pivot, n1)
        return
      }
      mid = closestArcIntersection(c0, r0 < 0.0, pivot, i[0], i[1])
    }
  }

  const rEnd = add(pivot, n1)
  const lEnd = subtract(pivot, n1)
  const outer = cw ? lhs : rhs
  const outerEnd = cw ? lEnd : rEnd
  if (cw) {
    rhs.lineTo(rEnd.x, rEnd.y)
  }
  if (Number.isNaN(r0)) {
    outer.lineTo(mid.x, mid.y)
  } else {
    outer.arcTo(R0, R0, 0.0, false, 0.0 < r0, mid.x, mid.y)
  }
  if (clip) {
    outer.lineTo(mid2.x, mid2.y)
  }
  if (Number.isNaN(r1)) {
    outer.lineTo(outerEnd.x, outerEnd.y)
  } else {
    outer.arcTo(R1, R1, 0.0, false, 0.0 < r1, outerEnd.x, outerEnd.y)
  }
  if (!cw) {
    lhs.lineTo(lEnd.x, lEnd.y)
  }
}

function warnClipFallback(): void {
  console.warn('Arcs join could not be clipped, falling back to a bevel join')
}
