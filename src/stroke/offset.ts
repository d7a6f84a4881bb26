import { cubicBezierCurvatureRadius, cubicBezierNormal } from '../bezier/math'
import { strokeCubicBezier } from '../bezier/flatten'
import { quadraticToCubicBezier } from '../bezier/split'
import {
  ellipseCurvatureRadius,
  ellipseNormal,
  ellipseRadiiCorrection,
  ellipseToCenter
} from '../ellipse/math'
import { Path } from '../paths/path'
import { FillRule, Point } from '../types/base'
import { CommandType } from '../types/paths'
import { equal } from '../utils/math'
import {
  add,
  dotProduct,
  negate,
  normalizeVector,
  pointsEqual,
  rotate90CW,
  subtract
} from '../utils/vector'
import { Capper, cap } from './cappers'
import { Joiner, MiterJoin, RoundJoin, join } from './joiners'

// Stroke state of a single segment. Normals point to the right when walking along the path and
// have the half width as length. Radii are NaN for lines.
interface LineState {
  type: CommandType.LineTo
  p0: Point
  p1: Point
  n0: Point
  n1: Point
  r0: number
  r1: number
}

interface CubeState {
  type: CommandType.CubeTo
  p0: Point
  p1: Point
  n0: Point
  n1: Point
  r0: number
  r1: number
  cp1: Point
  cp2: Point
}

interface ArcState {
  type: CommandType.ArcTo
  p0: Point
  p1: Point
  n0: Point
  n1: Point
  r0: number
  r1: number
  rx: number
  ry: number
  rot: number // degrees
  large: boolean
  sweep: boolean
}

type StrokeState = LineState | CubeState | ArcState

export interface Rails {
  rhs: Path
  // Undefined when the rails of an open path were capped into a single outline.
  lhs: Path | undefined
}

function strokeStates(sub: Path, halfWidth: number): { states: StrokeState[]; closed: boolean } {
  const eps = sub.config.epsilon
  const states: StrokeState[] = []
  let closed = false
  const line = (start: Point, end: Point): LineState => {
    const n = normalizeVector(rotate90CW(subtract(end, start)), halfWidth)
    return { type: CommandType.LineTo, p0: start, p1: end, n0: n, n1: n, r0: NaN, r1: NaN }
  }

  for (const seg of sub.segments()) {
    const start = seg.start
    switch (seg.type) {
      case CommandType.LineTo:
        states.push(line(start, seg.end))
        break
      case CommandType.QuadTo:
      case CommandType.CubeTo: {
        const end = seg.end
        const [cp1, cp2]: [Point, Point] =
          seg.type === CommandType.QuadTo
            ? quadraticToCubicBezier(start, seg.control, end)
            : [seg.control1, seg.control2]
        states.push({
          type: CommandType.CubeTo,
          p0: start,
          p1: end,
          n0: cubicBezierNormal(start, cp1, cp2, end, 0, halfWidth),
          n1: cubicBezierNormal(start, cp1, cp2, end, 1, halfWidth),
          r0: cubicBezierCurvatureRadius(start, cp1, cp2, end, 0.0, eps),
          r1: cubicBezierCurvatureRadius(start, cp1, cp2, end, 1.0, eps),
          cp1,
          cp2
        })
        break
      }
      case CommandType.ArcTo: {
        const { rx, ry, rotation: phi, largeArc: large, sweep, end } = seg
        const { theta0, theta1 } = ellipseToCenter(
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
        states.push({
          type: CommandType.ArcTo,
          p0: start,
          p1: end,
          n0: ellipseNormal(rx, ry, phi, sweep, theta0, halfWidth),
          n1: ellipseNormal(rx, ry, phi, sweep, theta1, halfWidth),
          r0: ellipseCurvatureRadius(rx, ry, sweep, theta0, eps),
          r1: ellipseCurvatureRadius(rx, ry, sweep, theta1, eps),
          rx,
          ry,
          rot: (phi * 180.0) / Math.PI,
          large,
          sweep
        })
        break
      }
      case CommandType.Close:
        if (!pointsEqual(start, seg.end, eps)) {
          states.push(line(start, seg.end))
        }
        closed = true
        break
    }
  }
  return { states, closed }
}

// Right and left rails of a single subpath offset by halfWidth, joined with the joiner. Closed
// subpaths give two closed rails. Open ones give the capped outline in rhs when strokeOpen is set.
export function offsetRails(
  sub: Path,
  halfWidth: number,
  capper: Capper,
  joiner: Joiner,
  strokeOpen: boolean,
  tolerance: number
): Rails {
  const eps = sub.config.epsilon
  const { states, closed } = strokeStates(sub, halfWidth)
  let rhs = new Path(sub.config)
  let lhs = new Path(sub.config)
  if (states.length === 0) {
    return { rhs, lhs: strokeOpen && !closed ? undefined : lhs }
  }

  const rStart = add(states[0].p0, states[0].n0)
  const lStart = subtract(states[0].p0, states[0].n0)
  rhs.moveTo(rStart.x, rStart.y)
  lhs.moveTo(lStart.x, lStart.y)

  let rhsJoinIndex = -1
  let lhsJoinIndex = -1
  states.forEach((cur, i) => {
    switch (cur.type) {
      case CommandType.LineTo: {
        const rEnd = add(cur.p1, cur.n1)
        const lEnd = subtract(cur.p1, cur.n1)
        rhs.lineTo(rEnd.x, rEnd.y)
        lhs.lineTo(lEnd.x, lEnd.y)
        break
      }
      case CommandType.CubeTo: {
        const { p0, cp1, cp2, p1 } = cur
        const right = strokeCubicBezier(p0, cp1, cp2, p1, halfWidth, tolerance, eps)
        const left = strokeCubicBezier(p0, cp1, cp2, p1, -halfWidth, tolerance, eps)
        rhs = rhs.join(polyline(sub, right))
        lhs = lhs.join(polyline(sub, left))
        break
      }
      case CommandType.ArcTo: {
        const rStart = add(cur.p0, cur.n0)
        const lStart = subtract(cur.p0, cur.n0)
        const rEnd = add(cur.p1, cur.n1)
        const lEnd = subtract(cur.p1, cur.n1)
        const dr = cur.sweep ? halfWidth : -halfWidth
        const phi = (cur.rot * Math.PI) / 180.0

        let rLambda = ellipseRadiiCorrection(rStart, cur.rx + dr, cur.ry + dr, phi, rEnd)
        let lLambda = ellipseRadiiCorrection(lStart, cur.rx - dr, cur.ry - dr, phi, lEnd)
        if (rLambda <= 1.0 && lLambda <= 1.0) {
          rLambda = 1.0
          lLambda = 1.0
        }
        const { rx, ry, rot, large, sweep } = cur
        rhs.arcTo(rLambda * (rx + dr), rLambda * (ry + dr), rot, large, sweep, rEnd.x, rEnd.y)
        lhs.arcTo(lLambda * (rx - dr), lLambda * (ry - dr), rot, large, sweep, lEnd.x, lEnd.y)
        break
      }
    }

    // Remove the overlap left by the previous join at the inside of the bend.
    if (0 < i) {
      const cw = 0.0 <= dotProduct(rotate90CW(states[i - 1].n1), cur.n0)
      if (cw && rhsJoinIndex !== -1) {
        rhs.optimizeInnerBend(rhsJoinIndex)
      } else if (!cw && lhsJoinIndex !== -1) {
        lhs.optimizeInnerBend(lhsJoinIndex)
      }
    }
    rhsJoinIndex = -1
    lhsJoinIndex = -1

    if (i + 1 < states.length || closed) {
      const next = i + 1 < states.length ? states[i + 1] : states[0]
      if (!pointsEqual(cur.n1, next.n0, eps)) {
        rhsJoinIndex = rhs.len()
        lhsJoinIndex = lhs.len()
        join(joiner, rhs, lhs, halfWidth, cur.p1, cur.n1, next.n0, cur.r1, next.r0)
      }
    }
  })

  if (closed) {
    rhs.close()
    lhs.close()

    if (1 < states.length) {
      const cw = 0.0 <= dotProduct(rotate90CW(states[states.length - 1].n1), states[0].n0)
      if (cw && rhsJoinIndex !== -1) {
        rhs.optimizeInnerBend(rhsJoinIndex)
      } else if (!cw && lhsJoinIndex !== -1) {
        lhs.optimizeInnerBend(lhsJoinIndex)
      }
    }
    rhs.optimizeClose()
    lhs.optimizeClose()
    return { rhs, lhs }
  } else if (strokeOpen) {
    const last = states[states.length - 1]
    const reversed = lhs.reverse()
    cap(capper, rhs, halfWidth, last.p1, last.n1)
    rhs = rhs.join(reversed)
    cap(capper, rhs, halfWidth, states[0].p0, negate(states[0].n0))
    rhs.close()
    rhs.optimizeClose()
    return { rhs, lhs: undefined }
  }
  return { rhs, lhs }
}

function polyline(sub: Path, points: Point[]): Path {
  const p = new Path(sub.config)
  points.forEach((pt, i) => {
    if (i === 0) {
      p.moveTo(pt.x, pt.y)
    } else {
      p.lineTo(pt.x, pt.y)
    }
  })
  return p
}

function anticlockwise(p: Path): Path {
  return p.ccw() ? p : p.reverse()
}

// Outline of the stroke of width w. Open subpaths are capped with the capper, corners and closed
// subpaths joined with the joiner. Outer contours run anticlockwise and holes clockwise.
export function strokePath(
  p: Path,
  width: number,
  capper: Capper = Capper.Butt,
  joiner: Joiner = MiterJoin,
  tolerance: number = p.config.tolerance
): Path {
  const q = new Path(p.config)
  const halfWidth = width / 2.0
  for (const sub of p.split()) {
    const { rhs, lhs } = offsetRails(sub, halfWidth, capper, joiner, true, tolerance)
    if (lhs === undefined) {
      q.append(anticlockwise(rhs).settle(FillRule.Positive))
      continue
    }

    // The outer rail fills and the inner one cuts out the hole.
    const [outer, inner] = sub.ccw() ? [rhs, lhs] : [lhs, rhs]
    q.append(anticlockwise(outer).settle(FillRule.Positive))
    q.append(anticlockwise(inner).settle(FillRule.Positive).reverse())
  }
  return q
}

// Grows the filled area of p by w, or shrinks it when w is negative. Open subpaths are offset to
// their right-hand side.
export function offsetPath(
  p: Path,
  w: number,
  fillRule: FillRule,
  tolerance: number = p.config.tolerance
): Path {
  if (equal(w, 0.0, p.config.epsilon)) {
    return p.copy()
  }

  const positive = 0.0 < w
  w = Math.abs(w)

  const q = new Path(p.config)
  const filling = p.filling(fillRule)
  p.split().forEach((sub, i) => {
    const ccw = sub.ccw()
    const closed = sub.closed()
    const { rhs, lhs } = offsetRails(sub, w, Capper.Butt, RoundJoin, false, tolerance)
    let r = !closed || (ccw !== filling[i]) !== positive || lhs === undefined ? rhs : lhs
    if (closed) {
      r = anticlockwise(r).settle(FillRule.Positive)
      if (!filling[i]) {
        r = r.reverse()
      }
    }
    q.append(r)
  })
  return q
}
