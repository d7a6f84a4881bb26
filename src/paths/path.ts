import {
  cubicBezierCurvatureRadius,
  cubicBezierDeriv,
  cubicBezierLength,
  cubicBezierNumInflections,
  cubicBezierPos,
  quadraticBezierCurvatureRadius,
  quadraticBezierDeriv,
  quadraticBezierLength,
  quadraticBezierPos
} from '../bezier/math'
import {
  flattenCubicBezier,
  flattenQuadraticBezier,
  xmonotoneCubicBezier,
  xmonotoneQuadraticBezier
} from '../bezier/flatten'
import { splitCubicBezier, splitQuadraticBezier } from '../bezier/split'
import { KernelConfig, resolveConfig } from '../constants'
import {
  ellipseToCubicBeziers,
  flattenEllipticArc,
  xmonotoneEllipticArc
} from '../ellipse/convert'
import {
  ellipseCurvatureRadius,
  ellipseDeriv,
  ellipseLength,
  ellipsePos,
  ellipseRadiiCorrection,
  ellipseSplit,
  ellipseToCenter
} from '../ellipse/math'
import { intersectionSegment } from '../intersections/intersections'
import { pathCrossings, pathWindings } from '../intersections/winding'
import { Capper } from '../stroke/cappers'
import { Joiner } from '../stroke/joiners'
import { offsetPath, strokePath } from '../stroke/offset'
import { settle } from '../stroke/settle'
import { Bounds, FillRule, Point, Vector } from '../types/base'
import {
  ArcToCommand,
  CommandType,
  PathCommand,
  Segment,
  commandSegments,
  copyCommand
} from '../types/paths'
import { emptyBounds } from '../utils/bounds'
import { fills } from '../utils/fillrule'
import {
  angleBetween,
  angleEqual,
  angleNorm,
  equal,
  gaussLegendre7,
  invSpeedPolynomialChebyshevApprox,
  solveQuadraticFormula
} from '../utils/math'
import { Matrix } from '../utils/matrix'
import {
  add,
  computeAngleBetweenVectors,
  crossProduct,
  interpolate,
  normalizeVector,
  subtract,
  vectorAngle,
  vectorLength
} from '../utils/vector'
import { FormatterError, PathFormat, PathFormatter } from '../writer/formatter'

export type LineReplacer = (start: Point, end: Point) => Path | undefined
export type QuadReplacer = (p0: Point, p1: Point, p2: Point) => Path | undefined
export type CubeReplacer = (p0: Point, p1: Point, p2: Point, p3: Point) => Path | undefined
// The rotation phi is given in radians.
export type ArcReplacer = (
  start: Point,
  rx: number,
  ry: number,
  phi: number,
  large: boolean,
  sweep: boolean,
  end: Point
) => Path | undefined

export interface Replacers {
  line?: LineReplacer
  quad?: QuadReplacer
  cube?: CubeReplacer
  arc?: ArcReplacer
}

function toDegrees(rad: number): number {
  return (rad * 180.0) / Math.PI
}

function toRadians(deg: number): number {
  return (deg * Math.PI) / 180.0
}

// Number of Chebyshev nodes for the inverse arc length of Beziers and arcs.
const SPLIT_NODES = 20
const SPLIT_NODES_ARC = 10

// A sequence of subpaths made of line, Bezier and elliptical arc commands. Drawing commands go
// through the mutators, which keep the command list free of no-op and degenerate commands.
export class Path {
  private cmds: PathCommand[] = []
  public readonly config: KernelConfig

  constructor(config: Partial<KernelConfig> = {}) {
    this.config = resolveConfig(config)
  }

  // Commands are copied as they are. A list that does not start with a MoveTo starts at the origin.
  static fromCommands(cmds: PathCommand[], config: Partial<KernelConfig> = {}): Path {
    const p = new Path(config)
    if (0 < cmds.length && cmds[0].type !== CommandType.MoveTo) {
      p.cmds.push({ type: CommandType.MoveTo, end: { x: 0, y: 0 } })
    }
    p.cmds.push(...cmds.map(copyCommand))
    return p
  }

  get commands(): PathCommand[] {
    return this.cmds.map(copyCommand)
  }

  private get eps(): number {
    return this.config.epsilon
  }

  private derive(cmds: PathCommand[] = []): Path {
    const p = new Path(this.config)
    p.cmds = cmds
    return p
  }

  private last(): PathCommand | undefined {
    return this.cmds[this.cmds.length - 1]
  }

  private pointsEqual(p: Point, q: Point): boolean {
    return equal(p.x, q.x, this.eps) && equal(p.y, q.y, this.eps)
  }

  // Empty paths have no drawing commands, a lone MoveTo counts as empty.
  empty(): boolean {
    return this.cmds.length <= 1
  }

  equals(q: Path): boolean {
    if (this.cmds.length !== q.cmds.length) {
      return false
    }
    return this.cmds.every((cmd, i) => commandsEqual(cmd, q.cmds[i], this.eps))
  }

  // Whether no coordinate is NaN or infinite.
  sane(): boolean {
    const finite = (p: Point): boolean => Number.isFinite(p.x) && Number.isFinite(p.y)
    return this.cmds.every((cmd) => {
      switch (cmd.type) {
        case CommandType.QuadTo:
          return finite(cmd.control) && finite(cmd.end)
        case CommandType.CubeTo:
          return finite(cmd.control1) && finite(cmd.control2) && finite(cmd.end)
        case CommandType.ArcTo:
          return Number.isFinite(cmd.rx) && Number.isFinite(cmd.ry) && finite(cmd.end)
        default:
          return finite(cmd.end)
      }
    })
  }

  // Whether both paths trace the same shape, where q may start at another command of p or run in
  // the opposite direction.
  same(q: Path): boolean {
    const n = this.cmds.length
    if (n !== q.cmds.length) {
      return false
    }
    const qr = q.reverse()
    const matches = (other: PathCommand[], offset: number): boolean =>
      this.cmds.every((cmd, i) => commandsEqual(cmd, other[(offset + i) % n], this.eps))
    for (let j = 0; j < n; j++) {
      if (matches(q.cmds, j) || matches(qr.cmds, j)) {
        return true
      }
    }
    return false
  }

  // Whether the last subpath ends with a Close.
  closed(): boolean {
    return this.last()?.type === CommandType.Close
  }

  // Whether the last subpath is closed by a zero-length Close.
  pointClosed(): boolean {
    return isPointClosed(this.cmds, this.eps)
  }

  hasSubpaths(): boolean {
    return this.cmds.some((cmd, i) => cmd.type === CommandType.MoveTo && i !== 0)
  }

  copy(): Path {
    return this.derive(this.cmds.map(copyCommand))
  }

  // Number of commands, MoveTo included.
  len(): number {
    return this.cmds.length
  }

  segments(): Segment[] {
    return commandSegments(this.cmds)
  }

  // Appends the commands of each path as they are, every path keeps its own MoveTo.
  append(...qs: Path[]): this {
    if (this.empty()) {
      this.cmds = []
    }
    for (const q of qs) {
      if (!q.empty()) {
        this.cmds.push(...q.cmds.map(copyCommand))
      }
    }
    return this
  }

  // Appends q, welding it onto the current subpath when q starts where this path ends. The first
  // command of q then runs through the mutators so that colinear lines merge.
  join(q: Path): this {
    if (q.empty()) {
      return this
    } else if (this.empty()) {
      this.cmds = q.cmds.map(copyCommand)
      return this
    }

    const last = this.cmds[this.cmds.length - 1]
    if (last.type === CommandType.Close || !this.pointsEqual(last.end, q.cmds[0].end)) {
      this.cmds.push(...q.cmds.map(copyCommand))
      return this
    }

    const rest = q.cmds.slice(1)
    this.apply(rest[0])
    const i = this.cmds.length
    const end = this.startPos()
    this.cmds.push(...rest.slice(1).map(copyCommand))

    // The first Close of q still points at the start of q.
    for (let j = i; j < this.cmds.length; j++) {
      const cmd = this.cmds[j]
      if (cmd.type === CommandType.MoveTo) {
        break
      } else if (cmd.type === CommandType.Close) {
        cmd.end = { ...end }
        break
      }
    }
    return this
  }

  // Run a command through the mutators.
  private apply(cmd: PathCommand): void {
    switch (cmd.type) {
      case CommandType.MoveTo:
        this.moveTo(cmd.end.x, cmd.end.y)
        break
      case CommandType.LineTo:
        this.lineTo(cmd.end.x, cmd.end.y)
        break
      case CommandType.QuadTo:
        this.quadTo(cmd.control.x, cmd.control.y, cmd.end.x, cmd.end.y)
        break
      case CommandType.CubeTo:
        this.cubeTo(
          cmd.control1.x,
          cmd.control1.y,
          cmd.control2.x,
          cmd.control2.y,
          cmd.end.x,
          cmd.end.y
        )
        break
      case CommandType.ArcTo:
        this.arcTo(
          cmd.rx,
          cmd.ry,
          toDegrees(cmd.rotation),
          cmd.largeArc,
          cmd.sweep,
          cmd.end.x,
          cmd.end.y
        )
        break
      case CommandType.Close:
        this.close()
        break
    }
  }

  // Current position, the end of the last command.
  pos(): Point {
    const last = this.last()
    return last === undefined ? { x: 0, y: 0 } : { ...last.end }
  }

  // Start of the current subpath, the position of the last MoveTo.
  startPos(): Point {
    for (let i = this.cmds.length - 1; 0 <= i; i--) {
      const cmd = this.cmds[i]
      if (cmd.type === CommandType.MoveTo) {
        return { ...cmd.end }
      }
    }
    return { x: 0, y: 0 }
  }

  // End points of all commands, zero-length Closes are left out.
  coords(): Point[] {
    const coords: Point[] = []
    for (const cmd of this.cmds) {
      const prev = coords[coords.length - 1]
      const zeroClose =
        prev !== undefined && cmd.type === CommandType.Close && this.pointsEqual(prev, cmd.end)
      if (!zeroClose) {
        coords.push({ ...cmd.end })
      }
    }
    return coords
  }

  // Starts a new subpath, replacing a MoveTo that has nothing drawn after it.
  moveTo(x: number, y: number): this {
    const last = this.last()
    if (last?.type === CommandType.MoveTo) {
      last.end = { x, y }
      return this
    }
    this.cmds.push({ type: CommandType.MoveTo, end: { x, y } })
    return this
  }

  // Drawing commands on an empty path start at the origin, after a Close at the closing point.
  private ensureStart(): void {
    const last = this.last()
    if (last === undefined) {
      this.moveTo(0.0, 0.0)
    } else if (last.type === CommandType.Close) {
      this.moveTo(last.end.x, last.end.y)
    }
  }

  lineTo(x: number, y: number): this {
    const start = this.pos()
    const end = { x, y }
    if (this.pointsEqual(start, end)) {
      return this
    }

    const n = this.cmds.length
    const last = this.last()
    if (last?.type === CommandType.LineTo) {
      const prevStart = 1 < n ? this.cmds[n - 2].end : { x: 0, y: 0 }

      // Divide by the lengths since the perp-dot of tiny segments falls below epsilon.
      const da = subtract(start, prevStart)
      const db = subtract(end, start)
      const div = crossProduct(da, db) / (vectorLength(da) * vectorLength(db))
      if (equal(div, 0.0, this.eps)) {
        const extends_ =
          Math.abs(da.y) < Math.abs(da.x) ? da.x < 0 === db.x < 0 : da.y < 0 === db.y < 0
        if (extends_) {
          last.end = end
          return this
        }
      }
    }

    this.ensureStart()
    this.cmds.push({ type: CommandType.LineTo, end })
    return this
  }

  // A quadratic Bezier whose control point lies on the chord becomes a line.
  quadTo(cpx: number, cpy: number, x: number, y: number): this {
    const start = this.pos()
    const cp = { x: cpx, y: cpy }
    const end = { x, y }
    if (this.pointsEqual(start, end) && this.pointsEqual(start, cp)) {
      return this
    } else if (
      !this.pointsEqual(start, end) &&
      (this.pointsEqual(start, cp) || this.alignedWith(start, end, subtract(cp, start))) &&
      (this.pointsEqual(end, cp) || this.alignedWith(start, end, subtract(end, cp)))
    ) {
      return this.lineTo(end.x, end.y)
    }

    this.ensureStart()
    this.cmds.push({ type: CommandType.QuadTo, control: cp, end })
    return this
  }

  cubeTo(cpx1: number, cpy1: number, cpx2: number, cpy2: number, x: number, y: number): this {
    const start = this.pos()
    const cp1 = { x: cpx1, y: cpy1 }
    const cp2 = { x: cpx2, y: cpy2 }
    const end = { x, y }
    if (
      this.pointsEqual(start, end) &&
      this.pointsEqual(start, cp1) &&
      this.pointsEqual(start, cp2)
    ) {
      return this
    }
    const onChord = (cp: Point): boolean =>
      this.pointsEqual(start, cp) ||
      this.pointsEqual(end, cp) ||
      (this.alignedWith(start, end, subtract(cp, start)) &&
        this.alignedWith(start, end, subtract(end, cp)))
    if (!this.pointsEqual(start, end) && onChord(cp1) && onChord(cp2)) {
      return this.lineTo(end.x, end.y)
    }

    this.ensureStart()
    this.cmds.push({ type: CommandType.CubeTo, control1: cp1, control2: cp2, end })
    return this
  }

  private alignedWith(start: Point, end: Point, v: Vector): boolean {
    return angleEqual(computeAngleBetweenVectors(subtract(end, start), v), 0.0, this.eps)
  }

  private sameDirection(a: Vector, b: Vector): boolean {
    return equal(computeAngleBetweenVectors(a, b), 0.0, this.eps)
  }

  // Elliptical arc to (x,y) with the rotation rot in degrees, following the SVG arc flags. Radii
  // that are too small for the chord are scaled up.
  arcTo(
    rx: number,
    ry: number,
    rot: number,
    large: boolean,
    sweep: boolean,
    x: number,
    y: number
  ): this {
    const start = this.pos()
    const end = { x, y }
    if (this.pointsEqual(start, end)) {
      return this
    }
    if (
      equal(rx, 0.0, this.eps) ||
      !Number.isFinite(rx) ||
      equal(ry, 0.0, this.eps) ||
      !Number.isFinite(ry)
    ) {
      return this.lineTo(end.x, end.y)
    }

    rx = Math.abs(rx)
    ry = Math.abs(ry)
    if (equal(rx, ry, this.eps)) {
      rot = 0.0
    } else if (rx < ry) {
      ;[rx, ry] = [ry, rx]
      rot += 90.0
    }

    let phi = angleNorm(toRadians(rot))
    if (Math.PI <= phi) {
      phi -= Math.PI
    }

    const lambda = ellipseRadiiCorrection(start, rx, ry, phi, end)
    if (1.0 < lambda) {
      rx *= lambda
      ry *= lambda
    }

    this.ensureStart()
    this.cmds.push({
      type: CommandType.ArcTo,
      rx,
      ry,
      rotation: phi,
      largeArc: large,
      sweep,
      end
    })
    return this
  }

  // Arc of the ellipse between the angles theta0 and theta1 (degrees, before rotation) starting at
  // the current position. It runs anticlockwise when theta0 < theta1; sweeps of a full turn or
  // more draw a full ellipse first.
  arc(rx: number, ry: number, rot: number, theta0: number, theta1: number): this {
    const phi = toRadians(rot)
    theta0 = toRadians(theta0)
    theta1 = toRadians(theta1)
    const dtheta = Math.abs(theta1 - theta0)

    const sweep = theta0 < theta1
    const large = dtheta % (2.0 * Math.PI) > Math.PI
    const p0 = ellipsePos(rx, ry, phi, 0.0, 0.0, theta0)
    const p1 = ellipsePos(rx, ry, phi, 0.0, 0.0, theta1)

    const start = this.pos()
    const center = subtract(start, p0)
    if (2.0 * Math.PI <= dtheta) {
      const startOpposite = subtract(center, p0)
      this.arcTo(rx, ry, rot, large, sweep, startOpposite.x, startOpposite.y)
      this.arcTo(rx, ry, rot, large, sweep, start.x, start.y)
      if (equal(dtheta % (2.0 * Math.PI), 0.0, this.eps)) {
        return this
      }
    }
    const end = add(center, p1)
    return this.arcTo(rx, ry, rot, large, sweep, end.x, end.y)
  }

  // Closes the subpath with a line back to its start. A final line that ends at the start, or that
  // runs straight towards it, becomes the Close itself.
  close(): this {
    const last = this.last()
    if (last === undefined || last.type === CommandType.Close) {
      return this
    } else if (last.type === CommandType.MoveTo) {
      this.cmds.pop()
      return this
    }

    const end = this.startPos()
    const n = this.cmds.length
    if (last.type === CommandType.LineTo) {
      const start = last.end
      const prevStart = 1 < n ? this.cmds[n - 2].end : { x: 0, y: 0 }
      if (
        this.pointsEqual(start, end) ||
        this.sameDirection(subtract(end, start), subtract(start, prevStart))
      ) {
        this.cmds[n - 1] = { type: CommandType.Close, end }
        return this
      }
    }
    this.cmds.push({ type: CommandType.Close, end })
    return this
  }

  // Moves the start of a closed last subpath one line forward when its first and last lines are
  // colinear, so that the Close replaces the first line.
  optimizeClose(): void {
    const n = this.cmds.length
    if (n === 0 || this.cmds[n - 1].type !== CommandType.Close) {
      return
    }

    let iMoveTo = n - 1
    while (0 < iMoveTo && this.cmds[iMoveTo].type !== CommandType.MoveTo) {
      iMoveTo--
    }
    const moveTo = this.cmds[iMoveTo]
    const first = this.cmds[iMoveTo + 1]
    if (
      moveTo.type === CommandType.MoveTo &&
      first.type === CommandType.LineTo &&
      iMoveTo + 2 < n - 1
    ) {
      const end = moveTo.end
      const start = this.cmds[n - 2].end
      const nextEnd = first.end
      if (
        !this.pointsEqual(start, end) &&
        this.sameDirection(subtract(end, start), subtract(nextEnd, end))
      ) {
        this.cmds[n - 1].end = { ...nextEnd }
        moveTo.end = { ...nextEnd }
        this.cmds.splice(iMoveTo + 1, 1)
      }
    }
  }

  // Cuts off the overlap at the inside of a bend, where i indexes the first command of the join
  // between two lines. Both lines are shortened to their intersection and the join dropped.
  optimizeInnerBend(i: number): void {
    const ai = i - 1
    let bi = i + 1
    if (ai <= 0 || this.cmds.length <= i) {
      return
    }

    const a = this.cmds[ai]
    const a0 = this.cmds[ai - 1].end
    const b0 = this.cmds[bi - 1].end
    const wraps = bi === this.cmds.length
    if (wraps) {
      // The bend lies at the start of the path.
      bi = 1
    }
    const b = this.cmds[bi]
    const isLine = (cmd: PathCommand): boolean =>
      cmd.type === CommandType.LineTo || cmd.type === CommandType.Close
    if (b === undefined || !isLine(a) || !isLine(b)) {
      return
    }

    const zs = intersectionSegment({ ...a, start: a0 }, { ...b, start: b0 }, this.eps)
    if (zs.length !== 1) {
      return
    }
    const z = zs[0]
    if (z.t[0] === 0.0 || z.t[0] === 1.0 || z.t[1] === 0.0 || z.t[1] === 1.0) {
      return
    }
    a.end = { ...z.point }
    if (wraps) {
      const closed = this.closed()
      this.cmds = this.cmds.slice(0, i)
      this.cmds[0].end = { ...z.point }
      if (closed) {
        this.close()
      }
    } else {
      this.cmds.splice(i, bi - i)
    }
  }

  // Index range [start, end) of the subpath holding command i.
  private subpathRange(i: number): [number, number] {
    let start = i
    while (0 < start && this.cmds[start].type !== CommandType.MoveTo) {
      start--
    }
    let end = i + 1
    while (end < this.cmds.length && this.cmds[end].type !== CommandType.MoveTo) {
      end++
    }
    return [start, end]
  }

  private locate(seg: number, t: number): Location | undefined {
    if (this.cmds.length <= 1 || seg < 0 || this.cmds.length <= seg) {
      return undefined
    }
    const [s, e] = this.subpathRange(seg)
    return locateInSubpath(this.cmds.slice(s, e), seg - s, t, this.eps)
  }

  // Unit direction of command seg at t in [0,1]. A MoveTo gives the starting direction of its
  // subpath and a zero-length Close the final direction.
  direction(seg: number, t: number): Vector {
    const loc = this.locate(seg, t)
    if (loc === undefined) {
      return { x: 0, y: 0 }
    }
    const { start, cmd } = loc
    switch (cmd.type) {
      case CommandType.LineTo:
      case CommandType.Close:
        return normalizeVector(subtract(cmd.end, start))
      case CommandType.QuadTo:
        return normalizeVector(quadraticBezierDeriv(start, cmd.control, cmd.end, loc.t))
      case CommandType.CubeTo:
        return normalizeVector(cubicBezierDeriv(start, cmd.control1, cmd.control2, cmd.end, loc.t))
      case CommandType.ArcTo: {
        const { theta0, theta1 } = arcToCenter(start, cmd, this.eps)
        const theta = theta0 + loc.t * (theta1 - theta0)
        return normalizeVector(ellipseDeriv(cmd.rx, cmd.ry, cmd.rotation, cmd.sweep, theta))
      }
      default:
        return { x: 0, y: 0 }
    }
  }

  // Signed curvature of command seg at t, positive when bending anticlockwise. Zero for lines.
  curvature(seg: number, t: number): number {
    const loc = this.locate(seg, t)
    if (loc === undefined) {
      return 0.0
    }
    const { start, cmd } = loc
    let r = NaN
    switch (cmd.type) {
      case CommandType.QuadTo:
        r = quadraticBezierCurvatureRadius(start, cmd.control, cmd.end, loc.t, this.eps)
        break
      case CommandType.CubeTo:
        r = cubicBezierCurvatureRadius(start, cmd.control1, cmd.control2, cmd.end, loc.t, this.eps)
        break
      case CommandType.ArcTo: {
        const { theta0, theta1 } = arcToCenter(start, cmd, this.eps)
        const theta = theta0 + loc.t * (theta1 - theta0)
        r = ellipseCurvatureRadius(cmd.rx, cmd.ry, cmd.sweep, theta, this.eps)
        break
      }
    }
    return Number.isNaN(r) ? 0.0 : 1.0 / r
  }

  // Direction at each coordinate of coords(), averaging the directions of the commands meeting
  // there. Closed paths average the first and last directions as well.
  coordDirections(): Vector[] {
    const n = this.cmds.length
    if (n <= 1) {
      return [{ x: 0, y: 0 }]
    }
    const last = isPointClosed(this.cmds, this.eps) ? n - 1 : n

    const dirs: Vector[] = []
    let closed = false
    let dirPrev: Vector = { x: 0, y: 0 }
    for (let i = 1; i < last; i++) {
      dirs.push(normalizeVector(add(dirPrev, this.direction(i, 0.0))))
      dirPrev = this.direction(i, 1.0)
      closed = this.cmds[i].type === CommandType.Close
    }
    if (closed) {
      dirs[0] = normalizeVector(add(dirs[0], dirPrev))
      dirs.push(dirs[0])
    } else {
      dirs.push(dirPrev)
    }
    return dirs
  }

  // Whether the first subpath runs anticlockwise at its bottom-right-most coordinate. This is its
  // orientation when it does not intersect itself. Empty paths and single lines count as
  // anticlockwise.
  ccw(): boolean {
    const first = this.split()[0]
    if (first === undefined) {
      return true
    }
    const n0 = first.cmds.length
    if (
      n0 <= 1 ||
      ((first.cmds[1].type === CommandType.LineTo || first.cmds[1].type === CommandType.Close) &&
        n0 <= 2)
    ) {
      return true
    }

    const p = first.xMonotone()
    const cmds = p.cmds
    const n = cmds.length

    // k indexes the command after the extreme coordinate.
    let k = 1
    const kMax = cmds[n - 1].type === CommandType.Close ? n - 1 : n
    for (let i = 1; i < n; i++) {
      const { x, y } = cmds[i].end
      const ref = cmds[k - 1].end
      if (ref.x < x || (equal(ref.x, x, this.eps) && y < ref.y)) {
        k = i + 1
      }
    }

    const kPrev = k === 1 ? kMax : k - 1
    // An open path closes implicitly from its last coordinate back to the start.
    const implicitClose = normalizeVector(subtract(cmds[0].end, cmds[n - 1].end))
    const dirPrev = kPrev === n ? implicitClose : p.direction(kPrev, 1.0)
    const anglePrev = angleNorm(vectorAngle(dirPrev) + Math.PI)
    const dirNext = k === kMax ? subtract(cmds[0].end, cmds[k - 1].end) : p.direction(k, 0.0)
    const angleNext = vectorAngle(dirNext)

    if (equal(anglePrev, angleNext, this.eps)) {
      // Same direction at the extreme point, the sharper bend lies inside.
      const curvPrev = kPrev === n ? 0.0 : -p.curvature(kPrev, 1.0)
      const curvNext = k === kMax ? 0.0 : p.curvature(k, 0.0)
      if (!equal(curvPrev, curvNext, this.eps)) {
        return curvNext < curvPrev
      }
    }
    return angleNext - anglePrev < 0.0
  }

  // Whether each subpath is filled, taking the windings of the other subpaths at its start into
  // account. Open subpaths are taken as closed.
  filling(fillRule: FillRule): boolean[] {
    const ps = this.split()
    const segs = ps.map((p) => p.segments())
    return ps.map((pi, i) => {
      let n = pi.ccw() ? 1 : -1
      const pos = pi.cmds[0].end
      segs.forEach((sj, j) => {
        if (i === j) {
          return
        }
        const { windings, boundary } = pathWindings(sj, pos.x, pos.y, this.eps)
        if (!boundary) {
          n += windings
        }
      })
      return fills(fillRule, n)
    })
  }

  // Winding number at (x,y) and whether the point lies on the path.
  windings(x: number, y: number): { windings: number; boundary: boolean } {
    return pathWindings(this.segments(), x, y, this.eps)
  }

  crossings(x: number, y: number): { crossings: number; boundary: boolean } {
    return pathCrossings(this.segments(), x, y, this.eps)
  }

  // Points on the path count as contained.
  contains(x: number, y: number, fillRule: FillRule): boolean {
    const { windings, boundary } = this.windings(x, y)
    return boundary || fills(fillRule, windings)
  }

  // Bounding box of all end and control points, arcs contribute their full ellipse.
  fastBounds(): Bounds {
    if (this.cmds.length === 0) {
      return emptyBounds()
    }
    const box = new BoundsBuilder(this.cmds[0].end)
    for (const seg of this.segments().slice(1)) {
      switch (seg.type) {
        case CommandType.QuadTo:
          box.add(seg.control)
          break
        case CommandType.CubeTo:
          box.add(seg.control1)
          box.add(seg.control2)
          break
        case CommandType.ArcTo: {
          const { cx, cy } = arcToCenter(seg.start, seg, this.eps)
          const r = Math.max(seg.rx, seg.ry)
          box.add({ x: cx - r, y: cy - r })
          box.add({ x: cx + r, y: cy + r })
          break
        }
      }
      box.add(seg.end)
    }
    return box.bounds()
  }

  // Exact bounding box, taking the extremes of Beziers and arcs.
  bounds(): Bounds {
    if (this.cmds.length === 0) {
      return emptyBounds()
    }
    const box = new BoundsBuilder(this.cmds[0].end)
    const inside = (t: number): boolean => !Number.isNaN(t) && this.eps < t && t < 1.0 - this.eps
    for (const seg of this.segments().slice(1)) {
      const start = seg.start
      switch (seg.type) {
        case CommandType.QuadTo: {
          const cp = seg.control
          const txDenom = start.x - 2.0 * cp.x + seg.end.x
          if (!equal(txDenom, 0.0, this.eps)) {
            const t = (start.x - cp.x) / txDenom
            if (inside(t)) {
              box.add(quadraticBezierPos(start, cp, seg.end, t))
            }
          }
          const tyDenom = start.y - 2.0 * cp.y + seg.end.y
          if (!equal(tyDenom, 0.0, this.eps)) {
            const t = (start.y - cp.y) / tyDenom
            if (inside(t)) {
              box.add(quadraticBezierPos(start, cp, seg.end, t))
            }
          }
          break
        }
        case CommandType.CubeTo: {
          const { control1: cp1, control2: cp2, end } = seg
          const tx = solveQuadraticFormula(
            -start.x + 3.0 * cp1.x - 3.0 * cp2.x + end.x,
            2.0 * start.x - 4.0 * cp1.x + 2.0 * cp2.x,
            -start.x + cp1.x,
            this.eps
          )
          const ty = solveQuadraticFormula(
            -start.y + 3.0 * cp1.y - 3.0 * cp2.y + end.y,
            2.0 * start.y - 4.0 * cp1.y + 2.0 * cp2.y,
            -start.y + cp1.y,
            this.eps
          )
          for (const t of [...tx, ...ty]) {
            if (inside(t)) {
              box.add(cubicBezierPos(start, cp1, cp2, end, t))
            }
          }
          break
        }
        case CommandType.ArcTo: {
          const { rx, ry, rotation: phi } = seg
          const { cx, cy, theta0, theta1 } = arcToCenter(start, seg, this.eps)

          // Angles at which the ellipse reaches its horizontal and vertical extremes.
          const sinphi = Math.sin(phi)
          const cosphi = Math.cos(phi)
          const thetaRight = Math.atan2(-ry * sinphi, rx * cosphi)
          const thetaTop = Math.atan2(ry * cosphi, rx * sinphi)
          const thetaLeft = thetaRight + Math.PI
          const thetaBottom = thetaTop + Math.PI

          const dx = Math.sqrt(rx * rx * cosphi * cosphi + ry * ry * sinphi * sinphi)
          const dy = Math.sqrt(rx * rx * sinphi * sinphi + ry * ry * cosphi * cosphi)
          if (angleBetween(thetaLeft, theta0, theta1, this.eps)) {
            box.add({ x: cx - dx, y: cy })
          }
          if (angleBetween(thetaRight, theta0, theta1, this.eps)) {
            box.add({ x: cx + dx, y: cy })
          }
          if (angleBetween(thetaBottom, theta0, theta1, this.eps)) {
            box.add({ x: cx, y: cy - dy })
          }
          if (angleBetween(thetaTop, theta0, theta1, this.eps)) {
            box.add({ x: cx, y: cy + dy })
          }
          break
        }
      }
      box.add(seg.end)
    }
    return box.bounds()
  }

  // Arc length of the path, approximated for cubic Beziers and arcs.
  length(): number {
    let d = 0.0
    for (const seg of this.segments()) {
      switch (seg.type) {
        case CommandType.LineTo:
        case CommandType.Close:
          d += vectorLength(subtract(seg.end, seg.start))
          break
        case CommandType.QuadTo:
          d += quadraticBezierLength(seg.start, seg.control, seg.end, this.eps)
          break
        case CommandType.CubeTo:
          d += cubicBezierLength(seg.start, seg.control1, seg.control2, seg.end, this.eps)
          break
        case CommandType.ArcTo: {
          const { theta0, theta1 } = arcToCenter(seg.start, seg, this.eps)
          d += ellipseLength(seg.rx, seg.ry, theta0, theta1)
          break
        }
      }
    }
    return d
  }

  // Transforms the path in place.
  transform(m: Matrix): this {
    const { sx, sy } = m.decompose(this.eps)
    for (const cmd of this.cmds) {
      switch (cmd.type) {
        case CommandType.QuadTo:
          cmd.control = m.apply(cmd.control)
          break
        case CommandType.CubeTo:
          cmd.control1 = m.apply(cmd.control1)
          cmd.control2 = m.apply(cmd.control2)
          break
        case CommandType.ArcTo: {
          // The ellipse x^T E x = 1 with E = diag(1/rx², 1/ry²) maps to x'^T Q x' = 1 with
          // Q = T^-T E T^-1; the eigenvectors of Q give the new axes.
          const T = m.rotate(toDegrees(cmd.rotation))
          const invT = T.inverse()
          const E = new Matrix(1.0 / cmd.rx / cmd.rx, 0, 0, 1.0 / cmd.ry / cmd.ry)
          const Q = invT.transpose().multiply(E).multiply(invT)

          const { lambda1, lambda2, v1, v2 } = Q.eigen(this.eps)
          let rx = 1.0 / Math.sqrt(lambda1)
          let ry = 1.0 / Math.sqrt(lambda2)
          let phi = vectorAngle(v1)
          if (rx < ry) {
            ;[rx, ry] = [ry, rx]
            phi = vectorAngle(v2)
          }
          phi = angleNorm(phi)
          if (Math.PI <= phi) {
            phi -= Math.PI
          }

          cmd.rx = rx
          cmd.ry = ry
          cmd.rotation = phi
          if (sx * sy < 0.0) {
            // Mirroring reverses the orientation.
            cmd.sweep = !cmd.sweep
          }
          break
        }
      }
      cmd.end = m.apply(cmd.end)
    }
    return this
  }

  translate(x: number, y: number): this {
    return this.transform(Matrix.identity().translate(x, y))
  }

  scale(x: number, y: number): this {
    return this.transform(Matrix.identity().scale(x, y))
  }

  // Whether the path holds only MoveTo, LineTo and Close commands.
  isFlat(): boolean {
    return this.cmds.every(
      (cmd) =>
        cmd.type === CommandType.MoveTo ||
        cmd.type === CommandType.LineTo ||
        cmd.type === CommandType.Close
    )
  }

  // Replaces Beziers and arcs by lines deviating at most tolerance from the curve.
  flatten(tolerance: number = this.config.tolerance): Path {
    const polyline = (start: Point, points: Point[]): Path => {
      const q = this.derive().moveTo(start.x, start.y)
      for (const p of points) {
        q.lineTo(p.x, p.y)
      }
      return q
    }
    return this.replace({
      quad: (p0, p1, p2) => polyline(p0, flattenQuadraticBezier(p0, p1, p2, tolerance, this.eps)),
      cube: (p0, p1, p2, p3) =>
        polyline(p0, flattenCubicBezier(p0, p1, p2, p3, tolerance, this.eps)),
      arc: (start, rx, ry, phi, large, sweep, end) =>
        polyline(
          start,
          flattenEllipticArc(start, rx, ry, phi, large, sweep, end, tolerance, this.eps)
        )
    })
  }

  // Replaces arcs by cubic Beziers.
  replaceArcs(): Path {
    return this.replace({
      arc: (start, rx, ry, phi, large, sweep, end) => {
        const q = this.derive().moveTo(start.x, start.y)
        for (const [, cp1, cp2, p] of ellipseToCubicBeziers(
          start,
          rx,
          ry,
          phi,
          large,
          sweep,
          end,
          this.eps
        )) {
          q.cubeTo(cp1.x, cp1.y, cp2.x, cp2.y, p.x, p.y)
        }
        return q
      }
    })
  }

  // Splits Beziers and arcs so that x only increases or only decreases along every command.
  xMonotone(): Path {
    return this.replace({
      quad: (p0, p1, p2) => {
        const q = this.derive().moveTo(p0.x, p0.y)
        for (const [, cp, p] of xmonotoneQuadraticBezier(p0, p1, p2, this.eps)) {
          q.quadTo(cp.x, cp.y, p.x, p.y)
        }
        return q
      },
      cube: (p0, p1, p2, p3) => {
        const q = this.derive().moveTo(p0.x, p0.y)
        for (const [, cp1, cp2, p] of xmonotoneCubicBezier(p0, p1, p2, p3, this.eps)) {
          q.cubeTo(cp1.x, cp1.y, cp2.x, cp2.y, p.x, p.y)
        }
        return q
      },
      arc: (start, rx, ry, phi, large, sweep, end) => {
        const q = this.derive().moveTo(start.x, start.y)
        for (const p of xmonotoneEllipticArc(start, rx, ry, phi, large, sweep, end, this.eps)) {
          q.arcTo(rx, ry, toDegrees(phi), false, sweep, p.x, p.y)
        }
        return q
      }
    })
  }

  // Returns a new path where each command is swapped for the path its replacer returns. The
  // replacement is welded in place and a line bridges to the original end point if it ends
  // elsewhere. Commands without a replacer, or whose replacer returns undefined, are kept.
  replace(replacers: Replacers): Path {
    const result = this.derive()
    let start: Point = { x: 0, y: 0 }
    let replacedPrev = false
    for (const cmd of this.cmds) {
      let q: Path | undefined
      switch (cmd.type) {
        case CommandType.LineTo:
        case CommandType.Close:
          q = replacers.line?.(start, cmd.end)
          if (q !== undefined && cmd.type === CommandType.Close) {
            q.close()
          }
          break
        case CommandType.QuadTo:
          q = replacers.quad?.(start, cmd.control, cmd.end)
          break
        case CommandType.CubeTo:
          q = replacers.cube?.(start, cmd.control1, cmd.control2, cmd.end)
          break
        case CommandType.ArcTo:
          q = replacers.arc?.(
            start,
            cmd.rx,
            cmd.ry,
            cmd.rotation,
            cmd.largeArc,
            cmd.sweep,
            cmd.end
          )
          break
      }

      if (q !== undefined) {
        result.join(q)
        if (cmd.type !== CommandType.Close) {
          result.lineTo(cmd.end.x, cmd.end.y)
        }
        replacedPrev = true
      } else if (replacedPrev) {
        // Weld the remainder onto the replacement.
        const last = result.last()
        if (cmd.type === CommandType.MoveTo) {
          result.moveTo(cmd.end.x, cmd.end.y)
        } else if (last === undefined) {
          result.cmds.push({ type: CommandType.MoveTo, end: { ...start } }, copyCommand(cmd))
        } else if (last.type === CommandType.Close || !result.pointsEqual(last.end, start)) {
          result.cmds.push({ type: CommandType.MoveTo, end: { ...start } })
          result.pushRaw(cmd)
        } else {
          result.apply(cmd)
        }
        replacedPrev = false
      } else {
        result.pushRaw(cmd)
      }
      start = cmd.end
    }
    return result
  }

  // Pushes a copy of the command, a Close is pointed at the current subpath start.
  private pushRaw(cmd: PathCommand): void {
    const c = copyCommand(cmd)
    if (c.type === CommandType.Close) {
      c.end = this.startPos()
    }
    this.cmds.push(c)
  }

  // Copies of the marker paths placed at every coordinate: first at the start, last at the end and
  // mid in between. With align the markers are rotated along the path direction.
  markers(
    first: Path | undefined,
    mid: Path | undefined,
    last: Path | undefined,
    align: boolean
  ): Path[] {
    const markers: Path[] = []
    const coordPos = this.coords()
    const coordDir = this.coordDirections()
    coordPos.forEach((pos, i) => {
      let q = mid
      if (i === 0) {
        q = first
      } else if (i === coordPos.length - 1) {
        q = last
      }
      if (q === undefined) {
        return
      }

      let m = Matrix.identity().translate(pos.x, pos.y)
      if (align) {
        m = m.rotate(toDegrees(vectorAngle(coordDir[i])))
      }
      markers.push(q.copy().transform(m))
    })
    return markers
  }

  // One path per subpath, split before each MoveTo.
  split(): Path[] {
    const ps: Path[] = []
    let i = 0
    for (let j = 0; j < this.cmds.length; j++) {
      if (i < j && this.cmds[j].type === CommandType.MoveTo) {
        ps.push(this.derive(this.cmds.slice(i, j).map(copyCommand)))
        i = j
      }
    }
    if (i + 1 < this.cmds.length) {
      ps.push(this.derive(this.cmds.slice(i).map(copyCommand)))
    }
    return ps
  }

  // Cuts the path at the given distances along it. Closes become lines in the pieces.
  splitAt(...ts: number[]): Path[] {
    if (ts.length === 0) {
      return [this.copy()]
    }
    ts = [...ts].sort((a, b) => a - b)
    if (ts[0] === 0.0) {
      ts = ts.slice(1)
    }

    let j = 0 // index into ts
    let T = 0.0 // distance covered so far

    const qs: Path[] = []
    let q = this.derive()
    const push = (pos: Point): void => {
      qs.push(q)
      q = this.derive().moveTo(pos.x, pos.y)
    }

    for (const seg of this.segments()) {
      const start = seg.start
      switch (seg.type) {
        case CommandType.MoveTo:
          q.moveTo(seg.end.x, seg.end.y)
          break
        case CommandType.LineTo:
        case CommandType.Close: {
          const end = seg.end
          const dT = vectorLength(subtract(end, start))
          let Tcurve = T
          while (j < ts.length && T < ts[j] && ts[j] <= T + dT) {
            const pos = interpolate(start, end, (ts[j] - T) / dT)
            Tcurve = ts[j]
            q.lineTo(pos.x, pos.y)
            push(pos)
            j++
          }
          if (Tcurve < T + dT) {
            q.lineTo(end.x, end.y)
          }
          T += dT
          break
        }
        case CommandType.QuadTo: {
          const { control: cp, end } = seg
          if (j === ts.length) {
            q.quadTo(cp.x, cp.y, end.x, end.y)
            break
          }
          const speed = (t: number): number =>
            vectorLength(quadraticBezierDeriv(start, cp, end, t))
          const [invL, dT] = invSpeedPolynomialChebyshevApprox(
            SPLIT_NODES,
            gaussLegendre7,
            speed,
            0.0,
            1.0
          )

          let t0 = 0.0
          let r: [Point, Point, Point] = [start, cp, end]
          while (j < ts.length && T < ts[j] && ts[j] <= T + dT) {
            const t = invL(ts[j] - T)
            const tsub = (t - t0) / (1.0 - t0)
            t0 = t

            const { first, second } = splitQuadraticBezier(r[0], r[1], r[2], tsub)
            q.quadTo(first[1].x, first[1].y, first[2].x, first[2].y)
            push(first[2])
            r = second
            j++
          }
          if (!equal(t0, 1.0, this.eps)) {
            q.quadTo(r[1].x, r[1].y, r[2].x, r[2].y)
          }
          T += dT
          break
        }
        case CommandType.CubeTo: {
          const { control1: cp1, control2: cp2, end } = seg
          if (j === ts.length) {
            q.cubeTo(cp1.x, cp1.y, cp2.x, cp2.y, end.x, end.y)
            break
          }
          const speed = (t: number): number =>
            vectorLength(cubicBezierDeriv(start, cp1, cp2, end, t))
          const nodes =
            SPLIT_NODES + SPLIT_NODES * cubicBezierNumInflections(start, cp1, cp2, end, this.eps)
          const [invL, dT] = invSpeedPolynomialChebyshevApprox(
            nodes,
            gaussLegendre7,
            speed,
            0.0,
            1.0
          )

          let t0 = 0.0
          let r: [Point, Point, Point, Point] = [start, cp1, cp2, end]
          while (j < ts.length && T < ts[j] && ts[j] <= T + dT) {
            const t = invL(ts[j] - T)
            const tsub = (t - t0) / (1.0 - t0)
            t0 = t

            const { first, second } = splitCubicBezier(r[0], r[1], r[2], r[3], tsub)
            q.cubeTo(first[1].x, first[1].y, first[2].x, first[2].y, first[3].x, first[3].y)
            push(first[3])
            r = second
            j++
          }
          if (!equal(t0, 1.0, this.eps)) {
            q.cubeTo(r[1].x, r[1].y, r[2].x, r[2].y, r[3].x, r[3].y)
          }
          T += dT
          break
        }
        case CommandType.ArcTo: {
          const { rx, ry, rotation: phi, largeArc, sweep, end } = seg
          const rot = toDegrees(phi)
          if (j === ts.length) {
            q.arcTo(rx, ry, rot, largeArc, sweep, end.x, end.y)
            break
          }
          const { cx, cy, theta0, theta1 } = arcToCenter(start, seg, this.eps)

          // Parametrize by u in [0,1] so that clockwise arcs have an increasing parameter too.
          const angle = (u: number): number => theta0 + u * (theta1 - theta0)
          const speed = (u: number): number =>
            Math.abs(theta1 - theta0) * vectorLength(ellipseDeriv(rx, ry, 0.0, true, angle(u)))
          const [invL, dT] = invSpeedPolynomialChebyshevApprox(
            SPLIT_NODES_ARC,
            gaussLegendre7,
            speed,
            0.0,
            1.0
          )

          let startTheta = theta0
          let nextLarge = largeArc
          while (j < ts.length && T < ts[j] && ts[j] <= T + dT) {
            const theta = angle(invL(ts[j] - T))
            const split = ellipseSplit(rx, ry, phi, cx, cy, startTheta, theta1, theta, this.eps)
            if (split !== undefined) {
              q.arcTo(rx, ry, rot, split.large0, sweep, split.mid.x, split.mid.y)
              push(split.mid)
              startTheta = theta
              nextLarge = split.large1
            }
            j++
          }
          if (!equal(startTheta, theta1, this.eps)) {
            q.arcTo(rx, ry, rot, nextLarge, sweep, end.x, end.y)
          }
          T += dT
          break
        }
      }
    }
    if (1 < q.cmds.length) {
      qs.push(q)
    }
    return qs
  }

  // Dashes the path with the alternating dash and space lengths d, starting at offset into the
  // pattern. Each subpath is dashed on its own; an odd-length pattern is repeated once.
  dash(offset: number, ...d: number[]): Path {
    ;[offset, d] = dashCanonical(offset, d, this.eps)
    if (d.length === 0) {
      return this.copy()
    } else if (d.length === 1 && d[0] === 0.0) {
      return this.derive()
    }

    if (d.length % 2 === 1) {
      // Odd indices must be spaces.
      d = [...d, ...d]
    }

    const [i0, pos0] = dashStart(offset, d)

    const q = this.derive()
    for (const ps of this.split()) {
      let i = i0
      let pos = pos0

      const t: number[] = []
      const length = ps.length()
      while (pos + d[i] + this.eps < length) {
        pos += d[i]
        if (0.0 < pos) {
          t.push(pos)
        }
        i++
        if (i === d.length) {
          i = 0
        }
      }

      const endsInDash = i % 2 === 0
      const j0 = (t.length % 2 === 1 && endsInDash) || (t.length % 2 === 0 && !endsInDash) ? 1 : 0

      let qd = this.derive()
      const pd = ps.splitAt(...t)
      for (let j = j0; j < pd.length - 1; j += 2) {
        qd.append(pd[j])
      }
      if (endsInDash) {
        const lastPiece = pd[pd.length - 1]
        if (ps.closed()) {
          // The last dash continues into the first.
          qd = lastPiece.join(qd)
        } else {
          qd.append(lastPiece)
        }
      }
      q.append(qd)
    }
    return q
  }

  // Canonical dash pattern and whether the stroke is drawn at all. An empty pattern means a solid
  // stroke.
  checkDash(offset: number, d: number[]): { dashes: number[]; stroke: boolean } {
    ;[offset, d] = dashCanonical(offset, d, this.eps)
    if (d.length === 0) {
      return { dashes: d, stroke: true }
    } else if (d.length === 1 && d[0] === 0.0) {
      return { dashes: [], stroke: false }
    }

    const length = this.length()
    const [i, pos] = dashStart(offset, d)
    if (length <= d[i] - pos) {
      // The first dash or space covers the whole path.
      return { dashes: [], stroke: i % 2 === 0 }
    }
    return { dashes: d, stroke: true }
  }

  // The same path traced in the opposite direction.
  reverse(): Path {
    const q = this.derive()
    const n = this.cmds.length
    if (n === 0) {
      return q
    }

    let end = { ...this.cmds[n - 1].end }
    q.cmds.push({ type: CommandType.MoveTo, end })

    let closed = false
    let first = end
    let start = end
    for (let i = n - 1; 0 <= i; i--) {
      const cmd = this.cmds[i]
      end = 0 < i ? { ...this.cmds[i - 1].end } : { x: 0, y: 0 }

      switch (cmd.type) {
        case CommandType.MoveTo:
          if (closed) {
            q.cmds.push({ type: CommandType.Close, end: { ...first } })
            closed = false
          }
          if (i !== 0) {
            q.cmds.push({ type: CommandType.MoveTo, end })
            first = end
          }
          break
        case CommandType.Close:
          if (!this.pointsEqual(start, end)) {
            q.cmds.push({ type: CommandType.LineTo, end })
          }
          closed = true
          break
        case CommandType.LineTo:
          if (closed && (i === 0 || this.cmds[i - 1].type === CommandType.MoveTo)) {
            q.cmds.push({ type: CommandType.Close, end: { ...first } })
            closed = false
          } else {
            q.cmds.push({ type: CommandType.LineTo, end })
          }
          break
        case CommandType.QuadTo:
          q.cmds.push({ type: CommandType.QuadTo, control: { ...cmd.control }, end })
          break
        case CommandType.CubeTo:
          q.cmds.push({
            type: CommandType.CubeTo,
            control1: { ...cmd.control2 },
            control2: { ...cmd.control1 },
            end
          })
          break
        case CommandType.ArcTo:
          q.cmds.push({ ...cmd, sweep: !cmd.sweep, end })
          break
      }
      start = end
    }
    if (closed) {
      q.cmds.push({ type: CommandType.Close, end: { ...first } })
    }
    return q
  }

  // Outline of the stroke of width w, made up of filled anticlockwise contours.
  stroke(
    width: number,
    capper?: Capper,
    joiner?: Joiner,
    tolerance: number = this.config.tolerance
  ): Path {
    return strokePath(this, width, capper, joiner, tolerance)
  }

  // Grows the filled area of the path by w, or shrinks it when w is negative.
  offset(w: number, fillRule: FillRule, tolerance: number = this.config.tolerance): Path {
    return offsetPath(this, w, fillRule, tolerance)
  }

  // Removes self-intersections and overlaps, leaving filled regions anticlockwise and holes
  // clockwise.
  settle(fillRule: FillRule): Path {
    return settle(this, fillRule)
  }

  toString(): string {
    return new PathFormatter(this.eps).format(this.cmds, PathFormat.Text)
  }

  // Minified SVG path data.
  toSvg(): string {
    if (this.empty()) {
      return ''
    }
    return new PathFormatter(this.eps).format(this.cmds, PathFormat.Svg)
  }

  toPs(): string {
    if (this.empty()) {
      return ''
    }
    return new PathFormatter(this.eps).format(this.cmds, PathFormat.PostScript)
  }

  toPdf(): string {
    if (this.empty()) {
      return ''
    }
    const p = this.replaceArcs()
    if (p.cmds.some((cmd) => cmd.type === CommandType.ArcTo)) {
      throw new FormatterError('Arcs left after replacing them by Beziers')
    }
    return new PathFormatter(this.eps).format(p.cmds, PathFormat.Pdf)
  }
}

interface Location {
  start: Point
  cmd: PathCommand
  t: number
}

class BoundsBuilder {
  private b: Bounds

  constructor(p: Point) {
    this.b = { xMin: p.x, yMin: p.y, xMax: p.x, yMax: p.y }
  }

  add(p: Point): void {
    this.b = {
      xMin: Math.min(this.b.xMin, p.x),
      yMin: Math.min(this.b.yMin, p.y),
      xMax: Math.max(this.b.xMax, p.x),
      yMax: Math.max(this.b.yMax, p.y)
    }
  }

  bounds(): Bounds {
    return { ...this.b }
  }
}

function arcToCenter(start: Point, cmd: ArcToCommand, eps: number) {
  return ellipseToCenter(
    start.x,
    start.y,
    cmd.rx,
    cmd.ry,
    cmd.rotation,
    cmd.largeArc,
    cmd.sweep,
    cmd.end.x,
    cmd.end.y,
    eps
  )
}

function isPointClosed(cmds: PathCommand[], eps: number): boolean {
  const n = cmds.length
  if (n < 2 || cmds[n - 1].type !== CommandType.Close) {
    return false
  }
  const prev = cmds[n - 2].end
  const end = cmds[n - 1].end
  return equal(prev.x, end.x, eps) && equal(prev.y, end.y, eps)
}

// Resolves command i of a single subpath. Index 0 (the MoveTo) maps to the start of the first
// command, a zero-length Close to the end of the command before it.
function locateInSubpath(
  cmds: PathCommand[],
  i: number,
  t: number,
  eps: number
): Location | undefined {
  const n = cmds.length
  const last = isPointClosed(cmds, eps) ? n - 1 : n
  if (i === 0) {
    i = 1
    t = 0.0
  } else if (i < n && i === last) {
    i -= 1
    t = 1.0
  }
  if (i < 1 || n <= i || last < i + 1) {
    return undefined
  }
  return { start: cmds[i - 1].end, cmd: cmds[i], t }
}

function commandsEqual(a: PathCommand, b: PathCommand, eps: number): boolean {
  const eq = (p: Point, q: Point): boolean => equal(p.x, q.x, eps) && equal(p.y, q.y, eps)
  if (a.type !== b.type || !eq(a.end, b.end)) {
    return false
  }
  if (a.type === CommandType.QuadTo && b.type === CommandType.QuadTo) {
    return eq(a.control, b.control)
  } else if (a.type === CommandType.CubeTo && b.type === CommandType.CubeTo) {
    return eq(a.control1, b.control1) && eq(a.control2, b.control2)
  } else if (a.type === CommandType.ArcTo && b.type === CommandType.ArcTo) {
    return (
      equal(a.rx, b.rx, eps) &&
      equal(a.ry, b.ry, eps) &&
      equal(a.rotation, b.rotation, eps) &&
      a.largeArc === b.largeArc &&
      a.sweep === b.sweep
    )
  }
  return true
}

// Index into the dash pattern and the position along the path where the first dash or space
// starts, negative when the offset lands halfway into it.
export function dashStart(offset: number, d: number[]): [number, number] {
  let i0 = 0
  while (d[i0] <= offset) {
    offset -= d[i0]
    i0++
    if (i0 === d.length) {
      i0 = 0
    }
  }
  let pos0 = -offset
  if (offset < 0.0) {
    const total = d.reduce((sum, dd) => sum + dd, 0.0)
    pos0 = -(total + offset)
  }
  return [i0, pos0]
}

// Simplified dash pattern: zero-length dashes and spaces are merged into their neighbours and
// repeated halves are dropped. Returns [] for a solid stroke and [0] for no stroke at all.
export function dashCanonical(offset: number, d: number[], eps: number): [number, number[]] {
  d = [...d]
  if (d.length === 0) {
    return [0.0, []]
  }

  // Remove zeros except the first and last.
  for (let i = 1; i < d.length - 1; i++) {
    if (equal(d[i], 0.0, eps)) {
      d[i - 1] += d[i + 1]
      d.splice(i, 2)
      i--
    }
  }

  // A leading zero merges the following space into the last entry.
  if (equal(d[0], 0.0, eps)) {
    if (d.length < 3) {
      return [0.0, [0.0]]
    }
    offset -= d[1]
    d[d.length - 1] += d[1]
    d = d.slice(2)
  }

  // A trailing zero merges the space before it into the first entry.
  if (equal(d[d.length - 1], 0.0, eps)) {
    if (d.length < 3) {
      return [0.0, []]
    }
    offset += d[d.length - 2]
    d[0] += d[d.length - 2]
    d = d.slice(0, d.length - 2)
  }

  if (d.some((dd) => dd < 0.0 || equal(dd, 0.0, eps))) {
    return [0.0, [0.0]]
  }

  // Drop repeated halves.
  while (d.length % 2 === 0) {
    const mid = d.length / 2
    let repeated = true
    for (let i = 0; i < mid; i++) {
      if (!equal(d[i], d[mid + i], eps)) {
        repeated = false
        break
      }
    }
    if (!repeated) {
      break
    }
    d = d.slice(0, mid)
  }
  return [offset, d]
}
