import { quadraticToCubicBezier } from '../bezier/split'
import { DEFAULT_EPSILON } from '../constants'
import { ellipseToCenter } from '../ellipse/math'
import { Point } from '../types/base'
import { CommandType, PathCommand } from '../types/paths'
import { equal } from '../utils/math'

export class FormatterError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'FormatterError'
  }
}

export enum PathFormat {
  Text = 'text',
  Svg = 'svg',
  PostScript = 'ps',
  Pdf = 'pdf'
}

const TEXT_PRECISION = 15
const DEC_PRECISION = 8

function toDegrees(rad: number): number {
  return (rad * 180.0) / Math.PI
}

export class PathFormatter {
  constructor(private readonly eps: number = DEFAULT_EPSILON) {}

  private round(x: number, precision: number): number {
    if (Math.abs(x) < this.eps) {
      return 0
    }
    return Number(x.toPrecision(precision))
  }

  private fmt(x: number): string {
    return String(this.round(x, TEXT_PRECISION))
  }

  // Shortest form for path data, leading zeros are dropped.
  private num(x: number): string {
    const s = String(this.round(x, TEXT_PRECISION))
    if (s.startsWith('0.')) {
      return s.slice(1)
    } else if (s.startsWith('-0.')) {
      return '-' + s.slice(2)
    }
    return s
  }

  private dec(x: number): string {
    return String(this.round(x, DEC_PRECISION))
  }

  public format(cmds: PathCommand[], format: PathFormat): string {
    switch (format) {
      case PathFormat.Text:
        return this.formatText(cmds)
      case PathFormat.Svg:
        return this.formatSvg(cmds)
      case PathFormat.PostScript:
        return this.formatPs(cmds)
      case PathFormat.Pdf:
        return this.formatPdf(cmds)
    }
  }

  // Close to SVG path data, but every command is written out in full.
  private formatText(cmds: PathCommand[]): string {
    const f = (x: number): string => this.fmt(x)
    let s = ''
    for (const cmd of cmds) {
      switch (cmd.type) {
        case CommandType.MoveTo:
        case CommandType.LineTo:
          s += `${cmd.type}${f(cmd.end.x)} ${f(cmd.end.y)}`
          break
        case CommandType.QuadTo:
          s += `Q${f(cmd.control.x)} ${f(cmd.control.y)} ${f(cmd.end.x)} ${f(cmd.end.y)}`
          break
        case CommandType.CubeTo:
          s +=
            `C${f(cmd.control1.x)} ${f(cmd.control1.y)} ${f(cmd.control2.x)} ` +
            `${f(cmd.control2.y)} ${f(cmd.end.x)} ${f(cmd.end.y)}`
          break
        case CommandType.ArcTo: {
          const large = cmd.largeArc ? '1' : '0'
          const sweep = cmd.sweep ? '1' : '0'
          s +=
            `A${f(cmd.rx)} ${f(cmd.ry)} ${f(toDegrees(cmd.rotation))} ${large} ${sweep} ` +
            `${f(cmd.end.x)} ${f(cmd.end.y)}`
          break
        }
        case CommandType.Close:
          s += 'z'
          break
      }
    }
    return s
  }

  private formatSvg(cmds: PathCommand[]): string {
    const n = (x: number): string => this.num(x)
    let s = ''
    let pos: Point = { x: 0, y: 0 }
    for (const cmd of cmds) {
      switch (cmd.type) {
        case CommandType.MoveTo:
          s += `M${n(cmd.end.x)} ${n(cmd.end.y)}`
          break
        case CommandType.LineTo:
          if (equal(cmd.end.x, pos.x, this.eps) && equal(cmd.end.y, pos.y, this.eps)) {
            // Nothing to draw.
          } else if (equal(cmd.end.x, pos.x, this.eps)) {
            s += `V${n(cmd.end.y)}`
          } else if (equal(cmd.end.y, pos.y, this.eps)) {
            s += `H${n(cmd.end.x)}`
          } else {
            s += `L${n(cmd.end.x)} ${n(cmd.end.y)}`
          }
          break
        case CommandType.QuadTo:
          s += `Q${n(cmd.control.x)} ${n(cmd.control.y)} ${n(cmd.end.x)} ${n(cmd.end.y)}`
          break
        case CommandType.CubeTo:
          s +=
            `C${n(cmd.control1.x)} ${n(cmd.control1.y)} ${n(cmd.control2.x)} ` +
            `${n(cmd.control2.y)} ${n(cmd.end.x)} ${n(cmd.end.y)}`
          break
        case CommandType.ArcTo: {
          let rx = cmd.rx
          let ry = cmd.ry
          let rot = toDegrees(cmd.rotation)
          if (90.0 <= rot) {
            ;[rx, ry] = [ry, rx]
            rot -= 90.0
          }
          const flags = (cmd.largeArc ? '1' : '0') + (cmd.sweep ? '1' : '0')
          s += `A${n(rx)} ${n(ry)} ${n(rot)} ${flags}${n(cmd.end.x)} ${n(cmd.end.y)}`
          break
        }
        case CommandType.Close:
          s += 'z'
          break
      }
      pos = cmd.end
    }
    return s
  }

  private formatPs(cmds: PathCommand[]): string {
    const d = (x: number): string => this.dec(x)
    const parts: string[] = []
    let pos: Point = { x: 0, y: 0 }
    for (const cmd of cmds) {
      switch (cmd.type) {
        case CommandType.MoveTo:
          parts.push(`${d(cmd.end.x)} ${d(cmd.end.y)} moveto`)
          break
        case CommandType.LineTo:
          parts.push(`${d(cmd.end.x)} ${d(cmd.end.y)} lineto`)
          break
        case CommandType.QuadTo:
        case CommandType.CubeTo: {
          const [cp1, cp2]: [Point, Point] =
            cmd.type === CommandType.QuadTo
              ? quadraticToCubicBezier(pos, cmd.control, cmd.end)
              : [cmd.control1, cmd.control2]
          parts.push(
            `${d(cp1.x)} ${d(cp1.y)} ${d(cp2.x)} ${d(cp2.y)} ` +
              `${d(cmd.end.x)} ${d(cmd.end.y)} curveto`
          )
          break
        }
        case CommandType.ArcTo: {
          const { cx, cy, theta0, theta1 } = ellipseToCenter(
            pos.x,
            pos.y,
            cmd.rx,
            cmd.ry,
            cmd.rotation,
            cmd.largeArc,
            cmd.sweep,
            cmd.end.x,
            cmd.end.y,
            this.eps
          )
          const args = [cx, cy, cmd.rx, cmd.ry, toDegrees(theta0), toDegrees(theta1)]
          args.push(toDegrees(cmd.rotation))
          parts.push(`${args.map(d).join(' ')} ellipse${cmd.sweep ? '' : 'n'}`)
          break
        }
        case CommandType.Close:
          parts.push('closepath')
          break
      }
      pos = cmd.end
    }
    return parts.join(' ')
  }

  // Arcs have no PDF operator and must be replaced by Beziers beforehand.
  private formatPdf(cmds: PathCommand[]): string {
    const d = (x: number): string => this.dec(x)
    const parts: string[] = []
    let pos: Point = { x: 0, y: 0 }
    for (const cmd of cmds) {
      switch (cmd.type) {
        case CommandType.MoveTo:
          parts.push(`${d(cmd.end.x)} ${d(cmd.end.y)} m`)
          break
        case CommandType.LineTo:
          parts.push(`${d(cmd.end.x)} ${d(cmd.end.y)} l`)
          break
        case CommandType.QuadTo:
        case CommandType.CubeTo: {
          const [cp1, cp2]: [Point, Point] =
            cmd.type === CommandType.QuadTo
              ? quadraticToCubicBezier(pos, cmd.control, cmd.end)
              : [cmd.control1, cmd.control2]
          parts.push(
            `${d(cp1.x)} ${d(cp1.y)} ${d(cp2.x)} ${d(cp2.y)} ${d(cmd.end.x)} ${d(cmd.end.y)} c`
          )
          break
        }
        case CommandType.ArcTo:
          throw new FormatterError('Arcs must be replaced before writing PDF path data')
        case CommandType.Close:
          parts.push('h')
          break
      }
      pos = cmd.end
    }
    return parts.join(' ')
  }
}
