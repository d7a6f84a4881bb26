import { KernelConfig } from '../constants'
import { Path } from '../paths/path'
import { Point } from '../types/base'
import { add, scale, subtract } from '../utils/vector'
import { ParseError } from './exceptions'

// Number of values taken by each command.
const PARAMETER_COUNT: Record<string, number> = {
  M: 2,
  Z: 0,
  L: 2,
  H: 1,
  V: 1,
  C: 6,
  S: 4,
  Q: 4,
  T: 2,
  A: 7
}

// Sticky, matched at lastIndex.
const NUMBER = /[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?/y

export class SvgPathParser {
  private data = ''
  private pos = 0

  constructor(private readonly config: Partial<KernelConfig> = {}) {}

  private isWhitespace(char: string): boolean {
    return [',', ' ', '\t', '\n', '\r', '\f'].includes(char)
  }

  private isNumberStart(char: string): boolean {
    return /[\d.+-]/.test(char)
  }

  private skipSeparators(): void {
    while (this.pos < this.data.length && this.isWhitespace(this.data[this.pos])) {
      this.pos++
    }
  }

  private readNumber(command: string): number {
    NUMBER.lastIndex = this.pos
    const match = NUMBER.exec(this.data)
    if (match === null) {
      const count = PARAMETER_COUNT[command.toUpperCase()]
      if (1 < count) {
        const position = this.pos + 1
        throw new ParseError(
          `Sets of ${count} numbers should follow command '${command}' at position ${position}`,
          position
        )
      }
      throw new ParseError(
        `Number should follow command '${command}' at position ${this.pos + 1}`,
        this.pos + 1
      )
    }
    this.pos += match[0].length
    return parseFloat(match[0])
  }

  // Arc flags are a single 0 or 1 that need no separator from what follows.
  private readFlag(command: string): boolean {
    const char = this.data[this.pos]
    if (char !== '0' && char !== '1') {
      throw new ParseError(
        `Arc flags should be 0 or 1 in command '${command}' at position ${this.pos + 1}`,
        this.pos + 1
      )
    }
    this.pos++
    return char === '1'
  }

  private readValues(command: string): number[] {
    const upper = command.toUpperCase()
    const values: number[] = []
    for (let j = 0; j < PARAMETER_COUNT[upper]; j++) {
      if (upper === 'A' && (j === 3 || j === 4)) {
        values.push(this.readFlag(command) ? 1 : 0)
      } else {
        values.push(this.readNumber(command))
      }
      this.skipSeparators()
    }
    return values
  }

  public parse(d: string): Path {
    this.data = d
    this.pos = 0

    const p = new Path(this.config)
    this.skipSeparators()
    if (this.data.length <= this.pos) {
      return p
    } else if (!/[A-Za-z]/.test(this.data[this.pos])) {
      throw new ParseError('Path data should start with a command', this.pos + 1)
    }

    let p0: Point = { x: 0, y: 0 } // current point
    let cpQuad: Point = { x: 0, y: 0 } // last control point of Q and T
    let cpCube: Point = { x: 0, y: 0 } // last control point of C and S
    let prevCommand = 'z'
    for (;;) {
      this.skipSeparators()
      if (this.data.length <= this.pos) {
        break
      }

      // A new command letter, or more values repeating the previous command.
      let command = prevCommand
      const char = this.data[this.pos]
      if (command === 'z' || command === 'Z' || !this.isNumberStart(char)) {
        command = char
        if (!(command.toUpperCase() in PARAMETER_COUNT)) {
          throw new ParseError(
            `Unknown command '${command}' at position ${this.pos + 1}`,
            this.pos + 1
          )
        }
        this.pos++
        this.skipSeparators()
      }

      const f = this.readValues(command)
      const relative = command === command.toLowerCase()
      const offset = relative ? p0 : { x: 0, y: 0 }
      const point = (i: number): Point => add(offset, { x: f[i], y: f[i + 1] })

      let p1: Point = p0
      switch (command.toUpperCase()) {
        case 'M':
          p1 = point(0)
          p.moveTo(p1.x, p1.y)
          // Further coordinate pairs are lines.
          command = relative ? 'l' : 'L'
          break
        case 'Z':
          p1 = p.startPos()
          p.close()
          break
        case 'L':
          p1 = point(0)
          p.lineTo(p1.x, p1.y)
          break
        case 'H':
          p1 = { x: relative ? p0.x + f[0] : f[0], y: p0.y }
          p.lineTo(p1.x, p1.y)
          break
        case 'V':
          p1 = { x: p0.x, y: relative ? p0.y + f[0] : f[0] }
          p.lineTo(p1.x, p1.y)
          break
        case 'C': {
          const cp1 = point(0)
          const cp2 = point(2)
          p1 = point(4)
          p.cubeTo(cp1.x, cp1.y, cp2.x, cp2.y, p1.x, p1.y)
          cpCube = cp2
          break
        }
        case 'S': {
          let cp1 = p0
          if ('CcSs'.includes(prevCommand)) {
            cp1 = subtract(scale(p0, 2.0), cpCube)
          }
          const cp2 = point(0)
          p1 = point(2)
          p.cubeTo(cp1.x, cp1.y, cp2.x, cp2.y, p1.x, p1.y)
          cpCube = cp2
          break
        }
        case 'Q': {
          const cp = point(0)
          p1 = point(2)
          p.quadTo(cp.x, cp.y, p1.x, p1.y)
          cpQuad = cp
          break
        }
        case 'T': {
          let cp = p0
          if ('QqTt'.includes(prevCommand)) {
            cp = subtract(scale(p0, 2.0), cpQuad)
          }
          p1 = point(0)
          p.quadTo(cp.x, cp.y, p1.x, p1.y)
          cpQuad = cp
          break
        }
        case 'A':
          p1 = point(5)
          p.arcTo(f[0], f[1], f[2], f[3] === 1, f[4] === 1, p1.x, p1.y)
          break
      }
      prevCommand = command
      p0 = p1
    }
    return p
  }
}

// Parses SVG path data into a path.
export function parseSvgPath(d: string, config: Partial<KernelConfig> = {}): Path {
  return new SvgPathParser(config).parse(d)
}
