import { Point } from './base'

export enum CommandType {
  MoveTo = 'M',
  LineTo = 'L',
  QuadTo = 'Q',
  CubeTo = 'C',
  ArcTo = 'A',
  Close = 'z'
}

export interface MoveToCommand {
  type: CommandType.MoveTo
  end: Point
}

export interface LineToCommand {
  type: CommandType.LineTo
  end: Point
}

export interface QuadToCommand {
  type: CommandType.QuadTo
  control: Point
  end: Point
}

export interface CubeToCommand {
  type: CommandType.CubeTo
  control1: Point
  control2: Point
  end: Point
}

// Elliptical arc in endpoint parametrization, rotation in radians.
export interface ArcToCommand {
  type: CommandType.ArcTo
  rx: number
  ry: number
  rotation: number
  largeArc: boolean
  sweep: boolean
  end: Point
}

// The end of a Close is always the start of its subpath.
export interface CloseCommand {
  type: CommandType.Close
  end: Point
}

export type PathCommand =
  | MoveToCommand
  | LineToCommand
  | QuadToCommand
  | CubeToCommand
  | ArcToCommand
  | CloseCommand

// A command together with the point it starts from.
export type Segment = PathCommand & { start: Point }

export type QuadraticCurve = [Point, Point, Point]
export type CubicCurve = [Point, Point, Point, Point]

export function copyCommand(cmd: PathCommand): PathCommand {
  switch (cmd.type) {
    case CommandType.MoveTo:
    case CommandType.LineTo:
    case CommandType.Close:
      return { type: cmd.type, end: { ...cmd.end } }
    case CommandType.QuadTo:
      return { type: cmd.type, control: { ...cmd.control }, end: { ...cmd.end } }
    case CommandType.CubeTo:
      return {
        type: cmd.type,
        control1: { ...cmd.control1 },
        control2: { ...cmd.control2 },
        end: { ...cmd.end }
      }
    case CommandType.ArcTo:
      return { ...cmd, end: { ...cmd.end } }
  }
}

// Attach the start point to every command. A MoveTo starts where the previous command ended.
export function commandSegments(cmds: PathCommand[]): Segment[] {
  const segs: Segment[] = []
  let start: Point = { x: 0, y: 0 }
  for (const cmd of cmds) {
    segs.push({ ...copyCommand(cmd), start: { ...start } })
    start = cmd.end
  }
  return segs
}
