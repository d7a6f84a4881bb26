import type { Path } from '../paths/path'
import { Point } from '../types/base'
import { add, rotate90CCW, subtract } from '../utils/vector'

// Cap drawn at the open ends of a stroke.
export enum Capper {
  Butt = 'butt',
  Round = 'round',
  Square = 'square'
}

export function parseCapper(value: string): Capper | undefined {
  switch (value) {
    case Capper.Butt:
      return Capper.Butt
    case Capper.Round:
      return Capper.Round
    case Capper.Square:
      return Capper.Square
    default:
      return undefined
  }
}

// Caps the stroke outline p around pivot, going from pivot+n0 to pivot-n0. The length of n0 is
// the half width.
export function cap(capper: Capper, p: Path, halfWidth: number, pivot: Point, n0: Point): void {
  const end = subtract(pivot, n0)
  switch (capper) {
    case Capper.Butt:
      p.lineTo(end.x, end.y)
      break
    case Capper.Round:
      p.arcTo(halfWidth, halfWidth, 0.0, false, true, end.x, end.y)
      break
    case Capper.Square: {
      const e = rotate90CCW(n0)
      const corner1 = add(add(pivot, e), n0)
      const corner2 = subtract(add(pivot, e), n0)
      p.lineTo(corner1.x, corner1.y)
      p.lineTo(corner2.x, corner2.y)
      p.lineTo(end.x, end.y)
      break
    }
  }
}
