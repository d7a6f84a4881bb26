import { DEFAULT_EPSILON } from '../constants'
import { Bounds, Point } from '../types/base'
import { Matrix } from './matrix'

export function emptyBounds(): Bounds {
  return { xMin: 0, yMin: 0, xMax: 0, yMax: 0 }
}

export function boundsFromPoint(p: Point): Bounds {
  return { xMin: p.x, yMin: p.y, xMax: p.x, yMax: p.y }
}

export function boundsWidth(b: Bounds): number {
  return b.xMax - b.xMin
}

export function boundsHeight(b: Bounds): number {
  return b.yMax - b.yMin
}

export function addPointToBounds(b: Bounds, p: Point): Bounds {
  return {
    xMin: Math.min(b.xMin, p.x),
    yMin: Math.min(b.yMin, p.y),
    xMax: Math.max(b.xMax, p.x),
    yMax: Math.max(b.yMax, p.y)
  }
}

export function unionBounds(a: Bounds, b: Bounds): Bounds {
  return {
    xMin: Math.min(a.xMin, b.xMin),
    yMin: Math.min(a.yMin, b.yMin),
    xMax: Math.max(a.xMax, b.xMax),
    yMax: Math.max(a.yMax, b.yMax)
  }
}

export function translateBounds(b: Bounds, x: number, y: number): Bounds {
  return { xMin: b.xMin + x, yMin: b.yMin + y, xMax: b.xMax + x, yMax: b.yMax + y }
}

// Axis-aligned bounds of the four transformed corners.
export function transformBounds(b: Bounds, m: Matrix): Bounds {
  const corners = [
    m.apply({ x: b.xMin, y: b.yMin }),
    m.apply({ x: b.xMax, y: b.yMin }),
    m.apply({ x: b.xMax, y: b.yMax }),
    m.apply({ x: b.xMin, y: b.yMax })
  ]
  return corners.slice(1).reduce(addPointToBounds, boundsFromPoint(corners[0]))
}

// Whether the point lies inside or on the edge of the bounds.
export function boundsContain(b: Bounds, p: Point, eps: number = DEFAULT_EPSILON): boolean {
  return (
    b.xMin - eps <= p.x && p.x <= b.xMax + eps && b.yMin - eps <= p.y && p.y <= b.yMax + eps
  )
}

// Whether both bounds share some area, touching edges do not count.
export function boundsOverlap(a: Bounds, b: Bounds, eps: number = DEFAULT_EPSILON): boolean {
  return (
    a.xMin + eps < b.xMax && b.xMin + eps < a.xMax && a.yMin + eps < b.yMax && b.yMin + eps < a.yMax
  )
}

export function boundsEqual(a: Bounds, b: Bounds, eps: number = DEFAULT_EPSILON): boolean {
  return (
    Math.abs(a.xMin - b.xMin) <= eps &&
    Math.abs(a.yMin - b.yMin) <= eps &&
    Math.abs(a.xMax - b.xMax) <= eps &&
    Math.abs(a.yMax - b.yMax) <= eps
  )
}
