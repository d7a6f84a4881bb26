import { DEFAULT_EPSILON } from '../constants'
import { Point, Vector } from '../types/base'
import { equal } from './math'

export function add(v1: Vector, v2: Vector): Vector {
  return { x: v1.x + v2.x, y: v1.y + v2.y }
}

export function subtract(v1: Vector, v2: Vector): Vector {
  return { x: v1.x - v2.x, y: v1.y - v2.y }
}

export function scale(v: Vector, factor: number): Vector {
  return { x: v.x * factor, y: v.y * factor }
}

export function divide(v: Vector, divisor: number): Vector {
  return { x: v.x / divisor, y: v.y / divisor }
}

export function negate(v: Vector): Vector {
  return { x: -v.x, y: -v.y }
}

export function dotProduct(v1: Vector, v2: Vector): number {
  return v1.x * v2.x + v1.y * v2.y
}

// Perp-dot product, the z component of the 3D cross product.
export function crossProduct(v1: Vector, v2: Vector): number {
  return v1.x * v2.y - v1.y * v2.x
}

export function vectorLength(v: Vector): number {
  return Math.hypot(v.x, v.y)
}

export function vectorAngle(v: Vector): number {
  return Math.atan2(v.y, v.x)
}

export function vectorSlope(v: Vector): number {
  return v.y / v.x
}

export function computeAngleBetweenVectors(v1: Vector, v2: Vector): number {
  // Signed angle in radians (range [-π, π]), positive for anticlockwise rotation from v1 to v2.
  return Math.atan2(crossProduct(v1, v2), dotProduct(v1, v2))
}

export function rotate90CW(v: Vector): Vector {
  return { x: v.y, y: -v.x }
}

export function rotate90CCW(v: Vector): Vector {
  return { x: -v.y, y: v.x }
}

// Rotate point p by phi radians (anticlockwise) around the pivot.
export function rotateAbout(p: Point, phi: number, pivot: Point): Point {
  const sinphi = Math.sin(phi)
  const cosphi = Math.cos(phi)
  const x = p.x - pivot.x
  const y = p.y - pivot.y
  return {
    x: pivot.x + cosphi * x - sinphi * y,
    y: pivot.y + sinphi * x + cosphi * y
  }
}

// Scale the vector to the given length. A zero vector stays zero.
export function normalizeVector(v: Vector, length: number = 1.0): Vector {
  const d = vectorLength(v)
  if (d === 0.0) {
    return { x: 0, y: 0 }
  }
  return { x: (v.x / d) * length, y: (v.y / d) * length }
}

export function interpolate(p: Point, q: Point, t: number): Point {
  return { x: (1.0 - t) * p.x + t * q.x, y: (1.0 - t) * p.y + t * q.y }
}

export function computePointToPointDistance(point1: Point, point2: Point): number {
  return Math.hypot(point2.x - point1.x, point2.y - point1.y)
}

export function pointsEqual(p: Point, q: Point, eps: number = DEFAULT_EPSILON): boolean {
  return equal(p.x, q.x, eps) && equal(p.y, q.y, eps)
}

export function isZeroVector(v: Vector, eps: number = DEFAULT_EPSILON): boolean {
  return equal(v.x, 0.0, eps) && equal(v.y, 0.0, eps)
}

export function formatPoint(p: Point): string {
  return `(${p.x},${p.y})`
}
