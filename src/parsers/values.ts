import { Point } from '../types/base'
import { ParseError } from './exceptions'

// Numeric attribute, unit suffixes such as px are ignored. Missing attributes take the fallback
// when one is given.
export function parseNumber(value: string | undefined, name: string, fallback?: number): number {
  if (value === undefined || value.trim() === '') {
    if (fallback !== undefined) {
      return fallback
    }
    throw new ParseError(`Missing ${name} attribute`)
  }
  const num = parseFloat(value)
  if (Number.isNaN(num)) {
    throw new ParseError(`Invalid ${name}: ${value}`)
  }
  return num
}

// Coordinate pairs of a points attribute.
export function parsePoints(pointsStr: string): Point[] {
  const values = pointsStr
    .trim()
    .split(/[\s,]+/)
    .filter((value) => value !== '')
    .map((value) => {
      const num = parseFloat(value)
      if (Number.isNaN(num)) {
        throw new ParseError(`Invalid point value: ${value}`)
      }
      return num
    })
  if (values.length % 2 !== 0) {
    throw new ParseError(`Odd number of coordinates in points: ${pointsStr}`)
  }

  const points: Point[] = []
  for (let i = 0; i < values.length; i += 2) {
    points.push({ x: values[i], y: values[i + 1] })
  }
  return points
}
