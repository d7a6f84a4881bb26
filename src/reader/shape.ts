import { KernelConfig } from '../constants'
import { ParseError } from '../parsers/exceptions'
import { parseNumber, parsePoints } from '../parsers/values'
import { Path } from '../paths/path'
import { circle, ellipse, polyline, rectangle, roundedRectangle } from '../paths/shapes'
import { ElementType, RawSvgElement } from '../types/svg'

export class ShapeReadError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ShapeReadError'
  }
}

// Turns basic shape elements into paths.
export class ShapeReader {
  constructor(private readonly config: Partial<KernelConfig> = {}) {}

  private readRectangle(attrs: Record<string, string>): Path {
    const x = parseNumber(attrs['x'], 'x', 0)
    const y = parseNumber(attrs['y'], 'y', 0)
    const width = parseNumber(attrs['width'], 'width')
    const height = parseNumber(attrs['height'], 'height')
    const rx = attrs['rx'] ? parseNumber(attrs['rx'], 'rx') : undefined
    const ry = attrs['ry'] ? parseNumber(attrs['ry'], 'ry') : undefined
    if (rx === undefined && ry === undefined) {
      return rectangle(x, y, width, height, this.config)
    }
    return roundedRectangle(x, y, width, height, rx, ry, this.config)
  }

  private readCircle(attrs: Record<string, string>): Path {
    return circle(
      parseNumber(attrs['cx'], 'cx', 0),
      parseNumber(attrs['cy'], 'cy', 0),
      parseNumber(attrs['r'], 'r'),
      this.config
    )
  }

  private readEllipse(attrs: Record<string, string>): Path {
    return ellipse(
      parseNumber(attrs['cx'], 'cx', 0),
      parseNumber(attrs['cy'], 'cy', 0),
      parseNumber(attrs['rx'], 'rx'),
      parseNumber(attrs['ry'], 'ry'),
      this.config
    )
  }

  private readLine(attrs: Record<string, string>): Path {
    const start = { x: parseNumber(attrs['x1'], 'x1', 0), y: parseNumber(attrs['y1'], 'y1', 0) }
    const end = { x: parseNumber(attrs['x2'], 'x2', 0), y: parseNumber(attrs['y2'], 'y2', 0) }
    return polyline([start, end], false, this.config)
  }

  private readPolyline(attrs: Record<string, string>, closed: boolean): Path {
    return polyline(parsePoints(attrs['points'] ?? ''), closed, this.config)
  }

  public read(element: RawSvgElement): Path {
    const attrs = element.attributes
    try {
      switch (element.type) {
        case ElementType.Rectangle:
          return this.readRectangle(attrs)
        case ElementType.Circle:
          return this.readCircle(attrs)
        case ElementType.Ellipse:
          return this.readEllipse(attrs)
        case ElementType.Line:
          return this.readLine(attrs)
        case ElementType.Polyline:
          return this.readPolyline(attrs, false)
        case ElementType.Polygon:
          return this.readPolyline(attrs, true)
        default:
          throw new ShapeReadError(`Unsupported shape type: ${element.type}`)
      }
    } catch (error) {
      if (error instanceof ParseError) {
        throw new ShapeReadError(`Invalid ${element.type} element: ${error.message}`)
      }
      throw error
    }
  }
}
