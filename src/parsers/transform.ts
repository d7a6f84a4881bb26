import { Matrix } from '../utils/matrix'
import { ParseError } from './exceptions'

export enum TransformType {
  Translate = 'translate',
  Scale = 'scale',
  Rotate = 'rotate',
  SkewX = 'skewX',
  SkewY = 'skewY',
  Matrix = 'matrix'
}

// Parse an SVG transform attribute into a single matrix.
export function parseTransform(transformStr: string | undefined): Matrix {
  let matrix = new Matrix()
  if (!transformStr) {
    return matrix
  }

  const transformRegex = /(translate|scale|rotate|matrix|skewX|skewY)\s*\(([-+\d\s,.eE]+)\)/g
  let match

  while ((match = transformRegex.exec(transformStr)) !== null) {
    const [, type, valuesStr] = match
    const values = valuesStr.trim().split(/[\s,]+/).map(Number)
    if (values.some((value) => Number.isNaN(value))) {
      throw new ParseError(`Invalid ${type} transform: ${valuesStr}`, match.index)
    }

    switch (type) {
      case TransformType.Translate: {
        const [tx = 0, ty = 0] = values
        matrix = matrix.translate(tx, ty)
        break
      }
      case TransformType.Scale: {
        const [sx = 1, sy = sx] = values
        matrix = matrix.scale(sx, sy)
        break
      }
      case TransformType.Rotate: {
        const [angle = 0, cx = 0, cy = 0] = values
        matrix = matrix.rotateAbout(angle, cx, cy)
        break
      }
      case TransformType.SkewX: {
        matrix = matrix.skewX(values[0] || 0)
        break
      }
      case TransformType.SkewY: {
        matrix = matrix.skewY(values[0] || 0)
        break
      }
      case TransformType.Matrix: {
        if (values.length !== 6) {
          throw new ParseError(`Matrix transform needs 6 values, got ${values.length}`, match.index)
        }
        const [a, b, c, d, e, f] = values
        matrix = matrix.multiply(new Matrix(a, b, c, d, e, f))
        break
      }
    }
  }

  return matrix
}
