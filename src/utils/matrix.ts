import { DEFAULT_EPSILON } from '../constants'
import { Point, Vector } from '../types/base'
import { equal, solveQuadraticFormula } from './math'
import { normalizeVector } from './vector'

export interface Eigen {
  lambda1: number
  lambda2: number
  v1: Vector
  v2: Vector
}

export interface Decomposition {
  tx: number
  ty: number
  phi: number
  sx: number
  sy: number
  theta: number
}

// Affine transformation. Chained operations are applied to points in reverse order, that is
// `new Matrix().translate(x, y).rotate(a)` rotates first and translates after.
export class Matrix {
  // https://www.w3.org/TR/SVG11/coords.html
  // [a, c, e]
  // [b, d, f]
  // [0, 0, 1]
  constructor(
    public readonly a: number = 1,
    public readonly b: number = 0,
    public readonly c: number = 0,
    public readonly d: number = 1,
    public readonly e: number = 0,
    public readonly f: number = 0
  ) {}

  static identity(): Matrix {
    return new Matrix()
  }

  multiply(other: Matrix): Matrix {
    const a = this.a * other.a + this.c * other.b
    const b = this.b * other.a + this.d * other.b
    const c = this.a * other.c + this.c * other.d
    const d = this.b * other.c + this.d * other.d
    const e = this.a * other.e + this.c * other.f + this.e
    const f = this.b * other.e + this.d * other.f + this.f
    return new Matrix(a, b, c, d, e, f)
  }

  apply(p: Point): Point {
    return {
      x: this.a * p.x + this.c * p.y + this.e,
      y: this.b * p.x + this.d * p.y + this.f
    }
  }

  // Apply the linear part only.
  applyToVector(v: Vector): Vector {
    return {
      x: this.a * v.x + this.c * v.y,
      y: this.b * v.x + this.d * v.y
    }
  }

  translate(x: number, y: number = 0): Matrix {
    return this.multiply(new Matrix(1, 0, 0, 1, x, y))
  }

  scale(x: number, y: number = x): Matrix {
    return this.multiply(new Matrix(x, 0, 0, y, 0, 0))
  }

  scaleAbout(x: number, y: number, cx: number, cy: number): Matrix {
    return this.translate(cx, cy).scale(x, y).translate(-cx, -cy)
  }

  // Rotate anticlockwise by an angle in degrees.
  rotate(angle: number): Matrix {
    const rad = (angle * Math.PI) / 180
    const cos = Math.cos(rad)
    const sin = Math.sin(rad)
    return this.multiply(new Matrix(cos, sin, -sin, cos, 0, 0))
  }

  rotateAbout(angle: number, cx: number, cy: number): Matrix {
    return this.translate(cx, cy).rotate(angle).translate(-cx, -cy)
  }

  shear(x: number, y: number): Matrix {
    return this.multiply(new Matrix(1, y, x, 1, 0, 0))
  }

  shearAbout(x: number, y: number, cx: number, cy: number): Matrix {
    return this.translate(cx, cy).shear(x, y).translate(-cx, -cy)
  }

  skewX(angle: number): Matrix {
    return this.shear(Math.tan((angle * Math.PI) / 180), 0)
  }

  skewY(angle: number): Matrix {
    return this.shear(0, Math.tan((angle * Math.PI) / 180))
  }

  reflectX(): Matrix {
    return this.scale(-1, 1)
  }

  reflectY(): Matrix {
    return this.scale(1, -1)
  }

  reflectXAbout(x: number): Matrix {
    return this.translate(x, 0).reflectX().translate(-x, 0)
  }

  reflectYAbout(y: number): Matrix {
    return this.translate(0, y).reflectY().translate(0, -y)
  }

  // Transpose of the linear part, without translation.
  transpose(): Matrix {
    return new Matrix(this.a, this.c, this.b, this.d, 0, 0)
  }

  determinant(): number {
    return this.a * this.d - this.c * this.b
  }

  inverse(): Matrix {
    const det = this.determinant()
    const a = this.d / det
    const b = -this.b / det
    const c = -this.c / det
    const d = this.a / det
    return new Matrix(a, b, c, d, -a * this.e - c * this.f, -b * this.e - d * this.f)
  }

  // Eigenvalues in ascending order with their unit eigenvectors.
  eigen(eps: number = DEFAULT_EPSILON): Eigen {
    let [lambda1, lambda2] = solveQuadraticFormula(1.0, -this.a - this.d, this.determinant(), eps)
    if (Number.isNaN(lambda1) && Number.isNaN(lambda2)) {
      // Either the matrix contains NaN or it has no real eigenvalues.
      return { lambda1, lambda2, v1: { x: 0, y: 0 }, v2: { x: 0, y: 0 } }
    } else if (Number.isNaN(lambda2)) {
      lambda2 = lambda1
    }

    if (equal(this.b, 0.0, eps) && equal(this.c, 0.0, eps)) {
      if (this.d < this.a) {
        return { lambda1: this.d, lambda2: this.a, v1: { x: 0, y: 1 }, v2: { x: 1, y: 0 } }
      }
      return { lambda1: this.a, lambda2: this.d, v1: { x: 1, y: 0 }, v2: { x: 0, y: 1 } }
    }

    // See http://www.math.harvard.edu/archive/21b_fall_04/exhibits/2dmatrices/index.html
    if (!equal(this.b, 0.0, eps)) {
      return {
        lambda1,
        lambda2,
        v1: normalizeVector({ x: lambda1 - this.d, y: this.b }),
        v2: normalizeVector({ x: lambda2 - this.d, y: this.b })
      }
    }
    return {
      lambda1,
      lambda2,
      v1: normalizeVector({ x: this.c, y: lambda1 - this.a }),
      v2: normalizeVector({ x: this.c, y: lambda2 - this.a })
    }
  }

  // Components such that the matrix equals
  // translate(tx, ty).rotate(phi).scale(sx, sy).rotate(theta), with angles in degrees.
  decompose(eps: number = DEFAULT_EPSILON): Decomposition {
    // See https://math.stackexchange.com/questions/861674
    const E = (this.a + this.d) / 2.0
    const F = (this.a - this.d) / 2.0
    const G = (this.b + this.c) / 2.0
    const H = (this.b - this.c) / 2.0

    const Q = Math.sqrt(E * E + H * H)
    const R = Math.sqrt(F * F + G * G)
    const sx = Q + R
    const sy = Q - R

    const a1 = Math.atan2(G, F)
    const a2 = Math.atan2(H, E)
    let phi = (((a2 + a1) / 2.0) * 180.0) / Math.PI
    let theta = (((a2 - a1) / 2.0) * 180.0) / Math.PI
    if (equal(sx, 1.0, eps) && equal(sy, 1.0, eps)) {
      theta += phi
      phi = 0.0
    }
    return { tx: this.e, ty: this.f, phi, sx, sy, theta }
  }

  isTranslation(eps: number = DEFAULT_EPSILON): boolean {
    return (
      equal(this.a, 1.0, eps) &&
      equal(this.b, 0.0, eps) &&
      equal(this.c, 0.0, eps) &&
      equal(this.d, 1.0, eps)
    )
  }

  // Distances are preserved: rotations, reflections and translations.
  isRigid(eps: number = DEFAULT_EPSILON): boolean {
    return (
      equal(this.a * this.a + this.b * this.b, 1.0, eps) &&
      equal(this.c * this.c + this.d * this.d, 1.0, eps) &&
      equal(this.a * this.c + this.b * this.d, 0.0, eps)
    )
  }

  // Shapes are preserved: rigid transformations and uniform scaling.
  isSimilarity(eps: number = DEFAULT_EPSILON): boolean {
    return (
      !equal(this.determinant(), 0.0, eps) &&
      equal(this.a * this.a + this.b * this.b, this.c * this.c + this.d * this.d, eps) &&
      equal(this.a * this.c + this.b * this.d, 0.0, eps)
    )
  }

  equals(other: Matrix, eps: number = DEFAULT_EPSILON): boolean {
    return (
      equal(this.a, other.a, eps) &&
      equal(this.b, other.b, eps) &&
      equal(this.c, other.c, eps) &&
      equal(this.d, other.d, eps) &&
      equal(this.e, other.e, eps) &&
      equal(this.f, other.f, eps)
    )
  }

  toString(): string {
    return `(${this.a} ${this.c}; ${this.b} ${this.d}) + (${this.e},${this.f})`
  }
}
