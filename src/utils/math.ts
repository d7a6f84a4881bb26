import { DEFAULT_EPSILON } from '../constants'

export type GaussLegendreFunction = (f: (x: number) => number, a: number, b: number) => number

export function equal(a: number, b: number, eps: number = DEFAULT_EPSILON): boolean {
  return Math.abs(a - b) <= eps
}

// Whether f lies in [lower, upper] with epsilon slack on both ends.
export function interval(
  f: number,
  lower: number,
  upper: number,
  eps: number = DEFAULT_EPSILON
): boolean {
  return lower - eps <= f && f <= upper + eps
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value))
}

// Normalize an angle into [0, 2π).
export function angleNorm(theta: number): number {
  theta = theta % (2.0 * Math.PI)
  if (theta < 0.0) {
    theta += 2.0 * Math.PI
  }
  return theta
}

// Whether two angles are equal modulo 2π.
export function angleEqual(a: number, b: number, eps: number = DEFAULT_EPSILON): boolean {
  return angleNorm(a - b + eps) <= 2.0 * eps
}

// Relative position of theta between lower and upper, which may sweep in either direction. Angles
// outside of the range map outside of [0, 1].
export function angleTime(
  theta: number,
  lower: number,
  upper: number,
  eps: number = DEFAULT_EPSILON
): number {
  let sweep = true
  if (upper < lower) {
    ;[lower, upper] = [upper, lower]
    sweep = false
  }
  theta = angleNorm(theta - lower + eps) - eps
  upper = angleNorm(upper - lower)

  let t = theta / upper
  if (!sweep) {
    t = 1.0 - t
  }
  if (equal(t, 0.0, eps)) {
    return 0.0
  } else if (equal(t, 1.0, eps)) {
    return 1.0
  }
  return t
}

// Whether theta lies in [lower, upper] including the end points.
export function angleBetween(
  theta: number,
  lower: number,
  upper: number,
  eps: number = DEFAULT_EPSILON
): boolean {
  if (upper < lower) {
    ;[lower, upper] = [upper, lower]
  }
  theta = angleNorm(theta - lower + eps)
  upper = angleNorm(upper - lower + 2.0 * eps)
  return theta <= upper
}

// Whether theta lies in (lower, upper) excluding the end points.
export function angleBetweenExclusive(theta: number, lower: number, upper: number): boolean {
  if (upper < lower) {
    ;[lower, upper] = [upper, lower]
  }
  theta = angleNorm(theta - lower)
  upper = angleNorm(upper - lower)
  return 0.0 < theta && theta < upper
}

// Real roots of a.x^2 + b.x + c = 0, NaN for roots that do not exist.
export function solveQuadraticFormula(
  a: number,
  b: number,
  c: number,
  eps: number = DEFAULT_EPSILON
): [number, number] {
  if (equal(a, 0.0, eps)) {
    if (equal(b, 0.0, eps)) {
      if (equal(c, 0.0, eps)) {
        // All terms disappear, every x is a solution.
        return [0.0, NaN]
      }
      return [NaN, NaN]
    }
    return [-c / b, NaN]
  }

  if (equal(c, 0.0, eps)) {
    if (equal(b, 0.0, eps)) {
      return [0.0, NaN]
    }
    return [0.0, -b / a]
  }

  const discriminant = b * b - 4.0 * a * c
  if (discriminant < 0.0) {
    return [NaN, NaN]
  } else if (equal(discriminant, 0.0, eps)) {
    return [-b / (2.0 * a), NaN]
  }

  // Take the root where b and the radical have the same sign and derive the other one from it
  // (Citardauq formula) to avoid cancellation.
  let q = Math.sqrt(discriminant)
  if (b < 0.0) {
    q = -q
  }
  let x1 = -(b + q) / (2.0 * a)
  let x2 = c / (a * x1)
  if (x2 < x1) {
    ;[x1, x2] = [x2, x1]
  }
  return [x1, x2]
}

// Real roots of a.x^3 + b.x^2 + c.x + d = 0 in ascending order, NaN for absent roots (sorted last).
export function solveCubicFormula(
  a: number,
  b: number,
  c: number,
  d: number,
  eps: number = DEFAULT_EPSILON
): [number, number, number] {
  let x1 = NaN
  let x2 = NaN
  let x3 = NaN
  if (equal(a, 0.0, eps)) {
    ;[x1, x2] = solveQuadraticFormula(b, c, d, eps)
  } else {
    // Monic polynomial: x^3 + b.x^2 + c.x + d = 0.
    b /= a
    c /= a
    d /= a

    // Depressed polynomial: x^3 + c1.x + c0 = 0.
    const bthird = b / 3.0
    const c0 = d - bthird * (c - 2.0 * bthird * bthird)
    const c1 = c - b * bthird
    if (equal(c0, 0.0, eps)) {
      if (c1 < 0.0) {
        const tmp = Math.sqrt(-c1)
        x1 = -tmp - bthird
        x2 = tmp - bthird
        x3 = 0.0 - bthird
      } else {
        x1 = 0.0 - bthird
      }
    } else if (equal(c1, 0.0, eps)) {
      x1 = -Math.cbrt(c0) - bthird
    } else {
      let delta = -(4.0 * c1 * c1 * c1 + 27.0 * c0 * c0)
      if (equal(delta, 0.0, eps)) {
        delta = 0.0
      }

      if (delta < 0.0) {
        // One real root.
        const betaRe = -c0 / 2.0
        const betaIm = Math.sqrt(-delta / 108.0)
        x1 = Math.cbrt(betaRe - betaIm) + Math.cbrt(betaRe + betaIm) - bthird
      } else if (0.0 < delta) {
        // Three real roots.
        const betaRe = -c0 / 2.0
        const betaIm = Math.sqrt(delta / 108.0)
        const theta = Math.atan2(betaIm, betaRe) / 3.0
        const sintheta = Math.sin(theta)
        const costheta = Math.cos(theta)
        const distance = Math.sqrt(-c1 / 3.0)
        const tmp = distance * sintheta * Math.sqrt(3.0)
        x1 = 2.0 * distance * costheta - bthird
        x2 = -distance * costheta - tmp - bthird
        x3 = -distance * costheta + tmp - bthird
      } else {
        // One single and one double root.
        const tmp = (-3.0 * c0) / (2.0 * c1)
        x1 = tmp - bthird
        x2 = -2.0 * tmp - bthird
      }
    }
  }

  if (x3 < x2 || Number.isNaN(x2)) {
    ;[x2, x3] = [x3, x2]
  }
  if (x2 < x1 || Number.isNaN(x1)) {
    ;[x1, x2] = [x2, x1]
  }
  if (x3 < x2 || Number.isNaN(x2)) {
    ;[x2, x3] = [x3, x2]
  }
  return [x1, x2, x3]
}

const GL3_X = Math.sqrt(3.0 / 5.0)

export function gaussLegendre3(f: (x: number) => number, a: number, b: number): number {
  const c = (b - a) / 2.0
  const d = (a + b) / 2.0
  const q1 = f(-GL3_X * c + d)
  const q2 = f(d)
  const q3 = f(GL3_X * c + d)
  return c * ((5.0 / 9.0) * (q1 + q3) + (8.0 / 9.0) * q2)
}

const GL5_X1 = (1.0 / 3.0) * Math.sqrt(5.0 - 2.0 * Math.sqrt(10.0 / 7.0))
const GL5_X2 = (1.0 / 3.0) * Math.sqrt(5.0 + 2.0 * Math.sqrt(10.0 / 7.0))
const GL5_W1 = (322.0 + 13.0 * Math.sqrt(70.0)) / 900.0
const GL5_W2 = (322.0 - 13.0 * Math.sqrt(70.0)) / 900.0

export function gaussLegendre5(f: (x: number) => number, a: number, b: number): number {
  const c = (b - a) / 2.0
  const d = (a + b) / 2.0
  const q1 = f(-GL5_X2 * c + d)
  const q2 = f(-GL5_X1 * c + d)
  const q3 = f(d)
  const q4 = f(GL5_X1 * c + d)
  const q5 = f(GL5_X2 * c + d)
  return c * (GL5_W2 * (q1 + q5) + GL5_W1 * (q2 + q4) + (128.0 / 225.0) * q3)
}

const GL7_X = [0.9491079123427585, 0.7415311855993945, 0.4058451513773972]
const GL7_W = [0.1294849661688697, 0.2797053914892766, 0.3818300505051189, 0.4179591836734694]

export function gaussLegendre7(f: (x: number) => number, a: number, b: number): number {
  const c = (b - a) / 2.0
  const d = (a + b) / 2.0
  let sum = GL7_W[3] * f(d)
  for (let i = 0; i < 3; i++) {
    sum += GL7_W[i] * (f(-GL7_X[i] * c + d) + f(GL7_X[i] * c + d))
  }
  return c * sum
}

// Find x in [xmin, xmax] where the monotone function f equals zero.
export function bisectionMethod(
  f: (x: number) => number,
  xmin: number,
  xmax: number,
  tolerance: number = 1e-12
): number {
  let fmin = f(xmin)
  for (let i = 0; i < 100 && tolerance < xmax - xmin; i++) {
    const xmid = (xmin + xmax) / 2.0
    const fmid = f(xmid)
    if (fmid === 0.0) {
      return xmid
    } else if (Math.sign(fmid) === Math.sign(fmin)) {
      xmin = xmid
      fmin = fmid
    } else {
      xmax = xmid
    }
  }
  return (xmin + xmax) / 2.0
}

// Chebyshev polynomial approximation of f over [xmin, xmax] with n nodes. The returned function
// clamps its input to the domain and its output to [ymin, ymax] unless either bound is NaN.
export function polynomialChebyshevApprox(
  n: number,
  f: (x: number) => number,
  xmin: number,
  xmax: number,
  ymin: number,
  ymax: number
): (x: number) => number {
  const fs: number[] = []
  for (let k = 0; k < n; k++) {
    const u = Math.cos((Math.PI * (k + 1 - 0.5)) / n)
    fs.push(f(xmin + ((xmax - xmin) * (u + 1.0)) / 2.0))
  }

  const coefficients: number[] = []
  for (let j = 0; j < n; j++) {
    let a = 0.0
    for (let k = 0; k < n; k++) {
      a += fs[k] * Math.cos((j * Math.PI * (k + 1 - 0.5)) / n)
    }
    coefficients.push((2.0 / n) * a)
  }

  if (ymax < ymin) {
    ;[ymin, ymax] = [ymax, ymin]
  }
  return (x: number): number => {
    x = clamp(x, xmin, xmax)
    const u = ((x - xmin) / (xmax - xmin)) * 2.0 - 1.0
    let a = 0.0
    for (let j = 0; j < n; j++) {
      a += coefficients[j] * Math.cos(j * Math.acos(u))
    }
    let y = -0.5 * coefficients[0] + a
    if (!Number.isNaN(ymin) && !Number.isNaN(ymax)) {
      y = clamp(y, ymin, ymax)
    }
    return y
  }
}

// Approximate the inverse of the arc length function of a curve with the given speed |P'(t)|.
// Returns the function mapping a length to a parameter and the total length.
export function invSpeedPolynomialChebyshevApprox(
  n: number,
  gaussLegendre: GaussLegendreFunction,
  speed: (t: number) => number,
  tmin: number,
  tmax: number
): [(length: number) => number, number] {
  const arcLength = (t: number): number => Math.abs(gaussLegendre(speed, tmin, t))
  const totalLength = arcLength(tmax)
  const inverse = (length: number): number => {
    return bisectionMethod((t) => arcLength(t) - length, tmin, tmax)
  }
  return [polynomialChebyshevApprox(n, inverse, 0.0, totalLength, tmin, tmax), totalLength]
}
