import { describe, expect, it } from '@jest/globals'
import {
  angleBetween,
  angleBetweenExclusive,
  angleNorm,
  angleTime,
  gaussLegendre3,
  gaussLegendre5,
  gaussLegendre7,
  invSpeedPolynomialChebyshevApprox,
  polynomialChebyshevApprox,
  solveCubicFormula,
  solveQuadraticFormula
} from '../../src/utils/math'

const PI = Math.PI
const EPS = 1e-10

describe('Angles', () => {
  it.each([
    [0.0, 0.0],
    [PI, PI],
    [2.0 * PI, 0.0],
    [3.0 * PI, PI],
    [-PI, PI],
    [-2.0 * PI, 0.0]
  ])('should normalize %f to %f', (theta, norm) => {
    expect(angleNorm(theta)).toBeCloseTo(norm, 12)
  })

  it.each([
    [0.0, 0.0, 1.0, 0.0],
    [1.0, 0.0, 1.0, 1.0],
    [0.5, 0.0, 1.0, 0.5],
    [0.5 + 2.0 * PI, 0.0, 1.0, 0.5],
    [0.5, 1.0 + 2.0 * PI, 0.0 + 2.0 * PI, 0.5],
    [0.5 - 2.0 * PI, 0.0, 1.0, 0.5],
    [-0.1, 0.0, 1.0, 2.0 * PI - 0.1],
    [1.1, 0.0, 1.0, 1.1],
    [2.0, 3.0, 1.0, 0.5],
    [0.75 * PI, 1.5 * PI, 2.5 * PI, 1.25],
    [0.0 - EPS, 0.0, 1.0, 0.0]
  ])('should place %f between %f and %f at time %f', (theta, lower, upper, t) => {
    expect(angleTime(theta, lower, upper)).toBeCloseTo(t, 9)
  })

  it.each([
    [0.0, 0.0, 1.0, true],
    [1.0, 0.0, 1.0, true],
    [0.5 + 2.0 * PI, 0.0, 1.0, true],
    [0.5, 0.0 - 2.0 * PI, 1.0 - 2.0 * PI, true],
    [-0.1, 0.0, 1.0, false],
    [1.1, 0.0, 1.0, false],
    [2.0, 3.0, 1.0, true],
    [0.75 * PI, 1.5 * PI, 2.5 * PI, false],
    [0.0 - EPS, 0.0, 1.0, true]
  ])('should tell whether %f lies in [%f, %f]', (theta, lower, upper, between) => {
    expect(angleBetween(theta, lower, upper)).toBe(between)
  })

  it.each([
    [0.0, 0.0, 1.0, false],
    [1.0, 0.0, 1.0, false],
    [0.5, 1.0, 0.0, true],
    [0.5, 1.0 + 2.0 * PI, 0.0 + 2.0 * PI, true],
    [-0.1, 0.0, 1.0, false],
    [0.75 * PI, 1.5 * PI, 2.5 * PI, false],
    [0.5 * PI, 1.75 * PI, 3.0 * PI, true]
  ])('should tell whether %f lies in (%f, %f)', (theta, lower, upper, between) => {
    expect(angleBetweenExclusive(theta, lower, upper)).toBe(between)
  })
})

describe('Polynomial roots', () => {
  it('should solve degenerate quadratics', () => {
    expect(solveQuadraticFormula(0.0, 0.0, 0.0)[0]).toBe(0.0)
    expect(solveQuadraticFormula(0.0, 0.0, 0.0)[1]).toBeNaN()
    expect(solveQuadraticFormula(0.0, 0.0, 1.0)[0]).toBeNaN()
    expect(solveQuadraticFormula(0.0, 1.0, 1.0)[0]).toBe(-1.0)
    expect(solveQuadraticFormula(-4.0, 0.0, 0.0)[0]).toBe(0.0)
    expect(solveQuadraticFormula(-4.0, 0.0, 0.0)[1]).toBeNaN()
  })

  it('should solve quadratics', () => {
    expect(solveQuadraticFormula(1.0, 1.0, 0.0)).toEqual([0.0, -1.0])
    const [x1, x2] = solveQuadraticFormula(1.0, 1.0, 1.0)
    expect(x1).toBeNaN()
    expect(x2).toBeNaN()

    const [y1, y2] = solveQuadraticFormula(1.0, 1.0, 0.25)
    expect(y1).toBe(-0.5)
    expect(y2).toBeNaN()

    const [z1, z2] = solveQuadraticFormula(2.0, -5.0, 2.0)
    expect(z1).toBeCloseTo(0.5, 12)
    expect(z2).toBeCloseTo(2.0, 12)
  })

  it.each([
    [0.0, 1.0, 1.0, 0.25, [-0.5]],
    [1.0, -15.0, 75.0, -125.0, [5.0]],
    [1.0, -3.0, -6.0, 8.0, [-2.0, 1.0, 4.0]],
    [1.0, -15.0, 75.0, -124.0, [4.0]],
    [1.0, -15.0, 75.0, -126.0, [6.0]],
    [1.0, 0.0, -7.0, 6.0, [-3.0, 1.0, 2.0]],
    [1.0, -3.0, -9.0, -5.0, [-1.0, 5.0]],
    [1.0, -4.0, 2.0, -8.0, [4.0]],
    [1.0, -4.0, 2.0, 7.0, [-1.0]],
    [16.0, -24.0, 24.0, -8.0, [0.5]]
  ])('should solve the cubic (%f %f %f %f)', (a, b, c, d, roots) => {
    const xs = solveCubicFormula(a, b, c, d)
    xs.forEach((x, i) => {
      if (i < roots.length) {
        expect(x).toBeCloseTo(roots[i], 9)
      } else {
        expect(x).toBeNaN()
      }
    })
  })
})

describe('Numerical integration', () => {
  it('should integrate the logarithm with increasing accuracy', () => {
    expect(gaussLegendre3(Math.log, 0.0, 1.0)).toBeCloseTo(-0.9476723836, 8)
    expect(gaussLegendre5(Math.log, 0.0, 1.0)).toBeCloseTo(-0.9790015666, 8)
    expect(gaussLegendre7(Math.log, 0.0, 1.0)).toBeCloseTo(-0.9887384497, 8)
  })

  it('should approximate a polynomial and clamp its range', () => {
    const g = polynomialChebyshevApprox(3, (x) => x * x, 0.0, 11.0, 0.0, 100.0)
    expect(g(0.0)).toBeCloseTo(0.0, 9)
    expect(g(5.0)).toBeCloseTo(25.0, 9)
    expect(g(10.0)).toBeCloseTo(100.0, 9)
    expect(g(11.0)).toBe(100.0)
  })

  it('should invert the arc length of a parametric curve', () => {
    const speed = (t: number): number => Math.hypot(Math.cos(t), 2.0 * t)
    const [f, length] = invSpeedPolynomialChebyshevApprox(15, gaussLegendre7, speed, 0.0, 2 * PI)
    expect(length).toBeCloseTo(40.0516, 2)
    expect(f(0.0)).toBeCloseTo(0.0, 2)
    expect(f(length)).toBeCloseTo(2.0 * PI, 2)
  })
})
