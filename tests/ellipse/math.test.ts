import { describe, expect, it } from '@jest/globals'
import {
  ellipseCurvatureRadius,
  ellipseDeriv,
  ellipseDeriv2,
  ellipseLength,
  ellipseNormal,
  ellipsePos,
  ellipseRadiiCorrection,
  ellipseSplit,
  ellipseToCenter
} from '../../src/ellipse/math'
import { Point } from '../../src/types/base'

const PI = Math.PI

function expectPoint(actual: Point, expected: Point): void {
  expect(actual.x).toBeCloseTo(expected.x, 9)
  expect(actual.y).toBeCloseTo(expected.y, 9)
}

describe('Ellipse', () => {
  it('should evaluate position and derivatives', () => {
    expectPoint(ellipsePos(2.0, 1.0, PI / 2.0, 1.0, 0.5, 0.0), { x: 1.0, y: 2.5 })
    expectPoint(ellipseDeriv(2.0, 1.0, PI / 2.0, true, 0.0), { x: -1.0, y: 0.0 })
    expectPoint(ellipseDeriv(2.0, 1.0, PI / 2.0, false, 0.0), { x: 1.0, y: 0.0 })
    expectPoint(ellipseDeriv2(2.0, 1.0, PI / 2.0, 0.0), { x: 0.0, y: -2.0 })
    expectPoint(ellipseNormal(2.0, 1.0, PI / 2.0, true, 0.0, 1.0), { x: 0.0, y: 1.0 })
    expectPoint(ellipseNormal(2.0, 1.0, PI / 2.0, false, 0.0, 1.0), { x: 0.0, y: -1.0 })
  })

  it('should compute the signed curvature radius', () => {
    expect(ellipseCurvatureRadius(2.0, 1.0, true, 0.0)).toBeCloseTo(0.5, 12)
    expect(ellipseCurvatureRadius(2.0, 1.0, false, 0.0)).toBeCloseTo(-0.5, 12)
    expect(ellipseCurvatureRadius(2.0, 1.0, true, PI / 2.0)).toBeCloseTo(4.0, 12)
    expect(ellipseCurvatureRadius(2.0, 0.0, true, 0.0)).toBeNaN()
  })

  it('should measure arc length and radii correction', () => {
    expect(ellipseLength(2.0, 1.0, 0.0, PI / 2.0)).toBeCloseTo(2.422110222, 3)
    expect(ellipseLength(2.0, 1.0, PI / 2.0, 0.0)).toBeCloseTo(2.422110222, 3)
    const correction = ellipseRadiiCorrection({ x: 0, y: 0 }, 0.1, 0.1, 0.0, { x: 1, y: 0 })
    expect(correction).toBeCloseTo(5.0, 12)
  })

  it.each([
    [[0.0, 0.0, 2.0, 2.0, 0.0, 2.0, 2.0], false, false, [2.0, 0.0, PI, PI / 2.0]],
    [[0.0, 0.0, 2.0, 2.0, 0.0, 2.0, 2.0], true, false, [0.0, 2.0, (PI * 3.0) / 2.0, 0.0]],
    [[0.0, 0.0, 2.0, 2.0, 0.0, 2.0, 2.0], true, true, [2.0, 0.0, PI, (PI * 5.0) / 2.0]],
    [[0.0, 0.0, 2.0, 1.0, PI / 2.0, 1.0, 2.0], false, false, [1.0, 0.0, PI / 2.0, 0.0]],
    [[0.0, 0.0, 0.1, 0.1, 0.0, 1.0, 0.0], false, false, [0.5, 0.0, PI, 0.0]],
    [[0.0, 0.0, 1.0, 1.0, 0.0, 0.0, 0.0], false, false, [0.0, 0.0, 0.0, 0.0]],
    [[8.2, 18.0, 0.2, 0.2, 0.0, 7.8, 18.0], false, true, [8.0, 18.0, 0.0, PI]],
    [[7.8, 18.0, 0.2, 0.2, 0.0, 8.2, 18.0], false, true, [8.0, 18.0, PI, 2.0 * PI]],
    [
      [-1.0 / Math.SQRT2, 0.0, 1.0, 1.0, 0.0, 1.0 / Math.SQRT2, 0.0],
      false,
      false,
      [0.0, -1.0 / Math.SQRT2, (3.0 / 4.0) * PI, (1.0 / 4.0) * PI]
    ]
  ])('should convert to the center parametrization (%#)', (arc, large, sweep, center) => {
    const [x1, y1, rx, ry, phi, x2, y2] = arc
    const { cx, cy, theta0, theta1 } = ellipseToCenter(x1, y1, rx, ry, phi, large, sweep, x2, y2)
    expect(cx).toBeCloseTo(center[0], 9)
    expect(cy).toBeCloseTo(center[1], 9)
    expect(theta0).toBeCloseTo(center[2], 9)
    expect(theta1).toBeCloseTo(center[3], 9)
  })

  it('should split an arc at an angle', () => {
    const half = ellipseSplit(2.0, 1.0, 0.0, 0.0, 0.0, PI, 0.0, PI / 2.0)
    expect(half).toBeDefined()
    expectPoint(half?.mid ?? { x: NaN, y: NaN }, { x: 0.0, y: 1.0 })
    expect(half?.large0).toBe(false)
    expect(half?.large1).toBe(false)

    expect(ellipseSplit(2.0, 1.0, 0.0, 0.0, 0.0, PI, 0.0, -PI / 2.0)).toBeUndefined()

    const early = ellipseSplit(2.0, 1.0, 0.0, 0.0, 0.0, 0.0, (PI * 7.0) / 4.0, PI / 2.0)
    expectPoint(early?.mid ?? { x: NaN, y: NaN }, { x: 0.0, y: 1.0 })
    expect(early?.large0).toBe(false)
    expect(early?.large1).toBe(true)

    const late = ellipseSplit(2.0, 1.0, 0.0, 0.0, 0.0, 0.0, (PI * 7.0) / 4.0, (PI * 3.0) / 2.0)
    expectPoint(late?.mid ?? { x: NaN, y: NaN }, { x: 0.0, y: -1.0 })
    expect(late?.large0).toBe(true)
    expect(late?.large1).toBe(false)
  })
})
