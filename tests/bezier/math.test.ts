import { describe, expect, it } from '@jest/globals'
import {
  colinearCubicBezierTurns,
  colinearQuadraticBezierTurns,
  cubicBezierCurvatureRadius,
  cubicBezierDeriv,
  cubicBezierDeriv2,
  cubicBezierLength,
  cubicBezierNormal,
  cubicBezierNumInflections,
  cubicBezierPos,
  findInflectionPointRangeCubicBezier,
  findInflectionPointsCubicBezier,
  quadraticBezierDeriv,
  quadraticBezierDistance,
  quadraticBezierLength,
  quadraticBezierPos
} from '../../src/bezier/math'
import {
  quadraticToCubicBezier,
  splitCubicBezier,
  splitQuadraticBezier
} from '../../src/bezier/split'
import { Point } from '../../src/types/base'

function expectPoint(actual: Point, expected: Point, precision = 9): void {
  expect(actual.x).toBeCloseTo(expected.x, precision)
  expect(actual.y).toBeCloseTo(expected.y, precision)
}

function expectOptional(actual: number, expected: number, precision = 8): void {
  if (Number.isNaN(expected)) {
    expect(actual).toBeNaN()
  } else {
    expect(actual).toBeCloseTo(expected, precision)
  }
}

const origin = { x: 0.0, y: 0.0 }

describe('Quadratic Bezier', () => {
  const p0 = origin
  const p1 = { x: 1.0, y: 0.0 }
  const p2 = { x: 1.0, y: 1.0 }

  it('should convert to a cubic Bezier', () => {
    const [c1, c2] = quadraticToCubicBezier(origin, { x: 1.5, y: 0.0 }, { x: 3.0, y: 0.0 })
    expectPoint(c1, { x: 1.0, y: 0.0 })
    expectPoint(c2, { x: 2.0, y: 0.0 })

    const [d1, d2] = quadraticToCubicBezier(p0, p1, p2)
    expectPoint(d1, { x: 2.0 / 3.0, y: 0.0 })
    expectPoint(d2, { x: 1.0, y: 1.0 / 3.0 })
  })

  it('should split at half time', () => {
    const { first, second } = splitQuadraticBezier(p0, p1, p2, 0.5)
    expect(first).toEqual([origin, { x: 0.5, y: 0.0 }, { x: 0.75, y: 0.25 }])
    expect(second).toEqual([{ x: 0.75, y: 0.25 }, { x: 1.0, y: 0.5 }, p2])
  })

  it.each([
    [0.0, { x: 0.0, y: 0.0 }, { x: 2.0, y: 0.0 }],
    [0.5, { x: 0.75, y: 0.25 }, { x: 1.0, y: 1.0 }],
    [1.0, { x: 1.0, y: 1.0 }, { x: 0.0, y: 2.0 }]
  ])('should evaluate position and derivative at %f', (t, pos, deriv) => {
    expectPoint(quadraticBezierPos(p0, p1, p2, t), pos)
    expectPoint(quadraticBezierDeriv(p0, p1, p2, t), deriv)
  })

  it('should compute its length', () => {
    const end = { x: 2.0, y: 0.0 }
    expect(quadraticBezierLength(origin, { x: 0.5, y: 0.0 }, end)).toBeCloseTo(2.0, 9)
    expect(quadraticBezierLength(origin, { x: 1.0, y: 0.0 }, end)).toBe(2.0)
    expect(quadraticBezierLength(p0, p1, p2)).toBeCloseTo(1.623225, 5)
  })

  it.each([
    [{ x: 3.0, y: 0.0 }, { x: 2.0, y: 0.0 }, [0.75], 2.5],
    [{ x: -1.0, y: 0.0 }, { x: 2.0, y: 0.0 }, [0.25], 2.5],
    [{ x: 3.0, y: 3.0 }, { x: 2.0, y: 2.0 }, [0.75], 2.5 * Math.SQRT2],
    [{ x: 0.0, y: 0.0 }, { x: 2.0, y: 0.0 }, [], 2.0],
    [{ x: 2.0, y: 0.0 }, { x: 2.0, y: 0.0 }, [], 2.0],
    [{ x: 0.0, y: 0.0 }, { x: 0.0, y: 0.0 }, [], 0.0]
  ])('should measure a straight curve through %j to %j', (c, end, turns, length) => {
    const actual = colinearQuadraticBezierTurns(origin, c, end) ?? []
    expect(actual).toHaveLength(turns.length)
    actual.forEach((t, i) => expect(t).toBeCloseTo(turns[i], 12))
    expect(quadraticBezierLength(origin, c, end)).toBeCloseTo(length, 9)
  })

  it('should not treat a bent curve as straight', () => {
    expect(colinearQuadraticBezierTurns(p0, p1, p2)).toBeUndefined()
  })

  it.each([
    [{ x: 4.0, y: 6.0 }, { x: 8.0, y: 0.0 }, { x: 9.0, y: 0.5 }, Math.sqrt(1.25)],
    [{ x: 1.0, y: 1.0 }, { x: 2.0, y: 0.0 }, { x: 0.0, y: 0.0 }, 0.0],
    [{ x: 1.0, y: 1.0 }, { x: 2.0, y: 0.0 }, { x: 1.0, y: 1.0 }, 0.5],
    [{ x: 1.0, y: 1.0 }, { x: 2.0, y: 0.0 }, { x: 1.0, y: 0.0 }, 0.5],
    [{ x: 1.0, y: 1.0 }, { x: 2.0, y: 0.0 }, { x: -1.0, y: 0.0 }, 1.0]
  ])('should measure the distance to a point', (c, end, q, d) => {
    expect(quadraticBezierDistance(origin, c, end, q)).toBeCloseTo(d, 9)
  })
})

describe('Cubic Bezier', () => {
  const p0 = origin
  const p1 = { x: 2.0 / 3.0, y: 0.0 }
  const p2 = { x: 1.0, y: 1.0 / 3.0 }
  const p3 = { x: 1.0, y: 1.0 }

  it.each([
    [0.0, { x: 0.0, y: 0.0 }, { x: 2.0, y: 0.0 }, 2.0],
    [0.5, { x: 0.75, y: 0.25 }, { x: 1.0, y: 1.0 }, 1.0 / Math.sqrt(2.0)],
    [1.0, { x: 1.0, y: 1.0 }, { x: 0.0, y: 2.0 }, 2.0]
  ])('should evaluate position, derivatives and curvature at %f', (t, pos, deriv, radius) => {
    expectPoint(cubicBezierPos(p0, p1, p2, p3, t), pos)
    expectPoint(cubicBezierDeriv(p0, p1, p2, p3, t), deriv)
    expectPoint(cubicBezierDeriv2(p0, p1, p2, p3, t), { x: -2.0, y: 2.0 })
    expect(cubicBezierCurvatureRadius(p0, p1, p2, p3, t)).toBeCloseTo(radius, 9)
  })

  it('should have no curvature radius when straight', () => {
    const r = cubicBezierCurvatureRadius(p0, p1, { x: 2.0, y: 0.0 }, { x: 3.0, y: 0.0 }, 0.0)
    expect(r).toBeNaN()
  })

  it.each([
    [[p0, p1, p2, p3], 0, { x: 0.0, y: -1.0 }],
    [[p0, p0, p1, p3], 0, { x: 0.0, y: -1.0 }],
    [[p0, p0, p0, p1], 0, { x: 0.0, y: -1.0 }],
    [[p0, p0, p0, p0], 0, { x: 0.0, y: 0.0 }],
    [[p0, p1, p2, p3], 1, { x: 1.0, y: 0.0 }],
    [[p0, p2, p3, p3], 1, { x: 1.0, y: 0.0 }],
    [[p2, p3, p3, p3], 1, { x: 1.0, y: 0.0 }],
    [[p3, p3, p3, p3], 1, { x: 0.0, y: 0.0 }]
  ] as const)('should find the normal at the end points (%#)', (ps, t, normal) => {
    expectPoint(cubicBezierNormal(ps[0], ps[1], ps[2], ps[3], t, 1.0), normal)
  })

  it('should compute its length', () => {
    expect(cubicBezierLength(p0, p1, p2, p3)).toBeCloseTo(1.623225, 5)
  })

  it('should measure a straight curve that turns back twice', () => {
    const [c1, c2, end] = [{ x: 3.0, y: 0.0 }, { x: -1.0, y: 0.0 }, { x: 2.0, y: 0.0 }]
    const turns = colinearCubicBezierTurns(origin, c1, c2, end)
    expect(turns).toHaveLength(2)
    if (turns !== undefined) {
      expect(turns[0]).toBeCloseTo(0.5 - Math.sqrt(28.0) / 28.0, 12)
      expect(turns[1]).toBeCloseTo(0.5 + Math.sqrt(28.0) / 28.0, 12)
    }
    expect(cubicBezierLength(origin, c1, c2, end)).toBeCloseTo(2.755929, 6)
  })

  it('should measure degenerate straight curves', () => {
    const end = { x: 3.0, y: 0.0 }
    expect(colinearCubicBezierTurns(origin, origin, end, end)).toEqual([])
    expect(cubicBezierLength(origin, origin, end, end)).toBeCloseTo(3.0, 9)
    expect(colinearCubicBezierTurns(origin, origin, origin, origin)).toEqual([])
    expect(cubicBezierLength(origin, origin, origin, origin)).toBe(0.0)
    expect(colinearCubicBezierTurns(p0, p1, p2, p3)).toBeUndefined()
  })

  it('should split at half time', () => {
    const { first, second } = splitCubicBezier(p0, p1, p2, p3, 0.5)
    const expected = [
      [p0, { x: 1.0 / 3.0, y: 0.0 }, { x: 7.0 / 12.0, y: 1.0 / 12.0 }, { x: 0.75, y: 0.25 }],
      [{ x: 0.75, y: 0.25 }, { x: 11.0 / 12.0, y: 5.0 / 12.0 }, { x: 1.0, y: 2.0 / 3.0 }, p3]
    ]
    first.forEach((p, i) => expectPoint(p, expected[0][i]))
    second.forEach((p, i) => expectPoint(p, expected[1][i]))
  })

  it.each([
    [[0, 0, 0, 1, 1, 1, 1, 0], NaN, NaN],
    [[0, 0, 1, 1, 0, 1, 1, 0], 0.5, NaN],
    [[16, 467, 185, 95, 673, 545, 810, 17], 0.4565900353, NaN],
    [[859, 676, 13, 422, 781, 12, 266, 425], 0.6810755245, 0.7052992723],
    [[872, 686, 11, 423, 779, 13, 220, 376], 0.5880709424, 0.8868629954],
    [[819, 566, 43, 18, 826, 18, 25, 533], 0.4761686269, 0.5392953369],
    [[884, 574, 135, 14, 678, 14, 14, 566], 0.3208363269, 0.6822908688]
  ])('should find inflection points (%#)', (c, x1, x2) => {
    const ps = [0, 2, 4, 6].map((i) => ({ x: c[i], y: c[i + 1] }))
    const [t1, t2] = findInflectionPointsCubicBezier(ps[0], ps[1], ps[2], ps[3])
    expectOptional(t1, x1)
    expectOptional(t2, x2)
    expect(cubicBezierNumInflections(ps[0], ps[1], ps[2], ps[3])).toBe(
      [x1, x2].filter((x) => !Number.isNaN(x)).length
    )
  })

  it.each([
    [[0, 0, 1, 1, 0, 1, 1, 0], NaN, 0.25, Infinity, Infinity],
    [[0, 0, 0, 0, 0, 0, 1, 0], 0.0, 0.25, 0.0, 1.0],
    [[0, 0, 0, 0, 1, 0, 1, 0], 0.0, 0.25, 0.0, 1.0],
    [[0, 0, 0, 1, 1, 1, 1, 0], 0.5, 1.0, -0.0503212081, 1.0503212081],
    [[0, 0, 0, 1, 1, 1, 1, 0], 0.5, 1e-9, 0.4994496788, 0.5005503212]
  ])('should find the flat range around an inflection point (%#)', (c, t, tol, x1, x2) => {
    const ps = [0, 2, 4, 6].map((i) => ({ x: c[i], y: c[i + 1] }))
    const [t1, t2] = findInflectionPointRangeCubicBezier(ps[0], ps[1], ps[2], ps[3], t, tol)
    if (x1 === Infinity) {
      expect(t1).toBe(Infinity)
      expect(t2).toBe(Infinity)
    } else {
      expect(t1).toBeCloseTo(x1, 8)
      expect(t2).toBeCloseTo(x2, 8)
    }
  })
})
